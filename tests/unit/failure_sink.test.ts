// tests/unit/failure_sink.test.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileFailureSink, formatTrace } from '../../src/core/tasks/FailureSink';

describe('FileFailureSink', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'failure-sink-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should append a timestamped entry with the stack trace', () => {
        const file = path.join(dir, 'nested', 'exceptions.log');
        const sink = new FileFailureSink(file);
        const error = new Error('disk on fire');

        sink.record(error, 'A.fail');

        const content = fs.readFileSync(file, 'utf8');
        const [header, ...rest] = content.split('\n');
        expect(header).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3}Z \[A\.fail\]$/);
        expect(rest.join('\n')).toBe(`${error.stack}\n\n`);
        expect(content.endsWith('\n\n')).toBe(true);
    });

    it('should keep earlier entries', () => {
        const file = path.join(dir, 'exceptions.log');
        const sink = new FileFailureSink(file);

        sink.record(new Error('first'));
        sink.record('plain reason');

        const entries = fs.readFileSync(file, 'utf8').split('\n\n').filter(Boolean);
        expect(entries).toHaveLength(2);
        expect(entries[0]).toContain('Error: first');
        expect(entries[1].split('\n')[1]).toBe('Non-error rejection: plain reason');
    });
});

describe('formatTrace', () => {
    it('should fall back to name and message without a stack', () => {
        const error = new Error('no stack');
        error.stack = undefined;

        expect(formatTrace(error)).toBe('Error: no stack');
    });
});
