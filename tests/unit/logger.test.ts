// tests/unit/logger.test.ts

import { Logger, LogLevel } from '../../src/core/logging/Logger';
import { BridgeError } from '../../src/core/errors';

describe('Logger', () => {
    let output: jest.SpyInstance;
    let previousLevel: LogLevel;

    beforeEach(() => {
        previousLevel = Logger.getLevel();
        output = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        Logger.setLevel(previousLevel);
        jest.restoreAllMocks();
    });

    it('should default to errors only under test', () => {
        expect(Logger.getLevel()).toBe(LogLevel.ERROR);
    });

    it('should drop messages below the current level', () => {
        Logger.setLevel(LogLevel.WARN);

        Logger.info('Test', 'hidden');
        Logger.warn('Test', 'shown');

        expect(output).toHaveBeenCalledTimes(1);
        expect(output.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN\] \[Test\] shown$/);
    });

    it('should append serialized context and redact secrets', () => {
        Logger.setLevel(LogLevel.DEBUG);

        Logger.debug('Test', 'connecting', { host: 'local', apiKey: 'test-secret', nested: { password: 'pw' } });

        expect(output.mock.calls[0][0]).toMatch(
            / connecting \{"host":"local","apiKey":"\[REDACTED\]","nested":\{"password":"\[REDACTED\]"\}\}$/,
        );
    });

    it('should append the stack of an error', () => {
        Logger.setLevel(LogLevel.ERROR);
        const error = new Error('kaput');

        Logger.critical('Test', 'failed', error);

        expect(output.mock.calls[0][0]).toContain(`[CRITICAL] [Test] failed Stack: ${error.stack}`);
    });

    it('should include the context of runtime errors', () => {
        Logger.setLevel(LogLevel.ERROR);
        const error = new BridgeError('too slow', { code: 'BRIDGE_TIMEOUT', retryable: true });

        Logger.error('Test', 'call failed', error);

        expect(output.mock.calls[0][0]).toContain(
            `[ERROR] [Test] call failed Context: {"code":"BRIDGE_TIMEOUT","component":"THREAD_BRIDGE","retryable":true} Stack: ${error.stack}`,
        );
    });

    it('should survive context that cannot be serialized', () => {
        Logger.setLevel(LogLevel.INFO);
        const circular: Record<string, unknown> = {};
        circular.self = circular;

        Logger.info('Test', 'loop', circular);

        expect(output.mock.calls[0][0]).toMatch(/ loop \[unserializable\]$/);
    });

    it('should print nothing when silenced', () => {
        Logger.setLevel(LogLevel.SILENT);

        Logger.critical('Test', 'quiet');

        expect(output).not.toHaveBeenCalled();
    });
});
