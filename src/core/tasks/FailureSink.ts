import fs from 'fs';
import path from 'path';

/**
 * Append-only destination for unrecovered task failures.
 */
export interface FailureSink {
    record(error: unknown, label?: string): void;
}

/**
 * Appends one entry per failure: a timestamp line, the stack trace, a blank line.
 */
export class FileFailureSink implements FailureSink {
    constructor(private readonly filePath: string) { }

    public record(error: unknown, label?: string): void {
        const timestamp = new Date().toISOString().replace('T', ' ');
        const header = label ? `${timestamp} [${label}]` : timestamp;
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        fs.appendFileSync(this.filePath, `${header}\n${formatTrace(error)}\n\n`);
    }
}

export function formatTrace(error: unknown): string {
    if (error instanceof Error) {
        return error.stack ?? `${error.name}: ${error.message}`;
    }
    return `Non-error rejection: ${String(error)}`;
}
