// src/core/errors/ModuleRuntimeError.ts

import { ErrorContext } from './ErrorContext';

/**
 * Base error class for every error raised by the module runtime.
 * Carries structured context so it can be logged and sent across threads as-is.
 */
export class ModuleRuntimeError extends Error {
    public readonly context: ErrorContext;

    constructor(message: string, context: ErrorContext = {}) {
        super(message);
        this.name = 'ModuleRuntimeError';
        this.context = context;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    public get code(): string {
        return this.context.code || 'RUNTIME_ERROR';
    }
}
