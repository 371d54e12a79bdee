// src/core/errors/errors.ts

import { ModuleRuntimeError } from './ModuleRuntimeError';
import { ErrorContext } from './ErrorContext';

/**
 * Raised (or logged) when a call names a module or method that is not registered.
 */
export class UnknownTargetError extends ModuleRuntimeError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'UNKNOWN_TARGET',
            component: 'MODULE_REGISTRY',
            ...context
        });
        this.name = 'UnknownTargetError';
    }
}

/**
 * Raised (or logged) when a call reaches a module that is not in its active state.
 */
export class InactiveModuleError extends ModuleRuntimeError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'MODULE_INACTIVE',
            component: 'MODULE_REGISTRY',
            retryable: true,
            ...context
        });
        this.name = 'InactiveModuleError';
    }
}

/**
 * Wraps a failure thrown inside an asynchronously dispatched task.
 */
export class TaskFailureError extends ModuleRuntimeError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'TASK_FAILURE',
            component: 'TASK_DISPATCHER',
            ...context
        });
        this.name = 'TaskFailureError';
    }
}

/**
 * Thrown when a cross-thread call cannot be delivered, times out, or fails remotely.
 */
export class BridgeError extends ModuleRuntimeError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'BRIDGE_ERROR',
            component: 'THREAD_BRIDGE',
            ...context
        });
        this.name = 'BridgeError';
    }
}

/**
 * Thrown when environment configuration fails validation.
 */
export class ConfigurationError extends ModuleRuntimeError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'CONFIG_ERROR',
            component: 'CONFIG',
            ...context
        });
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when a call target or bridge message is malformed.
 */
export class ValidationError extends ModuleRuntimeError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, {
            code: 'VALIDATION_ERROR',
            component: 'CORE_VALIDATION',
            ...context
        });
        this.name = 'ValidationError';
    }
}
