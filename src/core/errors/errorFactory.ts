// src/core/errors/errorFactory.ts

import * as Errors from './errors';
import { ErrorContext } from './ErrorContext';

/**
 * Factory class to create consistent error instances across the runtime.
 */
export class ErrorFactory {
    static unknownTarget(message: string, context?: ErrorContext) {
        return new Errors.UnknownTargetError(message, context);
    }

    static inactiveModule(message: string, context?: ErrorContext) {
        return new Errors.InactiveModuleError(message, context);
    }

    static taskFailure(message: string, context?: ErrorContext) {
        return new Errors.TaskFailureError(message, context);
    }

    static bridge(message: string, context?: ErrorContext) {
        return new Errors.BridgeError(message, context);
    }

    static configuration(message: string, context?: ErrorContext) {
        return new Errors.ConfigurationError(message, context);
    }

    static validation(message: string, context?: ErrorContext) {
        return new Errors.ValidationError(message, context);
    }
}
