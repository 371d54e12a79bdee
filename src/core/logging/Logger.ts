// src/core/logging/Logger.ts

/**
 * Structured Logger Service
 *
 * Centralizes logging to ensure:
 * 1. Structured output (timestamps, levels, components)
 * 2. Redaction of secret-looking context values
 * 3. Configurable verbosity
 */

import { ENV, LogLevelName } from '../../config/env';
import { ModuleRuntimeError } from '../errors/ModuleRuntimeError';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    CRITICAL = 4,
    SILENT = 5,
}

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    critical: LogLevel.CRITICAL,
    silent: LogLevel.SILENT,
};

function defaultLevel(): LogLevel {
    if (ENV.LOG_LEVEL) {
        return LEVEL_BY_NAME[ENV.LOG_LEVEL];
    }
    switch (ENV.NODE_ENV) {
        case 'production':
            return LogLevel.INFO;
        case 'test':
            return LogLevel.ERROR;
        default:
            return LogLevel.DEBUG;
    }
}

export class Logger {
    private static currentLevel: LogLevel = defaultLevel();

    /**
     * Context keys whose values never reach the log output.
     */
    private static SECRET_KEY_REGEX = /(password|secret|token|api[-_]?key)/i;

    public static setLevel(level: LogLevel): void {
        this.currentLevel = level;
    }

    public static getLevel(): LogLevel {
        return this.currentLevel;
    }

    /**
     * Serializes a value, replacing secret-looking entries.
     */
    private static serialize(value: unknown): string {
        try {
            return JSON.stringify(value, (key, entry: unknown) => {
                if (key && this.SECRET_KEY_REGEX.test(key)) {
                    return '[REDACTED]';
                }
                return typeof entry === 'bigint' ? entry.toString() : entry;
            }) ?? String(value);
        } catch (e) {
            return '[unserializable]'; // Circular reference or throwing getter
        }
    }

    private static formatMessage(level: string, component: string, message: unknown, context?: unknown): string {
        const timestamp = new Date().toISOString();

        let log = `[${timestamp}] [${level}] [${component}] ${typeof message === 'string' ? message : this.serialize(message)}`;

        if (context !== undefined) {
            log += ` ${this.serialize(context)}`;
        }

        return log;
    }

    private static errorDetails(error: unknown): string {
        if (error instanceof ModuleRuntimeError) {
            return ` Context: ${this.serialize(error.context)} Stack: ${error.stack}`;
        } else if (error instanceof Error) {
            return ` Stack: ${error.stack}`;
        } else if (error !== undefined) {
            return ` Details: ${this.serialize(error)}`;
        }
        return '';
    }

    public static debug(component: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.error(this.formatMessage('DEBUG', component, message, context));
        }
    }

    public static info(component: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.error(this.formatMessage('INFO', component, message, context));
        }
    }

    public static warn(component: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.error(this.formatMessage('WARN', component, message, context));
        }
    }

    public static error(component: string, message: unknown, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            console.error(this.formatMessage('ERROR', component, message) + this.errorDetails(error));
        }
    }

    public static critical(component: string, message: unknown, error?: unknown): void {
        if (this.currentLevel <= LogLevel.CRITICAL) {
            console.error(this.formatMessage('CRITICAL', component, message) + this.errorDetails(error));
        }
    }
}
