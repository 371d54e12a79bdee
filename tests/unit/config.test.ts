// tests/unit/config.test.ts

import { parseEnv } from '../../src/config/env';
import { CONFIG } from '../../src/config/config';
import {
    BridgeError,
    ConfigurationError,
    ErrorFactory,
    InactiveModuleError,
    ModuleRuntimeError,
    UnknownTargetError,
} from '../../src/core/errors';

describe('Environment configuration', () => {
    it('should apply defaults to an empty environment', () => {
        const env = parseEnv({});

        expect(env.NODE_ENV).toBe('development');
        expect(env.LOG_LEVEL).toBeUndefined();
        expect(env.EXCEPTION_PATH).toBeUndefined();
        expect(env.ADMISSION_HIGH_WATER_FACTOR).toBe(2);
        expect(env.ADMISSION_LOW_WATER_FACTOR).toBe(1);
        expect(env.ADMISSION_MAX_WAIT_MS).toBe(2047);
        expect(env.BRIDGE_TIMEOUT_MS).toBe(30000);
    });

    it('should coerce numeric strings', () => {
        const env = parseEnv({ ADMISSION_MAX_WAIT_MS: '150', ADMISSION_HIGH_WATER_FACTOR: '4', LOG_LEVEL: 'warn' });

        expect(env.ADMISSION_MAX_WAIT_MS).toBe(150);
        expect(env.ADMISSION_HIGH_WATER_FACTOR).toBe(4);
        expect(env.LOG_LEVEL).toBe('warn');
    });

    it('should reject a low-water factor above the high-water factor', () => {
        expect(() => parseEnv({ ADMISSION_LOW_WATER_FACTOR: '3' })).toThrow(ConfigurationError);

        try {
            parseEnv({ ADMISSION_LOW_WATER_FACTOR: '3' });
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigurationError);
            expect(error instanceof ConfigurationError && error.code).toBe('CONFIG_ERROR');
            expect(error instanceof Error && error.message).toBe(
                'Invalid environment configuration (ADMISSION_LOW_WATER_FACTOR: ADMISSION_LOW_WATER_FACTOR must not exceed ADMISSION_HIGH_WATER_FACTOR)',
            );
        }
    });

    it('should reject unknown log levels and non-numeric values', () => {
        expect(() => parseEnv({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
        expect(() => parseEnv({ BRIDGE_TIMEOUT_MS: 'soon' })).toThrow(/BRIDGE_TIMEOUT_MS/);
    });

    it('should expose the scheduler settings through CONFIG', () => {
        expect(CONFIG.SCHEDULER.LOW_WATER_FACTOR).toBeLessThanOrEqual(CONFIG.SCHEDULER.HIGH_WATER_FACTOR);
        expect(CONFIG.BRIDGE.TIMEOUT_MS).toBeGreaterThan(0);
    });
});

describe('Runtime errors', () => {
    it('should carry a default code per error class', () => {
        expect(new UnknownTargetError('x').code).toBe('UNKNOWN_TARGET');
        expect(new InactiveModuleError('x').code).toBe('MODULE_INACTIVE');
        expect(new BridgeError('x').code).toBe('BRIDGE_ERROR');
        expect(new ModuleRuntimeError('x').code).toBe('RUNTIME_ERROR');
    });

    it('should let the caller override the code', () => {
        const error = ErrorFactory.bridge('timed out', { code: 'BRIDGE_TIMEOUT' });

        expect(error).toBeInstanceOf(BridgeError);
        expect(error.code).toBe('BRIDGE_TIMEOUT');
        expect(error.context.component).toBe('THREAD_BRIDGE');
    });

    it('should mark inactive modules as retryable', () => {
        expect(ErrorFactory.inactiveModule('later').context.retryable).toBe(true);
    });

    it('should merge the caller context over the class defaults', () => {
        const error = ErrorFactory.taskFailure('boom', { target: 'a.b' });

        expect(error.name).toBe('TaskFailureError');
        expect(error.context).toEqual({ code: 'TASK_FAILURE', component: 'TASK_DISPATCHER', target: 'a.b' });
    });
});
