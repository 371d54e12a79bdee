// src/config/config.ts

import path from 'path';
import { ENV } from './env';

/**
 * Project root derived from the file location so it holds
 * even if the process is started from a different working directory.
 */
const PROJECT_ROOT = path.resolve(__dirname, '../..');

interface SchedulerConfig {
    HIGH_WATER_FACTOR: number;
    LOW_WATER_FACTOR: number;
    MAX_ADMISSION_WAIT_MS: number;
}

interface BridgeConfig {
    TIMEOUT_MS: number;
}

interface FailuresConfig {
    EXCEPTION_PATH?: string;
}

interface Config {
    SCHEDULER: SchedulerConfig;
    BRIDGE: BridgeConfig;
    FAILURES: FailuresConfig;
}

/**
 * Centralized configuration for the module runtime.
 */
export const CONFIG: Config = {
    SCHEDULER: {
        HIGH_WATER_FACTOR: ENV.ADMISSION_HIGH_WATER_FACTOR, // start waiting above factor × modules
        LOW_WATER_FACTOR: ENV.ADMISSION_LOW_WATER_FACTOR,   // resume at or below factor × modules
        MAX_ADMISSION_WAIT_MS: ENV.ADMISSION_MAX_WAIT_MS,
    },

    BRIDGE: {
        TIMEOUT_MS: ENV.BRIDGE_TIMEOUT_MS,
    },

    FAILURES: {
        EXCEPTION_PATH: ENV.EXCEPTION_PATH
            ? path.resolve(PROJECT_ROOT, ENV.EXCEPTION_PATH)
            : undefined,
    },
};
