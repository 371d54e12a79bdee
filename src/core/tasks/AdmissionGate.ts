import { CONFIG } from '../../config/config';
import { Logger } from '../logging/Logger';
import { AdmissionResult } from './types';

export interface AdmissionOptions {
    /** Start waiting when load exceeds this many tasks per module */
    highWaterFactor: number;
    /** Resume once load is at or below this many tasks per module */
    lowWaterFactor: number;
    /** Proceed regardless after waiting this long */
    maxWaitMs: number;
}

export const DEFAULT_ADMISSION: AdmissionOptions = {
    highWaterFactor: CONFIG.SCHEDULER.HIGH_WATER_FACTOR,
    lowWaterFactor: CONFIG.SCHEDULER.LOW_WATER_FACTOR,
    maxWaitMs: CONFIG.SCHEDULER.MAX_ADMISSION_WAIT_MS,
};

/**
 * Advisory admission control for new tasks.
 *
 * Waiters are woken by `release()` whenever a task completes and re-check the
 * load; the wait is bounded by `maxWaitMs`, after which the caller proceeds.
 */
export class AdmissionGate {
    private readonly options: AdmissionOptions;
    private waiters: Set<() => void> = new Set();

    constructor(options: Partial<AdmissionOptions> = {}) {
        this.options = { ...DEFAULT_ADMISSION, ...options };
    }

    public get waiting(): number {
        return this.waiters.size;
    }

    public async admit(load: () => number, capacity: number): Promise<AdmissionResult> {
        const { highWaterFactor, lowWaterFactor, maxWaitMs } = this.options;
        if (load() <= highWaterFactor * capacity) {
            return 'immediate';
        }

        Logger.info('AdmissionGate', 'Waiting for free slot before starting the next task', {
            running: load(),
            modules: capacity,
        });
        const deadline = Date.now() + maxWaitMs;
        while (load() > lowWaterFactor * capacity) {
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                Logger.warn('AdmissionGate', 'Starting the next task after a long wait; check reasons for long running tasks', {
                    running: load(),
                    waitedMs: maxWaitMs,
                });
                return 'forced';
            }
            await this.waitForRelease(remaining);
        }
        return 'waited';
    }

    /**
     * Wakes every waiter so it re-evaluates the load.
     */
    public release(): void {
        const waiters = Array.from(this.waiters);
        this.waiters.clear();
        waiters.forEach(wake => wake());
    }

    private waitForRelease(timeoutMs: number): Promise<void> {
        return new Promise(resolve => {
            const wake = () => {
                clearTimeout(timer);
                this.waiters.delete(wake);
                resolve();
            };
            const timer = setTimeout(wake, timeoutMs);
            this.waiters.add(wake);
        });
    }
}
