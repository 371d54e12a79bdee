import { Logger } from '../logging/Logger';
import { Metadata } from '../metadata/Metadata';
import { Kwargs } from '../modules/types';

/**
 * A pending method call (`module.method`) or event broadcast (bare name).
 */
export interface QueueItem {
    target: string;
    metadata: Metadata;
    kwargs: Kwargs;
}

export type ItemProcessor = (item: QueueItem) => Promise<void>;

/**
 * Called whenever the queue is observed empty; returning true ends `run()`.
 */
export type IdleHandler = () => Promise<boolean>;

/**
 * FIFO work queue drained by a single consumer loop on the scheduler thread.
 */
export class EventLoop {
    private items: QueueItem[] = [];
    private wake: (() => void) | null = null;
    private stopped = false;
    private running = false;

    constructor(
        private readonly processItem: ItemProcessor,
        private readonly onIdle: IdleHandler,
    ) { }

    public get size(): number {
        return this.items.length;
    }

    public get isRunning(): boolean {
        return this.running;
    }

    public put(target: string, metadata: Metadata, kwargs: Kwargs = {}): void {
        this.items.push({ target, metadata, kwargs });
        this.notify();
    }

    /**
     * Ends `run()` at its next check, waking it if it is waiting for items.
     */
    public stop(): void {
        this.stopped = true;
        this.notify();
    }

    public async run(): Promise<void> {
        if (this.running) {
            throw new Error('Event loop is already running');
        }
        this.running = true;
        try {
            while (!this.stopped) {
                const item = this.items.shift();
                if (item) {
                    await this.process(item);
                    continue;
                }

                if (await this.onIdle()) break;
                if (this.items.length === 0 && !this.stopped) {
                    await this.waitForItem();
                }
            }
        } finally {
            this.running = false;
        }
        Logger.debug('EventLoop', 'Event loop finished', { pending: this.items.length });
    }

    private async process(item: QueueItem): Promise<void> {
        try {
            await this.processItem(item);
        } catch (error) {
            Logger.error('EventLoop', `Failed to process queue item [${item.target}]`, error);
        }
    }

    private waitForItem(): Promise<void> {
        return new Promise(resolve => {
            this.wake = resolve;
        });
    }

    private notify(): void {
        const wake = this.wake;
        this.wake = null;
        wake?.();
    }
}
