import { Logger } from '../logging/Logger';
import { Metadata } from '../metadata/Metadata';
import { ModuleRegistry } from '../modules/ModuleRegistry';
import { BroadcastOptions, Kwargs } from '../modules/types';
import { describeCall } from '../modules/targets';
import { TaskDispatcher } from '../tasks/TaskDispatcher';
import { RuntimeEvents, SHUTDOWN_STAGES } from './constants';

/**
 * Delivers named events to every registered module except the one that raised them.
 * Owns the exit flag, set the first time `on_exit` is broadcast.
 */
export class EventBroadcaster {
    private exitFlag = false;
    // Claimed before the first await so overlapping exits see it
    private shutdownStarted = false;

    constructor(
        private readonly registry: ModuleRegistry,
        private readonly dispatcher: TaskDispatcher,
        private readonly createMetadata: () => Metadata,
    ) { }

    public get exitRequested(): boolean {
        return this.exitFlag;
    }

    public async broadcast(
        event: string,
        metadata: Metadata,
        kwargs: Kwargs = {},
        options: BroadcastOptions = {},
    ): Promise<void> {
        const { asynchronous = true } = options;

        if (event === RuntimeEvents.EXIT) {
            if (this.shutdownStarted) {
                Logger.warn('EventBroadcaster', 'Shutdown already in progress; ignoring repeated exit event', {
                    source: metadata.sourceName,
                });
                return;
            }
            this.shutdownStarted = true;
        }

        Logger.debug('EventBroadcaster', `Broadcasting event [${describeCall(event, kwargs)}]`, {
            source: metadata.sourceName,
            asynchronous,
        });
        for (const [, module] of this.registry.entries()) {
            if (metadata.isFrom(module)) continue; // split horizon
            if (asynchronous) {
                await this.dispatcher.callMethodAsync(module, event, kwargs, { logUnknown: false });
            } else {
                await module.callMethod(event, kwargs, { logUnknown: false });
            }
        }

        if (event === RuntimeEvents.EXIT) {
            this.exitFlag = true;
            await this.shutdown();
        }
    }

    /**
     * Broadcasts each shutdown stage synchronously; a stage finishes on every
     * module before the next starts.
     */
    private async shutdown(): Promise<void> {
        for (const stage of SHUTDOWN_STAGES) {
            Logger.info('EventBroadcaster', `Shutdown stage [${stage}]`);
            await this.broadcast(stage, this.createMetadata(), {}, { asynchronous: false });
        }
    }
}
