import { Logger } from '../logging/Logger';
import { Metadata } from '../metadata/Metadata';
import {
    CallOptions,
    Kwargs,
    MethodHandler,
    ModuleFunctions,
    ModuleState,
    RuntimeModule,
} from './types';
import { describeCall } from './targets';

/**
 * State a module moves to once the named lifecycle method has run.
 */
const LIFECYCLE_TRANSITIONS: ReadonlyMap<string, ModuleState> = new Map<string, ModuleState>([
    ['startup', 'started'],
    ['activate', 'active'],
    ['deactivate', 'inactive'],
    ['initiate_shutdown', 'stopping'],
    ['finalize_shutdown', 'stopped'],
]);

/**
 * Base class for runtime modules.
 *
 * Subclasses register their methods and event handlers with `on()` in the
 * constructor. Lifecycle methods (`startup`, `activate`, `deactivate`,
 * `initiate_shutdown`, `finalize_shutdown`) advance the module state even
 * when no handler is registered for them.
 */
export abstract class BaseModule implements RuntimeModule {
    private readonly handlers = new Map<string, MethodHandler>();
    private state: ModuleState = 'created';

    constructor(
        public readonly name: string,
        protected readonly functions: ModuleFunctions,
    ) { }

    public get isReady(): boolean {
        return this.state === 'active';
    }

    public get lifecycleState(): ModuleState {
        return this.state;
    }

    public hasMethod(method: string): boolean {
        return this.handlers.has(method);
    }

    /**
     * Registers the handler for a method or event. A later call replaces it.
     */
    protected on(method: string, handler: MethodHandler): this {
        this.handlers.set(method, handler);
        return this;
    }

    /**
     * Metadata naming this module as the source, for calls it originates.
     */
    protected createMetadata(): Metadata {
        return new Metadata(this, this.name);
    }

    public async callMethod(method: string, kwargs: Kwargs = {}, options: CallOptions = {}): Promise<unknown> {
        const { logUnknown = true } = options;
        const handler = this.handlers.get(method);
        const transition = LIFECYCLE_TRANSITIONS.get(method);

        if (!handler) {
            if (transition) {
                this.state = transition;
            } else if (logUnknown) {
                Logger.error(this.name, `Unknown method [${describeCall(`${this.name}.${method}`, kwargs)}]`);
            }
            return undefined;
        }

        const signal = options.signal ?? new AbortController().signal;
        const result = await handler(kwargs, { module: this, signal });
        if (transition) {
            this.state = transition;
        }
        return result;
    }
}
