import type { Metadata } from '../metadata/Metadata';
import type { Task } from '../tasks/types';

/**
 * Keyword arguments passed to a module method or event handler.
 */
export type Kwargs = Record<string, unknown>;

/**
 * Lifecycle state of a module. Only `active` modules accept targeted calls.
 */
export type ModuleState = 'created' | 'started' | 'active' | 'inactive' | 'stopping' | 'stopped';

export interface CallContext {
    /** The module the handler belongs to */
    module: RuntimeModule;
    /** Aborted when the runtime cancels outstanding tasks */
    signal: AbortSignal;
}

export type MethodHandler = (kwargs: Kwargs, context: CallContext) => unknown;

export interface CallOptions {
    /** Log an error when the method is not implemented (default true) */
    logUnknown?: boolean;
    signal?: AbortSignal;
}

/**
 * A named unit hosted by the runtime.
 */
export interface RuntimeModule {
    readonly name: string;
    readonly isReady: boolean;

    hasMethod(method: string): boolean;

    /**
     * Invokes a method or event handler by name.
     * Resolves to `undefined` when the module does not implement it.
     */
    callMethod(method: string, kwargs?: Kwargs, options?: CallOptions): Promise<unknown>;
}

export interface BroadcastOptions {
    /** Dispatch each delivery as a task (default) or await it in place */
    asynchronous?: boolean;
}

/**
 * Entry points of the runtime handed to every module at construction.
 */
export interface ModuleFunctions {
    triggerEvent(event: string, metadata: Metadata, kwargs?: Kwargs): Promise<void>;
    enqueueTask(target: string, metadata: Metadata, kwargs?: Kwargs): Promise<void>;
    execTask(target: string, metadata: Metadata, kwargs?: Kwargs): Promise<unknown>;
    execTaskAsync(target: string, metadata: Metadata, kwargs?: Kwargs): Promise<Task | undefined>;
    broadcastEvent(event: string, metadata: Metadata, kwargs?: Kwargs, options?: BroadcastOptions): Promise<void>;
    callMethodAsync(module: RuntimeModule, method: string, kwargs?: Kwargs, options?: CallOptions): Promise<Task>;
}

export type ModuleClass = new (name: string, functions: ModuleFunctions) => RuntimeModule;
