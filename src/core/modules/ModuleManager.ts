import { threadId } from 'worker_threads';
import { CONFIG } from '../../config/config';
import type { BridgeEndpoint } from '../bridge/BridgeClient';
import { BridgeTarget, ThreadBridge } from '../bridge/ThreadBridge';
import { ErrorFactory } from '../errors';
import { EVENT_PREFIX, RuntimeEvents } from '../events/constants';
import { EventBroadcaster } from '../events/EventBroadcaster';
import { Logger } from '../logging/Logger';
import { Metadata } from '../metadata/Metadata';
import { EventLoop, QueueItem } from '../queue/EventLoop';
import { SignalAdapter, SignalSource } from '../signals/SignalAdapter';
import { AdmissionGate, AdmissionOptions } from '../tasks/AdmissionGate';
import { FailureSink, FileFailureSink } from '../tasks/FailureSink';
import { TaskDispatcher } from '../tasks/TaskDispatcher';
import { Task } from '../tasks/types';
import { ModuleRegistry } from './ModuleRegistry';
import { describeCall, isQualifiedTarget, parseTarget } from './targets';
import {
    BroadcastOptions,
    CallOptions,
    Kwargs,
    ModuleClass,
    ModuleFunctions,
    RuntimeModule,
} from './types';

export interface ModuleManagerOptions {
    /** Modules to register, in order */
    modules?: Record<string, ModuleClass>;
    /** File receiving one stack trace per failed task; defaults to EXCEPTION_PATH */
    exceptionPath?: string;
    /** Takes precedence over `exceptionPath` */
    failureSink?: FailureSink;
    admission?: Partial<AdmissionOptions>;
    /** Where `run()` listens for SIGINT/SIGTERM */
    signalSource?: SignalSource;
}

const SOURCE_NAME = 'modulemanager';

/**
 * Hosts the registered modules and drives their lifecycle on the thread that
 * constructed it.
 *
 * Startup broadcasts `startup` and `activate`, then the event loop drains
 * queued calls and events. Broadcasting `on_exit` sets the exit flag and runs
 * the shutdown stages; the loop ends once the queue is empty and no task is
 * running.
 */
export class ModuleManager implements BridgeTarget {
    public readonly registry: ModuleRegistry = new ModuleRegistry();
    public readonly homeThreadId: number = threadId;

    private readonly tasks: TaskDispatcher;
    private readonly broadcaster: EventBroadcaster;
    private readonly eventLoop: EventLoop;
    private readonly bridge: ThreadBridge;
    private readonly signals: SignalAdapter;
    private readonly forced: AbortController = new AbortController();
    private started = false;

    constructor(options: ModuleManagerOptions = {}) {
        const exceptionPath = options.exceptionPath ?? CONFIG.FAILURES.EXCEPTION_PATH;
        const failureSink = options.failureSink ?? (exceptionPath ? new FileFailureSink(exceptionPath) : undefined);

        this.tasks = new TaskDispatcher(() => this.registry.size, new AdmissionGate(options.admission), failureSink);
        this.broadcaster = new EventBroadcaster(this.registry, this.tasks, () => this.createMetadata());
        this.eventLoop = new EventLoop(item => this.processItem(item), () => this.queueEmpty());
        this.bridge = new ThreadBridge(this);
        this.signals = new SignalAdapter({
            onInterrupt: () => this.requestExit(),
            onEscalate: () => this.forceStop(),
        }, options.signalSource);

        if (options.modules) {
            this.registerModules(options.modules);
        }
    }

    public createMetadata(): Metadata {
        return new Metadata(this, SOURCE_NAME);
    }

    public registerModule(name: string, moduleClass: ModuleClass): RuntimeModule {
        return this.registry.register(name, moduleClass, this.functionReferences);
    }

    public registerModules(modules: Record<string, ModuleClass>): void {
        this.registry.registerAll(modules, this.functionReferences);
    }

    public isReadyModule(name: string): boolean {
        return this.registry.isReady(name);
    }

    public get exitRequested(): boolean {
        return this.broadcaster.exitRequested;
    }

    public get runningTaskCount(): number {
        return this.tasks.runningCount;
    }

    public get queuedItemCount(): number {
        return this.eventLoop.size;
    }

    /**
     * The runtime's entry points, as handed to each module.
     */
    public get functionReferences(): ModuleFunctions {
        return {
            triggerEvent: (event, metadata, kwargs) => this.triggerEvent(event, metadata, kwargs),
            enqueueTask: (target, metadata, kwargs) => this.enqueueTask(target, metadata, kwargs),
            execTask: (target, metadata, kwargs) => this.execTask(target, metadata, kwargs),
            execTaskAsync: (target, metadata, kwargs) => this.execTaskAsync(target, metadata, kwargs),
            broadcastEvent: (event, metadata, kwargs, options) => this.broadcastEvent(event, metadata, kwargs, options),
            callMethodAsync: (module, method, kwargs, options) => this.callMethodAsync(module, method, kwargs, options),
        };
    }

    /**
     * A port for a worker thread; pass the endpoint to `BridgeClient`.
     */
    public openBridge(): BridgeEndpoint {
        return { port: this.bridge.open(), homeThreadId: this.homeThreadId };
    }

    public closeBridge(): void {
        this.bridge.close();
    }

    // --- Public operations (home thread) -----------------------------------

    /**
     * Calls `module.method` and resolves with its result. Failures propagate.
     */
    public async execTask(target: string, metadata: Metadata, kwargs: Kwargs = {}): Promise<unknown> {
        return this.execTaskInternal(target, metadata, kwargs, false);
    }

    /**
     * Starts `module.method` as a tracked task without waiting for it.
     */
    public async execTaskAsync(target: string, metadata: Metadata, kwargs: Kwargs = {}): Promise<Task | undefined> {
        const task = await this.execTaskInternal(target, metadata, kwargs, true);
        return isTask(task) ? task : undefined;
    }

    public async broadcastEvent(
        event: string,
        metadata: Metadata,
        kwargs: Kwargs = {},
        options: BroadcastOptions = {},
    ): Promise<void> {
        await this.broadcastEventInternal(event, metadata, kwargs, options.asynchronous ?? true);
    }

    public async enqueueTask(target: string, metadata: Metadata, kwargs: Kwargs = {}): Promise<void> {
        await this.enqueueTaskInternal(target, metadata, kwargs);
    }

    /**
     * Queues event `on_<event>` for broadcast.
     */
    public async triggerEvent(event: string, metadata: Metadata, kwargs: Kwargs = {}): Promise<void> {
        await this.triggerEventInternal(EVENT_PREFIX + event, metadata, kwargs);
    }

    public async callMethodAsync(
        module: RuntimeModule,
        method: string,
        kwargs: Kwargs = {},
        options: CallOptions = {},
    ): Promise<Task> {
        return this.tasks.callMethodAsync(module, method, kwargs, options);
    }

    // --- Internal forms (also served to other threads by the bridge) -------

    public async execTaskInternal(
        target: string,
        metadata: Metadata,
        kwargs: Kwargs,
        asynchronous: boolean,
    ): Promise<unknown> {
        Logger.debug('ModuleManager', `Executing task [${describeCall(target, kwargs)}]`, { source: metadata.sourceName });
        const { moduleName, methodName } = parseTarget(target);
        const module = this.registry.lookup(moduleName);

        if (!module) {
            Logger.error('ModuleManager', `Unknown module [${moduleName}] for task [${target}]`,
                ErrorFactory.unknownTarget(`Module ${moduleName} is not registered`, { operation: 'execTask', target }));
            return undefined;
        }
        if (!module.isReady) {
            Logger.error('ModuleManager', `Method module [${target}] is in an inactive state`,
                ErrorFactory.inactiveModule(`Module ${moduleName} is not active`, { operation: 'execTask', target }));
            return undefined;
        }

        if (asynchronous) {
            return this.tasks.callMethodAsync(module, methodName, kwargs);
        }
        return module.callMethod(methodName, kwargs);
    }

    public async broadcastEventInternal(
        event: string,
        metadata: Metadata,
        kwargs: Kwargs,
        asynchronous: boolean,
    ): Promise<void> {
        await this.broadcaster.broadcast(event, metadata, kwargs, { asynchronous });
    }

    public async enqueueTaskInternal(target: string, metadata: Metadata, kwargs: Kwargs): Promise<void> {
        Logger.debug('ModuleManager', `Enqueuing task [${describeCall(target, kwargs)}]`);
        this.eventLoop.put(target, metadata, kwargs);
    }

    public async triggerEventInternal(target: string, metadata: Metadata, kwargs: Kwargs): Promise<void> {
        Logger.debug('ModuleManager', `Triggering event target [${describeCall(target, kwargs)}]`);
        this.eventLoop.put(target, metadata, kwargs);
    }

    public metadataFor(source: string): Metadata {
        return new Metadata(this.registry.lookup(source) ?? this.bridge, source);
    }

    // --- Lifecycle ---------------------------------------------------------

    /**
     * Routes a queue item: `module.method` becomes a task, a bare name a broadcast.
     */
    public async processItem(item: QueueItem): Promise<void> {
        if (isQualifiedTarget(item.target)) {
            await this.execTaskInternal(item.target, item.metadata, item.kwargs, true);
        } else {
            await this.broadcastEventInternal(item.target, item.metadata, item.kwargs, true);
        }
    }

    /**
     * Idle callback of the event loop. True ends the loop: the exit flag is
     * set, nothing is queued and no task is running.
     */
    public async queueEmpty(): Promise<boolean> {
        await this.tasks.gatherFinishedTasks();
        await this.broadcastEvent(RuntimeEvents.BECOMING_IDLE, this.createMetadata());
        if (!this.broadcaster.exitRequested) {
            return false;
        }

        while (this.tasks.runningCount > 0 && this.eventLoop.size === 0 && !this.forced.signal.aborted) {
            await this.tasks.settleRunning(this.forced.signal);
        }
        return this.forced.signal.aborted || (this.tasks.runningCount === 0 && this.eventLoop.size === 0);
    }

    /**
     * Startup, then the event loop until shutdown completes, then a final reclamation.
     */
    public async mainTask(): Promise<void> {
        if (this.started) {
            throw new Error('ModuleManager has already been started');
        }
        this.started = true;

        Logger.info('ModuleManager', `Starting ${this.registry.size} module(s)`, { modules: this.registry.names() });
        await this.broadcastEventInternal(RuntimeEvents.STARTUP, this.createMetadata(), {}, false);
        await this.broadcastEventInternal(RuntimeEvents.ACTIVATE, this.createMetadata(), {}, false);

        await this.eventLoop.run();

        await this.tasks.gatherFinishedTasks();
        Logger.info('ModuleManager', 'Event loop terminated');
    }

    /**
     * Runs the whole lifecycle with SIGINT/SIGTERM mapped to an orderly exit.
     */
    public async run(): Promise<void> {
        this.signals.install();
        try {
            await this.mainTask();
        } finally {
            this.signals.uninstall();
            this.tasks.cancelAll('Runtime stopped');
            this.bridge.close();
        }
    }

    /**
     * Queues the exit event as a tracked task, as a received interrupt does.
     */
    public requestExit(): Task<void> {
        return this.tasks.track('trigger_event(exit)', () => this.triggerEvent('exit', this.createMetadata()));
    }

    /**
     * Stops waiting for running tasks, aborts them and ends the event loop.
     */
    public forceStop(): void {
        if (this.forced.signal.aborted) return;
        this.forced.abort();
        this.tasks.cancelAll('Shutdown forced');
        this.eventLoop.stop();
    }

    /**
     * Reclaims finished tasks now instead of at the next idle cycle.
     */
    public gatherFinishedTasks() {
        return this.tasks.gatherFinishedTasks();
    }
}

function isTask(value: unknown): value is Task {
    return typeof value === 'object' && value !== null && 'id' in value && 'done' in value && 'label' in value;
}
