// src/index.ts

export { ModuleManager } from './core/modules/ModuleManager';
export type { ModuleManagerOptions } from './core/modules/ModuleManager';
export { ModuleRegistry } from './core/modules/ModuleRegistry';
export { BaseModule } from './core/modules/BaseModule';
export { TARGET_SEPARATOR, isQualifiedTarget, parseTarget } from './core/modules/targets';
export type {
    BroadcastOptions,
    CallContext,
    CallOptions,
    Kwargs,
    MethodHandler,
    ModuleClass,
    ModuleFunctions,
    ModuleState,
    RuntimeModule,
} from './core/modules/types';

export { Metadata } from './core/metadata/Metadata';

export { TaskDispatcher } from './core/tasks/TaskDispatcher';
export { AdmissionGate, DEFAULT_ADMISSION } from './core/tasks/AdmissionGate';
export type { AdmissionOptions } from './core/tasks/AdmissionGate';
export { FileFailureSink } from './core/tasks/FailureSink';
export type { FailureSink } from './core/tasks/FailureSink';
export type { AdmissionResult, Task, TaskOutcome, TaskState } from './core/tasks/types';

export { EventBroadcaster } from './core/events/EventBroadcaster';
export { EVENT_PREFIX, RuntimeEvents, SHUTDOWN_STAGES } from './core/events/constants';
export { EventLoop } from './core/queue/EventLoop';
export type { IdleHandler, ItemProcessor, QueueItem } from './core/queue/EventLoop';

export { ThreadBridge } from './core/bridge/ThreadBridge';
export type { BridgeTarget } from './core/bridge/ThreadBridge';
export { BridgeClient } from './core/bridge/BridgeClient';
export type { BridgeClientOptions, BridgeEndpoint } from './core/bridge/BridgeClient';

export { SignalAdapter } from './core/signals/SignalAdapter';
export type { InterruptSignal, SignalHandlers, SignalSource } from './core/signals/SignalAdapter';

export * from './core/errors';
export { Logger, LogLevel } from './core/logging/Logger';
export { CONFIG } from './config/config';
