/**
 * Event and method names the runtime itself broadcasts.
 */
export const RuntimeEvents = {
    STARTUP: 'startup',
    ACTIVATE: 'activate',
    BECOMING_IDLE: 'becoming_idle',
    EXIT: 'on_exit',
    DEACTIVATE: 'deactivate',
    INITIATE_SHUTDOWN: 'initiate_shutdown',
    FINALIZE_SHUTDOWN: 'finalize_shutdown',
} as const;

/** Prefix `triggerEvent` adds to an event name */
export const EVENT_PREFIX = 'on_';

/** Stages broadcast in order, each awaited across every module, once `on_exit` is handled */
export const SHUTDOWN_STAGES = [
    RuntimeEvents.DEACTIVATE,
    RuntimeEvents.INITIATE_SHUTDOWN,
    RuntimeEvents.FINALIZE_SHUTDOWN,
] as const;
