import { Logger } from '../logging/Logger';

export type InterruptSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

export type SignalAdapterState = 'idle' | 'exiting' | 'forced';

export interface SignalHandlers {
    /** First signal: request an orderly shutdown */
    onInterrupt: (signal: InterruptSignal) => void;
    /** Second signal while shutting down: stop without waiting */
    onEscalate: (signal: InterruptSignal) => void;
}

/**
 * Anything signals can be subscribed on; `process` in production.
 */
export interface SignalSource {
    on(event: InterruptSignal, listener: (signal: InterruptSignal) => void): unknown;
    off(event: InterruptSignal, listener: (signal: InterruptSignal) => void): unknown;
}

/**
 * Turns process interrupt signals into shutdown requests.
 *
 * idle --signal--> exiting --signal--> forced; signals after that are ignored.
 */
export class SignalAdapter {
    private state: SignalAdapterState = 'idle';
    private installed = false;
    private readonly listener = (signal: InterruptSignal) => this.receive(signal);

    constructor(
        private readonly handlers: SignalHandlers,
        private readonly source: SignalSource = process,
        private readonly signals: readonly InterruptSignal[] = ['SIGINT', 'SIGTERM'],
    ) { }

    public get currentState(): SignalAdapterState {
        return this.state;
    }

    public install(): void {
        if (this.installed) return;
        this.signals.forEach(signal => this.source.on(signal, this.listener));
        this.installed = true;
    }

    public uninstall(): void {
        if (!this.installed) return;
        this.signals.forEach(signal => this.source.off(signal, this.listener));
        this.installed = false;
    }

    public receive(signal: InterruptSignal): void {
        switch (this.state) {
            case 'idle':
                this.state = 'exiting';
                Logger.info('SignalAdapter', `${signal} received. Exiting...`);
                this.handlers.onInterrupt(signal);
                break;
            case 'exiting':
                this.state = 'forced';
                Logger.warn('SignalAdapter', `${signal} received during shutdown. Cancelling outstanding tasks.`);
                this.handlers.onEscalate(signal);
                break;
            case 'forced':
                Logger.debug('SignalAdapter', `${signal} ignored; shutdown already forced`);
                break;
        }
    }
}
