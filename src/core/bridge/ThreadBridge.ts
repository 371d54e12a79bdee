import { MessageChannel, MessagePort } from 'worker_threads';
import { Mutex } from 'async-mutex';
import { Logger } from '../logging/Logger';
import { Metadata } from '../metadata/Metadata';
import { Kwargs } from '../modules/types';
import {
    BridgeResponse,
    ParsedBridgeRequest,
    bridgeRequestSchema,
    serializeError,
} from './protocol';

/**
 * Internal (home-thread) forms of the operations reachable from other threads.
 */
export interface BridgeTarget {
    execTaskInternal(target: string, metadata: Metadata, kwargs: Kwargs, asynchronous: boolean): Promise<unknown>;
    broadcastEventInternal(event: string, metadata: Metadata, kwargs: Kwargs, asynchronous: boolean): Promise<void>;
    enqueueTaskInternal(target: string, metadata: Metadata, kwargs: Kwargs): Promise<void>;
    triggerEventInternal(target: string, metadata: Metadata, kwargs: Kwargs): Promise<void>;
    /** Metadata for a request raised by another thread on behalf of `source` */
    metadataFor(source: string): Metadata;
}

/**
 * Home-thread end of the cross-thread bridge.
 *
 * Each `open()` yields a port to transfer to a worker. Requests from one port
 * run in arrival order; ports do not wait on each other.
 */
export class ThreadBridge {
    private ports: Map<MessagePort, Mutex> = new Map();

    constructor(private readonly target: BridgeTarget) { }

    public open(): MessagePort {
        const { port1, port2 } = new MessageChannel();
        const mutex = new Mutex();
        port1.on('message', (raw: unknown) => {
            this.handle(port1, mutex, raw).catch(error => {
                Logger.error('ThreadBridge', 'Failed to answer cross-thread request', error);
            });
        });
        port1.on('close', () => this.ports.delete(port1));
        this.ports.set(port1, mutex);
        return port2;
    }

    public close(): void {
        this.ports.forEach((_mutex, port) => port.close());
        this.ports.clear();
    }

    private async handle(port: MessagePort, mutex: Mutex, raw: unknown): Promise<void> {
        const parsed = bridgeRequestSchema.safeParse(raw);
        if (!parsed.success) {
            Logger.error('ThreadBridge', 'Rejected malformed cross-thread request', parsed.error.issues);
            const id = typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string' ? raw.id : undefined;
            if (id) {
                this.respond(port, undefined, {
                    kind: 'response',
                    id,
                    ok: false,
                    error: { name: 'ValidationError', message: 'Malformed bridge request', code: 'VALIDATION_ERROR' },
                });
            }
            return;
        }

        const request = parsed.data;
        Logger.debug('ThreadBridge', `Executing [${request.operation}] for [${request.source}] in a threadsafe manner`, {
            target: request.target,
        });
        const response = await mutex.runExclusive(() => this.execute(request));
        this.respond(port, request.flag, response);
    }

    private async execute(request: ParsedBridgeRequest): Promise<BridgeResponse> {
        const metadata = this.target.metadataFor(request.source);
        try {
            const value = await this.dispatch(request, metadata);
            return { kind: 'response', id: request.id, ok: true, value };
        } catch (error) {
            return { kind: 'response', id: request.id, ok: false, error: serializeError(error) };
        }
    }

    private async dispatch(request: ParsedBridgeRequest, metadata: Metadata): Promise<unknown> {
        const { target, kwargs } = request;
        switch (request.operation) {
            case 'execTask':
                return this.target.execTaskInternal(target, metadata, kwargs, false);
            case 'execTaskAsync': {
                const task = await this.target.execTaskInternal(target, metadata, kwargs, true);
                return typeof task === 'object' && task !== null && 'id' in task ? task.id : null;
            }
            case 'broadcastEvent':
                return this.target.broadcastEventInternal(target, metadata, kwargs, request.asynchronous ?? true);
            case 'enqueueTask':
                return this.target.enqueueTaskInternal(target, metadata, kwargs);
            case 'triggerEvent':
                return this.target.triggerEventInternal(target, metadata, kwargs);
        }
    }

    /**
     * Posts the response, then releases a blocked caller. A result that
     * cannot be cloned is reported to the caller as an error.
     */
    private respond(port: MessagePort, flag: Int32Array | undefined, response: BridgeResponse): void {
        try {
            port.postMessage(response);
        } catch (error) {
            Logger.error('ThreadBridge', `Result of request [${response.id}] cannot cross threads`, error);
            port.postMessage({
                kind: 'response',
                id: response.id,
                ok: false,
                error: serializeError(error),
            } satisfies BridgeResponse);
        }

        if (flag) {
            Atomics.store(flag, 0, 1);
            Atomics.notify(flag, 0);
        }
    }
}
