import { MessagePort, receiveMessageOnPort, threadId } from 'worker_threads';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { CONFIG } from '../../config/config';
import { ErrorFactory } from '../errors';
import { EVENT_PREFIX } from '../events/constants';
import { Logger } from '../logging/Logger';
import { BroadcastOptions, Kwargs } from '../modules/types';
import {
    BridgeOperation,
    BridgeRequest,
    BridgeResponse,
    bridgeResponseSchema,
} from './protocol';

/**
 * What a worker needs to reach the scheduler: a port from `ModuleManager.openBridge()`
 * and the id of the thread that owns the scheduler.
 */
export interface BridgeEndpoint {
    port: MessagePort;
    homeThreadId: number;
}

export interface BridgeClientOptions {
    /** Name the calls are attributed to; a registered module's name makes the worker act as that module */
    source: string;
    timeoutMs?: number;
}

const isMessagePort = (value: unknown): value is MessagePort =>
    typeof value === 'object' && value !== null
    && 'postMessage' in value && typeof value.postMessage === 'function'
    && 'on' in value && typeof value.on === 'function';

const workerDataSchema = z.object({
    port: z.custom<MessagePort>(isMessagePort, { message: 'Expected a MessagePort' }),
    homeThreadId: z.number().int().nonnegative(),
    source: z.string().min(1),
});

interface PendingCall {
    resolve: (value: unknown) => void;
    reject: (error: unknown) => void;
}

/**
 * Public form of the runtime operations for code running off the scheduler thread.
 *
 * The async forms post a request and resolve with the response. The `*Sync`
 * forms block the calling thread until the scheduler has executed the call.
 */
export class BridgeClient {
    private pending: Map<string, PendingCall> = new Map();
    private listening = false;
    private readonly source: string;
    private readonly timeoutMs: number;
    private readonly onMessage = (raw: unknown) => this.settle(raw);

    constructor(private readonly endpoint: BridgeEndpoint, options: BridgeClientOptions) {
        this.source = options.source;
        this.timeoutMs = options.timeoutMs ?? CONFIG.BRIDGE.TIMEOUT_MS;
    }

    /**
     * Builds a client from `workerData` shaped as `{ port, homeThreadId, source }`.
     */
    public static fromWorkerData(data: unknown, timeoutMs?: number): BridgeClient {
        const parsed = workerDataSchema.safeParse(data);
        if (!parsed.success) {
            throw ErrorFactory.validation('Worker data does not describe a bridge endpoint', {
                operation: 'BridgeClient.fromWorkerData',
                details: parsed.error.issues,
            });
        }
        const { port, homeThreadId, source } = parsed.data;
        return new BridgeClient({ port, homeThreadId }, { source, timeoutMs });
    }

    /**
     * Whether this client is being used on the thread that owns the scheduler.
     */
    public get onHomeThread(): boolean {
        return threadId === this.endpoint.homeThreadId;
    }

    public get pendingCalls(): number {
        return this.pending.size;
    }

    public execTask(target: string, kwargs: Kwargs = {}): Promise<unknown> {
        return this.request('execTask', target, kwargs);
    }

    /**
     * Resolves with the id of the started task, or null when the target was not callable.
     */
    public async execTaskAsync(target: string, kwargs: Kwargs = {}): Promise<string | null> {
        const id = await this.request('execTaskAsync', target, kwargs);
        return typeof id === 'string' ? id : null;
    }

    public async broadcastEvent(event: string, kwargs: Kwargs = {}, options: BroadcastOptions = {}): Promise<void> {
        await this.request('broadcastEvent', event, kwargs, options.asynchronous);
    }

    public async enqueueTask(target: string, kwargs: Kwargs = {}): Promise<void> {
        await this.request('enqueueTask', target, kwargs);
    }

    public async triggerEvent(event: string, kwargs: Kwargs = {}): Promise<void> {
        await this.request('triggerEvent', EVENT_PREFIX + event, kwargs);
    }

    public execTaskSync(target: string, kwargs: Kwargs = {}): unknown {
        return this.requestSync('execTask', target, kwargs);
    }

    public broadcastEventSync(event: string, kwargs: Kwargs = {}, options: BroadcastOptions = {}): void {
        this.requestSync('broadcastEvent', event, kwargs, options.asynchronous);
    }

    public enqueueTaskSync(target: string, kwargs: Kwargs = {}): void {
        this.requestSync('enqueueTask', target, kwargs);
    }

    public triggerEventSync(event: string, kwargs: Kwargs = {}): void {
        this.requestSync('triggerEvent', EVENT_PREFIX + event, kwargs);
    }

    /**
     * Stops listening and fails every call still waiting for a response.
     */
    public close(): void {
        this.endpoint.port.off('message', this.onMessage);
        this.listening = false;
        const pending = Array.from(this.pending.values());
        this.pending.clear();
        pending.forEach(call => call.reject(ErrorFactory.bridge('Bridge client closed before the response arrived', {
            operation: 'BridgeClient.close',
        })));
        this.endpoint.port.close();
    }

    private buildRequest(operation: BridgeOperation, target: string, kwargs: Kwargs, asynchronous?: boolean): BridgeRequest {
        return { kind: 'request', id: uuidv4(), operation, target, source: this.source, kwargs, asynchronous };
    }

    private request(operation: BridgeOperation, target: string, kwargs: Kwargs, asynchronous?: boolean): Promise<unknown> {
        if (!this.listening) {
            this.endpoint.port.on('message', this.onMessage);
            this.listening = true;
        }

        const request = this.buildRequest(operation, target, kwargs, asynchronous);
        return new Promise((resolve, reject) => {
            this.pending.set(request.id, { resolve, reject });
            try {
                this.endpoint.port.postMessage(request);
            } catch (error) {
                this.pending.delete(request.id);
                reject(ErrorFactory.bridge(`Cannot send [${operation}] for [${target}] across threads`, {
                    operation,
                    target,
                    details: error,
                }));
            }
        });
    }

    private requestSync(operation: BridgeOperation, target: string, kwargs: Kwargs, asynchronous?: boolean): unknown {
        if (this.onHomeThread) {
            throw ErrorFactory.bridge(`Blocking [${operation}] on the scheduler thread would deadlock it`, {
                operation,
                target,
                suggestion: 'Use the async form, or call the ModuleManager directly on its own thread',
            });
        }

        const flag = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
        const request = { ...this.buildRequest(operation, target, kwargs, asynchronous), flag };
        this.endpoint.port.postMessage(request);

        if (Atomics.wait(flag, 0, 0, this.timeoutMs) === 'timed-out') {
            throw ErrorFactory.bridge(`Timed out after ${this.timeoutMs}ms waiting for [${operation}] on [${target}]`, {
                code: 'BRIDGE_TIMEOUT',
                operation,
                target,
                retryable: true,
            });
        }

        for (;;) {
            const received = receiveMessageOnPort(this.endpoint.port);
            if (!received) {
                throw ErrorFactory.bridge(`No response to [${operation}] on [${target}]`, { operation, target });
            }
            const response = this.parseResponse(received.message);
            if (!response) continue;
            if (response.id === request.id) {
                return this.unwrap(response, operation, target);
            }
            this.deliver(response); // answer to an earlier async call
        }
    }

    private parseResponse(raw: unknown): BridgeResponse | undefined {
        const parsed = bridgeResponseSchema.safeParse(raw);
        if (!parsed.success) {
            Logger.warn('BridgeClient', 'Ignoring malformed bridge response', parsed.error.issues);
            return undefined;
        }
        return parsed.data;
    }

    private settle(raw: unknown): void {
        const response = this.parseResponse(raw);
        if (response) {
            this.deliver(response);
        }
    }

    private deliver(response: BridgeResponse): void {
        const call = this.pending.get(response.id);
        if (!call) {
            Logger.debug('BridgeClient', `Dropping response to unknown request [${response.id}]`);
            return;
        }
        this.pending.delete(response.id);
        if (response.ok) {
            call.resolve(response.value);
        } else {
            call.reject(this.toError(response.error, 'remote call'));
        }
        if (this.pending.size === 0 && this.listening) {
            this.endpoint.port.off('message', this.onMessage);
            this.listening = false;
        }
    }

    private unwrap(response: BridgeResponse, operation: string, target: string): unknown {
        if (response.ok) {
            return response.value;
        }
        throw this.toError(response.error, operation, target);
    }

    private toError(error: Extract<BridgeResponse, { ok: false }>['error'], operation: string, target?: string) {
        return ErrorFactory.bridge(error.message, {
            operation,
            target,
            details: { remoteName: error.name, remoteCode: error.code, remoteStack: error.stack },
        });
    }
}
