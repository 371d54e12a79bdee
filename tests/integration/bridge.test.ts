// tests/integration/bridge.test.ts

import { MessageChannel, Worker } from 'worker_threads';
import { ModuleManager } from '../../src/core/modules/ModuleManager';
import { BridgeClient } from '../../src/core/bridge/BridgeClient';
import { BridgeError, ValidationError } from '../../src/core/errors';
import { Logger } from '../../src/core/logging/Logger';
import { activateAll, LIFECYCLE_EVENTS, recorder } from '../helpers/modules';
import { deferred, Deferred, flush } from '../helpers/async';

// Runs in a plain worker and speaks the wire protocol directly.
const BLOCKING_WORKER = `
const { workerData, parentPort, receiveMessageOnPort } = require('worker_threads');
const { port } = workerData;
const flag = new Int32Array(new SharedArrayBuffer(4));
port.postMessage({
    kind: 'request',
    id: 'blocking-1',
    operation: 'execTask',
    target: 'calc.add',
    source: 'worker',
    kwargs: { a: 40, b: 2 },
    flag,
});
const waited = Atomics.wait(flag, 0, 0, 5000);
const received = receiveMessageOnPort(port);
parentPort.postMessage({ waited, response: received ? received.message : null });
`;

// Stands in for the home thread: holds plain requests until a blocking one
// arrives, answers them all, then releases the blocked caller.
const ANSWERING_WORKER = `
const { workerData } = require('worker_threads');
const { port } = workerData;
const held = [];
port.on('message', (request) => {
    if (!request.flag) {
        held.push(request);
        return;
    }
    for (const earlier of held.splice(0)) {
        port.postMessage({ kind: 'response', id: earlier.id, ok: true, value: 'earlier:' + earlier.target });
    }
    if (request.target === 'calc.explode') {
        port.postMessage({
            kind: 'response',
            id: request.id,
            ok: false,
            error: { name: 'Error', message: 'remote boom', code: 'TASK_FAILURE' },
        });
    } else {
        port.postMessage({ kind: 'response', id: request.id, ok: true, value: request.kwargs.a + request.kwargs.b });
    }
    Atomics.store(request.flag, 0, 1);
    Atomics.notify(request.flag, 0);
});
`;

interface WorkerReport {
    waited: string;
    response: { id: string; ok: boolean; value?: unknown } | null;
}

describe('Cross-thread bridge', () => {
    let journal: string[];
    let manager: ModuleManager;
    let release: Deferred<void>;

    beforeEach(async () => {
        journal = [];
        release = deferred();
        manager = new ModuleManager({
            modules: {
                calc: recorder(journal, LIFECYCLE_EVENTS, {
                    add: ({ a, b }) => Number(a) + Number(b),
                    explode: () => {
                        throw new Error('remote boom');
                    },
                    slow: () => new Promise(resolve => setTimeout(resolve, 10)),
                    hang: () => release.promise,
                }),
            },
            admission: { maxWaitMs: 50 },
        });
        await activateAll(manager.registry.entries());
        jest.spyOn(Logger, 'error').mockImplementation(() => undefined);
        jest.spyOn(Logger, 'critical').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        release.resolve();
        manager.closeBridge();
        await manager.gatherFinishedTasks();
        jest.restoreAllMocks();
    });

    it('should execute calls on the home thread and return their results', async () => {
        const client = new BridgeClient(manager.openBridge(), { source: 'tester' });

        await expect(client.execTask('calc.add', { a: 2, b: 3 })).resolves.toBe(5);
        expect(client.pendingCalls).toBe(0);
        client.close();
    });

    it('should raise remote failures as bridge errors', async () => {
        const client = new BridgeClient(manager.openBridge(), { source: 'tester' });

        const failure = client.execTask('calc.explode');
        await expect(failure).rejects.toBeInstanceOf(BridgeError);
        await expect(failure).rejects.toThrow('remote boom');
        client.close();
    });

    it('should return the task id of an asynchronous call', async () => {
        const client = new BridgeClient(manager.openBridge(), { source: 'tester' });

        const id = await client.execTaskAsync('calc.slow');
        expect(typeof id).toBe('string');
        await expect(client.execTaskAsync('ghost.slow')).resolves.toBeNull();
        client.close();
    });

    it('should queue tasks and events for the event loop', async () => {
        const client = new BridgeClient(manager.openBridge(), { source: 'tester' });

        await client.enqueueTask('calc.add', { a: 1, b: 1 });
        await client.triggerEvent('ping');

        expect(manager.queuedItemCount).toBe(2);
        client.close();
    });

    it('should not hold one thread\'s requests behind another thread\'s call', async () => {
        const first = new BridgeClient(manager.openBridge(), { source: 'first' });
        const second = new BridgeClient(manager.openBridge(), { source: 'second' });

        const hanging = first.execTask('calc.hang');
        await second.triggerEvent('exit');
        expect(manager.queuedItemCount).toBe(1);

        release.resolve();
        await expect(hanging).resolves.toBeUndefined();
        first.close();
        second.close();
    });

    it('should run requests from one thread in arrival order', async () => {
        const client = new BridgeClient(manager.openBridge(), { source: 'tester' });

        const hanging = client.execTask('calc.hang');
        const queued = client.enqueueTask('calc.add', { a: 1, b: 1 });
        await flush();
        expect(manager.queuedItemCount).toBe(0);

        release.resolve();
        await hanging;
        await queued;
        expect(manager.queuedItemCount).toBe(1);
        client.close();
    });

    it('should refuse to block the home thread', () => {
        const client = new BridgeClient(manager.openBridge(), { source: 'tester' });

        expect(client.onHomeThread).toBe(true);
        expect(() => client.execTaskSync('calc.add', { a: 1, b: 2 })).toThrow(BridgeError);
        expect(() => client.triggerEventSync('ping')).toThrow(
            'Blocking [triggerEvent] on the scheduler thread would deadlock it',
        );
        client.close();
    });

    it('should reject worker data that carries no port', () => {
        expect(() => BridgeClient.fromWorkerData({ homeThreadId: 0, source: 'w' })).toThrow(ValidationError);
    });

    it('should give up a blocking call after the timeout', () => {
        const { port1, port2 } = new MessageChannel();
        const client = new BridgeClient({ port: port2, homeThreadId: -1 }, { source: 'tester', timeoutMs: 20 });
        let caught: unknown;

        try {
            client.execTaskSync('calc.add', { a: 1, b: 2 });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(BridgeError);
        expect(caught instanceof BridgeError && caught.code).toBe('BRIDGE_TIMEOUT');
        client.close();
        port1.close();
    });

    it('should block until the answering thread releases the flag', async () => {
        const { port1, port2 } = new MessageChannel();
        const worker = new Worker(ANSWERING_WORKER, {
            eval: true,
            workerData: { port: port1 },
            transferList: [port1],
        });
        await new Promise<void>(resolve => worker.once('online', () => resolve()));
        const client = new BridgeClient({ port: port2, homeThreadId: -1 }, { source: 'tester', timeoutMs: 5000 });

        try {
            expect(client.onHomeThread).toBe(false);
            const earlier = client.execTask('calc.queued');

            // The answer to the earlier call arrives first and is handed to its promise
            expect(client.execTaskSync('calc.add', { a: 2, b: 3 })).toBe(5);
            await expect(earlier).resolves.toBe('earlier:calc.queued');
            expect(client.pendingCalls).toBe(0);

            expect(() => client.execTaskSync('calc.explode')).toThrow('remote boom');
        } finally {
            client.close();
            await worker.terminate();
        }
    });

    it('should answer a worker blocked on the request flag', async () => {
        const { port, homeThreadId } = manager.openBridge();
        const worker = new Worker(BLOCKING_WORKER, {
            eval: true,
            workerData: { port, homeThreadId },
            transferList: [port],
        });

        try {
            const report = await new Promise<WorkerReport>((resolve, reject) => {
                worker.once('message', resolve);
                worker.once('error', reject);
            });

            expect(['ok', 'not-equal']).toContain(report.waited);
            expect(report.response).toEqual({ kind: 'response', id: 'blocking-1', ok: true, value: 42 });
        } finally {
            await worker.terminate();
        }
    });
});
