import { v4 as uuidv4 } from 'uuid';
import { ErrorFactory } from '../errors';
import { Logger } from '../logging/Logger';
import { CallOptions, Kwargs, RuntimeModule } from '../modules/types';
import { describeCall } from '../modules/targets';
import { AdmissionGate } from './AdmissionGate';
import { FailureSink } from './FailureSink';
import { Task, TaskOutcome, TaskState } from './types';

class TrackedTask<T = unknown> implements Task<T> {
    public readonly id: string = uuidv4();
    public readonly startedAt: number = Date.now();
    public state: TaskState = 'running';
    public done: Promise<TaskOutcome<T>>;

    constructor(
        public readonly label: string,
        private readonly controller: AbortController,
        settled: (task: TrackedTask<T>) => Promise<TaskOutcome<T>>,
    ) {
        this.done = settled(this);
    }

    public get signal(): AbortSignal {
        return this.controller.signal;
    }

    public cancel(reason: string): void {
        this.controller.abort(reason);
    }
}

/**
 * Starts, tracks and retires asynchronous units of work.
 *
 * A task sits in the running set from creation until its completion
 * callback moves it to the finished set; `gatherFinishedTasks()` reclaims
 * finished tasks. Failures are contained at the task boundary.
 */
export class TaskDispatcher {
    private running: Set<TrackedTask> = new Set();
    private finished: Set<TrackedTask> = new Set();

    constructor(
        private readonly capacity: () => number,
        private readonly gate: AdmissionGate = new AdmissionGate(),
        private readonly failureSink?: FailureSink,
    ) { }

    public get runningCount(): number {
        return this.running.size;
    }

    public get finishedCount(): number {
        return this.finished.size;
    }

    public isRunning(task: Task): boolean {
        return task instanceof TrackedTask && this.running.has(task);
    }

    public isFinished(task: Task): boolean {
        return task instanceof TrackedTask && this.finished.has(task);
    }

    /**
     * Starts `module.method(kwargs)` as a tracked task once admission allows.
     */
    public async callMethodAsync(
        module: RuntimeModule,
        method: string,
        kwargs: Kwargs = {},
        options: CallOptions = {},
    ): Promise<Task> {
        const label = `${module.name}.${method}`;
        Logger.debug('TaskDispatcher', `Calling method asynchronously [${describeCall(label, kwargs)}]`);
        await this.gate.admit(() => this.running.size, this.capacity());
        return this.track(label, signal => module.callMethod(method, kwargs, { ...options, signal }));
    }

    /**
     * Tracks any unit of work. `start` runs on a later microtask, after the
     * task is already in the running set.
     */
    public track<T>(label: string, start: (signal: AbortSignal) => Promise<T>): Task<T> {
        const controller = new AbortController();
        const task = new TrackedTask<T>(label, controller, self => Promise.resolve()
            .then(() => start(controller.signal))
            .then(
                (value): TaskOutcome<T> => ({ status: 'fulfilled', value }),
                (reason: unknown): TaskOutcome<T> => ({ status: 'rejected', reason }),
            )
            .then(outcome => {
                this.onTaskDone(self, outcome);
                return outcome;
            }));
        this.running.add(task);
        return task;
    }

    private onTaskDone<T>(task: TrackedTask<T>, outcome: TaskOutcome<T>): void {
        this.running.delete(task);
        this.finished.add(task);
        task.state = 'finished';
        this.gate.release();

        if (outcome.status === 'rejected') {
            this.reportFailure(task, outcome.reason);
        }
    }

    private reportFailure(task: TrackedTask<unknown>, reason: unknown): void {
        if (task.signal.aborted) {
            Logger.warn('TaskDispatcher', `Task [${task.label}] ended after cancellation`, {
                reason: reason instanceof Error ? reason.message : String(reason),
            });
            return;
        }

        // Non-error rejections are wrapped so the sink still gets a stack
        const error = reason instanceof Error
            ? reason
            : ErrorFactory.taskFailure(`Task rejected with a non-error value: ${String(reason)}`, {
                operation: 'callMethodAsync',
                target: task.label,
                details: reason,
            });
        Logger.critical('TaskDispatcher', `Exception occurred in task [${task.label}]: [${error.message}]`, error);
        if (!this.failureSink) return;

        try {
            this.failureSink.record(error, task.label);
        } catch (sinkError) {
            Logger.error('TaskDispatcher', 'Failed to append to the failure sink', sinkError);
        }
    }

    /**
     * Collects the outcomes of finished tasks and forgets them.
     */
    public async gatherFinishedTasks(): Promise<TaskOutcome[]> {
        const tasks = Array.from(this.finished);
        const outcomes = await Promise.all(tasks.map(task => task.done));
        tasks.forEach(task => this.finished.delete(task));
        return outcomes;
    }

    /**
     * Waits for the tasks running at call time, or until `abort` fires.
     */
    public async settleRunning(abort?: AbortSignal): Promise<void> {
        const pending = Array.from(this.running, task => task.done);
        if (pending.length === 0 || abort?.aborted) return;

        const all = Promise.all(pending).then(() => undefined);
        if (!abort) {
            await all;
            return;
        }

        let onAbort: () => void = () => undefined;
        const aborted = new Promise<void>(resolve => {
            onAbort = () => resolve();
            abort.addEventListener('abort', onAbort, { once: true });
        });
        try {
            await Promise.race([all, aborted]);
        } finally {
            abort.removeEventListener('abort', onAbort);
        }
    }

    /**
     * Aborts the signal of every running task. Returns how many were cancelled.
     */
    public cancelAll(reason: string): number {
        const tasks = Array.from(this.running);
        tasks.forEach(task => {
            Logger.warn('TaskDispatcher', `Cancelling task [${task.label}]`, { id: task.id });
            task.cancel(reason);
        });
        return tasks.length;
    }
}
