export type TaskState = 'running' | 'finished';

export type TaskOutcome<T = unknown> =
    | { status: 'fulfilled'; value: T }
    | { status: 'rejected'; reason: unknown };

/**
 * A tracked asynchronous invocation.
 */
export interface Task<T = unknown> {
    readonly id: string;
    /** `module.method` or another description of the work */
    readonly label: string;
    readonly startedAt: number;
    readonly signal: AbortSignal;
    /** Resolves once the task has moved to the finished set; never rejects */
    readonly done: Promise<TaskOutcome<T>>;
    readonly state: TaskState;
}

export type AdmissionResult = 'immediate' | 'waited' | 'forced';
