import {
    ActionFailure,
} from './errors';

/**
 * An external program invocation with a fixed argument list.
 */
export interface Action {
    /** Program to run. Looked up in `PATH` by the command runner. */
    readonly program: string;
    readonly args: readonly string[];
}

/**
 * Represents a task.
 */
export interface TaskDefinition {
    /** Unique task name. */
    readonly name: string;
    /** Task action. Aggregate tasks have none. */
    readonly action?: Action;
    /** Names of the tasks that must succeed before this one runs, in order. */
    readonly dependencies: readonly string[];
    /** Task description. Default: the command line, or the task name. */
    readonly description?: string;
}

/**
 * Context that will be passed to the action runner during execution.
 */
export interface ActionContext {
    /** Action output */
    readonly output: Buffer[];
}

export interface SuccessOutcome {
    name: string;
    status: 'succeeded';
}

export interface FailureOutcome {
    name: string;
    status: 'failed';
    reason: string;
}

export interface SkippedOutcome {
    name: string;
    status: 'skipped';
}

/**
 * Outcome of a single planned task.
 */
export type TaskOutcome = SuccessOutcome | FailureOutcome | SkippedOutcome;

/**
 * Result of {@link Engine#execute}.
 */
export interface RunResult {
    /** Requested task. */
    root: string;
    /** Resolved plan, dependencies first. */
    plan: string[];
    /** One outcome per planned task, in plan order. */
    outcomes: TaskOutcome[];
    /** Tasks whose turn came, including the one that failed. */
    attempted: string[];
    skipped: string[];
    success: boolean;
    /** Set when a task failed. */
    failure?: ActionFailure;
}
