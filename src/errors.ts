/**
 * @module
 * Errors raised while loading, resolving and running tasks.
 */

/**
 * A task name that is not in the registry, either requested directly or
 * listed as a dependency.
 */
export class UnknownTaskError extends Error {
    readonly taskName: string;
    /** The task that lists `taskName` as a dependency, if any. */
    readonly referencedBy?: string;

    constructor(taskName: string, referencedBy?: string) {
        super(referencedBy === undefined ?
            `unknown task ${taskName}` :
            `unknown task ${taskName} (dependency of ${referencedBy})`);
        this.name = 'UnknownTaskError';
        this.taskName = taskName;
        this.referencedBy = referencedBy;
    }
}

export class DuplicateTaskError extends Error {
    readonly taskName: string;

    constructor(taskName: string) {
        super(`task ${taskName} is already registered`);
        this.name = 'DuplicateTaskError';
        this.taskName = taskName;
    }
}

/**
 * A dependency cycle. `cycle` starts and ends on the same task name.
 */
export class CyclicDependencyError extends Error {
    readonly cycle: readonly string[];

    constructor(cycle: readonly string[]) {
        super(`circular dependency detected: ${cycle.join(' -> ')}`);
        this.name = 'CyclicDependencyError';
        this.cycle = cycle;
    }
}

/**
 * A task action that completed abnormally. Reported in the run result, not thrown.
 */
export class ActionFailure extends Error {
    readonly taskName: string;
    readonly reason: string;

    constructor(taskName: string, reason: string) {
        super(`task ${taskName} failed: ${reason}`);
        this.name = 'ActionFailure';
        this.taskName = taskName;
        this.reason = reason;
    }
}
