/**
 * @module
 * taskchain Public API
 */
import {
    ActionRunner,
    CommandRunner,
    describeTask,
} from './cmdtask';
import {
    Engine,
} from './engine';
import {
    createProgress,
    Progress,
} from './progress';
import {
    Registry,
} from './registry';
import {
    RunResult,
} from './task';
import {
    readTaskFile,
} from './taskfile';

/**
 * Options for {@link newTaskRunner}.
 */
export interface RunnerOptions {
    /**
     * Runs task actions.
     * Default: a {@link CommandRunner} spawning child processes.
     */
    actionRunner?: ActionRunner;

    /**
     * Where status and task output go.
     * Default: console progress on stdout.
     */
    progress?: Progress;
}

/**
 * A loaded task table.
 */
export interface TaskRunner {
    /** Task names with their descriptions, in file order. */
    list(): Array<[string, string]>;
    /** Returns the plan for `task` without running anything. */
    plan(task: string): string[];
    /** Run `task` and its dependencies. */
    run(task: string): Promise<RunResult>;
}

class TaskRunnerImpl implements TaskRunner {
    private readonly registry: Registry;
    private readonly engine: Engine;

    constructor(registry: Registry, options: RunnerOptions) {
        this.registry = registry;
        this.engine = new Engine(registry,
                                 options.actionRunner || new CommandRunner(),
                                 options.progress || createProgress());
    }

    list(): Array<[string, string]> {
        return this.registry.names().map((name): [string, string] =>
            [name, describeTask(this.registry.lookup(name))]);
    }

    plan(task: string): string[] {
        return this.engine.resolve(task);
    }

    run(task: string): Promise<RunResult> {
        return this.engine.execute(task);
    }
}

/**
 * Create a task runner over `registry`.
 */
export function createTaskRunner(registry: Registry, options?: RunnerOptions): TaskRunner {
    return new TaskRunnerImpl(registry, options || {});
}

/**
 * Load a task file and construct a task runner.
 *
 * @param filename the filename, or `tasks.json` if not provided.
 */
export async function newTaskRunner(filename: string = 'tasks.json', options?: RunnerOptions): Promise<TaskRunner> {
    const registry = await readTaskFile(filename);
    return createTaskRunner(registry, options);
}

export type {
    Action,
    ActionContext,
    RunResult,
    TaskDefinition,
    TaskOutcome,
} from './task';
export {
    ActionFailure,
    CyclicDependencyError,
    DuplicateTaskError,
    UnknownTaskError,
} from './errors';
export {
    createRegistry,
    Registry,
} from './registry';
export {
    Engine,
    resolvePlan,
} from './engine';
export {
    CommandRunner,
} from './cmdtask';
export type {
    ActionOutcome,
    ActionRunner,
} from './cmdtask';
export {
    parseTaskFile,
    readTaskFile,
} from './taskfile';
export type {
    TaskRecord,
} from './taskfile';
export {
    createProgress,
    createSilentProgress,
} from './progress';
export type {
    Progress,
} from './progress';
