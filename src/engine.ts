/**
 * @module
 * Dependency resolution and sequential, fail-fast execution.
 */
import {
    ActionRunner,
    describeTask,
} from './cmdtask';
import {
    ActionFailure,
    CyclicDependencyError,
    UnknownTaskError,
} from './errors';
import {
    createSilentProgress,
    Progress,
} from './progress';
import {
    Registry,
} from './registry';
import {
    ActionContext,
    RunResult,
    TaskDefinition,
    TaskOutcome,
} from './task';
import util = require('util');

interface Frame {
    name: string;
    dependencies: readonly string[];
    /** Index of the next dependency to resolve. */
    next: number;
}

/**
 * Depth-first resolution state. Local to one {@link resolvePlan} call.
 */
class Resolver {
    private readonly registry: Registry;
    /** Names already placed in the plan. */
    private readonly visited: Set<string>;
    /** Tasks being resolved, outermost first. */
    private readonly stack: Frame[];
    private readonly inProgress: Set<string>;
    readonly plan: string[];

    constructor(registry: Registry) {
        this.registry = registry;
        this.visited = new Set();
        this.stack = [];
        this.inProgress = new Set();
        this.plan = [];
    }

    resolve(root: string): void {
        this.enter(root);
        while (this.stack.length) {
            const frame = this.stack[this.stack.length - 1];
            if (frame.next < frame.dependencies.length) {
                this.enter(frame.dependencies[frame.next++], frame.name);
                continue;
            }
            this.stack.pop();
            this.inProgress.delete(frame.name);
            this.visited.add(frame.name);
            this.plan.push(frame.name);
        }
    }

    private enter(name: string, referencedBy?: string): void {
        if (this.visited.has(name))
            return; // already scheduled
        if (this.inProgress.has(name)) {
            const names = this.stack.map(frame => frame.name);
            const cycle = names.slice(names.indexOf(name));
            cycle.push(name);
            throw new CyclicDependencyError(cycle);
        }
        if (!this.registry.has(name))
            throw new UnknownTaskError(name, referencedBy);
        const task = this.registry.lookup(name);
        this.inProgress.add(name);
        this.stack.push({ dependencies: task.dependencies, name, next: 0 });
    }
}

/**
 * Returns the execution plan for `root`: its dependency closure, each task once and after all of its
 * dependencies. Dependencies are resolved in declared order, so the plan is deterministic.
 */
export function resolvePlan(registry: Registry, root: string): string[] {
    const resolver = new Resolver(registry);
    resolver.resolve(root);
    return resolver.plan;
}

/**
 * Runs tasks from a frozen registry.
 */
export class Engine {
    private readonly registry: Registry;
    private readonly runner: ActionRunner;
    private readonly progress: Progress;
    private running: boolean;

    constructor(registry: Registry, runner: ActionRunner, progress?: Progress) {
        registry.freeze();
        this.registry = registry;
        this.runner = runner;
        this.progress = progress || createSilentProgress();
        this.running = false;
    }

    resolve(root: string): string[] {
        return resolvePlan(this.registry, root);
    }

    /**
     * Resolves `root` and runs its plan, stopping at the first failure.
     *
     * Resolution errors are thrown before any action runs. Action failures are reported in the result.
     */
    async execute(root: string): Promise<RunResult> {
        if (this.running)
            throw new Error(`cannot execute ${root}: engine is already running`);
        const plan = this.resolve(root);
        this.running = true;
        try {
            return await this.runPlan(root, plan);
        } finally {
            this.progress.unrender();
            this.running = false;
        }
    }

    private async runPlan(root: string, plan: string[]): Promise<RunResult> {
        const outcomes: TaskOutcome[] = [];
        const attempted: string[] = [];
        let failure: ActionFailure | undefined;

        for (const [i, name] of plan.entries()) {
            if (failure) {
                outcomes.push({ name, status: 'skipped' });
                continue;
            }

            const task = this.registry.lookup(name);
            attempted.push(name);
            this.progress.status = `[${i + 1}/${plan.length}] ${describeTask(task)}`;
            this.progress.render();

            const reason = await this.runTask(task);
            if (reason === undefined) {
                outcomes.push({ name, status: 'succeeded' });
            } else {
                failure = new ActionFailure(name, reason);
                outcomes.push({ name, reason, status: 'failed' });
                this.progress.write(`${failure.message}\n`);
            }
        }

        return {
            attempted,
            failure,
            outcomes,
            plan,
            root,
            skipped: outcomes.filter(o => o.status === 'skipped').map(o => o.name),
            success: !failure,
        };
    }

    /**
     * Runs the action of `task`. Returns the failure reason, or undefined on success.
     */
    private async runTask(task: TaskDefinition): Promise<string | undefined> {
        if (!task.action)
            return undefined; // aggregate task
        const ctx: ActionContext = {
            output: [],
        };
        let reason: string | undefined;
        try {
            const outcome = await this.runner.run(task.action, ctx);
            if (outcome.status === 'failure')
                reason = outcome.reason;
        } catch (error) {
            reason = error instanceof Error ? error.message : util.inspect(error);
        }
        for (const chunk of ctx.output)
            this.progress.write(chunk);
        return reason;
    }
}
