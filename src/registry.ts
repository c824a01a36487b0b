import {
    DuplicateTaskError,
    UnknownTaskError,
} from './errors';
import {
    Action,
    TaskDefinition,
} from './task';

/**
 * Task table. Filled once during the load phase, read-only after {@link Registry#freeze}.
 */
export class Registry {
    private readonly tasks: Map<string, TaskDefinition>;
    private frozen: boolean;

    constructor() {
        this.tasks = new Map();
        this.frozen = false;
    }

    get size(): number {
        return this.tasks.size;
    }

    isFrozen(): boolean {
        return this.frozen;
    }

    register(task: TaskDefinition): void {
        if (this.frozen)
            throw new Error(`cannot register task ${task.name}: registry is frozen`);
        if (this.tasks.has(task.name))
            throw new DuplicateTaskError(task.name);
        this.tasks.set(task.name, copyTask(task));
    }

    lookup(name: string): TaskDefinition {
        const task = this.tasks.get(name);
        if (!task)
            throw new UnknownTaskError(name);
        return task;
    }

    has(name: string): boolean {
        return this.tasks.has(name);
    }

    /**
     * Returns task names in registration order.
     */
    names(): string[] {
        return [...this.tasks.keys()];
    }

    freeze(): void {
        this.frozen = true;
    }
}

/**
 * Registers `tasks` in order and freezes the resulting registry.
 */
export function createRegistry(tasks: Iterable<TaskDefinition>): Registry {
    const registry = new Registry();
    for (const task of tasks)
        registry.register(task);
    registry.freeze();
    return registry;
}

// The stored definition must not change when the caller mutates its own copy.
function copyTask(task: TaskDefinition): TaskDefinition {
    let action: Action | undefined;
    if (task.action)
        action = Object.freeze({
            args: Object.freeze([...task.action.args]),
            program: task.action.program,
        });
    return Object.freeze({
        action,
        dependencies: Object.freeze([...task.dependencies]),
        description: task.description,
        name: task.name,
    });
}
