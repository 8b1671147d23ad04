/**
 * @module
 * Task registry.
 */
import {
    DefaultTaskConflictError,
    DuplicateTaskError,
    NoDefaultTaskError,
    UnknownTaskError,
} from './errors';
import type {
    Task,
} from './task';

/**
 * Holds the declared tasks. Lookup is by name, listing is in registration order.
 */
export class TaskRegistry {
    private readonly tasks: Map<string, Task>;
    private defaultTask?: Task;

    constructor(tasks?: Iterable<Task>) {
        this.tasks = new Map();
        if (tasks) {
            for (const task of tasks)
                this.register(task);
        }
    }

    get size(): number {
        return this.tasks.size;
    }

    /**
     * Adds `task`. The registry is left unchanged when this throws.
     */
    register(task: Task): void {
        if (this.tasks.has(task.name))
            throw new DuplicateTaskError(task.name);
        if (task.isDefault && this.defaultTask)
            throw new DefaultTaskConflictError(task.name, this.defaultTask.name);
        this.tasks.set(task.name, task);
        if (task.isDefault)
            this.defaultTask = task;
    }

    has(name: string): boolean {
        return this.tasks.has(name);
    }

    /**
     * Returns the task called `name`, or the default task when `name` is undefined.
     */
    resolve(name?: string): Task {
        if (name === undefined) {
            if (!this.defaultTask)
                throw new NoDefaultTaskError();
            return this.defaultTask;
        }
        const task = this.tasks.get(name);
        if (!task)
            throw new UnknownTaskError(name);
        return task;
    }

    /**
     * Yields `[name, description]` for every task, in registration order.
     */
    *listing(): IterableIterator<[string, string]> {
        for (const task of this.tasks.values())
            yield [task.name, task.description || ''];
    }
}
