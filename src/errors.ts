/**
 * @module
 * Error types raised by the registry, the dispatcher and the configuration loader.
 */

/**
 * A task with the same name is already registered.
 */
export class DuplicateTaskError extends Error {
    readonly taskName: string;

    constructor(taskName: string) {
        super(`task "${taskName}" is already registered`);
        this.name = 'DuplicateTaskError';
        this.taskName = taskName;
    }
}

/**
 * A second task was flagged as the default task.
 */
export class DefaultTaskConflictError extends Error {
    readonly taskName: string;
    readonly defaultTaskName: string;

    constructor(taskName: string, defaultTaskName: string) {
        super(`task "${taskName}" cannot be the default task, "${defaultTaskName}" already is`);
        this.name = 'DefaultTaskConflictError';
        this.taskName = taskName;
        this.defaultTaskName = defaultTaskName;
    }
}

export class UnknownTaskError extends Error {
    readonly taskName: string;

    constructor(taskName: string) {
        super(`no task named "${taskName}"`);
        this.name = 'UnknownTaskError';
        this.taskName = taskName;
    }
}

export class NoDefaultTaskError extends Error {
    constructor() {
        super('no task given and no default task is registered');
        this.name = 'NoDefaultTaskError';
    }
}

/**
 * An external command could not be started.
 */
export class SpawnError extends Error {
    readonly command: string;

    constructor(command: string, cause: Error) {
        super(`failed to start \`${command}\`: ${cause.message}`, { cause });
        this.name = 'SpawnError';
        this.command = command;
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
