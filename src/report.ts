/**
 * @module
 * Console step echo.
 */
import type {
    Step,
    Task,
} from './task';
import tty = require('tty');

/**
 * Reports steps to the console as they start.
 */
export interface Reporter {
    /** Echo `step` of `task` before it runs. */
    stepStarted(task: Task, index: number, step: Step): void;
    /** Echo `step` of `task` instead of running it. */
    stepSkipped(task: Task, index: number, step: Step): void;
}

class ConsoleReporter implements Reporter {
    private readonly stream: NodeJS.WritableStream;
    private readonly columns?: number;

    constructor(stream: NodeJS.WritableStream) {
        this.stream = stream;
        this.columns = stream instanceof tty.WriteStream ? stream.columns : undefined;
    }

    stepStarted(task: Task, index: number, step: Step): void {
        this.writeLine(`${stepLabel(task, index)} ${step.description}`);
    }

    stepSkipped(task: Task, index: number, step: Step): void {
        this.writeLine(`${stepLabel(task, index)} (dry run) ${step.description}`);
    }

    private writeLine(line: string): void {
        this.stream.write(`${this.columns ? truncateString(line, this.columns) : line}\n`);
    }
}

/**
 * Create a reporter. Writes to stderr by default, leaving stdout to the steps.
 */
export function createReporter(stream?: NodeJS.WritableStream): Reporter {
    return new ConsoleReporter(stream || process.stderr);
}

/**
 * Reporter that prints nothing.
 */
export const silentReporter: Reporter = {
    stepSkipped: () => undefined,
    stepStarted: () => undefined,
};

/**
 * Label for step `index` (zero-based) of `task`, e.g. `[check 2/3]`.
 */
export function stepLabel(task: Task, index: number): string {
    return `[${task.name} ${index + 1}/${task.steps.length}]`;
}

export function truncateString(x: string, len: number): string {
    if (x.length <= len)
        return x;
    else if (len <= 3)
        return x.slice(0, len);
    else
        return `${x.slice(0, len - 3)}...`;
}
