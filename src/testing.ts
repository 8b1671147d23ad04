/**
 * @module
 * Helpers shared by the tests.
 */
import type {
    Step,
    StepContext,
    StepResult,
} from './task';
import {
    SUCCESS,
} from './task';
import stream = require('stream');

/**
 * Writable stream that keeps everything written to it.
 */
export interface Sink {
    readonly stream: stream.Writable;
    text(): string;
}

export function createSink(): Sink {
    const chunks: Buffer[] = [];
    const writable = new stream.Writable({
        write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
            chunks.push(chunk);
            callback();
        },
    });
    return {
        stream: writable,
        text: () => Buffer.concat(chunks).toString('utf-8'),
    };
}

/**
 * In-process step that records its name and context, then returns `result`.
 */
export function recordingStep(
    name: string,
    calls: string[],
    result: StepResult = SUCCESS,
    contexts?: StepContext[],
): Step {
    return {
        description: name,
        fn: async ctx => {
            calls.push(name);
            if (contexts)
                contexts.push(ctx);
            return result;
        },
    };
}

/**
 * Resolves once pending stream writes (such as the pretty log transform's) have been delivered.
 */
export function flush(): Promise<void> {
    return new Promise<void>(resolve => setImmediate(resolve));
}
