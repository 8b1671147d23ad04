/**
 * @module
 * Sequential task execution.
 */
import {
    resolveEnv,
} from './env';
import type {
    EnvOverrides,
} from './env';
import {
    SpawnError,
} from './errors';
import {
    silentLogger,
} from './logger';
import type {
    Logger,
} from './logger';
import {
    silentReporter,
} from './report';
import type {
    Reporter,
} from './report';
import type {
    Step,
    StepContext,
    StepResult,
    Task,
} from './task';

/** Exit code reported for an in-process step that throws. */
export const STEP_ERROR_EXIT_CODE = 1;

/**
 * Options for {@link runTasks}.
 */
export interface RunOptions {
    /** Working directory of every step. Default: `process.cwd()`. */
    cwd?: string;
    /** Inherited environment. Default: `process.env`. Never modified. */
    baseEnv?: NodeJS.ProcessEnv;
    /** Variables applied to every step of every task in the run. */
    envOverrides?: EnvOverrides;
    /** Output stream handed to in-process steps. Default: `process.stdout`. */
    output?: NodeJS.WritableStream;
    /** Echo steps without running them. */
    dryRun?: boolean;
    reporter?: Reporter;
    logger?: Logger;
}

export interface SuccessRunResult {
    status: 'success';
}

export interface FailureRunResult {
    status: 'failure';
    /** Exit code of the failed step. */
    exitCode: number;
    task: Task;
    /** Zero-based index of the failed step within `task`. */
    stepIndex: number;
}

/**
 * Outcome of a run.
 */
export type RunResult = SuccessRunResult | FailureRunResult;

/**
 * Runs `tasks` one after the other, each task's steps in order. The first
 * failing step ends the run: no later step or task is started. A step function
 * that throws counts as a failure with {@link STEP_ERROR_EXIT_CODE}.
 *
 * @throws {@link SpawnError} if a step's command could not be started.
 */
export async function runTasks(tasks: readonly Task[], options?: RunOptions): Promise<RunResult> {
    if (!options)
        options = {};
    const cwd = options.cwd || process.cwd();
    const baseEnv = options.baseEnv || process.env;
    const envOverrides = options.envOverrides || {};
    const output = options.output || process.stdout;
    const reporter = options.reporter || silentReporter;
    const logger = options.logger || silentLogger;

    logger.debug({ cwd, envOverrides, tasks: tasks.map(x => x.name) }, 'run started');

    for (const [task, i, step] of plannedSteps(tasks)) {
        if (options.dryRun) {
            reporter.stepSkipped(task, i, step);
            continue;
        }

        reporter.stepStarted(task, i, step);
        const ctx: StepContext = {
            cwd,
            env: resolveEnv(baseEnv, envOverrides, step.env),
            output,
        };
        let result: StepResult;
        try {
            result = await step.fn(ctx);
        } catch (e) {
            logger.error({ err: e, step: step.description, task: task.name }, 'step threw');
            result = { exitCode: STEP_ERROR_EXIT_CODE, status: 'failure' };
        }
        logger.debug({ result: result.status, step: step.description, task: task.name }, 'step finished');

        if (result.status === 'spawn-error')
            throw new SpawnError(step.description, result.error);
        if (result.status === 'failure') {
            logger.debug({ exitCode: result.exitCode, task: task.name }, 'run aborted');
            return {
                exitCode: result.exitCode,
                status: 'failure',
                stepIndex: i,
                task,
            };
        }
    }

    return { status: 'success' };
}

/**
 * Runs a single task. See {@link runTasks}.
 */
export function runTask(task: Task, options?: RunOptions): Promise<RunResult> {
    return runTasks([task], options);
}

/**
 * Steps of `tasks` in the order a run would start them.
 */
export function* plannedSteps(tasks: readonly Task[]): IterableIterator<[Task, number, Step]> {
    for (const task of tasks) {
        for (let i = 0; i < task.steps.length; i++)
            yield [task, i, task.steps[i]];
    }
}
