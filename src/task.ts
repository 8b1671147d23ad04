/**
 * Context that will be passed to the step function during execution.
 */
export interface StepContext {
    /** Working directory of the run. */
    readonly cwd: string;
    /** Resolved environment: base environment, run overrides, then step env. */
    readonly env: NodeJS.ProcessEnv;
    /** Stream for the step's own output. */
    readonly output: NodeJS.WritableStream;
}

export interface SuccessStepResult {
    status: 'success';
}

export interface FailureStepResult {
    status: 'failure';
    /** Exit code of the failed step, propagated verbatim. */
    exitCode: number;
}

export interface SpawnErrorStepResult {
    status: 'spawn-error';
    error: Error;
}

/**
 * Outcome of a single step.
 */
export type StepResult = SuccessStepResult | FailureStepResult | SpawnErrorStepResult;

/**
 * Function that runs a step.
 */
export type StepFunction = (ctx: StepContext) => Promise<StepResult>;

/**
 * Represents one step of a task.
 */
export interface Step {
    /** Step function. */
    readonly fn: StepFunction;
    /** Human-readable form of the step, echoed before it runs. */
    readonly description: string;
    /** Variables layered on top of the run environment for this step only. */
    readonly env?: Readonly<Record<string, string>>;
}

/**
 * Represents a named task.
 */
export interface Task {
    /** Task name. Unique within a registry. */
    readonly name: string;
    /** Steps, run in order. */
    readonly steps: readonly Step[];
    /** One-line description, shown by the help listing. */
    readonly description?: string;
    /** Task run when no task name is given. */
    readonly isDefault?: boolean;
}

export const SUCCESS: SuccessStepResult = Object.freeze({ status: 'success' as const });
