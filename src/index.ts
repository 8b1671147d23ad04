/**
 * @module
 * stepmake Public API
 */
export {
    removeDirectoriesNamed,
    removePaths,
} from './clean';
export type {
    RemoveOptions,
} from './clean';
export {
    commandStepToStep,
    quote,
    runCommand,
} from './cmdstep';
export type {
    CommandStep,
} from './cmdstep';
export {
    loadConfig,
} from './config';
export type {
    Config,
} from './config';
export {
    runTask,
    runTasks,
} from './dispatch';
export type {
    RunOptions,
    RunResult,
} from './dispatch';
export {
    CACHE_DIR_VAR,
    defaultEnvOverrides,
    resolveEnv,
} from './env';
export type {
    EnvOverrides,
} from './env';
export {
    ConfigError,
    DefaultTaskConflictError,
    DuplicateTaskError,
    NoDefaultTaskError,
    SpawnError,
    UnknownTaskError,
} from './errors';
export {
    createLogger,
} from './logger';
export {
    createReporter,
} from './report';
export type {
    Reporter,
} from './report';
export {
    TaskRegistry,
} from './registry';
export {
    SUCCESS,
} from './task';
export type {
    Step,
    StepContext,
    StepFunction,
    StepResult,
    Task,
} from './task';
export {
    createDefaultRegistry,
    formatHelp,
} from './tasks';
