/**
 * @module
 * Environment resolution for spawned steps.
 */
import path = require('path');

/**
 * Variables applied on top of the inherited environment for a whole run.
 */
export type EnvOverrides = Readonly<Record<string, string>>;

/** Variable pointing uv at its cache directory. */
export const CACHE_DIR_VAR = 'UV_CACHE_DIR';

/** Cache directory used when the caller has not set {@link CACHE_DIR_VAR}. */
export const DEFAULT_CACHE_DIR = '.uv-cache';

/**
 * Returns the run-wide overrides: the cache directory is kept inside `cwd`
 * unless `baseEnv` already names one.
 */
export function defaultEnvOverrides(cwd: string, baseEnv: NodeJS.ProcessEnv): EnvOverrides {
    const cacheDir = baseEnv[CACHE_DIR_VAR] || path.join(cwd, DEFAULT_CACHE_DIR);
    return {
        [CACHE_DIR_VAR]: cacheDir,
    };
}

/**
 * Layers `overrides` and then `stepEnv` on top of `baseEnv`. None of the inputs is modified.
 */
export function resolveEnv(
    baseEnv: NodeJS.ProcessEnv,
    overrides: EnvOverrides,
    stepEnv?: Readonly<Record<string, string>>,
): NodeJS.ProcessEnv {
    return {
        ...baseEnv,
        ...overrides,
        ...stepEnv,
    };
}
