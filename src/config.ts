/**
 * @module
 * Startup configuration read from the environment.
 */
import {
    defaultEnvOverrides,
} from './env';
import type {
    EnvOverrides,
} from './env';
import {
    ConfigError,
} from './errors';
import {
    LOG_LEVELS,
} from './logger';
import type {
    LogLevel,
} from './logger';
import {
    z,
} from 'zod';
import fs = require('fs-extra');
import path = require('path');

const EnvSchema = z.object({
    STEPMAKE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    UV_CACHE_DIR: z.string().optional(),
});

export interface Config {
    /** Absolute working directory of the run. */
    readonly cwd: string;
    readonly logLevel: LogLevel;
    /** Variables applied to every spawned step. */
    readonly envOverrides: EnvOverrides;
}

/**
 * Reads the configuration from `env`. An empty `UV_CACHE_DIR` counts as unset.
 *
 * @throws {@link ConfigError} on an invalid variable or a missing working directory.
 */
export function loadConfig(env: NodeJS.ProcessEnv, cwd: string): Config {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(x => `${x.path.join('.')}: ${x.message}`);
        throw new ConfigError(`invalid environment: ${issues.join('; ')}`);
    }
    const absCwd = path.resolve(cwd);
    if (!isDirectory(absCwd))
        throw new ConfigError(`working directory ${absCwd} does not exist`);
    return {
        cwd: absCwd,
        envOverrides: defaultEnvOverrides(absCwd, { UV_CACHE_DIR: parsed.data.UV_CACHE_DIR }),
        logLevel: parsed.data.STEPMAKE_LOG_LEVEL,
    };
}

function isDirectory(dir: string): boolean {
    return fs.pathExistsSync(dir) && fs.statSync(dir).isDirectory();
}
