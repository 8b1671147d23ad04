#!/usr/bin/env node
/**
 * @module
 * Command line entry point: `stepmake [options] [tasks...]`.
 */
import {
    loadConfig,
} from './config';
import {
    runTasks,
} from './dispatch';
import {
    ConfigError,
    NoDefaultTaskError,
    SpawnError,
    UnknownTaskError,
} from './errors';
import {
    createLogger,
} from './logger';
import type {
    Logger,
} from './logger';
import {
    createReporter,
} from './report';
import type {
    Task,
} from './task';
import {
    createDefaultRegistry,
} from './tasks';
import {
    Command,
} from 'commander';
import {
    z,
} from 'zod';
import fs = require('fs-extra');
import path = require('path');

/** Exit code for errors raised by stepmake itself rather than by a step. */
export const ERROR_EXIT_CODE = 1;

interface CliOptions {
    directory?: string;
    dryRun?: boolean;
}

/**
 * Options for {@link main}.
 */
export interface MainOptions {
    /** Default: `process.env`. */
    env?: NodeJS.ProcessEnv;
    /** Receives the output of in-process steps. Default: `process.stdout`. */
    output?: NodeJS.WritableStream;
    /** Receives step echo and log lines. Default: `process.stderr`. */
    errorOutput?: NodeJS.WritableStream;
}

const PackageJsonSchema = z.object({
    version: z.string(),
});

function readVersion(): string {
    const pkg: unknown = fs.readJsonSync(path.join(__dirname, '..', 'package.json'));
    return PackageJsonSchema.parse(pkg).version;
}

function createProgram(): Command {
    return new Command()
        .name('stepmake')
        .description('Run project tasks in order, stopping at the first failing step.')
        .version(readVersion())
        .argument('[tasks...]', 'tasks to run; the default task when none is given')
        .option('-C, --directory <dir>', 'run in <dir> instead of the current directory')
        .option('-n, --dry-run', 'print the steps without running them');
}

/**
 * Runs the tasks named in `argv` and returns the process exit code: 0 on
 * success, the failing step's own exit code, or {@link ERROR_EXIT_CODE}.
 */
export async function main(argv: readonly string[], options?: MainOptions): Promise<number> {
    if (!options)
        options = {};
    const env = options.env || process.env;
    const errorOutput = options.errorOutput || process.stderr;

    const program = createProgram();
    program.parse([...argv], { from: 'user' });
    const opts = program.opts<CliOptions>();

    let logger: Logger | undefined;
    try {
        const config = loadConfig(env, opts.directory || process.cwd());
        logger = createLogger(config.logLevel, options.errorOutput);

        const registry = createDefaultRegistry();
        const tasks: Task[] = program.args.length ?
            program.args.map(name => registry.resolve(name)) :
            [registry.resolve()];

        const result = await runTasks(tasks, {
            baseEnv: env,
            cwd: config.cwd,
            dryRun: opts.dryRun,
            envOverrides: config.envOverrides,
            logger,
            output: options.output,
            reporter: createReporter(errorOutput),
        });
        if (result.status === 'failure') {
            logger.error(`task "${result.task.name}" failed at step ${result.stepIndex + 1}: exit code ${result.exitCode}`);
            return result.exitCode;
        }
        return 0;
    } catch (e) {
        if (!logger)
            logger = createLogger('info', options.errorOutput);
        if (e instanceof UnknownTaskError || e instanceof NoDefaultTaskError || e instanceof ConfigError) {
            logger.error(e.message);
            return ERROR_EXIT_CODE;
        }
        if (e instanceof SpawnError) {
            logger.error({ cause: e.cause }, e.message);
            return ERROR_EXIT_CODE;
        }
        logger.error({ err: e }, 'unexpected error');
        return ERROR_EXIT_CODE;
    }
}

if (require.main === module) {
    main(process.argv.slice(2)).then(code => {
        process.exitCode = code;
    }, err => {
        console.error(err);
        process.exitCode = ERROR_EXIT_CODE;
    });
}
