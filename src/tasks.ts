/**
 * @module
 * The built-in task table.
 */
import {
    removeDirectoriesNamed,
    removePaths,
} from './clean';
import {
    commandStepToStep,
} from './cmdstep';
import {
    DEFAULT_CACHE_DIR,
} from './env';
import {
    TaskRegistry,
} from './registry';
import type {
    Step,
    Task,
} from './task';
import {
    SUCCESS,
} from './task';

/** Directories owned by the project's tools, removed by `clean`. */
export const CACHE_DIRS: readonly string[] = [
    '.ruff_cache',
    '.pytest_cache',
    '.pyright',
    '.mypy_cache',
    'build',
    'dist',
    DEFAULT_CACHE_DIR,
];

/** Bytecode cache directories, removed wherever they appear. */
export const BYTECODE_CACHE_DIR = '__pycache__';

/** Virtual environment, never touched by `clean`. */
export const VENV_DIR = '.venv';

/** Width of the name column in the help listing. */
const HELP_NAME_WIDTH = 20;

function uv(...args: string[]): Step {
    return commandStepToStep({ command: ['uv', ...args] });
}

/**
 * Formats the help listing of `registry`.
 */
export function formatHelp(registry: TaskRegistry): string {
    const lines = ['Available tasks:'];
    for (const [name, description] of registry.listing())
        lines.push(`  ${name.padEnd(HELP_NAME_WIDTH)} ${description}`.trimEnd());
    return lines.join('\n') + '\n';
}

function helpStep(registry: TaskRegistry): Step {
    return {
        description: 'list tasks',
        fn: async ctx => {
            ctx.output.write(formatHelp(registry));
            return SUCCESS;
        },
    };
}

const cleanCacheDirsStep: Step = {
    description: `remove ${CACHE_DIRS.join(' ')}`,
    fn: async ctx => {
        await removePaths(ctx.cwd, CACHE_DIRS, { exclude: [VENV_DIR] });
        return SUCCESS;
    },
};

const cleanBytecodeStep: Step = {
    description: `remove ${BYTECODE_CACHE_DIR} directories outside ${VENV_DIR}`,
    fn: async ctx => {
        await removeDirectoriesNamed(ctx.cwd, BYTECODE_CACHE_DIR, { exclude: [VENV_DIR] });
        return SUCCESS;
    },
};

/**
 * Builds the registry of built-in tasks, in help listing order.
 */
export function createDefaultRegistry(): TaskRegistry {
    const registry = new TaskRegistry();
    const tasks: Task[] = [
        {
            description: 'Show available tasks.',
            isDefault: true,
            name: 'help',
            steps: [helpStep(registry)],
        },
        {
            description: 'Sync dependencies using locked versions.',
            name: 'prepare',
            steps: [uv('sync', '--frozen')],
        },
        {
            description: 'Auto-format Python sources with ruff.',
            name: 'format',
            steps: [
                uv('run', 'ruff', 'check', '--fix'),
                uv('run', 'ruff', 'format'),
            ],
        },
        {
            description: 'Run linting and type checks.',
            name: 'check',
            steps: [
                uv('run', 'ruff', 'check'),
                uv('run', 'ruff', 'format', '--check'),
                uv('run', 'pyright'),
            ],
        },
        {
            description: 'Run the test suite with pytest.',
            name: 'test',
            steps: [uv('run', 'pytest', '-vv')],
        },
        {
            description: 'Remove local cache and build artifacts.',
            name: 'clean',
            steps: [cleanCacheDirsStep, cleanBytecodeStep],
        },
    ];
    for (const task of tasks)
        registry.register(task);
    return registry;
}
