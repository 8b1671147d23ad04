/**
 * @module
 * Implements Steps that run external commands.
 */
import type {
    Step,
    StepContext,
    StepResult,
} from './task';
import {
    SUCCESS,
} from './task';
import childProcess = require('child_process');
import os = require('os');

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

/**
 * Represents a step that runs one external command.
 */
export interface CommandStep {
    command: string[];
    env?: Record<string, string>;
    description?: string;
}

/**
 * Converts a command step into a step.
 */
export function commandStepToStep(commandStep: CommandStep): Step {
    const command = commandStep.command;
    if (!command.length)
        throw new Error('command step has an empty command');

    return {
        description: commandStep.description || command.map(quote).join(' '),
        env: commandStep.env,
        fn: ctx => runCommand(command, ctx),
    };
}

/**
 * Runs `command` with inherited stdio and resolves with its outcome. Never rejects.
 */
export function runCommand(command: readonly string[], ctx: StepContext): Promise<StepResult> {
    return new Promise<StepResult>(resolve => {
        const cmdFile = command[0];
        const cmdArgs = command.slice(1);
        let cp: childProcess.ChildProcess;
        try {
            cp = childProcess.spawn(cmdFile, cmdArgs, {
                cwd: ctx.cwd,
                env: ctx.env,
                stdio: 'inherit',
            });
        } catch (e) {
            resolve({ error: toError(e), status: 'spawn-error' });
            return;
        }
        cp.on('error', e => {
            resolve({ error: e, status: 'spawn-error' });
        });
        cp.on('close', (code, signal) => {
            if (code === 0)
                resolve(SUCCESS);
            else if (code !== null)
                resolve({ exitCode: code, status: 'failure' });
            else
                resolve({ exitCode: signalExitCode(signal), status: 'failure' });
        });
    });
}

/**
 * Exit code a shell reports for a process killed by `signal`.
 */
export function signalExitCode(signal: NodeJS.Signals | null): number {
    if (!signal)
        return 1;
    return 128 + (SIGNAL_NUMBERS.get(signal) || 0);
}

/**
 * Return a shell-escaped version of `x`
 */
export function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}

function toError(e: unknown): Error {
    return e instanceof Error ? e : new Error(String(e));
}
