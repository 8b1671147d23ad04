/**
 * @module
 * Diagnostic logger.
 */
import pretty = require('pino-pretty');
import {
    pino,
} from 'pino';
import type {
    Logger,
} from 'pino';

export type {
    Logger,
} from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Creates a logger writing human-readable lines to `destination`. A file
 * descriptor (stderr by default) is written synchronously, so nothing is lost
 * when the process exits with a step's exit code; a stream receives lines
 * through the pretty transform on a later tick.
 */
export function createLogger(level: LogLevel = 'info', destination: number | NodeJS.WritableStream = 2): Logger {
    const stream = pretty({
        destination,
        ignore: 'pid,hostname',
        singleLine: true,
        sync: true,
        translateTime: 'SYS:HH:MM:ss',
    });
    return pino({ level, name: 'stepmake' }, stream);
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = pino({ level: 'silent' });
