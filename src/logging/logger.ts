/**
 * @file Logger
 *
 * Level-based structured logging with persistent context fields.
 * The default handler writes one coloured line per entry to the
 * console; tests and embedders swap it out with `logHandler_set()`.
 *
 * @module logging
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    level: LogLevel;
    message: string;
    context: Record<string, unknown>;
    timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
    debug(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, context?: Record<string, unknown>): void;
    child(context: Record<string, unknown>): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/** Render context fields as `key=value` pairs. */
function context_format(context: Record<string, unknown>): string {
    return Object.entries(context)
        .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
        .join(' ');
}

/** Default handler: one line per entry, coloured by level. */
export const consoleHandler: LogHandler = (entry: LogEntry): void => {
    const fields: string = context_format(entry.context);
    const line: string = fields ? `${entry.message} ${chalk.dim(fields)}` : entry.message;
    switch (entry.level) {
        case 'error':
            console.error(chalk.red(line));
            break;
        case 'warn':
            console.warn(chalk.yellow(line));
            break;
        case 'debug':
            console.log(chalk.gray(line));
            break;
        default:
            console.log(line);
    }
};

let currentHandler: LogHandler = consoleHandler;
let currentLevel: LogLevel = 'info';

/** Replace the active handler. Returns the previous one. */
export function logHandler_set(handler: LogHandler): LogHandler {
    const previous: LogHandler = currentHandler;
    currentHandler = handler;
    return previous;
}

/** Set the minimum level; entries below it are dropped. */
export function logLevel_set(level: LogLevel): void {
    currentLevel = level;
}

function entry_emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;
    currentHandler({
        level,
        message,
        context,
        timestamp: new Date().toISOString(),
    });
}

/** Create a logger whose entries always carry `baseContext`. */
export function logger_create(baseContext: Record<string, unknown> = {}): Logger {
    return {
        debug: (msg, ctx) => entry_emit('debug', msg, { ...baseContext, ...ctx }),
        info: (msg, ctx) => entry_emit('info', msg, { ...baseContext, ...ctx }),
        warn: (msg, ctx) => entry_emit('warn', msg, { ...baseContext, ...ctx }),
        error: (msg, ctx) => entry_emit('error', msg, { ...baseContext, ...ctx }),
        child: (childCtx) => logger_create({ ...baseContext, ...childCtx }),
    };
}

/** Root logger. */
export const logger: Logger = logger_create();
