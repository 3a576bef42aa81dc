/**
 * Structured logging for the backend.
 *
 * Modules take a sub-logger (`createLogger('search')`) so every line names
 * where it came from. The level comes from LOG_LEVEL, read when this module
 * loads; output is hidden under Jest.
 */

import { ILogObj, Logger } from 'tslog';

export type LogLevelName = 'silly' | 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: Record<LogLevelName, number> = {
    silly: 0,
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
};

function isLogLevelName(value: string): value is LogLevelName {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function resolveMinLevel(level: string | undefined): number {
    const name = (level ?? 'info').toLowerCase();
    return isLogLevelName(name) ? LOG_LEVELS[name] : LOG_LEVELS.info;
}

export const logger: Logger<ILogObj> = new Logger<ILogObj>({
    name: 'rag-chat',
    minLevel: resolveMinLevel(process.env.LOG_LEVEL),
    prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
    type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});

export function createLogger(name: string): Logger<ILogObj> {
    return logger.getSubLogger({ name });
}
