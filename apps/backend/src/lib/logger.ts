import pino from 'pino';
import { env } from '../config/env.js';

/**
 * Logger utilities for the Quire backend.
 *
 * `createLogger()` builds a Pino instance with the standard configuration and
 * `logger` is the process-wide instance used by bootstrap code and HTTP
 * middleware. Services receive a child of it through their constructors
 * instead of importing it, so tests can hand them a stub.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info({ port: 4000 }, 'Server listening');
 */

/**
 * Resolve the effective log level.
 *
 * LOG_LEVEL wins when set. Otherwise production logs `info` and above, tests
 * stay silent, and everything else logs `debug` and above.
 */
function resolveLevel(): pino.LevelWithSilent {
    if (env.LOG_LEVEL) {
        return env.LOG_LEVEL;
    }
    if (env.NODE_ENV === 'production') {
        return 'info';
    }
    return env.NODE_ENV === 'test' ? 'silent' : 'debug';
}

/**
 * Creates a Pino logger instance with standard Quire configuration.
 *
 * Production and test runs write newline-delimited JSON to stdout. Local
 * development goes through `pino-pretty` for colorized, human-readable output.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    const options: pino.LoggerOptions = {
        level: resolveLevel(),
        base: {
            service: 'quire-backend'
        }
    };

    if (env.NODE_ENV === 'production' || env.NODE_ENV === 'test') {
        return pino(options);
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    });

    return pino(options, transport);
}

export const logger = createLogger();
