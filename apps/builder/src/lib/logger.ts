import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import { env } from '../config/env.js';

/**
 * Logger utilities for the Quire builder.
 *
 * This module provides:
 * - Factory function for creating configured Pino logger instances
 * - Process-wide logger export used by the CLI entry point
 *
 * Services never import the singleton directly. They receive an `ILogger`
 * through their constructor and scope it with `child({ module })`, which keeps
 * them testable with a recording mock.
 *
 * **Usage:**
 *
 * ```typescript
 * import { logger } from './lib/logger.js';
 *
 * const buildLogger = logger.child({ module: 'build' });
 * buildLogger.info({ pages: 42 }, 'Site written');
 * ```
 */

/**
 * Resolve the effective log level from the environment.
 *
 * - `LOG_LEVEL` wins when set
 * - Tests are silent
 * - Production builds log `info` and above, development builds `debug` and above
 */
function resolveLevel(): LevelWithSilent {
    if (env.LOG_LEVEL) {
        return env.LOG_LEVEL;
    }
    if (env.NODE_ENV === 'test') {
        return 'silent';
    }
    return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Creates a Pino logger instance with the standard Quire configuration.
 *
 * Console output goes through `pino-pretty` for colorized, human-readable
 * lines. Under `NODE_ENV=test` no transport is started, so test runs leave no
 * worker threads behind.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): Logger {
    const level = resolveLevel();

    if (env.NODE_ENV === 'test') {
        return pino({ level, base: { service: 'quire-builder' } });
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,service'
        }
    });

    return pino(
        {
            level,
            base: {
                service: 'quire-builder'
            }
        },
        transport
    );
}

/**
 * Application logger singleton.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info({ source: '.' }, 'Build started');
 * logger.error({ error }, 'Build failed');
 */
export const logger = createLogger();
