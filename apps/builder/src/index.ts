/**
 * @fileoverview Command line entry point.
 *
 * Builds the site at `SITE_SOURCE` into `SITE_DESTINATION`, logs a summary
 * and sets exit code 1 when the build fails. All settings come from the
 * environment (see `config/env.ts`) and the site's `_config.yml`.
 *
 * @module index
 */

import { env } from './config/env.js';
import { logger } from './lib/logger.js';
import { QuireError, describeError } from './lib/errors.js';
import { BuildService } from './modules/build/index.js';

/**
 * Run one build.
 *
 * @throws Never; failures are logged and reported through the exit code
 */
async function bootstrap(): Promise<void> {
    try {
        const result = await new BuildService(logger).build({
            sourceDir: env.SITE_SOURCE,
            destinationDir: env.SITE_DESTINATION,
            siteEnv: env.SITE_ENV,
            skipInvalid: env.SKIP_INVALID,
            cacheDir: env.SITE_CACHE_DIR
        });

        for (const skipped of result.skipped) {
            logger.warn({ sourcePath: skipped.sourcePath }, `Skipped: ${skipped.reason}`);
        }
        logger.info(
            {
                destination: result.destination,
                pages: result.pagesWritten,
                staticFiles: result.staticFilesCopied,
                skipped: result.skipped.length
            },
            'Site built'
        );
    } catch (error) {
        if (error instanceof QuireError) {
            logger.error({ code: error.code, details: error.details }, error.message);
        } else {
            logger.error({ error, stack: error instanceof Error ? error.stack : undefined }, `Build failed: ${describeError(error)}`);
        }
        // Let the pretty-print transport flush before the process ends
        process.exitCode = 1;
    }
}

void bootstrap();
