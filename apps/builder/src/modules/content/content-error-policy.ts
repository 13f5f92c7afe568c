import type { ILogger } from '@quire/types';
import { ContentError } from '../../lib/errors.js';

/**
 * Document left out of the build in skip-invalid mode.
 */
export interface ISkippedDocument {
    readonly sourcePath: string;
    readonly reason: string;
}

/**
 * Decides what a ContentError does to the build.
 *
 * In strict mode (the default) every ContentError is rethrown and aborts the
 * build. In skip-invalid mode the document is excluded, a warning naming its
 * path is logged and the skip is recorded for the build report. Errors of any
 * other kind are always rethrown.
 */
export class ContentErrorPolicy {
    private readonly skipped: ISkippedDocument[] = [];

    constructor(
        private readonly skipInvalid: boolean,
        private readonly logger: ILogger
    ) {}

    /**
     * Handle an error raised while reading or transforming one document.
     *
     * @throws The error itself unless it is a ContentError and skip-invalid mode is on
     */
    handle(error: unknown): void {
        if (!(error instanceof ContentError) || !this.skipInvalid) {
            throw error;
        }

        this.logger.warn({ sourcePath: error.sourcePath, details: error.details }, `Skipping invalid document: ${error.message}`);
        this.skipped.push({ sourcePath: error.sourcePath, reason: error.message });
    }

    getSkipped(): readonly ISkippedDocument[] {
        return this.skipped;
    }
}
