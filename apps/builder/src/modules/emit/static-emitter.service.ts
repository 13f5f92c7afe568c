import path from 'path';
import fs from 'fs/promises';
import type { ILogger, IRenderedPage, IStaticFile } from '@quire/types';
import { describeError } from '../../lib/errors.js';
import type { IAssembledSite } from '../assembly/site-assembler.service.js';
import { compressHtml } from './html-compressor.js';

/**
 * Counts reported after a successful emit.
 */
export interface IEmitResult {
    readonly destination: string;
    readonly pagesWritten: number;
    readonly staticFilesCopied: number;
}

export interface IStaticEmitterOptions {
    /**
     * Compress `.html` outputs with {@link compressHtml}.
     */
    readonly compress: boolean;
}

/**
 * Writes the assembled site to the destination directory.
 *
 * Everything is written to `<destination>.staging` first. Only when every
 * page and static file is in place is the staging directory swapped in for
 * the destination; on failure the staging directory is removed and the
 * previous output stays untouched. Writing the same site twice produces the
 * same tree.
 *
 * Directory structure mirrors output paths:
 * `azure/bicep-modules/index.html`, `page2/index.html`, `assets/css/main.css`
 */
export class StaticEmitter {
    /**
     * @param options - Emit options
     * @param logger - Scoped logger
     */
    constructor(
        private readonly options: IStaticEmitterOptions,
        private readonly logger: ILogger
    ) {}

    /**
     * Write pages and copy static files.
     *
     * @param site - Assembled pages and static files
     * @param sourceDir - Source root that static file paths are relative to
     * @param destinationDir - Output directory, replaced as a whole
     *
     * @throws Error if any write fails; the destination is then left as it was
     */
    async emit(site: IAssembledSite, sourceDir: string, destinationDir: string): Promise<IEmitResult> {
        const destination = path.resolve(destinationDir);
        const staging = `${destination}.staging`;
        const previous = `${destination}.previous`;

        await fs.rm(staging, { recursive: true, force: true });

        try {
            await fs.mkdir(staging, { recursive: true });
            for (const page of site.pages) {
                await this.writePage(staging, page);
            }
            for (const file of site.staticFiles) {
                await this.copyStatic(sourceDir, staging, file);
            }

            await fs.rm(previous, { recursive: true, force: true });
            if (await this.exists(destination)) {
                await fs.rename(destination, previous);
            }
            await fs.rename(staging, destination);
            await fs.rm(previous, { recursive: true, force: true });
        } catch (error) {
            await fs.rm(staging, { recursive: true, force: true });
            this.logger.error({ destination, error: describeError(error) }, 'Emit failed; previous output left in place');
            throw error;
        }

        this.logger.info(
            { destination, pages: site.pages.length, staticFiles: site.staticFiles.length },
            'Site written'
        );
        return {
            destination,
            pagesWritten: site.pages.length,
            staticFilesCopied: site.staticFiles.length
        };
    }

    private async writePage(root: string, page: IRenderedPage): Promise<void> {
        const target = this.resolveInside(root, page.outputPath);
        const content = this.options.compress && page.outputPath.endsWith('.html')
            ? await compressHtml(page.content)
            : page.content;

        try {
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.writeFile(target, content, 'utf8');
        } catch (error) {
            throw new Error(`Failed to write ${page.outputPath}: ${describeError(error)}`);
        }
    }

    private async copyStatic(sourceDir: string, root: string, file: IStaticFile): Promise<void> {
        const target = this.resolveInside(root, file.outputPath);

        try {
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.copyFile(path.join(sourceDir, file.sourcePath), target);
        } catch (error) {
            throw new Error(`Failed to copy ${file.sourcePath}: ${describeError(error)}`);
        }
    }

    /**
     * @throws Error if the output path leaves the output directory
     */
    private resolveInside(root: string, outputPath: string): string {
        const target = path.resolve(root, outputPath);
        if (!target.startsWith(`${root}${path.sep}`)) {
            throw new Error(`Output path escapes the destination: ${outputPath}`);
        }
        return target;
    }

    private async exists(target: string): Promise<boolean> {
        try {
            await fs.stat(target);
            return true;
        } catch (error) {
            if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
                return false;
            }
            throw error;
        }
    }
}
