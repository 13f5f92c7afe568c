import path from 'path';
import fs from 'fs/promises';
import { load } from 'js-yaml';
import type { Dirent } from 'fs';
import type { DocumentMarkup, FrontMatter, ILogger, IDocument, IStaticFile } from '@quire/types';
import { ConfigurationError, ContentError, describeError } from '../../lib/errors.js';
import { isValidDate } from '../../lib/dates.js';
import type { SiteConfig } from '../config/site-config.schema.js';
import { CONFIG_FILENAME } from '../config/site-config.loader.js';
import { hasFrontMatter, parseFrontMatter } from './front-matter.js';
import type { ContentErrorPolicy } from './content-error-policy.js';

export const POSTS_DIR = '_posts';
export const LAYOUTS_DIR = '_layouts';
export const DATA_DIR = '_data';

const POST_FILENAME = /^(\d{4})-(\d{2})-(\d{2})-(.+)\.([^.]+)$/;
const DATA_EXTENSIONS = new Set(['.yml', '.yaml', '.json']);
const ALWAYS_EXCLUDED = ['node_modules'];

/**
 * Everything the content store holds for one build.
 */
export interface IContentSnapshot {
    readonly documents: IDocument[];
    readonly staticFiles: IStaticFile[];

    /**
     * Parsed `_data/` files, keyed by basename (nested for subdirectories).
     */
    readonly data: Record<string, unknown>;
}

function byName(a: Dirent, b: Dirent): number {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function normalizeEntry(entry: string): string {
    return entry.replace(/^\.?\/+/, '').replace(/\/+$/, '');
}

function extensionOf(filename: string): string {
    return path.extname(filename).slice(1).toLowerCase();
}

/**
 * Reads the site source tree into documents, static files and site data.
 *
 * Walk rules:
 * - Entries are visited in sorted order so every build sees the same sequence
 * - Names starting with `.`, `_`, `#` or `~` are ignored unless listed in `include`
 * - `_posts/` holds posts, `_data/` holds site data, `_layouts/` is left to the layout service
 * - `_config.yml`, the destination directory and `exclude` entries are skipped
 * - Files starting with a front matter block are documents; all others are static files
 */
export class ContentReader {
    private readonly excluded: string[];
    private readonly included: string[];
    private readonly markdownExtensions: Set<string>;

    /**
     * @param config - Site configuration (include/exclude lists, markdown extensions)
     * @param policy - Decides whether a ContentError aborts the build or skips the file
     * @param logger - Scoped logger
     */
    constructor(
        config: Readonly<SiteConfig>,
        private readonly policy: ContentErrorPolicy,
        private readonly logger: ILogger
    ) {
        this.excluded = [...ALWAYS_EXCLUDED, ...config.exclude].map(normalizeEntry);
        this.included = config.include.map(normalizeEntry);
        this.markdownExtensions = new Set(config.markdown_ext);
    }

    /**
     * Read the whole source tree.
     *
     * @param sourceDir - Site source root
     * @param destinationDir - Output directory, skipped if it lies inside the source
     *
     * @throws ContentError for an invalid document unless skip-invalid mode is on
     * @throws ConfigurationError for an unreadable `_data/` file
     */
    async read(sourceDir: string, destinationDir: string): Promise<IContentSnapshot> {
        const snapshot: IContentSnapshot = { documents: [], staticFiles: [], data: {} };
        const root = path.resolve(sourceDir);
        const destination = path.resolve(destinationDir);
        const skipRoots = [destination, `${destination}.staging`, `${destination}.previous`];

        await this.walk(root, '', snapshot, skipRoots);

        this.logger.info(
            { documents: snapshot.documents.length, staticFiles: snapshot.staticFiles.length },
            'Content store read'
        );
        return snapshot;
    }

    private async walk(root: string, relDir: string, snapshot: IContentSnapshot, skipRoots: string[]): Promise<void> {
        const entries = (await fs.readdir(path.join(root, relDir), { withFileTypes: true })).sort(byName);

        for (const entry of entries) {
            const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
            const absPath = path.join(root, relPath);

            if (skipRoots.some(skip => absPath === skip || absPath.startsWith(`${skip}${path.sep}`))) {
                continue;
            }
            if (relDir === '' && this.handleSpecialEntry(entry, relPath)) {
                if (entry.name === POSTS_DIR && entry.isDirectory()) {
                    await this.walkPosts(root, relPath, snapshot);
                } else if (entry.name === DATA_DIR && entry.isDirectory()) {
                    await this.readDataDir(root, relPath, snapshot.data);
                }
                continue;
            }
            if (this.isIgnored(entry.name, relPath)) {
                continue;
            }

            if (entry.isDirectory()) {
                await this.walk(root, relPath, snapshot, skipRoots);
            } else if (entry.isFile()) {
                await this.readPageOrStatic(root, relPath, snapshot);
            }
        }
    }

    /**
     * Root-level entries the walker must not treat as pages or static files.
     */
    private handleSpecialEntry(entry: Dirent, relPath: string): boolean {
        if (entry.name === CONFIG_FILENAME && entry.isFile()) {
            return true;
        }
        return entry.isDirectory() && [POSTS_DIR, DATA_DIR, LAYOUTS_DIR].includes(relPath);
    }

    private isIgnored(name: string, relPath: string): boolean {
        if (this.excluded.some(entry => relPath === entry || relPath.startsWith(`${entry}/`))) {
            return true;
        }
        if (/^[._#~]/.test(name)) {
            return !this.included.some(entry => entry === relPath || entry === name);
        }
        return false;
    }

    private markupFor(filename: string): DocumentMarkup {
        return this.markdownExtensions.has(extensionOf(filename)) ? 'markdown' : 'passthrough';
    }

    private async walkPosts(root: string, relDir: string, snapshot: IContentSnapshot): Promise<void> {
        const entries = (await fs.readdir(path.join(root, relDir), { withFileTypes: true })).sort(byName);

        for (const entry of entries) {
            const relPath = `${relDir}/${entry.name}`;
            if (/^[._#~]/.test(entry.name) || this.isIgnored(entry.name, relPath)) {
                continue;
            }
            if (entry.isDirectory()) {
                await this.walkPosts(root, relPath, snapshot);
                continue;
            }
            if (!entry.isFile()) {
                continue;
            }

            try {
                const post = await this.readPost(root, relPath, entry.name);
                if (post) {
                    snapshot.documents.push(post);
                }
            } catch (error) {
                this.policy.handle(error);
            }
        }
    }

    private async readPost(root: string, relPath: string, filename: string): Promise<IDocument | null> {
        const match = POST_FILENAME.exec(filename);
        if (!match) {
            throw new ContentError(relPath, 'Post filenames must look like YYYY-MM-DD-title.ext');
        }

        const [, year, month, day, name] = match;
        const filenameDate = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
        if (!isValidDate(filenameDate) || filenameDate.getUTCDate() !== Number(day)) {
            throw new ContentError(relPath, `Post filename has an invalid date: ${year}-${month}-${day}`);
        }

        const absPath = path.join(root, relPath);
        const [text, stats] = await Promise.all([fs.readFile(absPath, 'utf8'), fs.stat(absPath)]);
        const { frontMatter, body } = parseFrontMatter(text, relPath);

        if (frontMatter.published === false) {
            this.logger.debug({ sourcePath: relPath }, 'Unpublished post excluded');
            return null;
        }

        return {
            sourcePath: relPath,
            collection: 'posts',
            markup: this.markupFor(filename),
            frontMatter,
            body,
            slug: this.slugFor(frontMatter, name),
            date: this.dateFor(frontMatter, relPath) ?? filenameDate,
            sourceModifiedAt: stats.mtime
        };
    }

    private async readPageOrStatic(root: string, relPath: string, snapshot: IContentSnapshot): Promise<void> {
        const absPath = path.join(root, relPath);
        const buffer = await fs.readFile(absPath);
        const text = buffer.subarray(0, 64).toString('utf8');

        if (!hasFrontMatter(text)) {
            snapshot.staticFiles.push({ sourcePath: relPath, outputPath: relPath });
            return;
        }

        try {
            const stats = await fs.stat(absPath);
            const { frontMatter, body } = parseFrontMatter(buffer.toString('utf8'), relPath);
            if (frontMatter.published === false) {
                this.logger.debug({ sourcePath: relPath }, 'Unpublished page excluded');
                return;
            }

            const filename = path.posix.basename(relPath);
            snapshot.documents.push({
                sourcePath: relPath,
                collection: 'pages',
                markup: this.markupFor(filename),
                frontMatter,
                body,
                slug: this.slugFor(frontMatter, filename.replace(/\.[^.]+$/, '')),
                date: this.dateFor(frontMatter, relPath),
                sourceModifiedAt: stats.mtime
            });
        } catch (error) {
            this.policy.handle(error);
        }
    }

    private slugFor(frontMatter: FrontMatter, fallback: string): string {
        return typeof frontMatter.slug === 'string' && frontMatter.slug.length > 0 ? frontMatter.slug : fallback;
    }

    /**
     * Date from front matter. YAML timestamps arrive as Date; strings are parsed.
     *
     * @throws ContentError if `date` is present but not a valid date
     */
    private dateFor(frontMatter: FrontMatter, relPath: string): Date | undefined {
        const value = frontMatter.date;
        if (value === undefined || value === null) {
            return undefined;
        }
        const date = value instanceof Date ? value : new Date(String(value));
        if (!isValidDate(date)) {
            throw new ContentError(relPath, `Invalid date in front matter: ${String(value)}`);
        }
        return date;
    }

    private async readDataDir(root: string, relDir: string, target: Record<string, unknown>): Promise<void> {
        const entries = (await fs.readdir(path.join(root, relDir), { withFileTypes: true })).sort(byName);

        for (const entry of entries) {
            const relPath = `${relDir}/${entry.name}`;
            if (entry.name.startsWith('.')) {
                continue;
            }
            if (entry.isDirectory()) {
                const nested: Record<string, unknown> = {};
                await this.readDataDir(root, relPath, nested);
                target[entry.name] = nested;
                continue;
            }

            const ext = path.extname(entry.name).toLowerCase();
            if (!entry.isFile() || !DATA_EXTENSIONS.has(ext)) {
                continue;
            }

            try {
                target[path.basename(entry.name, path.extname(entry.name))] = load(
                    await fs.readFile(path.join(root, relPath), 'utf8')
                );
            } catch (error) {
                throw new ConfigurationError(`Failed to load site data ${relPath}: ${describeError(error)}`, { relPath });
            }
        }
    }
}
