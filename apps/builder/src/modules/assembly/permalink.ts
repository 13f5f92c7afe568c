import path from 'path';
import type { DocumentMarkup } from '@quire/types';
import { ConfigurationError, ContentError } from '../../lib/errors.js';
import { slugify } from '../../lib/slugify.js';

/**
 * Named permalink styles usable in place of a pattern.
 */
const NAMED_STYLES: Record<string, string> = {
    date: '/:categories/:year/:month/:day/:title:output_ext',
    pretty: '/:categories/:year/:month/:day/:title/',
    ordinal: '/:categories/:year/:y_day/:title:output_ext',
    none: '/:categories/:title:output_ext'
};

const DATE_PLACEHOLDERS = new Set(['year', 'month', 'day', 'i_month', 'i_day', 'short_year', 'y_day']);
const PLACEHOLDERS = new Set([
    ...DATE_PLACEHOLDERS,
    'categories',
    'category',
    'title',
    'slug',
    'name',
    'output_ext'
]);

const PLACEHOLDER_PATTERN = /:([a-z_]+)/g;

/**
 * Document metadata the permalink pattern can reference.
 */
export interface IPermalinkFields {
    readonly sourcePath: string;
    readonly slug: string;
    readonly categories: readonly string[];
    readonly date?: Date;
}

function pad(value: number, width = 2): string {
    return value.toString().padStart(width, '0');
}

function dayOfYear(date: Date): number {
    const start = Date.UTC(date.getUTCFullYear(), 0, 1);
    return Math.floor((date.getTime() - start) / 86_400_000) + 1;
}

/**
 * Replace a named style (`pretty`, `date`, ...) with its pattern.
 */
export function expandPermalinkStyle(pattern: string): string {
    return NAMED_STYLES[pattern] ?? pattern;
}

/**
 * Check a permalink pattern before any document is rendered.
 *
 * @throws ConfigurationError if the pattern does not start with "/" or names an unknown placeholder
 */
export function validatePermalinkPattern(pattern: string, origin = '_config.yml'): void {
    const expanded = expandPermalinkStyle(pattern);

    if (!expanded.startsWith('/')) {
        throw new ConfigurationError(`Invalid permalink pattern "${pattern}" in ${origin}: must start with "/"`, { pattern, origin });
    }

    for (const [, name] of expanded.matchAll(PLACEHOLDER_PATTERN)) {
        if (!PLACEHOLDERS.has(name)) {
            throw new ConfigurationError(
                `Invalid permalink pattern "${pattern}" in ${origin}: unknown placeholder ":${name}"`,
                { pattern, origin }
            );
        }
    }
}

/**
 * Substitute document metadata into a permalink pattern.
 *
 * Category and title segments are slugified; empty segments collapse, so a
 * post without categories under `/:categories/:title/` resolves to `/:title/`.
 * The result is a pure function of the pattern and the fields.
 *
 * @param pattern - Permalink pattern or named style
 * @param fields - Document metadata
 * @returns Site-relative URL starting with "/"
 *
 * @throws ConfigurationError if the pattern is invalid
 * @throws ContentError if the pattern uses date parts and the document has no date
 *
 * @example
 * resolvePermalink('/:categories/:title/', {
 *     sourcePath: '_posts/2024-03-05-bicep-modules.md',
 *     slug: 'bicep-modules',
 *     categories: ['Azure'],
 *     date: new Date(Date.UTC(2024, 2, 5))
 * });
 * // Returns: "/azure/bicep-modules/"
 */
export function resolvePermalink(pattern: string, fields: IPermalinkFields): string {
    validatePermalinkPattern(pattern, fields.sourcePath);

    const { date } = fields;
    const categorySlugs = fields.categories.map(slugify);

    const url = expandPermalinkStyle(pattern).replace(PLACEHOLDER_PATTERN, (_token, name: string) => {
        switch (name) {
            case 'categories':
                return categorySlugs.join('/');
            case 'category':
                return categorySlugs[0] ?? '';
            case 'title':
            case 'slug':
                return slugify(fields.slug);
            case 'name':
                return slugify(path.posix.basename(fields.sourcePath).replace(/\.[^.]+$/, ''));
            case 'output_ext':
                return '.html';
        }

        // Only date placeholders remain
        if (!date) {
            throw new ContentError(fields.sourcePath, `Permalink placeholder ":${name}" needs a date`);
        }
        switch (name) {
            case 'year':
                return date.getUTCFullYear().toString();
            case 'short_year':
                return pad(date.getUTCFullYear() % 100);
            case 'month':
                return pad(date.getUTCMonth() + 1);
            case 'i_month':
                return (date.getUTCMonth() + 1).toString();
            case 'day':
                return pad(date.getUTCDate());
            case 'i_day':
                return date.getUTCDate().toString();
            default:
                return pad(dayOfYear(date), 3);
        }
    });

    return url.replace(/\/{2,}/g, '/');
}

/**
 * URL of a page that declares no permalink, derived from its source path.
 *
 * @example
 * pageUrlFromSourcePath('about.md', 'markdown');           // "/about.html"
 * pageUrlFromSourcePath('docs/index.md', 'markdown');      // "/docs/"
 * pageUrlFromSourcePath('assets/js/skin.js', 'passthrough'); // "/assets/js/skin.js"
 */
export function pageUrlFromSourcePath(sourcePath: string, markup: DocumentMarkup): string {
    const outputPath = markup === 'markdown' ? sourcePath.replace(/\.[^./]+$/, '.html') : sourcePath;
    const url = `/${outputPath}`;
    return url.endsWith('/index.html') ? url.slice(0, -'index.html'.length) : url;
}

/**
 * Output file path for a URL, relative to the destination.
 *
 * @example
 * urlToOutputPath('/azure/my-post/'); // "azure/my-post/index.html"
 * urlToOutputPath('/about');          // "about.html"
 * urlToOutputPath('/feed.xml');       // "feed.xml"
 */
export function urlToOutputPath(url: string): string {
    const relative = url.replace(/^\/+/, '');
    if (relative === '' || relative.endsWith('/')) {
        return `${relative}index.html`;
    }
    return path.posix.extname(relative) === '' ? `${relative}.html` : relative;
}
