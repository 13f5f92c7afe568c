import type { IDocument } from '@quire/types';
import { ConfigurationError, ContentError, describeError } from '../../lib/errors.js';
import { isValidDate } from '../../lib/dates.js';
import { titleize } from '../../lib/slugify.js';
import { resolveSettings } from '../config/settings-resolver.js';
import type { IEffectiveSettings } from '../config/settings-resolver.js';
import type { SiteConfig } from '../config/site-config.schema.js';
import { readTaxonomy } from '../content/taxonomy.js';
import { layoutName } from '../render/layout.service.js';
import type { LayoutService } from '../render/layout.service.js';
import { pageUrlFromSourcePath, resolvePermalink, urlToOutputPath } from './permalink.js';
import { taxonomySlug } from './taxonomy-slugs.js';

/**
 * A document with everything decided that does not need rendering: merged
 * settings, URL, output path, layout and taxonomy.
 */
export interface IPlannedDocument {
    readonly document: IDocument;
    readonly settings: IEffectiveSettings;
    readonly url: string;
    readonly outputPath: string;
    readonly title: string;
    readonly categories: readonly string[];
    readonly tags: readonly string[];
    readonly layout: string | null;

    /**
     * Old URLs listed in `redirect_from` that should redirect here.
     */
    readonly redirectFrom: readonly string[];

    /**
     * `last_modified_at`, else the document date, else the source mtime.
     */
    readonly lastModified: Date;

    /**
     * Listed in the sitemap: HTML output and no `sitemap: false`.
     */
    readonly sitemap: boolean;
}

function readDate(value: unknown, sourcePath: string, key: string): Date | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    const date = value instanceof Date ? value : new Date(String(value));
    if (!isValidDate(date)) {
        throw new ContentError(sourcePath, `Invalid date in "${key}": ${String(value)}`);
    }
    return date;
}

function readRedirectSources(value: unknown, sourcePath: string): string[] {
    if (value === undefined || value === null) {
        return [];
    }
    const list = Array.isArray(value) ? value : [value];
    return list.map(item => {
        if (typeof item !== 'string' || !item.startsWith('/')) {
            throw new ContentError(sourcePath, `redirect_from entries must be URLs starting with "/", got ${JSON.stringify(item)}`);
        }
        return item;
    });
}

/**
 * Plan one document.
 *
 * @throws ConfigurationError if no permalink applies to a post or the layout is unknown
 * @throws ContentError if the permalink cannot be resolved from the document's metadata,
 * a category or tag has no letters or digits, or a `redirect_from` entry is not a site URL
 */
export function planDocument(
    config: Readonly<SiteConfig>,
    document: IDocument,
    layouts: LayoutService
): IPlannedDocument {
    const settings = resolveSettings(config, document);
    const { categories, tags } = readTaxonomy(settings.values);
    categories.forEach(name => taxonomySlug('category', name, document.sourcePath));
    tags.forEach(name => taxonomySlug('tag', name, document.sourcePath));

    const url = settings.permalink
        ? resolvePermalink(settings.permalink, {
            sourcePath: document.sourcePath,
            slug: document.slug,
            categories,
            date: document.date
        })
        : pageUrlFromSourcePath(document.sourcePath, document.markup);
    const outputPath = urlToOutputPath(url);

    let layout: string | null;
    try {
        layout = layoutName(settings.values.layout);
    } catch (error) {
        throw new ContentError(document.sourcePath, describeError(error));
    }
    if (layout !== null && !layouts.has(layout)) {
        throw new ConfigurationError(
            `${document.sourcePath} uses unknown layout "${layout}"`,
            { sourcePath: document.sourcePath, layout }
        );
    }

    const title = typeof settings.values.title === 'string' && settings.values.title.length > 0
        ? settings.values.title
        : titleize(document.slug);

    const redirectFrom = readRedirectSources(settings.values.redirect_from, document.sourcePath);

    const lastModified =
        readDate(settings.values.last_modified_at, document.sourcePath, 'last_modified_at') ??
        document.date ??
        document.sourceModifiedAt;

    return {
        document,
        settings,
        url,
        outputPath,
        title,
        categories,
        tags,
        layout,
        redirectFrom,
        lastModified,
        sitemap: settings.values.sitemap !== false && outputPath.endsWith('.html')
    };
}

/**
 * Newest first; equal dates fall back to source path, descending.
 */
export function compareNewestFirst(a: IPlannedDocument, b: IPlannedDocument): number {
    const byDate = (b.document.date?.getTime() ?? 0) - (a.document.date?.getTime() ?? 0);
    if (byDate !== 0) {
        return byDate;
    }
    return a.document.sourcePath < b.document.sourcePath ? 1 : a.document.sourcePath > b.document.sourcePath ? -1 : 0;
}
