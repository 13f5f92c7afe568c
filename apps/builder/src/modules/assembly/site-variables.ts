import type { SiteConfig } from '../config/site-config.schema.js';
import type { PageVariables } from '../render/content-transformer.service.js';
import type { IPlannedDocument } from './document-planner.js';
import { compareNewestFirst } from './document-planner.js';

/**
 * A planned document with its current `page` variables.
 */
export interface IDocumentVariables {
    readonly planned: IPlannedDocument;
    readonly page: PageVariables;
}

/**
 * Newest `lastModified` of all documents, or the Unix epoch for an empty site.
 *
 * Used as `site.time` so that rebuilding unchanged input gives identical output.
 */
export function newestTimestamp(documents: readonly IDocumentVariables[]): Date {
    const newest = Math.max(0, ...documents.map(({ planned }) => planned.lastModified.getTime()));
    return new Date(newest);
}

/**
 * Group post variables by taxonomy name, keeping the posts' order.
 */
function groupBy(
    posts: readonly IDocumentVariables[],
    names: (planned: IPlannedDocument) => readonly string[]
): Record<string, PageVariables[]> {
    const groups: Record<string, PageVariables[]> = {};
    for (const post of posts) {
        for (const name of names(post.planned)) {
            const group = groups[name] ?? [];
            group.push(post.page);
            groups[name] = group;
        }
    }
    return groups;
}

/**
 * Build the `site` template variables.
 *
 * Every `_config.yml` key is exposed as `site.<key>`, plus:
 * - `site.posts`: posts, newest first
 * - `site.pages`: pages in source path order
 * - `site.categories` / `site.tags`: posts grouped by name
 * - `site.data`: parsed `_data/` files
 * - `site.time`: newest document timestamp
 */
export function buildSiteVariables(
    config: Readonly<SiteConfig>,
    documents: readonly IDocumentVariables[],
    data: Readonly<Record<string, unknown>>
): Readonly<Record<string, unknown>> {
    const posts = documents
        .filter(({ planned }) => planned.document.collection === 'posts')
        .sort((a, b) => compareNewestFirst(a.planned, b.planned));
    const pages = documents.filter(({ planned }) => planned.document.collection === 'pages');

    return {
        ...config,
        time: newestTimestamp(documents),
        posts: posts.map(({ page }) => page),
        pages: pages.map(({ page }) => page),
        categories: groupBy(posts, planned => planned.categories),
        tags: groupBy(posts, planned => planned.tags),
        data
    };
}
