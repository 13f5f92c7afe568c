import type { SiteConfig } from '../../config/site-config.schema.js';
import type { ITransformedDocument } from '../../render/content-transformer.service.js';
import { toShortDateString, toXmlSchema } from '../../../lib/dates.js';
import { escapeXml } from '../../../lib/xml.js';

/**
 * URL as linked from a page: the base URL plus the site-relative URL.
 */
export function relativeUrl(config: Readonly<SiteConfig>, url: string): string {
    return `${config.baseurl}${url}`;
}

/**
 * Canonical absolute URL of a site-relative URL.
 */
export function absoluteUrl(config: Readonly<SiteConfig>, url: string): string {
    return `${config.url}${config.baseurl}${url}`;
}

/**
 * Newest `lastModified` among documents, undefined for none.
 */
export function newestOf(documents: readonly ITransformedDocument[]): Date | undefined {
    if (documents.length === 0) {
        return undefined;
    }
    return new Date(Math.max(...documents.map(({ planned }) => planned.lastModified.getTime())));
}

/**
 * List of post links used by pagination and archive pages.
 *
 * @example
 * renderPostList(config, posts);
 * // <ul class="post-list">
 * // <li><a href="/azure/bicep-modules/">Bicep modules</a> <time datetime="2024-03-05T00:00:00+00:00">05 Mar 2024</time></li>
 * // </ul>
 */
export function renderPostList(config: Readonly<SiteConfig>, posts: readonly ITransformedDocument[]): string {
    const items = posts.map(({ planned }) => {
        const link = `<a href="${escapeXml(relativeUrl(config, planned.url))}">${escapeXml(planned.title)}</a>`;
        const date = planned.document.date;
        return date
            ? `<li>${link} <time datetime="${toXmlSchema(date)}">${toShortDateString(date)}</time></li>`
            : `<li>${link}</li>`;
    });
    return ['<ul class="post-list">', ...items, '</ul>'].join('\n');
}

/**
 * Static page that sends the browser to `target` and tells crawlers where the
 * canonical copy lives.
 */
export function renderRedirect(target: string): string {
    const href = escapeXml(target);
    return [
        '<!DOCTYPE html>',
        '<html lang="en">',
        '<meta charset="utf-8">',
        '<title>Redirecting&hellip;</title>',
        `<link rel="canonical" href="${href}">`,
        `<meta http-equiv="refresh" content="0; url=${href}">`,
        '<meta name="robots" content="noindex">',
        '<h1>Redirecting&hellip;</h1>',
        `<a href="${href}">Click here if you are not redirected.</a>`,
        '</html>',
        ''
    ].join('\n');
}
