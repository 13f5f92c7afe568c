import { isValidDate, toXmlSchema } from '../../lib/dates.js';
import { isPlainObject } from '../../lib/objects.js';
import { escapeXml, htmlToText } from '../../lib/xml.js';
import type { TemplateContext } from './template.service.js';

export interface ISeoOptions {
    /**
     * Emit a `<title>` element. `{% seo title=false %}` turns it off for
     * layouts that write their own.
     */
    readonly title: boolean;
}

function text(value: unknown): string {
    return typeof value === 'string' ? value.trim() : '';
}

function authorName(author: unknown): string {
    if (isPlainObject(author)) {
        return text(author.name);
    }
    return text(author);
}

/**
 * Meta tags describing the page to search engines and link previews: title,
 * description, canonical URL, Open Graph and Twitter card tags, plus a
 * schema.org JSON-LD block.
 *
 * The description is the page's `description`, else the text of its excerpt,
 * else the site description. Dated pages are typed as articles.
 *
 * @example
 * renderSeoTags({ site: { title: 'Cloud Notes', url: 'https://notes.example.com' }, page: { title: 'About', url: '/about/' } }, { title: true });
 * // <title>About | Cloud Notes</title>
 * // <meta property="og:title" content="About">
 * // ...
 */
export function renderSeoTags(context: TemplateContext, options: ISeoOptions): string {
    const site: Readonly<Record<string, unknown>> = isPlainObject(context.site) ? context.site : {};
    const page: Readonly<Record<string, unknown>> = isPlainObject(context.page) ? context.page : {};

    const siteTitle = text(site.title);
    const pageTitle = text(page.title) || siteTitle;
    const fullTitle = siteTitle && pageTitle !== siteTitle ? `${pageTitle} | ${siteTitle}` : pageTitle;
    const description = text(page.description) ||
        (typeof page.excerpt === 'string' ? htmlToText(page.excerpt) : '') ||
        text(site.description);
    const canonical = typeof page.url === 'string' ? `${text(site.url)}${text(site.baseurl)}${page.url}` : '';
    const published = isValidDate(page.date) ? toXmlSchema(page.date) : '';
    const author = authorName(page.author) || authorName(site.author);

    const lines: string[] = [];
    if (options.title && fullTitle) {
        lines.push(`<title>${escapeXml(fullTitle)}</title>`);
    }
    if (pageTitle) {
        lines.push(`<meta property="og:title" content="${escapeXml(pageTitle)}">`);
    }
    if (description) {
        lines.push(
            `<meta name="description" content="${escapeXml(description)}">`,
            `<meta property="og:description" content="${escapeXml(description)}">`
        );
    }
    if (canonical) {
        lines.push(
            `<link rel="canonical" href="${escapeXml(canonical)}">`,
            `<meta property="og:url" content="${escapeXml(canonical)}">`
        );
    }
    if (siteTitle) {
        lines.push(`<meta property="og:site_name" content="${escapeXml(siteTitle)}">`);
    }
    lines.push(`<meta property="og:type" content="${published ? 'article' : 'website'}">`);
    if (published) {
        lines.push(`<meta property="article:published_time" content="${published}">`);
    }
    lines.push('<meta name="twitter:card" content="summary">');
    if (pageTitle) {
        lines.push(`<meta property="twitter:title" content="${escapeXml(pageTitle)}">`);
    }

    const linkedData: Record<string, unknown> = {
        '@context': 'https://schema.org',
        '@type': published ? 'BlogPosting' : 'WebPage',
        headline: pageTitle
    };
    if (canonical) {
        linkedData.url = canonical;
    }
    if (description) {
        linkedData.description = description;
    }
    if (published) {
        linkedData.datePublished = published;
    }
    if (author) {
        linkedData.author = { '@type': 'Person', name: author };
    }
    // "<" escaped so page text cannot close the script element
    lines.push(`<script type="application/ld+json">${JSON.stringify(linkedData).replace(/</g, '\\u003c')}</script>`);

    return lines.join('\n');
}
