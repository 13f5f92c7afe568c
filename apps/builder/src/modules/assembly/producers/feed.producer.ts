import type { IRenderedPage } from '@quire/types';
import { toXmlSchema } from '../../../lib/dates.js';
import { isPlainObject } from '../../../lib/objects.js';
import { escapeXml } from '../../../lib/xml.js';
import type { SiteConfig } from '../../config/site-config.schema.js';
import type { ITransformedDocument } from '../../render/content-transformer.service.js';
import { urlToOutputPath } from '../permalink.js';
import type { IIndexProducer, IProducerContext } from './index-producer.js';
import { absoluteUrl } from './markup.js';

function authorName(config: Readonly<SiteConfig>): string | undefined {
    const author = config.author;
    if (typeof author === 'string' && author.length > 0) {
        return author;
    }
    if (isPlainObject(author) && typeof author.name === 'string' && author.name.length > 0) {
        return author.name;
    }
    return undefined;
}

function renderEntry(config: Readonly<SiteConfig>, post: ITransformedDocument): string {
    const { planned, html, page } = post;
    const link = absoluteUrl(config, planned.url);
    const published = planned.document.date ?? planned.lastModified;
    const lines = [
        '<entry>',
        `<title type="html">${escapeXml(planned.title)}</title>`,
        `<link href="${escapeXml(link)}" rel="alternate" type="text/html" title="${escapeXml(planned.title)}" />`,
        `<published>${toXmlSchema(published)}</published>`,
        `<updated>${toXmlSchema(planned.lastModified)}</updated>`,
        `<id>${escapeXml(link)}</id>`,
        `<content type="html" xml:base="${escapeXml(link)}">${escapeXml(html)}</content>`
    ];
    for (const term of [...planned.categories, ...planned.tags]) {
        lines.push(`<category term="${escapeXml(term)}" />`);
    }
    if (typeof page.excerpt === 'string' && page.excerpt.length > 0) {
        lines.push(`<summary type="html">${escapeXml(page.excerpt)}</summary>`);
    }
    lines.push('</entry>');
    return lines.join('\n');
}

/**
 * Atom feed of the newest posts at `feed.path`.
 *
 * The feed's `updated` time is the newest post's date, so an unchanged site
 * produces an identical feed.
 */
export class FeedProducer implements IIndexProducer {
    readonly name = 'feed';
    readonly aliases = ['jekyll-feed'];
    readonly phase = 'content';

    async produce(context: IProducerContext): Promise<IRenderedPage[]> {
        const { config } = context;
        const posts = context.posts.slice(0, config.feed.limit);
        const feedUrl = absoluteUrl(config, config.feed.path);
        const updated = posts.length > 0
            ? new Date(Math.max(...posts.map(({ planned }) => planned.lastModified.getTime())))
            : new Date(0);
        const author = authorName(config);

        const lines = [
            '<?xml version="1.0" encoding="utf-8"?>',
            '<feed xmlns="http://www.w3.org/2005/Atom">',
            '<generator>Quire</generator>',
            `<link href="${escapeXml(feedUrl)}" rel="self" type="application/atom+xml" />`,
            `<link href="${escapeXml(absoluteUrl(config, '/'))}" rel="alternate" type="text/html" />`,
            `<updated>${toXmlSchema(updated)}</updated>`,
            `<id>${escapeXml(feedUrl)}</id>`,
            `<title type="html">${escapeXml(config.title)}</title>`
        ];
        if (config.description) {
            lines.push(`<subtitle>${escapeXml(config.description)}</subtitle>`);
        }
        if (author) {
            lines.push(`<author><name>${escapeXml(author)}</name></author>`);
        }
        lines.push(...posts.map(post => renderEntry(config, post)), '</feed>', '');

        return [{
            kind: 'feed',
            origin: 'generated:feed',
            url: config.feed.path,
            outputPath: urlToOutputPath(config.feed.path),
            content: lines.join('\n'),
            lastModified: posts.length > 0 ? updated : undefined,
            sitemap: false
        }];
    }
}
