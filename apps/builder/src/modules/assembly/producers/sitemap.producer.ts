import type { IRenderedPage } from '@quire/types';
import { toXmlSchema } from '../../../lib/dates.js';
import { escapeXml } from '../../../lib/xml.js';
import type { IIndexProducer, IProducerContext } from './index-producer.js';
import { absoluteUrl } from './markup.js';

export const SITEMAP_URL = '/sitemap.xml';
export const ROBOTS_URL = '/robots.txt';

/**
 * `sitemap.xml` listing every routable HTML page, plus `robots.txt` pointing
 * at it unless the site ships its own.
 *
 * Runs in the manifest phase so generated archives and pagination pages are
 * listed too. Redirect stubs and pages with `sitemap: false` are left out.
 */
export class SitemapProducer implements IIndexProducer {
    readonly name = 'sitemap';
    readonly aliases = ['jekyll-sitemap'];
    readonly phase = 'manifest';

    async produce(context: IProducerContext): Promise<IRenderedPage[]> {
        const { config } = context;
        const entries = context.pages
            .filter(page => page.sitemap)
            .map(page => ({ loc: absoluteUrl(config, page.url), lastModified: page.lastModified }))
            .sort((a, b) => (a.loc < b.loc ? -1 : a.loc > b.loc ? 1 : 0));

        const lines = [
            '<?xml version="1.0" encoding="UTF-8"?>',
            '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">'
        ];
        for (const entry of entries) {
            lines.push('<url>', `<loc>${escapeXml(entry.loc)}</loc>`);
            if (entry.lastModified) {
                lines.push(`<lastmod>${toXmlSchema(entry.lastModified)}</lastmod>`);
            }
            lines.push('</url>');
        }
        lines.push('</urlset>', '');

        const output: IRenderedPage[] = [{
            kind: 'sitemap',
            origin: 'generated:sitemap',
            url: SITEMAP_URL,
            outputPath: 'sitemap.xml',
            content: lines.join('\n'),
            sitemap: false
        }];

        const hasRobots =
            context.pages.some(page => page.outputPath === 'robots.txt') ||
            context.staticFiles.some(file => file.outputPath === 'robots.txt');
        if (!hasRobots) {
            output.push({
                kind: 'robots',
                origin: 'generated:sitemap:robots',
                url: ROBOTS_URL,
                outputPath: 'robots.txt',
                content: `Sitemap: ${absoluteUrl(config, SITEMAP_URL)}\n`,
                sitemap: false
            });
        }

        context.logger.debug({ urls: entries.length }, 'Sitemap generated');
        return output;
    }
}
