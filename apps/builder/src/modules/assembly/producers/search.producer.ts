import type { IRenderedPage } from '@quire/types';
import { toXmlSchema } from '../../../lib/dates.js';
import { htmlToText } from '../../../lib/xml.js';
import type { SiteConfig } from '../../config/site-config.schema.js';
import type { ITransformedDocument } from '../../render/content-transformer.service.js';
import type { IIndexProducer, IProducerContext } from './index-producer.js';
import { relativeUrl } from './markup.js';

export const SEARCH_INDEX_URL = '/search.json';

/**
 * Words of body text kept per entry unless `search_full_content` is set.
 */
const EXCERPT_WORDS = 50;

/**
 * One searchable document as written to `search.json`.
 */
export interface ISearchEntry {
    readonly title: string;

    /**
     * URL as linked from a page, base URL included.
     */
    readonly url: string;
    readonly excerpt: string;
    readonly categories: readonly string[];
    readonly tags: readonly string[];
    readonly date: string | null;
}

function searchable({ planned }: ITransformedDocument): boolean {
    return planned.sitemap && planned.settings.values.search !== false;
}

/**
 * `search.json` for the client-side search box, enabled by `search: true`.
 *
 * Lists posts newest first, then the other HTML documents in source order.
 * Documents with `search: false` or `sitemap: false` are left out, as are the
 * generated archive and pagination pages.
 */
export class SearchProducer implements IIndexProducer {
    readonly name = 'search';
    readonly aliases: readonly string[] = [];
    readonly phase = 'manifest';

    isEnabledBy(config: Readonly<SiteConfig>): boolean {
        return config.search;
    }

    async produce(context: IProducerContext): Promise<IRenderedPage[]> {
        const others = context.documents.filter(({ planned }) => planned.document.collection !== 'posts');
        const entries = [...context.posts, ...others]
            .filter(searchable)
            .map(document => this.toEntry(context, document));

        context.logger.debug({ entries: entries.length }, 'Search index generated');
        return [{
            kind: 'search-index',
            origin: 'generated:search',
            url: SEARCH_INDEX_URL,
            outputPath: 'search.json',
            content: `${JSON.stringify(entries, null, 2)}\n`,
            sitemap: false
        }];
    }

    private toEntry({ config }: IProducerContext, document: ITransformedDocument): ISearchEntry {
        const { planned, page } = document;
        const text = htmlToText(typeof page.excerpt === 'string' && !config.search_full_content ? page.excerpt : document.html);
        const words = text.split(' ').filter(word => word.length > 0);
        const excerpt = config.search_full_content || words.length <= EXCERPT_WORDS
            ? words.join(' ')
            : `${words.slice(0, EXCERPT_WORDS).join(' ')}…`;

        return {
            title: planned.title,
            url: relativeUrl(config, planned.url),
            excerpt,
            categories: planned.categories,
            tags: planned.tags,
            date: planned.document.date ? toXmlSchema(planned.document.date) : null
        };
    }
}
