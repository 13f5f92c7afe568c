import { ArchiveProducer } from './archive.producer.js';
import { FeedProducer } from './feed.producer.js';
import { IndexProducerRegistry } from './index-producer.js';
import { PaginationProducer } from './pagination.producer.js';
import { RedirectProducer } from './redirect.producer.js';
import { SearchProducer } from './search.producer.js';
import { SitemapProducer } from './sitemap.producer.js';

export { IndexProducerRegistry } from './index-producer.js';
export type { IIndexProducer, IProducerContext, ProducerPhase } from './index-producer.js';

/**
 * Registry holding every built-in producer.
 */
export function createIndexProducerRegistry(): IndexProducerRegistry {
    const registry = new IndexProducerRegistry();
    registry.register(new PaginationProducer());
    registry.register(new ArchiveProducer('category'));
    registry.register(new ArchiveProducer('tag'));
    registry.register(new RedirectProducer());
    registry.register(new FeedProducer());
    registry.register(new SitemapProducer());
    registry.register(new SearchProducer());
    return registry;
}
