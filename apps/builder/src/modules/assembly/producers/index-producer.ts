import type { ILogger, IRenderedPage, IStaticFile } from '@quire/types';
import type { SiteConfig } from '../../config/site-config.schema.js';
import type { ContentErrorPolicy } from '../../content/content-error-policy.js';
import type { ContentTransformer, ITransformedDocument } from '../../render/content-transformer.service.js';
import { RENDER_PLUGINS } from '../../render/render-plugins.js';
import type { TemplateContext } from '../../render/template.service.js';
import type { IDocumentVariables } from '../site-variables.js';

/**
 * When a producer runs.
 *
 * `content` producers run once every document is transformed. `manifest`
 * producers run last and see every page produced before them.
 */
export type ProducerPhase = 'content' | 'manifest';

/**
 * Everything a producer may read. Producers never modify it.
 */
export interface IProducerContext {
    readonly config: Readonly<SiteConfig>;

    /**
     * `site` template variables.
     */
    readonly site: TemplateContext;

    /**
     * Every transformed document, posts and pages.
     */
    readonly documents: readonly ITransformedDocument[];

    /**
     * Posts, newest first.
     */
    readonly posts: readonly ITransformedDocument[];

    /**
     * Source pages at a URL this producer claimed, keyed by URL. They are not
     * emitted on their own; the producer uses them as templates.
     */
    readonly claimed: ReadonlyMap<string, IDocumentVariables>;

    /**
     * Pages produced so far. Complete for `manifest` producers.
     */
    readonly pages: readonly IRenderedPage[];

    readonly staticFiles: readonly IStaticFile[];
    readonly transformer: ContentTransformer;

    /**
     * Handles a ContentError raised by a claimed source page. In skip-invalid
     * mode the page is reported and the producer goes on without it.
     */
    readonly policy: ContentErrorPolicy;
    readonly logger: ILogger;
}

/**
 * Generates index pages (archives, pagination, feeds, sitemaps) from documents.
 */
export interface IIndexProducer {
    /**
     * Name used in the `plugins` list of `_config.yml`.
     */
    readonly name: string;

    /**
     * Other names accepted in `plugins`, e.g. `jekyll-feed` for `feed`.
     */
    readonly aliases: readonly string[];

    readonly phase: ProducerPhase;

    /**
     * Whether configuration alone turns the producer on, without a `plugins` entry.
     */
    isEnabledBy?(config: Readonly<SiteConfig>): boolean;

    /**
     * URLs whose source page the producer takes over as its template.
     */
    claims?(config: Readonly<SiteConfig>): readonly string[];

    produce(context: IProducerContext): Promise<IRenderedPage[]>;
}

/**
 * Static registry of index producers, filled once at start-up.
 */
export class IndexProducerRegistry {
    private producers: Map<string, IIndexProducer> = new Map();
    private names: Map<string, IIndexProducer> = new Map();

    /**
     * @throws Error if the name or one of the aliases is already registered
     */
    register(producer: IIndexProducer): void {
        for (const name of [producer.name, ...producer.aliases]) {
            if (this.names.has(name)) {
                throw new Error(`Index producer ${name} already registered`);
            }
        }
        this.producers.set(producer.name, producer);
        for (const name of [producer.name, ...producer.aliases]) {
            this.names.set(name, producer);
        }
    }

    list(): IIndexProducer[] {
        return Array.from(this.producers.values());
    }

    /**
     * Look a producer up by name or alias.
     */
    resolve(name: string): IIndexProducer | undefined {
        return this.names.get(name);
    }

    /**
     * Producers enabled for a site, `content` phase first, registration order within a phase.
     *
     * Names in `plugins` that match no producer are logged and ignored, except
     * those the renderer implements itself.
     */
    enabled(config: Readonly<SiteConfig>, logger: ILogger): IIndexProducer[] {
        const enabled = new Set<IIndexProducer>();

        for (const name of config.plugins) {
            const producer = this.resolve(name);
            if (producer) {
                enabled.add(producer);
            } else if (RENDER_PLUGINS.has(name)) {
                logger.debug({ plugin: name }, 'Plugin handled by the renderer');
            } else {
                logger.info({ plugin: name }, 'No index producer for plugin, ignoring');
            }
        }

        const ordered = this.list().filter(producer => enabled.has(producer) || producer.isEnabledBy?.(config) === true);
        return [
            ...ordered.filter(producer => producer.phase === 'content'),
            ...ordered.filter(producer => producer.phase === 'manifest')
        ];
    }
}
