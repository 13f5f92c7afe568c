import type { ILogger, IRenderedPage, IStaticFile } from '@quire/types';
import type { SiteConfig } from '../config/site-config.schema.js';
import type { ContentErrorPolicy } from '../content/content-error-policy.js';
import type { IContentSnapshot } from '../content/content-reader.service.js';
import { pageVariables } from '../render/content-transformer.service.js';
import type { ContentTransformer, ITransformedDocument } from '../render/content-transformer.service.js';
import type { LayoutService } from '../render/layout.service.js';
import { assertNoCollisions } from './collisions.js';
import { compareNewestFirst, planDocument } from './document-planner.js';
import type { IPlannedDocument } from './document-planner.js';
import type { IIndexProducer, IndexProducerRegistry, IProducerContext } from './producers/index.js';
import { buildSiteVariables } from './site-variables.js';
import type { IDocumentVariables } from './site-variables.js';
import { TaxonomySlugRegistry } from './taxonomy-slugs.js';

/**
 * Every output of a build, checked for collisions and ready to emit.
 */
export interface IAssembledSite {
    readonly pages: readonly IRenderedPage[];
    readonly staticFiles: readonly IStaticFile[];
}

function toRenderedPage(transformed: ITransformedDocument): IRenderedPage {
    const { planned } = transformed;
    return {
        kind: 'document',
        origin: planned.document.sourcePath,
        url: planned.url,
        outputPath: planned.outputPath,
        content: transformed.content,
        lastModified: planned.lastModified,
        sitemap: planned.sitemap
    };
}

/**
 * Turns the content snapshot into the full set of rendered pages.
 *
 * Steps:
 * 1. Plan every document (settings, URL, layout) and check category and tag slugs
 * 2. Render post excerpts, which `site.posts` exposes to every template
 * 3. Transform every document not claimed by a producer
 * 4. Run the enabled index producers, content phase then manifest phase
 * 5. Reject any two outputs on one path
 *
 * ContentErrors from documents go through the error policy, including those a
 * producer hits while rendering a claimed source page; everything else aborts
 * the build.
 */
export class SiteAssembler {
    constructor(
        private readonly config: Readonly<SiteConfig>,
        private readonly transformer: ContentTransformer,
        private readonly layouts: LayoutService,
        private readonly registry: IndexProducerRegistry,
        private readonly policy: ContentErrorPolicy,
        private readonly logger: ILogger
    ) {}

    /**
     * @throws ConfigurationError for unknown layouts or a post without permalink
     * @throws ContentError for an invalid document unless skip-invalid mode is on
     * @throws OutputCollisionError if two outputs resolve to one path
     */
    async assemble(snapshot: IContentSnapshot): Promise<IAssembledSite> {
        const producers = this.registry.enabled(this.config, this.logger);
        const claimedUrls = new Set(producers.flatMap(producer => producer.claims?.(this.config) ?? []));

        const planned = this.plan(snapshot);
        const documents = await this.renderExcerpts(planned, snapshot.data);
        const site = buildSiteVariables(this.config, documents, snapshot.data);

        const claimed = new Map<string, IDocumentVariables>();
        const transformed: ITransformedDocument[] = [];
        for (const item of documents) {
            const { url, document } = item.planned;
            if (document.collection === 'pages' && claimedUrls.has(url) && !claimed.has(url)) {
                claimed.set(url, item);
                continue;
            }
            try {
                transformed.push(await this.transformer.transform(item.planned, site, this.excerptOf(item)));
            } catch (error) {
                this.policy.handle(error);
            }
        }

        const pages: IRenderedPage[] = transformed.map(toRenderedPage);
        const posts = transformed
            .filter(({ planned: { document } }) => document.collection === 'posts')
            .sort((a, b) => compareNewestFirst(a.planned, b.planned));

        for (const producer of producers) {
            const context: IProducerContext = {
                config: this.config,
                site,
                documents: transformed,
                posts,
                claimed: this.claimedBy(producer, claimed),
                pages: [...pages],
                staticFiles: snapshot.staticFiles,
                transformer: this.transformer,
                policy: this.policy,
                logger: this.logger.child({ producer: producer.name })
            };
            const produced = await producer.produce(context);
            pages.push(...produced);
            this.logger.debug({ producer: producer.name, pages: produced.length }, 'Index producer finished');
        }

        assertNoCollisions(pages, snapshot.staticFiles);

        this.logger.info(
            { pages: pages.length, staticFiles: snapshot.staticFiles.length, producers: producers.map(p => p.name) },
            'Site assembled'
        );
        return { pages, staticFiles: snapshot.staticFiles };
    }

    private plan(snapshot: IContentSnapshot): IPlannedDocument[] {
        const planned: IPlannedDocument[] = [];
        const slugs = new TaxonomySlugRegistry();
        for (const document of snapshot.documents) {
            try {
                const item = planDocument(this.config, document, this.layouts);
                slugs.register(item);
                planned.push(item);
            } catch (error) {
                this.policy.handle(error);
            }
        }
        return planned;
    }

    private async renderExcerpts(
        planned: readonly IPlannedDocument[],
        data: Readonly<Record<string, unknown>>
    ): Promise<IDocumentVariables[]> {
        const site = buildSiteVariables(
            this.config,
            planned.map(item => ({ planned: item, page: pageVariables(item, null) })),
            data
        );

        const documents: IDocumentVariables[] = [];
        for (const item of planned) {
            try {
                const excerpt = await this.transformer.excerpt(item, site);
                documents.push({ planned: item, page: pageVariables(item, excerpt) });
            } catch (error) {
                this.policy.handle(error);
            }
        }
        return documents;
    }

    private excerptOf(item: IDocumentVariables): string | null {
        return typeof item.page.excerpt === 'string' ? item.page.excerpt : null;
    }

    private claimedBy(producer: IIndexProducer, claimed: ReadonlyMap<string, IDocumentVariables>): Map<string, IDocumentVariables> {
        const urls = producer.claims?.(this.config) ?? [];
        return new Map(
            urls.flatMap(url => {
                const item = claimed.get(url);
                return item ? [[url, item] as const] : [];
            })
        );
    }
}
