/**
 * Producer contexts built from in-memory documents.
 *
 * Documents are planned and transformed the way the assembler does it, with
 * layouts loaded from a site fixture, so producer tests see real pages.
 *
 * @module tests/vitest/helpers/producer-context
 */

import type { IDocument, IRenderedPage } from '@quire/types';
import { parseSiteConfig } from '../../../modules/config/site-config.loader.js';
import { planDocument, compareNewestFirst } from '../../../modules/assembly/document-planner.js';
import { buildSiteVariables } from '../../../modules/assembly/site-variables.js';
import type { IDocumentVariables } from '../../../modules/assembly/site-variables.js';
import type { IProducerContext } from '../../../modules/assembly/producers/index.js';
import { ContentTransformer, pageVariables } from '../../../modules/render/content-transformer.service.js';
import type { ITransformedDocument } from '../../../modules/render/content-transformer.service.js';
import { LayoutService } from '../../../modules/render/layout.service.js';
import { MarkdownService } from '../../../modules/render/markdown.service.js';
import { TemplateService } from '../../../modules/render/template.service.js';
import { ContentErrorPolicy } from '../../../modules/content/content-error-policy.js';
import { MockLogger } from '../mocks/logger.js';

export interface IProducerContextOptions {
    /**
     * Pages whose URL a producer claimed, excluded from `documents`.
     */
    claimedUrls?: readonly string[];

    /**
     * Pages produced before the producer under test.
     */
    pages?: readonly IRenderedPage[];

    /**
     * Skip-invalid mode of the error policy. Defaults to strict.
     */
    skipInvalid?: boolean;
}

/**
 * Plan and transform `documents`, then build the context a producer receives.
 *
 * @param sourceDir - Site source holding `_layouts/`
 * @param rawConfig - `_config.yml` values
 * @param documents - Posts and pages of the site
 */
export async function createProducerContext(
    sourceDir: string,
    rawConfig: Record<string, unknown>,
    documents: readonly IDocument[],
    options: IProducerContextOptions = {}
): Promise<IProducerContext> {
    const config = parseSiteConfig(rawConfig);
    const logger = new MockLogger();
    const templates = new TemplateService();
    const layouts = await LayoutService.load(sourceDir, '_layouts', templates, logger);
    const transformer = new ContentTransformer(config, templates, new MarkdownService(), layouts);

    const variables: IDocumentVariables[] = documents.map(document => {
        const planned = planDocument(config, document, layouts);
        return { planned, page: pageVariables(planned, null) };
    });
    const site = buildSiteVariables(config, variables, {});

    const claimedUrls = new Set(options.claimedUrls ?? []);
    const claimed = new Map<string, IDocumentVariables>();
    const transformed: ITransformedDocument[] = [];
    for (const item of variables) {
        if (claimedUrls.has(item.planned.url)) {
            claimed.set(item.planned.url, item);
        } else {
            transformed.push(await transformer.transform(item.planned, site, null));
        }
    }

    return {
        config,
        site,
        documents: transformed,
        posts: transformed
            .filter(({ planned }) => planned.document.collection === 'posts')
            .sort((a, b) => compareNewestFirst(a.planned, b.planned)),
        claimed,
        pages: options.pages ?? [],
        staticFiles: [],
        transformer,
        policy: new ContentErrorPolicy(options.skipInvalid ?? false, logger),
        logger
    };
}
