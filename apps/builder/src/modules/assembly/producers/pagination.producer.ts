import type { IRenderedPage } from '@quire/types';
import { ConfigurationError } from '../../../lib/errors.js';
import { escapeXml } from '../../../lib/xml.js';
import type { SiteConfig } from '../../config/site-config.schema.js';
import type { ITransformedDocument } from '../../render/content-transformer.service.js';
import { layoutName } from '../../render/layout.service.js';
import { urlToOutputPath } from '../permalink.js';
import type { IDocumentVariables } from '../site-variables.js';
import type { IIndexProducer, IProducerContext } from './index-producer.js';
import { absoluteUrl, newestOf, relativeUrl, renderPostList, renderRedirect } from './markup.js';

/**
 * One page of the post index.
 */
export interface IPaginatorPage {
    readonly page: number;
    readonly per_page: number;
    readonly total_posts: number;
    readonly total_pages: number;
    readonly previous_page: number | null;
    readonly previous_page_path: string | null;
    readonly next_page: number | null;
    readonly next_page_path: string | null;
    readonly posts: readonly ITransformedDocument[];
}

/**
 * Directory of `paginate_path`, where page 1 lives.
 *
 * @example
 * paginationBaseUrl('/page:num/');      // "/"
 * paginationBaseUrl('/blog/page:num/'); // "/blog/"
 */
export function paginationBaseUrl(paginatePath: string): string {
    const at = paginatePath.indexOf(':num');
    return paginatePath.slice(0, paginatePath.lastIndexOf('/', at) + 1);
}

/**
 * URL of page `num`: the base URL for page 1, `paginate_path` otherwise.
 */
export function paginationPageUrl(paginatePath: string, num: number): string {
    return num === 1 ? paginationBaseUrl(paginatePath) : paginatePath.replace(':num', String(num));
}

/**
 * Split posts (newest first) into pages of `perPage`.
 *
 * Always returns at least one page so the index exists on an empty site.
 */
export function paginate(posts: readonly ITransformedDocument[], perPage: number, paginatePath: string): IPaginatorPage[] {
    const totalPages = Math.max(1, Math.ceil(posts.length / perPage));
    const pages: IPaginatorPage[] = [];

    for (let page = 1; page <= totalPages; page++) {
        const previous = page > 1 ? page - 1 : null;
        const next = page < totalPages ? page + 1 : null;
        pages.push({
            page,
            per_page: perPage,
            total_posts: posts.length,
            total_pages: totalPages,
            previous_page: previous,
            previous_page_path: previous === null ? null : paginationPageUrl(paginatePath, previous),
            next_page: next,
            next_page_path: next === null ? null : paginationPageUrl(paginatePath, next),
            posts: posts.slice((page - 1) * perPage, page * perPage)
        });
    }
    return pages;
}

function renderNavigation(config: Readonly<SiteConfig>, pager: IPaginatorPage): string {
    if (pager.total_pages === 1) {
        return '';
    }
    const parts = ['<nav class="pagination">'];
    if (pager.previous_page_path !== null) {
        parts.push(`<a class="pagination__previous" rel="prev" href="${escapeXml(relativeUrl(config, pager.previous_page_path))}">Previous</a>`);
    }
    parts.push(`<span class="pagination__current">Page ${pager.page} of ${pager.total_pages}</span>`);
    if (pager.next_page_path !== null) {
        parts.push(`<a class="pagination__next" rel="next" href="${escapeXml(relativeUrl(config, pager.next_page_path))}">Next</a>`);
    }
    parts.push('</nav>');
    return parts.join('\n');
}

/**
 * Splits posts into pages of `paginate` entries, newest first.
 *
 * Page 1 is canonical at the directory of `paginate_path`; `/page1/` is a
 * redirect stub to it. A source page at that directory is taken over: its
 * layout and title are used and its rendered body precedes the list on
 * every page.
 */
export class PaginationProducer implements IIndexProducer {
    readonly name = 'paginate';
    readonly aliases = ['jekyll-paginate'];
    readonly phase = 'content';

    isEnabledBy(config: Readonly<SiteConfig>): boolean {
        return config.paginate !== undefined;
    }

    claims(config: Readonly<SiteConfig>): readonly string[] {
        return config.paginate === undefined ? [] : [paginationBaseUrl(config.paginate_path)];
    }

    async produce(context: IProducerContext): Promise<IRenderedPage[]> {
        const { config } = context;
        if (config.paginate === undefined) {
            context.logger.warn('Pagination plugin enabled without "paginate"; no index pages generated');
            return [];
        }

        const baseUrl = paginationBaseUrl(config.paginate_path);
        const template = context.claimed.get(baseUrl);
        let output: IRenderedPage[] | null = null;
        if (template) {
            try {
                output = await this.renderPages(context, config.paginate, template);
            } catch (error) {
                // Skip-invalid mode: drop the template, keep the generated index
                context.policy.handle(error);
            }
        }
        if (output === null) {
            output = await this.renderPages(context, config.paginate, undefined);
        }

        const firstPageAlias = config.paginate_path.replace(':num', '1');
        if (firstPageAlias !== baseUrl) {
            output.push({
                kind: 'redirect',
                origin: 'generated:paginate:redirect',
                url: firstPageAlias,
                outputPath: urlToOutputPath(firstPageAlias),
                content: renderRedirect(absoluteUrl(config, baseUrl)),
                sitemap: false
            });
        }

        return output;
    }

    private async renderPages(
        context: IProducerContext,
        perPage: number,
        template: IDocumentVariables | undefined
    ): Promise<IRenderedPage[]> {
        const { config, site, transformer } = context;
        const layout = template ? template.planned.layout : layoutName(config.paginate_layout);
        const origin = template ? template.planned.document.sourcePath : 'generated:paginate';
        const baseTitle = template ? template.planned.title : config.title;
        if (layout !== null && !transformer.hasLayout(layout)) {
            throw new ConfigurationError(`paginate_layout uses unknown layout "${layout}"`, { layout });
        }

        const output: IRenderedPage[] = [];
        for (const pager of paginate(context.posts, perPage, config.paginate_path)) {
            const url = paginationPageUrl(config.paginate_path, pager.page);
            const page = {
                ...(template ? template.page : {}),
                title: pager.page === 1 ? baseTitle : `${baseTitle} - Page ${pager.page}`,
                url
            };
            const paginator = { ...pager, posts: pager.posts.map(post => post.page) };

            const intro = template
                ? await transformer.renderFragment(
                    template.planned.document.body,
                    template.planned.document.markup,
                    { site, page, paginator },
                    template.planned.document.sourcePath
                )
                : '';
            const body = [intro.trim(), renderPostList(config, pager.posts), renderNavigation(config, pager)]
                .filter(part => part.length > 0)
                .join('\n');

            output.push({
                kind: 'pagination',
                origin: pager.page === 1 ? origin : `generated:paginate:${pager.page}`,
                url,
                outputPath: urlToOutputPath(url),
                content: transformer.wrap(body, layout, { site, page: { ...page, content: body }, paginator }, origin),
                lastModified: newestOf(pager.posts) ?? template?.planned.lastModified,
                sitemap: true
            });
        }
        return output;
    }
}
