import type { IRenderedPage } from '@quire/types';
import { ConfigurationError } from '../../../lib/errors.js';
import { slugify } from '../../../lib/slugify.js';
import { escapeXml } from '../../../lib/xml.js';
import type { ArchiveConfig, SiteConfig } from '../../config/site-config.schema.js';
import type { ITransformedDocument } from '../../render/content-transformer.service.js';
import { urlToOutputPath } from '../permalink.js';
import type { IDocumentVariables } from '../site-variables.js';
import { taxonomyNames } from '../taxonomy-slugs.js';
import type { TaxonomyKind } from '../taxonomy-slugs.js';
import type { IIndexProducer, IProducerContext } from './index-producer.js';
import { newestOf, relativeUrl, renderPostList } from './markup.js';

/**
 * Posts sharing one category or tag.
 */
export interface IArchiveGroup {
    /**
     * Name as first written in front matter.
     */
    readonly name: string;
    readonly slug: string;

    /**
     * Posts carrying the name, newest first.
     */
    readonly posts: ITransformedDocument[];
}

const KIND_SETTINGS = {
    category: {
        producer: 'category-archive',
        pageKind: 'category-archive',
        title: 'Categories',
        config: (config: Readonly<SiteConfig>) => config.category_archive
    },
    tag: {
        producer: 'tag-archive',
        pageKind: 'tag-archive',
        title: 'Tags',
        config: (config: Readonly<SiteConfig>) => config.tag_archive
    }
} as const;

/**
 * Group posts by category or tag.
 *
 * Names are grouped by slug, so `Azure` and `azure` share one archive. Planning
 * has already rejected names without a slug and differently spelled names that
 * share one, so a post with N names appears in exactly N groups. Groups are
 * ordered by slug.
 */
export function groupPosts(posts: readonly ITransformedDocument[], kind: TaxonomyKind): IArchiveGroup[] {
    const groups = new Map<string, IArchiveGroup>();

    for (const post of posts) {
        const seen = new Set<string>();
        for (const name of taxonomyNames(post.planned, kind)) {
            const slug = slugify(name);
            if (seen.has(slug)) {
                continue;
            }
            seen.add(slug);

            const group = groups.get(slug);
            if (group) {
                group.posts.push(post);
            } else {
                groups.set(slug, { name, slug, posts: [post] });
            }
        }
    }

    return Array.from(groups.values()).sort((a, b) => (a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0));
}

function renderOverview(config: Readonly<SiteConfig>, archive: ArchiveConfig, groups: readonly IArchiveGroup[]): string {
    const items = groups.map(group => {
        const href = escapeXml(relativeUrl(config, `${archive.path}${group.slug}/`));
        return `<li><a href="${href}">${escapeXml(group.name)}</a> <span class="taxonomy-index__count">${group.posts.length}</span></li>`;
    });
    return ['<ul class="taxonomy-index">', ...items, '</ul>'].join('\n');
}

/**
 * One archive page per category (or tag) at `<path><slug>/`, plus an overview
 * at `<path>` listing every group with its post count.
 *
 * A source page at `<path>` is taken over as the overview template: its title
 * and layout are used and its body precedes the list.
 */
export class ArchiveProducer implements IIndexProducer {
    readonly name: string;
    readonly aliases: readonly string[] = [];
    readonly phase = 'content';

    constructor(private readonly kind: TaxonomyKind) {
        this.name = KIND_SETTINGS[kind].producer;
    }

    isEnabledBy(config: Readonly<SiteConfig>): boolean {
        return KIND_SETTINGS[this.kind].config(config) !== undefined;
    }

    claims(config: Readonly<SiteConfig>): readonly string[] {
        const archive = KIND_SETTINGS[this.kind].config(config);
        return archive ? [archive.path] : [];
    }

    async produce(context: IProducerContext): Promise<IRenderedPage[]> {
        const { config, site, transformer } = context;
        const settings = KIND_SETTINGS[this.kind];
        const archive = settings.config(config);
        if (!archive) {
            context.logger.warn({ producer: this.name }, 'Archive plugin enabled without configuration; no archive pages generated');
            return [];
        }
        if (archive.layout !== null && !transformer.hasLayout(archive.layout)) {
            throw new ConfigurationError(`${this.name} uses unknown layout "${archive.layout}"`, { layout: archive.layout });
        }

        const groups = groupPosts(context.posts, this.kind);
        const output: IRenderedPage[] = [];

        for (const group of groups) {
            const url = `${archive.path}${group.slug}/`;
            const origin = `generated:${this.name}:${group.slug}`;
            const body = renderPostList(config, group.posts);
            const page = {
                title: group.name,
                url,
                taxonomy: this.kind,
                slug: group.slug,
                posts: group.posts.map(post => post.page),
                content: body
            };

            output.push({
                kind: settings.pageKind,
                origin,
                url,
                outputPath: urlToOutputPath(url),
                content: transformer.wrap(body, archive.layout, { site, page }, origin),
                lastModified: newestOf(group.posts),
                sitemap: true
            });
        }

        const template = context.claimed.get(archive.path);
        let index: IRenderedPage | null = null;
        if (template) {
            try {
                index = await this.renderIndex(context, archive, groups, template);
            } catch (error) {
                // Skip-invalid mode: drop the template, keep the generated overview
                context.policy.handle(error);
            }
        }
        output.push(index ?? await this.renderIndex(context, archive, groups, undefined));
        context.logger.debug({ producer: this.name, groups: groups.length }, 'Archive pages generated');
        return output;
    }

    private async renderIndex(
        context: IProducerContext,
        archive: ArchiveConfig,
        groups: readonly IArchiveGroup[],
        template: IDocumentVariables | undefined
    ): Promise<IRenderedPage> {
        const { config, site, transformer } = context;
        const origin = template ? template.planned.document.sourcePath : `generated:${this.name}:index`;
        const page = {
            ...(template ? template.page : {}),
            title: template ? template.planned.title : KIND_SETTINGS[this.kind].title,
            url: archive.path
        };

        const intro = template
            ? await transformer.renderFragment(
                template.planned.document.body,
                template.planned.document.markup,
                { site, page },
                template.planned.document.sourcePath
            )
            : '';
        const body = [intro.trim(), renderOverview(config, archive, groups)].filter(part => part.length > 0).join('\n');
        const layout = template ? template.planned.layout : archive.layout;

        return {
            kind: KIND_SETTINGS[this.kind].pageKind,
            origin,
            url: archive.path,
            outputPath: urlToOutputPath(archive.path),
            content: transformer.wrap(body, layout, { site, page: { ...page, content: body } }, origin),
            lastModified: newestOf(groups.flatMap(group => group.posts)),
            sitemap: true
        };
    }
}
