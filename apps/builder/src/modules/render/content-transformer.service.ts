import type { DocumentMarkup } from '@quire/types';
import { ContentError, describeError } from '../../lib/errors.js';
import type { SiteConfig } from '../config/site-config.schema.js';
import type { IPlannedDocument } from '../assembly/document-planner.js';
import type { LayoutService } from './layout.service.js';
import type { MarkdownService } from './markdown.service.js';
import { renderFeatures } from './render-plugins.js';
import type { TemplateContext, TemplateService } from './template.service.js';

const WORDS_PER_MINUTE = 200;
// Raw and comment blocks first, then single tokens; a separator inside any of them is not a cut point
const TEMPLATE_REGION = new RegExp([
    String.raw`\{%-?\s*raw\s*-?%\}[\s\S]*?\{%-?\s*endraw\s*-?%\}`,
    String.raw`\{%-?\s*comment\s*-?%\}[\s\S]*?\{%-?\s*endcomment\s*-?%\}`,
    String.raw`\{\{[\s\S]*?\}\}`,
    String.raw`\{%[\s\S]*?%\}`
].join('|'), 'g');

/**
 * Template variables of one document (`page.*`).
 */
export type PageVariables = Readonly<Record<string, unknown>>;

/**
 * Output of the transformer for one document.
 */
export interface ITransformedDocument {
    readonly planned: IPlannedDocument;
    readonly page: PageVariables;

    /**
     * Body after template evaluation and Markdown conversion, before any layout.
     */
    readonly html: string;

    /**
     * Final text written to the output path.
     */
    readonly content: string;
}

/**
 * Reading time in whole minutes, never less than one.
 */
export function readTime(body: string): number {
    const words = body.split(/\s+/).filter(word => word.length > 0).length;
    return Math.max(1, Math.ceil(words / WORDS_PER_MINUTE));
}

/**
 * Text before the first excerpt separator that is not inside a template
 * region (raw or comment block, or a `{{ }}`/`{% %}` token).
 * Without a separator the whole body is the excerpt.
 */
export function excerptSource(body: string, separator: string): string {
    const regions = Array.from(body.matchAll(TEMPLATE_REGION), match => ({
        start: match.index ?? 0,
        end: (match.index ?? 0) + match[0].length
    }));

    let searchFrom = 0;
    for (;;) {
        const at = body.indexOf(separator, searchFrom);
        if (at === -1) {
            return body;
        }
        const enclosing = regions.find(region => region.start < at && at < region.end);
        if (!enclosing) {
            return body.slice(0, at);
        }
        searchFrom = enclosing.end;
    }
}

/**
 * Build the `page` variables of a document.
 *
 * Merged front matter comes first, then the computed values, which always win.
 */
export function pageVariables(planned: IPlannedDocument, excerpt: string | null): PageVariables {
    const { document } = planned;
    return {
        ...planned.settings.values,
        url: planned.url,
        date: document.date ?? null,
        last_modified_at: planned.lastModified,
        title: planned.title,
        slug: document.slug,
        path: document.sourcePath,
        collection: document.collection,
        categories: [...planned.categories],
        tags: [...planned.tags],
        excerpt,
        read_time: readTime(document.body)
    };
}

/**
 * Turns a planned document into its final text.
 *
 * Steps in order:
 * 1. Evaluate template tokens in the body against `{ site, page }`
 * 2. Convert Markdown bodies to HTML (other bodies pass through)
 * 3. Wrap the result in the document's layout chain
 */
export class ContentTransformer {
    constructor(
        private readonly config: Readonly<SiteConfig>,
        private readonly templates: TemplateService,
        private readonly markdown: MarkdownService,
        private readonly layouts: LayoutService
    ) {}

    /**
     * Evaluate tokens in `source` and convert it according to its markup.
     *
     * @throws ContentError if a token cannot be evaluated or the Markdown fails to render
     */
    async renderFragment(
        source: string,
        markup: DocumentMarkup,
        context: TemplateContext,
        sourcePath: string
    ): Promise<string> {
        const evaluated = this.templates.render(source, context, { sourcePath });
        if (markup !== 'markdown') {
            return evaluated;
        }

        try {
            return await this.markdown.render(evaluated, {
                sanitize: this.config.sanitize_html,
                emoji: renderFeatures(this.config).emoji
            });
        } catch (error) {
            throw new ContentError(sourcePath, describeError(error));
        }
    }

    /**
     * Rendered excerpt of a post: front matter `excerpt` if set, otherwise the
     * body up to the first excerpt separator. Pages have none.
     */
    async excerpt(planned: IPlannedDocument, site: TemplateContext): Promise<string | null> {
        const { document, settings } = planned;
        if (document.collection !== 'posts') {
            return null;
        }

        const separator = typeof settings.values.excerpt_separator === 'string'
            ? settings.values.excerpt_separator
            : this.config.excerpt_separator;
        const source = typeof settings.values.excerpt === 'string'
            ? settings.values.excerpt
            : excerptSource(document.body, separator);

        const html = await this.renderFragment(
            source.trim(),
            document.markup,
            { site, page: pageVariables(planned, null) },
            document.sourcePath
        );
        return html.trim();
    }

    /**
     * Render a document and wrap it in its layouts.
     *
     * @param planned - Document with resolved settings and URL
     * @param site - `site` template variables
     * @param excerpt - Rendered excerpt from {@link excerpt}
     *
     * @throws ContentError if the body or a layout cannot be rendered
     * @throws ConfigurationError if the layout is unknown
     */
    async transform(planned: IPlannedDocument, site: TemplateContext, excerpt: string | null): Promise<ITransformedDocument> {
        const page = pageVariables(planned, excerpt);
        const { document } = planned;

        const html = await this.renderFragment(document.body, document.markup, { site, page }, document.sourcePath);
        const content = this.layouts.wrap(html, planned.layout, { site, page: { ...page, content: html } }, document.sourcePath);

        return { planned, page, html, content };
    }

    hasLayout(name: string): boolean {
        return this.layouts.has(name);
    }

    /**
     * Wrap generated content in a layout chain.
     */
    wrap(content: string, layout: string | null, context: TemplateContext, origin: string): string {
        return this.layouts.wrap(content, layout, context, origin);
    }
}
