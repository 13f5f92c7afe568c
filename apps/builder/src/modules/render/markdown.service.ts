import { createHash } from 'crypto';
import { remark } from 'remark';
import remarkGemoji from 'remark-gemoji';
import remarkGfm from 'remark-gfm';
import remarkHtml from 'remark-html';
import { rehype } from 'rehype';
import rehypeSanitize from 'rehype-sanitize';
import rehypeStringify from 'rehype-stringify';
import type { ICacheService } from '@quire/types';
import { describeError } from '../../lib/errors.js';

/**
 * Options that change the rendered output, and therefore the cache key.
 */
export interface IMarkdownOptions {
    /**
     * Strip scripts, event handlers and unknown tags from the HTML.
     */
    readonly sanitize: boolean;

    /**
     * Replace `:shortcode:` emoji such as `:rocket:` with the character.
     */
    readonly emoji?: boolean;
}

/**
 * Service for rendering Markdown bodies to HTML fragments.
 *
 * The remark/rehype pipeline:
 * 1. Parse markdown with GitHub Flavored Markdown support
 * 2. Replace emoji shortcodes (when enabled)
 * 3. Convert to HTML
 * 4. Sanitize HTML (when enabled) to prevent XSS attacks
 * 5. Stringify to final HTML output
 *
 * Fenced code keeps its `language-<lang>` class through sanitization, which the
 * browser diagram script depends on.
 */
export class MarkdownService {
    /**
     * Cache key prefix for rendered HTML.
     * Full key format: "markdown:{sha256}"
     */
    private readonly CACHE_PREFIX = 'markdown:';

    /**
     * Create a markdown service.
     *
     * @param cacheService - Optional render cache; without one every call renders
     */
    constructor(private readonly cacheService?: ICacheService) {}

    /**
     * Render markdown body to HTML.
     *
     * @param markdown - Markdown content to render (without front matter)
     * @param options - Rendering options
     * @returns Promise resolving to the HTML fragment
     *
     * @throws Error if markdown processing fails
     *
     * @example
     * const html = await markdown.render('# Hello\n\nThis is **bold** text.', { sanitize: true });
     * // Returns: "<h1>Hello</h1>\n<p>This is <strong>bold</strong> text.</p>"
     */
    async render(markdown: string, options: IMarkdownOptions): Promise<string> {
        const cacheKey = this.cacheKey(markdown, options);
        if (this.cacheService) {
            const cached = await this.cacheService.get<string>(cacheKey);
            if (typeof cached === 'string') {
                return cached;
            }
        }

        let html: string;
        try {
            const htmlResult = await remark()
                .use(remarkGfm)
                .use(options.emoji === true ? [remarkGemoji] : [])
                .use(remarkHtml, { sanitize: false }) // Sanitized below with rehype
                .process(markdown);

            html = options.sanitize ? await this.sanitize(String(htmlResult)) : String(htmlResult);
        } catch (error) {
            throw new Error(`Failed to render markdown: ${describeError(error)}`);
        }

        if (this.cacheService) {
            await this.cacheService.set(cacheKey, html);
        }
        return html;
    }

    private async sanitize(html: string): Promise<string> {
        const sanitizedResult = await rehype()
            .data('settings', { fragment: true })
            .use(rehypeSanitize)
            .use(rehypeStringify)
            .process(html);

        return String(sanitizedResult);
    }

    private cacheKey(markdown: string, options: IMarkdownOptions): string {
        const digest = createHash('sha256')
            .update(JSON.stringify({ sanitize: options.sanitize, emoji: options.emoji === true }))
            .update('\0')
            .update(markdown)
            .digest('hex');
        return this.CACHE_PREFIX + digest;
    }
}
