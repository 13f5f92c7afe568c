import type { SiteConfig } from '../config/site-config.schema.js';

/**
 * Plugin names that enable the `{% seo %}` template tag.
 */
export const SEO_PLUGINS: readonly string[] = ['jekyll-seo-tag', 'seo-tag'];

/**
 * Plugin names that turn `:shortcode:` emoji in Markdown into characters.
 */
export const EMOJI_PLUGINS: readonly string[] = ['jemoji', 'gemoji'];

/**
 * Plugins implemented by the renderer rather than an index producer.
 */
export const RENDER_PLUGINS: ReadonlySet<string> = new Set([...SEO_PLUGINS, ...EMOJI_PLUGINS]);

export interface IRenderFeatures {
    readonly seo: boolean;
    readonly emoji: boolean;
}

/**
 * Renderer features switched on by the site's `plugins` list.
 */
export function renderFeatures(config: Readonly<SiteConfig>): IRenderFeatures {
    return {
        seo: config.plugins.some(name => SEO_PLUGINS.includes(name)),
        emoji: config.plugins.some(name => EMOJI_PLUGINS.includes(name))
    };
}
