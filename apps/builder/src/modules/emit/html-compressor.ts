import { rehype } from 'rehype';
import rehypeMinifyWhitespace from 'rehype-minify-whitespace';
import rehypeStringify from 'rehype-stringify';
import { describeError } from '../../lib/errors.js';
import type { SiteConfig } from '../config/site-config.schema.js';

const FULL_DOCUMENT = /^\s*(<!doctype|<html)/i;

/**
 * Whether HTML output is compressed for this build.
 *
 * On when `compress_html` is configured, unless the build environment is
 * listed in `compress_html.ignore.envs`.
 */
export function shouldCompress(config: Readonly<SiteConfig>, siteEnv: string): boolean {
    return config.compress_html !== undefined && !config.compress_html.ignore.envs.includes(siteEnv);
}

/**
 * Collapse insignificant whitespace in an HTML page.
 *
 * Content of `pre`, `textarea`, `script` and `style` elements is left intact.
 * Text that is not a full document is processed as a fragment so no
 * `html`/`head`/`body` wrapper is added.
 *
 * @throws Error if the HTML cannot be processed
 */
export async function compressHtml(html: string): Promise<string> {
    try {
        const result = await rehype()
            .data('settings', { fragment: !FULL_DOCUMENT.test(html) })
            .use(rehypeMinifyWhitespace)
            .use(rehypeStringify)
            .process(html);
        return String(result);
    } catch (error) {
        throw new Error(`Failed to compress HTML: ${describeError(error)}`);
    }
}
