/**
 * @fileoverview Browser entry point.
 *
 * Loaded as a module script by the site layouts, after they set
 * `window.SITE_SKIN`. The `mermaid` import is resolved by the page's import map.
 */

import { DiagramEnhancer } from './diagram-enhancer.js';
import { MermaidRenderer } from './mermaid-renderer.js';

declare global {
    interface Window {
        /**
         * Skin from `_config.yml`, written into the page at build time.
         */
        SITE_SKIN?: unknown;
    }
}

const enhancer = new DiagramEnhancer(new MermaidRenderer(), document, window.SITE_SKIN);

enhancer.start().catch((error: unknown) => {
    console.error('Diagram enhancement failed', error);
});
