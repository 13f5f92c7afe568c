import mermaid from 'mermaid';
import type { DiagramTheme } from '@quire/types';
import type { IDiagramRenderer } from './diagram-enhancer.js';

/**
 * {@link IDiagramRenderer} backed by the mermaid library.
 *
 * Rendering is driven by the enhancer, so mermaid's own page scan is off and
 * errors are thrown to the caller instead of being drawn into the page.
 */
export class MermaidRenderer implements IDiagramRenderer {
    initialize(theme: DiagramTheme): void {
        mermaid.initialize({
            startOnLoad: false,
            securityLevel: 'strict',
            suppressErrorRendering: true,
            theme
        });
    }

    async render(id: string, source: string): Promise<string> {
        const { svg } = await mermaid.render(id, source);
        return svg;
    }
}
