import type { DiagramTheme } from '@quire/types';
import { diagramThemeFor } from './theme-map.js';

/**
 * Marker class the builder's Markdown renderer puts on fenced diagram code.
 */
export const DIAGRAM_SELECTOR = '.language-mermaid';

/**
 * Lifecycle of one enhancement pass.
 *
 * uninitialized → waiting-for-dom → scanning → rendering → idle
 */
export type EnhancerState = 'uninitialized' | 'waiting-for-dom' | 'scanning' | 'rendering' | 'idle';

/**
 * Turns diagram source into SVG markup.
 */
export interface IDiagramRenderer {
    /**
     * Configure the renderer once, before the first diagram.
     */
    initialize(theme: DiagramTheme): void;

    /**
     * Render one diagram.
     *
     * @param id - Unique id for the generated SVG
     * @param source - Diagram source text
     * @returns SVG markup
     * @throws Error if the source cannot be parsed
     */
    render(id: string, source: string): Promise<string>;
}

/**
 * Outcome of a pass.
 */
export interface IEnhancementReport {
    readonly theme: DiagramTheme;
    readonly rendered: number;
    readonly failed: number;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Replaces diagram code blocks on a page with rendered diagrams.
 *
 * Runs one pass after the DOM is ready. Each block is rendered on its own: a
 * block that fails is replaced by an inline error message and the remaining
 * blocks are still rendered. Render failures never escape {@link start}.
 *
 * @example
 * const enhancer = new DiagramEnhancer(new MermaidRenderer(), document, window.SITE_SKIN);
 * const report = await enhancer.start();
 * // report: { theme: 'dark', rendered: 2, failed: 0 }
 */
export class DiagramEnhancer {
    private state: EnhancerState = 'uninitialized';
    private pass: Promise<IEnhancementReport> | null = null;

    /**
     * @param renderer - Diagram renderer
     * @param document - Page to enhance
     * @param skin - Skin name baked into the page at build time
     */
    constructor(
        private readonly renderer: IDiagramRenderer,
        private readonly document: Document,
        private readonly skin: unknown
    ) {}

    getState(): EnhancerState {
        return this.state;
    }

    /**
     * Start the pass. Later calls return the promise of the first one.
     */
    start(): Promise<IEnhancementReport> {
        if (!this.pass) {
            this.state = 'waiting-for-dom';
            this.pass = this.domReady().then(() => this.enhance());
        }
        return this.pass;
    }

    private domReady(): Promise<void> {
        if (this.document.readyState !== 'loading') {
            return Promise.resolve();
        }
        return new Promise(resolve => {
            this.document.addEventListener('DOMContentLoaded', () => resolve(), { once: true });
        });
    }

    private async enhance(): Promise<IEnhancementReport> {
        this.state = 'scanning';
        const theme = diagramThemeFor(this.skin);
        const blocks = Array.from(this.document.querySelectorAll<HTMLElement>(DIAGRAM_SELECTOR));

        this.state = 'rendering';
        let rendered = 0;
        let failed = 0;
        if (blocks.length > 0) {
            this.renderer.initialize(theme);
        }

        for (const [index, block] of blocks.entries()) {
            // Fenced code is <pre><code class="language-mermaid">; replace the whole <pre>
            const parent = block.parentElement;
            const target = parent !== null && parent.tagName === 'PRE' ? parent : block;
            const source = block.textContent ?? '';

            try {
                const svg = await this.renderer.render(`diagram-${index}`, source);
                target.replaceWith(this.diagramElement(svg));
                rendered++;
            } catch (error) {
                target.replaceWith(this.errorElement(source, error));
                failed++;
            }
        }

        this.state = 'idle';
        return { theme, rendered, failed };
    }

    private diagramElement(svg: string): HTMLElement {
        const container = this.document.createElement('div');
        container.className = 'diagram';
        // Trusted: the renderer runs with securityLevel strict
        container.innerHTML = svg;
        return container;
    }

    private errorElement(source: string, error: unknown): HTMLElement {
        const container = this.document.createElement('div');
        container.className = 'diagram diagram--error';
        container.setAttribute('role', 'alert');

        const message = this.document.createElement('p');
        message.textContent = `Diagram could not be rendered: ${describeError(error)}`;

        const code = this.document.createElement('pre');
        code.textContent = source;

        container.append(message, code);
        return container;
    }
}
