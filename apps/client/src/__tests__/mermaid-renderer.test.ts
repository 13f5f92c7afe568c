/// <reference types="vitest" />

import { describe, it, expect, vi, beforeEach } from 'vitest';
import mermaid from 'mermaid';
import { MermaidRenderer } from '../mermaid-renderer.js';

vi.mock('mermaid', () => ({
    default: {
        initialize: vi.fn(),
        render: vi.fn()
    }
}));

describe('MermaidRenderer', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should initialize mermaid without its page scan and with strict security', () => {
        new MermaidRenderer().initialize('forest');

        expect(mermaid.initialize).toHaveBeenCalledWith({
            startOnLoad: false,
            securityLevel: 'strict',
            suppressErrorRendering: true,
            theme: 'forest'
        });
    });

    it('should return the SVG of a rendered diagram', async () => {
        vi.mocked(mermaid.render).mockResolvedValue({ svg: '<svg id="diagram-0"></svg>', diagramType: 'flowchart' });

        const svg = await new MermaidRenderer().render('diagram-0', 'graph TD\n  A --- B');

        expect(svg).toBe('<svg id="diagram-0"></svg>');
        expect(mermaid.render).toHaveBeenCalledWith('diagram-0', 'graph TD\n  A --- B');
    });

    it('should pass parse errors to the caller', async () => {
        vi.mocked(mermaid.render).mockRejectedValue(new Error('Parse error on line 1'));

        await expect(new MermaidRenderer().render('diagram-1', 'graph TD\n  A -->')).rejects.toThrow('Parse error on line 1');
    });
});
