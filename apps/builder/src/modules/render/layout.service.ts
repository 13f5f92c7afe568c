import path from 'path';
import fs from 'fs/promises';
import type { Dirent } from 'fs';
import type { FrontMatter, ILogger } from '@quire/types';
import { ConfigurationError, ContentError, describeError } from '../../lib/errors.js';
import { parseFrontMatter } from '../content/front-matter.js';
import type { IParsedSource } from '../content/front-matter.js';
import type { TemplateContext, TemplateService } from './template.service.js';

/**
 * Layout template loaded from `_layouts/`.
 */
export interface ILayout {
    /**
     * Name used by `layout:` in front matter: path under `_layouts/` without extension.
     */
    readonly name: string;

    /**
     * Path relative to the source root, e.g. `_layouts/single.html`.
     */
    readonly sourcePath: string;

    readonly frontMatter: FrontMatter;
    readonly body: string;

    /**
     * Layout this one is wrapped in, or null for an outermost layout.
     */
    readonly parent: string | null;
}

/**
 * Normalize a `layout` front matter value.
 *
 * `null`, `"none"`, `"null"`, `false` and a missing value all mean no layout.
 *
 * @throws Error if the value is not a string
 */
export function layoutName(value: unknown): string | null {
    if (value === undefined || value === null || value === false) {
        return null;
    }
    if (typeof value !== 'string') {
        throw new Error(`layout must be a name, got ${JSON.stringify(value)}`);
    }
    const name = value.trim().replace(/\.html$/, '');
    return name === '' || name === 'none' || name === 'null' ? null : name;
}

/**
 * Orders layouts so every parent precedes its children.
 *
 * Kahn's algorithm over the parent edges. Layouts left unprocessed sit on a
 * cycle (or hang below one).
 *
 * @throws ConfigurationError naming the layouts on the cycle
 */
function sortLayoutsByParent(layouts: ILayout[], logger: ILogger): ILayout[] {
    const inDegree = new Map<string, number>();
    layouts.forEach(layout => {
        inDegree.set(layout.name, layout.parent === null ? 0 : 1);
    });

    const queue: ILayout[] = layouts.filter(layout => inDegree.get(layout.name) === 0);
    const result: ILayout[] = [];

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
        const parent = next;
        result.push(parent);

        layouts.forEach(child => {
            if (child.parent === parent.name) {
                inDegree.set(child.name, 0);
                queue.push(child);
            }
        });
    }

    if (result.length !== layouts.length) {
        const unprocessedNames = layouts
            .filter(layout => !result.includes(layout))
            .map(layout => layout.name)
            .join(', ');

        logger.error({ unprocessedLayouts: unprocessedNames }, 'Circular layout reference detected');

        throw new ConfigurationError(
            `Circular layout reference detected: ${unprocessedNames}. Remove the cycle from the "layout" front matter of these layouts.`,
            { layouts: unprocessedNames }
        );
    }

    return result;
}

/**
 * Loads layout templates and wraps rendered content in layout chains.
 *
 * All layouts are loaded and validated up front: a layout naming an unknown
 * parent, or a cycle of layouts, is a ConfigurationError raised before any
 * document is transformed.
 */
export class LayoutService {
    private constructor(
        private readonly layouts: ReadonlyMap<string, ILayout>,
        private readonly templates: TemplateService
    ) {}

    /**
     * Load every layout under `<sourceDir>/_layouts`.
     *
     * A site without a `_layouts/` directory has no layouts.
     *
     * @throws ConfigurationError for unreadable layouts, unknown parents or cycles
     */
    static async load(
        sourceDir: string,
        layoutsDir: string,
        templates: TemplateService,
        logger: ILogger
    ): Promise<LayoutService> {
        const root = path.join(sourceDir, layoutsDir);
        const files = await LayoutService.listFiles(root, '');
        const layouts: ILayout[] = [];

        for (const relPath of files) {
            const sourcePath = `${layoutsDir}/${relPath}`;
            let text: string;
            try {
                text = await fs.readFile(path.join(root, relPath), 'utf8');
            } catch (error) {
                throw new ConfigurationError(`Failed to read layout ${sourcePath}: ${describeError(error)}`, { sourcePath });
            }

            let parsed: IParsedSource;
            let parent: string | null;
            try {
                parsed = parseFrontMatter(text, sourcePath);
                parent = layoutName(parsed.frontMatter.layout);
            } catch (error) {
                throw new ConfigurationError(`Invalid layout ${sourcePath}: ${describeError(error)}`, { sourcePath });
            }

            layouts.push({
                name: relPath.replace(/\.[^./]+$/, ''),
                sourcePath,
                frontMatter: parsed.frontMatter,
                body: parsed.body,
                parent
            });
        }

        const byName = new Map(layouts.map(layout => [layout.name, layout]));
        for (const layout of layouts) {
            if (layout.parent !== null && !byName.has(layout.parent)) {
                throw new ConfigurationError(
                    `Layout "${layout.name}" uses unknown layout "${layout.parent}"`,
                    { sourcePath: layout.sourcePath, parent: layout.parent }
                );
            }
        }

        const ordered = sortLayoutsByParent(layouts, logger);
        logger.debug({ layouts: ordered.map(layout => layout.name) }, 'Layouts loaded');

        return new LayoutService(byName, templates);
    }

    private static async listFiles(root: string, relDir: string): Promise<string[]> {
        let entries: Dirent[];
        try {
            entries = await fs.readdir(path.join(root, relDir), { withFileTypes: true });
        } catch (error) {
            if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
                return [];
            }
            throw new ConfigurationError(`Failed to read layouts directory: ${describeError(error)}`);
        }

        const files: string[] = [];
        for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
            const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
            if (entry.name.startsWith('.')) {
                continue;
            }
            if (entry.isDirectory()) {
                files.push(...(await LayoutService.listFiles(root, relPath)));
            } else if (entry.isFile()) {
                files.push(relPath);
            }
        }
        return files;
    }

    has(name: string): boolean {
        return this.layouts.has(name);
    }

    /**
     * Layouts applied for `name`, innermost first.
     *
     * @throws ConfigurationError if `name` is not a known layout
     */
    chain(name: string): ILayout[] {
        const chain: ILayout[] = [];
        for (let current: string | null = name; current !== null;) {
            const layout = this.layouts.get(current);
            if (!layout) {
                throw new ConfigurationError(`Unknown layout "${current}"`, { layout: current });
            }
            chain.push(layout);
            current = layout.parent;
        }
        return chain;
    }

    /**
     * Wrap rendered content in a layout and its ancestors.
     *
     * Each layout is rendered with the document's context plus `content` (the
     * HTML produced so far) and `layout` (the layout's own front matter).
     *
     * @param content - Rendered document HTML
     * @param name - Layout to start with, or null for no wrapping
     * @param context - Template context of the document (`site`, `page`, ...)
     * @param sourcePath - Document being rendered, for error messages
     *
     * @throws ConfigurationError if the layout is unknown
     * @throws ContentError if a layout token cannot be evaluated
     */
    wrap(content: string, name: string | null, context: TemplateContext, sourcePath: string): string {
        if (name === null) {
            return content;
        }

        let output = content;
        for (const layout of this.chain(name)) {
            try {
                output = this.templates.render(
                    layout.body,
                    { ...context, content: output, layout: layout.frontMatter },
                    { sourcePath, templatePath: layout.sourcePath }
                );
            } catch (error) {
                if (error instanceof ContentError) {
                    throw error;
                }
                throw new ContentError(sourcePath, `Failed to apply layout ${layout.sourcePath}: ${describeError(error)}`);
            }
        }
        return output;
    }
}
