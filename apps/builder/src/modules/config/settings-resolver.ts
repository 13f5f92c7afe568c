import type { IDocument } from '@quire/types';
import { ConfigurationError } from '../../lib/errors.js';
import { deepMerge } from '../../lib/objects.js';
import type { FrontMatterDefault, SiteConfig } from './site-config.schema.js';

/**
 * Effective settings of one document after site defaults and front matter merge.
 */
export interface IEffectiveSettings {
    /**
     * Merged front matter view: matching defaults, then the document's own values.
     */
    readonly values: Readonly<Record<string, unknown>>;

    /**
     * Permalink pattern for the document. Always set for posts; set for pages
     * only when a default or the front matter declares one.
     */
    readonly permalink?: string;
}

function normalizeScopePath(scopePath: string): string {
    return scopePath.replace(/^\.?\/+/, '').replace(/\/+$/, '');
}

function scopeMatches(entry: FrontMatterDefault, document: IDocument): boolean {
    if (entry.scope.type && entry.scope.type !== document.collection) {
        return false;
    }
    const prefix = normalizeScopePath(entry.scope.path);
    return prefix === '' || document.sourcePath === prefix || document.sourcePath.startsWith(`${prefix}/`);
}

/**
 * Site defaults that apply to a document, least specific first.
 *
 * Shorter scope paths sort before longer ones, untyped scopes before typed
 * ones, and declaration order breaks the remaining ties, so merging the list
 * in order lets the later and more specific scope win.
 */
export function matchingDefaults(config: Readonly<SiteConfig>, document: IDocument): FrontMatterDefault[] {
    return config.defaults
        .map((entry, index) => ({ entry, index }))
        .filter(({ entry }) => scopeMatches(entry, document))
        .sort((a, b) => {
            const byPath = normalizeScopePath(a.entry.scope.path).length - normalizeScopePath(b.entry.scope.path).length;
            if (byPath !== 0) {
                return byPath;
            }
            const byType = Number(a.entry.scope.type !== undefined) - Number(b.entry.scope.type !== undefined);
            return byType !== 0 ? byType : a.index - b.index;
        })
        .map(({ entry }) => entry);
}

/**
 * Produce the effective settings view for a document.
 *
 * Pure function of its inputs. Document front matter always overrides site
 * defaults for the same key.
 *
 * @param config - Site configuration
 * @param document - Document whose front matter is merged
 * @returns Merged values and the permalink pattern to apply
 *
 * @throws ConfigurationError if a post has no permalink pattern after the merge
 */
export function resolveSettings(config: Readonly<SiteConfig>, document: IDocument): IEffectiveSettings {
    let values: Record<string, unknown> = {};
    for (const entry of matchingDefaults(config, document)) {
        values = deepMerge(values, entry.values);
    }
    values = deepMerge(values, document.frontMatter);

    const declared = typeof values.permalink === 'string' && values.permalink.length > 0
        ? values.permalink
        : undefined;

    if (document.collection === 'pages') {
        return { values, permalink: declared };
    }

    const permalink = declared ?? config.permalink;
    if (!permalink) {
        throw new ConfigurationError(
            `No permalink pattern applies to ${document.sourcePath}; set "permalink" in _config.yml`,
            { sourcePath: document.sourcePath }
        );
    }

    return { values, permalink };
}
