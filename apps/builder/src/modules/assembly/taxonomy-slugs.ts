import { ContentError } from '../../lib/errors.js';
import { slugify } from '../../lib/slugify.js';
import type { IPlannedDocument } from './document-planner.js';

export type TaxonomyKind = 'category' | 'tag';

const KIND_LABEL: Readonly<Record<TaxonomyKind, string>> = {
    category: 'Category',
    tag: 'Tag'
};

/**
 * Names of one kind as planned on a document.
 */
export function taxonomyNames(planned: IPlannedDocument, kind: TaxonomyKind): readonly string[] {
    return kind === 'category' ? planned.categories : planned.tags;
}

/**
 * Slug of a category or tag name.
 *
 * @throws ContentError if the name has no letters or digits
 */
export function taxonomySlug(kind: TaxonomyKind, name: string, sourcePath: string): string {
    const slug = slugify(name);
    if (slug === '') {
        throw new ContentError(sourcePath, `${KIND_LABEL[kind]} "${name}" has no letters or digits to build a URL from`, { kind, name });
    }
    return slug;
}

/**
 * Remembers which name each category and tag slug belongs to across the site.
 *
 * Names that differ only in case share a slug (`Azure`, `azure`). Any other
 * pair of names with one slug (`C#`, `C++`) is rejected, since both would be
 * served from the same archive URL.
 */
export class TaxonomySlugRegistry {
    private readonly names: Record<TaxonomyKind, Map<string, string>> = {
        category: new Map(),
        tag: new Map()
    };

    /**
     * Record the categories and tags of a document. Nothing is recorded when it fails.
     *
     * @throws ContentError if a name is empty as a slug or clashes with another name
     */
    register(planned: IPlannedDocument): void {
        const { sourcePath } = planned.document;
        const additions: Array<[TaxonomyKind, string, string]> = [];

        for (const kind of ['category', 'tag'] as const) {
            const local = new Map<string, string>();
            for (const name of taxonomyNames(planned, kind)) {
                const slug = taxonomySlug(kind, name, sourcePath);
                const existing = local.get(slug) ?? this.names[kind].get(slug);
                if (existing !== undefined && existing.toLowerCase() !== name.toLowerCase()) {
                    throw new ContentError(
                        sourcePath,
                        `${KIND_LABEL[kind]} "${name}" has the same URL slug "${slug}" as "${existing}"`,
                        { kind, name, slug, existing }
                    );
                }
                if (existing === undefined) {
                    local.set(slug, name);
                    additions.push([kind, slug, name]);
                }
            }
        }

        for (const [kind, slug, name] of additions) {
            this.names[kind].set(slug, name);
        }
    }
}
