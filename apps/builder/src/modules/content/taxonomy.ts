/**
 * Category and tag names of a document, in declaration order without duplicates.
 */
export interface ITaxonomy {
    readonly categories: string[];
    readonly tags: string[];
}

/**
 * Accepts a YAML list or a space-separated string.
 */
function toNames(value: unknown): string[] {
    if (Array.isArray(value)) {
        return value
            .filter(item => item !== null && item !== undefined)
            .map(item => String(item).trim())
            .filter(item => item.length > 0);
    }
    if (typeof value === 'string') {
        return value.split(/\s+/).filter(item => item.length > 0);
    }
    if (typeof value === 'number') {
        return [String(value)];
    }
    return [];
}

/**
 * Read categories and tags from merged front matter settings.
 *
 * `category` (single) is merged into `categories`.
 *
 * @example
 * readTaxonomy({ category: 'azure', tags: 'bicep devops' });
 * // { categories: ['azure'], tags: ['bicep', 'devops'] }
 */
export function readTaxonomy(values: Readonly<Record<string, unknown>>): ITaxonomy {
    const categories = [...toNames(values.category), ...toNames(values.categories)];
    const tags = toNames(values.tags);

    return {
        categories: [...new Set(categories)],
        tags: [...new Set(tags)]
    };
}
