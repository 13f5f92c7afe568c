/**
 * Turn a title, category or tag into a URL segment.
 *
 * Lowercases, replaces every run of characters that are not letters or digits
 * (in any script) with a single hyphen and trims hyphens from both ends. The
 * result is empty when the input has no letters or digits.
 *
 * @example
 * slugify('Azure DevOps & Bicep'); // "azure-devops-bicep"
 * slugify('日本語 notes'); // "日本語-notes"
 */
export function slugify(input: string): string {
    let slug = input.normalize('NFC').toLowerCase();

    // Replace anything that is not a letter or digit with hyphens
    slug = slug.replace(/[^\p{L}\p{N}]+/gu, '-');

    // Remove leading/trailing hyphens
    slug = slug.replace(/^-+|-+$/g, '');

    return slug;
}

/**
 * Title made from a slug, as used for documents without a `title`.
 *
 * @example
 * titleize('hello-world'); // "Hello World"
 */
export function titleize(slug: string): string {
    return slug
        .split('-')
        .filter(word => word.length > 0)
        .map(word => word.charAt(0).toUpperCase() + word.slice(1))
        .join(' ');
}
