import matter from 'gray-matter';
import type { FrontMatter } from '@quire/types';
import { ContentError, describeError } from '../../lib/errors.js';
import { isPlainObject } from '../../lib/objects.js';

export interface IParsedSource {
    frontMatter: FrontMatter;
    body: string;
}

/**
 * Whether text begins with a `---` front matter delimiter line.
 */
export function hasFrontMatter(text: string): boolean {
    return /^---[ \t]*\r?\n/.test(text);
}

/**
 * Split a source file into its front matter mapping and body.
 *
 * Front matter must be at the start of the content in YAML format:
 * ---
 * title: "Deploying Bicep from pipelines"
 * categories: [azure, devops]
 * tags: bicep pipelines
 * ---
 * Body text...
 *
 * Text without a front matter block yields an empty mapping and the text unchanged.
 *
 * @param text - Raw file content
 * @param sourcePath - Source path, used in error messages
 *
 * @throws ContentError if the YAML is malformed or is not a mapping
 */
export function parseFrontMatter(text: string, sourcePath: string): IParsedSource {
    let data: unknown;
    let body: string;
    try {
        // Passing options bypasses gray-matter's shared result cache
        const parsed = matter(text, {});
        data = parsed.data;
        body = parsed.content;
    } catch (error) {
        throw new ContentError(sourcePath, `Failed to parse front matter: ${describeError(error)}`);
    }

    if (!isPlainObject(data)) {
        throw new ContentError(sourcePath, 'Front matter must be a mapping of keys to values');
    }

    return { frontMatter: Object.freeze({ ...data }), body };
}
