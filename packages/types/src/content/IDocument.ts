/**
 * Front matter mapping parsed from the YAML block at the top of a source file.
 *
 * Values are whatever the YAML produced: strings, numbers, booleans, dates,
 * lists and nested mappings.
 */
export type FrontMatter = Readonly<Record<string, unknown>>;

/**
 * Named grouping a document belongs to, decided by its location.
 *
 * Files under `_posts/` are posts; every other file with front matter is a page.
 */
export type CollectionName = 'posts' | 'pages';

/**
 * How a document body is converted after template tokens are evaluated.
 *
 * `markdown` bodies go through the Markdown pipeline; `passthrough` bodies
 * (HTML, XML, scripts with front matter) are emitted as evaluated.
 */
export type DocumentMarkup = 'markdown' | 'passthrough';

/**
 * One source content file plus its metadata, as read from the content store.
 *
 * Immutable for the duration of a build.
 */
export interface IDocument {
    /**
     * Path relative to the source root, always `/`-separated.
     * Identity of the document.
     */
    readonly sourcePath: string;

    readonly collection: CollectionName;

    readonly markup: DocumentMarkup;

    readonly frontMatter: FrontMatter;

    /**
     * Body text following the front matter block, untouched.
     */
    readonly body: string;

    /**
     * Filename without date prefix and extension, or front matter `slug`.
     */
    readonly slug: string;

    /**
     * Publish date from front matter `date` or the `YYYY-MM-DD-` filename prefix.
     * Pages without a date leave this undefined.
     */
    readonly date?: Date;

    /**
     * Modification time of the source file.
     */
    readonly sourceModifiedAt: Date;
}

/**
 * File without front matter, copied to the output unchanged.
 */
export interface IStaticFile {
    readonly sourcePath: string;
    readonly outputPath: string;
}
