/**
 * What produced a rendered page.
 *
 * `document` pages come from a source file; the others are generated indexes.
 */
export type RenderedPageKind =
    | 'document'
    | 'category-archive'
    | 'tag-archive'
    | 'pagination'
    | 'redirect'
    | 'feed'
    | 'sitemap'
    | 'robots'
    | 'search-index';

/**
 * Final output artifact: an output path plus the text written there.
 */
export interface IRenderedPage {
    readonly kind: RenderedPageKind;

    /**
     * Source path for document pages, `generated:<producer>:<key>` otherwise.
     * Reported when two pages collide on one output path.
     */
    readonly origin: string;

    /**
     * Site-relative URL, e.g. `/azure/my-post/`.
     */
    readonly url: string;

    /**
     * Output file path relative to the destination, `/`-separated, e.g. `azure/my-post/index.html`.
     */
    readonly outputPath: string;

    readonly content: string;

    /**
     * Timestamp reported in the sitemap. Undefined when nothing dates the page.
     */
    readonly lastModified?: Date;

    /**
     * Whether the page is listed in the sitemap.
     */
    readonly sitemap: boolean;
}
