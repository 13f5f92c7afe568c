import { z } from 'zod';
import { SITE_SKINS } from '@quire/types';

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, '');

/**
 * Scope of a front matter default: a source path prefix and an optional collection.
 */
const defaultScopeSchema = z.object({
    path: z.string().default(''),
    type: z.enum(['posts', 'pages']).optional()
});

const frontMatterDefaultSchema = z.object({
    scope: defaultScopeSchema.default({}),
    values: z.record(z.unknown()).default({})
});

/**
 * Category or tag archive settings.
 *
 * `type` is accepted for compatibility with existing configuration files and
 * ignored; archives are always generated as one page per group.
 */
const archiveSchema = z.object({
    type: z.string().optional(),
    path: z.string().startsWith('/'),
    layout: z.string().nullable().default('archive')
});

const compressHtmlSchema = z.object({
    clippings: z.unknown().optional(),
    ignore: z
        .object({
            envs: z
                .union([z.string(), z.array(z.string())])
                .transform(value => (Array.isArray(value) ? value : [value]))
                .default([])
        })
        .default({})
});

/**
 * Schema of `_config.yml`.
 *
 * Keys the builder does not interpret (author profile, analytics, comments,
 * footer links, ...) pass through untouched and stay reachable from templates
 * as `site.<key>`.
 */
export const siteConfigSchema = z
    .object({
        title: z.string().default(''),
        description: z.string().default(''),
        url: z.string().default('').transform(trimTrailingSlash),
        baseurl: z.string().default('').transform(trimTrailingSlash),
        skin: z.enum(SITE_SKINS).default('default'),
        plugins: z.array(z.string()).default([]),
        include: z.array(z.string()).default([]),
        exclude: z.array(z.string()).default([]),
        permalink: z.string().min(1).optional(),
        paginate: z.number().int().positive().optional(),
        paginate_path: z.string().includes(':num').default('/page:num/'),
        paginate_layout: z.string().nullable().default('home'),
        defaults: z.array(frontMatterDefaultSchema).default([]),
        markdown_ext: z
            .string()
            .default('markdown,mkdown,mkdn,mkd,md')
            .transform(value =>
                value
                    .split(',')
                    .map(ext => ext.trim().toLowerCase())
                    .filter(ext => ext.length > 0)
            ),
        excerpt_separator: z.string().default('\n\n'),
        category_archive: archiveSchema.optional(),
        tag_archive: archiveSchema.optional(),
        feed: z
            .object({
                path: z.string().startsWith('/').default('/feed.xml'),
                limit: z.number().int().positive().default(10)
            })
            .default({}),
        compress_html: compressHtmlSchema.optional(),
        skip_invalid: z.boolean().default(false),
        sanitize_html: z.boolean().default(true),
        search: z.boolean().default(false),
        search_full_content: z.boolean().default(false),
        timezone: z.string().optional()
    })
    .passthrough();

export type SiteConfig = z.infer<typeof siteConfigSchema>;
export type FrontMatterDefault = z.infer<typeof frontMatterDefaultSchema>;
export type ArchiveConfig = z.infer<typeof archiveSchema>;
