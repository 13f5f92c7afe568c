/// <reference types="vitest" />

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { planDocument } from '../document-planner.js';
import type { IPlannedDocument } from '../document-planner.js';
import { TaxonomySlugRegistry } from '../taxonomy-slugs.js';
import { parseSiteConfig } from '../../config/site-config.loader.js';
import { LayoutService } from '../../render/layout.service.js';
import { TemplateService } from '../../render/template.service.js';
import { ContentError } from '../../../lib/errors.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createSiteFixture } from '../../../tests/vitest/helpers/site-fixture.js';
import type { ISiteFixture } from '../../../tests/vitest/helpers/site-fixture.js';
import { makePost } from '../../../tests/vitest/helpers/documents.js';

describe('category and tag slugs', () => {
    const config = parseSiteConfig({ title: 'Cloud Notes', permalink: '/:categories/:title/' });
    let site: ISiteFixture;
    let layouts: LayoutService;

    beforeAll(async () => {
        site = await createSiteFixture({});
        layouts = await LayoutService.load(site.source, '_layouts', new TemplateService(), new MockLogger());
    });

    afterAll(async () => {
        await site.cleanup();
    });

    function plan(filename: string, frontMatter: Record<string, unknown>): IPlannedDocument {
        return planDocument(config, makePost(filename, frontMatter), layouts);
    }

    it('should reject a tag without letters or digits while planning', () => {
        expect(() => plan('2024-03-05-hash.md', { tags: ['#'] })).toThrow(ContentError);
        expect(() => plan('2024-03-05-hash.md', { tags: ['#'] })).toThrow(
            '_posts/2024-03-05-hash.md: Tag "#" has no letters or digits to build a URL from'
        );
    });

    it('should reject a category without letters or digits while planning', () => {
        expect(() => plan('2024-03-05-plus.md', { categories: ['+++'] })).toThrow(
            '_posts/2024-03-05-plus.md: Category "+++" has no letters or digits to build a URL from'
        );
    });

    it('should keep non-Latin categories in the URL', () => {
        expect(plan('2024-03-05-notes.md', { categories: ['日本語'] }).url).toBe('/日本語/notes/');
    });

    it('should let names that differ only in case share a slug', () => {
        const registry = new TaxonomySlugRegistry();

        registry.register(plan('2024-03-05-a.md', { tags: ['Azure'] }));

        expect(() => registry.register(plan('2024-03-06-b.md', { tags: ['azure'] }))).not.toThrow();
    });

    it('should reject a differently spelled tag with a slug already in use', () => {
        const registry = new TaxonomySlugRegistry();
        registry.register(plan('2024-03-05-a.md', { tags: ['C#', '日本語'] }));

        expect(() => registry.register(plan('2024-03-06-b.md', { tags: ['C++'] }))).toThrow(
            '_posts/2024-03-06-b.md: Tag "C++" has the same URL slug "c" as "C#"'
        );
    });

    it('should reject clashing names within one document', () => {
        expect(() => new TaxonomySlugRegistry().register(plan('2024-03-05-a.md', { categories: ['C#', 'C++'] }))).toThrow(
            '_posts/2024-03-05-a.md: Category "C++" has the same URL slug "c" as "C#"'
        );
    });

    it('should record nothing from a rejected document', () => {
        const registry = new TaxonomySlugRegistry();
        registry.register(plan('2024-03-05-a.md', { tags: ['C#'] }));

        expect(() => registry.register(plan('2024-03-06-b.md', { tags: ['Kubernetes', 'C++'] }))).toThrow(ContentError);
        expect(() => registry.register(plan('2024-03-07-c.md', { tags: ['kubernetes'] }))).not.toThrow();
    });
});
