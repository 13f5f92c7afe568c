/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LayoutService, layoutName } from '../layout.service.js';
import { TemplateService } from '../template.service.js';
import { ConfigurationError } from '../../../lib/errors.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createSiteFixture } from '../../../tests/vitest/helpers/site-fixture.js';
import type { ISiteFixture } from '../../../tests/vitest/helpers/site-fixture.js';

describe('LayoutService', () => {
    let site: ISiteFixture;
    let logger: MockLogger;

    beforeEach(async () => {
        logger = new MockLogger();
        site = await createSiteFixture({
            '_layouts/default.html': '<body>{{ content }}</body>',
            '_layouts/single.html': '---\nlayout: default\nsidebar: true\n---\n<article data-sidebar="{{ layout.sidebar }}"><h1>{{ page.title }}</h1>{{ content }}</article>'
        });
    });

    afterEach(async () => {
        await site.cleanup();
    });

    const load = () => LayoutService.load(site.source, '_layouts', new TemplateService(), logger);

    it('should wrap content through the layout chain, innermost first', async () => {
        const layouts = await load();

        const html = layouts.wrap('<p>Hi</p>', 'single', { site: {}, page: { title: 'Hello' } }, 'hello.md');

        expect(html).toBe('<body><article data-sidebar="true"><h1>Hello</h1><p>Hi</p></article></body>');
    });

    it('should resolve the chain by name', async () => {
        const layouts = await load();

        expect(layouts.chain('single').map(layout => layout.name)).toEqual(['single', 'default']);
    });

    it('should leave content unwrapped without a layout', async () => {
        const layouts = await load();

        expect(layouts.wrap('<p>Hi</p>', null, {}, 'hello.md')).toBe('<p>Hi</p>');
    });

    it('should not substitute tokens found inside the wrapped content', async () => {
        const layouts = await load();

        const html = layouts.wrap('{{ page.title }}', 'default', { page: { title: 'Hello' } }, 'hello.md');

        expect(html).toBe('<body>{{ page.title }}</body>');
    });

    it('should reject an unknown layout', async () => {
        const layouts = await load();

        expect(() => layouts.wrap('x', 'missing', {}, 'hello.md')).toThrow('Unknown layout "missing"');
    });

    it('should detect a layout cycle when loading', async () => {
        await site.write({
            '_layouts/a.html': '---\nlayout: b\n---\nA {{ content }}',
            '_layouts/b.html': '---\nlayout: a\n---\nB {{ content }}'
        });

        await expect(load()).rejects.toThrow(ConfigurationError);
        await expect(load()).rejects.toThrow('Circular layout reference detected: a, b.');
        expect(logger.error).toHaveBeenCalled();
    });

    it('should detect a layout that wraps itself', async () => {
        await site.write({ '_layouts/loop.html': '---\nlayout: loop\n---\n{{ content }}' });

        await expect(load()).rejects.toThrow('Circular layout reference detected: loop.');
    });

    it('should reject a parent layout that does not exist', async () => {
        await site.write({ '_layouts/orphan.html': '---\nlayout: nowhere\n---\n{{ content }}' });

        await expect(load()).rejects.toThrow('Layout "orphan" uses unknown layout "nowhere"');
    });

    it('should treat a site without _layouts as having no layouts', async () => {
        const empty = await createSiteFixture();
        try {
            const layouts = await LayoutService.load(empty.source, '_layouts', new TemplateService(), logger);
            expect(layouts.has('default')).toBe(false);
        } finally {
            await empty.cleanup();
        }
    });
});

describe('layoutName', () => {
    it('should map the no-layout spellings to null', () => {
        expect(layoutName(undefined)).toBeNull();
        expect(layoutName(null)).toBeNull();
        expect(layoutName('none')).toBeNull();
        expect(layoutName(false)).toBeNull();
        expect(layoutName('single')).toBe('single');
        expect(layoutName('single.html')).toBe('single');
    });
});
