/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ContentTransformer, excerptSource, readTime } from '../content-transformer.service.js';
import { LayoutService } from '../layout.service.js';
import { MarkdownService } from '../markdown.service.js';
import { TemplateService } from '../template.service.js';
import { planDocument } from '../../assembly/document-planner.js';
import { parseSiteConfig } from '../../config/site-config.loader.js';
import { ContentError } from '../../../lib/errors.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createSiteFixture } from '../../../tests/vitest/helpers/site-fixture.js';
import type { ISiteFixture } from '../../../tests/vitest/helpers/site-fixture.js';
import { makePage, makePost } from '../../../tests/vitest/helpers/documents.js';

describe('readTime', () => {
    it('should never be less than one minute', () => {
        expect(readTime('')).toBe(1);
        expect(readTime('just a few words')).toBe(1);
    });

    it('should round partial minutes up at 200 words per minute', () => {
        expect(readTime(Array(200).fill('word').join(' '))).toBe(1);
        expect(readTime(Array(401).fill('word').join('\n'))).toBe(3);
    });
});

describe('excerptSource', () => {
    it('should cut at the first separator', () => {
        expect(excerptSource('First para.\n\nSecond para.\n', '\n\n')).toBe('First para.');
    });

    it('should use the whole body without a separator', () => {
        expect(excerptSource('Only one paragraph.', '<!--more-->')).toBe('Only one paragraph.');
    });

    it('should ignore separators inside raw regions', () => {
        const body = '{% raw %}a\n\nb{% endraw %}\n\nAfter';

        expect(excerptSource(body, '\n\n')).toBe('{% raw %}a\n\nb{% endraw %}');
    });

    it('should ignore separators inside comment blocks', () => {
        const body = '{% comment %}\nfirst\n\nsecond\n{% endcomment %}\nBody text.\n\nMore.';

        expect(excerptSource(body, '\n\n')).toBe('{% comment %}\nfirst\n\nsecond\n{% endcomment %}\nBody text.');
    });

    it('should ignore separators inside a token spanning lines', () => {
        const body = 'Hi {{ page.title\n\n| upcase }} there.\n\nMore.';

        expect(excerptSource(body, '\n\n')).toBe('Hi {{ page.title\n\n| upcase }} there.');
    });
});

describe('ContentTransformer', () => {
    let site: ISiteFixture;
    let transformer: ContentTransformer;
    let layouts: LayoutService;
    const config = parseSiteConfig({ title: 'Cloud Notes', permalink: '/:categories/:title/' });

    beforeEach(async () => {
        site = await createSiteFixture({
            '_layouts/default.html': '<main data-title="{{ page.title }}">{{ content }}</main>'
        });
        const templates = new TemplateService();
        layouts = await LayoutService.load(site.source, '_layouts', templates, new MockLogger());
        transformer = new ContentTransformer(config, templates, new MarkdownService(), layouts);
    });

    afterEach(async () => {
        await site.cleanup();
    });

    it('should evaluate tokens and wrap the body in its layout', async () => {
        const planned = planDocument(config, makePage('about.html', { title: 'About', layout: 'default' }, '<h1>{{ page.title }} - {{ site.title }}</h1>'), layouts);

        const result = await transformer.transform(planned, config, null);

        expect(result.html).toBe('<h1>About - Cloud Notes</h1>');
        expect(result.content).toBe('<main data-title="About"><h1>About - Cloud Notes</h1></main>');
        expect(result.page.url).toBe('/about.html');
    });

    it('should convert Markdown bodies to HTML', async () => {
        const planned = planDocument(config, makePost('2024-03-05-hello.md', { title: 'Hello', categories: ['Azure'] }, 'Hello **world**\n'), layouts);

        const result = await transformer.transform(planned, config, null);

        expect(result.html).toContain('<p>Hello <strong>world</strong></p>');
        expect(result.page.url).toBe('/azure/hello/');
        expect(result.page.categories).toEqual(['Azure']);
        expect(result.page.read_time).toBe(1);
    });

    it('should render a post excerpt from the text before the separator', async () => {
        const planned = planDocument(config, makePost('2024-03-05-hello.md', { title: 'Hello' }, 'Intro **text**.\n\nMore.\n'), layouts);

        expect(await transformer.excerpt(planned, config)).toBe('<p>Intro <strong>text</strong>.</p>');
    });

    it('should keep a comment block whole when cutting the excerpt', async () => {
        const body = '{% comment %}\nfirst\n\nsecond\n{% endcomment %}\nBody text.\n\nMore.\n';
        const planned = planDocument(config, makePost('2024-03-05-notes.md', { title: 'Notes' }, body), layouts);

        expect(await transformer.excerpt(planned, config)).toBe('<p>Body text.</p>');
    });

    it('should prefer an excerpt from front matter', async () => {
        const planned = planDocument(config, makePost('2024-03-05-hello.md', { excerpt: 'Custom summary' }, 'Intro.\n\nMore.\n'), layouts);

        expect(await transformer.excerpt(planned, config)).toBe('<p>Custom summary</p>');
    });

    it('should not give pages an excerpt', async () => {
        const planned = planDocument(config, makePage('about.md', { title: 'About' }), layouts);

        expect(await transformer.excerpt(planned, config)).toBeNull();
    });

    it('should name the document when a token fails', async () => {
        const planned = planDocument(config, makePage('about.md', {}, '{{ page.missing }}'), layouts);

        await expect(transformer.transform(planned, config, null)).rejects.toBeInstanceOf(ContentError);
        await expect(transformer.transform(planned, config, null)).rejects.toThrow(
            'about.md: Unresolved template token "{{ page.missing }}"'
        );
    });
});
