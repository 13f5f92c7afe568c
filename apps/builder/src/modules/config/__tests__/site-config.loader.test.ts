/// <reference types="vitest" />

import { describe, it, expect, afterEach } from 'vitest';
import { loadSiteConfig, parseSiteConfig } from '../site-config.loader.js';
import { ConfigurationError } from '../../../lib/errors.js';
import { createSiteFixture } from '../../../tests/vitest/helpers/site-fixture.js';
import type { ISiteFixture } from '../../../tests/vitest/helpers/site-fixture.js';

describe('parseSiteConfig', () => {
    it('should apply defaults to an empty configuration', () => {
        const config = parseSiteConfig({});

        expect(config.skin).toBe('default');
        expect(config.paginate_path).toBe('/page:num/');
        expect(config.paginate_layout).toBe('home');
        expect(config.markdown_ext).toEqual(['markdown', 'mkdown', 'mkdn', 'mkd', 'md']);
        expect(config.excerpt_separator).toBe('\n\n');
        expect(config.feed).toEqual({ path: '/feed.xml', limit: 10 });
        expect(config.skip_invalid).toBe(false);
        expect(config.sanitize_html).toBe(true);
        expect(config.defaults).toEqual([]);
    });

    it('should trim trailing slashes from url and baseurl', () => {
        const config = parseSiteConfig({ url: 'https://notes.example.com/', baseurl: '/blog/' });

        expect(config.url).toBe('https://notes.example.com');
        expect(config.baseurl).toBe('/blog');
    });

    it('should accept minimal_mistakes_skin as an alias of skin', () => {
        expect(parseSiteConfig({ minimal_mistakes_skin: 'mint' }).skin).toBe('mint');
        expect(parseSiteConfig({ skin: 'neon', minimal_mistakes_skin: 'mint' }).skin).toBe('neon');
    });

    it('should keep unknown keys for templates', () => {
        const config = parseSiteConfig({ author: { name: 'Test Author' }, analytics: { provider: 'none' } });

        expect(config.author).toEqual({ name: 'Test Author' });
        expect(config.analytics).toEqual({ provider: 'none' });
    });

    it('should normalize compress_html ignore envs to a list', () => {
        const config = parseSiteConfig({ compress_html: { ignore: { envs: 'development' } } });

        expect(config.compress_html?.ignore.envs).toEqual(['development']);
    });

    it('should reject an unknown skin and name the failing key', () => {
        expect(() => parseSiteConfig({ skin: 'glitter' })).toThrow('Invalid _config.yml: skin');
    });

    it('should list every failing key', () => {
        expect(() => parseSiteConfig({ paginate: 0, paginate_path: '/page/' })).toThrow(
            'Invalid _config.yml: paginate, paginate_path'
        );
    });

    it('should reject a configuration that is not a mapping', () => {
        expect(() => parseSiteConfig(['title'])).toThrow(ConfigurationError);
    });

    it('should return a frozen configuration', () => {
        expect(Object.isFrozen(parseSiteConfig({}))).toBe(true);
    });
});

describe('loadSiteConfig', () => {
    let site: ISiteFixture;

    afterEach(async () => {
        await site.cleanup();
    });

    it('should load and validate _config.yml', async () => {
        site = await createSiteFixture({
            '_config.yml': 'title: Cloud Notes\nskin: dark\npaginate: 5\nplugins:\n  - jekyll-feed\n'
        });

        const config = await loadSiteConfig(site.source);

        expect(config.title).toBe('Cloud Notes');
        expect(config.skin).toBe('dark');
        expect(config.paginate).toBe(5);
        expect(config.plugins).toEqual(['jekyll-feed']);
    });

    it('should use defaults for an empty file', async () => {
        site = await createSiteFixture({ '_config.yml': '' });

        const config = await loadSiteConfig(site.source);

        expect(config.title).toBe('');
        expect(config.skin).toBe('default');
    });

    it('should report a missing file as a configuration error', async () => {
        site = await createSiteFixture();

        await expect(loadSiteConfig(site.source)).rejects.toThrow(/^Failed to read _config\.yml: /);
    });

    it('should report malformed YAML as a configuration error', async () => {
        site = await createSiteFixture({ '_config.yml': 'title: [unclosed\n' });

        await expect(loadSiteConfig(site.source)).rejects.toBeInstanceOf(ConfigurationError);
    });
});
