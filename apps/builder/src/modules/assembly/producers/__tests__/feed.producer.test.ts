/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FeedProducer } from '../feed.producer.js';
import { createSiteFixture } from '../../../../tests/vitest/helpers/site-fixture.js';
import type { ISiteFixture } from '../../../../tests/vitest/helpers/site-fixture.js';
import { makePost } from '../../../../tests/vitest/helpers/documents.js';
import { createProducerContext } from '../../../../tests/vitest/helpers/producer-context.js';

describe('FeedProducer', () => {
    let site: ISiteFixture;
    const config = {
        title: 'Cloud Notes',
        description: 'Notes on cloud tooling',
        url: 'https://notes.example.com',
        permalink: '/:title/',
        author: { name: 'Sam Example' },
        feed: { limit: 2 }
    };
    const posts = [
        makePost('2024-03-05-bicep-modules.md', { title: 'Bicep & ARM' }),
        makePost('2024-03-10-pipelines.md', { title: 'Pipelines', tags: ['ci'] }),
        makePost('2024-04-01-kubectl.md', { title: 'Kubectl', categories: ['Kubernetes'] })
    ];

    beforeEach(async () => {
        site = await createSiteFixture();
    });

    afterEach(async () => {
        await site.cleanup();
    });

    it('should write an Atom feed of the newest posts up to the limit', async () => {
        const context = await createProducerContext(site.source, config, posts);

        const [feed] = await new FeedProducer().produce(context);

        expect(feed.kind).toBe('feed');
        expect(feed.outputPath).toBe('feed.xml');
        expect(feed.sitemap).toBe(false);
        expect(feed.content.match(/<entry>/g)).toHaveLength(2);
        expect(feed.content).toContain('<link href="https://notes.example.com/kubectl/" rel="alternate" type="text/html" title="Kubectl" />');
        expect(feed.content).toContain('<link href="https://notes.example.com/pipelines/" rel="alternate" type="text/html" title="Pipelines" />');
        expect(feed.content).not.toContain('Bicep &amp; ARM');
    });

    it('should describe the site in the feed header', async () => {
        const context = await createProducerContext(site.source, config, posts);

        const [feed] = await new FeedProducer().produce(context);
        const lines = feed.content.split('\n');

        expect(lines.slice(0, 10)).toEqual([
            '<?xml version="1.0" encoding="utf-8"?>',
            '<feed xmlns="http://www.w3.org/2005/Atom">',
            '<generator>Quire</generator>',
            '<link href="https://notes.example.com/feed.xml" rel="self" type="application/atom+xml" />',
            '<link href="https://notes.example.com/" rel="alternate" type="text/html" />',
            '<updated>2024-04-01T00:00:00+00:00</updated>',
            '<id>https://notes.example.com/feed.xml</id>',
            '<title type="html">Cloud Notes</title>',
            '<subtitle>Notes on cloud tooling</subtitle>',
            '<author><name>Sam Example</name></author>'
        ]);
        expect(feed.lastModified?.toISOString()).toBe('2024-04-01T00:00:00.000Z');
    });

    it('should escape post HTML and list taxonomy terms', async () => {
        const context = await createProducerContext(site.source, config, posts);

        const [feed] = await new FeedProducer().produce(context);

        expect(feed.content).toContain(
            '<content type="html" xml:base="https://notes.example.com/kubectl/">&lt;p&gt;Post body.&lt;/p&gt;'
        );
        expect(feed.content).toContain('<category term="Kubernetes" />');
        expect(feed.content).toContain('<category term="ci" />');
    });

    it('should produce an empty feed dated at the epoch for a site without posts', async () => {
        const context = await createProducerContext(site.source, config, []);

        const [feed] = await new FeedProducer().produce(context);

        expect(feed.content).toContain('<updated>1970-01-01T00:00:00+00:00</updated>');
        expect(feed.content).not.toContain('<entry>');
        expect(feed.lastModified).toBeUndefined();
    });
});
