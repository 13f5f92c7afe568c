/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import type { IRenderedPage } from '@quire/types';
import { StaticEmitter } from '../static-emitter.service.js';
import type { IAssembledSite } from '../../assembly/site-assembler.service.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createSiteFixture } from '../../../tests/vitest/helpers/site-fixture.js';
import type { ISiteFixture } from '../../../tests/vitest/helpers/site-fixture.js';

function page(outputPath: string, content: string): IRenderedPage {
    return { kind: 'document', origin: outputPath, url: `/${outputPath}`, outputPath, content, sitemap: true };
}

describe('StaticEmitter', () => {
    let site: ISiteFixture;
    let logger: MockLogger;
    let emitter: StaticEmitter;

    const assembled: IAssembledSite = {
        pages: [
            page('index.html', '<p>Home</p>'),
            page('azure/bicep-modules/index.html', '<p>Bicep</p>'),
            page('feed.xml', '<feed />\n')
        ],
        staticFiles: [{ sourcePath: 'assets/css/main.css', outputPath: 'assets/css/main.css' }]
    };

    beforeEach(async () => {
        logger = new MockLogger();
        emitter = new StaticEmitter({ compress: false }, logger);
        site = await createSiteFixture({ 'assets/css/main.css': 'body { margin: 0; }\n' });
    });

    afterEach(async () => {
        await site.cleanup();
    });

    it('should write pages and copy static files', async () => {
        const result = await emitter.emit(assembled, site.source, site.destination);

        expect(result).toEqual({ destination: site.destination, pagesWritten: 3, staticFilesCopied: 1 });
        expect(await site.listOutput()).toEqual([
            'assets/css/main.css',
            'azure/bicep-modules/index.html',
            'feed.xml',
            'index.html'
        ]);
        expect(await site.readOutput('azure/bicep-modules/index.html')).toBe('<p>Bicep</p>');
        expect(await site.readOutput('assets/css/main.css')).toBe('body { margin: 0; }\n');
    });

    it('should produce the same tree when run twice and leave no work directories', async () => {
        await emitter.emit(assembled, site.source, site.destination);
        const first = await site.listOutput();
        await emitter.emit(assembled, site.source, site.destination);

        expect(await site.listOutput()).toEqual(first);
        expect((await fs.readdir(site.root)).sort()).toEqual(['site', 'source']);
    });

    it('should replace the previous output as a whole', async () => {
        await emitter.emit({ pages: [page('old.html', 'old')], staticFiles: [] }, site.source, site.destination);

        await emitter.emit(assembled, site.source, site.destination);

        expect(await site.listOutput()).not.toContain('old.html');
    });

    it('should keep the previous output when a write fails', async () => {
        await emitter.emit(assembled, site.source, site.destination);
        const broken: IAssembledSite = {
            pages: [page('index.html', '<p>New home</p>')],
            staticFiles: [{ sourcePath: 'missing.css', outputPath: 'missing.css' }]
        };

        await expect(emitter.emit(broken, site.source, site.destination)).rejects.toThrow(/^Failed to copy missing\.css: /);

        expect(await site.readOutput('index.html')).toBe('<p>Home</p>');
        expect((await fs.readdir(site.root)).sort()).toEqual(['site', 'source']);
        expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('should refuse output paths outside the destination', async () => {
        const escaping: IAssembledSite = { pages: [page('../escape.html', 'x')], staticFiles: [] };

        await expect(emitter.emit(escaping, site.source, site.destination)).rejects.toThrow(
            'Output path escapes the destination: ../escape.html'
        );
    });

    it('should compress HTML pages only', async () => {
        const compressing = new StaticEmitter({ compress: true }, logger);

        await compressing.emit(
            { pages: [page('index.html', '<p>  a   b  </p>\n\n<p>c</p>'), page('feed.xml', '<feed>  </feed>')], staticFiles: [] },
            site.source,
            site.destination
        );

        expect(await site.readOutput('index.html')).toBe('<p>a b</p><p>c</p>');
        expect(await site.readOutput('feed.xml')).toBe('<feed>  </feed>');
    });
});
