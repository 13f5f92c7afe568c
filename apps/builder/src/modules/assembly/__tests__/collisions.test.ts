/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import type { IRenderedPage } from '@quire/types';
import { assertNoCollisions } from '../collisions.js';
import { OutputCollisionError } from '../../../lib/errors.js';

function page(origin: string, outputPath: string): IRenderedPage {
    return { kind: 'document', origin, url: `/${outputPath}`, outputPath, content: '', sitemap: true };
}

describe('assertNoCollisions', () => {
    it('should accept distinct output paths', () => {
        expect(() =>
            assertNoCollisions([page('about.md', 'about/index.html')], [{ sourcePath: 'assets/main.css', outputPath: 'assets/main.css' }])
        ).not.toThrow();
    });

    it('should name both sources of a shared page path', () => {
        const pages = [page('index.html', 'index.html'), page('generated:paginate', 'index.html')];

        expect(() => assertNoCollisions(pages, [])).toThrow(OutputCollisionError);
        expect(() => assertNoCollisions(pages, [])).toThrow(
            'Output path "index.html" is produced by both "index.html" and "generated:paginate"'
        );
    });

    it('should detect a page colliding with a static file', () => {
        const pages = [page('generated:sitemap:robots', 'robots.txt')];
        const staticFiles = [{ sourcePath: 'robots.txt', outputPath: 'robots.txt' }];

        try {
            assertNoCollisions(pages, staticFiles);
            expect.unreachable('collision not detected');
        } catch (error) {
            expect(error).toBeInstanceOf(OutputCollisionError);
            if (error instanceof OutputCollisionError) {
                expect(error.outputPath).toBe('robots.txt');
                expect(error.origins).toEqual(['generated:sitemap:robots', 'robots.txt']);
            }
        }
    });
});
