import type { IRenderedPage, IStaticFile } from '@quire/types';
import { OutputCollisionError } from '../../lib/errors.js';

/**
 * Make sure no two outputs share an output path.
 *
 * @throws OutputCollisionError naming the path and both sources
 */
export function assertNoCollisions(pages: readonly IRenderedPage[], staticFiles: readonly IStaticFile[]): void {
    const owners = new Map<string, string>();
    const outputs = [
        ...pages.map(page => ({ outputPath: page.outputPath, origin: page.origin })),
        ...staticFiles.map(file => ({ outputPath: file.outputPath, origin: file.sourcePath }))
    ];

    for (const { outputPath, origin } of outputs) {
        const owner = owners.get(outputPath);
        if (owner !== undefined) {
            throw new OutputCollisionError(outputPath, [owner, origin]);
        }
        owners.set(outputPath, origin);
    }
}
