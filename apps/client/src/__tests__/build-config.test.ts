/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';

function readConfig(relativePath: string): Record<string, unknown> {
    const parsed: unknown = JSON.parse(readFileSync(new URL(relativePath, import.meta.url), 'utf8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error(`${relativePath} is not a JSON object`);
    }
    return Object.fromEntries(Object.entries(parsed));
}

describe('browser build configuration', () => {
    const client = readConfig('../../tsconfig.build.json');
    const types = readConfig('../../../../packages/types/tsconfig.build.json');

    it('should take the shared types from their declarations, outside the emitted sources', () => {
        expect(client.compilerOptions).toMatchObject({ rootDir: 'src', outDir: '../../example/assets/js/diagrams' });
        expect(client.references).toEqual([{ path: '../../packages/types/tsconfig.build.json' }]);
    });

    it('should build the shared types as a declaration-only project', () => {
        expect(types.compilerOptions).toMatchObject({ composite: true, rootDir: 'src', emitDeclarationOnly: true });
    });
});
