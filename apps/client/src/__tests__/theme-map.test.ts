/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { SITE_SKINS } from '@quire/types';
import { DEFAULT_DIAGRAM_THEME, SKIN_DIAGRAM_THEMES, diagramThemeFor } from '../theme-map.js';

describe('diagramThemeFor', () => {
    it('should map every configured skin', () => {
        expect(SITE_SKINS.map(skin => [skin, diagramThemeFor(skin)])).toEqual([
            ['air', 'default'],
            ['aqua', 'default'],
            ['contrast', 'default'],
            ['dark', 'dark'],
            ['default', 'default'],
            ['dirt', 'default'],
            ['mint', 'forest'],
            ['neon', 'dark'],
            ['plum', 'dark'],
            ['sunrise', 'default']
        ]);
    });

    it('should cover exactly the configured skins', () => {
        expect(Object.keys(SKIN_DIAGRAM_THEMES).sort()).toEqual([...SITE_SKINS].sort());
    });

    it('should ignore case and surrounding whitespace', () => {
        expect(diagramThemeFor(' Neon ')).toBe('dark');
    });

    it('should fall back to the default theme for anything else', () => {
        expect(diagramThemeFor('holiday')).toBe(DEFAULT_DIAGRAM_THEME);
        expect(diagramThemeFor('toString')).toBe('default');
        expect(diagramThemeFor(undefined)).toBe('default');
        expect(diagramThemeFor(42)).toBe('default');
    });
});
