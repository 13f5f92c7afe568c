/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { SITE_SKINS, isSiteSkin } from '../skins.js';

describe('isSiteSkin', () => {
    it('should accept every configured skin', () => {
        expect(SITE_SKINS.every(skin => isSiteSkin(skin))).toBe(true);
    });

    it('should reject names outside the closed set', () => {
        expect(isSiteSkin('holiday')).toBe(false);
        expect(isSiteSkin('Dark')).toBe(false);
        expect(isSiteSkin('')).toBe(false);
    });
});
