/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { slugify, titleize } from '../slugify.js';

describe('slugify', () => {
    it('should join words with single hyphens', () => {
        expect(slugify('Azure DevOps & Bicep')).toBe('azure-devops-bicep');
        expect(slugify('  --Kubernetes 1.29--  ')).toBe('kubernetes-1-29');
    });

    it('should keep letters and digits of any script', () => {
        expect(slugify('日本語')).toBe('日本語');
        expect(slugify('Café Crème')).toBe('café-crème');
    });

    it('should be empty when there are no letters or digits', () => {
        expect(slugify('#')).toBe('');
        expect(slugify('+++')).toBe('');
    });

    it('should reduce different spellings to the same slug', () => {
        expect(slugify('C#')).toBe('c');
        expect(slugify('C++')).toBe('c');
    });
});

describe('titleize', () => {
    it('should capitalise each word of a slug', () => {
        expect(titleize('bicep-modules')).toBe('Bicep Modules');
    });
});
