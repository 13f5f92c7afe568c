/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { escapeXml, htmlToText, unescapeXml } from '../xml.js';

describe('xml', () => {
    it('should escape markup characters', () => {
        expect(escapeXml(`<a href="x">Tom & Jerry's</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;');
    });

    it('should unescape only what escapeXml writes', () => {
        expect(unescapeXml('&amp;lt; &quot;hi&quot; &copy;')).toBe('&lt; "hi" &copy;');
    });

    it('should reduce HTML to its visible text', () => {
        expect(htmlToText('<p>Bicep &amp; <em>ARM</em></p>\n<p>More</p>\n')).toBe('Bicep & ARM More');
    });
});
