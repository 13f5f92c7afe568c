const XML_ENTITIES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;'
};

/**
 * Escape text for use in XML/HTML element content or attribute values.
 */
export function escapeXml(value: string): string {
    return value.replace(/[&<>"']/g, char => XML_ENTITIES[char] ?? char);
}

const XML_CHARACTERS: Record<string, string> = Object.fromEntries(
    Object.entries(XML_ENTITIES).map(([char, entity]) => [entity, char])
);

/**
 * Reverse of {@link escapeXml}. Other entities are left as written.
 */
export function unescapeXml(value: string): string {
    return value.replace(/&(?:amp|lt|gt|quot|#39);/g, entity => XML_CHARACTERS[entity] ?? entity);
}

/**
 * Visible text of an HTML fragment: tags dropped, whitespace collapsed.
 *
 * @example
 * htmlToText('<p>Bicep &amp; ARM</p>\n<p>More</p>');
 * // Returns: "Bicep & ARM More"
 */
export function htmlToText(html: string): string {
    return unescapeXml(html.replace(/<[^>]*>/g, '')).replace(/\s+/g, ' ').trim();
}
