import type { DiagramTheme, SiteSkin } from '@quire/types';

/**
 * Diagram theme used for a skin that is missing or unknown.
 */
export const DEFAULT_DIAGRAM_THEME: DiagramTheme = 'default';

/**
 * Diagram theme for every site skin.
 *
 * Typed as a full record so adding a skin to `SITE_SKINS` without a theme
 * here fails to compile.
 */
export const SKIN_DIAGRAM_THEMES: Readonly<Record<SiteSkin, DiagramTheme>> = {
    air: 'default',
    aqua: 'default',
    contrast: 'default',
    dark: 'dark',
    default: 'default',
    dirt: 'default',
    // mermaid has no mint theme; forest is the closest palette
    mint: 'forest',
    neon: 'dark',
    plum: 'dark',
    sunrise: 'default'
};

function isMappedSkin(value: string): value is SiteSkin {
    return Object.hasOwn(SKIN_DIAGRAM_THEMES, value);
}

/**
 * Resolve the diagram theme for the skin baked into the page.
 *
 * Never throws: anything that is not a known skin name gets
 * {@link DEFAULT_DIAGRAM_THEME}.
 *
 * @example
 * diagramThemeFor('neon');    // "dark"
 * diagramThemeFor('mint');    // "forest"
 * diagramThemeFor('holiday'); // "default"
 */
export function diagramThemeFor(skin: unknown): DiagramTheme {
    if (typeof skin !== 'string') {
        return DEFAULT_DIAGRAM_THEME;
    }
    const name = skin.trim().toLowerCase();
    return isMappedSkin(name) ? SKIN_DIAGRAM_THEMES[name] : DEFAULT_DIAGRAM_THEME;
}
