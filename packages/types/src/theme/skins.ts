/**
 * Closed set of visual skins a site can select in `_config.yml`.
 */
export const SITE_SKINS = [
    'air',
    'aqua',
    'contrast',
    'dark',
    'default',
    'dirt',
    'mint',
    'neon',
    'plum',
    'sunrise'
] as const;

export type SiteSkin = (typeof SITE_SKINS)[number];

/**
 * Themes the browser diagram renderer understands.
 */
export type DiagramTheme = 'default' | 'dark' | 'forest' | 'neutral' | 'base';

/**
 * Narrow an arbitrary string to a known skin.
 */
export function isSiteSkin(value: string): value is SiteSkin {
    return SITE_SKINS.some(skin => skin === value);
}
