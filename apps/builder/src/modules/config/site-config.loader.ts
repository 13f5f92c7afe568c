import path from 'path';
import fs from 'fs/promises';
import { load } from 'js-yaml';
import { ConfigurationError, describeError } from '../../lib/errors.js';
import { isPlainObject } from '../../lib/objects.js';
import { siteConfigSchema } from './site-config.schema.js';
import type { SiteConfig } from './site-config.schema.js';

export const CONFIG_FILENAME = '_config.yml';

/**
 * Validate a parsed configuration mapping.
 *
 * Accepts `minimal_mistakes_skin` as an alias of `skin` so existing
 * configuration files keep working.
 *
 * @param raw - Mapping parsed from YAML
 * @returns Frozen, validated configuration with defaults applied
 *
 * @throws ConfigurationError listing every failing key
 */
export function parseSiteConfig(raw: unknown): Readonly<SiteConfig> {
    if (!isPlainObject(raw)) {
        throw new ConfigurationError(`${CONFIG_FILENAME} must contain a mapping of settings`);
    }

    const input = { ...raw };
    if (input.skin === undefined && input.minimal_mistakes_skin !== undefined) {
        input.skin = input.minimal_mistakes_skin;
    }

    const parsed = siteConfigSchema.safeParse(input);
    if (!parsed.success) {
        const fieldErrors = parsed.error.flatten().fieldErrors;
        throw new ConfigurationError(
            `Invalid ${CONFIG_FILENAME}: ${Object.keys(fieldErrors).join(', ')}`,
            fieldErrors
        );
    }

    return Object.freeze(parsed.data);
}

/**
 * Load `_config.yml` from the site source directory.
 *
 * @param sourceDir - Site source root
 * @returns Validated site configuration
 *
 * @throws ConfigurationError if the file is missing, is not valid YAML or fails validation
 *
 * @example
 * const config = await loadSiteConfig('./example');
 * console.log(config.skin); // "dark"
 */
export async function loadSiteConfig(sourceDir: string): Promise<Readonly<SiteConfig>> {
    const configPath = path.join(sourceDir, CONFIG_FILENAME);

    let text: string;
    try {
        text = await fs.readFile(configPath, 'utf8');
    } catch (error) {
        throw new ConfigurationError(`Failed to read ${CONFIG_FILENAME}: ${describeError(error)}`, { configPath });
    }

    let raw: unknown;
    try {
        raw = load(text);
    } catch (error) {
        throw new ConfigurationError(`Failed to parse ${CONFIG_FILENAME}: ${describeError(error)}`, { configPath });
    }

    // An empty file parses to undefined; treat it as "all defaults"
    return parseSiteConfig(raw ?? {});
}
