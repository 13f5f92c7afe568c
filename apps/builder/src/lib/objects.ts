/**
 * Plain object check: mappings parsed from YAML, not arrays, dates or class instances.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Merge `override` onto `base`, recursing into nested plain objects.
 *
 * Arrays and scalars in `override` replace the base value. Neither input is modified.
 */
export function deepMerge(
    base: Readonly<Record<string, unknown>>,
    override: Readonly<Record<string, unknown>>
): Record<string, unknown> {
    const result: Record<string, unknown> = { ...base };

    for (const [key, value] of Object.entries(override)) {
        const existing = result[key];
        result[key] = isPlainObject(existing) && isPlainObject(value)
            ? deepMerge(existing, value)
            : value;
    }

    return result;
}
