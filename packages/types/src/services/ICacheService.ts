/**
 * Key-value cache used to skip repeated work between builds.
 *
 * The cache is an acceleration detail only. A miss, an expired entry or an
 * unreadable entry must always be recoverable by recomputing the value, so
 * callers never depend on a hit for correctness.
 */
export interface ICacheService {
    /**
     * Retrieve a cached value by key.
     *
     * @param key - Cache key to retrieve
     * @returns The stored value, or null when the key is missing or unusable
     *
     * @example
     * ```typescript
     * const html = await cache.get<string>('markdown:3f1c…');
     * if (html !== null) {
     *     return html;
     * }
     * ```
     */
    get<T>(key: string): Promise<T | null>;

    /**
     * Store a JSON-serializable value.
     *
     * @param key - Cache key to store under
     * @param value - Value to cache
     * @param ttlSeconds - Optional time-to-live; entries without one never expire
     */
    set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;

    /**
     * Delete a cache entry.
     *
     * @returns Number of entries removed (0 or 1)
     */
    del(key: string): Promise<number>;
}
