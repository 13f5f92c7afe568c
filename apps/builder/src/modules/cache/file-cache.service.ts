import path from 'path';
import fs from 'fs/promises';
import { createHash } from 'crypto';
import type { ICacheService, ILogger } from '@quire/types';
import { describeError } from '../../lib/errors.js';
import { isPlainObject } from '../../lib/objects.js';

/**
 * FileCacheService
 *
 * Disk-backed cache that survives between builds. Each entry is one JSON
 * file named after the SHA-256 of its key, holding the value and an optional
 * expiry time.
 *
 * An entry that cannot be read or parsed is logged and treated as a miss, so
 * a damaged cache directory only costs a re-render.
 */
export class FileCacheService implements ICacheService {
  /**
   * @param directory - Directory holding the entries, created on first write
   * @param logger - Scoped logger
   */
  constructor(
    private readonly directory: string,
    private readonly logger: ILogger
  ) {}

  /**
   * Retrieve a cached value by key.
   *
   * @param key - Cache key to retrieve
   * @returns Parsed value if found and not expired, null otherwise
   */
  async get<T>(key: string): Promise<T | null> {
    let text: string;
    try {
      text = await fs.readFile(this.entryPath(key), 'utf8');
    } catch (error) {
      if (!this.isMissing(error)) {
        this.logger.warn({ key, error: describeError(error) }, 'Unreadable cache entry, treating as miss');
      }
      return null;
    }

    let entry: unknown;
    try {
      entry = JSON.parse(text);
    } catch (error) {
      this.logger.warn({ key, error: describeError(error) }, 'Corrupt cache entry, treating as miss');
      return null;
    }

    if (!isPlainObject(entry) || !('value' in entry)) {
      this.logger.warn({ key }, 'Malformed cache entry, treating as miss');
      return null;
    }
    if (typeof entry.expiresAt === 'number' && entry.expiresAt < Date.now()) {
      return null;
    }

    return entry.value as T;
  }

  /**
   * Store a value with optional TTL.
   *
   * @param key - Cache key to store under
   * @param value - Value to cache (must be JSON-serializable)
   * @param ttlSeconds - Optional time-to-live in seconds
   *
   * A failed write is logged and otherwise ignored; the next build recomputes the value.
   */
  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const entry = {
      key,
      value,
      expiresAt: ttlSeconds ? Date.now() + ttlSeconds * 1000 : undefined
    };

    // Write then rename: readers only ever see whole entries
    const target = this.entryPath(key);
    const temporary = `${target}.${process.pid}.tmp`;
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(temporary, JSON.stringify(entry), 'utf8');
      await fs.rename(temporary, target);
    } catch (error) {
      this.logger.warn({ key, error: describeError(error) }, 'Failed to write cache entry, continuing without it');
    }
  }

  /**
   * Delete a cache entry.
   *
   * @returns 1 if an entry was removed, 0 if there was none
   */
  async del(key: string): Promise<number> {
    try {
      await fs.unlink(this.entryPath(key));
      return 1;
    } catch (error) {
      if (this.isMissing(error)) {
        return 0;
      }
      throw new Error(`Failed to delete cache entry: ${describeError(error)}`);
    }
  }

  private entryPath(key: string): string {
    return path.join(this.directory, `${createHash('sha256').update(key).digest('hex')}.json`);
  }

  private isMissing(error: unknown): boolean {
    return Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT');
  }
}
