import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, statSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

interface CacheEntry {
    timestamp: number;
    key: string;
    data: unknown;
}

/**
 * File-system cache for database search responses.
 * Stores one JSON file per key in the cache directory.
 *
 * Cache key = SHA-256 of the joined key parts (database, query, limits).
 * Entries older than the TTL are ignored. Callers validate `data` themselves.
 */
export class ResponseCache {
    private readonly cacheDir: string;
    private readonly ttlMs: number;
    private readonly enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? '.reviewflow-cache';
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            logger.debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    private filePath(parts: readonly string[]): { key: string; path: string } {
        const key = parts.join('\u0000');
        const hash = createHash('sha256').update(key).digest('hex');
        return { key, path: join(this.cacheDir, `${hash}.json`) };
    }

    /**
     * Get a cached value, or null if missing, expired or unreadable.
     */
    get(parts: readonly string[]): unknown {
        if (!this.enabled) return null;

        const { key, path } = this.filePath(parts);
        if (!existsSync(path)) return null;

        let entry: unknown;
        try {
            entry = JSON.parse(readFileSync(path, 'utf-8'));
        } catch (error) {
            logger.warn({ path, error }, 'Unreadable cache entry ignored');
            return null;
        }

        if (!isCacheEntry(entry) || entry.key !== key) return null;

        if (Date.now() - entry.timestamp > this.ttlMs) {
            logger.debug({ key: key.slice(0, 80) }, 'Cache expired');
            return null;
        }

        logger.debug({ key: key.slice(0, 80) }, 'Cache hit');
        return entry.data;
    }

    /**
     * Store a value in the cache.
     */
    set(parts: readonly string[], data: unknown): void {
        if (!this.enabled) return;

        const { key, path } = this.filePath(parts);
        const entry: CacheEntry = { timestamp: Date.now(), key, data };
        try {
            writeFileSync(path, JSON.stringify(entry), 'utf-8');
        } catch (error) {
            logger.warn({ error }, 'Failed to write cache entry');
        }
    }

    /**
     * Number of entries and total size on disk.
     */
    getStats(): { enabled: boolean; directory: string; entries: number; bytes: number } {
        if (!existsSync(this.cacheDir)) {
            return { enabled: this.enabled, directory: this.cacheDir, entries: 0, bytes: 0 };
        }
        const files = readdirSync(this.cacheDir).filter((f) => f.endsWith('.json'));
        const bytes = files.reduce((sum, f) => sum + statSync(join(this.cacheDir, f)).size, 0);
        return { enabled: this.enabled, directory: this.cacheDir, entries: files.length, bytes };
    }

    /**
     * Remove every cached entry.
     */
    clear(): void {
        rmSync(this.cacheDir, { recursive: true, force: true });
        if (this.enabled) mkdirSync(this.cacheDir, { recursive: true });
    }
}

function isCacheEntry(value: unknown): value is CacheEntry {
    return (
        typeof value === 'object' &&
        value !== null &&
        'timestamp' in value &&
        typeof value.timestamp === 'number' &&
        'key' in value &&
        typeof value.key === 'string' &&
        'data' in value
    );
}
