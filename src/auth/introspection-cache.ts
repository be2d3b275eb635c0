import { createHash } from 'crypto';
import type { IntrospectionResult } from '@/auth/types';

export interface IntrospectionCacheStore {
    get(token: string): IntrospectionResult | undefined;
    set(token: string, result: IntrospectionResult, ttlSeconds: number): void;
}

export interface IntrospectionCacheOptions {
    maxEntries: number;
    now?: () => number;
}

interface CacheEntry {
    result: IntrospectionResult;
    expiresAt: number;
}

export const hashToken = (token: string): string => createHash('sha256').update(token).digest('hex');

/**
 * Process-local introspection cache. Keys are token hashes so raw tokens never
 * sit in memory longer than the request. Entries expire on read; when full,
 * the least recently used entry makes room.
 */
export class IntrospectionCache implements IntrospectionCacheStore {
    private readonly entries = new Map<string, CacheEntry>();
    private readonly maxEntries: number;
    private readonly now: () => number;

    constructor(options: IntrospectionCacheOptions) {
        if (!Number.isInteger(options.maxEntries) || options.maxEntries <= 0) {
            throw new Error(`Cache capacity must be a positive integer, got ${options.maxEntries}`);
        }
        this.maxEntries = options.maxEntries;
        this.now = options.now ?? Date.now;
    }

    get(token: string): IntrospectionResult | undefined {
        const key = hashToken(token);
        const entry = this.entries.get(key);
        if (!entry) return undefined;

        if (entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return undefined;
        }

        // Move to end (most recently used)
        this.entries.delete(key);
        this.entries.set(key, entry);
        return entry.result;
    }

    set(token: string, result: IntrospectionResult, ttlSeconds: number): void {
        if (ttlSeconds <= 0) return;

        const key = hashToken(token);
        const entry: CacheEntry = {
            result: Object.freeze({ active: result.active, claims: Object.freeze({ ...result.claims }) }),
            expiresAt: this.now() + ttlSeconds * 1000
        };

        if (this.entries.has(key)) {
            this.entries.delete(key);
        } else if (this.entries.size >= this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (!oldest.done) {
                this.entries.delete(oldest.value);
            }
        }

        this.entries.set(key, entry);
    }

    size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}
