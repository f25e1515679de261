/**
 * YouTube Metadata Storage
 *
 * Caches resolved VideoDetails so repeated plays of the same track do not
 * hit yt-dlp or the mirrors again.
 */

import IORedis from 'ioredis';
import type { VideoDetails } from '@/lib/types';
import { asRecord, parseJson, readBoolean, readNumber, readString } from '@/core/scrapers/utils';
import { logger } from '../shared/logger';

// ============================================================================
// Types
// ============================================================================

/** The part of an ioredis client the cache uses */
export interface KeyValueStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
    quit?(): Promise<unknown>;
}

interface MemoryEntry {
    value: VideoDetails;
    expiresAt: number;
}

// ============================================================================
// Config
// ============================================================================

export const REDIS_METADATA_PREFIX = 'yt:meta:';

const MAX_SWEEP_INTERVAL_MS = 60 * 1000;

export function idKey(id: string): string {
    return `id:${id}`;
}

export function queryKey(query: string): string {
    return `q:${query.trim().toLowerCase()}`;
}

/**
 * Validate a cached payload before trusting it
 */
export function isVideoDetails(value: unknown): value is VideoDetails {
    const record = asRecord(value);
    if (!record) return false;
    return readString(record, 'id') !== undefined
        && readString(record, 'title') !== undefined
        && readString(record, 'duration') !== undefined
        && readNumber(record, 'durationSeconds') !== undefined
        && readString(record, 'thumbnail') !== undefined
        && readString(record, 'link') !== undefined
        && typeof record['channel'] === 'string'
        && typeof record['isLive'] === 'boolean';
}

function toVideoDetails(value: unknown): VideoDetails | null {
    if (!isVideoDetails(value)) return null;
    const record = asRecord(value);
    if (!record) return null;
    return {
        id: value.id,
        title: value.title,
        duration: value.duration,
        durationSeconds: value.durationSeconds,
        thumbnail: value.thumbnail,
        link: value.link,
        channel: value.channel,
        views: readNumber(record, 'views'),
        isLive: readBoolean(record, 'isLive'),
    };
}

/**
 * Redis connection for the metadata cache. Errors are logged, never thrown
 * from the event emitter.
 */
export function createRedisStore(url: string): IORedis {
    const client = new IORedis(url, {
        maxRetriesPerRequest: 1,
        connectTimeout: 5000,
    });
    client.on('error', (err: Error) => {
        logger.warn('cache', `Redis error: ${err.message}`);
    });
    return client;
}

// ============================================================================
// Storage (Redis-backed with in-memory fallback)
// ============================================================================

export class MetadataCache {
    private readonly memory = new Map<string, MemoryEntry>();
    private nextSweepAt = 0;

    constructor(
        private readonly ttlSeconds: number,
        private readonly redis: KeyValueStore | null = null,
        private readonly now: () => number = Date.now,
    ) {}

    async get(key: string): Promise<VideoDetails | null> {
        if (this.redis) {
            try {
                const raw = await this.redis.get(`${REDIS_METADATA_PREFIX}${key}`);
                const cached = raw ? toVideoDetails(parseJson(raw)) : null;
                if (cached) {
                    logger.cache('youtube', true, key);
                    return cached;
                }
            } catch (error) {
                logger.warn('cache', `Redis read failed, using memory: ${error instanceof Error ? error.message : String(error)}`);
            }
        }

        const entry = this.memory.get(key);
        if (entry && this.now() >= entry.expiresAt) {
            this.memory.delete(key);
            logger.cache('youtube', false, key);
            return null;
        }
        logger.cache('youtube', !!entry, key);
        return entry ? entry.value : null;
    }

    async set(key: string, value: VideoDetails): Promise<void> {
        if (this.ttlSeconds <= 0) return;

        this.sweep();
        this.memory.set(key, { value, expiresAt: this.now() + this.ttlSeconds * 1000 });

        if (this.redis) {
            try {
                await this.redis.set(`${REDIS_METADATA_PREFIX}${key}`, JSON.stringify(value), 'EX', this.ttlSeconds);
            } catch (error) {
                logger.warn('cache', `Redis write failed: ${error instanceof Error ? error.message : String(error)}`);
            }
        }
    }

    /** Memory entries, expired ones included until swept */
    get size(): number {
        return this.memory.size;
    }

    /**
     * Entries that are never read again would otherwise stay forever.
     * Runs at most once per TTL (capped at a minute).
     */
    private sweep(): void {
        const now = this.now();
        if (now < this.nextSweepAt) return;
        this.nextSweepAt = now + Math.min(this.ttlSeconds * 1000, MAX_SWEEP_INTERVAL_MS);
        for (const [key, entry] of this.memory) {
            if (now >= entry.expiresAt) this.memory.delete(key);
        }
    }

    /** Drops memory entries; Redis keys expire by TTL */
    clear(): void {
        this.memory.clear();
    }

    async close(): Promise<void> {
        if (this.redis?.quit) await this.redis.quit();
    }
}
