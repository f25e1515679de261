/**
 * YouTube Resolver
 *
 * Public entry point of the adapter. Tries the primary backend (yt-dlp)
 * with retries, puts it on cooldown when YouTube blocks it, and falls back
 * to the mirror backend.
 *
 * @module youtube/resolver
 */

import path from 'path';
import type { AdapterConfig, AudioFormat, MediaMode } from '@/core/config';
import {
    createError,
    isBlocking,
    isTerminal,
    ScraperErrorCode,
    type BackendName,
    type ScraperResult,
} from '@/core/scrapers/types';
import { BackendCooldown, RateLimiter, systemClock, type Clock } from '@/lib/http/anti-ban';
import { createHttpClient } from '@/lib/http/client';
import type { DetailsTarget, DownloadedMedia, DownloadOptions, MediaBackend, VideoDetails } from '@/lib/types';
import { extractUrl, type MessageLike } from '@/lib/url/message';
import { withRetry } from '@/lib/utils/retry';
import { logger } from '../shared/logger';
import { MirrorBackend } from './mirror';
import { MirrorRotator } from './rotator';
import { createRedisStore, idKey, MetadataCache, queryKey } from './storage';
import { extractYouTubeId, isYouTubeUrl, normalizeVideoId } from './url';
import { fileExists, YtDlpBackend } from './ytdlp';

export interface ResolverRetryPolicy {
    maxRetries: number;
    retryDelayMs: number;
    jitterMs?: number;
}

export interface ResolverOptions {
    primary: MediaBackend;
    fallback: MediaBackend;
    cache: MetadataCache;
    cooldown: BackendCooldown;
    downloadDir: string;
    audioFormat?: AudioFormat;
    maxDurationSeconds?: number;
    retry?: ResolverRetryPolicy;
    clock?: Clock;
}

export interface DetailsOptions {
    /** Fail with DURATION_LIMIT over maxDurationSeconds (default true) */
    enforceDurationLimit?: boolean;
}

interface BackendOutcome<T> {
    result: ScraperResult<T>;
    backend: BackendName;
}

export class YouTubeResolver {
    private readonly primary: MediaBackend;
    private readonly fallback: MediaBackend;
    private readonly cache: MetadataCache;
    private readonly cooldown: BackendCooldown;
    private readonly downloadDir: string;
    private readonly audioFormat: AudioFormat;
    private readonly maxDurationSeconds?: number;
    private readonly retry: ResolverRetryPolicy;
    private readonly clock: Clock;

    constructor(options: ResolverOptions) {
        this.primary = options.primary;
        this.fallback = options.fallback;
        this.cache = options.cache;
        this.cooldown = options.cooldown;
        this.downloadDir = options.downloadDir;
        this.audioFormat = options.audioFormat ?? 'mp3';
        this.maxDurationSeconds = options.maxDurationSeconds;
        this.retry = options.retry ?? { maxRetries: 2, retryDelayMs: 1000 };
        this.clock = options.clock ?? systemClock;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PUBLIC API
    // ═══════════════════════════════════════════════════════════════════════════

    exists(link: string): boolean {
        return isYouTubeUrl(link);
    }

    url(message: MessageLike): string | null {
        return extractUrl(message);
    }

    async details(query: string, options: DetailsOptions = {}): Promise<ScraperResult<VideoDetails>> {
        const enforceLimit = options.enforceDurationLimit ?? true;
        const startTime = Date.now();
        const trimmed = query.trim();
        if (!trimmed) return createError(ScraperErrorCode.INVALID_QUERY);

        let target: DetailsTarget;
        if (isYouTubeUrl(trimmed)) {
            const id = extractYouTubeId(trimmed);
            if (!id) return createError(ScraperErrorCode.INVALID_URL, 'Could not find a video id in the link');
            target = { kind: 'id', id };
            logger.url('youtube', trimmed);
        } else {
            target = { kind: 'search', query: trimmed };
        }

        const cacheKey = target.kind === 'id' ? idKey(target.id) : queryKey(target.query);
        const cached = await this.cache.get(cacheKey);
        if (cached) return this.checkDuration(cached, enforceLimit);

        const { result } = await this.run('details', (backend) =>
            target.kind === 'id' ? backend.lookup(target.id) : backend.search(target.query)
        );
        if (!result.success) return result;

        const details = result.data;
        await this.cache.set(idKey(details.id), details);
        if (target.kind === 'search') await this.cache.set(cacheKey, details);

        logger.resolve('youtube', trimmed, details.id);
        logger.meta('youtube', { title: details.title, duration: details.duration, channel: details.channel });
        logger.complete('youtube', Date.now() - startTime);
        return this.checkDuration(details, enforceLimit);
    }

    async video(id: string, mode: MediaMode = 'audio'): Promise<ScraperResult<string>> {
        const videoId = normalizeVideoId(id);
        if (!videoId) return createError(ScraperErrorCode.INVALID_URL);

        const { result } = await this.run('stream', (backend) => backend.streamUrl(videoId, mode));
        return result;
    }

    async download(id: string, options: DownloadOptions = {}): Promise<ScraperResult<DownloadedMedia>> {
        const videoId = normalizeVideoId(id);
        if (!videoId) return createError(ScraperErrorCode.INVALID_URL);

        const mode = options.mode ?? 'audio';
        const audioFormat = options.audioFormat ?? this.audioFormat;

        const existing = this.expectedPath(videoId, mode, audioFormat);
        if (await fileExists(existing)) {
            logger.debug('youtube', `Reusing ${existing}`);
            return {
                success: true,
                data: { id: videoId, filePath: existing, mode, backend: 'cache', cached: true },
            };
        }

        const { result, backend } = await this.run('download', (b) => b.download(videoId, mode, audioFormat));
        if (!result.success) return result;
        return {
            success: true,
            data: { id: videoId, filePath: result.data, mode, backend, cached: false },
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // BACKEND POLICY
    // ═══════════════════════════════════════════════════════════════════════════

    private async run<T>(
        operation: string,
        fn: (backend: MediaBackend) => Promise<ScraperResult<T>>
    ): Promise<BackendOutcome<T>> {
        if (this.cooldown.isCoolingDown()) {
            logger.debug('youtube', `${this.primary.name} cooling down (${Math.ceil(this.cooldown.remaining() / 1000)}s left), skipping`);
        } else {
            const result = await withRetry(() => fn(this.primary), {
                maxRetries: this.retry.maxRetries,
                baseDelay: this.retry.retryDelayMs,
                backoff: 'linear',
                jitter: this.retry.jitterMs,
                clock: this.clock,
                onRetry: (attempt, code) => logger.warn('youtube', `${operation} retry ${attempt} on ${this.primary.name} [${code}]`),
            });

            if (result.success) {
                this.cooldown.markSuccess();
                logger.backend('youtube', this.primary.name, operation);
                return { result, backend: this.primary.name };
            }
            if (isTerminal(result.errorCode)) {
                return { result, backend: this.primary.name };
            }
            if (isBlocking(result.errorCode)) {
                const cooldownMs = this.cooldown.markBlocked();
                logger.warn('youtube', `${this.primary.name} blocked [${result.errorCode}], cooling down for ${Math.round(cooldownMs / 1000)}s`);
            }
            logger.warn('youtube', `${operation} failed on ${this.primary.name} [${result.errorCode}], trying ${this.fallback.name}`);
        }

        let result: ScraperResult<T>;
        try {
            result = await fn(this.fallback);
        } catch (error) {
            result = createError(ScraperErrorCode.UNKNOWN, error instanceof Error ? error.message : 'Unknown error');
        }
        if (result.success) {
            logger.backend('youtube', this.fallback.name, operation);
        } else {
            logger.error('youtube', result.error, result.errorCode);
        }
        return { result, backend: this.fallback.name };
    }

    private checkDuration(details: VideoDetails, enforce: boolean): ScraperResult<VideoDetails> {
        if (enforce && this.maxDurationSeconds !== undefined && !details.isLive && details.durationSeconds > this.maxDurationSeconds) {
            const limitMin = Math.floor(this.maxDurationSeconds / 60);
            return createError(ScraperErrorCode.DURATION_LIMIT, `Video is longer than ${limitMin} minutes`);
        }
        return { success: true, data: details };
    }

    private expectedPath(id: string, mode: MediaMode, audioFormat: AudioFormat): string {
        return path.join(this.downloadDir, `${id}.${mode === 'audio' ? audioFormat : 'mp4'}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Wire the resolver from configuration: one rate limiter shared by both
 * backends, Redis metadata cache when REDIS_URL is set
 */
export function createResolver(config: AdapterConfig): YouTubeResolver {
    const limiter = new RateLimiter(config.requests.minDelayMs, config.requests.maxDelayMs);

    const primary = new YtDlpBackend({
        config: config.ytdlp,
        downloadDir: config.downloadDir,
        ffmpegBinary: config.ffmpegBinary,
        limiter,
    });

    const fallback = new MirrorBackend({
        rotator: new MirrorRotator(config.mirrors.urls),
        attempts: config.mirrors.attempts,
        downloadDir: config.downloadDir,
        timeoutMs: config.httpTimeoutMs,
        http: createHttpClient(config.httpTimeoutMs),
        limiter,
        ffmpegBinary: config.ffmpegBinary,
    });

    const cache = new MetadataCache(
        config.metadataCacheTtlSeconds,
        config.redisUrl ? createRedisStore(config.redisUrl) : null
    );

    return new YouTubeResolver({
        primary,
        fallback,
        cache,
        cooldown: new BackendCooldown(config.requests.blockCooldownMs),
        downloadDir: config.downloadDir,
        audioFormat: config.audioFormat,
        maxDurationSeconds: config.maxDurationSeconds,
        retry: {
            maxRetries: config.requests.maxRetries,
            retryDelayMs: config.requests.retryDelayMs,
        },
    });
}
