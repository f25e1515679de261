/**
 * Core Config Module
 * Centralized configuration and constants.
 *
 * Everything is read from the environment once, through loadConfig(),
 * so that tests can hand in their own env object.
 */

import path from 'path';
import os from 'os';
import { DEFAULT_MIRRORS } from './mirrors';

export { DEFAULT_MIRRORS } from './mirrors';

export type MediaMode = 'audio' | 'video';
export type AudioFormat = 'mp3' | 'm4a' | 'opus';

const AUDIO_FORMATS: AudioFormat[] = ['mp3', 'm4a', 'opus'];

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface YtDlpConfig {
    binary: string;
    cookiesFile?: string;
    proxy?: string;
    timeoutMs: number;
}

export interface MirrorConfig {
    urls: string[];
    attempts: number;
}

export interface RequestPolicyConfig {
    minDelayMs: number;
    maxDelayMs: number;
    maxRetries: number;
    retryDelayMs: number;
    blockCooldownMs: number;
}

export interface ThumbnailConfig {
    fallbackPath: string;
    overlayPath?: string;
    fontFamily: string;
}

export interface AdapterConfig {
    ytdlp: YtDlpConfig;
    ffmpegBinary: string;
    mirrors: MirrorConfig;
    httpTimeoutMs: number;
    requests: RequestPolicyConfig;
    downloadDir: string;
    cacheDir: string;
    audioFormat: AudioFormat;
    maxDurationSeconds?: number;
    redisUrl?: string;
    metadataCacheTtlSeconds: number;
    thumbnails: ThumbnailConfig;
    telegramBotToken?: string;
}

// Environment Helpers
export function getEnv(key: string, defaultValue?: string, env: NodeJS.ProcessEnv = process.env): string {
    const value = env[key];
    if (value === undefined || value === '') {
        if (defaultValue !== undefined) return defaultValue;
        throw new ConfigError(`Missing required environment variable: ${key}`);
    }
    return value;
}

export function getEnvOptional(key: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
    const value = env[key]?.trim();
    return value ? value : undefined;
}

export function isDevelopment(): boolean {
    return process.env.NODE_ENV === 'development';
}

function getEnvInt(key: string, defaultValue: number, env: NodeJS.ProcessEnv): number {
    const raw = getEnvOptional(key, env);
    if (raw === undefined) return defaultValue;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`);
    }
    return value;
}

/**
 * Normalize mirror base URLs: trims, drops trailing slashes and duplicates
 */
export function normalizeMirrorUrls(entries: readonly string[]): string[] {
    const seen = new Set<string>();
    for (const entry of entries) {
        const url = entry.trim().replace(/\/+$/, '');
        if (url) seen.add(url);
    }
    return [...seen];
}

/**
 * Comma-separated MIRROR_API_URLS; built-in defaults when unset
 */
export function parseMirrorList(raw: string | undefined): string[] {
    if (raw === undefined) return [...DEFAULT_MIRRORS];
    return normalizeMirrorUrls(raw.split(','));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AdapterConfig {
    const mirrorUrls = parseMirrorList(getEnvOptional('MIRROR_API_URLS', env));
    if (mirrorUrls.length === 0) {
        throw new ConfigError('MIRROR_API_URLS must name at least one mirror');
    }
    for (const url of mirrorUrls) {
        if (!/^https?:\/\//i.test(url)) throw new ConfigError(`Invalid mirror URL: ${url}`);
    }

    const minDelayMs = getEnvInt('REQUEST_MIN_DELAY_MS', 1000, env);
    const maxDelayMs = getEnvInt('REQUEST_MAX_DELAY_MS', 3000, env);
    if (minDelayMs > maxDelayMs) {
        throw new ConfigError('REQUEST_MIN_DELAY_MS cannot exceed REQUEST_MAX_DELAY_MS');
    }

    const audioFormat = getEnv('AUDIO_FORMAT', 'mp3', env).toLowerCase();
    const matchedFormat = AUDIO_FORMATS.find(f => f === audioFormat);
    if (!matchedFormat) {
        throw new ConfigError(`AUDIO_FORMAT must be one of ${AUDIO_FORMATS.join(', ')}`);
    }

    const durationLimitMin = getEnvInt('DURATION_LIMIT_MIN', 0, env);
    const cacheDir = path.resolve(getEnv('CACHE_DIR', 'cache', env));

    return {
        ytdlp: {
            binary: getEnv('YTDLP_PATH', 'yt-dlp', env),
            cookiesFile: getEnvOptional('YTDLP_COOKIES_FILE', env),
            proxy: getEnvOptional('YTDLP_PROXY', env),
            timeoutMs: getEnvInt('YTDLP_TIMEOUT_MS', 90000, env),
        },
        ffmpegBinary: getEnv('FFMPEG_PATH', 'ffmpeg', env),
        mirrors: {
            urls: mirrorUrls,
            attempts: Math.max(1, Math.min(getEnvInt('MIRROR_ATTEMPTS', 3, env), mirrorUrls.length)),
        },
        httpTimeoutMs: getEnvInt('HTTP_TIMEOUT_MS', 15000, env),
        requests: {
            minDelayMs,
            maxDelayMs,
            maxRetries: getEnvInt('SCRAPER_MAX_RETRIES', 2, env),
            retryDelayMs: getEnvInt('SCRAPER_RETRY_DELAY_MS', 1000, env),
            blockCooldownMs: getEnvInt('BLOCK_COOLDOWN_MS', 5 * 60 * 1000, env),
        },
        downloadDir: path.resolve(getEnv('DOWNLOAD_DIR', path.join(os.tmpdir(), 'yt-media-downloads'), env)),
        cacheDir,
        audioFormat: matchedFormat,
        maxDurationSeconds: durationLimitMin > 0 ? durationLimitMin * 60 : undefined,
        redisUrl: getEnvOptional('REDIS_URL', env),
        metadataCacheTtlSeconds: getEnvInt('METADATA_CACHE_TTL_SECONDS', 6 * 60 * 60, env),
        thumbnails: {
            fallbackPath: path.resolve(getEnv('THUMB_FALLBACK_PATH', 'assets/fallback.png', env)),
            overlayPath: getEnvOptional('THUMB_OVERLAY_PATH', env),
            fontFamily: getEnv('THUMB_FONT_FAMILY', 'DejaVu Sans, sans-serif', env),
        },
        telegramBotToken: getEnvOptional('TELEGRAM_BOT_TOKEN', env),
    };
}

// Application Constants
export const APP_NAME = 'yt-media-adapter';
