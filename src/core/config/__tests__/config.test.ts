import path from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_MIRRORS, getEnv, loadConfig, parseMirrorList } from '../index';

describe('loadConfig', () => {
    it('fills in defaults from an empty environment', () => {
        const config = loadConfig({});

        expect(config.mirrors.urls).toEqual([...DEFAULT_MIRRORS]);
        expect(config.mirrors.attempts).toBe(3);
        expect(config.requests).toEqual({
            minDelayMs: 1000,
            maxDelayMs: 3000,
            maxRetries: 2,
            retryDelayMs: 1000,
            blockCooldownMs: 300000,
        });
        expect(config.ytdlp).toEqual({ binary: 'yt-dlp', cookiesFile: undefined, proxy: undefined, timeoutMs: 90000 });
        expect(config.audioFormat).toBe('mp3');
        expect(config.maxDurationSeconds).toBeUndefined();
        expect(config.redisUrl).toBeUndefined();
        expect(config.cacheDir).toBe(path.resolve('cache'));
        expect(config.metadataCacheTtlSeconds).toBe(21600);
    });

    it('normalizes the mirror list and clamps attempts to its size', () => {
        const config = loadConfig({
            MIRROR_API_URLS: ' https://a.example/ , https://b.example//,https://a.example',
            MIRROR_ATTEMPTS: '5',
        });
        expect(config.mirrors.urls).toEqual(['https://a.example', 'https://b.example']);
        expect(config.mirrors.attempts).toBe(2);
    });

    it('rejects an empty or non-http mirror list', () => {
        expect(() => loadConfig({ MIRROR_API_URLS: ',' })).toThrow(ConfigError);
        expect(() => loadConfig({ MIRROR_API_URLS: 'ftp://mirror.example' })).toThrow('Invalid mirror URL: ftp://mirror.example');
    });

    it('rejects a minimum delay above the maximum', () => {
        expect(() => loadConfig({ REQUEST_MIN_DELAY_MS: '5000', REQUEST_MAX_DELAY_MS: '3000' })).toThrow(ConfigError);
    });

    it('validates numeric and enum values', () => {
        expect(() => loadConfig({ SCRAPER_MAX_RETRIES: 'abc' })).toThrow('SCRAPER_MAX_RETRIES must be a non-negative integer, got "abc"');
        expect(() => loadConfig({ SCRAPER_MAX_RETRIES: '-1' })).toThrow(ConfigError);
        expect(() => loadConfig({ AUDIO_FORMAT: 'flac' })).toThrow(ConfigError);
        expect(loadConfig({ AUDIO_FORMAT: 'OPUS' }).audioFormat).toBe('opus');
    });

    it('converts the duration limit to seconds', () => {
        expect(loadConfig({ DURATION_LIMIT_MIN: '10' }).maxDurationSeconds).toBe(600);
        expect(loadConfig({ DURATION_LIMIT_MIN: '0' }).maxDurationSeconds).toBeUndefined();
    });

    it('passes yt-dlp credentials through', () => {
        const config = loadConfig({ YTDLP_COOKIES_FILE: '/etc/yt/cookies.txt', YTDLP_PROXY: 'http://proxy.local:8080' });
        expect(config.ytdlp.cookiesFile).toBe('/etc/yt/cookies.txt');
        expect(config.ytdlp.proxy).toBe('http://proxy.local:8080');
    });
});

describe('getEnv', () => {
    it('returns the default or throws when missing', () => {
        expect(getEnv('MISSING_KEY', 'fallback', {})).toBe('fallback');
        expect(() => getEnv('MISSING_KEY', undefined, {})).toThrow('Missing required environment variable: MISSING_KEY');
    });
});

describe('parseMirrorList', () => {
    it('returns the built-in mirrors when unset', () => {
        expect(parseMirrorList(undefined)).toEqual([...DEFAULT_MIRRORS]);
    });
});
