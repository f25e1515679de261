/**
 * YouTube backend using public Invidious-compatible mirrors
 *
 * Each operation walks up to `attempts` mirrors picked by the rotator.
 * A terminal answer (video missing, private) stops the walk; anything
 * else moves on to the next mirror.
 *
 * @module youtube/mirror
 */

import axios, { type AxiosInstance } from 'axios';
import fs from 'fs/promises';
import path from 'path';
import type { AudioFormat, MediaMode } from '@/core/config';
import {
    createError,
    detectErrorCode,
    isTerminal,
    ScraperErrorCode,
    type ScraperFailure,
    type ScraperResult,
} from '@/core/scrapers/types';
import { parseJson } from '@/core/scrapers/utils';
import { createHttpClient, httpDownloadToFile, httpGetJson } from '@/lib/http/client';
import type { RateLimiter } from '@/lib/http/anti-ban';
import type { ExecRunner, MediaBackend, VideoDetails } from '@/lib/types';
import { detectError } from '../shared/error-detector';
import { logger } from '../shared/logger';
import { extractMirrorDetails, extractMirrorSearchResult, pickMirrorStream, type MirrorStream } from './extractor';
import { transcodeAudio } from './postprocess';
import type { MirrorRotator } from './rotator';

export interface MirrorBackendOptions {
    rotator: MirrorRotator;
    /** Mirrors tried per operation */
    attempts: number;
    downloadDir: string;
    timeoutMs?: number;
    http?: AxiosInstance;
    limiter?: RateLimiter;
    ffmpegBinary?: string;
    runner?: ExecRunner;
}

export class MirrorBackend implements MediaBackend {
    readonly name = 'mirror' as const;

    private readonly rotator: MirrorRotator;
    private readonly attempts: number;
    private readonly downloadDir: string;
    private readonly timeoutMs: number;
    private readonly http: AxiosInstance;
    private readonly limiter?: RateLimiter;
    private readonly ffmpegBinary?: string;
    private readonly runner?: ExecRunner;

    constructor(options: MirrorBackendOptions) {
        this.rotator = options.rotator;
        this.attempts = Math.max(1, Math.min(options.attempts, options.rotator.size));
        this.downloadDir = options.downloadDir;
        this.timeoutMs = options.timeoutMs ?? 15000;
        this.http = options.http ?? createHttpClient(this.timeoutMs);
        this.limiter = options.limiter;
        this.ffmpegBinary = options.ffmpegBinary;
        this.runner = options.runner;
    }

    lookup(id: string): Promise<ScraperResult<VideoDetails>> {
        return this.withMirrors('lookup', async (base): Promise<ScraperResult<VideoDetails>> => {
            const res = await this.getJson(base, `/api/v1/videos/${encodeURIComponent(id)}`);
            if (!res.success) return res;
            const details = extractMirrorDetails(res.data);
            return details
                ? { success: true, data: details }
                : createError(ScraperErrorCode.PARSE_ERROR, 'Mirror returned no video data');
        });
    }

    search(query: string): Promise<ScraperResult<VideoDetails>> {
        return this.withMirrors('search', async (base): Promise<ScraperResult<VideoDetails>> => {
            const res = await this.getJson(base, '/api/v1/search', { q: query, type: 'video' });
            if (!res.success) return res;
            const details = extractMirrorSearchResult(res.data);
            return details
                ? { success: true, data: details }
                : createError(ScraperErrorCode.NOT_FOUND, 'No results found');
        });
    }

    streamUrl(id: string, mode: MediaMode): Promise<ScraperResult<string>> {
        return this.withMirrors('stream', async (base): Promise<ScraperResult<string>> => {
            const res = await this.resolveStream(base, id, mode);
            return res.success ? { success: true, data: res.data.url } : res;
        });
    }

    download(id: string, mode: MediaMode, audioFormat: AudioFormat): Promise<ScraperResult<string>> {
        return this.withMirrors('download', async (base): Promise<ScraperResult<string>> => {
            const res = await this.resolveStream(base, id, mode);
            if (!res.success) return res;
            if (res.data.isLive) {
                return createError(ScraperErrorCode.NO_MEDIA, 'Live streams cannot be downloaded');
            }
            return this.saveStream(id, res.data, mode, audioFormat);
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTERNALS
    // ═══════════════════════════════════════════════════════════════════════════

    private async withMirrors<T>(
        operation: string,
        fn: (base: string) => Promise<ScraperResult<T>>
    ): Promise<ScraperResult<T>> {
        let lastError: ScraperFailure = createError(ScraperErrorCode.API_ERROR, 'No mirror available');

        for (let attempt = 0; attempt < this.attempts; attempt++) {
            const base = this.rotator.next();
            const result = await fn(base);
            if (result.success) {
                logger.debug('mirror', `${operation} served by ${base}`);
                return result;
            }
            lastError = result;
            if (isTerminal(result.errorCode)) return result;
            logger.warn('mirror', `${base} failed ${operation} [${result.errorCode}]: ${result.error}`);
        }

        return lastError;
    }

    private schedule<T>(task: () => Promise<T>): Promise<T> {
        return this.limiter ? this.limiter.schedule(task) : task();
    }

    private async getJson(base: string, apiPath: string, params?: Record<string, string>): Promise<ScraperResult<unknown>> {
        let response: { data: string; status: number };
        try {
            response = await this.schedule(() => httpGetJson(this.http, `${base}${apiPath}`, { params, timeout: this.timeoutMs }));
        } catch (error) {
            return classifyRequestError(error);
        }

        const errorCode = detectError(response.status, response.data);
        if (errorCode) {
            return createError(errorCode, `Mirror responded with HTTP ${response.status}`);
        }

        const data = parseJson(response.data);
        if (data === null) {
            return createError(ScraperErrorCode.PARSE_ERROR, 'Mirror returned invalid JSON');
        }
        return { success: true, data };
    }

    private async resolveStream(base: string, id: string, mode: MediaMode): Promise<ScraperResult<MirrorStream>> {
        const res = await this.getJson(base, `/api/v1/videos/${encodeURIComponent(id)}`);
        if (!res.success) return res;

        const stream = pickMirrorStream(res.data, mode);
        if (!stream) {
            return createError(ScraperErrorCode.NO_MEDIA, `No ${mode} stream on mirror`);
        }
        // Proxied / HLS URLs may be instance-relative
        let url: string;
        try {
            url = new URL(stream.url, base).toString();
        } catch {
            return createError(ScraperErrorCode.PARSE_ERROR, `Mirror returned an invalid stream URL: ${stream.url}`);
        }
        return { success: true, data: { ...stream, url } };
    }

    private async saveStream(
        id: string,
        stream: MirrorStream,
        mode: MediaMode,
        audioFormat: AudioFormat
    ): Promise<ScraperResult<string>> {
        await fs.mkdir(this.downloadDir, { recursive: true });

        const needsTranscode = mode === 'audio' && stream.ext !== audioFormat;
        const target = path.join(this.downloadDir, `${id}.${mode === 'audio' ? audioFormat : stream.ext}`);
        const source = needsTranscode ? path.join(this.downloadDir, `${id}.source.${stream.ext}`) : target;
        const partial = `${source}.part`;

        let status: number;
        try {
            status = await this.schedule(() => httpDownloadToFile(this.http, stream.url, partial, { timeout: this.timeoutMs }));
        } catch (error) {
            await fs.rm(partial, { force: true });
            return classifyRequestError(error);
        }
        if (status < 200 || status >= 300) {
            await fs.rm(partial, { force: true });
            const code = detectError(status, '') ?? ScraperErrorCode.DOWNLOAD_FAILED;
            return createError(code, `Media download failed with HTTP ${status}`);
        }
        await fs.rename(partial, source);

        if (!needsTranscode) return { success: true, data: target };

        const converted = await transcodeAudio(source, target, audioFormat, {
            ffmpegBinary: this.ffmpegBinary,
            runner: this.runner,
        });
        if (!converted.success) {
            await fs.rm(source, { force: true });
        }
        return converted;
    }
}

function classifyRequestError(error: unknown): ScraperFailure {
    if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
            return createError(ScraperErrorCode.TIMEOUT, 'Mirror request timed out');
        }
        return createError(ScraperErrorCode.NETWORK_ERROR, error.message);
    }
    const message = error instanceof Error ? error.message : String(error);
    return createError(detectErrorCode(error), message);
}
