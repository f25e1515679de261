/**
 * YouTube backend using yt-dlp
 *
 * Runs the yt-dlp binary through execFile and delegates parsing to the
 * extractor. Every invocation is paced by the shared rate limiter.
 *
 * @module youtube/ytdlp
 */

import fs from 'fs/promises';
import path from 'path';
import type { AudioFormat, MediaMode, YtDlpConfig } from '@/core/config';
import { createError, ScraperErrorCode, type ScraperResult } from '@/core/scrapers/types';
import { parseJson } from '@/core/scrapers/utils';
import type { RateLimiter } from '@/lib/http/anti-ban';
import type { ExecRunner, MediaBackend, VideoDetails } from '@/lib/types';
import { detectYtDlpError } from '../shared/error-detector';
import { defaultExecRunner, describeExecError } from '../shared/exec';
import { logger } from '../shared/logger';
import { extractYtDlpDetails } from './extractor';
import { watchUrl } from './url';

// ═══════════════════════════════════════════════════════════════════════════════
// FORMAT SELECTORS
// ═══════════════════════════════════════════════════════════════════════════════

export const STREAM_FORMATS: Record<MediaMode, string> = {
    audio: 'bestaudio/best',
    video: 'best[height<=?720][width<=?1280]/best',
};

export const DOWNLOAD_VIDEO_FORMAT = 'bestvideo[height<=?720][width<=?1280][ext=mp4]+bestaudio[ext=m4a]/best';

const METADATA_BUFFER = 20 * 1024 * 1024;

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT BUILDERS
// ═══════════════════════════════════════════════════════════════════════════════

function authArgs(config: YtDlpConfig): string[] {
    const args: string[] = [];
    if (config.cookiesFile) args.push('--cookies', config.cookiesFile);
    if (config.proxy) args.push('--proxy', config.proxy);
    return args;
}

export function buildMetadataArgs(target: string, config: YtDlpConfig): string[] {
    return ['--dump-single-json', '--no-playlist', '--no-warnings', '--skip-download', ...authArgs(config), target];
}

export function buildStreamArgs(id: string, mode: MediaMode, config: YtDlpConfig): string[] {
    return ['-g', '-f', STREAM_FORMATS[mode], '--no-playlist', '--no-warnings', ...authArgs(config), watchUrl(id)];
}

export function buildDownloadArgs(
    id: string,
    mode: MediaMode,
    audioFormat: AudioFormat,
    downloadDir: string,
    config: YtDlpConfig,
    ffmpegBinary?: string
): string[] {
    const formatArgs = mode === 'audio'
        ? ['-f', 'bestaudio/best', '-x', '--audio-format', audioFormat, '--audio-quality', '192K']
        : ['-f', DOWNLOAD_VIDEO_FORMAT, '--merge-output-format', 'mp4'];
    const ffmpegArgs = ffmpegBinary && ffmpegBinary !== 'ffmpeg' ? ['--ffmpeg-location', ffmpegBinary] : [];

    return [
        ...formatArgs,
        '--no-playlist',
        '--no-warnings',
        '--no-progress',
        '-o', path.join(downloadDir, `${id}.%(ext)s`),
        '--print', 'after_move:filepath',
        ...ffmpegArgs,
        ...authArgs(config),
        watchUrl(id),
    ];
}

// ═══════════════════════════════════════════════════════════════════════════════
// BACKEND
// ═══════════════════════════════════════════════════════════════════════════════

export interface YtDlpBackendOptions {
    config: YtDlpConfig;
    downloadDir: string;
    ffmpegBinary?: string;
    limiter?: RateLimiter;
    runner?: ExecRunner;
}

export class YtDlpBackend implements MediaBackend {
    readonly name = 'ytdlp' as const;

    private readonly config: YtDlpConfig;
    private readonly downloadDir: string;
    private readonly ffmpegBinary?: string;
    private readonly limiter?: RateLimiter;
    private readonly runner: ExecRunner;

    constructor(options: YtDlpBackendOptions) {
        this.config = options.config;
        this.downloadDir = options.downloadDir;
        this.ffmpegBinary = options.ffmpegBinary;
        this.limiter = options.limiter;
        this.runner = options.runner ?? defaultExecRunner;
    }

    lookup(id: string): Promise<ScraperResult<VideoDetails>> {
        return this.fetchDetails(watchUrl(id));
    }

    search(query: string): Promise<ScraperResult<VideoDetails>> {
        return this.fetchDetails(`ytsearch1:${query}`);
    }

    async streamUrl(id: string, mode: MediaMode): Promise<ScraperResult<string>> {
        const result = await this.run(buildStreamArgs(id, mode, this.config));
        if (!result.success) return result;

        const url = firstLine(result.data);
        if (!url || !/^https?:\/\//.test(url)) {
            return createError(ScraperErrorCode.NO_MEDIA, 'yt-dlp returned no stream URL');
        }
        return { success: true, data: url };
    }

    async download(id: string, mode: MediaMode, audioFormat: AudioFormat): Promise<ScraperResult<string>> {
        await fs.mkdir(this.downloadDir, { recursive: true });

        const args = buildDownloadArgs(id, mode, audioFormat, this.downloadDir, this.config, this.ffmpegBinary);
        const result = await this.run(args, { timeout: this.config.timeoutMs * 4 });
        if (!result.success) return result;

        const printed = lastLine(result.data);
        const expected = path.join(this.downloadDir, `${id}.${mode === 'audio' ? audioFormat : 'mp4'}`);
        const filePath = printed || expected;

        if (!(await fileExists(filePath))) {
            return createError(ScraperErrorCode.DOWNLOAD_FAILED, 'yt-dlp finished without producing a file');
        }
        return { success: true, data: filePath };
    }

    private async fetchDetails(target: string): Promise<ScraperResult<VideoDetails>> {
        const result = await this.run(buildMetadataArgs(target, this.config), { maxBuffer: METADATA_BUFFER });
        if (!result.success) return result;

        const parsed = parseJson(result.data);
        if (parsed === null) {
            return createError(ScraperErrorCode.PARSE_ERROR, 'yt-dlp returned invalid JSON');
        }
        const details = extractYtDlpDetails(parsed);
        if (!details) {
            return createError(ScraperErrorCode.NOT_FOUND, 'No results found');
        }
        return { success: true, data: details };
    }

    /**
     * Run yt-dlp and map failures onto error codes. Returns stdout on success.
     */
    private async run(args: string[], options: { timeout?: number; maxBuffer?: number } = {}): Promise<ScraperResult<string>> {
        const exec = async (): Promise<ScraperResult<string>> => {
            const startTime = Date.now();
            try {
                const { stdout } = await this.runner(this.config.binary, args, {
                    timeout: options.timeout ?? this.config.timeoutMs,
                    maxBuffer: options.maxBuffer,
                });
                logger.debug('youtube', `yt-dlp took ${Date.now() - startTime}ms`);
                return { success: true, data: stdout };
            } catch (error) {
                const failure = describeExecError(error);
                if (failure.missing) {
                    return createError(ScraperErrorCode.BACKEND_UNAVAILABLE, 'yt-dlp not installed on server');
                }
                if (failure.killed) {
                    return createError(ScraperErrorCode.TIMEOUT, 'yt-dlp timed out');
                }
                const detected = detectYtDlpError(failure.stderr || failure.message);
                logger.warn('youtube', `yt-dlp failed [${detected.errorCode}]: ${detected.message}`);
                return createError(detected.errorCode, detected.message);
            }
        };
        return this.limiter ? this.limiter.schedule(exec) : exec();
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function outputLines(output: string): string[] {
    return output.split(/\r?\n/).map(l => l.trim()).filter(Boolean);
}

function firstLine(output: string): string | undefined {
    return outputLines(output)[0];
}

function lastLine(output: string): string | undefined {
    const lines = outputLines(output);
    return lines[lines.length - 1];
}

export async function fileExists(filePath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(filePath);
        return stat.isFile() && stat.size > 0;
    } catch {
        return false;
    }
}
