import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { YtDlpConfig } from '@/core/config';
import { ScraperErrorCode } from '@/core/scrapers/types';
import { RateLimiter } from '@/lib/http/anti-ban';
import type { ExecRunner } from '@/lib/types';
import { buildDownloadArgs, buildMetadataArgs, buildStreamArgs, YtDlpBackend } from '../ytdlp';
import { fakeClock, makeDetails, VIDEO_ID, ytdlpVideo } from './fixtures';

const config: YtDlpConfig = { binary: 'yt-dlp', timeoutMs: 1000 };
const WATCH = `https://www.youtube.com/watch?v=${VIDEO_ID}`;

function execError(message: string, fields: Record<string, unknown>): Error {
    return Object.assign(new Error(message), fields);
}

describe('argument builders', () => {
    it('adds cookies and proxy to metadata calls', () => {
        expect(buildMetadataArgs(WATCH, { ...config, cookiesFile: '/secrets/cookies.txt', proxy: 'http://proxy.local:8080' })).toEqual([
            '--dump-single-json', '--no-playlist', '--no-warnings', '--skip-download',
            '--cookies', '/secrets/cookies.txt', '--proxy', 'http://proxy.local:8080',
            WATCH,
        ]);
    });

    it('caps video streams at 720p', () => {
        expect(buildStreamArgs(VIDEO_ID, 'video', config)).toEqual([
            '-g', '-f', 'best[height<=?720][width<=?1280]/best', '--no-playlist', '--no-warnings', WATCH,
        ]);
    });

    it('extracts audio into the download directory', () => {
        expect(buildDownloadArgs(VIDEO_ID, 'audio', 'mp3', '/downloads', config)).toEqual([
            '-f', 'bestaudio/best', '-x', '--audio-format', 'mp3', '--audio-quality', '192K',
            '--no-playlist', '--no-warnings', '--no-progress',
            '-o', path.join('/downloads', `${VIDEO_ID}.%(ext)s`),
            '--print', 'after_move:filepath',
            WATCH,
        ]);
    });

    it('passes a custom ffmpeg location', () => {
        const args = buildDownloadArgs(VIDEO_ID, 'video', 'mp3', '/downloads', config, '/opt/ffmpeg/bin/ffmpeg');
        expect(args).toContain('--merge-output-format');
        expect(args.slice(args.indexOf('--ffmpeg-location'), args.indexOf('--ffmpeg-location') + 2)).toEqual([
            '--ffmpeg-location', '/opt/ffmpeg/bin/ffmpeg',
        ]);
    });
});

describe('YtDlpBackend', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ytdlp-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    function backend(runner: ExecRunner, limiter?: RateLimiter): YtDlpBackend {
        return new YtDlpBackend({ config, downloadDir: dir, runner, limiter });
    }

    it('looks up a video by id', async () => {
        const runner = vi.fn<ExecRunner>(async () => ({ stdout: JSON.stringify(ytdlpVideo), stderr: '' }));

        const result = await backend(runner).lookup(VIDEO_ID);

        expect(result).toEqual({
            success: true,
            data: makeDetails({ thumbnail: `https://i.ytimg.com/vi/${VIDEO_ID}/maxresdefault.jpg` }),
        });
        expect(runner).toHaveBeenCalledWith('yt-dlp', buildMetadataArgs(WATCH, config), expect.objectContaining({ timeout: 1000 }));
    });

    it('searches with ytsearch1', async () => {
        const runner = vi.fn<ExecRunner>(async () => ({
            stdout: JSON.stringify({ _type: 'playlist', entries: [ytdlpVideo] }),
            stderr: '',
        }));

        const result = await backend(runner).search('test song');

        expect(result.success && result.data.id).toBe(VIDEO_ID);
        expect(runner.mock.calls[0][1].at(-1)).toBe('ytsearch1:test song');
    });

    it('reports an empty search as not found', async () => {
        const runner: ExecRunner = async () => ({ stdout: JSON.stringify({ _type: 'playlist', entries: [] }), stderr: '' });

        const result = await backend(runner).search('nothing here');

        expect(result).toMatchObject({ success: false, errorCode: ScraperErrorCode.NOT_FOUND });
    });

    it('reports unparseable output', async () => {
        const runner: ExecRunner = async () => ({ stdout: 'not json', stderr: '' });

        const result = await backend(runner).lookup(VIDEO_ID);

        expect(result).toMatchObject({ success: false, errorCode: ScraperErrorCode.PARSE_ERROR });
    });

    it('returns the first printed stream URL', async () => {
        const runner: ExecRunner = async () => ({ stdout: 'https://rr1.example/audio\nhttps://rr1.example/other\n', stderr: '' });

        expect(await backend(runner).streamUrl(VIDEO_ID, 'audio')).toEqual({ success: true, data: 'https://rr1.example/audio' });
    });

    it('rejects output that is not a URL', async () => {
        const runner: ExecRunner = async () => ({ stdout: '\n', stderr: '' });

        const result = await backend(runner).streamUrl(VIDEO_ID, 'audio');

        expect(result).toMatchObject({ success: false, errorCode: ScraperErrorCode.NO_MEDIA });
    });

    it('classifies bot checks from stderr', async () => {
        const runner: ExecRunner = async () => {
            throw execError('Command failed', {
                code: 1,
                stderr: `ERROR: [youtube] ${VIDEO_ID}: Sign in to confirm you're not a bot`,
            });
        };

        const result = await backend(runner).lookup(VIDEO_ID);

        expect(result).toEqual({
            success: false,
            errorCode: ScraperErrorCode.BLOCKED,
            error: 'YouTube flagged the request as automated',
        });
    });

    it('reports a missing binary', async () => {
        const runner: ExecRunner = async () => {
            throw execError('spawn yt-dlp ENOENT', { code: 'ENOENT' });
        };

        expect(await backend(runner).lookup(VIDEO_ID)).toEqual({
            success: false,
            errorCode: ScraperErrorCode.BACKEND_UNAVAILABLE,
            error: 'yt-dlp not installed on server',
        });
    });

    it('reports a killed process as a timeout', async () => {
        const runner: ExecRunner = async () => {
            throw execError('Command failed', { killed: true, signal: 'SIGTERM' });
        };

        const result = await backend(runner).lookup(VIDEO_ID);

        expect(result).toMatchObject({ success: false, errorCode: ScraperErrorCode.TIMEOUT });
    });

    it('downloads to the path yt-dlp prints', async () => {
        const runner: ExecRunner = async (_file, args) => {
            const template = args[args.indexOf('-o') + 1];
            const output = template.replace('%(ext)s', 'mp3');
            await fs.writeFile(output, 'audio');
            return { stdout: `${output}\n`, stderr: '' };
        };

        const result = await backend(runner).download(VIDEO_ID, 'audio', 'mp3');

        expect(result).toEqual({ success: true, data: path.join(dir, `${VIDEO_ID}.mp3`) });
    });

    it('fails a download that leaves no file behind', async () => {
        const runner: ExecRunner = async () => ({ stdout: '', stderr: '' });

        const result = await backend(runner).download(VIDEO_ID, 'audio', 'mp3');

        expect(result).toMatchObject({ success: false, errorCode: ScraperErrorCode.DOWNLOAD_FAILED });
    });

    it('paces calls through the shared limiter', async () => {
        const { clock, sleeps } = fakeClock();
        const limiter = new RateLimiter(100, 100, clock);
        const runner: ExecRunner = async () => ({ stdout: JSON.stringify(ytdlpVideo), stderr: '' });
        const ytdlp = backend(runner, limiter);

        await Promise.all([ytdlp.lookup(VIDEO_ID), ytdlp.lookup(VIDEO_ID)]);

        expect(sleeps).toEqual([100]);
    });
});
