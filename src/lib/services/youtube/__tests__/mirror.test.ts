import { AxiosError } from 'axios';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ScraperErrorCode } from '@/core/scrapers/types';
import type { ExecRunner } from '@/lib/types';
import { MirrorBackend } from '../mirror';
import { MirrorRotator } from '../rotator';
import { makeDetails, mirrorVideo, stubHttp, VIDEO_ID, type StubReply } from './fixtures';

const MIRRORS = ['https://a.example', 'https://b.example', 'https://c.example'];
const VIDEO_PATH = `/api/v1/videos/${VIDEO_ID}`;

function media(body: string): StubReply {
    return { status: 200, data: Readable.from([Buffer.from(body)]) };
}

describe('MirrorBackend', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mirror-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    function backend(
        handler: Parameters<typeof stubHttp>[0],
        options: { attempts?: number; runner?: ExecRunner } = {}
    ) {
        const { http, requests } = stubHttp(handler);
        const mirror = new MirrorBackend({
            rotator: new MirrorRotator(MIRRORS),
            attempts: options.attempts ?? 3,
            downloadDir: dir,
            http,
            runner: options.runner,
        });
        return { mirror, requests };
    }

    describe('lookup', () => {
        it('reads the video from the first mirror', async () => {
            const { mirror, requests } = backend(() => ({ status: 200, data: JSON.stringify(mirrorVideo) }));

            expect(await mirror.lookup(VIDEO_ID)).toEqual({ success: true, data: makeDetails() });
            expect(requests).toEqual([`https://a.example${VIDEO_PATH}`]);
        });

        it('moves on after a server error', async () => {
            const { mirror, requests } = backend((url) =>
                url.startsWith('https://a.example')
                    ? { status: 502, data: 'Bad Gateway' }
                    : { status: 200, data: JSON.stringify(mirrorVideo) }
            );

            const result = await mirror.lookup(VIDEO_ID);

            expect(result.success).toBe(true);
            expect(requests).toEqual([`https://a.example${VIDEO_PATH}`, `https://b.example${VIDEO_PATH}`]);
        });

        it('treats a bare 404 as a broken instance', async () => {
            const { mirror, requests } = backend((url) =>
                url.startsWith('https://a.example')
                    ? { status: 404, data: '<html>Not Found</html>' }
                    : { status: 200, data: JSON.stringify(mirrorVideo) }
            );

            expect((await mirror.lookup(VIDEO_ID)).success).toBe(true);
            expect(requests).toHaveLength(2);
        });

        it('stops at a missing video', async () => {
            const { mirror, requests } = backend(() => ({ status: 404, data: '{"error":"This video is unavailable"}' }));

            const result = await mirror.lookup(VIDEO_ID);

            expect(result).toMatchObject({ success: false, errorCode: ScraperErrorCode.NOT_FOUND });
            expect(requests).toHaveLength(1);
        });

        it('gives up after the configured number of mirrors', async () => {
            const { mirror, requests } = backend(() => ({ status: 429, data: '' }), { attempts: 2 });

            const result = await mirror.lookup(VIDEO_ID);

            expect(result).toMatchObject({ success: false, errorCode: ScraperErrorCode.RATE_LIMITED });
            expect(requests).toEqual([`https://a.example${VIDEO_PATH}`, `https://b.example${VIDEO_PATH}`]);
        });

        it('maps transport errors', async () => {
            const { mirror } = backend(() => {
                throw new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED');
            }, { attempts: 1 });

            expect(await mirror.lookup(VIDEO_ID)).toMatchObject({ success: false, errorCode: ScraperErrorCode.TIMEOUT });
        });

        it('reports invalid JSON', async () => {
            const { mirror } = backend(() => ({ status: 200, data: '<html>' }), { attempts: 1 });

            expect(await mirror.lookup(VIDEO_ID)).toMatchObject({ success: false, errorCode: ScraperErrorCode.PARSE_ERROR });
        });
    });

    describe('search', () => {
        it('queries videos only', async () => {
            let params: unknown;
            const { mirror, requests } = backend((_url, config) => {
                params = config.params;
                return { status: 200, data: JSON.stringify([mirrorVideo]) };
            });

            const result = await mirror.search('test song');

            expect(result).toEqual({ success: true, data: makeDetails() });
            expect(requests).toEqual(['https://a.example/api/v1/search']);
            expect(params).toEqual({ q: 'test song', type: 'video' });
        });

        it('reports no results as not found', async () => {
            const { mirror, requests } = backend(() => ({ status: 200, data: '[]' }));

            expect(await mirror.search('nothing')).toMatchObject({ success: false, errorCode: ScraperErrorCode.NOT_FOUND });
            expect(requests).toHaveLength(1);
        });
    });

    describe('streamUrl', () => {
        it('resolves instance-relative stream URLs', async () => {
            const proxied = {
                ...mirrorVideo,
                adaptiveFormats: [{ url: '/latest_version?id=x&itag=140', type: 'audio/mp4', bitrate: '130000' }],
            };
            const { mirror } = backend(() => ({ status: 200, data: JSON.stringify(proxied) }));

            expect(await mirror.streamUrl(VIDEO_ID, 'audio')).toEqual({
                success: true,
                data: 'https://a.example/latest_version?id=x&itag=140',
            });
        });

        it('moves past a mirror that sends an unusable stream URL', async () => {
            const broken = { ...mirrorVideo, adaptiveFormats: [{ url: 'http://[bad', type: 'audio/mp4' }] };
            const { mirror, requests } = backend((url) => ({
                status: 200,
                data: JSON.stringify(url.startsWith('https://a.example') ? broken : mirrorVideo),
            }));

            expect(await mirror.streamUrl(VIDEO_ID, 'audio')).toEqual({ success: true, data: 'https://cdn.example/audio-mp4-high' });
            expect(requests).toHaveLength(2);
        });

        it('returns the muxed video stream', async () => {
            const { mirror } = backend(() => ({ status: 200, data: JSON.stringify(mirrorVideo) }));

            expect(await mirror.streamUrl(VIDEO_ID, 'video')).toEqual({ success: true, data: 'https://cdn.example/720' });
        });
    });

    describe('download', () => {
        it('saves audio that is already in the requested format', async () => {
            const runner = vi.fn<ExecRunner>();
            const { mirror } = backend((url) =>
                url.startsWith('https://cdn.example') ? media('m4a-bytes') : { status: 200, data: JSON.stringify(mirrorVideo) },
                { runner }
            );

            const result = await mirror.download(VIDEO_ID, 'audio', 'm4a');

            const target = path.join(dir, `${VIDEO_ID}.m4a`);
            expect(result).toEqual({ success: true, data: target });
            await expect(fs.readFile(target, 'utf8')).resolves.toBe('m4a-bytes');
            expect(runner).not.toHaveBeenCalled();
        });

        it('transcodes to the requested audio format', async () => {
            const runner = vi.fn<ExecRunner>(async (_file, args) => {
                await fs.writeFile(args[args.length - 1], 'mp3-bytes');
                return { stdout: '', stderr: '' };
            });
            const { mirror } = backend((url) =>
                url.startsWith('https://cdn.example') ? media('m4a-bytes') : { status: 200, data: JSON.stringify(mirrorVideo) },
                { runner }
            );

            const result = await mirror.download(VIDEO_ID, 'audio', 'mp3');

            const target = path.join(dir, `${VIDEO_ID}.mp3`);
            const source = path.join(dir, `${VIDEO_ID}.source.m4a`);
            expect(result).toEqual({ success: true, data: target });
            expect(runner.mock.calls[0][0]).toBe('ffmpeg');
            expect(runner.mock.calls[0][1]).toContain(source);
            await expect(fs.readdir(dir)).resolves.toEqual([`${VIDEO_ID}.mp3`]);
        });

        it('leaves no partial file when the conversion is killed', async () => {
            const runner = vi.fn<ExecRunner>()
                .mockImplementationOnce(async (_file, args) => {
                    await fs.writeFile(args[args.length - 1], 'half-an-mp3');
                    throw Object.assign(new Error('Command failed'), { killed: true, signal: 'SIGTERM' });
                })
                .mockImplementationOnce(async (_file, args) => {
                    await fs.writeFile(args[args.length - 1], 'mp3-bytes');
                    return { stdout: '', stderr: '' };
                });
            const { mirror } = backend((url) =>
                url.startsWith('https://cdn.example') ? media('m4a-bytes') : { status: 200, data: JSON.stringify(mirrorVideo) },
                { attempts: 1, runner }
            );

            expect(await mirror.download(VIDEO_ID, 'audio', 'mp3')).toMatchObject({
                success: false,
                errorCode: ScraperErrorCode.TIMEOUT,
            });
            await expect(fs.readdir(dir)).resolves.toEqual([]);

            const target = path.join(dir, `${VIDEO_ID}.mp3`);
            expect(await mirror.download(VIDEO_ID, 'audio', 'mp3')).toEqual({ success: true, data: target });
            await expect(fs.readFile(target, 'utf8')).resolves.toBe('mp3-bytes');
        });

        it('cleans up after a refused media request', async () => {
            const { mirror } = backend((url) =>
                url.startsWith('https://cdn.example') ? { status: 403, data: Readable.from([]) } : { status: 200, data: JSON.stringify(mirrorVideo) },
                { attempts: 1 }
            );

            const result = await mirror.download(VIDEO_ID, 'video', 'mp3');

            expect(result).toMatchObject({ success: false, errorCode: ScraperErrorCode.BLOCKED });
            await expect(fs.readdir(dir)).resolves.toEqual([]);
        });

        it('refuses live streams', async () => {
            const live = { ...mirrorVideo, liveNow: true, hlsUrl: 'https://a.example/api/manifest/hls/live.m3u8' };
            const { mirror } = backend(() => ({ status: 200, data: JSON.stringify(live) }), { attempts: 1 });

            expect(await mirror.download(VIDEO_ID, 'audio', 'mp3')).toMatchObject({
                success: false,
                errorCode: ScraperErrorCode.NO_MEDIA,
            });
        });
    });
});
