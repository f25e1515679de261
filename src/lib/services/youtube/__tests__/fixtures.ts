import axios, { type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import type { Clock } from '@/lib/http/anti-ban';
import type { VideoDetails } from '@/lib/types';

export const VIDEO_ID = 'abcDEF12345';

export const ytdlpVideo = {
    id: VIDEO_ID,
    title: 'Test Song',
    duration: 245,
    thumbnail: `https://i.ytimg.com/vi/${VIDEO_ID}/maxresdefault.jpg?v=1`,
    channel: 'Test Channel',
    view_count: 1234,
    is_live: false,
};

export const mirrorVideo = {
    type: 'video',
    videoId: VIDEO_ID,
    title: 'Test Song',
    lengthSeconds: 245,
    author: 'Test Channel',
    viewCount: 1234,
    liveNow: false,
    adaptiveFormats: [
        { url: 'https://cdn.example/audio-webm-high', type: 'audio/webm; codecs="opus"', bitrate: '160000', container: 'webm' },
        { url: 'https://cdn.example/audio-mp4-low', type: 'audio/mp4; codecs="mp4a.40.5"', bitrate: '48000', container: 'm4a' },
        { url: 'https://cdn.example/audio-mp4-high', type: 'audio/mp4; codecs="mp4a.40.2"', bitrate: '130000', container: 'm4a' },
        { url: 'https://cdn.example/video-only', type: 'video/mp4; codecs="avc1"', bitrate: '900000', container: 'mp4' },
    ],
    formatStreams: [
        { url: 'https://cdn.example/360', type: 'video/mp4; codecs="avc1.42001E, mp4a.40.2"', container: 'mp4', resolution: '360p' },
        { url: 'https://cdn.example/720', type: 'video/mp4', container: 'mp4', resolution: '720p' },
        { url: 'https://cdn.example/1080', type: 'video/mp4', container: 'mp4', resolution: '1080p' },
    ],
};

export function makeDetails(overrides: Partial<VideoDetails> = {}): VideoDetails {
    return {
        id: VIDEO_ID,
        title: 'Test Song',
        duration: '4:05',
        durationSeconds: 245,
        thumbnail: `https://i.ytimg.com/vi/${VIDEO_ID}/hqdefault.jpg`,
        link: `https://www.youtube.com/watch?v=${VIDEO_ID}`,
        channel: 'Test Channel',
        views: 1234,
        isLive: false,
        ...overrides,
    };
}

/** Clock whose sleeps advance time instantly */
export function fakeClock(start = 0): { clock: Clock; sleeps: number[]; advance: (ms: number) => void; time: () => number } {
    let t = start;
    const sleeps: number[] = [];
    return {
        clock: {
            now: () => t,
            sleep: async (ms: number) => {
                sleeps.push(ms);
                t += ms;
            },
            random: () => 0,
        },
        sleeps,
        advance: (ms: number) => {
            t += ms;
        },
        time: () => t,
    };
}

export interface StubReply {
    status: number;
    data: unknown;
}

/**
 * axios instance answered in-process. The handler sees the request URL and
 * query params.
 */
export function stubHttp(handler: (url: string, config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>) {
    const requests: string[] = [];
    const adapter: AxiosAdapter = async (config) => {
        const url = config.url ?? '';
        requests.push(url);
        const reply = await handler(url, config);
        return { data: reply.data, status: reply.status, statusText: '', headers: {}, config };
    };
    const http = axios.create({ adapter, validateStatus: () => true });
    return { http, requests };
}
