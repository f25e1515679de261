/**
 * YouTube Extractor
 *
 * Normalizes yt-dlp JSON and mirror (Invidious API) JSON into VideoDetails,
 * and picks playable streams out of mirror format lists.
 *
 * @module youtube/extractor
 */

import type { MediaMode, VideoDetails } from '@/lib/types';
import { asArray, asRecord, readBoolean, readNumber, readString, type JsonRecord } from '@/core/scrapers/utils';
import { formatDuration, stripQuery } from '@/lib/utils/format-utils';
import { watchUrl } from './url';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Highest muxed resolution served in video mode */
export const MAX_VIDEO_HEIGHT = 720;

const UNKNOWN_CHANNEL = 'Unknown';

export function defaultThumbnail(id: string): string {
    return `https://i.ytimg.com/vi/${id}/hqdefault.jpg`;
}

function buildDetails(raw: {
    id: string;
    title?: string;
    seconds?: number;
    isLive: boolean;
    thumbnail?: string;
    channel?: string;
    views?: number;
}): VideoDetails {
    const durationSeconds = raw.isLive ? 0 : Math.max(0, Math.floor(raw.seconds ?? 0));
    return {
        id: raw.id,
        title: raw.title ?? raw.id,
        duration: formatDuration(durationSeconds, raw.isLive),
        durationSeconds,
        thumbnail: stripQuery(raw.thumbnail ?? defaultThumbnail(raw.id)),
        link: watchUrl(raw.id),
        channel: raw.channel ?? UNKNOWN_CHANNEL,
        views: raw.views,
        isLive: raw.isLive,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// YT-DLP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Search output is a playlist; the video is its first entry
 */
export function unwrapYtDlpOutput(data: unknown): JsonRecord | null {
    const record = asRecord(data);
    if (!record) return null;
    if (record['_type'] === 'playlist') {
        return asRecord(asArray(record['entries'])[0]);
    }
    return record;
}

export function extractYtDlpDetails(data: unknown): VideoDetails | null {
    const video = unwrapYtDlpOutput(data);
    if (!video) return null;

    const id = readString(video, 'id');
    if (!id) return null;

    const liveStatus = readString(video, 'live_status');
    return buildDetails({
        id,
        title: readString(video, 'title'),
        seconds: readNumber(video, 'duration'),
        isLive: readBoolean(video, 'is_live') || liveStatus === 'is_live',
        thumbnail: readString(video, 'thumbnail'),
        channel: readString(video, 'channel') ?? readString(video, 'uploader'),
        views: readNumber(video, 'view_count'),
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// MIRROR (Invidious API)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Mirror thumbnails are proxied through the instance, which may be the very
 * thing that is failing. The YouTube image CDN is used instead.
 */
export function extractMirrorDetails(data: unknown): VideoDetails | null {
    const video = asRecord(data);
    if (!video) return null;

    const id = readString(video, 'videoId');
    if (!id) return null;

    return buildDetails({
        id,
        title: readString(video, 'title'),
        seconds: readNumber(video, 'lengthSeconds'),
        isLive: readBoolean(video, 'liveNow'),
        thumbnail: defaultThumbnail(id),
        channel: readString(video, 'author'),
        views: readNumber(video, 'viewCount'),
    });
}

/**
 * First `type: "video"` item of a search response
 */
export function extractMirrorSearchResult(data: unknown): VideoDetails | null {
    for (const item of asArray(data)) {
        const record = asRecord(item);
        if (record && record['type'] === 'video') {
            return extractMirrorDetails(record);
        }
    }
    return null;
}

export interface MirrorStream {
    url: string;
    ext: string;
    isLive: boolean;
}

function extFromMime(type: string | undefined, container: string | undefined): string {
    if (container) return container;
    if (!type) return 'bin';
    if (type.startsWith('audio/mp4')) return 'm4a';
    if (type.startsWith('audio/webm') || type.startsWith('video/webm')) return 'webm';
    if (type.startsWith('video/mp4')) return 'mp4';
    if (type.startsWith('video/3gpp')) return '3gp';
    return 'bin';
}

/** "720p", "720p60", "1280x720" → 720 */
export function parseHeight(format: JsonRecord): number | undefined {
    const explicit = readNumber(format, 'height');
    if (explicit !== undefined) return explicit;
    const label = readString(format, 'resolution') ?? readString(format, 'qualityLabel') ?? readString(format, 'size');
    if (!label) return undefined;
    const byP = label.match(/(\d+)p/);
    if (byP) return Number(byP[1]);
    const bySize = label.match(/\d+x(\d+)/);
    return bySize ? Number(bySize[1]) : undefined;
}

function pickAudio(video: JsonRecord): MirrorStream | null {
    const audio = asArray(video['adaptiveFormats'])
        .map(asRecord)
        .filter((f): f is JsonRecord => f !== null && (readString(f, 'type') ?? '').startsWith('audio/') && !!readString(f, 'url'));
    if (audio.length === 0) return null;

    const mp4 = audio.filter(f => (readString(f, 'type') ?? '').startsWith('audio/mp4'));
    const pool = mp4.length > 0 ? mp4 : audio;
    const best = pool.reduce((a, b) => (readNumber(b, 'bitrate') ?? 0) > (readNumber(a, 'bitrate') ?? 0) ? b : a);

    const url = readString(best, 'url');
    if (!url) return null;
    const type = readString(best, 'type');
    // Invidious reports container "mp4" for audio/mp4; on disk that is an m4a
    const container = type?.startsWith('audio/mp4') ? 'm4a' : readString(best, 'container');
    return { url, ext: extFromMime(type, container), isLive: false };
}

function pickVideo(video: JsonRecord): MirrorStream | null {
    let best: { format: JsonRecord; height: number } | null = null;
    for (const entry of asArray(video['formatStreams'])) {
        const format = asRecord(entry);
        if (!format || !readString(format, 'url')) continue;
        const height = parseHeight(format) ?? 0;
        if (height > MAX_VIDEO_HEIGHT) continue;
        if (!best || height > best.height) best = { format, height };
    }
    if (!best) return null;

    const url = readString(best.format, 'url');
    if (!url) return null;
    return {
        url,
        ext: extFromMime(readString(best.format, 'type'), readString(best.format, 'container')),
        isLive: false,
    };
}

/**
 * Stream for the given mode: best audio-only (audio/mp4 preferred), best muxed
 * stream at or below 720p, or the HLS manifest for live streams
 */
export function pickMirrorStream(data: unknown, mode: MediaMode): MirrorStream | null {
    const video = asRecord(data);
    if (!video) return null;

    if (readBoolean(video, 'liveNow')) {
        const hlsUrl = readString(video, 'hlsUrl');
        return hlsUrl ? { url: hlsUrl, ext: 'm3u8', isLive: true } : null;
    }

    return mode === 'audio' ? pickAudio(video) : pickVideo(video);
}
