/**
 * YouTube URL helpers
 *
 * @module youtube/url
 */

const YOUTUBE_HOST_PATTERN = /^(?:https?:\/\/)?(?:www\.|m\.|music\.)?(?:youtube\.com|youtu\.be)(?:[/?#]|$)/i;

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

export const WATCH_URL = 'https://www.youtube.com/watch?v=';

/**
 * Check if text is a YouTube link (youtube.com, youtu.be, m., music.)
 */
export function isYouTubeUrl(text: string): boolean {
    return YOUTUBE_HOST_PATTERN.test(text.trim());
}

export function isVideoId(value: string): boolean {
    return VIDEO_ID_PATTERN.test(value);
}

/**
 * Extract video ID from YouTube URL
 */
export function extractYouTubeId(url: string): string | null {
    const patterns = [
        /(?:youtube\.com\/watch\?(?:[^#\s]*&)?v=|youtu\.be\/|youtube\.com\/embed\/|youtube\.com\/shorts\/|youtube\.com\/live\/)([a-zA-Z0-9_-]{11})(?![a-zA-Z0-9_-])/,
        /(?:youtube\.com\/v\/|youtube\.com\/e\/)([a-zA-Z0-9_-]{11})(?![a-zA-Z0-9_-])/,
    ];

    for (const pattern of patterns) {
        const match = url.match(pattern);
        if (match) return match[1];
    }

    return null;
}

/**
 * Accepts a bare id or any YouTube link; null when neither
 */
export function normalizeVideoId(input: string): string | null {
    const trimmed = input.trim();
    if (isVideoId(trimmed)) return trimmed;
    if (isYouTubeUrl(trimmed)) return extractYouTubeId(trimmed);
    return null;
}

export function watchUrl(id: string): string {
    return `${WATCH_URL}${id}`;
}
