/**
 * Error Detector Helper
 * Maps yt-dlp stderr and mirror HTTP responses onto ScraperErrorCode
 */

import { ScraperErrorCode } from '@/core/scrapers/types';

export interface ErrorPattern {
    patterns: string[];
    errorCode: ScraperErrorCode;
    message: string;
}

/**
 * yt-dlp failure messages, most specific first.
 * "Sign in to confirm you're not a bot" must win over the generic sign-in rule.
 */
export const YTDLP_ERROR_PATTERNS: ErrorPattern[] = [
    {
        patterns: ['confirm you\'re not a bot', 'confirm you’re not a bot', 'not a bot'],
        errorCode: ScraperErrorCode.BLOCKED,
        message: 'YouTube flagged the request as automated'
    },
    {
        patterns: ['HTTP Error 429', 'Too Many Requests'],
        errorCode: ScraperErrorCode.RATE_LIMITED,
        message: 'Rate limited by YouTube'
    },
    {
        patterns: ['HTTP Error 403', 'Forbidden'],
        errorCode: ScraperErrorCode.BLOCKED,
        message: 'Request forbidden by YouTube'
    },
    {
        patterns: ['confirm your age', 'age-restricted', 'inappropriate for some users'],
        errorCode: ScraperErrorCode.AGE_RESTRICTED,
        message: 'Age verification required'
    },
    {
        patterns: ['Private video', 'This video is private'],
        errorCode: ScraperErrorCode.PRIVATE_CONTENT,
        message: 'Video is private'
    },
    {
        patterns: ['not available in your country', 'blocked it in your country', 'geo restriction'],
        errorCode: ScraperErrorCode.GEO_BLOCKED,
        message: 'Video geo-blocked'
    },
    {
        patterns: ['Sign in', 'cookies', 'login required'],
        errorCode: ScraperErrorCode.COOKIE_REQUIRED,
        message: 'Login required'
    },
    {
        patterns: ['Video unavailable', 'This video is unavailable', 'has been removed', 'Incomplete YouTube ID', 'is not a valid URL'],
        errorCode: ScraperErrorCode.NOT_FOUND,
        message: 'Video unavailable'
    },
    {
        patterns: ['timed out', 'Read timed out'],
        errorCode: ScraperErrorCode.TIMEOUT,
        message: 'yt-dlp timed out'
    },
    {
        patterns: ['Unable to download webpage', 'Connection reset', 'Temporary failure in name resolution', 'Network is unreachable'],
        errorCode: ScraperErrorCode.NETWORK_ERROR,
        message: 'Network error while contacting YouTube'
    },
    {
        patterns: ['Requested format is not available'],
        errorCode: ScraperErrorCode.NO_MEDIA,
        message: 'No matching format'
    },
];

/**
 * Mirror API error bodies ({"error": "..."})
 */
export const MIRROR_ERROR_PATTERNS: ErrorPattern[] = [
    {
        patterns: ['This video is unavailable', 'Video unavailable', 'This video may no longer exist'],
        errorCode: ScraperErrorCode.NOT_FOUND,
        message: 'Video unavailable'
    },
    {
        patterns: ['This video is private', 'Private video'],
        errorCode: ScraperErrorCode.PRIVATE_CONTENT,
        message: 'Video is private'
    },
    {
        patterns: ['not a bot', 'Sign in'],
        errorCode: ScraperErrorCode.BLOCKED,
        message: 'Mirror is blocked by YouTube'
    },
    {
        patterns: ['rate limit', 'too many requests'],
        errorCode: ScraperErrorCode.RATE_LIMITED,
        message: 'Mirror rate limited'
    },
];

/**
 * Check if content matches any pattern (case-insensitive)
 */
function matchesPattern(content: string, patterns: string[]): boolean {
    const lowerContent = content.toLowerCase();
    return patterns.some(pattern => lowerContent.includes(pattern.toLowerCase()));
}

function detectErrorFromContent(content: string, patterns: ErrorPattern[]): ErrorPattern | null {
    for (const errorPattern of patterns) {
        if (matchesPattern(content, errorPattern.patterns)) {
            return errorPattern;
        }
    }
    return null;
}

/**
 * Classify yt-dlp stderr / error output
 */
export function detectYtDlpError(output: string): { errorCode: ScraperErrorCode; message: string } {
    const match = detectErrorFromContent(output, YTDLP_ERROR_PATTERNS);
    if (match) return { errorCode: match.errorCode, message: match.message };

    const errorLine = output.split('\n').map(l => l.trim()).find(l => l.startsWith('ERROR:'));
    return {
        errorCode: ScraperErrorCode.UNKNOWN,
        message: (errorLine || output.trim() || 'yt-dlp failed').substring(0, 200),
    };
}

/**
 * Detect error from HTTP status code
 */
function detectErrorFromStatus(status: number): ScraperErrorCode | null {
    if (status === 403) return ScraperErrorCode.BLOCKED;
    if (status === 429) return ScraperErrorCode.RATE_LIMITED;
    if (status === 408 || status === 504) return ScraperErrorCode.TIMEOUT;
    if (status >= 500) return ScraperErrorCode.API_ERROR;
    return null;
}

/**
 * Classify a mirror response. Body text wins over a bare 404 so that a dead
 * instance (404 without an error body) is not mistaken for a missing video.
 */
export function detectError(status: number, body: string): ScraperErrorCode | null {
    const statusError = detectErrorFromStatus(status);
    if (statusError) return statusError;

    if (status >= 400 || body.includes('"error"')) {
        const contentError = detectErrorFromContent(body, MIRROR_ERROR_PATTERNS);
        if (contentError) return contentError.errorCode;
    }

    if (status >= 400) return ScraperErrorCode.API_ERROR;
    return null;
}
