/**
 * Scraper Types - Core Domain Types
 * Result and error types shared by every media backend.
 */

export type BackendName = 'ytdlp' | 'mirror';

export enum ScraperErrorCode {
    INVALID_URL = 'INVALID_URL',
    INVALID_QUERY = 'INVALID_QUERY',
    COOKIE_REQUIRED = 'COOKIE_REQUIRED',
    NOT_FOUND = 'NOT_FOUND',
    PRIVATE_CONTENT = 'PRIVATE_CONTENT',
    AGE_RESTRICTED = 'AGE_RESTRICTED',
    GEO_BLOCKED = 'GEO_BLOCKED',
    DURATION_LIMIT = 'DURATION_LIMIT',
    NO_MEDIA = 'NO_MEDIA',
    TIMEOUT = 'TIMEOUT',
    RATE_LIMITED = 'RATE_LIMITED',
    BLOCKED = 'BLOCKED',
    NETWORK_ERROR = 'NETWORK_ERROR',
    API_ERROR = 'API_ERROR',
    BACKEND_UNAVAILABLE = 'BACKEND_UNAVAILABLE',
    PARSE_ERROR = 'PARSE_ERROR',
    DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
    UNKNOWN = 'UNKNOWN',
}

export const ERROR_MESSAGES: Record<ScraperErrorCode, string> = {
    [ScraperErrorCode.INVALID_URL]: 'Invalid YouTube link or video id',
    [ScraperErrorCode.INVALID_QUERY]: 'Nothing to search for',
    [ScraperErrorCode.COOKIE_REQUIRED]: 'This video requires a signed-in session',
    [ScraperErrorCode.NOT_FOUND]: 'Video not found or unavailable',
    [ScraperErrorCode.PRIVATE_CONTENT]: 'This video is private',
    [ScraperErrorCode.AGE_RESTRICTED]: 'This video is age-restricted',
    [ScraperErrorCode.GEO_BLOCKED]: 'This video is not available in this region',
    [ScraperErrorCode.DURATION_LIMIT]: 'This video is longer than the allowed duration',
    [ScraperErrorCode.NO_MEDIA]: 'No playable stream found',
    [ScraperErrorCode.TIMEOUT]: 'Request timed out. Please try again.',
    [ScraperErrorCode.RATE_LIMITED]: 'Too many requests. Please wait a moment.',
    [ScraperErrorCode.BLOCKED]: 'Request was blocked by YouTube',
    [ScraperErrorCode.NETWORK_ERROR]: 'Network error. Please check the connection.',
    [ScraperErrorCode.API_ERROR]: 'Backend error',
    [ScraperErrorCode.BACKEND_UNAVAILABLE]: 'Backend is not installed on this server',
    [ScraperErrorCode.PARSE_ERROR]: 'Failed to parse backend response',
    [ScraperErrorCode.DOWNLOAD_FAILED]: 'Download failed',
    [ScraperErrorCode.UNKNOWN]: 'An unexpected error occurred',
};

export interface ScraperSuccess<T> {
    success: true;
    data: T;
}

export interface ScraperFailure {
    success: false;
    error: string;
    errorCode: ScraperErrorCode;
}

export type ScraperResult<T> = ScraperSuccess<T> | ScraperFailure;

export function createError(code: ScraperErrorCode, customMessage?: string): ScraperFailure {
    return {
        success: false,
        error: customMessage || ERROR_MESSAGES[code],
        errorCode: code,
    };
}

export function detectErrorCode(error: unknown): ScraperErrorCode {
    const msg = error instanceof Error ? error.message : String(error);
    const lower = msg.toLowerCase();

    if (lower.includes('timeout') || lower.includes('timed out') || lower.includes('aborted')) return ScraperErrorCode.TIMEOUT;
    if (lower.includes('rate limit') || lower.includes('429')) return ScraperErrorCode.RATE_LIMITED;
    if (lower.includes('not a bot') || lower.includes('blocked') || lower.includes('403')) return ScraperErrorCode.BLOCKED;
    if (lower.includes('sign in') || lower.includes('login')) return ScraperErrorCode.COOKIE_REQUIRED;
    if (lower.includes('private')) return ScraperErrorCode.PRIVATE_CONTENT;
    if (lower.includes('not found') || lower.includes('404') || lower.includes('unavailable')) return ScraperErrorCode.NOT_FOUND;
    if (lower.includes('age') && lower.includes('restrict')) return ScraperErrorCode.AGE_RESTRICTED;
    if (lower.includes('econnreset') || lower.includes('enotfound') || lower.includes('network') || lower.includes('socket')) {
        return ScraperErrorCode.NETWORK_ERROR;
    }

    return ScraperErrorCode.UNKNOWN;
}

/** Worth another attempt against the same backend */
export function isRetryable(code: ScraperErrorCode): boolean {
    return [
        ScraperErrorCode.TIMEOUT,
        ScraperErrorCode.NETWORK_ERROR,
        ScraperErrorCode.API_ERROR,
    ].includes(code);
}

/** Upstream is refusing us; the backend should cool down */
export function isBlocking(code: ScraperErrorCode): boolean {
    return [
        ScraperErrorCode.BLOCKED,
        ScraperErrorCode.RATE_LIMITED,
        ScraperErrorCode.COOKIE_REQUIRED,
    ].includes(code);
}

/** Answer is final; another backend would say the same */
export function isTerminal(code: ScraperErrorCode): boolean {
    return [
        ScraperErrorCode.INVALID_URL,
        ScraperErrorCode.INVALID_QUERY,
        ScraperErrorCode.NOT_FOUND,
        ScraperErrorCode.PRIVATE_CONTENT,
        ScraperErrorCode.DURATION_LIMIT,
    ].includes(code);
}
