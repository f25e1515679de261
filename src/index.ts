/**
 * YouTube media adapter for Telegram music bots
 *
 * @example
 * const config = loadConfig();
 * const yt = createResolver(config);
 * const link = yt.url(message) ?? extractQuery(message);
 * const info = await yt.details(link ?? '');
 * if (info.success) {
 *     const file = await yt.download(info.data.id, { mode: 'audio' });
 * }
 */

export {
    loadConfig,
    parseMirrorList,
    normalizeMirrorUrls,
    getEnv,
    getEnvOptional,
    isDevelopment,
    ConfigError,
    DEFAULT_MIRRORS,
    APP_NAME,
    type AdapterConfig,
    type AudioFormat,
    type MediaMode,
} from './core/config';

export {
    ScraperErrorCode,
    ERROR_MESSAGES,
    createError,
    isRetryable,
    isBlocking,
    isTerminal,
    type ScraperResult,
    type ScraperSuccess,
    type ScraperFailure,
    type BackendName,
} from './core/scrapers/types';

export type {
    VideoDetails,
    DownloadedMedia,
    DownloadOptions,
    MediaBackend,
    ExecRunner,
} from './lib/types';

export {
    extractUrl,
    extractQuery,
    extractUserTarget,
    isValidUsername,
    ExtractionError,
    type MessageLike,
    type UserTarget,
} from './lib/url/message';

export * from './lib/services/youtube';
export * from './lib/services/thumbnail';

export { RateLimiter, BackendCooldown } from './lib/http/anti-ban';
export { withRetry, type RetryOptions } from './lib/utils/retry';
export { detectError, detectYtDlpError } from './lib/services/shared/error-detector';
export { logger } from './lib/services/shared/logger';
