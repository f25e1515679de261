/**
 * YouTube Resolver
 */
export { YouTubeResolver, createResolver, type ResolverOptions, type DetailsOptions, type ResolverRetryPolicy } from './resolver';

/**
 * Backends
 */
export {
    YtDlpBackend,
    buildMetadataArgs,
    buildStreamArgs,
    buildDownloadArgs,
    STREAM_FORMATS,
    DOWNLOAD_VIDEO_FORMAT,
    type YtDlpBackendOptions,
} from './ytdlp';
export { MirrorBackend, type MirrorBackendOptions } from './mirror';
export { MirrorRotator } from './rotator';

/**
 * YouTube Extractor
 */
export {
    extractYtDlpDetails,
    extractMirrorDetails,
    extractMirrorSearchResult,
    pickMirrorStream,
    type MirrorStream,
} from './extractor';

/**
 * YouTube Storage
 */
export { MetadataCache, createRedisStore, type KeyValueStore } from './storage';

export { transcodeAudio, AUDIO_CODECS } from './postprocess';
export { isYouTubeUrl, extractYouTubeId, normalizeVideoId, watchUrl } from './url';
