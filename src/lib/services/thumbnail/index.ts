import type { Api } from 'grammy';
import type { AdapterConfig } from '@/core/config';
import { createHttpClient } from '@/lib/http/client';
import type { YouTubeResolver } from '../youtube/resolver';
import { watchUrl } from '../youtube/url';
import { ThumbnailComposer } from './composer';
import { TelegramProfilePhotoSource } from './profile';

export {
    ThumbnailComposer,
    thumbnailPath,
    buildTextOverlay,
    centerCrop,
    roundImage,
    type ThumbKind,
    type ThumbnailComposerOptions,
} from './composer';
export {
    TelegramProfilePhotoSource,
    pickLargestPhoto,
    telegramFileUrl,
    type ProfilePhotoSource,
    type TelegramFileApi,
} from './profile';

/**
 * Composer backed by the resolver for metadata and, when a bot token is
 * configured, Telegram for avatars
 */
export function createThumbnailComposer(config: AdapterConfig, resolver: Pick<YouTubeResolver, 'details'>, api?: Api): ThumbnailComposer {
    const http = createHttpClient(config.httpTimeoutMs);
    const profilePhotos = api && config.telegramBotToken
        ? new TelegramProfilePhotoSource(api, config.telegramBotToken, http)
        : undefined;

    return new ThumbnailComposer({
        config: config.thumbnails,
        cacheDir: config.cacheDir,
        // Cards are drawn for long videos too; the limit is for playback
        details: (videoId) => resolver.details(watchUrl(videoId), { enforceDurationLimit: false }),
        profilePhotos,
        http,
    });
}
