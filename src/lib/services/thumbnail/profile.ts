/**
 * Telegram profile photos for thumbnail avatars
 */

import type { AxiosInstance } from 'axios';
import type { PhotoSize } from 'grammy/types';
import { httpGetBuffer } from '@/lib/http/client';
import { logger } from '../shared/logger';

export interface ProfilePhotoSource {
    /** Image bytes, or null when the user has no photo */
    fetch(userId: number): Promise<Buffer | null>;
}

/** The two Bot API calls used here; a grammy `Api` satisfies it */
export interface TelegramFileApi {
    getUserProfilePhotos(userId: number, other?: { limit?: number }): Promise<{ photos: PhotoSize[][] }>;
    getFile(fileId: string): Promise<{ file_path?: string }>;
}

export function pickLargestPhoto(sizes: PhotoSize[]): PhotoSize | null {
    if (sizes.length === 0) return null;
    return sizes.reduce((a, b) => (b.width * b.height > a.width * a.height ? b : a));
}

export function telegramFileUrl(token: string, filePath: string): string {
    return `https://api.telegram.org/file/bot${token}/${filePath}`;
}

export class TelegramProfilePhotoSource implements ProfilePhotoSource {
    constructor(
        private readonly api: TelegramFileApi,
        private readonly botToken: string,
        private readonly http: AxiosInstance,
    ) {}

    async fetch(userId: number): Promise<Buffer | null> {
        const { photos } = await this.api.getUserProfilePhotos(userId, { limit: 1 });
        const largest = pickLargestPhoto(photos[0] ?? []);
        if (!largest) {
            logger.debug('thumbnail', `User ${userId} has no profile photo`);
            return null;
        }

        const file = await this.api.getFile(largest.file_id);
        if (!file.file_path) return null;

        const res = await httpGetBuffer(this.http, telegramFileUrl(this.botToken, file.file_path));
        if (res.status !== 200) {
            logger.warn('thumbnail', `Profile photo download failed with HTTP ${res.status}`);
            return null;
        }
        return res.data;
    }
}
