/**
 * Thumbnail Composer
 *
 * "Now playing" / "added to queue" cards: blurred video thumbnail as the
 * background, a round crop of it in the middle, the requester's avatar and
 * the title / duration underneath. Output is cached per video and user.
 */

import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import type { AxiosInstance } from 'axios';
import type { ThumbnailConfig } from '@/core/config';
import type { ScraperResult } from '@/core/scrapers/types';
import { createHttpClient, httpGetBuffer } from '@/lib/http/client';
import type { VideoDetails } from '@/lib/types';
import { cleanTitle, escapeXml, sanitizeFilename, wrapText } from '@/lib/utils/format-utils';
import { logger } from '../shared/logger';
import type { ProfilePhotoSource } from './profile';

// ═══════════════════════════════════════════════════════════════
// LAYOUT
// ═══════════════════════════════════════════════════════════════

export const CANVAS = { width: 1280, height: 720 };
export const BLUR_SIGMA = 17.6; // ≈ box blur radius 30
export const BRIGHTNESS = 0.6;
export const CROP_SIZE = 500;
export const LOGO = { size: 365, left: Math.floor((1280 - 365) / 2) + 2, top: 138 };
export const AVATAR = { size: 107, left: 710, top: 427 };
export const TITLE_WIDTH = 32;

export type ThumbKind = 'playing' | 'queue';

const HEADERS: Record<ThumbKind, { text: string; x: number; y: number; stroke: string; strokeWidth: number }> = {
    playing: { text: 'STARTED PLAYING', x: 450, y: 25, stroke: 'grey', strokeWidth: 3 },
    queue: { text: 'ADDED TO QUEUE', x: 455, y: 25, stroke: 'black', strokeWidth: 5 },
};

const DEFAULT_TITLE = 'Unsupported Title';
const DEFAULT_DURATION = 'Unknown';

export function thumbnailPath(cacheDir: string, kind: ThumbKind, videoId: string, userId: number | string): string {
    const prefix = kind === 'queue' ? 'que' : '';
    return path.join(cacheDir, `${prefix}${sanitizeFilename(videoId)}_${sanitizeFilename(String(userId))}.png`);
}

/**
 * Text layer. y values are the top of each line, as in the layout above.
 */
export function buildTextOverlay(kind: ThumbKind, title: string, duration: string, fontFamily: string): string {
    const header = HEADERS[kind];
    const lines = wrapText(title, TITLE_WIDTH).slice(0, 2);
    const font = escapeXml(fontFamily);
    const titleRows = [530, 580]
        .slice(0, lines.length)
        .map((y, i) =>
            `<text x="640" y="${y + 45}" text-anchor="middle" font-size="45" fill="white" stroke="white" stroke-width="1">${escapeXml(lines[i])}</text>`
        );

    return [
        `<svg xmlns="http://www.w3.org/2000/svg" width="${CANVAS.width}" height="${CANVAS.height}" font-family="${font}">`,
        `<text x="${header.x}" y="${header.y + 45}" font-size="45" fill="white" stroke="${header.stroke}" stroke-width="${header.strokeWidth}" paint-order="stroke">${header.text}</text>`,
        ...titleRows,
        `<text x="640" y="${660 + 30}" text-anchor="middle" font-size="30" fill="white">Duration: ${escapeXml(duration)} Mins</text>`,
        '</svg>',
    ].join('');
}

function ellipseMask(size: number): Buffer {
    const r = size / 2;
    return Buffer.from(
        `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}"><ellipse cx="${r}" cy="${r}" rx="${r}" ry="${r}" fill="#fff"/></svg>`
    );
}

/** Stretched to size × size, then masked to a circle */
export async function roundImage(input: Buffer, size: number): Promise<Buffer> {
    return sharp(input)
        .resize(size, size, { fit: 'fill' })
        .ensureAlpha()
        .composite([{ input: ellipseMask(size), blend: 'dest-in' }])
        .png()
        .toBuffer();
}

/**
 * Centered square of min(500, w, h) pixels
 */
export async function centerCrop(input: Buffer): Promise<Buffer> {
    const { width = 0, height = 0 } = await sharp(input).metadata();
    const size = Math.min(CROP_SIZE, width, height);
    if (size <= 0) throw new Error('Thumbnail has no pixels');
    return sharp(input)
        .extract({
            left: Math.floor((width - size) / 2),
            top: Math.floor((height - size) / 2),
            width: size,
            height: size,
        })
        .png()
        .toBuffer();
}

async function readIfExists(filePath: string | undefined): Promise<Buffer | null> {
    if (!filePath) return null;
    try {
        return await fs.readFile(filePath);
    } catch {
        return null;
    }
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await fs.stat(filePath)).isFile();
    } catch {
        return false;
    }
}

// ═══════════════════════════════════════════════════════════════
// COMPOSER
// ═══════════════════════════════════════════════════════════════

export interface ThumbnailComposerOptions {
    config: ThumbnailConfig;
    cacheDir: string;
    /** Metadata by video id, normally resolver.details */
    details: (videoId: string) => Promise<ScraperResult<VideoDetails>>;
    profilePhotos?: ProfilePhotoSource;
    http?: AxiosInstance;
}

export class ThumbnailComposer {
    private readonly config: ThumbnailConfig;
    private readonly cacheDir: string;
    private readonly details: (videoId: string) => Promise<ScraperResult<VideoDetails>>;
    private readonly profilePhotos?: ProfilePhotoSource;
    private readonly http: AxiosInstance;

    constructor(options: ThumbnailComposerOptions) {
        this.config = options.config;
        this.cacheDir = options.cacheDir;
        this.details = options.details;
        this.profilePhotos = options.profilePhotos;
        this.http = options.http ?? createHttpClient();
    }

    genThumb(videoId: string, userId: number): Promise<string | null> {
        return this.generate('playing', videoId, userId);
    }

    genQueueThumb(videoId: string, userId: number): Promise<string | null> {
        return this.generate('queue', videoId, userId);
    }

    private async generate(kind: ThumbKind, videoId: string, userId: number): Promise<string | null> {
        const outputPath = thumbnailPath(this.cacheDir, kind, videoId, userId);
        if (await isFile(outputPath)) return outputPath;

        try {
            const avatar = await this.loadAvatar(userId);
            if (!avatar) return null;

            const { title, duration, thumbnailUrl } = await this.loadMetadata(videoId);
            const thumbnail = thumbnailUrl ? await this.downloadThumbnail(thumbnailUrl) : null;
            if (!thumbnail) {
                logger.warn('thumbnail', `No thumbnail image for ${videoId}`);
                return this.fallback();
            }

            const image = await this.compose(kind, thumbnail, avatar, title, duration);
            await fs.mkdir(this.cacheDir, { recursive: true });
            await fs.writeFile(outputPath, image);
            return outputPath;
        } catch (error) {
            logger.error('thumbnail', error, kind === 'queue' ? 'QUEUE' : 'PLAYING');
            return this.fallback();
        }
    }

    async compose(kind: ThumbKind, thumbnail: Buffer, avatar: Buffer, title: string, duration: string): Promise<Buffer> {
        const background = await sharp(thumbnail)
            .resize(CANVAS.width, CANVAS.height, { fit: 'fill' })
            .blur(BLUR_SIGMA)
            .modulate({ brightness: BRIGHTNESS })
            .ensureAlpha()
            .png()
            .toBuffer();

        const logo = await roundImage(await centerCrop(thumbnail), LOGO.size);
        const roundAvatar = await roundImage(avatar, AVATAR.size);

        const layers: sharp.OverlayOptions[] = [
            { input: logo, left: LOGO.left, top: LOGO.top },
            { input: roundAvatar, left: AVATAR.left, top: AVATAR.top },
        ];

        const overlay = await readIfExists(this.config.overlayPath);
        if (overlay) {
            const frame = await sharp(overlay).resize(CANVAS.width, CANVAS.height, { fit: 'fill' }).png().toBuffer();
            layers.push({ input: frame, left: 0, top: 0 });
        }

        layers.push({
            input: Buffer.from(buildTextOverlay(kind, title, duration, this.config.fontFamily)),
            left: 0,
            top: 0,
        });

        return sharp(background).composite(layers).png().toBuffer();
    }

    private async loadAvatar(userId: number): Promise<Buffer | null> {
        if (this.profilePhotos) {
            try {
                const photo = await this.profilePhotos.fetch(userId);
                if (photo) return photo;
            } catch (error) {
                logger.error('thumbnail', error, 'PROFILE');
            }
        }
        const fallback = await readIfExists(this.config.fallbackPath);
        if (!fallback) logger.warn('thumbnail', `Fallback image missing: ${this.config.fallbackPath}`);
        return fallback;
    }

    private async loadMetadata(videoId: string): Promise<{ title: string; duration: string; thumbnailUrl?: string }> {
        const result = await this.details(videoId);
        if (!result.success) {
            logger.warn('thumbnail', `Metadata unavailable for ${videoId}: ${result.error}`);
            return { title: DEFAULT_TITLE, duration: DEFAULT_DURATION };
        }
        return {
            title: cleanTitle(result.data.title) || DEFAULT_TITLE,
            duration: result.data.duration,
            thumbnailUrl: result.data.thumbnail,
        };
    }

    private async downloadThumbnail(url: string): Promise<Buffer | null> {
        try {
            const res = await httpGetBuffer(this.http, url);
            return res.status === 200 ? res.data : null;
        } catch (error) {
            logger.error('thumbnail', error, 'DOWNLOAD');
            return null;
        }
    }

    private async fallback(): Promise<string | null> {
        return (await isFile(this.config.fallbackPath)) ? this.config.fallbackPath : null;
    }
}
