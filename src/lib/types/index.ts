import type { BackendName, ScraperResult } from '@/core/scrapers/types';
import type { AudioFormat, MediaMode } from '@/core/config';

export type { MediaMode, AudioFormat } from '@/core/config';
export type { BackendName } from '@/core/scrapers/types';

/**
 * Canonical video metadata, identical whichever backend produced it
 */
export interface VideoDetails {
    id: string;
    title: string;
    duration: string;          // "m:ss" / "h:mm:ss" / "Live"
    durationSeconds: number;   // 0 for live streams
    thumbnail: string;         // query string stripped
    link: string;
    channel: string;
    views?: number;
    isLive: boolean;
}

export interface DownloadOptions {
    mode?: MediaMode;
    audioFormat?: AudioFormat;
}

export interface DownloadedMedia {
    id: string;
    filePath: string;
    mode: MediaMode;
    backend: BackendName | 'cache';
    cached: boolean;
}

/** Lookup key: either a known video id or free search text */
export type DetailsTarget =
    | { kind: 'id'; id: string }
    | { kind: 'search'; query: string };

/**
 * One source of metadata / streams / files. Implementations never throw for
 * upstream failures; they return ScraperResult failures instead.
 */
export interface MediaBackend {
    readonly name: BackendName;
    lookup(id: string): Promise<ScraperResult<VideoDetails>>;
    search(query: string): Promise<ScraperResult<VideoDetails>>;
    streamUrl(id: string, mode: MediaMode): Promise<ScraperResult<string>>;
    download(id: string, mode: MediaMode, audioFormat: AudioFormat): Promise<ScraperResult<string>>;
}

/**
 * Child-process runner (execFile shape). Rejects with an error carrying
 * stderr / code / killed on non-zero exit.
 */
export interface ExecResult {
    stdout: string;
    stderr: string;
}

export interface ExecOptions {
    timeout?: number;
    maxBuffer?: number;
}

export type ExecRunner = (file: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;
