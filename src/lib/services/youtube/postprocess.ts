/**
 * Audio post-processing with ffmpeg (mirror downloads arrive as m4a / webm)
 *
 * @module youtube/postprocess
 */

import fs from 'fs/promises';
import type { AudioFormat } from '@/core/config';
import { createError, ScraperErrorCode, type ScraperResult } from '@/core/scrapers/types';
import type { ExecRunner } from '@/lib/types';
import { defaultExecRunner, describeExecError } from '../shared/exec';
import { logger } from '../shared/logger';

export const AUDIO_CODECS: Record<AudioFormat, { codec: string; bitrate: string }> = {
    mp3: { codec: 'libmp3lame', bitrate: '192k' },
    m4a: { codec: 'aac', bitrate: '192k' },
    opus: { codec: 'libopus', bitrate: '128k' },
};

const FFMPEG_TIMEOUT = 5 * 60 * 1000;

export function buildTranscodeArgs(input: string, output: string, format: AudioFormat): string[] {
    const { codec, bitrate } = AUDIO_CODECS[format];
    return ['-y', '-hide_banner', '-loglevel', 'error', '-i', input, '-vn', '-c:a', codec, '-b:a', bitrate, output];
}

export interface TranscodeOptions {
    ffmpegBinary?: string;
    runner?: ExecRunner;
    /** Delete the input once the output is written */
    removeInput?: boolean;
}

export async function transcodeAudio(
    input: string,
    output: string,
    format: AudioFormat,
    options: TranscodeOptions = {}
): Promise<ScraperResult<string>> {
    const { ffmpegBinary = 'ffmpeg', runner = defaultExecRunner, removeInput = true } = options;

    try {
        await runner(ffmpegBinary, buildTranscodeArgs(input, output, format), { timeout: FFMPEG_TIMEOUT });
    } catch (error) {
        // A killed or failed ffmpeg can leave a truncated file behind
        if (input !== output) await fs.rm(output, { force: true });
        const failure = describeExecError(error);
        if (failure.missing) return createError(ScraperErrorCode.BACKEND_UNAVAILABLE, 'ffmpeg is not installed');
        if (failure.killed) return createError(ScraperErrorCode.TIMEOUT, 'ffmpeg timed out');
        logger.error('ffmpeg', failure.stderr || failure.message, 'TRANSCODE');
        return createError(ScraperErrorCode.DOWNLOAD_FAILED, 'Audio conversion failed');
    }

    if (removeInput && input !== output) {
        await fs.rm(input, { force: true });
    }
    return { success: true, data: output };
}
