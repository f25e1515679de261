/**
 * execFile wrapper shared by the yt-dlp backend and the ffmpeg post-processor.
 * Never goes through a shell.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ExecRunner } from '@/lib/types';

const execFileAsync = promisify(execFile);

const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024;

export const defaultExecRunner: ExecRunner = async (file, args, options = {}) => {
    const { stdout, stderr } = await execFileAsync(file, args, {
        timeout: options.timeout,
        maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
        encoding: 'utf8',
        windowsHide: true,
    });
    return { stdout, stderr };
};

export interface ExecFailure {
    message: string;
    stderr: string;
    /** Process was killed (timeout) */
    killed: boolean;
    /** Binary not found */
    missing: boolean;
}

/**
 * Read the fields execFile attaches to its rejection
 */
export function describeExecError(error: unknown): ExecFailure {
    const message = error instanceof Error ? error.message : String(error);
    if (typeof error !== 'object' || error === null) {
        return { message, stderr: '', killed: false, missing: false };
    }
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
    const killed = 'killed' in error && error.killed === true;
    const timedOut = 'code' in error && error.code === 'ETIMEDOUT';
    const missing = 'code' in error && error.code === 'ENOENT';
    return { message, stderr, killed: killed || timedOut, missing };
}
