/**
 * Round-robin over a fixed list of mirror base URLs
 *
 * @module youtube/rotator
 */

import { ConfigError, normalizeMirrorUrls } from '@/core/config';

export class MirrorRotator {
    private readonly mirrors: readonly string[];
    private index = 0;

    constructor(mirrors: readonly string[]) {
        const normalized = normalizeMirrorUrls(mirrors);
        if (normalized.length === 0) {
            throw new ConfigError('Mirror list is empty');
        }
        this.mirrors = normalized;
    }

    get size(): number {
        return this.mirrors.length;
    }

    /** Next mirror, starting at the first */
    next(): string {
        const mirror = this.mirrors[this.index];
        this.index = (this.index + 1) % this.mirrors.length;
        return mirror;
    }
}
