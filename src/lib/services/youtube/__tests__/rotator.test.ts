import { describe, expect, it } from 'vitest';
import { ConfigError } from '@/core/config';
import { MirrorRotator } from '../rotator';

describe('MirrorRotator', () => {
    it('cycles from the first mirror', () => {
        const rotator = new MirrorRotator(['https://a.example/', 'https://b.example', 'https://a.example']);

        expect(rotator.size).toBe(2);
        expect([rotator.next(), rotator.next(), rotator.next()]).toEqual([
            'https://a.example',
            'https://b.example',
            'https://a.example',
        ]);
    });

    it('refuses an empty list', () => {
        expect(() => new MirrorRotator([])).toThrow(ConfigError);
        expect(() => new MirrorRotator([' ', '/'])).toThrow(ConfigError);
    });
});
