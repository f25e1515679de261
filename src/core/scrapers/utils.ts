/**
 * Scraper Utilities
 * Narrowing helpers for untyped backend payloads (yt-dlp JSON, mirror API JSON).
 *
 * @module core/scrapers/utils
 */

export type JsonRecord = Record<string, unknown>;

/**
 * Safe JSON parse - handles both string and already-parsed data
 */
export function parseJson(data: unknown): unknown {
    if (data === null || data === undefined || data === '') return null;
    if (typeof data !== 'string') return data;
    try { return JSON.parse(data); } catch { return null; }
}

export function asRecord(value: unknown): JsonRecord | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) return null;
    const record: JsonRecord = {};
    for (const [key, entry] of Object.entries(value)) record[key] = entry;
    return record;
}

export function asArray(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

export function readString(obj: JsonRecord, key: string): string | undefined {
    const value = obj[key];
    if (typeof value === 'string' && value.trim()) return value;
    return undefined;
}

/** Numbers may arrive as strings (Invidious bitrates, for one) */
export function readNumber(obj: JsonRecord, key: string): number | undefined {
    const value = obj[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() && Number.isFinite(Number(value))) return Number(value);
    return undefined;
}

export function readBoolean(obj: JsonRecord, key: string): boolean {
    return obj[key] === true;
}
