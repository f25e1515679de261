/**
 * Format Utilities
 * Shared formatting for durations, titles and file names
 */

/**
 * Seconds → "m:ss" or "h:mm:ss"
 */
export function formatDuration(seconds: number | undefined, isLive = false): string {
    if (isLive) return 'Live';
    if (seconds === undefined || !Number.isFinite(seconds) || seconds < 0) return '0:00';
    const total = Math.floor(seconds);
    const h = Math.floor(total / 3600);
    const m = Math.floor((total % 3600) / 60);
    const s = total % 60;
    const ss = String(s).padStart(2, '0');
    return h > 0 ? `${h}:${String(m).padStart(2, '0')}:${ss}` : `${m}:${ss}`;
}

/**
 * Non-word runs become a space, then every word is capitalized
 */
export function cleanTitle(title: string): string {
    return title
        .replace(/[^\p{L}\p{N}_]+/gu, ' ')
        .trim()
        .replace(/\p{L}+/gu, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Greedy word wrap. Words longer than the width are split.
 */
export function wrapText(text: string, width = 32): string[] {
    const lines: string[] = [];
    let current = '';
    for (const rawWord of text.split(/\s+/).filter(Boolean)) {
        let word = rawWord;
        while (word.length > width) {
            if (current) {
                lines.push(current);
                current = '';
            }
            lines.push(word.slice(0, width));
            word = word.slice(width);
        }
        if (!word) continue;
        if (!current) {
            current = word;
        } else if (current.length + 1 + word.length <= width) {
            current += ` ${word}`;
        } else {
            lines.push(current);
            current = word;
        }
    }
    if (current) lines.push(current);
    return lines;
}

export function sanitizeFilename(name: string): string {
    return name.replace(/[\\/*?:"<>|]/g, '_');
}

export function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

/**
 * Strip query string / fragment (thumbnail URLs carry cache-busting params)
 */
export function stripQuery(url: string): string {
    return url.split(/[?#]/)[0];
}
