/**
 * Logger for the media adapter
 * Clean, consistent, tagged console logging
 */

type LogLevel = 'info' | 'error' | 'debug';

// ═══════════════════════════════════════════════════════════════
// SECURITY: Patterns to detect and redact sensitive data in logs
// ═══════════════════════════════════════════════════════════════

const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
    // Telegram file URLs embed the bot token
    { pattern: /api\.telegram\.org\/file\/bot[^/\s]+/g, replacement: 'api.telegram.org/file/bot[REDACTED]' },
    // Telegram bot tokens (format: 123456789:ABCdefGHI...)
    { pattern: /\d{8,10}:[A-Za-z0-9_-]{35}/g, replacement: '[BOT_TOKEN_REDACTED]' },
    // Proxy / Redis URLs with credentials
    { pattern: /\b(rediss?|https?|socks5h?):\/\/[^\s:@/]+:[^\s@/]+@/gi, replacement: '$1://[CREDENTIALS_REDACTED]@' },
    // Cookie headers / cookie jar lines
    { pattern: /(cookie|SAPISID|__Secure-[\w-]+)['"=:\s]+[^\s;'"]+/gi, replacement: '$1=[REDACTED]' },
    // Generic secrets in env format
    { pattern: /(SECRET|TOKEN|PASSWORD)['"=:\s]+[^\s'"]+/gi, replacement: '$1=[REDACTED]' },
];

/**
 * Sanitize log message to prevent secret leakage
 */
export function sanitizeLogMessage(message: string): string {
    if (!message) return message;

    let sanitized = message;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
        sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
}

const COLORS = {
    info: '\x1b[36m',
    error: '\x1b[31m',
    debug: '\x1b[90m',
    success: '\x1b[32m',
    warn: '\x1b[33m',
    reset: '\x1b[0m',
};

const LOG_LEVELS = { error: 0, info: 1, debug: 2 };

function getLogLevel(): LogLevel {
    const env = process.env.LOG_LEVEL?.toLowerCase();
    if (env === 'error' || env === 'info' || env === 'debug') return env;
    return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= LOG_LEVELS[getLogLevel()];
}

function capitalize(s: string): string {
    return s.charAt(0).toUpperCase() + s.slice(1);
}

function tag(scope: string, sub?: string): string {
    const base = capitalize(scope);
    return sub ? `[${base}.${sub}]` : `[${base}]`;
}

export const logger = {
    url: (scope: string, url: string) => {
        if (shouldLog('info')) console.log(`${COLORS.info}${tag(scope)}${COLORS.reset} URL: ${sanitizeLogMessage(url)}`);
    },

    resolve: (scope: string, query: string, videoId: string) => {
        if (shouldLog('info')) {
            const shown = query.length > 60 ? `${query.substring(0, 60)}...` : query;
            console.log(`${COLORS.info}${tag(scope, 'Resolve')}${COLORS.reset} "${sanitizeLogMessage(shown)}" → ${videoId}`);
        }
    },

    backend: (scope: string, backend: string, operation: string) => {
        if (shouldLog('info')) console.log(`${COLORS.info}${tag(scope, 'Backend')}${COLORS.reset} ${operation} served by ${backend}`);
    },

    meta: (scope: string, data: { title?: string; duration?: string; channel?: string }) => {
        if (!shouldLog('info')) return;
        const parts: string[] = [];
        if (data.title) parts.push(`"${sanitizeLogMessage(data.title.substring(0, 40))}${data.title.length > 40 ? '...' : ''}"`);
        if (data.channel) parts.push(`@${sanitizeLogMessage(data.channel.replace('@', ''))}`);
        if (data.duration) parts.push(data.duration);
        if (parts.length) console.log(`${COLORS.info}${tag(scope, 'Meta')}${COLORS.reset} ${parts.join(' | ')}`);
    },

    complete: (scope: string, timeMs: number) => {
        if (shouldLog('info')) {
            const time = timeMs < 1000 ? `${timeMs}ms` : `${(timeMs / 1000).toFixed(1)}s`;
            console.log(`${COLORS.success}${tag(scope)}${COLORS.reset} ✓ Complete (${time})`);
        }
    },

    cache: (scope: string, hit: boolean, key?: string) => {
        if (shouldLog('debug')) {
            const status = hit ? '✓ Cache hit' : '○ Cache miss';
            const keyInfo = key ? ` [${sanitizeLogMessage(key.substring(0, 50))}${key.length > 50 ? '...' : ''}]` : '';
            console.log(`${COLORS.debug}${tag(scope, 'Cache')}${COLORS.reset} ${status}${keyInfo}`);
        }
    },

    error: (scope: string, error: unknown, errorType?: string) => {
        const msg = error instanceof Error ? error.message : String(error);
        const typeTag = errorType ? ` [${errorType}]` : '';
        console.error(`${COLORS.error}${tag(scope)}${COLORS.reset} ✗${typeTag} ${sanitizeLogMessage(msg)}`);
    },

    warn: (scope: string, message: string) => {
        if (shouldLog('info')) console.log(`${COLORS.warn}${tag(scope)}${COLORS.reset} ⚠ ${sanitizeLogMessage(message)}`);
    },

    debug: (scope: string, message: string) => {
        if (shouldLog('debug')) console.log(`${COLORS.debug}${tag(scope)}${COLORS.reset} ${sanitizeLogMessage(message)}`);
    },
};
