/**
 * Public Invidious-compatible API mirrors used when yt-dlp is blocked.
 * Override with MIRROR_API_URLS.
 */
export const DEFAULT_MIRRORS = [
    'https://inv.nadeko.net',
    'https://invidious.nerdvpn.de',
    'https://invidious.privacyredirect.com',
    'https://invidious.fdn.fr',
    'https://invidious.perennialte.ch',
    'https://yewtu.be',
] as const;
