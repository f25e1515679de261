/**
 * HTTP Headers Module
 *
 * UA Strategy:
 * - Desktop Chrome / Firefox pool, rotated round-robin per request
 * - Mirror APIs get JSON headers, media CDNs get browser-like headers
 *
 * @module http/headers
 */

// ═══════════════════════════════════════════════════════════════════════════════
// USER AGENTS
// ═══════════════════════════════════════════════════════════════════════════════

export const UA_DESKTOP_POOL = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:134.0) Gecko/20100101 Firefox/134.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36',
];

let desktopIndex = 0;

/** Get next Desktop UA (round-robin rotation) */
export function getNextDesktopUA(): string {
  const ua = UA_DESKTOP_POOL[desktopIndex];
  desktopIndex = (desktopIndex + 1) % UA_DESKTOP_POOL.length;
  return ua;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HEADERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Headers for JSON endpoints (mirror APIs)
 */
export function httpGetApiHeaders(extra?: Record<string, string>): Record<string, string> {
  return {
    'User-Agent': getNextDesktopUA(),
    'Accept': 'application/json, */*',
    'Accept-Language': 'en-US,en;q=0.9',
    ...extra,
  };
}

/**
 * Headers for media / image downloads
 */
export function httpGetMediaHeaders(referer?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': getNextDesktopUA(),
    'Accept': '*/*',
    'Accept-Language': 'en-US,en;q=0.9',
    'Accept-Encoding': 'identity',
  };
  if (referer) {
    headers['Referer'] = referer;
    headers['Origin'] = new URL(referer).origin;
  }
  return headers;
}
