/**
 * HTTP Client Module
 *
 * Pooled axios client plus the three request shapes the adapter needs:
 * JSON GET (mirror APIs), binary GET (thumbnails, avatars) and streamed
 * download to disk (mirror media).
 *
 * @module http/client
 */

import axios, { type AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import fs from 'fs';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { logger } from '@/lib/services/shared/logger';
import { httpGetApiHeaders, httpGetMediaHeaders } from './headers';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface HttpGetOptions {
  timeout?: number;
  headers?: Record<string, string>;
  params?: Record<string, string>;
}

export interface HttpResponse<T> {
  data: T;
  status: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONNECTION POOL CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

const POOL_CONFIG = {
  keepAlive: true,
  keepAliveMsecs: 30 * 1000,
  maxSockets: 20,
  maxFreeSockets: 5,
  timeout: 60000,
  scheduling: 'fifo' as const,
};

// ═══════════════════════════════════════════════════════════════════════════════
// AXIOS CLIENT - with Connection Pooling
// ═══════════════════════════════════════════════════════════════════════════════

export function createHttpClient(timeout = 15000): AxiosInstance {
  const client = axios.create({
    timeout,
    maxRedirects: 5,
    // Status is inspected by the caller (error detector), never thrown
    validateStatus: () => true,
    decompress: true,
    httpAgent: new http.Agent(POOL_CONFIG),
    httpsAgent: new https.Agent(POOL_CONFIG),
  });

  client.interceptors.response.use(
    (res) => {
      logger.debug('http', `${res.status} ${res.config.url ?? ''}`);
      return res;
    },
    (err: unknown) => {
      if (axios.isAxiosError(err) && err.code === 'ECONNABORTED') {
        logger.warn('http', `Timeout: ${err.config?.url ?? ''}`);
      }
      return Promise.reject(err);
    }
  );

  return client;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HTTP METHODS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * GET JSON. Body is returned as text so the error detector can read it on failure.
 */
export async function httpGetJson(
  client: AxiosInstance,
  url: string,
  options: HttpGetOptions = {}
): Promise<HttpResponse<string>> {
  const res = await client.get<unknown>(url, {
    timeout: options.timeout,
    params: options.params,
    headers: httpGetApiHeaders(options.headers),
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
  });
  const data = typeof res.data === 'string' ? res.data : JSON.stringify(res.data ?? '');
  return { data, status: res.status };
}

/**
 * GET binary body (images)
 */
export async function httpGetBuffer(
  client: AxiosInstance,
  url: string,
  options: HttpGetOptions = {}
): Promise<HttpResponse<Buffer>> {
  const res = await client.get<ArrayBuffer>(url, {
    timeout: options.timeout,
    headers: { ...httpGetMediaHeaders(), ...options.headers },
    responseType: 'arraybuffer',
  });
  return { data: Buffer.from(res.data), status: res.status };
}

/**
 * Stream a response body to disk. Returns the HTTP status; the file is only
 * written for 2xx responses.
 */
export async function httpDownloadToFile(
  client: AxiosInstance,
  url: string,
  filePath: string,
  options: HttpGetOptions = {}
): Promise<number> {
  const res = await client.get<Readable>(url, {
    timeout: options.timeout,
    headers: { ...httpGetMediaHeaders(), ...options.headers },
    responseType: 'stream',
  });
  if (res.status < 200 || res.status >= 300) {
    // Release the pooled socket; the error body is not needed
    res.data.destroy();
    return res.status;
  }
  await pipeline(res.data, fs.createWriteStream(filePath));
  return res.status;
}
