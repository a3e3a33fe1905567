/**
 * http.ts
 *
 * Minimal HTTP client for the release index: JSON metadata requests and
 * streamed asset downloads, both following redirects.
 */

import fs from 'fs';
import http from 'http';
import https from 'https';
import { pipeline } from 'stream/promises';

export type Headers = Record<string, string>;

export interface HttpClient {
  getJson(url: string, headers: Headers): Promise<unknown>;
  download(url: string, headers: Headers, destPath: string): Promise<void>;
}

export interface HttpsClientOptions {
  /** Idle time allowed for a metadata request, in milliseconds. */
  metadataTimeout?: number;
  /** Idle time allowed during a download before it is aborted, in milliseconds. */
  downloadIdleTimeout?: number;
  maxRedirects?: number;
}

export class HttpStatusError extends Error {
  constructor(
    readonly statusCode: number,
    readonly url: string,
  ) {
    super(`HTTP ${statusCode}: ${url}`);
    this.name = 'HttpStatusError';
  }
}

const REDIRECT_CODES = new Set([301, 302, 303, 307, 308]);

/**
 * Headers for a redirect hop. Credentials are only forwarded to the host
 * they were issued for.
 */
export function redirectHeaders(headers: Headers, from: URL, to: URL): Headers {
  if (from.host === to.host) {
    return headers;
  }
  const next: Headers = {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() !== 'authorization') {
      next[name] = value;
    }
  }
  return next;
}

export class HttpsClient implements HttpClient {
  private readonly metadataTimeout: number;
  private readonly downloadIdleTimeout: number;
  private readonly maxRedirects: number;

  constructor(options: HttpsClientOptions = {}) {
    this.metadataTimeout = options.metadataTimeout ?? 30_000;
    this.downloadIdleTimeout = options.downloadIdleTimeout ?? 5 * 60_000;
    this.maxRedirects = options.maxRedirects ?? 5;
  }

  /**
   * `metadataTimeout` bounds the whole exchange, redirects and body included,
   * not just the gaps between received bytes.
   */
  async getJson(url: string, headers: Headers): Promise<unknown> {
    const signal = AbortSignal.timeout(this.metadataTimeout);
    try {
      const response = await this.request(new URL(url), headers, this.metadataTimeout, 0, signal);
      const chunks: Buffer[] = [];
      for await (const chunk of response) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
      const body = Buffer.concat(chunks).toString('utf8');
      return JSON.parse(body);
    } catch (error) {
      if (signal.aborted) {
        throw new Error(`Request timed out after ${this.metadataTimeout}ms: ${url}`, { cause: error });
      }
      throw error;
    }
  }

  async download(url: string, headers: Headers, destPath: string): Promise<void> {
    const response = await this.request(new URL(url), headers, this.downloadIdleTimeout, 0);
    await pipeline(response, fs.createWriteStream(destPath));
  }

  private request(
    url: URL,
    headers: Headers,
    timeout: number,
    redirects: number,
    signal?: AbortSignal,
  ): Promise<http.IncomingMessage> {
    return new Promise((resolve, reject) => {
      const onResponse = (response: http.IncomingMessage): void => {
        const status = response.statusCode ?? 0;
        const location = response.headers.location;

        if (REDIRECT_CODES.has(status) && location) {
          response.resume();
          if (redirects >= this.maxRedirects) {
            reject(new Error(`Too many redirects: ${url.toString()}`));
            return;
          }
          const next = new URL(location, url);
          this.request(next, redirectHeaders(headers, url, next), timeout, redirects + 1, signal)
            .then(resolve, reject);
          return;
        }

        if (status < 200 || status >= 300) {
          response.resume();
          reject(new HttpStatusError(status, url.toString()));
          return;
        }

        resolve(response);
      };

      const options = { headers, timeout, signal };
      const req = url.protocol === 'https:'
        ? https.get(url, options, onResponse)
        : http.get(url, options, onResponse);

      req.on('timeout', () => {
        req.destroy(new Error(`Request timed out after ${timeout}ms: ${url.toString()}`));
      });
      req.on('error', reject);
    });
  }
}
