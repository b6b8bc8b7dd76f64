/**
 * lightFetcher.ts — Plain HTTP client for the router's management pages.
 *
 * One request, one attempt: got's own retry is disabled and any transport
 * level failure (timeout, refused connection, DNS) is rethrown as a
 * TransportError.  HTTP status codes are returned to the caller untouched,
 * the session manager decides what they mean.
 *
 * Bodies are decoded with the charset named in Content-Type; older router
 * firmware serves ISO-8859-1.
 */

import { TextDecoder } from 'util';
import { gotScraping } from 'got-scraping';
import { Logger } from '../core/logger';
import { TransportError } from '../core/errors';

const logger = new Logger('LightFetcher');

export interface LightFetchOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  cookieHeader?: string;
  body?: string;
  /** Request timeout in milliseconds. */
  timeout?: number;
  followRedirect?: boolean;
}

export interface LightFetchResult {
  body: string;
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
}

/** The capability the session manager needs; tests substitute a fake. */
export type HttpTransport = (
  url: string,
  options?: LightFetchOptions,
) => Promise<LightFetchResult>;

// ── Charset ──────────────────────────────────────────────

export function charsetOf(contentType: string | undefined): string | null {
  const match = contentType?.match(/charset\s*=\s*"?([\w.:-]+)"?/i);
  return match ? match[1].toLowerCase() : null;
}

function decodeBody(raw: Buffer, contentType: string | undefined): string {
  const charset = charsetOf(contentType) ?? 'utf-8';
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.warn(`Unknown charset "${charset}" (${reason}), decoding as utf-8`);
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(raw);
}

// ── Transport ────────────────────────────────────────────

/**
 * Fetch a URL with got-scraping.
 *
 * @throws TransportError when no HTTP response was received.
 */
export const lightFetch: HttpTransport = async (url, options) => {
  const method = options?.method ?? 'GET';
  logger.debug(`${method} ${url}`);

  const headers: Record<string, string> = {
    ...options?.headers,
  };

  if (options?.cookieHeader) {
    headers['cookie'] = options.cookieHeader;
  }

  try {
    const response = await gotScraping(url, {
      method,
      headers,
      body: options?.body,
      timeout: { request: options?.timeout ?? 2_000 },
      retry: { limit: 0 },
      throwHttpErrors: false,
      followRedirect: options?.followRedirect ?? true,
    });

    logger.debug(`HTTP ${response.statusCode} for ${url}`);

    const body = response.rawBody
      ? decodeBody(response.rawBody, response.headers['content-type'])
      : response.body;

    return {
      body,
      statusCode: response.statusCode,
      headers: response.headers,
    };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TransportError(`${method} ${url} failed: ${reason}`, { cause: err });
  }
};
