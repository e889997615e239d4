/**
 * Shared HTTP Client
 *
 * Cookie-aware fetch wrapper used for the portal session:
 * - Cookie jar management with tough-cookie
 * - Redirects followed by hand so every hop's Set-Cookie lands in the jar
 * - Form POST helper (application/x-www-form-urlencoded, field order kept)
 * - Response bodies decoded with the charset the server declares
 *
 * ```typescript
 * const http = createCookieFetch({ timeout: 15000 });
 * const { html } = await http.postForm('https://example.com/login.asp', { user: 'foo', pass: 'bar' });
 * ```
 *
 * Transport failures and timeouts surface as {@link NetworkError}.
 */

import { TextDecoder } from 'node:util';
import { CookieJar, Cookie } from 'tough-cookie';
import { NetworkError } from '../errors.js';
import type { Logger } from './logger.js';

// ============================================================================
// Types
// ============================================================================

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/** Flat, ordered form payload. Field order is preserved on the wire. */
export type FormFields = Readonly<Record<string, string>>;

export interface HttpClientConfig {
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Custom user agent */
  userAgent?: string;
  /** Accept language header */
  acceptLanguage?: string;
  /** Maximum redirects followed per request (default: 10) */
  maxRedirects?: number;
  /** Logger for request tracing at debug level */
  logger?: Logger;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
}

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpResult {
  /** Final HTTP status after redirects */
  status: number;
  /** URL of the final response */
  url: string;
  /** Decoded body */
  html: string;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const DEFAULT_ACCEPT_LANGUAGE = 'ro-RO,ro;q=0.9,en;q=0.8';
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// ============================================================================
// CookieFetch - Fetch wrapper with cookie jar
// ============================================================================

export class CookieFetch {
  private cookieJar: CookieJar;
  private config: Required<Omit<HttpClientConfig, 'logger'>>;
  private logger?: Logger;

  constructor(config: HttpClientConfig = {}) {
    this.cookieJar = new CookieJar();
    this.config = {
      timeout: config.timeout ?? 30000,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      acceptLanguage: config.acceptLanguage ?? DEFAULT_ACCEPT_LANGUAGE,
      maxRedirects: config.maxRedirects ?? 10,
      fetch: config.fetch ?? ((input, init) => fetch(input, init))
    };
    this.logger = config.logger;
  }

  /**
   * Make an HTTP request with automatic cookie handling, following
   * redirects. 301/302/303 switch to GET and drop the body; 307/308
   * repeat the request as-is.
   */
  async request(url: string, options: RequestOptions = {}): Promise<HttpResult> {
    let method = options.method ?? 'GET';
    let body = options.body;
    let currentUrl = url;

    for (let hop = 0; hop <= this.config.maxRedirects; hop++) {
      const response = await this.send(currentUrl, method, body, options.headers);

      const location = response.headers.get('location');
      if (!REDIRECT_STATUSES.has(response.status) || !location) {
        const html = await decodeBody(response);
        return { status: response.status, url: currentUrl, html };
      }

      // Drain the redirect body so the connection can be reused
      await response.arrayBuffer();

      const nextUrl = new URL(location, currentUrl).toString();
      this.log(`[Redirect] ${response.status} -> ${nextUrl}`);

      if (response.status !== 307 && response.status !== 308) {
        method = 'GET';
        body = undefined;
      }
      currentUrl = nextUrl;
    }

    throw new NetworkError(`Too many redirects (>${this.config.maxRedirects}) starting at ${url}`);
  }

  /**
   * GET request that returns the decoded body
   */
  async getHtml(url: string, headers?: Record<string, string>): Promise<HttpResult> {
    return this.request(url, { method: 'GET', headers });
  }

  /**
   * POST url-encoded form data
   */
  async postForm(url: string, formData: FormFields, headers?: Record<string, string>): Promise<HttpResult> {
    const body = new URLSearchParams(Object.entries(formData)).toString();
    return this.request(url, { method: 'POST', headers, body });
  }

  /**
   * Get cookie string for a URL
   */
  async getCookieString(url: string): Promise<string> {
    return this.cookieJar.getCookieString(url);
  }

  /**
   * Set a cookie manually
   */
  async setCookie(cookie: string, url: string): Promise<void> {
    await this.cookieJar.setCookie(cookie, url);
  }

  /**
   * Discard every cookie held for this session
   */
  async clearCookies(): Promise<void> {
    await this.cookieJar.removeAllCookies();
  }

  private async send(
    url: string,
    method: 'GET' | 'POST',
    body: string | undefined,
    extraHeaders: Record<string, string> = {}
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': this.config.acceptLanguage,
      'Cache-Control': 'max-age=0',
      ...extraHeaders
    };

    const cookieString = await this.cookieJar.getCookieString(url);
    if (cookieString) {
      headers['Cookie'] = cookieString;
      this.log(`[Cookie] Sending: ${cookieString.substring(0, 60)}...`);
    }

    if (method === 'POST' && !headers['Content-Type']) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    let response: Response;
    try {
      this.log(`[${method}] ${url}`);
      response = await this.config.fetch(url, {
        method,
        headers,
        body,
        redirect: 'manual',
        signal: controller.signal
      });
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new NetworkError(`Request timeout after ${this.config.timeout}ms: ${method} ${url}`, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`${method} ${url} failed: ${message}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    const setCookieHeaders = response.headers.getSetCookie?.() ?? [];
    for (const header of setCookieHeaders) {
      try {
        await this.cookieJar.setCookie(header, url);
        const cookie = Cookie.parse(header);
        if (cookie) {
          this.log(`[Cookie] Set: ${cookie.key}=${cookie.value.substring(0, 20)}...`);
        }
      } catch (error) {
        this.log(`[Cookie] Rejected "${header.substring(0, 40)}": ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    this.log(`[Response] ${response.status} ${response.statusText}`);
    return response;
  }

  private log(message: string): void {
    this.logger?.debug(message);
  }
}

// ============================================================================
// Body Decoding
// ============================================================================

/**
 * Read the charset parameter of a Content-Type header.
 */
export function charsetOf(contentType: string | null): string | null {
  if (!contentType) return null;
  const match = contentType.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match ? match[1].toLowerCase() : null;
}

/**
 * Decode a response body with its declared charset, UTF-8 otherwise.
 * Legacy ASP pages often declare windows-1250 or iso-8859-2.
 */
export async function decodeBody(response: Response): Promise<string> {
  const buffer = await response.arrayBuffer();
  const charset = charsetOf(response.headers.get('content-type')) ?? 'utf-8';

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    decoder = new TextDecoder('utf-8');
  }
  return decoder.decode(buffer);
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new CookieFetch instance
 */
export function createCookieFetch(config?: HttpClientConfig): CookieFetch {
  return new CookieFetch(config);
}
