/**
 * Static HTTP transport and the plain-request Fetcher
 *
 * Requests go through the global fetch with a per-attempt timeout, and
 * transient failures (network errors, 429 and 5xx gateway responses) are
 * retried with exponential backoff.
 */

import { DEFAULT_USER_AGENT } from "./browser.js";
import { CookieJar } from "./cookies.js";
import type { Fetcher, HeaderMap, RenderedPage } from "./types.js";
import { delay, getBaseUrl } from "./utils.js";

/** Statuses worth another attempt */
const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

/** Transport-level retries after the first attempt */
const MAX_RETRIES = 3;

/** Probe timeouts (ms): HEAD first, then a short streamed GET */
const HEAD_TIMEOUT = 6000;
const PROBE_GET_TIMEOUT = 8000;

/**
 * Non-2xx response, or a request that could not complete.
 * `status` is 0 when no response was received.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status: number = 0,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

/** Per-request settings for {@link HttpClient.send} */
export interface RequestOptions {
  method?: "GET" | "HEAD" | "POST";
  headers?: HeaderMap;
  body?: string;
  /** Overrides the client timeout (ms) */
  timeout?: number;
  /** Overrides the client retry count */
  retries?: number;
}

/** Settings shared by every request of a client */
export interface HttpClientOptions {
  /** Per-attempt timeout (ms) */
  timeout: number;
  /** Base backoff delay (ms), doubled on each retry */
  retryDelay?: number;
}

/**
 * HttpClient wraps fetch with timeout and retry handling.
 */
export class HttpClient {
  private readonly timeout: number;
  private readonly retryDelay: number;

  constructor(options: HttpClientOptions) {
    this.timeout = options.timeout;
    this.retryDelay = options.retryDelay ?? 500;
  }

  /**
   * Send a request and hand the successful response to `read`.
   * The timeout covers reading the body as well as the response headers.
   *
   * @throws {FetchError} When the final attempt is not 2xx
   * @throws {Error} When the final attempt fails at the network level
   */
  async send<T>(url: string, options: RequestOptions, read: (response: Response) => Promise<T>): Promise<T> {
    const retries = options.retries ?? MAX_RETRIES;
    let lastError: Error = new FetchError(`Request to ${url} was not attempted`, url);

    for (let attempt = 0; ; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), options.timeout ?? this.timeout);

      try {
        const response = await fetch(url, {
          method: options.method ?? "GET",
          headers: options.headers,
          body: options.body,
          redirect: "follow",
          signal: controller.signal,
        });

        if (response.ok) {
          return await read(response);
        }

        await response.body?.cancel();
        lastError = new FetchError(`HTTP ${response.status}: ${response.statusText}`, url, response.status);
        if (!RETRY_STATUSES.has(response.status)) {
          throw lastError;
        }
      } catch (error) {
        if (error instanceof FetchError && !RETRY_STATUSES.has(error.status)) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));
      } finally {
        clearTimeout(timeoutId);
      }

      if (attempt >= retries) {
        throw lastError;
      }
      await delay(this.retryDelay * 2 ** attempt);
    }
  }
}

/** Settings for {@link StaticFetcher} */
export interface StaticFetcherOptions {
  /** Per-request timeout (ms) */
  timeout: number;
  /** Shared cookie store (also fed by the rendering session) */
  jar: CookieJar;
  /** Base backoff delay (ms) */
  retryDelay?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isImageContentType(contentType: string | null): boolean {
  return !contentType || contentType.toLowerCase().includes("image");
}

/**
 * Fetcher that issues plain HTTP requests with a browser-like header set.
 */
export class StaticFetcher implements Fetcher {
  readonly rendering = false;
  private readonly client: HttpClient;
  private readonly jar: CookieJar;

  constructor(options: StaticFetcherOptions) {
    this.client = new HttpClient({ timeout: options.timeout, retryDelay: options.retryDelay });
    this.jar = options.jar;
  }

  /** Base headers plus the cookies that apply to `url` */
  private withSession(url: string, headers: HeaderMap): HeaderMap {
    const merged: HeaderMap = { "User-Agent": DEFAULT_USER_AGENT, ...headers };
    const cookie = this.jar.headerFor(url);
    if (cookie) merged.Cookie = cookie;
    return merged;
  }

  /**
   * Headers for HTML page requests. Without a referer the page's own site
   * root is sent, as a visitor clicking through from the home page would.
   */
  pageHeaders(url: string, referer?: string): HeaderMap {
    const headers: HeaderMap = {
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
    };
    try {
      if (referer) {
        headers.Referer = referer;
        headers.Origin = getBaseUrl(referer);
      } else {
        headers.Referer = `${getBaseUrl(url)}/`;
      }
    } catch {
      // Unparseable referer: send the page request without it
      delete headers.Referer;
    }
    return this.withSession(url, headers);
  }

  async fetchPage(url: string, referer?: string): Promise<RenderedPage | null> {
    try {
      return await this.client.send(url, { headers: this.pageHeaders(url, referer) }, async (response) => ({
        url: response.url || url,
        html: await response.text(),
        cookies: [],
      }));
    } catch (error) {
      console.warn(`Failed to fetch page ${url}: ${errorMessage(error)}`);
      return null;
    }
  }

  async fetchAsset(url: string, headers: HeaderMap): Promise<Buffer | null> {
    try {
      return await this.client.send(url, { headers: this.withSession(url, headers) }, async (response) => {
        const contentType = response.headers.get("content-type");
        if (!isImageContentType(contentType)) {
          await response.body?.cancel();
          throw new FetchError(`Unexpected content type ${contentType}`, url, response.status);
        }
        return Buffer.from(await response.arrayBuffer());
      });
    } catch (error) {
      console.warn(`Failed to fetch asset ${url}: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * HEAD first; CDNs that reject or mishandle HEAD get a streamed GET that
   * reads only the first chunk of the body.
   */
  async probe(url: string, headers: HeaderMap): Promise<boolean> {
    const requestHeaders = this.withSession(url, headers);
    try {
      const ok = await this.client.send(
        url,
        { method: "HEAD", headers: requestHeaders, timeout: HEAD_TIMEOUT, retries: 1 },
        async (response) => isImageContentType(response.headers.get("content-type")),
      );
      if (ok) return true;
    } catch {
      // Fall through to the GET probe
    }

    try {
      return await this.client.send(
        url,
        { headers: requestHeaders, timeout: PROBE_GET_TIMEOUT, retries: 1 },
        async (response) => {
          if (!isImageContentType(response.headers.get("content-type"))) {
            await response.body?.cancel();
            return false;
          }
          if (response.body) {
            const reader = response.body.getReader();
            await reader.read();
            await reader.cancel();
          }
          return true;
        },
      );
    } catch {
      return false;
    }
  }

  async postForm(url: string, form: Record<string, string>, headers: HeaderMap): Promise<string | null> {
    try {
      return await this.client.send(
        url,
        {
          method: "POST",
          headers: this.withSession(url, {
            "Content-Type": "application/x-www-form-urlencoded; charset=UTF-8",
            ...headers,
          }),
          body: new URLSearchParams(form).toString(),
          retries: 0,
        },
        (response) => response.text(),
      );
    } catch (error) {
      console.warn(`POST ${url} failed: ${errorMessage(error)}`);
      return null;
    }
  }

  async close(): Promise<void> {
    // Nothing to release: fetch keeps no per-fetcher resources
  }
}
