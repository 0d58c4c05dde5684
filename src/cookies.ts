/**
 * Cookie jar shared between the rendering session and static requests
 */

import type { SessionCookie } from "./types.js";

/**
 * Minimal in-memory cookie store. Cookies copied from the browser after each
 * rendered load are replayed on static requests, so CDN challenge tokens
 * acquired while rendering also cover asset downloads.
 */
export class CookieJar {
  private readonly cookies = new Map<string, SessionCookie>();

  /**
   * @param credential - Pre-supplied Cookie header (e.g. 'session=abc; cf=1'),
   *   sent with every request ahead of stored cookies
   */
  constructor(private readonly credential: string | null = null) {}

  /** Insert or replace cookies, keyed by domain, path and name */
  setAll(cookies: readonly SessionCookie[]): void {
    for (const cookie of cookies) {
      if (!cookie.name) continue;
      const domain = cookie.domain.replace(/^\./, "").toLowerCase();
      const path = cookie.path || "/";
      this.cookies.set(`${domain};${path};${cookie.name}`, { ...cookie, domain, path });
    }
  }

  get size(): number {
    return this.cookies.size;
  }

  /**
   * Build the Cookie header value for a request URL.
   *
   * @returns Header value, or null when nothing applies
   */
  headerFor(url: string): string | null {
    let host: string;
    let pathname: string;
    try {
      const parsed = new URL(url);
      host = parsed.hostname.toLowerCase();
      pathname = parsed.pathname || "/";
    } catch {
      return this.credential;
    }

    const pairs: string[] = [];
    if (this.credential) pairs.push(this.credential.trim());
    for (const cookie of this.cookies.values()) {
      const domainMatches = host === cookie.domain || host.endsWith(`.${cookie.domain}`);
      if (domainMatches && pathname.startsWith(cookie.path)) {
        pairs.push(`${cookie.name}=${cookie.value}`);
      }
    }
    return pairs.length > 0 ? pairs.join("; ") : null;
  }
}
