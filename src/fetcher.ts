/**
 * Rendering Fetcher and Fetcher selection
 */

import type { Browser, Page } from "puppeteer-core";
import { createPage, launchBrowser } from "./browser.js";
import { RENDER_MAX_WORKERS, type ScraperConfig } from "./config.js";
import { CookieJar } from "./cookies.js";
import { StaticFetcher } from "./http.js";
import type { Fetcher, HeaderMap, RenderedPage, SessionCookie } from "./types.js";
import { delay, getBaseUrl } from "./utils.js";

/** Upper bound on waiting for the network to go quiet after load (ms) */
const NETWORK_IDLE_TIMEOUT = 10000;

/** Controls that reveal more content when clicked */
const LOAD_MORE_PATTERN = "show more|load more|expand";

/** Maximum number of load-more controls clicked per page */
const MAX_LOAD_MORE_CLICKS = 3;

/** Scroll passes used to trigger lazy loading */
const SCROLL_PASSES = 5;
const SCROLL_PAUSE = 400;

/** Settings for {@link RenderedFetcher} */
export interface RenderedFetcherOptions {
  /** Chrome/Chromium executable, or null for the installed Chrome */
  chromePath: string | null;
  /** Settle time after load (ms) */
  renderWait: number;
  /** Click load-more controls and scroll to the bottom */
  interactions: boolean;
  /** Navigation timeout (ms) */
  timeout: number;
}

/**
 * Fetcher that loads pages in a headless browser.
 *
 * The browser is launched on first use and shared by every page load. After
 * each load the page's cookies are copied into the static fetcher's jar.
 * Assets are requested through the browser session first, so they carry every
 * cookie the browser holds for the CDN host; a failed browser request falls
 * back to the static fetcher. At most RENDER_MAX_WORKERS session pages are
 * open for assets and form posts at a time.
 *
 * Any rendering failure falls back to a static fetch of the same URL; a
 * failed launch disables rendering for the rest of the run.
 */
export class RenderedFetcher implements Fetcher {
  private browserPromise: Promise<Browser | null> | null = null;
  private disabled = false;
  private sessionPages = 0;
  private readonly waitingForPage: (() => void)[] = [];

  constructor(
    private readonly options: RenderedFetcherOptions,
    private readonly fallback: StaticFetcher,
    private readonly jar: CookieJar,
  ) {}

  get rendering(): boolean {
    return !this.disabled;
  }

  private acquireBrowser(): Promise<Browser | null> {
    if (!this.browserPromise) {
      this.browserPromise = launchBrowser(this.options.chromePath).catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Failed to launch browser, continuing with plain requests: ${message}`);
        this.disabled = true;
        return null;
      });
    }
    return this.browserPromise;
  }

  async fetchPage(url: string, referer?: string): Promise<RenderedPage | null> {
    const browser = this.disabled ? null : await this.acquireBrowser();
    if (!browser) {
      return this.fallback.fetchPage(url, referer);
    }

    try {
      const page = await createPage(browser);
      try {
        return await this.renderPage(page, url, referer);
      } finally {
        await page.close();
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Rendering failed for ${url}, falling back to plain request: ${message}`);
      return this.fallback.fetchPage(url, referer);
    }
  }

  private async renderPage(page: Page, url: string, referer?: string): Promise<RenderedPage> {
    if (referer) {
      await page.setExtraHTTPHeaders({ Referer: referer });
    }
    await page.goto(url, { waitUntil: "domcontentloaded", timeout: this.options.timeout });

    try {
      await page.waitForNetworkIdle({ idleTime: 500, timeout: NETWORK_IDLE_TIMEOUT });
    } catch {
      // Pages with long-polling never go idle; the fixed settle below still applies
    }
    await delay(this.options.renderWait);

    if (this.options.interactions) {
      await this.revealLazyContent(page);
    }

    const html = await page.content();
    const cookies: SessionCookie[] = (await page.cookies()).map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
    }));
    this.jar.setAll(cookies);

    return { url: page.url(), html, cookies };
  }

  /** Click "load more" style controls, then scroll to the bottom a few times */
  private async revealLazyContent(page: Page): Promise<void> {
    const clicked = await page.evaluate(
      (pattern, maxClicks) => {
        const matcher = new RegExp(pattern, "i");
        const candidates = document.querySelectorAll<HTMLElement>('button, a[href="#"], a:not([href])');
        let count = 0;
        for (const element of candidates) {
          if (count >= maxClicks) break;
          if (matcher.test(element.textContent ?? "")) {
            element.click();
            count++;
          }
        }
        return count;
      },
      LOAD_MORE_PATTERN,
      MAX_LOAD_MORE_CLICKS,
    );
    if (clicked > 0) {
      await delay(500 * clicked);
    }

    for (let i = 0; i < SCROLL_PASSES; i++) {
      await page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
      await delay(SCROLL_PAUSE);
    }
  }

  async fetchAsset(url: string, headers: HeaderMap): Promise<Buffer | null> {
    const bytes = await this.withSessionPage(url, (page) => this.loadAsset(page, url, headers));
    return bytes ?? this.fallback.fetchAsset(url, headers);
  }

  private async loadAsset(page: Page, url: string, headers: HeaderMap): Promise<Buffer | null> {
    const response = await page.goto(url, { referer: headers.Referer, timeout: this.options.timeout });
    if (!response || !response.ok()) return null;

    const contentType = response.headers()["content-type"];
    if (contentType && !contentType.toLowerCase().includes("image")) return null;
    return response.buffer();
  }

  probe(url: string, headers: HeaderMap): Promise<boolean> {
    return this.fallback.probe(url, headers);
  }

  /**
   * Plain POST first; when the site refuses it, repeat the POST from a
   * browser page on the same origin so the session's cookies apply.
   */
  async postForm(url: string, form: Record<string, string>, headers: HeaderMap): Promise<string | null> {
    const body = await this.fallback.postForm(url, form, headers);
    if (body !== null) return body;
    return this.withSessionPage(url, (page) => this.postFromPage(page, url, form, headers));
  }

  private async postFromPage(
    page: Page,
    url: string,
    form: Record<string, string>,
    headers: HeaderMap,
  ): Promise<string | null> {
    await page.goto(headers.Referer ?? `${getBaseUrl(url)}/`, {
      waitUntil: "domcontentloaded",
      timeout: this.options.timeout,
    });
    return page.evaluate(
      async (target, payload, requestedWith) => {
        const response = await fetch(target, {
          method: "POST",
          credentials: "include",
          headers: {
            "Content-Type": "application/x-www-form-urlencoded; charset=UTF-8",
            "X-Requested-With": requestedWith,
          },
          body: payload,
        });
        return response.ok ? response.text() : null;
      },
      url,
      new URLSearchParams(form).toString(),
      headers["X-Requested-With"] ?? "XMLHttpRequest",
    );
  }

  /**
   * Run `work` on a fresh page of the shared browser, with at most
   * RENDER_MAX_WORKERS such pages open. Null when rendering is off or the
   * browser request fails.
   */
  private async withSessionPage<T>(url: string, work: (page: Page) => Promise<T | null>): Promise<T | null> {
    const browser = this.disabled ? null : await this.acquireBrowser();
    if (!browser) return null;

    await this.acquirePageSlot();
    try {
      const page = await createPage(browser);
      try {
        return await work(page);
      } finally {
        await page.close();
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Browser request failed for ${url}, falling back to plain request: ${message}`);
      return null;
    } finally {
      this.releasePageSlot();
    }
  }

  private async acquirePageSlot(): Promise<void> {
    if (this.sessionPages < RENDER_MAX_WORKERS) {
      this.sessionPages++;
      return;
    }
    await new Promise<void>((resolve) => this.waitingForPage.push(resolve));
  }

  /** Hands the slot to the next waiter, if any */
  private releasePageSlot(): void {
    const next = this.waitingForPage.shift();
    if (next) {
      next();
    } else {
      this.sessionPages--;
    }
  }

  async close(): Promise<void> {
    const pending = this.browserPromise;
    this.browserPromise = null;
    if (!pending) return;
    const browser = await pending;
    if (browser) {
      await browser.close();
    }
  }
}

/**
 * Build the Fetcher selected by the configuration.
 * Both variants share one cookie jar seeded with the configured credential.
 */
export function createFetcher(config: ScraperConfig): Fetcher {
  const jar = new CookieJar(config.cookie);
  const staticFetcher = new StaticFetcher({ timeout: config.timeout, jar });
  if (!config.render) {
    return staticFetcher;
  }
  return new RenderedFetcher(
    {
      chromePath: config.chromePath,
      renderWait: config.renderWait,
      interactions: config.renderInteractions,
      timeout: config.timeout,
    },
    staticFetcher,
    jar,
  );
}
