/**
 * Chapter discovery
 *
 * An ordered list of strategies is tried against a series listing until one
 * yields chapters:
 *   1. rendered-DOM anchor scan (rendering fetcher only)
 *   2. range inference from the "read last" link (rendering fetcher only)
 *   3. admin-ajax chapter list endpoint
 *   4. static anchor scan
 * Every strategy's anchors are deduplicated by URL (first seen wins) and then
 * sorted by ordinal.
 */

import * as cheerio from "cheerio";
import type { SiteProfile } from "./config.js";
import type { Chapter, Fetcher } from "./types.js";
import { getBaseUrl, resolveUrl } from "./utils.js";

/** Patterns that expose a numeric series id on Madara-style listing pages */
const SERIES_ID_PATTERNS = [
  /"manga_id"\s*:\s*"(\d+)"/i,
  /data-id="(\d+)"/i,
  /data-postid="(\d+)"/i,
  /postid-(\d+)/,
];

const AJAX_PATH = "/wp-admin/admin-ajax.php";

/** Ordinal key sentinel that sorts before every numbered chapter */
const PROLOGUE = "prologue";

/** Largest chapter number range inference will template */
export const MAX_INFERRED_CHAPTER = 10000;

/**
 * Shared state for one discovery run. The listing page is fetched at most
 * once and reused by every strategy that needs it.
 */
export class DiscoveryContext {
  private listing: Promise<string | null> | null = null;

  constructor(
    readonly seriesUrl: string,
    readonly site: SiteProfile,
    readonly fetcher: Fetcher,
  ) {}

  listingHtml(): Promise<string | null> {
    if (!this.listing) {
      this.listing = this.fetcher.fetchPage(this.seriesUrl).then((page) => page?.html ?? null);
    }
    return this.listing;
  }
}

/** One way of finding a series' chapters; an empty list means "try the next" */
export interface DiscoveryStrategy {
  readonly name: string;
  discover(context: DiscoveryContext): Promise<Chapter[]>;
}

/**
 * Extract the ordinal key from a chapter URL.
 *
 * @example
 * chapterKeyFromUrl('https://example.com/series/x/chapter-12-5/') // '12-5'
 */
export function chapterKeyFromUrl(url: string): string | null {
  const lastSegment = url.replace(/\/+$/, "").split("/").pop() ?? "";
  const match = lastSegment.match(/chapter-([\w-]+)/i);
  return match ? match[1] : null;
}

/**
 * Numeric sort position of an ordinal key: -1 for the prologue, the first
 * integer in the key otherwise, and +Infinity when the key has none.
 */
export function ordinalOf(key: string): number {
  const lower = key.toLowerCase();
  if (lower.includes(PROLOGUE)) return -1;
  const match = lower.match(/(\d+)/);
  return match ? parseInt(match[1], 10) : Number.POSITIVE_INFINITY;
}

/**
 * Deduplicate by URL keeping the first occurrence, then sort by ordinal.
 * The sort is stable, so equal or non-numeric ordinals keep discovery order.
 */
export function normalizeChapters(chapters: readonly Chapter[]): Chapter[] {
  const seen = new Set<string>();
  const unique: Chapter[] = [];
  for (const chapter of chapters) {
    if (seen.has(chapter.url)) continue;
    seen.add(chapter.url);
    unique.push(chapter);
  }
  return unique.sort((a, b) => {
    const left = ordinalOf(a.key);
    const right = ordinalOf(b.key);
    if (left === right) return 0;
    return left < right ? -1 : 1;
  });
}

/**
 * Collect chapter anchors from an HTML document or fragment.
 * An anchor qualifies when its resolved URL's path matches the site's
 * chapter-link shape.
 *
 * @param html - Document or fragment to scan
 * @param baseUrl - URL relative hrefs are resolved against
 * @param site - Site profile giving the chapter-link shape
 */
export function parseChapterAnchors(html: string, baseUrl: string, site: SiteProfile): Chapter[] {
  const $ = cheerio.load(html);
  const chapters: Chapter[] = [];

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href || href.startsWith("#")) return;

    const url = resolveUrl(href, baseUrl);
    if (!url) return;

    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      return;
    }
    if (!site.chapterPath.test(pathname)) return;

    const key = chapterKeyFromUrl(pathname);
    if (!key) return;

    const text = $(element).text().replace(/\s+/g, " ").trim();
    chapters.push({ key, title: text || `Chapter ${key}`, url });
  });

  return chapters;
}

/**
 * Find the "jump to last chapter" anchor and synthesize chapters 0..N by
 * templating the series URL.
 */
export function inferChapterRange(html: string, seriesUrl: string, site: SiteProfile): Chapter[] {
  const $ = cheerio.load(html);
  const labels = site.lastChapterLabels.map((label) => label.toLowerCase());

  let lastHref: string | undefined;
  $("a[href]").each((_, element) => {
    const text = $(element).text().replace(/\s+/g, " ").trim().toLowerCase();
    if (labels.some((label) => text.includes(label))) {
      lastHref = $(element).attr("href");
      return false;
    }
    return undefined;
  });
  if (!lastHref) return [];

  const match = lastHref.match(/chapter-(\d+)/i);
  if (!match) return [];
  const last = parseInt(match[1], 10);
  if (last > MAX_INFERRED_CHAPTER) {
    console.warn(`Ignoring last-chapter link ${lastHref}: chapter ${last} exceeds ${MAX_INFERRED_CHAPTER}`);
    return [];
  }

  const base = seriesUrl.replace(/\/+$/, "") + "/";
  const chapters: Chapter[] = [];
  for (let i = 0; i <= last; i++) {
    chapters.push({ key: String(i), title: `Chapter ${i}`, url: new URL(`chapter-${i}/`, base).href });
  }
  return chapters;
}

/**
 * Pull the numeric series id out of a listing page.
 * Tries inline JSON, data attributes, then the body's `postid-N` class.
 */
export function extractSeriesId(html: string): string | null {
  for (const pattern of SERIES_ID_PATTERNS) {
    const match = html.match(pattern);
    if (match) return match[1];
  }
  return null;
}

/**
 * Series title from the listing page: a heading whose class mentions a title
 * or name, otherwise the first h1/h2.
 */
export function extractSeriesTitle(html: string): string | null {
  const $ = cheerio.load(html);
  const heading = $("h1[class*='title'], h1[class*='name'], h2[class*='title'], h2[class*='name']").first();
  const fallback = $("h1, h2").first();
  const text = (heading.length > 0 ? heading : fallback).text().replace(/\s+/g, " ").trim();
  return text || null;
}

export const renderedAnchorStrategy: DiscoveryStrategy = {
  name: "rendered anchors",
  async discover(context) {
    if (!context.fetcher.rendering) return [];
    const html = await context.listingHtml();
    return html ? parseChapterAnchors(html, context.seriesUrl, context.site) : [];
  },
};

export const chapterRangeStrategy: DiscoveryStrategy = {
  name: "last-chapter range",
  async discover(context) {
    if (!context.fetcher.rendering) return [];
    const html = await context.listingHtml();
    return html ? inferChapterRange(html, context.seriesUrl, context.site) : [];
  },
};

export const ajaxListStrategy: DiscoveryStrategy = {
  name: "admin-ajax",
  async discover(context) {
    const html = await context.listingHtml();
    if (!html) return [];

    const seriesId = extractSeriesId(html);
    if (!seriesId) return [];

    const origin = getBaseUrl(context.seriesUrl);
    const fragment = await context.fetcher.postForm(
      `${origin}${AJAX_PATH}`,
      { action: context.site.ajaxAction, manga: seriesId },
      {
        Referer: context.seriesUrl,
        Origin: origin,
        "X-Requested-With": "XMLHttpRequest",
      },
    );
    return fragment ? parseChapterAnchors(fragment, context.seriesUrl, context.site) : [];
  },
};

export const staticAnchorStrategy: DiscoveryStrategy = {
  name: "static anchors",
  async discover(context) {
    const html = await context.listingHtml();
    return html ? parseChapterAnchors(html, context.seriesUrl, context.site) : [];
  },
};

export const DEFAULT_STRATEGIES: readonly DiscoveryStrategy[] = [
  renderedAnchorStrategy,
  chapterRangeStrategy,
  ajaxListStrategy,
  staticAnchorStrategy,
];

/**
 * Discover the chapters of a series.
 * Never throws: a strategy that fails is logged and skipped, and exhausting
 * every strategy yields an empty list.
 *
 * @param seriesUrl - Listing URL of the series
 * @param site - Site profile for the listing's host
 * @param fetcher - Fetcher used for every request
 * @param strategies - Strategy chain, tried in order
 * @param context - Shared listing cache, when the caller also reads the listing
 */
export async function discoverChapters(
  seriesUrl: string,
  site: SiteProfile,
  fetcher: Fetcher,
  strategies: readonly DiscoveryStrategy[] = DEFAULT_STRATEGIES,
  context: DiscoveryContext = new DiscoveryContext(seriesUrl, site, fetcher),
): Promise<Chapter[]> {
  for (const strategy of strategies) {
    let found: Chapter[];
    try {
      found = await strategy.discover(context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Chapter discovery via ${strategy.name} failed for ${seriesUrl}: ${message}`);
      continue;
    }
    if (found.length > 0) {
      const chapters = normalizeChapters(found);
      console.log(`Found ${chapters.length} chapters via ${strategy.name}`);
      return chapters;
    }
  }

  console.warn(`No chapters found for ${seriesUrl}`);
  return [];
}
