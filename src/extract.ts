/**
 * Image URL extraction from chapter pages
 *
 * Chapter pages are inconsistent: images may sit in lazy-load attributes,
 * inline scripts, CSS backgrounds or an encoded manifest. Each place is an
 * ExtractionSource; the engine folds their results into one ordered,
 * deduplicated, capped list.
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { GENERIC_PROFILE, type SiteProfile } from "./config.js";
import type { RenderedPage } from "./types.js";
import { resolveUrl } from "./utils.js";

/** Extensions an image URL must contain */
export const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp", ".gif"];

/** Image attributes in lookup order; lazy loaders keep the real URL in data-* */
const IMAGE_ATTRIBUTES = ["data-src", "data-original", "data-lazy-src", "data-url", "src"];

const SCRIPT_PATTERNS = [
  /["']([^"']*\.(?:jpg|jpeg|png|webp|gif))["']/gi,
  /["']([^"']*\.(?:jpg|jpeg|png|webp|gif)[^"']*)["']/gi,
  /url["']?\s*:\s*["']([^"']*\.(?:jpg|jpeg|png|webp|gif))["']/gi,
  /src["']?\s*:\s*["']([^"']*\.(?:jpg|jpeg|png|webp|gif))["']/gi,
];

const PAGE_TEXT_PATTERNS = [
  /https?:\/\/[^\s<>"'{}|\\^`[\]]*\.(?:jpg|jpeg|png|webp|gif)/gi,
  /data-[a-zA-Z0-9-]*["']?\s*:\s*["']([^"']*\.(?:jpg|jpeg|png|webp|gif))["']/gi,
  /src["']?\s*=\s*["']([^"']*\.(?:jpg|jpeg|png|webp|gif))["']/gi,
];

const STYLE_PATTERNS = [
  /background-image\s*:\s*url\(["']?([^"')]*\.(?:jpg|jpeg|png|webp|gif))["']?\)/gi,
  /background\s*:\s*[^;]*url\(["']?([^"')]*\.(?:jpg|jpeg|png|webp|gif))["']?\)/gi,
];

/** Classes of containers whose inline style may carry a page image */
const CONTAINER_CLASS = /(chapter|content|page|image|img)/i;

const MANIFEST_PATTERN = /var\s+chapterData\s*=\s*(\{.*?\})\s*;/s;

/** Page numbers tried by the URL-guessing source */
const GUESS_PAGES = 29;

/** Parsed chapter page handed to every source */
export interface ChapterDocument {
  /** URL relative references resolve against */
  url: string;
  html: string;
  $: CheerioAPI;
  site: SiteProfile;
}

/** One place on a page where image URLs can be found */
export interface ExtractionSource {
  readonly name: string;
  /** Only consulted when every earlier source came up empty */
  readonly fallbackOnly?: boolean;
  collect(doc: ChapterDocument): string[];
}

/**
 * Check if URL is usable as an image download target.
 * Requires http(s), a non-empty host and a known image extension somewhere
 * in the URL; blob and data URIs are rejected.
 */
export function isValidImageUrl(url: string): boolean {
  if (!url) return false;
  if (/^(blob|data):/i.test(url)) return false;
  if (!/^https?:\/\//i.test(url)) return false;

  const lower = url.toLowerCase();
  if (!IMAGE_EXTENSIONS.some((ext) => lower.includes(ext))) return false;

  try {
    return new URL(url).host !== "";
  } catch {
    return false;
  }
}

/** Undo the escaping found in inline JSON and HTML attributes */
function unescapeUrl(raw: string): string {
  return raw.trim().replace(/\\\//g, "/").replace(/&amp;/g, "&");
}

/** Run each pattern globally, taking the capture group when there is one */
function matchAllUrls(text: string, patterns: readonly RegExp[], baseUrl: string): string[] {
  const urls: string[] = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const raw = match[1] ?? match[0];
      const absolute = resolveUrl(unescapeUrl(raw), baseUrl);
      if (absolute) urls.push(absolute);
    }
  }
  return urls;
}

export const imageTagSource: ExtractionSource = {
  name: "image tags",
  collect({ $, url }) {
    const reader = $("[class*='reading-content'], [class*='chapter-content']").first();
    const images = reader.length > 0 ? reader.find("img") : $("img");
    const urls: string[] = [];

    images.each((_, img) => {
      for (const attribute of IMAGE_ATTRIBUTES) {
        const value = $(img).attr(attribute);
        if (!value) continue;
        const absolute = resolveUrl(value.trim(), url);
        if (absolute && isValidImageUrl(absolute)) {
          urls.push(absolute);
          break;
        }
      }
    });
    return urls;
  },
};

export const inlineScriptSource: ExtractionSource = {
  name: "inline scripts",
  collect({ $, url }) {
    const urls: string[] = [];
    $("script:not([src])").each((_, script) => {
      const text = $(script).html();
      if (text) urls.push(...matchAllUrls(text, SCRIPT_PATTERNS, url));
    });
    return urls;
  },
};

/**
 * Decode a `var chapterData = {"data": "<base64>", "base": "<url>"}` payload,
 * where `data` is a base64 JSON array of `{ "src": string }` entries.
 *
 * @returns Image URLs in manifest order, or an empty list if the payload is malformed
 */
export function decodeChapterManifest(script: string): string[] {
  const match = script.match(MANIFEST_PATTERN);
  if (!match) return [];

  try {
    const payload: unknown = JSON.parse(match[1]);
    if (typeof payload !== "object" || payload === null) return [];
    const { data, base } = payload as { data?: unknown; base?: unknown };
    if (typeof data !== "string" || typeof base !== "string") return [];

    const decoded: unknown = JSON.parse(Buffer.from(data.replace(/\s+/g, ""), "base64").toString("utf8"));
    if (!Array.isArray(decoded)) return [];

    const root = base.replace(/\/+$/, "");
    const urls: string[] = [];
    for (const entry of decoded) {
      if (typeof entry === "object" && entry !== null && "src" in entry && typeof entry.src === "string") {
        urls.push(`${root}/${entry.src.replace(/^\/+/, "")}`);
      }
    }
    return urls;
  } catch {
    return [];
  }
}

export const chapterManifestSource: ExtractionSource = {
  name: "chapter manifest",
  collect({ $ }) {
    const urls: string[] = [];
    $("script:not([src])").each((_, script) => {
      const text = $(script).html();
      if (text && text.includes("chapterData")) urls.push(...decodeChapterManifest(text));
    });
    return urls;
  },
};

export const pageTextSource: ExtractionSource = {
  name: "page text",
  collect({ html, url }) {
    return matchAllUrls(html, PAGE_TEXT_PATTERNS, url);
  },
};

export const inlineStyleSource: ExtractionSource = {
  name: "inline styles",
  collect({ $, url }) {
    const urls: string[] = [];
    $("div[style], section[style], article[style]").each((_, element) => {
      const className = $(element).attr("class") ?? "";
      if (!CONTAINER_CLASS.test(className)) return;
      urls.push(...matchAllUrls($(element).attr("style") ?? "", STYLE_PATTERNS, url));
    });
    return urls;
  },
};

/**
 * Guess image URLs from the chapter URL using common asset layouts.
 * A last resort with no guarantee; most guesses will not exist.
 */
export const urlTemplateSource: ExtractionSource = {
  name: "url templates",
  fallbackOnly: true,
  collect({ url, site }) {
    const base = url.replace(/[?#].*$/, "").replace(/\/+$/, "");
    const roots = [base.replace("/chapter-", "/images/"), `${base}/images`];
    for (const [from, to] of Object.entries(site.assetHostAliases)) {
      if (base.includes(from)) roots.push(base.replace(from, to));
    }
    roots.push(`${base}/api/images`, `${base}/assets/images`);

    const urls: string[] = [];
    for (const root of roots) {
      for (let i = 1; i <= GUESS_PAGES; i++) {
        const padded = String(i).padStart(3, "0");
        urls.push(
          `${root}/page_${padded}.jpg`,
          `${root}/${padded}.jpg`,
          `${root}/img_${padded}.jpg`,
          `${root}/image_${padded}.jpg`,
          `${root}/page_${i}.jpg`,
        );
      }
    }
    return urls;
  },
};

/** Sources in scan order */
export const DEFAULT_SOURCES: readonly ExtractionSource[] = [
  imageTagSource,
  inlineScriptSource,
  chapterManifestSource,
  pageTextSource,
  inlineStyleSource,
  urlTemplateSource,
];

/**
 * Keep at most `max` URLs. An oversized list keeps its first and last
 * entries (half from each end) rather than being truncated, so a run of
 * real pages at the end is not dropped wholesale.
 */
export function capImageUrls(urls: readonly string[], max: number): string[] {
  if (urls.length <= max) return [...urls];
  const head = Math.ceil(max / 2);
  const tail = max - head;
  return [...urls.slice(0, head), ...(tail > 0 ? urls.slice(urls.length - tail) : [])];
}

/** Options for {@link extractImageUrls} */
export interface ExtractOptions {
  /** Upper bound on returned URLs */
  maxImages: number;
  site?: SiteProfile;
  sources?: readonly ExtractionSource[];
}

/**
 * Extract image URLs from a chapter page.
 * Never throws; a missing page yields an empty list.
 *
 * @returns Absolute image URLs in first-seen order
 */
export function extractImageUrls(page: RenderedPage | null, options: ExtractOptions): string[] {
  if (!page) return [];

  const doc: ChapterDocument = {
    url: page.url,
    html: page.html,
    $: cheerio.load(page.html),
    site: options.site ?? GENERIC_PROFILE,
  };

  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const source of options.sources ?? DEFAULT_SOURCES) {
    if (source.fallbackOnly && ordered.length > 0) continue;

    let found: string[];
    try {
      found = source.collect(doc);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Image source "${source.name}" failed on ${page.url}: ${message}`);
      continue;
    }

    for (const url of found) {
      if (seen.has(url) || !isValidImageUrl(url)) continue;
      seen.add(url);
      ordered.push(url);
    }
  }

  if (ordered.length > options.maxImages) {
    console.warn(`Found ${ordered.length} images, keeping ${options.maxImages} from both ends of the list`);
  }
  return capImageUrls(ordered, options.maxImages);
}
