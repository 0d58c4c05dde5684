/**
 * Run configuration and built-in site profiles
 */

/** Tunables for a scraping run */
export interface ScraperConfig {
  /** Root directory for downloaded series */
  downloadDir: string;
  /** Delay between chapters (ms) */
  chapterDelay: number;
  /** Load pages in a headless browser */
  render: boolean;
  /** Settle time after a rendered page loads (ms) */
  renderWait: number;
  /** Click "load more" controls and scroll to the bottom while rendering */
  renderInteractions: boolean;
  /** Probe image URLs before downloading */
  validate: boolean;
  /** Worker budget for validation and downloads */
  maxWorkers: number;
  /** Upper bound on image URLs kept per chapter */
  maxImages: number;
  /** Per-request timeout (ms) */
  timeout: number;
  /** Pre-supplied Cookie header sent with every static request */
  cookie: string | null;
  /** Chrome/Chromium executable for rendering */
  chromePath: string | null;
  /** Require downloaded bytes to be identifiable as an image */
  verifyImages: boolean;
  /** Only print discovered chapters */
  listOnly: boolean;
}

export const DEFAULT_CONFIG: ScraperConfig = {
  downloadDir: "downloads",
  chapterDelay: 1000,
  render: false,
  renderWait: 1500,
  renderInteractions: true,
  validate: false,
  maxWorkers: 6,
  maxImages: 100,
  timeout: 30000,
  cookie: null,
  chromePath: null,
  verifyImages: true,
  listOnly: false,
};

/** Concurrency ceiling while a shared browser context is in use */
export const RENDER_MAX_WORKERS = 2;

/** Delay before the single task-level retry of a failed download (ms) */
export const DOWNLOAD_RETRY_DELAY = 300;

/** Describes where a site keeps its chapters and images */
export interface SiteProfile {
  name: string;
  /** Hosts served by this profile (without "www.") */
  hosts: string[];
  /** Matches the path of a chapter URL */
  chapterPath: RegExp;
  /** admin-ajax action that returns the chapter list fragment */
  ajaxAction: string;
  /** Anchor labels that point at the newest chapter */
  lastChapterLabels: string[];
  /** Host substitutions tried by the URL-guessing extraction source */
  assetHostAliases: Record<string, string>;
}

export const GENERIC_PROFILE: SiteProfile = {
  name: "generic",
  hosts: [],
  chapterPath: /\/chapter-[^/]+\/?$/i,
  ajaxAction: "manga_get_chapters",
  lastChapterLabels: ["read last", "last chapter", "newest chapter"],
  assetHostAliases: {},
};

export const SITE_PROFILES: SiteProfile[] = [
  {
    name: "manhwaread",
    hosts: ["manhwaread.com"],
    chapterPath: /^\/manhwa\/[^/]+\/chapter-[^/]+\/?$/i,
    ajaxAction: "manga_get_chapters",
    lastChapterLabels: ["read last", "last chapter"],
    assetHostAliases: { "manhwaread.com": "mancover.xyz" },
  },
  {
    name: "toongod",
    hosts: ["toongod.org"],
    chapterPath: /^\/webtoon\/[^/]+\/chapter-[^/]+\/?$/i,
    ajaxAction: "manga_get_chapters",
    lastChapterLabels: ["read last"],
    assetHostAliases: {},
  },
];

/**
 * Pick the site profile for a listing URL, falling back to the generic one.
 *
 * @example
 * resolveSiteProfile('https://www.toongod.org/webtoon/x/').name // 'toongod'
 */
export function resolveSiteProfile(url: string): SiteProfile {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase().replace(/^www\./, "");
  } catch {
    return GENERIC_PROFILE;
  }
  return SITE_PROFILES.find((profile) => profile.hosts.includes(host)) ?? GENERIC_PROFILE;
}

/** Invalid configuration detected before the run starts */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
