/**
 * Library entry: the discovery, extraction and download pipeline
 *
 * The command-line runner lives in scrape.ts.
 */

export * from "./types.js";
export {
  ConfigError,
  DEFAULT_CONFIG,
  GENERIC_PROFILE,
  resolveSiteProfile,
  SITE_PROFILES,
  type ScraperConfig,
  type SiteProfile,
} from "./config.js";
export { CookieJar } from "./cookies.js";
export { FetchError, HttpClient, StaticFetcher } from "./http.js";
export { createFetcher, RenderedFetcher } from "./fetcher.js";
export {
  DEFAULT_STRATEGIES,
  discoverChapters,
  DiscoveryContext,
  normalizeChapters,
  type DiscoveryStrategy,
} from "./discovery.js";
export {
  capImageUrls,
  DEFAULT_SOURCES,
  extractImageUrls,
  isValidImageUrl,
  type ChapterDocument,
  type ExtractionSource,
} from "./extract.js";
export { validateCandidates } from "./validate.js";
export { downloadChapter, planDownloads } from "./download.js";
export { downloadSeries, processChapter, runAll, type RunContext } from "./run.js";
export { runPool } from "./pool.js";
export { InterruptToken, sanitizeFilename } from "./utils.js";
