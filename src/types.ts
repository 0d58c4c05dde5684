/**
 * Shared type definitions for the scraper
 */

/** A titled collection of chapters hosted at a listing URL */
export interface Series {
  /** Display title, used for the output directory name */
  title: string;
  /** Canonical listing URL of the series */
  url: string;
}

/** One chapter of a series */
export interface Chapter {
  /** Ordinal key taken from the chapter URL (e.g. '12', '12-5', 'prologue') */
  key: string;
  /** Chapter title extracted from the anchor text */
  title: string;
  /** Absolute URL of the chapter page; the dedup key */
  url: string;
}

/** A cookie as reported by the rendering session */
export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
}

/** A fetched page, rendered or static */
export interface RenderedPage {
  /** Final URL the HTML was loaded from */
  url: string;
  html: string;
  /** Cookies effective after the load (empty for static fetches) */
  cookies: SessionCookie[];
}

/** Request headers as a plain record */
export type HeaderMap = Record<string, string>;

/**
 * Page and asset retrieval. Implementations never throw from these methods:
 * a failed fetch is reported as `null` (or `false` for probes).
 */
export interface Fetcher {
  /** True while page loads execute scripts in a headless browser */
  readonly rendering: boolean;
  fetchPage(url: string, referer?: string): Promise<RenderedPage | null>;
  fetchAsset(url: string, headers: HeaderMap): Promise<Buffer | null>;
  /** Lightweight reachability and content-type check of an asset */
  probe(url: string, headers: HeaderMap): Promise<boolean>;
  /** POST a urlencoded form and return the response body */
  postForm(url: string, form: Record<string, string>, headers: HeaderMap): Promise<string | null>;
  /** Release any rendering resources */
  close(): Promise<void>;
}

/** One image to download */
export interface DownloadTask {
  /** 1-based page index */
  page: number;
  url: string;
  /** Absolute destination file path */
  dest: string;
  /** Chapter URL sent as Referer */
  referer: string;
}

/** Outcome of one chapter's downloads */
export interface DownloadResult {
  attempted: number;
  succeeded: number;
  /** Tasks that failed after the retry */
  failed: DownloadTask[];
}

/** Per-series result reported at the end of a run */
export interface SeriesReport {
  title: string;
  chaptersFound: number;
  chaptersSucceeded: number;
  /** Elapsed time in milliseconds */
  duration: number;
}
