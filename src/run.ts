/**
 * Run controller: discovery, extraction, validation and download for each
 * chapter of each series, with pacing and cooperative interruption.
 */

import * as path from "node:path";
import { resolveSiteProfile, type ScraperConfig } from "./config.js";
import { DiscoveryContext, discoverChapters, DEFAULT_STRATEGIES, extractSeriesTitle } from "./discovery.js";
import { downloadChapter, isStorageExhausted, planDownloads } from "./download.js";
import { extractImageUrls } from "./extract.js";
import type { Chapter, Fetcher, Series, SeriesReport } from "./types.js";
import { delay, sanitizeFilename, type InterruptToken } from "./utils.js";
import { validateCandidates } from "./validate.js";

/** Everything a run needs besides its worklist */
export interface RunContext {
  config: ScraperConfig;
  fetcher: Fetcher;
  token: InterruptToken;
  /** Called after each image task of a chapter finishes */
  onProgress?: (done: number, total: number, chapter: Chapter) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Directory name for a chapter.
 *
 * @example
 * chapterDirName({ key: '12-5', title: 'Chapter 12.5', url: '...' }) // 'Chapter 12-5'
 */
export function chapterDirName(chapter: Chapter): string {
  return sanitizeFilename(`Chapter ${chapter.key}`);
}

/**
 * Title to store a series under: the supplied one, else the listing page
 * heading, else the last segment of the listing URL.
 */
export async function resolveSeriesTitle(series: Series, context: DiscoveryContext): Promise<string> {
  if (series.title.trim()) return series.title.trim();

  const html = await context.listingHtml();
  const heading = html ? extractSeriesTitle(html) : null;
  if (heading) return heading;

  const segment = series.url.replace(/[?#].*$/, "").replace(/\/+$/, "").split("/").pop();
  return segment || "series";
}

/**
 * Process one chapter: fetch its page, extract and optionally validate the
 * image URLs, then download them into `chapterDir`.
 *
 * @returns True if at least one image is on disk afterwards
 */
export async function processChapter(chapter: Chapter, chapterDir: string, run: RunContext): Promise<boolean> {
  const { config, fetcher, token } = run;
  const site = resolveSiteProfile(chapter.url);

  const page = await fetcher.fetchPage(chapter.url);
  if (!page) {
    console.warn(`Skipping chapter ${chapter.key}: page could not be fetched (${chapter.url})`);
    return false;
  }

  const candidates = extractImageUrls(page, { maxImages: config.maxImages, site });
  if (candidates.length === 0) {
    console.warn(`No images found for chapter ${chapter.key} (${chapter.url})`);
    return false;
  }

  const urls = await validateCandidates(candidates, {
    fetcher,
    referer: chapter.url,
    enabled: config.validate,
    workers: config.maxWorkers,
    token,
  });
  if (urls.length === 0) {
    console.warn(`No reachable images for chapter ${chapter.key} (${chapter.url})`);
    return false;
  }

  const tasks = planDownloads(urls, chapterDir, chapter.url);
  const result = await downloadChapter(tasks, {
    fetcher,
    workers: config.maxWorkers,
    chapter: chapter.key,
    verify: config.verifyImages,
    onProgress: (done, total) => run.onProgress?.(done, total, chapter),
  });

  console.log(`Downloaded ${result.succeeded}/${result.attempted} images`);
  return result.succeeded > 0;
}

/**
 * Discover and download every chapter of one series.
 * Stops before the next chapter once the run is interrupted; the chapter in
 * progress always finishes.
 */
export async function downloadSeries(series: Series, run: RunContext): Promise<SeriesReport> {
  const { config, fetcher, token } = run;
  const started = Date.now();
  const site = resolveSiteProfile(series.url);
  const context = new DiscoveryContext(series.url, site, fetcher);

  console.log(`\n${series.title || series.url}`);
  const chapters = await discoverChapters(series.url, site, fetcher, DEFAULT_STRATEGIES, context);
  const title = await resolveSeriesTitle(series, context);
  const report: SeriesReport = { title, chaptersFound: chapters.length, chaptersSucceeded: 0, duration: 0 };

  if (config.listOnly) {
    for (const chapter of chapters) {
      console.log(`  ${chapter.key}: ${chapter.title}`);
    }
    console.log(`Total: ${chapters.length} chapters`);
    report.duration = Date.now() - started;
    return report;
  }

  const seriesDir = path.join(config.downloadDir, sanitizeFilename(title));
  for (let i = 0; i < chapters.length; i++) {
    if (token.interrupted) break;

    const chapter = chapters[i];
    console.log(`[${i + 1}/${chapters.length}] Chapter ${chapter.key}: ${chapter.title}`);
    try {
      if (await processChapter(chapter, path.join(seriesDir, chapterDirName(chapter)), run)) {
        report.chaptersSucceeded++;
      }
    } catch (error) {
      if (isStorageExhausted(error)) throw error;
      console.warn(`Chapter ${chapter.key} failed (${chapter.url}): ${errorMessage(error)}`);
    }

    if (i < chapters.length - 1 && !token.interrupted) {
      await delay(config.chapterDelay);
    }
  }

  report.duration = Date.now() - started;
  return report;
}

/**
 * Process a worklist of series in order, then release the fetcher.
 * A series that fails outright is reported with zero chapters and the run
 * moves on; only storage exhaustion propagates.
 */
export async function runAll(seriesList: readonly Series[], run: RunContext): Promise<SeriesReport[]> {
  const reports: SeriesReport[] = [];
  try {
    for (const series of seriesList) {
      if (run.token.interrupted) break;

      const started = Date.now();
      try {
        reports.push(await downloadSeries(series, run));
      } catch (error) {
        if (isStorageExhausted(error)) throw error;
        console.error(`Series ${series.title || series.url} failed: ${errorMessage(error)}`);
        reports.push({
          title: series.title || series.url,
          chaptersFound: 0,
          chaptersSucceeded: 0,
          duration: Date.now() - started,
        });
      }
    }
  } finally {
    await run.fetcher.close();
  }
  return reports;
}
