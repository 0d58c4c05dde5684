/**
 * Chapter image downloads
 *
 * Tasks are numbered before dispatch so filenames are stable across runs,
 * then fetched with bounded concurrency. Existing files are skipped, which
 * makes re-running a chapter a no-op.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import sharp from "sharp";
import { DOWNLOAD_RETRY_DELAY, RENDER_MAX_WORKERS } from "./config.js";
import { runPool } from "./pool.js";
import type { DownloadResult, DownloadTask, Fetcher } from "./types.js";
import { buildAssetHeaders, delay } from "./utils.js";

const EXTENSION_PATTERN = /\.(jpe?g|png|webp|gif)$/i;
const EMBEDDED_EXTENSION_PATTERN = /\.(jpe?g|png|webp|gif)(?=[^a-z0-9]|$)/i;

/** Attempts per task: the first try plus one retry */
const TASK_ATTEMPTS = 2;

/**
 * File extension for an image URL, defaulting to `.jpg`.
 *
 * @example
 * imageExtension('https://cdn.example.com/a/001.webp?v=2') // '.webp'
 * imageExtension('https://cdn.example.com/image?id=7') // '.jpg'
 */
export function imageExtension(url: string): string {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // Not a URL: inspect the raw string
  }
  const match = pathname.match(EXTENSION_PATTERN) ?? url.match(EMBEDDED_EXTENSION_PATTERN);
  if (!match) return ".jpg";
  return `.${match[1].toLowerCase()}`;
}

/**
 * Turn an ordered URL list into download tasks with 1-based page numbers.
 *
 * @param urls - Image URLs in page order
 * @param chapterDir - Directory the pages are written to
 * @param referer - Chapter URL
 */
export function planDownloads(urls: readonly string[], chapterDir: string, referer: string): DownloadTask[] {
  return urls.map((url, index) => {
    const page = index + 1;
    const filename = `page_${String(page).padStart(3, "0")}${imageExtension(url)}`;
    return { page, url, dest: path.join(chapterDir, filename), referer };
  });
}

/**
 * Check that bytes decode as an image sharp can identify.
 */
export async function isDecodableImage(buffer: Buffer): Promise<boolean> {
  try {
    const metadata = await sharp(buffer).metadata();
    return Boolean(metadata.format);
  } catch {
    return false;
  }
}

async function hasContent(filepath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filepath);
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}

/** Write through a temporary file so a partial write never takes the final name */
async function writeFileAtomic(filepath: string, data: Buffer): Promise<void> {
  const partial = `${filepath}.part`;
  await fs.writeFile(partial, data);
  await fs.rename(partial, filepath);
}

/** Out of disk space or quota: the one failure that ends the run */
export function isStorageExhausted(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOSPC" || error.code === "EDQUOT");
}

/** Settings for {@link downloadChapter} */
export interface DownloadOptions {
  fetcher: Fetcher;
  /** Worker budget; clamped while the fetcher renders */
  workers: number;
  /** Chapter key used in log messages */
  chapter: string;
  /** Require the bytes to be identifiable as an image */
  verify?: boolean;
  /** Pause before the retry (ms) */
  retryDelay?: number;
  /** Called after each task finishes */
  onProgress?: (done: number, total: number) => void;
}

/**
 * Download every task of one chapter.
 *
 * A task whose destination already holds a file counts as succeeded without
 * a fetch. Otherwise the asset is fetched with the chapter as Referer and
 * retried once after a short pause. Failures never affect sibling tasks;
 * only running out of storage is rethrown.
 */
export async function downloadChapter(tasks: readonly DownloadTask[], options: DownloadOptions): Promise<DownloadResult> {
  const workers = options.fetcher.rendering ? Math.min(options.workers, RENDER_MAX_WORKERS) : options.workers;
  const retryDelay = options.retryDelay ?? DOWNLOAD_RETRY_DELAY;
  const verify = options.verify ?? true;

  for (const dir of new Set(tasks.map((task) => path.dirname(task.dest)))) {
    await fs.mkdir(dir, { recursive: true });
  }

  const runTask = async (task: DownloadTask): Promise<boolean> => {
    if (await hasContent(task.dest)) return true;

    const headers = buildAssetHeaders(task.referer);
    for (let attempt = 0; attempt < TASK_ATTEMPTS; attempt++) {
      if (attempt > 0) await delay(retryDelay);

      const bytes = await options.fetcher.fetchAsset(task.url, headers);
      if (!bytes || bytes.length === 0) continue;
      if (verify && !(await isDecodableImage(bytes))) {
        console.warn(`Page ${task.page} of chapter ${options.chapter} is not a readable image: ${task.url}`);
        continue;
      }

      try {
        await writeFileAtomic(task.dest, bytes);
        return true;
      } catch (error) {
        if (isStorageExhausted(error)) throw error;
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Failed to write ${task.dest}: ${message}`);
      }
    }
    return false;
  };

  let done = 0;
  const { results } = await runPool(tasks, runTask, {
    workers,
    onResult: () => {
      done++;
      options.onProgress?.(done, tasks.length);
    },
  });

  const failed = tasks.filter((_, index) => results[index] !== true);
  for (const task of failed) {
    console.warn(`Failed to download page ${task.page} of chapter ${options.chapter}: ${task.url}`);
  }

  return { attempted: tasks.length, succeeded: tasks.length - failed.length, failed };
}
