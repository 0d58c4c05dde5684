#!/usr/bin/env node
/**
 * Download chapter images of manhwa/webtoon series
 *
 * Usage: npm run scrape -- <series-url> [options]
 * Example: npm run scrape -- https://example.com/manhwa/some-series/ --render --validate
 *
 * Options:
 *   --series <file>       JSON list of { title, url } series
 *   --title <title>       Title for a single series URL
 *   --download-dir <dir>  Output root (default: downloads)
 *   --delay ms            Delay between chapters (default: 1000)
 *   --render              Load pages in headless Chrome
 *   --validate            Probe image URLs before downloading
 *   --list-only           Print discovered chapters without downloading
 */

import * as fs from "node:fs/promises";
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { ConfigError, DEFAULT_CONFIG, type ScraperConfig } from "./config.js";
import { createFetcher } from "./fetcher.js";
import { runAll } from "./run.js";
import type { Series, SeriesReport } from "./types.js";
import {
  formatDuration,
  getNullableStringArg,
  getNumberArg,
  getPositionalArgs,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  InterruptToken,
  onInterrupt,
  setupSignalHandlers,
  validateSeriesList,
  validateUrl,
} from "./utils.js";

/** Exit code of a run that was interrupted by a signal */
export const EXIT_INTERRUPTED = 130;

/** Parsed command line */
export interface CliOptions {
  /** Positional series listing URLs */
  urls: string[];
  /** Title for a single positional URL */
  title: string | null;
  /** Path of a JSON series list */
  seriesFile: string | null;
  config: ScraperConfig;
  /** Whether to show help and exit */
  showHelp: boolean;
}

/**
 * Print usage information for the scrape command.
 */
function showUsage(): void {
  console.log("Usage: npm run scrape -- <series-url>... [options]");
  console.log("       npm run scrape -- --series <file.json> [options]");
  console.log("");
  console.log("Discover the chapters of each series and download their images.");
  console.log("");
  console.log("Options:");
  console.log("  --series <file>        JSON array of { title, url } series");
  console.log("  --title <title>        Title for a single series URL");
  console.log("  --download-dir <dir>   Output root (default: downloads)");
  console.log("  --delay <ms>           Delay between chapters (default: 1000)");
  console.log("  --render               Load pages in headless Chrome");
  console.log("  --wait <ms>            Settle time after a rendered load (default: 1500)");
  console.log("  --no-scroll            Skip load-more clicks and scrolling while rendering");
  console.log("  --chrome-path <path>   Chrome/Chromium binary (or CHROME_PATH)");
  console.log("  --validate             Probe image URLs before downloading");
  console.log("  --max-workers <n>      Concurrent probes/downloads (default: 6)");
  console.log("  --max-images <n>       Image URLs kept per chapter (default: 100)");
  console.log("  --timeout <ms>         Request timeout (default: 30000)");
  console.log('  --cookie "<a=b; c=d>"  Cookie header sent with every request');
  console.log("  --no-verify            Keep downloads sharp cannot identify as images");
  console.log("  --list-only            Print discovered chapters without downloading");
  console.log("  --help, -h             Show this help message");
  console.log("");
  console.log("Example:");
  console.log("  npm run scrape -- https://example.com/manhwa/some-series/ --render --validate");
}

/** Flags that take values, used for positional argument detection */
const SCRAPER_VALUE_FLAGS = [
  "--series",
  "--title",
  "--download-dir",
  "--delay",
  "--wait",
  "--chrome-path",
  "--max-workers",
  "--max-images",
  "--timeout",
  "--cookie",
];

/**
 * Parse command line arguments for the scrape command.
 * Numeric values are not checked here; see {@link validateConfig}.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @param env - Environment consulted for CHROME_PATH
 */
export function parseArgs(args: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): CliOptions {
  return {
    urls: getPositionalArgs(args, SCRAPER_VALUE_FLAGS),
    title: getNullableStringArg(args, "--title"),
    seriesFile: getNullableStringArg(args, "--series"),
    config: {
      downloadDir: getStringArg(args, "--download-dir", DEFAULT_CONFIG.downloadDir),
      chapterDelay: getNumberArg(args, "--delay", DEFAULT_CONFIG.chapterDelay),
      render: hasFlag(args, "--render"),
      renderWait: getNumberArg(args, "--wait", DEFAULT_CONFIG.renderWait),
      renderInteractions: !hasFlag(args, "--no-scroll"),
      validate: hasFlag(args, "--validate"),
      maxWorkers: getNumberArg(args, "--max-workers", DEFAULT_CONFIG.maxWorkers),
      maxImages: getNumberArg(args, "--max-images", DEFAULT_CONFIG.maxImages),
      timeout: getNumberArg(args, "--timeout", DEFAULT_CONFIG.timeout),
      cookie: getNullableStringArg(args, "--cookie"),
      chromePath: getNullableStringArg(args, "--chrome-path") ?? (env.CHROME_PATH || null),
      verifyImages: !hasFlag(args, "--no-verify"),
      listOnly: hasFlag(args, "--list-only"),
    },
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Reject numeric settings that are missing, negative or zero where a
 * positive count is required.
 *
 * @throws {ConfigError} On the first invalid setting
 */
export function validateConfig(config: ScraperConfig): ScraperConfig {
  const nonNegative: [string, number][] = [
    ["--delay", config.chapterDelay],
    ["--wait", config.renderWait],
  ];
  const positive: [string, number][] = [
    ["--max-workers", config.maxWorkers],
    ["--max-images", config.maxImages],
    ["--timeout", config.timeout],
  ];

  for (const [flag, value] of nonNegative) {
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError(`${flag} must be a non-negative integer`);
    }
  }
  for (const [flag, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${flag} must be a positive integer`);
    }
  }
  return config;
}

/**
 * Read and validate a JSON series list.
 *
 * @throws {ConfigError} If the file cannot be read, parsed or validated
 */
export async function loadSeriesList(filepath: string): Promise<Series[]> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(filepath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read series list ${filepath}: ${message}`);
  }

  const validation = validateSeriesList(data);
  if (!validation.isValid) {
    throw new ConfigError(`Invalid series list ${filepath}: ${validation.error}`);
  }
  return validation.series;
}

/**
 * Build the worklist from a series file or positional URLs.
 * An empty title means "derive it from the listing page".
 *
 * @throws {ConfigError} On an invalid URL, file, or a --title given with several URLs
 */
export async function resolveSeriesInput(options: CliOptions): Promise<Series[]> {
  const series = options.seriesFile ? await loadSeriesList(options.seriesFile) : [];

  for (const url of options.urls) {
    const urlValidation = validateUrl(url);
    if (!urlValidation.isValid) {
      throw new ConfigError(`${url}: ${urlValidation.error}`);
    }
  }
  if (options.title !== null && options.urls.length !== 1) {
    throw new ConfigError("--title needs exactly one series URL");
  }

  return [...series, ...options.urls.map((url) => ({ title: options.title ?? "", url }))];
}

/**
 * Display a progress bar in the terminal.
 * Shows percentage, counts, and current item title.
 *
 * @param current - Current item number (1-based)
 * @param total - Total number of items
 * @param title - Title of the current item being processed
 */
export function progressBar(current: number, total: number, title: string): void {
  const barWidth = 30;
  const percent = Math.round((current / total) * 100);
  const filled = Math.round((current / total) * barWidth);
  const empty = barWidth - filled;
  const bar = "=".repeat(filled) + " ".repeat(empty);

  // Truncate title to fit in terminal
  const maxTitleLen = 40;
  const shortTitle = title.length > maxTitleLen ? `${title.slice(0, maxTitleLen - 3)}...` : title.padEnd(maxTitleLen);

  process.stdout.write(`\r[${bar}] ${percent.toString().padStart(3)}% (${current}/${total}) ${shortTitle}`);

  if (current === total) {
    process.stdout.write("\n");
  }
}

/**
 * Print the per-series summary and return the exit code.
 * 0 when any chapter succeeded (or only listing was asked for), 1 when
 * nothing succeeded, 130 after an interrupted run.
 */
export function printRunSummary(
  reports: SeriesReport[],
  { interrupted, listOnly }: { interrupted: boolean; listOnly: boolean },
): number {
  console.log("\nSummary:");
  for (const report of reports) {
    const counts = listOnly
      ? `${report.chaptersFound} chapters`
      : `${report.chaptersSucceeded}/${report.chaptersFound} chapters`;
    console.log(`  ${report.title}: ${counts} (${formatDuration(report.duration)})`);
  }

  if (interrupted) {
    console.log("Run interrupted before completion.");
    return EXIT_INTERRUPTED;
  }
  if (listOnly) return 0;

  const succeeded = reports.reduce((sum, report) => sum + report.chaptersSucceeded, 0);
  return succeeded > 0 ? 0 : 1;
}

/**
 * Parse arguments, run every series and summarize.
 *
 * @param args - Command line arguments
 * @param token - Interruption token observed by the run
 * @returns Process exit code
 */
export async function runCli(args: string[], token: InterruptToken): Promise<number> {
  const options = parseArgs(args);

  if (options.showHelp) {
    showUsage();
    return 0;
  }

  let config: ScraperConfig;
  let series: Series[];
  try {
    config = validateConfig(options.config);
    series = await resolveSeriesInput(options);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (series.length === 0) {
    showUsage();
    return 1;
  }

  const fetcher = createFetcher(config);

  // Close the browser if a second signal forces exit mid-run
  onInterrupt(() => fetcher.close());

  const reports = await runAll(series, {
    config,
    fetcher,
    token,
    onProgress: (done, total, chapter) => progressBar(done, total, `Chapter ${chapter.key}`),
  });
  return printRunSummary(reports, { interrupted: token.interrupted, listOnly: config.listOnly });
}

/**
 * Main entry point for the scraper.
 *
 * @throws Exits with code 1 on configuration errors or when nothing was downloaded
 */
export async function main(): Promise<void> {
  const token = new InterruptToken();
  setupSignalHandlers("Download", token);

  const exitCode = await runCli(process.argv.slice(2), token);
  process.exit(exitCode);
}

function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Only run main when executed directly (not when imported for testing)
if (isDirectRun()) {
  main().catch((error: unknown) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
