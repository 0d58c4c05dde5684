/**
 * Utility functions for the scraper
 * Extracted for testability
 */

import type { HeaderMap, Series } from "./types.js";

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks, run when a second signal forces exit */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent the forced-exit path from running twice */
let isExiting = false;

/**
 * Process-wide interruption flag. Set once by a signal handler and only read
 * by the pipeline; it is never cleared.
 */
export class InterruptToken {
  private flag = false;

  get interrupted(): boolean {
    return this.flag;
  }

  interrupt(): void {
    this.flag = true;
  }
}

/**
 * Register a cleanup callback to be called when the process is forced to exit.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 */
export function onInterrupt(callback: CleanupCallback): void {
  cleanupCallbacks.push(callback);
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * The first signal sets the interruption token so the run winds down after
 * the current chapter; a second signal runs cleanup callbacks and exits.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Download")
 * @param token - Token observed by the running pipeline
 */
export function setupSignalHandlers(commandName: string, token: InterruptToken): void {
  const handler = async (signal: string) => {
    if (!token.interrupted) {
      token.interrupt();
      console.warn(`\n${commandName} interrupted. Finishing the current chapter and exiting...`);
      return;
    }
    if (isExiting) return;
    isExiting = true;

    console.warn(`\n${commandName} aborted.`);

    for (const callback of cleanupCallbacks) {
      try {
        await callback();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Cleanup failed during shutdown: ${message}`);
      }
    }

    // 128 + signal number: SIGINT = 2, SIGTERM = 15
    const exitCode = signal === "SIGINT" ? 130 : 143;
    process.exit(exitCode);
  };

  process.on("SIGINT", () => void handler("SIGINT"));
  process.on("SIGTERM", () => void handler("SIGTERM"));
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Make a title safe to use as a single path segment.
 * Replaces characters reserved on common filesystems with underscores.
 *
 * @example
 * sanitizeFilename('Chapter 1: Start?') // 'Chapter 1_ Start_'
 */
export function sanitizeFilename(title: string): string {
  return (
    title
      .replace(/[<>:"/\\|?*\x00-\x1f]/g, "_")
      .replace(/\s+/g, " ")
      .trim()
      .replace(/^\.+$/, "_")
      .slice(0, 120)
  );
}

/**
 * Extract the origin (protocol + host) from a full URL.
 *
 * @throws {TypeError} If URL is invalid
 *
 * @example
 * getBaseUrl('https://example.com/path/to/page') // 'https://example.com'
 * getBaseUrl('http://localhost:3000/page') // 'http://localhost:3000'
 */
export function getBaseUrl(url: string): string {
  const parsed = new URL(url);
  return `${parsed.protocol}//${parsed.host}`;
}

/**
 * Resolve a possibly relative reference against a base URL.
 *
 * @returns Absolute URL, or null if it cannot be resolved
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Headers for image requests. Hotlink-protected CDNs check that Referer and
 * Origin point at the reading page.
 *
 * @param referer - Page the image is embedded in
 */
export function buildAssetHeaders(referer: string): HeaderMap {
  const headers: HeaderMap = {
    Accept: "image/avif,image/webp,image/apng,image/*,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.9",
    Referer: referer,
  };
  try {
    headers.Origin = getBaseUrl(referer);
  } catch {
    // Referer without a parseable origin is still sent as-is
  }
  return headers;
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(65000) // '1m 5s'
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Check if a boolean flag is present in arguments.
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/**
 * Get a nullable string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--title')
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: string): string | null {
  let result: string | null = null;
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value && !value.startsWith("--")) {
      result = value;
    }
  }
  return result;
}

/**
 * Get a string argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--download-dir')
 * @param defaultValue - Default value if flag not found
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  return getNullableStringArg(args, flag) ?? defaultValue;
}

/**
 * Get a number argument value from command line arguments.
 * A value that is present but not a number is returned as NaN so that
 * callers can reject it instead of silently using the default.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--delay')
 * @param defaultValue - Default value if flag not found
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  const raw = getNullableStringArg(args, flag);
  if (raw === null) return defaultValue;
  return /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
}

/**
 * Get all positional (non-flag) arguments.
 * Skips values that follow flags (e.g., in '--delay 1000', skips '1000').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 */
export function getPositionalArgs(args: string[], knownFlags: string[] = []): string[] {
  const positional: string[] = [];
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }
  return positional;
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: "URL is required" };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { isValid: false, error: "URL must use http or https protocol" };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: "Invalid URL format" };
  }
}

/** Result of series list validation */
export type SeriesListValidation = { isValid: true; series: Series[] } | { isValid: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate the structure of a series list file.
 * Expects an array of objects with string `title` and http(s) `url`.
 *
 * @example
 * validateSeriesList([{ title: 'A', url: 'https://example.com/a/' }]) // { isValid: true, series: [...] }
 * validateSeriesList({}) // { isValid: false, error: 'Series list must be an array' }
 */
export function validateSeriesList(data: unknown): SeriesListValidation {
  if (!Array.isArray(data)) {
    return { isValid: false, error: "Series list must be an array" };
  }

  const series: Series[] = [];
  for (let i = 0; i < data.length; i++) {
    const entry: unknown = data[i];
    if (!isRecord(entry)) {
      return { isValid: false, error: `series[${i}] must be an object` };
    }

    const { title, url } = entry;
    if (typeof title !== "string") {
      return { isValid: false, error: `series[${i}].title must be a string` };
    }

    if (typeof url !== "string") {
      return { isValid: false, error: `series[${i}].url must be a string` };
    }

    const urlCheck = validateUrl(url);
    if (!urlCheck.isValid) {
      return { isValid: false, error: `series[${i}].url: ${urlCheck.error}` };
    }

    series.push({ title, url });
  }

  return { isValid: true, series };
}
