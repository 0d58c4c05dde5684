/**
 * Browser management utilities for puppeteer-core
 *
 * Kept apart from the fetchers to keep launch settings testable.
 */

import puppeteer, { type Browser, type Page } from "puppeteer-core";

/**
 * Realistic Chrome user agent to avoid bot detection.
 * Shared by the browser and the static HTTP client so both look alike.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36";

/** Default viewport dimensions for the browser page */
export const DEFAULT_VIEWPORT = { width: 1280, height: 800 };

/** Sandbox flags disabled for compatibility in Docker/CI environments */
export const BROWSER_ARGS = ["--no-sandbox", "--disable-setuid-sandbox", "--disable-dev-shm-usage"];

/**
 * Launch a new headless browser instance.
 * Uses the given executable, or the locally installed stable Chrome.
 *
 * @param executablePath - Chrome/Chromium binary, or null to use the Chrome channel
 */
export function launchBrowser(executablePath: string | null): Promise<Browser> {
  if (executablePath) {
    return puppeteer.launch({ headless: true, args: BROWSER_ARGS, executablePath });
  }
  return puppeteer.launch({ headless: true, args: BROWSER_ARGS, channel: "chrome" });
}

/**
 * Create a new page with realistic browser settings.
 * Sets user agent and viewport to mimic a real Chrome browser.
 *
 * @param browser - Browser instance to create the page in
 */
export async function createPage(browser: Browser): Promise<Page> {
  const page = await browser.newPage();
  await page.setUserAgent(DEFAULT_USER_AGENT);
  await page.setViewport(DEFAULT_VIEWPORT);
  return page;
}
