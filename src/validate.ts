/**
 * Optional reachability check of candidate image URLs
 */

import { runPool } from "./pool.js";
import type { Fetcher } from "./types.js";
import { buildAssetHeaders, type InterruptToken } from "./utils.js";

/** Settings for {@link validateCandidates} */
export interface ValidateOptions {
  fetcher: Fetcher;
  /** Chapter URL sent as Referer */
  referer: string;
  /** When false every candidate passes through unchecked */
  enabled: boolean;
  workers: number;
  token: InterruptToken;
}

/**
 * Probe each candidate and keep the ones that answer with an image.
 * Once the run is interrupted no further probes start; probes already in
 * flight are awaited and only completed results are kept.
 *
 * @returns Surviving URLs in their original order
 */
export async function validateCandidates(urls: readonly string[], options: ValidateOptions): Promise<string[]> {
  if (!options.enabled || urls.length === 0) return [...urls];

  const headers = buildAssetHeaders(options.referer);
  const { results, stopped } = await runPool(urls, (url) => options.fetcher.probe(url, headers), {
    workers: options.workers,
    shouldStop: () => options.token.interrupted,
  });

  const valid = urls.filter((_, index) => results[index] === true);
  if (stopped) {
    console.warn(`Validation interrupted after ${results.filter((r) => r !== undefined).length}/${urls.length} probes`);
  }
  console.log(`Validated ${valid.length}/${urls.length} image URLs`);
  return valid;
}
