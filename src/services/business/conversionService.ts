/**
 * Conversion Service
 * Runs a batch of URLs through extraction and tagging, one at a time,
 * and decides what the caller gets back.
 */

import path from "path";
import { mkdir } from "fs/promises";
import type { AudioExtractor } from "./extractionService.js";
import { tagProducedAudio } from "./metadataService.js";
import { BadRequestError, errorMessage } from "../../utils/errors.js";
import { findDisallowedUrl } from "../../utils/url.js";

export type ConversionOutcome =
  | { ok: true; url: string; audioPath: string }
  | { ok: false; url: string; error: string };

export interface ConversionFailure {
  url: string;
  error: string;
}

export type Delivery =
  | { kind: "failed"; results: ConversionFailure[] }
  | { kind: "single"; audioPath: string }
  | { kind: "archive"; audioPaths: string[] };

export const ALL_FAILED_MESSAGE = "None of the URLs could be converted";

/**
 * Rejects the whole batch if any URL is outside the allow-list.
 * Shape and count are already checked by the request schema.
 */
export function assertAllowedUrls(urls: readonly string[]): void {
  const disallowed = findDisallowedUrl(urls);
  if (disallowed !== undefined) {
    throw new BadRequestError(`URL not allowed: ${disallowed}`);
  }
}

/**
 * Converts each URL in its own subdirectory of jobDir.
 * One outcome per URL, in input order; a failing URL never stops the batch.
 */
export async function convertUrls(
  urls: readonly string[],
  jobDir: string,
  extractor: AudioExtractor,
  signal?: AbortSignal
): Promise<ConversionOutcome[]> {
  const outcomes: ConversionOutcome[] = [];

  for (const [index, url] of urls.entries()) {
    if (signal?.aborted) {
      outcomes.push({ ok: false, url, error: "Request cancelled" });
      continue;
    }

    try {
      const urlDir = path.join(jobDir, String(index));
      await mkdir(urlDir);

      console.log(`[convert] (${index + 1}/${urls.length}) ${url}`);
      const artifacts = await extractor.extract(url, urlDir, signal);
      await tagProducedAudio(artifacts);

      outcomes.push({ ok: true, url, audioPath: artifacts.audioPath });
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[convert] Failed ${url}: ${message}`);
      outcomes.push({ ok: false, url, error: message });
    }
  }

  return outcomes;
}

/**
 * 0 successes → failure report, 1 → that file, 2+ → archive.
 */
export function decideDelivery(outcomes: readonly ConversionOutcome[]): Delivery {
  const audioPaths: string[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) audioPaths.push(outcome.audioPath);
  }

  if (audioPaths.length === 0) {
    return {
      kind: "failed",
      results: outcomes.flatMap((outcome) => (outcome.ok ? [] : [{ url: outcome.url, error: outcome.error }])),
    };
  }

  if (audioPaths.length === 1) {
    return { kind: "single", audioPath: audioPaths[0] };
  }

  return { kind: "archive", audioPaths };
}
