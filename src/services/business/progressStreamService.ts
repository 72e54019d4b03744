/**
 * Progress Stream Service
 *
 * Relays yt-dlp output to the caller as Server-Sent Events while each URL converts.
 *
 * ## SSE Protocol Format
 *
 * Messages are sent as `data: {JSON}\n\n`:
 * ```
 * data: {"type":"progress","url":"https://youtu.be/a","line":"[download]  42.0% of 3.10MiB"}\n\n
 * ```
 *
 * ## Message Types
 *
 * - **progress**: one per yt-dlp stdout line, in the order yt-dlp printed them
 * - **done**: the URL produced an MP3 (`file` is its name)
 * - **error**: the URL was rejected or failed (`message`)
 * - **finished**: the URL's extraction stream is over
 * - **end**: every URL has been handled; the response closes after it
 *
 * URLs are handled one after another. A rejected URL gets an error event and the
 * stream moves on. The stream never carries the audio itself; callers fetch it
 * from POST /api/convert.
 *
 * ## Connection Lifecycle
 *
 * The controller aborts the signal when the client disconnects. The generator stops
 * at the next line, yt-dlp is killed, and the job directory is removed.
 */

import path from "path";
import type { Response } from "express";
import type { AudioExtractor } from "./extractionService.js";
import { tagProducedAudio } from "./metadataService.js";
import { errorMessage } from "../../utils/errors.js";
import { createJobDirectory, removeJobDirectory } from "../../utils/jobDirectory.js";
import { isAllowedUrl } from "../../utils/url.js";

export type ProgressEvent =
  | { type: "progress"; url: string; line: string }
  | { type: "done"; url: string; file: string }
  | { type: "error"; url: string; message: string }
  | { type: "finished"; url: string }
  | { type: "end" };

export interface ProgressStreamOptions {
  extractor: AudioExtractor;
  tmpDir: string;
  signal?: AbortSignal;
}

/**
 * Runs one URL in its own job directory, yielding its events.
 */
async function* convertWithProgress(url: string, options: ProgressStreamOptions): AsyncGenerator<ProgressEvent> {
  const jobDir = await createJobDirectory(options.tmpDir, "stream-");

  try {
    for await (const event of options.extractor.stream(url, jobDir, options.signal)) {
      if (options.signal?.aborted) {
        return;
      }

      if (event.type === "progress") {
        yield { type: "progress", url, line: event.line };
      } else {
        await tagProducedAudio(event.artifacts);
        yield { type: "done", url, file: path.basename(event.artifacts.audioPath) };
      }
    }
  } catch (error) {
    if (options.signal?.aborted) {
      return;
    }
    const message = errorMessage(error);
    console.error(`[sse] ${url} failed: ${message}`);
    yield { type: "error", url, message };
  } finally {
    await removeJobDirectory(jobDir);
  }

  yield { type: "finished", url };
}

/**
 * Every event for a batch, ending with a single `end` event.
 * Stops early, without `end`, once the signal is aborted.
 */
export async function* conversionProgress(
  urls: readonly string[],
  options: ProgressStreamOptions
): AsyncGenerator<ProgressEvent> {
  for (const url of urls) {
    if (options.signal?.aborted) {
      return;
    }

    if (!isAllowedUrl(url)) {
      yield { type: "error", url, message: `URL not allowed: ${url}` };
      continue;
    }

    yield* convertWithProgress(url, options);
  }

  yield { type: "end" };
}

export function formatSseMessage(event: ProgressEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

/**
 * Writes the batch's events to an already-opened SSE response and closes it.
 */
export async function streamConversionProgress(
  urls: readonly string[],
  res: Response,
  options: ProgressStreamOptions
): Promise<void> {
  for await (const event of conversionProgress(urls, options)) {
    if (res.writableEnded || res.destroyed) {
      break;
    }
    res.write(formatSseMessage(event));
  }

  if (!res.writableEnded) {
    res.end();
  }
}
