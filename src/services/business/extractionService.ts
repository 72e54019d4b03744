/**
 * Extraction Service
 * Turns one URL into an audio file (plus sidecar and thumbnail) inside a job directory.
 */

import { copyFile } from "fs/promises";
import path from "path";
import { buildYtDlpArgs, runYtDlp, streamYtDlp } from "../external/ytdlp.js";
import { scanOutputDirectory, type ExtractedArtifacts } from "../../utils/outputFiles.js";

export type ExtractionEvent =
  | { type: "progress"; line: string }
  | { type: "complete"; artifacts: ExtractedArtifacts };

/**
 * Seam between the orchestrators and the external tool.
 * Tests provide fakes; production uses createYtDlpExtractor.
 */
export interface AudioExtractor {
  /** Runs to completion and returns the scanned output. */
  extract(url: string, jobDir: string, signal?: AbortSignal): Promise<ExtractedArtifacts>;
  /** Yields one progress event per tool output line, then a single complete event. */
  stream(url: string, jobDir: string, signal?: AbortSignal): AsyncGenerator<ExtractionEvent>;
}

export interface YtDlpExtractorOptions {
  binaryPath: string;
  timeoutMs: number;
  cookiesPath: string | null;
}

/** Name of the per-job cookie copy. */
export const JOB_COOKIES_FILE = "cookies.txt";

/**
 * Copies the shared cookie file into the job directory.
 * yt-dlp rewrites the cookie file it is given, so it only ever sees the copy.
 */
export async function prepareJobCookies(cookiesPath: string | null, jobDir: string): Promise<string | null> {
  if (!cookiesPath) {
    return null;
  }

  const target = path.join(jobDir, JOB_COOKIES_FILE);
  try {
    await copyFile(cookiesPath, target);
    return target;
  } catch (error) {
    console.warn(`[yt-dlp] Could not copy cookies from ${cookiesPath}, continuing without:`, error);
    return null;
  }
}

export function createYtDlpExtractor(options: YtDlpExtractorOptions): AudioExtractor {
  const runOptions = (signal?: AbortSignal) => ({
    binaryPath: options.binaryPath,
    timeoutMs: options.timeoutMs,
    signal,
  });

  return {
    async extract(url, jobDir, signal) {
      const cookiesFile = await prepareJobCookies(options.cookiesPath, jobDir);
      await runYtDlp(buildYtDlpArgs(url, jobDir, cookiesFile), runOptions(signal));
      return scanOutputDirectory(jobDir);
    },

    async *stream(url, jobDir, signal) {
      const cookiesFile = await prepareJobCookies(options.cookiesPath, jobDir);
      for await (const line of streamYtDlp(buildYtDlpArgs(url, jobDir, cookiesFile), runOptions(signal))) {
        yield { type: "progress", line };
      }
      yield { type: "complete", artifacts: await scanOutputDirectory(jobDir) };
    },
  };
}
