/**
 * yt-dlp Process Service
 * Builds the yt-dlp command line and runs it, either to completion or
 * relaying its stdout line by line.
 */

import { execa } from "execa";
import { createInterface } from "readline";
import path from "path";
import { ExtractionError } from "../../utils/errors.js";
import { AUTH_REQUIRED_MESSAGE, isAuthFailure, truncateOutput } from "../../utils/errorMessages.js";

/** File name template: title capped at 200 characters, then the video id. */
export const OUTPUT_TEMPLATE = "%(title).200s [%(id)s].%(ext)s";

export interface YtDlpRunOptions {
  binaryPath: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Arguments for best-quality audio → 192k MP3, with info JSON and a JPG thumbnail.
 */
export function buildYtDlpArgs(url: string, outputDir: string, cookiesFile?: string | null): string[] {
  const args = [
    "--no-playlist",
    "--format", "bestaudio/best",
    "--extract-audio",
    "--audio-format", "mp3",
    "--audio-quality", "192",
    "--output", path.join(outputDir, OUTPUT_TEMPLATE),
    "--write-info-json",
    "--write-thumbnail",
    "--convert-thumbnails", "jpg",
    "--no-warnings",
    "--newline",
  ];

  if (cookiesFile) {
    args.push("--cookies", cookiesFile);
  }

  args.push(url);
  return args;
}

/** The parts of a finished execa run that decide success. */
export interface YtDlpExit {
  exitCode?: number;
  failed: boolean;
  timedOut: boolean;
  isCanceled: boolean;
  stdout: string;
  stderr: string;
  /** Set by execa when the run failed, e.g. a spawn error when the binary is missing. */
  shortMessage?: string;
}

/**
 * Maps a finished (non-throwing) run to an ExtractionError, or null on success.
 */
export function toExtractionError(result: YtDlpExit, timeoutMs: number): ExtractionError | null {
  if (!result.failed && result.exitCode === 0) {
    return null;
  }

  if (result.isCanceled) {
    return new ExtractionError("Extraction cancelled", "cancelled");
  }
  if (result.timedOut) {
    return new ExtractionError(`yt-dlp timed out after ${Math.round(timeoutMs / 1000)}s`, "timeout");
  }

  const output =
    result.stderr || result.stdout || result.shortMessage || `yt-dlp exited with code ${result.exitCode}`;
  if (isAuthFailure(output)) {
    return new ExtractionError(AUTH_REQUIRED_MESSAGE, "auth");
  }
  return new ExtractionError(truncateOutput(output), "failed");
}

/**
 * Runs yt-dlp to completion. Throws ExtractionError on a failed run.
 */
export async function runYtDlp(args: string[], options: YtDlpRunOptions): Promise<void> {
  console.log(`[yt-dlp] Running: ${options.binaryPath} ${args.join(" ")}`);

  const result = await execa(options.binaryPath, args, {
    reject: false,
    timeout: options.timeoutMs,
    signal: options.signal,
  });

  const error = toExtractionError(result, options.timeoutMs);
  if (error) {
    console.error(`[yt-dlp] Failed (${error.kind}): ${error.message}`);
    throw error;
  }
}

/**
 * Runs yt-dlp and yields each stdout line as soon as it is read.
 * Throws ExtractionError after the last line if the run failed.
 * Returning early (consumer stopped) kills the process.
 */
export async function* streamYtDlp(args: string[], options: YtDlpRunOptions): AsyncGenerator<string> {
  console.log(`[yt-dlp] Streaming: ${options.binaryPath} ${args.join(" ")}`);

  const subprocess = execa(options.binaryPath, args, {
    reject: false,
    timeout: options.timeoutMs,
    signal: options.signal,
  });
  // execa only wires its error, timeout and abort handling once the result is awaited.
  const completion = subprocess.then((result) => result);

  let finished = false;
  try {
    if (subprocess.stdout) {
      const lines = createInterface({ input: subprocess.stdout, crlfDelay: Infinity });
      try {
        for await (const line of lines) {
          if (line.trim()) {
            yield line;
          }
        }
      } finally {
        lines.close();
      }
    }

    const result = await completion;
    finished = true;

    const error = toExtractionError(result, options.timeoutMs);
    if (error) {
      console.error(`[yt-dlp] Failed (${error.kind}): ${error.message}`);
      throw error;
    }
  } finally {
    if (!finished) {
      subprocess.kill();
      await completion;
    }
  }
}
