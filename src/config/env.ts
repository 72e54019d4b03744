/**
 * Environment Configuration
 * Builds the typed application config from environment variables.
 * Fails fast at startup if a value is present but malformed.
 */

import os from "os";
import path from "path";

export interface AppConfig {
  /** Server configuration */
  port: number;
  nodeEnv: string;
  /** Allowed cross-origin caller; "*" allows any origin */
  frontendOrigin: string;
  /** Cookie file handed (as a per-job copy) to yt-dlp */
  cookiesPath: string | null;
  /** Raw cookie text, written to a file on startup when cookiesPath is unset */
  cookiesContent: string | null;
  ytdlpPath: string;
  /** Parent directory of every job working directory */
  tmpDir: string;
  extractionTimeoutMs: number;
  maxUrls: number;
  rateLimit: {
    windowMs: number;
    limit: number;
  };
}

/**
 * Reads the configuration once. Pass a custom env in tests.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: getIntEnv(env, "PORT", 3000),
    nodeEnv: env.NODE_ENV || "development",
    frontendOrigin: env.FRONTEND_ORIGIN || "*",
    cookiesPath: env.COOKIES_PATH || null,
    cookiesContent: env.YOUTUBE_COOKIES || null,
    ytdlpPath: env.YTDLP_PATH || "yt-dlp",
    tmpDir: path.resolve(env.TMP_DIR || path.join(os.tmpdir(), "yt2mp3")),
    extractionTimeoutMs: getIntEnv(env, "EXTRACTION_TIMEOUT_SECONDS", 600) * 1000,
    maxUrls: getIntEnv(env, "MAX_URLS", 10),
    rateLimit: {
      windowMs: getIntEnv(env, "RATE_LIMIT_WINDOW_MS", 15 * 60 * 1000),
      limit: getIntEnv(env, "RATE_LIMIT_MAX", 100),
    },
  };
}

/**
 * Parses a positive integer variable, falling back when unset.
 * Throws immediately if the variable is set to something else.
 */
function getIntEnv(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid value for environment variable ${key}: "${raw}"`);
  }
  return value;
}
