/**
 * Application Initialization
 * Prepares the temp directory and cookie material before the server accepts requests.
 */

import { chmod, mkdir, writeFile } from "fs/promises";
import path from "path";
import type { AppConfig } from "./env.js";
import { cleanupTempFiles } from "../utils/cleanupTemp.js";

/**
 * Initializes application dependencies on startup.
 * Returns the config with cookiesPath filled in when cookies came from the environment.
 */
export async function initializeApp(config: AppConfig): Promise<AppConfig> {
  console.log("Initializing application...");

  try {
    await mkdir(config.tmpDir, { recursive: true });
    await cleanupTempFiles(config.tmpDir);

    const cookiesPath = await initializeCookies(config);

    console.log("✓ Application initialized successfully\n");
    return { ...config, cookiesPath };
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}

/**
 * Writes cookies from YOUTUBE_COOKIES to a file when no cookie file is configured.
 * The file lives beside the job directories, never inside one.
 */
async function initializeCookies(config: AppConfig): Promise<string | null> {
  if (config.cookiesPath) {
    console.log(`[yt-dlp] Using cookies file ${config.cookiesPath}`);
    return config.cookiesPath;
  }

  if (!config.cookiesContent) {
    console.log("[yt-dlp] No cookies configured - running without authentication");
    console.log("[yt-dlp] ⚠️  May hit bot detection on cloud IPs");
    return null;
  }

  const cookiesPath = path.join(path.dirname(config.tmpDir), "yt2mp3-cookies.txt");
  await writeFile(cookiesPath, config.cookiesContent, { encoding: "utf-8", mode: 0o600 });
  // mode only applies when the file is created
  await chmod(cookiesPath, 0o600);
  console.log(`[yt-dlp] ✓ Cookies initialized at ${cookiesPath}`);
  return cookiesPath;
}
