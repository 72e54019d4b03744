/**
 * Cleanup utility for temporary files
 * Runs on startup to clear job directories left behind by a crashed process.
 */

import { readdir, rm, stat } from "fs/promises";
import path from "path";

export interface CleanupSummary {
  removedDirs: number;
  skipped: number;
}

/**
 * Removes every entry in baseDir older than maxAgeHours.
 */
export async function cleanupTempFiles(
  baseDir: string,
  maxAgeHours: number = 24,
  now: number = Date.now()
): Promise<CleanupSummary> {
  const summary: CleanupSummary = { removedDirs: 0, skipped: 0 };
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;

  let entries: string[];
  try {
    entries = await readdir(baseDir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      console.log("[cleanup] No temp directory found, nothing to clean");
      return summary;
    }
    throw error;
  }

  console.log(`[cleanup] Scanning ${baseDir} for old job directories...`);

  for (const entry of entries) {
    const entryPath = path.join(baseDir, entry);
    try {
      const stats = await stat(entryPath);
      const ageMs = now - stats.mtimeMs;

      if (ageMs <= maxAgeMs) {
        summary.skipped++;
        continue;
      }

      await rm(entryPath, { recursive: true, force: true });
      summary.removedDirs++;
      console.log(`[cleanup] Removed old temp entry: ${entry} (${(ageMs / 3600000).toFixed(1)}h old)`);
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${entry}:`, err);
    }
  }

  console.log(`[cleanup] ✓ Removed ${summary.removedDirs} entries, kept ${summary.skipped}`);
  return summary;
}
