/**
 * Job working directories.
 * Each request (and each URL inside it) owns its directory exclusively.
 */

import { mkdir, mkdtemp, rm } from "fs/promises";
import path from "path";

/**
 * Creates a fresh, uniquely named directory under baseDir.
 */
export async function createJobDirectory(baseDir: string, prefix: string = "job-"): Promise<string> {
  await mkdir(baseDir, { recursive: true });
  return mkdtemp(path.join(baseDir, prefix));
}

/**
 * Removes a job directory. Failures are logged, never thrown:
 * the startup sweep picks up whatever is left.
 */
export async function removeJobDirectory(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    console.warn(`[cleanup] Failed to remove job directory ${dir}:`, error);
  }
}
