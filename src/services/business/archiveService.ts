/**
 * Archive Service
 * Bundles produced MP3s into a flat zip.
 */

import archiver from "archiver";
import { createWriteStream } from "fs";
import path from "path";

export const ARCHIVE_NAME = "downloads.zip";

/**
 * Writes a zip at destPath with one entry per file, named by its base name.
 */
export async function createZipArchive(files: readonly string[], destPath: string): Promise<string> {
  const output = createWriteStream(destPath);
  const archive = archiver("zip", { zlib: { level: 9 } });

  const closed = new Promise<void>((resolve, reject) => {
    output.on("close", resolve);
    output.on("error", reject);
    archive.on("error", reject);
  });

  archive.on("warning", (warning) => {
    console.warn("[archive] Warning while zipping:", warning);
  });

  archive.pipe(output);
  for (const file of files) {
    archive.file(file, { name: path.basename(file) });
  }

  await archive.finalize();
  await closed;

  console.log(`[archive] Wrote ${files.length} files to ${path.basename(destPath)} (${archive.pointer()} bytes)`);
  return destPath;
}
