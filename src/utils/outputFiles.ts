/**
 * Output discovery.
 * yt-dlp names its files after the video title, so the job directory is
 * scanned and classified by extension instead of looking up fixed names.
 */

import { readdir } from "fs/promises";
import path from "path";
import { ExtractionError } from "./errors.js";

export const AUDIO_EXTENSION = ".mp3";
export const METADATA_EXTENSION = ".json";
export const THUMBNAIL_EXTENSIONS: readonly string[] = [".jpg", ".jpeg", ".webp", ".png"];

export interface ExtractedArtifacts {
  audioPath: string;
  metadataPath: string | null;
  thumbnailPath: string | null;
}

type Category = "audio" | "metadata" | "thumbnail";

const CATEGORIES: readonly Category[] = ["audio", "metadata", "thumbnail"];

function classify(fileName: string): Category | null {
  const ext = path.extname(fileName).toLowerCase();
  if (ext === AUDIO_EXTENSION) return "audio";
  if (ext === METADATA_EXTENSION) return "metadata";
  if (THUMBNAIL_EXTENSIONS.includes(ext)) return "thumbnail";
  return null;
}

/**
 * Scans a finished job directory.
 * Expects at most one file per category; extras are ignored with a warning.
 * Throws when no audio file was produced.
 */
export async function scanOutputDirectory(dir: string): Promise<ExtractedArtifacts> {
  const entries = await readdir(dir, { withFileTypes: true });
  const found: Record<Category, string[]> = { audio: [], metadata: [], thumbnail: [] };

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const category = classify(entry.name);
    if (category) {
      found[category].push(entry.name);
    }
  }

  for (const category of CATEGORIES) {
    const names = found[category].sort();
    if (names.length > 1) {
      console.warn(`[yt-dlp] Expected one ${category} file in ${dir}, found ${names.length}; using ${names[0]}`);
    }
  }

  const [audio] = found.audio;
  if (!audio) {
    throw new ExtractionError("No audio file produced", "no-audio");
  }

  const [metadata] = found.metadata;
  const [thumbnail] = found.thumbnail;

  return {
    audioPath: path.join(dir, audio),
    metadataPath: metadata ? path.join(dir, metadata) : null,
    thumbnailPath: thumbnail ? path.join(dir, thumbnail) : null,
  };
}
