/**
 * Metadata Service
 * Tags a produced MP3 from its yt-dlp sidecar. Never fails the conversion:
 * every problem ends up in the log and in the returned TaggingResult.
 */

import { readFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { embedMetadata, type VideoInfo } from "../external/id3.js";
import { errorMessage } from "../../utils/errors.js";
import type { ExtractedArtifacts } from "../../utils/outputFiles.js";

export type TaggingResult =
  | { status: "tagged" }
  | { status: "skipped"; reason: string }
  | { status: "failed"; reason: string };

const optionalText = z.string().nullish().catch(null);

/** Only the fields we tag with; the rest of the info JSON is ignored. */
const videoInfoSchema = z.object({
  title: optionalText,
  artist: optionalText,
  uploader: optionalText,
  album: optionalText,
  webpage_url: optionalText,
});

async function readVideoInfo(metadataPath: string): Promise<VideoInfo> {
  const raw: unknown = JSON.parse(await readFile(metadataPath, "utf-8"));
  return videoInfoSchema.parse(raw);
}

export async function tagProducedAudio(artifacts: ExtractedArtifacts): Promise<TaggingResult> {
  const fileName = path.basename(artifacts.audioPath);

  if (!artifacts.metadataPath) {
    console.warn(`[id3] No info JSON for ${fileName}, skipping tags`);
    return { status: "skipped", reason: "No metadata file" };
  }

  try {
    const info = await readVideoInfo(artifacts.metadataPath);
    await embedMetadata(artifacts.audioPath, info, artifacts.thumbnailPath);
    console.log(`[id3] Tagged ${fileName}`);
    return { status: "tagged" };
  } catch (error) {
    const reason = errorMessage(error);
    console.warn(`[id3] Metadata embedding failed for ${fileName}: ${reason}`);
    return { status: "failed", reason };
  }
}
