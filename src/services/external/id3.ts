/**
 * ID3 Tag Service
 * Writes descriptive tags and cover art into MP3 files using node-id3.
 * node-id3 always writes ID3v2.3 frames.
 */

import NodeID3 from "node-id3";
import { readFile } from "fs/promises";

export const DEFAULT_ALBUM = "YouTube";
export const COVER_MIME = "image/jpeg";
/** APIC picture type 3: front cover. */
export const FRONT_COVER = 3;

/** Fields read from yt-dlp's info JSON. */
export interface VideoInfo {
  title?: string | null;
  artist?: string | null;
  uploader?: string | null;
  album?: string | null;
  webpage_url?: string | null;
}

export function buildTags(info: VideoInfo): NodeID3.Tags {
  const tags: NodeID3.Tags = {
    album: info.album || DEFAULT_ALBUM,
  };

  if (info.title) tags.title = info.title;

  const artist = info.artist || info.uploader;
  if (artist) tags.artist = artist;

  if (info.webpage_url) tags.artistUrl = [info.webpage_url];

  return tags;
}

/**
 * Writes text tags, then, if a thumbnail is given, re-opens the tag and adds it
 * as the front cover. A cover that cannot be attached is logged and skipped.
 * Throws only when the text tags cannot be written.
 */
export async function embedMetadata(
  audioPath: string,
  info: VideoInfo,
  thumbnailPath: string | null
): Promise<void> {
  await NodeID3.Promise.update(buildTags(info), audioPath);

  if (!thumbnailPath) {
    return;
  }

  try {
    const imageBuffer = await readFile(thumbnailPath);
    await NodeID3.Promise.update(
      {
        image: {
          mime: COVER_MIME,
          type: { id: FRONT_COVER, name: "front cover" },
          description: "Cover",
          imageBuffer,
        },
      },
      audioPath
    );
  } catch (error) {
    console.warn(`[id3] Could not embed cover art from ${thumbnailPath}:`, error);
  }
}
