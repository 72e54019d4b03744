import { writeFile } from "fs/promises";
import path from "path";
import type { AudioExtractor, ExtractionEvent } from "../../src/services/business/extractionService.js";
import { ExtractionError } from "../../src/utils/errors.js";
import type { ExtractedArtifacts } from "../../src/utils/outputFiles.js";

export type FakeBehavior =
  | { fileName: string; content?: string; info?: Record<string, unknown>; lines?: string[] }
  | { error: string; lines?: string[] };

export interface FakeExtractor extends AudioExtractor {
  calls: string[];
}

async function produce(behavior: FakeBehavior, jobDir: string): Promise<ExtractedArtifacts> {
  if ("error" in behavior) {
    throw new ExtractionError(behavior.error);
  }

  const audioPath = path.join(jobDir, behavior.fileName);
  await writeFile(audioPath, behavior.content ?? `audio:${behavior.fileName}`);

  let metadataPath: string | null = null;
  if (behavior.info) {
    metadataPath = path.join(jobDir, behavior.fileName.replace(/\.mp3$/, ".info.json"));
    await writeFile(metadataPath, JSON.stringify(behavior.info));
  }

  return { audioPath, metadataPath, thumbnailPath: null };
}

/**
 * Stands in for yt-dlp: writes a file per URL according to its behavior.
 * URLs without a behavior fail.
 */
export function createFakeExtractor(behaviors: Record<string, FakeBehavior>): FakeExtractor {
  const calls: string[] = [];
  const behaviorFor = (url: string): FakeBehavior => behaviors[url] ?? { error: `no fake for ${url}` };

  return {
    calls,
    async extract(url, jobDir) {
      calls.push(url);
      return produce(behaviorFor(url), jobDir);
    },
    async *stream(url, jobDir): AsyncGenerator<ExtractionEvent> {
      calls.push(url);
      const behavior = behaviorFor(url);
      for (const line of behavior.lines ?? []) {
        yield { type: "progress", line };
      }
      yield { type: "complete", artifacts: await produce(behavior, jobDir) };
    },
  };
}
