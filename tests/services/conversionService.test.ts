import { mkdtemp, readdir, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  assertAllowedUrls,
  convertUrls,
  decideDelivery,
  type ConversionOutcome,
} from "../../src/services/business/conversionService.js";
import { BadRequestError } from "../../src/utils/errors.js";
import { createFakeExtractor } from "../helpers/fakeExtractor.js";

describe("assertAllowedUrls", () => {
  it("passes an allowed batch", () => {
    expect(() => assertAllowedUrls(["https://youtu.be/a", "https://www.youtube.com/watch?v=b"])).not.toThrow();
  });

  it("rejects the batch naming the first disallowed URL", () => {
    expect(() => assertAllowedUrls(["https://youtu.be/a", "https://notyoutube.example/x"])).toThrow(
      new BadRequestError("URL not allowed: https://notyoutube.example/x")
    );
  });
});

describe("convertUrls", () => {
  let jobDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    jobDir = await mkdtemp(path.join(os.tmpdir(), "convert-test-"));
  });

  afterEach(async () => {
    await rm(jobDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("records one outcome per URL in input order and keeps going after a failure", async () => {
    const extractor = createFakeExtractor({
      "https://youtu.be/A": { fileName: "Song A [A].mp3" },
      "https://youtu.be/B": { error: "ERROR: Video unavailable" },
      "https://youtu.be/C": { fileName: "Song C [C].mp3" },
    });

    const outcomes = await convertUrls(
      ["https://youtu.be/A", "https://youtu.be/B", "https://youtu.be/C"],
      jobDir,
      extractor
    );

    expect(extractor.calls).toEqual(["https://youtu.be/A", "https://youtu.be/B", "https://youtu.be/C"]);
    expect(outcomes).toEqual([
      { ok: true, url: "https://youtu.be/A", audioPath: path.join(jobDir, "0", "Song A [A].mp3") },
      { ok: false, url: "https://youtu.be/B", error: "ERROR: Video unavailable" },
      { ok: true, url: "https://youtu.be/C", audioPath: path.join(jobDir, "2", "Song C [C].mp3") },
    ]);
  });

  it("gives every URL its own directory", async () => {
    const extractor = createFakeExtractor({
      "https://youtu.be/A": { fileName: "Same.mp3" },
      "https://youtu.be/B": { fileName: "Same.mp3" },
    });

    const outcomes = await convertUrls(["https://youtu.be/A", "https://youtu.be/B"], jobDir, extractor);

    expect(outcomes.every((outcome) => outcome.ok)).toBe(true);
    expect((await readdir(jobDir)).sort()).toEqual(["0", "1"]);
  });

  it("marks remaining URLs as cancelled once the signal aborts", async () => {
    const extractor = createFakeExtractor({ "https://youtu.be/A": { fileName: "A.mp3" } });
    const abort = new AbortController();
    abort.abort();

    const outcomes = await convertUrls(["https://youtu.be/A"], jobDir, extractor, abort.signal);

    expect(extractor.calls).toEqual([]);
    expect(outcomes).toEqual([{ ok: false, url: "https://youtu.be/A", error: "Request cancelled" }]);
  });
});

describe("decideDelivery", () => {
  const success = (name: string): ConversionOutcome => ({ ok: true, url: `https://youtu.be/${name}`, audioPath: `/jobs/${name}.mp3` });
  const failure = (name: string): ConversionOutcome => ({ ok: false, url: `https://youtu.be/${name}`, error: `${name} failed` });

  it("reports every URL when nothing succeeded", () => {
    expect(decideDelivery([failure("A"), failure("B")])).toEqual({
      kind: "failed",
      results: [
        { url: "https://youtu.be/A", error: "A failed" },
        { url: "https://youtu.be/B", error: "B failed" },
      ],
    });
  });

  it("returns the single success even when others failed", () => {
    expect(decideDelivery([failure("A"), success("B"), failure("C")])).toEqual({
      kind: "single",
      audioPath: "/jobs/B.mp3",
    });
  });

  it("archives two or more successes", () => {
    expect(decideDelivery([success("A"), failure("B"), success("C")])).toEqual({
      kind: "archive",
      audioPaths: ["/jobs/A.mp3", "/jobs/C.mp3"],
    });
  });
});
