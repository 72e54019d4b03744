import { mkdtemp, readFile, rm, stat, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../../src/config/env.js";
import { initializeApp } from "../../src/config/init.js";

const COOKIES = "# Netscape HTTP Cookie File\n";

describe("initializeApp", () => {
  let root: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    root = await mkdtemp(path.join(os.tmpdir(), "init-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("writes YOUTUBE_COOKIES beside the temp directory, readable only by the owner", async () => {
    const config = loadConfig({ TMP_DIR: path.join(root, "tmp"), YOUTUBE_COOKIES: COOKIES });

    const initialized = await initializeApp(config);

    const cookiesPath = path.join(root, "yt2mp3-cookies.txt");
    expect(initialized.cookiesPath).toBe(cookiesPath);
    expect(await readFile(cookiesPath, "utf-8")).toBe(COOKIES);
    expect((await stat(cookiesPath)).mode & 0o777).toBe(0o600);
    expect((await stat(path.join(root, "tmp"))).isDirectory()).toBe(true);
  });

  it("tightens the mode of a cookie file left by an earlier run", async () => {
    const cookiesPath = path.join(root, "yt2mp3-cookies.txt");
    await writeFile(cookiesPath, "stale", { mode: 0o644 });
    const config = loadConfig({ TMP_DIR: path.join(root, "tmp"), YOUTUBE_COOKIES: COOKIES });

    await initializeApp(config);

    expect(await readFile(cookiesPath, "utf-8")).toBe(COOKIES);
    expect((await stat(cookiesPath)).mode & 0o777).toBe(0o600);
  });

  it("leaves cookies unset when none are configured", async () => {
    const config = loadConfig({ TMP_DIR: path.join(root, "tmp") });

    const initialized = await initializeApp(config);

    expect(initialized.cookiesPath).toBeNull();
  });
});
