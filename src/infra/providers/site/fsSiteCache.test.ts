import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CONTENT_FILE, FsSiteCache, STRIPPED_FILE } from "./fsSiteCache";

let sourcesPath = "";

beforeEach(async () => {
  sourcesPath = await mkdtemp(path.join(tmpdir(), "site-cache-"));
});

afterEach(async () => {
  await rm(sourcesPath, { recursive: true, force: true });
});

const page = new URL("https://docs.example.test/guide/start/");

describe("FsSiteCache", () => {
  it("lays artifacts out by host and path", async () => {
    const cache = new FsSiteCache(sourcesPath);

    await cache.writeStripped(page, "near text");
    await cache.writeContent(page, "main content");

    const directory = path.join(sourcesPath, "sites", "docs.example.test", "guide", "start");
    expect(cache.directoryFor(page)).toBe(directory);
    expect(await readFile(path.join(directory, STRIPPED_FILE), "utf-8")).toBe("near text");
    expect(await readFile(path.join(directory, CONTENT_FILE), "utf-8")).toBe("main content");
  });

  it("returns fresh content and ignores content older than the max age", async () => {
    await new FsSiteCache(sourcesPath).writeContent(page, "main content");

    const fresh = new FsSiteCache(sourcesPath);
    const later = new FsSiteCache(sourcesPath, () => Date.now() + 120_000);

    expect(await fresh.readContent(page, 60_000)).toBe("main content");
    expect(await later.readContent(page, 60_000)).toBeNull();
  });

  it("reports a miss when nothing was cached", async () => {
    const cache = new FsSiteCache(sourcesPath);

    expect(await cache.readContent(new URL("https://other.test/"), 60_000)).toBeNull();
  });

  it("overwrites earlier artifacts for the same url", async () => {
    const cache = new FsSiteCache(sourcesPath);

    await cache.writeContent(page, "first");
    await cache.writeContent(page, "second");

    expect(await cache.readContent(page, 60_000)).toBe("second");
  });
});
