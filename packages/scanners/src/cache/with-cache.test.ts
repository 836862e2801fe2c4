// packages/scanners/src/cache/with-cache.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { CacheStore } from "./cache-store.js";
import { withCacheStore, withOptionalCacheStore } from "./with-cache.js";

describe("withCacheStore", () => {
  let testDir: string;
  let cacheDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "tokentally-with-cache-test-"));
    cacheDir = join(testDir, "cache");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  async function seed(key: string): Promise<void> {
    const store = await CacheStore.open(cacheDir);
    const reportPath = join(testDir, "report.txt");
    await writeFile(reportPath, "report");
    await store.store(key, {
      reportFileName: await store.saveArtifact(key, reportPath),
      projectPath: "/work/app",
      createdAt: "2026-01-01T00:00:00.000Z",
      fileCount: 1,
    });
  }

  it("hands an opened store to the callback and reports its size", async () => {
    await seed("app_1");

    const { result, stats } = await withCacheStore(async (cache) => cache.lookup("app_1")?.fileCount, {
      cacheDir,
    });

    expect(result).toBe(1);
    expect(stats).toEqual({ entryCount: 1 });
  });

  it("clears the store first when asked", async () => {
    await seed("app_1");
    const onVerbose = vi.fn();

    const { stats } = await withCacheStore(async () => undefined, {
      cacheDir,
      clearCache: true,
      onVerbose,
    });

    expect(stats).toEqual({ entryCount: 0 });
    expect(onVerbose).toHaveBeenCalledWith("Cache cleared (1 entries)");
  });

  it("propagates callback errors", async () => {
    await expect(
      withCacheStore(async () => {
        throw new Error("boom");
      }, { cacheDir }),
    ).rejects.toThrow("boom");
  });
});

describe("withOptionalCacheStore", () => {
  it("passes undefined and never touches the disk when disabled", async () => {
    const cacheDir = join(tmpdir(), "tokentally-never-created");
    const callback = vi.fn(async (cache: CacheStore | undefined) => cache);

    const { result, stats } = await withOptionalCacheStore(false, callback, { cacheDir });

    expect(result).toBeUndefined();
    expect(stats).toBeUndefined();
    expect(callback).toHaveBeenCalledTimes(1);
    expect(existsSync(cacheDir)).toBe(false);
  });
});
