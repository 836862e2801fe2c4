// apps/cli/src/commands/__tests__/cache.test.ts
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { mkdtemp, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { CacheStore } from "@tokentally/scanners";
import { TokentallyConfigSchema } from "../../config/schema.js";

vi.mock("../../config/loader.js", () => ({
  loadConfig: vi.fn(),
  getConfigPath: vi.fn(),
}));

vi.mock("../../output/reporters.js", () => ({
  success: vi.fn(),
  error: vi.fn(),
  info: vi.fn(),
  header: vi.fn(),
  line: vi.fn(),
  setJsonMode: vi.fn(),
}));

vi.mock("../../output/formatters.js", () => ({
  formatCacheTable: vi.fn(() => "Cache Table"),
}));

// Import after mocks are set up
import { createCacheCommand } from "../cache.js";
import { loadConfig } from "../../config/loader.js";
import * as reporters from "../../output/reporters.js";
import * as formatters from "../../output/formatters.js";

const CREATED_AT = "2026-02-01T08:00:00.000Z";

function createTestProgram(): Command {
  const program = new Command();
  program.exitOverride();
  program.configureOutput({
    writeErr: () => {},
    writeOut: () => {},
  });
  program.addCommand(createCacheCommand());
  return program;
}

describe("cache command", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;
  let testDir: string;
  let cacheDir: string;

  async function seed(...keys: string[]): Promise<void> {
    const store = await CacheStore.open(cacheDir);
    for (const key of keys) {
      const reportPath = join(testDir, `${key}.txt`);
      await writeFile(reportPath, `report ${key}`);
      await store.store(key, {
        reportFileName: await store.saveArtifact(key, reportPath),
        projectPath: `/work/${key}`,
        createdAt: CREATED_AT,
        fileCount: 1,
      });
    }
  }

  async function run(...args: string[]): Promise<void> {
    await createTestProgram().parseAsync(["node", "test", "cache", ...args]);
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
    testDir = await mkdtemp(join(tmpdir(), "tokentally-cache-cmd-test-"));
    cacheDir = join(testDir, "cache");
    vi.mocked(loadConfig).mockResolvedValue({
      config: TokentallyConfigSchema.parse({ cache: { directory: cacheDir } }),
      configPath: null,
    });
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
    await rm(testDir, { recursive: true, force: true });
  });

  describe("list", () => {
    it("prints entries as JSON, sorted by key", async () => {
      await seed("web_1", "api_2");

      await run("list", "--json");

      const entries = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(entries).toEqual([
        {
          key: "api_2",
          reportFileName: "cache_api_2.txt",
          projectPath: "/work/api_2",
          createdAt: CREATED_AT,
          fileCount: 1,
        },
        {
          key: "web_1",
          reportFileName: "cache_web_1.txt",
          projectPath: "/work/web_1",
          createdAt: CREATED_AT,
          fileCount: 1,
        },
      ]);
    });

    it("renders a table using the configured cache directory", async () => {
      await seed("web_1");

      await run("list");

      expect(formatters.formatCacheTable).toHaveBeenCalledWith([
        expect.objectContaining({ key: "web_1" }),
      ]);
      expect(reporters.line).toHaveBeenCalledWith("Cache Table");
    });

    it("honours --cache-dir", async () => {
      const otherDir = join(testDir, "other");

      await run("list", "--cache-dir", otherDir, "--json");

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual([]);
      expect(loadConfig).not.toHaveBeenCalled();
    });
  });

  describe("clear", () => {
    it("removes every entry", async () => {
      await seed("web_1", "api_2");

      await run("clear");

      expect(reporters.success).toHaveBeenCalledWith("Removed 2 cache entries");
      expect(await readdir(cacheDir)).toEqual(["cache_index.json"]);
    });

    it("removes entries by key prefix", async () => {
      await seed("web_1", "web_2", "api_3");

      await run("clear", "web_");

      expect(reporters.success).toHaveBeenCalledWith("Removed 2 cache entries");
      const store = await CacheStore.open(cacheDir);
      expect((await store.list()).map((e) => e.key)).toEqual(["api_3"]);
    });

    it("says so when nothing matched", async () => {
      await seed("web_1");

      await run("clear", "api_");

      expect(reporters.info).toHaveBeenCalledWith('No cache entries start with "api_"');
    });

    it("exits with 1 when the cache directory is unusable", async () => {
      const blocker = join(testDir, "blocker");
      await writeFile(blocker, "");

      await expect(run("clear", "--cache-dir", join(blocker, "cache"))).rejects.toThrow(
        "process.exit called",
      );

      expect(processExitSpy).toHaveBeenCalledWith(1);
    });
  });
});
