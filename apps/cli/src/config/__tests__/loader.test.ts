// apps/cli/src/config/__tests__/loader.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { loadConfig, getConfigPath } from "../loader.js";
import { existsSync, readFileSync } from "fs";
import { resolve } from "path";

// Mock fs module
vi.mock("fs", async () => {
  const actual = await vi.importActual<typeof import("fs")>("fs");
  return {
    ...actual,
    existsSync: vi.fn(),
    readFileSync: vi.fn(),
  };
});

describe("Config Loader", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("getConfigPath", () => {
    it("finds tokentally.config.mjs first", () => {
      vi.mocked(existsSync).mockImplementation((path) => {
        return String(path).endsWith(".mjs") || String(path).endsWith(".tokentallyrc");
      });

      const result = getConfigPath("/test/project");

      expect(result).toBe(resolve("/test/project", "tokentally.config.mjs"));
    });

    it("finds tokentally.config.js when mjs not present", () => {
      vi.mocked(existsSync).mockImplementation((path) => {
        return String(path).endsWith("tokentally.config.js");
      });

      const result = getConfigPath("/test/project");

      expect(result).toBe(resolve("/test/project", "tokentally.config.js"));
    });

    it("finds .tokentallyrc.json", () => {
      vi.mocked(existsSync).mockImplementation((path) => {
        return String(path).endsWith(".tokentallyrc.json");
      });

      const result = getConfigPath("/test/project");

      expect(result).toBe(resolve("/test/project", ".tokentallyrc.json"));
    });

    it("finds .tokentallyrc", () => {
      vi.mocked(existsSync).mockImplementation((path) => {
        return String(path).endsWith(".tokentallyrc");
      });

      const result = getConfigPath("/test/project");

      expect(result).toBe(resolve("/test/project", ".tokentallyrc"));
    });

    it("returns null when no config file exists", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(getConfigPath("/test/project")).toBeNull();
    });
  });

  describe("loadConfig", () => {
    it("returns default config when no file exists", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      const result = await loadConfig("/test/project");

      expect(result).toEqual({
        configPath: null,
        config: {
          collect: {
            include: [],
            exclude: [],
            fileTypes: [],
            output: "collected_code.txt",
            layout: "standard",
          },
          cache: { enabled: true, directory: ".code_cache" },
          output: { colors: true },
        },
      });
    });

    it("loads JSON config from .tokentallyrc.json", async () => {
      vi.mocked(existsSync).mockImplementation((path) => {
        return String(path).endsWith(".tokentallyrc.json");
      });
      vi.mocked(readFileSync).mockReturnValue(
        JSON.stringify({
          collect: { fileTypes: ["*.py"], layout: "indexed" },
          cache: { enabled: false },
        }),
      );

      const result = await loadConfig("/test/project");

      expect(result.configPath).toBe(resolve("/test/project", ".tokentallyrc.json"));
      expect(result.config.collect.fileTypes).toEqual(["*.py"]);
      expect(result.config.collect.layout).toBe("indexed");
      expect(result.config.cache).toEqual({ enabled: false, directory: ".code_cache" });
    });

    it("loads JSON config from .tokentallyrc", async () => {
      vi.mocked(existsSync).mockImplementation((path) => {
        return String(path).endsWith(".tokentallyrc");
      });
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ cache: { directory: "/tmp/reports" } }));

      const result = await loadConfig("/test/project");

      expect(result.configPath).toBe(resolve("/test/project", ".tokentallyrc"));
      expect(result.config.cache.directory).toBe("/tmp/reports");
    });

    it("throws on invalid JSON", async () => {
      vi.mocked(existsSync).mockImplementation((path) => {
        return String(path).endsWith(".tokentallyrc.json");
      });
      vi.mocked(readFileSync).mockReturnValue("{ invalid json }");

      await expect(loadConfig("/test/project")).rejects.toThrow(/Invalid JSON in/);
    });

    it("throws on schema validation failure with helpful message", async () => {
      vi.mocked(existsSync).mockImplementation((path) => {
        return String(path).endsWith(".tokentallyrc.json");
      });
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ collect: { layout: "fancy" } }));

      await expect(loadConfig("/test/project")).rejects.toThrow(
        /Invalid config.*Configuration error.*collect\.layout/s,
      );
    });
  });
});
