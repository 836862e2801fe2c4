// packages/scanners/src/cache/hashing.test.ts
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { computeProjectHash, hashContent, hashFile, projectSlug } from "./hashing.js";

describe("hashContent", () => {
  it("returns the md5 hex digest", () => {
    expect(hashContent("")).toBe("d41d8cd98f00b204e9800998ecf8427e");
    expect(hashContent("hello")).toBe("5d41402abc4b2a76b9719d911017c592");
  });
});

describe("hashFile", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "tokentally-hash-test-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("hashes file bytes", async () => {
    const filePath = join(testDir, "a.txt");
    await writeFile(filePath, "hello");

    expect(await hashFile(filePath)).toBe("5d41402abc4b2a76b9719d911017c592");
  });

  it("returns an empty string for unreadable files", async () => {
    expect(await hashFile(join(testDir, "missing.txt"))).toBe("");
  });
});

describe("computeProjectHash", () => {
  it("is 16 lowercase hex characters", () => {
    expect(computeProjectHash("/work/app")).toMatch(/^[0-9a-f]{16}$/);
  });

  it("is deterministic", () => {
    expect(computeProjectHash("/work/app", ["*.py"], ["test_*"], ["*.md"])).toBe(
      computeProjectHash("/work/app", ["*.py"], ["test_*"], ["*.md"]),
    );
  });

  it("ignores pattern order and repetition", () => {
    expect(computeProjectHash("/work/app", ["*.py", "*.ts", "*.py"])).toBe(
      computeProjectHash("/work/app", ["*.ts", "*.py"]),
    );
  });

  it("changes with the root or any pattern set", () => {
    const base = computeProjectHash("/work/app", ["*.py"]);

    expect(computeProjectHash("/work/other", ["*.py"])).not.toBe(base);
    expect(computeProjectHash("/work/app", ["*.ts"])).not.toBe(base);
    expect(computeProjectHash("/work/app", ["*.py"], ["*.py"])).not.toBe(base);
    expect(computeProjectHash("/work/app", ["*.py"], [], ["*.py"])).not.toBe(base);
  });

  it("keeps the same pattern in different sets apart", () => {
    expect(computeProjectHash("/work/app", ["*.py"], [])).not.toBe(
      computeProjectHash("/work/app", [], ["*.py"]),
    );
  });
});

describe("projectSlug", () => {
  it("lowercases the root's name and replaces unsafe characters", () => {
    expect(projectSlug("/home/dev/My App")).toBe("my_app");
    expect(projectSlug("/srv/api.v2-beta")).toBe("api_v2_beta");
  });

  it("falls back to root when nothing usable remains", () => {
    expect(projectSlug("/")).toBe("root");
    expect(projectSlug("/tmp/___")).toBe("root");
  });

  it("caps the slug length", () => {
    expect(projectSlug(`/tmp/${"a".repeat(80)}`)).toBe("a".repeat(48));
  });
});
