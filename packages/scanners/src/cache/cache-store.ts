// packages/scanners/src/cache/cache-store.ts
import { access, copyFile, mkdir, readdir, readFile, rename, rm, writeFile } from "fs/promises";
import { basename, join, resolve } from "path";
import {
  CacheDirectoryError,
  PersistedCacheEntrySchema,
  fromPersistedEntry,
  normalizePatternSet,
  toPersistedEntry,
  type CacheEntry,
  type PatternSetInput,
  type PersistedCacheEntry,
} from "@tokentally/core";
import { computeProjectHash, projectSlug } from "./hashing.js";
import {
  ARTIFACT_FILE_PATTERN,
  CACHE_INDEX_FILE,
  DEFAULT_CACHE_DIR,
  artifactFileName,
} from "./types.js";

export type CacheEntryDetails = Omit<CacheEntry, "key">;

// Index entries may only name files directly inside the cache directory
function isPlainFileName(name: string): boolean {
  return name === basename(name) && name !== "." && name !== "..";
}

/**
 * Persistent index of collection reports, keyed by project root and
 * pattern set.
 *
 * The index lives in `cache_index.json` next to the report artifacts. It is
 * loaded when the store is opened and rewritten (temp file + rename) after
 * every change. A missing or corrupt index is an empty cache, not an error.
 */
export class CacheStore {
  readonly cacheDir: string;
  private index = new Map<string, CacheEntry>();

  private constructor(cacheDir: string) {
    this.cacheDir = cacheDir;
  }

  /**
   * Open (creating if needed) the cache directory and load its index
   */
  static async open(cacheDir: string = DEFAULT_CACHE_DIR): Promise<CacheStore> {
    const store = new CacheStore(resolve(cacheDir));
    try {
      await mkdir(store.cacheDir, { recursive: true });
    } catch (error) {
      throw new CacheDirectoryError(store.cacheDir, error);
    }
    store.index = await store.readIndex();
    return store;
  }

  get indexPath(): string {
    return join(this.cacheDir, CACHE_INDEX_FILE);
  }

  get size(): number {
    return this.index.size;
  }

  computeProjectHash(
    root: string,
    include: readonly string[] = [],
    exclude: readonly string[] = [],
    fileTypes: readonly string[] = [],
  ): string {
    return computeProjectHash(root, include, exclude, fileTypes);
  }

  /**
   * `<slug>_<hash>`: equal for equal inputs, different otherwise
   */
  computeCacheKey(root: string, patterns: PatternSetInput = {}): string {
    const { include, exclude, fileTypes } = normalizePatternSet(patterns);
    return `${projectSlug(root)}_${this.computeProjectHash(root, include, exclude, fileTypes)}`;
  }

  lookup(key: string): CacheEntry | undefined {
    return this.index.get(key);
  }

  artifactPath(entry: Pick<CacheEntry, "reportFileName">): string {
    return join(this.cacheDir, entry.reportFileName);
  }

  async hasArtifact(entry: Pick<CacheEntry, "reportFileName">): Promise<boolean> {
    try {
      await access(this.artifactPath(entry));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Copy a finished report into the cache directory under the key's
   * artifact name. Returns that name.
   */
  async saveArtifact(key: string, reportPath: string): Promise<string> {
    const fileName = artifactFileName(key);
    try {
      await copyFile(reportPath, join(this.cacheDir, fileName));
    } catch (error) {
      throw new CacheDirectoryError(this.cacheDir, error);
    }
    return fileName;
  }

  /**
   * Insert or replace the entry for `key` and persist the index.
   * A replaced entry's artifact is removed when it is a different file.
   */
  async store(key: string, details: CacheEntryDetails): Promise<CacheEntry> {
    const entry: CacheEntry = { key, ...details };
    const previous = this.index.get(key);
    this.index.set(key, entry);

    if (previous && previous.reportFileName !== entry.reportFileName) {
      await this.removeArtifact(previous.reportFileName);
    }

    await this.flush();
    return entry;
  }

  /**
   * Remove entries and their artifacts.
   * Without a prefix everything goes, including unreferenced artifacts;
   * with one, only keys starting with it (case-sensitive).
   * Returns the number of entries removed.
   */
  async clear(prefix?: string): Promise<number> {
    const keys = [...this.index.keys()].filter(
      (key) => prefix === undefined || key.startsWith(prefix),
    );

    for (const key of keys) {
      const entry = this.index.get(key);
      this.index.delete(key);
      if (entry) {
        await this.removeArtifact(entry.reportFileName);
      }
    }

    if (prefix === undefined) {
      this.index.clear();
      await this.removeOrphanArtifacts();
    }

    await this.flush();
    return keys.length;
  }

  /**
   * Entries as currently persisted, sorted by key
   */
  async list(): Promise<CacheEntry[]> {
    this.index = await this.readIndex();
    return [...this.index.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  private async readIndex(): Promise<Map<string, CacheEntry>> {
    const index = new Map<string, CacheEntry>();

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.indexPath, "utf-8"));
    } catch {
      // Missing or unparsable index - start empty
      return index;
    }

    if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
      return index;
    }

    for (const [key, value] of Object.entries(raw)) {
      const parsed = PersistedCacheEntrySchema.safeParse(value);
      if (parsed.success && key.length > 0 && isPlainFileName(parsed.data.file)) {
        index.set(key, fromPersistedEntry(key, parsed.data));
      }
    }

    return index;
  }

  private async flush(): Promise<void> {
    const document: Record<string, PersistedCacheEntry> = {};
    for (const key of [...this.index.keys()].sort()) {
      const entry = this.index.get(key);
      if (entry) document[key] = toPersistedEntry(entry);
    }

    const tempPath = `${this.indexPath}.${process.pid}.tmp`;
    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(tempPath, JSON.stringify(document, null, 2), "utf-8");
      await rename(tempPath, this.indexPath);
    } catch (error) {
      throw new CacheDirectoryError(this.cacheDir, error);
    }
  }

  private async removeArtifact(fileName: string): Promise<void> {
    try {
      await rm(join(this.cacheDir, fileName), { force: true });
    } catch (error) {
      throw new CacheDirectoryError(this.cacheDir, error);
    }
  }

  private async removeOrphanArtifacts(): Promise<void> {
    let names: string[];
    try {
      names = await readdir(this.cacheDir);
    } catch (error) {
      throw new CacheDirectoryError(this.cacheDir, error);
    }
    for (const name of names.filter((n) => ARTIFACT_FILE_PATTERN.test(n))) {
      await this.removeArtifact(name);
    }
  }
}
