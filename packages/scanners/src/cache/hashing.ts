// packages/scanners/src/cache/hashing.ts
import { createHash } from "crypto";
import { readFile } from "fs/promises";
import { basename, resolve } from "path";
import { MAX_SLUG_LENGTH, PROJECT_HASH_LENGTH } from "./types.js";

/**
 * MD5 hex digest (32 characters) of raw content
 */
export function hashContent(content: string | Uint8Array): string {
  return createHash("md5").update(content).digest("hex");
}

/**
 * MD5 hex digest of a file's bytes, or "" when the file cannot be read
 */
export async function hashFile(filePath: string): Promise<string> {
  let content: Buffer;
  try {
    content = await readFile(filePath);
  } catch {
    return "";
  }
  return hashContent(content);
}

function canonicalSet(patterns: readonly string[]): string[] {
  return [...new Set(patterns)].sort();
}

/**
 * Fingerprint of a collection's inputs: the resolved root and the three
 * pattern sets. Pattern order and repetition do not matter; the root keeps
 * its casing so roots with colliding slugs still hash apart.
 */
export function computeProjectHash(
  root: string,
  include: readonly string[] = [],
  exclude: readonly string[] = [],
  fileTypes: readonly string[] = [],
): string {
  const canonical = JSON.stringify([
    resolve(root),
    canonicalSet(include),
    canonicalSet(exclude),
    canonicalSet(fileTypes),
  ]);
  return hashContent(canonical).slice(0, PROJECT_HASH_LENGTH);
}

/**
 * Filesystem-safe, lowercase name for a project root, e.g.
 * `/home/dev/My App` -> `my_app`
 */
export function projectSlug(root: string): string {
  const slug = basename(resolve(root))
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/^_+|_+$/g, "");
  return slug || "root";
}
