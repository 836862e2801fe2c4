/**
 * Eligibility rules for files taking part in a collection run.
 *
 * All functions here are pure: same path and patterns, same answer.
 */

import micromatch from "micromatch";
import type { PatternSet } from "@tokentally/core";
import { DEFAULT_FILE_TYPES, NOISE_DIRECTORIES } from "./defaults.js";

const MATCH_OPTIONS: micromatch.Options = { dot: true };

export function splitSegments(relativePath: string): string[] {
  return relativePath.split(/[\\/]+/).filter((segment) => segment.length > 0);
}

/** Hidden entries and well-known noise directories */
export function isIgnoredName(name: string): boolean {
  return name.startsWith(".") || NOISE_DIRECTORIES.has(name);
}

function matchesAny(value: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => micromatch.isMatch(value, pattern, MATCH_OPTIONS));
}

// Patterns containing a slash describe a path, the rest a single name
function isPathPattern(pattern: string): boolean {
  return stripTrailingSlash(pattern).includes("/");
}

function stripTrailingSlash(pattern: string): string {
  return pattern.endsWith("/") ? pattern.slice(0, -1) : pattern;
}

function matchesNameOrPath(
  fileName: string,
  posixPath: string,
  patterns: readonly string[],
): boolean {
  return patterns.some((pattern) =>
    isPathPattern(pattern)
      ? micromatch.isMatch(posixPath, stripTrailingSlash(pattern), MATCH_OPTIONS)
      : micromatch.isMatch(fileName, pattern, MATCH_OPTIONS),
  );
}

/** Exclude globs that can name a directory, trailing slash removed */
function directoryPatterns(exclude: readonly string[]): string[] {
  return exclude.filter((pattern) => !isPathPattern(pattern)).map(stripTrailingSlash);
}

/**
 * File type globs in effect: the explicit ones, else the default catalog
 */
export function effectiveFileTypes(patterns: PatternSet): readonly string[] {
  return patterns.fileTypes.length > 0 ? patterns.fileTypes : DEFAULT_FILE_TYPES;
}

/**
 * Decide whether a file, given by its path relative to the project root,
 * takes part in a collection run.
 *
 * - Any hidden segment or noise directory rejects the path.
 * - A non-empty `include` list is a strict allow-list: only files matching it
 *   are eligible, and `exclude`/`fileTypes` are not consulted.
 * - Otherwise the file name must match a file type glob and nothing in
 *   `exclude` (checked against the name, each directory and the path).
 */
export function isEligible(relativePath: string, patterns: PatternSet): boolean {
  const segments = splitSegments(relativePath);
  const fileName = segments[segments.length - 1];
  if (fileName === undefined) return false;
  if (segments.some(isIgnoredName)) return false;

  const posixPath = segments.join("/");

  if (patterns.include.length > 0) {
    return matchesNameOrPath(fileName, posixPath, patterns.include);
  }

  if (!matchesAny(fileName, effectiveFileTypes(patterns))) return false;
  if (matchesNameOrPath(fileName, posixPath, patterns.exclude)) return false;

  const directories = segments.slice(0, -1);
  const dirPatterns = directoryPatterns(patterns.exclude);
  return !directories.some((dir) => matchesAny(dir, dirPatterns));
}

/**
 * Whether a directory's whole subtree can be skipped during the walk.
 * Only ever says yes for directories whose files `isEligible` would reject.
 */
export function isPrunedDirectory(name: string, patterns: PatternSet): boolean {
  if (isIgnoredName(name)) return true;
  if (patterns.include.length > 0) return false;
  return matchesAny(name, directoryPatterns(patterns.exclude));
}
