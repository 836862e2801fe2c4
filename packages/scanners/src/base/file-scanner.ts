import { glob } from "glob";
import { stat } from "fs/promises";
import { resolve } from "path";
import {
  describeCause,
  errorCode,
  normalizePatternSet,
  type PatternSet,
  type PatternSetInput,
  type ScanResult,
} from "@tokentally/core";
import { isEligible, isPrunedDirectory } from "../patterns/index.js";

/**
 * Warning codes for file discovery. None of them is fatal: the scan
 * still returns whatever it could find, possibly nothing.
 */
export type ScanWarningCode =
  | "ROOT_NOT_FOUND"
  | "ROOT_NOT_DIRECTORY"
  | "ROOT_INACCESSIBLE"
  | "WALK_FAILED"
  | "NO_FILES_MATCHED";

export interface ScanWarning {
  code: ScanWarningCode;
  message: string;
  path?: string;
}

export interface ScanDetails {
  /** Absolute paths, ascending, each at most once */
  files: ScanResult;
  warnings: ScanWarning[];
}

/**
 * Walks a project root and lists the files eligible for collection.
 *
 * Hidden, noise and excluded directories are pruned before descending.
 * Symbolic links are never followed, so link cycles cannot loop the walk.
 */
export class FileScanner {
  async scan(
    root: string,
    include: string[] = [],
    exclude: string[] = [],
    fileTypes: string[] = [],
  ): Promise<ScanResult> {
    const { files } = await this.scanWithDetails(root, { include, exclude, fileTypes });
    return files;
  }

  async scanWithDetails(root: string, input: PatternSetInput = {}): Promise<ScanDetails> {
    const patterns = normalizePatternSet(input);
    const projectRoot = resolve(root);
    const warnings: ScanWarning[] = [];

    const rootWarning = await this.checkRoot(projectRoot);
    if (rootWarning) {
      return { files: [], warnings: [rootWarning] };
    }

    let found: string[];
    try {
      found = await this.walk(projectRoot, patterns);
    } catch (error) {
      return {
        files: [],
        warnings: [
          {
            code: "WALK_FAILED",
            message: `Could not walk ${projectRoot}: ${describeCause(error)}`,
            path: projectRoot,
          },
        ],
      };
    }

    // Deduplicate, then sort by plain string order for reproducible output
    const files = [...new Set(found)].sort();

    if (files.length === 0) {
      warnings.push({
        code: "NO_FILES_MATCHED",
        message: `No eligible files found under ${projectRoot}`,
        path: projectRoot,
      });
    }

    return { files, warnings };
  }

  private async checkRoot(projectRoot: string): Promise<ScanWarning | null> {
    try {
      const stats = await stat(projectRoot);
      if (!stats.isDirectory()) {
        return {
          code: "ROOT_NOT_DIRECTORY",
          message: `${projectRoot} is not a directory`,
          path: projectRoot,
        };
      }
      return null;
    } catch (error) {
      const missing = errorCode(error) === "ENOENT" || errorCode(error) === "ENOTDIR";
      return {
        code: missing ? "ROOT_NOT_FOUND" : "ROOT_INACCESSIBLE",
        message: missing
          ? `${projectRoot} does not exist`
          : `Cannot access ${projectRoot}: ${describeCause(error)}`,
        path: projectRoot,
      };
    }
  }

  private async walk(projectRoot: string, patterns: PatternSet): Promise<string[]> {
    const entries = await glob("**/*", {
      cwd: projectRoot,
      dot: true,
      follow: false,
      stat: true,
      withFileTypes: true,
      ignore: {
        ignored: (entry) => !isEligible(entry.relativePosix(), patterns),
        // The root itself is never pruned, whatever its name
        childrenIgnored: (entry) =>
          entry.relativePosix() !== "" &&
          (entry.isSymbolicLink() || isPrunedDirectory(entry.name, patterns)),
      },
    });

    return entries.filter((entry) => entry.isFile()).map((entry) => entry.fullpath());
  }
}
