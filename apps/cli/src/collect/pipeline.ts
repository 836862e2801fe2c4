// apps/cli/src/collect/pipeline.ts
import { copyFile, mkdir } from "fs/promises";
import { dirname, relative, resolve, isAbsolute } from "path";
import {
  ReportWriteError,
  createReportFormatter,
  normalizePatternSet,
  type CacheEntry,
  type PatternSetInput,
  type ReportFormatter,
  type ReportLayout,
} from "@tokentally/core";
import { FileScanner, type CacheStore, type ScanWarning } from "@tokentally/scanners";

/** Report file written when no output path is given */
export const DEFAULT_OUTPUT_FILE = "collected_code.txt";

function isWithin(directory: string, filePath: string): boolean {
  const rel = relative(directory, filePath);
  return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel);
}

/**
 * Options for a single collection run
 */
export interface CollectOptions extends PatternSetInput {
  /** Consult and update the cache (ignored for the indexed layout) */
  useCache?: boolean;
  /** Report path, relative to the working directory */
  outputFile?: string;
  layout?: ReportLayout;
  /**
   * Callback for progress updates
   */
  onProgress?: (message: string) => void;
}

/**
 * Result of a collection run
 */
export interface CollectionResult {
  reportPath: string;
  cacheKey?: string;
  cacheHit: boolean;
  fileCount: number;
  layout: ReportLayout;
  warnings: ScanWarning[];
  /** Files whose content was replaced by an unreadable marker */
  unreadableFiles: string[];
}

export interface CollectionPipelineOptions {
  /** Cache store; without one nothing is cached */
  cache?: CacheStore;
  scanner?: FileScanner;
  /** Formatter override, used for every layout */
  formatter?: ReportFormatter;
}

/**
 * Scan, format and cache one project per call.
 *
 * With a cache, a key derived from the root and the pattern set decides
 * whether a stored report can be reused: a hit copies the stored artifact to
 * the output path and never scans. Only the standard layout is cached.
 */
export class CollectionPipeline {
  private cache?: CacheStore;
  private scanner: FileScanner;
  private formatter?: ReportFormatter;

  constructor(options: CollectionPipelineOptions = {}) {
    this.cache = options.cache;
    this.scanner = options.scanner ?? new FileScanner();
    this.formatter = options.formatter;
  }

  async collect(root: string, options: CollectOptions = {}): Promise<CollectionResult> {
    const { useCache = true, outputFile = DEFAULT_OUTPUT_FILE, layout = "standard", onProgress } = options;
    const patterns = normalizePatternSet({
      include: options.include,
      exclude: options.exclude,
      fileTypes: options.fileTypes,
    });
    const projectRoot = resolve(root);
    const reportPath = resolve(outputFile);
    const cache = useCache && layout === "standard" ? this.cache : undefined;

    let cacheKey: string | undefined;
    if (cache) {
      cacheKey = cache.computeCacheKey(projectRoot, patterns);
      onProgress?.(`Checking cache (${cacheKey})...`);

      const entry = cache.lookup(cacheKey);
      if (entry && (await cache.hasArtifact(entry))) {
        await this.restoreArtifact(cache, entry, reportPath);
        return {
          reportPath,
          cacheKey,
          cacheHit: true,
          fileCount: entry.fileCount,
          layout,
          warnings: [],
          unreadableFiles: [],
        };
      }
    }

    onProgress?.(`Scanning ${projectRoot}...`);
    const scanned = await this.scanner.scanWithDetails(projectRoot, patterns);
    // The tool's own output never goes into a report
    const files = scanned.files.filter(
      (file) => file !== reportPath && !(this.cache && isWithin(this.cache.cacheDir, file)),
    );
    const { warnings } = scanned;

    onProgress?.(`Writing report for ${files.length} files...`);
    const formatter = this.formatter ?? createReportFormatter(layout);
    const summary = await formatter.write(files, projectRoot, reportPath);

    if (cache && cacheKey) {
      onProgress?.("Updating cache...");
      const reportFileName = await cache.saveArtifact(cacheKey, reportPath);
      await cache.store(cacheKey, {
        reportFileName,
        projectPath: projectRoot,
        createdAt: new Date().toISOString(),
        fileCount: files.length,
      });
    }

    return {
      reportPath,
      cacheKey,
      cacheHit: false,
      fileCount: files.length,
      layout,
      warnings,
      unreadableFiles: summary.unreadableFiles,
    };
  }

  private async restoreArtifact(cache: CacheStore, entry: CacheEntry, reportPath: string): Promise<void> {
    const artifactPath = cache.artifactPath(entry);
    if (artifactPath === reportPath) return;

    try {
      await mkdir(dirname(reportPath), { recursive: true });
      await copyFile(artifactPath, reportPath);
    } catch (error) {
      throw new ReportWriteError(reportPath, error);
    }
  }
}
