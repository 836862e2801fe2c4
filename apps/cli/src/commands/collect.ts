import { Command } from "commander";
import { FileAnalyzer, ReportLayoutSchema, getContextWindowSummary, type FileAnalysis } from "@tokentally/core";
import { withOptionalCacheStore } from "@tokentally/scanners";
import { loadConfig } from "../config/loader.js";
import {
  spinner,
  success,
  error,
  info,
  warning,
  header,
  keyValue,
  line,
  newline,
  setJsonMode,
  disableColors,
} from "../output/reporters.js";
import { formatAnalysisTable, formatContextTable } from "../output/formatters.js";
import { CollectionPipeline } from "../collect/pipeline.js";
import { EXIT_ERROR } from "../constants.js";

interface CollectCommandOptions {
  include?: string[];
  exclude?: string[];
  type?: string[];
  output?: string;
  layout?: string;
  cache: boolean;
  cacheDir?: string;
  clearCache?: boolean;
  analyze?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export function createCollectCommand(): Command {
  const cmd = new Command("collect")
    .description("Collect a project's source files into one report")
    .argument("[path]", "Project root", ".")
    .option("-i, --include <patterns...>", "Only collect files matching these globs")
    .option("-e, --exclude <patterns...>", "Skip files matching these globs")
    .option("-t, --type <patterns...>", "File type globs (default: built-in catalog)")
    .option("-o, --output <file>", "Report path")
    .option("--layout <layout>", "Report layout (standard, indexed)")
    .option("--no-cache", "Always rescan; do not read or write the cache")
    .option("--cache-dir <dir>", "Cache directory")
    .option("--clear-cache", "Clear the cache before collecting")
    .option("--analyze", "Print token statistics for the report")
    .option("--json", "Output as JSON")
    .option("-v, --verbose", "Verbose output")
    .action(async (path: string, options: CollectCommandOptions) => {
      // Set JSON mode before creating spinner to redirect spinner to stderr
      if (options.json) {
        setJsonMode(true);
      }
      const spin = spinner("Loading configuration...");

      try {
        const { config, configPath } = await loadConfig();
        if (!config.output.colors) {
          disableColors();
        }

        const verbose = (message: string) => {
          if (!options.verbose) return;
          spin.stop();
          info(message);
          spin.start();
        };

        if (configPath) {
          verbose(`Using config: ${configPath}`);
        }

        const layout = ReportLayoutSchema.safeParse(options.layout ?? config.collect.layout);
        if (!layout.success) {
          throw new Error(`Unknown layout "${options.layout}" (expected standard or indexed)`);
        }

        const useCache = options.cache && config.cache.enabled;
        const cacheDir = options.cacheDir ?? config.cache.directory;

        const { result, stats } = await withOptionalCacheStore(
          useCache && layout.data === "standard",
          (cache) =>
            new CollectionPipeline({ cache }).collect(path, {
              include: options.include ?? config.collect.include,
              exclude: options.exclude ?? config.collect.exclude,
              fileTypes: options.type ?? config.collect.fileTypes,
              outputFile: options.output ?? config.collect.output,
              layout: layout.data,
              useCache,
              onProgress: (msg) => {
                spin.text = msg;
              },
            }),
          { cacheDir, clearCache: options.clearCache, onVerbose: verbose },
        );
        if (stats) {
          verbose(`Cache holds ${stats.entryCount} entries`);
        }

        let analysis: FileAnalysis | undefined;
        if (options.analyze) {
          spin.text = "Counting tokens...";
          analysis = await new FileAnalyzer().analyzeFile(result.reportPath);
        }

        spin.stop();

        if (options.json) {
          console.log(JSON.stringify({ ...result, analysis }, null, 2));
          return;
        }

        for (const w of result.warnings) {
          warning(w.message);
        }
        for (const file of result.unreadableFiles) {
          warning(`Could not read ${file}`);
        }

        header("Collection");
        keyValue("Report", result.reportPath);
        keyValue("Files", String(result.fileCount));
        keyValue("Layout", result.layout);
        keyValue("Cache", result.cacheHit ? "hit" : result.cacheKey ? "miss (stored)" : "off");
        if (result.cacheKey) {
          keyValue("Cache key", result.cacheKey);
        }
        newline();

        if (analysis) {
          header("Report statistics");
          line(formatAnalysisTable(analysis));
          newline();
          header("Context windows");
          line(formatContextTable(getContextWindowSummary(analysis.tokenCount)));
          newline();
        }

        success(`Report written to ${result.reportPath}`);
      } catch (err) {
        spin.stop();
        const message = err instanceof Error ? err.message : String(err);
        error(`Collection failed: ${message}`);
        process.exit(EXIT_ERROR);
      }
    });

  return cmd;
}
