import { Command } from "commander";
import { CacheStore } from "@tokentally/scanners";
import { loadConfig } from "../config/loader.js";
import { success, error, info, header, line, setJsonMode } from "../output/reporters.js";
import { formatCacheTable } from "../output/formatters.js";
import { EXIT_ERROR } from "../constants.js";

async function openStore(cacheDir: string | undefined): Promise<CacheStore> {
  if (cacheDir) {
    return CacheStore.open(cacheDir);
  }
  const { config } = await loadConfig();
  return CacheStore.open(config.cache.directory);
}

function fail(action: string, err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  error(`${action} failed: ${message}`);
  process.exit(EXIT_ERROR);
}

export function createCacheCommand(): Command {
  const cmd = new Command("cache").description("Inspect or clear cached reports");

  cmd
    .command("list")
    .description("List cached reports")
    .option("--cache-dir <dir>", "Cache directory")
    .option("--json", "Output as JSON")
    .action(async (options: { cacheDir?: string; json?: boolean }) => {
      if (options.json) {
        setJsonMode(true);
      }

      try {
        const store = await openStore(options.cacheDir);
        const entries = await store.list();

        if (options.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }

        header(`Cache (${store.cacheDir})`);
        line(formatCacheTable(entries));
      } catch (err) {
        fail("Cache list", err);
      }
    });

  cmd
    .command("clear")
    .description("Remove cached reports, all of them or those whose key starts with a prefix")
    .argument("[prefix]", "Key prefix (case-sensitive)")
    .option("--cache-dir <dir>", "Cache directory")
    .action(async (prefix: string | undefined, options: { cacheDir?: string }) => {
      try {
        const store = await openStore(options.cacheDir);
        const removed = await store.clear(prefix);

        if (removed === 0) {
          info(prefix ? `No cache entries start with "${prefix}"` : "Cache is already empty");
          return;
        }
        success(`Removed ${removed} cache ${removed === 1 ? "entry" : "entries"}`);
      } catch (err) {
        fail("Cache clear", err);
      }
    });

  return cmd;
}
