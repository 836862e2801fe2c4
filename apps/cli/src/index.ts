import { Command } from "commander";
import {
  createCollectCommand,
  createAnalyzeCommand,
  createCacheCommand,
} from "./commands/index.js";

export function createCli(): Command {
  const program = new Command();

  program
    .name("tokentally")
    .description("Collect source files into one report and measure its token footprint")
    .version("0.1.0");

  // Add commands
  program.addCommand(createCollectCommand());
  program.addCommand(createAnalyzeCommand());
  program.addCommand(createCacheCommand());

  return program;
}

// Re-export config utilities for user config files
export { defineConfig } from "./config/schema.js";
export type { TokentallyConfig, TokentallyConfigInput } from "./config/schema.js";
export { CollectionPipeline, DEFAULT_OUTPUT_FILE } from "./collect/pipeline.js";
export type { CollectOptions, CollectionResult } from "./collect/pipeline.js";
