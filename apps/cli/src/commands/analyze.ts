import { Command } from "commander";
import { FileAnalyzer, getContextWindowSummary } from "@tokentally/core";
import { spinner, error, header, line, newline, setJsonMode } from "../output/reporters.js";
import { formatAnalysisTable, formatContextTable } from "../output/formatters.js";
import { EXIT_ERROR } from "../constants.js";

export function createAnalyzeCommand(): Command {
  const cmd = new Command("analyze")
    .description("Show size and token statistics for one file")
    .argument("<file>", "File to analyze (usually a collected report)")
    .option("--json", "Output as JSON")
    .action(async (file: string, options: { json?: boolean }) => {
      if (options.json) {
        setJsonMode(true);
      }
      const spin = spinner("Counting tokens...");

      try {
        const analysis = await new FileAnalyzer().analyzeFile(file);
        spin.stop();

        if (options.json) {
          console.log(JSON.stringify(analysis, null, 2));
          return;
        }

        header("File statistics");
        line(formatAnalysisTable(analysis));
        newline();
        header("Context windows");
        line(formatContextTable(getContextWindowSummary(analysis.tokenCount)));
      } catch (err) {
        spin.stop();
        const message = err instanceof Error ? err.message : String(err);
        error(`Analysis failed: ${message}`);
        process.exit(EXIT_ERROR);
      }
    });

  return cmd;
}
