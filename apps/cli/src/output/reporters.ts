import chalk from "chalk";
import ora, { type Ora } from "ora";

// Output configuration for JSON mode
// When set to true, all non-JSON output is suppressed or redirected to stderr
let jsonMode = false;

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

function output(message: string): void {
  (jsonMode ? console.error : console.log)(message);
}

// Create a spinner
// In JSON mode, spinner output goes to stderr to keep stdout clean for JSON
export function spinner(text: string): Ora {
  return ora({
    text,
    color: "cyan",
    stream: jsonMode ? process.stderr : process.stdout,
  }).start();
}

// Success message
export function success(message: string): void {
  output(chalk.green("✓") + " " + message);
}

// Warning message
export function warning(message: string): void {
  output(chalk.yellow("!") + " " + message);
}

// Error message
export function error(message: string): void {
  output(chalk.red("✗") + " " + message);
}

// Info message
export function info(message: string): void {
  output(chalk.blue("i") + " " + message);
}

// Header
export function header(text: string): void {
  output("");
  output(chalk.bold(text));
  output(chalk.dim("─".repeat(text.length)));
}

// Newline
export function newline(): void {
  output("");
}

// Plain line, routed like every other message
export function line(text: string): void {
  output(text);
}

// Colours off (config `output.colors: false`)
export function disableColors(): void {
  chalk.level = 0;
}

// Key-value pair, keys padded so values line up
const KEY_WIDTH = 11;

export function keyValue(key: string, value: string): void {
  output("  " + chalk.dim((key + ":").padEnd(KEY_WIDTH)) + " " + value);
}
