/**
 * Default file type catalog used when no file type patterns are given.
 * Covers common source, markup and config text files.
 */
export const DEFAULT_FILE_TYPES: readonly string[] = [
  "*.py",
  "*.js",
  "*.jsx",
  "*.mjs",
  "*.cjs",
  "*.ts",
  "*.tsx",
  "*.java",
  "*.kt",
  "*.go",
  "*.rs",
  "*.c",
  "*.h",
  "*.cpp",
  "*.hpp",
  "*.cs",
  "*.rb",
  "*.php",
  "*.swift",
  "*.scala",
  "*.sh",
  "*.sql",
  "*.html",
  "*.css",
  "*.scss",
  "*.vue",
  "*.svelte",
  "*.md",
  "*.json",
  "*.yaml",
  "*.yml",
  "*.toml",
  "*.xml",
  "*.txt",
];

/**
 * Directory names that never take part in a collection: dependency
 * managers, build output and version control metadata.
 */
export const NOISE_DIRECTORIES: ReadonlySet<string> = new Set([
  "node_modules",
  "bower_components",
  "jspm_packages",
  "vendor",
  "__pycache__",
  "venv",
  "site-packages",
  "dist",
  "build",
  "target",
  "out",
  "coverage",
  ".git",
  ".svn",
  ".hg",
]);
