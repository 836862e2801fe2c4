export { createCollectCommand } from "./collect.js";
export { createAnalyzeCommand } from "./analyze.js";
export { createCacheCommand } from "./cache.js";
