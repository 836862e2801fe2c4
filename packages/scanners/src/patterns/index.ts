export { DEFAULT_FILE_TYPES, NOISE_DIRECTORIES } from "./defaults.js";
export {
  isEligible,
  isPrunedDirectory,
  isIgnoredName,
  effectiveFileTypes,
  splitSegments,
} from "./pattern-matcher.js";
