// Base
export { FileScanner, type ScanDetails, type ScanWarning, type ScanWarningCode } from "./base/index.js";

// Pattern matching
export * from "./patterns/index.js";

// Cache
export * from "./cache/index.js";
