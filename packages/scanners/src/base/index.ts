export { FileScanner } from "./file-scanner.js";
export type { ScanDetails, ScanWarning, ScanWarningCode } from "./file-scanner.js";
