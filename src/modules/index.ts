/**
 * Pipeline modules export
 */

export { scanFiles, normalizeExtension } from "./scanner";
export type { ScanOptions } from "./scanner";
export { locateSpeedToken } from "./locator";
export { validateSpeed, parseSpeed, formatSpeed } from "./validator";
export {
  replaceSpeedToken,
  writeFileAtomic,
  tempPathFor,
  FILE_ENCODING,
} from "./rewriter";
export type { WriteOptions } from "./rewriter";
export { createJob, runBatch } from "./batch";
export type { BatchOptions } from "./batch";
export { stats, writeReport } from "./stats";
