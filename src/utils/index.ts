/**
 * Utility exports
 */

// Filesystem utilities
export { readSnapshot } from "./read-snapshot";
export { saveJson } from "./save-json";

// Config utilities
export {
  loadConfig,
  mergeConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";

// Errors
export {
  SpindleSpeedError,
  InvalidSpeedError,
  OutOfRangeSpeedError,
  ScanRootError,
  WriteFailureError,
  describeError,
} from "./errors";
export type { WriteStage } from "./errors";

// Classes
export { IdGenerator } from "./id-generator";
export { Tracker } from "./tracker";
export { Logger } from "./logger";
