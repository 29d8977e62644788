/**
 * Central type exports
 */

// Configuration
export type {
  UpdaterConfig,
  PartialUpdaterConfig,
  SpeedConfig,
  ScanConfig,
  LocatorConfig,
  BatchConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export { UpdaterConfigSchema, PartialUpdaterConfigSchema } from "./config";

// Files
export type {
  FileCandidate,
  Span,
  TokenMatch,
  ScanDiagnostic,
  ScanDiagnosticReason,
  FileSnapshot,
} from "./files";

// Batch
export type {
  Job,
  TargetSpeed,
  SkipReason,
  FailureReason,
  UpdatedOutcome,
  SkippedOutcome,
  FailedOutcome,
  FileOutcome,
  FileStatus,
  OutcomeCounts,
  BatchSummary,
  FileProgressEvent,
  DiagnosticProgressEvent,
  ProgressEvent,
} from "./batch";
export { NO_MATCH_DETAILS } from "./batch";
