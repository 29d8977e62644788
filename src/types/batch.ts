/**
 * Batch run types - flow between the orchestrator, tracker and operator
 */

import type { ScanDiagnostic } from "./files";

export interface Job {
  readonly root: string;
  readonly requestedSpeed: number;
}

/**
 * A speed that passed validation, with the literal written into files
 */
export interface TargetSpeed {
  readonly rpm: number;
  readonly literal: string;
}

export const NO_MATCH_DETAILS = "no spindle-speed command found";

export type SkipReason = "no-match";
export type FailureReason = "io-error" | "write-failure";

interface OutcomeBase {
  path: string;
  relativePath: string;
}

export interface UpdatedOutcome extends OutcomeBase {
  status: "updated";
  oldSpeed: number;
  newSpeed: number;
  line: number; // One-based line number of the rewritten command
}

export interface SkippedOutcome extends OutcomeBase {
  status: "skipped";
  reason: SkipReason;
  details: string;
}

export interface FailedOutcome extends OutcomeBase {
  status: "failed";
  reason: FailureReason;
  details: string;
  oldSpeed?: number;
}

// Discriminated union - terminal once recorded
export type FileOutcome = UpdatedOutcome | SkippedOutcome | FailedOutcome;
export type FileStatus = FileOutcome["status"];

export interface OutcomeCounts {
  total: number;
  updated: number;
  skipped: number;
  failed: number;
}

export interface BatchSummary {
  root: string;
  targetSpeed: number;
  total: number;
  updatedCount: number;
  skippedCount: number;
  failedCount: number;
  cancelled: boolean;
  outcomes: FileOutcome[]; // Sorted by discovery order
  diagnostics: ScanDiagnostic[];
  duration: number; // Milliseconds
}

export interface FileProgressEvent {
  type: "file";
  outcome: FileOutcome;
  discovered: number;
  counts: OutcomeCounts;
}

export interface DiagnosticProgressEvent {
  type: "diagnostic";
  diagnostic: ScanDiagnostic;
}

export type ProgressEvent = FileProgressEvent | DiagnosticProgressEvent;
