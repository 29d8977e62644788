/**
 * Batch Tracker
 * Single accumulator for per-file outcomes and scan diagnostics.
 * Workers never touch the collections directly: every outcome goes through
 * record(), which runs to completion on the event loop before the next one.
 */

import type {
  BatchSummary,
  FileOutcome,
  FileStatus,
  OutcomeCounts,
  ScanDiagnostic,
  TargetSpeed,
} from "../types";

interface RecordedOutcome {
  index: number; // Discovery order
  outcome: FileOutcome;
}

export class Tracker {
  private discovered = 0;
  private recorded: RecordedOutcome[] = [];
  private recordedIndexes = new Set<number>();
  private diagnostics: ScanDiagnostic[] = [];
  private counts: Record<FileStatus, number> = {
    updated: 0,
    skipped: 0,
    failed: 0,
  };
  private startTime = Date.now();

  // ============================================================================
  // Mutation
  // ============================================================================

  /**
   * Register a newly discovered file and return its discovery index
   */
  discover(): number {
    return this.discovered++;
  }

  /**
   * Record the terminal outcome of a discovered file
   * Returns a copy of the counts including this outcome
   */
  record(index: number, outcome: FileOutcome): OutcomeCounts {
    if (this.recordedIndexes.has(index)) {
      throw new Error(`Outcome for file #${index} already recorded`);
    }
    this.recordedIndexes.add(index);
    this.recorded.push({ index, outcome });
    this.counts[outcome.status]++;
    return this.getCounts();
  }

  addDiagnostic(diagnostic: ScanDiagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  // ============================================================================
  // Snapshots
  // ============================================================================

  getDiscovered(): number {
    return this.discovered;
  }

  getCounts(): OutcomeCounts {
    return {
      total: this.recorded.length,
      updated: this.counts.updated,
      skipped: this.counts.skipped,
      failed: this.counts.failed,
    };
  }

  getDiagnostics(): ScanDiagnostic[] {
    return [...this.diagnostics];
  }

  /**
   * Build the final summary; outcomes are ordered by discovery, not completion
   */
  summarize(
    root: string,
    target: TargetSpeed,
    cancelled: boolean,
  ): BatchSummary {
    const outcomes = [...this.recorded]
      .sort((a, b) => a.index - b.index)
      .map(({ outcome }) => outcome);
    const counts = this.getCounts();

    return {
      root,
      targetSpeed: target.rpm,
      total: counts.total,
      updatedCount: counts.updated,
      skippedCount: counts.skipped,
      failedCount: counts.failed,
      cancelled,
      outcomes,
      diagnostics: this.getDiagnostics(),
      duration: Date.now() - this.startTime,
    };
  }
}
