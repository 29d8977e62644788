/**
 * Batch Module
 * Drives scanner -> locator -> rewriter across a directory tree
 */

import path from "node:path";
import { scanFiles } from "./scanner";
import { locateSpeedToken } from "./locator";
import { validateSpeed } from "./validator";
import { replaceSpeedToken, writeFileAtomic, FILE_ENCODING } from "./rewriter";
import { readSnapshot } from "../utils/read-snapshot";
import { describeError } from "../utils/errors";
import { Logger } from "../utils/logger";
import { Tracker } from "../utils/tracker";
import {
  NO_MATCH_DETAILS,
  type BatchSummary,
  type FileCandidate,
  type FileOutcome,
  type FileSnapshot,
  type Job,
  type ProgressEvent,
  type TargetSpeed,
  type UpdaterConfig,
} from "../types";

export interface BatchOptions {
  config: UpdaterConfig;
  logger?: Logger;
  // Cooperative cancellation, checked between files
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
}

interface IndexedCandidate {
  index: number;
  candidate: FileCandidate;
}

export function createJob(root: string, requestedSpeed: number): Job {
  return Object.freeze({ root: path.resolve(root), requestedSpeed });
}

/**
 * Attach discovery indexes as the scanner yields, so ordering does not
 * depend on which worker pulls which file
 */
async function* enumerate(
  files: AsyncIterable<FileCandidate>,
  tracker: Tracker,
): AsyncGenerator<IndexedCandidate> {
  for await (const candidate of files) {
    yield { index: tracker.discover(), candidate };
  }
}

/**
 * Process one file; never throws, every error becomes a failed outcome
 */
async function processFile(
  candidate: FileCandidate,
  target: TargetSpeed,
  config: UpdaterConfig,
): Promise<FileOutcome> {
  const { path: filePath, relativePath } = candidate;

  let text: string;
  let snapshot: FileSnapshot;
  try {
    snapshot = await readSnapshot(candidate.realPath);
    text = snapshot.bytes.toString(FILE_ENCODING);
  } catch (error) {
    return {
      path: filePath,
      relativePath,
      status: "failed",
      reason: "io-error",
      details: describeError(error),
    };
  }

  const match = locateSpeedToken(filePath, text, config.locator);
  if (!match) {
    return {
      path: filePath,
      relativePath,
      status: "skipped",
      reason: "no-match",
      details: NO_MATCH_DETAILS,
    };
  }

  // Equal speeds are rewritten too; the write path has no no-op branch
  try {
    const updated = replaceSpeedToken(text, match, target);
    await writeFileAtomic(
      candidate.realPath,
      Buffer.from(updated, FILE_ENCODING),
      {
        mode: snapshot.mode,
        expected: { mtimeMs: snapshot.mtimeMs, size: snapshot.size },
      },
    );
  } catch (error) {
    return {
      path: filePath,
      relativePath,
      status: "failed",
      reason: "write-failure",
      details: describeError(error),
      oldSpeed: match.currentSpeed,
    };
  }

  return {
    path: filePath,
    relativePath,
    status: "updated",
    oldSpeed: match.currentSpeed,
    newSpeed: target.rpm,
    line: match.lineIndex + 1,
  };
}

/**
 * Update the spindle speed in every matching file under job.root.
 *
 * The requested speed is validated before anything is scanned; an invalid
 * speed or unreadable root rejects with zero files touched. Per-file errors
 * end up in the summary. Once the signal aborts, running files finish and no
 * new ones start.
 */
export async function runBatch(
  job: Job,
  options: BatchOptions,
): Promise<BatchSummary> {
  const { config, signal, onProgress } = options;
  const logger = options.logger ?? new Logger(config.logging.level);

  const target = validateSpeed(job.requestedSpeed, config.speed);
  logger.info(
    `Updating spindle speed to ${target.literal} RPM in ${config.scan.extension} files under ${job.root}`,
  );

  const tracker = new Tracker();
  const files = enumerate(
    scanFiles(job.root, {
      ...config.scan,
      onDiagnostic: (diagnostic) => {
        tracker.addDiagnostic(diagnostic);
        logger.warn(`Skipping ${diagnostic.path}: ${diagnostic.details}`);
        onProgress?.({ type: "diagnostic", diagnostic });
      },
    }),
    tracker,
  );

  let cancelled = false;

  async function worker(): Promise<void> {
    for (;;) {
      if (signal?.aborted) {
        cancelled = true;
        return;
      }

      const next = await files.next();
      if (next.done) return;

      // Aborted while waiting on the scanner: leave this file untouched
      if (signal?.aborted) {
        cancelled = true;
        return;
      }

      const { index, candidate } = next.value;
      logger.debug(`Processing ${candidate.relativePath}`);
      const outcome = await processFile(candidate, target, config);

      if (outcome.status === "failed") {
        logger.warn(`${candidate.relativePath}: ${outcome.details}`);
      }

      const counts = tracker.record(index, outcome);
      onProgress?.({
        type: "file",
        outcome,
        discovered: tracker.getDiscovered(),
        counts,
      });
    }
  }

  const results = await Promise.allSettled(
    Array.from({ length: config.batch.concurrency }, () => worker()),
  );
  // Close the walk when cancellation left it suspended
  await files.return(undefined);

  for (const result of results) {
    if (result.status === "rejected") {
      throw result.reason;
    }
  }

  const summary = tracker.summarize(job.root, target, cancelled);
  logger.debug(
    `Batch finished: ${summary.updatedCount} updated, ${summary.skippedCount} skipped, ${summary.failedCount} failed`,
  );
  return summary;
}
