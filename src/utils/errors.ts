/**
 * Error taxonomy
 * Batch-level errors reject a run before any file is touched;
 * per-file errors are turned into failed outcomes by the orchestrator.
 */

export class SpindleSpeedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Speed that is not a positive finite number
 */
export class InvalidSpeedError extends SpindleSpeedError {
  constructor(
    readonly input: string | number,
    message = `Invalid spindle speed: ${input}`,
  ) {
    super(message);
  }
}

export class OutOfRangeSpeedError extends SpindleSpeedError {
  constructor(
    readonly speed: number,
    readonly minRpm: number,
    readonly maxRpm: number,
  ) {
    super(`Spindle speed must be between ${minRpm} and ${maxRpm} RPM`);
  }
}

/**
 * Scan root is missing, not a directory, or cannot be listed
 */
export class ScanRootError extends SpindleSpeedError {
  constructor(
    readonly root: string,
    cause: unknown,
  ) {
    super(`Cannot read scan root ${root}: ${describeError(cause)}`, { cause });
  }
}

export type WriteStage = "write" | "modified" | "replace";

/**
 * Commit of a rewritten file did not complete; the original is untouched
 */
export class WriteFailureError extends SpindleSpeedError {
  constructor(
    readonly path: string,
    readonly stage: WriteStage,
    cause: unknown,
    readonly leftoverTempPath?: string,
  ) {
    super(
      `Failed to ${describeStage(stage)} ${path}: ${describeError(cause)}` +
        (leftoverTempPath ? ` (temporary file left at ${leftoverTempPath})` : ""),
      { cause },
    );
  }
}

function describeStage(stage: WriteStage): string {
  switch (stage) {
    case "write":
      return "write temporary file for";
    case "modified":
      return "update";
    case "replace":
      return "replace";
  }
}

/**
 * Human-readable message for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
