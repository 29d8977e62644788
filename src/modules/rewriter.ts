/**
 * Rewriter Module
 * Substitutes the speed literal and commits the result atomically
 */

import { open, chmod, stat, rename, rm, type FileHandle } from "fs/promises";
import path from "node:path";
import { IdGenerator } from "../utils/id-generator";
import { WriteFailureError, type WriteStage } from "../utils/errors";
import type { TargetSpeed, TokenMatch } from "../types";

// Files are decoded byte-for-byte so untouched bytes round-trip exactly
export const FILE_ENCODING: BufferEncoding = "latin1";

const tempIds = new IdGenerator();

export interface WriteOptions {
  // Permission bits to carry over to the replacement file
  mode?: number;
  // Stats of the target when it was read; a mismatch aborts the commit
  expected?: { mtimeMs: number; size: number };
}

/**
 * Replace exactly the matched literal; every other character is kept
 */
export function replaceSpeedToken(
  text: string,
  match: TokenMatch,
  target: TargetSpeed,
): string {
  const { start, end } = match.offset;
  if (text.slice(start, end) !== match.literal) {
    throw new Error(
      `Token at ${start}-${end} in ${match.filePath} no longer reads "${match.literal}"`,
    );
  }
  return text.slice(0, start) + target.literal + text.slice(end);
}

/**
 * Temp file beside the target, so the final rename stays on one filesystem
 */
export function tempPathFor(target: string, id: string): string {
  return path.join(path.dirname(target), `.${path.basename(target)}.${id}.tmp`);
}

async function writeTemp(
  handle: FileHandle,
  content: Buffer,
): Promise<void> {
  try {
    await handle.writeFile(content);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function assertUnchanged(
  target: string,
  expected: NonNullable<WriteOptions["expected"]>,
): Promise<void> {
  const current = await stat(target);
  if (current.mtimeMs !== expected.mtimeMs || current.size !== expected.size) {
    throw new Error("file was modified after it was read");
  }
}

/**
 * Write content to a temp file, persist it, then rename it over the target.
 * Until the rename succeeds the target is never opened for writing; on any
 * failure the temp file is removed and a WriteFailureError is thrown.
 */
export async function writeFileAtomic(
  target: string,
  content: Buffer,
  options: WriteOptions = {},
): Promise<void> {
  const id = tempIds.generate();
  const tempPath = tempPathFor(target, id);
  let stage: WriteStage = "write";
  let created = false;

  try {
    // "wx": fail rather than clobber an existing file of the same name
    const handle = await open(tempPath, "wx");
    created = true;
    await writeTemp(handle, content);
    if (options.mode !== undefined) {
      await chmod(tempPath, options.mode);
    }

    if (options.expected) {
      stage = "modified";
      await assertUnchanged(target, options.expected);
    }

    stage = "replace";
    await rename(tempPath, target);
  } catch (error) {
    const removed =
      !created ||
      (await rm(tempPath, { force: true }).then(
        () => true,
        () => false,
      ));
    throw new WriteFailureError(
      target,
      stage,
      error,
      removed ? undefined : tempPath,
    );
  } finally {
    tempIds.release(id);
  }
}
