import { open } from "fs/promises";
import type { FileSnapshot } from "../types";

/**
 * Read a file's bytes together with the stats taken from the same handle
 */
export async function readSnapshot(path: string): Promise<FileSnapshot> {
  const handle = await open(path, "r");
  try {
    const stats = await handle.stat();
    const bytes = await handle.readFile();
    return {
      bytes,
      mtimeMs: stats.mtimeMs,
      size: stats.size,
      mode: stats.mode & 0o7777,
    };
  } finally {
    await handle.close();
  }
}
