/**
 * Scanner Module
 * Walks a directory tree and yields every file with the configured extension
 */

import glob from "fast-glob";
import { stat, realpath } from "fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import { ScanRootError, describeError } from "../utils/errors";
import type { FileCandidate, ScanConfig, ScanDiagnostic } from "../types";

export interface ScanOptions extends ScanConfig {
  onDiagnostic?: (diagnostic: ScanDiagnostic) => void;
}

/**
 * Ensure the extension has a leading dot and compare case-insensitively
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/**
 * Device + inode: the same directory reached through different paths
 * (symlinks, bind mounts) gets the same key
 */
function identityOf(stats: Stats): string {
  return `${stats.dev}:${stats.ino}`;
}

/**
 * List one directory level, resolving symlinks to their targets when asked.
 * Entries are sorted by name so the walk order is stable.
 */
async function listDirectory(
  directory: string,
  followSymlinks: boolean,
): Promise<glob.Entry[]> {
  const entries = await glob("*", {
    cwd: directory,
    // One level per call; descending is the walk's job
    deep: 1,
    absolute: true,
    dot: true,
    onlyFiles: false,
    objectMode: true,
    stats: true,
    followSymbolicLinks: followSymlinks,
    suppressErrors: false,
  });

  return entries.sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
  );
}

/**
 * Lazily enumerate candidate files under root, depth first.
 *
 * Every call walks the tree afresh. Directories are pruned once their
 * identity has been seen, so symlink cycles terminate, and a file reachable
 * through several links is yielded once (by real path).
 *
 * Throws ScanRootError when root itself cannot be read; unreadable
 * subdirectories are reported through onDiagnostic and skipped.
 */
export async function* scanFiles(
  root: string,
  options: ScanOptions,
): AsyncGenerator<FileCandidate> {
  const rootPath = path.resolve(root);
  const extension = normalizeExtension(options.extension);

  let rootStats: Stats;
  try {
    rootStats = await stat(rootPath);
  } catch (error) {
    throw new ScanRootError(rootPath, error);
  }
  if (!rootStats.isDirectory()) {
    throw new ScanRootError(rootPath, new Error("not a directory"));
  }

  const visitedDirectories = new Set<string>([identityOf(rootStats)]);
  const visitedFiles = new Set<string>();
  const pending: string[] = [rootPath];

  let directory: string | undefined;
  while ((directory = pending.pop()) !== undefined) {
    let entries: glob.Entry[];
    try {
      entries = await listDirectory(directory, options.followSymlinks);
    } catch (error) {
      if (directory === rootPath) {
        throw new ScanRootError(rootPath, error);
      }
      options.onDiagnostic?.({
        path: directory,
        reason: "unreadable-directory",
        details: describeError(error),
      });
      continue;
    }

    const subdirectories: string[] = [];

    for (const entry of entries) {
      const stats = entry.stats;
      if (!stats) continue;

      if (stats.isDirectory()) {
        const identity = identityOf(stats);
        if (!visitedDirectories.has(identity)) {
          visitedDirectories.add(identity);
          subdirectories.push(entry.path);
        }
        continue;
      }

      if (
        !stats.isFile() ||
        path.extname(entry.name).toLowerCase() !== extension
      ) {
        continue;
      }

      let realPath: string;
      try {
        realPath = await realpath(entry.path);
      } catch (error) {
        options.onDiagnostic?.({
          path: entry.path,
          reason: "unresolvable-file",
          details: describeError(error),
        });
        continue;
      }

      // Real path, not inode: a rewrite renames a new inode into place
      if (visitedFiles.has(realPath)) continue;
      visitedFiles.add(realPath);

      yield {
        path: entry.path,
        relativePath: path.relative(rootPath, entry.path),
        realPath,
      };
    }

    // Reversed so the first subdirectory (by name) is walked first
    pending.push(...subdirectories.reverse());
  }
}
