/**
 * File-related type definitions
 */

export interface FileCandidate {
  path: string; // Path as discovered under the scan root
  relativePath: string; // Relative path from scan root
  realPath: string; // Symlink-resolved path, the one that gets rewritten
}

/**
 * Character range, end exclusive
 */
export interface Span {
  start: number;
  end: number;
}

export interface TokenMatch {
  filePath: string;
  lineIndex: number; // Zero-based line number
  // Span of the numeric literal within its line (command letter excluded)
  // Example: "S8000 M3" -> { start: 1, end: 5 }
  column: Span;
  // Same span measured from the start of the file text
  offset: Span;
  literal: string; // Numeric literal as written, e.g. "8000"
  currentSpeed: number;
}

export type ScanDiagnosticReason = "unreadable-directory" | "unresolvable-file";

export interface ScanDiagnostic {
  path: string;
  reason: ScanDiagnosticReason;
  details: string;
}

/**
 * File contents plus the metadata needed to detect concurrent edits
 */
export interface FileSnapshot {
  bytes: Buffer;
  mtimeMs: number;
  size: number;
  mode: number;
}
