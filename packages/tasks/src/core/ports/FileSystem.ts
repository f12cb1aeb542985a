import type { Result } from "@tasklist/core";

export interface FileStats {
  size: number;
  mtimeMs: number;
  birthtimeMs: number;
}

/**
 * Port for the file operations the task store needs.
 * Implementations report failures as Results and never throw.
 */
export interface FileSystem {
  read(filePath: string): Result<string, Error>;

  /** Replace the file's contents */
  write(filePath: string, content: string): Result<void, Error>;

  exists(filePath: string): boolean;

  stats(filePath: string): Result<FileStats, Error>;

  /** Copy a file, overwriting the destination */
  copy(from: string, to: string): Result<void, Error>;

  rename(oldPath: string, newPath: string): Result<void, Error>;

  /** Create a directory and its parents */
  ensureDir(dirPath: string): Result<void, Error>;
}

/**
 * True when the error is a missing-file error.
 */
export function isNotFound(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}
