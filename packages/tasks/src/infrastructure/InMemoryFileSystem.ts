import { Ok, Err, type Result } from "@tasklist/core";
import type { FileSystem, FileStats } from "../core/ports/FileSystem.js";

export type FileOperation = "read" | "write" | "copy" | "rename" | "stats" | "ensureDir";

interface StoredFile {
  content: string;
  mtimeMs: number;
  birthtimeMs: number;
}

function notFound(filePath: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, '${filePath}'`), {
    code: "ENOENT",
  });
}

/**
 * In-memory FileSystem for tests.
 * Operations can be made to fail per path to exercise recovery paths.
 */
export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, StoredFile>();
  private dirs = new Set<string>();
  private failures = new Map<FileOperation, Set<string>>();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Make an operation fail for a path (for copy/rename, the source path).
   */
  fail(operation: FileOperation, filePath: string): void {
    const paths = this.failures.get(operation) ?? new Set<string>();
    paths.add(filePath);
    this.failures.set(operation, paths);
  }

  /**
   * Clear all injected failures.
   */
  heal(): void {
    this.failures.clear();
  }

  /** Paths of all stored files, sorted */
  list(): string[] {
    return [...this.files.keys()].sort();
  }

  private injected(operation: FileOperation, filePath: string): Error | null {
    if (this.failures.get(operation)?.has(filePath)) {
      return new Error(`Injected ${operation} failure: ${filePath}`);
    }
    return null;
  }

  read(filePath: string): Result<string, Error> {
    const failure = this.injected("read", filePath);
    if (failure) return Err(failure);
    const file = this.files.get(filePath);
    if (!file) return Err(notFound(filePath));
    return Ok(file.content);
  }

  write(filePath: string, content: string): Result<void, Error> {
    const failure = this.injected("write", filePath);
    if (failure) return Err(failure);
    const existing = this.files.get(filePath);
    const now = this.now();
    this.files.set(filePath, { content, mtimeMs: now, birthtimeMs: existing?.birthtimeMs ?? now });
    return Ok(undefined);
  }

  exists(filePath: string): boolean {
    return this.files.has(filePath) || this.dirs.has(filePath);
  }

  stats(filePath: string): Result<FileStats, Error> {
    const failure = this.injected("stats", filePath);
    if (failure) return Err(failure);
    const file = this.files.get(filePath);
    if (!file) return Err(notFound(filePath));
    return Ok({
      size: Buffer.byteLength(file.content, "utf-8"),
      mtimeMs: file.mtimeMs,
      birthtimeMs: file.birthtimeMs,
    });
  }

  copy(from: string, to: string): Result<void, Error> {
    const failure = this.injected("copy", from);
    if (failure) return Err(failure);
    const file = this.files.get(from);
    if (!file) return Err(notFound(from));
    const now = this.now();
    this.files.set(to, { content: file.content, mtimeMs: now, birthtimeMs: now });
    return Ok(undefined);
  }

  rename(oldPath: string, newPath: string): Result<void, Error> {
    const failure = this.injected("rename", oldPath);
    if (failure) return Err(failure);
    const file = this.files.get(oldPath);
    if (!file) return Err(notFound(oldPath));
    this.files.delete(oldPath);
    this.files.set(newPath, file);
    return Ok(undefined);
  }

  ensureDir(dirPath: string): Result<void, Error> {
    const failure = this.injected("ensureDir", dirPath);
    if (failure) return Err(failure);
    this.dirs.add(dirPath);
    return Ok(undefined);
  }
}
