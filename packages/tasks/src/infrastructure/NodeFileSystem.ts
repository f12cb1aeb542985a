import fs from "node:fs";
import path from "node:path";
import { tryCatch, type Result } from "@tasklist/core";
import type { FileSystem, FileStats } from "../core/ports/FileSystem.js";

/**
 * Node.js implementation of the FileSystem port.
 * Relative paths resolve against the base path (the working directory by default).
 */
export class NodeFileSystem implements FileSystem {
  private readonly basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath ?? process.cwd();
  }

  private resolvePath(filePath: string): string {
    if (path.isAbsolute(filePath)) {
      return filePath;
    }
    return path.resolve(this.basePath, filePath);
  }

  read(filePath: string): Result<string, Error> {
    return tryCatch(() => fs.readFileSync(this.resolvePath(filePath), "utf-8"));
  }

  write(filePath: string, content: string): Result<void, Error> {
    return tryCatch(() => fs.writeFileSync(this.resolvePath(filePath), content, "utf-8"));
  }

  exists(filePath: string): boolean {
    return fs.existsSync(this.resolvePath(filePath));
  }

  stats(filePath: string): Result<FileStats, Error> {
    return tryCatch(() => {
      const stat = fs.statSync(this.resolvePath(filePath));
      return { size: stat.size, mtimeMs: stat.mtimeMs, birthtimeMs: stat.birthtimeMs };
    });
  }

  copy(from: string, to: string): Result<void, Error> {
    return tryCatch(() => fs.copyFileSync(this.resolvePath(from), this.resolvePath(to)));
  }

  rename(oldPath: string, newPath: string): Result<void, Error> {
    return tryCatch(() => fs.renameSync(this.resolvePath(oldPath), this.resolvePath(newPath)));
  }

  ensureDir(dirPath: string): Result<void, Error> {
    return tryCatch(() => {
      fs.mkdirSync(this.resolvePath(dirPath), { recursive: true });
    });
  }
}
