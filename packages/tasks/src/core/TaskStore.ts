/**
 * Task store - JSON file persistence with backups.
 *
 * Every overwrite is preceded by a copy to `<file>.bak`; a file that fails to
 * parse is moved aside to `<file>.backup_<YYYYMMDD_HHMMSS>` and replaced by an
 * empty list. No operation throws.
 */

import { dirname } from "node:path";
import { Ok, Err, map, mapErr, unwrapOr, tryCatch, silentLogger, type Logger, type Result } from "@tasklist/core";
import type { FileSystem } from "./ports/FileSystem.js";
import { isNotFound } from "./ports/FileSystem.js";
import type { LoadReport, StoreStats, TaskRecord } from "./model.js";
import { StoredRecordSchema, type StoredRecord } from "./schema.js";
import { formatBackupStamp } from "./dates.js";

export interface TaskStoreOptions {
  fs: FileSystem;
  now?: () => Date;
  logger?: Logger;
}

const EMPTY_FILE = "[]\n";

export class TaskStore {
  private readonly fs: FileSystem;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    readonly filePath: string,
    options: TaskStoreOptions
  ) {
    this.fs = options.fs;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? silentLogger;
  }

  /** Fixed backup written before every save */
  get backupPath(): string {
    return `${this.filePath}.bak`;
  }

  /**
   * Create the file with an empty list if it does not exist.
   */
  ensureStorageExists(): Result<void, string> {
    if (this.fs.exists(this.filePath)) {
      return Ok(undefined);
    }

    const dir = dirname(this.filePath);
    const created: Result<void, Error> = this.fs.exists(dir) ? Ok(undefined) : this.fs.ensureDir(dir);
    const written = created.ok ? this.fs.write(this.filePath, EMPTY_FILE) : created;

    if (!written.ok) {
      this.log.error(`Could not create ${this.filePath}`, written.error);
      return Err(`Could not create ${this.filePath}: ${written.error.message}`);
    }
    return Ok(undefined);
  }

  /**
   * Read all records. Missing and corrupt files are healed; the report says which.
   */
  load(): LoadReport<StoredRecord> {
    if (!this.fs.exists(this.filePath)) {
      return this.createEmpty();
    }

    const read = this.fs.read(this.filePath);
    if (!read.ok) {
      if (isNotFound(read.error)) {
        return this.createEmpty();
      }
      this.log.error(`Could not read ${this.filePath}`, read.error);
      return { status: "unreadable", records: [], message: read.error.message };
    }

    const parsed = tryCatch((): unknown => JSON.parse(read.value));
    if (!parsed.ok) {
      return this.recoverCorrupt(parsed.error);
    }

    const data = parsed.value;
    if (!Array.isArray(data)) {
      const message = `${this.filePath} does not contain a task list`;
      this.log.warn(message);
      return { status: "unreadable", records: [], message };
    }

    const { records, skipped } = this.parseRecords(data);
    if (skipped === 0) {
      return { status: "loaded", records };
    }

    // Skipped elements are not written back by the next save; keep the file as read.
    const kept = this.backup();
    const message = kept.ok
      ? `Skipped ${skipped} invalid record(s); original file kept at ${kept.value}`
      : `Skipped ${skipped} invalid record(s); ${kept.error}`;
    this.log.warn(message);
    return {
      status: "loaded",
      records,
      backupPath: kept.ok ? kept.value : undefined,
      message,
    };
  }

  /**
   * Replace the file with `records`, backing up the previous contents first.
   * On a failed write the file is restored from the backup.
   */
  save(records: TaskRecord[]): Result<void, string> {
    if (this.fs.exists(this.filePath)) {
      const copied = this.fs.copy(this.filePath, this.backupPath);
      if (!copied.ok) {
        this.log.warn(`Could not back up before saving: ${copied.error.message}`);
      }
    }

    const content = `${JSON.stringify(records, null, 2)}\n`;
    const written = this.fs.write(this.filePath, content);
    if (written.ok) {
      return Ok(undefined);
    }

    this.log.error(`Could not save ${this.filePath}`, written.error);
    this.restoreFromBackup();
    return mapErr(written, (error) => `Could not save tasks: ${error.message}`);
  }

  /**
   * Copy the current file to a new timestamped backup.
   */
  backup(): Result<string, string> {
    if (!this.fs.exists(this.filePath)) {
      return Err(`Nothing to back up: ${this.filePath} does not exist`);
    }

    const target = this.timestampedBackupPath();
    const copied = this.fs.copy(this.filePath, target);
    if (!copied.ok) {
      this.log.error("Could not create backup", copied.error);
    }
    return mapErr(
      map(copied, () => target),
      (error) => `Could not create backup: ${error.message}`
    );
  }

  /**
   * File size and times, or null if the file is missing or unreadable.
   */
  stats(): StoreStats | null {
    if (!this.fs.exists(this.filePath)) {
      return null;
    }
    const stats = map(this.fs.stats(this.filePath), (stat): StoreStats | null => ({
      size: stat.size,
      modifiedAt: new Date(stat.mtimeMs),
      createdAt: new Date(stat.birthtimeMs),
    }));
    return unwrapOr(stats, null);
  }

  private createEmpty(): LoadReport<StoredRecord> {
    const created = this.ensureStorageExists();
    if (!created.ok) {
      return { status: "unreadable", records: [], message: created.error };
    }
    this.log.info(`Created ${this.filePath}`);
    return { status: "created", records: [] };
  }

  private recoverCorrupt(cause: Error): LoadReport<StoredRecord> {
    this.log.error(`Could not parse ${this.filePath}`, cause);

    const target = this.timestampedBackupPath();
    const moved = this.fs.rename(this.filePath, target);
    if (!moved.ok) {
      this.log.error("Could not move the corrupt file aside", moved.error);
      return { status: "unreadable", records: [], message: moved.error.message };
    }
    this.log.info(`Corrupt file moved to ${target}`);

    this.ensureStorageExists();
    return {
      status: "recovered",
      records: [],
      backupPath: target,
      message: `Corrupt task file moved to ${target}`,
    };
  }

  private parseRecords(data: unknown[]): { records: StoredRecord[]; skipped: number } {
    const records: StoredRecord[] = [];
    let skipped = 0;
    data.forEach((item, index) => {
      const parsed = StoredRecordSchema.safeParse(item);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        skipped += 1;
        this.log.warn(`Skipping invalid record at index ${index}`);
      }
    });
    return { records, skipped };
  }

  private restoreFromBackup(): void {
    if (!this.fs.exists(this.backupPath)) {
      return;
    }
    const restored = this.fs.copy(this.backupPath, this.filePath);
    if (restored.ok) {
      this.log.info(`Restored ${this.filePath} from ${this.backupPath}`);
    } else {
      this.log.error("Could not restore from backup", restored.error);
    }
  }

  // Backups are never overwritten: a second one within the same second gets a suffix.
  private timestampedBackupPath(): string {
    const base = `${this.filePath}.backup_${formatBackupStamp(this.now())}`;
    let candidate = base;
    for (let n = 1; this.fs.exists(candidate); n++) {
      candidate = `${base}_${n}`;
    }
    return candidate;
  }
}
