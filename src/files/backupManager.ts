import fs from "fs";
import path from "path";
import { BackupError, errorCode, errorMessage } from "../errors";
import { AtomicWriter } from "./atomicWriter";

export const DEFAULT_BACKUP_SUFFIX = ".ssosync-backup";
export const DEFAULT_BACKUP_KEEP = 5;

export interface Backup {
  originalPath: string;
  backupPath: string;
  timestamp: Date;
}

export interface BackupManagerOptions {
  suffix?: string;
  now?: () => Date;
  /** Writes restored content; restores replace the original atomically. */
  writer?: AtomicWriter;
}

const STAMP = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})_(\d{3})(?:-\d+)?$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatBackupStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `_${pad(date.getUTCMilliseconds(), 3)}`
  );
}

export function parseBackupStamp(stamp: string): Date | null {
  const m = STAMP.exec(stamp);
  if (!m) return null;
  const [, y, mo, d, h, mi, s, ms] = m.map(Number);
  return new Date(Date.UTC(y, mo - 1, d, h, mi, s, ms));
}

/**
 * Timestamped copies of a file, kept beside it as
 * `<file><suffix>_<YYYYMMDD>_<HHMMSS>_<mmm>`.  Names sort chronologically.
 */
export class BackupManager {
  readonly suffix: string;
  private readonly now: () => Date;
  private readonly writer: AtomicWriter;

  constructor(options: BackupManagerOptions = {}) {
    this.suffix = options.suffix ?? DEFAULT_BACKUP_SUFFIX;
    this.now = options.now ?? (() => new Date());
    this.writer = options.writer ?? new AtomicWriter();
  }

  /** Copy `file` to a new backup.  Returns null when there is nothing to protect. */
  async snapshot(file: string): Promise<Backup | null> {
    let content: Buffer;
    try {
      content = await fs.promises.readFile(file);
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw new BackupError("snapshot", file, `cannot read source: ${errorMessage(err)}`, err);
    }

    const timestamp = this.now();
    const base = `${file}${this.suffix}_${formatBackupStamp(timestamp)}`;

    for (let attempt = 0; ; attempt++) {
      const backupPath = attempt === 0 ? base : `${base}-${attempt}`;
      try {
        await fs.promises.writeFile(backupPath, content, { flag: "wx" });
        return { originalPath: file, backupPath, timestamp };
      } catch (err) {
        if (errorCode(err) === "EEXIST" && attempt < 100) continue;
        throw new BackupError("snapshot", file, `cannot write ${backupPath}: ${errorMessage(err)}`, err);
      }
    }
  }

  async restore(backup: Backup): Promise<void> {
    let content: Buffer;
    try {
      content = await fs.promises.readFile(backup.backupPath);
    } catch (err) {
      const details =
        errorCode(err) === "ENOENT"
          ? `backup ${backup.backupPath} does not exist`
          : `cannot read ${backup.backupPath}: ${errorMessage(err)}`;
      throw new BackupError("restore", backup.originalPath, details, err);
    }

    try {
      await this.writer.write(backup.originalPath, content);
    } catch (err) {
      throw new BackupError("restore", backup.originalPath, errorMessage(err), err);
    }
  }

  /** Backups of `file`, newest first. */
  async list(file: string): Promise<Backup[]> {
    const dir = path.dirname(file);
    const prefix = `${path.basename(file)}${this.suffix}_`;

    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch (err) {
      if (errorCode(err) === "ENOENT") return [];
      throw new BackupError("prune", file, errorMessage(err), err);
    }

    const backups: Backup[] = [];
    for (const name of names) {
      if (!name.startsWith(prefix)) continue;
      const timestamp = parseBackupStamp(name.slice(prefix.length));
      if (!timestamp) continue;
      backups.push({ originalPath: file, backupPath: path.join(dir, name), timestamp });
    }

    return backups.sort((a, b) =>
      a.backupPath < b.backupPath ? 1 : a.backupPath > b.backupPath ? -1 : 0
    );
  }

  async latest(file: string): Promise<Backup | null> {
    const [newest] = await this.list(file);
    return newest ?? null;
  }

  /** Delete all but the `keep` newest backups of `file`; `current` is always kept. */
  async prune(file: string, keep: number = DEFAULT_BACKUP_KEEP, current?: Backup | null): Promise<string[]> {
    const backups = await this.list(file);
    const removed: string[] = [];

    for (const backup of backups.slice(Math.max(keep, 0))) {
      if (current && backup.backupPath === current.backupPath) continue;
      try {
        await fs.promises.rm(backup.backupPath, { force: true });
      } catch (err) {
        throw new BackupError("prune", file, errorMessage(err), err);
      }
      removed.push(backup.backupPath);
    }
    return removed;
  }

  isBackupPath(candidate: string): boolean {
    const marker = `${this.suffix}_`;
    const at = candidate.lastIndexOf(marker);
    return at > 0 && parseBackupStamp(candidate.slice(at + marker.length)) !== null;
  }

  originalPathOf(backupPath: string): string {
    if (!this.isBackupPath(backupPath)) return backupPath;
    return backupPath.slice(0, backupPath.lastIndexOf(`${this.suffix}_`));
  }
}
