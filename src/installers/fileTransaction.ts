import fs from "fs";
import { isUtf8 } from "buffer";
import { AtomicWriter } from "../files/atomicWriter";
import { type Backup, BackupManager, DEFAULT_BACKUP_KEEP } from "../files/backupManager";
import { DEFAULT_LOCK_TIMEOUT_MS, acquireFileLock } from "../files/fileLock";
import { BackupError, SsoSyncError, WriteError, errorCode, errorMessage } from "../errors";

export type Logger = Pick<Console, "log" | "warn" | "error">;

export interface TransactionDeps {
  backups?: BackupManager;
  writer?: AtomicWriter;
  logger?: Logger;
  lockTimeoutMs?: number;
  lockRetryIntervalMs?: number;
  backupKeep?: number;
}

export interface TransactionResult {
  path: string;
  changed: boolean;
  backup: Backup | null;
  /** Content of the file after the transaction. */
  content: string;
}

async function readIfExists(file: string): Promise<Buffer | null> {
  try {
    return await fs.promises.readFile(file);
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    throw new WriteError(file, `cannot read: ${errorMessage(err)}`, errorCode(err), err);
  }
}

function asSyncError(err: unknown, file: string): SsoSyncError {
  const wrapped = err instanceof SsoSyncError ? err : new WriteError(file, errorMessage(err), errorCode(err), err);
  wrapped.path = wrapped.path ?? file;
  return wrapped;
}

/**
 * Lock `file`, compute its new content from the current one, and replace it
 * atomically with a backup taken first.  A failure during or after the write
 * restores the previous content before the error is re-thrown, so the file is
 * always either fully old or fully new.
 *
 * Files that are not valid UTF-8 are decoded and re-encoded as latin1, which
 * maps every byte to one character and back, so bytes `compute` leaves alone
 * are written out unchanged.
 */
export async function runFileTransaction(
  file: string,
  compute: (current: string) => string | Buffer,
  deps: TransactionDeps = {}
): Promise<TransactionResult> {
  const backups = deps.backups ?? new BackupManager();
  const writer = deps.writer ?? new AtomicWriter();
  const logger = deps.logger ?? console;

  const lock = await acquireFileLock(file, {
    timeoutMs: deps.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS,
    retryIntervalMs: deps.lockRetryIntervalMs,
  });

  try {
    let currentBytes: Buffer | null;
    let nextBytes: Buffer;
    let encoding: BufferEncoding = "utf-8";
    try {
      const stray = await writer.cleanupStaleTemps(file);
      if (stray.length > 0 && process.env.DEBUG) {
        // eslint-disable-next-line no-console
        console.debug(`Removed ${stray.length} leftover temp file(s) for ${file}`);
      }
      currentBytes = await readIfExists(file);
      if (currentBytes && !isUtf8(currentBytes)) encoding = "latin1";
      const next = compute(currentBytes?.toString(encoding) ?? "");
      nextBytes = Buffer.isBuffer(next) ? next : Buffer.from(next, encoding);
    } catch (err) {
      throw asSyncError(err, file);
    }
    const content = nextBytes.toString(encoding);

    if (nextBytes.equals(currentBytes ?? Buffer.alloc(0))) {
      return { path: file, changed: false, backup: null, content };
    }

    const backup = await backups.snapshot(file).catch((err: unknown) => {
      throw asSyncError(err, file);
    });

    try {
      await writer.write(file, nextBytes);
      const written = await fs.promises.readFile(file);
      if (!written.equals(nextBytes)) {
        throw new WriteError(file, "content read back differs from what was written");
      }
    } catch (err) {
      const failure = asSyncError(err, file);
      try {
        if (backup) await backups.restore(backup);
        else await fs.promises.rm(file, { force: true });
        failure.rolledBack = true;
      } catch (restoreErr) {
        logger.error(`Rollback of ${file} failed: ${errorMessage(restoreErr)}`);
        throw asSyncError(restoreErr, file);
      }
      throw failure;
    }

    try {
      await backups.prune(file, deps.backupKeep ?? DEFAULT_BACKUP_KEEP, backup);
    } catch (err) {
      logger.warn(`Could not prune old backups of ${file}: ${errorMessage(err)}`);
    }

    return { path: file, changed: true, backup, content };
  } finally {
    await lock.release();
  }
}

/**
 * Put the newest backup of `file` back in place.  Runs as a normal
 * transaction, so the content being replaced is itself backed up first.
 */
export async function restoreLatestBackup(
  file: string,
  deps: TransactionDeps = {}
): Promise<TransactionResult & { restoredFrom: Backup }> {
  const backups = deps.backups ?? new BackupManager();
  const latest = await backups.latest(file);
  if (!latest) {
    throw new SsoSyncError(`No backup found for ${file}`, { path: file });
  }

  let content: Buffer;
  try {
    content = await fs.promises.readFile(latest.backupPath);
  } catch (err) {
    throw new BackupError("restore", file, `cannot read ${latest.backupPath}: ${errorMessage(err)}`, err);
  }

  const result = await runFileTransaction(file, () => content, { ...deps, backups });
  return { ...result, restoredFrom: latest };
}
