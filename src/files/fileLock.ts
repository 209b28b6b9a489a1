import fs from "fs";
import path from "path";
import { LockTimeoutError, WriteError, errorCode, errorMessage } from "../errors";

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;

export interface FileLockOptions {
  timeoutMs?: number;
  retryIntervalMs?: number;
  /** A lock file older than this is treated as abandoned by a dead process. */
  staleMs?: number;
}

export interface FileLock {
  readonly lockPath: string;
  release(): Promise<void>;
}

// Lock files this process holds; removed synchronously if the process exits.
const held = new Set<string>();
let exitHookInstalled = false;

function installExitHook(): void {
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.on("exit", () => {
    for (const lockPath of held) fs.rmSync(lockPath, { force: true });
  });
}

export function lockPathFor(target: string): string {
  return `${target}.lock`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type LockState = "missing" | "stale" | "fresh";

async function lockState(lockPath: string, staleMs: number): Promise<LockState> {
  try {
    const stat = await fs.promises.stat(lockPath);
    return Date.now() - stat.mtimeMs < staleMs ? "fresh" : "stale";
  } catch (err) {
    if (errorCode(err) === "ENOENT") return "missing";
    throw err;
  }
}

/**
 * Remove an abandoned lock.  Waiters that find the same stale lock serialize
 * on `<lock>.takeover` and re-check under it, so a lock a competing waiter
 * has just created is never removed.  Returns true when the caller should
 * retry the lock right away.
 */
async function takeOverIfStale(lockPath: string, staleMs: number): Promise<boolean> {
  if ((await lockState(lockPath, staleMs)) === "fresh") return false;

  const guardPath = `${lockPath}.takeover`;
  try {
    await (await fs.promises.open(guardPath, "wx")).close();
  } catch (err) {
    if (errorCode(err) !== "EEXIST") throw err;
    if ((await lockState(guardPath, staleMs)) === "stale") {
      await fs.promises.rm(guardPath, { force: true });
    }
    return false;
  }

  try {
    const state = await lockState(lockPath, staleMs);
    if (state === "fresh") return false;
    if (state === "stale") await fs.promises.rm(lockPath, { force: true });
    return true;
  } finally {
    await fs.promises.rm(guardPath, { force: true });
  }
}

/**
 * Take an exclusive advisory lock on `target` by creating `<target>.lock`.
 * Waits up to `timeoutMs` for another holder, then fails with
 * LockTimeoutError.
 */
export async function acquireFileLock(target: string, options: FileLockOptions = {}): Promise<FileLock> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  const retryIntervalMs = options.retryIntervalMs ?? 50;
  const staleMs = options.staleMs ?? 30_000;
  const lockPath = lockPathFor(target);
  const deadline = Date.now() + timeoutMs;

  try {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
  } catch (err) {
    throw new WriteError(target, errorMessage(err), errorCode(err), err);
  }

  for (;;) {
    try {
      const handle = await fs.promises.open(lockPath, "wx");
      try {
        await handle.writeFile(JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }));
      } finally {
        await handle.close();
      }
      break;
    } catch (err) {
      if (errorCode(err) !== "EEXIST") {
        throw new WriteError(lockPath, errorMessage(err), errorCode(err), err);
      }
    }

    let retryNow: boolean;
    try {
      retryNow = await takeOverIfStale(lockPath, staleMs);
    } catch (err) {
      throw new WriteError(lockPath, errorMessage(err), errorCode(err), err);
    }
    if (retryNow) continue;
    if (Date.now() >= deadline) throw new LockTimeoutError(target, timeoutMs);
    await sleep(Math.min(retryIntervalMs, Math.max(deadline - Date.now(), 1)));
  }

  installExitHook();
  held.add(lockPath);

  let released = false;
  return {
    lockPath,
    async release() {
      if (released) return;
      released = true;
      held.delete(lockPath);
      await fs.promises.rm(lockPath, { force: true });
    },
  };
}

/** Run `fn` while holding the lock on `target`. */
export async function withFileLock<T>(
  target: string,
  options: FileLockOptions,
  fn: () => Promise<T>
): Promise<T> {
  const lock = await acquireFileLock(target, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
