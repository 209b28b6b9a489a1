import fs from "fs";
import path from "path";
import { randomBytes } from "crypto";
import { WriteError, errorCode, errorMessage } from "../errors";

const TEMP_MARKER = ".ssosync-tmp-";

// Temp files of writes in flight; removed synchronously if the process exits mid-write.
const pending = new Set<string>();
let exitHookInstalled = false;

function trackTemp(tempPath: string): void {
  if (!exitHookInstalled) {
    exitHookInstalled = true;
    process.on("exit", () => {
      for (const leftover of pending) fs.rmSync(leftover, { force: true });
    });
  }
  pending.add(tempPath);
}

function tempPrefix(target: string): string {
  return `.${path.basename(target)}${TEMP_MARKER}`;
}

/**
 * Writes files so that readers only ever see the old or the new content:
 * the content goes to a temporary sibling which is then renamed over the
 * target.  A crash before the rename leaves the target untouched and a stray
 * temp file that `cleanupStaleTemps` removes on the next run.
 */
export class AtomicWriter {
  async write(target: string, content: string | Buffer): Promise<void> {
    const dir = path.dirname(target);
    const tempPath = path.join(
      dir,
      `${tempPrefix(target)}${process.pid}-${randomBytes(4).toString("hex")}`
    );

    trackTemp(tempPath);
    try {
      await fs.promises.mkdir(dir, { recursive: true });
      const mode = await this.existingMode(target);

      const handle = await fs.promises.open(tempPath, "wx", mode ?? 0o644);
      try {
        await handle.writeFile(content);
        await handle.sync();
      } finally {
        await handle.close();
      }
      if (mode !== undefined) await fs.promises.chmod(tempPath, mode);

      await fs.promises.rename(tempPath, target);
    } catch (err) {
      await fs.promises.rm(tempPath, { force: true });
      if (err instanceof WriteError) throw err;
      throw new WriteError(target, errorMessage(err), errorCode(err), err);
    } finally {
      pending.delete(tempPath);
    }
  }

  /** Remove temp files left behind by an interrupted write to `target`. */
  async cleanupStaleTemps(target: string): Promise<string[]> {
    const dir = path.dirname(target);
    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch (err) {
      if (errorCode(err) === "ENOENT") return [];
      throw new WriteError(target, errorMessage(err), errorCode(err), err);
    }

    const prefix = tempPrefix(target);
    const removed: string[] = [];
    for (const name of names) {
      if (!name.startsWith(prefix)) continue;
      const stale = path.join(dir, name);
      await fs.promises.rm(stale, { force: true });
      removed.push(stale);
    }
    return removed;
  }

  private async existingMode(target: string): Promise<number | undefined> {
    try {
      const stat = await fs.promises.stat(target);
      return stat.mode & 0o777;
    } catch (err) {
      if (errorCode(err) === "ENOENT") return undefined;
      throw err;
    }
  }
}
