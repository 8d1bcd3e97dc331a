import { promises as fs } from "fs";
import path from "path";
import { LockError } from "../errors";
import { ensureDir } from "../utils/fs";

interface LockOwner {
  pid: number;
  acquiredAt: string;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") return error.code;
  return undefined;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: alive but owned by someone else
    return errnoCode(error) === "EPERM";
  }
}

async function readOwner(lockPath: string): Promise<LockOwner | null> {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(lockPath, "utf8"));
    if (typeof parsed !== "object" || parsed === null) return null;
    const pid = "pid" in parsed ? parsed.pid : undefined;
    const acquiredAt = "acquiredAt" in parsed ? parsed.acquiredAt : undefined;
    if (typeof pid !== "number" || typeof acquiredAt !== "string") return null;
    return { pid, acquiredAt };
  } catch {
    return null;
  }
}

/**
 * Exclusive advisory lock around one pipeline run. The lock file holds the
 * owner's pid; a file whose owner is gone is taken over.
 */
export class PipelineLock {
  private released = false;

  private constructor(public readonly lockPath: string) {}

  static async acquire(lockPath: string, now: () => Date = () => new Date()): Promise<PipelineLock> {
    await ensureDir(path.dirname(lockPath));
    const owner: LockOwner = { pid: process.pid, acquiredAt: now().toISOString() };

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        await fs.writeFile(lockPath, JSON.stringify(owner), { flag: "wx" });
        return new PipelineLock(lockPath);
      } catch (error) {
        if (errnoCode(error) !== "EEXIST") throw error;
      }

      const current = await readOwner(lockPath);
      if (current && isProcessAlive(current.pid)) {
        throw new LockError(
          `Another pipeline run (pid ${current.pid}, since ${current.acquiredAt}) holds ${lockPath}`
        );
      }
      await fs.rm(lockPath, { force: true });
    }

    throw new LockError(`Could not acquire ${lockPath}`);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await fs.rm(this.lockPath, { force: true });
  }
}
