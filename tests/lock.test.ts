import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { PipelineLock } from "../src/pipeline/lock";
import { LockError } from "../src/errors";
import { pathExists } from "../src/utils/fs";
import { makeTempDir, readText, removeDir } from "./helpers";

describe("Pipeline lock", () => {
  let dir: string;
  let lockPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    lockPath = path.join(dir, "data", ".pipeline.lock");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("records the owning pid and removes the file on release", async () => {
    const lock = await PipelineLock.acquire(lockPath, () => new Date("2026-01-05T10:00:00Z"));

    expect(JSON.parse(await readText(lockPath))).toEqual({
      pid: process.pid,
      acquiredAt: "2026-01-05T10:00:00.000Z"
    });

    await lock.release();
    expect(await pathExists(lockPath)).toBe(false);
  });

  it("refuses a second holder while the owner is alive", async () => {
    const lock = await PipelineLock.acquire(lockPath);
    try {
      await expect(PipelineLock.acquire(lockPath)).rejects.toBeInstanceOf(LockError);
    } finally {
      await lock.release();
    }
  });

  it("takes over a lock file it cannot attribute to a live process", async () => {
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, "garbage");

    const lock = await PipelineLock.acquire(lockPath);

    expect(JSON.parse(await readText(lockPath)).pid).toBe(process.pid);
    await lock.release();
  });
});
