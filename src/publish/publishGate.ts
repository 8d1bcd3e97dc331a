import { promises as fs } from "fs";
import path from "path";
import { moveFile, pathExists, writeFileAtomic } from "../utils/fs";
import { BuildError, ErrorCodes, PublishError, errorMessage } from "../errors";

export async function verifyArtifacts(workDir: string, names: string[]): Promise<string[]> {
  const missing: string[] = [];
  for (const name of names) {
    if (!(await pathExists(path.join(workDir, name)))) missing.push(name);
  }
  if (missing.length) {
    throw new BuildError(
      `Build reported success but expected artifacts are missing from ${workDir}: ${missing.join(", ")}`,
      ErrorCodes.ARTIFACT_MISSING
    );
  }
  return names.map((name) => path.join(workDir, name));
}

/**
 * Moves each artifact into `publishDir`, replacing what is there. There is no
 * rollback: a failure part way leaves the already-moved files published.
 */
export async function relocateArtifacts(workDir: string, publishDir: string, names: string[]): Promise<string[]> {
  const moved: string[] = [];
  for (const name of names) {
    const destPath = path.join(publishDir, name);
    try {
      await moveFile(path.join(workDir, name), destPath);
    } catch (error) {
      const partial = moved.length
        ? ` Already published: ${moved.map((file) => path.basename(file)).join(", ")}; consistency is not restored automatically, re-run the pipeline.`
        : "";
      throw new PublishError(`Failed to publish ${name} to ${publishDir}: ${errorMessage(error)}.${partial}`, moved);
    }
    moved.push(destPath);
  }
  return moved;
}

/** The compared candidate bytes become the Recorded State through a temp file and rename. */
export async function commitState(candidate: Buffer, recordedPath: string): Promise<void> {
  try {
    await writeFileAtomic(recordedPath, candidate);
  } catch (error) {
    throw new PublishError(
      `Artifacts were published but the fingerprint could not be recorded at ${recordedPath}: ${errorMessage(error)}`,
      [],
      ErrorCodes.STATE_COMMIT_FAILED
    );
  }
}

export async function readCommitMessage(metadataPath: string): Promise<string> {
  const content = await fs.readFile(metadataPath, "utf8");
  return content.trim();
}
