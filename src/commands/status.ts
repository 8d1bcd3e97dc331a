import { loadCommandContext } from "./context";
import { computeFingerprint, fingerprintOptionsFor, serializeFingerprint } from "../fingerprint/fingerprint";
import { ChangeSummary, describeChange, isChanged, summarizeChange } from "../detect/changeDetector";
import { pathExists, readBytesOrEmpty } from "../utils/fs";
import { Logger } from "../utils/logger";

export interface StatusOptions {
  rootDir?: string;
  logger?: Logger;
}

export interface StatusReport {
  changed: boolean;
  recordedExists: boolean;
  changes: ChangeSummary;
}

/** Compares the dataset on disk with the Recorded State without writing anything. */
export async function runStatusCommand(options: StatusOptions = {}): Promise<StatusReport> {
  const logger = options.logger ?? console;
  const { config, paths } = await loadCommandContext(options.rootDir);

  const record = await computeFingerprint(fingerprintOptionsFor(paths, config));
  const candidate = Buffer.from(serializeFingerprint(record), "utf8");
  const recordedExists = await pathExists(paths.recordedState);
  const recorded = await readBytesOrEmpty(paths.recordedState);

  const changed = isChanged(recorded, candidate);
  const changes = summarizeChange(recorded.toString("utf8"), candidate.toString("utf8"));

  if (!changed) {
    logger.log("Dataset matches the recorded fingerprint.");
  } else {
    const origin = recordedExists ? "" : " (no recorded state yet)";
    logger.log(`Dataset differs from the recorded fingerprint${origin}: ${describeChange(changes)}`);
  }
  return { changed, recordedExists, changes };
}
