import { loadCommandContext } from "./context";
import { computeFingerprint, fingerprintOptionsFor, writeCandidate } from "../fingerprint/fingerprint";
import { Logger } from "../utils/logger";

export interface FingerprintCommandOptions {
  rootDir?: string;
  logger?: Logger;
}

export async function runFingerprintCommand(options: FingerprintCommandOptions = {}): Promise<string> {
  const logger = options.logger ?? console;
  const { config, paths } = await loadCommandContext(options.rootDir);
  const record = await computeFingerprint(fingerprintOptionsFor(paths, config));
  const text = await writeCandidate(paths.candidateState, record);
  logger.log(text.trimEnd() || "(no dataset files)");
  logger.log(`Wrote ${record.entries.length} entries to ${paths.candidateState}`);
  return text;
}
