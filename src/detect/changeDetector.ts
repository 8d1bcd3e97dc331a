import { readBytesOrEmpty, pathExists } from "../utils/fs";
import { compareCodeUnits, parseFingerprint } from "../fingerprint/fingerprint";
import { FingerprintEntry } from "../fingerprint/types";

export interface ChangeDecision {
  changed: boolean;
  recordedExists: boolean;
  recorded: Buffer;
  candidate: Buffer;
}

export interface ChangeSummary {
  added: string[];
  removed: string[];
  modified: string[];
}

/** Byte equality on serialized records; nothing else is considered. */
export function isChanged(recorded: Buffer, candidate: Buffer): boolean {
  return !recorded.equals(candidate);
}

export async function detectChange(recordedPath: string, candidatePath: string): Promise<ChangeDecision> {
  const recordedExists = await pathExists(recordedPath);
  const recorded = await readBytesOrEmpty(recordedPath);
  const candidate = await readBytesOrEmpty(candidatePath);
  return { changed: isChanged(recorded, candidate), recordedExists, recorded, candidate };
}

function toDigestMap(entries: FingerprintEntry[]): Map<string, string> {
  const map = new Map<string, string>();
  for (const entry of entries) {
    map.set(entry.path, entry.digest);
  }
  return map;
}

/**
 * Per-file view of the difference between two records, for reporting. A pure
 * reordering shows up as a change in `isChanged` but yields an empty summary.
 */
export function summarizeChange(recordedText: string, candidateText: string): ChangeSummary {
  const recordedMap = toDigestMap(parseFingerprint(recordedText));
  const candidateMap = toDigestMap(parseFingerprint(candidateText));
  const summary: ChangeSummary = { added: [], removed: [], modified: [] };

  const paths = new Set<string>([...Array.from(recordedMap.keys()), ...Array.from(candidateMap.keys())]);
  for (const filePath of Array.from(paths).sort(compareCodeUnits)) {
    const oldDigest = recordedMap.get(filePath);
    const newDigest = candidateMap.get(filePath);
    if (oldDigest === undefined) {
      summary.added.push(filePath);
    } else if (newDigest === undefined) {
      summary.removed.push(filePath);
    } else if (oldDigest !== newDigest) {
      summary.modified.push(filePath);
    }
  }
  return summary;
}

export function describeChange(summary: ChangeSummary): string {
  const parts: string[] = [];
  if (summary.added.length) parts.push(`added ${summary.added.join(", ")}`);
  if (summary.removed.length) parts.push(`removed ${summary.removed.join(", ")}`);
  if (summary.modified.length) parts.push(`modified ${summary.modified.join(", ")}`);
  return parts.length ? parts.join("; ") : "no per-file differences";
}
