import { promises as fs } from "fs";
import path from "path";
import { FingerprintEntry, FingerprintRecord } from "./types";
import { DigestAlgorithm, digestHex } from "../utils/hash";
import { listFiles, writeText } from "../utils/fs";
import { PipelinePaths, artifactNames, portableRelative } from "../io/paths";
import { PipelineConfig } from "../config/pipelineConfig";

export interface FingerprintOptions {
  rootDir: string;
  dataDir: string;
  extension: string;
  algorithm: DigestAlgorithm;
  /** build outputs sharing the dataset directory */
  exclude?: string[];
}

const SEPARATOR = "  ";

export function fingerprintOptionsFor(paths: PipelinePaths, config: PipelineConfig): FingerprintOptions {
  return {
    rootDir: paths.rootDir,
    dataDir: paths.dataDir,
    extension: config.dataset.extension,
    algorithm: config.dataset.algorithm,
    exclude: paths.artifactWorkDir === paths.dataDir ? artifactNames(config) : []
  };
}

export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export async function listDatasetFiles(dataDir: string, extension: string, exclude: string[] = []): Promise<string[]> {
  const names = await listFiles(dataDir, (name) => name.endsWith(extension) && !exclude.includes(name));
  return names.sort(compareCodeUnits);
}

export async function computeFingerprint(options: FingerprintOptions): Promise<FingerprintRecord> {
  const names = await listDatasetFiles(options.dataDir, options.extension, options.exclude);
  const entries: FingerprintEntry[] = [];
  for (const name of names) {
    const filePath = path.join(options.dataDir, name);
    const content = await fs.readFile(filePath);
    entries.push({
      digest: digestHex(options.algorithm, content),
      path: portableRelative(options.rootDir, filePath)
    });
  }
  entries.sort((a, b) => compareCodeUnits(a.path, b.path));
  return { algorithm: options.algorithm, entries };
}

export function serializeFingerprint(record: FingerprintRecord): string {
  return record.entries.map((entry) => `${entry.digest}${SEPARATOR}${entry.path}\n`).join("");
}

/**
 * Reads the text form back into entries. Lines that do not look like
 * `<hex>  <path>` are skipped.
 */
export function parseFingerprint(text: string): FingerprintEntry[] {
  const entries: FingerprintEntry[] = [];
  for (const line of text.split("\n")) {
    const match = /^([0-9a-f]+) {2}(.+)$/.exec(line);
    if (!match) continue;
    entries.push({ digest: match[1], path: match[2] });
  }
  return entries;
}

export async function writeCandidate(candidatePath: string, record: FingerprintRecord): Promise<string> {
  const text = serializeFingerprint(record);
  await writeText(candidatePath, text);
  return text;
}
