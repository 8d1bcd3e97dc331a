import { DigestAlgorithm } from "../utils/hash";

export interface FingerprintEntry {
  digest: string;
  /** relative to the pipeline root, `/`-separated */
  path: string;
}

export interface FingerprintRecord {
  algorithm: DigestAlgorithm;
  entries: FingerprintEntry[];
}
