import { createHash } from "crypto";

export type DigestAlgorithm = "sha1" | "sha256";

export function digestHex(algorithm: DigestAlgorithm, content: string | Buffer): string {
  return createHash(algorithm).update(content).digest("hex");
}
