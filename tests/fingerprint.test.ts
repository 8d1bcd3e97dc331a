import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import { createHash } from "crypto";
import path from "path";
import {
  computeFingerprint,
  fingerprintOptionsFor,
  listDatasetFiles,
  parseFingerprint,
  serializeFingerprint,
  writeCandidate
} from "../src/fingerprint/fingerprint";
import { parseConfig } from "../src/config/loadConfig";
import { resolvePipelinePaths } from "../src/io/paths";
import { makeTempDir, readText, removeDir } from "./helpers";

function sha1(content: string): string {
  return createHash("sha1").update(content).digest("hex");
}

describe("Content fingerprinter", () => {
  let root: string;
  let dataDir: string;

  beforeEach(async () => {
    root = await makeTempDir();
    dataDir = path.join(root, "data");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("yields an empty record when the dataset directory does not exist", async () => {
    const record = await computeFingerprint({ rootDir: root, dataDir, extension: ".json", algorithm: "sha1" });

    expect(record.entries).toEqual([]);
    expect(serializeFingerprint(record)).toBe("");
  });

  it("serializes one sorted `<digest>  <path>` line per dataset file", async () => {
    await fs.mkdir(dataDir);
    await fs.writeFile(path.join(dataDir, "tunes.json"), '{"tunes":[1]}');
    await fs.writeFile(path.join(dataDir, "aliases.json"), '{"aliases":[]}');

    const record = await computeFingerprint({ rootDir: root, dataDir, extension: ".json", algorithm: "sha1" });

    expect(serializeFingerprint(record)).toBe(
      `${sha1('{"aliases":[]}')}  data/aliases.json\n` + `${sha1('{"tunes":[1]}')}  data/tunes.json\n`
    );
  });

  it("is independent of file creation order", async () => {
    const otherRoot = await makeTempDir();
    try {
      const otherData = path.join(otherRoot, "data");
      await fs.mkdir(dataDir);
      await fs.mkdir(otherData);
      for (const name of ["c.json", "a.json", "b.json"]) {
        await fs.writeFile(path.join(dataDir, name), name);
      }
      for (const name of ["b.json", "c.json", "a.json"]) {
        await fs.writeFile(path.join(otherData, name), name);
      }

      const first = await computeFingerprint({ rootDir: root, dataDir, extension: ".json", algorithm: "sha1" });
      const second = await computeFingerprint({
        rootDir: otherRoot,
        dataDir: otherData,
        extension: ".json",
        algorithm: "sha1"
      });

      expect(serializeFingerprint(first)).toBe(serializeFingerprint(second));
      expect(first.entries.map((entry) => entry.path)).toEqual(["data/a.json", "data/b.json", "data/c.json"]);
    } finally {
      await removeDir(otherRoot);
    }
  });

  it("skips other extensions, subdirectories and excluded build outputs", async () => {
    await fs.mkdir(path.join(dataDir, "midis"), { recursive: true });
    await fs.writeFile(path.join(dataDir, "tunes.json"), "[]");
    await fs.writeFile(path.join(dataDir, "old_hash.txt"), "");
    await fs.writeFile(path.join(dataDir, "nud-meta.json"), "{}");
    await fs.writeFile(path.join(dataDir, "midis", "1.json"), "{}");

    const names = await listDatasetFiles(dataDir, ".json", ["nud-meta.json"]);

    expect(names).toEqual(["tunes.json"]);
  });

  it("uses 64-character digests for sha256", async () => {
    await fs.mkdir(dataDir);
    await fs.writeFile(path.join(dataDir, "tunes.json"), "[]");

    const record = await computeFingerprint({ rootDir: root, dataDir, extension: ".json", algorithm: "sha256" });

    expect(record.entries[0].digest).toMatch(/^[0-9a-f]{64}$/);
  });

  it("overwrites the previous candidate file", async () => {
    const candidatePath = path.join(dataDir, "new_hash.txt");
    await fs.mkdir(dataDir);
    await fs.writeFile(candidatePath, "stale contents\n");

    const text = await writeCandidate(candidatePath, {
      algorithm: "sha1",
      entries: [{ digest: "abc123", path: "data/tunes.json" }]
    });

    expect(text).toBe("abc123  data/tunes.json\n");
    expect(await readText(candidatePath)).toBe("abc123  data/tunes.json\n");
  });

  it("parses the text form and ignores lines that are not entries", () => {
    const entries = parseFingerprint("abc123  data/tunes.json\nsha1sum: data/*.json: No such file\n\n");

    expect(entries).toEqual([{ digest: "abc123", path: "data/tunes.json" }]);
  });

  it("excludes artifact names only when the build writes into the dataset directory", () => {
    const shared = parseConfig({}, "test config");
    const separate = parseConfig({ artifacts: { workDir: "build" } }, "test config");

    expect(fingerprintOptionsFor(resolvePipelinePaths("/srv/pipeline", shared), shared).exclude).toEqual([
      "folkfriend-non-user-data.json",
      "nud-meta.json"
    ]);
    expect(fingerprintOptionsFor(resolvePipelinePaths("/srv/pipeline", separate), separate).exclude).toEqual([]);
  });

  it("fingerprints an input named like an artifact when the build writes elsewhere", async () => {
    const config = parseConfig({ artifacts: { workDir: "build" } }, "test config");
    const paths = resolvePipelinePaths(root, config);
    await fs.mkdir(paths.dataDir);
    await fs.writeFile(path.join(paths.dataDir, "nud-meta.json"), "{}");

    const record = await computeFingerprint(fingerprintOptionsFor(paths, config));

    expect(record.entries).toEqual([{ digest: sha1("{}"), path: "data/nud-meta.json" }]);
  });
});
