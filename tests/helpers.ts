import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { parseConfig } from "../src/config/loadConfig";
import { PipelineConfig } from "../src/config/pipelineConfig";
import { PipelinePaths, resolvePipelinePaths } from "../src/io/paths";
import { ExternalStep, PipelineSteps, PublishContext, StepResult } from "../src/steps/types";

export interface RecordingLogger {
  lines: string[];
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    log: (...args: unknown[]) => lines.push(`log: ${args.join(" ")}`),
    warn: (...args: unknown[]) => lines.push(`warn: ${args.join(" ")}`),
    error: (...args: unknown[]) => lines.push(`error: ${args.join(" ")}`)
  };
}

export async function makeTempDir(prefix = "tunedata-sync-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dirPath: string): Promise<void> {
  await fs.rm(dirPath, { recursive: true, force: true });
}

export function okResult(stdout = ""): StepResult {
  return { ok: true, exitCode: 0, stdout, stderr: "" };
}

export function failedResult(exitCode = 1, stderr = ""): StepResult {
  return { ok: false, exitCode, stdout: "", stderr };
}

export function fakeStep(name: string, run: () => Promise<StepResult>): ExternalStep {
  return { name, run };
}

export interface FakeUpstream {
  /** file name -> content, as the fetch step would download it */
  files: Record<string, string>;
  toolVersion: string;
  fetchFails: boolean;
  buildFails: boolean;
  buildSkips: string[];
  publishFailsAt: string | null;
  buildCount: number;
}

export interface Harness {
  root: string;
  config: PipelineConfig;
  paths: PipelinePaths;
  upstream: FakeUpstream;
  calls: string[];
  publishContexts: PublishContext[];
  steps: PipelineSteps;
}

/**
 * A pipeline root whose external steps are in-process fakes: fetch writes
 * `upstream.files` into the dataset directory, build writes both artifacts.
 */
export async function createHarness(root: string, configData: Record<string, unknown> = {}): Promise<Harness> {
  const config = parseConfig({ paths: { publishDir: "public" }, ...configData }, "test config");
  const paths = resolvePipelinePaths(root, config);
  const upstream: FakeUpstream = {
    files: {},
    toolVersion: config.tool.expectedVersion,
    fetchFails: false,
    buildFails: false,
    buildSkips: [],
    publishFailsAt: null,
    buildCount: 0
  };
  const calls: string[] = [];
  const publishContexts: PublishContext[] = [];

  const steps: PipelineSteps = {
    precheck: fakeStep("version check", async () => {
      calls.push("precheck");
      return okResult(`${upstream.toolVersion}\n`);
    }),
    fetch: fakeStep("fetch", async () => {
      calls.push("fetch");
      if (upstream.fetchFails) return failedResult(1, "connection refused");
      await fs.mkdir(paths.dataDir, { recursive: true });
      for (const [name, content] of Object.entries(upstream.files)) {
        await fs.writeFile(path.join(paths.dataDir, name), content, "utf8");
      }
      return okResult();
    }),
    build: fakeStep("build", async () => {
      calls.push("build");
      if (upstream.buildFails) return failedResult(2, "Traceback: KeyError");
      upstream.buildCount += 1;
      const primary = JSON.stringify(Object.keys(upstream.files).sort());
      const artifacts: Record<string, string> = {
        [config.artifacts.primary]: primary,
        [config.artifacts.metadata]: `{"v": ${upstream.buildCount}, "size": ${primary.length}}\n`
      };
      for (const [name, content] of Object.entries(artifacts)) {
        if (upstream.buildSkips.includes(name)) continue;
        await fs.writeFile(path.join(paths.artifactWorkDir, name), content, "utf8");
      }
      return okResult();
    }),
    externalPublish: (context: PublishContext) => {
      publishContexts.push(context);
      return ["git add", "git commit", "git push"].map((name) =>
        fakeStep(name, async () => {
          calls.push(name);
          return upstream.publishFailsAt === name ? failedResult(128, "rejected") : okResult();
        })
      );
    }
  };

  return { root, config, paths, upstream, calls, publishContexts, steps };
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}
