import path from "path";
import { PipelineConfig } from "../config/pipelineConfig";

export interface PipelinePaths {
  rootDir: string;
  dataDir: string;
  publishDir: string;
  recordedState: string;
  candidateState: string;
  lockFile: string;
  runLogDir: string | null;
  artifactWorkDir: string;
}

export function resolvePipelinePaths(rootDir: string, config: PipelineConfig): PipelinePaths {
  const fromRoot = (relative: string): string => path.resolve(rootDir, relative);
  return {
    rootDir,
    dataDir: fromRoot(config.paths.dataDir),
    publishDir: fromRoot(config.paths.publishDir),
    recordedState: fromRoot(config.paths.recordedState),
    candidateState: fromRoot(config.paths.candidateState),
    lockFile: fromRoot(config.paths.lockFile),
    runLogDir: config.paths.runLogDir === null ? null : fromRoot(config.paths.runLogDir),
    artifactWorkDir: fromRoot(config.artifacts.workDir)
  };
}

export function artifactNames(config: PipelineConfig): string[] {
  return [config.artifacts.primary, config.artifacts.metadata];
}

export function runManifestPath(runLogDir: string, runId: string): string {
  return path.join(runLogDir, `${runId}.json`);
}

/** `/`-separated path relative to `fromDir`, as written into fingerprints and commands. */
export function portableRelative(fromDir: string, targetPath: string): string {
  return path.relative(fromDir, targetPath).split(path.sep).join("/");
}
