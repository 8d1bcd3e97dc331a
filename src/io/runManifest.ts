import { runManifestPath } from "./paths";
import { writeJson } from "../utils/fs";
import { RunManifest } from "../types/runManifest";
import { PipelineOutcome } from "../pipeline/orchestrator";

export function buildRunManifest(rootDir: string, outcome: PipelineOutcome): RunManifest {
  return {
    schema_version: "1.0",
    run_id: outcome.runId,
    root_dir: rootDir,
    started_at: outcome.startedAt,
    ended_at: outcome.endedAt,
    status: outcome.status,
    exit_code: outcome.exitCode,
    stages_completed: outcome.stagesCompleted,
    failed_stage: outcome.failedStage,
    recorded_state_existed: outcome.recordedStateExisted,
    changes: outcome.changes,
    published_files: outcome.publishedFiles,
    error: outcome.error
  };
}

export async function writeRunManifest(runLogDir: string, manifest: RunManifest): Promise<string> {
  const filePath = runManifestPath(runLogDir, manifest.run_id);
  await writeJson(filePath, manifest);
  return filePath;
}
