import { ChangeSummary } from "../detect/changeDetector";

export type Stage =
  | "PRECHECK"
  | "FETCH"
  | "FINGERPRINT"
  | "COMPARE"
  | "REBUILD"
  | "PUBLISH"
  | "COMMIT_STATE"
  | "EXTERNAL_PUBLISH";

export type RunStatus = "published" | "no_change" | "failed" | "published_external_failed";

export interface RunManifestError {
  code: string;
  message: string;
  stack?: string;
}

export interface RunManifest {
  schema_version: "1.0";
  run_id: string;
  root_dir: string;
  started_at: string;
  ended_at: string;
  status: RunStatus;
  exit_code: number;
  stages_completed: Stage[];
  failed_stage: Stage | null;
  recorded_state_existed: boolean | null;
  changes: ChangeSummary | null;
  published_files: string[];
  error: RunManifestError | null;
}
