import path from "path";
import { PipelineConfig } from "../config/pipelineConfig";
import { ChangeDecision, ChangeSummary, describeChange, detectChange, summarizeChange } from "../detect/changeDetector";
import {
  BuildError,
  ExternalPublishError,
  FetchError,
  PrecheckError,
  PublishError,
  errorMessage,
  isPipelineError
} from "../errors";
import { computeFingerprint, fingerprintOptionsFor, writeCandidate } from "../fingerprint/fingerprint";
import { artifactNames, PipelinePaths } from "../io/paths";
import { commitState, readCommitMessage, relocateArtifacts, verifyArtifacts } from "../publish/publishGate";
import { checkToolVersion } from "../steps/precheck";
import { PipelineSteps, describeFailure } from "../steps/types";
import { RunManifestError, RunStatus, Stage } from "../types/runManifest";
import { ensureDir } from "../utils/fs";
import { Logger } from "../utils/logger";
import { toFileSafe, toUtcIsoSeconds } from "../utils/time";
import { ExitCode, ExitCodes } from "./exitCodes";
import { PipelineLock } from "./lock";

export const STAGES: readonly Stage[] = [
  "PRECHECK",
  "FETCH",
  "FINGERPRINT",
  "COMPARE",
  "REBUILD",
  "PUBLISH",
  "COMMIT_STATE",
  "EXTERNAL_PUBLISH"
];

export interface OrchestratorOptions {
  paths: PipelinePaths;
  config: PipelineConfig;
  steps: PipelineSteps;
  logger?: Logger;
  now?: () => Date;
}

export interface PipelineOutcome {
  runId: string;
  startedAt: string;
  endedAt: string;
  status: RunStatus;
  exitCode: ExitCode;
  stagesCompleted: Stage[];
  failedStage: Stage | null;
  recordedStateExisted: boolean | null;
  changes: ChangeSummary | null;
  publishedFiles: string[];
  error: RunManifestError | null;
}

interface RunState {
  runId: string;
  startedAt: string;
  completed: Stage[];
  current: Stage | null;
  decision: ChangeDecision | null;
  changes: ChangeSummary | null;
  publishedFiles: string[];
}

/**
 * Drives one synchronization run through STAGES in order. Every failure ends
 * the run; the Recorded State is written only in COMMIT_STATE, after PUBLISH
 * has moved every artifact.
 */
export class PipelineOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: OrchestratorOptions) {
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  async run(): Promise<PipelineOutcome> {
    const startedAt = toUtcIsoSeconds(this.now());
    const state: RunState = {
      runId: toFileSafe(startedAt),
      startedAt,
      completed: [],
      current: null,
      decision: null,
      changes: null,
      publishedFiles: []
    };

    const { config, paths } = this.options;
    let lock: PipelineLock | null = null;

    try {
      await this.stage(state, "PRECHECK", () => this.precheck());

      if (config.lock) {
        lock = await PipelineLock.acquire(paths.lockFile, this.now);
      }

      await this.stage(state, "FETCH", () => this.fetch());
      await this.stage(state, "FINGERPRINT", () => this.fingerprint());
      const decision = await this.stage(state, "COMPARE", () => this.compare(state));

      if (!decision.changed) {
        this.logger.log("Upstream data has not changed. Nothing to rebuild.");
        return this.finish(state, "no_change", ExitCodes.NO_CHANGE, null);
      }

      await this.stage(state, "REBUILD", () => this.rebuild());
      state.publishedFiles = await this.stage(state, "PUBLISH", () => this.publish());
      await this.stage(state, "COMMIT_STATE", () => this.commit(decision));
      await this.stage(state, "EXTERNAL_PUBLISH", () => this.externalPublish(state.publishedFiles));

      this.logger.log(`Published ${state.publishedFiles.length} artifacts to ${paths.publishDir}.`);
      return this.finish(state, "published", ExitCodes.PUBLISHED, null);
    } catch (error) {
      return this.fail(state, error);
    } finally {
      if (lock) await this.release(lock);
    }
  }

  private async release(lock: PipelineLock): Promise<void> {
    try {
      await lock.release();
    } catch (error) {
      this.logger.warn(`Could not release ${lock.lockPath}: ${errorMessage(error)}`);
    }
  }

  private async stage<T>(state: RunState, stage: Stage, action: () => Promise<T>): Promise<T> {
    state.current = stage;
    const result = await action();
    state.completed.push(stage);
    state.current = null;
    return result;
  }

  private async precheck(): Promise<void> {
    const { tool } = this.options.config;
    const version = await checkToolVersion(this.options.steps.precheck, tool);
    this.logger.log(`Found ${tool.command} version ${version}`);
  }

  private async fetch(): Promise<void> {
    const step = this.options.steps.fetch;
    // the fetch step writes into the dataset directory but does not create it
    await ensureDir(this.options.paths.dataDir);
    const result = await step.run();
    if (!result.ok) {
      throw new FetchError(`Fetch step "${step.name}" ${describeFailure(result)}`);
    }
  }

  private async fingerprint(): Promise<void> {
    const { config, paths } = this.options;
    const record = await computeFingerprint(fingerprintOptionsFor(paths, config));
    await writeCandidate(paths.candidateState, record);
    this.logger.log(`Fingerprinted ${record.entries.length} dataset files.`);
  }

  private async compare(state: RunState): Promise<ChangeDecision> {
    const { paths } = this.options;
    const decision = await detectChange(paths.recordedState, paths.candidateState);
    state.decision = decision;
    if (decision.changed) {
      state.changes = summarizeChange(decision.recorded.toString("utf8"), decision.candidate.toString("utf8"));
      const origin = decision.recordedExists ? "" : " (no recorded state yet)";
      this.logger.log(`Dataset changed${origin}: ${describeChange(state.changes)}`);
    }
    return decision;
  }

  private async rebuild(): Promise<void> {
    const { config, paths, steps } = this.options;
    const result = await steps.build.run();
    if (!result.ok) {
      throw new BuildError(`Build step "${steps.build.name}" ${describeFailure(result)}`);
    }
    await verifyArtifacts(paths.artifactWorkDir, artifactNames(config));
  }

  private publish(): Promise<string[]> {
    const { config, paths } = this.options;
    return relocateArtifacts(paths.artifactWorkDir, paths.publishDir, artifactNames(config));
  }

  private async commit(decision: ChangeDecision): Promise<void> {
    await commitState(decision.candidate, this.options.paths.recordedState);
    this.logger.log(`Recorded fingerprint at ${this.options.paths.recordedState}`);
  }

  private async externalPublish(publishedFiles: string[]): Promise<void> {
    const { config, paths, steps } = this.options;
    const metadataPath = path.join(paths.publishDir, config.artifacts.metadata);

    let commitMessage: string;
    try {
      commitMessage = await readCommitMessage(metadataPath);
    } catch (error) {
      throw new ExternalPublishError(`Could not read commit message from ${metadataPath}: ${errorMessage(error)}`, "commit message");
    }

    for (const step of steps.externalPublish({ commitMessage, publishedFiles })) {
      const result = await step.run();
      if (!result.ok) {
        throw new ExternalPublishError(`External publish step "${step.name}" ${describeFailure(result)}`, step.name);
      }
    }
  }

  private finish(
    state: RunState,
    status: RunStatus,
    exitCode: ExitCode,
    error: RunManifestError | null
  ): PipelineOutcome {
    return {
      runId: state.runId,
      startedAt: state.startedAt,
      endedAt: toUtcIsoSeconds(this.now()),
      status,
      exitCode,
      stagesCompleted: [...state.completed],
      failedStage: error ? state.current : null,
      recordedStateExisted: state.decision ? state.decision.recordedExists : null,
      changes: state.changes,
      publishedFiles: state.publishedFiles,
      error
    };
  }

  private fail(state: RunState, error: unknown): PipelineOutcome {
    const details: RunManifestError = {
      code: isPipelineError(error) ? error.code : "UNEXPECTED",
      message: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined
    };

    if (error instanceof ExternalPublishError) {
      this.logger.error("!!! External publish failed after the new fingerprint was recorded.");
      this.logger.error(`!!! ${error.message}`);
      this.logger.error("!!! Local artifacts and state are current; downstream copies lag until this step is re-run by hand.");
      return this.finish(state, "published_external_failed", error.exitCode, details);
    }

    if (error instanceof PublishError) {
      state.publishedFiles = error.movedFiles;
    }
    this.logger.error(`Pipeline failed${state.current ? ` at ${state.current}` : ""}: ${details.message}`);
    if (error instanceof PrecheckError) {
      for (const line of error.remediation) this.logger.error(line);
    }
    const exitCode = isPipelineError(error) ? error.exitCode : ExitCodes.UNEXPECTED;
    return this.finish(state, "failed", exitCode, details);
  }
}
