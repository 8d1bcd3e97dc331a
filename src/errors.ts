import { ExitCodes, ExitCode } from "./pipeline/exitCodes";

export const ErrorCodes = {
  CONFIG_ERROR: "CONFIG_ERROR",
  PRECHECK_FAILED: "PRECHECK_FAILED",
  FETCH_FAILED: "FETCH_FAILED",
  BUILD_FAILED: "BUILD_FAILED",
  ARTIFACT_MISSING: "ARTIFACT_MISSING",
  PUBLISH_FAILED: "PUBLISH_FAILED",
  STATE_COMMIT_FAILED: "STATE_COMMIT_FAILED",
  EXTERNAL_PUBLISH_FAILED: "EXTERNAL_PUBLISH_FAILED",
  LOCK_HELD: "LOCK_HELD"
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class PipelineError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public exitCode: ExitCode
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIG_ERROR, ExitCodes.CONFIG_ERROR);
    this.name = "ConfigError";
  }
}

export class PrecheckError extends PipelineError {
  constructor(
    message: string,
    public remediation: string[]
  ) {
    super(message, ErrorCodes.PRECHECK_FAILED, ExitCodes.PRECHECK_FAILED);
    this.name = "PrecheckError";
  }
}

export class FetchError extends PipelineError {
  constructor(message: string) {
    super(message, ErrorCodes.FETCH_FAILED, ExitCodes.FETCH_FAILED);
    this.name = "FetchError";
  }
}

export class BuildError extends PipelineError {
  constructor(
    message: string,
    code: typeof ErrorCodes.BUILD_FAILED | typeof ErrorCodes.ARTIFACT_MISSING = ErrorCodes.BUILD_FAILED
  ) {
    super(message, code, ExitCodes.BUILD_FAILED);
    this.name = "BuildError";
  }
}

/**
 * Relocation or state commit failed. Files already moved stay where they are;
 * re-running the pipeline is the recovery path.
 */
export class PublishError extends PipelineError {
  constructor(
    message: string,
    public movedFiles: string[] = [],
    code: typeof ErrorCodes.PUBLISH_FAILED | typeof ErrorCodes.STATE_COMMIT_FAILED = ErrorCodes.PUBLISH_FAILED
  ) {
    super(message, code, ExitCodes.PUBLISH_FAILED);
    this.name = "PublishError";
  }
}

export class ExternalPublishError extends PipelineError {
  constructor(
    message: string,
    public step: string
  ) {
    super(message, ErrorCodes.EXTERNAL_PUBLISH_FAILED, ExitCodes.EXTERNAL_PUBLISH_FAILED);
    this.name = "ExternalPublishError";
  }
}

export class LockError extends PipelineError {
  constructor(message: string) {
    super(message, ErrorCodes.LOCK_HELD, ExitCodes.LOCKED);
    this.name = "LockError";
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
