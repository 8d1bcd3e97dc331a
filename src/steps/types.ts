export interface StepResult {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** set when the process could not be started at all */
  spawnError?: string;
}

/**
 * An opaque external step: takes no input beyond what it was built with and
 * reports success or failure. Outputs land wherever the step's own contract says.
 */
export interface ExternalStep {
  name: string;
  run(): Promise<StepResult>;
}

export interface PublishContext {
  commitMessage: string;
  /** absolute paths of the relocated artifacts */
  publishedFiles: string[];
}

export interface PipelineSteps {
  precheck: ExternalStep;
  fetch: ExternalStep;
  build: ExternalStep;
  externalPublish(context: PublishContext): ExternalStep[];
}

export function describeFailure(result: StepResult): string {
  if (result.spawnError) return `could not start: ${result.spawnError}`;
  const stderr = result.stderr.trim();
  const status = result.exitCode === null ? "was terminated by a signal" : `exited with code ${result.exitCode}`;
  return stderr ? `${status}: ${stderr.split("\n").slice(-1)[0]}` : status;
}
