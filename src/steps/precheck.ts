import { ExternalStep, describeFailure } from "./types";
import { ToolConfig } from "../config/pipelineConfig";
import { PrecheckError } from "../errors";

export function remediationFor(tool: ToolConfig): string[] {
  return [
    `Please ensure ${tool.command} reports exactly "${tool.expectedVersion}".`,
    `See ${tool.sourceUrl}`,
    `Provide the executable as '${tool.command}' relative to the pipeline root, or set tool.command in the config.`
  ];
}

/**
 * Strict equality of trimmed stdout against one known-good version string.
 * Older, newer and unparseable output are all the same failure. The tool's
 * exit status is not consulted; only a tool that cannot be started fails
 * before the comparison.
 */
export async function checkToolVersion(versionCheck: ExternalStep, tool: ToolConfig): Promise<string> {
  const result = await versionCheck.run();
  if (result.spawnError) {
    throw new PrecheckError(`${tool.command} version check ${describeFailure(result)}`, remediationFor(tool));
  }

  const reported = result.stdout.trim();
  if (reported !== tool.expectedVersion) {
    throw new PrecheckError(
      `${tool.command} reports "${reported}", expected "${tool.expectedVersion}"`,
      remediationFor(tool)
    );
  }
  return reported;
}
