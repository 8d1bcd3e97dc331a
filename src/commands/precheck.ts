import { loadCommandContext } from "./context";
import { checkToolVersion } from "../steps/precheck";
import { createPipelineSteps } from "../steps/pipelineSteps";
import { Logger } from "../utils/logger";

export interface PrecheckOptions {
  rootDir?: string;
  logger?: Logger;
}

export async function runPrecheckCommand(options: PrecheckOptions = {}): Promise<void> {
  const logger = options.logger ?? console;
  const { rootDir, config } = await loadCommandContext(options.rootDir);
  const steps = createPipelineSteps(rootDir, config, logger);
  const version = await checkToolVersion(steps.precheck, config.tool);
  logger.log(`Found ${config.tool.command} version ${version}`);
}
