import { loadCommandContext } from "./context";
import { PipelineOrchestrator, PipelineOutcome } from "../pipeline/orchestrator";
import { createPipelineSteps } from "../steps/pipelineSteps";
import { buildRunManifest, writeRunManifest } from "../io/runManifest";
import { Logger } from "../utils/logger";

export interface RunOptions {
  rootDir?: string;
  logger?: Logger;
}

export async function runPipelineCommand(options: RunOptions = {}): Promise<PipelineOutcome> {
  const logger = options.logger ?? console;
  const { rootDir, config, paths } = await loadCommandContext(options.rootDir);

  const orchestrator = new PipelineOrchestrator({
    paths,
    config,
    steps: createPipelineSteps(rootDir, config, logger),
    logger
  });
  const outcome = await orchestrator.run();

  if (paths.runLogDir) {
    const manifestPath = await writeRunManifest(paths.runLogDir, buildRunManifest(rootDir, outcome));
    logger.log(`Wrote run manifest to ${manifestPath}`);
  }
  return outcome;
}
