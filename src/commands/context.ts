import { loadConfig, resolvePipelineRoot } from "../config/loadConfig";
import { PipelineConfig } from "../config/pipelineConfig";
import { PipelinePaths, resolvePipelinePaths } from "../io/paths";

export interface CommandContext {
  rootDir: string;
  config: PipelineConfig;
  paths: PipelinePaths;
}

export async function loadCommandContext(rootDir = resolvePipelineRoot()): Promise<CommandContext> {
  const config = await loadConfig(rootDir);
  return { rootDir, config, paths: resolvePipelinePaths(rootDir, config) };
}
