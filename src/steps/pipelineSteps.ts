import path from "path";
import { PipelineSteps, PublishContext } from "./types";
import { createCommandStep } from "./commandStep";
import { PipelineConfig } from "../config/pipelineConfig";
import { portableRelative } from "../io/paths";
import { Logger } from "../utils/logger";

export function createPipelineSteps(rootDir: string, config: PipelineConfig, logger: Logger): PipelineSteps {
  const base = { rootDir, environment: config.environment, logger };

  return {
    precheck: createCommandStep(
      { label: "version check", command: config.tool.command, args: config.tool.versionArgs, cwd: "." },
      { ...base, logger: undefined }
    ),
    fetch: createCommandStep(config.fetch, { ...base, echo: true }),
    build: createCommandStep(config.build, { ...base, echo: true }),
    externalPublish: (context: PublishContext) =>
      config.externalPublish.map((command) => {
        const cwd = path.resolve(rootDir, command.cwd);
        return createCommandStep(command, {
          ...base,
          echo: true,
          placeholders: {
            message: context.commitMessage,
            artifacts: context.publishedFiles.map((file) => portableRelative(cwd, file))
          }
        });
      })
  };
}
