import path from "path";
import { ZodError } from "zod";
import { CONFIG_FILE_NAME, PipelineConfig, PipelineConfigSchema } from "./pipelineConfig";
import { pathExists, readJson } from "../utils/fs";
import { ConfigError, errorMessage } from "../errors";

export function resolvePipelineRoot(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): string {
  const fromEnv = env.TUNEDATA_SYNC_ROOT?.trim();
  return path.resolve(cwd, fromEnv ? fromEnv : ".");
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseConfig(data: unknown, label: string): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`${label} is invalid: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** A pipeline root without a config file runs on the conventional defaults. */
export async function loadConfig(rootDir: string): Promise<PipelineConfig> {
  const configPath = path.join(rootDir, CONFIG_FILE_NAME);
  if (!(await pathExists(configPath))) {
    return parseConfig({}, "Default config");
  }

  let data: unknown;
  try {
    data = await readJson<unknown>(configPath);
  } catch (error) {
    throw new ConfigError(`Could not read ${configPath}: ${errorMessage(error)}`);
  }
  return parseConfig(data, configPath);
}
