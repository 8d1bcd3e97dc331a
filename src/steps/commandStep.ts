import path from "path";
import { ExternalStep } from "./types";
import { runProcess } from "./process";
import { CommandConfig, PipelineConfig } from "../config/pipelineConfig";
import { Logger } from "../utils/logger";

export type PlaceholderValues = Record<string, string | string[]>;

export interface CommandStepOptions {
  rootDir: string;
  environment: PipelineConfig["environment"];
  logger?: Logger;
  placeholders?: PlaceholderValues;
  /** stream the process output into the log */
  echo?: boolean;
}

/**
 * Expands `{name}` tokens. An argument that is exactly a list-valued token
 * expands to one argument per item; unknown tokens are left as written.
 */
export function expandArgs(args: string[], values: PlaceholderValues): string[] {
  const expanded: string[] = [];
  for (const arg of args) {
    const whole = /^\{(\w+)\}$/.exec(arg);
    const wholeValue = whole ? values[whole[1]] : undefined;
    if (Array.isArray(wholeValue)) {
      expanded.push(...wholeValue);
      continue;
    }
    expanded.push(
      arg.replace(/\{(\w+)\}/g, (token: string, name: string) => {
        const value = values[name];
        if (value === undefined) return token;
        return Array.isArray(value) ? value.join(" ") : value;
      })
    );
  }
  return expanded;
}

export function buildStepEnv(
  rootDir: string,
  environment: PipelineConfig["environment"],
  base: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const binDirs = environment.binDirs.map((dir) => path.resolve(rootDir, dir));
  const currentPath = base.PATH ?? "";
  const searchPath = [...binDirs, ...(currentPath ? [currentPath] : [])].join(path.delimiter);
  return {
    ...base,
    ...environment.variables,
    PATH: searchPath,
    PIPELINE_ROOT: rootDir
  };
}

export function stepName(config: CommandConfig): string {
  return config.label ?? [config.command, ...config.args].join(" ");
}

export function createCommandStep(config: CommandConfig, options: CommandStepOptions): ExternalStep {
  const cwd = path.resolve(options.rootDir, config.cwd);
  const values: PlaceholderValues = { root: options.rootDir, ...options.placeholders };
  const args = expandArgs(config.args, values);
  const name = stepName(config);

  return {
    name,
    run: () => {
      options.logger?.log(`Running ${name}: ${[config.command, ...args].join(" ")}`);
      return runProcess(config.command, args, {
        cwd,
        env: buildStepEnv(options.rootDir, options.environment),
        logger: options.logger,
        echoPrefix: options.echo ? `[${name}]` : undefined
      });
    }
  };
}
