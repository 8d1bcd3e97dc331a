#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runPipelineCommand } from "../commands/run";
import { runPrecheckCommand } from "../commands/precheck";
import { runFingerprintCommand } from "../commands/fingerprint";
import { runStatusCommand } from "../commands/status";
import { PrecheckError, isPipelineError } from "../errors";
import { ExitCodes } from "../pipeline/exitCodes";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.TUNEDATA_SYNC_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("tunedata-sync")
  .description("Rebuild and publish the tune index when the upstream tune data changes")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides TUNEDATA_SYNC_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("run")
  .description("Precheck, fetch, and rebuild/publish only if the dataset changed")
  .action(async () => {
    const outcome = await runPipelineCommand();
    process.exitCode = outcome.exitCode;
  });

program
  .command("precheck")
  .description("Verify the external converter reports the exact expected version")
  .action(async () => {
    await runPrecheckCommand();
  });

program
  .command("fingerprint")
  .description("Fingerprint the local dataset and write the candidate state")
  .action(async () => {
    await runFingerprintCommand();
  });

program
  .command("status")
  .description("Compare the local dataset with the recorded state without writing anything")
  .action(async () => {
    await runStatusCommand();
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  if (error instanceof PrecheckError) {
    for (const line of error.remediation) console.error(line);
  }
  process.exitCode = isPipelineError(error) ? error.exitCode : ExitCodes.UNEXPECTED;
});
