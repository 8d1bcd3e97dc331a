import { spawn } from "child_process";
import { StepResult } from "./types";
import { LineEcho, Logger } from "../utils/logger";

export interface ProcessOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** prefix for streamed output lines; nothing is streamed when omitted */
  echoPrefix?: string;
}

export async function runProcess(
  command: string,
  args: string[],
  options: ProcessOptions
): Promise<StepResult> {
  const { cwd, env, logger, echoPrefix } = options;

  return new Promise((resolve) => {
    const stdoutEcho = logger && echoPrefix ? new LineEcho(logger, echoPrefix) : null;
    const stderrEcho = logger && echoPrefix ? new LineEcho(logger, echoPrefix) : null;

    let settled = false;
    const finish = (result: StepResult): void => {
      if (settled) return;
      settled = true;
      stdoutEcho?.flush();
      stderrEcho?.flush();
      resolve(result);
    };

    let stdout = "";
    let stderr = "";

    const proc = spawn(command, args, {
      cwd,
      env: env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"]
    });

    // a multi-byte character may span two chunks
    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");

    proc.stdout.on("data", (chunk: string) => {
      stdout += chunk;
      stdoutEcho?.write(chunk);
    });

    proc.stderr.on("data", (chunk: string) => {
      stderr += chunk;
      stderrEcho?.write(chunk);
    });

    proc.on("error", (err) => {
      finish({ ok: false, exitCode: null, stdout, stderr, spawnError: err.message });
    });

    proc.on("close", (code) => {
      finish({ ok: code === 0, exitCode: code, stdout, stderr });
    });
  });
}
