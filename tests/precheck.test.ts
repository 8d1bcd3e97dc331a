import { describe, expect, it } from "vitest";
import { checkToolVersion, remediationFor } from "../src/steps/precheck";
import { PipelineConfigSchema } from "../src/config/pipelineConfig";
import { ErrorCodes, PrecheckError } from "../src/errors";
import { ExitCodes } from "../src/pipeline/exitCodes";
import { StepResult } from "../src/steps/types";
import { fakeStep, okResult } from "./helpers";

const tool = PipelineConfigSchema.parse({}).tool;

function versionCheck(result: StepResult) {
  return fakeStep("version check", async () => result);
}

describe("Tool version precheck", () => {
  it("accepts the exact expected version after trimming", async () => {
    const version = await checkToolVersion(versionCheck(okResult("4.84 January 20 2023 abc2midi\n")), tool);

    expect(version).toBe("4.84 January 20 2023 abc2midi");
  });

  it("rejects a newer version with remediation guidance", async () => {
    const error = await checkToolVersion(versionCheck(okResult("4.85 March 1 2024 abc2midi")), tool).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(PrecheckError);
    expect(error).toMatchObject({
      code: ErrorCodes.PRECHECK_FAILED,
      exitCode: ExitCodes.PRECHECK_FAILED,
      message: './abc2midi reports "4.85 March 1 2024 abc2midi", expected "4.84 January 20 2023 abc2midi"'
    });
    expect(remediationFor(tool)).toContain("See https://github.com/sshlien/abcmidi");
  });

  it("rejects empty or malformed output the same way", async () => {
    await expect(checkToolVersion(versionCheck(okResult("")), tool)).rejects.toBeInstanceOf(PrecheckError);
    await expect(checkToolVersion(versionCheck(okResult("abc2midi: unknown option")), tool)).rejects.toBeInstanceOf(
      PrecheckError
    );
  });

  it("fails when the tool cannot be started", async () => {
    const missing: StepResult = { ok: false, exitCode: null, stdout: "", stderr: "", spawnError: "spawn ./abc2midi ENOENT" };

    await expect(checkToolVersion(versionCheck(missing), tool)).rejects.toThrow(
      "./abc2midi version check could not start: spawn ./abc2midi ENOENT"
    );
  });

  it("compares stdout even when the tool exits non-zero", async () => {
    const result: StepResult = { ok: false, exitCode: 1, stdout: "4.84 January 20 2023 abc2midi", stderr: "" };

    expect(await checkToolVersion(versionCheck(result), tool)).toBe("4.84 January 20 2023 abc2midi");
  });
});
