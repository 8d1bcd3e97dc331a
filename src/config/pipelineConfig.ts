import { z } from "zod";

export const CONFIG_FILE_NAME = "tunedata-sync.config.json";

const CommandSchema = z.object({
  label: z.string().optional(),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  // relative to the pipeline root
  cwd: z.string().default(".")
});

const ToolSchema = z.object({
  command: z.string().min(1).default("./abc2midi"),
  versionArgs: z.array(z.string()).default(["-ver"]),
  expectedVersion: z.string().min(1).default("4.84 January 20 2023 abc2midi"),
  sourceUrl: z.string().url().default("https://github.com/sshlien/abcmidi")
});

const PathsSchema = z.object({
  dataDir: z.string().default("data"),
  publishDir: z.string().default("../public"),
  recordedState: z.string().default("data/old_hash.txt"),
  candidateState: z.string().default("data/new_hash.txt"),
  lockFile: z.string().default("data/.pipeline.lock"),
  runLogDir: z.string().nullable().default(null)
});

const DatasetSchema = z.object({
  extension: z.string().startsWith(".").default(".json"),
  algorithm: z.enum(["sha1", "sha256"]).default("sha1")
});

const ArtifactsSchema = z.object({
  workDir: z.string().default("data"),
  primary: z.string().min(1).default("folkfriend-non-user-data.json"),
  metadata: z.string().min(1).default("nud-meta.json")
});

const EnvironmentSchema = z.object({
  // prepended to PATH for every external step, e.g. a virtualenv's bin directory
  binDirs: z.array(z.string()).default([]),
  variables: z.record(z.string()).default({})
});

const DEFAULT_PUBLISH_STEPS: z.input<typeof CommandSchema>[] = [
  { label: "git add", command: "git", args: ["add", "{artifacts}"], cwd: ".." },
  { label: "git commit", command: "git", args: ["commit", "-m", "{message}"], cwd: ".." },
  { label: "git push", command: "git", args: ["push"], cwd: ".." },
  { label: "deploy", command: "firebase", args: ["deploy"], cwd: ".." }
];

export const PipelineConfigSchema = z.object({
  tool: ToolSchema.default({}),
  paths: PathsSchema.default({}),
  dataset: DatasetSchema.default({}),
  artifacts: ArtifactsSchema.default({}),
  environment: EnvironmentSchema.default({}),
  fetch: CommandSchema.default({
    label: "fetch",
    command: "python",
    args: ["src/download_thesession_data.py", "{root}"]
  }),
  build: CommandSchema.default({
    label: "build",
    command: "python",
    args: ["src/build_non_user_data.py", "{root}"]
  }),
  externalPublish: z.array(CommandSchema).default(DEFAULT_PUBLISH_STEPS),
  lock: z.boolean().default(true)
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type CommandConfig = z.infer<typeof CommandSchema>;
export type ToolConfig = z.infer<typeof ToolSchema>;
