import { tmpdir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";

export const LOG_LEVELS = ["error", "warn", "info", "verbose", "debug", "silly"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const ENGINES = ["syn", "scip"] as const;
export type Engine = (typeof ENGINES)[number];

export const DEFAULT_BACKEND_NAME = "callgraph-engine";

function defaultSearchDirs(): string[] {
  const entry = process.argv[1];
  const dirs = entry ? [dirname(resolve(entry))] : [];
  dirs.push(join(process.cwd(), "target", "release"));
  return dirs;
}

export const analysisConfigSchema = z.object({
  /** Executable file name looked up in `searchDirs`. */
  backendName: z.string().min(1).default(DEFAULT_BACKEND_NAME),
  /** Explicit executable; skips the search when set. */
  backendPath: z.string().min(1).optional(),
  searchDirs: z.array(z.string().min(1)).default(defaultSearchDirs),
  /** Where the engine is told to write its artifact. */
  outputPath: z.string().min(1).default(() => join(tmpdir(), "callgraph-output.dot")),
  engine: z.enum(ENGINES).default("syn"),
  /** Manifest file passed as `--workspace <root>/<manifestName>`. */
  manifestName: z.string().min(1).default("Cargo.toml"),
  extraArgs: z.array(z.string()).default([]),
  logLevel: z.enum(LOG_LEVELS).default("warn"),
  logFile: z.string().min(1).optional(),
});

export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof analysisConfigSchema>;

/** Per-run overrides accepted by the orchestrator. */
export type AnalysisOptions = Partial<Pick<AnalysisConfig, "engine" | "outputPath" | "extraArgs">>;

type Env = Record<string, string | undefined>;

function fromEnv(env: Env): Record<string, string> {
  const input: Record<string, string> = {};
  if (env.CALLGRAPH_BACKEND) input.backendPath = env.CALLGRAPH_BACKEND;
  if (env.CALLGRAPH_OUTPUT) input.outputPath = env.CALLGRAPH_OUTPUT;
  if (env.CALLGRAPH_ENGINE) input.engine = env.CALLGRAPH_ENGINE;
  if (env.CALLGRAPH_LOG_LEVEL) input.logLevel = env.CALLGRAPH_LOG_LEVEL;
  if (env.CALLGRAPH_LOG_FILE) input.logFile = env.CALLGRAPH_LOG_FILE;
  return input;
}

/**
 * Resolve the analysis configuration. Explicit overrides win over
 * `CALLGRAPH_*` environment variables, which win over defaults. Overrides
 * may come straight from user input; everything is validated here.
 */
export function loadConfig(
  overrides: AnalysisConfigInput | Record<string, unknown> = {},
  env: Env = process.env,
): AnalysisConfig {
  const result = analysisConfigSchema.safeParse({ ...fromEnv(env), ...overrides });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`),
    );
  }
  return result.data;
}

/** Command-line arguments for one engine run. Same inputs, same list. */
export function buildAnalysisArgs(config: AnalysisConfig, workspaceRoot: string, options: AnalysisOptions = {}): string[] {
  return [
    "--workspace",
    join(workspaceRoot, config.manifestName),
    "--output",
    options.outputPath ?? config.outputPath,
    "--engine",
    options.engine ?? config.engine,
    ...(options.extraArgs ?? config.extraArgs),
  ];
}
