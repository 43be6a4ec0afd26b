import { spawn as spawnChild } from "node:child_process";
import { accessSync, constants, existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { buildAnalysisArgs } from "./config";
import type { AnalysisConfig, AnalysisOptions } from "./config";
import { NoArtifactProduced, ProcessFailure, ProcessSpawnError } from "./errors";
import { createLogger } from "./logger";
import type { AnalysisState, ViewportMessage } from "./types";
import type { Workspace } from "./workspace";

/** Callbacks a spawner reports through. Each fires on the event loop, never inline. */
export interface SpawnHooks {
  onStdout(chunk: string): void;
  onStderr(chunk: string): void;
  onExit(code: number | null, signal: NodeJS.Signals | null): void;
  onError(err: Error): void;
}

export interface ProcessHandle {
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
}

export type Spawner = (command: string, args: readonly string[], hooks: SpawnHooks) => ProcessHandle;

/** Runs the engine as a child process with piped output. */
export const spawnProcess: Spawner = (command, args, hooks) => {
  const child = spawnChild(command, args, { stdio: ["ignore", "pipe", "pipe"] });
  child.stdout.setEncoding("utf8");
  child.stderr.setEncoding("utf8");
  child.stdout.on("data", (chunk: string) => hooks.onStdout(chunk));
  child.stderr.on("data", (chunk: string) => hooks.onStderr(chunk));
  child.on("error", (err) => hooks.onError(err));
  child.on("close", (code, signal) => hooks.onExit(code, signal));
  return child;
};

export interface OrchestratorOptions {
  config: AnalysisConfig;
  /** Receives every viewport command; the viewport is the usual consumer. */
  onMessage: (message: ViewportMessage) => void;
  onStatus?: (status: string) => void;
  /** Fires when the run trigger becomes enabled or disabled. */
  onTriggerChange?: (enabled: boolean) => void;
  onStateChange?: (state: AnalysisState) => void;
  spawn?: Spawner;
}

export const NO_OUTPUT_MESSAGE = "Analysis completed but no output generated.";

export function backendNotFoundMessage(name: string): string {
  return `Backend not found.\nPlease ensure '${name}' is built.`;
}

export function outputBlockedMessage(path: string): string {
  return `Cannot replace output file:\n${path}`;
}

export function analysisFailedMessage(stderr: string): string {
  return `Analysis failed:\n${stderr}`;
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Explicit path if configured, else the first executable hit in the search dirs. */
export function resolveBackend(config: AnalysisConfig): string | null {
  if (config.backendPath) return existsSync(config.backendPath) ? config.backendPath : null;
  for (const dir of config.searchDirs) {
    const candidate = join(dir, config.backendName);
    if (isExecutable(candidate)) return candidate;
  }
  return null;
}

interface ActiveRun {
  outputPath: string;
  stderr: string;
  settled: boolean;
}

const log = createLogger("orchestrator");

/**
 * Drives the external analysis engine, one run at a time.
 *
 * idle → running → succeeded | failed → idle. A start request while a run is
 * in flight is rejected without side effects. Completion is reported to
 * `onMessage` before the trigger is re-enabled.
 */
export class AnalysisOrchestrator {
  private readonly config: AnalysisConfig;
  private readonly spawn: Spawner;
  private readonly onMessage: (message: ViewportMessage) => void;
  private readonly onStatus?: (status: string) => void;
  private readonly onTriggerChange?: (enabled: boolean) => void;
  private readonly onStateChange?: (state: AnalysisState) => void;

  private state: AnalysisState = "idle";
  private run: ActiveRun | null = null;
  private handle: ProcessHandle | null = null;
  private triggerEnabled = true;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.spawn = options.spawn ?? spawnProcess;
    this.onMessage = options.onMessage;
    this.onStatus = options.onStatus;
    this.onTriggerChange = options.onTriggerChange;
    this.onStateChange = options.onStateChange;
  }

  getState(): AnalysisState {
    return this.state;
  }

  isTriggerEnabled(): boolean {
    return this.triggerEnabled;
  }

  isRunning(): boolean {
    return this.run !== null;
  }

  /**
   * Start an analysis of `workspace`. Returns false when the request was
   * rejected (a run is in flight) or ended immediately (engine missing,
   * output path not removable, launch failure).
   */
  start(workspace: Workspace, options: AnalysisOptions = {}): boolean {
    if (this.state !== "idle") {
      log.debug("Start ignored: analysis already running");
      return false;
    }

    const backend = resolveBackend(this.config);
    if (!backend) {
      const error = new ProcessSpawnError(this.config.backendPath ?? this.config.backendName);
      log.warn(error.message);
      this.onMessage({ type: "showMessage", text: backendNotFoundMessage(this.config.backendName) });
      this.status("Error: Backend not found");
      return false;
    }

    const outputPath = options.outputPath ?? this.config.outputPath;
    try {
      rmSync(outputPath, { force: true });
    } catch (err) {
      log.warn(`Cannot remove previous output ${outputPath}`, err);
      this.onMessage({ type: "showMessage", text: outputBlockedMessage(outputPath) });
      this.status("Error: Output path unavailable");
      return false;
    }
    const args = buildAnalysisArgs(this.config, workspace.root, options);

    this.setTrigger(false);
    this.setState("running");
    this.status("Running analysis...");
    log.info(`Running ${backend} ${args.join(" ")}`);

    const run: ActiveRun = { outputPath, stderr: "", settled: false };
    this.run = run;
    let handle: ProcessHandle;
    try {
      handle = this.spawn(backend, args, {
        onStdout: (chunk) => {
          if (this.run === run) log.debug(chunk.trimEnd());
        },
        onStderr: (chunk) => {
          if (this.run === run) run.stderr += chunk;
        },
        onExit: (code, signal) => this.finish(run, code, signal),
        onError: (err) => this.fail(run, new ProcessSpawnError(backend, err)),
      });
    } catch (err) {
      this.fail(run, new ProcessSpawnError(backend, err));
      return false;
    }
    if (this.run === run) this.handle = handle;
    return true;
  }

  /** Kill a run still in flight. Its late callbacks are ignored. */
  shutdown(): void {
    const run = this.run;
    const handle = this.handle;
    if (!run || !handle) return;
    run.settled = true;
    this.run = null;
    this.handle = null;
    log.info(`Terminating running analysis (pid ${handle.pid ?? "unknown"})`);
    handle.kill("SIGKILL");
    this.setState("idle");
    this.setTrigger(true);
  }

  private finish(run: ActiveRun, code: number | null, signal: NodeJS.Signals | null): void {
    if (run.settled || this.run !== run) return;
    run.settled = true;

    if (code === 0) {
      if (existsSync(run.outputPath)) {
        log.info(`Analysis finished: ${run.outputPath}`);
        this.complete("succeeded", { type: "load", path: run.outputPath }, "Analysis complete!");
      } else {
        log.warn(new NoArtifactProduced(run.outputPath).message);
        this.complete("failed", { type: "showMessage", text: NO_OUTPUT_MESSAGE }, "No output generated");
      }
      return;
    }

    const failure = new ProcessFailure(code, signal, run.stderr);
    log.warn(failure.message);
    this.complete("failed", { type: "showMessage", text: analysisFailedMessage(failure.stderr) }, "Analysis failed");
  }

  private fail(run: ActiveRun, error: ProcessSpawnError): void {
    if (run.settled || this.run !== run) return;
    run.settled = true;
    log.warn(error.message, error.cause);
    this.complete(
      "failed",
      { type: "showMessage", text: backendNotFoundMessage(this.config.backendName) },
      "Error: Backend not found",
    );
  }

  private complete(state: "succeeded" | "failed", message: ViewportMessage, status: string): void {
    this.setState(state);
    this.onMessage(message);
    this.status(status);
    this.run = null;
    this.handle = null;
    this.setState("idle");
    this.setTrigger(true);
  }

  private setState(state: AnalysisState): void {
    this.state = state;
    this.onStateChange?.(state);
  }

  private setTrigger(enabled: boolean): void {
    if (this.triggerEnabled === enabled) return;
    this.triggerEnabled = enabled;
    this.onTriggerChange?.(enabled);
  }

  private status(text: string): void {
    this.onStatus?.(text);
  }
}
