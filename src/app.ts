import type { AnalysisConfig, AnalysisOptions } from "./config";
import { WorkspaceError } from "./errors";
import { createLogger } from "./logger";
import { AnalysisOrchestrator } from "./orchestrator";
import type { Spawner } from "./orchestrator";
import type { AnalysisState, ViewportOptions } from "./types";
import { Viewport } from "./viewport";
import { selectWorkspace } from "./workspace";
import type { Workspace } from "./workspace";

export const READY_STATUS = "Ready - Select a folder to begin";
export const NO_WORKSPACE_STATUS = "Please select a project folder first";
export const CLEARED_STATUS = "Results cleared";

export interface CallGraphAppOptions {
  config: AnalysisConfig;
  viewport?: ViewportOptions;
  spawn?: Spawner;
  /** Called whenever status, workspace or trigger availability changes. */
  onChange?: () => void;
}

const log = createLogger("app");

/**
 * Headless counterpart of the application window: the three user triggers
 * (select workspace, run analysis, clear results) plus the status line.
 */
export class CallGraphApp {
  readonly viewport: Viewport;
  private readonly orchestrator: AnalysisOrchestrator;
  private readonly onChange?: () => void;
  private workspace: Workspace | null = null;
  private statusText = READY_STATUS;
  private idleWaiters: (() => void)[] = [];

  constructor(options: CallGraphAppOptions) {
    this.onChange = options.onChange;
    this.viewport = new Viewport(options.viewport);
    this.orchestrator = new AnalysisOrchestrator({
      config: options.config,
      spawn: options.spawn,
      onMessage: (message) => this.viewport.dispatch(message),
      onStatus: (status) => this.setStatus(status),
      onTriggerChange: (enabled) => {
        if (enabled) this.flushIdleWaiters();
        this.emitChange();
      },
    });
  }

  get status(): string {
    return this.statusText;
  }

  get currentWorkspace(): Workspace | null {
    return this.workspace;
  }

  /** True when a workspace is chosen and no analysis is in flight. */
  get analyzeEnabled(): boolean {
    return this.workspace !== null && this.orchestrator.isTriggerEnabled();
  }

  get analysisState(): AnalysisState {
    return this.orchestrator.getState();
  }

  /** Returns false, leaving the previous selection in place, if `path` is not a folder. */
  selectWorkspace(path: string): boolean {
    let workspace: Workspace;
    try {
      workspace = selectWorkspace(path);
    } catch (err) {
      if (!(err instanceof WorkspaceError)) throw err;
      log.warn(err.message);
      this.setStatus(err.message);
      return false;
    }
    this.workspace = workspace;
    this.setStatus(`Loaded: ${workspace.root} (${workspace.sourceFiles.length} .rs files)`);
    return true;
  }

  runAnalysis(options?: AnalysisOptions): boolean {
    if (!this.workspace) {
      this.setStatus(NO_WORKSPACE_STATUS);
      return false;
    }
    if (!this.orchestrator.isTriggerEnabled()) return false;
    return this.orchestrator.start(this.workspace, options);
  }

  clearResults(): void {
    this.viewport.clear();
    this.setStatus(CLEARED_STATUS);
  }

  /** Resolves once no analysis is running. */
  waitForIdle(): Promise<void> {
    if (!this.orchestrator.isRunning()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  shutdown(): void {
    this.orchestrator.shutdown();
  }

  private setStatus(text: string): void {
    this.statusText = text;
    this.emitChange();
  }

  private flushIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private emitChange(): void {
    this.onChange?.();
  }
}
