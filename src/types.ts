import type { ArtifactIoError, EmptyGraphResult } from "./errors";

/** Commands the orchestrator sends to the viewport. */
export type ViewportMessage =
  | { type: "load"; path: string }
  | { type: "showMessage"; text: string }
  | { type: "clear" };

export type ViewportState =
  | { kind: "placeholder"; message: string }
  | { kind: "graph"; nodeCount: number; edgeCount: number };

export type LoadResult =
  | { ok: true; nodeCount: number; edgeCount: number }
  | { ok: false; error: ArtifactIoError | EmptyGraphResult };

export type ZoomDirection = "in" | "out";

export interface ViewportOptions {
  /** Viewport size in CSS pixels (default: 1400 × 900). */
  width?: number;
  height?: number;
  /** Called after every state or camera change. */
  onRender?: () => void;
}

export type AnalysisState = "idle" | "running" | "succeeded" | "failed";
