export { Viewport, IDLE_MESSAGE, EMPTY_GRAPH_MESSAGE, artifactErrorMessage } from "./viewport";
export {
  AnalysisOrchestrator,
  spawnProcess,
  resolveBackend,
  backendNotFoundMessage,
  analysisFailedMessage,
  outputBlockedMessage,
  NO_OUTPUT_MESSAGE,
} from "./orchestrator";
export type { OrchestratorOptions, ProcessHandle, SpawnHooks, Spawner } from "./orchestrator";
export { CallGraphApp } from "./app";
export type { CallGraphAppOptions } from "./app";
export {
  computeFitView,
  identityView,
  panView,
  resizeView,
  screenToWorld,
  toViewState,
  worldToScreen,
  zoomView,
} from "./camera";
export type { Bounds, CameraView, ViewState } from "./camera";
export { arrowHead, edgeAnchors, edgeGeometry } from "./geometry";
export type { EdgeGeometry, Point } from "./geometry";
export { boundingBox, buildGraphScene, buildPlaceholderScene, sceneBounds } from "./scene";
export type { SceneItem, NodeItem, EdgeLineItem, ArrowHeadItem, PlaceholderTextItem } from "./scene";
export { analysisConfigSchema, buildAnalysisArgs, loadConfig } from "./config";
export type { AnalysisConfig, AnalysisConfigInput, AnalysisOptions, Engine, LogLevel } from "./config";
export { selectWorkspace } from "./workspace";
export type { Workspace } from "./workspace";
export { configureLogging, createLogger } from "./logger";
export * from "./errors";
export * from "./graph/index";
export type {
  AnalysisState,
  LoadResult,
  ViewportMessage,
  ViewportOptions,
  ViewportState,
  ZoomDirection,
} from "./types";
