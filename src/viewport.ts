import {
  ZOOM_STEP,
  computeFitView,
  identityView,
  panView,
  resizeView,
  toViewState,
  zoomView,
} from "./camera";
import type { CameraView, ViewState } from "./camera";
import { ArtifactIoError, EmptyGraphResult } from "./errors";
import { computeLayout } from "./graph/layout";
import { GraphModel } from "./graph/model";
import { parseGraphDocument, readGraphDocument } from "./graph/parse";
import type { GraphDocument, ReadonlyGraph } from "./graph/types";
import { createLogger } from "./logger";
import { buildGraphScene, buildPlaceholderScene, sceneBounds } from "./scene";
import type { SceneItem } from "./scene";
import type { LoadResult, ViewportMessage, ViewportOptions, ViewportState, ZoomDirection } from "./types";

export const IDLE_MESSAGE = "Select a folder and click 'Run Analysis'\nto visualize the call graph";
export const EMPTY_GRAPH_MESSAGE = "No nodes found in the call graph";

export function artifactErrorMessage(path: string): string {
  return `Failed to open output file:\n${path}`;
}

const DEFAULT_WIDTH = 1400;
const DEFAULT_HEIGHT = 900;

const log = createLogger("viewport");

/**
 * Owns the displayed scene and camera.
 *
 * Either shows a placeholder message or a laid-out graph; the two never
 * coexist. Loading runs to completion synchronously: read, parse, populate,
 * lay out, build the scene, fit.
 */
export class Viewport {
  private width: number;
  private height: number;
  private model = new GraphModel();
  private scene: SceneItem[] = [];
  private state: ViewportState = { kind: "placeholder", message: IDLE_MESSAGE };
  private view: CameraView;
  private onRender?: () => void;

  private isDragging = false;
  private lastDragX = 0;
  private lastDragY = 0;

  constructor(options: ViewportOptions = {}) {
    this.width = options.width ?? DEFAULT_WIDTH;
    this.height = options.height ?? DEFAULT_HEIGHT;
    this.onRender = options.onRender;
    this.view = identityView(this.width, this.height);
    this.showPlaceholder(IDLE_MESSAGE);
  }

  /** Apply one orchestrator command. */
  dispatch(message: ViewportMessage): void {
    switch (message.type) {
      case "load":
        this.load(message.path);
        break;
      case "showMessage":
        this.showMessage(message.text);
        break;
      case "clear":
        this.clear();
        break;
    }
  }

  load(path: string): LoadResult {
    let doc: GraphDocument;
    try {
      doc = readGraphDocument(path);
    } catch (err) {
      if (!(err instanceof ArtifactIoError)) throw err;
      log.warn(`Could not read ${path}`, err.cause);
      this.showPlaceholder(artifactErrorMessage(path));
      return { ok: false, error: err };
    }
    return this.populate(doc, path);
  }

  /** Same pipeline as {@link load}, for text already in memory. */
  loadText(text: string, source = "<text>"): LoadResult {
    return this.populate(parseGraphDocument(text), source);
  }

  showMessage(text: string): void {
    this.showPlaceholder(text);
  }

  clear(): void {
    this.showPlaceholder(IDLE_MESSAGE);
  }

  /** Frame all content, with padding and a small extra zoom-out. */
  fitToView(): void {
    const bounds = sceneBounds(this.scene);
    if (!bounds) return;
    this.view = computeFitView(bounds, this.width, this.height);
    this.emitRender();
  }

  /** One zoom step around a screen point (default: viewport centre). */
  zoomAt(direction: ZoomDirection, screenX = this.width / 2, screenY = this.height / 2): void {
    const factor = direction === "in" ? 1 / ZOOM_STEP : ZOOM_STEP;
    this.view = zoomView(this.view, screenX, screenY, this.width, this.height, factor);
    this.emitRender();
  }

  /** Wheel input: scrolling up (negative delta) zooms in. */
  handleWheel(deltaY: number, screenX?: number, screenY?: number): void {
    if (deltaY === 0) return;
    this.zoomAt(deltaY < 0 ? "in" : "out", screenX, screenY);
  }

  pan(dx: number, dy: number): void {
    this.view = panView(this.view, dx, dy, this.width, this.height);
    this.emitRender();
  }

  beginDrag(screenX: number, screenY: number): void {
    this.isDragging = true;
    this.lastDragX = screenX;
    this.lastDragY = screenY;
  }

  dragTo(screenX: number, screenY: number): void {
    if (!this.isDragging) return;
    const dx = screenX - this.lastDragX;
    const dy = screenY - this.lastDragY;
    this.lastDragX = screenX;
    this.lastDragY = screenY;
    this.pan(dx, dy);
  }

  endDrag(): void {
    this.isDragging = false;
  }

  resize(width: number, height: number): void {
    if (width <= 0 || height <= 0) return;
    this.view = resizeView(this.view, this.width, width, height);
    this.width = width;
    this.height = height;
    this.emitRender();
  }

  getState(): ViewportState {
    return this.state;
  }

  getScene(): readonly SceneItem[] {
    return this.scene;
  }

  /** The displayed graph. Changes only through {@link load}, {@link loadText} and the placeholder transitions. */
  getModel(): ReadonlyGraph {
    return this.model;
  }

  getCameraView(): CameraView {
    return { ...this.view };
  }

  getViewState(): ViewState {
    return toViewState(this.view, this.width, this.height);
  }

  getSize(): { width: number; height: number } {
    return { width: this.width, height: this.height };
  }

  private populate(doc: GraphDocument, source: string): LoadResult {
    this.model = GraphModel.fromDocument(doc);

    if (this.model.nodeCount === 0) {
      const error = new EmptyGraphResult(source);
      this.showPlaceholder(EMPTY_GRAPH_MESSAGE);
      return { ok: false, error };
    }

    this.model.applyLayout(computeLayout(this.model.getNodes().map((node) => node.id)));
    this.scene = buildGraphScene(this.model);

    const nodeCount = this.model.nodeCount;
    const edgeCount = this.model.edgeCount;
    log.debug(`Loaded ${source}: ${nodeCount} nodes, ${edgeCount} edges`);
    this.state = { kind: "graph", nodeCount, edgeCount };
    this.fitToView();
    return { ok: true, nodeCount, edgeCount };
  }

  private showPlaceholder(message: string): void {
    this.model.clear();
    this.scene = buildPlaceholderScene(message);
    this.state = { kind: "placeholder", message };
    this.view = identityView(this.width, this.height);
    this.emitRender();
  }

  private emitRender(): void {
    this.onRender?.();
  }
}
