import type { Bounds } from "./camera";
import { edgeGeometry } from "./geometry";
import type { Point } from "./geometry";
import type { GraphModel } from "./graph/model";

export interface NodeItem {
  kind: "node";
  id: string;
  label: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface EdgeLineItem {
  kind: "edgeLine";
  source: string;
  target: string;
  start: Point;
  end: Point;
}

export interface ArrowHeadItem {
  kind: "arrowHead";
  source: string;
  target: string;
  points: [Point, Point, Point];
}

export interface PlaceholderTextItem {
  kind: "placeholderText";
  lines: string[];
  /** Top-left corner of the text block. */
  x: number;
  y: number;
  fontSize: number;
}

export type SceneItem = NodeItem | EdgeLineItem | ArrowHeadItem | PlaceholderTextItem;

export const PLACEHOLDER_FONT_SIZE = 16;
export const LINE_HEIGHT = 1.25;
/** Rough advance width of one glyph, as a fraction of the font size. */
export const GLYPH_WIDTH = 0.6;

export function placeholderSize(lines: readonly string[], fontSize: number): { width: number; height: number } {
  let longest = 0;
  for (const line of lines) longest = Math.max(longest, line.length);
  return {
    width: longest * fontSize * GLYPH_WIDTH,
    height: lines.length * fontSize * LINE_HEIGHT,
  };
}

function pointsBounds(points: readonly Point[]): Bounds {
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.x > maxX) maxX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.y > maxY) maxY = p.y;
  }
  return { minX, maxX, minY, maxY };
}

export function boundingBox(item: SceneItem): Bounds {
  switch (item.kind) {
    case "node":
      return { minX: item.x, maxX: item.x + item.width, minY: item.y, maxY: item.y + item.height };
    case "edgeLine":
      return pointsBounds([item.start, item.end]);
    case "arrowHead":
      return pointsBounds(item.points);
    case "placeholderText": {
      const { width, height } = placeholderSize(item.lines, item.fontSize);
      return { minX: item.x, maxX: item.x + width, minY: item.y, maxY: item.y + height };
    }
  }
}

/** Union of item boxes, or null for an empty scene. */
export function sceneBounds(items: readonly SceneItem[]): Bounds | null {
  if (items.length === 0) return null;
  const bounds: Bounds = { minX: Infinity, maxX: -Infinity, minY: Infinity, maxY: -Infinity };
  for (const item of items) {
    const b = boundingBox(item);
    if (b.minX < bounds.minX) bounds.minX = b.minX;
    if (b.maxX > bounds.maxX) bounds.maxX = b.maxX;
    if (b.minY < bounds.minY) bounds.minY = b.minY;
    if (b.maxY > bounds.maxY) bounds.maxY = b.maxY;
  }
  return bounds;
}

/** Edge lines and arrowheads first so nodes draw over them. */
export function buildGraphScene(model: GraphModel): SceneItem[] {
  const items: SceneItem[] = [];

  for (const edge of model.getEdges()) {
    const source = model.getNode(edge.source);
    const target = model.getNode(edge.target);
    if (!source || !target) continue;
    const geometry = edgeGeometry(source, target);
    items.push({
      kind: "edgeLine",
      source: edge.source,
      target: edge.target,
      start: geometry.start,
      end: geometry.end,
    });
    items.push({ kind: "arrowHead", source: edge.source, target: edge.target, points: geometry.arrow });
  }

  for (const node of model.getNodes()) {
    items.push({
      kind: "node",
      id: node.id,
      label: node.displayLabel,
      x: node.x,
      y: node.y,
      width: node.width,
      height: node.height,
    });
  }

  return items;
}

/** A single text block centred on the origin. */
export function buildPlaceholderScene(message: string, fontSize = PLACEHOLDER_FONT_SIZE): SceneItem[] {
  const lines = message.split("\n");
  const { width, height } = placeholderSize(lines, fontSize);
  return [{ kind: "placeholderText", lines, x: -width / 2, y: -height / 2, fontSize }];
}
