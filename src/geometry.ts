import type { GraphNode } from "./graph/types";

export interface Point {
  x: number;
  y: number;
}

export const ARROW_LENGTH = 10;
/** Half-angle between the arrowhead's sides and the edge line. */
export const ARROW_SPREAD = Math.PI / 6;

type Box = Pick<GraphNode, "x" | "y" | "width" | "height">;

export interface EdgeGeometry {
  start: Point;
  end: Point;
  /** Apex first, then the two base corners. */
  arrow: [Point, Point, Point];
}

/**
 * Fixed attachment points: bottom-centre of the source box, top-centre of
 * the target box. Relative placement of the two boxes is not considered.
 */
export function edgeAnchors(source: Box, target: Box): { start: Point; end: Point } {
  return {
    start: { x: source.x + source.width / 2, y: source.y + source.height },
    end: { x: target.x + target.width / 2, y: target.y },
  };
}

/** Triangle with its apex at `to`, base corners set back along the line by `length`. */
export function arrowHead(
  from: Point,
  to: Point,
  length = ARROW_LENGTH,
  spread = ARROW_SPREAD,
): [Point, Point, Point] {
  const angle = Math.atan2(to.y - from.y, to.x - from.x);
  return [
    { x: to.x, y: to.y },
    {
      x: to.x - Math.cos(angle - spread) * length,
      y: to.y - Math.sin(angle - spread) * length,
    },
    {
      x: to.x - Math.cos(angle + spread) * length,
      y: to.y - Math.sin(angle + spread) * length,
    },
  ];
}

export function edgeGeometry(source: Box, target: Box): EdgeGeometry {
  const { start, end } = edgeAnchors(source, target);
  return { start, end, arrow: arrowHead(start, end) };
}
