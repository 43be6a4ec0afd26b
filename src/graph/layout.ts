import type { LayoutResult } from "./types";

export interface GridLayoutOptions {
  /** Nodes per row (default: 5). */
  columns?: number;
  /** Horizontal distance between column origins (default: 200). */
  spacingX?: number;
  /** Vertical distance between row origins (default: 120). */
  spacingY?: number;
}

export const DEFAULT_COLUMNS = 5;
export const DEFAULT_SPACING_X = 200;
export const DEFAULT_SPACING_Y = 120;

/**
 * Place nodes on a fixed grid, row-major, in the order given.
 * Edges play no part: the result depends only on each id's index.
 */
export function computeLayout(ids: Iterable<string>, options: GridLayoutOptions = {}): LayoutResult {
  const columns = Math.max(1, Math.floor(options.columns ?? DEFAULT_COLUMNS));
  const spacingX = options.spacingX ?? DEFAULT_SPACING_X;
  const spacingY = options.spacingY ?? DEFAULT_SPACING_Y;

  const result: LayoutResult = new Map();
  let i = 0;
  for (const id of ids) {
    const column = i % columns;
    const row = Math.floor(i / columns);
    result.set(id, { x: column * spacingX, y: row * spacingY });
    i++;
  }

  return result;
}
