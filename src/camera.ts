export interface Bounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/** Visible world rectangle. World y grows downward, as on screen. */
export interface CameraView {
  centerX: number;
  centerY: number;
  halfW: number;
  halfH: number;
}

/** Screen pixels per world unit, and where the world origin lands on screen. */
export interface ViewState {
  scale: number;
  offsetX: number;
  offsetY: number;
}

/** World units added around content before fitting. */
export const FIT_PADDING = 50;
/** Extra zoom-out applied after fitting, leaving a visible margin. */
export const FIT_ZOOM_OUT = 0.9;
/** Scale change per wheel step. */
export const ZOOM_STEP = 1.1;

export function padBounds(bounds: Bounds, padding: number): Bounds {
  return {
    minX: bounds.minX - padding,
    maxX: bounds.maxX + padding,
    minY: bounds.minY - padding,
    maxY: bounds.maxY + padding,
  };
}

/**
 * Frame `bounds` (after padding) in a `width` × `height` viewport, keeping
 * the viewport's aspect ratio, then zoom out by `zoomOut`.
 */
export function computeFitView(
  bounds: Bounds,
  width: number,
  height: number,
  padding = FIT_PADDING,
  zoomOut = FIT_ZOOM_OUT,
): CameraView {
  const padded = padBounds(bounds, padding);
  const dataW = Math.max(padded.maxX - padded.minX, Number.EPSILON);
  const dataH = Math.max(padded.maxY - padded.minY, Number.EPSILON);
  const centerX = (padded.minX + padded.maxX) * 0.5;
  const centerY = (padded.minY + padded.maxY) * 0.5;

  const aspect = Math.max(width, 1) / Math.max(height, 1);
  const dataAspect = dataW / dataH;

  let halfW: number;
  let halfH: number;

  if (dataAspect > aspect) {
    halfW = dataW * 0.5;
    halfH = halfW / aspect;
  } else {
    halfH = dataH * 0.5;
    halfW = halfH * aspect;
  }

  return { centerX, centerY, halfW: halfW / zoomOut, halfH: halfH / zoomOut };
}

/** Camera showing the world at scale 1 with the origin in the viewport centre. */
export function identityView(width: number, height: number): CameraView {
  return { centerX: 0, centerY: 0, halfW: width / 2, halfH: height / 2 };
}

export function worldToScreen(
  wx: number,
  wy: number,
  view: CameraView,
  width: number,
  height: number,
): { sx: number; sy: number } {
  const sx = ((wx - view.centerX) / (2 * view.halfW)) * width + width * 0.5;
  const sy = ((wy - view.centerY) / (2 * view.halfH)) * height + height * 0.5;
  return { sx, sy };
}

export function screenToWorld(
  sx: number,
  sy: number,
  view: CameraView,
  width: number,
  height: number,
): { x: number; y: number } {
  return {
    x: view.centerX + (sx / width - 0.5) * 2 * view.halfW,
    y: view.centerY + (sy / height - 0.5) * 2 * view.halfH,
  };
}

/**
 * Scale the visible extent by `factor` around a screen point, which stays
 * over the same world point. factor > 1 zooms out.
 */
export function zoomView(
  view: CameraView,
  sx: number,
  sy: number,
  width: number,
  height: number,
  factor: number,
): CameraView {
  const world = screenToWorld(sx, sy, view, width, height);
  return {
    centerX: world.x + (view.centerX - world.x) * factor,
    centerY: world.y + (view.centerY - world.y) * factor,
    halfW: view.halfW * factor,
    halfH: view.halfH * factor,
  };
}

/** Move the content by a screen-space delta. */
export function panView(view: CameraView, dx: number, dy: number, width: number, height: number): CameraView {
  return {
    centerX: view.centerX - (dx / width) * 2 * view.halfW,
    centerY: view.centerY - (dy / height) * 2 * view.halfH,
    halfW: view.halfW,
    halfH: view.halfH,
  };
}

/** Screen transform for a camera whose extent matches the viewport aspect. */
export function toViewState(view: CameraView, width: number, height: number): ViewState {
  const scale = width / (2 * view.halfW);
  return {
    scale,
    offsetX: width / 2 - view.centerX * scale,
    offsetY: height / 2 - view.centerY * scale,
  };
}

/** Keep centre and scale when the viewport changes size. */
export function resizeView(view: CameraView, oldWidth: number, width: number, height: number): CameraView {
  const scale = oldWidth / (2 * view.halfW);
  return { centerX: view.centerX, centerY: view.centerY, halfW: width / (2 * scale), halfH: height / (2 * scale) };
}
