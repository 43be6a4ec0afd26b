import { describe, it, expect } from "vitest";
import {
  computeFitView,
  identityView,
  panView,
  resizeView,
  screenToWorld,
  toViewState,
  worldToScreen,
  zoomView,
} from "../src/camera";

const nodeBounds = { minX: 0, maxX: 160, minY: 0, maxY: 60 };

describe("computeFitView", () => {
  it("centres the padded content", () => {
    const view = computeFitView(nodeBounds, 800, 600);

    expect(view.centerX).toBeCloseTo(80);
    expect(view.centerY).toBeCloseTo(30);
  });

  it("fits the wider dimension and keeps the viewport aspect", () => {
    const view = computeFitView(nodeBounds, 800, 600);

    // padded 260 × 160, then zoomed out by 0.9
    expect(view.halfW).toBeCloseTo(130 / 0.9);
    expect(view.halfH).toBeCloseTo(97.5 / 0.9);
    expect(view.halfW / view.halfH).toBeCloseTo(800 / 600);
  });

  it("fits the taller dimension for tall content", () => {
    const view = computeFitView({ minX: 0, maxX: 160, minY: 0, maxY: 1000 }, 800, 600);

    expect(view.halfH).toBeCloseTo(550 / 0.9);
    expect(view.halfW).toBeCloseTo((550 / 0.9) * (800 / 600));
  });

  it("yields a scale of viewport / padded extent × 0.9", () => {
    const view = computeFitView(nodeBounds, 800, 600);

    expect(toViewState(view, 800, 600).scale).toBeCloseTo((800 / 260) * 0.9);
  });
});

describe("projection", () => {
  it("screenToWorld inverts worldToScreen", () => {
    const view = computeFitView(nodeBounds, 800, 600);
    const { sx, sy } = worldToScreen(123, -45, view, 800, 600);
    const world = screenToWorld(sx, sy, view, 800, 600);

    expect(world.x).toBeCloseTo(123);
    expect(world.y).toBeCloseTo(-45);
  });

  it("identity view maps the origin to the viewport centre at scale 1", () => {
    expect(toViewState(identityView(800, 600), 800, 600)).toEqual({ scale: 1, offsetX: 400, offsetY: 300 });
  });

  it("view state agrees with worldToScreen", () => {
    const view = computeFitView(nodeBounds, 800, 600);
    const state = toViewState(view, 800, 600);
    const { sx, sy } = worldToScreen(160, 60, view, 800, 600);

    expect(sx).toBeCloseTo(160 * state.scale + state.offsetX);
    expect(sy).toBeCloseTo(60 * state.scale + state.offsetY);
  });
});

describe("zoomView", () => {
  it("scales the visible extent by the factor", () => {
    const view = zoomView(identityView(800, 600), 400, 300, 800, 600, 1.1);

    expect(view.halfW).toBeCloseTo(440);
    expect(view.halfH).toBeCloseTo(330);
    expect(view.centerX).toBeCloseTo(0);
    expect(view.centerY).toBeCloseTo(0);
  });

  it("keeps the world point under the anchor fixed", () => {
    const before = identityView(800, 600);
    const anchor = screenToWorld(100, 50, before, 800, 600);
    const after = zoomView(before, 100, 50, 800, 600, 1 / 1.1);
    const { sx, sy } = worldToScreen(anchor.x, anchor.y, after, 800, 600);

    expect(sx).toBeCloseTo(100);
    expect(sy).toBeCloseTo(50);
  });
});

describe("panView", () => {
  it("moves content by the screen delta", () => {
    const view = panView(identityView(800, 600), 10, 20, 800, 600);

    expect(view.centerX).toBeCloseTo(-10);
    expect(view.centerY).toBeCloseTo(-20);
    expect(toViewState(view, 800, 600)).toEqual({ scale: 1, offsetX: 410, offsetY: 320 });
  });
});

describe("resizeView", () => {
  it("keeps centre and scale", () => {
    const view = resizeView(identityView(800, 600), 800, 1000, 500);

    expect(view).toEqual({ centerX: 0, centerY: 0, halfW: 500, halfH: 250 });
  });
});
