import { describe, it, expect } from "vitest";
import { arrowHead, edgeAnchors, edgeGeometry } from "../src/geometry";

const box = (x: number, y: number) => ({ x, y, width: 160, height: 60 });

describe("edgeAnchors", () => {
  it("connects bottom-centre of the source to top-centre of the target", () => {
    const { start, end } = edgeAnchors(box(0, 0), box(0, 120));

    expect(start).toEqual({ x: 80, y: 60 });
    expect(end).toEqual({ x: 80, y: 120 });
  });

  it("uses the same anchors for side-by-side boxes", () => {
    const { start, end } = edgeAnchors(box(0, 0), box(200, 0));

    expect(start).toEqual({ x: 80, y: 60 });
    expect(end).toEqual({ x: 280, y: 0 });
  });

  it("uses the same anchors when the target sits above the source", () => {
    const { start, end } = edgeAnchors(box(0, 120), box(0, 0));

    expect(start).toEqual({ x: 80, y: 180 });
    expect(end).toEqual({ x: 80, y: 0 });
  });
});

describe("arrowHead", () => {
  it("puts the apex on the target anchor", () => {
    const [apex] = arrowHead({ x: 80, y: 60 }, { x: 80, y: 120 });

    expect(apex).toEqual({ x: 80, y: 120 });
  });

  it("sets the base corners back 30° either side of a downward line", () => {
    const [, left, right] = arrowHead({ x: 80, y: 60 }, { x: 80, y: 120 });

    expect(left.x).toBeCloseTo(75);
    expect(left.y).toBeCloseTo(120 - 8.660254);
    expect(right.x).toBeCloseTo(85);
    expect(right.y).toBeCloseTo(120 - 8.660254);
  });

  it("places both base corners at the arrow length from the apex", () => {
    const [apex, left, right] = arrowHead({ x: 0, y: 0 }, { x: 37, y: -12 }, 14);

    expect(Math.hypot(left.x - apex.x, left.y - apex.y)).toBeCloseTo(14);
    expect(Math.hypot(right.x - apex.x, right.y - apex.y)).toBeCloseTo(14);
  });

  it("points a horizontal arrow back along the line", () => {
    const [, left, right] = arrowHead({ x: 0, y: 0 }, { x: 100, y: 0 });

    expect(left.x).toBeCloseTo(100 - 8.660254);
    expect(left.y).toBeCloseTo(5);
    expect(right.x).toBeCloseTo(100 - 8.660254);
    expect(right.y).toBeCloseTo(-5);
  });
});

describe("edgeGeometry", () => {
  it("combines anchors and arrowhead", () => {
    const geometry = edgeGeometry(box(0, 0), box(0, 120));

    expect(geometry.start).toEqual({ x: 80, y: 60 });
    expect(geometry.end).toEqual({ x: 80, y: 120 });
    expect(geometry.arrow[0]).toEqual({ x: 80, y: 120 });
  });
});
