import { createElement, type ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import type { ViewState } from "./camera";
import { GLYPH_WIDTH, LINE_HEIGHT, type SceneItem } from "./scene";
import type { Viewport } from "./viewport";

export const theme = {
  background: "#11111b",
  grid: "#1e1e2e",
  nodeFill: "#313244",
  nodeStroke: "#89b4fa",
  label: "#cdd6f4",
  edge: "#a6adc8",
  placeholder: "#6c7086",
};

const GRID_SIZE = 50;
const GRID_ID = "callgraph-grid";
const LABEL_FONT_SIZE = 12;

/** Props for the {@link CallGraphView} component. */
export interface CallGraphViewProps {
  scene: readonly SceneItem[];
  viewState: ViewState;
  width: number;
  height: number;
  /** Background grid, drawn under everything and independent of the graph (default: true). */
  showGrid?: boolean;
}

function matrix(view: ViewState): string {
  return `matrix(${view.scale} 0 0 ${view.scale} ${view.offsetX} ${view.offsetY})`;
}

/** SVG element for one scene item. */
export function drawItem(item: SceneItem, key: string | number): ReactElement {
  switch (item.kind) {
    case "node": {
      const cx = item.x + item.width / 2;
      const cy = item.y + item.height / 2;
      return createElement(
        "g",
        { key, className: "node" },
        createElement("ellipse", {
          cx,
          cy,
          rx: item.width / 2,
          ry: item.height / 2,
          fill: theme.nodeFill,
          stroke: theme.nodeStroke,
          strokeWidth: 2,
        }),
        createElement(
          "text",
          {
            x: cx,
            y: cy,
            fill: theme.label,
            fontSize: LABEL_FONT_SIZE,
            textAnchor: "middle" as const,
            dominantBaseline: "central" as const,
          },
          item.label,
        ),
      );
    }
    case "edgeLine":
      return createElement("line", {
        key,
        x1: item.start.x,
        y1: item.start.y,
        x2: item.end.x,
        y2: item.end.y,
        stroke: theme.edge,
        strokeWidth: 1.5,
      });
    case "arrowHead":
      return createElement("polygon", {
        key,
        points: item.points.map((p) => `${p.x},${p.y}`).join(" "),
        fill: theme.edge,
        stroke: theme.edge,
      });
    case "placeholderText": {
      const centerX = item.x + (Math.max(...item.lines.map((l) => l.length)) * item.fontSize * GLYPH_WIDTH) / 2;
      return createElement(
        "g",
        { key, className: "placeholder" },
        ...item.lines.map((line, i) =>
          createElement(
            "text",
            {
              key: i,
              x: centerX,
              y: item.y + i * item.fontSize * LINE_HEIGHT,
              fill: theme.placeholder,
              fontSize: item.fontSize,
              textAnchor: "middle" as const,
              dominantBaseline: "hanging" as const,
            },
            line,
          ),
        ),
      );
    }
  }
}

/**
 * Static SVG rendering of a viewport's scene under its current camera.
 *
 * The grid pattern moves with the camera but is not part of the scene, so
 * loading or clearing a graph never touches it.
 */
export function CallGraphView(props: CallGraphViewProps): ReactElement {
  const { scene, viewState, width, height, showGrid = true } = props;
  const transform = matrix(viewState);

  return createElement(
    "svg",
    { xmlns: "http://www.w3.org/2000/svg", width, height, viewBox: `0 0 ${width} ${height}` },
    createElement("rect", { width, height, fill: theme.background }),
    showGrid
      ? createElement(
          "defs",
          null,
          createElement(
            "pattern",
            {
              id: GRID_ID,
              width: GRID_SIZE,
              height: GRID_SIZE,
              patternUnits: "userSpaceOnUse",
              patternTransform: transform,
            },
            createElement("path", {
              d: `M ${GRID_SIZE} 0 L 0 0 0 ${GRID_SIZE}`,
              fill: "none",
              stroke: theme.grid,
              strokeWidth: 0.5,
            }),
          ),
        )
      : null,
    showGrid ? createElement("rect", { width, height, fill: `url(#${GRID_ID})` }) : null,
    createElement(
      "g",
      { transform },
      scene.map((item, i) => drawItem(item, i)),
    ),
  );
}

/** Markup for the viewport as it currently looks. */
export function renderViewportSvg(viewport: Viewport, showGrid = true): string {
  const { width, height } = viewport.getSize();
  return renderToStaticMarkup(
    createElement(CallGraphView, {
      scene: viewport.getScene(),
      viewState: viewport.getViewState(),
      width,
      height,
      showGrid,
    }),
  );
}
