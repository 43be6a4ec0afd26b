export type {
  GraphNode,
  GraphEdge,
  GraphDocument,
  NodeDeclaration,
  EdgeDeclaration,
  NodePosition,
  LayoutResult,
  ReadonlyGraph,
} from "./types";
export { parseGraphDocument, readGraphDocument, truncateLabel, MAX_LABEL_LENGTH } from "./parse";
export { GraphModel, NODE_WIDTH, NODE_HEIGHT } from "./model";
export { computeLayout, DEFAULT_COLUMNS, DEFAULT_SPACING_X, DEFAULT_SPACING_Y } from "./layout";
export type { GridLayoutOptions } from "./layout";
