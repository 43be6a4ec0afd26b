export interface GraphNode {
  id: string;
  /** Label as declared in the artifact. */
  label: string;
  /** Label as drawn: long labels keep their trailing characters. */
  displayLabel: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface GraphEdge {
  source: string;
  target: string;
}

export interface NodeDeclaration {
  id: string;
  label: string;
}

export interface EdgeDeclaration {
  source: string;
  target: string;
}

/** Declarations recovered from one artifact, in file order. */
export interface GraphDocument {
  nodes: NodeDeclaration[];
  edges: EdgeDeclaration[];
}

export interface NodePosition {
  x: number;
  y: number;
}

export type LayoutResult = Map<string, NodePosition>;

/** Query-only view of a loaded graph. */
export interface ReadonlyGraph {
  getNode(id: string): Readonly<GraphNode> | undefined;
  hasNode(id: string): boolean;
  getNodes(): readonly Readonly<GraphNode>[];
  getEdges(): readonly Readonly<GraphEdge>[];
  readonly nodeCount: number;
  readonly edgeCount: number;
}
