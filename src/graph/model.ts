import { truncateLabel } from "./parse";
import type { GraphDocument, GraphEdge, GraphNode, LayoutResult, ReadonlyGraph } from "./types";

export const NODE_WIDTH = 160;
export const NODE_HEIGHT = 60;

/**
 * Node and edge store for one loaded graph.
 *
 * Node iteration order is insertion order; the layout depends on it.
 */
export class GraphModel implements ReadonlyGraph {
  private nodes = new Map<string, GraphNode>();
  private edges: GraphEdge[] = [];

  /** Build a model from parsed declarations: all nodes first, then edges. */
  static fromDocument(doc: GraphDocument): GraphModel {
    const model = new GraphModel();
    for (const node of doc.nodes) model.addNode(node.id, node.label);
    for (const edge of doc.edges) model.addEdge(edge.source, edge.target);
    return model;
  }

  /** Insert a node, or return the existing one untouched if `id` is known. */
  addNode(id: string, label: string): GraphNode {
    const existing = this.nodes.get(id);
    if (existing) return existing;

    const node: GraphNode = {
      id,
      label,
      displayLabel: truncateLabel(label),
      x: 0,
      y: 0,
      width: NODE_WIDTH,
      height: NODE_HEIGHT,
    };
    this.nodes.set(id, node);
    return node;
  }

  /**
   * Append an edge. Returns null, storing nothing, when either endpoint is
   * unknown. Repeated pairs are kept.
   */
  addEdge(source: string, target: string): GraphEdge | null {
    if (!this.nodes.has(source) || !this.nodes.has(target)) return null;
    const edge: GraphEdge = { source, target };
    this.edges.push(edge);
    return edge;
  }

  applyLayout(layout: LayoutResult): void {
    for (const [id, pos] of layout) {
      const node = this.nodes.get(id);
      if (!node) continue;
      node.x = pos.x;
      node.y = pos.y;
    }
  }

  clear(): void {
    this.nodes.clear();
    this.edges = [];
  }

  getNode(id: string): GraphNode | undefined {
    return this.nodes.get(id);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNodes(): GraphNode[] {
    return Array.from(this.nodes.values());
  }

  getEdges(): readonly GraphEdge[] {
    return this.edges;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.length;
  }
}
