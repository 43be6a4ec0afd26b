import { readFileSync } from "node:fs";
import { ArtifactIoError } from "../errors";
import type { GraphDocument } from "./types";

/** Longest label drawn without truncation. */
export const MAX_LABEL_LENGTH = 20;

const ELLIPSIS = "...";

const NODE_PATTERN = /"([^"]+)"\s*\[label="([^"]+)"\]/;
const EDGE_PATTERN = /"([^"]+)"\s*->\s*"([^"]+)"/;

/**
 * Shorten a label for display, keeping its last characters.
 *
 * Labels look like `name@scope`; the scope suffix is what tells two
 * same-named functions apart, so the head is dropped instead of the tail.
 */
export function truncateLabel(label: string): string {
  if (label.length <= MAX_LABEL_LENGTH) return label;
  return ELLIPSIS + label.slice(-MAX_LABEL_LENGTH);
}

/**
 * Extract node and edge declarations from graph-description text.
 *
 * Only two line shapes are understood: `"id" [label="text"]` and
 * `"from" -> "to"`. The node shape is tried first. Any other line is skipped.
 */
export function parseGraphDocument(text: string): GraphDocument {
  const doc: GraphDocument = { nodes: [], edges: [] };

  for (const line of text.split("\n")) {
    const node = NODE_PATTERN.exec(line);
    if (node) {
      doc.nodes.push({ id: node[1], label: node[2] });
      continue;
    }

    const edge = EDGE_PATTERN.exec(line);
    if (edge) {
      doc.edges.push({ source: edge[1], target: edge[2] });
    }
  }

  return doc;
}

/** Read an artifact in full. Throws {@link ArtifactIoError} on any failure. */
export function readGraphDocument(path: string): GraphDocument {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new ArtifactIoError(path, err);
  }
  return parseGraphDocument(text);
}
