/**
 * StackScope Serialization
 * Deterministic plain-object forms of snapshots and results
 */

import type {
  GraphEdge,
  GraphNode,
  GraphSnapshot,
  ResolutionDiagnostic,
  StackReport,
  UnparsedFile,
} from './types.js';

export interface SerializedGraph {
  version: number;
  createdAt: number;
  documentCount: number;
  coverage: number;
  stack: StackReport;
  nodes: GraphNode[];
  edges: GraphEdge[];
  unparsed: UnparsedFile[];
  diagnostics: ResolutionDiagnostic[];
}

/**
 * Nodes ordered by path then qualified name; edges in graph order
 * (sorted by source, kind and target at build time).
 */
export function serializeGraph(snapshot: GraphSnapshot): SerializedGraph {
  const nodes = [...snapshot.graph.nodes.values()].sort(
    (a, b) =>
      (a.path < b.path ? -1 : a.path > b.path ? 1 : 0) ||
      (a.qualifiedName < b.qualifiedName ? -1 : a.qualifiedName > b.qualifiedName ? 1 : 0)
  );

  return {
    version: snapshot.version,
    createdAt: snapshot.createdAt,
    documentCount: snapshot.documentCount,
    coverage: snapshot.coverage,
    stack: snapshot.stack,
    nodes: nodes.map((node) => ({
      ...node,
      span: { ...node.span },
      ...(node.signature ? { signature: node.signature.map((entry) => ({ ...entry })) } : {}),
      ...(node.route ? { route: { ...node.route } } : {}),
    })),
    edges: snapshot.graph.edges.map((edge) => ({ ...edge, provenance: { ...edge.provenance } })),
    unparsed: snapshot.unparsed.map((u) => ({ ...u })),
    diagnostics: snapshot.diagnostics.map((d) => ({ ...d })),
  };
}

/**
 * Graph summary counts by node and edge kind
 */
export function graphStats(snapshot: GraphSnapshot): {
  nodes: Record<string, number>;
  edges: Record<string, number>;
} {
  const nodes: Record<string, number> = {};
  const edges: Record<string, number> = {};
  for (const node of snapshot.graph.nodes.values()) {
    nodes[node.kind] = (nodes[node.kind] ?? 0) + 1;
  }
  for (const edge of snapshot.graph.edges) {
    edges[edge.kind] = (edges[edge.kind] ?? 0) + 1;
  }
  return { nodes, edges };
}
