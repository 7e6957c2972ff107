/**
 * StackScope Node Resolution
 * Resolves node queries (ids, qualified names, file paths) to graph nodes
 */

import { byString } from './types.js';
import type { Graph, GraphNode } from './types.js';

/**
 * Display form of a node: "path#qualifiedName", or the path for File nodes
 */
export function nodeLabel(node: GraphNode): string {
  return node.qualifiedName ? `${node.path}#${node.qualifiedName}` : node.path;
}

/**
 * Resolve a query string to a graph node.
 *
 * Resolution order:
 * 1. Exact node ID match
 * 2. "path#qualifiedName" label match
 * 3. File path match (the File node)
 * 4. Qualified name match, when unique
 * 5. Short name match (case-insensitive), when unique
 */
export function resolveNode(query: string, graph: Graph): GraphNode | null {
  if (!query || graph.nodes.size === 0) return null;

  const byId = graph.nodes.get(query);
  if (byId) return byId;

  const nodes = [...graph.nodes.values()];
  const normalizedQuery = normalizeQuery(query);

  const byLabel = nodes.find((n) => normalizeQuery(nodeLabel(n)) === normalizedQuery);
  if (byLabel) return byLabel;

  const byQualified = nodes.filter((n) => n.qualifiedName !== '' && n.qualifiedName === query);
  if (byQualified.length === 1) return byQualified[0];

  const queryLower = query.toLowerCase();
  const byName = nodes.filter((n) => n.qualifiedName !== '' && n.name.toLowerCase() === queryLower);
  if (byName.length === 1) return byName[0];

  return null;
}

/**
 * Find candidate suggestions when resolution fails.
 * Returns up to `maxResults` node labels for "Did you mean?" hints.
 */
export function findCandidates(query: string, graph: Graph, maxResults: number = 5): string[] {
  const queryLower = query.toLowerCase();

  const scored = [...graph.nodes.values()].map((node) => {
    const nameLower = (node.qualifiedName || node.path).toLowerCase();
    let score = 0;

    // Substring match
    if (nameLower.includes(queryLower) || queryLower.includes(nameLower)) {
      score += 3;
    }

    // Common prefix
    let prefix = 0;
    for (let i = 0; i < Math.min(nameLower.length, queryLower.length); i++) {
      if (nameLower[i] === queryLower[i]) prefix++;
      else break;
    }
    score += prefix;

    // Penalize length difference
    score -= Math.abs(nameLower.length - queryLower.length) * 0.5;

    return { label: nodeLabel(node), score };
  });

  return scored
    .filter((s) => s.score > 0)
    .sort((a, b) => b.score - a.score || byString(a.label, b.label))
    .slice(0, maxResults)
    .map((s) => s.label);
}

function normalizeQuery(p: string): string {
  return p.replace(/\\/g, '/').replace(/^\.\//, '').toLowerCase();
}
