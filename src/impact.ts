/**
 * StackScope Blast Radius
 * Reverse traversal from a changed node through the edges that carry that change
 */

import { NotFoundError, throwIfAborted } from './errors.js';
import { findCandidates, nodeLabel } from './resolve.js';
import type { ChangeKind, ChangeSpec, EdgeKind, GraphEdge, GraphSnapshot, ImpactEntry, ImpactResult } from './types.js';

/**
 * Whether a dependent reached over `edge` is affected by `change` to `target`.
 *
 * - Rename: callers, bound clients and schema references break; importers
 *   only break when they import the renamed symbol itself
 * - Remove: everything that depends on it
 * - SignatureChange: callers and bound clients
 */
export function propagates(change: ChangeKind, edge: GraphEdge, target: string): boolean {
  switch (change) {
    case 'Remove':
      return true;
    case 'SignatureChange':
      return edge.kind === 'Calls' || edge.kind === 'BindsEndpoint';
    case 'Rename':
      if (edge.kind === 'Imports') return edge.target === target;
      return edge.kind === 'Calls' || edge.kind === 'BindsEndpoint' || edge.kind === 'ReferencesSchema';
  }
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Compute the blast radius of a change.
 *
 * Level-order over incoming edges: a node's distance is its shortest hop
 * count and its confidence the best path-minimum among paths of that length.
 * The changed node itself is excluded.
 */
export function simulateChange(
  snapshot: GraphSnapshot,
  change: ChangeSpec,
  options: { signal?: AbortSignal } = {}
): ImpactResult {
  const { graph } = snapshot;
  if (!graph.nodes.has(change.target)) {
    throw new NotFoundError('Node', change.target, findCandidates(change.target, graph));
  }

  const reached = new Map<string, ImpactEntry>([
    [change.target, { nodeId: change.target, distance: 0, confidence: 1, via: 'Calls' }],
  ]);
  let frontier = [change.target];
  let distance = 0;

  while (frontier.length > 0) {
    distance++;
    const next = new Map<string, ImpactEntry>();

    for (const id of frontier) {
      throwIfAborted(options.signal, 'Impact simulation');
      const pathConfidence = reached.get(id)?.confidence ?? 1;

      for (const edge of graph.incoming.get(id) ?? []) {
        if (!propagates(change.change, edge, change.target)) continue;
        if (reached.has(edge.source)) continue;

        const confidence = Math.min(pathConfidence, edge.confidence);
        const existing = next.get(edge.source);
        if (!existing || confidence > existing.confidence) {
          next.set(edge.source, { nodeId: edge.source, distance, confidence, via: edge.kind });
        }
      }
    }

    for (const [id, entry] of next) reached.set(id, entry);
    frontier = [...next.keys()].sort();
  }

  reached.delete(change.target);
  return [...reached.values()]
    .map((entry) => ({ ...entry, confidence: round(entry.confidence) }))
    .sort(
      (a, b) =>
        a.distance - b.distance ||
        b.confidence - a.confidence ||
        (a.nodeId < b.nodeId ? -1 : a.nodeId > b.nodeId ? 1 : 0)
    );
}

/**
 * Count of affected nodes per edge kind that first reached them
 */
export function summarizeImpact(result: ImpactResult): Partial<Record<EdgeKind, number>> {
  const counts: Partial<Record<EdgeKind, number>> = {};
  for (const entry of result) {
    counts[entry.via] = (counts[entry.via] ?? 0) + 1;
  }
  return counts;
}

/**
 * Format an impact result for human-readable CLI output
 */
export function formatImpactOutput(snapshot: GraphSnapshot, change: ChangeSpec, result: ImpactResult): string {
  const target = snapshot.graph.nodes.get(change.target);
  const lines: string[] = [];

  lines.push(`StackScope - ${change.change} ${target ? nodeLabel(target) : change.target}`);
  const maxDistance = result.reduce((max, e) => Math.max(max, e.distance), 0);
  lines.push(
    `${result.length} affected node${result.length !== 1 ? 's' : ''}` +
      (result.length > 0 ? `, up to ${maxDistance} hop${maxDistance !== 1 ? 's' : ''} away` : '')
  );
  if (snapshot.unparsed.length > 0) {
    lines.push(`Coverage ${Math.round(snapshot.coverage * 100)}%: ${snapshot.unparsed.length} file(s) not analyzed`);
  }
  lines.push('');

  let currentDistance = 0;
  for (const entry of result) {
    if (entry.distance !== currentDistance) {
      currentDistance = entry.distance;
      lines.push(currentDistance === 1 ? 'Direct:' : `Distance ${currentDistance}:`);
    }
    const node = snapshot.graph.nodes.get(entry.nodeId);
    const name = node ? `${node.kind} ${nodeLabel(node)}` : entry.nodeId;
    lines.push(`  ${name}  via ${entry.via} (${entry.confidence.toFixed(2)})`);
  }

  return lines.join('\n').trimEnd();
}
