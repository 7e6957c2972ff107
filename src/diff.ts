/**
 * StackScope Snapshot Diff
 * Structural differences between two graph snapshots
 */

import { nodeLabel } from './resolve.js';
import type { GraphEdge, GraphNode, GraphSnapshot, NodeKind, SignatureEntry } from './types.js';
import { byString, edgeKey } from './types.js';

export type DiffSignificance = 'major' | 'minor' | 'patch';

export interface NodeChange {
  id: string;
  kind: NodeKind;
  label: string;
}

export interface NodeModification extends NodeChange {
  changes: string[];
}

export interface EdgeChange {
  source: string;
  target: string;
  kind: GraphEdge['kind'];
  sourceLabel: string;
  targetLabel: string;
}

export interface SnapshotDiff {
  fromVersion: number;
  toVersion: number;
  nodes: { added: NodeChange[]; removed: NodeChange[]; modified: NodeModification[] };
  edges: { added: EdgeChange[]; removed: EdgeChange[] };
  significance: DiffSignificance;
  stats: {
    totalChanges: number;
    nodesBefore: number;
    nodesAfter: number;
    edgesBefore: number;
    edgesAfter: number;
  };
}

// =============================================================================
// DIFF COMPUTATION
// =============================================================================

function describeSignature(signature: SignatureEntry[] | undefined): string {
  if (!signature) return '—';
  return `(${signature.map((s) => (s.type ? `${s.name}: ${s.type}` : s.name)).join(', ')})`;
}

function nodeChange(node: GraphNode): NodeChange {
  return { id: node.id, kind: node.kind, label: nodeLabel(node) };
}

function edgeChange(edge: GraphEdge, snapshot: GraphSnapshot): EdgeChange {
  const source = snapshot.graph.nodes.get(edge.source);
  const target = snapshot.graph.nodes.get(edge.target);
  return {
    source: edge.source,
    target: edge.target,
    kind: edge.kind,
    sourceLabel: source ? nodeLabel(source) : edge.source,
    targetLabel: target ? nodeLabel(target) : edge.target,
  };
}

/**
 * Field-level changes on a node that survives between snapshots
 */
export function compareNodes(prev: GraphNode, curr: GraphNode): string[] {
  const changes: string[] = [];
  if (prev.kind !== curr.kind) {
    changes.push(`kind: ${prev.kind} → ${curr.kind}`);
  }
  const prevSig = describeSignature(prev.signature);
  const currSig = describeSignature(curr.signature);
  if (prevSig !== currSig) {
    changes.push(`signature: ${prevSig} → ${currSig}`);
  }
  const prevRoute = prev.route ? `${prev.route.method} ${prev.route.path}` : '—';
  const currRoute = curr.route ? `${curr.route.method} ${curr.route.path}` : '—';
  if (prevRoute !== currRoute) {
    changes.push(`route: ${prevRoute} → ${currRoute}`);
  }
  if (Boolean(prev.exported) !== Boolean(curr.exported)) {
    changes.push(curr.exported ? 'now exported' : 'no longer exported');
  }
  return changes;
}

/**
 * Classify the significance of a diff.
 * Major: a public surface (Endpoint or Schema) removed or changed, or >20% of nodes changed
 * Minor: nodes or edges added or removed
 * Patch: everything else
 */
export function classifySignificance(diff: Omit<SnapshotDiff, 'significance'>): DiffSignificance {
  const surface = new Set<NodeKind>(['Endpoint', 'Schema']);
  if (
    diff.nodes.removed.some((n) => surface.has(n.kind)) ||
    diff.nodes.modified.some((n) => surface.has(n.kind))
  ) {
    return 'major';
  }

  const changed = diff.nodes.added.length + diff.nodes.removed.length + diff.nodes.modified.length;
  if (changed / (diff.stats.nodesBefore || 1) > 0.2) return 'major';

  if (changed > 0 || diff.edges.added.length > 0 || diff.edges.removed.length > 0) return 'minor';
  return 'patch';
}

/**
 * Compute a structured diff between two snapshots. Nodes match by id
 * (path + qualified name), edges by source, kind and target.
 */
export function diffSnapshots(previous: GraphSnapshot, current: GraphSnapshot): SnapshotDiff {
  const prevNodes = previous.graph.nodes;
  const currNodes = current.graph.nodes;

  const added: NodeChange[] = [];
  const removed: NodeChange[] = [];
  const modified: NodeModification[] = [];

  for (const [id, curr] of currNodes) {
    const prev = prevNodes.get(id);
    if (!prev) {
      added.push(nodeChange(curr));
      continue;
    }
    const changes = compareNodes(prev, curr);
    if (changes.length > 0) modified.push({ ...nodeChange(curr), changes });
  }
  for (const [id, prev] of prevNodes) {
    if (!currNodes.has(id)) removed.push(nodeChange(prev));
  }

  const prevEdges = new Map(previous.graph.edges.map((e) => [edgeKey(e), e]));
  const currEdges = new Map(current.graph.edges.map((e) => [edgeKey(e), e]));
  const addedEdges: EdgeChange[] = [];
  const removedEdges: EdgeChange[] = [];

  for (const [key, edge] of currEdges) {
    if (!prevEdges.has(key)) addedEdges.push(edgeChange(edge, current));
  }
  for (const [key, edge] of prevEdges) {
    if (!currEdges.has(key)) removedEdges.push(edgeChange(edge, previous));
  }

  const byLabel = (a: NodeChange, b: NodeChange) => byString(a.label, b.label);
  const result = {
    fromVersion: previous.version,
    toVersion: current.version,
    nodes: { added: added.sort(byLabel), removed: removed.sort(byLabel), modified: modified.sort(byLabel) },
    edges: { added: addedEdges, removed: removedEdges },
    stats: {
      totalChanges: added.length + removed.length + modified.length + addedEdges.length + removedEdges.length,
      nodesBefore: prevNodes.size,
      nodesAfter: currNodes.size,
      edgesBefore: previous.graph.edges.length,
      edgesAfter: current.graph.edges.length,
    },
  };

  return { ...result, significance: classifySignificance(result) };
}

// =============================================================================
// FORMATTING
// =============================================================================

function significanceBadge(sig: DiffSignificance): string {
  switch (sig) {
    case 'major': return '[MAJOR]';
    case 'minor': return '[MINOR]';
    case 'patch': return '[PATCH]';
  }
}

/**
 * Format a snapshot diff for human-readable CLI output
 */
export function formatDiffSummary(diff: SnapshotDiff): string {
  const lines: string[] = [];

  lines.push(`${significanceBadge(diff.significance)}  v${diff.fromVersion} → v${diff.toVersion}`);
  lines.push(`Nodes: ${diff.stats.nodesBefore} → ${diff.stats.nodesAfter}`);
  lines.push(`Edges: ${diff.stats.edgesBefore} → ${diff.stats.edgesAfter}`);
  lines.push('');

  if (diff.stats.totalChanges === 0) {
    lines.push('No changes.');
    return lines.join('\n');
  }

  if (diff.nodes.added.length > 0) {
    lines.push('Added Nodes:');
    for (const n of diff.nodes.added) lines.push(`  + ${n.label} (${n.kind})`);
    lines.push('');
  }

  if (diff.nodes.removed.length > 0) {
    lines.push('Removed Nodes:');
    for (const n of diff.nodes.removed) lines.push(`  - ${n.label} (${n.kind})`);
    lines.push('');
  }

  if (diff.nodes.modified.length > 0) {
    lines.push('Modified Nodes:');
    for (const m of diff.nodes.modified) {
      lines.push(`  ~ ${m.label} (${m.kind})`);
      for (const ch of m.changes) lines.push(`      ${ch}`);
    }
    lines.push('');
  }

  if (diff.edges.added.length > 0) {
    lines.push('Added Edges:');
    for (const e of diff.edges.added) lines.push(`  + ${e.sourceLabel} → ${e.targetLabel} [${e.kind}]`);
    lines.push('');
  }

  if (diff.edges.removed.length > 0) {
    lines.push('Removed Edges:');
    for (const e of diff.edges.removed) lines.push(`  - ${e.sourceLabel} → ${e.targetLabel} [${e.kind}]`);
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
