/**
 * StackScope Agent Output
 * Stable envelope format and explanation payloads for machine consumers
 */

import { SCHEMA_VERSION } from './config.js';
import { nodeLabel } from './resolve.js';
import { graphStats } from './serialize.js';
import type {
  ChangeSpec,
  GraphSnapshot,
  ImpactResult,
  IntegrityFinding,
  IntegrityReport,
  NodeKind,
  Severity,
  StackReport,
} from './types.js';

/**
 * Wrap any command output in a stable envelope for machine consumers.
 * Keys are sorted at the top level for deterministic output.
 */
export function wrapInEnvelope<T>(
  command: string,
  data: T,
  metadata?: Record<string, unknown>,
  timestamp: number = Date.now()
): string {
  const envelope: Record<string, unknown> = {
    schema_version: SCHEMA_VERSION,
    command,
    timestamp,
    data,
  };

  if (metadata && Object.keys(metadata).length > 0) {
    envelope.metadata = metadata;
  }

  // Sort top-level keys for deterministic output
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(envelope).sort()) {
    sorted[key] = envelope[key];
  }

  return JSON.stringify(sorted, null, 2);
}

// =============================================================================
// EXPLANATION PAYLOAD
// =============================================================================

export interface CompactNode {
  id: string;
  kind: NodeKind;
  label: string;
  language: string;
}

export interface ExplanationPayload {
  version: number;
  coverage: number;
  stack: StackReport;
  stats: ReturnType<typeof graphStats>;
  nodes: CompactNode[];
  findings?: Array<Omit<IntegrityFinding, 'evidence'>>;
  impact?: {
    change: ChangeSpec;
    affected: Array<{ nodeId: string; distance: number; confidence: number; via: string }>;
  };
  unparsed: Array<{ path: string; reason: string }>;
}

/**
 * Read-only input for an explanation layer: the nodes a report or impact
 * result mentions, in compact form. Nothing here feeds back into analysis.
 */
export function buildExplanationPayload(
  snapshot: GraphSnapshot,
  input: { report?: IntegrityReport; change?: ChangeSpec; impact?: ImpactResult }
): ExplanationPayload {
  const mentioned = new Set<string>();
  for (const finding of input.report?.findings ?? []) {
    for (const id of finding.nodeIds) mentioned.add(id);
  }
  if (input.change) mentioned.add(input.change.target);
  for (const entry of input.impact ?? []) mentioned.add(entry.nodeId);

  const nodes: CompactNode[] = [];
  for (const id of [...mentioned].sort()) {
    const node = snapshot.graph.nodes.get(id);
    if (!node) continue;
    nodes.push({ id, kind: node.kind, label: nodeLabel(node), language: node.language });
  }

  const payload: ExplanationPayload = {
    version: snapshot.version,
    coverage: snapshot.coverage,
    stack: snapshot.stack,
    stats: graphStats(snapshot),
    nodes,
    unparsed: snapshot.unparsed.map((u) => ({ path: u.path, reason: u.reason })),
  };

  if (input.report) {
    payload.findings = input.report.findings.map(({ kind, severity, nodeIds, message }) => ({
      kind,
      severity,
      nodeIds,
      message,
    }));
  }
  if (input.change && input.impact) {
    payload.impact = { change: input.change, affected: input.impact.map((e) => ({ ...e })) };
  }

  return payload;
}

// =============================================================================
// EXECUTIVE SUMMARY
// =============================================================================

export interface SummaryAction {
  action: string;
  reason: string;
}

export interface ExecutiveSummary {
  version: number;
  coverage: number;
  stack: StackReport;
  counts: Record<Severity, number>;
  top_findings: string[];
  next_actions: SummaryAction[];
}

/**
 * Orientation summary of an integrity report
 */
export function buildExecutiveSummary(snapshot: GraphSnapshot, report: IntegrityReport): ExecutiveSummary {
  const counts: Record<Severity, number> = { High: 0, Medium: 0, Low: 0 };
  for (const finding of report.findings) counts[finding.severity]++;

  const top = report.findings.filter((f) => f.severity === 'High').map((f) => f.message);

  return {
    version: snapshot.version,
    coverage: report.coverage,
    stack: snapshot.stack,
    counts,
    top_findings: top.slice(0, 10),
    next_actions: computeNextActions(report),
  };
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? 's' : ''}`;
}

function computeNextActions(report: IntegrityReport): SummaryAction[] {
  const actions: SummaryAction[] = [];
  const ofKind = (kind: IntegrityFinding['kind']) => report.findings.filter((f) => f.kind === kind);

  const secrets = ofKind('ProductionRisk').filter((f) => f.severity === 'High');
  if (secrets.length > 0) {
    actions.push({
      action: `Resolve ${plural(secrets.length, 'high-severity production risk')}`,
      reason: 'Credentials or unsafe settings are committed to source',
    });
  }

  const importCycles = ofKind('Cycle').filter((f) => f.severity === 'High');
  if (importCycles.length > 0) {
    actions.push({
      action: `Break ${plural(importCycles.length, 'import cycle')}`,
      reason: 'Modules in a cycle cannot be loaded or changed independently',
    });
  }

  const gods = ofKind('GodObject');
  if (gods.length > 0) {
    actions.push({
      action: `Split ${plural(gods.length, 'highly coupled node')}`,
      reason: 'Changes to these nodes reach a large part of the graph',
    });
  }

  const orphans = ofKind('Orphan');
  if (orphans.length > 0) {
    actions.push({
      action: `Review ${plural(orphans.length, 'unreferenced node')}`,
      reason: 'Nothing in the analyzed code depends on them',
    });
  }

  if (report.unparsed.length > 0) {
    actions.push({
      action: `Check ${plural(report.unparsed.length, 'unparsed file')}`,
      reason: `Findings cover ${Math.round(report.coverage * 100)}% of the input`,
    });
  }

  return actions;
}
