/**
 * StackScope Integrity Analysis
 * Structural detectors over one immutable snapshot: cycles, god objects,
 * orphans and production-readiness risks
 */

import { validatePatterns } from './config.js';
import type { AnalyzerConfig } from './config.js';
import { throwIfAborted } from './errors.js';
import { isRunnerEntryPath } from './classify.js';
import { byString, createNodeId } from './types.js';
import type {
  EdgeKind,
  FindingKind,
  Graph,
  GraphEdge,
  GraphSnapshot,
  IntegrityFinding,
  IntegrityReport,
  Severity,
} from './types.js';

export interface IntegrityDetector {
  kind: FindingKind;
  name: string;
  description: string;
  detect: (snapshot: GraphSnapshot, config: AnalyzerConfig, signal?: AbortSignal) => IntegrityFinding[];
}

const CYCLE_KINDS: ReadonlySet<EdgeKind> = new Set<EdgeKind>(['Imports', 'Calls']);
const COUPLING_KINDS: ReadonlySet<EdgeKind> = new Set<EdgeKind>(['Imports', 'Calls', 'ReferencesSchema']);

const SEVERITY_RANK: Record<Severity, number> = { High: 0, Medium: 1, Low: 2 };
const KIND_RANK: Record<FindingKind, number> = { Cycle: 0, GodObject: 1, Orphan: 2, ProductionRisk: 3 };

function label(graph: Graph, id: string): string {
  const node = graph.nodes.get(id);
  if (!node) return id;
  return node.qualifiedName ? `${node.path}#${node.qualifiedName}` : node.path;
}

// =============================================================================
// CYCLES
// =============================================================================

/**
 * Strongly connected components over the given edge kinds (iterative Tarjan).
 * Components come out in reverse topological order.
 */
export function stronglyConnectedComponents(
  graph: Graph,
  kinds: ReadonlySet<EdgeKind>,
  signal?: AbortSignal
): string[][] {
  const index = new Map<string, number>();
  const low = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];
  let counter = 0;

  const successors = (id: string): string[] => {
    const targets = new Set<string>();
    for (const edge of graph.outgoing.get(id) ?? []) {
      if (kinds.has(edge.kind)) targets.add(edge.target);
    }
    return [...targets];
  };

  const visit = (id: string) => {
    index.set(id, counter);
    low.set(id, counter);
    counter++;
    stack.push(id);
    onStack.add(id);
  };

  for (const root of [...graph.nodes.keys()].sort()) {
    if (index.has(root)) continue;
    throwIfAborted(signal, 'Cycle detection');

    visit(root);
    const frames = [{ id: root, next: successors(root), i: 0 }];

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];

      if (frame.i < frame.next.length) {
        const w = frame.next[frame.i++];
        if (!index.has(w)) {
          throwIfAborted(signal, 'Cycle detection');
          visit(w);
          frames.push({ id: w, next: successors(w), i: 0 });
        } else if (onStack.has(w)) {
          low.set(frame.id, Math.min(low.get(frame.id) ?? 0, index.get(w) ?? 0));
        }
        continue;
      }

      frames.pop();
      const parent = frames[frames.length - 1];
      const frameLow = low.get(frame.id) ?? 0;
      if (parent) {
        low.set(parent.id, Math.min(low.get(parent.id) ?? 0, frameLow));
      }

      if (frameLow === index.get(frame.id)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.id);
        components.push(component);
      }
    }
  }

  return components;
}

export function detectCycles(graph: Graph, signal?: AbortSignal): IntegrityFinding[] {
  const findings: IntegrityFinding[] = [];

  for (const component of stronglyConnectedComponents(graph, CYCLE_KINDS, signal)) {
    const members = new Set(component);

    if (component.length === 1) {
      const id = component[0];
      const selfLoop = (graph.outgoing.get(id) ?? []).filter((e) => e.kind === 'Calls' && e.target === id);
      if (selfLoop.length === 0) continue;
      findings.push({
        kind: 'Cycle',
        severity: 'Low',
        nodeIds: [id],
        evidence: { type: 'edges', edges: selfLoop },
        message: `${label(graph, id)} calls itself`,
      });
      continue;
    }

    const edges: GraphEdge[] = [];
    for (const id of component) {
      for (const edge of graph.outgoing.get(id) ?? []) {
        if (CYCLE_KINDS.has(edge.kind) && members.has(edge.target)) edges.push(edge);
      }
    }
    const hasImport = edges.some((e) => e.kind === 'Imports');
    const nodeIds = [...component].sort();

    findings.push({
      kind: 'Cycle',
      severity: hasImport ? 'High' : 'Medium',
      nodeIds,
      evidence: { type: 'edges', edges },
      message: `${hasImport ? 'Import' : 'Call'} cycle across ${nodeIds.length} nodes: ${nodeIds.map((id) => label(graph, id)).join(', ')}`,
    });
  }

  return findings;
}

// =============================================================================
// GOD OBJECTS
// =============================================================================

/**
 * Degree of every node over coupling edges (Imports, Calls, ReferencesSchema)
 */
export function couplingDegrees(graph: Graph): Map<string, number> {
  const degrees = new Map<string, number>();
  for (const id of graph.nodes.keys()) degrees.set(id, 0);
  for (const edge of graph.edges) {
    if (!COUPLING_KINDS.has(edge.kind)) continue;
    degrees.set(edge.source, (degrees.get(edge.source) ?? 0) + 1);
    degrees.set(edge.target, (degrees.get(edge.target) ?? 0) + 1);
  }
  return degrees;
}

export function detectGodObjects(
  graph: Graph,
  options: AnalyzerConfig['godObject'],
  signal?: AbortSignal
): IntegrityFinding[] {
  if (graph.nodes.size === 0) return [];

  const degrees = couplingDegrees(graph);
  let total = 0;
  for (const degree of degrees.values()) total += degree;
  const meanDegree = total / graph.nodes.size;
  const threshold = Math.max(options.multiplier * meanDegree, options.minDegree);

  const findings: IntegrityFinding[] = [];
  for (const [id, degree] of degrees) {
    throwIfAborted(signal, 'God object detection');
    if (degree <= threshold) continue;

    const ratio = degree / threshold;
    const severity: Severity = ratio >= options.highRatio ? 'High' : ratio >= options.mediumRatio ? 'Medium' : 'Low';
    findings.push({
      kind: 'GodObject',
      severity,
      nodeIds: [id],
      evidence: {
        type: 'degree',
        degree,
        threshold: Math.round(threshold * 100) / 100,
        meanDegree: Math.round(meanDegree * 100) / 100,
      },
      message: `${label(graph, id)} has degree ${degree} (threshold ${threshold.toFixed(1)}, mean ${meanDegree.toFixed(2)})`,
    });
  }

  return findings;
}

// =============================================================================
// ORPHANS
// =============================================================================

export function detectOrphans(
  graph: Graph,
  options: AnalyzerConfig['orphans'],
  signal?: AbortSignal
): IntegrityFinding[] {
  const entryKinds = new Set(options.entryKinds);
  const namePatterns = options.entryNamePatterns.map((p) => new RegExp(p));
  const pathPatterns = options.entryPathPatterns.map((p) => new RegExp(p));

  const findings: IntegrityFinding[] = [];
  for (const node of graph.nodes.values()) {
    throwIfAborted(signal, 'Orphan detection');
    if ((graph.incoming.get(node.id) ?? []).length > 0) continue;

    if (node.language === 'text') continue;
    if (entryKinds.has(node.kind)) continue;
    if (namePatterns.some((re) => re.test(node.name))) continue;
    if (pathPatterns.some((re) => re.test(node.path))) continue;
    if (isRunnerEntryPath(node.path)) continue;

    const isFile = node.qualifiedName === '';
    findings.push({
      kind: 'Orphan',
      severity: isFile ? 'Medium' : 'Low',
      nodeIds: [node.id],
      evidence: { type: 'inbound', inbound: 0, outbound: (graph.outgoing.get(node.id) ?? []).length },
      message: isFile
        ? `${node.path} is never imported`
        : `${node.kind} ${label(graph, node.id)} is never referenced`,
    });
  }

  return findings;
}

// =============================================================================
// PRODUCTION RISKS
// =============================================================================

export function detectProductionRisks(snapshot: GraphSnapshot, signal?: AbortSignal): IntegrityFinding[] {
  const findings: IntegrityFinding[] = [];
  for (const hit of snapshot.riskHits) {
    throwIfAborted(signal, 'Production risk scan');
    const fileId = hit.path === '' ? null : createNodeId(hit.path, '');
    findings.push({
      kind: 'ProductionRisk',
      severity: hit.severity,
      nodeIds: fileId !== null && snapshot.graph.nodes.has(fileId) ? [fileId] : [],
      evidence: {
        type: 'pattern',
        path: hit.path,
        markerId: hit.markerId,
        label: hit.label,
        lines: hit.lines,
        count: hit.count,
      },
      message:
        hit.path === ''
          ? hit.label
          : `${hit.label} in ${hit.path}${hit.lines.length > 0 ? ` (line ${hit.lines.join(', ')})` : ''}`,
    });
  }
  return findings;
}

// =============================================================================
// REPORT
// =============================================================================

/**
 * Get all built-in detectors
 */
export function getBuiltinDetectors(): IntegrityDetector[] {
  return [
    {
      kind: 'Cycle',
      name: 'Dependency cycles',
      description: 'Strongly connected components over Imports and Calls edges',
      detect: (snapshot, _config, signal) => detectCycles(snapshot.graph, signal),
    },
    {
      kind: 'GodObject',
      name: 'God objects',
      description: 'Nodes whose coupling degree is far above the graph mean',
      detect: (snapshot, config, signal) => detectGodObjects(snapshot.graph, config.godObject, signal),
    },
    {
      kind: 'Orphan',
      name: 'Orphans',
      description: 'Nodes nothing points at, excluding entry points',
      detect: (snapshot, config, signal) => detectOrphans(snapshot.graph, config.orphans, signal),
    },
    {
      kind: 'ProductionRisk',
      name: 'Production readiness',
      description: 'Secrets, debug flags, permissive settings and TODO density',
      detect: (snapshot, _config, signal) => detectProductionRisks(snapshot, signal),
    },
  ];
}

function compareFindings(a: IntegrityFinding, b: IntegrityFinding): number {
  return (
    KIND_RANK[a.kind] - KIND_RANK[b.kind] ||
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    byString(a.nodeIds[0] ?? '', b.nodeIds[0] ?? '') ||
    byString(a.message, b.message)
  );
}

/**
 * Run every detector over one snapshot. Detectors run concurrently;
 * a cancelled run rejects and reports nothing.
 */
export async function analyzeIntegrity(
  snapshot: GraphSnapshot,
  config: AnalyzerConfig,
  options: { signal?: AbortSignal; detectors?: IntegrityDetector[] } = {}
): Promise<IntegrityReport> {
  const detectors = options.detectors ?? getBuiltinDetectors();
  throwIfAborted(options.signal, 'Integrity analysis');
  validatePatterns(config);

  const results = await Promise.all(
    detectors.map((detector) => Promise.resolve().then(() => detector.detect(snapshot, config, options.signal)))
  );

  return {
    version: snapshot.version,
    coverage: snapshot.coverage,
    findings: results.flat().sort(compareFindings),
    unparsed: [...snapshot.unparsed],
  };
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * Format an integrity report for human-readable CLI output
 */
export function formatIntegrityOutput(report: IntegrityReport, filterKind?: FindingKind): string {
  const findings = filterKind ? report.findings.filter((f) => f.kind === filterKind) : report.findings;
  const lines: string[] = [];

  lines.push(`StackScope - Integrity (snapshot v${report.version}, coverage ${Math.round(report.coverage * 100)}%)`);
  if (report.unparsed.length > 0) {
    lines.push(`  ${report.unparsed.length} file(s) could not be parsed; findings may be incomplete`);
  }
  lines.push('');

  if (findings.length === 0) {
    lines.push('No integrity findings.');
    return lines.join('\n');
  }

  const byKind = new Map<FindingKind, IntegrityFinding[]>();
  for (const finding of findings) {
    const group = byKind.get(finding.kind);
    if (group) group.push(finding);
    else byKind.set(finding.kind, [finding]);
  }

  for (const [kind, group] of byKind) {
    lines.push(`${kind} (${group.length}):`);
    for (const finding of group) {
      lines.push(`  [${finding.severity.toUpperCase()}] ${finding.message}`);
    }
    lines.push('');
  }

  if (report.unparsed.length > 0) {
    lines.push('Unparsed:');
    for (const file of report.unparsed) {
      lines.push(`  - ${file.path} (${file.reason}): ${file.message}`);
    }
  }

  return lines.join('\n').trimEnd();
}
