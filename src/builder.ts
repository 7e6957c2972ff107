/**
 * StackScope Graph Builder
 * Sequential merge of per-file contributions into one immutable graph
 */

import * as path from 'path';
import type { AnalyzerConfig } from './config.js';
import { findEndpointMatches } from './endpoints.js';
import { stripExtension } from './extractors/shared.js';
import { byString, createNodeId, edgeKey, shortName } from './types.js';
import type {
  DiagnosticReason,
  FileContribution,
  Graph,
  GraphEdge,
  GraphNode,
  ModuleHint,
  ResolutionDiagnostic,
  SymbolReference,
  UnparsedFile,
} from './types.js';

export interface BuildResult {
  graph: Graph;
  diagnostics: ResolutionDiagnostic[];
  unparsed: UnparsedFile[];
}

type Resolution =
  | { node: GraphNode; confidence: number }
  | { reason: DiagnosticReason };

function directorySegments(filePath: string): string[] {
  const dir = path.posix.dirname(filePath);
  return dir === '.' ? [] : dir.split('/');
}

/**
 * Number of leading directories two paths share
 */
export function commonDirectoryDepth(a: string, b: string): number {
  const da = directorySegments(a);
  const db = directorySegments(b);
  let depth = 0;
  while (depth < da.length && depth < db.length && da[depth] === db[depth]) depth++;
  return depth;
}

function topLevelSegment(filePath: string): string {
  return directorySegments(filePath)[0] ?? '';
}

/**
 * Narrow candidates by path proximity to `fromPath`:
 * deepest common directory first, then same top-level package.
 */
export function pickByProximity<T extends { path: string }>(fromPath: string, candidates: T[]): T[] {
  let best = -1;
  let closest: T[] = [];
  for (const candidate of candidates) {
    const depth = commonDirectoryDepth(fromPath, candidate.path);
    if (depth > best) {
      best = depth;
      closest = [candidate];
    } else if (depth === best) {
      closest.push(candidate);
    }
  }
  if (closest.length <= 1) return closest;

  const top = topLevelSegment(fromPath);
  const sameTop = closest.filter((c) => topLevelSegment(c.path) === top);
  return sameTop.length > 0 ? sameTop : closest;
}

// =============================================================================
// BUILDER
// =============================================================================

class GraphBuilder {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges = new Map<string, GraphEdge>();
  private readonly diagnostics = new Map<string, ResolutionDiagnostic>();

  private readonly fileByStem = new Map<string, string>();
  private readonly symbolsByFile = new Map<string, Map<string, GraphNode>>();
  private readonly byQualified = new Map<string, GraphNode[]>();
  private readonly byShort = new Map<string, GraphNode[]>();
  private stems: string[] = [];

  constructor(private readonly config: AnalyzerConfig) {}

  // ---------------------------------------------------------------------------
  // Placement and indexing
  // ---------------------------------------------------------------------------

  place(contribution: FileContribution): void {
    const stem = stripExtension(contribution.path);
    if (!this.fileByStem.has(stem)) this.fileByStem.set(stem, contribution.path);

    let symbols = this.symbolsByFile.get(contribution.path);
    if (!symbols) {
      symbols = new Map();
      this.symbolsByFile.set(contribution.path, symbols);
    }

    for (const node of contribution.nodes) {
      if (this.nodes.has(node.id)) {
        this.diagnose({
          file: node.path,
          line: node.span.lineStart,
          target: node.qualifiedName,
          reason: 'duplicate-symbol',
        });
        continue;
      }
      this.nodes.set(node.id, node);
      symbols.set(node.qualifiedName, node);

      if (node.qualifiedName === '' || node.kind === 'Endpoint') continue;
      push(this.byQualified, node.qualifiedName, node);
      push(this.byShort, shortName(node.qualifiedName), node);
    }
  }

  finishIndexing(): void {
    this.stems = [...this.fileByStem.keys()].sort(byString);
  }

  // ---------------------------------------------------------------------------
  // Module and symbol resolution
  // ---------------------------------------------------------------------------

  private fileForStem(stem: string): string | undefined {
    return this.fileByStem.get(stem) ?? this.fileByStem.get(`${stem}/index`) ?? this.fileByStem.get(`${stem}/__init__`);
  }

  resolveModule(hint: ModuleHint, fromPath: string): string | undefined {
    for (const candidate of hint.candidates) {
      const direct = this.fileForStem(candidate);
      if (direct) return direct;
    }
    if (!hint.suffix) return undefined;

    // Absolute Python imports may be rooted below the ingestion root
    for (const candidate of hint.candidates) {
      const matches = this.stems
        .filter((s) => s.endsWith(`/${candidate}`) || s.endsWith(`/${candidate}/__init__`))
        .flatMap((s) => {
          const file = this.fileByStem.get(s);
          return file ? [{ path: file }] : [];
        });
      const closest = pickByProximity(fromPath, matches);
      if (closest.length > 0) return closest[0].path;
    }
    return undefined;
  }

  /**
   * Exact lookup inside one file. A dotted target whose head names a sibling
   * module ("user_service.create") is looked up in that module.
   */
  private lookupInFile(filePath: string, target: string): GraphNode | undefined {
    const symbols = this.symbolsByFile.get(filePath);
    if (!symbols) return undefined;

    if (target === 'default') {
      for (const node of symbols.values()) {
        if (node.defaultExport) return node;
      }
      return symbols.get('');
    }

    const direct = symbols.get(target);
    if (direct) return direct;

    const dir = stripExtension(filePath).replace(/\/(index|__init__)$/, '');
    const [head, ...rest] = target.split('.');
    const sibling = this.fileForStem(`${dir}/${head}`);
    if (sibling && sibling !== filePath) {
      return this.symbolsByFile.get(sibling)?.get(rest.join('.'));
    }
    return undefined;
  }

  private resolveGlobal(target: string, fromPath: string): Resolution {
    let candidates = this.byQualified.get(target) ?? [];
    if (candidates.length === 0 && !target.includes('.')) {
      candidates = this.byShort.get(target) ?? [];
    }
    if (target === '' || target === 'default' || candidates.length === 0) return { reason: 'not-found' };
    if (candidates.length === 1) {
      return { node: candidates[0], confidence: this.config.resolution.nameMatchConfidence };
    }

    const closest = pickByProximity(fromPath, candidates);
    if (closest.length === 1) {
      return { node: closest[0], confidence: this.config.resolution.proximityMatchConfidence };
    }
    return { reason: 'ambiguous' };
  }

  resolve(ref: SymbolReference, fromPath: string): Resolution {
    if (ref.module) {
      const file = this.resolveModule(ref.module, fromPath);
      if (!file) {
        return { reason: ref.module.external || ref.module.suffix ? 'external-module' : 'not-found' };
      }
      const node = this.lookupInFile(file, ref.target);
      if (node) return { node, confidence: 1.0 };
      return this.resolveGlobal(ref.target, fromPath);
    }

    const local = this.lookupInFile(fromPath, ref.target);
    if (local) return { node: local, confidence: 1.0 };
    return this.resolveGlobal(ref.target, fromPath);
  }

  // ---------------------------------------------------------------------------
  // Edges
  // ---------------------------------------------------------------------------

  private sourceId(filePath: string, qualifiedName: string): string {
    const node = this.symbolsByFile.get(filePath)?.get(qualifiedName);
    return node ? node.id : createNodeId(filePath, '');
  }

  addEdge(edge: GraphEdge): void {
    if (edge.source === edge.target && edge.kind !== 'Calls') return;
    const key = edgeKey(edge);
    const existing = this.edges.get(key);
    if (!existing || edge.confidence > existing.confidence) {
      this.edges.set(key, edge);
    }
  }

  linkReferences(contribution: FileContribution): void {
    for (const ref of contribution.references) {
      const resolution = this.resolve(ref, contribution.path);
      if ('reason' in resolution) {
        this.diagnose({
          file: contribution.path,
          line: ref.span.lineStart,
          kind: ref.kind,
          target: ref.target,
          module: ref.module?.specifier,
          reason: resolution.reason,
        });
        continue;
      }

      this.addEdge({
        source: this.sourceId(contribution.path, ref.from),
        target: resolution.node.id,
        kind: ref.kind,
        confidence: resolution.confidence,
        provenance: { file: contribution.path, lineStart: ref.span.lineStart, lineEnd: ref.span.lineEnd },
      });
    }
  }

  bindEndpoints(contributions: FileContribution[]): void {
    const endpoints = [...this.nodes.values()]
      .filter((n) => n.kind === 'Endpoint' && n.route)
      .sort((a, b) => byString(a.id, b.id));
    if (endpoints.length === 0) return;

    for (const contribution of contributions) {
      for (const call of contribution.httpCalls) {
        const source = this.sourceId(contribution.path, call.from);
        for (const match of findEndpointMatches(call, endpoints, this.config.binding)) {
          this.addEdge({
            source,
            target: match.endpoint.id,
            kind: 'BindsEndpoint',
            confidence: match.confidence,
            provenance: { file: contribution.path, lineStart: call.span.lineStart, lineEnd: call.span.lineEnd },
          });
        }
      }
    }
  }

  private diagnose(diagnostic: ResolutionDiagnostic): void {
    const key = [diagnostic.file, diagnostic.line, diagnostic.kind ?? '', diagnostic.target, diagnostic.module ?? '', diagnostic.reason].join('|');
    if (!this.diagnostics.has(key)) this.diagnostics.set(key, diagnostic);
  }

  // ---------------------------------------------------------------------------
  // Output
  // ---------------------------------------------------------------------------

  finish(): { graph: Graph; diagnostics: ResolutionDiagnostic[] } {
    const edges = [...this.edges.values()].sort((a, b) => byString(edgeKey(a), edgeKey(b)));
    const outgoing = new Map<string, GraphEdge[]>();
    const incoming = new Map<string, GraphEdge[]>();
    for (const id of this.nodes.keys()) {
      outgoing.set(id, []);
      incoming.set(id, []);
    }
    for (const edge of edges) {
      outgoing.get(edge.source)?.push(edge);
      incoming.get(edge.target)?.push(edge);
    }

    const diagnostics = [...this.diagnostics.values()].sort(
      (a, b) => byString(a.file, b.file) || a.line - b.line || byString(a.target, b.target)
    );

    return {
      graph: { nodes: this.nodes, outgoing, incoming, edges },
      diagnostics,
    };
  }
}

function push<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}

/**
 * Merge contributions into one graph. Input order does not matter:
 * files are processed sorted by path.
 */
export function buildGraph(
  contributions: readonly FileContribution[],
  unparsed: readonly UnparsedFile[],
  config: AnalyzerConfig
): BuildResult {
  const sorted = [...contributions].sort((a, b) => byString(a.path, b.path));
  const builder = new GraphBuilder(config);

  for (const contribution of sorted) {
    builder.place(contribution);
  }
  builder.finishIndexing();

  for (const contribution of sorted) {
    builder.linkReferences(contribution);
  }
  builder.bindEndpoints(sorted);

  const { graph, diagnostics } = builder.finish();
  return {
    graph,
    diagnostics,
    unparsed: [...unparsed].sort((a, b) => byString(a.path, b.path)),
  };
}
