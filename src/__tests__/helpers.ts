/**
 * Shared test fixtures for StackScope tests
 */

import { DEFAULT_CONFIG } from '../config.js';
import type { AnalyzerConfig } from '../config.js';
import { extractDocument } from '../extractors/index.js';
import { buildGraph } from '../builder.js';
import type { BuildResult } from '../builder.js';
import { detectLanguage } from '../sources.js';
import { createNodeId, edgeKey } from '../types.js';
import type {
  EdgeKind,
  FileContribution,
  Graph,
  GraphEdge,
  GraphNode,
  GraphSnapshot,
  Language,
  SourceDocument,
  UnparsedFile,
} from '../types.js';

/**
 * Create a mock GraphNode. The id is derived from path and qualified name
 * exactly as the extractors derive it.
 */
export function createMockNode(
  path: string,
  qualifiedName: string = '',
  overrides: Partial<Omit<GraphNode, 'id' | 'path' | 'qualifiedName'>> = {}
): GraphNode {
  return {
    id: createNodeId(path, qualifiedName),
    kind: qualifiedName === '' ? 'File' : 'Function',
    name: qualifiedName === '' ? path.split('/').pop() ?? path : qualifiedName.split('.').pop() ?? qualifiedName,
    qualifiedName,
    language: path.endsWith('.py') ? 'python' : 'typescript',
    path,
    span: { lineStart: 1, lineEnd: 10 },
    ...overrides,
  };
}

/**
 * Create a mock GraphEdge between two nodes
 */
export function createMockEdge(
  source: GraphNode,
  target: GraphNode,
  kind: EdgeKind = 'Calls',
  confidence: number = 1
): GraphEdge {
  return {
    source: source.id,
    target: target.id,
    kind,
    confidence,
    provenance: { file: source.path, lineStart: 1, lineEnd: 1 },
  };
}

/**
 * Assemble a Graph with adjacency indices from nodes and edges
 */
export function createMockGraph(nodes: GraphNode[], edges: GraphEdge[] = []): Graph {
  const nodeMap = new Map<string, GraphNode>();
  const outgoing = new Map<string, GraphEdge[]>();
  const incoming = new Map<string, GraphEdge[]>();
  for (const node of nodes) {
    nodeMap.set(node.id, node);
    outgoing.set(node.id, []);
    incoming.set(node.id, []);
  }

  const sorted = [...edges].sort((a, b) => (edgeKey(a) < edgeKey(b) ? -1 : edgeKey(a) > edgeKey(b) ? 1 : 0));
  for (const edge of sorted) {
    outgoing.get(edge.source)?.push(edge);
    incoming.get(edge.target)?.push(edge);
  }
  return { nodes: nodeMap, outgoing, incoming, edges: sorted };
}

/**
 * Wrap a graph in a snapshot with full coverage
 */
export function createMockSnapshot(graph: Graph, overrides: Partial<GraphSnapshot> = {}): GraphSnapshot {
  return {
    version: 1,
    createdAt: 0,
    graph,
    unparsed: [],
    diagnostics: [],
    riskHits: [],
    documentCount: graph.nodes.size,
    coverage: 1,
    stack: { languages: {}, frontend: [], backend: [], database: [], queue: [] },
    ...overrides,
  };
}

/**
 * Configuration with defaults and a small extraction pool
 */
export function testConfig(overrides: Partial<AnalyzerConfig> = {}): AnalyzerConfig {
  return { ...DEFAULT_CONFIG, concurrency: 2, ...overrides };
}

/**
 * A source document; the language follows the extension unless given
 */
export function doc(path: string, content: string, language?: Language): SourceDocument {
  return { path, content, language: language ?? detectLanguage(path) ?? 'unknown' };
}

/**
 * Extract a document that is expected to parse
 */
export function extractOk(document: SourceDocument, config: AnalyzerConfig = testConfig()): FileContribution {
  const outcome = extractDocument(document, config);
  if (outcome.status !== 'parsed') {
    throw new Error(`${document.path} did not parse: ${outcome.unparsed.reason} ${outcome.unparsed.message}`);
  }
  return outcome.contribution;
}

/**
 * Extract and build a set of documents synchronously
 */
export function buildFrom(documents: SourceDocument[], config: AnalyzerConfig = testConfig()): BuildResult {
  const contributions: FileContribution[] = [];
  const unparsed: UnparsedFile[] = [];
  for (const document of documents) {
    const outcome = extractDocument(document, config);
    if (outcome.status === 'parsed') contributions.push(outcome.contribution);
    else unparsed.push(outcome.unparsed);
  }
  return buildGraph(contributions, unparsed, config);
}

export function id(path: string, qualifiedName: string = ''): string {
  return createNodeId(path, qualifiedName);
}

/**
 * Edges as "sourceLabel -Kind-> targetLabel" strings for readable assertions
 */
export function edgeLabels(graph: Graph, kind?: EdgeKind): string[] {
  const label = (nodeId: string) => {
    const node = graph.nodes.get(nodeId);
    if (!node) return nodeId;
    return node.qualifiedName ? `${node.path}#${node.qualifiedName}` : node.path;
  };
  return graph.edges
    .filter((e) => !kind || e.kind === kind)
    .map((e) => `${label(e.source)} -${e.kind}-> ${label(e.target)}`)
    .sort();
}
