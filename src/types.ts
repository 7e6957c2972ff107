/**
 * StackScope Type Definitions
 * Cross-stack dependency graph model
 */

import * as crypto from 'crypto';

// =============================================================================
// DOCUMENTS
// =============================================================================

/**
 * Language tag supplied with every ingested document
 */
export type Language =
  | 'typescript'
  | 'javascript'
  | 'python'
  | 'go'
  | 'java'
  | 'ruby'
  | 'text'          // config files, Dockerfiles, env files: risk scan only
  | 'unknown';

export const LANGUAGES = [
  'typescript', 'javascript', 'python', 'go', 'java', 'ruby', 'text', 'unknown',
] as const;

/**
 * Normalized ingestion input
 */
export interface SourceDocument {
  path: string;
  language: Language;
  content: string;
}

// =============================================================================
// NODES
// =============================================================================

export type NodeKind =
  | 'File'
  | 'Module'
  | 'Function'
  | 'Class'
  | 'Endpoint'
  | 'Schema'
  | 'Component';

export const NODE_KINDS = [
  'File', 'Module', 'Function', 'Class', 'Endpoint', 'Schema', 'Component',
] as const;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS' | 'ANY';

export interface SourceSpan {
  lineStart: number;          // 1-indexed
  lineEnd: number;
}

/**
 * One parameter or field, in declaration order
 */
export interface SignatureEntry {
  name: string;
  type?: string;
}

export interface RouteInfo {
  method: HttpMethod;
  path: string;               // as written: "/api/users/:id"
}

export interface GraphNode {
  id: string;                 // N_<hash of path#qualifiedName>
  kind: NodeKind;
  name: string;               // short name: "find"
  qualifiedName: string;      // "UserService.find", "" for the File node
  language: Language;
  path: string;
  span: SourceSpan;
  signature?: SignatureEntry[];
  route?: RouteInfo;
  exported?: boolean;
  defaultExport?: boolean;
}

// =============================================================================
// EDGES
// =============================================================================

export type EdgeKind =
  | 'Imports'
  | 'Calls'
  | 'Implements'
  | 'BindsEndpoint'
  | 'ReferencesSchema';

export const EDGE_KINDS = [
  'Imports', 'Calls', 'Implements', 'BindsEndpoint', 'ReferencesSchema',
] as const;

export interface Provenance {
  file: string;
  lineStart: number;
  lineEnd: number;
}

/**
 * Directed edge: source depends on target
 */
export interface GraphEdge {
  source: string;
  target: string;
  kind: EdgeKind;
  confidence: number;         // 1.0 syntactic, < 1.0 heuristic
  provenance: Provenance;
}

// =============================================================================
// EXTRACTION OUTPUT
// =============================================================================

/**
 * Where a referenced name is expected to live.
 * Candidates are normalized paths without extension, tried in order.
 */
export interface ModuleHint {
  specifier: string;          // as written: "./api", "app.services.user"
  candidates: string[];
  external: boolean;          // bare package specifier
  suffix?: boolean;           // candidates may match the tail of a path
}

/**
 * A reference recorded by name. Resolution to node ids is the builder's job.
 */
export interface SymbolReference {
  kind: EdgeKind;
  from: string;               // qualified name of the referencing symbol in this file
  target: string;             // qualified name sought, "" = the module itself, "default" = default export
  module?: ModuleHint;
  span: SourceSpan;
}

/**
 * An outgoing HTTP request found in code (fetch, axios, requests)
 */
export interface HttpCall {
  from: string;
  method: HttpMethod;
  url: string;                // template holes rendered as "*"
  span: SourceSpan;
}

export interface FileContribution {
  path: string;
  language: Language;
  nodes: GraphNode[];
  references: SymbolReference[];
  httpCalls: HttpCall[];
}

export type UnparsedReason =
  | 'syntax-error'
  | 'unsupported-language'
  | 'unsupported-extension'
  | 'empty-file'
  | 'extractor-error';

export interface UnparsedFile {
  path: string;
  language: Language;
  reason: UnparsedReason;
  message: string;
}

export type DiagnosticReason = 'not-found' | 'ambiguous' | 'external-module' | 'duplicate-symbol';

export interface ResolutionDiagnostic {
  file: string;
  line: number;
  kind?: EdgeKind;              // absent for duplicate-symbol
  target: string;
  module?: string;
  reason: DiagnosticReason;
}

// =============================================================================
// RISK MARKERS
// =============================================================================

export type Severity = 'Low' | 'Medium' | 'High';

/**
 * Pattern matches captured while the document content is in hand
 */
export interface RiskHit {
  path: string;
  markerId: string;
  label: string;
  severity: Severity;
  lines: number[];            // first matching lines (capped)
  count: number;
}

// =============================================================================
// GRAPH & SNAPSHOT
// =============================================================================

export interface Graph {
  nodes: ReadonlyMap<string, GraphNode>;
  outgoing: ReadonlyMap<string, readonly GraphEdge[]>;
  incoming: ReadonlyMap<string, readonly GraphEdge[]>;
  edges: readonly GraphEdge[];
}

export interface StackReport {
  languages: Partial<Record<Language, number>>;
  frontend: string[];
  backend: string[];
  database: string[];
  queue: string[];
}

export interface GraphSnapshot {
  version: number;
  createdAt: number;
  graph: Graph;
  unparsed: readonly UnparsedFile[];
  diagnostics: readonly ResolutionDiagnostic[];
  riskHits: readonly RiskHit[];
  documentCount: number;
  coverage: number;           // parsed / ingested documents
  stack: StackReport;
}

// =============================================================================
// INTEGRITY
// =============================================================================

export type FindingKind = 'Cycle' | 'GodObject' | 'Orphan' | 'ProductionRisk';

export type FindingEvidence =
  | { type: 'edges'; edges: GraphEdge[] }
  | { type: 'degree'; degree: number; threshold: number; meanDegree: number }
  | { type: 'inbound'; inbound: 0; outbound: number }
  | { type: 'pattern'; path: string; markerId: string; label: string; lines: number[]; count: number };

export interface IntegrityFinding {
  kind: FindingKind;
  severity: Severity;
  nodeIds: string[];
  evidence: FindingEvidence;
  message: string;
}

export interface IntegrityReport {
  version: number;
  coverage: number;
  findings: IntegrityFinding[];
  unparsed: UnparsedFile[];
}

// =============================================================================
// BLAST RADIUS
// =============================================================================

export type ChangeKind = 'Rename' | 'Remove' | 'SignatureChange';

export const CHANGE_KINDS = ['Rename', 'Remove', 'SignatureChange'] as const;

export interface ChangeSpec {
  target: string;             // node id
  change: ChangeKind;
}

export interface ImpactEntry {
  nodeId: string;
  distance: number;
  confidence: number;
  via: EdgeKind;              // kind of the edge that reached this node
}

export type ImpactResult = ImpactEntry[];

// =============================================================================
// ID GENERATION
// =============================================================================

/**
 * Code-unit order. Independent of the host locale.
 */
export function byString(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Normalize a document path: forward slashes, no leading "./" or "/",
 * "." and ".." segments collapsed. Returns null if the path escapes its root.
 */
export function normalizePath(input: string): string | null {
  const parts: string[] = [];
  for (const segment of input.replace(/\\/g, '/').split('/')) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      if (parts.length === 0) return null;
      parts.pop();
      continue;
    }
    parts.push(segment);
  }
  return parts.length > 0 ? parts.join('/') : null;
}

/**
 * Generate a node ID
 * Format: N_ + first 16 hex chars of sha256("path#qualifiedName")
 */
export function createNodeId(path: string, qualifiedName: string): string {
  const digest = crypto.createHash('sha256').update(`${path}#${qualifiedName}`).digest('hex');
  return `N_${digest.slice(0, 16)}`;
}

/**
 * Key identifying an edge for deduplication
 */
export function edgeKey(edge: Pick<GraphEdge, 'source' | 'target' | 'kind'>): string {
  return `${edge.source}|${edge.kind}|${edge.target}`;
}

/**
 * Short name of a qualified name: "UserService.find" → "find"
 */
export function shortName(qualifiedName: string): string {
  const idx = qualifiedName.lastIndexOf('.');
  return idx === -1 ? qualifiedName : qualifiedName.slice(idx + 1);
}
