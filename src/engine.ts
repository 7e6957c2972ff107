/**
 * StackScope Engine
 * Ingestion pipeline and snapshot-scoped queries
 */

import pLimit from 'p-limit';
import { z } from 'zod';
import { getConfig, resolveConcurrency, validatePatterns } from './config.js';
import type { AnalyzerConfig } from './config.js';
import { ValidationError, throwIfAborted } from './errors.js';
import { extractDocument } from './extractors/index.js';
import type { ExtractionOutcome } from './extractors/index.js';
import { buildGraph } from './builder.js';
import { detectStack } from './stack.js';
import { scanBatchRisks } from './risks.js';
import { analyzeIntegrity } from './integrity.js';
import { simulateChange } from './impact.js';
import type { SnapshotStore } from './snapshot-store.js';
import { CHANGE_KINDS, LANGUAGES, byString, normalizePath } from './types.js';
import type {
  ChangeSpec,
  FileContribution,
  GraphSnapshot,
  ImpactResult,
  IntegrityReport,
  RiskHit,
  SourceDocument,
  UnparsedFile,
} from './types.js';

// =============================================================================
// VALIDATION
// =============================================================================

const documentSchema = z.object({
  path: z.string().min(1),
  language: z.enum(LANGUAGES),
  content: z.string(),
});

const changeSpecSchema = z.object({
  target: z.string().min(1),
  change: z.enum(CHANGE_KINDS),
});

function formatIssues(error: z.ZodError, prefix: string): string[] {
  return error.issues.map((issue) => {
    const where = [prefix, ...issue.path.map(String)].filter(Boolean).join('.');
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate and normalize an ingestion batch. Throws ValidationError listing
 * every problem; nothing is extracted from a rejected batch.
 */
export function validateDocuments(input: readonly unknown[]): SourceDocument[] {
  const issues: string[] = [];
  const documents: SourceDocument[] = [];
  const seen = new Map<string, number>();

  input.forEach((raw, index) => {
    const parsed = documentSchema.safeParse(raw);
    if (!parsed.success) {
      issues.push(...formatIssues(parsed.error, `documents[${index}]`));
      return;
    }

    const normalized = normalizePath(parsed.data.path);
    if (normalized === null) {
      issues.push(`documents[${index}].path: "${parsed.data.path}" escapes the ingestion root`);
      return;
    }

    const first = seen.get(normalized);
    if (first !== undefined) {
      issues.push(`documents[${index}].path: duplicate of documents[${first}] ("${normalized}")`);
      return;
    }
    seen.set(normalized, index);
    documents.push({ ...parsed.data, path: normalized });
  });

  if (issues.length > 0) throw new ValidationError(issues);
  return documents;
}

export function validateChangeSpec(input: unknown): ChangeSpec {
  const parsed = changeSpecSchema.safeParse(input);
  if (!parsed.success) throw new ValidationError(formatIssues(parsed.error, 'change'));
  return parsed.data;
}

// =============================================================================
// INGESTION
// =============================================================================

export interface EngineOptions {
  config?: AnalyzerConfig;
  signal?: AbortSignal;
  verbose?: boolean;
}

/**
 * Extract documents on a bounded pool. Extraction is pure, so completion
 * order does not affect the result.
 */
export async function extractAll(
  documents: readonly SourceDocument[],
  config: AnalyzerConfig,
  signal?: AbortSignal
): Promise<ExtractionOutcome[]> {
  const limit = pLimit(resolveConcurrency(config));
  return Promise.all(
    documents.map((document) =>
      limit(async () => {
        throwIfAborted(signal, 'Ingestion');
        return extractDocument(document, config);
      })
    )
  );
}

/**
 * Ingest a batch of documents and publish it as the next snapshot version.
 * A rejected batch leaves the current snapshot in place.
 */
export async function ingest(
  store: SnapshotStore,
  input: readonly unknown[],
  options: EngineOptions = {}
): Promise<GraphSnapshot> {
  const config = options.config ?? getConfig();
  const verbose = options.verbose ?? config.verbose;
  const startTime = Date.now();

  const documents = validateDocuments(input);
  validatePatterns(config);
  if (verbose) console.log(`Ingesting ${documents.length} document(s)...`);

  const outcomes = await extractAll(documents, config, options.signal);

  const contributions: FileContribution[] = [];
  const unparsed: UnparsedFile[] = [];
  const riskHits: RiskHit[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'parsed') contributions.push(outcome.contribution);
    else unparsed.push(outcome.unparsed);
    riskHits.push(...outcome.riskHits);
  }
  if (verbose) {
    console.log(`  Parsed: ${contributions.length}, unparsed: ${unparsed.length}`);
    for (const file of unparsed) console.log(`    - ${file.path}: ${file.reason}`);
  }

  throwIfAborted(options.signal, 'Ingestion');
  const build = buildGraph(contributions, unparsed, config);
  if (verbose) {
    console.log(`  Graph: ${build.graph.nodes.size} nodes, ${build.graph.edges.length} edges`);
    console.log(`  Unresolved references: ${build.diagnostics.length}`);
  }

  riskHits.push(...scanBatchRisks(documents.map((d) => d.path), config.risks));
  riskHits.sort((a, b) => byString(a.path, b.path) || byString(a.markerId, b.markerId));

  const snapshot = store.publish({
    graph: build.graph,
    unparsed: build.unparsed,
    diagnostics: build.diagnostics,
    riskHits,
    documentCount: documents.length,
    coverage: documents.length === 0 ? 1 : contributions.length / documents.length,
    stack: detectStack(documents, build.diagnostics),
  });

  if (verbose) console.log(`Published snapshot v${snapshot.version} in ${Date.now() - startTime}ms`);
  return snapshot;
}

// =============================================================================
// QUERIES
// =============================================================================

export interface QueryOptions extends EngineOptions {
  version?: number;
}

/**
 * Integrity report for one snapshot version (current by default)
 */
export async function checkIntegrity(store: SnapshotStore, options: QueryOptions = {}): Promise<IntegrityReport> {
  const config = options.config ?? getConfig();
  return store.withSnapshot(
    (snapshot) => analyzeIntegrity(snapshot, config, { signal: options.signal }),
    options.version
  );
}

/**
 * Blast radius of a change against one snapshot version (current by default)
 */
export async function simulate(
  store: SnapshotStore,
  change: unknown,
  options: QueryOptions = {}
): Promise<ImpactResult> {
  const spec = validateChangeSpec(change);
  return store.withSnapshot(
    (snapshot) => simulateChange(snapshot, spec, { signal: options.signal }),
    options.version
  );
}
