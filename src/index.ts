/**
 * StackScope - Cross-stack dependency graph
 *
 * What exists, what is wrong with it, and what breaks if it changes.
 *
 * @packageDocumentation
 */

// Engine
export {
  ingest,
  checkIntegrity,
  simulate,
  extractAll,
  validateDocuments,
  validateChangeSpec,
  type EngineOptions,
  type QueryOptions,
} from './engine.js';
export { SnapshotStore, type SnapshotLease, type SnapshotDraft } from './snapshot-store.js';

// Configuration
export {
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
  SCHEMA_VERSION,
  getConfig,
  setConfig,
  resetConfig,
  loadConfig,
  loadConfigFile,
  parseConfigFile,
  mergeConfig,
  resolveConcurrency,
  validatePatterns,
  regexIssue,
  type AnalyzerConfig,
  type ConfigFile,
  type RiskMarker,
} from './config.js';

// Errors
export { StackScopeError, ValidationError, NotFoundError, CancellationError, type ErrorCode } from './errors.js';

// Extraction
export {
  extractDocument,
  adapterFor,
  ADAPTERS,
  type LanguageAdapter,
  type AdapterResult,
  type ExtractionOutcome,
} from './extractors/index.js';
export { scanDocumentRisks, scanBatchRisks, DEFAULT_RISK_MARKERS } from './risks.js';
export { loadSources, detectLanguage, type LoadSourcesOptions } from './sources.js';

// Graph building
export { buildGraph, type BuildResult } from './builder.js';
export { matchUrl, findEndpointMatches, urlSegments, urlHost } from './endpoints.js';
export { detectStack, formatStack } from './stack.js';

// Integrity analysis
export {
  analyzeIntegrity,
  getBuiltinDetectors,
  detectCycles,
  detectGodObjects,
  detectOrphans,
  detectProductionRisks,
  stronglyConnectedComponents,
  formatIntegrityOutput,
  type IntegrityDetector,
} from './integrity.js';
export { classifyPath, isRunnerEntryPath, type PathClassification } from './classify.js';

// Blast radius
export { simulateChange, propagates, summarizeImpact, formatImpactOutput } from './impact.js';
export { resolveNode, findCandidates, nodeLabel } from './resolve.js';

// Diff and output
export { diffSnapshots, classifySignificance, formatDiffSummary, type SnapshotDiff } from './diff.js';
export { serializeGraph, graphStats, type SerializedGraph } from './serialize.js';
export {
  wrapInEnvelope,
  buildExplanationPayload,
  buildExecutiveSummary,
  type ExplanationPayload,
  type ExecutiveSummary,
} from './agent-output.js';

// Types
export * from './types.js';
