/**
 * StackScope Symbol Extraction
 * Dispatches one document to the adapter for its language tag
 */

import type { AnalyzerConfig } from '../config.js';
import { scanDocumentRisks } from '../risks.js';
import type {
  FileContribution,
  Language,
  RiskHit,
  SourceDocument,
  UnparsedFile,
  UnparsedReason,
} from '../types.js';
import { ContributionBuilder, extensionOf } from './shared.js';
import { typescriptAdapter } from './typescript.js';
import { pythonAdapter } from './python.js';

// =============================================================================
// ADAPTER CONTRACT
// =============================================================================

export type AdapterResult =
  | { ok: true; contribution: FileContribution }
  | { ok: false; reason: UnparsedReason; message: string };

/**
 * One implementation per supported language. Adapters are pure:
 * no state survives between documents.
 */
export interface LanguageAdapter {
  name: string;
  languages: Language[];
  extensions: string[] | null;       // null = any extension
  extract(document: SourceDocument): AdapterResult;
}

/**
 * Configuration, Dockerfiles and env files: a File node, nothing else
 */
export const textAdapter: LanguageAdapter = {
  name: 'text',
  languages: ['text'],
  extensions: null,
  extract(document) {
    const lines = document.content.split('\n').length;
    return { ok: true, contribution: new ContributionBuilder(document, lines).contribution };
  },
};

export const ADAPTERS: readonly LanguageAdapter[] = [typescriptAdapter, pythonAdapter, textAdapter];

export function adapterFor(language: Language): LanguageAdapter | undefined {
  return ADAPTERS.find((a) => a.languages.includes(language));
}

// =============================================================================
// EXTRACTION
// =============================================================================

export type ExtractionOutcome =
  | { status: 'parsed'; contribution: FileContribution; riskHits: RiskHit[] }
  | { status: 'unparsed'; unparsed: UnparsedFile; riskHits: RiskHit[] };

function unparsed(document: SourceDocument, reason: UnparsedReason, message: string): UnparsedFile {
  return { path: document.path, language: document.language, reason, message };
}

function runAdapter(document: SourceDocument): FileContribution | UnparsedFile {
  const adapter = adapterFor(document.language);
  if (!adapter) {
    return unparsed(document, 'unsupported-language', `No extractor for language "${document.language}"`);
  }

  const ext = extensionOf(document.path);
  if (adapter.extensions && !adapter.extensions.includes(ext)) {
    return unparsed(document, 'unsupported-extension', `Extension "${ext || '(none)'}" is not handled by the ${adapter.name} extractor`);
  }

  if (document.content.trim().length === 0) {
    return unparsed(document, 'empty-file', 'Document is empty');
  }

  try {
    const result = adapter.extract(document);
    return result.ok ? result.contribution : unparsed(document, result.reason, result.message);
  } catch (error) {
    return unparsed(document, 'extractor-error', error instanceof Error ? error.message : String(error));
  }
}

/**
 * Extract one document. Never throws: every failure becomes an UnparsedFile.
 * Risk markers are scanned whether or not the document parsed.
 */
export function extractDocument(document: SourceDocument, config: AnalyzerConfig): ExtractionOutcome {
  const riskHits = scanDocumentRisks(document, config.risks);
  const result = runAdapter(document);
  return 'reason' in result
    ? { status: 'unparsed', unparsed: result, riskHits }
    : { status: 'parsed', contribution: result, riskHits };
}
