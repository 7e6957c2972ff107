/**
 * Helpers shared by the language adapters
 */

import * as path from 'path';
import { createNodeId, normalizePath, shortName } from '../types.js';
import type {
  FileContribution,
  GraphNode,
  Language,
  ModuleHint,
  NodeKind,
  SourceDocument,
  SourceSpan,
} from '../types.js';

export const TS_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];
export const PY_EXTENSIONS = ['.py', '.pyi'];

/**
 * Path without its extension: "src/api/users.ts" → "src/api/users"
 */
export function stripExtension(filePath: string): string {
  const ext = path.posix.extname(filePath);
  return ext ? filePath.slice(0, -ext.length) : filePath;
}

export function extensionOf(filePath: string): string {
  return path.posix.extname(filePath).toLowerCase();
}

/**
 * Collects the nodes and references of one file
 */
export class ContributionBuilder {
  readonly contribution: FileContribution;
  private readonly declared = new Set<string>();

  constructor(document: SourceDocument, lineCount: number) {
    this.contribution = {
      path: document.path,
      language: document.language,
      nodes: [],
      references: [],
      httpCalls: [],
    };
    this.addNode('File', '', { lineStart: 1, lineEnd: Math.max(1, lineCount) }, {
      name: path.posix.basename(document.path),
    });
  }

  get path(): string {
    return this.contribution.path;
  }

  get language(): Language {
    return this.contribution.language;
  }

  has(qualifiedName: string): boolean {
    return this.declared.has(qualifiedName);
  }

  /**
   * Declare a node. Later declarations of the same qualified name are kept
   * so the builder can report them as duplicates.
   */
  addNode(
    kind: NodeKind,
    qualifiedName: string,
    span: SourceSpan,
    extra: Partial<Pick<GraphNode, 'name' | 'signature' | 'route' | 'exported' | 'defaultExport'>> = {}
  ): GraphNode {
    const node: GraphNode = {
      id: createNodeId(this.contribution.path, qualifiedName),
      kind,
      name: extra.name ?? shortName(qualifiedName),
      qualifiedName,
      language: this.contribution.language,
      path: this.contribution.path,
      span,
    };
    if (extra.signature) node.signature = extra.signature;
    if (extra.route) node.route = extra.route;
    if (extra.exported) node.exported = true;
    if (extra.defaultExport) node.defaultExport = true;

    this.declared.add(qualifiedName);
    this.contribution.nodes.push(node);
    return node;
  }

  markExported(qualifiedName: string, asDefault = false): void {
    for (const node of this.contribution.nodes) {
      if (node.qualifiedName !== qualifiedName) continue;
      node.exported = true;
      if (asDefault) node.defaultExport = true;
    }
  }
}

// =============================================================================
// MODULE HINTS
// =============================================================================

const TS_IMPORT_EXTENSION = /\.(d\.ts|ts|tsx|mts|cts|js|jsx|mjs|cjs)$/;

/**
 * Module hint for a JS/TS import specifier, relative to the importing file.
 * "@/x" and "~/x" are treated as source-root aliases.
 */
export function tsModuleHint(fromPath: string, specifier: string): ModuleHint {
  if (specifier.startsWith('.') || specifier.startsWith('/')) {
    const joined = specifier.startsWith('/')
      ? specifier
      : path.posix.join(path.posix.dirname(fromPath), specifier);
    const normalized = normalizePath(joined);
    return {
      specifier,
      candidates: normalized ? [normalized.replace(TS_IMPORT_EXTENSION, '')] : [],
      external: false,
    };
  }

  const alias = specifier.match(/^[@~]\/(.+)$/);
  if (alias) {
    const rest = alias[1].replace(TS_IMPORT_EXTENSION, '');
    return { specifier, candidates: [`src/${rest}`, rest], external: false };
  }

  return { specifier, candidates: [], external: true };
}

/**
 * Module hint for a Python import.
 * Relative imports ("..models") resolve against the package directory;
 * absolute ones may live anywhere under the root, so they match by suffix.
 */
export function pyModuleHint(fromPath: string, specifier: string): ModuleHint {
  const dots = specifier.match(/^\.*/)?.[0].length ?? 0;
  const dotted = specifier.slice(dots);
  const modulePath = dotted.split('.').filter(Boolean).join('/');

  if (dots === 0) {
    return { specifier, candidates: modulePath ? [modulePath] : [], external: false, suffix: true };
  }

  let base = path.posix.dirname(fromPath);
  for (let i = 1; i < dots; i++) {
    base = path.posix.dirname(base);
  }
  const joined = modulePath ? path.posix.join(base, modulePath) : base;
  const normalized = joined === '.' ? null : normalizePath(joined);
  return {
    specifier,
    candidates: normalized ? [normalized] : [],
    external: false,
  };
}
