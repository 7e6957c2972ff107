/**
 * StackScope Stack Detection
 * Recognises frameworks and data stores from the external modules a codebase imports
 */

import * as fs from 'fs';
import { z } from 'zod';
import { byString } from './types.js';
import type { Language, ResolutionDiagnostic, StackReport } from './types.js';

type StackLayer = 'frontend' | 'backend' | 'database' | 'queue';

interface FrameworkSignature {
  packageName: string;
  layer: StackLayer;
  name: string;
  ecosystem: 'js' | 'python';
}

const frameworkSignatureSchema = z.array(
  z.object({
    packageName: z.string().min(1),
    layer: z.enum(['frontend', 'backend', 'database', 'queue']),
    name: z.string().min(1),
    ecosystem: z.enum(['js', 'python']),
  })
);

let signatures: FrameworkSignature[] | null = null;

/**
 * Known frameworks and data stores, read once from data/frameworks.json
 */
export function frameworkSignatures(): FrameworkSignature[] {
  if (!signatures) {
    const file = new URL('../data/frameworks.json', import.meta.url);
    signatures = frameworkSignatureSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  }
  return signatures;
}

/**
 * Package a module specifier belongs to:
 * "@nestjs/core/x" → "@nestjs/core", "next/router" → "next", "flask.views" → "flask"
 */
export function packageNameOf(specifier: string, ecosystem: 'js' | 'python'): string {
  if (ecosystem === 'python') return specifier.split('.')[0];
  const parts = specifier.split('/');
  return specifier.startsWith('@') && parts.length > 1 ? `${parts[0]}/${parts[1]}` : parts[0];
}

function ecosystemOf(filePath: string): 'js' | 'python' {
  return filePath.endsWith('.py') ? 'python' : 'js';
}

/**
 * Build the stack report from document languages and the external modules
 * that import resolution left unresolved.
 */
export function detectStack(
  documents: ReadonlyArray<{ path: string; language: Language }>,
  diagnostics: readonly ResolutionDiagnostic[]
): StackReport {
  const languages: Partial<Record<Language, number>> = {};
  for (const doc of documents) {
    languages[doc.language] = (languages[doc.language] ?? 0) + 1;
  }

  const imported = new Set<string>();
  for (const diagnostic of diagnostics) {
    if (diagnostic.reason !== 'external-module' || !diagnostic.module) continue;
    const ecosystem = ecosystemOf(diagnostic.file);
    imported.add(`${ecosystem}:${packageNameOf(diagnostic.module, ecosystem)}`);
  }

  const layers: Record<StackLayer, Set<string>> = {
    frontend: new Set(),
    backend: new Set(),
    database: new Set(),
    queue: new Set(),
  };
  for (const signature of frameworkSignatures()) {
    if (imported.has(`${signature.ecosystem}:${signature.packageName}`)) {
      layers[signature.layer].add(signature.name);
    }
  }

  const sorted = (set: Set<string>) => [...set].sort();
  return {
    languages,
    frontend: sorted(layers.frontend),
    backend: sorted(layers.backend),
    database: sorted(layers.database),
    queue: sorted(layers.queue),
  };
}

/**
 * One-line summary: "typescript 12, python 4 | frontend: React | backend: FastAPI"
 */
export function formatStack(stack: StackReport): string {
  const languages = Object.entries(stack.languages)
    .sort(([a], [b]) => byString(a, b))
    .map(([lang, count]) => `${lang} ${count}`)
    .join(', ');
  const parts = [languages || 'no documents'];
  for (const layer of ['frontend', 'backend', 'database', 'queue'] as const) {
    if (stack[layer].length > 0) parts.push(`${layer}: ${stack[layer].join(', ')}`);
  }
  return parts.join(' | ');
}
