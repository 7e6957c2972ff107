/**
 * StackScope Source Loading
 * Discovers files under a project root and reads them as ingestion documents
 */

import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import type { Language, SourceDocument } from './types.js';

const LANGUAGE_BY_EXTENSION: Record<string, Language> = {
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.py': 'python',
  '.pyi': 'python',
  '.go': 'go',
  '.java': 'java',
  '.rb': 'ruby',
  '.json': 'text',
  '.yml': 'text',
  '.yaml': 'text',
  '.toml': 'text',
  '.ini': 'text',
  '.cfg': 'text',
  '.env': 'text',
  '.txt': 'text',
  '.md': 'text',
  '.rst': 'text',
};

const TEXT_FILE_NAMES = /^(Dockerfile(\..+)?|Procfile|README(\..+)?|\.DS_Store|\.env(\..+)?|requirements.*\.txt|id_rsa|id_ed25519|master\.key)$/;

export const DEFAULT_IGNORE = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/.next/**',
  '**/__pycache__/**',
  '**/venv/**',
  '**/.venv/**',
  '**/.git/**',
  '**/coverage/**',
  '**/*.min.js',
  '**/package-lock.json',
];

/**
 * Language tag for a path, or null for files StackScope does not ingest
 */
export function detectLanguage(filePath: string): Language | null {
  const base = path.posix.basename(filePath);
  if (TEXT_FILE_NAMES.test(base)) return 'text';
  const ext = path.posix.extname(base).toLowerCase();
  return Object.prototype.hasOwnProperty.call(LANGUAGE_BY_EXTENSION, ext) ? LANGUAGE_BY_EXTENSION[ext] : null;
}

export interface LoadSourcesOptions {
  ignore?: string[];
  maxFileBytes?: number;
  verbose?: boolean;
}

/**
 * Read every ingestible file under `root`, paths relative to it and sorted
 */
export async function loadSources(root: string, options: LoadSourcesOptions = {}): Promise<SourceDocument[]> {
  const maxFileBytes = options.maxFileBytes ?? 1_000_000;
  const files = await glob('**/*', {
    cwd: root,
    nodir: true,
    dot: true,
    posix: true,
    ignore: [...DEFAULT_IGNORE, ...(options.ignore ?? [])],
  });

  const documents: SourceDocument[] = [];
  for (const file of files.sort()) {
    const language = detectLanguage(file);
    if (!language) continue;

    const fullPath = path.join(root, file);
    const stat = await fs.promises.stat(fullPath);
    if (stat.size > maxFileBytes) {
      if (options.verbose) console.log(`  Skipping ${file} (${stat.size} bytes)`);
      continue;
    }

    documents.push({ path: file, language, content: await fs.promises.readFile(fullPath, 'utf-8') });
  }

  if (options.verbose) console.log(`Found ${documents.length} document(s) under ${root}`);
  return documents;
}
