/**
 * Tests for source discovery
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { detectLanguage, loadSources } from '../sources.js';

describe('detectLanguage', () => {
  it('maps extensions to language tags', () => {
    expect(detectLanguage('src/app.tsx')).toBe('typescript');
    expect(detectLanguage('lib/util.mjs')).toBe('javascript');
    expect(detectLanguage('api/main.py')).toBe('python');
    expect(detectLanguage('config/app.yaml')).toBe('text');
  });

  it('recognizes well-known file names', () => {
    expect(detectLanguage('Dockerfile')).toBe('text');
    expect(detectLanguage('deploy/Dockerfile.prod')).toBe('text');
    expect(detectLanguage('.env.local')).toBe('text');
    expect(detectLanguage('requirements-dev.txt')).toBe('text');
  });

  it('reads documentation and Finder metadata as text', () => {
    expect(detectLanguage('README')).toBe('text');
    expect(detectLanguage('docs/guide.md')).toBe('text');
    expect(detectLanguage('assets/.DS_Store')).toBe('text');
  });

  it('returns null for files it does not ingest', () => {
    expect(detectLanguage('assets/logo.png')).toBeNull();
    expect(detectLanguage('Makefile')).toBeNull();
  });
});

describe('loadSources', () => {
  let tmpDir: string;

  function write(relative: string, content: string): void {
    const full = path.join(tmpDir, relative);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stackscope-sources-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads ingestible files with root-relative sorted paths', async () => {
    write('src/b.ts', 'export const b = 1;\n');
    write('src/a.ts', 'export const a = 1;\n');
    write('api/main.py', 'x = 1\n');
    write('.env', 'SECRET=x\n');
    write('logo.png', 'not really');

    const documents = await loadSources(tmpDir);

    expect(documents.map((d) => [d.path, d.language])).toEqual([
      ['.env', 'text'],
      ['api/main.py', 'python'],
      ['src/a.ts', 'typescript'],
      ['src/b.ts', 'typescript'],
    ]);
    expect(documents[2].content).toBe('export const a = 1;\n');
  });

  it('skips dependency and build directories', async () => {
    write('node_modules/lib/index.js', 'module.exports = 1;\n');
    write('dist/index.js', 'export {};\n');
    write('src/index.ts', 'export {};\n');

    const documents = await loadSources(tmpDir);

    expect(documents.map((d) => d.path)).toEqual(['src/index.ts']);
  });

  it('applies extra ignore patterns and the size limit', async () => {
    write('src/keep.ts', 'export {};\n');
    write('src/generated/api.ts', 'export {};\n');
    write('src/big.ts', `export const data = "${'x'.repeat(200)}";\n`);

    const documents = await loadSources(tmpDir, { ignore: ['**/generated/**'], maxFileBytes: 100 });

    expect(documents.map((d) => d.path)).toEqual(['src/keep.ts']);
  });
});
