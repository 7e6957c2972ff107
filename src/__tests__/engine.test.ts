/**
 * Tests for the ingestion pipeline and snapshot-scoped queries
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { checkIntegrity, ingest, simulate, validateChangeSpec, validateDocuments } from '../engine.js';
import { SnapshotStore } from '../snapshot-store.js';
import { CancellationError, NotFoundError, ValidationError } from '../errors.js';
import { id, testConfig } from './helpers.js';

const config = testConfig();

const BASIC = [
  { path: 'src/users.ts', language: 'typescript', content: 'export function createUser() {\n  return 1;\n}\n' },
  {
    path: 'src/api.ts',
    language: 'typescript',
    content: "import { createUser } from './users';\nexport function handler() {\n  return createUser();\n}\n",
  },
  { path: 'app/empty.py', language: 'python', content: '' },
];

const CROSS_STACK = [
  {
    path: 'backend/routes.py',
    language: 'python',
    content: [
      'from fastapi import APIRouter',
      '',
      'router = APIRouter(prefix="/api/users")',
      '',
      '',
      '@router.get("/{user_id}")',
      'def get_user(user_id: int):',
      '    return {"id": user_id}',
      '',
    ].join('\n'),
  },
  {
    path: 'web/src/api.ts',
    language: 'typescript',
    content: 'export async function loadUser(id: string) {\n  const res = await fetch(`/api/users/${id}`);\n  return res.json();\n}\n',
  },
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('validateDocuments', () => {
  it('normalizes paths', () => {
    const [document] = validateDocuments([{ path: './src\\lib/../a.ts', language: 'typescript', content: '' }]);

    expect(document.path).toBe('src/a.ts');
  });

  it('lists every problem in the batch', () => {
    try {
      validateDocuments([
        { path: 'src/a.ts', language: 'typescript', content: '' },
        { path: './src/a.ts', language: 'typescript', content: '' },
        { path: '../x.ts', language: 'typescript', content: '' },
        { path: 'b.cob', language: 'cobol', content: '' },
      ]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toHaveLength(3);
        expect(error.issues[0]).toBe('documents[1].path: duplicate of documents[0] ("src/a.ts")');
        expect(error.issues[1]).toBe('documents[2].path: "../x.ts" escapes the ingestion root');
        expect(error.issues[2]).toMatch(/^documents\[3\]\.language: /);
      }
    }
  });
});

describe('validateChangeSpec', () => {
  it('accepts a well-formed change', () => {
    expect(validateChangeSpec({ target: 'N_1', change: 'Rename' })).toEqual({ target: 'N_1', change: 'Rename' });
  });

  it('rejects unknown change kinds and empty targets', () => {
    expect(() => validateChangeSpec({ target: '', change: 'Explode' })).toThrow(ValidationError);
  });
});

describe('ingest', () => {
  it('publishes a snapshot with coverage over all documents', async () => {
    const store = new SnapshotStore();

    const snapshot = await ingest(store, BASIC, { config });

    expect(snapshot.version).toBe(1);
    expect(snapshot.documentCount).toBe(3);
    expect(snapshot.coverage).toBeCloseTo(2 / 3);
    expect(snapshot.unparsed).toEqual([
      { path: 'app/empty.py', language: 'python', reason: 'empty-file', message: 'Document is empty' },
    ]);
    expect(snapshot.graph.nodes.size).toBe(4);
    expect(snapshot.graph.edges).toHaveLength(3);
    expect(snapshot.stack.languages).toEqual({ typescript: 2, python: 1 });
    expect(store.current).toBe(snapshot);
  });

  it('reports full coverage for an empty batch', async () => {
    const snapshot = await ingest(new SnapshotStore(), [], { config });

    expect(snapshot.coverage).toBe(1);
    expect(snapshot.graph.nodes.size).toBe(0);
  });

  it('keeps the current snapshot when a batch is rejected', async () => {
    const store = new SnapshotStore();
    await ingest(store, BASIC, { config });

    await expect(
      ingest(store, [...BASIC, { path: 'src/users.ts', language: 'typescript', content: '' }], { config })
    ).rejects.toThrow(ValidationError);

    expect(store.current?.version).toBe(1);
    expect(store.liveVersions).toEqual([1]);
  });

  it('publishes nothing when cancelled', async () => {
    const store = new SnapshotStore();
    const controller = new AbortController();
    controller.abort();

    await expect(ingest(store, BASIC, { config, signal: controller.signal })).rejects.toThrow(CancellationError);
    expect(store.current).toBeNull();
  });

  it('rejects a configuration whose marker pattern does not compile', async () => {
    const store = new SnapshotStore();
    const broken = testConfig({
      risks: {
        ...config.risks,
        markers: [...config.risks.markers, { id: 'broken', label: 'Broken', pattern: '[', severity: 'Low' }],
      },
    });

    await expect(ingest(store, BASIC, { config: broken })).rejects.toThrow(ValidationError);
    expect(store.current).toBeNull();
  });

  it('records a missing README once for the batch', async () => {
    const snapshot = await ingest(new SnapshotStore(), BASIC, { config });

    expect(snapshot.riskHits.map((h) => [h.path, h.markerId])).toEqual([['', 'missing-readme']]);
  });

  it('does not record a missing README when the batch has one', async () => {
    const withReadme = [...BASIC, { path: 'README.md', language: 'text', content: '# Users\n' }];

    const snapshot = await ingest(new SnapshotStore(), withReadme, { config });

    expect(snapshot.riskHits).toEqual([]);
  });

  it('logs progress when verbose', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await ingest(new SnapshotStore(), BASIC, { config, verbose: true });

    expect(log).toHaveBeenCalledWith('Ingesting 3 document(s)...');
    expect(log).toHaveBeenCalledWith('  Parsed: 2, unparsed: 1');
    expect(log).toHaveBeenCalledWith('    - app/empty.py: empty-file');
  });

  it('is deterministic across runs', async () => {
    const first = await ingest(new SnapshotStore(), CROSS_STACK, { config });
    const second = await ingest(new SnapshotStore(), [...CROSS_STACK].reverse(), { config });

    expect([...second.graph.nodes.keys()].sort()).toEqual([...first.graph.nodes.keys()].sort());
    expect(second.graph.edges).toEqual(first.graph.edges);
  });

  it('detects the stack from imported packages', async () => {
    const snapshot = await ingest(new SnapshotStore(), CROSS_STACK, { config });

    expect(snapshot.stack.backend).toEqual(['FastAPI']);
  });
});

describe('checkIntegrity', () => {
  it('reports orphans of the current snapshot', async () => {
    const store = new SnapshotStore();
    await ingest(store, BASIC, { config });

    const report = await checkIntegrity(store, { config });

    expect(report.version).toBe(1);
    expect(report.findings.map((f) => [f.kind, f.severity, f.message])).toEqual([
      ['Orphan', 'Medium', 'src/api.ts is never imported'],
      ['Orphan', 'Low', 'Function src/api.ts#handler is never referenced'],
      ['ProductionRisk', 'Low', 'No README found; the project is undocumented'],
    ]);
    expect(report.unparsed.map((u) => u.path)).toEqual(['app/empty.py']);
  });

  it('answers for a pinned version while a lease holds it', async () => {
    const store = new SnapshotStore();
    await ingest(store, BASIC, { config });
    const lease = store.acquire();
    await ingest(store, CROSS_STACK, { config });

    const report = await checkIntegrity(store, { config, version: 1 });

    expect(report.version).toBe(1);
    lease.release();
    await expect(checkIntegrity(store, { config, version: 1 })).rejects.toThrow(NotFoundError);
  });
});

describe('simulate', () => {
  it('follows a removed handler through its endpoint to the client', async () => {
    const store = new SnapshotStore();
    await ingest(store, CROSS_STACK, { config });

    const result = await simulate(store, { target: id('backend/routes.py', 'get_user'), change: 'Remove' });

    expect(result).toEqual([
      { nodeId: id('backend/routes.py', 'GET /api/users/{user_id}'), distance: 1, confidence: 1, via: 'BindsEndpoint' },
      { nodeId: id('web/src/api.ts', 'loadUser'), distance: 2, confidence: 0.85, via: 'BindsEndpoint' },
    ]);
  });

  it('reaches importers and callers of a removed function', async () => {
    const store = new SnapshotStore();
    await ingest(store, BASIC, { config });

    const result = await simulate(store, { target: id('src/users.ts', 'createUser'), change: 'Remove' });

    expect(result.map((e) => e.nodeId).sort()).toEqual([id('src/api.ts'), id('src/api.ts', 'handler')].sort());
  });

  it('validates the change before touching the store', async () => {
    await expect(simulate(new SnapshotStore(), { target: 'x', change: 'Delete' })).rejects.toThrow(ValidationError);
  });
});
