/**
 * Tests for integrity detectors
 */

import { describe, it, expect } from 'vitest';
import {
  analyzeIntegrity,
  couplingDegrees,
  detectCycles,
  detectGodObjects,
  detectOrphans,
  detectProductionRisks,
  formatIntegrityOutput,
  getBuiltinDetectors,
  stronglyConnectedComponents,
} from '../integrity.js';
import { CancellationError, ValidationError } from '../errors.js';
import { DEFAULT_CONFIG } from '../config.js';
import {
  buildFrom,
  createMockEdge,
  createMockGraph,
  createMockNode,
  createMockSnapshot,
  doc,
  id,
  testConfig,
} from './helpers.js';
import type { GraphNode, RiskHit } from '../types.js';

// =============================================================================
// CYCLES
// =============================================================================

describe('detectCycles', () => {
  it('reports nothing for a DAG', () => {
    const a = createMockNode('src/a.ts');
    const b = createMockNode('src/b.ts');
    const c = createMockNode('src/c.ts');
    const d = createMockNode('src/d.ts');
    const graph = createMockGraph([a, b, c, d], [
      createMockEdge(a, b, 'Imports'),
      createMockEdge(a, c, 'Imports'),
      createMockEdge(b, d, 'Imports'),
      createMockEdge(c, d, 'Calls'),
    ]);

    expect(detectCycles(graph)).toEqual([]);
  });

  it('reports one finding for a three-node import cycle', () => {
    const a = createMockNode('src/a.ts');
    const b = createMockNode('src/b.ts');
    const c = createMockNode('src/c.ts');
    const edges = [
      createMockEdge(a, b, 'Imports'),
      createMockEdge(b, c, 'Imports'),
      createMockEdge(c, a, 'Imports'),
    ];
    const graph = createMockGraph([a, b, c], edges);

    const findings = detectCycles(graph);

    expect(findings).toHaveLength(1);
    expect(findings[0].kind).toBe('Cycle');
    expect(findings[0].severity).toBe('High');
    expect(findings[0].nodeIds).toEqual([a.id, b.id, c.id].sort());
    expect(findings[0].evidence.type).toBe('edges');
    if (findings[0].evidence.type === 'edges') {
      expect(findings[0].evidence.edges).toHaveLength(3);
      expect(findings[0].evidence.edges).toEqual(expect.arrayContaining(edges));
    }
  });

  it('finds the same cycle from extracted sources', () => {
    const { graph } = buildFrom([
      doc('src/a.ts', "import { b } from './b';\nexport const a = () => b();\n"),
      doc('src/b.ts', "import { c } from './c';\nexport const b = () => c();\n"),
      doc('src/c.ts', "import { a } from './a';\nexport const c = () => a();\n"),
    ]);

    const findings = detectCycles(graph);

    // Files import each other; the functions call each other
    expect(findings).toHaveLength(2);
    const byNodes = findings.map((f) => f.nodeIds);
    expect(byNodes).toContainEqual([id('src/a.ts'), id('src/b.ts'), id('src/c.ts')].sort());
    expect(byNodes).toContainEqual([id('src/a.ts', 'a'), id('src/b.ts', 'b'), id('src/c.ts', 'c')].sort());
    const callCycle = findings.find((f) => f.nodeIds.includes(id('src/a.ts', 'a')));
    expect(callCycle?.severity).toBe('Medium');
  });

  it('reports a Calls self-loop as Low', () => {
    const f = createMockNode('src/walk.ts', 'walk');
    const graph = createMockGraph([f], [createMockEdge(f, f, 'Calls')]);

    const findings = detectCycles(graph);

    expect(findings).toHaveLength(1);
    expect(findings[0].severity).toBe('Low');
    expect(findings[0].nodeIds).toEqual([f.id]);
  });

  it('ignores cycles made only of other edge kinds', () => {
    const a = createMockNode('src/a.ts', 'A', { kind: 'Schema' });
    const b = createMockNode('src/b.ts', 'B', { kind: 'Schema' });
    const graph = createMockGraph([a, b], [
      createMockEdge(a, b, 'ReferencesSchema'),
      createMockEdge(b, a, 'ReferencesSchema'),
    ]);

    expect(detectCycles(graph)).toEqual([]);
  });

  it('handles long chains without recursion limits', () => {
    const nodes: GraphNode[] = [];
    for (let i = 0; i < 20000; i++) nodes.push(createMockNode(`src/n${i}.ts`));
    const edges = nodes.slice(1).map((node, i) => createMockEdge(nodes[i], node, 'Imports'));
    edges.push(createMockEdge(nodes[nodes.length - 1], nodes[0], 'Imports'));

    const components = stronglyConnectedComponents(createMockGraph(nodes, edges), new Set(['Imports']));

    expect(components).toHaveLength(1);
    expect(components[0]).toHaveLength(20000);
  });
});

// =============================================================================
// GOD OBJECTS
// =============================================================================

describe('detectGodObjects', () => {
  // hub → 50 leaves, x → 4 of those leaves, two isolated nodes:
  // 54 nodes, 54 edges, mean degree 2, threshold max(3 × 2, 10) = 10
  function fixture() {
    const hub = createMockNode('src/hub.ts', 'Hub', { kind: 'Class' });
    const x = createMockNode('src/x.ts', 'x');
    const leaves = Array.from({ length: 50 }, (_, i) => createMockNode(`src/leaf${i}.ts`, `leaf${i}`));
    const isolated = [createMockNode('src/z1.ts', 'z1'), createMockNode('src/z2.ts', 'z2')];
    const edges = [
      ...leaves.map((leaf) => createMockEdge(hub, leaf, 'Calls')),
      ...leaves.slice(0, 4).map((leaf) => createMockEdge(x, leaf, 'Calls')),
    ];
    return { hub, x, graph: createMockGraph([hub, x, ...leaves, ...isolated], edges) };
  }

  it('flags a degree-50 node High when the mean degree is 2', () => {
    const { hub, graph } = fixture();

    const findings = detectGodObjects(graph, DEFAULT_CONFIG.godObject);

    expect(findings).toHaveLength(1);
    expect(findings[0].nodeIds).toEqual([hub.id]);
    expect(findings[0].severity).toBe('High');
    expect(findings[0].evidence).toEqual({ type: 'degree', degree: 50, threshold: 10, meanDegree: 2 });
  });

  it('does not flag a degree-4 node in the same graph', () => {
    const { x, graph } = fixture();

    expect(couplingDegrees(graph).get(x.id)).toBe(4);
    const flagged = detectGodObjects(graph, DEFAULT_CONFIG.godObject).flatMap((f) => f.nodeIds);
    expect(flagged).not.toContain(x.id);
  });

  it('scales severity by the ratio to the threshold', () => {
    const { graph } = fixture();

    // threshold max(3 × 2, 40) = 40; 50 / 40 = 1.25 → Low
    const low = detectGodObjects(graph, { ...DEFAULT_CONFIG.godObject, minDegree: 40 });
    expect(low.map((f) => f.severity)).toEqual(['Low']);

    // threshold 30; 50 / 30 ≈ 1.67 → Medium
    const medium = detectGodObjects(graph, { ...DEFAULT_CONFIG.godObject, minDegree: 30 });
    expect(medium.map((f) => f.severity)).toEqual(['Medium']);
  });

  it('counts only Imports, Calls and ReferencesSchema edges', () => {
    const a = createMockNode('src/a.ts', 'a');
    const b = createMockNode('src/b.ts', 'b');
    const graph = createMockGraph([a, b], [
      createMockEdge(a, b, 'Implements'),
      createMockEdge(a, b, 'BindsEndpoint'),
      createMockEdge(a, b, 'ReferencesSchema'),
    ]);

    expect(couplingDegrees(graph).get(a.id)).toBe(1);
  });

  it('returns nothing for an empty graph', () => {
    expect(detectGodObjects(createMockGraph([]), DEFAULT_CONFIG.godObject)).toEqual([]);
  });
});

// =============================================================================
// ORPHANS
// =============================================================================

describe('detectOrphans', () => {
  const orphans = DEFAULT_CONFIG.orphans;

  it('flags unreferenced symbols and files', () => {
    const entry = createMockNode('src/index.ts');
    const util = createMockNode('src/lib/util.ts');
    const used = createMockNode('src/lib/util.ts', 'format');
    const unused = createMockNode('src/lib/util.ts', 'legacyFormat');
    const stale = createMockNode('src/lib/stale.ts');
    const graph = createMockGraph([entry, util, used, unused, stale], [
      createMockEdge(entry, util, 'Imports'),
      createMockEdge(entry, used, 'Imports'),
    ]);

    const findings = detectOrphans(graph, orphans);

    expect(findings.map((f) => f.nodeIds[0]).sort()).toEqual([unused.id, stale.id].sort());
    const file = findings.find((f) => f.nodeIds[0] === stale.id);
    expect(file?.severity).toBe('Medium');
    expect(file?.message).toBe('src/lib/stale.ts is never imported');
    const symbol = findings.find((f) => f.nodeIds[0] === unused.id);
    expect(symbol?.severity).toBe('Low');
    expect(symbol?.evidence).toEqual({ type: 'inbound', inbound: 0, outbound: 0 });
  });

  it('excludes nodes matching an entry-point name pattern even with zero inbound edges', () => {
    const main = createMockNode('src/cli/run.ts', 'main');
    const boot = createMockNode('src/cli/run.ts', 'bootstrap');
    const file = createMockNode('src/cli/run.ts');
    const graph = createMockGraph([file, main, boot], [
      createMockEdge(main, boot, 'Calls'),
    ]);

    // run.ts File node is still an orphan; main is excluded by name
    const findings = detectOrphans(graph, orphans);
    expect(findings.map((f) => f.nodeIds[0])).toEqual([file.id]);
  });

  it('honours configured name patterns', () => {
    const handler = createMockNode('src/hooks.ts', 'handleWebhook');
    const graph = createMockGraph([handler]);

    expect(detectOrphans(graph, orphans)).toHaveLength(1);
    expect(detectOrphans(graph, { ...orphans, entryNamePatterns: ['^handle'] })).toEqual([]);
  });

  it('excludes endpoints, entry files, test files and text documents', () => {
    const endpoint = createMockNode('src/routes.ts', 'GET /users', {
      kind: 'Endpoint',
      route: { method: 'GET', path: '/users' },
    });
    const server = createMockNode('server.js');
    const serverFn = createMockNode('server.js', 'start');
    const test = createMockNode('src/__tests__/user.test.ts');
    const pyTest = createMockNode('tests/test_users.py', 'test_create');
    const settings = createMockNode('config/settings.yml', '', { language: 'text' });
    const graph = createMockGraph([endpoint, server, serverFn, test, pyTest, settings]);

    expect(detectOrphans(graph, orphans)).toEqual([]);
  });
});

// =============================================================================
// PRODUCTION RISKS
// =============================================================================

describe('detectProductionRisks', () => {
  const hit = (path: string, overrides: Partial<RiskHit> = {}): RiskHit => ({
    path,
    markerId: 'debug-enabled',
    label: 'Debug mode enabled',
    severity: 'High',
    lines: [3],
    count: 1,
    ...overrides,
  });

  it('attaches hits to the owning File node', () => {
    const settings = createMockNode('app/settings.py');
    const snapshot = createMockSnapshot(createMockGraph([settings]), {
      riskHits: [hit('app/settings.py')],
    });

    const findings = detectProductionRisks(snapshot);

    expect(findings).toEqual([
      {
        kind: 'ProductionRisk',
        severity: 'High',
        nodeIds: [settings.id],
        evidence: {
          type: 'pattern',
          path: 'app/settings.py',
          markerId: 'debug-enabled',
          label: 'Debug mode enabled',
          lines: [3],
          count: 1,
        },
        message: 'Debug mode enabled in app/settings.py (line 3)',
      },
    ]);
  });

  it('reports hits in files that did not parse', () => {
    const snapshot = createMockSnapshot(createMockGraph([]), {
      riskHits: [hit('broken.py', { markerId: 'hardcoded-secret', label: 'Hardcoded password or secret', lines: [1, 4] })],
    });

    const [finding] = detectProductionRisks(snapshot);

    expect(finding.nodeIds).toEqual([]);
    expect(finding.message).toBe('Hardcoded password or secret in broken.py (line 1, 4)');
  });

  it('reports batch-level hits without a node or location', () => {
    const snapshot = createMockSnapshot(createMockGraph([createMockNode('src/a.ts')]), {
      riskHits: [
        hit('', {
          markerId: 'missing-readme',
          label: 'No README found; the project is undocumented',
          severity: 'Low',
          lines: [],
        }),
      ],
    });

    const [finding] = detectProductionRisks(snapshot);

    expect(finding.nodeIds).toEqual([]);
    expect(finding.severity).toBe('Low');
    expect(finding.message).toBe('No README found; the project is undocumented');
  });
});

// =============================================================================
// REPORT
// =============================================================================

describe('analyzeIntegrity', () => {
  it('runs every built-in detector', () => {
    expect(getBuiltinDetectors().map((d) => d.kind)).toEqual(['Cycle', 'GodObject', 'Orphan', 'ProductionRisk']);
  });

  it('orders findings by kind, then severity', async () => {
    const a = createMockNode('src/a.ts');
    const b = createMockNode('src/b.ts');
    const loop = createMockNode('src/a.ts', 'loop');
    const graph = createMockGraph([a, b, loop], [
      createMockEdge(a, b, 'Imports'),
      createMockEdge(b, a, 'Imports'),
      createMockEdge(loop, loop, 'Calls'),
    ]);
    const snapshot = createMockSnapshot(graph, {
      riskHits: [{ path: 'src/a.ts', markerId: 'console-logging', label: 'console.log left in code', severity: 'Low', lines: [2], count: 1 }],
    });

    const report = await analyzeIntegrity(snapshot, testConfig());

    expect(report.findings.map((f) => `${f.kind}:${f.severity}`)).toEqual([
      'Cycle:High',
      'Cycle:Low',
      'ProductionRisk:Low',
    ]);
  });

  it('reports coverage and unparsed files with the findings', async () => {
    const snapshot = createMockSnapshot(createMockGraph([createMockNode('src/index.ts')]), {
      coverage: 0.5,
      documentCount: 2,
      unparsed: [{ path: 'src/broken.ts', language: 'typescript', reason: 'syntax-error', message: 'line 1: oops' }],
    });

    const report = await analyzeIntegrity(snapshot, testConfig());

    expect(report.coverage).toBe(0.5);
    expect(report.unparsed.map((u) => u.path)).toEqual(['src/broken.ts']);
    expect(report.version).toBe(1);
  });

  it('rejects with CancellationError when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const snapshot = createMockSnapshot(createMockGraph([createMockNode('src/a.ts')]));

    await expect(analyzeIntegrity(snapshot, testConfig(), { signal: controller.signal })).rejects.toBeInstanceOf(
      CancellationError
    );
  });

  it('rejects entry patterns that do not compile before running detectors', async () => {
    const snapshot = createMockSnapshot(createMockGraph([createMockNode('src/a.ts')]));
    const config = testConfig({
      orphans: { ...DEFAULT_CONFIG.orphans, entryNamePatterns: ['('] },
    });

    await expect(analyzeIntegrity(snapshot, config)).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('formatIntegrityOutput', () => {
  it('groups findings by kind', () => {
    const output = formatIntegrityOutput({
      version: 3,
      coverage: 1,
      unparsed: [],
      findings: [
        { kind: 'Orphan', severity: 'Low', nodeIds: ['N_1'], evidence: { type: 'inbound', inbound: 0, outbound: 0 }, message: 'Function src/a.ts#x is never referenced' },
      ],
    });

    expect(output.split('\n')).toEqual([
      'StackScope - Integrity (snapshot v3, coverage 100%)',
      '',
      'Orphan (1):',
      '  [LOW] Function src/a.ts#x is never referenced',
    ]);
  });

  it('says so when there is nothing to report', () => {
    const output = formatIntegrityOutput({ version: 1, coverage: 1, unparsed: [], findings: [] });
    expect(output).toBe('StackScope - Integrity (snapshot v1, coverage 100%)\n\nNo integrity findings.');
  });
});
