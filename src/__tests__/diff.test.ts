/**
 * Tests for snapshot diffing
 */

import { describe, it, expect } from 'vitest';
import { classifySignificance, compareNodes, diffSnapshots, formatDiffSummary } from '../diff.js';
import type { SnapshotDiff } from '../diff.js';
import { createMockEdge, createMockGraph, createMockNode, createMockSnapshot } from './helpers.js';

const file = createMockNode('src/users.ts');
const createUser = createMockNode('src/users.ts', 'createUser', { signature: [{ name: 'id', type: 'string' }] });
const createUserV2 = createMockNode('src/users.ts', 'createUser', {
  signature: [{ name: 'id', type: 'string' }, { name: 'role' }],
  exported: true,
});
const deleteUser = createMockNode('src/users.ts', 'deleteUser');
const listUsers = createMockNode('src/users.ts', 'listUsers');

const previous = createMockSnapshot(
  createMockGraph([file, createUser, deleteUser], [createMockEdge(createUser, deleteUser)]),
  { version: 1 }
);
const current = createMockSnapshot(
  createMockGraph([file, createUserV2, listUsers], [createMockEdge(listUsers, createUserV2)]),
  { version: 2 }
);

function emptyDiff(nodesBefore: number): Omit<SnapshotDiff, 'significance'> {
  return {
    fromVersion: 1,
    toVersion: 2,
    nodes: { added: [], removed: [], modified: [] },
    edges: { added: [], removed: [] },
    stats: { totalChanges: 0, nodesBefore, nodesAfter: nodesBefore, edgesBefore: 0, edgesAfter: 0 },
  };
}

describe('compareNodes', () => {
  it('reports route and kind changes', () => {
    const get = createMockNode('src/api.ts', 'GET /users', { kind: 'Endpoint', route: { method: 'GET', path: '/users' } });
    const post = createMockNode('src/api.ts', 'GET /users', { kind: 'Endpoint', route: { method: 'POST', path: '/users' } });

    expect(compareNodes(get, post)).toEqual(['route: GET /users → POST /users']);
    expect(compareNodes(deleteUser, { ...deleteUser, kind: 'Class' })).toEqual(['kind: Function → Class']);
  });

  it('returns nothing for identical nodes', () => {
    expect(compareNodes(createUser, { ...createUser })).toEqual([]);
  });
});

describe('diffSnapshots', () => {
  const diff = diffSnapshots(previous, current);

  it('matches nodes by id', () => {
    expect(diff.nodes.added).toEqual([{ id: listUsers.id, kind: 'Function', label: 'src/users.ts#listUsers' }]);
    expect(diff.nodes.removed).toEqual([{ id: deleteUser.id, kind: 'Function', label: 'src/users.ts#deleteUser' }]);
    expect(diff.nodes.modified).toEqual([
      {
        id: createUser.id,
        kind: 'Function',
        label: 'src/users.ts#createUser',
        changes: ['signature: (id: string) → (id: string, role)', 'now exported'],
      },
    ]);
  });

  it('matches edges by source, kind and target', () => {
    expect(diff.edges.added.map((e) => `${e.sourceLabel} ${e.kind} ${e.targetLabel}`)).toEqual([
      'src/users.ts#listUsers Calls src/users.ts#createUser',
    ]);
    expect(diff.edges.removed.map((e) => `${e.sourceLabel} ${e.kind} ${e.targetLabel}`)).toEqual([
      'src/users.ts#createUser Calls src/users.ts#deleteUser',
    ]);
  });

  it('counts changes and rates them', () => {
    expect(diff.stats).toEqual({ totalChanges: 5, nodesBefore: 3, nodesAfter: 3, edgesBefore: 1, edgesAfter: 1 });
    expect(diff.significance).toBe('major');
  });

  it('orders changes by code unit, not by locale', () => {
    const empty = createMockSnapshot(createMockGraph([]));
    const next = createMockSnapshot(createMockGraph([createMockNode('src/a.ts'), createMockNode('src/B.ts')]));

    expect(diffSnapshots(empty, next).nodes.added.map((n) => n.label)).toEqual(['src/B.ts', 'src/a.ts']);
  });

  it('finds nothing between a snapshot and itself', () => {
    const same = diffSnapshots(previous, previous);

    expect(same.stats.totalChanges).toBe(0);
    expect(same.significance).toBe('patch');
  });
});

describe('classifySignificance', () => {
  it('treats a removed endpoint as major', () => {
    const diff = emptyDiff(100);
    diff.nodes.removed.push({ id: 'N_1', kind: 'Endpoint', label: 'src/api.ts#GET /users' });

    expect(classifySignificance(diff)).toBe('major');
  });

  it('treats a small structural change as minor', () => {
    const diff = emptyDiff(10);
    diff.nodes.added.push({ id: 'N_1', kind: 'Function', label: 'src/a.ts#helper' });

    expect(classifySignificance(diff)).toBe('minor');
  });

  it('treats an unchanged graph as patch', () => {
    expect(classifySignificance(emptyDiff(10))).toBe('patch');
  });
});

describe('formatDiffSummary', () => {
  it('lists every change under its heading', () => {
    expect(formatDiffSummary(diffSnapshots(previous, current))).toBe(
      [
        '[MAJOR]  v1 → v2',
        'Nodes: 3 → 3',
        'Edges: 1 → 1',
        '',
        'Added Nodes:',
        '  + src/users.ts#listUsers (Function)',
        '',
        'Removed Nodes:',
        '  - src/users.ts#deleteUser (Function)',
        '',
        'Modified Nodes:',
        '  ~ src/users.ts#createUser (Function)',
        '      signature: (id: string) → (id: string, role)',
        '      now exported',
        '',
        'Added Edges:',
        '  + src/users.ts#listUsers → src/users.ts#createUser [Calls]',
        '',
        'Removed Edges:',
        '  - src/users.ts#createUser → src/users.ts#deleteUser [Calls]',
      ].join('\n')
    );
  });

  it('says so when nothing changed', () => {
    expect(formatDiffSummary(diffSnapshots(previous, previous))).toBe(
      '[PATCH]  v1 → v1\nNodes: 3 → 3\nEdges: 1 → 1\n\nNo changes.'
    );
  });
});
