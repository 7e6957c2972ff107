/**
 * Tests for graph serialization
 */

import { describe, it, expect } from 'vitest';
import { graphStats, serializeGraph } from '../serialize.js';
import { createMockEdge, createMockGraph, createMockNode, createMockSnapshot } from './helpers.js';

const endpoint = createMockNode('src/api.ts', 'GET /users', {
  kind: 'Endpoint',
  route: { method: 'GET', path: '/users' },
  signature: [{ name: 'id', type: 'string' }],
});
const file = createMockNode('src/api.ts');
const caller = createMockNode('src/web.ts', 'load');
const snapshot = createMockSnapshot(
  createMockGraph([caller, endpoint, file], [createMockEdge(caller, endpoint, 'BindsEndpoint', 0.9)])
);

describe('serializeGraph', () => {
  it('orders nodes by path then qualified name', () => {
    expect(serializeGraph(snapshot).nodes.map((n) => `${n.path}#${n.qualifiedName}`)).toEqual([
      'src/api.ts#',
      'src/api.ts#GET /users',
      'src/web.ts#load',
    ]);
  });

  it('returns copies that cannot reach the snapshot', () => {
    const serialized = serializeGraph(snapshot);
    const copy = serialized.nodes[1];

    copy.signature?.push({ name: 'injected' });
    if (copy.route) copy.route.path = '/changed';
    copy.span.lineEnd = 99;
    serialized.edges[0].provenance.file = 'elsewhere.ts';

    expect(endpoint.signature).toEqual([{ name: 'id', type: 'string' }]);
    expect(endpoint.route).toEqual({ method: 'GET', path: '/users' });
    expect(endpoint.span).toEqual({ lineStart: 1, lineEnd: 10 });
    expect(snapshot.graph.edges[0].provenance.file).toBe('src/web.ts');
  });
});

describe('graphStats', () => {
  it('counts nodes and edges by kind', () => {
    expect(graphStats(snapshot)).toEqual({ nodes: { Function: 1, Endpoint: 1, File: 1 }, edges: { BindsEndpoint: 1 } });
  });
});
