/**
 * StackScope Snapshot Store
 * Versioned, immutable graph snapshots with reference-counted leases
 */

import { NotFoundError } from './errors.js';
import type { Graph, GraphSnapshot } from './types.js';

export type SnapshotDraft = Omit<GraphSnapshot, 'version' | 'createdAt'>;

/**
 * A read handle on one snapshot version. Release exactly once; extra
 * releases are ignored.
 */
export interface SnapshotLease {
  readonly snapshot: GraphSnapshot;
  release(): void;
}

/**
 * Freeze every node and edge of a graph in place. Readers share them
 * across leases.
 */
function freezeGraph(graph: Graph): void {
  for (const node of graph.nodes.values()) {
    Object.freeze(node.span);
    if (node.signature) {
      for (const entry of node.signature) Object.freeze(entry);
      Object.freeze(node.signature);
    }
    if (node.route) Object.freeze(node.route);
    Object.freeze(node);
  }
  for (const edge of graph.edges) {
    Object.freeze(edge.provenance);
    Object.freeze(edge);
  }
  Object.freeze(graph.edges);
}

interface Entry {
  snapshot: GraphSnapshot;
  refs: number;
}

export class SnapshotStore {
  private readonly entries = new Map<number, Entry>();
  private currentVersion: number | null = null;
  private nextVersion = 1;

  /**
   * Freeze a draft as the next version and make it current. The previous
   * current snapshot is retired once no lease holds it.
   */
  publish(draft: SnapshotDraft, createdAt: number = Date.now()): GraphSnapshot {
    freezeGraph(draft.graph);
    for (const file of draft.unparsed) Object.freeze(file);
    for (const diagnostic of draft.diagnostics) Object.freeze(diagnostic);
    for (const hit of draft.riskHits) Object.freeze(hit);
    const snapshot: GraphSnapshot = Object.freeze({ ...draft, version: this.nextVersion++, createdAt });
    this.entries.set(snapshot.version, { snapshot, refs: 0 });

    const previous = this.currentVersion;
    this.currentVersion = snapshot.version;
    if (previous !== null) this.retireIfUnused(previous);

    return snapshot;
  }

  get current(): GraphSnapshot | null {
    if (this.currentVersion === null) return null;
    return this.entries.get(this.currentVersion)?.snapshot ?? null;
  }

  /**
   * Versions still held in memory, ascending
   */
  get liveVersions(): number[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }

  /**
   * Lease a snapshot: the current one, or a specific live version
   */
  acquire(version?: number): SnapshotLease {
    const wanted = version ?? this.currentVersion;
    const entry = wanted === null ? undefined : this.entries.get(wanted);
    if (!entry) {
      throw new NotFoundError(
        'Snapshot',
        wanted === null ? 'current' : `v${wanted}`,
        this.liveVersions.map((v) => `v${v}`)
      );
    }

    entry.refs++;
    let released = false;
    return {
      snapshot: entry.snapshot,
      release: () => {
        if (released) return;
        released = true;
        entry.refs--;
        this.retireIfUnused(entry.snapshot.version);
      },
    };
  }

  /**
   * Run `fn` against a leased snapshot and release it afterwards
   */
  async withSnapshot<T>(fn: (snapshot: GraphSnapshot) => T | Promise<T>, version?: number): Promise<T> {
    const lease = this.acquire(version);
    try {
      return await fn(lease.snapshot);
    } finally {
      lease.release();
    }
  }

  refCount(version: number): number {
    return this.entries.get(version)?.refs ?? 0;
  }

  private retireIfUnused(version: number): void {
    const entry = this.entries.get(version);
    if (entry && entry.refs === 0 && version !== this.currentVersion) {
      this.entries.delete(version);
    }
  }
}
