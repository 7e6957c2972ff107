#!/usr/bin/env node

/**
 * StackScope CLI
 * Cross-stack dependency graph, integrity checks and blast radius for a local project
 */

import { Command, Option } from 'commander';
import * as path from 'path';
import { loadConfig } from '../config.js';
import type { AnalyzerConfig } from '../config.js';
import { ingest } from '../engine.js';
import { NotFoundError, StackScopeError, ValidationError } from '../errors.js';
import { SnapshotStore } from '../snapshot-store.js';
import { loadSources } from '../sources.js';
import { analyzeIntegrity, formatIntegrityOutput } from '../integrity.js';
import { formatImpactOutput, simulateChange } from '../impact.js';
import { findCandidates, resolveNode } from '../resolve.js';
import { diffSnapshots, formatDiffSummary } from '../diff.js';
import { formatStack } from '../stack.js';
import { graphStats, serializeGraph } from '../serialize.js';
import { buildExecutiveSummary, buildExplanationPayload, wrapInEnvelope } from '../agent-output.js';
import { CHANGE_KINDS } from '../types.js';
import type { ChangeKind, FindingKind, GraphSnapshot, Severity } from '../types.js';

const program = new Command();

program
  .name('stackscope')
  .description('Cross-stack dependency graph: architectural smells and blast radius')
  .version('0.1.0')
  .option('--verbose', 'Show progress while loading and analyzing')
  .option('--concurrency <n>', 'Parallel extraction slots (default: one per CPU)');

interface GlobalOptions {
  verbose?: boolean;
  concurrency?: string;
}

function globalOptions(): GlobalOptions {
  const opts: GlobalOptions = program.opts();
  return opts;
}

function configFor(root: string): AnalyzerConfig {
  const opts = globalOptions();
  const config = loadConfig(root);
  const concurrency = opts.concurrency ? Number(opts.concurrency) : NaN;
  return {
    ...config,
    verbose: opts.verbose ?? config.verbose,
    concurrency: Number.isFinite(concurrency) && concurrency > 0 ? concurrency : config.concurrency,
  };
}

/**
 * Load a directory and publish it into `store`
 */
async function analyzeDirectory(store: SnapshotStore, dir: string): Promise<{ snapshot: GraphSnapshot; config: AnalyzerConfig }> {
  const root = path.resolve(dir);
  const config = configFor(root);
  const documents = await loadSources(root, { verbose: config.verbose });
  const snapshot = await ingest(store, documents, { config });
  return { snapshot, config };
}

function fail(label: string, error: unknown): never {
  if (error instanceof NotFoundError) {
    console.error(error.message);
    if (error.candidates.length > 0) {
      console.error('\nDid you mean:');
      for (const name of error.candidates) console.error(`  - ${name}`);
    }
  } else if (error instanceof ValidationError) {
    console.error(`${label} failed: ${error.message}`);
    for (const issue of error.issues) console.error(`  - ${issue}`);
  } else if (error instanceof StackScopeError) {
    console.error(`${label} failed: ${error.message}`);
  } else {
    console.error(`${label} failed:`, error);
  }
  process.exit(1);
}

// =============================================================================
// ANALYZE COMMAND
// =============================================================================

program
  .command('analyze [dir]')
  .description('Build the graph and print a summary with the top integrity findings')
  .option('--json', 'Output as JSON')
  .option('--agent', 'Output wrapped in agent envelope (implies --json)')
  .action(async (dir: string | undefined, options: { json?: boolean; agent?: boolean }) => {
    try {
      const store = new SnapshotStore();
      const { snapshot, config } = await analyzeDirectory(store, dir ?? '.');
      const report = await analyzeIntegrity(snapshot, config);
      const summary = buildExecutiveSummary(snapshot, report);

      if (options.agent) {
        console.log(wrapInEnvelope('analyze', summary, { root: path.resolve(dir ?? '.') }));
        return;
      }
      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      const stats = graphStats(snapshot);
      console.log(`StackScope - ${path.resolve(dir ?? '.')}\n`);
      console.log(`Stack: ${formatStack(snapshot.stack)}`);
      console.log(`Nodes: ${snapshot.graph.nodes.size} (${Object.entries(stats.nodes).map(([k, v]) => `${k} ${v}`).join(', ')})`);
      console.log(`Edges: ${snapshot.graph.edges.length} (${Object.entries(stats.edges).map(([k, v]) => `${k} ${v}`).join(', ') || 'none'})`);
      console.log(`Coverage: ${Math.round(snapshot.coverage * 100)}% of ${snapshot.documentCount} document(s)`);
      console.log(`Findings: ${summary.counts.High} high, ${summary.counts.Medium} medium, ${summary.counts.Low} low`);

      if (summary.top_findings.length > 0) {
        console.log('\nTop findings:');
        for (const message of summary.top_findings) console.log(`  - ${message}`);
      }
      if (summary.next_actions.length > 0) {
        console.log('\nNext actions:');
        for (const action of summary.next_actions) console.log(`  - ${action.action}: ${action.reason}`);
      }
    } catch (error) {
      fail('Analysis', error);
    }
  });

// =============================================================================
// GRAPH COMMAND
// =============================================================================

program
  .command('graph [dir]')
  .description('Print the full dependency graph as JSON')
  .option('--agent', 'Output wrapped in agent envelope')
  .option('--diagnostics', 'Print unresolved references instead of the graph')
  .action(async (dir: string | undefined, options: { agent?: boolean; diagnostics?: boolean }) => {
    try {
      const store = new SnapshotStore();
      const { snapshot } = await analyzeDirectory(store, dir ?? '.');

      if (options.diagnostics) {
        for (const d of snapshot.diagnostics) {
          const module = d.module ? ` from "${d.module}"` : '';
          console.log(`${d.file}:${d.line}  ${d.reason}  ${d.kind ?? 'node'} ${d.target || '(module)'}${module}`);
        }
        return;
      }

      const data = serializeGraph(snapshot);
      console.log(options.agent ? wrapInEnvelope('graph', data) : JSON.stringify(data, null, 2));
    } catch (error) {
      fail('Graph build', error);
    }
  });

// =============================================================================
// INTEGRITY COMMAND
// =============================================================================

program
  .command('integrity [dir]')
  .description('Report cycles, god objects, orphans and production risks')
  .addOption(new Option('--kind <kind>', 'Only show one finding kind').choices(['Cycle', 'GodObject', 'Orphan', 'ProductionRisk']))
  .addOption(new Option('--severity <level>', 'Minimum severity').choices(['Low', 'Medium', 'High']))
  .option('--json', 'Output as JSON')
  .option('--agent', 'Output wrapped in agent envelope (implies --json)')
  .action(async (dir: string | undefined, options: { kind?: FindingKind; severity?: Severity; json?: boolean; agent?: boolean }) => {
    try {
      const store = new SnapshotStore();
      const { snapshot, config } = await analyzeDirectory(store, dir ?? '.');
      const report = await analyzeIntegrity(snapshot, config);

      const rank: Record<Severity, number> = { Low: 0, Medium: 1, High: 2 };
      const minimum = options.severity ? rank[options.severity] : 0;
      const filtered = {
        ...report,
        findings: report.findings.filter(
          (f) => rank[f.severity] >= minimum && (!options.kind || f.kind === options.kind)
        ),
      };

      if (options.agent) {
        console.log(wrapInEnvelope('integrity', { report: filtered, explanation: buildExplanationPayload(snapshot, { report: filtered }) }));
        return;
      }
      if (options.json) {
        console.log(JSON.stringify(filtered, null, 2));
        return;
      }

      console.log(formatIntegrityOutput(filtered));
    } catch (error) {
      fail('Integrity check', error);
    }
  });

// =============================================================================
// IMPACT COMMAND
// =============================================================================

program
  .command('impact <target> [dir]')
  .description('Show what is affected if you change a node (id, path#name, file path or name)')
  .addOption(new Option('--change <kind>', 'Kind of change').choices([...CHANGE_KINDS]).default('Remove'))
  .option('--json', 'Output as JSON')
  .option('--agent', 'Output wrapped in agent envelope (implies --json)')
  .action(async (target: string, dir: string | undefined, options: { change: ChangeKind; json?: boolean; agent?: boolean }) => {
    try {
      const store = new SnapshotStore();
      const { snapshot } = await analyzeDirectory(store, dir ?? '.');

      const node = resolveNode(target, snapshot.graph);
      if (!node) {
        throw new NotFoundError('Node', target, findCandidates(target, snapshot.graph));
      }

      const change = { target: node.id, change: options.change };
      const result = simulateChange(snapshot, change);

      if (options.agent) {
        console.log(wrapInEnvelope('impact', buildExplanationPayload(snapshot, { change, impact: result })));
        return;
      }
      if (options.json) {
        console.log(JSON.stringify({ change, affected: result }, null, 2));
        return;
      }

      console.log(formatImpactOutput(snapshot, change, result));
    } catch (error) {
      fail('Impact analysis', error);
    }
  });

// =============================================================================
// DIFF COMMAND
// =============================================================================

program
  .command('diff <before> <after>')
  .description('Compare the graphs of two directories')
  .option('--json', 'Output as JSON')
  .option('--agent', 'Output wrapped in agent envelope (implies --json)')
  .action(async (before: string, after: string, options: { json?: boolean; agent?: boolean }) => {
    try {
      const store = new SnapshotStore();
      const previous = store.acquire(
        (await analyzeDirectory(store, before)).snapshot.version
      );
      try {
        const { snapshot: current } = await analyzeDirectory(store, after);
        const diff = diffSnapshots(previous.snapshot, current);

        if (options.agent) {
          console.log(wrapInEnvelope('diff', diff));
        } else if (options.json) {
          console.log(JSON.stringify(diff, null, 2));
        } else {
          console.log(formatDiffSummary(diff));
        }
      } finally {
        previous.release();
      }
    } catch (error) {
      fail('Diff', error);
    }
  });

// =============================================================================
// PARSE AND RUN
// =============================================================================

program.parseAsync().catch((error: unknown) => fail('StackScope', error));
