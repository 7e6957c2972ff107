/**
 * StackScope Production-Readiness Markers
 * Pattern scan over raw document text, run once at ingestion
 */

import type { AnalyzerConfig, RiskMarker } from './config.js';
import type { RiskHit, SourceDocument } from './types.js';

// =============================================================================
// DEFAULT MARKERS
// =============================================================================

export const DEFAULT_RISK_MARKERS: RiskMarker[] = [
  // Hardcoded secrets
  {
    id: 'hardcoded-api-key',
    label: 'Hardcoded API key',
    pattern: 'API_KEY\\s*[:=]\\s*[\'"][A-Za-z0-9_\\-]{20,}[\'"]',
    flags: 'i',
    severity: 'High',
  },
  {
    id: 'hardcoded-secret',
    label: 'Hardcoded password or secret',
    pattern: '(password|passwd|secret|token)\\s*[:=]\\s*[\'"][^\'"\\s]{8,}[\'"]',
    flags: 'i',
    severity: 'High',
  },
  { id: 'aws-access-key', label: 'AWS access key ID', pattern: 'AKIA[0-9A-Z]{16}', severity: 'High' },
  { id: 'stripe-live-key', label: 'Stripe live secret key', pattern: 'sk_live_[0-9a-zA-Z]{24}', severity: 'High' },
  { id: 'github-token', label: 'GitHub personal token', pattern: 'ghp_[0-9a-zA-Z]{36}', severity: 'High' },

  // Debug and permissive configuration
  {
    id: 'debug-enabled',
    label: 'Debug mode enabled',
    pattern: '^\\s*DEBUG\\s*[:=]\\s*(True|true|1)\\b',
    severity: 'High',
  },
  {
    id: 'permissive-hosts',
    label: 'Permissive ALLOWED_HOSTS',
    pattern: 'ALLOWED_HOSTS\\s*=\\s*\\[\\s*[\'"]\\*[\'"]\\s*\\]',
    severity: 'High',
  },
  {
    id: 'permissive-cors',
    label: 'CORS allows every origin',
    pattern: '(CORS_ORIGIN_ALLOW_ALL\\s*=\\s*True|allow_origins\\s*=\\s*\\[\\s*[\'"]\\*[\'"]\\s*\\]|origin\\s*:\\s*[\'"]\\*[\'"])',
    severity: 'Medium',
  },

  // Dependency hygiene
  {
    id: 'unpinned-requirement',
    label: 'Unpinned Python requirement',
    pattern: '^\\s*[A-Za-z0-9_.\\-]+(\\[[^\\]]*\\])?\\s*$',
    severity: 'Medium',
    paths: '(^|/)requirements[^/]*\\.txt$',
  },
  {
    id: 'latest-image-tag',
    label: 'Container image pinned to :latest',
    pattern: '^\\s*FROM\\s+\\S+:latest\\b',
    flags: 'i',
    severity: 'Medium',
    paths: '(^|/)Dockerfile[^/]*$',
  },

  // Code hygiene
  {
    id: 'console-logging',
    label: 'console.log left in code',
    pattern: '\\bconsole\\.log\\(',
    severity: 'Low',
    paths: '\\.(ts|tsx|js|jsx|mjs|cjs)$',
  },
  {
    id: 'print-logging',
    label: 'print() used instead of a logger',
    pattern: '(^|[^\\w.])print\\(',
    severity: 'Low',
    paths: '\\.py$',
  },

  // Sensitive files committed
  {
    id: 'sensitive-file',
    label: 'Sensitive file committed',
    pattern: '(^|/)(\\.env|\\.DS_Store|id_rsa|id_ed25519|master\\.key|credentials\\.json)$',
    severity: 'High',
    pathOnly: true,
  },
];

const DEBT_MARKER = /(#|\/\/|\/\*|\*)\s*(TODO|FIXME|HACK)\b/;

export const TECH_DEBT_MARKER_ID = 'todo-density';

export const MISSING_README_MARKER_ID = 'missing-readme';

const ROOT_README = /^readme[^/]*$/i;

// =============================================================================
// SCANNING
// =============================================================================

interface CompiledMarker {
  marker: RiskMarker;
  content: RegExp;
  paths?: RegExp;
}

function compileMarkers(markers: RiskMarker[]): CompiledMarker[] {
  return markers.map((marker) => ({
    marker,
    content: new RegExp(marker.pattern, marker.flags),
    paths: marker.paths ? new RegExp(marker.paths) : undefined,
  }));
}

const compiledCache = new WeakMap<RiskMarker[], CompiledMarker[]>();

function getCompiled(markers: RiskMarker[]): CompiledMarker[] {
  let compiled = compiledCache.get(markers);
  if (!compiled) {
    compiled = compileMarkers(markers);
    compiledCache.set(markers, compiled);
  }
  return compiled;
}

/**
 * Scan one document for risk markers and TODO/FIXME density.
 * Returns one hit per marker that matched at least once.
 */
export function scanDocumentRisks(
  document: SourceDocument,
  risks: AnalyzerConfig['risks']
): RiskHit[] {
  const hits: RiskHit[] = [];
  const lines = document.content.split(/\r?\n/);

  for (const { marker, content, paths } of getCompiled(risks.markers)) {
    if (paths && !paths.test(document.path)) continue;

    if (marker.pathOnly) {
      if (content.test(document.path)) {
        hits.push({
          path: document.path,
          markerId: marker.id,
          label: marker.label,
          severity: marker.severity,
          lines: [],
          count: 1,
        });
      }
      continue;
    }

    const matched: number[] = [];
    let count = 0;
    lines.forEach((line, i) => {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) return;
      if (content.test(line)) {
        count++;
        if (matched.length < risks.maxLinesPerHit) matched.push(i + 1);
      }
    });

    if (count > 0) {
      hits.push({
        path: document.path,
        markerId: marker.id,
        label: marker.label,
        severity: marker.severity,
        lines: matched,
        count,
      });
    }
  }

  const debt = scanDebtDensity(document.path, lines, risks);
  if (debt) hits.push(debt);

  return hits;
}

function scanDebtDensity(
  filePath: string,
  lines: string[],
  risks: AnalyzerConfig['risks']
): RiskHit | null {
  const matched: number[] = [];
  let count = 0;
  lines.forEach((line, i) => {
    if (DEBT_MARKER.test(line)) {
      count++;
      if (matched.length < risks.maxLinesPerHit) matched.push(i + 1);
    }
  });

  const nonEmpty = lines.filter((l) => l.trim().length > 0).length;
  if (count < risks.todoMinCount || nonEmpty === 0) return null;

  const density = count / nonEmpty;
  if (density <= risks.todoDensityThreshold) return null;

  return {
    path: filePath,
    markerId: TECH_DEBT_MARKER_ID,
    label: `TODO/FIXME density ${(density * 100).toFixed(1)}% (${count} markers)`,
    severity: density > risks.todoDensityThreshold * 5 ? 'Medium' : 'Low',
    lines: matched,
    count,
  };
}

// =============================================================================
// BATCH CHECKS
// =============================================================================

/**
 * Checks over the document list as a whole. Hits carry an empty path and
 * attach to no node.
 */
export function scanBatchRisks(paths: readonly string[], risks: AnalyzerConfig['risks']): RiskHit[] {
  if (paths.length === 0 || !risks.requireReadme) return [];
  if (paths.some((p) => ROOT_README.test(p))) return [];
  return [
    {
      path: '',
      markerId: MISSING_README_MARKER_ID,
      label: 'No README found; the project is undocumented',
      severity: 'Low',
      lines: [],
      count: 1,
    },
  ];
}
