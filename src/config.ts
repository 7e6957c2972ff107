/**
 * StackScope Configuration System
 * Tunable thresholds, entry-point patterns and risk markers
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { NODE_KINDS } from './types.js';
import type { NodeKind, Severity } from './types.js';
import { ValidationError } from './errors.js';
import { DEFAULT_RISK_MARKERS } from './risks.js';

/**
 * Current schema version for envelope output
 */
export const SCHEMA_VERSION = '1.0.0';

export const CONFIG_FILE_NAME = '.stackscope.json';

// =============================================================================
// CONFIGURATION SHAPE
// =============================================================================

export interface RiskMarker {
  id: string;
  label: string;
  pattern: string;            // RegExp source, matched per line
  flags?: string;
  severity: Severity;
  paths?: string;             // RegExp source; marker only applies to matching paths
  pathOnly?: boolean;         // match the path itself, not the content
}

export interface AnalyzerConfig {
  concurrency: number;        // extraction pool size, 0 = one per CPU
  verbose: boolean;
  godObject: {
    multiplier: number;       // × mean degree
    minDegree: number;        // absolute floor for the threshold
    mediumRatio: number;      // degree / threshold at which severity becomes Medium
    highRatio: number;
  };
  orphans: {
    entryKinds: NodeKind[];
    entryNamePatterns: string[];
    entryPathPatterns: string[];
  };
  binding: {
    exactConfidence: number;  // literal URL and verb match
    wildcardPenalty: number;  // subtracted per wildcard segment
    suffixConfidence: number; // call URL ends with the route (mounted routers)
    minConfidence: number;
    firstPartyHosts: string[];  // absolute URLs bind only when their host is listed
  };
  resolution: {
    nameMatchConfidence: number;      // unique global name match
    proximityMatchConfidence: number; // needed a path-proximity tie-break
  };
  risks: {
    markers: RiskMarker[];
    todoDensityThreshold: number;     // markers per line
    todoMinCount: number;
    maxLinesPerHit: number;
    requireReadme: boolean;           // flag a batch with no README at its root
  };
}

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const DEFAULT_CONFIG: AnalyzerConfig = {
  concurrency: 0,
  verbose: false,
  godObject: {
    multiplier: 3,
    minDegree: 10,
    mediumRatio: 1.5,
    highRatio: 3,
  },
  orphans: {
    entryKinds: ['Endpoint'],
    entryNamePatterns: ['^main$', '^bootstrap$', '^App$', '^default$', '^__main__$'],
    entryPathPatterns: [
      '(^|/)(main|index|server|app|manage|wsgi|asgi|setup)\\.[a-z]+$',
      '(^|/)__init__\\.py$',
      '(^|/)(urls|apps|admin|settings|conftest)\\.py$',
    ],
  },
  binding: {
    exactConfidence: 0.9,
    wildcardPenalty: 0.05,
    suffixConfidence: 0.6,
    minConfidence: 0.5,
    firstPartyHosts: ['localhost', '127.0.0.1', '0.0.0.0'],
  },
  resolution: {
    nameMatchConfidence: 0.9,
    proximityMatchConfidence: 0.7,
  },
  risks: {
    markers: DEFAULT_RISK_MARKERS,
    todoDensityThreshold: 0.02,
    todoMinCount: 3,
    maxLinesPerHit: 5,
    requireReadme: true,
  },
};

// =============================================================================
// ENVIRONMENT VARIABLES
// =============================================================================

/**
 * Environment variables that override default config
 *
 * STACKSCOPE_CONCURRENCY: number - Extraction pool size
 * STACKSCOPE_VERBOSE: 'true' | 'false' - Progress output
 * STACKSCOPE_GOD_MULTIPLIER: number - God object multiplier over mean degree
 * STACKSCOPE_GOD_MIN_DEGREE: number - God object absolute minimum
 * STACKSCOPE_TODO_DENSITY: number - TODO/FIXME markers per line
 */

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true';
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

// =============================================================================
// CONFIG FILE
// =============================================================================

const severitySchema = z.enum(['Low', 'Medium', 'High']);

/**
 * Why a pattern cannot be used, or null. Markers are tested line by line
 * with one RegExp, so stateful flags are refused.
 */
export function regexIssue(source: string, flags?: string): string | null {
  if (flags && /[gy]/.test(flags)) return `flags "${flags}" must not include g or y`;
  try {
    new RegExp(source, flags);
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

const regexSourceSchema = z.string().superRefine((source, ctx) => {
  const issue = regexIssue(source);
  if (issue) ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue });
});

const riskMarkerSchema = z
  .object({
    id: z.string().min(1),
    label: z.string().min(1),
    pattern: z.string().min(1),
    flags: z.string().optional(),
    severity: severitySchema,
    paths: regexSourceSchema.optional(),
    pathOnly: z.boolean().optional(),
  })
  .superRefine((marker, ctx) => {
    const issue = regexIssue(marker.pattern, marker.flags);
    if (issue) ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue, path: ['pattern'] });
  });

const configFileSchema = z.object({
  concurrency: z.number().int().min(0).optional(),
  verbose: z.boolean().optional(),
  godObject: z.object({
    multiplier: z.number().positive().optional(),
    minDegree: z.number().min(0).optional(),
    mediumRatio: z.number().positive().optional(),
    highRatio: z.number().positive().optional(),
  }).optional(),
  orphans: z.object({
    entryKinds: z.array(z.enum(NODE_KINDS)).optional(),
    entryNamePatterns: z.array(regexSourceSchema).optional(),
    entryPathPatterns: z.array(regexSourceSchema).optional(),
  }).optional(),
  binding: z.object({
    exactConfidence: z.number().min(0).max(1).optional(),
    wildcardPenalty: z.number().min(0).max(1).optional(),
    suffixConfidence: z.number().min(0).max(1).optional(),
    minConfidence: z.number().min(0).max(1).optional(),
    firstPartyHosts: z.array(z.string().min(1)).optional(),
  }).optional(),
  resolution: z.object({
    nameMatchConfidence: z.number().min(0).max(1).optional(),
    proximityMatchConfidence: z.number().min(0).max(1).optional(),
  }).optional(),
  risks: z.object({
    markers: z.array(riskMarkerSchema).optional(),
    extraMarkers: z.array(riskMarkerSchema).optional(),
    todoDensityThreshold: z.number().min(0).optional(),
    todoMinCount: z.number().int().min(0).optional(),
    maxLinesPerHit: z.number().int().positive().optional(),
    requireReadme: z.boolean().optional(),
  }).optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Merge a parsed config file over a base configuration
 */
export function mergeConfig(base: AnalyzerConfig, file: ConfigFile): AnalyzerConfig {
  const markers = file.risks?.markers ?? base.risks.markers;
  return {
    concurrency: file.concurrency ?? base.concurrency,
    verbose: file.verbose ?? base.verbose,
    godObject: { ...base.godObject, ...file.godObject },
    orphans: { ...base.orphans, ...file.orphans },
    binding: { ...base.binding, ...file.binding },
    resolution: { ...base.resolution, ...file.resolution },
    risks: {
      markers: [...markers, ...(file.risks?.extraMarkers ?? [])],
      todoDensityThreshold: file.risks?.todoDensityThreshold ?? base.risks.todoDensityThreshold,
      todoMinCount: file.risks?.todoMinCount ?? base.risks.todoMinCount,
      maxLinesPerHit: file.risks?.maxLinesPerHit ?? base.risks.maxLinesPerHit,
      requireReadme: file.risks?.requireReadme ?? base.risks.requireReadme,
    },
  };
}

/**
 * Validate an unknown value as a config file
 */
export function parseConfigFile(value: unknown): ConfigFile {
  const result = configFileSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((i) => `${CONFIG_FILE_NAME}: ${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  return result.data;
}

/**
 * Check every pattern of a configuration built in code. Configurations
 * read through parseConfigFile are already checked.
 */
export function validatePatterns(config: AnalyzerConfig): void {
  const issues: string[] = [];
  config.orphans.entryNamePatterns.forEach((source, i) => {
    const issue = regexIssue(source);
    if (issue) issues.push(`orphans.entryNamePatterns.${i}: ${issue}`);
  });
  config.orphans.entryPathPatterns.forEach((source, i) => {
    const issue = regexIssue(source);
    if (issue) issues.push(`orphans.entryPathPatterns.${i}: ${issue}`);
  });
  config.risks.markers.forEach((marker, i) => {
    const issue = regexIssue(marker.pattern, marker.flags);
    if (issue) issues.push(`risks.markers.${i}.pattern: ${issue}`);
    const pathIssue = marker.paths === undefined ? null : regexIssue(marker.paths);
    if (pathIssue) issues.push(`risks.markers.${i}.paths: ${pathIssue}`);
  });
  if (issues.length > 0) throw new ValidationError(issues);
}

/**
 * Load .stackscope.json from a project root, if present
 */
export function loadConfigFile(projectRoot: string): ConfigFile | null {
  const configPath = path.join(projectRoot, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ValidationError([`${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`]);
  }
  return parseConfigFile(raw);
}

// =============================================================================
// CONFIGURATION LOADING
// =============================================================================

/**
 * Load configuration from environment and defaults
 */
export function loadConfig(projectRoot?: string): AnalyzerConfig {
  const fromEnv: AnalyzerConfig = {
    ...DEFAULT_CONFIG,
    concurrency: getEnvNumber('STACKSCOPE_CONCURRENCY', DEFAULT_CONFIG.concurrency),
    verbose: getEnvBoolean('STACKSCOPE_VERBOSE', DEFAULT_CONFIG.verbose),
    godObject: {
      ...DEFAULT_CONFIG.godObject,
      multiplier: getEnvNumber('STACKSCOPE_GOD_MULTIPLIER', DEFAULT_CONFIG.godObject.multiplier),
      minDegree: getEnvNumber('STACKSCOPE_GOD_MIN_DEGREE', DEFAULT_CONFIG.godObject.minDegree),
    },
    risks: {
      ...DEFAULT_CONFIG.risks,
      todoDensityThreshold: getEnvNumber('STACKSCOPE_TODO_DENSITY', DEFAULT_CONFIG.risks.todoDensityThreshold),
    },
  };

  if (!projectRoot) return fromEnv;
  const file = loadConfigFile(projectRoot);
  return file ? mergeConfig(fromEnv, file) : fromEnv;
}

/**
 * Effective extraction pool size
 */
export function resolveConcurrency(config: AnalyzerConfig): number {
  if (config.concurrency > 0) return Math.floor(config.concurrency);
  return Math.max(1, os.cpus().length || 1);
}

// =============================================================================
// EXPORT CONFIG SINGLETON
// =============================================================================

let cachedConfig: AnalyzerConfig | null = null;

/**
 * Get the current configuration (cached)
 */
export function getConfig(): AnalyzerConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration (for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Override configuration (for testing)
 */
export function setConfig(config: ConfigFile): AnalyzerConfig {
  cachedConfig = mergeConfig(loadConfig(), parseConfigFile(config));
  return cachedConfig;
}
