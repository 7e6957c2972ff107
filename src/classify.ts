/**
 * StackScope Path Classification
 * Classifies files as production, test, migration, dev-only, admin or analytics code
 */

export type PathClassification = 'production' | 'admin' | 'analytics' | 'test' | 'dev-only' | 'migration';

/**
 * Classify a file by its path. Test patterns win over everything else.
 */
export function classifyPath(filePath: string): PathClassification {
  const p = '/' + filePath.toLowerCase();

  if (isTestPath(p)) return 'test';
  if (isMigrationPath(p)) return 'migration';
  if (isDevPath(p)) return 'dev-only';
  if (isAdminPath(p)) return 'admin';
  if (isAnalyticsPath(p)) return 'analytics';
  return 'production';
}

/**
 * Files something outside the graph runs directly: test runners,
 * migration tools and build tooling.
 */
export function isRunnerEntryPath(filePath: string): boolean {
  const classification = classifyPath(filePath);
  return classification === 'test' || classification === 'migration' || classification === 'dev-only';
}

function isTestPath(p: string): boolean {
  return /(__tests__|\.test\.|\.spec\.|\/tests?\/|\/testing\/|\/test_[^/]*\.py$|_test\.py$|\/conftest\.py$)/.test(p);
}

function isMigrationPath(p: string): boolean {
  return /(\/migrations?\/|\/migrate|\.migration\.|\/seeds?\/|\/alembic\/)/.test(p);
}

function isDevPath(p: string): boolean {
  return /(\/scripts\/|\/dev\/|\.dev\.|webpack\.config|vite\.config|vitest\.config|rollup\.config|jest\.config|next\.config|tailwind\.config|postcss\.config|eslint|prettier|\.storybook|\.stories\.)/.test(p);
}

function isAdminPath(p: string): boolean {
  return /(\/admin\/|\/dashboard\/|\/internal\/|\/backoffice\/|\/admin\.py$)/.test(p);
}

function isAnalyticsPath(p: string): boolean {
  return /(\/analytics\/|\/tracking\/|\/telemetry\/|\/metrics\/|\/monitoring\/)/.test(p);
}
