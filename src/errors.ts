/**
 * StackScope Errors
 * Batch- and query-level failures. Per-file problems are records, not errors.
 */

export type ErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'CANCELLED';

export class StackScopeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed ingestion input. The batch is rejected; the current snapshot stays.
 */
export class ValidationError extends StackScopeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('VALIDATION', `Invalid ingestion input: ${issues.slice(0, 3).join('; ')}${issues.length > 3 ? ` (+${issues.length - 3} more)` : ''}`);
    this.issues = issues;
  }
}

export class NotFoundError extends StackScopeError {
  readonly target: string;
  readonly candidates: string[];

  constructor(what: string, target: string, candidates: string[] = []) {
    super('NOT_FOUND', `${what} not found: ${target}`);
    this.target = target;
    this.candidates = candidates;
  }
}

export class CancellationError extends StackScopeError {
  constructor(operation: string) {
    super('CANCELLED', `${operation} cancelled`);
  }
}

/**
 * Throw if the caller has asked to stop
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancellationError(operation);
  }
}
