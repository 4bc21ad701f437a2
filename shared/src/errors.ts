/**
 * Error taxonomy shared by every coordination component.
 *
 * Every failure surfaced by the core is a CoordinatorError carrying one of
 * the closed ErrorKind values. The kind decides the recovery policy and the
 * CLI exit code; `code` is a finer-grained stable identifier.
 */

export const ERROR_KINDS = Object.freeze({
  LockTimeout: 'LockTimeout',
  StateCorruption: 'StateCorruption',
  ValidationFailed: 'ValidationFailed',
  PermissionDenied: 'PermissionDenied',
  DiskFull: 'DiskFull',
  Timeout: 'Timeout',
  ResourceExhausted: 'ResourceExhausted',
  IsolationViolation: 'IsolationViolation',
  MergeConflict: 'MergeConflict',
  WorkspaceNotFound: 'WorkspaceNotFound',
  ConfigurationError: 'ConfigurationError',
  Unknown: 'Unknown',
} as const);

export type ErrorKind = (typeof ERROR_KINDS)[keyof typeof ERROR_KINDS];

export const EXIT_CODES: Readonly<Record<ErrorKind, number>> = Object.freeze({
  Unknown: 1,
  LockTimeout: 2,
  StateCorruption: 3,
  ValidationFailed: 4,
  PermissionDenied: 5,
  DiskFull: 6,
  Timeout: 7,
  ResourceExhausted: 8,
  IsolationViolation: 9,
  MergeConflict: 10,
  WorkspaceNotFound: 11,
  ConfigurationError: 12,
});

export function exitCodeFor(kind: ErrorKind): number {
  return EXIT_CODES[kind];
}

export type ErrorDetails = Record<string, unknown>;

export class CoordinatorError extends Error {
  readonly kind: ErrorKind;
  readonly code: string;
  readonly details: ErrorDetails;

  constructor(
    message: string,
    input: {
      readonly kind: ErrorKind;
      readonly code: string;
      readonly details?: ErrorDetails;
      readonly cause?: unknown;
    }
  ) {
    super(message);
    this.name = 'CoordinatorError';
    this.kind = input.kind;
    this.code = input.code;
    this.details = input.details ?? {};
    if ('cause' in input) {
      this.cause = input.cause;
    }
  }
}

export class LockTimeoutError extends CoordinatorError {
  constructor(resource: string, timeoutMs: number, details: ErrorDetails = {}) {
    super(`Failed to acquire lock on ${resource} within ${timeoutMs}ms`, {
      kind: ERROR_KINDS.LockTimeout,
      code: 'LOCK_TIMEOUT',
      details: { resource, timeoutMs, ...details },
    });
    this.name = 'LockTimeoutError';
  }
}

export class NotHeldError extends CoordinatorError {
  constructor(resource: string, details: ErrorDetails = {}) {
    super(`Lock on ${resource} is not held by this holder`, {
      kind: ERROR_KINDS.ValidationFailed,
      code: 'LOCK_NOT_HELD',
      details: { resource, ...details },
    });
    this.name = 'NotHeldError';
  }
}

export class LockOrderError extends CoordinatorError {
  constructor(requested: string, held: string) {
    super(`Lock order violation: requested ${requested} while holding ${held}`, {
      kind: ERROR_KINDS.ConfigurationError,
      code: 'LOCK_ORDER',
      details: { requested, held },
    });
    this.name = 'LockOrderError';
  }
}

export class StateCorruptionError extends CoordinatorError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, {
      kind: ERROR_KINDS.StateCorruption,
      code: 'STATE_CORRUPTION',
      details,
      cause,
    });
    this.name = 'StateCorruptionError';
  }
}

export class ValidationFailedError extends CoordinatorError {
  readonly issues: string[];

  constructor(message: string, issues: string[], details: ErrorDetails = {}) {
    super(message, {
      kind: ERROR_KINDS.ValidationFailed,
      code: 'VALIDATION_FAILED',
      details: { issues, ...details },
    });
    this.name = 'ValidationFailedError';
    this.issues = issues;
  }
}

export class NotFoundError extends CoordinatorError {
  constructor(what: string, selector: string) {
    super(`${what} not found: ${selector}`, {
      kind: ERROR_KINDS.ValidationFailed,
      code: 'NOT_FOUND',
      details: { what, selector },
    });
    this.name = 'NotFoundError';
  }
}

export class AlreadyExistsError extends CoordinatorError {
  constructor(what: string, name: string, details: ErrorDetails = {}) {
    super(`${what} already exists: ${name}`, {
      kind: ERROR_KINDS.ValidationFailed,
      code: 'ALREADY_EXISTS',
      details: { what, name, ...details },
    });
    this.name = 'AlreadyExistsError';
  }
}

export class WorkspaceNotFoundError extends CoordinatorError {
  constructor(name: string) {
    super(`Workspace not found: ${name}`, {
      kind: ERROR_KINDS.WorkspaceNotFound,
      code: 'WORKSPACE_NOT_FOUND',
      details: { name },
    });
    this.name = 'WorkspaceNotFoundError';
  }
}

export class IsolationViolationError extends CoordinatorError {
  readonly violations: string[];

  constructor(workspace: string, reason: string, violations: string[]) {
    super(`Isolation violation in ${workspace}: ${reason}`, {
      kind: ERROR_KINDS.IsolationViolation,
      code: 'ISOLATION_VIOLATION',
      details: { workspace, reason, violations },
    });
    this.name = 'IsolationViolationError';
    this.violations = violations;
  }
}

export class DirtyStateError extends CoordinatorError {
  readonly paths: string[];

  constructor(workspace: string, paths: string[], reason = 'uncommitted changes') {
    super(`Workspace ${workspace} has ${reason}`, {
      kind: ERROR_KINDS.IsolationViolation,
      code: 'DIRTY_STATE',
      details: { workspace, reason, paths },
    });
    this.name = 'DirtyStateError';
    this.paths = paths;
  }
}

export class MergeConflictError extends CoordinatorError {
  readonly conflicts: string[];
  readonly reason: string;

  constructor(workspace: string, conflicts: string[], reason: string, code = 'MERGE_CONFLICT') {
    super(`Merge of ${workspace} stopped: ${reason}`, {
      kind: ERROR_KINDS.MergeConflict,
      code,
      details: { workspace, reason, conflicts },
    });
    this.name = 'MergeConflictError';
    this.conflicts = conflicts;
    this.reason = reason;
  }
}

/**
 * A fast-forward merge found trunk ahead of the workspace's base. Nothing
 * conflicts; the workspace can be merged again with another strategy.
 */
export class TrunkDivergedError extends MergeConflictError {
  constructor(workspace: string) {
    super(workspace, [], 'fast-forward not possible: trunk has diverged', 'TRUNK_DIVERGED');
    this.name = 'TrunkDivergedError';
  }
}

export class DependencyPendingError extends CoordinatorError {
  constructor(workspace: string, pending: string[]) {
    super(`Workspace ${workspace} must merge after: ${pending.join(', ')}`, {
      kind: ERROR_KINDS.ValidationFailed,
      code: 'DEPENDENCY_PENDING',
      details: { workspace, pending },
    });
    this.name = 'DependencyPendingError';
  }
}

export class FeatureDisabledError extends CoordinatorError {
  constructor(feature: string, reason: string | null) {
    super(`Feature "${feature}" is disabled by degraded mode`, {
      kind: ERROR_KINDS.ConfigurationError,
      code: 'FEATURE_DISABLED',
      details: { feature, reason },
    });
    this.name = 'FeatureDisabledError';
  }
}

export class ConfigurationError extends CoordinatorError {
  constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, {
      kind: ERROR_KINDS.ConfigurationError,
      code: 'CONFIGURATION_ERROR',
      details,
      cause,
    });
    this.name = 'ConfigurationError';
  }
}

export class RetryExhaustedError extends CoordinatorError {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(operation: string, attempts: number, kind: ErrorKind, lastError: unknown) {
    super(`Operation ${operation} failed after ${attempts} attempt(s): ${asMessage(lastError)}`, {
      kind,
      code: 'RETRY_EXHAUSTED',
      details: { operation, attempts },
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * errno-style code (`EEXIST`, `ENOENT`, ...) of a system error, if any.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isCoordinatorError(error: unknown): error is CoordinatorError {
  return error instanceof CoordinatorError;
}

export interface Diagnostic {
  kind: ErrorKind;
  code: string;
  message: string;
  details: ErrorDetails;
}

/**
 * Structured payload printed by the CLI for a failed command.
 */
export function toDiagnostic(error: unknown, kind: ErrorKind = ERROR_KINDS.Unknown): Diagnostic {
  if (isCoordinatorError(error)) {
    return { kind: error.kind, code: error.code, message: error.message, details: error.details };
  }
  return { kind, code: 'UNEXPECTED', message: asMessage(error), details: {} };
}
