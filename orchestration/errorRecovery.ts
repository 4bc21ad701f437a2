/**
 * Error Recovery - retry, checkpoint restore and degraded mode
 *
 * Failures are classified into the closed ErrorKind taxonomy. The kind picks
 * the disposition:
 *   transient  (LockTimeout, Timeout, ResourceExhausted, Unknown) -> retry with backoff
 *   integrity  (StateCorruption, ValidationFailed)                -> restore, then retry
 *   judgment   (MergeConflict, IsolationViolation, WorkspaceNotFound) -> surface, never retried
 *   fatal      (PermissionDenied, DiskFull, ConfigurationError)   -> escalate immediately
 *
 * Every handled failure is appended to the error log, and kinds with a
 * recovery strategy get it run: before the next attempt for retried kinds,
 * before the error is raised for escalated ones.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync, renameSync, appendFileSync } from 'fs';
import { basename, dirname } from 'path';
import { cpus, loadavg } from 'os';
import { z, ZodError } from 'zod';
import { ComponentLogger } from '../shared/src/logger.js';
import type { CoordinatorConfig, RecoveryConfig } from '../shared/src/config.js';
import {
  ERROR_KINDS,
  FeatureDisabledError,
  RetryExhaustedError,
  asMessage,
  errorCode,
  isCoordinatorError,
  toDiagnostic,
  type Diagnostic,
  type ErrorKind,
} from '../shared/src/errors.js';
import { sweepTempFiles, type LockManager } from './fileLock.js';
import type { StateStore } from './stateManager.js';
import { defaultDegradedMode, type DegradedMode } from './stateSchema.js';
import type { Checkpoint, CheckpointKind, CheckpointRestore, CheckpointStore } from './checkpointStore.js';

const logger = new ComponentLogger('ErrorRecovery');

const DISPOSITION_NAMES = ['retry', 'restore', 'surface', 'escalate'] as const;
export type Disposition = (typeof DISPOSITION_NAMES)[number];

const STRATEGY_NAMES = [
  'clean-stale-locks',
  'recover-state',
  'wait-for-resources',
  'cleanup-temp-files',
  'reset-config',
] as const;
export type RecoveryStrategy = (typeof STRATEGY_NAMES)[number];

const DISPOSITIONS: Readonly<Record<ErrorKind, Disposition>> = Object.freeze({
  LockTimeout: 'retry',
  Timeout: 'retry',
  ResourceExhausted: 'retry',
  Unknown: 'retry',
  StateCorruption: 'restore',
  ValidationFailed: 'restore',
  MergeConflict: 'surface',
  IsolationViolation: 'surface',
  WorkspaceNotFound: 'surface',
  PermissionDenied: 'escalate',
  DiskFull: 'escalate',
  ConfigurationError: 'escalate',
});

const ERRNO_KINDS: Readonly<Record<string, ErrorKind>> = Object.freeze({
  EACCES: ERROR_KINDS.PermissionDenied,
  EPERM: ERROR_KINDS.PermissionDenied,
  EROFS: ERROR_KINDS.PermissionDenied,
  ENOSPC: ERROR_KINDS.DiskFull,
  EDQUOT: ERROR_KINDS.DiskFull,
  ETIMEDOUT: ERROR_KINDS.Timeout,
  EMFILE: ERROR_KINDS.ResourceExhausted,
  ENFILE: ERROR_KINDS.ResourceExhausted,
  EAGAIN: ERROR_KINDS.ResourceExhausted,
  ENOMEM: ERROR_KINDS.ResourceExhausted,
  EBUSY: ERROR_KINDS.ResourceExhausted,
});

export const RECOVERY_STRATEGIES: Readonly<Partial<Record<ErrorKind, RecoveryStrategy>>> = Object.freeze({
  LockTimeout: 'clean-stale-locks',
  StateCorruption: 'recover-state',
  ResourceExhausted: 'wait-for-resources',
  DiskFull: 'cleanup-temp-files',
  ConfigurationError: 'reset-config',
});

const ErrorLogEntrySchema = z.object({
  timestamp: z.string(),
  operation: z.string(),
  attempt: z.number().int(),
  pid: z.number().int(),
  kind: z.nativeEnum(ERROR_KINDS),
  disposition: z.enum(DISPOSITION_NAMES),
  message: z.string(),
  strategy: z.enum(STRATEGY_NAMES).nullable(),
  /** null when no strategy ran */
  recovered: z.boolean().nullable(),
  detail: z.string().nullable(),
});

export type ErrorLogEntry = z.infer<typeof ErrorLogEntrySchema>;

/**
 * Read the error log back, oldest first.
 */
export function readErrorLog(errorLog: string): ErrorLogEntry[] {
  if (!existsSync(errorLog)) return [];
  const entries: ErrorLogEntry[] = [];
  for (const line of readFileSync(errorLog, 'utf-8').split('\n')) {
    if (!line.trim()) continue;
    try {
      entries.push(ErrorLogEntrySchema.parse(JSON.parse(line)));
    } catch (error) {
      logger.debug('Skipping unreadable error log line', {
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }
  return entries;
}

/**
 * Map a raw failure onto the error taxonomy.
 */
export function classifyError(error: unknown): ErrorKind {
  if (isCoordinatorError(error)) return error.kind;
  const code = errorCode(error);
  if (code && code in ERRNO_KINDS) return ERRNO_KINDS[code];
  if (error instanceof ZodError) return ERROR_KINDS.ValidationFailed;
  if (error instanceof SyntaxError) return ERROR_KINDS.StateCorruption;
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return ERROR_KINDS.Timeout;
  }
  return ERROR_KINDS.Unknown;
}

export function dispositionFor(kind: ErrorKind): Disposition {
  return DISPOSITIONS[kind];
}

export type RecoveryPhase = 'Attempting' | 'Succeeded' | 'Failed' | 'Retrying' | 'Restoring' | 'Degraded' | 'Fatal';

export interface RecoveryTransition {
  operation: string;
  from: RecoveryPhase | null;
  to: RecoveryPhase;
  attempt: number;
  kind?: ErrorKind;
  detail?: string;
  at: string;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Pause of the wait-for-resources strategy */
  resourceWaitMs?: number;
  onTransition?: (transition: RecoveryTransition) => void;
}

export interface HandleErrorOptions {
  attempt?: number;
  /** Run the recovery strategy of the error's kind */
  repair?: boolean;
  resourceWaitMs?: number;
}

export interface ConfigReset {
  configFile: string;
  /** Where the previous file went; null when there was none */
  backupPath: string | null;
  restoredDefault: boolean;
}

export interface ProtectedOptions extends RetryOptions {
  /** A critical operation never degrades; its failure is always raised. */
  critical?: boolean;
  /** Capabilities disabled when a non-critical operation runs out of attempts */
  degradeFeatures?: string[];
}

export type ProtectedOutcome<T> =
  | { status: 'succeeded'; result: T; attempts: number; transitions: RecoveryTransition[] }
  | { status: 'degraded'; degradedMode: DegradedMode; error: Diagnostic; transitions: RecoveryTransition[] };

export type HealthProbe = () => Promise<boolean> | boolean;

export interface HealthReport {
  healthy: boolean;
  results: Record<string, { ok: boolean; error?: string }>;
  exitedDegradedMode: boolean;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RecoveryManager {
  private readonly defaults: RecoveryConfig;

  constructor(
    private readonly config: CoordinatorConfig,
    private readonly state: StateStore,
    private readonly checkpoints: CheckpointStore,
    private readonly locks: LockManager
  ) {
    this.defaults = config.recovery;
  }

  classifyError(error: unknown): ErrorKind {
    return classifyError(error);
  }

  async checkpoint(name: string, phase: string, payload: unknown, kind?: CheckpointKind): Promise<Checkpoint> {
    return this.checkpoints.create(name, phase, payload, kind);
  }

  async restore(checkpointId: string): Promise<CheckpointRestore> {
    return this.checkpoints.restore(checkpointId);
  }

  /**
   * Run `operation` up to `maxAttempts` times. Every retry starts from the most
   * recent checkpoint named after the operation, when there is one.
   * @throws the original error for kinds that are not retried
   * @throws RetryExhaustedError once attempts run out
   */
  async retryWithBackoff<T>(
    name: string,
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
  ): Promise<T> {
    const maxAttempts = options.maxAttempts ?? this.defaults.maxAttempts;
    const baseDelayMs = options.baseDelayMs ?? this.defaults.baseDelayMs;
    const maxDelayMs = options.maxDelayMs ?? this.defaults.maxDelayMs;
    let phase: RecoveryPhase | null = null;
    const move = (to: RecoveryPhase, attempt: number, kind?: ErrorKind, detail?: string): void => {
      const transition: RecoveryTransition = {
        operation: name,
        from: phase,
        to,
        attempt,
        kind,
        detail,
        at: new Date().toISOString(),
      };
      phase = to;
      options.onTransition?.(transition);
    };

    for (let attempt = 1; ; attempt++) {
      if (attempt > 1) {
        const checkpoint = this.checkpoints.latestFor(name);
        if (checkpoint) {
          move('Restoring', attempt, undefined, checkpoint.id);
          await this.checkpoints.restore(checkpoint.id);
        }
      }

      move('Attempting', attempt);
      try {
        const result = await operation(attempt);
        move('Succeeded', attempt);
        return result;
      } catch (error) {
        const kind = classifyError(error);
        const disposition = dispositionFor(kind);
        move('Failed', attempt, kind, asMessage(error));
        logger.warn(`${name} failed on attempt ${attempt}/${maxAttempts}`, {
          attempt,
          kind,
          error: error instanceof Error ? error : new Error(String(error)),
        });

        const exhausted = attempt >= maxAttempts;
        const repair = disposition === 'escalate' || (disposition !== 'surface' && !exhausted);
        await this.handleError(name, error, { attempt, repair, resourceWaitMs: options.resourceWaitMs });

        if (disposition === 'surface' || disposition === 'escalate') {
          throw error;
        }
        if (exhausted) {
          throw new RetryExhaustedError(name, attempt, kind, error);
        }

        const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
        move('Retrying', attempt, kind, `${delay}ms`);
        await sleep(delay);
      }
    }
  }

  /**
   * Drive an operation through the full recovery state machine. A
   * non-critical operation that exhausts its attempts puts the pipeline in
   * degraded mode instead of failing it.
   */
  async runProtected<T>(
    name: string,
    operation: (attempt: number) => Promise<T>,
    options: ProtectedOptions = {}
  ): Promise<ProtectedOutcome<T>> {
    const transitions: RecoveryTransition[] = [];
    const record = (transition: RecoveryTransition): void => {
      transitions.push(transition);
      options.onTransition?.(transition);
    };
    let attempts = 0;

    try {
      const result = await this.retryWithBackoff(
        name,
        (attempt) => {
          attempts = attempt;
          return operation(attempt);
        },
        { ...options, onTransition: record }
      );
      return { status: 'succeeded', result, attempts, transitions };
    } catch (error) {
      const kind = error instanceof RetryExhaustedError ? error.kind : classifyError(error);
      const disposition = dispositionFor(kind);
      const features = options.degradeFeatures ?? [];
      const at = new Date().toISOString();

      if (!options.critical && features.length > 0 && (disposition === 'retry' || disposition === 'restore')) {
        const degradedMode = await this.enterDegradedMode(`${name} failed: ${asMessage(error)}`, features);
        record({ operation: name, from: 'Failed', to: 'Degraded', attempt: attempts, kind, at });
        return { status: 'degraded', degradedMode, error: toDiagnostic(error, kind), transitions };
      }

      if (disposition !== 'surface') {
        record({ operation: name, from: 'Failed', to: 'Fatal', attempt: attempts, kind, at });
        logger.error(`${name} escalated`, { kind, error: error instanceof Error ? error : new Error(String(error)) });
      }
      throw error;
    }
  }

  /**
   * Mark the pipeline degraded. Features accumulate while degraded mode stays on.
   */
  async enterDegradedMode(reason: string, disabledFeatures: string[]): Promise<DegradedMode> {
    const { document } = await this.state.write((doc) => {
      const previous = doc.degradedMode.enabled ? doc.degradedMode.disabledFeatures : [];
      doc.degradedMode = {
        enabled: true,
        reason,
        timestamp: new Date().toISOString(),
        disabledFeatures: [...new Set([...previous, ...disabledFeatures])],
      };
      return doc;
    }, 'degraded-mode:enter');
    logger.warn(`Entered degraded mode: ${reason}`, { count: document.degradedMode.disabledFeatures.length });
    return document.degradedMode;
  }

  async exitDegradedMode(): Promise<DegradedMode> {
    const { document } = await this.state.write((doc) => {
      doc.degradedMode = defaultDegradedMode();
      return doc;
    }, 'degraded-mode:exit');
    logger.info('Exited degraded mode');
    return document.degradedMode;
  }

  degradedMode(): DegradedMode {
    return this.state.store.peek()?.degradedMode ?? defaultDegradedMode();
  }

  isFeatureEnabled(feature: string): boolean {
    const mode = this.degradedMode();
    return !(mode.enabled && mode.disabledFeatures.includes(feature));
  }

  /**
   * @throws FeatureDisabledError when degraded mode disables `feature`
   */
  requireFeature(feature: string): void {
    const mode = this.degradedMode();
    if (mode.enabled && mode.disabledFeatures.includes(feature)) {
      throw new FeatureDisabledError(feature, mode.reason);
    }
  }

  /**
   * Run every probe; when all pass and the pipeline is degraded, leave degraded mode.
   */
  async probeHealth(
    probes: Record<string, HealthProbe>,
    options: { exitDegradedMode?: boolean } = {}
  ): Promise<HealthReport> {
    const results: HealthReport['results'] = {};
    for (const [name, probe] of Object.entries(probes)) {
      try {
        results[name] = { ok: await probe() };
      } catch (error) {
        results[name] = { ok: false, error: asMessage(error) };
      }
    }
    const healthy = Object.values(results).every((r) => r.ok);
    let exitedDegradedMode = false;
    if (healthy && options.exitDegradedMode !== false && this.degradedMode().enabled) {
      await this.exitDegradedMode();
      exitedDegradedMode = true;
    }
    return { healthy, results, exitedDegradedMode };
  }

  /**
   * Log a failure to the error log and, unless `repair` is false, run the
   * recovery strategy of its kind. A failing strategy is logged, not thrown.
   */
  async handleError(operation: string, error: unknown, options: HandleErrorOptions = {}): Promise<ErrorLogEntry> {
    const kind = classifyError(error);
    const strategy = options.repair === false ? null : (RECOVERY_STRATEGIES[kind] ?? null);
    let recovered: boolean | null = null;
    let detail: string | null = null;
    if (strategy) {
      try {
        detail = await this.runStrategy(strategy, options);
        recovered = true;
        logger.info(`Recovery ${strategy} after ${kind}: ${detail}`, { kind });
      } catch (strategyError) {
        recovered = false;
        detail = asMessage(strategyError);
        logger.error(`Recovery ${strategy} after ${kind} failed`, {
          kind,
          error: strategyError instanceof Error ? strategyError : new Error(String(strategyError)),
        });
      }
    }

    const entry: ErrorLogEntry = {
      timestamp: new Date().toISOString(),
      operation,
      attempt: options.attempt ?? 1,
      pid: this.locks.holderPid,
      kind,
      disposition: dispositionFor(kind),
      message: asMessage(error),
      strategy,
      recovered,
      detail,
    };
    this.appendErrorLog(entry);
    return entry;
  }

  /**
   * Entries of the error log, oldest first; the last `limit` when given.
   */
  errorLog(limit?: number): ErrorLogEntry[] {
    const entries = readErrorLog(this.config.paths.errorLog);
    return limit === undefined ? entries : entries.slice(-limit);
  }

  /**
   * Remove temp files crashed writers left beside the coordinator's files.
   * @returns paths removed
   */
  cleanupTempFiles(maxAgeMs: number = this.config.locks.stalenessThresholdMs): string[] {
    const { paths } = this.config;
    const dirs = new Set([
      dirname(paths.stateFile),
      paths.backupDir,
      paths.lockDir,
      paths.checkpointDir,
      dirname(paths.workspaceIndexFile),
      paths.archiveDir,
    ]);
    return [...dirs].flatMap((dir) => sweepTempFiles(dir, maxAgeMs));
  }

  /**
   * Move the pipeline config file aside and put `<configFile>.default` in its
   * place when one exists. Takes effect at the next configuration load.
   */
  resetConfig(): ConfigReset {
    const { configFile } = this.config.paths;
    let backupPath: string | null = null;
    if (existsSync(configFile)) {
      backupPath = `${configFile}.backup.${Date.now()}`;
      renameSync(configFile, backupPath);
    }
    const defaults = `${configFile}.default`;
    const restoredDefault = existsSync(defaults);
    if (restoredDefault) {
      copyFileSync(defaults, configFile);
    }
    logger.warn(`Reset configuration ${configFile}`, { path: backupPath ?? configFile });
    return { configFile, backupPath, restoredDefault };
  }

  private async runStrategy(strategy: RecoveryStrategy, options: HandleErrorOptions): Promise<string> {
    switch (strategy) {
      case 'clean-stale-locks':
        return `${this.locks.cleanup()} stale lock(s) reclaimed`;
      case 'recover-state': {
        // A read quarantines a corrupt document and restores the newest valid backup
        const outcome = await this.state.read();
        return `state ${outcome.status}`;
      }
      case 'wait-for-resources': {
        const base = options.resourceWaitMs ?? this.defaults.resourceWaitMs;
        const waitMs = loadavg()[0] > cpus().length ? base * 2 : base;
        await sleep(waitMs);
        return `waited ${waitMs}ms`;
      }
      case 'cleanup-temp-files': {
        const temp = this.cleanupTempFiles().length;
        const backups = this.state.store.pruneBackups().length;
        const checkpoints = this.checkpoints.cleanup().length;
        return `removed ${temp} temp file(s), ${backups} backup(s), ${checkpoints} checkpoint(s)`;
      }
      case 'reset-config': {
        const reset = this.resetConfig();
        const moved = reset.backupPath ? `moved to ${basename(reset.backupPath)}` : 'no config file';
        return reset.restoredDefault ? `${moved}, defaults restored` : moved;
      }
    }
  }

  private appendErrorLog(entry: ErrorLogEntry): void {
    const { errorLog } = this.config.paths;
    try {
      mkdirSync(dirname(errorLog), { recursive: true });
      appendFileSync(errorLog, JSON.stringify(entry) + '\n');
    } catch (error) {
      logger.warn('Could not append to error log', {
        path: errorLog,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }
}
