/**
 * Crash Protection Monitor
 *
 * Periodically repairs what crashed processes leave behind:
 * 1. Reclaims stale or corrupt lock files
 * 2. Reports contention (resources with several live holders)
 * 3. Removes temp files orphaned by interrupted writes
 * 4. Recovers a corrupt state document from its backups
 * 5. Reconciles the workspace index with git
 * 6. Probes health and leaves degraded mode once everything passes
 *
 * Usage:
 *   pipeline-coord monitor check
 *   pipeline-coord monitor start [intervalSeconds]
 */

import { accessSync, constants, existsSync, mkdirSync } from 'fs';
import { ComponentLogger } from '../shared/src/logger.js';
import { asMessage } from '../shared/src/errors.js';
import type { Coordinator } from './coordinator.js';
import type { HealthProbe, HealthReport } from './errorRecovery.js';
import type { LockListing } from './fileLock.js';
import type { RepairReport } from './worktreeManager.js';

const logger = new ComponentLogger('CrashMonitor');

export const DEFAULT_CHECK_INTERVAL_MS = 5_000;
// Alert after this many contended checks in a row
const MAX_CONTENTION_STREAK = 5;

export interface MonitorOptions {
  intervalMs?: number;
  /** Leave degraded mode when every probe passes */
  exitDegradedWhenHealthy?: boolean;
}

export interface Contention {
  resource: string;
  holders: number[];
}

export interface CheckReport {
  checkedAt: string;
  staleLocksCleaned: number;
  contentions: Contention[];
  tempFilesRemoved: number;
  stateRecovered: boolean;
  workspaceRepair: RepairReport | null;
  health: HealthReport;
  errors: string[];
}

export interface MonitorStatus {
  startedAt: string;
  lastCheck: string | null;
  checks: number;
  staleLocksCleaned: number;
  contentionEvents: number;
  tempFilesRemoved: number;
  stateRecoveries: number;
  errors: string[];
  locks: LockListing[];
}

/**
 * Group live lock files by resource and keep those with more than one holder.
 */
export function findContentions(listing: LockListing[]): Contention[] {
  const byResource = new Map<string, number[]>();
  for (const entry of listing) {
    if (entry.status !== 'valid' || !entry.record) continue;
    const holders = byResource.get(entry.record.resourceName) ?? [];
    holders.push(entry.record.holderProcessId);
    byResource.set(entry.record.resourceName, holders);
  }
  return [...byResource.entries()]
    .filter(([, holders]) => holders.length > 1)
    .map(([resource, holders]) => ({ resource, holders }));
}

export class CrashMonitor {
  private readonly startedAt = new Date().toISOString();
  private lastCheck: string | null = null;
  private checks = 0;
  private staleLocksCleaned = 0;
  private contentionEvents = 0;
  private tempFilesRemoved = 0;
  private stateRecoveries = 0;
  private consecutiveContentions = 0;
  private readonly errors: string[] = [];
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<CheckReport> | null = null;

  constructor(private readonly coordinator: Coordinator, private readonly options: MonitorOptions = {}) {}

  /**
   * Run a single check cycle. Failures of one step are recorded and do not
   * stop the others.
   */
  async runCheck(): Promise<CheckReport> {
    const { locks, state, workspaces, recovery, config } = this.coordinator;
    const checkedAt = new Date().toISOString();
    const errors: string[] = [];
    const step = async <T>(name: string, fn: () => Promise<T> | T, fallback: T): Promise<T> => {
      try {
        return await fn();
      } catch (error) {
        const message = `${name}: ${asMessage(error)}`;
        errors.push(message);
        logger.error(`Check step ${name} failed`, { error: error instanceof Error ? error : new Error(message) });
        return fallback;
      }
    };

    // 1. Clean stale locks
    const cleaned = await step('locks', () => locks.cleanup(), 0);

    // 2. Contention
    const contentions = await step('contention', () => findContentions(locks.list()), []);
    if (contentions.length > 0) {
      this.consecutiveContentions++;
      this.contentionEvents += contentions.length;
      for (const c of contentions) {
        logger.warn(`Contention on ${c.resource}: ${c.holders.length} holders (${c.holders.join(', ')})`, {
          resource: c.resource,
        });
      }
      if (this.consecutiveContentions >= MAX_CONTENTION_STREAK) {
        logger.error(`High contention: ${this.consecutiveContentions} consecutive checks with contended locks`);
      }
    } else {
      this.consecutiveContentions = 0;
    }

    // 3. Orphaned temp files
    const tempFilesRemoved = await step('temp-files', () => recovery.cleanupTempFiles().length, 0);

    // 4. State document
    const stateRecovered = await step(
      'state',
      async () => {
        if (!existsSync(state.filePath) || state.validate().valid) return false;
        const outcome = await state.read();
        logger.warn(`State document was invalid; read finished with status ${outcome.status}`, {
          backupId: outcome.recoveredFrom,
        });
        return true;
      },
      false
    );

    // 5. Workspace index
    const workspaceRepair = await step(
      'workspaces',
      () => (existsSync(config.paths.workspaceIndexFile) ? workspaces.repair() : null),
      null
    );

    // 6. Health
    const health = await step('health', () => this.probeHealth(), {
      healthy: false,
      results: {},
      exitedDegradedMode: false,
    });
    if (recovery.degradedMode().enabled && !health.healthy) {
      logger.warn('Pipeline remains in degraded mode');
    }

    this.checks++;
    this.lastCheck = checkedAt;
    this.staleLocksCleaned += cleaned;
    this.tempFilesRemoved += tempFilesRemoved;
    if (stateRecovered) this.stateRecoveries++;
    this.errors.push(...errors);

    return {
      checkedAt,
      staleLocksCleaned: cleaned,
      contentions,
      tempFilesRemoved,
      stateRecovered,
      workspaceRepair,
      health,
      errors,
    };
  }

  defaultProbes(): Record<string, HealthProbe> {
    const { locks, state } = this.coordinator;
    return {
      'lock-dir-writable': () => {
        mkdirSync(locks.lockDir, { recursive: true });
        accessSync(locks.lockDir, constants.W_OK);
        return true;
      },
      'state-valid': () => !existsSync(state.filePath) || state.validate().valid,
      'no-stale-locks': () => locks.list().every((entry) => entry.status === 'valid'),
    };
  }

  status(): MonitorStatus {
    return {
      startedAt: this.startedAt,
      lastCheck: this.lastCheck,
      checks: this.checks,
      staleLocksCleaned: this.staleLocksCleaned,
      contentionEvents: this.contentionEvents,
      tempFilesRemoved: this.tempFilesRemoved,
      stateRecoveries: this.stateRecoveries,
      errors: [...this.errors],
      locks: this.coordinator.locks.list(),
    };
  }

  /**
   * Check immediately, then every `intervalMs`. A cycle never overlaps the previous one.
   */
  async start(): Promise<CheckReport> {
    const intervalMs = this.options.intervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
    logger.info(`Crash monitor started (interval ${intervalMs / 1000}s)`);
    const first = await this.runCheck();

    this.timer = setInterval(() => {
      if (this.running) return;
      this.running = this.runCheck();
      void this.running
        .catch((error: unknown) => {
          logger.error('Check failed', { error: error instanceof Error ? error : new Error(String(error)) });
        })
        .finally(() => {
          this.running = null;
        });
    }, intervalMs);
    return first;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
    logger.info('Crash monitor stopped');
  }

  private async probeHealth(): Promise<HealthReport> {
    return this.coordinator.recovery.probeHealth(this.defaultProbes(), {
      exitDegradedMode: this.options.exitDegradedWhenHealthy !== false,
    });
  }
}
