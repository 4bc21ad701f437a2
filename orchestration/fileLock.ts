/**
 * File Locking for Multi-Process Safety
 *
 * Advisory leases over named resources, mediated through a lock directory.
 * An exclusive lease is the file `<resource>.lock`; each shared lease is its
 * own file `<resource>.shared.<leaseId>.lock`. Lock files are created with
 * create-if-absent semantics (hard link of a fully written temp file), so a
 * reader never sees a half-written record.
 *
 * Usage:
 *   const locks = LockManager.fromConfig(loadConfig());
 *   const lease = await locks.acquire('state', { mode: 'exclusive' });
 *   try {
 *     atomicWrite(path, content);
 *   } finally {
 *     locks.release(lease);
 *   }
 */

import {
  existsSync,
  readFileSync,
  writeFileSync,
  unlinkSync,
  renameSync,
  mkdirSync,
  readdirSync,
  linkSync,
  appendFileSync,
  statSync,
} from 'fs';
import { join, dirname, basename } from 'path';
import { randomUUID } from 'crypto';
import { hostname } from 'os';
import { z } from 'zod';
import { ComponentLogger } from '../shared/src/logger.js';
import type { CoordinatorConfig } from '../shared/src/config.js';
import {
  LockOrderError,
  LockTimeoutError,
  NotHeldError,
  errorCode,
} from '../shared/src/errors.js';

const logger = new ComponentLogger('FileLock');

export type LockMode = 'exclusive' | 'shared';

export const LockRecordSchema = z.object({
  resourceName: z.string().min(1),
  mode: z.enum(['exclusive', 'shared']),
  holderProcessId: z.number().int(),
  /** Kernel start time of the holder; tells a recycled pid from the holder */
  holderStartTime: z.string().nullable().default(null),
  leaseId: z.string().min(1),
  hostname: z.string(),
  acquiredAt: z.string(),
  acquiredAtMs: z.number(),
  expiresAt: z.string(),
  metadata: z.record(z.unknown()).default({}),
});

export type LockRecord = z.infer<typeof LockRecordSchema>;

export interface LeaseHandle {
  resource: string;
  mode: LockMode;
  leaseId: string;
  lockPath: string;
  holderPid: number;
  acquiredAtMs: number;
}

export interface AcquireOptions {
  mode?: LockMode;
  timeoutMs?: number;
  metadata?: Record<string, unknown>;
}

export type LockCheck =
  | { resource: string; status: 'free' }
  | {
      resource: string;
      status: 'held';
      mode: LockMode;
      holders: { holderProcessId: number; leaseId: string; ageMs: number; stale: boolean }[];
    };

export interface LockListing {
  file: string;
  status: 'valid' | 'stale' | 'corrupt';
  record: LockRecord | null;
  ageMs: number | null;
}

export type AuditOutcome = 'acquired' | 'released' | 'timeout' | 'reclaimed' | 'not-held';

export interface AuditEntry {
  timestamp: string;
  resource: string;
  mode: LockMode | 'unknown';
  pid: number;
  leaseId: string | null;
  outcome: AuditOutcome;
  durationMs: number;
  attempts?: number;
  reason?: string;
}

export interface LockManagerOptions {
  lockDir: string;
  auditLog?: string;
  defaultTimeoutMs?: number;
  stalenessThresholdMs?: number;
  retryBaseMs?: number;
  retryMaxMs?: number;
  /** Process recorded as the holder; the CLI passes its parent shell. */
  holderPid?: number;
}

/**
 * Canonical acquisition order. Lower number = acquired first.
 */
export const LOCK_PRIORITIES: Readonly<Record<string, number>> = Object.freeze({
  state: 1,
  'workspace-index': 2,
  trunk: 3,
  config: 4,
  signals: 5,
  backup: 6,
  temp: 7,
  user: 10,
});

const UNLISTED_PRIORITY = 999;

export function lockPriority(resource: string): number {
  return LOCK_PRIORITIES[resource] ?? UNLISTED_PRIORITY;
}

/**
 * Sort resources into the order they must be acquired in.
 */
export function sortByPriority(resources: readonly string[]): string[] {
  return [...new Set(resources)].sort((a, b) => {
    const diff = lockPriority(a) - lockPriority(b);
    return diff !== 0 ? diff : a.localeCompare(b);
  });
}

/**
 * Check if a process is running by PID
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but belongs to someone else
    return errorCode(error) === 'EPERM';
  }
}

/**
 * Start time of `pid` in clock ticks since boot, from /proc/<pid>/stat.
 * Null where /proc is unavailable or the process is gone.
 */
export function processStartTime(pid: number): string | null {
  if (!Number.isInteger(pid) || pid <= 0) return null;
  let stat: string;
  try {
    stat = readFileSync(`/proc/${pid}/stat`, 'utf-8');
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ESRCH' || code === 'EACCES' || code === 'ENOTDIR') return null;
    throw error;
  }
  // comm may contain spaces and parentheses; fields resume after the last ')'
  const fields = stat.slice(stat.lastIndexOf(')') + 2).split(' ');
  return fields[19] ?? null;
}

// Temp files of atomicWrite and createIfAbsent, and reclaim tombstones
const TEMP_FILE_PATTERN = /\.[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\.(tmp|reclaim)$/;

/**
 * Delete temp files a crashed writer left in `dir` once they are older than `maxAgeMs`.
 * @returns paths removed
 */
export function sweepTempFiles(dir: string, maxAgeMs: number): string[] {
  if (!existsSync(dir)) return [];
  const removed: string[] = [];
  const now = Date.now();
  for (const file of readdirSync(dir)) {
    if (!TEMP_FILE_PATTERN.test(file)) continue;
    const path = join(dir, file);
    try {
      if (now - statSync(path).mtimeMs <= maxAgeMs) continue;
      unlinkSync(path);
      removed.push(path);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') throw error;
    }
  }
  if (removed.length > 0) {
    logger.info(`Removed ${removed.length} orphaned temp file(s) from ${dir}`, { path: dir, count: removed.length });
  }
  return removed;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sanitize a resource name for use as a lock file name
 */
function sanitizeResource(resource: string): string {
  return resource.replace(/[^A-Za-z0-9._-]/g, '_').replace(/\.\./g, '_');
}

/**
 * Perform an atomic write to a file
 * Writes to a temporary file first, then renames to target
 * This prevents corruption if the process crashes during write
 */
export function atomicWrite(filePath: string, content: string): void {
  const dir = dirname(filePath);
  mkdirSync(dir, { recursive: true });
  const tempPath = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  try {
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, filePath);
  } catch (error) {
    if (existsSync(tempPath)) {
      unlinkSync(tempPath);
    }
    throw error;
  }
}

/**
 * Create `target` with `content` only if it does not exist yet.
 * @returns false when another entry already occupies `target`
 */
export function createIfAbsent(target: string, content: string): boolean {
  const tempPath = `${target}.${randomUUID()}.tmp`;
  writeFileSync(tempPath, content, 'utf-8');
  try {
    linkSync(tempPath, target);
    return true;
  } catch (error) {
    if (errorCode(error) === 'EEXIST') return false;
    throw error;
  } finally {
    unlinkSync(tempPath);
  }
}

type ReadResult = { kind: 'missing' } | { kind: 'corrupt' } | { kind: 'ok'; record: LockRecord };

function readLockFile(lockPath: string): ReadResult {
  let content: string;
  try {
    content = readFileSync(lockPath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return { kind: 'missing' };
    throw error;
  }
  try {
    const parsed = LockRecordSchema.safeParse(JSON.parse(content));
    return parsed.success ? { kind: 'ok', record: parsed.data } : { kind: 'corrupt' };
  } catch {
    return { kind: 'corrupt' };
  }
}

/**
 * Why the holder of a lock on this host no longer exists; null while it runs
 * or when it lives on another host.
 */
function holderGone(record: LockRecord): 'holder dead' | 'pid reused' | null {
  if (record.hostname !== hostname()) return null;
  if (!isProcessAlive(record.holderProcessId)) return 'holder dead';
  if (record.holderStartTime === null) return null;
  const startTime = processStartTime(record.holderProcessId);
  return startTime !== null && startTime !== record.holderStartTime ? 'pid reused' : null;
}

export class LockManager {
  readonly lockDir: string;
  readonly auditLog: string;
  readonly holderPid: number;
  private readonly defaultTimeoutMs: number;
  private readonly stalenessThresholdMs: number;
  private readonly retryBaseMs: number;
  private readonly retryMaxMs: number;
  private readonly held = new Map<string, LeaseHandle>();

  constructor(options: LockManagerOptions) {
    this.lockDir = options.lockDir;
    this.auditLog = options.auditLog ?? join(options.lockDir, 'audit.log');
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30_000;
    this.stalenessThresholdMs = options.stalenessThresholdMs ?? 300_000;
    this.retryBaseMs = options.retryBaseMs ?? 25;
    this.retryMaxMs = options.retryMaxMs ?? 1_000;
    this.holderPid = options.holderPid ?? process.pid;
  }

  static fromConfig(config: CoordinatorConfig, overrides: Partial<LockManagerOptions> = {}): LockManager {
    return new LockManager({
      lockDir: config.paths.lockDir,
      auditLog: config.paths.auditLog,
      ...config.locks,
      ...overrides,
    });
  }

  /** Leases this manager currently holds, in acquisition order. */
  heldLeases(): LeaseHandle[] {
    return [...this.held.values()];
  }

  exclusivePath(resource: string): string {
    return join(this.lockDir, `${sanitizeResource(resource)}.lock`);
  }

  private sharedPrefix(resource: string): string {
    return `${sanitizeResource(resource)}.shared.`;
  }

  private sharedPaths(resource: string): string[] {
    if (!existsSync(this.lockDir)) return [];
    const prefix = this.sharedPrefix(resource);
    return readdirSync(this.lockDir)
      .filter((f) => f.startsWith(prefix) && f.endsWith('.lock'))
      .map((f) => join(this.lockDir, f));
  }

  /**
   * Acquire a lease on `resource`, waiting up to the timeout.
   * @throws LockTimeoutError when the lease is not granted in time
   * @throws LockOrderError when the request breaks the canonical order
   */
  async acquire(resource: string, options: AcquireOptions = {}): Promise<LeaseHandle> {
    const mode = options.mode ?? 'exclusive';
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    this.checkOrder(resource);
    mkdirSync(this.lockDir, { recursive: true });

    const startTime = Date.now();
    const deadline = startTime + timeoutMs;
    const leaseId = randomUUID();
    const record = this.buildRecord(resource, mode, leaseId, options.metadata ?? {});
    const lockPath =
      mode === 'exclusive'
        ? this.exclusivePath(resource)
        : join(this.lockDir, `${this.sharedPrefix(resource)}${leaseId}.lock`);

    let attempts = 0;
    let delay = this.retryBaseMs;
    const waitOrTimeout = async (reason: string): Promise<void> => {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        const holder = readLockFile(this.exclusivePath(resource));
        this.audit({
          resource,
          mode,
          leaseId,
          outcome: 'timeout',
          durationMs: Date.now() - startTime,
          attempts,
          reason,
        });
        logger.warn(`Timed out waiting for ${resource}`, { resource, mode, attempt: attempts });
        throw new LockTimeoutError(resource, timeoutMs, {
          mode,
          attempts,
          reason,
          holder: holder.kind === 'ok' ? holder.record.holderProcessId : null,
        });
      }
      await sleep(Math.min(delay, remaining));
      delay = Math.min(delay * 2, this.retryMaxMs);
    };

    while (true) {
      attempts++;
      if (mode === 'exclusive') {
        if (createIfAbsent(lockPath, JSON.stringify(record, null, 2))) {
          // Announced: no new shared lease can be granted; wait for existing ones to drain
          while (this.liveSharedCount(resource) > 0) {
            try {
              await waitOrTimeout('shared holders did not drain');
            } catch (error) {
              this.removeIfOwned(lockPath, leaseId);
              throw error;
            }
          }
          return this.grant(resource, mode, leaseId, lockPath, record, startTime, attempts);
        }
        if (this.reclaimIfStale(lockPath, resource)) continue;
        await waitOrTimeout('held exclusively');
        continue;
      }

      // Shared: no exclusive may be present before and after announcing
      const exclusive = this.exclusivePath(resource);
      if (existsSync(exclusive)) {
        if (this.reclaimIfStale(exclusive, resource)) continue;
        await waitOrTimeout('held exclusively');
        continue;
      }
      writeFileSync(lockPath, JSON.stringify(record, null, 2), { encoding: 'utf-8', flag: 'wx' });
      if (existsSync(exclusive)) {
        unlinkSync(lockPath);
        await waitOrTimeout('exclusive request pending');
        continue;
      }
      return this.grant(resource, mode, leaseId, lockPath, record, startTime, attempts);
    }
  }

  /**
   * Release a lease.
   * @throws NotHeldError when the lock file is gone or belongs to another lease
   */
  release(handle: LeaseHandle): void {
    const current = readLockFile(handle.lockPath);
    this.held.delete(handle.leaseId);
    if (current.kind !== 'ok' || current.record.leaseId !== handle.leaseId) {
      this.audit({
        resource: handle.resource,
        mode: handle.mode,
        leaseId: handle.leaseId,
        outcome: 'not-held',
        durationMs: Date.now() - handle.acquiredAtMs,
      });
      throw new NotHeldError(handle.resource, { leaseId: handle.leaseId });
    }
    unlinkSync(handle.lockPath);
    this.audit({
      resource: handle.resource,
      mode: handle.mode,
      leaseId: handle.leaseId,
      outcome: 'released',
      durationMs: Date.now() - handle.acquiredAtMs,
    });
    logger.debug(`Released lock on ${handle.resource}`, { resource: handle.resource, leaseId: handle.leaseId });
  }

  /**
   * Release every lease this holder pid has on `resource`, whoever created it.
   * @returns number of lock files removed
   */
  releaseResource(resource: string): number {
    const paths = [this.exclusivePath(resource), ...this.sharedPaths(resource)];
    let released = 0;
    for (const lockPath of paths) {
      const current = readLockFile(lockPath);
      if (current.kind !== 'ok' || current.record.holderProcessId !== this.holderPid) continue;
      unlinkSync(lockPath);
      this.held.delete(current.record.leaseId);
      released++;
      this.audit({
        resource,
        mode: current.record.mode,
        leaseId: current.record.leaseId,
        outcome: 'released',
        durationMs: Date.now() - current.record.acquiredAtMs,
      });
    }
    if (released === 0) {
      throw new NotHeldError(resource, { holderPid: this.holderPid });
    }
    return released;
  }

  releaseAll(): number {
    let released = 0;
    for (const handle of [...this.held.values()].reverse()) {
      try {
        this.release(handle);
        released++;
      } catch (error) {
        logger.warn(`Lease on ${handle.resource} was already gone`, {
          resource: handle.resource,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }
    return released;
  }

  /**
   * Acquire several resources in canonical order.
   * On any failure the leases taken so far are released again.
   */
  async acquireAll(resources: readonly string[], options: AcquireOptions = {}): Promise<LeaseHandle[]> {
    const leases: LeaseHandle[] = [];
    try {
      for (const resource of sortByPriority(resources)) {
        leases.push(await this.acquire(resource, options));
      }
      return leases;
    } catch (error) {
      for (const lease of leases.reverse()) {
        this.release(lease);
      }
      throw error;
    }
  }

  async withLock<T>(resource: string, fn: (lease: LeaseHandle) => Promise<T> | T, options: AcquireOptions = {}): Promise<T> {
    const lease = await this.acquire(resource, options);
    try {
      return await fn(lease);
    } finally {
      this.release(lease);
    }
  }

  check(resource: string): LockCheck {
    const now = Date.now();
    const holders: { holderProcessId: number; leaseId: string; ageMs: number; stale: boolean }[] = [];
    let mode: LockMode = 'shared';

    for (const lockPath of [this.exclusivePath(resource), ...this.sharedPaths(resource)]) {
      const current = readLockFile(lockPath);
      if (current.kind !== 'ok') continue;
      if (current.record.mode === 'exclusive') mode = 'exclusive';
      holders.push({
        holderProcessId: current.record.holderProcessId,
        leaseId: current.record.leaseId,
        ageMs: now - current.record.acquiredAtMs,
        stale: this.isStale(current.record),
      });
    }

    if (holders.length === 0) return { resource, status: 'free' };
    return { resource, status: 'held', mode, holders };
  }

  list(): LockListing[] {
    if (!existsSync(this.lockDir)) return [];
    const now = Date.now();
    return readdirSync(this.lockDir)
      .filter((f) => f.endsWith('.lock'))
      .sort()
      .map((file): LockListing => {
        const current = readLockFile(join(this.lockDir, file));
        if (current.kind !== 'ok') {
          return { file, status: 'corrupt', record: null, ageMs: null };
        }
        return {
          file,
          status: this.isStale(current.record) ? 'stale' : 'valid',
          record: current.record,
          ageMs: now - current.record.acquiredAtMs,
        };
      });
  }

  /**
   * Reclaim every lock whose holder is dead, whose age exceeds the threshold
   * (or `maxAgeMs` when given), or whose file is corrupt. Orphaned temp files
   * older than the staleness threshold are removed too.
   * @returns count of reclaimed lock files
   */
  cleanup(maxAgeMs?: number): number {
    if (!existsSync(this.lockDir)) return 0;
    sweepTempFiles(this.lockDir, this.stalenessThresholdMs);
    let cleaned = 0;
    for (const file of readdirSync(this.lockDir)) {
      if (!file.endsWith('.lock')) continue;
      const lockPath = join(this.lockDir, file);
      const current = readLockFile(lockPath);
      if (current.kind === 'missing') continue;
      const reclaimable =
        current.kind === 'corrupt' || this.isStale(current.record, maxAgeMs ?? this.stalenessThresholdMs);
      if (reclaimable && this.reclaim(lockPath, current.kind === 'ok' ? current.record : null, file)) {
        cleaned++;
      }
    }
    if (cleaned > 0) {
      logger.info(`Cleaned up ${cleaned} stale lock(s)`, { count: cleaned });
    }
    return cleaned;
  }

  isStale(record: LockRecord, thresholdMs: number = this.stalenessThresholdMs): boolean {
    if (Date.now() - record.acquiredAtMs > thresholdMs) return true;
    return holderGone(record) !== null;
  }

  private checkOrder(resource: string): void {
    for (const lease of this.held.values()) {
      if (lease.resource === resource || lockPriority(resource) < lockPriority(lease.resource)) {
        throw new LockOrderError(resource, lease.resource);
      }
    }
  }

  private buildRecord(
    resource: string,
    mode: LockMode,
    leaseId: string,
    metadata: Record<string, unknown>
  ): LockRecord {
    const now = Date.now();
    return {
      resourceName: resource,
      mode,
      holderProcessId: this.holderPid,
      holderStartTime: processStartTime(this.holderPid),
      leaseId,
      hostname: hostname(),
      acquiredAt: new Date(now).toISOString(),
      acquiredAtMs: now,
      expiresAt: new Date(now + this.stalenessThresholdMs).toISOString(),
      metadata,
    };
  }

  private grant(
    resource: string,
    mode: LockMode,
    leaseId: string,
    lockPath: string,
    record: LockRecord,
    startTime: number,
    attempts: number
  ): LeaseHandle {
    const handle: LeaseHandle = {
      resource,
      mode,
      leaseId,
      lockPath,
      holderPid: this.holderPid,
      acquiredAtMs: record.acquiredAtMs,
    };
    this.held.set(leaseId, handle);
    this.audit({ resource, mode, leaseId, outcome: 'acquired', durationMs: Date.now() - startTime, attempts });
    logger.debug(`Acquired lock on ${resource}`, { resource, mode, leaseId, attempt: attempts });
    return handle;
  }

  private liveSharedCount(resource: string): number {
    let live = 0;
    for (const lockPath of this.sharedPaths(resource)) {
      if (!this.reclaimIfStale(lockPath, resource) && existsSync(lockPath)) live++;
    }
    return live;
  }

  /**
   * @returns true when the entry at `lockPath` is gone (reclaimed or released meanwhile)
   */
  private reclaimIfStale(lockPath: string, resource: string): boolean {
    const current = readLockFile(lockPath);
    if (current.kind === 'missing') return true;
    if (current.kind === 'ok' && !this.isStale(current.record)) return false;
    return this.reclaim(lockPath, current.kind === 'ok' ? current.record : null, resource);
  }

  /**
   * Move the entry aside, then confirm it is the one judged stale.
   * A fresh lease that slipped in between is put back.
   */
  private reclaim(lockPath: string, judged: LockRecord | null, label: string): boolean {
    const tombstone = `${lockPath}.${randomUUID()}.reclaim`;
    try {
      renameSync(lockPath, tombstone);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return true;
      throw error;
    }

    const moved = readLockFile(tombstone);
    const sameLease =
      judged === null ? moved.kind !== 'ok' : moved.kind === 'ok' && moved.record.leaseId === judged.leaseId;
    if (!sameLease) {
      try {
        linkSync(tombstone, lockPath);
      } catch (error) {
        if (errorCode(error) !== 'EEXIST') throw error;
        logger.warn(`Could not restore lease moved during reclaim of ${label}`, { path: lockPath });
      }
      unlinkSync(tombstone);
      return false;
    }

    unlinkSync(tombstone);
    const resource = judged?.resourceName ?? label;
    this.audit({
      resource,
      mode: judged?.mode ?? 'unknown',
      leaseId: judged?.leaseId ?? null,
      outcome: 'reclaimed',
      durationMs: judged ? Date.now() - judged.acquiredAtMs : 0,
      reason: judged === null ? 'corrupt' : (holderGone(judged) ?? 'expired'),
    });
    logger.warn(`Reclaimed stale lock on ${resource}`, {
      resource,
      pid: judged?.holderProcessId,
      leaseId: judged?.leaseId,
    });
    return true;
  }

  private removeIfOwned(lockPath: string, leaseId: string): void {
    const current = readLockFile(lockPath);
    if (current.kind === 'ok' && current.record.leaseId === leaseId) {
      unlinkSync(lockPath);
    }
  }

  private audit(entry: Omit<AuditEntry, 'timestamp' | 'pid'>): void {
    const line: AuditEntry = { timestamp: new Date().toISOString(), pid: this.holderPid, ...entry };
    try {
      mkdirSync(dirname(this.auditLog), { recursive: true });
      appendFileSync(this.auditLog, JSON.stringify(line) + '\n');
    } catch (error) {
      logger.warn('Could not append to lock audit trail', {
        path: this.auditLog,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }
}

const AuditEntrySchema = z.object({
  timestamp: z.string(),
  resource: z.string(),
  mode: z.enum(['exclusive', 'shared', 'unknown']),
  pid: z.number(),
  leaseId: z.string().nullable(),
  outcome: z.enum(['acquired', 'released', 'timeout', 'reclaimed', 'not-held']),
  durationMs: z.number(),
  attempts: z.number().optional(),
  reason: z.string().optional(),
});

/**
 * Read the audit trail back, oldest first.
 */
export function readAuditTrail(auditLog: string): AuditEntry[] {
  if (!existsSync(auditLog)) return [];
  const entries: AuditEntry[] = [];
  for (const line of readFileSync(auditLog, 'utf-8').split('\n')) {
    if (!line.trim()) continue;
    try {
      entries.push(AuditEntrySchema.parse(JSON.parse(line)));
    } catch (error) {
      logger.debug('Skipping unreadable audit line', {
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }
  return entries;
}
