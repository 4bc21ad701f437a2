/**
 * Workspace Manager - isolated git worktrees per unit of work
 *
 * Lifecycle: active -> validating -> {merged | conflict} -> {archived | failed}
 *
 * Every index change happens under the `workspace-index` lock and every
 * trunk integration under the `trunk` lock. A merge holds `workspace-index`
 * from its dependency check until the merged record is written, and takes
 * `trunk` inside it, so a later merge always sees the earlier one's paths.
 * State is written only after both are released.
 */

import { existsSync, mkdirSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join, relative, sep, isAbsolute } from 'path';
import { ComponentLogger } from '../shared/src/logger.js';
import type { CoordinatorConfig, MergeStrategy, WorkspaceConfig } from '../shared/src/config.js';
import {
  AlreadyExistsError,
  DependencyPendingError,
  DirtyStateError,
  IsolationViolationError,
  LockTimeoutError,
  MergeConflictError,
  TrunkDivergedError,
  ValidationFailedError,
  WorkspaceNotFoundError,
  asMessage,
} from '../shared/src/errors.js';
import { atomicWrite, isProcessAlive, type LeaseHandle, type LockManager } from './fileLock.js';
import type { JsonDocumentStore } from './documentStore.js';
import type { StateStore } from './stateManager.js';
import { GitClient, canonicalPath } from './git.js';
import {
  TERMINAL_STATUSES,
  WORKSPACE_INDEX_RESOURCE,
  createWorkspaceIndex,
  type Resolution,
  type WorkspaceIndex,
  type WorkspaceRecord,
  type WorkspaceStatus,
} from './worktreeIndex.js';

const logger = new ComponentLogger('WorkspaceManager');

export const TRUNK_RESOURCE = 'trunk';
export const ARCHIVE_FEATURE = 'workspace-archive';

/** Degraded-mode gate consulted before optional capabilities. */
export interface FeatureGate {
  requireFeature(feature: string): void;
}

export interface CreateOptions {
  dependsOn?: string[];
  allowedPaths?: string[];
}

export interface ValidationResult {
  name: string;
  branch: string;
  basePoint: string;
  head: string;
  changedPaths: string[];
}

export interface MergeResult {
  name: string;
  strategy: MergeStrategy;
  mergeCommit: string;
  changedPaths: string[];
  alreadyMerged: boolean;
}

export interface CleanupOptions {
  archive?: boolean;
  force?: boolean;
}

export interface CleanupResult {
  name: string;
  status: WorkspaceStatus;
  archivePath: string | null;
}

export interface WorkspaceDetail {
  record: WorkspaceRecord;
  exists: boolean;
  registered: boolean;
  head: string | null;
  uncommitted: string[];
}

export interface RepairReport {
  pruned: boolean;
  removedRecords: string[];
  orphans: string[];
  reset: { name: string; from: WorkspaceStatus; to: WorkspaceStatus }[];
  skipped: string[];
}

/**
 * Turn a task key into a workspace name usable as a directory and a branch.
 */
export function sanitizeWorkspaceName(taskKey: string): string {
  const name = taskKey
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, '-')
    .replace(/\.{2,}/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^[-.]+|[-.]+$/g, '')
    .replace(/\.lock$/, '-lock')
    .slice(0, 100);
  if (!name) {
    throw new ValidationFailedError(`Task key "${taskKey}" yields an empty workspace name`, ['taskKey: empty']);
  }
  return name;
}

export function taskKeyFor(phase: string, task: string): string {
  return `${phase}-${task}`;
}

function within(path: string, scope: string): boolean {
  const normalized = scope.replace(/\/+$/, '');
  return path === normalized || path.startsWith(`${normalized}/`);
}

function isInside(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel) && rel.split(sep)[0] !== '..');
}

function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

export class WorkspaceManager {
  readonly index: JsonDocumentStore<WorkspaceIndex>;
  readonly git: GitClient;
  private readonly settings: WorkspaceConfig;
  private readonly repoDir: string;
  private readonly workspaceDir: string;
  private readonly archiveDir: string;
  private readonly stalenessThresholdMs: number;

  constructor(
    config: CoordinatorConfig,
    private readonly locks: LockManager,
    private readonly state: StateStore,
    private readonly features?: FeatureGate
  ) {
    this.index = createWorkspaceIndex(config, locks);
    this.settings = config.workspace;
    this.repoDir = config.paths.repoDir;
    this.workspaceDir = config.paths.workspaceDir;
    this.archiveDir = config.paths.archiveDir;
    this.stalenessThresholdMs = config.locks.stalenessThresholdMs;
    this.git = new GitClient(this.repoDir);
  }

  /**
   * Create a worktree on a fresh branch rooted at `basePoint` (trunk by default).
   * @throws AlreadyExistsError when the record, directory or branch already exists
   */
  async create(taskKey: string, basePoint?: string, options: CreateOptions = {}): Promise<WorkspaceRecord> {
    const name = sanitizeWorkspaceName(taskKey);
    const branch = `${this.settings.branchPrefix}${name}`;
    const path = join(this.workspaceDir, name);
    const baseRef = basePoint ?? this.settings.trunkBranch;

    await this.index.read();
    return this.locks.withLock(WORKSPACE_INDEX_RESOURCE, async (lease) => {
      const { document } = await this.index.read();
      const existing = document.workspaces[name];
      if (existing) {
        throw new AlreadyExistsError('Workspace', name, { status: existing.status });
      }
      if (existsSync(path)) {
        throw new AlreadyExistsError('Workspace', name, { reason: 'directory exists', path });
      }
      if (await this.git.branchExists(branch)) {
        throw new AlreadyExistsError('Workspace', name, { reason: 'branch exists', branch });
      }

      const dependsOn = [...new Set(options.dependsOn ?? [])];
      const unknown = dependsOn.filter((dep) => !document.workspaces[dep]);
      if (unknown.length) {
        throw new ValidationFailedError(
          `Workspace ${name} depends on unknown workspaces`,
          unknown.map((dep) => `dependsOn: unknown workspace "${dep}"`)
        );
      }

      const sha = await this.git.resolveCommit(baseRef);
      if (!sha) {
        throw new ValidationFailedError(`Base point ${baseRef} is not a commit`, [`basePoint: unknown ref "${baseRef}"`]);
      }

      mkdirSync(this.workspaceDir, { recursive: true });
      await this.git.worktreeAdd(path, branch, sha);

      const now = new Date().toISOString();
      const record: WorkspaceRecord = {
        name,
        taskKey,
        status: 'active',
        branch,
        basePoint: sha,
        baseRef,
        path,
        createdAt: now,
        lastActivityAt: now,
        changedPaths: [],
        mergeStatus: 'pending',
        dependsOn,
        allowedPaths: options.allowedPaths?.length ? options.allowedPaths : null,
        conflicts: [],
        resolutions: {},
        strategy: null,
        mergeOwner: null,
        mergeCommit: null,
        mergedAt: null,
        archivePath: null,
        failureReason: null,
      };

      try {
        await this.index.write(
          (doc) => {
            doc.workspaces[name] = record;
            return doc;
          },
          `workspace:create:${name}`,
          { heldLease: lease }
        );
      } catch (error) {
        // Leave nothing behind when the record cannot be stored
        await this.git.worktreeRemove(path);
        await this.git.deleteBranch(branch);
        throw error;
      }

      logger.info(`Created workspace ${name} at ${sha.slice(0, 12)}`, { workspace: name, path });
      return record;
    });
  }

  /**
   * Check the isolation invariants of a workspace.
   * @throws DirtyStateError for uncommitted or untracked files in the workspace
   * @throws IsolationViolationError for a missing completion marker, a modified
   *   trunk checkout, foreign history or changes outside the declared scope
   */
  async validate(name: string): Promise<ValidationResult> {
    return this.validateRecord(await this.get(name));
  }

  private async validateRecord(record: WorkspaceRecord): Promise<ValidationResult> {
    const name = record.name;
    if (TERMINAL_STATUSES.includes(record.status)) {
      throw new ValidationFailedError(`Workspace ${name} is ${record.status}`, [`status: ${record.status}`]);
    }

    const registered = await this.isRegistered(record.path);
    if (!registered || !existsSync(record.path)) {
      throw new WorkspaceNotFoundError(name);
    }

    const marker = this.settings.completionMarker;
    if (this.settings.requireCompletionMarker && !existsSync(join(record.path, marker))) {
      throw new IsolationViolationError(name, 'completion marker missing', [marker]);
    }

    const uncommitted = (await this.git.status(record.path)).map((e) => e.path).filter((p) => p !== marker);
    if (uncommitted.length) {
      throw new DirtyStateError(name, uncommitted);
    }

    const trunkChanges = (await this.git.status(this.repoDir, false)).map((e) => e.path);
    if (trunkChanges.length) {
      throw new IsolationViolationError(name, 'trunk checkout has uncommitted modifications', trunkChanges);
    }

    const head = await this.git.resolveCommit(record.branch);
    if (!head) {
      throw new WorkspaceNotFoundError(name);
    }
    if (!(await this.git.isAncestor(record.basePoint, head))) {
      throw new IsolationViolationError(name, 'branch history does not descend from the base point', [record.branch]);
    }

    const changedPaths = await this.git.diffNames([`${record.basePoint}...${head}`]);
    if (record.allowedPaths) {
      const scopes = record.allowedPaths;
      const outside = changedPaths.filter((p) => !scopes.some((scope) => within(p, scope)));
      if (outside.length) {
        throw new IsolationViolationError(name, 'changes outside the declared scope', outside);
      }
    }

    return { name, branch: record.branch, basePoint: record.basePoint, head, changedPaths };
  }

  /**
   * Integrate a workspace into the trunk.
   * @throws DependencyPendingError when a declared dependency is not merged yet
   * @throws MergeConflictError with the conflicting paths; the trunk is left untouched
   * @throws TrunkDivergedError when a fast-forward is requested but trunk moved on
   */
  async merge(name: string, strategy: MergeStrategy = this.settings.defaultStrategy): Promise<MergeResult> {
    // Repair a corrupt index before taking its lock
    await this.index.read();
    const { result, record } = await this.locks.withLock(
      WORKSPACE_INDEX_RESOURCE,
      (lease) => this.mergeLocked(name, strategy, lease),
      { metadata: { workspace: name } }
    );
    if (result.alreadyMerged) {
      return result;
    }
    await this.recordCompletion(record);

    logger.info(`Merged workspace ${name} (${strategy})`, { workspace: name });
    return result;
  }

  private async mergeLocked(
    name: string,
    strategy: MergeStrategy,
    lease: LeaseHandle
  ): Promise<{ result: MergeResult; record: WorkspaceRecord }> {
    const { document: index } = await this.index.read();
    const record = index.workspaces[name];
    if (!record) {
      throw new WorkspaceNotFoundError(name);
    }
    if (record.status === 'merged' || (record.status === 'archived' && record.mergeCommit)) {
      const result: MergeResult = {
        name,
        strategy: record.strategy ?? strategy,
        mergeCommit: record.mergeCommit ?? '',
        changedPaths: record.changedPaths,
        alreadyMerged: true,
      };
      return { result, record };
    }

    const pending = record.dependsOn.filter((dep) => {
      const status = index.workspaces[dep]?.status;
      return status !== 'merged' && status !== 'archived';
    });
    if (pending.length) {
      throw new DependencyPendingError(name, pending);
    }

    const report = await this.validateRecord(record);
    await this.updateRecord(
      name,
      `workspace:validating:${name}`,
      (rec) => {
        rec.status = 'validating';
        rec.changedPaths = report.changedPaths;
        rec.strategy = strategy;
        rec.mergeOwner = { pid: this.locks.holderPid, since: new Date().toISOString() };
      },
      lease
    );

    let trunkLease: LeaseHandle;
    try {
      trunkLease = await this.locks.acquire(TRUNK_RESOURCE, { metadata: { workspace: name } });
    } catch (error) {
      await this.recordMergeFailure(name, error, lease);
      throw error;
    }

    try {
      let mergeCommit: string;
      try {
        mergeCommit = await logger.timedAsync(
          `Integrate ${name}`,
          () => this.integrate(record, report, strategy, index),
          { workspace: name }
        );
      } catch (error) {
        await this.recordMergeFailure(name, error, lease);
        throw error;
      }

      const mergedAt = new Date().toISOString();
      const merged = await this.updateRecord(
        name,
        `workspace:merged:${name}`,
        (rec) => {
          rec.status = 'merged';
          rec.mergeStatus = 'merged';
          rec.mergeCommit = mergeCommit;
          rec.mergedAt = mergedAt;
          rec.conflicts = [];
          rec.resolutions = {};
          rec.mergeOwner = null;
          rec.failureReason = null;
        },
        lease
      );
      const result: MergeResult = { name, strategy, mergeCommit, changedPaths: report.changedPaths, alreadyMerged: false };
      return { result, record: merged };
    } finally {
      this.locks.release(trunkLease);
    }
  }

  private async recordMergeFailure(name: string, error: unknown, lease: LeaseHandle): Promise<void> {
    if (error instanceof TrunkDivergedError) {
      await this.updateRecord(
        name,
        `workspace:diverged:${name}`,
        (rec) => {
          rec.status = 'active';
          rec.mergeStatus = 'aborted';
          rec.conflicts = [];
          rec.mergeOwner = null;
          rec.failureReason = error.reason;
        },
        lease
      );
      logger.warn(`Merge of ${name} stopped: ${error.reason}`, { workspace: name });
    } else if (error instanceof MergeConflictError) {
      await this.updateRecord(
        name,
        `workspace:conflict:${name}`,
        (rec) => {
          rec.status = 'conflict';
          rec.mergeStatus = 'conflict';
          rec.conflicts = error.conflicts;
          rec.mergeOwner = null;
        },
        lease
      );
      logger.warn(`Merge of ${name} stopped on conflicts`, { workspace: name, count: error.conflicts.length });
    } else {
      await this.updateRecord(
        name,
        `workspace:merge-aborted:${name}`,
        (rec) => {
          rec.status = 'active';
          rec.mergeStatus = 'aborted';
          rec.mergeOwner = null;
          rec.failureReason = asMessage(error);
        },
        lease
      );
      logger.error(`Merge of ${name} aborted`, {
        workspace: name,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  /** Keep the trunk version of a conflicting path. */
  async acceptOurs(name: string, path: string): Promise<WorkspaceRecord> {
    return this.recordResolution(name, path, { strategy: 'ours' });
  }

  /** Take the workspace version of a conflicting path. */
  async acceptTheirs(name: string, path: string): Promise<WorkspaceRecord> {
    return this.recordResolution(name, path, { strategy: 'theirs' });
  }

  /** Supply the merged content of a conflicting path. */
  async provideResolved(name: string, path: string, content: string): Promise<WorkspaceRecord> {
    return this.recordResolution(name, path, { strategy: 'content', content });
  }

  /**
   * Remove a workspace's worktree and branch, optionally archiving its change set first.
   * Unmerged work is only discarded with `force`, and the record then ends `failed`.
   */
  async cleanup(name: string, options: CleanupOptions = {}): Promise<CleanupResult> {
    if (options.archive) {
      this.features?.requireFeature(ARCHIVE_FEATURE);
    }

    await this.index.read();
    return this.locks.withLock(WORKSPACE_INDEX_RESOURCE, async (lease) => {
      const record = await this.get(name);
      if (TERMINAL_STATUSES.includes(record.status)) {
        await this.removePhysical(record);
        return { name, status: record.status, archivePath: record.archivePath };
      }
      if (record.status !== 'merged' && !options.force) {
        throw new DirtyStateError(name, record.changedPaths, `unmerged work in status ${record.status} (use force to abandon)`);
      }

      const archivePath = options.archive ? await this.archive(record) : null;
      await this.removePhysical(record);

      const status: WorkspaceStatus = record.status === 'merged' ? 'archived' : 'failed';
      await this.index.write(
        (doc) => {
          const rec = doc.workspaces[name];
          if (!rec) return doc;
          rec.status = status;
          rec.archivePath = archivePath;
          rec.lastActivityAt = new Date().toISOString();
          rec.mergeOwner = null;
          if (status === 'failed') {
            rec.failureReason = 'abandoned';
            rec.mergeStatus = rec.mergeStatus === 'pending' ? 'aborted' : rec.mergeStatus;
          }
          return doc;
        },
        `workspace:cleanup:${name}`,
        { heldLease: lease }
      );

      logger.info(`Cleaned up workspace ${name} (${status})`, { workspace: name, path: archivePath ?? undefined });
      return { name, status, archivePath };
    });
  }

  /**
   * Clean up every merged workspace.
   */
  async cleanupCompleted(options: Pick<CleanupOptions, 'archive'> = {}): Promise<CleanupResult[]> {
    const results: CleanupResult[] = [];
    for (const record of await this.list({ status: 'merged' })) {
      results.push(await this.cleanup(record.name, { archive: options.archive }));
    }
    return results;
  }

  async list(filter: { status?: WorkspaceStatus } = {}): Promise<WorkspaceRecord[]> {
    const { document } = await this.index.read();
    return Object.values(document.workspaces)
      .filter((rec) => filter.status === undefined || rec.status === filter.status)
      .sort((a, b) => (a.createdAt === b.createdAt ? a.name.localeCompare(b.name) : a.createdAt < b.createdAt ? -1 : 1));
  }

  async get(name: string): Promise<WorkspaceRecord> {
    const { document } = await this.index.read();
    const record = document.workspaces[name];
    if (!record) {
      throw new WorkspaceNotFoundError(name);
    }
    return record;
  }

  /**
   * Record plus what the filesystem and git currently say about it.
   */
  async status(name: string): Promise<WorkspaceDetail> {
    const record = await this.get(name);
    const exists = existsSync(record.path);
    const registered = await this.isRegistered(record.path);
    const head = await this.git.resolveCommit(record.branch);
    const uncommitted = exists && registered ? (await this.git.status(record.path)).map((e) => e.path) : [];
    return { record, exists, registered, head, uncommitted };
  }

  async summary(): Promise<{ total: number; byStatus: Record<WorkspaceStatus, number>; workspaces: WorkspaceRecord[] }> {
    const workspaces = await this.list();
    const byStatus: Record<WorkspaceStatus, number> = {
      active: 0,
      validating: 0,
      merged: 0,
      conflict: 0,
      archived: 0,
      failed: 0,
    };
    for (const rec of workspaces) byStatus[rec.status]++;
    return { total: workspaces.length, byStatus, workspaces };
  }

  /**
   * The workspace containing `cwd`, if any.
   */
  async current(cwd: string = process.cwd()): Promise<WorkspaceRecord | null> {
    const here = canonicalPath(cwd);
    for (const record of await this.list()) {
      if (TERMINAL_STATUSES.includes(record.status)) continue;
      if (isInside(here, canonicalPath(record.path))) return record;
    }
    return null;
  }

  /**
   * Reconcile the index with git and the filesystem after a crash.
   */
  async repair(): Promise<RepairReport> {
    const report: RepairReport = { pruned: false, removedRecords: [], orphans: [], reset: [], skipped: [] };
    const newlyMerged: WorkspaceRecord[] = [];

    // Reads under the index lock must not need to repair the file
    await this.index.read();
    await this.locks.withLock(WORKSPACE_INDEX_RESOURCE, async (lease) => {
      await this.git.worktreePrune();
      report.pruned = true;

      const { document } = await this.index.read();
      const registered = new Set((await this.git.worktreeList()).map((w) => canonicalPath(w.path)));
      const known = new Set(Object.values(document.workspaces).map((rec) => canonicalPath(rec.path)));
      const updates = new Map<string, Partial<WorkspaceRecord>>();
      const removals: string[] = [];

      for (const record of Object.values(document.workspaces)) {
        if (TERMINAL_STATUSES.includes(record.status)) continue;
        const present = existsSync(record.path) && registered.has(canonicalPath(record.path));

        if (!present) {
          if (record.status === 'merged') {
            updates.set(record.name, { status: 'archived', failureReason: 'worktree removed outside cleanup' });
            report.reset.push({ name: record.name, from: 'merged', to: 'archived' });
          } else {
            removals.push(record.name);
          }
          continue;
        }

        if (record.status !== 'validating') continue;
        const owner = record.mergeOwner;
        const ownerActive =
          owner !== null &&
          isProcessAlive(owner.pid) &&
          Date.now() - Date.parse(owner.since) <= this.stalenessThresholdMs;
        if (ownerActive) {
          report.skipped.push(record.name);
          continue;
        }

        const outcome = await this.resolveInterruptedMerge(record);
        if (outcome === null) {
          report.skipped.push(record.name);
          continue;
        }
        updates.set(record.name, outcome);
        if (outcome.status === 'merged') newlyMerged.push(record);
        report.reset.push({ name: record.name, from: 'validating', to: outcome.status ?? 'active' });
      }

      const candidates = [
        ...[...registered].filter((p) => isInside(p, canonicalPath(this.workspaceDir))),
        ...(existsSync(this.workspaceDir)
          ? readdirSync(this.workspaceDir).map((entry) => canonicalPath(join(this.workspaceDir, entry)))
          : []),
      ];
      report.orphans = [...new Set(candidates)].filter((p) => !known.has(p) && p !== canonicalPath(this.workspaceDir));

      if (removals.length || updates.size) {
        await this.index.write(
          (doc) => {
            for (const name of removals) delete doc.workspaces[name];
            for (const [name, patch] of updates) {
              const rec = doc.workspaces[name];
              if (rec) doc.workspaces[name] = { ...rec, ...patch, mergeOwner: null, lastActivityAt: new Date().toISOString() };
            }
            return doc;
          },
          'workspace:repair',
          { heldLease: lease }
        );
      }
      report.removedRecords = removals;
    });

    for (const record of newlyMerged) {
      await this.recordCompletion(record);
    }
    if (report.orphans.length) {
      logger.warn(`Found ${report.orphans.length} orphaned workspace(s)`, { count: report.orphans.length });
    }
    logger.info('Workspace index repaired', { count: report.removedRecords.length + report.reset.length });
    return report;
  }

  /**
   * Runs under both locks, against the index as read under `workspace-index`.
   * Returns the new trunk head.
   */
  private async integrate(
    record: WorkspaceRecord,
    report: ValidationResult,
    strategy: MergeStrategy,
    index: WorkspaceIndex
  ): Promise<string> {
    const trunk = this.settings.trunkBranch;
    const resolutions = record.resolutions;

    const trunkChanges = (await this.git.status(this.repoDir, false)).map((e) => e.path);
    if (trunkChanges.length) {
      throw new IsolationViolationError(record.name, 'trunk checkout has uncommitted modifications', trunkChanges);
    }

    const overlaps = await this.overlapWithMerged(record, report.changedPaths, index);
    const unresolvedOverlap = overlaps.paths.filter((p) => !(p in resolutions));
    if (unresolvedOverlap.length) {
      throw new MergeConflictError(
        record.name,
        unresolvedOverlap,
        `change set overlaps merged workspace(s) ${overlaps.workspaces.join(', ')}`
      );
    }
    if (strategy === 'fast-forward' && Object.keys(resolutions).length) {
      throw new MergeConflictError(
        record.name,
        Object.keys(resolutions),
        'recorded resolutions need a three-way or squash merge'
      );
    }

    if ((await this.git.currentBranch(this.repoDir)) !== trunk) {
      await this.git.run(['checkout', trunk]);
    }
    const preHead = await this.git.resolveCommit('HEAD');
    if (!preHead) {
      throw new ValidationFailedError(`Trunk ${trunk} has no commits`, ['trunk: empty']);
    }

    try {
      if (strategy === 'fast-forward') {
        const ff = await this.git.run(['merge', '--ff-only', record.branch], { allowFailure: true });
        if (ff.exitCode !== 0) {
          throw new TrunkDivergedError(record.name);
        }
      } else {
        const args =
          strategy === 'squash'
            ? ['merge', '--squash', record.branch]
            : ['merge', '--no-ff', '--no-commit', record.branch];
        const attempt = await this.git.run(args, { allowFailure: true });
        const conflicts = await this.git.conflictedPaths();
        if (attempt.exitCode !== 0 && conflicts.length === 0) {
          throw new MergeConflictError(record.name, [], `git merge failed: ${attempt.stderr.trim()}`);
        }

        const unresolved = conflicts.filter((p) => !(p in resolutions));
        if (unresolved.length) {
          throw new MergeConflictError(record.name, unresolved, 'content conflicts');
        }
        for (const [path, resolution] of Object.entries(resolutions)) {
          await this.applyResolution(path, resolution, preHead, record.branch);
        }
        await this.commitIfStaged(strategy, record);
      }
    } catch (error) {
      await this.restoreTrunk(preHead);
      throw error;
    }

    const head = await this.git.resolveCommit('HEAD');
    return head ?? preHead;
  }

  private async applyResolution(path: string, resolution: Resolution, ours: string, theirs: string): Promise<void> {
    switch (resolution.strategy) {
      case 'ours':
        await this.git.run(['checkout', ours, '--', path]);
        break;
      case 'theirs':
        await this.git.run(['checkout', theirs, '--', path]);
        break;
      case 'content':
        atomicWrite(join(this.repoDir, path), resolution.content);
        break;
    }
    await this.git.run(['add', '--', path]);
  }

  private async commitIfStaged(strategy: MergeStrategy, record: WorkspaceRecord): Promise<void> {
    const mergeInProgress = await this.git.mergeInProgress();
    const staged = await this.git.run(['diff', '--cached', '--quiet'], { allowFailure: true });
    if (!mergeInProgress && staged.exitCode === 0) {
      return;
    }
    const message =
      strategy === 'squash'
        ? `Squash workspace ${record.name} (${record.taskKey})`
        : `Merge workspace ${record.name} (${record.taskKey})`;
    await this.git.run(['commit', '--no-verify', '-m', message]);
  }

  /**
   * Put the trunk back to `preHead`. Only tracked files were touched: the
   * checkout had no tracked modifications when the merge started.
   */
  private async restoreTrunk(preHead: string): Promise<void> {
    if (await this.git.mergeInProgress()) {
      await this.git.run(['merge', '--abort'], { allowFailure: true });
    }
    await this.git.run(['reset', '--hard', preHead]);
  }

  /**
   * Paths this change set shares with merged workspaces whose merge is not
   * already part of this workspace's base.
   */
  private async overlapWithMerged(
    record: WorkspaceRecord,
    changedPaths: string[],
    index: WorkspaceIndex
  ): Promise<{ paths: string[]; workspaces: string[] }> {
    const mine = new Set(changedPaths);
    const paths = new Set<string>();
    const workspaces: string[] = [];
    for (const other of Object.values(index.workspaces)) {
      if (other.name === record.name || !other.mergeCommit) continue;
      if (other.status !== 'merged' && other.status !== 'archived') continue;
      if (await this.git.isAncestor(other.mergeCommit, record.basePoint)) continue;
      const shared = other.changedPaths.filter((p) => mine.has(p));
      if (shared.length) {
        workspaces.push(other.name);
        shared.forEach((p) => paths.add(p));
      }
    }
    return { paths: [...paths].sort(), workspaces };
  }

  private async recordResolution(name: string, path: string, resolution: Resolution): Promise<WorkspaceRecord> {
    const record = await this.get(name);
    if (record.status !== 'conflict') {
      throw new ValidationFailedError(`Workspace ${name} is not in conflict`, [`status: ${record.status}`]);
    }
    if (!record.conflicts.includes(path)) {
      throw new ValidationFailedError(`Path ${path} is not conflicting in ${name}`, [`path: ${path}`]);
    }
    const updated = await this.updateRecord(name, `workspace:resolve:${name}`, (rec) => {
      rec.resolutions[path] = resolution;
    });
    logger.info(`Recorded ${resolution.strategy} resolution for ${path}`, { workspace: name, path });
    return updated;
  }

  private async updateRecord(
    name: string,
    label: string,
    patch: (record: WorkspaceRecord) => void,
    heldLease?: LeaseHandle
  ): Promise<WorkspaceRecord> {
    const { document } = await this.index.write(
      (doc) => {
        const rec = doc.workspaces[name];
        if (!rec) throw new WorkspaceNotFoundError(name);
        patch(rec);
        rec.lastActivityAt = new Date().toISOString();
        return doc;
      },
      label,
      { heldLease }
    );
    const updated = document.workspaces[name];
    if (!updated) throw new WorkspaceNotFoundError(name);
    return updated;
  }

  private async recordCompletion(record: WorkspaceRecord): Promise<void> {
    const signal = `workspace:${record.name}:merged`;
    await this.state.write((doc) => {
      if (!doc.completedUnits.includes(record.taskKey)) doc.completedUnits.push(record.taskKey);
      if (!(signal in doc.signals)) doc.signals[signal] = new Date().toISOString();
      return doc;
    }, `workspace:merged:${record.name}`);
  }

  /**
   * Work out how an interrupted merge ended. Takes the trunk lock without
   * waiting; null when a merge still holds it.
   */
  private async resolveInterruptedMerge(record: WorkspaceRecord): Promise<Partial<WorkspaceRecord> | null> {
    let trunkLease: LeaseHandle;
    try {
      trunkLease = await this.locks.acquire(TRUNK_RESOURCE, { timeoutMs: 0 });
    } catch (error) {
      if (error instanceof LockTimeoutError) return null;
      throw error;
    }

    try {
      const head = await this.git.resolveCommit(record.branch);
      const trunkHead = await this.git.resolveCommit(this.settings.trunkBranch);
      if (head && trunkHead && (await this.git.isAncestor(head, trunkHead))) {
        return { status: 'merged', mergeStatus: 'merged', mergeCommit: trunkHead, mergedAt: new Date().toISOString() };
      }
      if (await this.git.mergeInProgress()) {
        const abort = await this.git.run(['merge', '--abort'], { allowFailure: true });
        if (abort.exitCode !== 0) {
          return { status: 'failed', mergeStatus: 'aborted', failureReason: 'trunk could not be restored' };
        }
      }
      return { status: 'active', mergeStatus: 'aborted', failureReason: 'merge interrupted' };
    } finally {
      this.locks.release(trunkLease);
    }
  }

  private async isRegistered(path: string): Promise<boolean> {
    const target = canonicalPath(path);
    return (await this.git.worktreeList()).some((w) => canonicalPath(w.path) === target);
  }

  private async removePhysical(record: WorkspaceRecord): Promise<void> {
    if (await this.isRegistered(record.path)) {
      await this.git.worktreeRemove(record.path);
    } else if (existsSync(record.path)) {
      rmSync(record.path, { recursive: true, force: true });
    }
    if (await this.git.branchExists(record.branch)) {
      await this.git.deleteBranch(record.branch);
    }
  }

  /**
   * gzip tarball of the branch's changed paths plus a JSON manifest.
   * @returns path of the manifest
   */
  private async archive(record: WorkspaceRecord): Promise<string> {
    mkdirSync(this.archiveDir, { recursive: true });
    const stamp = compactTimestamp(new Date());
    const head = await this.git.resolveCommit(record.branch);
    const changedPaths = head ? await this.git.diffNames([`${record.basePoint}...${head}`]) : record.changedPaths;
    const archivedPaths = head ? await this.git.listTreePaths(head, changedPaths) : [];

    let tarball: string | null = null;
    if (head && archivedPaths.length) {
      tarball = join(this.archiveDir, `${record.name}-${stamp}.tar.gz`);
      await this.git.run(['archive', '--format=tar.gz', '-o', tarball, head, '--', ...archivedPaths]);
    }

    const manifestPath = join(this.archiveDir, `${record.name}-${stamp}.manifest.json`);
    const manifest = {
      name: record.name,
      taskKey: record.taskKey,
      branch: record.branch,
      basePoint: record.basePoint,
      head,
      status: record.status,
      mergeCommit: record.mergeCommit,
      changedPaths,
      archivedPaths,
      tarball,
      archivedAt: new Date().toISOString(),
    };
    writeFileSync(manifestPath, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
    logger.info(`Archived workspace ${record.name}`, { workspace: record.name, path: manifestPath });
    return manifestPath;
  }
}
