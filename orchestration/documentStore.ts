/**
 * Lock-guarded JSON document with versioned writes, rotating backups and
 * corruption recovery. The pipeline state and the workspace index are both
 * instances of this store, each under its own lock resource.
 *
 * Write path: exclusive lock -> read current -> mutate a copy -> validate ->
 * back up the pre-mutation bytes -> temp write + rename -> prune backups.
 * Reads take no lock; a rename never exposes a partial file.
 */

import { existsSync, readFileSync, readdirSync, unlinkSync, mkdirSync, renameSync, statSync } from 'fs';
import { join, basename } from 'path';
import { randomBytes } from 'crypto';
import type { z } from 'zod';
import { ComponentLogger } from '../shared/src/logger.js';
import type { RetentionConfig } from '../shared/src/config.js';
import {
  NotFoundError,
  NotHeldError,
  StateCorruptionError,
  ValidationFailedError,
  asMessage,
  errorCode,
} from '../shared/src/errors.js';
import { atomicWrite, createIfAbsent, type LeaseHandle, type LockManager } from './fileLock.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DocumentMetadata {
  createdAt: string;
  lastModifiedAt: string;
  lastModifiedBy: number;
  lastChange: string;
  [key: string]: unknown;
}

export interface VersionedDocument {
  revision: number;
  metadata: DocumentMetadata;
}

export type Mutator<T> = (draft: T) => T | undefined;

export interface DocumentUpgrade {
  currentVersion: string;
  versionOf: (raw: unknown) => string | undefined;
  /** Older versions `apply` knows how to upgrade. Anything else is corrupt. */
  previousVersions: readonly string[];
  /** Bring an older document up to the current shape, in memory. */
  apply: (raw: unknown) => unknown;
}

export interface DocumentStoreOptions<T extends VersionedDocument> {
  /** Component name used in log lines */
  name: string;
  /** Lock resource guarding the document */
  resource: string;
  filePath: string;
  backupDir: string;
  backupPrefix: string;
  retention: RetentionConfig;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  createDefault: () => T;
  locks: LockManager;
  lockTimeoutMs?: number;
  /** Rules relating a candidate to the document it replaces */
  checkTransition?: (previous: T, candidate: T) => string[];
  upgrade?: DocumentUpgrade;
}

export type ReadStatus = 'ok' | 'initialized' | 'recovered' | 'reset';

export interface ReadOutcome<T> {
  document: T;
  status: ReadStatus;
  /** Backup the document was recovered from */
  recoveredFrom?: string;
  /** Where the unreadable file was moved */
  quarantinedTo?: string;
  /** On-disk document predates the current schema version */
  outdated: boolean;
}

export interface WriteOptions {
  /** Exclusive lease on the store's resource already held by the caller */
  heldLease?: LeaseHandle;
}

export interface WriteOutcome<T> {
  document: T;
  previousRevision: number;
  backupId: string | null;
}

export interface BackupInfo {
  id: string;
  path: string;
  label: string;
  revision: number | null;
  createdAt: string;
  sizeBytes: number;
  valid: boolean;
}

export interface RestoreOutcome<T> {
  restoredFrom: string;
  document: T;
  safetyBackupId: string | null;
}

export type ValidationReport = { valid: true; issues: [] } | { valid: false; issues: string[] };

type Loaded<T> =
  | { kind: 'missing' }
  | { kind: 'corrupt'; content: string; reason: string }
  | { kind: 'ok'; content: string; document: T; outdated: boolean };

const BACKUP_NAME = /^(.+)-(\d{8}T\d{9}Z)-r(\d+|x)-([0-9a-f]{6})-([A-Za-z0-9_-]+)\.json$/;

function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

function parseCompactTimestamp(ts: string): string {
  const m = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{3})Z$/.exec(ts);
  if (!m) return ts;
  return `${m[1]}-${m[2]}-${m[3]}T${m[4]}:${m[5]}:${m[6]}.${m[7]}Z`;
}

export function sanitizeLabel(label: string): string {
  const cleaned = label.replace(/[^A-Za-z0-9_-]+/g, '-').replace(/^-+|-+$/g, '').slice(0, 40);
  return cleaned || 'auto';
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function serialize(document: unknown): string {
  return JSON.stringify(document, null, 2) + '\n';
}

export class JsonDocumentStore<T extends VersionedDocument> {
  readonly filePath: string;
  readonly resource: string;
  private readonly logger: ComponentLogger;

  constructor(private readonly options: DocumentStoreOptions<T>) {
    this.filePath = options.filePath;
    this.resource = options.resource;
    this.logger = new ComponentLogger(options.name);
  }

  get locks(): LockManager {
    return this.options.locks;
  }

  /**
   * Create the default document if none exists. Idempotent.
   */
  async init(): Promise<ReadOutcome<T>> {
    return this.read();
  }

  /**
   * Read the current document. Missing files are initialized; unreadable
   * ones are quarantined and replaced from the newest valid backup.
   */
  async read(): Promise<ReadOutcome<T>> {
    const loaded = this.load();
    if (loaded.kind === 'ok') {
      return { document: loaded.document, status: 'ok', outdated: loaded.outdated };
    }
    return this.locks.withLock(this.resource, () => this.repairLocked(), {
      timeoutMs: this.options.lockTimeoutMs,
    });
  }

  /**
   * Lock-free read that never repairs; undefined when the file is missing or unreadable.
   */
  peek(): T | undefined {
    const loaded = this.load();
    return loaded.kind === 'ok' ? loaded.document : undefined;
  }

  /**
   * Apply `mutator` to a copy of the current document and commit the result.
   * @throws ValidationFailedError when the candidate is rejected; the prior document stays authoritative
   */
  async write(mutator: Mutator<T>, changeLabel: string, writeOptions: WriteOptions = {}): Promise<WriteOutcome<T>> {
    const { heldLease } = writeOptions;
    if (heldLease) {
      if (heldLease.resource !== this.resource || heldLease.mode !== 'exclusive') {
        throw new NotHeldError(this.resource, { leaseResource: heldLease.resource, mode: heldLease.mode });
      }
      return this.writeLocked(mutator, changeLabel);
    }
    return this.locks.withLock(this.resource, () => this.writeLocked(mutator, changeLabel), {
      timeoutMs: this.options.lockTimeoutMs,
      metadata: { change: changeLabel },
    });
  }

  /**
   * Schema check, plus transition rules when `previous` is given.
   */
  validate(candidate: unknown, previous?: T): ValidationReport {
    const parsed = this.options.schema.safeParse(candidate);
    if (!parsed.success) {
      return { valid: false, issues: formatIssues(parsed.error) };
    }
    if (previous) {
      const issues: string[] = [];
      if (parsed.data.revision <= previous.revision) {
        issues.push(`revision: must increase (was ${previous.revision}, got ${parsed.data.revision})`);
      }
      issues.push(...(this.options.checkTransition?.(previous, parsed.data) ?? []));
      if (issues.length) return { valid: false, issues };
    }
    return { valid: true, issues: [] };
  }

  /**
   * Parse `candidate` as a document of this store.
   * @throws ValidationFailedError
   */
  parseDocument(candidate: unknown): T {
    const parsed = this.options.schema.safeParse(candidate);
    if (!parsed.success) {
      throw new ValidationFailedError('Document failed validation', formatIssues(parsed.error));
    }
    return parsed.data;
  }

  /**
   * Copy the current on-disk bytes into the backup directory.
   */
  backup(label: string): BackupInfo {
    const loaded = this.load();
    if (loaded.kind === 'missing') {
      throw new NotFoundError('Document', this.filePath);
    }
    const revision = loaded.kind === 'ok' ? loaded.document.revision : null;
    const info = this.writeBackup(loaded.content, revision, label);
    this.pruneBackups();
    return info;
  }

  /**
   * Restore a backup chosen by id, by label (most recent match) or, with no
   * selector, the latest one. The current document is backed up first.
   */
  async restore(selector?: string): Promise<RestoreOutcome<T>> {
    return this.locks.withLock(
      this.resource,
      () => {
        const target = this.selectBackup(selector);
        const content = readFileSync(target.path, 'utf-8');
        const document = this.parse(content);
        if (document.kind !== 'ok') {
          throw new StateCorruptionError(`Backup ${target.id} is not a valid document`, {
            backupId: target.id,
            reason: document.reason,
          });
        }

        const current = this.load();
        let safetyBackupId: string | null = null;
        if (current.kind !== 'missing') {
          safetyBackupId = this.writeBackup(
            current.content,
            current.kind === 'ok' ? current.document.revision : null,
            'pre-restore'
          ).id;
        }

        atomicWrite(this.filePath, content);
        this.pruneBackups([target.id]);
        this.logger.info(`Restored from backup ${target.id}`, { backupId: target.id });
        return { restoredFrom: target.id, document: document.document, safetyBackupId };
      },
      { timeoutMs: this.options.lockTimeoutMs }
    );
  }

  /**
   * Backups of this document, newest first.
   */
  listBackups(): BackupInfo[] {
    if (!existsSync(this.options.backupDir)) return [];
    const backups: BackupInfo[] = [];
    for (const file of readdirSync(this.options.backupDir)) {
      const m = BACKUP_NAME.exec(file);
      if (!m || m[1] !== this.options.backupPrefix) continue;
      const path = join(this.options.backupDir, file);
      let valid = false;
      let sizeBytes = 0;
      try {
        const content = readFileSync(path, 'utf-8');
        sizeBytes = Buffer.byteLength(content);
        valid = this.parse(content).kind === 'ok';
      } catch (error) {
        if (errorCode(error) !== 'ENOENT') throw error;
        continue;
      }
      backups.push({
        id: basename(file, '.json'),
        path,
        label: m[5],
        revision: m[3] === 'x' ? null : Number(m[3]),
        createdAt: parseCompactTimestamp(m[2]),
        sizeBytes,
        valid,
      });
    }
    return backups.sort((a, b) => {
      if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
      return (b.revision ?? -1) - (a.revision ?? -1);
    });
  }

  /**
   * Persist the upgraded form of an outdated document through the write path.
   */
  async migrate(): Promise<{ migrated: boolean; from?: string; to?: string }> {
    const upgrade = this.options.upgrade;
    if (!upgrade) return { migrated: false };
    return this.locks.withLock(
      this.resource,
      () => {
        const loaded = this.load();
        if (loaded.kind !== 'ok' || !loaded.outdated) {
          return { migrated: false };
        }
        const from = upgrade.versionOf(JSON.parse(loaded.content)) ?? 'legacy';
        const document = this.stamp(loaded.document, loaded.document, 'migration');
        this.writeBackup(loaded.content, null, 'pre-migration');
        atomicWrite(this.filePath, serialize(document));
        this.logger.info(`Migrated document from ${from} to ${upgrade.currentVersion}`, {
          path: this.filePath,
        });
        return { migrated: true, from, to: upgrade.currentVersion };
      },
      { timeoutMs: this.options.lockTimeoutMs }
    );
  }

  /**
   * Prune backups beyond the retention count or age. The newest is always kept.
   * @returns ids of removed backups
   */
  pruneBackups(keep: string[] = []): string[] {
    const { maxCount, retentionDays } = this.options.retention;
    const now = Date.now();
    const removed: string[] = [];
    this.listBackups().forEach((backup, index) => {
      if (index === 0 || keep.includes(backup.id)) return;
      const expired = now - Date.parse(backup.createdAt) > retentionDays * DAY_MS;
      if (index >= maxCount || expired) {
        try {
          unlinkSync(backup.path);
          removed.push(backup.id);
        } catch (error) {
          if (errorCode(error) !== 'ENOENT') throw error;
        }
      }
    });
    if (removed.length) {
      this.logger.debug(`Pruned ${removed.length} backup(s)`, { count: removed.length });
    }
    return removed;
  }

  private writeLocked(mutator: Mutator<T>, changeLabel: string): WriteOutcome<T> {
    let loaded = this.load();
    if (loaded.kind !== 'ok') {
      const repaired = this.repairLocked();
      loaded = {
        kind: 'ok',
        content: readFileSync(this.filePath, 'utf-8'),
        document: repaired.document,
        outdated: false,
      };
    }
    const previous = loaded.document;
    const draft = structuredClone(previous);
    const document = this.stamp(previous, mutator(draft) ?? draft, changeLabel);

    const backupId = this.writeBackup(loaded.content, previous.revision, changeLabel).id;
    atomicWrite(this.filePath, serialize(document));
    this.pruneBackups();
    this.logger.debug(`Committed revision ${document.revision}`, { label: changeLabel });
    return { document, previousRevision: previous.revision, backupId };
  }

  /**
   * Set revision and metadata on the candidate, then validate it against `previous`.
   */
  private stamp(previous: T, candidate: T, changeLabel: string): T {
    const stamped: T = {
      ...candidate,
      revision: previous.revision + 1,
      metadata: {
        ...candidate.metadata,
        createdAt: previous.metadata.createdAt,
        lastModifiedAt: new Date().toISOString(),
        lastModifiedBy: this.locks.holderPid,
        lastChange: changeLabel,
      },
    };

    const report = this.validate(stamped, previous);
    if (!report.valid) {
      this.logger.warn(`Rejected write "${changeLabel}"`, { label: changeLabel, count: report.issues.length });
      throw new ValidationFailedError(`Write "${changeLabel}" failed validation`, report.issues, {
        label: changeLabel,
      });
    }
    return stamped;
  }

  private repairLocked(): ReadOutcome<T> {
    const loaded = this.load();
    if (loaded.kind === 'ok') {
      return { document: loaded.document, status: 'ok', outdated: loaded.outdated };
    }

    if (loaded.kind === 'missing') {
      const document = this.options.createDefault();
      atomicWrite(this.filePath, serialize(document));
      this.logger.info('Created default document', { path: this.filePath });
      return { document, status: 'initialized', outdated: false };
    }

    const quarantinedTo = `${this.filePath}.corrupt.${Date.now()}`;
    renameSync(this.filePath, quarantinedTo);
    this.logger.error(`Document is corrupt: ${loaded.reason}`, { path: quarantinedTo });

    for (const backup of this.listBackups()) {
      if (!backup.valid) continue;
      const content = readFileSync(backup.path, 'utf-8');
      const parsed = this.parse(content);
      if (parsed.kind !== 'ok') continue;
      atomicWrite(this.filePath, content);
      this.logger.warn(`Recovered document from backup ${backup.id}`, { backupId: backup.id });
      return {
        document: parsed.document,
        status: 'recovered',
        recoveredFrom: backup.id,
        quarantinedTo,
        outdated: parsed.outdated,
      };
    }

    const document = this.options.createDefault();
    atomicWrite(this.filePath, serialize(document));
    this.logger.error('NO VALID BACKUP FOUND: document reset to defaults, previous contents quarantined', {
      path: quarantinedTo,
    });
    return { document, status: 'reset', quarantinedTo, outdated: false };
  }

  private load(): Loaded<T> {
    let content: string;
    try {
      content = readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return { kind: 'missing' };
      throw error;
    }
    return this.parse(content);
  }

  private parse(content: string): Exclude<Loaded<T>, { kind: 'missing' }> {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      return { kind: 'corrupt', content, reason: `unparsable JSON: ${asMessage(error)}` };
    }

    let candidate = raw;
    let outdated = false;
    const upgrade = this.options.upgrade;
    if (upgrade) {
      const version = upgrade.versionOf(raw);
      if (version !== upgrade.currentVersion) {
        if (version === undefined || !upgrade.previousVersions.includes(version)) {
          const shown = version === undefined ? 'missing' : `"${version}"`;
          return { kind: 'corrupt', content, reason: `unrecognised schema version (${shown})` };
        }
        candidate = upgrade.apply(raw);
        outdated = true;
      }
    }
    const parsed = this.options.schema.safeParse(candidate);
    if (!parsed.success) {
      return { kind: 'corrupt', content, reason: formatIssues(parsed.error).join('; ') };
    }
    return { kind: 'ok', content, document: parsed.data, outdated };
  }

  private writeBackup(content: string, revision: number | null, label: string): BackupInfo {
    mkdirSync(this.options.backupDir, { recursive: true });
    const createdAt = new Date();
    const rev = revision === null ? 'x' : String(revision).padStart(6, '0');
    const safeLabel = sanitizeLabel(label);

    while (true) {
      const id = `${this.options.backupPrefix}-${compactTimestamp(createdAt)}-r${rev}-${randomBytes(3).toString('hex')}-${safeLabel}`;
      const path = join(this.options.backupDir, `${id}.json`);
      if (!createIfAbsent(path, content)) continue;
      this.logger.debug(`Backup ${id} written`, { backupId: id, label: safeLabel });
      return {
        id,
        path,
        label: safeLabel,
        revision,
        createdAt: createdAt.toISOString(),
        sizeBytes: statSync(path).size,
        valid: this.parse(content).kind === 'ok',
      };
    }
  }

  private selectBackup(selector?: string): BackupInfo {
    const backups = this.listBackups();
    const target =
      selector === undefined || selector === 'latest'
        ? backups.find((b) => b.valid)
        : (backups.find((b) => b.id === selector || `${b.id}.json` === selector) ??
          backups.find((b) => b.label === sanitizeLabel(selector)));
    if (!target) {
      throw new NotFoundError('Backup', selector ?? 'latest');
    }
    return target;
  }
}
