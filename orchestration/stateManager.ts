/**
 * State Manager - Safe Multi-Process Pipeline State
 *
 * Owns every access to the shared pipeline state document. Writes are
 * serialized by the exclusive `state` lock and committed atomically; reads
 * are lock-free and self-healing.
 *
 * Usage:
 *   const state = StateStore.fromConfig(loadConfig());
 *   await state.init();
 *   await state.write((doc) => {
 *     doc.phase = 'implementation';
 *     return doc;
 *   }, 'enter-implementation');
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { ComponentLogger } from '../shared/src/logger.js';
import type { CoordinatorConfig } from '../shared/src/config.js';
import { asMessage, errorCode } from '../shared/src/errors.js';
import { LockManager } from './fileLock.js';
import {
  JsonDocumentStore,
  type BackupInfo,
  type Mutator,
  type ReadOutcome,
  type RestoreOutcome,
  type ValidationReport,
  type WriteOptions,
  type WriteOutcome,
} from './documentStore.js';
import {
  PREVIOUS_STATE_VERSIONS,
  STATE_SCHEMA_VERSION,
  buildStateSchema,
  checkStateTransition,
  createDefaultState,
  stateVersionOf,
  upgradeState,
  type DegradedMode,
  type StateDocument,
} from './stateSchema.js';

const logger = new ComponentLogger('StateManager');

export const STATE_RESOURCE = 'state';

/**
 * Operations accepted by `state write` on the command line.
 */
export const StateMutationSchema = z
  .object({
    phase: z.string().min(1).optional(),
    completeUnits: z.array(z.string().min(1)).optional(),
    signals: z.union([z.array(z.string().min(1)), z.record(z.string())]).optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .strict();

export type StateMutation = z.infer<typeof StateMutationSchema>;

export interface InitOutcome {
  document: StateDocument;
  status: ReadOutcome<StateDocument>['status'];
  migrated: boolean;
  migratedFrom?: string;
}

export interface StateStatus {
  stateFile: string;
  exists: boolean;
  valid: boolean;
  issues: string[];
  schemaVersion: string | null;
  revision: number | null;
  phase: string | null;
  completedUnits: number;
  signals: number;
  degradedMode: DegradedMode | null;
  lastModifiedAt: string | null;
  lastChange: string | null;
  backupCount: number;
  latestBackup: string | null;
}

export class StateStore {
  readonly store: JsonDocumentStore<StateDocument>;
  readonly phases: readonly string[];

  constructor(config: CoordinatorConfig, readonly locks: LockManager) {
    this.phases = config.phases;
    this.store = new JsonDocumentStore<StateDocument>({
      name: 'StateStore',
      resource: STATE_RESOURCE,
      filePath: config.paths.stateFile,
      backupDir: config.paths.backupDir,
      backupPrefix: 'state',
      retention: config.backups,
      schema: buildStateSchema(config.phases),
      createDefault: () => createDefaultState(config.phases, locks.holderPid),
      locks,
      checkTransition: checkStateTransition,
      upgrade: {
        currentVersion: STATE_SCHEMA_VERSION,
        versionOf: stateVersionOf,
        previousVersions: PREVIOUS_STATE_VERSIONS,
        apply: (raw) => upgradeState(raw, config.phases, locks.holderPid),
      },
    });
  }

  static fromConfig(config: CoordinatorConfig, locks: LockManager = LockManager.fromConfig(config)): StateStore {
    return new StateStore(config, locks);
  }

  get filePath(): string {
    return this.store.filePath;
  }

  /**
   * Create the default document if absent and migrate an outdated one. Idempotent.
   */
  async init(): Promise<InitOutcome> {
    const outcome = await this.store.init();
    if (!outcome.outdated) {
      return { document: outcome.document, status: outcome.status, migrated: false };
    }
    const migration = await this.store.migrate();
    const current = await this.store.read();
    return {
      document: current.document,
      status: outcome.status,
      migrated: migration.migrated,
      migratedFrom: migration.from,
    };
  }

  async read(): Promise<ReadOutcome<StateDocument>> {
    return this.store.read();
  }

  async write(mutator: Mutator<StateDocument>, changeLabel: string, options?: WriteOptions): Promise<WriteOutcome<StateDocument>> {
    return this.store.write(mutator, changeLabel, options);
  }

  /**
   * Validate `document`, or the on-disk file when none is given.
   */
  validate(document?: unknown): ValidationReport {
    if (document !== undefined) {
      return this.store.validate(document);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      const reason = errorCode(error) === 'ENOENT' ? 'state file is missing' : `unreadable: ${asMessage(error)}`;
      return { valid: false, issues: [reason] };
    }
    return this.store.validate(raw);
  }

  backup(label = 'manual'): BackupInfo {
    return this.store.backup(label);
  }

  async restore(selector?: string): Promise<RestoreOutcome<StateDocument>> {
    return this.store.restore(selector);
  }

  listBackups(): BackupInfo[] {
    return this.store.listBackups();
  }

  async migrate(): Promise<{ migrated: boolean; from?: string; to?: string }> {
    return this.store.migrate();
  }

  status(): StateStatus {
    const exists = existsSync(this.filePath);
    const report = this.validate();
    const document = this.store.peek();
    const backups = this.listBackups();
    return {
      stateFile: this.filePath,
      exists,
      valid: report.valid,
      issues: report.issues,
      schemaVersion: document?.schemaVersion ?? null,
      revision: document?.revision ?? null,
      phase: document?.phase ?? null,
      completedUnits: document?.completedUnits.length ?? 0,
      signals: document ? Object.keys(document.signals).length : 0,
      degradedMode: document?.degradedMode ?? null,
      lastModifiedAt: document?.metadata.lastModifiedAt ?? null,
      lastChange: document?.metadata.lastChange ?? null,
      backupCount: backups.length,
      latestBackup: backups[0]?.id ?? null,
    };
  }

  async setPhase(phase: string, changeLabel = `phase:${phase}`): Promise<StateDocument> {
    const { document } = await this.write((doc) => {
      doc.phase = phase;
      return doc;
    }, changeLabel);
    logger.info(`Phase set to ${phase}`, { phase });
    return document;
  }

  async markUnitCompleted(unit: string, changeLabel = `complete:${unit}`, options?: WriteOptions): Promise<StateDocument> {
    const { document } = await this.write(
      (doc) => {
        if (!doc.completedUnits.includes(unit)) doc.completedUnits.push(unit);
        return doc;
      },
      changeLabel,
      options
    );
    return document;
  }

  /**
   * Record a signal. Re-emitting an existing signal keeps its first timestamp.
   */
  async emitSignal(name: string, at: Date = new Date(), options?: WriteOptions): Promise<StateDocument> {
    const { document } = await this.write(
      (doc) => {
        if (!(name in doc.signals)) doc.signals[name] = at.toISOString();
        return doc;
      },
      `signal:${name}`,
      options
    );
    return document;
  }

  /**
   * Apply a declarative mutation, as given to `state write`.
   */
  async applyMutation(mutation: StateMutation, changeLabel = 'cli-write'): Promise<WriteOutcome<StateDocument>> {
    const now = new Date().toISOString();
    return this.write((doc) => {
      if (mutation.phase !== undefined) doc.phase = mutation.phase;
      for (const unit of mutation.completeUnits ?? []) {
        if (!doc.completedUnits.includes(unit)) doc.completedUnits.push(unit);
      }
      const signals = mutation.signals;
      if (Array.isArray(signals)) {
        for (const name of signals) {
          if (!(name in doc.signals)) doc.signals[name] = now;
        }
      } else if (signals) {
        Object.assign(doc.signals, signals);
      }
      if (mutation.metadata) {
        doc.metadata = { ...doc.metadata, ...mutation.metadata };
      }
      return doc;
    }, changeLabel);
  }
}
