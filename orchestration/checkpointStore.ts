/**
 * Checkpoint arena: immutable named snapshots, one JSON file per id.
 */

import { existsSync, readFileSync, readdirSync, unlinkSync, mkdirSync } from 'fs';
import { join, basename } from 'path';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import { ComponentLogger } from '../shared/src/logger.js';
import type { CoordinatorConfig, RetentionConfig } from '../shared/src/config.js';
import {
  AlreadyExistsError,
  NotFoundError,
  StateCorruptionError,
  ValidationFailedError,
  errorCode,
} from '../shared/src/errors.js';
import { createIfAbsent } from './fileLock.js';
import type { StateStore } from './stateManager.js';
import type { StateDocument } from './stateSchema.js';

const logger = new ComponentLogger('Checkpoints');

const DAY_MS = 24 * 60 * 60 * 1000;

const CheckpointBaseSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  phaseAtCapture: z.string(),
  createdAt: z.string(),
  holderPid: z.number().int(),
  payload: z.unknown(),
});

export const CheckpointSchema = z.discriminatedUnion('kind', [
  CheckpointBaseSchema.extend({
    kind: z.literal('full-state'),
    stateSnapshot: z.record(z.unknown()),
  }),
  CheckpointBaseSchema.extend({
    kind: z.literal('payload-only'),
  }),
]);

export type Checkpoint = z.infer<typeof CheckpointSchema>;
export type CheckpointKind = Checkpoint['kind'];

export interface CheckpointRestore {
  checkpoint: Checkpoint;
  /** New state document, for full-state checkpoints */
  state: StateDocument | null;
}

export function sanitizeCheckpointName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_.-]+/g, '-').replace(/^-+|-+$/g, '').slice(0, 60);
  return cleaned || 'checkpoint';
}

function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

export class CheckpointStore {
  private readonly dir: string;
  private readonly retention: RetentionConfig;

  constructor(config: CoordinatorConfig, private readonly state: StateStore) {
    this.dir = config.paths.checkpointDir;
    this.retention = config.checkpoints;
  }

  /**
   * Capture a checkpoint. `full-state` also snapshots the current state document.
   */
  async create(
    name: string,
    phase: string,
    payload: unknown,
    kind: CheckpointKind = 'full-state'
  ): Promise<Checkpoint> {
    mkdirSync(this.dir, { recursive: true });
    const createdAt = new Date();
    const id = `checkpoint-${compactTimestamp(createdAt)}-${sanitizeCheckpointName(name)}-${randomBytes(3).toString('hex')}`;
    const base = {
      id,
      name,
      phaseAtCapture: phase,
      createdAt: createdAt.toISOString(),
      holderPid: this.state.locks.holderPid,
      payload: payload ?? null,
    };

    let checkpoint: Checkpoint;
    if (kind === 'full-state') {
      const { document } = await this.state.read();
      checkpoint = { ...base, kind, stateSnapshot: structuredClone(document) };
    } else {
      checkpoint = { ...base, kind };
    }

    if (!createIfAbsent(this.pathFor(id), JSON.stringify(checkpoint, null, 2) + '\n')) {
      throw new AlreadyExistsError('Checkpoint', id);
    }
    logger.info(`Checkpoint ${id} created`, { checkpointId: id, phase });
    this.cleanup();
    return checkpoint;
  }

  get(id: string): Checkpoint {
    const path = this.pathFor(basename(id, '.json'));
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') throw new NotFoundError('Checkpoint', id);
      throw error;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StateCorruptionError(`Checkpoint ${id} is not valid JSON`, { checkpointId: id }, error);
    }
    const parsed = CheckpointSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateCorruptionError(`Checkpoint ${id} is malformed`, { checkpointId: id });
    }
    return parsed.data;
  }

  /**
   * Readable checkpoints, newest first; optionally only those named `name`.
   */
  list(name?: string): Checkpoint[] {
    if (!existsSync(this.dir)) return [];
    const checkpoints: Checkpoint[] = [];
    for (const file of readdirSync(this.dir)) {
      if (!file.startsWith('checkpoint-') || !file.endsWith('.json')) continue;
      try {
        const checkpoint = this.get(file);
        if (name === undefined || checkpoint.name === name) checkpoints.push(checkpoint);
      } catch (error) {
        logger.warn(`Skipping unreadable checkpoint ${file}`, {
          checkpointId: file,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }
    return checkpoints.sort((a, b) => {
      if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
      return a.id < b.id ? 1 : -1;
    });
  }

  latestFor(name: string): Checkpoint | undefined {
    return this.list(name)[0];
  }

  /**
   * Restore a checkpoint. The checkpoint itself is kept, so it can be restored again.
   *
   * A full-state snapshot is committed through the state store's write path.
   * Signals emitted after the capture and the current degraded-mode setting
   * are carried over: both are never rolled back.
   */
  async restore(id: string): Promise<CheckpointRestore> {
    const checkpoint = this.get(id);
    if (checkpoint.kind === 'payload-only') {
      logger.info(`Checkpoint ${checkpoint.id} holds no state; payload returned`, { checkpointId: checkpoint.id });
      return { checkpoint, state: null };
    }

    let snapshot: StateDocument;
    try {
      snapshot = this.state.store.parseDocument(checkpoint.stateSnapshot);
    } catch (error) {
      throw new StateCorruptionError(
        `Checkpoint ${checkpoint.id} snapshot is not a valid state`,
        { checkpointId: checkpoint.id, issues: error instanceof ValidationFailedError ? error.issues : [] },
        error
      );
    }

    const { document } = await this.state.write(
      (current) => ({
        ...current,
        phase: snapshot.phase,
        completedUnits: [...snapshot.completedUnits],
        signals: { ...snapshot.signals, ...current.signals },
        metadata: { ...current.metadata, restoredFromCheckpoint: checkpoint.id },
      }),
      `checkpoint-restore:${checkpoint.id}`
    );

    logger.info(`Restored checkpoint ${checkpoint.id}`, { checkpointId: checkpoint.id, phase: document.phase });
    return { checkpoint, state: document };
  }

  /**
   * Apply the retention policy: at most `maxCount` checkpoints, none older
   * than `retentionDays` (or the given override).
   * @returns ids of removed checkpoints
   */
  cleanup(retentionDays: number = this.retention.retentionDays): string[] {
    const now = Date.now();
    const removed: string[] = [];
    this.list().forEach((checkpoint, index) => {
      const expired = now - Date.parse(checkpoint.createdAt) > retentionDays * DAY_MS;
      if (index < this.retention.maxCount && !expired) return;
      try {
        unlinkSync(this.pathFor(checkpoint.id));
        removed.push(checkpoint.id);
      } catch (error) {
        if (errorCode(error) !== 'ENOENT') throw error;
      }
    });
    if (removed.length) {
      logger.info(`Removed ${removed.length} checkpoint(s)`, { count: removed.length });
    }
    return removed;
  }

  private pathFor(id: string): string {
    return join(this.dir, `${id}.json`);
  }
}
