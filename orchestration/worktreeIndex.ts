/**
 * Workspace index: the side document recording every workspace and its
 * lifecycle status, stored through the same lock-guarded document store as
 * the pipeline state, under the `workspace-index` resource.
 */

import { z } from 'zod';
import type { CoordinatorConfig } from '../shared/src/config.js';
import { MergeStrategySchema } from '../shared/src/config.js';
import type { LockManager } from './fileLock.js';
import { JsonDocumentStore } from './documentStore.js';

export const WORKSPACE_INDEX_RESOURCE = 'workspace-index';
export const WORKSPACE_INDEX_VERSION = '1.0';

export const WorkspaceStatusSchema = z.enum(['active', 'validating', 'merged', 'conflict', 'archived', 'failed']);
export type WorkspaceStatus = z.infer<typeof WorkspaceStatusSchema>;

export const MergeStatusSchema = z.enum(['pending', 'merged', 'conflict', 'aborted']);
export type MergeStatus = z.infer<typeof MergeStatusSchema>;

export const ResolutionSchema = z.discriminatedUnion('strategy', [
  z.object({ strategy: z.literal('ours') }),
  z.object({ strategy: z.literal('theirs') }),
  z.object({ strategy: z.literal('content'), content: z.string() }),
]);
export type Resolution = z.infer<typeof ResolutionSchema>;

export const WorkspaceRecordSchema = z.object({
  name: z.string().min(1),
  taskKey: z.string().min(1),
  status: WorkspaceStatusSchema,
  branch: z.string().min(1),
  basePoint: z.string().min(1),
  baseRef: z.string().min(1),
  path: z.string().min(1),
  createdAt: z.string(),
  lastActivityAt: z.string(),
  changedPaths: z.array(z.string()),
  mergeStatus: MergeStatusSchema,
  dependsOn: z.array(z.string()),
  allowedPaths: z.array(z.string()).nullable(),
  conflicts: z.array(z.string()),
  resolutions: z.record(ResolutionSchema),
  strategy: MergeStrategySchema.nullable(),
  mergeOwner: z.object({ pid: z.number().int(), since: z.string() }).nullable(),
  mergeCommit: z.string().nullable(),
  mergedAt: z.string().nullable(),
  archivePath: z.string().nullable(),
  failureReason: z.string().nullable(),
});
export type WorkspaceRecord = z.infer<typeof WorkspaceRecordSchema>;

export const WorkspaceIndexSchema = z
  .object({
    schemaVersion: z.literal(WORKSPACE_INDEX_VERSION),
    revision: z.number().int().nonnegative(),
    workspaces: z.record(WorkspaceRecordSchema),
    metadata: z
      .object({
        createdAt: z.string(),
        lastModifiedAt: z.string(),
        lastModifiedBy: z.number().int(),
        lastChange: z.string(),
      })
      .catchall(z.unknown()),
  })
  .superRefine((doc, ctx) => {
    for (const [key, record] of Object.entries(doc.workspaces)) {
      if (record.name !== key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['workspaces', key, 'name'],
          message: `record name "${record.name}" does not match its key`,
        });
      }
    }
  });
export type WorkspaceIndex = z.infer<typeof WorkspaceIndexSchema>;

/**
 * Status changes a record may make in a single write.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<WorkspaceStatus, readonly WorkspaceStatus[]>> = Object.freeze({
  active: ['validating', 'failed', 'archived'],
  validating: ['merged', 'conflict', 'active', 'failed'],
  conflict: ['validating', 'failed', 'archived'],
  merged: ['archived'],
  archived: [],
  failed: [],
});

export const TERMINAL_STATUSES: readonly WorkspaceStatus[] = ['archived', 'failed'];

export function canTransition(from: WorkspaceStatus, to: WorkspaceStatus): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

export function checkIndexTransition(previous: WorkspaceIndex, candidate: WorkspaceIndex): string[] {
  const issues: string[] = [];
  for (const [name, record] of Object.entries(candidate.workspaces)) {
    const before = previous.workspaces[name];
    if (before && !canTransition(before.status, record.status)) {
      issues.push(`workspaces.${name}.status: ${before.status} -> ${record.status} is not allowed`);
    }
    if (!before && record.status !== 'active') {
      issues.push(`workspaces.${name}.status: new records start active`);
    }
  }
  return issues;
}

export function createWorkspaceIndex(config: CoordinatorConfig, locks: LockManager): JsonDocumentStore<WorkspaceIndex> {
  return new JsonDocumentStore<WorkspaceIndex>({
    name: 'WorkspaceIndex',
    resource: WORKSPACE_INDEX_RESOURCE,
    filePath: config.paths.workspaceIndexFile,
    backupDir: config.paths.backupDir,
    backupPrefix: 'worktree-index',
    retention: config.backups,
    schema: WorkspaceIndexSchema,
    createDefault: () => {
      const now = new Date().toISOString();
      return {
        schemaVersion: WORKSPACE_INDEX_VERSION,
        revision: 0,
        workspaces: {},
        metadata: { createdAt: now, lastModifiedAt: now, lastModifiedBy: locks.holderPid, lastChange: 'init' },
      };
    },
    locks,
    checkTransition: checkIndexTransition,
  });
}
