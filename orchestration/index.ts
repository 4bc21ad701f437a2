/**
 * Orchestration Module - coordination core for concurrent pipeline processes
 *
 * - Advisory file locks with staleness reclamation
 * - Versioned state document with backups and recovery
 * - Checkpoints, retry and degraded mode
 * - Isolated git worktrees per unit of work
 *
 * Quick Start:
 *   import { loadConfig } from '../shared/src/index.js';
 *   import { createCoordinator } from './orchestration/index.js';
 *
 *   const { state, workspaces } = createCoordinator(loadConfig({ rootDir }));
 *   const ws = await workspaces.create(taskKeyFor('phase1', 'task1'));
 *   // ... commit work in ws.path ...
 *   await workspaces.merge(ws.name);
 */

export { createCoordinator, type Coordinator } from './coordinator.js';

// File locking primitives
export {
  LockManager,
  LOCK_PRIORITIES,
  lockPriority,
  sortByPriority,
  atomicWrite,
  createIfAbsent,
  isProcessAlive,
  processStartTime,
  readAuditTrail,
  sweepTempFiles,
  type LeaseHandle,
  type LockRecord,
  type LockMode,
  type LockCheck,
  type LockListing,
  type AcquireOptions,
  type AuditEntry,
} from './fileLock.js';

// Versioned documents and the pipeline state
export {
  JsonDocumentStore,
  type BackupInfo,
  type Mutator,
  type ReadOutcome,
  type RestoreOutcome,
  type ValidationReport,
  type WriteOutcome,
} from './documentStore.js';
export { StateStore, StateMutationSchema, STATE_RESOURCE, type StateMutation, type StateStatus } from './stateManager.js';
export { buildStateSchema, createDefaultState, type StateDocument, type DegradedMode } from './stateSchema.js';

// Checkpoints and recovery
export { CheckpointStore, CheckpointSchema, type Checkpoint, type CheckpointKind } from './checkpointStore.js';
export {
  RecoveryManager,
  RECOVERY_STRATEGIES,
  classifyError,
  dispositionFor,
  readErrorLog,
  type ConfigReset,
  type Disposition,
  type ErrorLogEntry,
  type RecoveryStrategy,
  type HealthProbe,
  type HealthReport,
  type ProtectedOutcome,
  type RecoveryTransition,
} from './errorRecovery.js';

// Workspaces
export {
  WorkspaceManager,
  sanitizeWorkspaceName,
  taskKeyFor,
  TRUNK_RESOURCE,
  ARCHIVE_FEATURE,
  type MergeResult,
  type RepairReport,
  type ValidationResult,
} from './worktreeManager.js';
export { WORKSPACE_INDEX_RESOURCE, type WorkspaceRecord, type WorkspaceStatus } from './worktreeIndex.js';

// Crash protection
export { CrashMonitor, findContentions, type CheckReport } from './crashProtection.js';
