/**
 * Wires the coordination components together for one configuration root.
 */

import { setLogLevel, type CoordinatorConfig } from '../shared/src/index.js';
import { LockManager, type LockManagerOptions } from './fileLock.js';
import { StateStore } from './stateManager.js';
import { CheckpointStore } from './checkpointStore.js';
import { RecoveryManager } from './errorRecovery.js';
import { WorkspaceManager } from './worktreeManager.js';

export interface Coordinator {
  config: CoordinatorConfig;
  locks: LockManager;
  state: StateStore;
  checkpoints: CheckpointStore;
  recovery: RecoveryManager;
  workspaces: WorkspaceManager;
}

export function createCoordinator(config: CoordinatorConfig, lockOptions: Partial<LockManagerOptions> = {}): Coordinator {
  setLogLevel(config.logLevel);

  const locks = LockManager.fromConfig(config, lockOptions);
  const state = new StateStore(config, locks);
  const checkpoints = new CheckpointStore(config, state);
  const recovery = new RecoveryManager(config, state, checkpoints, locks);
  const workspaces = new WorkspaceManager(config, locks, state, recovery);
  return { config, locks, state, checkpoints, recovery, workspaces };
}
