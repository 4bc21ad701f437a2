/**
 * Configuration layering: defaults, environment, explicit overrides.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { writeFileSync } from 'fs';
import { join } from 'path';
import {
  ConfigurationError,
  DEFAULT_PHASES,
  createLogger,
  getEnvBoolean,
  getEnvNumber,
  loadConfig,
  readConfigFile,
  setLogLevel,
} from '../shared/src/index.js';
import { makeRoot, removeRoot } from './helpers.js';

const ENV_KEYS = Object.keys(process.env).filter((key) => key.startsWith('PIPELINE_') || key === 'LOG_LEVEL');

describe('loadConfig', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('PIPELINE_') || key === 'LOG_LEVEL') delete process.env[key];
    }
    for (const [key, value] of saved) {
      if (value !== undefined) process.env[key] = value;
    }
    saved.clear();
  });

  it('derives every path from the root directory', () => {
    const config = loadConfig({ rootDir: '/srv/pipeline' });
    assert.deepEqual(config.paths, {
      stateFile: join('/srv/pipeline', '.workflow-state.json'),
      backupDir: join('/srv/pipeline', '.state-backups'),
      lockDir: join('/srv/pipeline', '.locks'),
      checkpointDir: join('/srv/pipeline', '.checkpoints'),
      workspaceIndexFile: join('/srv/pipeline', '.worktree-index.json'),
      workspaceDir: join('/srv/pipeline', 'worktrees'),
      archiveDir: join('/srv/pipeline', '.worktree-archive'),
      auditLog: join('/srv/pipeline', '.locks', 'audit.log'),
      errorLog: join('/srv/pipeline', '.error-recovery.log'),
      configFile: join('/srv/pipeline', '.pipeline.env'),
      repoDir: '/srv/pipeline',
    });
  });

  it('applies defaults', () => {
    const config = loadConfig({ rootDir: '/srv/pipeline' });
    assert.deepEqual(config.locks, {
      defaultTimeoutMs: 30_000,
      stalenessThresholdMs: 300_000,
      retryBaseMs: 25,
      retryMaxMs: 1_000,
    });
    assert.deepEqual(config.backups, { maxCount: 5, retentionDays: 7 });
    assert.deepEqual(config.checkpoints, { maxCount: 50, retentionDays: 7 });
    assert.deepEqual(config.recovery, { maxAttempts: 3, baseDelayMs: 1_000, maxDelayMs: 60_000, resourceWaitMs: 5_000 });
    assert.deepEqual(config.workspace, {
      trunkBranch: 'main',
      branchPrefix: 'feature/',
      defaultStrategy: 'three-way',
      completionMarker: '.workspace-complete',
      requireCompletionMarker: false,
    });
    assert.deepEqual(config.phases, [...DEFAULT_PHASES]);
    assert.equal(config.logLevel, 'info');
  });

  it('reads the environment', () => {
    process.env.PIPELINE_ROOT = '/srv/from-env';
    process.env.PIPELINE_LOCK_TIMEOUT_SECONDS = '2.5';
    process.env.PIPELINE_LOCK_STALE_SECONDS = '60';
    process.env.PIPELINE_LOCK_DIR = '/tmp/pipeline-locks';
    process.env.PIPELINE_TRUNK_BRANCH = 'trunk';
    process.env.PIPELINE_REQUIRE_COMPLETION_MARKER = 'true';
    process.env.PIPELINE_PHASES = 'plan, build ,ship';
    process.env.PIPELINE_MAX_RETRIES = '5';
    process.env.PIPELINE_LOG_LEVEL = 'warn';

    const config = loadConfig();
    assert.equal(config.rootDir, '/srv/from-env');
    assert.equal(config.locks.defaultTimeoutMs, 2_500);
    assert.equal(config.locks.stalenessThresholdMs, 60_000);
    assert.equal(config.paths.lockDir, '/tmp/pipeline-locks');
    assert.equal(config.paths.auditLog, join('/tmp/pipeline-locks', 'audit.log'));
    assert.equal(config.workspace.trunkBranch, 'trunk');
    assert.equal(config.workspace.requireCompletionMarker, true);
    assert.deepEqual(config.phases, ['plan', 'build', 'ship']);
    assert.equal(config.recovery.maxAttempts, 5);
    assert.equal(config.logLevel, 'warn');
  });

  it('lets explicit overrides win over the environment', () => {
    process.env.PIPELINE_LOCK_TIMEOUT_SECONDS = '2';
    process.env.PIPELINE_LOG_LEVEL = 'warn';

    const config = loadConfig({
      rootDir: '/srv/pipeline',
      locks: { defaultTimeoutMs: 100 },
      paths: { stateFile: '/elsewhere/state.json' },
      logLevel: 'debug',
    });
    assert.equal(config.locks.defaultTimeoutMs, 100);
    assert.equal(config.locks.stalenessThresholdMs, 300_000);
    assert.equal(config.paths.stateFile, '/elsewhere/state.json');
    assert.equal(config.paths.backupDir, join('/srv/pipeline', '.state-backups'));
    assert.equal(config.logLevel, 'debug');
  });

  it('layers the pipeline config file beneath the environment', () => {
    const root = makeRoot();
    try {
      writeFileSync(
        join(root, '.pipeline.env'),
        'PIPELINE_TRUNK_BRANCH=develop\nPIPELINE_LOCK_TIMEOUT_SECONDS=4\nPIPELINE_RESOURCE_WAIT_SECONDS=0.5\n'
      );
      process.env.PIPELINE_LOCK_TIMEOUT_SECONDS = '2';

      const config = loadConfig({ rootDir: root });
      assert.equal(config.paths.configFile, join(root, '.pipeline.env'));
      assert.equal(config.workspace.trunkBranch, 'develop');
      assert.equal(config.locks.defaultTimeoutMs, 2_000);
      assert.equal(config.recovery.resourceWaitMs, 500);
    } finally {
      removeRoot(root);
    }
  });

  it('finds the config file through PIPELINE_CONFIG_FILE, relative to the root', () => {
    const root = makeRoot();
    try {
      writeFileSync(join(root, 'custom.env'), 'PIPELINE_MAX_RETRIES=7\n');
      process.env.PIPELINE_CONFIG_FILE = 'custom.env';

      const config = loadConfig({ rootDir: root });
      assert.equal(config.paths.configFile, join(root, 'custom.env'));
      assert.equal(config.recovery.maxAttempts, 7);
      assert.deepEqual(readConfigFile(join(root, 'absent.env')), {});
    } finally {
      removeRoot(root);
    }
  });

  it('rejects invalid values with a configuration error', () => {
    process.env.PIPELINE_LOCK_TIMEOUT_SECONDS = 'soon';
    assert.throws(() => loadConfig({ rootDir: '/srv/pipeline' }), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.kind, 'ConfigurationError');
      assert.equal(error.message, 'Environment variable PIPELINE_LOCK_TIMEOUT_SECONDS is not a number: soon');
      return true;
    });

    delete process.env.PIPELINE_LOCK_TIMEOUT_SECONDS;
    assert.throws(() => loadConfig({ rootDir: '/srv/pipeline', backups: { maxCount: 0 } }), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.deepEqual(error.details.issues, ['backups.maxCount: Number must be greater than 0']);
      return true;
    });

    process.env.PIPELINE_LOG_LEVEL = 'chatty';
    assert.throws(() => loadConfig({ rootDir: '/srv/pipeline' }), { name: 'ConfigurationError' });
  });
});

describe('environment helpers', () => {
  afterEach(() => {
    delete process.env.PIPELINE_TEST_VALUE;
  });

  it('parses numbers and booleans with defaults', () => {
    assert.equal(getEnvNumber('PIPELINE_TEST_VALUE', 4), 4);
    assert.equal(getEnvBoolean('PIPELINE_TEST_VALUE', true), true);

    process.env.PIPELINE_TEST_VALUE = '1';
    assert.equal(getEnvNumber('PIPELINE_TEST_VALUE', 4), 1);
    assert.equal(getEnvBoolean('PIPELINE_TEST_VALUE', false), true);

    process.env.PIPELINE_TEST_VALUE = 'no';
    assert.equal(getEnvBoolean('PIPELINE_TEST_VALUE', true), false);
  });
});

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('error');
  });

  it('reuses one logger per component and follows the global level', () => {
    const first = createLogger('ConfigTest');
    assert.equal(createLogger('ConfigTest'), first);
    assert.notEqual(createLogger('OtherConfigTest'), first);

    setLogLevel('warn');
    assert.equal(first.level, 'warn');
    assert.equal(createLogger('LateConfigTest').level, 'warn');
  });
});
