/**
 * Configuration management for the coordination core
 *
 * Layers, lowest first: defaults, the pipeline config file
 * (`<root>/.pipeline.env`, dotenv syntax), the process environment
 * (including a `.env` in the working directory), explicit overrides.
 */

import { readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigurationError, errorCode } from './errors.js';

let envLoaded = false;

function loadDotenv(): void {
  if (envLoaded) return;
  envLoaded = true;
  dotenv.config();
}

export const DEFAULT_PHASES = [
  'pre-init',
  'planning',
  'specification',
  'implementation',
  'testing',
  'validation',
  'deployment',
  'complete',
] as const;

export const MergeStrategySchema = z.enum(['fast-forward', 'three-way', 'squash']);
export type MergeStrategy = z.infer<typeof MergeStrategySchema>;

// Lock manager configuration
export const LockConfigSchema = z.object({
  defaultTimeoutMs: z.number().int().positive().default(30_000),
  stalenessThresholdMs: z.number().int().positive().default(300_000),
  retryBaseMs: z.number().int().positive().default(25),
  retryMaxMs: z.number().int().positive().default(1_000),
});
export type LockConfig = z.infer<typeof LockConfigSchema>;

// Retention policy shared by backups and checkpoints
export const RetentionConfigSchema = z.object({
  maxCount: z.number().int().positive(),
  retentionDays: z.number().positive(),
});
export type RetentionConfig = z.infer<typeof RetentionConfigSchema>;

// Retry configuration
export const RecoveryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().int().nonnegative().default(1_000),
  maxDelayMs: z.number().int().positive().default(60_000),
  /** Pause before retrying after resource exhaustion; doubled under high load */
  resourceWaitMs: z.number().int().nonnegative().default(5_000),
});
export type RecoveryConfig = z.infer<typeof RecoveryConfigSchema>;

// Workspace configuration
export const WorkspaceConfigSchema = z.object({
  trunkBranch: z.string().min(1).default('main'),
  branchPrefix: z.string().default('feature/'),
  defaultStrategy: MergeStrategySchema.default('three-way'),
  completionMarker: z.string().min(1).default('.workspace-complete'),
  requireCompletionMarker: z.boolean().default(false),
});
export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;

export const PathsConfigSchema = z.object({
  stateFile: z.string(),
  backupDir: z.string(),
  lockDir: z.string(),
  checkpointDir: z.string(),
  workspaceIndexFile: z.string(),
  workspaceDir: z.string(),
  archiveDir: z.string(),
  auditLog: z.string(),
  errorLog: z.string(),
  configFile: z.string(),
  repoDir: z.string(),
});
export type PathsConfig = z.infer<typeof PathsConfigSchema>;

// Main configuration schema
export const CoordinatorConfigSchema = z.object({
  rootDir: z.string().min(1),
  paths: PathsConfigSchema,
  locks: LockConfigSchema.default({}),
  backups: RetentionConfigSchema.default({ maxCount: 5, retentionDays: 7 }),
  checkpoints: RetentionConfigSchema.default({ maxCount: 50, retentionDays: 7 }),
  recovery: RecoveryConfigSchema.default({}),
  workspace: WorkspaceConfigSchema.default({}),
  phases: z.array(z.string().min(1)).min(1).default([...DEFAULT_PHASES]),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});
export type CoordinatorConfig = z.infer<typeof CoordinatorConfigSchema>;

export interface ConfigOverrides {
  rootDir?: string;
  paths?: Partial<PathsConfig>;
  locks?: Partial<LockConfig>;
  backups?: Partial<RetentionConfig>;
  checkpoints?: Partial<RetentionConfig>;
  recovery?: Partial<RecoveryConfig>;
  workspace?: Partial<WorkspaceConfig>;
  phases?: string[];
  logLevel?: CoordinatorConfig['logLevel'];
}

type EnvSource = Record<string, string | undefined>;

// Parse environment variable as number
export function getEnvNumber(name: string, defaultValue: number, env: EnvSource = process.env): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Environment variable ${name} is not a number: ${value}`, { name, value });
  }
  return parsed;
}

// Parse environment variable as boolean
export function getEnvBoolean(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const value = env[name];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

// Optional environment variable with default
export function getEnv(name: string, defaultValue: string, env: EnvSource = process.env): string {
  return env[name] || defaultValue;
}

/**
 * Settings from the pipeline config file; empty when there is none.
 */
export function readConfigFile(configFile: string): Record<string, string> {
  let content: string;
  try {
    content = readFileSync(configFile, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return {};
    throw new ConfigurationError(`Cannot read configuration file ${configFile}`, { configFile }, error);
  }
  return dotenv.parse(content);
}

function resolvePaths(rootDir: string, configFile: string, env: EnvSource, overrides: Partial<PathsConfig> = {}): PathsConfig {
  const lockDir = overrides.lockDir ?? env.PIPELINE_LOCK_DIR ?? path.join(rootDir, '.locks');
  return {
    stateFile: overrides.stateFile ?? env.PIPELINE_STATE_FILE ?? path.join(rootDir, '.workflow-state.json'),
    backupDir: overrides.backupDir ?? path.join(rootDir, '.state-backups'),
    lockDir,
    checkpointDir: overrides.checkpointDir ?? path.join(rootDir, '.checkpoints'),
    workspaceIndexFile: overrides.workspaceIndexFile ?? path.join(rootDir, '.worktree-index.json'),
    workspaceDir: overrides.workspaceDir ?? env.PIPELINE_WORKSPACE_DIR ?? path.join(rootDir, 'worktrees'),
    archiveDir: overrides.archiveDir ?? path.join(rootDir, '.worktree-archive'),
    auditLog: overrides.auditLog ?? env.PIPELINE_AUDIT_LOG ?? path.join(lockDir, 'audit.log'),
    errorLog: overrides.errorLog ?? env.PIPELINE_ERROR_LOG ?? path.join(rootDir, '.error-recovery.log'),
    configFile,
    repoDir: overrides.repoDir ?? env.PIPELINE_REPO_DIR ?? rootDir,
  };
}

function parsePhases(env: EnvSource): string[] | undefined {
  const raw = env.PIPELINE_PHASES;
  if (!raw) return undefined;
  const phases = raw.split(',').map((p) => p.trim()).filter(Boolean);
  return phases.length ? phases : undefined;
}

/**
 * Build the configuration: defaults, then the config file, then environment,
 * then explicit overrides. The root and the config file location itself come
 * from the environment or overrides only.
 */
export function loadConfig(overrides: ConfigOverrides = {}): CoordinatorConfig {
  loadDotenv();

  const rootDir = path.resolve(overrides.rootDir ?? getEnv('PIPELINE_ROOT', process.cwd()));
  const configFile = path.resolve(
    rootDir,
    overrides.paths?.configFile ?? getEnv('PIPELINE_CONFIG_FILE', '.pipeline.env')
  );
  const env: EnvSource = { ...readConfigFile(configFile), ...process.env };

  const candidate = {
    rootDir,
    paths: resolvePaths(rootDir, configFile, env, overrides.paths),
    locks: {
      defaultTimeoutMs: getEnvNumber('PIPELINE_LOCK_TIMEOUT_SECONDS', 30, env) * 1000,
      stalenessThresholdMs: getEnvNumber('PIPELINE_LOCK_STALE_SECONDS', 300, env) * 1000,
      ...overrides.locks,
    },
    backups: {
      maxCount: getEnvNumber('PIPELINE_BACKUP_MAX_COUNT', 5, env),
      retentionDays: getEnvNumber('PIPELINE_BACKUP_RETENTION_DAYS', 7, env),
      ...overrides.backups,
    },
    checkpoints: {
      maxCount: getEnvNumber('PIPELINE_CHECKPOINT_MAX_COUNT', 50, env),
      retentionDays: getEnvNumber('PIPELINE_CHECKPOINT_RETENTION_DAYS', 7, env),
      ...overrides.checkpoints,
    },
    recovery: {
      maxAttempts: getEnvNumber('PIPELINE_MAX_RETRIES', 3, env),
      resourceWaitMs: Math.round(getEnvNumber('PIPELINE_RESOURCE_WAIT_SECONDS', 5, env) * 1000),
      ...overrides.recovery,
    },
    workspace: {
      trunkBranch: getEnv('PIPELINE_TRUNK_BRANCH', 'main', env),
      requireCompletionMarker: getEnvBoolean('PIPELINE_REQUIRE_COMPLETION_MARKER', false, env),
      ...overrides.workspace,
    },
    phases: overrides.phases ?? parsePhases(env),
    logLevel: overrides.logLevel ?? env.PIPELINE_LOG_LEVEL ?? env.LOG_LEVEL ?? 'info',
  };

  const result = CoordinatorConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError('Invalid configuration', { issues }, result.error);
  }
  return result.data;
}
