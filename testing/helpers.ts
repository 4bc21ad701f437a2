/**
 * Shared fixtures for the test suites: throwaway roots, git repositories and
 * child processes.
 */

import { execFile, execFileSync, spawn, type ChildProcess } from 'child_process';
import { mkdtempSync, mkdirSync, realpathSync, rmSync, writeFileSync } from 'fs';
import { tmpdir, hostname } from 'os';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { promisify } from 'util';
import { loadConfig, type ConfigOverrides, type CoordinatorConfig } from '../shared/src/index.js';
import type { LockRecord } from '../orchestration/fileLock.js';

const execFileAsync = promisify(execFile);

export const TESTING_DIR = dirname(fileURLToPath(import.meta.url));

// Far above any pid_max, so never a live process
export const DEAD_PID = 2147483646;

export function makeRoot(prefix = 'pipeline-test-'): string {
  return realpathSync(mkdtempSync(join(tmpdir(), prefix)));
}

export function removeRoot(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

export function testConfig(root: string, overrides: ConfigOverrides = {}): CoordinatorConfig {
  return loadConfig({
    ...overrides,
    rootDir: root,
    logLevel: overrides.logLevel ?? 'error',
    locks: { defaultTimeoutMs: 5_000, ...overrides.locks },
  });
}

export function git(cwd: string, args: string[]): string {
  return execFileSync('git', args, { cwd, encoding: 'utf-8', env: { ...process.env, GIT_TERMINAL_PROMPT: '0' } });
}

/**
 * Initialise a repository on `main` with one commit.
 */
export function initRepo(dir: string): void {
  mkdirSync(dir, { recursive: true });
  git(dir, ['init', '-q', '-b', 'main']);
  git(dir, ['config', 'user.email', 'test@example.com']);
  git(dir, ['config', 'user.name', 'Test Runner']);
  git(dir, ['config', 'commit.gpgsign', 'false']);
  writeFileSync(join(dir, '.gitignore'), 'worktrees/\n.locks/\n.state-backups/\n.checkpoints/\n.worktree-archive/\n.workflow-state.json*\n.worktree-index.json*\n.error-recovery.log\n.pipeline.env*\n');
  writeFileSync(join(dir, 'README.md'), '# fixture\n');
  git(dir, ['add', '.']);
  git(dir, ['commit', '-q', '-m', 'initial']);
}

export function commitFile(dir: string, path: string, content: string, message = `update ${path}`): string {
  const full = join(dir, path);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
  git(dir, ['add', '--', path]);
  git(dir, ['commit', '-q', '-m', message]);
  return git(dir, ['rev-parse', 'HEAD']).trim();
}

/**
 * A lock record as another process would have written it.
 */
export function foreignLockRecord(resource: string, overrides: Partial<LockRecord> = {}): LockRecord {
  const acquiredAtMs = overrides.acquiredAtMs ?? Date.now();
  return {
    resourceName: resource,
    mode: 'exclusive',
    holderProcessId: DEAD_PID,
    holderStartTime: null,
    leaseId: '00000000-0000-4000-8000-000000000000',
    hostname: hostname(),
    acquiredAt: new Date(acquiredAtMs).toISOString(),
    acquiredAtMs,
    expiresAt: new Date(acquiredAtMs + 300_000).toISOString(),
    metadata: {},
    ...overrides,
  };
}

export function writeLockFile(lockDir: string, file: string, content: string): string {
  mkdirSync(lockDir, { recursive: true });
  const path = join(lockDir, file);
  writeFileSync(path, content);
  return path;
}

/**
 * Run a fixture script under tsx in a child process.
 */
export async function runFixture(script: string, args: string[]): Promise<{ stdout: string; stderr: string }> {
  return execFileAsync(process.execPath, ['--import', 'tsx', join(TESTING_DIR, 'fixtures', script), ...args], {
    env: { ...process.env, PIPELINE_LOG_LEVEL: 'error' },
  });
}

export interface RunningFixture {
  child: ChildProcess;
  /** First line the fixture prints */
  ready: Promise<string>;
  exited: Promise<number | null>;
}

/**
 * Start a fixture script and keep it running; `ready` resolves on its first output line.
 */
export function startFixture(script: string, args: string[]): RunningFixture {
  const child = spawn(process.execPath, ['--import', 'tsx', join(TESTING_DIR, 'fixtures', script), ...args], {
    env: { ...process.env, PIPELINE_LOG_LEVEL: 'error' },
    stdio: ['ignore', 'pipe', 'inherit'],
  });
  const ready = new Promise<string>((resolve, reject) => {
    let buffered = '';
    child.stdout?.on('data', (chunk: Buffer) => {
      buffered += chunk.toString('utf-8');
      const newline = buffered.indexOf('\n');
      if (newline !== -1) resolve(buffered.slice(0, newline));
    });
    child.once('error', reject);
    child.once('exit', (code) => reject(new Error(`fixture ${script} exited with ${code} before output`)));
  });
  const exited = new Promise<number | null>((resolve) => {
    child.once('exit', (code) => resolve(code));
  });
  return { child, ready, exited };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
