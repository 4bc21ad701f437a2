/**
 * Thin async wrapper over the git CLI
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { existsSync, realpathSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { CoordinatorError, ERROR_KINDS } from '../shared/src/errors.js';
import { ComponentLogger } from '../shared/src/logger.js';

const execFileAsync = promisify(execFile);
const DEFAULT_MAX_BUFFER = 16 * 1024 * 1024;

const logger = new ComponentLogger('Git');

export interface GitResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface WorktreeEntry {
  path: string;
  head: string | null;
  branch: string | null;
  prunable: boolean;
}

export interface StatusEntry {
  code: string;
  path: string;
}

export class GitCommandError extends CoordinatorError {
  constructor(args: string[], exitCode: number, stderr: string) {
    super(`git ${args.join(' ')} failed (${exitCode}): ${stderr.trim().split('\n')[0] ?? ''}`, {
      kind: ERROR_KINDS.Unknown,
      code: 'GIT_FAILED',
      details: { args, exitCode, stderr: stderr.trim() },
    });
    this.name = 'GitCommandError';
  }
}

function stringProp(value: object, key: 'stdout' | 'stderr'): string {
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'string' ? prop : '';
}

/**
 * Resolve symlinks so paths compare equal to the ones git reports.
 */
export function canonicalPath(path: string): string {
  const absolute = resolve(path);
  return existsSync(absolute) ? realpathSync(absolute) : absolute;
}

export class GitClient {
  constructor(readonly cwd: string) {}

  /**
   * Run git; a non-zero exit throws unless `allowFailure` is set.
   */
  async run(args: string[], options: { cwd?: string; allowFailure?: boolean } = {}): Promise<GitResult> {
    const cwd = options.cwd ?? this.cwd;
    try {
      const { stdout, stderr } = await execFileAsync('git', args, {
        cwd,
        maxBuffer: DEFAULT_MAX_BUFFER,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0', GIT_EDITOR: 'true' },
      });
      return { stdout, stderr, exitCode: 0 };
    } catch (error) {
      if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'number') {
        throw error;
      }
      const result = { stdout: stringProp(error, 'stdout'), stderr: stringProp(error, 'stderr'), exitCode: error.code };
      if (options.allowFailure) return result;
      logger.debug(`git ${args[0] ?? ''} exited ${result.exitCode}`, { path: cwd });
      throw new GitCommandError(args, result.exitCode, result.stderr);
    }
  }

  async resolveCommit(ref: string, cwd?: string): Promise<string | null> {
    const { stdout, exitCode } = await this.run(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`], {
      cwd,
      allowFailure: true,
    });
    return exitCode === 0 ? stdout.trim() : null;
  }

  async branchExists(branch: string): Promise<boolean> {
    const { exitCode } = await this.run(['show-ref', '--verify', '--quiet', `refs/heads/${branch}`], {
      allowFailure: true,
    });
    return exitCode === 0;
  }

  async currentBranch(cwd?: string): Promise<string | null> {
    const { stdout, exitCode } = await this.run(['symbolic-ref', '--quiet', '--short', 'HEAD'], {
      cwd,
      allowFailure: true,
    });
    return exitCode === 0 ? stdout.trim() : null;
  }

  async isAncestor(ancestor: string, descendant: string, cwd?: string): Promise<boolean> {
    const { exitCode, stderr } = await this.run(['merge-base', '--is-ancestor', ancestor, descendant], {
      cwd,
      allowFailure: true,
    });
    if (exitCode > 1) throw new GitCommandError(['merge-base', '--is-ancestor', ancestor, descendant], exitCode, stderr);
    return exitCode === 0;
  }

  /**
   * Porcelain status entries. `untracked: false` reports tracked modifications only.
   */
  async status(cwd: string, untracked = true): Promise<StatusEntry[]> {
    const { stdout } = await this.run(
      ['status', '--porcelain', '-z', `--untracked-files=${untracked ? 'all' : 'no'}`],
      { cwd }
    );
    const fields = stdout.split('\0');
    const entries: StatusEntry[] = [];
    for (let i = 0; i < fields.length; i++) {
      const field = fields[i];
      if (!field || field.length < 4) continue;
      const code = field.slice(0, 2);
      entries.push({ code, path: field.slice(3) });
      // renames and copies carry the source path in the next field
      if (code.includes('R') || code.includes('C')) i++;
    }
    return entries;
  }

  async diffNames(args: string[], cwd?: string): Promise<string[]> {
    const { stdout } = await this.run(['diff', '--name-only', ...args], { cwd });
    return stdout.split('\n').map((l) => l.trim()).filter(Boolean);
  }

  async conflictedPaths(cwd?: string): Promise<string[]> {
    return this.diffNames(['--diff-filter=U'], cwd);
  }

  async worktreeList(): Promise<WorktreeEntry[]> {
    const { stdout } = await this.run(['worktree', 'list', '--porcelain']);
    const entries: WorktreeEntry[] = [];
    let current: WorktreeEntry | null = null;
    for (const line of stdout.split('\n')) {
      if (line.startsWith('worktree ')) {
        current = { path: line.slice('worktree '.length), head: null, branch: null, prunable: false };
        entries.push(current);
      } else if (current && line.startsWith('HEAD ')) {
        current.head = line.slice('HEAD '.length);
      } else if (current && line.startsWith('branch ')) {
        current.branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
      } else if (current && line.startsWith('prunable')) {
        current.prunable = true;
      }
    }
    return entries;
  }

  async worktreeAdd(path: string, branch: string, commit: string): Promise<void> {
    await this.run(['worktree', 'add', '-b', branch, path, commit]);
  }

  async worktreeRemove(path: string): Promise<void> {
    await this.run(['worktree', 'remove', '--force', path]);
  }

  async worktreePrune(): Promise<void> {
    await this.run(['worktree', 'prune']);
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.run(['branch', '-D', branch]);
  }

  /**
   * Whether a merge is in progress in `cwd` (MERGE_HEAD present).
   */
  async mergeInProgress(cwd?: string): Promise<boolean> {
    const dir = cwd ?? this.cwd;
    const { stdout } = await this.run(['rev-parse', '--git-path', 'MERGE_HEAD'], { cwd: dir });
    const mergeHead = stdout.trim();
    return existsSync(isAbsolute(mergeHead) ? mergeHead : resolve(dir, mergeHead));
  }

  async listTreePaths(ref: string, paths: string[]): Promise<string[]> {
    if (paths.length === 0) return [];
    const { stdout } = await this.run(['ls-tree', '-r', '--name-only', ref, '--', ...paths]);
    return stdout.split('\n').map((l) => l.trim()).filter(Boolean);
  }
}
