/**
 * Workspace lifecycle against a real git repository in a temp directory.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createCoordinator, type Coordinator } from '../orchestration/coordinator.js';
import { sanitizeWorkspaceName, taskKeyFor } from '../orchestration/worktreeManager.js';
import type { WorkspaceRecord } from '../orchestration/worktreeIndex.js';
import {
  DependencyPendingError,
  DirtyStateError,
  IsolationViolationError,
  MergeConflictError,
  TrunkDivergedError,
} from '../shared/src/errors.js';
import { DEAD_PID, commitFile, git, initRepo, makeRoot, removeRoot, testConfig } from './helpers.js';

describe('sanitizeWorkspaceName', () => {
  it('keeps names usable as directories and branches', () => {
    assert.equal(sanitizeWorkspaceName('Phase 1/Task #2'), 'Phase-1-Task-2');
    assert.equal(sanitizeWorkspaceName('../../etc'), 'etc');
    assert.equal(sanitizeWorkspaceName('x.lock'), 'x-lock');
    assert.equal(taskKeyFor('phase1', 'task1'), 'phase1-task1');
  });

  it('rejects keys with nothing usable', () => {
    assert.throws(() => sanitizeWorkspaceName('///'), { name: 'ValidationFailedError' });
  });
});

describe('WorkspaceManager', () => {
  let root: string;
  let coordinator: Coordinator;

  function trunkHead(): string {
    return git(root, ['rev-parse', 'main']).trim();
  }

  async function createWith(task: string, files: Record<string, string>, dependsOn?: string[]): Promise<WorkspaceRecord> {
    const record = await coordinator.workspaces.create(taskKeyFor('phase1', task), undefined, { dependsOn });
    for (const [path, content] of Object.entries(files)) {
      commitFile(record.path, path, content);
    }
    return record;
  }

  async function markValidating(name: string, pid: number): Promise<void> {
    await coordinator.workspaces.index.write((doc) => {
      const rec = doc.workspaces[name];
      if (rec) {
        rec.status = 'validating';
        rec.mergeOwner = { pid, since: new Date().toISOString() };
      }
      return doc;
    }, 'test:interrupt');
  }

  beforeEach(() => {
    root = makeRoot();
    initRepo(root);
    coordinator = createCoordinator(testConfig(root));
  });

  afterEach(() => {
    removeRoot(root);
  });

  describe('create', () => {
    it('creates a worktree on a fresh branch from the trunk', async () => {
      const base = trunkHead();
      const record = await coordinator.workspaces.create(taskKeyFor('phase1', 'task1'));

      assert.equal(record.name, 'phase1-task1');
      assert.equal(record.taskKey, 'phase1-task1');
      assert.equal(record.status, 'active');
      assert.equal(record.branch, 'feature/phase1-task1');
      assert.equal(record.path, join(root, 'worktrees', 'phase1-task1'));
      assert.equal(record.basePoint, base);
      assert.equal(record.baseRef, 'main');
      assert.equal(record.allowedPaths, null);
      assert.ok(existsSync(join(record.path, 'README.md')));
      assert.equal(git(record.path, ['rev-parse', '--abbrev-ref', 'HEAD']).trim(), 'feature/phase1-task1');
      assert.deepEqual(await coordinator.workspaces.get('phase1-task1'), record);
    });

    it('refuses a second workspace for the same task', async () => {
      await coordinator.workspaces.create('phase1-task1');
      await assert.rejects(coordinator.workspaces.create('phase1-task1'), {
        name: 'AlreadyExistsError',
        kind: 'ValidationFailed',
      });
    });

    it('refuses unknown dependencies and bases', async () => {
      await assert.rejects(coordinator.workspaces.create('phase1-a', undefined, { dependsOn: ['ghost'] }), {
        name: 'ValidationFailedError',
      });
      await assert.rejects(coordinator.workspaces.create('phase1-b', 'no-such-ref'), {
        name: 'ValidationFailedError',
      });
      assert.equal(existsSync(join(root, 'worktrees', 'phase1-b')), false);
      assert.deepEqual(await coordinator.workspaces.list(), []);
    });

    it('roots the workspace at an explicit base point', async () => {
      const first = trunkHead();
      commitFile(root, 'later.txt', 'later\n');
      const record = await coordinator.workspaces.create('phase1-old', first);
      assert.equal(record.basePoint, first);
      assert.equal(record.baseRef, first);
      assert.equal(existsSync(join(record.path, 'later.txt')), false);
    });
  });

  describe('validate', () => {
    it('reports the committed change set', async () => {
      const record = await createWith('a', { 'src/a.txt': 'a\n' });
      const head = git(record.path, ['rev-parse', 'HEAD']).trim();

      assert.deepEqual(await coordinator.workspaces.validate(record.name), {
        name: 'phase1-a',
        branch: 'feature/phase1-a',
        basePoint: record.basePoint,
        head,
        changedPaths: ['src/a.txt'],
      });
    });

    it('rejects uncommitted files in the workspace', async () => {
      const record = await createWith('a', { 'a.txt': 'a\n' });
      writeFileSync(join(record.path, 'notes.txt'), 'scratch');

      await assert.rejects(coordinator.workspaces.validate(record.name), (error: unknown) => {
        assert.ok(error instanceof DirtyStateError);
        assert.deepEqual(error.paths, ['notes.txt']);
        assert.equal(error.kind, 'IsolationViolation');
        return true;
      });
    });

    it('rejects changes outside the allowed paths', async () => {
      const record = await coordinator.workspaces.create('phase1-scoped', undefined, { allowedPaths: ['src/'] });
      commitFile(record.path, 'src/ok.ts', 'ok\n');
      commitFile(record.path, 'docs/notes.md', 'out of scope\n');

      await assert.rejects(coordinator.workspaces.validate(record.name), (error: unknown) => {
        assert.ok(error instanceof IsolationViolationError);
        assert.deepEqual(error.violations, ['docs/notes.md']);
        return true;
      });
    });

    it('rejects a trunk checkout with modified tracked files', async () => {
      const record = await createWith('a', { 'a.txt': 'a\n' });
      writeFileSync(join(root, 'README.md'), '# edited on trunk\n');

      await assert.rejects(coordinator.workspaces.validate(record.name), (error: unknown) => {
        assert.ok(error instanceof IsolationViolationError);
        assert.deepEqual(error.violations, ['README.md']);
        assert.equal(error.message, 'Isolation violation in phase1-a: trunk checkout has uncommitted modifications');
        return true;
      });
    });

    it('reports a workspace whose directory is gone', async () => {
      const record = await createWith('a', {});
      rmSync(record.path, { recursive: true, force: true });
      await assert.rejects(coordinator.workspaces.validate(record.name), { name: 'WorkspaceNotFoundError' });
      await assert.rejects(coordinator.workspaces.validate('never-created'), {
        name: 'WorkspaceNotFoundError',
        kind: 'WorkspaceNotFound',
      });
    });

    it('requires the completion marker when configured', async () => {
      const strict = createCoordinator(testConfig(root, { workspace: { requireCompletionMarker: true } }));
      const record = await strict.workspaces.create('phase1-marked');
      commitFile(record.path, 'a.txt', 'a\n');

      await assert.rejects(strict.workspaces.validate(record.name), {
        name: 'IsolationViolationError',
        message: 'Isolation violation in phase1-marked: completion marker missing',
      });

      writeFileSync(join(record.path, '.workspace-complete'), 'done\n');
      const report = await strict.workspaces.validate(record.name);
      assert.deepEqual(report.changedPaths, ['a.txt']);
    });
  });

  describe('merge', () => {
    it('merges disjoint workspaces one after the other', async () => {
      const { workspaces, state } = coordinator;
      const a = await createWith('a', { 'a.txt': 'from a\n' });
      const b = await createWith('b', { 'b.txt': 'from b\n' });

      const first = await workspaces.merge(a.name);
      assert.equal(first.alreadyMerged, false);
      assert.equal(first.strategy, 'three-way');
      assert.deepEqual(first.changedPaths, ['a.txt']);
      assert.equal(first.mergeCommit, trunkHead());

      const second = await workspaces.merge(b.name);
      assert.equal(second.mergeCommit, trunkHead());
      assert.equal(readFileSync(join(root, 'a.txt'), 'utf-8'), 'from a\n');
      assert.equal(readFileSync(join(root, 'b.txt'), 'utf-8'), 'from b\n');
      assert.equal(git(root, ['log', '-1', '--format=%s']).trim(), 'Merge workspace phase1-b (phase1-b)');

      const record = await workspaces.get(a.name);
      assert.equal(record.status, 'merged');
      assert.equal(record.mergeStatus, 'merged');
      assert.equal(record.mergeCommit, first.mergeCommit);
      assert.equal(record.mergeOwner, null);

      const { document } = await state.read();
      assert.deepEqual(document.completedUnits, ['phase1-a', 'phase1-b']);
      assert.ok('workspace:phase1-a:merged' in document.signals);
      assert.ok('workspace:phase1-b:merged' in document.signals);
    });

    it('treats a repeated merge as already done', async () => {
      const a = await createWith('a', { 'a.txt': 'a\n' });
      const first = await coordinator.workspaces.merge(a.name);
      const again = await coordinator.workspaces.merge(a.name);
      assert.deepEqual(again, { ...first, alreadyMerged: true });
    });

    it('stops on overlapping change sets until every path is resolved', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'shared.txt': 'from a\n' });
      const b = await createWith('b', { 'shared.txt': 'from b\n' });
      await workspaces.merge(a.name);
      const before = trunkHead();

      await assert.rejects(workspaces.merge(b.name), (error: unknown) => {
        assert.ok(error instanceof MergeConflictError);
        assert.deepEqual(error.conflicts, ['shared.txt']);
        assert.equal(error.message, 'Merge of phase1-b stopped: change set overlaps merged workspace(s) phase1-a');
        return true;
      });
      assert.equal(trunkHead(), before);
      const conflicted = await workspaces.get(b.name);
      assert.equal(conflicted.status, 'conflict');
      assert.equal(conflicted.mergeStatus, 'conflict');
      assert.deepEqual(conflicted.conflicts, ['shared.txt']);

      await assert.rejects(workspaces.acceptTheirs(b.name, 'other.txt'), { name: 'ValidationFailedError' });
      const resolved = await workspaces.acceptTheirs(b.name, 'shared.txt');
      assert.deepEqual(resolved.resolutions, { 'shared.txt': { strategy: 'theirs' } });

      const result = await workspaces.merge(b.name);
      assert.equal(result.alreadyMerged, false);
      assert.equal(readFileSync(join(root, 'shared.txt'), 'utf-8'), 'from b\n');
      const merged = await workspaces.get(b.name);
      assert.equal(merged.status, 'merged');
      assert.deepEqual(merged.conflicts, []);
      assert.deepEqual(merged.resolutions, {});
      assert.equal(git(root, ['status', '--porcelain', '--untracked-files=no']), '');
    });

    it('applies supplied content for a conflicting path', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'README.md': '# fixture\nline from a\n' });
      const b = await createWith('b', { 'README.md': '# fixture\nline from b\n' });
      await workspaces.merge(a.name);
      await assert.rejects(workspaces.merge(b.name), { name: 'MergeConflictError' });

      await workspaces.provideResolved(b.name, 'README.md', '# fixture\nline from a\nline from b\n');
      await workspaces.merge(b.name);
      assert.equal(readFileSync(join(root, 'README.md'), 'utf-8'), '# fixture\nline from a\nline from b\n');
    });

    it('keeps the trunk version with acceptOurs', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'config.txt': 'trunk wins\n' });
      const b = await createWith('b', { 'config.txt': 'workspace loses\n', 'extra.txt': 'kept\n' });
      await workspaces.merge(a.name);
      await assert.rejects(workspaces.merge(b.name), { name: 'MergeConflictError' });

      await workspaces.acceptOurs(b.name, 'config.txt');
      await workspaces.merge(b.name);
      assert.equal(readFileSync(join(root, 'config.txt'), 'utf-8'), 'trunk wins\n');
      assert.equal(readFileSync(join(root, 'extra.txt'), 'utf-8'), 'kept\n');
    });

    it('refuses resolutions for workspaces that are not in conflict', async () => {
      const a = await createWith('a', { 'a.txt': 'a\n' });
      await assert.rejects(coordinator.workspaces.acceptOurs(a.name, 'a.txt'), {
        name: 'ValidationFailedError',
        message: 'Workspace phase1-a is not in conflict',
      });
    });

    it('waits for dependencies to merge first', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'a.txt': 'a\n' });
      const b = await createWith('b', { 'b.txt': 'b\n' }, [a.name]);

      await assert.rejects(workspaces.merge(b.name), (error: unknown) => {
        assert.ok(error instanceof DependencyPendingError);
        assert.equal(error.message, 'Workspace phase1-b must merge after: phase1-a');
        return true;
      });
      assert.equal((await workspaces.get(b.name)).status, 'active');

      await workspaces.merge(a.name);
      const result = await workspaces.merge(b.name);
      assert.equal(result.alreadyMerged, false);
    });

    it('fast-forwards only while the trunk has not moved', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'a.txt': 'a\n' });
      const b = await createWith('b', { 'b.txt': 'b\n' });
      const aHead = git(a.path, ['rev-parse', 'HEAD']).trim();

      const result = await workspaces.merge(a.name, 'fast-forward');
      assert.equal(result.mergeCommit, aHead);
      assert.equal(trunkHead(), aHead);

      await assert.rejects(workspaces.merge(b.name, 'fast-forward'), (error: unknown) => {
        assert.ok(error instanceof TrunkDivergedError);
        assert.equal(error.code, 'TRUNK_DIVERGED');
        assert.equal(error.message, 'Merge of phase1-b stopped: fast-forward not possible: trunk has diverged');
        return true;
      });
      assert.equal(trunkHead(), aHead);
      const diverged = await workspaces.get(b.name);
      assert.equal(diverged.status, 'active');
      assert.equal(diverged.mergeStatus, 'aborted');
      assert.equal(diverged.failureReason, 'fast-forward not possible: trunk has diverged');
      assert.deepEqual(diverged.conflicts, []);

      const retried = await workspaces.merge(b.name, 'three-way');
      assert.equal(retried.alreadyMerged, false);
      assert.equal((await workspaces.get(b.name)).status, 'merged');
    });

    it('serializes concurrent merges so the second sees the first one\'s paths', async () => {
      commitFile(root, 'shared.txt', 'one\ntwo\nthree\nfour\nfive\nsix\nseven\neight\n');
      const a = await createWith('a', { 'shared.txt': 'ONE\ntwo\nthree\nfour\nfive\nsix\nseven\neight\n' });
      const b = await createWith('b', { 'shared.txt': 'one\ntwo\nthree\nfour\nfive\nsix\nseven\nEIGHT\n' });
      const first = createCoordinator(testConfig(root, { locks: { defaultTimeoutMs: 60_000 } }));
      const second = createCoordinator(testConfig(root, { locks: { defaultTimeoutMs: 60_000 } }));

      const results = await Promise.allSettled([first.workspaces.merge(a.name), second.workspaces.merge(b.name)]);
      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.flatMap((r): unknown[] => (r.status === 'rejected' ? [r.reason] : []));
      assert.equal(fulfilled.length, 1);
      assert.equal(rejected.length, 1);
      const error = rejected[0];
      assert.ok(error instanceof MergeConflictError);
      assert.deepEqual(error.conflicts, ['shared.txt']);
      assert.match(error.message, /^Merge of phase1-[ab] stopped: change set overlaps merged workspace\(s\) phase1-[ab]$/);

      const statuses = (await coordinator.workspaces.list()).map((r) => r.status).sort();
      assert.deepEqual(statuses, ['conflict', 'merged']);
      const trunkContent = readFileSync(join(root, 'shared.txt'), 'utf-8');
      assert.ok(
        trunkContent === 'ONE\ntwo\nthree\nfour\nfive\nsix\nseven\neight\n' ||
          trunkContent === 'one\ntwo\nthree\nfour\nfive\nsix\nseven\nEIGHT\n'
      );
      assert.equal(git(root, ['status', '--porcelain', '--untracked-files=no']), '');
    });

    it('repairs a corrupt index before merging', async () => {
      const { workspaces, config } = coordinator;
      const a = await createWith('a', { 'a.txt': 'a\n' });
      await workspaces.index.write((doc) => doc, 'test:touch');
      writeFileSync(config.paths.workspaceIndexFile, '{ truncated');

      const result = await workspaces.merge(a.name);
      assert.equal(result.alreadyMerged, false);
      assert.equal((await workspaces.get(a.name)).status, 'merged');
    });

    it('squashes the workspace into one trunk commit', async () => {
      const record = await createWith('c', { 'c1.txt': '1\n', 'c2.txt': '2\n' });
      const before = trunkHead();

      const result = await coordinator.workspaces.merge(record.name, 'squash');
      assert.equal(result.strategy, 'squash');
      assert.deepEqual(result.changedPaths, ['c1.txt', 'c2.txt']);
      assert.equal(git(root, ['rev-parse', 'HEAD~1']).trim(), before);
      assert.equal(git(root, ['log', '-1', '--format=%s']).trim(), 'Squash workspace phase1-c (phase1-c)');
      assert.equal(git(root, ['rev-list', '--parents', '-n', '1', 'HEAD']).trim().split(' ').length, 2);
    });
  });

  describe('cleanup', () => {
    it('archives a merged workspace and removes its worktree and branch', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'src/a.txt': 'a\n' });
      await workspaces.merge(a.name);

      const result = await workspaces.cleanup(a.name, { archive: true });
      assert.equal(result.status, 'archived');
      assert.ok(result.archivePath);
      assert.match(result.archivePath, /phase1-a-\d{8}T\d{9}Z\.manifest\.json$/);

      const manifest: unknown = JSON.parse(readFileSync(result.archivePath, 'utf-8'));
      assert.ok(typeof manifest === 'object' && manifest !== null);
      assert.deepEqual(Reflect.get(manifest, 'changedPaths'), ['src/a.txt']);
      const tarball: unknown = Reflect.get(manifest, 'tarball');
      assert.ok(typeof tarball === 'string' && existsSync(tarball));

      assert.equal(existsSync(a.path), false);
      assert.equal(git(root, ['branch', '--list', a.branch]).trim(), '');
      const record = await workspaces.get(a.name);
      assert.equal(record.status, 'archived');
      assert.equal(record.archivePath, result.archivePath);

      // Merging an archived workspace reports the earlier merge
      const again = await workspaces.merge(a.name);
      assert.equal(again.alreadyMerged, true);
    });

    it('keeps unmerged work unless forced', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'a.txt': 'a\n' });

      await assert.rejects(workspaces.cleanup(a.name), { name: 'DirtyStateError' });
      assert.ok(existsSync(a.path));

      const result = await workspaces.cleanup(a.name, { force: true });
      assert.deepEqual(result, { name: 'phase1-a', status: 'failed', archivePath: null });
      const record = await workspaces.get(a.name);
      assert.equal(record.failureReason, 'abandoned');
      assert.equal(record.mergeStatus, 'aborted');
      assert.equal(existsSync(a.path), false);

      // A terminal record only has its leftovers removed
      assert.deepEqual(await workspaces.cleanup(a.name), result);
    });

    it('skips archiving while degraded mode disables it', async () => {
      const a = await createWith('a', { 'a.txt': 'a\n' });
      await coordinator.workspaces.merge(a.name);
      await coordinator.recovery.enterDegradedMode('archive disk full', ['workspace-archive']);

      await assert.rejects(coordinator.workspaces.cleanup(a.name, { archive: true }), {
        name: 'FeatureDisabledError',
      });
      const result = await coordinator.workspaces.cleanup(a.name);
      assert.deepEqual(result, { name: 'phase1-a', status: 'archived', archivePath: null });
    });

    it('cleans up every merged workspace at once', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'a.txt': 'a\n' });
      const b = await createWith('b', { 'b.txt': 'b\n' });
      await createWith('c', { 'c.txt': 'c\n' });
      await workspaces.merge(a.name);
      await workspaces.merge(b.name);

      const results = await workspaces.cleanupCompleted();
      assert.deepEqual(
        results.map((r) => [r.name, r.status]),
        [
          ['phase1-a', 'archived'],
          ['phase1-b', 'archived'],
        ]
      );
      assert.equal((await workspaces.get('phase1-c')).status, 'active');
    });
  });

  describe('queries', () => {
    it('lists, filters and summarizes workspaces', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'a.txt': 'a\n' });
      await createWith('b', {});
      await workspaces.merge(a.name);

      assert.deepEqual(
        (await workspaces.list()).map((r) => r.name),
        ['phase1-a', 'phase1-b']
      );
      assert.deepEqual(
        (await workspaces.list({ status: 'active' })).map((r) => r.name),
        ['phase1-b']
      );
      const summary = await workspaces.summary();
      assert.equal(summary.total, 2);
      assert.deepEqual(summary.byStatus, { active: 1, validating: 0, merged: 1, conflict: 0, archived: 0, failed: 0 });
    });

    it('reports live details of a workspace', async () => {
      const a = await createWith('a', { 'a.txt': 'a\n' });
      writeFileSync(join(a.path, 'wip.txt'), 'wip');

      const detail = await coordinator.workspaces.status(a.name);
      assert.equal(detail.exists, true);
      assert.equal(detail.registered, true);
      assert.equal(detail.head, git(a.path, ['rev-parse', 'HEAD']).trim());
      assert.deepEqual(detail.uncommitted, ['wip.txt']);
    });

    it('finds the workspace containing a directory', async () => {
      const a = await createWith('a', { 'src/a.txt': 'a\n' });
      assert.equal((await coordinator.workspaces.current(join(a.path, 'src')))?.name, 'phase1-a');
      assert.equal(await coordinator.workspaces.current(root), null);
    });
  });

  describe('repair', () => {
    it('drops records whose worktree vanished and archives merged ones', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'a.txt': 'a\n' });
      const b = await createWith('b', { 'b.txt': 'b\n' });
      await workspaces.merge(b.name);
      rmSync(a.path, { recursive: true, force: true });
      rmSync(b.path, { recursive: true, force: true });

      const report = await workspaces.repair();
      assert.equal(report.pruned, true);
      assert.deepEqual(report.removedRecords, ['phase1-a']);
      assert.deepEqual(report.reset, [{ name: 'phase1-b', from: 'merged', to: 'archived' }]);
      assert.deepEqual(
        (await workspaces.list()).map((r) => [r.name, r.status]),
        [['phase1-b', 'archived']]
      );
      assert.equal(git(root, ['worktree', 'list', '--porcelain']).includes(a.path), false);
    });

    it('reports directories no record claims', async () => {
      await createWith('a', {});
      mkdirSync(join(root, 'worktrees', 'stray'), { recursive: true });

      const report = await coordinator.workspaces.repair();
      assert.deepEqual(report.orphans, [join(root, 'worktrees', 'stray')]);
      assert.deepEqual(report.removedRecords, []);
    });

    it('returns an interrupted merge to active', async () => {
      const { workspaces } = coordinator;
      const a = await createWith('a', { 'a.txt': 'a\n' });
      await markValidating(a.name, DEAD_PID);

      const report = await workspaces.repair();
      assert.deepEqual(report.reset, [{ name: 'phase1-a', from: 'validating', to: 'active' }]);
      const record = await workspaces.get(a.name);
      assert.equal(record.status, 'active');
      assert.equal(record.mergeStatus, 'aborted');
      assert.equal(record.failureReason, 'merge interrupted');
      assert.equal(record.mergeOwner, null);
    });

    it('completes an interrupted merge that already reached the trunk', async () => {
      const { workspaces, state } = coordinator;
      const a = await createWith('a', { 'a.txt': 'a\n' });
      git(root, ['merge', '--no-ff', '--no-edit', '-q', '-m', 'merged by hand', a.branch]);
      await markValidating(a.name, DEAD_PID);

      const report = await workspaces.repair();
      assert.deepEqual(report.reset, [{ name: 'phase1-a', from: 'validating', to: 'merged' }]);
      const record = await workspaces.get(a.name);
      assert.equal(record.status, 'merged');
      assert.equal(record.mergeCommit, trunkHead());

      const { document } = await state.read();
      assert.deepEqual(document.completedUnits, ['phase1-a']);
      assert.ok('workspace:phase1-a:merged' in document.signals);
    });

    it('leaves merges with a live owner alone', async () => {
      const a = await createWith('a', { 'a.txt': 'a\n' });
      await markValidating(a.name, process.pid);

      const report = await coordinator.workspaces.repair();
      assert.deepEqual(report.skipped, ['phase1-a']);
      assert.equal((await coordinator.workspaces.get(a.name)).status, 'validating');
    });
  });
});
