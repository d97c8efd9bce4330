import { basename, join } from 'path';
import { mkdirSync, rmSync, renameSync } from 'fs';
import { BackendError, WorktreeDirectoryExistsError } from '../errors.ts';
import type { WorktreeBackend } from '../backend.ts';
import type { WorktreeRecord, WorktreeStatus } from '../types.ts';

const CLEAN: WorktreeStatus = { dirty: false, ahead: 0, behind: 0, modified: 0, untracked: 0, staged: 0 };

/**
 * In-memory stand-in for git. Keeps worktrees as `path → branch`, logs every
 * mutating call, and fails a call when `failures` holds an error under
 * `<method>` or `<method>:<worktree name>`.
 *
 * With `materialize` set, worktree directories are also created and removed
 * on disk so code that touches the filesystem can run against it.
 */
export class FakeBackend implements WorktreeBackend {
  readonly branches: Set<string>;
  readonly worktrees = new Map<string, string>();
  readonly calls: string[] = [];
  readonly failures = new Map<string, Error>();
  readonly statuses = new Map<string, WorktreeStatus>();
  /** Paths occupied by something other than a worktree, e.g. the main checkout. */
  readonly occupied = new Set<string>();
  private readonly materialize: boolean;

  constructor(args: { branches: string[]; worktrees?: Record<string, string>; materialize?: boolean }) {
    this.branches = new Set(args.branches);
    this.materialize = args.materialize ?? false;
    for (const [path, branch] of Object.entries(args.worktrees ?? {})) {
      this.worktrees.set(path, branch);
      if (this.materialize) {
        mkdirSync(path, { recursive: true });
      }
    }
  }

  private failIfConfigured(method: string, name?: string) {
    const error = (name !== undefined ? this.failures.get(`${method}:${name}`) : undefined) ?? this.failures.get(method);
    if (error) {
      throw error;
    }
  }

  private assertBranchFree(branch: string) {
    for (const [path, checkedOut] of this.worktrees) {
      if (checkedOut === branch) {
        throw new BackendError({
          message: `branch '${branch}' is already checked out at ${path}`,
          command: 'git worktree add',
          exitCode: 128,
          stderr: '',
        });
      }
    }
  }

  private assertExists(path: string, command: string) {
    if (!this.worktrees.has(path)) {
      throw new BackendError({ message: `not a worktree: ${path}`, command, exitCode: 128, stderr: '' });
    }
  }

  listWorktrees(): WorktreeRecord[] {
    this.failIfConfigured('listWorktrees');
    return [...this.worktrees].map(([path, branch]) => ({ name: basename(path), path, currentBranch: branch }));
  }

  branchExists(branch: string) {
    this.failIfConfigured('branchExists', branch);
    return this.branches.has(branch);
  }

  fetch() {
    this.calls.push('fetch');
    this.failIfConfigured('fetch');
  }

  createWorktree(args: { name: string; branch: string; prefix: string }) {
    this.failIfConfigured('createWorktree', args.name);
    const path = join(args.prefix, args.name);
    if (this.worktrees.has(path) || this.occupied.has(path)) {
      throw new WorktreeDirectoryExistsError({ path });
    }
    this.assertBranchFree(args.branch);
    this.worktrees.set(path, args.branch);
    if (this.materialize) {
      mkdirSync(path, { recursive: true });
    }
    this.calls.push(`create:${args.name}:${args.branch}`);
  }

  removeWorktree(args: { path: string }) {
    this.failIfConfigured('removeWorktree', basename(args.path));
    this.assertExists(args.path, 'git worktree remove');
    this.worktrees.delete(args.path);
    if (this.materialize) {
      rmSync(args.path, { recursive: true, force: true });
    }
    this.calls.push(`remove:${basename(args.path)}`);
  }

  retargetWorktree(args: { path: string; branch: string }) {
    this.failIfConfigured('retargetWorktree', basename(args.path));
    this.assertExists(args.path, 'git checkout');
    this.assertBranchFree(args.branch);
    this.worktrees.set(args.path, args.branch);
    this.calls.push(`retarget:${basename(args.path)}:${args.branch}`);
  }

  promoteWorktree(args: { sourcePath: string; targetPath: string }) {
    this.failIfConfigured('promoteWorktree', basename(args.targetPath));
    this.assertExists(args.sourcePath, 'git worktree move');
    const branch = this.worktrees.get(args.sourcePath) ?? '';
    this.worktrees.delete(args.targetPath);
    this.worktrees.delete(args.sourcePath);
    this.worktrees.set(args.targetPath, branch);
    if (this.materialize) {
      rmSync(args.targetPath, { recursive: true, force: true });
      renameSync(args.sourcePath, args.targetPath);
    }
    this.calls.push(`promote:${basename(args.sourcePath)}->${basename(args.targetPath)}`);
  }

  status(args: { path: string }) {
    this.failIfConfigured('status', basename(args.path));
    return this.statuses.get(args.path) ?? CLEAN;
  }

  addWorktree(args: { name: string; branch: string; createBranch: boolean; baseBranch: string; prefix: string }) {
    this.failIfConfigured('addWorktree', args.name);
    const path = join(args.prefix, args.name);
    if (this.worktrees.has(path) || this.occupied.has(path)) {
      throw new WorktreeDirectoryExistsError({ path });
    }
    if (!this.branches.has(args.branch)) {
      if (!args.createBranch) {
        throw new BackendError({ message: `branch '${args.branch}' does not exist`, command: 'git worktree add', exitCode: null, stderr: '' });
      }
      this.branches.add(args.branch);
    }
    this.assertBranchFree(args.branch);
    this.worktrees.set(path, args.branch);
    if (this.materialize) {
      mkdirSync(path, { recursive: true });
    }
    this.calls.push(`add:${args.name}:${args.branch}`);
    return path;
  }

  pushWorktree(args: { path: string }) {
    this.calls.push(`push:${basename(args.path)}`);
    this.failIfConfigured('pushWorktree', basename(args.path));
  }

  pullWorktree(args: { path: string }) {
    this.calls.push(`pull:${basename(args.path)}`);
    this.failIfConfigured('pullWorktree', basename(args.path));
  }

  /** Calls that changed worktrees, i.e. everything but fetch, push and pull. */
  mutations() {
    return this.calls.filter(call => !/^(fetch|push|pull)\b/.test(call));
  }
}
