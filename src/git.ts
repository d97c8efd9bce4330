import { execFileSync } from 'child_process';
import { existsSync, readdirSync, realpathSync, rmdirSync, statSync, mkdirSync } from 'fs';
import { basename, dirname, resolve } from 'path';
import { BackendError, WorktreeDirectoryExistsError } from './errors.ts';
import type { WorktreeBackend } from './backend.ts';
import type { WorktreeRecord, WorktreeStatus } from './types.ts';

export const DETACHED_BRANCH = '(detached)' as const;
export const DEFAULT_REMOTE = 'origin' as const;

type ExecFailure = {
  status?: number | null;
  stderr?: unknown;
};

const isExecFailure = (value: unknown): value is Error & ExecFailure =>
  value instanceof Error && 'status' in value;

function outputText(value: unknown) {
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return '';
}

function describeFailure(args: { operation: string; stderr: string; exitCode: number | null }) {
  const stderr = args.stderr.trim();
  if (stderr.includes('already checked out') || stderr.includes('is already used by worktree')) {
    return 'branch is already checked out in another worktree';
  }
  if (stderr.includes('not a git repository')) {
    return 'not a git repository';
  }
  if (stderr.includes('already exists')) {
    return 'worktree directory already exists';
  }
  if (stderr) {
    return `git ${args.operation} failed: ${stderr}`;
  }
  return `git ${args.operation} failed (exit ${args.exitCode ?? 'unknown'})`;
}

/** Runs git with an argument vector; throws BackendError with stderr attached. */
export function exec(args: { args: string[]; cwd: string; interactive?: boolean; raw?: boolean }) {
  const command = `git ${args.args.join(' ')}`;
  try {
    const result = execFileSync('git', args.args, {
      cwd: args.cwd,
      encoding: 'utf8',
      stdio: args.interactive ? 'inherit' : 'pipe',
    });

    if (typeof result === 'string') {
      return args.raw ? result : result.trim();
    }

    return '';
  } catch (error) {
    const exitCode = isExecFailure(error) ? error.status ?? null : null;
    const stderr = isExecFailure(error) ? outputText(error.stderr) : '';
    throw new BackendError({
      message: describeFailure({ operation: args.args[0] ?? '', stderr, exitCode }),
      command,
      exitCode,
      stderr,
      cause: error,
    });
  }
}

/** Like exec, but a failing command yields null. For probes only. */
export function execQuiet(args: { args: string[]; cwd: string }) {
  try {
    return exec({ args: args.args, cwd: args.cwd });
  } catch (error) {
    if (error instanceof BackendError) {
      return null;
    }
    throw error;
  }
}

export function isGitRepo(args: { cwd: string }) {
  return execQuiet({ args: ['rev-parse', '--is-inside-work-tree'], cwd: args.cwd }) === 'true';
}

export function getGitRoot(args: { cwd: string }) {
  return execQuiet({ args: ['rev-parse', '--show-toplevel'], cwd: args.cwd }) ?? '';
}

export function getCurrentBranch(args: { cwd: string }) {
  return execQuiet({ args: ['branch', '--show-current'], cwd: args.cwd }) ?? '';
}

export function resolveRealPath(args: { path: string }) {
  try {
    return realpathSync(args.path);
  } catch (error) {
    return args.path;
  }
}

/** Parses `git worktree list --porcelain`. The first entry is the main worktree. */
export function parseWorktreeList(args: { output: string; resolvePath: (path: string) => string }) {
  const worktrees: WorktreeRecord[] = [];
  let current: { path?: string; branch?: string } = {};

  const flush = () => {
    if (current.path) {
      const path = args.resolvePath(current.path);
      worktrees.push({
        name: basename(path),
        path,
        currentBranch: current.branch || DETACHED_BRANCH,
      });
    }
    current = {};
  };

  for (const rawLine of args.output.split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith('worktree ')) {
      flush();
      current.path = line.substring(9);
    } else if (line.startsWith('branch ')) {
      current.branch = line.substring(7).replace('refs/heads/', '');
    } else if (line === '') {
      flush();
    }
  }
  flush();

  return worktrees;
}

export function listWorktrees(args: { repoRoot: string }) {
  const output = exec({ args: ['worktree', 'list', '--porcelain'], cwd: args.repoRoot });
  return parseWorktreeList({ output, resolvePath: path => resolveRealPath({ path }) });
}

/** Parses `git status --porcelain` lines into change counters. */
export function parseStatusPorcelain(args: { output: string }) {
  const lines = args.output.split('\n').filter(line => line.length > 0);
  let modified = 0;
  let untracked = 0;
  let staged = 0;

  for (const line of lines) {
    const indexStatus = line[0] ?? ' ';
    const worktreeStatus = line[1] ?? ' ';

    if (indexStatus === '?' && worktreeStatus === '?') {
      untracked++;
      continue;
    }
    if ('AMDRC'.includes(indexStatus)) {
      staged++;
    }
    if (worktreeStatus === 'M' || worktreeStatus === 'D') {
      modified++;
    }
  }

  return { dirty: lines.length > 0, modified, untracked, staged };
}

export function getWorktreeStatus(args: { path: string }): WorktreeStatus {
  const worktreePath = args.path;
  if (!existsSync(worktreePath)) {
    throw new BackendError({
      message: `worktree path does not exist: ${worktreePath}`,
      command: 'git status',
      exitCode: null,
      stderr: '',
    });
  }

  // Untrimmed: a leading space is a status column.
  const statusOutput = exec({ args: ['status', '--porcelain'], cwd: worktreePath, raw: true });
  const changes = parseStatusPorcelain({ output: statusOutput });

  let ahead = 0;
  let behind = 0;
  const aheadBehind = execQuiet({ args: ['rev-list', '--left-right', '--count', 'HEAD...@{upstream}'], cwd: worktreePath });
  if (aheadBehind) {
    const parts = aheadBehind.split(/\s+/);
    if (parts.length === 2) {
      ahead = parseInt(parts[0] || '0', 10);
      behind = parseInt(parts[1] || '0', 10);
    }
  }

  return { ...changes, ahead, behind };
}

function getUpstreamBranch(args: { path: string }) {
  return execQuiet({ args: ['rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{upstream}'], cwd: args.path }) ?? '';
}

function verifyRef(args: { ref: string; cwd: string }) {
  return execQuiet({ args: ['rev-parse', '--verify', '--quiet', args.ref], cwd: args.cwd }) !== null;
}

function isEmptyDirectory(args: { path: string }) {
  try {
    return statSync(args.path).isDirectory() && readdirSync(args.path).length === 0;
  } catch (error) {
    return false;
  }
}

/** Git implementation of the worktree backend, rooted at the main worktree. */
export function createGitBackend(args: { repoRoot: string; remote?: string }): WorktreeBackend {
  const repoRoot = args.repoRoot;
  const remote = args.remote ?? DEFAULT_REMOTE;

  const localBranchExists = (branch: string) => verifyRef({ ref: `refs/heads/${branch}`, cwd: repoRoot });
  const remoteBranchExists = (branch: string) => verifyRef({ ref: `refs/remotes/${remote}/${branch}`, cwd: repoRoot });

  const createWorktree = (createArgs: { name: string; branch: string; prefix: string }) => {
    const worktreePath = resolve(repoRoot, createArgs.prefix, createArgs.name);

    // An empty placeholder (e.g. kept for .gitignore) is not a real checkout.
    if (isEmptyDirectory({ path: worktreePath })) {
      rmdirSync(worktreePath);
    }
    if (existsSync(worktreePath)) {
      throw new WorktreeDirectoryExistsError({ path: worktreePath });
    }

    const branch = createArgs.branch;
    const hasLocal = localBranchExists(branch);
    const hasRemote = remoteBranchExists(branch);
    if (!hasLocal && !hasRemote) {
      throw new BackendError({
        message: `branch '${branch}' does not exist`,
        command: 'git worktree add',
        exitCode: null,
        stderr: '',
      });
    }

    mkdirSync(dirname(worktreePath), { recursive: true });
    if (hasLocal) {
      exec({ args: ['worktree', 'add', worktreePath, branch], cwd: repoRoot });
      if (hasRemote) {
        exec({ args: ['branch', `--set-upstream-to=${remote}/${branch}`, branch], cwd: worktreePath });
      }
    } else {
      exec({ args: ['worktree', 'add', '--track', '-b', branch, worktreePath, `${remote}/${branch}`], cwd: repoRoot });
    }
  };

  const removeWorktree = (removeArgs: { path: string }) => {
    exec({ args: ['worktree', 'remove', '--force', removeArgs.path], cwd: repoRoot });
  };

  return {
    listWorktrees: () => listWorktrees({ repoRoot }),

    branchExists: branch => localBranchExists(branch) || remoteBranchExists(branch),

    fetch: () => {
      exec({ args: ['fetch', '--prune', remote], cwd: repoRoot });
    },

    createWorktree,

    removeWorktree,

    retargetWorktree: retargetArgs => {
      removeWorktree({ path: retargetArgs.path });
      createWorktree({
        name: basename(retargetArgs.path),
        branch: retargetArgs.branch,
        prefix: dirname(retargetArgs.path),
      });
    },

    promoteWorktree: promoteArgs => {
      removeWorktree({ path: promoteArgs.targetPath });
      exec({ args: ['worktree', 'move', promoteArgs.sourcePath, promoteArgs.targetPath], cwd: repoRoot });
    },

    status: statusArgs => getWorktreeStatus({ path: statusArgs.path }),

    addWorktree: addArgs => {
      const worktreePath = resolve(repoRoot, addArgs.prefix, addArgs.name);
      if (existsSync(worktreePath)) {
        throw new WorktreeDirectoryExistsError({ path: worktreePath });
      }
      mkdirSync(dirname(worktreePath), { recursive: true });

      const branch = addArgs.branch;
      const baseBranch = addArgs.baseBranch;
      const exists = localBranchExists(branch) || remoteBranchExists(branch);

      if (addArgs.createBranch && !exists) {
        const base = baseBranch ? [baseBranch] : [];
        exec({ args: ['worktree', 'add', '-b', branch, worktreePath, ...base], cwd: repoRoot });
        return worktreePath;
      }

      if (!exists) {
        throw new BackendError({
          message: `branch '${branch}' does not exist`,
          command: 'git worktree add',
          exitCode: null,
          stderr: '',
        });
      }

      if (addArgs.createBranch && baseBranch) {
        const mergeBase = exec({ args: ['merge-base', branch, baseBranch], cwd: repoRoot });
        const baseCommit = exec({ args: ['rev-parse', baseBranch], cwd: repoRoot });
        if (mergeBase !== baseCommit) {
          throw new BackendError({
            message: `branch '${branch}' exists but is not based on '${baseBranch}'; delete it or pick another name`,
            command: 'git merge-base',
            exitCode: null,
            stderr: '',
          });
        }
      }

      if (localBranchExists(branch)) {
        exec({ args: ['worktree', 'add', worktreePath, branch], cwd: repoRoot });
      } else {
        exec({ args: ['worktree', 'add', '--track', '-b', branch, worktreePath, `${remote}/${branch}`], cwd: repoRoot });
      }
      return worktreePath;
    },

    pushWorktree: pushArgs => {
      const branch = getCurrentBranch({ cwd: pushArgs.path });
      if (!branch) {
        throw new BackendError({ message: 'worktree is in detached HEAD state', command: 'git push', exitCode: null, stderr: '' });
      }
      const upstream = getUpstreamBranch({ path: pushArgs.path });
      const pushArgv = upstream ? ['push'] : ['push', '-u', remote, branch];
      exec({ args: pushArgv, cwd: pushArgs.path, interactive: true });
    },

    pullWorktree: pullArgs => {
      const branch = getCurrentBranch({ cwd: pullArgs.path });
      if (!branch) {
        throw new BackendError({ message: 'worktree is in detached HEAD state', command: 'git pull', exitCode: null, stderr: '' });
      }
      const pullArgv = ['pull'];
      if (!getUpstreamBranch({ path: pullArgs.path })) {
        if (remoteBranchExists(branch)) {
          exec({ args: ['branch', `--set-upstream-to=${remote}/${branch}`], cwd: pullArgs.path });
        } else {
          pullArgv.push(remote, branch);
        }
      }
      exec({ args: pullArgv, cwd: pullArgs.path, interactive: true });
    },
  };
}
