import { join } from 'path';
import { existsSync, statSync } from 'fs';
import { applyCopyRules } from './file-copy.ts';
import { errorMessage, ValidationError } from './errors.ts';
import {
  addAdHocWorktree,
  getWorktreeBaseBranch,
  removeAdHocWorktree,
  removeWorktreeBaseBranch,
  setCurrentWorktree,
  setWorktreeBaseBranch,
} from './state.ts';
import { managedRecords } from './sync/diff.ts';
import { findProductionWorktree, mergeChainBranches } from './merge-chain.ts';
import type { WorktreeBackend } from './backend.ts';
import type { CopyResult } from './file-copy.ts';
import type { BatchItemResult, CopyRule, DesiredState, RepoInfo, RuntimeState, WorktreeStatus } from './types.ts';

/** Everything a lifecycle operation needs, built once per command. */
export type Session = {
  repo: RepoInfo;
  backend: WorktreeBackend;
  /** Null when the repository has no worktree mapping yet */
  desired: DesiredState | null;
  state: RuntimeState;
  copyRules: CopyRule[];
  persist: (state: RuntimeState) => void;
};

export type WorktreeEntry = {
  name: string;
  path: string;
  /** Declared branch, or the current one for ad hoc worktrees */
  expectedBranch: string;
  /** Null when the declared worktree is not materialized */
  currentBranch: string | null;
  tracked: boolean;
  adHoc: boolean;
  baseBranch: string | undefined;
  status: WorktreeStatus | null;
};

const isDeclared = (session: Session, name: string) => session.desired?.worktrees.has(name) ?? false;

function persistSoftly(session: Session, warnings: string[]) {
  try {
    session.persist(session.state);
  } catch (error) {
    warnings.push(`failed to save state: ${errorMessage(error)}`);
  }
}

export function worktreePath(args: { session: Session; name: string }) {
  return join(args.session.repo.managedPrefix, args.name);
}

/**
 * Creates a worktree outside the declared mapping. Only the backend call can
 * fail; file copying and state persistence report warnings instead.
 */
export async function addWorktree(args: {
  session: Session;
  name: string;
  branch: string;
  createBranch: boolean;
  baseBranch: string;
}) {
  const session = args.session;
  const warnings: string[] = [];

  const path = session.backend.addWorktree({
    name: args.name,
    branch: args.branch,
    createBranch: args.createBranch,
    baseBranch: args.baseBranch,
    prefix: session.repo.managedPrefix,
  });

  const adHoc = !isDeclared(session, args.name);
  let copy: CopyResult | null = null;
  if (adHoc) {
    copy = await applyCopyRules({ rules: session.copyRules, managedPrefix: session.repo.managedPrefix, targetPath: path });
    warnings.push(...copy.warnings);
  }

  setWorktreeBaseBranch({ state: session.state, worktree: args.name, baseBranch: args.baseBranch });
  if (adHoc) {
    addAdHocWorktree({ state: session.state, worktree: args.name });
  }

  persistSoftly(session, warnings);

  return { path, adHoc, copy, warnings };
}

export function removeWorktree(args: { session: Session; name: string }) {
  const session = args.session;
  const warnings: string[] = [];

  session.backend.removeWorktree({ path: worktreePath({ session, name: args.name }) });

  removeAdHocWorktree({ state: session.state, worktree: args.name });
  removeWorktreeBaseBranch({ state: session.state, worktree: args.name });
  persistSoftly(session, warnings);

  return { warnings };
}

export type HotfixPlan = {
  worktree: string;
  branch: string;
  /** Branch of the production worktree the hotfix starts from */
  baseBranch: string;
  /** Branches the fix is merged back through, production first */
  deploymentChain: string[];
};

export function planHotfix(args: { desired: DesiredState | null; name: string; hotfixPrefix: string }): HotfixPlan {
  const production = args.desired ? findProductionWorktree({ desired: args.desired }) : null;
  if (!args.desired || !production) {
    throw new ValidationError({ message: 'No production branch found: declare worktrees in the mapping file first' });
  }

  return {
    worktree: args.hotfixPrefix ? `${args.hotfixPrefix}_${args.name}` : args.name,
    branch: `hotfix/${args.name}`,
    baseBranch: production.branch,
    deploymentChain: mergeChainBranches({ desired: args.desired, from: production.name }),
  };
}

/** Records `name` as the current worktree and returns its path. */
export function switchWorktree(args: { session: Session; name: string }) {
  const session = args.session;
  const path = worktreePath({ session, name: args.name });
  if (!existsSync(path)) {
    throw new ValidationError({ message: `worktree directory '${args.name}' does not exist` });
  }

  const warnings: string[] = [];
  setCurrentWorktree({ state: session.state, worktree: args.name });
  persistSoftly(session, warnings);

  return { path, warnings };
}

function modifiedTime(path: string) {
  try {
    return statSync(path).mtimeMs;
  } catch (error) {
    return 0;
  }
}

/** Tracked names first (alphabetical), then ad hoc ones, newest directory first. */
export function sortWorktreeEntries(args: { entries: WorktreeEntry[]; mtime?: (path: string) => number }) {
  const mtime = args.mtime ?? modifiedTime;
  const tracked = args.entries.filter(entry => entry.tracked).sort((left, right) => left.name.localeCompare(right.name));
  const others = args.entries
    .filter(entry => !entry.tracked)
    .map(entry => ({ entry, time: mtime(entry.path) }))
    .sort((left, right) => right.time - left.time || left.entry.name.localeCompare(right.entry.name))
    .map(item => item.entry);
  return [...tracked, ...others];
}

export function listWorktreeEntries(args: { session: Session; withStatus: boolean }) {
  const session = args.session;
  const records = managedRecords({
    actual: session.backend.listWorktrees(),
    managedPrefix: session.repo.managedPrefix,
  });
  const byName = new Map(records.map(record => [record.name, record]));
  const entries: WorktreeEntry[] = [];

  const statusOf = (path: string) => {
    if (!args.withStatus) {
      return null;
    }
    try {
      return session.backend.status({ path });
    } catch (error) {
      return null;
    }
  };

  for (const [name, declared] of session.desired?.worktrees ?? []) {
    const record = byName.get(name);
    entries.push({
      name,
      path: record?.path ?? worktreePath({ session, name }),
      expectedBranch: declared.branch,
      currentBranch: record?.currentBranch ?? null,
      tracked: true,
      adHoc: false,
      baseBranch: getWorktreeBaseBranch({ state: session.state, worktree: name }),
      status: record ? statusOf(record.path) : null,
    });
    byName.delete(name);
  }

  for (const record of byName.values()) {
    entries.push({
      name: record.name,
      path: record.path,
      expectedBranch: record.currentBranch,
      currentBranch: record.currentBranch,
      tracked: false,
      adHoc: session.state.adHocWorktrees.includes(record.name),
      baseBranch: getWorktreeBaseBranch({ state: session.state, worktree: record.name }),
      status: statusOf(record.path),
    });
  }

  return sortWorktreeEntries({ entries });
}

/**
 * Runs `action` on every named worktree. Unlike a sync pass this keeps going
 * after a failure and reports each worktree separately.
 */
export function forEachWorktree(args: {
  session: Session;
  names: string[];
  action: (path: string) => void;
  onStart?: (name: string) => void;
}) {
  const results: BatchItemResult[] = [];
  for (const name of args.names) {
    args.onStart?.(name);
    try {
      args.action(worktreePath({ session: args.session, name }));
      results.push({ name, ok: true });
    } catch (error) {
      results.push({ name, ok: false, error: errorMessage(error) });
    }
  }
  return results;
}

export function pushWorktrees(args: { session: Session; names: string[]; onStart?: (name: string) => void }) {
  const backend = args.session.backend;
  return forEachWorktree({ ...args, action: path => backend.pushWorktree({ path }) });
}

export function pullWorktrees(args: { session: Session; names: string[]; onStart?: (name: string) => void }) {
  const backend = args.session.backend;
  return forEachWorktree({ ...args, action: path => backend.pullWorktree({ path }) });
}

/** Checks every declared branch, reporting all of them rather than stopping at the first. */
export function checkDeclaredBranches(args: { backend: WorktreeBackend; desired: DesiredState }) {
  return [...args.desired.worktrees.values()]
    .sort((left, right) => left.name.localeCompare(right.name))
    .map(worktree => ({
      name: worktree.name,
      branch: worktree.branch,
      exists: args.backend.branchExists(worktree.branch),
    }));
}
