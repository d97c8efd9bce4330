import { sep } from 'path';
import type { BranchChange, SyncStatus, WorktreeRecord } from '../types.ts';

function trimTrailingSeparators(path: string) {
  let trimmed = path;
  while (trimmed.length > 1 && trimmed.endsWith(sep)) {
    trimmed = trimmed.slice(0, -1);
  }
  return trimmed;
}

/** True when `path` lies inside `prefix`, compared on whole path segments. */
export function isUnderPrefix(args: { path: string; prefix: string }) {
  const prefix = trimTrailingSeparators(args.prefix);
  const path = trimTrailingSeparators(args.path);
  return path.startsWith(prefix === sep ? sep : `${prefix}${sep}`);
}

export function managedRecords(args: { actual: WorktreeRecord[]; managedPrefix: string }) {
  return args.actual.filter(record => isUnderPrefix({ path: record.path, prefix: args.managedPrefix }));
}

/**
 * Classifies every managed worktree name as missing, orphaned, branch-changed
 * or unchanged. Promotions are left empty; see detectPromotions.
 */
export function diffWorktrees(args: {
  desired: ReadonlyMap<string, string>;
  actual: WorktreeRecord[];
  managedPrefix: string;
}): SyncStatus {
  const remaining = new Map<string, WorktreeRecord>();
  for (const record of managedRecords({ actual: args.actual, managedPrefix: args.managedPrefix })) {
    remaining.set(record.name, record);
  }

  const missingWorktrees: string[] = [];
  const changes: Array<[string, BranchChange]> = [];

  for (const [name, branch] of args.desired) {
    const record = remaining.get(name);
    if (!record) {
      missingWorktrees.push(name);
      continue;
    }

    if (record.currentBranch !== branch) {
      changes.push([name, { oldBranch: record.currentBranch, newBranch: branch }]);
    }
    remaining.delete(name);
  }

  const orphanedWorktrees = [...remaining.keys()];

  missingWorktrees.sort();
  orphanedWorktrees.sort();
  changes.sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));

  return {
    inSync: missingWorktrees.length === 0 && orphanedWorktrees.length === 0 && changes.length === 0,
    missingWorktrees,
    orphanedWorktrees,
    branchChanges: new Map(changes),
    worktreePromotions: [],
  };
}
