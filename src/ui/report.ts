import type { Theme } from './theme.ts';
import type { DesiredState, DesiredWorktree, SyncStatus, WorktreeStatus } from '../types.ts';
import type { WorktreeEntry } from '../manager.ts';
import type { SyncOperation } from '../sync/reconcile.ts';

/** Lines describing what a sync pass would change. Empty when in sync. */
export function syncStatusLines(args: {
  theme: Theme;
  status: SyncStatus;
  desired: DesiredState;
  keptOrphans?: string[];
}) {
  const theme = args.theme;
  const icons = theme.icons;
  const status = args.status;
  const kept = new Set(args.keptOrphans ?? []);
  const lines: string[] = [];

  const section = (title: string, items: string[]) => {
    if (items.length === 0) {
      return;
    }
    lines.push(theme.paint(title, 'bright'));
    for (const item of items) {
      lines.push(`  • ${item}`);
    }
  };

  section(
    `${icons.missing} Missing worktrees:`,
    status.missingWorktrees.map(name => {
      const branch = args.desired.worktrees.get(name)?.branch;
      return branch ? `${name} → ${branch}` : name;
    }),
  );

  section(
    `${icons.orphaned} Orphaned worktrees:`,
    status.orphanedWorktrees.map(name =>
      kept.has(name) ? `${name} ${theme.paint('(kept, use --force to remove)', 'dim')}` : name,
    ),
  );

  const promotedTargets = new Set(status.worktreePromotions.map(promotion => promotion.targetWorktree));
  section(
    `${icons.changes} Branch changes:`,
    [...status.branchChanges]
      .filter(([name]) => !promotedTargets.has(name))
      .map(([name, change]) => `${name}: ${change.oldBranch} → ${change.newBranch}`),
  );

  section(
    `${icons.promotion} Promotions:`,
    status.worktreePromotions.map(
      promotion =>
        `${promotion.sourceWorktree} (${promotion.branch}) → ${promotion.targetWorktree} (replaces ${promotion.targetBranch})`,
    ),
  );

  return lines;
}

export function describeOperation(args: { operation: SyncOperation }) {
  const operation = args.operation;
  switch (operation.kind) {
    case 'remove':
      return `Removed orphaned worktree ${operation.worktree}`;
    case 'create':
      return `Created worktree ${operation.worktree} on ${operation.branch}`;
    case 'skip-primary':
      return `Skipped ${operation.worktree}: the repository's main checkout is already there`;
    case 'promote':
      return `Promoted ${operation.promotion.sourceWorktree} to ${operation.promotion.targetWorktree} (${operation.promotion.branch})`;
    case 'recreate-source':
      return `Recreated worktree ${operation.worktree} on ${operation.branch}`;
    case 'retarget':
      return `Switched ${operation.worktree} from ${operation.fromBranch} to ${operation.toBranch}`;
  }
}

function statusSummary(args: { theme: Theme; status: WorktreeStatus | null }) {
  const status = args.status;
  if (!status) {
    return `${args.theme.icons.gitUnknown} unknown`;
  }

  const parts = [
    status.dirty ? `${status.staged} staged, ${status.modified} modified, ${status.untracked} untracked` : 'clean',
  ];
  if (status.ahead > 0) {
    parts.push(`${status.ahead} ahead`);
  }
  if (status.behind > 0) {
    parts.push(`${status.behind} behind`);
  }
  return `${args.theme.statusIcon({ status })} ${parts.join(', ')}`;
}

/** Detail view of one worktree; `mergesInto` lists the branches after it in its chain. */
export function worktreeInfoLines(args: {
  theme: Theme;
  entry: WorktreeEntry;
  declared: DesiredWorktree | undefined;
  mergesInto: string[];
}) {
  const { theme, entry } = args;
  const row = (label: string, value: string) => `${theme.paint(label.padEnd(13), 'cyan')}${value}`;

  const kind = entry.tracked ? 'declared' : entry.adHoc ? 'ad hoc' : 'untracked';
  const branch =
    entry.currentBranch === null
      ? `${entry.expectedBranch} (not created)`
      : entry.currentBranch === entry.expectedBranch
        ? entry.currentBranch
        : `${entry.currentBranch} (expected ${entry.expectedBranch})`;

  const lines = [row('Worktree:', entry.name), row('Path:', entry.path), row('Branch:', branch), row('Kind:', kind)];
  if (args.declared?.description) {
    lines.push(row('Description:', args.declared.description));
  }
  lines.push(row('Base branch:', entry.baseBranch ?? theme.paint('unknown', 'dim')));
  if (args.mergesInto.length > 0) {
    lines.push(row('Merges into:', args.mergesInto.join(' → ')));
  }
  if (entry.currentBranch !== null) {
    lines.push(row('Status:', statusSummary({ theme, status: entry.status })));
  }
  return lines;
}
