import { PromotionConflictError } from '../errors.ts';
import { managedRecords } from './diff.ts';
import type { BranchChange, Promotion, WorktreeRecord } from '../types.ts';

/**
 * A branch change whose new branch is already checked out in another managed
 * worktree cannot be a plain checkout switch: git keeps one worktree per
 * branch, so the holder has to be vacated first. Those changes become
 * promotions, emitted in lexical order of the target name.
 */
export function detectPromotions(args: {
  branchChanges: ReadonlyMap<string, BranchChange>;
  actual: WorktreeRecord[];
  managedPrefix: string;
}) {
  const branchToWorktree = new Map<string, string>();
  for (const record of managedRecords({ actual: args.actual, managedPrefix: args.managedPrefix })) {
    branchToWorktree.set(record.currentBranch, record.name);
  }

  const targets = [...args.branchChanges.keys()].sort();
  const promotions: Promotion[] = [];

  for (const targetWorktree of targets) {
    const change = args.branchChanges.get(targetWorktree);
    if (!change) {
      continue;
    }

    const sourceWorktree = branchToWorktree.get(change.newBranch);
    if (sourceWorktree === undefined) {
      continue;
    }

    promotions.push({
      sourceWorktree,
      targetWorktree,
      branch: change.newBranch,
      sourceBranch: change.newBranch,
      targetBranch: change.oldBranch,
    });
  }

  return promotions;
}

/** Throws when one worktree would be touched by two promotions in the same pass. */
export function assertPromotionsDisjoint(args: { promotions: Promotion[] }) {
  const seen = new Set<string>();
  for (const promotion of args.promotions) {
    for (const worktree of [promotion.sourceWorktree, promotion.targetWorktree]) {
      if (seen.has(worktree)) {
        throw new PromotionConflictError({ worktree });
      }
      seen.add(worktree);
    }
  }
}
