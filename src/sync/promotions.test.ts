import { describe, it, expect } from 'vitest';
import { assertPromotionsDisjoint, detectPromotions } from './promotions.ts';
import { computeSyncStatus } from './reconcile.ts';
import { PromotionConflictError } from '../errors.ts';
import type { BranchChange, Promotion, WorktreeRecord } from '../types.ts';

const PREFIX = '/repo/worktrees';

const record = (name: string, currentBranch: string): WorktreeRecord => ({
  name,
  path: `${PREFIX}/${name}`,
  currentBranch,
});

const promotion = (sourceWorktree: string, targetWorktree: string): Promotion => ({
  sourceWorktree,
  targetWorktree,
  branch: 'b',
  sourceBranch: 'b',
  targetBranch: 'a',
});

describe('detectPromotions', () => {
  it('turns a change onto a branch held by another worktree into a promotion', () => {
    const status = computeSyncStatus({
      desired: { worktrees: new Map([['A', { name: 'A', branch: 'feature', description: '' }]]) },
      actual: [record('A', 'main'), record('B', 'feature')],
      managedPrefix: PREFIX,
    });

    expect(status.worktreePromotions).toEqual([
      { sourceWorktree: 'B', targetWorktree: 'A', branch: 'feature', sourceBranch: 'feature', targetBranch: 'main' },
    ]);
    expect(status.orphanedWorktrees).toEqual(['B']);
  });

  it('leaves plain branch changes alone', () => {
    const branchChanges = new Map<string, BranchChange>([['A', { oldBranch: 'main', newBranch: 'fresh' }]]);

    expect(detectPromotions({ branchChanges, actual: [record('A', 'main')], managedPrefix: PREFIX })).toEqual([]);
  });

  it('ignores a branch held outside the managed prefix', () => {
    const branchChanges = new Map<string, BranchChange>([['A', { oldBranch: 'dev', newBranch: 'main' }]]);
    const actual = [{ name: 'repo', path: '/repo', currentBranch: 'main' }, record('A', 'dev')];

    expect(detectPromotions({ branchChanges, actual, managedPrefix: PREFIX })).toEqual([]);
  });

  it('emits promotions in target name order', () => {
    const branchChanges = new Map<string, BranchChange>([
      ['Z', { oldBranch: 'z', newBranch: 'q' }],
      ['M', { oldBranch: 'm', newBranch: 'p' }],
    ]);
    const actual = [record('Z', 'z'), record('M', 'm'), record('P', 'p'), record('Q', 'q')];

    const targets = detectPromotions({ branchChanges, actual, managedPrefix: PREFIX }).map(item => item.targetWorktree);

    expect(targets).toEqual(['M', 'Z']);
  });
});

describe('assertPromotionsDisjoint', () => {
  it('accepts promotions over separate worktrees', () => {
    expect(() => assertPromotionsDisjoint({ promotions: [promotion('B', 'A'), promotion('D', 'C')] })).not.toThrow();
  });

  it('rejects a swap', () => {
    expect(() => assertPromotionsDisjoint({ promotions: [promotion('B', 'A'), promotion('A', 'B')] })).toThrow(
      PromotionConflictError,
    );
  });

  it('rejects a chain through one worktree', () => {
    expect(() => assertPromotionsDisjoint({ promotions: [promotion('B', 'A'), promotion('C', 'B')] })).toThrow(
      "worktree 'B' takes part in more than one promotion; resolve the branch moves in separate syncs",
    );
  });
});
