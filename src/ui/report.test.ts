import { describe, it, expect } from 'vitest';
import { describeOperation, syncStatusLines, worktreeInfoLines } from './report.ts';
import { createTheme } from './theme.ts';
import type { BranchChange, DesiredState, SyncStatus } from '../types.ts';

const theme = createTheme({ color: false, icons: { missing: '+', orphaned: '-', changes: '~', promotion: '^' } });

const desired: DesiredState = {
  worktrees: new Map([
    ['A', { name: 'A', branch: 'feature', description: '' }],
    ['C', { name: 'C', branch: 'staging', description: '' }],
    ['D', { name: 'D', branch: 'next', description: '' }],
  ]),
};

describe('syncStatusLines', () => {
  it('lists each kind of change, showing promoted targets only as promotions', () => {
    const status: SyncStatus = {
      inSync: false,
      missingWorktrees: ['C'],
      orphanedWorktrees: ['B', 'old'],
      branchChanges: new Map<string, BranchChange>([
        ['A', { oldBranch: 'main', newBranch: 'feature' }],
        ['D', { oldBranch: 'prev', newBranch: 'next' }],
      ]),
      worktreePromotions: [
        { sourceWorktree: 'B', targetWorktree: 'A', branch: 'feature', sourceBranch: 'feature', targetBranch: 'main' },
      ],
    };

    expect(syncStatusLines({ theme, status, desired, keptOrphans: ['old'] })).toEqual([
      '+ Missing worktrees:',
      '  • C → staging',
      '- Orphaned worktrees:',
      '  • B',
      '  • old (kept, use --force to remove)',
      '~ Branch changes:',
      '  • D: prev → next',
      '^ Promotions:',
      '  • B (feature) → A (replaces main)',
    ]);
  });

  it('is empty when in sync', () => {
    const status: SyncStatus = {
      inSync: true,
      missingWorktrees: [],
      orphanedWorktrees: [],
      branchChanges: new Map(),
      worktreePromotions: [],
    };

    expect(syncStatusLines({ theme, status, desired })).toEqual([]);
  });
});

describe('describeOperation', () => {
  it('phrases each applied step', () => {
    expect(describeOperation({ operation: { kind: 'create', worktree: 'dev', branch: 'develop' } })).toBe(
      'Created worktree dev on develop',
    );
    expect(describeOperation({ operation: { kind: 'retarget', worktree: 'dev', fromBranch: 'a', toBranch: 'b' } })).toBe(
      'Switched dev from a to b',
    );
  });
});

describe('worktreeInfoLines', () => {
  it('shows provenance, merge target and status', () => {
    const lines = worktreeInfoLines({
      theme,
      entry: {
        name: 'HOTFIX_login',
        path: '/repo/worktrees/HOTFIX_login',
        expectedBranch: 'hotfix/login',
        currentBranch: 'hotfix/login',
        tracked: false,
        adHoc: true,
        baseBranch: 'production',
        status: { dirty: true, ahead: 1, behind: 0, modified: 2, untracked: 1, staged: 0 },
      },
      declared: undefined,
      mergesInto: [],
    });

    expect(lines).toEqual([
      'Worktree:    HOTFIX_login',
      'Path:        /repo/worktrees/HOTFIX_login',
      'Branch:      hotfix/login',
      'Kind:        ad hoc',
      'Base branch: production',
      'Status:      ↑1 ~ 0 staged, 2 modified, 1 untracked, 1 ahead',
    ]);
  });

  it('shows the chain of a declared worktree that is not created yet', () => {
    const lines = worktreeInfoLines({
      theme,
      entry: {
        name: 'D',
        path: '/repo/worktrees/D',
        expectedBranch: 'next',
        currentBranch: null,
        tracked: true,
        adHoc: false,
        baseBranch: undefined,
        status: null,
      },
      declared: { name: 'D', branch: 'next', description: 'Next release', mergeInto: 'A' },
      mergesInto: ['feature'],
    });

    expect(lines).toEqual([
      'Worktree:    D',
      'Path:        /repo/worktrees/D',
      'Branch:      next (not created)',
      'Kind:        declared',
      'Description: Next release',
      'Base branch: unknown',
      'Merges into: feature',
    ]);
  });
});
