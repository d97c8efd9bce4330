import { describe, it, expect } from 'vitest';
import { diffWorktrees, isUnderPrefix, managedRecords } from './diff.ts';
import type { WorktreeRecord } from '../types.ts';

const record = (path: string, currentBranch: string): WorktreeRecord => ({
  name: path.split('/').pop() ?? path,
  path,
  currentBranch,
});

describe('isUnderPrefix', () => {
  it('matches whole path segments only', () => {
    expect(isUnderPrefix({ path: '/repo/worktrees/dev', prefix: '/repo/worktrees' })).toBe(true);
    expect(isUnderPrefix({ path: '/repo/worktrees-old/dev', prefix: '/repo/worktrees' })).toBe(false);
    expect(isUnderPrefix({ path: '/repo/worktrees', prefix: '/repo/worktrees' })).toBe(false);
  });

  it('ignores a trailing separator on the prefix', () => {
    expect(isUnderPrefix({ path: '/repo/worktrees/dev', prefix: '/repo/worktrees/' })).toBe(true);
  });
});

describe('managedRecords', () => {
  it('drops the main checkout and anything outside the prefix', () => {
    const actual = [record('/repo', 'main'), record('/repo/worktrees/dev', 'dev'), record('/tmp/scratch', 'scratch')];

    expect(managedRecords({ actual, managedPrefix: '/repo/worktrees' }).map(item => item.name)).toEqual(['dev']);
  });
});

describe('diffWorktrees', () => {
  it('puts every name in exactly one class', () => {
    const desired = new Map([
      ['same', 'main'],
      ['moved', 'release'],
      ['absent', 'feature'],
    ]);
    const actual = [
      record('/repo', 'main'),
      record('/repo/worktrees/same', 'main'),
      record('/repo/worktrees/moved', 'hotfix'),
      record('/repo/worktrees/stray', 'old'),
    ];

    const status = diffWorktrees({ desired, actual, managedPrefix: '/repo/worktrees' });

    expect(status.inSync).toBe(false);
    expect(status.missingWorktrees).toEqual(['absent']);
    expect(status.orphanedWorktrees).toEqual(['stray']);
    expect([...status.branchChanges]).toEqual([['moved', { oldBranch: 'hotfix', newBranch: 'release' }]]);
    expect(status.worktreePromotions).toEqual([]);
  });

  it('reports in sync when every declared worktree matches', () => {
    const status = diffWorktrees({
      desired: new Map([['dev', 'dev']]),
      actual: [record('/repo/worktrees/dev', 'dev')],
      managedPrefix: '/repo/worktrees',
    });

    expect(status.inSync).toBe(true);
    expect(status.branchChanges.size).toBe(0);
  });

  it('sorts every list by name', () => {
    const status = diffWorktrees({
      desired: new Map([
        ['zeta', 'z'],
        ['alpha', 'a'],
        ['mid', 'n'],
        ['beta', 'b'],
      ]),
      actual: [
        record('/w/mid', 'm'),
        record('/w/beta', 'c'),
        record('/w/yy', 'y'),
        record('/w/xx', 'x'),
      ],
      managedPrefix: '/w',
    });

    expect(status.missingWorktrees).toEqual(['alpha', 'zeta']);
    expect(status.orphanedWorktrees).toEqual(['xx', 'yy']);
    expect([...status.branchChanges.keys()]).toEqual(['beta', 'mid']);
  });

  it('treats an empty mapping as all orphans', () => {
    const status = diffWorktrees({
      desired: new Map(),
      actual: [record('/w/one', 'a')],
      managedPrefix: '/w',
    });

    expect(status.orphanedWorktrees).toEqual(['one']);
    expect(status.missingWorktrees).toEqual([]);
  });
});
