import { describe, it, expect } from 'vitest';
import { DETACHED_BRANCH, parseStatusPorcelain, parseWorktreeList } from './git.ts';

describe('parseWorktreeList', () => {
  it('reads porcelain output, main worktree first', () => {
    const output = [
      'worktree /repo',
      'HEAD 1111111111111111111111111111111111111111',
      'branch refs/heads/main',
      '',
      'worktree /repo/worktrees/dev',
      'HEAD 2222222222222222222222222222222222222222',
      'branch refs/heads/feature/dev',
      '',
      'worktree /repo/worktrees/bisect',
      'HEAD 3333333333333333333333333333333333333333',
      'detached',
      '',
    ].join('\n');

    const worktrees = parseWorktreeList({ output, resolvePath: path => path });

    expect(worktrees).toEqual([
      { name: 'repo', path: '/repo', currentBranch: 'main' },
      { name: 'dev', path: '/repo/worktrees/dev', currentBranch: 'feature/dev' },
      { name: 'bisect', path: '/repo/worktrees/bisect', currentBranch: DETACHED_BRANCH },
    ]);
  });

  it('resolves every path', () => {
    const worktrees = parseWorktreeList({
      output: 'worktree /link/dev\nbranch refs/heads/dev',
      resolvePath: path => path.replace('/link', '/real'),
    });

    expect(worktrees).toEqual([{ name: 'dev', path: '/real/dev', currentBranch: 'dev' }]);
  });
});

describe('parseStatusPorcelain', () => {
  it('counts staged, modified and untracked entries', () => {
    const output = ['M  staged.ts', ' M edited.ts', 'MM both.ts', ' D gone.ts', '?? new.ts', 'A  added.ts', ''].join('\n');

    expect(parseStatusPorcelain({ output })).toEqual({ dirty: true, modified: 3, untracked: 1, staged: 3 });
  });

  it('reports a clean tree', () => {
    expect(parseStatusPorcelain({ output: '' })).toEqual({ dirty: false, modified: 0, untracked: 0, staged: 0 });
  });
});
