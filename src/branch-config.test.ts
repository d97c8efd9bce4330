import { describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadBranchConfig, parseBranchConfig, toBranchMapping } from './branch-config.ts';
import { ConfigError } from './errors.ts';

const PATH = '/repo/worktrees.toml';

describe('parseBranchConfig', () => {
  it('reads every declared worktree', () => {
    const desired = parseBranchConfig({
      path: PATH,
      content: [
        '[worktrees.main]',
        'branch = "main"',
        'description = "Production"',
        '',
        '[worktrees.dev]',
        'branch = "develop"',
      ].join('\n'),
    });

    expect([...desired.worktrees.values()]).toEqual([
      { name: 'main', branch: 'main', description: 'Production' },
      { name: 'dev', branch: 'develop', description: '' },
    ]);
    expect([...toBranchMapping({ desired })]).toEqual([
      ['main', 'main'],
      ['dev', 'develop'],
    ]);
  });

  it('reads merge targets and rejects broken chains', () => {
    const desired = parseBranchConfig({
      path: PATH,
      content: '[worktrees.main]\nbranch = "main"\n\n[worktrees.dev]\nbranch = "develop"\nmergeInto = "main"\n',
    });

    expect(desired.worktrees.get('dev')?.mergeInto).toBe('main');
    expect(desired.worktrees.get('main')?.mergeInto).toBeUndefined();
    expect(() =>
      parseBranchConfig({ path: PATH, content: '[worktrees.dev]\nbranch = "develop"\nmergeInto = "ghost"\n' }),
    ).toThrow(`Invalid ${PATH}: worktree 'dev' merges into unknown worktree 'ghost'`);
    expect(() =>
      parseBranchConfig({
        path: PATH,
        content: '[worktrees.a]\nbranch = "a"\nmergeInto = "b"\n\n[worktrees.b]\nbranch = "b"\nmergeInto = "a"\n',
      }),
    ).toThrow(`Invalid ${PATH}: circular merge chain: a → b → a`);
  });

  it('accepts a file with no worktrees', () => {
    expect(parseBranchConfig({ path: PATH, content: '' }).worktrees.size).toBe(0);
  });

  it('trims branch names', () => {
    const desired = parseBranchConfig({ path: PATH, content: '[worktrees.dev]\nbranch = "  develop "\n' });

    expect(desired.worktrees.get('dev')?.branch).toBe('develop');
  });

  it('requires a branch', () => {
    expect(() => parseBranchConfig({ path: PATH, content: '[worktrees.dev]\ndescription = "x"\n' })).toThrow(
      `Invalid ${PATH}: worktrees.dev.branch: Required`,
    );
  });

  it('rejects an empty branch', () => {
    expect(() => parseBranchConfig({ path: PATH, content: '[worktrees.dev]\nbranch = "  "\n' })).toThrow(
      `Invalid ${PATH}: worktrees.dev.branch: branch is required`,
    );
  });

  it('rejects names that are not a single path segment', () => {
    expect(() => parseBranchConfig({ path: PATH, content: '[worktrees."a/b"]\nbranch = "x"\n' })).toThrow(
      `Invalid ${PATH}: 'a/b' is not a valid worktree name`,
    );
    expect(() => parseBranchConfig({ path: PATH, content: '[worktrees.".."]\nbranch = "x"\n' })).toThrow(ConfigError);
  });

  it('reports TOML syntax errors with the file path', () => {
    expect(() => parseBranchConfig({ path: PATH, content: '[worktrees.dev\n' })).toThrow(`Failed to parse ${PATH}`);
  });
});

describe('loadBranchConfig', () => {
  it('fails clearly when the file is missing', () => {
    const dir = mkdtempSync(join(tmpdir(), 'wtsync-mapping-'));
    const path = join(dir, 'worktrees.toml');
    try {
      expect(() => loadBranchConfig({ path })).toThrow(`No worktree mapping found at ${path}`);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
