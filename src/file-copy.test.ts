import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync, readFileSync, statSync, chmodSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { applyCopyRules } from './file-copy.ts';

describe('applyCopyRules', () => {
  let prefix: string;
  let source: string;
  let target: string;

  beforeEach(() => {
    prefix = mkdtempSync(join(tmpdir(), 'wtsync-copy-'));
    source = join(prefix, 'main');
    target = join(prefix, 'spike');
    mkdirSync(source);
    mkdirSync(target);
  });

  afterEach(() => {
    rmSync(prefix, { recursive: true, force: true });
  });

  const put = (path: string, content: string) => {
    const full = join(source, path);
    mkdirSync(join(full, '..'), { recursive: true });
    writeFileSync(full, content, 'utf-8');
  };

  it('copies dotfiles, globbed files and whole directories', async () => {
    put('.env', 'TOKEN=test-secret');
    put('config/local.json', '{}');
    put('config/nested/extra.yml', 'a: 1');
    put('notes/a.md', '# a');
    put('notes/b.txt', 'b');

    const result = await applyCopyRules({
      rules: [{ sourceWorktree: 'main', files: ['.env', 'config', 'notes/*.md'] }],
      managedPrefix: prefix,
      targetPath: target,
    });

    expect(result.copied).toEqual(['.env', 'config/local.json', 'config/nested/extra.yml', 'notes/a.md']);
    expect(result.skipped).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(readFileSync(join(target, '.env'), 'utf-8')).toBe('TOKEN=test-secret');
    expect(readFileSync(join(target, 'config/nested/extra.yml'), 'utf-8')).toBe('a: 1');
  });

  it('never overwrites a file already in the target', async () => {
    put('.env', 'from source');
    writeFileSync(join(target, '.env'), 'mine', 'utf-8');

    const result = await applyCopyRules({
      rules: [{ sourceWorktree: 'main', files: ['.env'] }],
      managedPrefix: prefix,
      targetPath: target,
    });

    expect(result.skipped).toEqual(['.env']);
    expect(readFileSync(join(target, '.env'), 'utf-8')).toBe('mine');
  });

  it('keeps the file mode', async () => {
    put('run.sh', 'echo hi');
    chmodSync(join(source, 'run.sh'), 0o755);

    await applyCopyRules({ rules: [{ sourceWorktree: 'main', files: ['run.sh'] }], managedPrefix: prefix, targetPath: target });

    expect(statSync(join(target, 'run.sh')).mode & 0o777).toBe(0o755);
  });

  it('turns problems into warnings', async () => {
    put('.env', 'x');

    const result = await applyCopyRules({
      rules: [
        { sourceWorktree: 'ghost', files: ['.env'] },
        { sourceWorktree: 'main', files: ['missing.txt', '.env'] },
      ],
      managedPrefix: prefix,
      targetPath: target,
    });

    expect(result.warnings).toEqual([
      "source worktree 'ghost' does not exist, skipping file copy rule",
      "'missing.txt' matched nothing in 'main'",
    ]);
    expect(result.copied).toEqual(['.env']);
  });
});
