import { join, dirname } from 'path';
import { chmodSync, constants, copyFileSync, existsSync, mkdirSync, statSync } from 'fs';
import glob from 'fast-glob';
import { errorMessage } from './errors.ts';
import type { CopyRule } from './types.ts';

export type CopyResult = {
  copied: string[];
  skipped: string[];
  warnings: string[];
};

async function expandPattern(args: { cwd: string; pattern: string }) {
  const literalPath = join(args.cwd, args.pattern);
  if (existsSync(literalPath)) {
    if (statSync(literalPath).isDirectory()) {
      return glob(`${glob.escapePath(args.pattern)}/**`, { cwd: args.cwd, dot: true, onlyFiles: true });
    }
    return [args.pattern];
  }

  return glob(args.pattern, { cwd: args.cwd, dot: true, onlyFiles: true });
}

/**
 * Seeds a new worktree with files from existing ones, e.g. untracked `.env`
 * files. Existing files in the target are never overwritten, and nothing
 * here throws: problems come back as warnings.
 */
export async function applyCopyRules(args: { rules: CopyRule[]; managedPrefix: string; targetPath: string }) {
  const result: CopyResult = { copied: [], skipped: [], warnings: [] };

  for (const rule of args.rules) {
    const sourceRoot = join(args.managedPrefix, rule.sourceWorktree);
    if (!existsSync(sourceRoot)) {
      result.warnings.push(`source worktree '${rule.sourceWorktree}' does not exist, skipping file copy rule`);
      continue;
    }

    for (const pattern of rule.files) {
      let matches: string[];
      try {
        matches = await expandPattern({ cwd: sourceRoot, pattern });
      } catch (error) {
        result.warnings.push(`failed to expand '${pattern}' in '${rule.sourceWorktree}': ${errorMessage(error)}`);
        continue;
      }

      if (matches.length === 0) {
        result.warnings.push(`'${pattern}' matched nothing in '${rule.sourceWorktree}'`);
        continue;
      }

      for (const file of matches.sort()) {
        const sourcePath = join(sourceRoot, file);
        const targetPath = join(args.targetPath, file);

        if (existsSync(targetPath)) {
          result.skipped.push(file);
          continue;
        }

        try {
          mkdirSync(dirname(targetPath), { recursive: true });
          copyFileSync(sourcePath, targetPath, constants.COPYFILE_EXCL);
          chmodSync(targetPath, statSync(sourcePath).mode);
          result.copied.push(file);
        } catch (error) {
          result.warnings.push(`failed to copy '${file}' from '${rule.sourceWorktree}': ${errorMessage(error)}`);
        }
      }
    }
  }

  return result;
}
