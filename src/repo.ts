import { join, isAbsolute } from 'path';
import { getGitRoot, isGitRepo, listWorktrees, resolveRealPath } from './git.ts';
import { MANAGEMENT_DIRNAME, expandPath } from './config.ts';
import type { RepoInfo } from './types.ts';

export function managedPrefixFor(args: { root: string; worktreePrefix: string }) {
  const expanded = expandPath({ path: args.worktreePrefix });
  const prefix = isAbsolute(expanded) ? expanded : join(args.root, expanded);
  return resolveRealPath({ path: prefix });
}

/**
 * Resolves the main worktree from anywhere inside the repository, including
 * from inside a managed worktree.
 */
export function detectRepoRoot(args: { cwd: string }) {
  if (!isGitRepo({ cwd: args.cwd })) {
    return null;
  }

  const toplevel = getGitRoot({ cwd: args.cwd });
  const main = listWorktrees({ repoRoot: toplevel })[0];
  return main ? main.path : resolveRealPath({ path: toplevel });
}

export function repoInfoFor(args: { root: string; worktreePrefix: string }): RepoInfo {
  return {
    root: args.root,
    managementDir: join(args.root, MANAGEMENT_DIRNAME),
    managedPrefix: managedPrefixFor(args),
  };
}
