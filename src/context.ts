import { existsSync } from 'fs';
import { loadConfig, resolveBranchConfigPath } from './config.ts';
import { loadBranchConfig } from './branch-config.ts';
import { createGitBackend } from './git.ts';
import { detectRepoRoot, repoInfoFor } from './repo.ts';
import { loadState, saveState } from './state.ts';
import { ValidationError } from './errors.ts';
import { createTheme } from './ui/theme.ts';
import type { Session } from './manager.ts';

export function shouldUseColor() {
  return Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
}

/**
 * Builds everything a command needs from the working directory: repository
 * paths, settings, theme, runtime state and the git backend. A repository
 * without a worktree mapping gets a session with no declared worktrees.
 */
export function openSession(args: { cwd: string; branchConfig?: string }) {
  const root = detectRepoRoot({ cwd: args.cwd });
  if (!root) {
    throw new ValidationError({ message: 'Not in a git repository' });
  }

  const config = loadConfig({ repoRoot: root });
  const repo = repoInfoFor({ root, worktreePrefix: config.worktreePrefix });
  const theme = createTheme({ icons: config.icons, color: shouldUseColor() });

  const branchConfigPath = resolveBranchConfigPath({
    repoRoot: root,
    branchConfig: args.branchConfig ?? config.branchConfig,
  });
  const desired = existsSync(branchConfigPath) ? loadBranchConfig({ path: branchConfigPath }) : null;

  const session: Session = {
    repo,
    backend: createGitBackend({ repoRoot: root }),
    desired,
    state: loadState({ managementDir: repo.managementDir }),
    copyRules: config.copyRules,
    persist: state => saveState({ managementDir: repo.managementDir, state }),
  };

  return { session, config, theme, branchConfigPath };
}
