import { openSession } from '../context.ts';
import { loadBranchConfig } from '../branch-config.ts';
import { checkDeclaredBranches } from '../manager.ts';

export function validateCommand(args: { branchConfig?: string }) {
  const { session, theme, branchConfigPath } = openSession({ cwd: process.cwd(), branchConfig: args.branchConfig });
  const desired = session.desired ?? loadBranchConfig({ path: branchConfigPath });

  theme.info({ message: `Checking ${desired.worktrees.size} declared worktree(s) in ${branchConfigPath}` });
  theme.blank();

  const checks = checkDeclaredBranches({ backend: session.backend, desired });
  for (const check of checks) {
    const icon = check.exists ? theme.paint(theme.icons.gitClean, 'green') : theme.paint(theme.icons.error, 'red');
    const suffix = check.exists ? '' : theme.paint(' (branch not found locally or on the remote)', 'dim');
    theme.write(`  ${icon} ${check.name} → ${check.branch}${suffix}`);
  }
  theme.blank();

  const missing = checks.filter(check => !check.exists).length;
  if (missing > 0) {
    theme.error({ message: `${missing} declared branch(es) do not exist` });
    process.exit(1);
  }
  theme.success({ message: 'All declared branches exist' });
}
