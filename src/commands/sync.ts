import { openSession } from '../context.ts';
import { loadBranchConfig } from '../branch-config.ts';
import { reconcile } from '../sync/reconcile.ts';
import { createConfirm } from '../ui/prompts.ts';
import { describeOperation, syncStatusLines } from '../ui/report.ts';

export async function syncCommand(args: { dryRun: boolean; force: boolean; branchConfig?: string }) {
  const { session, theme, branchConfigPath } = openSession({ cwd: process.cwd(), branchConfig: args.branchConfig });
  const desired = session.desired ?? loadBranchConfig({ path: branchConfigPath });

  const result = await reconcile({
    backend: session.backend,
    desired,
    state: session.state,
    managedPrefix: session.repo.managedPrefix,
    dryRun: args.dryRun,
    force: args.force,
    confirm: createConfirm({ theme }),
    persist: session.persist,
    onPhase: phase => {
      if (phase === 'fetching') {
        theme.log({ message: 'Fetching from remote…', color: 'dim' });
      }
    },
  });

  if (result.outcome === 'in-sync') {
    theme.success({ message: 'All worktrees are in sync' });
    return;
  }

  theme.blank();
  if (result.outcome === 'dry-run') {
    theme.write(theme.paint(`${theme.icons.dryRun} Dry run, nothing was changed:`, 'cyan'));
  }
  for (const line of syncStatusLines({ theme, status: result.status, desired, keptOrphans: result.keptOrphans })) {
    theme.write(line);
  }
  theme.blank();

  if (result.outcome === 'dry-run') {
    return;
  }

  for (const operation of result.operations) {
    theme.success({ message: describeOperation({ operation }) });
  }
  if (result.keptOrphans.length > 0) {
    theme.warning({
      message: `${result.keptOrphans.length} orphaned worktree(s) kept; run 'wts sync --force' to remove them`,
    });
  }
  theme.success({ message: 'Sync complete' });
}
