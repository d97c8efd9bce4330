import { openSession } from '../context.ts';
import { computeSyncStatus } from '../sync/reconcile.ts';
import { managedRecords } from '../sync/diff.ts';
import { syncStatusLines } from '../ui/report.ts';
import { box, DEFAULT_PATH_MAX_LENGTH, formatPath } from '../ui/theme.ts';

const SUMMARY_WIDTH = 76;

export function statusCommand(args: { branchConfig?: string }) {
  const { session, theme, branchConfigPath } = openSession({ cwd: process.cwd(), branchConfig: args.branchConfig });
  const state = session.state;

  const summary = [
    `Repository: ${formatPath({ path: session.repo.root, maxLength: DEFAULT_PATH_MAX_LENGTH })}`,
    `Worktrees:  ${formatPath({ path: session.repo.managedPrefix, maxLength: DEFAULT_PATH_MAX_LENGTH })}`,
    `Mapping:    ${formatPath({ path: branchConfigPath, maxLength: DEFAULT_PATH_MAX_LENGTH })}`,
    `Last sync:  ${state.lastSync ? state.lastSync.toLocaleString() : 'never'}`,
  ];
  theme.blank();
  theme.write(box({ title: 'wtsync', content: summary, width: SUMMARY_WIDTH }));
  theme.blank();

  const actual = session.backend.listWorktrees();

  if (!session.desired) {
    theme.info({ message: `No worktree mapping found at ${branchConfigPath}` });
  } else {
    const status = computeSyncStatus({ desired: session.desired, actual, managedPrefix: session.repo.managedPrefix });
    if (status.inSync) {
      theme.success({ message: 'All worktrees are in sync' });
    } else {
      theme.warning({ message: "Out of sync; run 'wts sync' to apply:" });
      for (const line of syncStatusLines({ theme, status, desired: session.desired })) {
        theme.write(line);
      }
    }
  }
  theme.blank();

  const records = managedRecords({ actual, managedPrefix: session.repo.managedPrefix });
  if (records.length === 0) {
    theme.log({ message: 'No managed worktrees', color: 'dim' });
    theme.blank();
    return;
  }

  for (const record of records) {
    let icon: string;
    try {
      icon = theme.statusIcon({ status: session.backend.status({ path: record.path }) });
    } catch (error) {
      icon = theme.statusIcon({ status: null });
    }
    const marker = record.name === state.currentWorktree ? theme.paint('→', 'cyan') : ' ';
    theme.write(`${marker} ${theme.paint(record.name, 'bright')} ${theme.paint(record.currentBranch, 'green')} ${icon}`);
  }
  theme.blank();
}
