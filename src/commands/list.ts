import { openSession } from '../context.ts';
import { listWorktreeEntries } from '../manager.ts';
import type { WorktreeEntry } from '../manager.ts';
import type { Theme } from '../ui/theme.ts';

function branchColumn(args: { theme: Theme; entry: WorktreeEntry }) {
  const theme = args.theme;
  const entry = args.entry;

  if (entry.currentBranch === null) {
    return `${theme.paint(entry.expectedBranch, 'dim')} ${theme.paint(`${theme.icons.missing} not created`, 'yellow')}`;
  }
  if (entry.currentBranch !== entry.expectedBranch) {
    return `${theme.paint(entry.currentBranch, 'yellow')} ${theme.paint(`(expected ${entry.expectedBranch})`, 'dim')}`;
  }
  return theme.paint(entry.currentBranch, 'green');
}

export function listCommand(args: { branchConfig?: string }) {
  const { session, theme } = openSession({ cwd: process.cwd(), branchConfig: args.branchConfig });
  const entries = listWorktreeEntries({ session, withStatus: true });

  theme.blank();
  if (entries.length === 0) {
    theme.info({ message: "No worktrees yet. Declare some in the mapping file and run 'wts sync', or use 'wts add'." });
    theme.blank();
    return;
  }

  const width = Math.max(...entries.map(entry => entry.name.length));
  for (const entry of entries) {
    const marker = entry.name === session.state.currentWorktree ? theme.paint('→', 'cyan') : ' ';
    const icon = entry.currentBranch === null ? ' ' : theme.statusIcon({ status: entry.status });
    const tags: string[] = [];
    if (entry.adHoc) {
      tags.push('ad hoc');
    } else if (!entry.tracked) {
      tags.push('untracked');
    }
    if (entry.baseBranch) {
      tags.push(`from ${entry.baseBranch}`);
    }
    const tagText = tags.length > 0 ? ` ${theme.paint(`[${tags.join(', ')}]`, 'dim')}` : '';

    theme.write(`${marker} ${entry.name.padEnd(width)}  ${icon}  ${branchColumn({ theme, entry })}${tagText}`);
  }

  theme.blank();
  const icons = theme.icons;
  theme.log({
    message: `Legend: → current  ${icons.gitClean} clean  ${icons.gitDirty} changes  ${icons.gitAhead} ahead  ${icons.gitBehind} behind  ${icons.gitDiverged} diverged`,
    color: 'dim',
  });
  theme.blank();
}
