import * as clack from '@clack/prompts';
import fuzzysort from 'fuzzysort';
import type { Theme } from './theme.ts';
import type { ConfirmFn, WorktreeStatus } from '../types.ts';

/** Interactive confirmation; a cancelled prompt (Ctrl-C) counts as "no". */
export function createConfirm(args: { theme: Theme }): ConfirmFn {
  return async message => {
    const lines = message.split('\n');
    const question = lines.pop() ?? message;

    if (lines.length > 0) {
      args.theme.blank();
      for (const line of lines) {
        args.theme.write(line);
      }
    }

    const answer = await clack.confirm({ message: question, initialValue: false });
    return answer === true;
  };
}

export async function confirmRemove(args: {
  theme: Theme;
  name: string;
  branch: string;
  path: string;
  status: WorktreeStatus | null;
}) {
  const theme = args.theme;
  const status = args.status;

  const lines = [
    `Worktree: ${theme.paint(args.name, 'cyan')}`,
    `Branch: ${theme.paint(args.branch, 'cyan')}`,
    `Path: ${theme.paint(args.path, 'dim')}`,
  ];

  if (status) {
    const statusParts: string[] = [];
    if (status.staged) statusParts.push(`${status.staged} staged`);
    if (status.modified) statusParts.push(`${status.modified} modified`);
    if (status.untracked) statusParts.push(`${status.untracked} untracked`);
    if (status.ahead) statusParts.push(`${status.ahead} ahead`);
    if (status.behind) statusParts.push(`${status.behind} behind`);

    if (statusParts.length > 0) {
      lines.push(`Status: ${statusParts.join(', ')}`);
    }
  }

  if (status?.dirty) {
    lines.push('');
    lines.push(theme.paint(`${theme.icons.warning}  You have uncommitted changes!`, 'yellow'));
  }

  theme.blank();
  for (const line of lines) {
    theme.write(line);
  }
  theme.blank();

  const confirmed = await clack.confirm({
    message: 'Are you sure you want to remove this worktree?',
    initialValue: !status?.dirty,
  });

  return confirmed === true;
}

/** Closest known worktree name to a mistyped one, if any is close enough. */
export function suggestName(args: { query: string; names: string[] }) {
  const results = fuzzysort.go(args.query, args.names, { limit: 1, threshold: 0.3 });
  const best = results[0];
  return best ? best.target : null;
}
