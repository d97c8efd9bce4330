import { openSession } from '../context.ts';
import { listWorktreeEntries, pullWorktrees, pushWorktrees } from '../manager.ts';
import { ValidationError } from '../errors.ts';
import type { BatchItemResult } from '../types.ts';

type Direction = 'push' | 'pull';

/** `wts push` and `wts pull`: one worktree, or every materialized one with `--all`. */
export function transferCommand(args: { direction: Direction; name?: string; all: boolean; branchConfig?: string }) {
  const { session, theme } = openSession({ cwd: process.cwd(), branchConfig: args.branchConfig });
  const available = listWorktreeEntries({ session, withStatus: false })
    .filter(entry => entry.currentBranch !== null)
    .map(entry => entry.name);

  let names: string[];
  if (args.all) {
    names = available;
  } else {
    const name = args.name ?? session.state.currentWorktree;
    if (!name) {
      throw new ValidationError({ message: `Usage: wts ${args.direction} <name> | --all` });
    }
    if (!available.includes(name)) {
      throw new ValidationError({ message: `No worktree named '${name}'` });
    }
    names = [name];
  }

  const run = args.direction === 'push' ? pushWorktrees : pullWorktrees;
  const verb = args.direction === 'push' ? 'Pushing' : 'Pulling';
  const results: BatchItemResult[] = run({
    session,
    names,
    onStart: name => theme.info({ message: `${verb} ${name}...` }),
  });

  if (!args.all) {
    const result = results[0];
    if (result && !result.ok) {
      theme.error({ message: `Failed to ${args.direction} ${result.name}: ${result.error}` });
      process.exit(1);
    }
    theme.success({ message: `${args.direction === 'push' ? 'Pushed' : 'Pulled'} ${names.join(', ')}` });
    return;
  }

  theme.blank();
  theme.write(theme.paint('Summary:', 'bright'));
  for (const result of results) {
    if (result.ok) {
      theme.write(`  ${theme.paint(theme.icons.gitClean, 'green')} ${result.name}`);
    } else {
      theme.write(`  ${theme.paint(theme.icons.error, 'red')} ${result.name}: ${result.error}`);
    }
  }
  theme.blank();

  const failed = results.filter(result => !result.ok).length;
  if (failed > 0) {
    theme.error({ message: `${failed} of ${results.length} worktree(s) failed to ${args.direction}` });
    process.exit(1);
  }
  theme.success({ message: `All ${results.length} worktree(s) done` });
}
