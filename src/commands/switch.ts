import { openSession } from '../context.ts';
import { listWorktreeEntries, switchWorktree } from '../manager.ts';
import { suggestName } from '../ui/prompts.ts';
import { ValidationError } from '../errors.ts';

/**
 * Records the selected worktree and prints its path. With `--print-path`
 * only the path goes to stdout so a shell function can `cd` into it.
 */
export function switchCommand(args: { name?: string; printPath: boolean; branchConfig?: string }) {
  const { session, theme } = openSession({ cwd: process.cwd(), branchConfig: args.branchConfig });
  const available = listWorktreeEntries({ session, withStatus: false }).filter(entry => entry.currentBranch !== null);

  if (args.name === undefined) {
    theme.blank();
    for (const entry of available) {
      const marker = entry.name === session.state.currentWorktree ? theme.paint('→', 'cyan') : ' ';
      theme.write(`${marker} ${entry.name} ${theme.paint(entry.expectedBranch, 'dim')}`);
    }
    theme.blank();
    theme.log({ message: "Use 'wts switch <name>' to select one, or 'wts switch -' for the previous one", color: 'dim' });
    return;
  }

  let name = args.name;
  if (name === '-') {
    name = session.state.previousWorktree;
    if (!name) {
      throw new ValidationError({ message: 'No previous worktree to switch to' });
    }
  }

  if (!available.some(entry => entry.name === name)) {
    const suggestion = suggestName({ query: name, names: available.map(entry => entry.name) });
    throw new ValidationError({
      message: `No worktree named '${name}'${suggestion ? `; did you mean '${suggestion}'?` : ''}`,
    });
  }

  const result = switchWorktree({ session, name });

  if (args.printPath) {
    for (const warning of result.warnings) {
      process.stderr.write(`${warning}\n`);
    }
    process.stdout.write(`${result.path}\n`);
    return;
  }

  for (const warning of result.warnings) {
    theme.warning({ message: warning });
  }
  theme.success({ message: `Switched to ${name}` });
  theme.log({ message: `cd ${result.path}`, color: 'dim' });
}
