import { openSession } from '../context.ts';
import { listWorktreeEntries } from '../manager.ts';
import { mergeChainBranches } from '../merge-chain.ts';
import { suggestName } from '../ui/prompts.ts';
import { worktreeInfoLines } from '../ui/report.ts';
import { ValidationError } from '../errors.ts';

export function infoCommand(args: { name: string; branchConfig?: string }) {
  const { session, theme } = openSession({ cwd: process.cwd(), branchConfig: args.branchConfig });
  const entries = listWorktreeEntries({ session, withStatus: true });

  const entry = entries.find(candidate => candidate.name === args.name);
  if (!entry) {
    const suggestion = suggestName({ query: args.name, names: entries.map(candidate => candidate.name) });
    throw new ValidationError({
      message: `No worktree named '${args.name}'${suggestion ? `; did you mean '${suggestion}'?` : ''}`,
    });
  }

  const desired = session.desired;
  // The first branch of the chain is the worktree's own.
  const mergesInto = desired ? mergeChainBranches({ desired, from: entry.name }).slice(1) : [];

  theme.blank();
  for (const line of worktreeInfoLines({ theme, entry, declared: desired?.worktrees.get(entry.name), mergesInto })) {
    theme.write(line);
  }
  theme.blank();
}
