import { openSession } from '../context.ts';
import { removeWorktree, worktreePath } from '../manager.ts';
import { managedRecords } from '../sync/diff.ts';
import { confirmRemove, suggestName } from '../ui/prompts.ts';
import { ValidationError } from '../errors.ts';
import type { WorktreeStatus } from '../types.ts';

export async function removeCommand(args: { name: string; force: boolean; branchConfig?: string }) {
  const { session, theme } = openSession({ cwd: process.cwd(), branchConfig: args.branchConfig });

  const records = managedRecords({ actual: session.backend.listWorktrees(), managedPrefix: session.repo.managedPrefix });
  const record = records.find(candidate => candidate.name === args.name);
  if (!record) {
    const suggestion = suggestName({ query: args.name, names: records.map(candidate => candidate.name) });
    throw new ValidationError({
      message: `No managed worktree named '${args.name}'${suggestion ? `; did you mean '${suggestion}'?` : ''}`,
    });
  }

  if (!args.force) {
    let status: WorktreeStatus | null;
    try {
      status = session.backend.status({ path: record.path });
    } catch (error) {
      status = null;
    }

    const confirmed = await confirmRemove({
      theme,
      name: record.name,
      branch: record.currentBranch,
      path: record.path,
      status,
    });
    if (!confirmed) {
      theme.info({ message: 'Cancelled' });
      return;
    }
  }

  const result = removeWorktree({ session, name: args.name });
  for (const warning of result.warnings) {
    theme.warning({ message: warning });
  }
  theme.success({ message: `Worktree removed: ${args.name}` });

  if (session.desired?.worktrees.has(args.name)) {
    theme.log({
      message: `'${args.name}' is still declared and will be recreated at ${worktreePath({ session, name: args.name })} by the next sync`,
      color: 'dim',
    });
  }
}
