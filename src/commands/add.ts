import { openSession } from '../context.ts';
import { addWorktree } from '../manager.ts';
import { getCurrentBranch } from '../git.ts';
import { openInEditor } from '../editor.ts';
import { errorMessage } from '../errors.ts';
import type { Theme } from '../ui/theme.ts';

type AddResult = Awaited<ReturnType<typeof addWorktree>>;

export async function addCommand(args: {
  name: string;
  branch: string;
  createBranch: boolean;
  baseBranch?: string;
  open: boolean;
  branchConfig?: string;
}) {
  const { session, config, theme } = openSession({ cwd: process.cwd(), branchConfig: args.branchConfig });

  // New branches start from whatever is checked out where the command runs.
  const baseBranch = args.baseBranch ?? (args.createBranch ? getCurrentBranch({ cwd: process.cwd() }) : '');

  theme.info({ message: `Creating worktree '${args.name}' for branch '${args.branch}'...` });
  const result = await addWorktree({
    session,
    name: args.name,
    branch: args.branch,
    createBranch: args.createBranch,
    baseBranch,
  });

  reportAdded({ theme, config, result, open: args.open });
}

/** Shared by `add` and `hotfix`: where the worktree is, what was copied, and the editor. */
export function reportAdded(args: {
  theme: Theme;
  config: { editor: string; autoOpen: boolean };
  result: AddResult;
  open: boolean;
}) {
  const { theme, config, result } = args;

  theme.success({ message: 'Worktree created!' });
  theme.write(`📂 ${theme.paint(result.path, 'cyan')}`);

  if (result.copy) {
    for (const file of result.copy.copied) {
      theme.write(`  • Copied ${file}`);
    }
    for (const file of result.copy.skipped) {
      theme.log({ message: `  • Skipped ${file} (already present)`, color: 'dim' });
    }
  }
  for (const warning of result.warnings) {
    theme.warning({ message: warning });
  }
  theme.blank();

  if (args.open || config.autoOpen) {
    theme.info({ message: `Opening in ${config.editor}...` });
    openInEditor({
      editor: config.editor,
      path: result.path,
      onError: error => theme.warning({ message: `Failed to start ${config.editor}: ${errorMessage(error)}` }),
    });
  } else {
    theme.log({ message: `cd ${result.path}`, color: 'dim' });
  }
}
