import { openSession } from '../context.ts';
import { addWorktree, planHotfix } from '../manager.ts';
import { reportAdded } from './add.ts';

export async function hotfixCommand(args: { name: string; open: boolean; branchConfig?: string }) {
  const { session, config, theme } = openSession({ cwd: process.cwd(), branchConfig: args.branchConfig });
  const plan = planHotfix({ desired: session.desired, name: args.name, hotfixPrefix: config.hotfixPrefix });

  theme.info({ message: `Using production branch '${plan.baseBranch}' as base for hotfix` });
  theme.info({ message: `Creating hotfix worktree '${plan.worktree}' on branch '${plan.branch}'...` });
  const result = await addWorktree({
    session,
    name: plan.worktree,
    branch: plan.branch,
    createBranch: true,
    baseBranch: plan.baseBranch,
  });

  reportAdded({ theme, config, result, open: args.open });

  if (plan.deploymentChain.length > 1) {
    theme.info({ message: `Remember to merge back through the deployment chain: ${plan.deploymentChain.join(' → ')}` });
  }
}
