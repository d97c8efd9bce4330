import type { DesiredState } from './types.ts';

/**
 * Worktrees form a merge-back chain through `mergeInto`: a fix lands in the
 * production worktree and travels up, e.g. `production → staging → main`.
 * Returns the first problem with the links, or null when they form a forest.
 */
export function findMergeChainProblem(args: { desired: DesiredState }) {
  const worktrees = args.desired.worktrees;
  const names = [...worktrees.keys()].sort();

  for (const name of names) {
    const target = worktrees.get(name)?.mergeInto;
    if (target === undefined) {
      continue;
    }
    if (target === name) {
      return `worktree '${name}' merges into itself`;
    }
    if (!worktrees.has(target)) {
      return `worktree '${name}' merges into unknown worktree '${target}'`;
    }
  }

  // Each worktree has at most one target, so a walk that revisits a name is a cycle.
  const acyclic = new Set<string>();
  for (const start of names) {
    const seen: string[] = [];
    let current: string | undefined = start;
    while (current !== undefined && !acyclic.has(current)) {
      if (seen.includes(current)) {
        const cycle = [...seen.slice(seen.indexOf(current)), current];
        return `circular merge chain: ${cycle.join(' → ')}`;
      }
      seen.push(current);
      current = worktrees.get(current)?.mergeInto;
    }
    for (const name of seen) {
      acyclic.add(name);
    }
  }

  return null;
}

/** Worktree names from `from` up to the end of its chain. Expects a checked mapping. */
export function mergeChain(args: { desired: DesiredState; from: string }) {
  const chain: string[] = [];
  let current: string | undefined = args.from;
  while (current !== undefined && args.desired.worktrees.has(current) && !chain.includes(current)) {
    chain.push(current);
    current = args.desired.worktrees.get(current)?.mergeInto;
  }
  return chain;
}

/** Branches along the chain from `from`, in merge order. */
export function mergeChainBranches(args: { desired: DesiredState; from: string }) {
  return mergeChain(args).flatMap(name => {
    const worktree = args.desired.worktrees.get(name);
    return worktree ? [worktree.branch] : [];
  });
}

/**
 * The worktree hotfixes branch from: one that merges into another but that
 * nothing merges into. Without any links, the first worktree that merges
 * nowhere. Ties go to the lexically first name.
 */
export function findProductionWorktree(args: { desired: DesiredState }) {
  const worktrees = [...args.desired.worktrees.values()].sort((left, right) => left.name.localeCompare(right.name));
  const mergedInto = new Set(worktrees.flatMap(worktree => (worktree.mergeInto ? [worktree.mergeInto] : [])));

  const start = worktrees.find(worktree => worktree.mergeInto !== undefined && !mergedInto.has(worktree.name));
  return start ?? worktrees.find(worktree => worktree.mergeInto === undefined) ?? null;
}
