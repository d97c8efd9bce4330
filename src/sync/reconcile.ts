import { join } from 'path';
import {
  ConfirmationDeclinedError,
  ConfirmationRequiredError,
  SyncError,
  ValidationError,
  WorktreeDirectoryExistsError,
} from '../errors.ts';
import { toBranchMapping } from '../branch-config.ts';
import { markSynced, removeAdHocWorktree, removeWorktreeBaseBranch } from '../state.ts';
import { diffWorktrees, managedRecords } from './diff.ts';
import { assertPromotionsDisjoint, detectPromotions } from './promotions.ts';
import type { VersionControlBackend } from '../backend.ts';
import type { ConfirmFn, DesiredState, Promotion, RuntimeState, SyncStatus, WorktreeRecord } from '../types.ts';

export const SYNC_PHASES = [
  'validating',
  'fetching',
  'diffing',
  'awaiting-confirmation',
  'removing',
  'creating',
  'promoting',
  'retargeting',
  'persisting',
  'done',
] as const;

export type SyncPhase = (typeof SYNC_PHASES)[number];

export type SyncOperation =
  | { kind: 'remove'; worktree: string; path: string }
  | { kind: 'create'; worktree: string; branch: string }
  | { kind: 'skip-primary'; worktree: string; branch: string }
  | { kind: 'promote'; promotion: Promotion }
  | { kind: 'recreate-source'; worktree: string; branch: string }
  | { kind: 'retarget'; worktree: string; fromBranch: string; toBranch: string };

export type ReconcileResult = {
  outcome: 'in-sync' | 'dry-run' | 'applied';
  status: SyncStatus;
  /** Mutations in the order they were applied */
  operations: SyncOperation[];
  /** Orphans left in place because removal was not forced */
  keptOrphans: string[];
};

export type ReconcileOptions = {
  backend: VersionControlBackend;
  desired: DesiredState;
  state: RuntimeState;
  managedPrefix: string;
  dryRun: boolean;
  /** Permits removal of orphaned worktrees */
  force: boolean;
  confirm?: ConfirmFn;
  /** Durably writes the runtime state */
  persist: (state: RuntimeState) => void;
  now?: () => Date;
  onPhase?: (phase: SyncPhase) => void;
};

function attempt<T>(operation: string, task: () => T): T {
  try {
    return task();
  } catch (error) {
    throw new SyncError({ operation, cause: error });
  }
}

function forgetWorktree(args: { state: RuntimeState; name: string }) {
  removeAdHocWorktree({ state: args.state, worktree: args.name });
  removeWorktreeBaseBranch({ state: args.state, worktree: args.name });
}

function validateDesired(args: { backend: VersionControlBackend; desired: DesiredState }) {
  const owners = new Map<string, string>();
  const names = [...args.desired.worktrees.keys()].sort();

  for (const name of names) {
    const worktree = args.desired.worktrees.get(name);
    if (!worktree) {
      continue;
    }

    const owner = owners.get(worktree.branch);
    if (owner !== undefined) {
      throw new ValidationError({
        message: `branch '${worktree.branch}' is declared for both '${owner}' and '${name}'`,
      });
    }
    owners.set(worktree.branch, name);

    const exists = attempt(`check branch ${worktree.branch}`, () => args.backend.branchExists(worktree.branch));
    if (!exists) {
      throw new ValidationError({ message: `branch '${worktree.branch}' does not exist (declared for '${name}')` });
    }
  }
}

export function computeSyncStatus(args: {
  desired: DesiredState;
  actual: WorktreeRecord[];
  managedPrefix: string;
}): SyncStatus {
  const status = diffWorktrees({
    desired: toBranchMapping({ desired: args.desired }),
    actual: args.actual,
    managedPrefix: args.managedPrefix,
  });
  status.worktreePromotions = detectPromotions({
    branchChanges: status.branchChanges,
    actual: args.actual,
    managedPrefix: args.managedPrefix,
  });
  return status;
}

export function orphanRemovalMessage(args: { orphans: Array<{ name: string; path: string }> }) {
  const lines = ['The following worktrees will be PERMANENTLY DELETED:'];
  for (const orphan of args.orphans) {
    lines.push(`  • ${orphan.name} (${orphan.path})`);
  }
  lines.push('Do you want to continue?');
  return lines.join('\n');
}

export function promotionMessage(args: { promotion: Promotion }) {
  const promotion = args.promotion;
  return [
    `Worktree ${promotion.sourceWorktree} (${promotion.branch}) will be promoted to ${promotion.targetWorktree}.`,
    'This is a destructive action:',
    `  1. Worktree ${promotion.targetWorktree} (${promotion.targetBranch}) will be removed.`,
    `  2. Worktree ${promotion.sourceWorktree} (${promotion.branch}) will be moved to ${promotion.targetWorktree}.`,
    'Continue?',
  ].join('\n');
}

/**
 * One reconciliation pass. Every step recomputes from what the backend
 * reports, so an aborted pass is resumed by running it again.
 */
export async function reconcile(options: ReconcileOptions): Promise<ReconcileResult> {
  const backend = options.backend;
  const desired = options.desired;
  const managedPrefix = options.managedPrefix;
  const enter = (phase: SyncPhase) => options.onPhase?.(phase);

  enter('validating');
  validateDesired({ backend, desired });

  enter('fetching');
  attempt('fetch', () => backend.fetch());

  enter('diffing');
  const actual = attempt('list worktrees', () => backend.listWorktrees());
  const status = computeSyncStatus({ desired, actual, managedPrefix });

  if (status.inSync) {
    enter('done');
    return { outcome: 'in-sync', status, operations: [], keptOrphans: [] };
  }

  const promotionSources = new Set(status.worktreePromotions.map(promotion => promotion.sourceWorktree));
  // A promotion vacates its source, so it never needs removing on its own.
  const orphans = status.orphanedWorktrees.filter(name => !promotionSources.has(name));
  const keptOrphans = options.force ? [] : orphans;

  if (options.dryRun) {
    enter('done');
    return { outcome: 'dry-run', status, operations: [], keptOrphans };
  }

  enter('awaiting-confirmation');
  assertPromotionsDisjoint({ promotions: status.worktreePromotions });

  const records = new Map<string, WorktreeRecord>();
  for (const record of managedRecords({ actual, managedPrefix })) {
    records.set(record.name, record);
  }
  const pathOf = (name: string) => records.get(name)?.path ?? join(managedPrefix, name);
  const toRemove = options.force ? orphans.map(name => ({ name, path: pathOf(name) })) : [];

  if (toRemove.length > 0 && options.confirm) {
    const confirmed = await options.confirm(orphanRemovalMessage({ orphans: toRemove }));
    if (!confirmed) {
      throw new ConfirmationDeclinedError({ message: 'orphan removal cancelled by user' });
    }
  }

  if (status.worktreePromotions.length > 0) {
    const confirm = options.confirm;
    if (!confirm) {
      throw new ConfirmationRequiredError({
        message: 'worktree promotions require confirmation, but no confirmation function was provided',
      });
    }
    for (const promotion of status.worktreePromotions) {
      if (!(await confirm(promotionMessage({ promotion })))) {
        throw new ConfirmationDeclinedError({ message: 'worktree promotion cancelled by user' });
      }
    }
  }

  const operations: SyncOperation[] = [];

  enter('removing');
  for (const orphan of toRemove) {
    attempt(`remove orphaned worktree ${orphan.name}`, () => backend.removeWorktree({ path: orphan.path }));
    operations.push({ kind: 'remove', worktree: orphan.name, path: orphan.path });
    forgetWorktree({ state: options.state, name: orphan.name });
  }

  enter('creating');
  for (const name of status.missingWorktrees) {
    const worktree = desired.worktrees.get(name);
    if (!worktree) {
      continue;
    }

    try {
      backend.createWorktree({ name, branch: worktree.branch, prefix: managedPrefix });
      operations.push({ kind: 'create', worktree: name, branch: worktree.branch });
    } catch (error) {
      // The repository's own checkout can occupy the slot of a worktree named after its branch.
      if (error instanceof WorktreeDirectoryExistsError && name === worktree.branch) {
        operations.push({ kind: 'skip-primary', worktree: name, branch: worktree.branch });
        continue;
      }
      throw new SyncError({ operation: `create worktree ${name}`, cause: error });
    }
  }

  // Applied promotions leave `status.branchChanges`; what remains is a plain retarget.
  enter('promoting');
  for (const promotion of status.worktreePromotions) {
    attempt(`promote ${promotion.sourceWorktree} to ${promotion.targetWorktree}`, () =>
      backend.promoteWorktree({
        sourcePath: pathOf(promotion.sourceWorktree),
        targetPath: pathOf(promotion.targetWorktree),
      }),
    );
    operations.push({ kind: 'promote', promotion });
    status.branchChanges.delete(promotion.targetWorktree);

    const vacated = desired.worktrees.get(promotion.sourceWorktree);
    if (vacated) {
      attempt(`create worktree ${vacated.name}`, () =>
        backend.createWorktree({ name: vacated.name, branch: vacated.branch, prefix: managedPrefix }),
      );
      operations.push({ kind: 'recreate-source', worktree: vacated.name, branch: vacated.branch });
      status.branchChanges.delete(vacated.name);
    } else {
      forgetWorktree({ state: options.state, name: promotion.sourceWorktree });
    }
  }

  enter('retargeting');
  for (const [name, change] of status.branchChanges) {
    attempt(`retarget worktree ${name}`, () => backend.retargetWorktree({ path: pathOf(name), branch: change.newBranch }));
    operations.push({ kind: 'retarget', worktree: name, fromBranch: change.oldBranch, toBranch: change.newBranch });
  }

  enter('persisting');
  markSynced({ state: options.state, trackedNames: desired.worktrees.keys(), now: options.now?.() ?? new Date() });
  attempt('save state', () => options.persist(options.state));

  enter('done');
  return { outcome: 'applied', status, operations, keptOrphans };
}
