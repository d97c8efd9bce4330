export type CopyRule = {
  /** Worktree the files are copied from */
  sourceWorktree: string;
  /** Files, directories or glob patterns relative to the source worktree */
  files: string[];
};

export type IconSet = {
  success: string;
  warning: string;
  error: string;
  info: string;
  orphaned: string;
  dryRun: string;
  missing: string;
  changes: string;
  promotion: string;
  gitClean: string;
  gitDirty: string;
  gitAhead: string;
  gitBehind: string;
  gitDiverged: string;
  gitUnknown: string;
};

export type Config = {
  worktreePrefix?: string;
  branchConfig?: string;
  editor?: string;
  autoOpen?: boolean;
  /** Worktree name prefix for hotfixes, joined with `_`; empty for none */
  hotfixPrefix?: string;
  icons?: Partial<IconSet>;
  copyRules?: CopyRule[];
};

export type ConfigSource = {
  path: string;
  type: 'default' | 'global' | 'local';
};

export type ResolvedConfig = Config & {
  sources: Partial<Record<keyof Config, ConfigSource>>;
};

export type RepoInfo = {
  /** Absolute path of the main worktree */
  root: string;
  /** Directory holding settings and runtime state */
  managementDir: string;
  /** Directory under which worktrees are managed */
  managedPrefix: string;
};

/** A worktree as git reports it right now. */
export type WorktreeRecord = {
  /** Directory basename, used as the worktree name */
  name: string;
  /** Absolute, symlink-resolved path */
  path: string;
  currentBranch: string;
};

export type DesiredWorktree = {
  name: string;
  branch: string;
  description: string;
  /** Worktree whose branch this one's changes are merged into next */
  mergeInto?: string;
};

export type DesiredState = {
  worktrees: Map<string, DesiredWorktree>;
};

export type WorktreeStatus = {
  /** Has uncommitted or untracked changes */
  dirty: boolean;
  /** Commits ahead of upstream */
  ahead: number;
  /** Commits behind upstream */
  behind: number;
  modified: number;
  untracked: number;
  staged: number;
};

export type BranchChange = {
  oldBranch: string;
  newBranch: string;
};

/**
 * `branch` is checked out in `sourceWorktree` but declared for
 * `targetWorktree`, which currently holds `targetBranch`.
 */
export type Promotion = {
  sourceWorktree: string;
  targetWorktree: string;
  branch: string;
  sourceBranch: string;
  targetBranch: string;
};

export type SyncStatus = {
  inSync: boolean;
  missingWorktrees: string[];
  orphanedWorktrees: string[];
  branchChanges: Map<string, BranchChange>;
  worktreePromotions: Promotion[];
};

export type RuntimeState = {
  lastSync: Date | null;
  trackedVars: string[];
  adHocWorktrees: string[];
  currentWorktree: string;
  previousWorktree: string;
  worktreeBaseBranch: Record<string, string>;
};

export type ConfirmFn = (message: string) => boolean | Promise<boolean>;

/** Per-item outcome of a batch operation that keeps going past failures. */
export type BatchItemResult =
  | { name: string; ok: true }
  | { name: string; ok: false; error: string };
