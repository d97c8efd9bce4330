import type { WorktreeRecord, WorktreeStatus } from './types.ts';

/**
 * What the reconciliation engine needs from version control. Every method is
 * synchronous and throws on failure; nothing is retried.
 */
export interface VersionControlBackend {
  listWorktrees(): WorktreeRecord[];
  /** True when the branch exists locally or on the remote. */
  branchExists(branch: string): boolean;
  fetch(): void;
  /** Creates `<prefix>/<name>` on `branch`; throws WorktreeDirectoryExistsError if the directory is taken. */
  createWorktree(args: { name: string; branch: string; prefix: string }): void;
  removeWorktree(args: { path: string }): void;
  /** Repoints the worktree at `path` to `branch`. */
  retargetWorktree(args: { path: string; branch: string }): void;
  /** Vacates `sourcePath` and leaves its checkout at `targetPath`. */
  promoteWorktree(args: { sourcePath: string; targetPath: string }): void;
  status(args: { path: string }): WorktreeStatus;
}

/** Lifecycle operations used outside a reconciliation pass. */
export interface WorktreeBackend extends VersionControlBackend {
  addWorktree(args: { name: string; branch: string; createBranch: boolean; baseBranch: string; prefix: string }): string;
  pushWorktree(args: { path: string }): void;
  pullWorktree(args: { path: string }): void;
}
