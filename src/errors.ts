export type ErrorCode =
  | 'VALIDATION'
  | 'CONFIG'
  | 'BACKEND'
  | 'DIRECTORY_EXISTS'
  | 'CONFIRMATION_DECLINED'
  | 'CONFIRMATION_REQUIRED'
  | 'PROMOTION_CONFLICT'
  | 'SYNC';

/**
 * Base class for every error the tool raises on purpose.
 * Anything else reaching the CLI is a bug.
 */
export class WtsyncError extends Error {
  readonly code: ErrorCode;

  constructor(args: { message: string; code: ErrorCode; cause?: unknown }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = 'WtsyncError';
    this.code = args.code;
  }
}

/** A declared worktree cannot be realised, e.g. its branch is missing. */
export class ValidationError extends WtsyncError {
  constructor(args: { message: string }) {
    super({ message: args.message, code: 'VALIDATION' });
    this.name = 'ValidationError';
  }
}

export class ConfigError extends WtsyncError {
  readonly path: string;

  constructor(args: { message: string; path: string; cause?: unknown }) {
    super({ message: args.message, code: 'CONFIG', cause: args.cause });
    this.name = 'ConfigError';
    this.path = args.path;
  }
}

export class BackendError extends WtsyncError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: { message: string; command: string; exitCode: number | null; stderr: string; cause?: unknown }) {
    super({ message: args.message, code: 'BACKEND', cause: args.cause });
    this.name = 'BackendError';
    this.command = args.command;
    this.exitCode = args.exitCode;
    this.stderr = args.stderr;
  }
}

export class WorktreeDirectoryExistsError extends WtsyncError {
  readonly path: string;

  constructor(args: { path: string }) {
    super({ message: `worktree directory already exists: ${args.path}`, code: 'DIRECTORY_EXISTS' });
    this.name = 'WorktreeDirectoryExistsError';
    this.path = args.path;
  }
}

export class ConfirmationDeclinedError extends WtsyncError {
  constructor(args: { message: string }) {
    super({ message: args.message, code: 'CONFIRMATION_DECLINED' });
    this.name = 'ConfirmationDeclinedError';
  }
}

export class ConfirmationRequiredError extends WtsyncError {
  constructor(args: { message: string }) {
    super({ message: args.message, code: 'CONFIRMATION_REQUIRED' });
    this.name = 'ConfirmationRequiredError';
  }
}

export class PromotionConflictError extends WtsyncError {
  readonly worktree: string;

  constructor(args: { worktree: string }) {
    super({
      message: `worktree '${args.worktree}' takes part in more than one promotion; resolve the branch moves in separate syncs`,
      code: 'PROMOTION_CONFLICT',
    });
    this.name = 'PromotionConflictError';
    this.worktree = args.worktree;
  }
}

/** A mid-pass failure, labelled with the operation that failed. */
export class SyncError extends WtsyncError {
  readonly operation: string;

  constructor(args: { operation: string; cause: unknown }) {
    super({ message: `${args.operation}: ${errorMessage(args.cause)}`, code: 'SYNC', cause: args.cause });
    this.name = 'SyncError';
    this.operation = args.operation;
  }
}

export function errorMessage(value: unknown) {
  return value instanceof Error ? value.message : String(value);
}
