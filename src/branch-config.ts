import { readFileSync, existsSync } from 'fs';
import { parse as parseToml } from '@iarna/toml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.ts';
import { findMergeChainProblem } from './merge-chain.ts';
import type { DesiredState, DesiredWorktree } from './types.ts';

const worktreeEntrySchema = z.object({
  branch: z.string().trim().min(1, 'branch is required'),
  description: z.string().default(''),
  mergeInto: z.string().trim().min(1, 'mergeInto must name a worktree').optional(),
});

const branchConfigSchema = z.object({
  worktrees: z.record(worktreeEntrySchema).default({}),
});

const WORKTREE_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

/**
 * Parses the declarative worktree mapping:
 *
 * ```toml
 * [worktrees.main]
 * branch = "main"
 * description = "Production"
 *
 * [worktrees.dev]
 * branch = "develop"
 * mergeInto = "main"
 * ```
 */
export function parseBranchConfig(args: { content: string; path: string }): DesiredState {
  let raw: unknown;
  try {
    raw = parseToml(args.content);
  } catch (error) {
    throw new ConfigError({ message: `Failed to parse ${args.path}: ${errorMessage(error)}`, path: args.path, cause: error });
  }

  const validation = branchConfigSchema.safeParse(raw);
  if (!validation.success) {
    const issue = validation.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    const detail = issue ? issue.message : 'invalid content';
    throw new ConfigError({ message: `Invalid ${args.path}: ${where ? `${where}: ` : ''}${detail}`, path: args.path });
  }

  const worktrees = new Map<string, DesiredWorktree>();
  for (const [name, entry] of Object.entries(validation.data.worktrees)) {
    if (!WORKTREE_NAME_PATTERN.test(name) || name === '.' || name === '..') {
      throw new ConfigError({ message: `Invalid ${args.path}: '${name}' is not a valid worktree name`, path: args.path });
    }
    const worktree: DesiredWorktree = { name, branch: entry.branch, description: entry.description };
    if (entry.mergeInto !== undefined) {
      worktree.mergeInto = entry.mergeInto;
    }
    worktrees.set(name, worktree);
  }

  const problem = findMergeChainProblem({ desired: { worktrees } });
  if (problem) {
    throw new ConfigError({ message: `Invalid ${args.path}: ${problem}`, path: args.path });
  }

  return { worktrees };
}

export function loadBranchConfig(args: { path: string }) {
  if (!existsSync(args.path)) {
    throw new ConfigError({ message: `No worktree mapping found at ${args.path}`, path: args.path });
  }

  return parseBranchConfig({ content: readFileSync(args.path, 'utf-8'), path: args.path });
}

export function toBranchMapping(args: { desired: DesiredState }) {
  const mapping = new Map<string, string>();
  for (const [name, worktree] of args.desired.worktrees) {
    mapping.set(name, worktree.branch);
  }
  return mapping;
}
