import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { parse as parseToml, stringify as stringifyToml } from '@iarna/toml';
import type { JsonMap } from '@iarna/toml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.ts';
import type { RuntimeState } from './types.ts';

export const STATE_FILENAME = 'state.toml';

// Every field is optional so files written by older or newer releases still load.
const stateFileSchema = z.object({
  lastSync: z.date().optional(),
  trackedVars: z.array(z.string()).optional(),
  adHocWorktrees: z.array(z.string()).optional(),
  currentWorktree: z.string().optional(),
  previousWorktree: z.string().optional(),
  worktreeBaseBranch: z.record(z.string()).optional(),
});

export function defaultState(): RuntimeState {
  return {
    lastSync: null,
    trackedVars: [],
    adHocWorktrees: [],
    currentWorktree: '',
    previousWorktree: '',
    worktreeBaseBranch: {},
  };
}

export function statePath(args: { managementDir: string }) {
  return join(args.managementDir, STATE_FILENAME);
}

export function loadState(args: { managementDir: string }): RuntimeState {
  const path = statePath(args);
  if (!existsSync(path)) {
    return defaultState();
  }

  let raw: unknown;
  try {
    raw = parseToml(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError({ message: `Failed to decode state file ${path}: ${errorMessage(error)}`, path, cause: error });
  }

  const validation = stateFileSchema.safeParse(raw);
  if (!validation.success) {
    throw new ConfigError({ message: `Malformed state file ${path}`, path, cause: validation.error });
  }

  const data = validation.data;
  const defaults = defaultState();
  return {
    lastSync: data.lastSync ? new Date(data.lastSync.getTime()) : defaults.lastSync,
    trackedVars: data.trackedVars ?? defaults.trackedVars,
    adHocWorktrees: data.adHocWorktrees ?? defaults.adHocWorktrees,
    currentWorktree: data.currentWorktree ?? defaults.currentWorktree,
    previousWorktree: data.previousWorktree ?? defaults.previousWorktree,
    worktreeBaseBranch: data.worktreeBaseBranch ?? defaults.worktreeBaseBranch,
  };
}

export function serializeState(args: { state: RuntimeState }) {
  const state = args.state;
  const record: JsonMap = {
    trackedVars: [...state.trackedVars],
    adHocWorktrees: [...state.adHocWorktrees],
    currentWorktree: state.currentWorktree,
    previousWorktree: state.previousWorktree,
    worktreeBaseBranch: { ...state.worktreeBaseBranch },
  };
  // TOML has no null; an absent key reads back as "never synced".
  if (state.lastSync) {
    record.lastSync = state.lastSync;
  }
  return stringifyToml(record);
}

/** Overwrites the whole state file. */
export function saveState(args: { managementDir: string; state: RuntimeState }) {
  mkdirSync(args.managementDir, { recursive: true });
  writeFileSync(statePath(args), serializeState({ state: args.state }), 'utf-8');
}

export function setWorktreeBaseBranch(args: { state: RuntimeState; worktree: string; baseBranch: string }) {
  args.state.worktreeBaseBranch[args.worktree] = args.baseBranch;
}

export function getWorktreeBaseBranch(args: { state: RuntimeState; worktree: string }) {
  return Object.hasOwn(args.state.worktreeBaseBranch, args.worktree)
    ? args.state.worktreeBaseBranch[args.worktree]
    : undefined;
}

export function removeWorktreeBaseBranch(args: { state: RuntimeState; worktree: string }) {
  delete args.state.worktreeBaseBranch[args.worktree];
}

export function addAdHocWorktree(args: { state: RuntimeState; worktree: string }) {
  if (!args.state.adHocWorktrees.includes(args.worktree)) {
    args.state.adHocWorktrees.push(args.worktree);
  }
}

export function removeAdHocWorktree(args: { state: RuntimeState; worktree: string }) {
  args.state.adHocWorktrees = args.state.adHocWorktrees.filter(name => name !== args.worktree);
}

/** Selecting the already-current worktree keeps the previous one intact. */
export function setCurrentWorktree(args: { state: RuntimeState; worktree: string }) {
  const state = args.state;
  if (state.currentWorktree && state.currentWorktree !== args.worktree) {
    state.previousWorktree = state.currentWorktree;
  }
  state.currentWorktree = args.worktree;
}

export function markSynced(args: { state: RuntimeState; trackedNames: Iterable<string>; now: Date }) {
  args.state.trackedVars = [...args.trackedNames].sort();
  args.state.lastSync = args.now;
}
