import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join, isAbsolute, dirname } from 'path';
import { homedir } from 'os';
import { parse as parseToml, stringify as stringifyToml } from '@iarna/toml';
import type { JsonMap } from '@iarna/toml';
import { ConfigError, ValidationError, errorMessage } from './errors.ts';
import { z } from 'zod';
import type { Config, ResolvedConfig, ConfigSource } from './types.ts';

export const MANAGEMENT_DIRNAME = '.wtsync';
export const SETTINGS_FILENAME = 'config.toml';
export const GLOBAL_CONFIG_FILENAME = '.wtsync.toml';

export const CONFIG_KEYS = [
  'worktreePrefix',
  'branchConfig',
  'editor',
  'autoOpen',
  'hotfixPrefix',
  'icons',
  'copyRules',
] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

/** Keys `wts config set` can write; tables are edited by hand. */
export const SCALAR_CONFIG_KEYS = ['worktreePrefix', 'branchConfig', 'editor', 'autoOpen', 'hotfixPrefix'] as const;
export type ScalarConfigKey = (typeof SCALAR_CONFIG_KEYS)[number];

export const DEFAULT_CONFIG = {
  worktreePrefix: 'worktrees',
  branchConfig: 'worktrees.toml',
  editor: process.env.EDITOR || process.env.VISUAL || 'code',
  autoOpen: false,
  hotfixPrefix: 'HOTFIX',
  copyRules: [],
} satisfies Config;

const iconsSchema = z
  .object({
    success: z.string(),
    warning: z.string(),
    error: z.string(),
    info: z.string(),
    orphaned: z.string(),
    dryRun: z.string(),
    missing: z.string(),
    changes: z.string(),
    promotion: z.string(),
    gitClean: z.string(),
    gitDirty: z.string(),
    gitAhead: z.string(),
    gitBehind: z.string(),
    gitDiverged: z.string(),
    gitUnknown: z.string(),
  })
  .partial();

const copyRuleSchema = z.object({
  sourceWorktree: z.string().min(1),
  files: z.array(z.string().min(1)),
});

const settingsFileSchema = z.object({
  worktreePrefix: z.string().min(1).optional(),
  branchConfig: z.string().min(1).optional(),
  editor: z.string().optional(),
  autoOpen: z.boolean().optional(),
  hotfixPrefix: z.string().optional(),
  icons: iconsSchema.optional(),
  copyRules: z.array(copyRuleSchema).optional(),
});

export function globalConfigPaths(args: { home: string }) {
  return [join(args.home, GLOBAL_CONFIG_FILENAME), join(args.home, '.config', 'wtsync', SETTINGS_FILENAME)];
}

export function localConfigPath(args: { repoRoot: string }) {
  return join(args.repoRoot, MANAGEMENT_DIRNAME, SETTINGS_FILENAME);
}

export function loadConfig(args: { repoRoot: string; home?: string }) {
  const resolved = resolveConfig(args);
  return {
    worktreePrefix: resolved.worktreePrefix ?? DEFAULT_CONFIG.worktreePrefix,
    branchConfig: resolved.branchConfig ?? DEFAULT_CONFIG.branchConfig,
    editor: resolved.editor ?? DEFAULT_CONFIG.editor,
    autoOpen: resolved.autoOpen ?? DEFAULT_CONFIG.autoOpen,
    hotfixPrefix: resolved.hotfixPrefix ?? DEFAULT_CONFIG.hotfixPrefix,
    icons: resolved.icons ?? {},
    copyRules: resolved.copyRules ?? DEFAULT_CONFIG.copyRules,
  };
}

export function resolveConfig(args: { repoRoot: string; home?: string }) {
  const home = args.home ?? homedir();
  const configs: Array<{ config: Config; source: ConfigSource }> = [];

  // 1. Defaults
  configs.push({
    config: DEFAULT_CONFIG,
    source: { path: '(default)', type: 'default' },
  });

  // 2. Global config, first match wins
  const globalPath = globalConfigPaths({ home }).find(candidate => existsSync(candidate));
  if (globalPath) {
    configs.push({
      config: loadTomlFile({ path: globalPath }),
      source: { path: globalPath, type: 'global' },
    });
  }

  // 3. Repository config
  const repoConfig = localConfigPath({ repoRoot: args.repoRoot });
  if (existsSync(repoConfig)) {
    configs.push({
      config: loadTomlFile({ path: repoConfig }),
      source: { path: repoConfig, type: 'local' },
    });
  }

  const merged: Config = {};
  const sources: Partial<Record<ConfigKey, ConfigSource>> = {};

  for (const entry of configs) {
    const config = entry.config;
    const source = entry.source;

    if (config.worktreePrefix !== undefined) {
      merged.worktreePrefix = config.worktreePrefix;
      sources.worktreePrefix = source;
    }
    if (config.branchConfig !== undefined) {
      merged.branchConfig = config.branchConfig;
      sources.branchConfig = source;
    }
    if (config.editor !== undefined) {
      merged.editor = config.editor;
      sources.editor = source;
    }
    if (config.autoOpen !== undefined) {
      merged.autoOpen = config.autoOpen;
      sources.autoOpen = source;
    }
    if (config.hotfixPrefix !== undefined) {
      merged.hotfixPrefix = config.hotfixPrefix;
      sources.hotfixPrefix = source;
    }
    if (config.icons !== undefined) {
      merged.icons = { ...merged.icons, ...config.icons };
      sources.icons = source;
    }
    if (config.copyRules !== undefined) {
      merged.copyRules = config.copyRules;
      sources.copyRules = source;
    }
  }

  const resolvedConfig = {
    ...merged,
    sources,
  } satisfies ResolvedConfig;

  return resolvedConfig;
}

function loadTomlFile(args: { path: string }): Config {
  try {
    const content = readFileSync(args.path, 'utf-8');
    const validation = settingsFileSchema.safeParse(parseToml(content));
    return validation.success ? validation.data : {};
  } catch (error) {
    return {};
  }
}

export function expandPath(args: { path: string; home?: string }) {
  const targetPath = args.path;
  if (targetPath.startsWith('~/')) {
    return join(args.home ?? homedir(), targetPath.slice(2));
  }
  return targetPath;
}

export function resolveBranchConfigPath(args: { repoRoot: string; branchConfig: string }) {
  const expanded = expandPath({ path: args.branchConfig });
  return isAbsolute(expanded) ? expanded : join(args.repoRoot, expanded);
}

export function isScalarConfigKey(value: string): value is ScalarConfigKey {
  return SCALAR_CONFIG_KEYS.some(key => key === value);
}

export function parseConfigValue(args: { key: ScalarConfigKey; value: string }) {
  if (args.key !== 'autoOpen') {
    return args.value;
  }

  const normalized = args.value.trim().toLowerCase();
  if (normalized !== 'true' && normalized !== 'false') {
    throw new ValidationError({ message: `autoOpen must be true or false, got '${args.value}'` });
  }
  return normalized === 'true';
}

/** Sets one key in a settings file, keeping every other key and table in it. */
export function writeConfigValue(args: { path: string; key: ScalarConfigKey; value: string | boolean }) {
  let existing: JsonMap = {};
  if (existsSync(args.path)) {
    try {
      existing = parseToml(readFileSync(args.path, 'utf-8'));
    } catch (error) {
      throw new ConfigError({ message: `Failed to parse ${args.path}: ${errorMessage(error)}`, path: args.path, cause: error });
    }
  }

  existing[args.key] = args.value;
  mkdirSync(dirname(args.path), { recursive: true });
  writeFileSync(args.path, stringifyToml(existing), 'utf-8');
}
