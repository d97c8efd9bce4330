import { homedir } from 'os';
import { existsSync } from 'fs';
import { join } from 'path';
import {
  CONFIG_KEYS,
  GLOBAL_CONFIG_FILENAME,
  SCALAR_CONFIG_KEYS,
  globalConfigPaths,
  isScalarConfigKey,
  localConfigPath,
  parseConfigValue,
  resolveConfig,
  writeConfigValue,
} from '../config.ts';
import { detectRepoRoot } from '../repo.ts';
import { shouldUseColor } from '../context.ts';
import { ValidationError } from '../errors.ts';
import { createTheme } from '../ui/theme.ts';
import type { Theme } from '../ui/theme.ts';

const USAGE = 'Usage: wts config <get|set|list> [key] [value] [--global]';

function requireRepoRoot() {
  const root = detectRepoRoot({ cwd: process.cwd() });
  if (!root) {
    throw new ValidationError({ message: 'Not in a git repository' });
  }
  return root;
}

function displayValue(value: unknown) {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function configCommand(args: { values: string[]; global: boolean }) {
  const root = detectRepoRoot({ cwd: process.cwd() });
  const icons = root ? resolveConfig({ repoRoot: root }).icons : undefined;
  const theme = createTheme({ icons, color: shouldUseColor() });
  const [action, key, value] = args.values;

  switch (action) {
    case 'get':
      if (!key) {
        throw new ValidationError({ message: 'Usage: wts config get <key>' });
      }
      getConfig({ theme, key });
      break;
    case 'set':
      if (!key || value === undefined) {
        throw new ValidationError({ message: 'Usage: wts config set <key> <value> [--global]' });
      }
      setConfig({ theme, key, value, global: args.global });
      break;
    case 'list':
      listConfig({ theme });
      break;
    default:
      throw new ValidationError({ message: action ? `Unknown action: ${action}\n${USAGE}` : USAGE });
  }
}

function getConfig(args: { theme: Theme; key: string }) {
  const resolved = resolveConfig({ repoRoot: requireRepoRoot() });
  const key = CONFIG_KEYS.find(candidate => candidate === args.key);
  if (!key) {
    throw new ValidationError({ message: `Config key not found: ${args.key}` });
  }

  const value = resolved[key];
  if (value === undefined) {
    throw new ValidationError({ message: `Config key not set: ${args.key}` });
  }

  args.theme.write(displayValue(value));
}

function setConfig(args: { theme: Theme; key: string; value: string; global: boolean }) {
  if (!isScalarConfigKey(args.key)) {
    throw new ValidationError({
      message: `Invalid config key: ${args.key}\nValid keys: ${SCALAR_CONFIG_KEYS.join(', ')} (edit icons and copyRules in the file)`,
    });
  }

  let configPath: string;
  if (args.global) {
    const home = homedir();
    configPath =
      globalConfigPaths({ home }).find(candidate => existsSync(candidate)) ?? join(home, GLOBAL_CONFIG_FILENAME);
  } else {
    configPath = localConfigPath({ repoRoot: requireRepoRoot() });
  }

  const parsedValue = parseConfigValue({ key: args.key, value: args.value });
  writeConfigValue({ path: configPath, key: args.key, value: parsedValue });

  args.theme.success({ message: `Set ${args.key} = ${parsedValue}` });
  args.theme.info({ message: `Config file: ${configPath}` });
}

function listConfig(args: { theme: Theme }) {
  const theme = args.theme;
  const resolved = resolveConfig({ repoRoot: requireRepoRoot() });

  theme.blank();
  theme.write(theme.paint('Configuration:', 'bright'));
  theme.blank();

  for (const key of CONFIG_KEYS) {
    const value = resolved[key];
    const source = resolved.sources[key];
    if (value === undefined) {
      continue;
    }

    theme.write(`  ${theme.paint(key, 'cyan')} = ${theme.paint(displayValue(value), 'green')}`);
    if (source) {
      const sourceText = source.type === 'default' ? theme.paint('(default)', 'dim') : theme.paint(source.path, 'dim');
      theme.write(`    from: ${sourceText}`);
    }
    theme.blank();
  }
}
