import { readFileSync } from 'fs';
import { z } from 'zod';
import { parseArgs } from './args.ts';
import { syncCommand } from './commands/sync.ts';
import { statusCommand } from './commands/status.ts';
import { listCommand } from './commands/list.ts';
import { addCommand } from './commands/add.ts';
import { hotfixCommand } from './commands/hotfix.ts';
import { infoCommand } from './commands/info.ts';
import { removeCommand } from './commands/remove.ts';
import { switchCommand } from './commands/switch.ts';
import { transferCommand } from './commands/transfer.ts';
import { validateCommand } from './commands/validate.ts';
import { configCommand } from './commands/config.ts';
import { shouldUseColor } from './context.ts';
import { errorMessage, SyncError } from './errors.ts';
import { createTheme } from './ui/theme.ts';
import type { Theme } from './ui/theme.ts';

const CONFIG_OPTION = '--config';

export async function main(args: { argv: string[] }) {
  const theme = createTheme({ color: shouldUseColor() });
  const command = args.argv[0];
  const commandArgs = args.argv.slice(1);

  const parse = (shape: { flags?: string[]; options?: string[] }) => {
    const parsed = parseArgs({
      values: commandArgs,
      flags: shape.flags ?? [],
      options: [CONFIG_OPTION, ...(shape.options ?? [])],
    });
    return { ...parsed, branchConfig: parsed.options.get(CONFIG_OPTION) };
  };

  try {
    switch (command) {
      case 'sync': {
        const parsed = parse({ flags: ['--dry-run', '-n', '--force', '-f'] });
        await syncCommand({
          dryRun: parsed.flags.has('--dry-run') || parsed.flags.has('-n'),
          force: parsed.flags.has('--force') || parsed.flags.has('-f'),
          branchConfig: parsed.branchConfig,
        });
        break;
      }

      case 'status':
      case 'st':
        statusCommand({ branchConfig: parse({}).branchConfig });
        break;

      case 'list':
      case 'ls':
        listCommand({ branchConfig: parse({}).branchConfig });
        break;

      case 'add': {
        const parsed = parse({ flags: ['-b', '--open'], options: ['--base'] });
        const [name, branch] = parsed.positionals;
        if (!name || !branch) {
          usageError({ theme, usage: 'wts add <name> <branch> [-b] [--base <branch>] [--open]' });
        }
        await addCommand({
          name,
          branch,
          createBranch: parsed.flags.has('-b'),
          baseBranch: parsed.options.get('--base'),
          open: parsed.flags.has('--open'),
          branchConfig: parsed.branchConfig,
        });
        break;
      }

      case 'hotfix':
      case 'hf': {
        const parsed = parse({ flags: ['--open'] });
        const name = parsed.positionals[0];
        if (!name) {
          usageError({ theme, usage: 'wts hotfix <name> [--open]' });
        }
        await hotfixCommand({ name, open: parsed.flags.has('--open'), branchConfig: parsed.branchConfig });
        break;
      }

      case 'info':
      case 'i': {
        const parsed = parse({});
        const name = parsed.positionals[0];
        if (!name) {
          usageError({ theme, usage: 'wts info <name>' });
        }
        infoCommand({ name, branchConfig: parsed.branchConfig });
        break;
      }

      case 'remove':
      case 'rm': {
        const parsed = parse({ flags: ['--force', '-f'] });
        const name = parsed.positionals[0];
        if (!name) {
          usageError({ theme, usage: 'wts remove <name> [--force]' });
        }
        await removeCommand({
          name,
          force: parsed.flags.has('--force') || parsed.flags.has('-f'),
          branchConfig: parsed.branchConfig,
        });
        break;
      }

      case 'switch':
      case 'sw': {
        const parsed = parse({ flags: ['--print-path'] });
        switchCommand({
          name: parsed.positionals[0],
          printPath: parsed.flags.has('--print-path'),
          branchConfig: parsed.branchConfig,
        });
        break;
      }

      case 'push':
      case 'pull': {
        const parsed = parse({ flags: ['--all', '-a'] });
        transferCommand({
          direction: command,
          name: parsed.positionals[0],
          all: parsed.flags.has('--all') || parsed.flags.has('-a'),
          branchConfig: parsed.branchConfig,
        });
        break;
      }

      case 'validate':
        validateCommand({ branchConfig: parse({}).branchConfig });
        break;

      case 'config': {
        const parsed = parseArgs({ values: commandArgs, flags: ['--global'], options: [] });
        configCommand({ values: parsed.positionals, global: parsed.flags.has('--global') });
        break;
      }

      case 'help':
      case '--help':
      case '-h':
      case undefined:
        showHelp({ theme });
        break;

      case 'version':
      case '--version':
      case '-v':
        theme.write(`wts v${readVersion()}`);
        break;

      default:
        theme.error({ message: `Unknown command: ${command}` });
        theme.blank();
        showHelp({ theme });
        process.exit(1);
    }
  } catch (unknownError) {
    theme.error({ message: errorMessage(unknownError) });
    if (unknownError instanceof SyncError) {
      theme.log({ message: 'Steps before the failure stay applied; fix the cause and run sync again.', color: 'dim' });
    }
    process.exit(1);
  }
}

function usageError(args: { theme: Theme; usage: string }): never {
  args.theme.error({ message: `Usage: ${args.usage}` });
  process.exit(1);
}

const packageSchema = z.object({ version: z.string() });

function readVersion() {
  const content = readFileSync(new URL('../package.json', import.meta.url), 'utf-8');
  const validation = packageSchema.safeParse(JSON.parse(content));
  return validation.success ? validation.data.version : 'unknown';
}

function showHelp(args: { theme: Theme }) {
  const theme = args.theme;
  const lines = [
    '',
    theme.paint('wts - declarative git worktree manager', 'bright'),
    '',
    theme.paint('Usage:', 'cyan'),
    '  wts sync [--dry-run] [--force]         Make worktrees match the mapping file',
    '  wts status                             Show what a sync would change',
    '  wts list                               List managed worktrees',
    '  wts add <name> <branch> [-b]           Create an ad hoc worktree',
    '          [--base <branch>] [--open]',
    '  wts hotfix <name> [--open]             Create a hotfix worktree from the production branch',
    '  wts info <name>                        Show details of one worktree',
    '  wts remove <name> [--force]            Remove a worktree',
    '  wts switch [name|-] [--print-path]     Select a worktree and print its path',
    '  wts push [name|--all]                  Push one or every worktree',
    '  wts pull [name|--all]                  Pull one or every worktree',
    '  wts validate                           Check that every declared branch exists',
    '  wts config <get|set|list>              Manage settings',
    '  wts help                               Show this help',
    '  wts version                            Show version',
    '',
    theme.paint('Flags:', 'cyan'),
    '  --config <path>          Use another worktree mapping file',
    '  --dry-run, -n            Report changes without applying them',
    '  --force, -f              Also remove orphaned worktrees (sync), skip confirmation (remove)',
    '  -b                       Create the branch if it does not exist (add)',
    '',
    theme.paint('Config:', 'cyan'),
    '  wts config get <key>                   Get a setting',
    '  wts config set <key> <value>           Set a setting for this repository',
    '  wts config set <key> <value> --global  Set a setting for every repository',
    '  wts config list                        List settings and where they come from',
    '',
    theme.paint('Config keys:', 'dim'),
    '  worktreePrefix  Directory holding managed worktrees (default: worktrees)',
    '  branchConfig    Worktree mapping file (default: worktrees.toml)',
    '  editor          Editor command (default: $EDITOR or "code")',
    '  autoOpen        Open new worktrees in the editor (default: false)',
    '  hotfixPrefix    Name prefix for hotfix worktrees (default: HOTFIX)',
    '',
    theme.paint('Mapping file:', 'cyan'),
    '  [worktrees.main]',
    '  branch = "main"',
    '  description = "Production"',
    '',
    '  [worktrees.dev]',
    '  branch = "develop"',
    '  mergeInto = "main"',
    '',
  ];
  for (const line of lines) {
    theme.write(line);
  }
}
