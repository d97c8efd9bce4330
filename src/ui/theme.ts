import type { IconSet, WorktreeStatus } from '../types.ts';

export const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
} as const;

export type ColorKey = keyof typeof colors;

export const DEFAULT_ICONS = {
  success: '✅',
  warning: '⚠️',
  error: '❌',
  info: '💡',
  orphaned: '🗑️',
  dryRun: '🔍',
  missing: '📁',
  changes: '🔄',
  promotion: '⏫',
  gitClean: '✓',
  gitDirty: '~',
  gitAhead: '↑',
  gitBehind: '↓',
  gitDiverged: '⇕',
  gitUnknown: '?',
} satisfies IconSet;

export const DEFAULT_PATH_MAX_LENGTH = 60;

export type Writer = (line: string) => void;

export type Theme = ReturnType<typeof createTheme>;

export function colorize(args: { text: string; color: ColorKey; enabled?: boolean }) {
  if (args.enabled === false) {
    return args.text;
  }
  return `${colors[args.color]}${args.text}${colors.reset}`;
}

export function stripAnsi(args: { text: string }) {
  return args.text.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Presentation context for one command run. Built from the resolved
 * settings and handed to whatever renders output.
 */
export function createTheme(args: { icons?: Partial<IconSet>; color?: boolean; write?: Writer }) {
  const icons: IconSet = { ...DEFAULT_ICONS, ...args.icons };
  const colorEnabled = args.color ?? true;
  const write: Writer = args.write ?? (line => console.log(line));

  const paint = (text: string, color: ColorKey) => colorize({ text, color, enabled: colorEnabled });

  const log = (logArgs: { message: string; color: ColorKey }) => {
    write(paint(logArgs.message, logArgs.color));
  };

  return {
    icons,
    paint,
    write,
    blank: () => write(''),
    log,
    error: (logArgs: { message: string }) => log({ message: `${icons.error} ${logArgs.message}`, color: 'red' }),
    success: (logArgs: { message: string }) => log({ message: `${icons.success} ${logArgs.message}`, color: 'green' }),
    info: (logArgs: { message: string }) => log({ message: `${icons.info} ${logArgs.message}`, color: 'blue' }),
    warning: (logArgs: { message: string }) => log({ message: `${icons.warning} ${logArgs.message}`, color: 'yellow' }),
    statusIcon: (iconArgs: { status: WorktreeStatus | null }) => statusIcon({ icons, status: iconArgs.status }),
  };
}

export function statusIcon(args: { icons: IconSet; status: WorktreeStatus | null }) {
  const icons = args.icons;
  const status = args.status;
  if (!status) {
    return icons.gitUnknown;
  }

  const parts: string[] = [];

  if (status.ahead > 0 && status.behind > 0) {
    parts.push(icons.gitDiverged);
  } else if (status.ahead > 0) {
    parts.push(`${icons.gitAhead}${status.ahead}`);
  } else if (status.behind > 0) {
    parts.push(`${icons.gitBehind}${status.behind}`);
  }

  if (status.dirty) {
    parts.push(icons.gitDirty);
  }

  if (parts.length === 0) {
    return icons.gitClean;
  }

  return parts.join(' ');
}

export function formatPath(args: { path: string; maxLength: number; home?: string }) {
  const path = args.path;
  const maxLength = args.maxLength;

  if (path.length <= maxLength) {
    return path;
  }

  const home = args.home ?? process.env.HOME ?? '';
  if (home && path.startsWith(home)) {
    const relativePath = `~${path.slice(home.length)}`;
    if (relativePath.length <= maxLength) {
      return relativePath;
    }
    return `...${relativePath.slice(-(maxLength - 3))}`;
  }

  return `...${path.slice(-(maxLength - 3))}`;
}

export function box(args: { title: string; content: string[]; width: number }) {
  const title = args.title;
  const content = args.content;
  const width = args.width;
  const lines = [
    `┌─ ${title} ${'─'.repeat(Math.max(0, width - title.length - 5))}┐`,
    `│${' '.repeat(width - 2)}│`,
  ];

  for (const line of content) {
    const stripped = stripAnsi({ text: line });
    const padding = Math.max(0, width - stripped.length - 4);
    lines.push(`│  ${line}${' '.repeat(padding)}│`);
  }

  lines.push(`│${' '.repeat(width - 2)}│`);
  lines.push(`└${'─'.repeat(width - 2)}┘`);

  return lines.join('\n');
}
