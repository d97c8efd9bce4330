import { describe, it, expect } from 'vitest';
import { parseArgs } from './args.ts';

describe('parseArgs', () => {
  const shape = { flags: ['-b', '--open'], options: ['--base', '--config'] };

  it('separates positionals, flags and options', () => {
    const parsed = parseArgs({ ...shape, values: ['spike', '-b', '--base', 'main', 'feature/spike', '--config=alt.toml'] });

    expect(parsed.positionals).toEqual(['spike', 'feature/spike']);
    expect([...parsed.flags]).toEqual(['-b']);
    expect(Object.fromEntries(parsed.options)).toEqual({ '--base': 'main', '--config': 'alt.toml' });
  });

  it('treats a lone dash as a positional', () => {
    expect(parseArgs({ ...shape, values: ['-'] }).positionals).toEqual(['-']);
  });

  it('stops reading flags after --', () => {
    expect(parseArgs({ ...shape, values: ['--', '--open'] }).positionals).toEqual(['--open']);
  });

  it('rejects unknown flags and missing option values', () => {
    expect(() => parseArgs({ ...shape, values: ['--nope'] })).toThrow('Unknown flag: --nope');
    expect(() => parseArgs({ ...shape, values: ['--base'] })).toThrow('--base requires a value');
    expect(() => parseArgs({ ...shape, values: ['--base', '--open'] })).toThrow('--base requires a value');
  });
});
