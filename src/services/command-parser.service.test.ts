import { describe, it, expect } from 'vitest';
import { COMMANDS, formatHelp, parseCommandLine, parseInteger } from './command-parser.service.ts';

const command = (name: string) => {
  const found = COMMANDS.find((c) => c.name === name);
  if (!found) {
    throw new Error(`no command ${name}`);
  }
  return found;
};

describe('parseCommandLine', () => {
  it('should treat blank lines as empty', () => {
    expect(parseCommandLine('')).toEqual({ type: 'empty' });
    expect(parseCommandLine('   \t')).toEqual({ type: 'empty' });
  });

  it('should match full names and abbreviations', () => {
    expect(parseCommandLine('continue')).toEqual({ type: 'command', command: command('continue') });
    expect(parseCommandLine('c')).toEqual({ type: 'command', command: command('continue') });
    expect(parseCommandLine('  t  ')).toEqual({ type: 'command', command: command('tape') });
  });

  it('should report unknown words', () => {
    expect(parseCommandLine('nex 3')).toEqual({ type: 'unknown', word: 'nex' });
    expect(parseCommandLine('x')).toEqual({ type: 'unknown', word: 'x' });
  });

  it('should take the first word as the argument', () => {
    expect(parseCommandLine('n 5')).toEqual({ type: 'command', command: command('next'), arg: '5' });
    expect(parseCommandLine('print 3 4')).toEqual({ type: 'command', command: command('print'), arg: '3' });
  });

  it('should keep the rest of the line for input', () => {
    expect(parseCommandLine('input hello world  ')).toEqual({
      type: 'command',
      command: command('input'),
      arg: 'hello world',
    });
  });
});

describe('parseInteger', () => {
  it('should parse signed decimal integers', () => {
    expect(parseInteger('12')).toBe(12);
    expect(parseInteger('-3')).toBe(-3);
    expect(parseInteger('+4')).toBe(4);
  });

  it('should reject anything else', () => {
    expect(parseInteger('1.5')).toBeNull();
    expect(parseInteger('abc')).toBeNull();
    expect(parseInteger('3x')).toBeNull();
    expect(parseInteger('')).toBeNull();
  });
});

describe('formatHelp', () => {
  it('should list every command with its abbreviation', () => {
    const lines = formatHelp().split('\n');

    expect(lines.slice(0, 5)).toEqual([
      'List of commands:',
      '',
      '(h)elp -- Print this help.',
      '(q)uit -- Exit debugger.',
      '(f)ile <filename> -- Use file.',
    ]);
    expect(lines).toContain('(n)ext [count = 1] -- Step instructions.');
    expect(lines).toHaveLength(COMMANDS.length + 2);
  });
});
