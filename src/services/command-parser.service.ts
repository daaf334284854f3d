export type CommandName =
  | 'help'
  | 'quit'
  | 'file'
  | 'run'
  | 'next'
  | 'jump'
  | 'continue'
  | 'dataptr'
  | 'print'
  | 'tape'
  | 'input';

export interface CommandDefinition {
  name: CommandName;
  abbr: string;
  description: string;
  argument?: string;
  // Take everything after the command word, spaces included
  rawArgument?: boolean;
}

export const COMMANDS: readonly CommandDefinition[] = [
  { name: 'help', abbr: 'h', description: 'Print this help' },
  { name: 'quit', abbr: 'q', description: 'Exit debugger' },
  { name: 'file', abbr: 'f', description: 'Use file', argument: '<filename>' },
  { name: 'run', abbr: 'r', description: 'Start execution' },
  { name: 'next', abbr: 'n', description: 'Step instructions', argument: '[count = 1]' },
  { name: 'jump', abbr: 'j', description: 'Jumps to an instruction', argument: '<instr_index>' },
  { name: 'continue', abbr: 'c', description: 'Continue execution' },
  { name: 'dataptr', abbr: 'd', description: 'Prints the data pointer' },
  { name: 'print', abbr: 'p', description: 'Print cell', argument: '[index = $ptr]' },
  { name: 'tape', abbr: 't', description: 'Print the cells around the data pointer' },
  { name: 'input', abbr: 'i', description: 'Queue input for the program', argument: '<text>', rawArgument: true },
];

export type ParsedLine =
  | { type: 'empty' }
  | { type: 'unknown'; word: string }
  | { type: 'command'; command: CommandDefinition; arg?: string };

const commandsByWord = new Map<string, CommandDefinition>(
  COMMANDS.flatMap((command): Array<[string, CommandDefinition]> => [
    [command.name, command],
    [command.abbr, command],
  ]),
);

/**
 * Splits a command line into the command and its single argument.
 * Commands match by full name or by their one-letter abbreviation.
 */
export function parseCommandLine(line: string): ParsedLine {
  const match = /^\s*(\S+)(?:\s+(.*?))?\s*$/.exec(line);
  if (!match) {
    return { type: 'empty' };
  }

  const [, word, rest] = match;
  const command = commandsByWord.get(word);
  if (!command) {
    return { type: 'unknown', word };
  }

  if (rest === undefined || rest === '') {
    return { type: 'command', command };
  }
  return {
    type: 'command',
    command,
    arg: command.rawArgument ? rest : rest.split(/\s+/)[0],
  };
}

// Strict decimal integer, null for anything else
export function parseInteger(text: string): number | null {
  return /^[+-]?\d+$/.test(text) ? Number.parseInt(text, 10) : null;
}

export function formatHelp(): string {
  const lines = COMMANDS.map((command) => {
    // The abbreviation doubles as the first letter of the name
    const name = `(${command.abbr})${command.name.slice(1)}`;
    return command.argument
      ? `${name} ${command.argument} -- ${command.description}.`
      : `${name} -- ${command.description}.`;
  });
  return ['List of commands:', '', ...lines].join('\n');
}
