import { fail, ok, type CompileError, type Result, type SourceLocation } from '../errors.ts';
import {
  DEFAULT_PROGRAM_SIZE,
  DEFAULT_STACK_SIZE,
  Operator,
  simpleOperators,
  type CompileOptions,
  type Instruction,
  type Program,
} from './types.ts';

export type CompileResult = Result<Program, CompileError>;

const compileError = (
  type: CompileError['type'],
  message: string,
  location: SourceLocation,
): CompileResult => fail({ type, message, location: { ...location } });

/**
 * Compiles brainfuck source into a program with resolved bracket pairs.
 *
 * Single pass: every `[` pushes its instruction index on a bounded stack,
 * every `]` pops it and links both brackets to each other. Characters that
 * are not operators are comments and take no instruction slot. The program
 * always ends with an `End` instruction, which needs a slot of its own.
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
  const programSize = options.programSize ?? DEFAULT_PROGRAM_SIZE;
  const stackSize = options.stackSize ?? DEFAULT_STACK_SIZE;

  const instructions: Instruction[] = [];
  const stack: number[] = [];
  let line = 1;
  let column = 0;

  for (const char of source) {
    if (char === '\n') {
      line++;
      column = 0;
      continue;
    }
    column++;

    const simple = simpleOperators.get(char);
    if (simple === undefined && char !== '[' && char !== ']') {
      continue;
    }

    const location = { line, column };
    if (instructions.length >= programSize - 1) {
      return compileError(
        'program_too_large',
        `program exceeds ${programSize - 1} instructions`,
        location,
      );
    }

    if (simple !== undefined) {
      instructions.push({ operator: simple, operand: 0, location });
      continue;
    }

    const pc = instructions.length;
    if (char === '[') {
      if (stack.length >= stackSize) {
        return compileError(
          'too_many_opens',
          `more than ${stackSize} nested '['`,
          location,
        );
      }
      // operand is patched by the matching ']'
      instructions.push({ operator: Operator.JumpIfZero, operand: 0, location });
      stack.push(pc);
    } else {
      const open = stack.pop();
      if (open === undefined) {
        return compileError('unmatched_close', "unmatched ']'", location);
      }
      instructions.push({ operator: Operator.JumpIfNonZero, operand: open, location });
      instructions[open].operand = pc;
    }
  }

  if (stack.length > 0) {
    const innermost = instructions[stack[stack.length - 1]];
    return compileError('unmatched_open', "unmatched '['", innermost.location);
  }

  instructions.push({
    operator: Operator.End,
    operand: 0,
    location: { line, column: column + 1 },
  });

  return ok({
    instructions,
    count: instructions.length,
    capacity: programSize,
  });
}
