import type { SourceLocation } from '../errors.ts';

export enum Operator {
  End = 0,
  IncPtr = 1,
  DecPtr = 2,
  IncCell = 3,
  DecCell = 4,
  Output = 5,
  Input = 6,
  JumpIfZero = 7,
  JumpIfNonZero = 8,
}

export interface Instruction {
  operator: Operator;
  operand: number; // matching bracket index, jumps only
  location: SourceLocation;
}

export interface Program {
  instructions: readonly Instruction[];
  count: number; // includes the trailing End
  capacity: number;
}

export interface CompileOptions {
  programSize?: number;
  stackSize?: number;
}

export const DEFAULT_PROGRAM_SIZE = 4096;
export const DEFAULT_STACK_SIZE = 512;

export const operatorInfo: Record<Operator, { symbol: string; name: string }> = {
  [Operator.End]: { symbol: 'EOF', name: 'End' },
  [Operator.IncPtr]: { symbol: '>', name: 'IncPtr' },
  [Operator.DecPtr]: { symbol: '<', name: 'DecPtr' },
  [Operator.IncCell]: { symbol: '+', name: 'IncCell' },
  [Operator.DecCell]: { symbol: '-', name: 'DecCell' },
  [Operator.Output]: { symbol: '.', name: 'Output' },
  [Operator.Input]: { symbol: ',', name: 'Input' },
  [Operator.JumpIfZero]: { symbol: '[', name: 'JumpIfZero' },
  [Operator.JumpIfNonZero]: { symbol: ']', name: 'JumpIfNonZero' },
};

// Characters that map to a single instruction without an operand
export const simpleOperators: ReadonlyMap<string, Operator> = new Map([
  ['>', Operator.IncPtr],
  ['<', Operator.DecPtr],
  ['+', Operator.IncCell],
  ['-', Operator.DecCell],
  ['.', Operator.Output],
  [',', Operator.Input],
]);
