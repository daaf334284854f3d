import type { RuntimeError } from '../errors.ts';
import { Operator, operatorInfo, type Instruction, type Program } from '../compiler/types.ts';
import { cellModulus, createTape, type Tape } from './tape.ts';

export interface Runtime {
    running: boolean;
    pc: number;
    pointer: number;
    tape: Tape;
}

// Byte-oriented I/O port used by '.' and ','
export interface MachineIO {
    output(byte: number): void;
    // null signals end of input
    input(): number | null;
}

export type StepOutcome =
    | { kind: 'continue' }
    | { kind: 'terminated'; reason: 'normal' }
    | { kind: 'terminated'; reason: 'error'; error: RuntimeError };

export interface StepOptions {
    // Written to the cell when ',' hits end of input; negative values count down from the cell maximum
    eofValue?: number;
}

export const DEFAULT_EOF_VALUE = 0;

export const createRuntime = (cellSize: number, tapeSize: number): Runtime => ({
    running: true,
    pc: 0,
    pointer: 0,
    tape: createTape(cellSize, tapeSize),
});

const CONTINUE: StepOutcome = { kind: 'continue' };

const halt = (
    runtime: Runtime,
    instruction: Instruction,
    type: RuntimeError['type'],
    message: string,
): StepOutcome => {
    runtime.running = false;
    return {
        kind: 'terminated',
        reason: 'error',
        error: {
            type,
            message,
            pc: runtime.pc,
            symbol: operatorInfo[instruction.operator].symbol,
            pointer: runtime.pointer,
            cell: runtime.tape[runtime.pointer],
        },
    };
}

/**
 * Executes a single instruction against the runtime.
 *
 * A failing instruction leaves pc and pointer where they were so the
 * diagnostic points at the offending instruction. Taken jumps land on the
 * matching bracket and the regular increment moves past it.
 */
export function step(
    runtime: Runtime,
    instruction: Instruction,
    io: MachineIO,
    options: StepOptions = {},
): StepOutcome {
    const { tape } = runtime;
    const modulus = cellModulus(tape);

    switch (instruction.operator) {
        case Operator.End:
            runtime.running = false;
            return { kind: 'terminated', reason: 'normal' };
        case Operator.IncPtr:
            if (runtime.pointer + 1 >= tape.length) {
                return halt(
                    runtime,
                    instruction,
                    'pointer_overflow',
                    `trying to increment the data pointer out of range (${tape.length})`,
                );
            }
            runtime.pointer++;
            break;
        case Operator.DecPtr:
            if (runtime.pointer === 0) {
                return halt(runtime, instruction, 'pointer_underflow', 'trying to decrement the data pointer below 0');
            }
            runtime.pointer--;
            break;
        case Operator.IncCell:
            tape[runtime.pointer] = (tape[runtime.pointer] + 1) % modulus;
            break;
        case Operator.DecCell:
            tape[runtime.pointer] = (tape[runtime.pointer] - 1 + modulus) % modulus;
            break;
        case Operator.Output:
            io.output(tape[runtime.pointer] & 0xff);
            break;
        case Operator.Input: {
            const byte = io.input();
            const eofValue = options.eofValue ?? DEFAULT_EOF_VALUE;
            tape[runtime.pointer] = byte ?? ((eofValue % modulus) + modulus) % modulus;
            break;
        }
        case Operator.JumpIfZero:
            if (tape[runtime.pointer] === 0) {
                runtime.pc = instruction.operand;
            }
            break;
        case Operator.JumpIfNonZero:
            if (tape[runtime.pointer] !== 0) {
                runtime.pc = instruction.operand;
            }
            break;
    }

    runtime.pc++;
    return CONTINUE;
}

/**
 * Steps up to `count` instructions, stopping at the first termination.
 * Returns the last outcome, `continue` when all steps ran (or count is 0).
 */
export function runSteps(
    runtime: Runtime,
    program: Program,
    io: MachineIO,
    count: number,
    options: StepOptions = {},
): StepOutcome {
    let outcome: StepOutcome = CONTINUE;
    for (let i = 0; i < count; i++) {
        outcome = step(runtime, program.instructions[runtime.pc], io, options);
        if (outcome.kind === 'terminated') {
            break;
        }
    }
    return outcome;
}
