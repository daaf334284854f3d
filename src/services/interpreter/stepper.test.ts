import { describe, it, expect } from 'vitest';
import { compile } from '../compiler/compiler.ts';
import type { Program } from '../compiler/types.ts';
import { createRuntime, runSteps, step, type MachineIO } from './stepper.ts';

const program = (source: string): Program => {
    const result = compile(source);
    if (!result.ok) {
        throw new Error(result.error.message);
    }
    return result.value;
};

class FakeIO implements MachineIO {
    public written: number[] = [];

    constructor(private pending: number[] = []) {
    }

    output(byte: number) {
        this.written.push(byte);
    }

    input(): number | null {
        return this.pending.shift() ?? null;
    }
}

describe('step', () => {
    it('should output the current cell', () => {
        const io = new FakeIO();
        const runtime = createRuntime(256, 16);
        const outcome = runSteps(runtime, program('+++.'), io, 10);

        expect(outcome).toEqual({ kind: 'terminated', reason: 'normal' });
        expect(io.written).toEqual([3]);
        expect(runtime.running).toBe(false);
        expect(runtime.pc).toBe(4);
    });

    it('should wrap cells at the cell size', () => {
        const runtime = createRuntime(256, 16);
        runSteps(runtime, program('-'), new FakeIO(), 1);
        expect(runtime.tape[0]).toBe(255);

        const wide = createRuntime(65536, 16);
        wide.tape[0] = 65535;
        runSteps(wide, program('+'), new FakeIO(), 1);
        expect(wide.tape[0]).toBe(0);
    });

    it('should output only the low byte of wide cells', () => {
        const io = new FakeIO();
        const runtime = createRuntime(65536, 16);
        runtime.tape[0] = 0x141;
        runSteps(runtime, program('.'), io, 1);

        expect(io.written).toEqual([0x41]);
    });

    it('should read input into the current cell', () => {
        const runtime = createRuntime(256, 16);
        runSteps(runtime, program(','), new FakeIO([65]), 1);

        expect(runtime.tape[0]).toBe(65);
        expect(runtime.pc).toBe(1);
    });

    it('should store the EOF value when input runs out', () => {
        const runtime = createRuntime(256, 16);
        runtime.tape[0] = 7;
        runSteps(runtime, program(','), new FakeIO(), 1);
        expect(runtime.tape[0]).toBe(0);

        const negative = createRuntime(65536, 16);
        runSteps(negative, program(','), new FakeIO(), 1, { eofValue: -1 });
        expect(negative.tape[0]).toBe(65535);
    });

    it('should skip a loop whose cell is zero', () => {
        const runtime = createRuntime(256, 16);
        const outcome = step(runtime, program('[+]').instructions[0], new FakeIO());

        expect(outcome).toEqual({ kind: 'continue' });
        expect(runtime.pc).toBe(3);
    });

    it('should jump back past the opening bracket', () => {
        const runtime = createRuntime(256, 16);
        const instructions = program('+[-]').instructions;
        runtime.tape[0] = 2;
        runtime.pc = 3;
        step(runtime, instructions[3], new FakeIO());

        expect(runtime.pc).toBe(2);
    });

    it('should stop at the end of the tape', () => {
        const runtime = createRuntime(256, 2);
        const outcome = runSteps(runtime, program('>>'), new FakeIO(), 5);

        expect(outcome).toEqual({
            kind: 'terminated',
            reason: 'error',
            error: {
                type: 'pointer_overflow',
                message: 'trying to increment the data pointer out of range (2)',
                pc: 1,
                symbol: '>',
                pointer: 1,
                cell: 0,
            },
        });
        expect(runtime.running).toBe(false);
        expect(runtime.pc).toBe(1);
    });

    it('should stop below the start of the tape', () => {
        const runtime = createRuntime(256, 4);
        runtime.tape[0] = 9;
        const outcome = runSteps(runtime, program('<'), new FakeIO(), 1);

        expect(outcome).toEqual({
            kind: 'terminated',
            reason: 'error',
            error: {
                type: 'pointer_underflow',
                message: 'trying to decrement the data pointer below 0',
                pc: 0,
                symbol: '<',
                pointer: 0,
                cell: 9,
            },
        });
    });
});

describe('runSteps', () => {
    it('should do nothing for a count of zero', () => {
        const runtime = createRuntime(256, 4);
        const outcome = runSteps(runtime, program('+'), new FakeIO(), 0);

        expect(outcome).toEqual({ kind: 'continue' });
        expect(runtime.pc).toBe(0);
        expect(runtime.tape[0]).toBe(0);
    });

    it('should stop after the requested number of steps', () => {
        const runtime = createRuntime(256, 4);
        const outcome = runSteps(runtime, program('+++'), new FakeIO(), 2);

        expect(outcome).toEqual({ kind: 'continue' });
        expect(runtime.pc).toBe(2);
        expect(runtime.tape[0]).toBe(2);
    });
});
