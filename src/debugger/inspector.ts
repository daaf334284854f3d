import {operatorInfo, type Operator} from "../services/compiler/types.ts";
import {fail, ok, type Result, type UserError, userError} from "../services/errors.ts";
import type {Runtime} from "../services/interpreter/stepper.ts";
import {isPrintable} from "../services/interpreter/tape.ts";
import type {DebuggerSession} from "./debugger-session.store.ts";

export type CellReport = {
    index: number;
    value: number;
    char?: string; // set for printable values
}

export type TapeWindowCell = CellReport & {
    current: boolean;
}

export type InstructionReport = {
    index: number; // 1-based
    operator: Operator;
    symbol: string;
}

const cellReport = (runtime: Runtime, index: number): CellReport => {
    const value = runtime.tape[index];
    return isPrintable(value)
        ? {index, value, char: String.fromCharCode(value)}
        : {index, value};
}

// Read-only queries against a running session
export class Inspector {
    constructor(private session: DebuggerSession) {
    }

    public dataPointer(): Result<number, UserError> {
        const running = this.session.execution();
        return running.ok ? ok(running.value.runtime.pointer) : running;
    }

    public cell(index?: number): Result<CellReport, UserError> {
        const running = this.session.execution();
        if (!running.ok) {
            return running;
        }

        const {runtime} = running.value;
        const target = index ?? runtime.pointer;
        if (!Number.isInteger(target) || target < 0 || target >= runtime.tape.length) {
            return fail(userError('invalid_index', `${target}: Not in range [0..${runtime.tape.length}).`));
        }
        return ok(cellReport(runtime, target));
    }

    /**
     * Cells within `radius` of the pointer. Positions past either end of the
     * tape are left out, so the window shrinks at the edges.
     */
    public tapeWindow(radius?: number): Result<TapeWindowCell[], UserError> {
        const running = this.session.execution();
        if (!running.ok) {
            return running;
        }

        const {runtime} = running.value;
        const span = radius ?? this.session.settings.getValue().inspector.windowRadius;
        const first = Math.max(0, runtime.pointer - span);
        const last = Math.min(runtime.tape.length - 1, runtime.pointer + span);

        const cells: TapeWindowCell[] = [];
        for (let index = first; index <= last; index++) {
            cells.push({...cellReport(runtime, index), current: index === runtime.pointer});
        }
        return ok(cells);
    }

    public currentInstruction(): Result<InstructionReport, UserError> {
        const running = this.session.execution();
        if (!running.ok) {
            return running;
        }

        const {runtime, program} = running.value;
        const {operator} = program.instructions[runtime.pc];
        return ok({
            index: runtime.pc + 1,
            operator,
            symbol: operatorInfo[operator].symbol
        });
    }
}
