import { BehaviorSubject, Subject } from "rxjs";
import type { MachineIO } from "../services/interpreter/stepper.ts";

export interface ProgramIOState {
    output: string;
    pendingInput: string;
}

const initialState: ProgramIOState = {
    output: "",
    pendingInput: ""
};

/**
 * Program-side I/O. Bytes written by '.' are appended to `output` and
 * published on `bytes`; ',' consumes `pendingInput` one character at a time.
 */
export class ProgramIOStore implements MachineIO {
    private state$ = new BehaviorSubject<ProgramIOState>(initialState);

    public bytes = new Subject<number>();

    get state() {
        return this.state$;
    }

    output(byte: number) {
        this.state$.next({
            ...this.state$.value,
            output: this.state$.value.output + String.fromCharCode(byte)
        });
        this.bytes.next(byte);
    }

    input(): number | null {
        const { pendingInput } = this.state$.value;
        if (pendingInput.length === 0) {
            return null;
        }

        this.state$.next({
            ...this.state$.value,
            pendingInput: pendingInput.slice(1)
        });
        return pendingInput.charCodeAt(0);
    }

    // Returns the number of bytes queued
    queueInput(text: string): number {
        // One char per UTF-8 byte
        const bytes = Buffer.from(text, "utf8").toString("latin1");
        this.state$.next({
            ...this.state$.value,
            pendingInput: this.state$.value.pendingInput + bytes
        });
        return bytes.length;
    }

    clearOutput() {
        this.state$.next({
            ...this.state$.value,
            output: ""
        });
    }
}
