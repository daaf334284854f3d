// Debugger session: load -> run -> next/jump/continue -> halt

import {BehaviorSubject, Subject} from "rxjs";
import {compile} from "../services/compiler/compiler.ts";
import type {Program} from "../services/compiler/types.ts";
import {
    fail,
    noProgramLoaded,
    notRunning,
    ok,
    type CompileError,
    type Result,
    type RuntimeError,
    type UserError,
    userError
} from "../services/errors.ts";
import {createRuntime, runSteps, step, type MachineIO, type Runtime, type StepOptions, type StepOutcome} from "../services/interpreter/stepper.ts";
import {logService} from "../services/log.service.ts";
import {MemoryStorage, SettingsStore, type Settings} from "../stores/settings.store.ts";

export type SessionStatus = 'unloaded' | 'loaded' | 'running' | 'halted';

export type SessionState = {
    status: SessionStatus;
    program: Program | null;
    runtime: Runtime | null;
    sourceName?: string;

    // Set while halted
    haltReason?: 'normal' | 'error';
    runtimeError?: RuntimeError;
}

export type SessionEvent =
    | { type: 'loaded'; program: Program; sourceName?: string }
    | { type: 'loadFailed'; error: CompileError; sourceName?: string }
    | { type: 'started'; runtime: Runtime }
    | { type: 'halted'; reason: 'normal' }
    | { type: 'halted'; reason: 'error'; error: RuntimeError };

// 'paused' only comes out of continue() when the configured step limit is hit
export type ExecutionOutcome = StepOutcome | { kind: 'paused'; steps: number };

export type Execution = { runtime: Runtime; program: Program };

export class DebuggerSession {
    public state = new BehaviorSubject<SessionState>({
        status: 'unloaded',
        program: null,
        runtime: null
    });

    public events = new Subject<SessionEvent>();

    constructor(
        private io: MachineIO,
        public readonly settings: BehaviorSubject<Settings> = new SettingsStore(new MemoryStorage()).settings
    ) {
    }

    /**
     * Compiles `source` and makes it the current program. Any runtime is
     * dropped first, so a failed compile leaves the session unloaded.
     */
    public load(source: string, sourceName?: string): Result<Program, CompileError> {
        this.stopRuntime();
        this.state.next({status: 'unloaded', program: null, runtime: null, sourceName});

        const result = compile(source, this.settings.getValue().compiler);
        if (!result.ok) {
            logService.debug(`Compilation of ${sourceName ?? 'source'} failed: ${result.error.type}`);
            this.events.next({type: 'loadFailed', error: result.error, sourceName});
            return result;
        }

        const program = result.value;
        logService.debug(`Compiled ${sourceName ?? 'source'}: ${program.count} instructions`);
        this.state.next({status: 'loaded', program, runtime: null, sourceName});
        this.events.next({type: 'loaded', program, sourceName});
        return result;
    }

    // Stops the current run but keeps the program
    public discardRuntime() {
        this.stopRuntime();
        const {program, sourceName} = this.state.getValue();
        this.state.next({
            status: program ? 'loaded' : 'unloaded',
            program,
            runtime: null,
            sourceName
        });
    }

    public run(): Result<Runtime, UserError> {
        const current = this.state.getValue();
        if (!current.program) {
            return fail(noProgramLoaded());
        }

        this.stopRuntime();
        const {cellSize, tapeSize} = this.settings.getValue().interpreter;
        const runtime = createRuntime(cellSize, tapeSize);
        logService.debug(`Starting run with ${tapeSize} cells of ${cellSize} values`);

        this.state.next({
            status: 'running',
            program: current.program,
            runtime,
            sourceName: current.sourceName
        });
        this.events.next({type: 'started', runtime});
        return ok(runtime);
    }

    public next(count: number = 1): Result<ExecutionOutcome, UserError> {
        const execution = this.execution();
        if (!execution.ok) {
            return execution;
        }
        if (!Number.isInteger(count) || count < 0) {
            return fail(userError('invalid_count', `${count}: Not a valid instruction count.`));
        }

        const {runtime, program} = execution.value;
        const outcome = runSteps(runtime, program, this.io, count, this.stepOptions());

        this.settle(outcome);
        return ok(outcome);
    }

    /**
     * Steps until the program halts. With `debugger.continueStepLimit` set,
     * gives control back after that many instructions with the run intact.
     */
    public continue(): Result<ExecutionOutcome, UserError> {
        const execution = this.execution();
        if (!execution.ok) {
            return execution;
        }

        const {runtime, program} = execution.value;
        const limit = this.settings.getValue().debugger.continueStepLimit;
        let outcome: StepOutcome = {kind: 'continue'};
        let steps = 0;

        while (outcome.kind === 'continue') {
            if (limit > 0 && steps === limit) {
                logService.debug(`continue paused after ${steps} instructions`);
                this.settle(outcome);
                const paused: ExecutionOutcome = {kind: 'paused', steps};
                return ok(paused);
            }
            outcome = this.stepOnce(runtime, program);
            steps++;
        }

        this.settle(outcome);
        return ok(outcome);
    }

    // `index` is 1-based, as printed in the prompt
    public jump(index: number): Result<number, UserError> {
        const execution = this.execution();
        if (!execution.ok) {
            return execution;
        }

        const {runtime, program} = execution.value;
        if (!Number.isInteger(index) || index < 1 || index > program.count) {
            return fail(userError(
                'invalid_index',
                `${index}: Not in range of program's instructions [1..${program.count}]`
            ));
        }

        runtime.pc = index - 1;
        this.state.next({...this.state.getValue()});
        return ok(runtime.pc);
    }

    // A dropped runtime may still be held by whoever received it from run()
    private stopRuntime() {
        const {runtime} = this.state.getValue();
        if (runtime) {
            runtime.running = false;
        }
    }

    private stepOnce(runtime: Runtime, program: Program): StepOutcome {
        return step(runtime, program.instructions[runtime.pc], this.io, this.stepOptions());
    }

    private stepOptions(): StepOptions {
        return {eofValue: this.settings.getValue().interpreter.eofValue};
    }

    // The live runtime and its program, only while running
    public execution(): Result<Execution, UserError> {
        const {status, runtime, program} = this.state.getValue();
        if (status !== 'running' || !runtime || !program) {
            return fail(notRunning());
        }
        return ok({runtime, program});
    }

    private settle(outcome: StepOutcome) {
        const current = this.state.getValue();
        if (outcome.kind === 'continue') {
            this.state.next({...current});
            return;
        }

        if (outcome.reason === 'normal') {
            logService.debug('Program halted normally');
            this.state.next({...current, status: 'halted', haltReason: 'normal'});
            this.events.next({type: 'halted', reason: 'normal'});
        } else {
            logService.debug(`Program halted with ${outcome.error.type}`);
            this.state.next({...current, status: 'halted', haltReason: 'error', runtimeError: outcome.error});
            this.events.next({type: 'halted', reason: 'error', error: outcome.error});
        }
    }
}
