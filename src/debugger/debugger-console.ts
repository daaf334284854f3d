import {readFile} from "node:fs/promises";
import type {Subscription} from "rxjs";
import {
    formatHelp,
    parseCommandLine,
    parseInteger,
    type CommandDefinition
} from "../services/command-parser.service.ts";
import {userError, type RuntimeError, type UserError} from "../services/errors.ts";
import {logService} from "../services/log.service.ts";
import type {ProgramIOStore} from "../stores/program-io.store.ts";
import type {DebuggerSession, SessionEvent} from "./debugger-session.store.ts";
import {Inspector, type CellReport} from "./inspector.ts";

export const PROMPT = '(tapedb) ';

export interface ConsoleWriter {
    write(text: string): void;
    error(text: string): void;
    // Program output, one raw byte
    writeByte(byte: number): void;
}

export type SourceReader = (path: string) => Promise<string>;

const readSourceFile: SourceReader = (path) => readFile(path, 'utf8');

const formatCell = (cell: CellReport) =>
    cell.char !== undefined
        ? `$[${cell.index}]: ${cell.value} ('${cell.char}').`
        : `$[${cell.index}]: ${cell.value}.`;

const isMissingFile = (e: unknown) =>
    e instanceof Error && 'code' in e && e.code === 'ENOENT';

/**
 * Text front end of a debugger session: runs one command line at a time
 * and writes the results. Program output goes to the same writer as it
 * is produced.
 */
export class DebuggerConsole {
    private inspector: Inspector;
    private subscriptions: Subscription[] = [];

    // Program output written without a trailing newline yet
    private outputLineOpen = false;

    constructor(
        private session: DebuggerSession,
        private io: ProgramIOStore,
        private writer: ConsoleWriter,
        private readSource: SourceReader = readSourceFile
    ) {
        this.inspector = new Inspector(session);
        this.subscriptions.push(
            session.events.subscribe(event => this.handleEvent(event)),
            io.bytes.subscribe(byte => this.writeProgramByte(byte))
        );
    }

    // `@<index>: <symbol>` for the instruction about to run, null when not running
    public statusLine(): string | null {
        const current = this.inspector.currentInstruction();
        this.closeOutputLine();
        return current.ok ? `@${current.value.index}: ${current.value.symbol}` : null;
    }

    /**
     * Executes one command line. Resolves to false once the user quits.
     */
    public async execute(line: string): Promise<boolean> {
        const parsed = parseCommandLine(line);
        if (parsed.type === 'empty') {
            return true;
        }
        if (parsed.type === 'unknown') {
            this.println(`Unknown command '${parsed.word}', type 'help'.`);
            return true;
        }

        try {
            return await this.dispatch(parsed.command, parsed.arg);
        } catch (e) {
            logService.error(`'${parsed.command.name}' failed: ${e instanceof Error ? e.message : String(e)}`);
            return true;
        }
    }

    public async loadFile(path: string) {
        this.println(`Reading ${path}...`);

        let source: string;
        try {
            source = await this.readSource(path);
        } catch (e) {
            this.session.discardRuntime();
            this.eprintln(isMissingFile(e)
                ? `${path}: No such file or directory.`
                : `${path}: ${e instanceof Error ? e.message : String(e)}`);
            return;
        }

        const result = this.session.load(source, path);
        if (!result.ok) {
            this.println(`Could not read from ${path}.`);
        }
    }

    public dispose() {
        this.subscriptions.forEach(subscription => subscription.unsubscribe());
        this.subscriptions = [];
    }

    private async dispatch(command: CommandDefinition, arg: string | undefined): Promise<boolean> {
        switch (command.name) {
            case 'help':
                this.println(formatHelp());
                break;
            case 'quit':
                return false;
            case 'file':
                if (arg === undefined) {
                    this.report(this.missingArgument(command));
                } else {
                    await this.loadFile(arg);
                }
                break;
            case 'run': {
                const result = this.session.run();
                if (!result.ok) {
                    this.report(result.error);
                }
                break;
            }
            case 'next':
                this.next(arg);
                break;
            case 'jump':
                this.jump(command, arg);
                break;
            case 'continue': {
                const result = this.session.continue();
                if (!result.ok) {
                    this.report(result.error);
                } else if (result.value.kind === 'paused') {
                    this.println(`Paused after ${result.value.steps} instructions.`);
                }
                break;
            }
            case 'dataptr': {
                const result = this.inspector.dataPointer();
                this.println(result.ok ? `$ptr: ${result.value}` : result.error.message);
                break;
            }
            case 'print':
                this.print(arg);
                break;
            case 'tape':
                this.tape();
                break;
            case 'input':
                if (arg === undefined) {
                    this.report(this.missingArgument(command));
                } else {
                    const queued = this.io.queueInput(`${arg}\n`);
                    this.println(`Queued ${queued} bytes of input.`);
                }
                break;
        }
        return true;
    }

    private next(arg: string | undefined) {
        const count = arg === undefined ? 1 : parseInteger(arg);
        if (count === null) {
            this.report(userError('invalid_count', `${arg}: Not a valid instruction count.`));
            return;
        }

        const result = this.session.next(count);
        if (!result.ok) {
            this.report(result.error);
        }
    }

    private jump(command: CommandDefinition, arg: string | undefined) {
        const execution = this.session.execution();
        if (!execution.ok) {
            this.report(execution.error);
            return;
        }
        if (arg === undefined) {
            this.report(this.missingArgument(command));
            return;
        }

        const index = parseInteger(arg);
        if (index === null) {
            this.report(userError('invalid_index', `${arg}: Not a valid instruction index.`));
            return;
        }

        const result = this.session.jump(index);
        if (!result.ok) {
            this.report(result.error);
        }
    }

    private print(arg: string | undefined) {
        const index = arg === undefined ? undefined : parseInteger(arg);
        if (index === null) {
            this.report(userError('invalid_index', `${arg}: Not a valid cell index.`));
            return;
        }

        const result = this.inspector.cell(index);
        this.println(result.ok ? formatCell(result.value) : result.error.message);
    }

    private tape() {
        const result = this.inspector.tapeWindow();
        if (!result.ok) {
            this.report(result.error);
            return;
        }

        for (const cell of result.value) {
            this.println(`${cell.current ? '-> ' : '   '}${formatCell(cell)}`);
        }
    }

    private missingArgument(command: CommandDefinition): UserError {
        return userError(
            'missing_argument',
            `error: '${command.name}' takes exactly one ${command.argument ?? ''} argument.`
        );
    }

    private handleEvent(event: SessionEvent) {
        switch (event.type) {
            case 'started':
                this.io.clearOutput();
                break;
            case 'loadFailed': {
                const {message, location} = event.error;
                this.eprintln(`error: ${message} at ${location.line}:${location.column}.`);
                break;
            }
            case 'halted':
                if (event.reason === 'normal') {
                    this.println('Program exited normally.');
                } else {
                    this.reportRuntimeError(event.error);
                }
                break;
            case 'loaded':
                break;
        }
    }

    private reportRuntimeError(error: RuntimeError) {
        this.eprintln(`error: ${error.message}`);
        this.eprintln(`At instruction ${error.pc + 1} ('${error.symbol}'). $[$ptr: ${error.pointer}]: ${error.cell}.`);
        this.println('Program exited with error.');
    }

    private report(error: UserError) {
        this.println(error.message);
    }

    private writeProgramByte(byte: number) {
        this.writer.writeByte(byte);
        this.outputLineOpen = byte !== 0x0a;
    }

    private closeOutputLine() {
        if (this.outputLineOpen) {
            this.writer.write('\n');
            this.outputLineOpen = false;
        }
    }

    private println(text: string) {
        this.closeOutputLine();
        this.writer.write(`${text}\n`);
    }

    private eprintln(text: string) {
        this.closeOutputLine();
        this.writer.error(`${text}\n`);
    }
}
