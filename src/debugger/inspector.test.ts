import {describe, it, expect} from 'vitest';
import {Operator} from '../services/compiler/types.ts';
import {ProgramIOStore} from '../stores/program-io.store.ts';
import {MemoryStorage, SettingsStore} from '../stores/settings.store.ts';
import {DebuggerSession} from './debugger-session.store.ts';
import {Inspector} from './inspector.ts';

const running = (source: string, steps: number) => {
    const settings = new SettingsStore(new MemoryStorage({
        interpreterTapeSize: 8,
        interpreterCellSize: 256
    })).settings;
    const session = new DebuggerSession(new ProgramIOStore(), settings);
    session.load(source);
    session.run();
    session.next(steps);
    return {session, inspector: new Inspector(session)};
}

describe('Inspector', () => {
    it('should need a running program', () => {
        const inspector = new Inspector(new DebuggerSession(new ProgramIOStore()));
        const notRunning = {ok: false, error: {type: 'not_running', message: 'The program is not being run.'}};

        expect(inspector.dataPointer()).toEqual(notRunning);
        expect(inspector.cell()).toEqual(notRunning);
        expect(inspector.tapeWindow()).toEqual(notRunning);
        expect(inspector.currentInstruction()).toEqual(notRunning);
    });

    describe('Cells', () => {
        it('should report the data pointer', () => {
            const {inspector} = running('>+', 2);
            expect(inspector.dataPointer()).toEqual({ok: true, value: 1});
        });

        it('should default to the cell under the pointer', () => {
            const {inspector} = running('>+', 2);

            expect(inspector.cell()).toEqual({ok: true, value: {index: 1, value: 1}});
            expect(inspector.cell(0)).toEqual({ok: true, value: {index: 0, value: 0}});
        });

        it('should include the character of printable values', () => {
            const {session, inspector} = running('>', 1);
            const runtime = session.state.getValue().runtime;
            if (!runtime) {
                throw new Error('expected a runtime');
            }
            runtime.tape[1] = 65;

            expect(inspector.cell()).toEqual({ok: true, value: {index: 1, value: 65, char: 'A'}});
        });

        it('should reject indices off the tape', () => {
            const {inspector} = running('+', 0);

            expect(inspector.cell(8)).toEqual({
                ok: false,
                error: {type: 'invalid_index', message: '8: Not in range [0..8).'}
            });
            expect(inspector.cell(-1).ok).toBe(false);
        });
    });

    describe('Tape window', () => {
        it('should show the cells around the pointer', () => {
            const {inspector} = running('>+', 2);
            const result = inspector.tapeWindow(2);
            if (!result.ok) {
                throw new Error(result.error.message);
            }

            expect(result.value.map(cell => cell.index)).toEqual([0, 1, 2, 3]);
            expect(result.value[1]).toEqual({index: 1, value: 1, current: true});
            expect(result.value.filter(cell => cell.current)).toHaveLength(1);
        });

        it('should use the configured radius', () => {
            const {inspector} = running('>', 1);
            const result = inspector.tapeWindow();

            expect(result.ok && result.value.map(cell => cell.index)).toEqual([0, 1, 2, 3, 4, 5]);
        });

        it('should stop at the end of the tape', () => {
            const {inspector} = running('>>>>>>>', 7);
            const result = inspector.tapeWindow(2);

            expect(result.ok && result.value.map(cell => cell.index)).toEqual([5, 6, 7]);
        });
    });

    describe('Current instruction', () => {
        it('should report the instruction about to run', () => {
            const {inspector} = running('+[-]', 0);

            expect(inspector.currentInstruction()).toEqual({
                ok: true,
                value: {index: 1, operator: Operator.IncCell, symbol: '+'}
            });
        });

        it('should report the end of the program', () => {
            const {session, inspector} = running('+[-]', 0);
            session.jump(5);

            expect(inspector.currentInstruction()).toEqual({
                ok: true,
                value: {index: 5, operator: Operator.End, symbol: 'EOF'}
            });
        });
    });
});
