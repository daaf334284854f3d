export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const fail = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export interface SourceLocation {
  line: number; // 1-based
  column: number; // 1-based
}

export interface CompileError {
  type: 'unmatched_open' | 'unmatched_close' | 'too_many_opens' | 'program_too_large';
  message: string;
  location: SourceLocation;
}

export interface RuntimeError {
  type: 'pointer_overflow' | 'pointer_underflow';
  message: string;
  pc: number; // 0-based index of the offending instruction
  symbol: string;
  pointer: number;
  cell: number;
}

export interface UserError {
  type:
    | 'invalid_count'
    | 'invalid_index'
    | 'missing_argument'
    | 'not_running'
    | 'no_program_loaded';
  message: string;
}

export const userError = (type: UserError['type'], message: string): UserError => ({
  type,
  message,
});

export const notRunning = () => userError('not_running', 'The program is not being run.');

export const noProgramLoaded = () => userError('no_program_loaded', "No program loaded, use 'file'.");
