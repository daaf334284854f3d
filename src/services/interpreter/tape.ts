export type Tape = Uint8Array | Uint16Array | Uint32Array;

export const DEFAULT_TAPE_SIZE = 65535;
export const DEFAULT_CELL_SIZE = 65536; // 16-bit cells

// Cell size (number of values) to the typed array that holds it
const tapeFactories = new Map<number, (tapeSize: number) => Tape>([
    [256, tapeSize => new Uint8Array(tapeSize)],
    [65536, tapeSize => new Uint16Array(tapeSize)],
    [4294967296, tapeSize => new Uint32Array(tapeSize)],
]);

export const SUPPORTED_CELL_SIZES: readonly number[] = [...tapeFactories.keys()];

// Typed arrays start zeroed
export const createTape = (cellSize: number, tapeSize: number): Tape => {
    const factory = tapeFactories.get(cellSize);
    if (!factory) {
        throw new Error(`Unsupported cell size: ${cellSize}`);
    }
    return factory(tapeSize);
}

// Number of distinct values a cell holds, e.g. 65536 for a Uint16Array
export const cellModulus = (tape: Tape): number => 2 ** (tape.BYTES_PER_ELEMENT * 8);

export const isPrintable = (value: number): boolean => value >= 0x20 && value <= 0x7e;
