import { readFileSync } from 'node:fs';
import { BehaviorSubject } from 'rxjs';
import { DEFAULT_PROGRAM_SIZE, DEFAULT_STACK_SIZE } from '../services/compiler/types.ts';
import { DEFAULT_EOF_VALUE } from '../services/interpreter/stepper.ts';
import { DEFAULT_CELL_SIZE, DEFAULT_TAPE_SIZE, SUPPORTED_CELL_SIZES } from '../services/interpreter/tape.ts';
import { logService } from '../services/log.service.ts';

export interface InterpreterSettings {
  tapeSize: number;
  cellSize: number;
  eofValue: number;
}

export interface CompilerSettings {
  programSize: number;
  stackSize: number;
}

export interface InspectorSettings {
  windowRadius: number;
}

export interface DebuggerSettings {
  continueStepLimit: number; // 0 = unlimited
}

export interface DevelopmentSettings {
  verbose: boolean;
}

export interface Settings {
  interpreter: InterpreterSettings;
  compiler: CompilerSettings;
  inspector: InspectorSettings;
  debugger: DebuggerSettings;
  development: DevelopmentSettings;
}

// Same shape as the part of the Web Storage API the store reads
export interface SettingsStorage {
  getItem(key: string): string | null;
}

export class MemoryStorage implements SettingsStorage {
  private items: Map<string, string>;

  constructor(values: Record<string, unknown> = {}) {
    this.items = new Map(
      Object.entries(values).map(([key, value]) => [key, JSON.stringify(value)]),
    );
  }

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }
}

/**
 * Reads settings from a flat JSON object, e.g. `{ "interpreterTapeSize": 30000 }`.
 * A missing file yields an empty storage.
 */
export class JsonFileStorage implements SettingsStorage {
  private values: Record<string, unknown> = {};

  constructor(public readonly path: string) {
    let text: string;
    try {
      text = readFileSync(path, 'utf8');
    } catch {
      logService.debug(`No settings file at ${path}, using defaults`);
      return;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
        this.values = Object.fromEntries(Object.entries(parsed));
      } else {
        logService.warn(`Ignoring ${path}: expected a JSON object`);
      }
    } catch (e) {
      logService.warn(`Ignoring ${path}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  getItem(key: string): string | null {
    return key in this.values ? JSON.stringify(this.values[key]) : null;
  }
}

export const DEFAULT_SETTINGS_FILE = '.tapedbrc.json';

const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;
const isNonNegativeInteger = (value: number) => Number.isInteger(value) && value >= 0;

export class SettingsStore {
  public settings: BehaviorSubject<Settings>;

  constructor(private storage: SettingsStorage) {
    this.settings = new BehaviorSubject<Settings>(this.load());
  }

  reload(storage: SettingsStorage = this.storage) {
    this.storage = storage;
    this.settings.next(this.load());
  }

  private load(): Settings {
    return {
      interpreter: {
        // The pointer may never reach tapeSize, so one cell is the minimum
        tapeSize: this.loadNumber('interpreterTapeSize', DEFAULT_TAPE_SIZE, isPositiveInteger),
        cellSize: this.loadNumber('interpreterCellSize', DEFAULT_CELL_SIZE, (size) =>
          SUPPORTED_CELL_SIZES.includes(size),
        ),
        eofValue: this.loadNumber('interpreterEofValue', DEFAULT_EOF_VALUE, Number.isInteger),
      },
      compiler: {
        // At least one slot for the trailing End
        programSize: this.loadNumber('compilerProgramSize', DEFAULT_PROGRAM_SIZE, isPositiveInteger),
        stackSize: this.loadNumber('compilerStackSize', DEFAULT_STACK_SIZE, isNonNegativeInteger),
      },
      inspector: {
        windowRadius: this.loadNumber('inspectorWindowRadius', 4, isNonNegativeInteger),
      },
      debugger: {
        continueStepLimit: this.loadNumber('debuggerContinueStepLimit', 0, isNonNegativeInteger),
      },
      development: {
        verbose: this.loadFromStorage('developmentVerbose', false) === true,
      },
    };
  }

  private loadNumber(key: string, defaultValue: number, isValid: (value: number) => boolean): number {
    const value = this.loadFromStorage(key, defaultValue);
    if (typeof value === 'number' && isValid(value)) {
      return value;
    }
    logService.warn(`Invalid value for ${key}: ${JSON.stringify(value)}, using ${defaultValue}`);
    return defaultValue;
  }

  private loadFromStorage(key: string, defaultValue: unknown): unknown {
    const stored = this.storage.getItem(key);
    if (stored === null) {
      return defaultValue;
    }
    try {
      const parsed: unknown = JSON.parse(stored);
      return parsed;
    } catch {
      logService.warn(`Unreadable value for ${key}, using ${JSON.stringify(defaultValue)}`);
      return defaultValue;
    }
  }
}
