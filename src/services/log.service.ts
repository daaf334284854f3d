import { Subject } from 'rxjs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
}

class LogService {
  public entries = new Subject<LogEntry>();

  debug(message: string) {
    this.log('debug', message);
  }

  info(message: string) {
    this.log('info', message);
  }

  warn(message: string) {
    this.log('warn', message);
  }

  error(message: string) {
    this.log('error', message);
  }

  private log(level: LogLevel, message: string) {
    this.entries.next({ level, message, timestamp: Date.now() });
  }
}

export type { LogService };

export const logService = new LogService();
