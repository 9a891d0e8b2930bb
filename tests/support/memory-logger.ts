import type { LogFields, LogLevel, Logger } from '@/lib/bot/logger';

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  fields?: LogFields;
}

/** Logger that keeps every line in memory; children share the same buffer */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[];
  private scope: string;

  constructor(scope = 'test', entries: LogEntry[] = []) {
    this.scope = scope;
    this.entries = entries;
  }

  debug(message: string, fields?: LogFields): void {
    this.entries.push({ level: 'debug', scope: this.scope, message, fields });
  }

  info(message: string, fields?: LogFields): void {
    this.entries.push({ level: 'info', scope: this.scope, message, fields });
  }

  warn(message: string, fields?: LogFields): void {
    this.entries.push({ level: 'warn', scope: this.scope, message, fields });
  }

  error(message: string, fields?: LogFields): void {
    this.entries.push({ level: 'error', scope: this.scope, message, fields });
  }

  child(scope: string): Logger {
    return new MemoryLogger(scope, this.entries);
  }

  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  messages(level?: LogLevel): string[] {
    return (level ? this.at(level) : this.entries).map((e) => e.message);
  }
}
