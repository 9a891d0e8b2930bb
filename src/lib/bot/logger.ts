/**
 * Logger — Structured Console Output
 *
 * One line per event: `2024-01-01T00:00:00.000Z [INFO] [monitor] message key=value`.
 * ERROR lines go to stderr, WARN lines through console.warn.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = typeof value === 'string' && /\s/.test(value)
      ? JSON.stringify(value)
      : String(value);
    parts.push(`${key}=${text}`);
  }
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export function formatLine(
  level: LogLevel,
  scope: string,
  message: string,
  fields?: LogFields,
  now: Date = new Date(),
): string {
  return `${now.toISOString()} [${level.toUpperCase()}] [${scope}] ${message}${formatFields(fields)}`;
}

export class ConsoleLogger implements Logger {
  private scope: string;
  private minLevel: LogLevel;

  constructor(scope = 'bot', minLevel: LogLevel = 'info') {
    this.scope = scope;
    this.minLevel = minLevel;
  }

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(scope, this.minLevel);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;

    const line = formatLine(level, this.scope, message, fields);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}
