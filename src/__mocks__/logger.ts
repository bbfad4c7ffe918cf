/**
 * Logger that keeps every record for assertions.
 */

import { LogLevel, type Logger } from '../observability.js';

export interface LogRecord {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
}

export class RecordingLogger implements Logger {
  readonly records: LogRecord[] = [];

  debug(message: string, context: Record<string, unknown> = {}): void {
    this.records.push({ level: LogLevel.Debug, message, context });
  }

  warn(message: string, context: Record<string, unknown> = {}): void {
    this.records.push({ level: LogLevel.Warn, message, context });
  }

  error(message: string, context: Record<string, unknown> = {}): void {
    this.records.push({ level: LogLevel.Error, message, context });
  }

  messages(level?: LogLevel): string[] {
    return this.records
      .filter((record) => level === undefined || record.level === level)
      .map((record) => record.message);
  }
}
