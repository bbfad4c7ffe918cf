/**
 * Diagnostics for the GitLab job tools.
 *
 * Everything logged goes to stderr so that stdout carries only tool output
 * (search matches) and can be piped.
 */

/**
 * Severities, lowest first. Warn is the CLI default; `--debug` lowers it to Debug.
 */
export enum LogLevel {
  Debug = 0,
  Warn = 1,
  Error = 2,
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Context keys whose values never reach the diagnostic stream.
 */
const SENSITIVE_KEYS = new Set([
  'token',
  'private_token',
  'private-token',
  'authorization',
  'secret',
  'password',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy of a context object with sensitive values replaced, at any depth.
 */
export function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      result[key] = redactContext(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Receives one formatted line at a time, without the newline.
 */
export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Writes `<level>: <message>[ <context as JSON>]` lines.
 */
export class StderrLogger implements Logger {
  private readonly level: LogLevel;
  private readonly write: LogWriter;

  constructor(options: { level?: LogLevel; write?: LogWriter } = {}) {
    this.level = options.level ?? LogLevel.Warn;
    this.write = options.write ?? stderrWriter;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  private log(level: LogLevel, message: string, context: Record<string, unknown> = {}): void {
    if (level < this.level) return;

    const safe = redactContext(context);
    const suffix = Object.keys(safe).length > 0 ? ` ${JSON.stringify(safe)}` : '';
    this.write(`${LogLevel[level].toLowerCase()}: ${message}${suffix}`);
  }
}

/**
 * Logger that discards everything; the default for library classes.
 */
export class NoopLogger implements Logger {
  debug(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
}

/**
 * Create the logger a CLI run uses.
 */
export function createCliLogger(debugEnabled: boolean, write?: LogWriter): Logger {
  return new StderrLogger({
    level: debugEnabled ? LogLevel.Debug : LogLevel.Warn,
    write,
  });
}
