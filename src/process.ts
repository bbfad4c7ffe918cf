/**
 * External program execution
 *
 * Programs (git, the preprocessing filter, the diff viewer) are always described
 * as an ordered list of argument tokens and spawned without a shell. A user
 * supplied command string is turned into tokens once, by `parseCommand`.
 *
 * @example
 * ```typescript
 * const runner = new SpawnProcessRunner();
 * const result = await runner.run(parseCommand('sort -u'), { input: 'b\na\n' });
 * console.log(result.stdout.toString()); // "a\nb\n"
 * ```
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { parse } from 'shell-quote';
import { ConfigError, SpawnFailedError } from './errors.js';
import { NoopLogger, type Logger } from './observability.js';

/**
 * Options for a single program run
 */
export interface RunOptions {
  /**
   * Content written to the program's standard input (pipe mode only)
   */
  input?: Buffer | string;

  /**
   * `pipe` captures stdout/stderr; `inherit` hands the terminal to the program
   * (default: pipe)
   */
  stdio?: 'pipe' | 'inherit';
}

/**
 * Outcome of a program that was launched and has exited
 */
export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: string;
}

/**
 * Launches external programs.
 */
export interface ProcessRunner {
  /**
   * Run a program to completion.
   *
   * @throws {SpawnFailedError} If the program cannot be launched
   */
  run(argv: readonly string[], options?: RunOptions): Promise<ProcessResult>;
}

/**
 * ProcessRunner backed by `child_process.spawn`.
 */
export class SpawnProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger = new NoopLogger()) {}

  async run(argv: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    const [program, ...args] = argv;
    if (program === undefined || program === '') {
      throw new SpawnFailedError('(none)', 'empty command');
    }

    const stdio = options.stdio ?? 'pipe';
    this.logger.debug(`exec: ${formatCommand(argv)}`);

    let proc: ChildProcess;
    try {
      proc = spawn(program, args, {
        stdio: stdio === 'inherit' ? 'inherit' : ['pipe', 'pipe', 'pipe'],
      });
    } catch (error) {
      throw new SpawnFailedError(
        program,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }

    return this.waitForClose(program, proc, options.input);
  }

  /**
   * Feed stdin, collect output and wait for the process to close
   */
  private waitForClose(
    program: string,
    proc: ChildProcess,
    input: Buffer | string | undefined
  ): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let spawnFailed = false;

      proc.stdout?.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk);
      });
      proc.stderr?.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      proc.on('error', (err) => {
        spawnFailed = true;
        reject(new SpawnFailedError(program, err.message, err));
      });

      proc.on('close', (code, signal) => {
        if (spawnFailed) return;
        resolve({
          exitCode: code,
          signal,
          stdout: Buffer.concat(stdoutChunks),
          stderr: Buffer.concat(stderrChunks).toString(),
        });
      });

      if (proc.stdin) {
        // A program that exits without reading its input closes the pipe early.
        proc.stdin.on('error', (err) => {
          this.logger.debug(`stdin of ${program} closed early: ${err.message}`);
        });
        proc.stdin.end(input ?? '');
      }
    });
  }
}

/**
 * Split a user-supplied command string into argument tokens.
 *
 * Follows POSIX shell word splitting: single and double quotes group words and
 * backslashes escape. `$VAR` references and glob characters are kept literally.
 * Pipes, redirections and command separators are rejected because the program
 * is never run through a shell.
 *
 * @throws {ConfigError} If the string is empty or contains shell operators
 */
export function parseCommand(command: string): string[] {
  const tokens: string[] = [];
  const entries = parse(command, (key: string) => `$${key}`);

  for (const entry of entries) {
    if (typeof entry === 'string') {
      tokens.push(entry);
    } else if ('op' in entry && entry.op === 'glob' && 'pattern' in entry) {
      tokens.push(entry.pattern);
    } else if ('op' in entry) {
      throw new ConfigError(
        `Unsupported shell operator "${entry.op}" in command: ${command}`
      );
    } else {
      throw new ConfigError(`Unsupported comment in command: ${command}`);
    }
  }

  if (tokens.length === 0) {
    throw new ConfigError('Command must not be empty');
  }
  return tokens;
}

/**
 * Render argument tokens as a single line for diagnostics.
 *
 * Tokens containing whitespace (or empty tokens) are wrapped in single quotes.
 */
export function formatCommand(argv: readonly string[]): string {
  return argv
    .map((token) =>
      token === '' || /\s/.test(token)
        ? `'${token.replace(/'/g, `'\\''`)}'`
        : token
    )
    .join(' ');
}

/**
 * Describe how a finished program ended, for error messages
 */
export function describeExit(result: ProcessResult): string {
  if (result.signal) {
    return `terminated by ${result.signal}`;
  }
  return `exited with code ${result.exitCode ?? 'unknown'}`;
}
