/**
 * Mock process runner for testing.
 *
 * Handlers are registered per program name (the first argv token). Programs
 * without a handler exit 0 with empty output.
 */

import { SpawnFailedError } from '../errors.js';
import type { ProcessResult, ProcessRunner, RunOptions } from '../process.js';

export type ProcessHandler = (
  argv: readonly string[],
  options: RunOptions
) => Partial<ProcessResult> | Promise<Partial<ProcessResult>>;

export interface CapturedRun {
  argv: string[];
  options: RunOptions;
}

export class MockProcessRunner implements ProcessRunner {
  private readonly handlers = new Map<string, ProcessHandler | 'missing'>();
  private readonly captured: CapturedRun[] = [];

  on(program: string, handler: ProcessHandler): this {
    this.handlers.set(program, handler);
    return this;
  }

  /**
   * Make a program fail to launch, as if it were not installed
   */
  missing(program: string): this {
    this.handlers.set(program, 'missing');
    return this;
  }

  getRuns(): CapturedRun[] {
    return [...this.captured];
  }

  getPrograms(): string[] {
    return this.captured.map((run) => run.argv[0] ?? '');
  }

  async run(argv: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    this.captured.push({ argv: [...argv], options });

    const program = argv[0] ?? '';
    const handler = this.handlers.get(program);
    if (handler === 'missing') {
      throw new SpawnFailedError(program, `spawn ${program} ENOENT`);
    }

    const partial = handler ? await handler(argv, options) : {};
    return {
      exitCode: partial.exitCode === undefined ? 0 : partial.exitCode,
      signal: partial.signal ?? null,
      stdout: partial.stdout ?? Buffer.alloc(0),
      stderr: partial.stderr ?? '',
    };
  }
}

/**
 * Input handed to a mocked program, as text
 */
export function inputText(options: RunOptions): string {
  if (options.input === undefined) return '';
  return typeof options.input === 'string' ? options.input : options.input.toString('utf8');
}
