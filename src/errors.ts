/**
 * Error types for the GitLab job tools.
 *
 * Every error raised by the tools is fatal: the first one aborts the run and the
 * CLI maps it to exit code 1.
 */

/**
 * Base error class for all GitLab job tools errors.
 */
export class GitLabToolsError extends Error {
  /**
   * Error code for programmatic error identification
   */
  readonly code: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly statusCode?: number;

  /**
   * Original error that caused this error (if any)
   */
  override readonly cause?: Error;

  constructor(
    message: string,
    code: string,
    options: {
      statusCode?: number;
      cause?: Error;
    } = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = options.statusCode;
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      cause: this.cause?.message,
    };
  }
}

/**
 * Missing or invalid server, repository slug, credential, pattern or program
 * specification.
 */
export class ConfigError extends GitLabToolsError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', { cause });
  }
}

/**
 * Non-2xx response or transport failure.
 */
export class NetworkError extends GitLabToolsError {
  /**
   * URL of the failed request
   */
  readonly url: string;

  constructor(
    message: string,
    url: string,
    options: { statusCode?: number; cause?: Error } = {}
  ) {
    super(message, 'NETWORK_ERROR', options);
    this.url = url;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), url: this.url };
  }
}

/**
 * Response body that is not the JSON shape the tools expect.
 */
export class ParseError extends GitLabToolsError {
  constructor(message: string, cause?: Error) {
    super(message, 'PARSE_ERROR', { cause });
  }
}

/**
 * External preprocessing program failed to launch or exited unsuccessfully.
 */
export class PreprocessError extends GitLabToolsError {
  readonly exitCode?: number;
  readonly stderr: string;

  constructor(
    message: string,
    options: { exitCode?: number; stderr?: string; cause?: Error } = {}
  ) {
    super(message, 'PREPROCESS_ERROR', { cause: options.cause });
    this.exitCode = options.exitCode;
    this.stderr = options.stderr ?? '';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), exitCode: this.exitCode, stderr: this.stderr };
  }
}

/**
 * External diff program could not be launched.
 */
export class DiffToolError extends GitLabToolsError {
  constructor(message: string, cause?: Error) {
    super(message, 'DIFF_TOOL_ERROR', { cause });
  }
}

/**
 * A program could not be spawned at all (missing binary, permissions).
 * Callers translate it into the error of their own step.
 */
export class SpawnFailedError extends GitLabToolsError {
  readonly program: string;

  constructor(program: string, reason: string, cause?: Error) {
    super(`Failed to launch ${program}: ${reason}`, 'SPAWN_FAILED', { cause });
    this.program = program;
  }
}

// ============================================================================
// Error Parsing Utility
// ============================================================================

const STATUS_HINTS: Record<number, string> = {
  400: 'Bad request to GitLab API',
  401: 'Unauthorized - check your GitLab token',
  403: 'Forbidden - check your GitLab permissions',
  404: 'Not found - check the server, repository and job id',
  429: 'Rate limit exceeded',
  500: 'GitLab internal server error',
  503: 'GitLab service temporarily unavailable',
};

/**
 * Extract the server-provided message from an error response body.
 */
function extractMessage(body: unknown): string | undefined {
  if (typeof body === 'string') {
    const trimmed = body.trim();
    return trimmed.length > 0 && trimmed.length <= 200 ? trimmed : undefined;
  }
  if (body && typeof body === 'object') {
    for (const key of ['message', 'error', 'error_description']) {
      const value: unknown = Reflect.get(body, key);
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
      if (value && typeof value === 'object') {
        return JSON.stringify(value);
      }
    }
  }
  return undefined;
}

/**
 * Map a non-2xx GitLab response to a NetworkError.
 *
 * @example
 * ```typescript
 * parseHttpError(401, { message: '401 Unauthorized' }, url).message
 * // => 'Unauthorized - check your GitLab token (HTTP 401: 401 Unauthorized)'
 * ```
 */
export function parseHttpError(status: number, body: unknown, url: string): NetworkError {
  const hint = STATUS_HINTS[status] ?? `GitLab API error`;
  const detail = extractMessage(body);
  const message = detail
    ? `${hint} (HTTP ${status}: ${detail})`
    : `${hint} (HTTP ${status})`;
  return new NetworkError(message, url, { statusCode: status });
}

/**
 * Type guard to check if an error is a GitLabToolsError
 */
export function isGitLabToolsError(error: unknown): error is GitLabToolsError {
  return error instanceof GitLabToolsError;
}
