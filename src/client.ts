/**
 * GitLab API Client
 *
 * Issues single authenticated GET requests against the GitLab REST API and
 * classifies the outcome: a 2xx response yields the body, anything else is a
 * fatal NetworkError. There is no retry.
 */

import { fetch as undiciFetch } from 'undici';
import type { ToolConfig } from './config.js';
import { API_VERSION } from './config.js';
import { bearerAuthorization } from './auth.js';
import { NetworkError, ParseError, parseHttpError } from './errors.js';
import { NoopLogger, type Logger } from './observability.js';
import { formatCommand } from './process.js';

/**
 * The parts of a fetch Response the client reads
 */
export interface FetchResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly headers: { get(name: string): string | null };
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

/**
 * Request init passed to the fetch function
 */
export interface FetchInit {
  method: 'GET';
  headers: Record<string, string>;
}

/**
 * HTTP function used by the client (default: undici fetch)
 */
export type FetchFn = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * Query parameters; undefined values are omitted, empty strings are kept
 */
export type QueryParams = Record<string, string | number | undefined>;

/**
 * Client construction options
 */
export interface ClientOptions {
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * GitLab API Client
 *
 * @example
 * ```typescript
 * const client = new GitLabClient(config);
 * const url = client.buildUrl('/projects/group%2fproject/jobs/42/trace');
 * const log = await client.getText(url);
 * ```
 */
export class GitLabClient {
  private readonly config: ToolConfig;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private readonly apiBaseUrl: string;

  constructor(config: ToolConfig, options: ClientOptions = {}) {
    this.config = config;
    this.fetchFn = options.fetch ?? undiciFetch;
    this.logger = options.logger ?? new NoopLogger();
    this.apiBaseUrl = `${config.serverUrl}/api/${API_VERSION}`;
  }

  /**
   * Get the configuration the client was built with
   */
  getConfig(): ToolConfig {
    return this.config;
  }

  /**
   * Build a full API URL from a path and query parameters
   *
   * @param path - API endpoint path (e.g., '/projects/123/deployments')
   * @param query - Query parameters, appended in insertion order
   */
  buildUrl(path: string, query?: QueryParams): string {
    const normalizedPath = path.startsWith('/') ? path : `/${path}`;
    let url = `${this.apiBaseUrl}${normalizedPath}`;

    if (query) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          params.append(key, String(value));
        }
      }

      const queryString = params.toString();
      if (queryString) {
        url += `?${queryString}`;
      }
    }

    return url;
  }

  /**
   * GET a URL and return the body as text
   */
  async getText(url: string): Promise<string> {
    const response = await this.request(url);
    return this.readBody(url, () => response.text());
  }

  /**
   * GET a URL and return the raw body
   */
  async getBuffer(url: string): Promise<Buffer> {
    const response = await this.request(url);
    return Buffer.from(await this.readBody(url, () => response.arrayBuffer()));
  }

  /**
   * GET a URL and parse the body as JSON
   *
   * @throws {ParseError} If the body is not valid JSON
   */
  async getJson(url: string): Promise<unknown> {
    const body = await this.getText(url);
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new ParseError(
        `Response from ${url} is not valid JSON`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Render the request as an equivalent curl command, token redacted
   */
  describeRequest(url: string): string {
    return formatCommand([
      'curl',
      '--silent',
      '--show-error',
      '--fail',
      '--header',
      'Authorization: Bearer [REDACTED]',
      url,
    ]);
  }

  /**
   * Core request method
   *
   * @throws {NetworkError} On transport failure or any non-2xx status
   */
  private async request(url: string): Promise<FetchResponse> {
    if (this.config.debugEnabled) {
      this.logger.debug(this.describeRequest(url));
    }

    let response: FetchResponse;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: {
          Authorization: bearerAuthorization(this.config.token),
        },
      });
    } catch (error) {
      throw transportError(url, error);
    }

    if (!response.ok) {
      throw parseHttpError(response.status, await this.readErrorBody(response), url);
    }

    return response;
  }

  /**
   * Read a successful response body; the connection can still drop mid-body
   *
   * @throws {NetworkError} If the body cannot be read
   */
  private async readBody<T>(url: string, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (error) {
      throw transportError(url, error);
    }
  }

  /**
   * Read an error response body, as JSON when the server says so
   */
  private async readErrorBody(response: FetchResponse): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      this.logger.debug('Could not read error response body', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const contentType = response.headers.get('Content-Type') ?? '';
    if (contentType.includes('application/json')) {
      try {
        return JSON.parse(text);
      } catch {
        return text;
      }
    }
    return text;
  }
}

/**
 * NetworkError for a request that failed below HTTP (DNS, refused or dropped connection)
 */
function transportError(url: string, error: unknown): NetworkError {
  const cause = error instanceof Error ? error : undefined;
  const reason = cause?.cause instanceof Error
    ? `${cause.message}: ${cause.cause.message}`
    : cause?.message ?? String(error);
  return new NetworkError(`Request to ${url} failed: ${reason}`, url, { cause });
}
