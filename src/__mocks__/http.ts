/**
 * In-process stand-in for the HTTP layer.
 *
 * Routes are matched in registration order against the request URL; a string
 * route matches when the URL contains it. Unmatched requests get a 404.
 *
 * @example
 * ```typescript
 * const http = new MockFetch().onJson('/deployments', []);
 * const client = new GitLabClient(config, { fetch: http.fetch });
 * ```
 */

import type { FetchFn, FetchInit, FetchResponse } from '../client.js';

export interface MockRoute {
  status?: number;
  body?: string | Buffer;
  headers?: Record<string, string>;
  /**
   * Reject the request as a transport failure
   */
  error?: Error;
}

export interface RecordedRequest {
  url: string;
  init: FetchInit;
}

function createResponse(status: number, body: Buffer, headers: Record<string, string>): FetchResponse {
  const lowerCased = new Map(
    Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value])
  );
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: (name: string) => lowerCased.get(name.toLowerCase()) ?? null },
    text: async () => body.toString('utf8'),
    arrayBuffer: async () => {
      const copy = new ArrayBuffer(body.byteLength);
      new Uint8Array(copy).set(body);
      return copy;
    },
  };
}

export class MockFetch {
  private readonly routes: Array<{ match: string | RegExp; route: MockRoute }> = [];
  private readonly requests: RecordedRequest[] = [];

  on(match: string | RegExp, route: MockRoute): this {
    this.routes.push({ match, route });
    return this;
  }

  onText(match: string | RegExp, body: string | Buffer, status = 200): this {
    return this.on(match, { status, body, headers: { 'Content-Type': 'text/plain' } });
  }

  onJson(match: string | RegExp, body: unknown, status = 200): this {
    return this.on(match, {
      status,
      body: JSON.stringify(body),
      headers: { 'Content-Type': 'application/json' },
    });
  }

  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  getUrls(): string[] {
    return this.requests.map((request) => request.url);
  }

  readonly fetch: FetchFn = async (url, init) => {
    this.requests.push({ url, init });

    const found = this.routes.find(({ match }) =>
      typeof match === 'string' ? url.includes(match) : match.test(url)
    );
    if (!found) {
      return createResponse(404, Buffer.from('{"message":"404 Not Found"}'), {
        'Content-Type': 'application/json',
      });
    }

    const { route } = found;
    if (route.error) {
      throw route.error;
    }
    const body = typeof route.body === 'string' ? Buffer.from(route.body) : route.body ?? Buffer.alloc(0);
    return createResponse(route.status ?? 200, body, route.headers ?? {});
  };
}
