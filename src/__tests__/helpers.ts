/**
 * Shared test doubles
 */

import { vi } from 'vitest';
import type { Cookies, HttpClient, HttpResponse, PostOptions, RequestOptions } from '../http/client.js';
import type { Logger } from '../logger.js';

export function createMockLogger() {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  } satisfies Logger;
}

export interface HttpResponseInit {
  status?: number;
  body?: string | Buffer;
  headers?: Record<string, string>;
  cookies?: Cookies;
}

export function createHttpResponse(init: HttpResponseInit = {}): HttpResponse {
  const body = Buffer.isBuffer(init.body) ? init.body : Buffer.from(init.body ?? '');
  return {
    status: init.status ?? 200,
    headers: init.headers ?? {},
    cookies: init.cookies ?? {},
    body,
    json: () => JSON.parse(body.toString('utf-8')),
  };
}

export interface RecordedRequest {
  method: 'GET' | 'POST';
  url: string;
  options: PostOptions;
}

/**
 * In-process HttpClient: answers from a URL -> response table, 404 otherwise
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, HttpResponse | Error>();

  on(url: string, response: HttpResponse | Error): this {
    this.routes.set(url, response);
    return this;
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.handle('GET', url, options);
  }

  async post(url: string, options: PostOptions = {}): Promise<HttpResponse> {
    return this.handle('POST', url, options);
  }

  private handle(method: 'GET' | 'POST', url: string, options: PostOptions): HttpResponse {
    this.requests.push({ method, url, options });
    const response = this.routes.get(url);
    if (response instanceof Error) throw response;
    return response ?? createHttpResponse({ status: 404 });
  }
}
