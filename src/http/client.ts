/**
 * Minimal HTTP capability over the global fetch: form posts, cookie
 * session state and raw response bodies
 */

import { TransportError, errorMessage } from '../errors.js';

export type Cookies = Record<string, string>;

export interface HttpResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  cookies: Cookies;
  body: Buffer;
  json(): unknown;
}

export interface RequestOptions {
  cookies?: Cookies;
}

export interface PostOptions extends RequestOptions {
  form?: Record<string, string | undefined>;
}

export interface HttpClient {
  get(url: string, options?: RequestOptions): Promise<HttpResponse>;
  post(url: string, options?: PostOptions): Promise<HttpResponse>;
}

export type FetchFn = typeof fetch;

export interface FetchHttpClientOptions {
  timeoutMs?: number;
  fetch?: FetchFn;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Parse `Set-Cookie` header lines into a name -> value map
 */
export function parseSetCookie(lines: string[]): Cookies {
  const cookies: Cookies = {};
  for (const line of lines) {
    const pair = line.split(';', 1)[0];
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    cookies[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return cookies;
}

export function serializeCookies(cookies: Cookies): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

export function encodeForm(form: Record<string, string | undefined>): URLSearchParams {
  const params = new URLSearchParams();
  for (const [name, value] of Object.entries(form)) {
    if (value !== undefined) params.append(name, value);
  }
  return params;
}

async function readBody(body: Response['body'], onChunk: () => void): Promise<Buffer> {
  if (!body) return Buffer.alloc(0);
  const reader = body.getReader();
  const chunks: Buffer[] = [];
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    onChunk();
    chunks.push(Buffer.from(value));
  }
  return Buffer.concat(chunks);
}

export class FetchHttpClient implements HttpClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;

  constructor(options: FetchHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request('GET', url, options.cookies);
  }

  post(url: string, options: PostOptions = {}): Promise<HttpResponse> {
    return this.request('POST', url, options.cookies, options.form ? encodeForm(options.form) : undefined);
  }

  private async request(
    method: 'GET' | 'POST',
    url: string,
    cookies?: Cookies,
    body?: URLSearchParams,
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    if (cookies && Object.keys(cookies).length > 0) {
      headers.cookie = serializeCookies(cookies);
    }

    // Idle timeout: armed until the headers arrive, then re-armed per body chunk
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const arm = (): void => {
      clearTimeout(timer);
      timer = setTimeout(
        () => controller.abort(new Error(`no data received for ${this.timeoutMs} ms`)),
        this.timeoutMs,
      );
    };

    try {
      arm();
      const response = await this.fetchImpl(url, {
        method,
        headers,
        body,
        redirect: 'follow',
        signal: controller.signal,
      });
      arm();

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        responseHeaders[name.toLowerCase()] = value;
      });
      const payload = await readBody(response.body, arm);

      return {
        status: response.status,
        headers: responseHeaders,
        cookies: parseSetCookie(response.headers.getSetCookie()),
        body: payload,
        json: () => JSON.parse(payload.toString('utf-8')),
      };
    } catch (err) {
      throw new TransportError(`${method} ${url} failed: ${errorMessage(err)}`, { url, cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}
