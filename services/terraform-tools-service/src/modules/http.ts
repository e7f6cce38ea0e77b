/**
 * Bounded HTTP downloads for the fetcher and the registry client.
 *
 * Every request gets its own AbortController: the configured timeout and the
 * caller's signal both abort it, and the timeout covers reading the body.
 */

import { CancelledError, errorMessage, logger } from '@tfguard/shared-utils';
import { FetchError, SERVICE_NAME } from '../errors';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs: number;
  maxBytes: number;
  /** Defaults to the global fetch; tests pass an in-process stand-in */
  fetch?: FetchFn;
  headers?: Record<string, string>;
}

export interface HttpRequest {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export class HttpClient {
  readonly maxBytes: number;
  private timeoutMs: number;
  private fetchFn: FetchFn;
  private headers: Record<string, string>;

  constructor(options: HttpClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.maxBytes = options.maxBytes;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = { 'User-Agent': 'tfguard', ...options.headers };
  }

  /**
   * Run `handle` against the response while the deadline is armed. Non-2xx
   * statuses other than 204 never reach the handler.
   */
  async request<T>(url: string, request: HttpRequest, handle: (response: Response) => Promise<T>): Promise<T> {
    const { signal } = request;
    if (signal?.aborted) {
      throw new CancelledError(`GET ${url}`, SERVICE_NAME);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      logger.debug(`GET ${url}`);
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: { ...this.headers, ...request.headers },
        signal: controller.signal,
      });

      if (response.status === 404) {
        throw new FetchError('notFound', `Not found: ${url}`, { url, status: 404 });
      }
      if (!response.ok) {
        throw new FetchError('networkFailure', `GET ${url} failed with HTTP ${response.status}`, {
          url,
          status: response.status,
        });
      }

      return await handle(response);
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (signal?.aborted) {
        throw new CancelledError(`GET ${url}`, SERVICE_NAME);
      }
      if (timedOut) {
        throw new FetchError('timeout', `GET ${url} timed out after ${this.timeoutMs}ms`, {
          url,
          timeoutMs: this.timeoutMs,
        });
      }
      throw new FetchError('networkFailure', `GET ${url} failed: ${errorMessage(error)}`, { url });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async getJson(url: string, request: HttpRequest = {}): Promise<unknown> {
    return this.request(url, { ...request, headers: { Accept: 'application/json', ...request.headers } }, async response => {
      const text = new TextDecoder().decode(await readBounded(response, this.maxBytes, url));
      try {
        return JSON.parse(text);
      } catch {
        throw new FetchError('networkFailure', `GET ${url} returned invalid JSON`, { url });
      }
    });
  }

  async download(url: string, request: HttpRequest = {}): Promise<Uint8Array> {
    return this.request(url, request, response => readBounded(response, this.maxBytes, url));
  }
}

/**
 * Read a response body, giving up as soon as it passes `maxBytes`
 */
export async function readBounded(response: Response, maxBytes: number, url: string): Promise<Uint8Array> {
  const tooLarge = () =>
    new FetchError('tooLarge', `Download from ${url} exceeds ${maxBytes} bytes`, { url, maxBytes });

  const declared = Number(response.headers.get('content-length'));
  if (Number.isFinite(declared) && declared > maxBytes) {
    throw tooLarge();
  }

  if (!response.body) return new Uint8Array(0);

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.length;
    if (total > maxBytes) {
      await reader.cancel();
      throw tooLarge();
    }
    chunks.push(value);
  }

  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
