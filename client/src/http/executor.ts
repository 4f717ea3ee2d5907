/**
 * Request Executor
 *
 * Performs a single GET against the API and reports the outcome as a
 * Result. Nothing here throws for HTTP, network or decoding problems;
 * the caller decides what a failure means.
 */

import {
  describeError,
  describeFailure,
  fail,
  isRecord,
  ok,
  type ApiRecord,
  type Observer,
  type QueryParams,
  type RequestFailure,
  type Result,
} from '@shovels-client/shared';
import { buildUrl } from './query.js';

/**
 * The fetch signature the executor calls through
 */
export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Per-call overrides
 */
export interface RequestOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;

  /** Extra headers, merged over the session headers */
  headers?: Record<string, string>;
}

/**
 * Anything that can fetch one page.
 *
 * Implementations must report failures through the Result.
 */
export interface PageRequester {
  execute(
    url: string,
    params?: QueryParams,
    options?: RequestOptions,
  ): Promise<Result<ApiRecord, RequestFailure>>;
}

export interface RequestExecutorOptions {
  /** Headers sent with every request (API key, Accept) */
  headers: Record<string, string>;

  observer: Observer;

  /** Default timeout when a call does not set one */
  timeoutMs?: number;

  /** fetch implementation (default: global fetch) */
  fetch?: FetchFunction;
}

/**
 * Render a caught fetch error, including the underlying socket error
 * Node attaches as `cause`.
 */
function transportMessage(err: unknown): string {
  const { message } = describeError(err);
  if (err instanceof Error && err.cause instanceof Error) {
    return `${message} (${err.cause.message})`;
  }
  return message;
}

function countItems(body: ApiRecord): number {
  const size = body['size'];
  if (typeof size === 'number') {
    return size;
  }
  const items = body['items'];
  return Array.isArray(items) ? items.length : 0;
}

export class RequestExecutor implements PageRequester {
  private readonly headers: Record<string, string>;
  private readonly observer: Observer;
  private readonly timeoutMs: number | undefined;
  private readonly fetchImpl: FetchFunction;

  constructor(options: RequestExecutorOptions) {
    this.headers = { ...options.headers };
    this.observer = options.observer;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async execute(
    url: string,
    params: QueryParams = {},
    options: RequestOptions = {},
  ): Promise<Result<ApiRecord, RequestFailure>> {
    const target = buildUrl(url, params);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    const init: RequestInit = {
      method: 'GET',
      headers: { ...this.headers, ...options.headers },
    };
    if (timeoutMs !== undefined) {
      init.signal = AbortSignal.timeout(timeoutMs);
    }

    let status: number;
    let text: string;
    try {
      const response = await this.fetchImpl(target, init);
      status = response.status;
      text = await response.text();
    } catch (err) {
      return this.failed(url, { kind: 'transport', message: transportMessage(err) });
    }

    if (status !== 200) {
      return this.failed(url, { kind: 'http', status, body: text });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return this.failed(url, { kind: 'decode', status, body: text });
    }

    if (!isRecord(body)) {
      return this.failed(url, { kind: 'decode', status, body: text });
    }

    this.observer.record('debug', `Number of items returned: ${countItems(body)}`);
    return ok(body);
  }

  private failed(url: string, failure: RequestFailure): Result<never, RequestFailure> {
    this.observer.record('error', `Error fetching ${url}: ${describeFailure(failure)}`);
    return fail(failure);
  }
}
