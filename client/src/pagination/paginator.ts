/**
 * Pagination engine
 *
 * Follows cursor or page-number continuations until the server reports
 * the last page, the iteration ceiling is reached, or a request fails.
 * A failed request ends the chain but keeps what was already collected.
 */

import {
  describeError,
  validatePaginationOptions,
  type ApiItem,
  type ApiRecord,
  type Continuation,
  type Observer,
  type PaginationCursor,
  type PaginationOptions,
  type PaginationOutcome,
  type QueryParams,
  type RequestFailure,
  type Result,
} from '@shovels-client/shared';
import type { PageRequester, RequestOptions } from '../http/executor.js';
import { formatElapsed } from '../utils/elapsed.js';
import { parsePageResponse } from './response.js';

/**
 * Options for one fetch chain
 */
export interface FetchAllOptions extends PaginationOptions, RequestOptions {}

type ContinuationMode = 'cursor' | 'page';

type NextStep =
  | { kind: 'cursor'; cursor: PaginationCursor }
  | { kind: 'page'; page: number };

/**
 * Decide where the chain goes after a successful page.
 *
 * Once the first response has fixed the mode, a response carrying the
 * other kind of continuation (or none) ends the chain.
 */
function nextStep(continuation: Continuation, mode: ContinuationMode | undefined): NextStep | undefined {
  if (mode !== undefined && continuation.kind !== mode) {
    return undefined;
  }

  switch (continuation.kind) {
    case 'none':
      return undefined;
    case 'cursor':
      return continuation.next === null ? undefined : { kind: 'cursor', cursor: continuation.next };
    case 'page':
      return continuation.next === null ? undefined : { kind: 'page', page: continuation.next };
  }
}

export class Paginator {
  constructor(
    private readonly requester: PageRequester,
    private readonly observer: Observer,
  ) {}

  /**
   * Fetch every page and return the collected items
   * @throws ValidationError if page, size or maxIterations is out of range
   */
  async fetchAll(url: string, params?: QueryParams, options: FetchAllOptions = {}): Promise<ApiItem[]> {
    const outcome = await this.run(url, params, options);
    return outcome.items;
  }

  /**
   * Fetch every page and report how the chain ended
   * @throws ValidationError if page, size or maxIterations is out of range
   */
  async run(url: string, params?: QueryParams, options: FetchAllOptions = {}): Promise<PaginationOutcome> {
    validatePaginationOptions(options);

    const { size, maxIterations } = options;
    let { page, cursor } = options;
    const requestOptions: RequestOptions = {};
    if (options.timeoutMs !== undefined) requestOptions.timeoutMs = options.timeoutMs;
    if (options.headers !== undefined) requestOptions.headers = options.headers;

    const workingParams: QueryParams = { ...params };
    const items: ApiItem[] = [];
    let mode: ContinuationMode | undefined;
    let iterations = 0;
    let failure: RequestFailure | undefined;

    this.observer.record(
      'info',
      Object.keys(workingParams).length > 0 ? `Request params: ${JSON.stringify(workingParams)}` : 'No params',
    );
    const startedAt = Date.now();

    for (;;) {
      iterations += 1;
      if (cursor !== undefined) workingParams['cursor'] = cursor;
      if (page !== undefined) workingParams['page'] = page;
      if (size !== undefined) workingParams['size'] = size;

      this.observer.record(
        'debug',
        `Iteration ${iterations}: Page ${page ?? '-'}, Cursor ${cursor ?? '-'}, Size ${size ?? '-'}`,
      );

      let result: Result<ApiRecord, RequestFailure>;
      try {
        result = await this.requester.execute(url, workingParams, requestOptions);
      } catch (err) {
        const { message, stack } = describeError(err);
        const position = cursor !== undefined ? `cursor ${cursor}` : `page ${page ?? 1}`;
        this.observer.record('error', `Error fetching ${position}: ${message}`);
        if (stack) this.observer.record('error', stack);
        failure = { kind: 'unexpected', message };
        break;
      }

      if (!result.ok) {
        failure = result.error;
        break;
      }

      const response = parsePageResponse(result.value);
      items.push(...response.items);

      if (maxIterations !== undefined && iterations >= maxIterations) {
        break;
      }

      const next = nextStep(response.continuation, mode);
      if (next === undefined) {
        break;
      }

      mode = next.kind;
      if (next.kind === 'cursor') {
        cursor = next.cursor;
        page = undefined;
        delete workingParams['page'];
      } else {
        page = next.page;
        cursor = undefined;
        delete workingParams['cursor'];
      }
    }

    const elapsedMs = Date.now() - startedAt;
    this.observer.record('info', `Time to complete request: ${formatElapsed(elapsedMs)}`);
    this.observer.record('info', `Total number of items returned: ${items.length}`);
    this.observer.record('info', `Number of individual requests made: ${iterations}`);

    const outcome: PaginationOutcome = {
      items,
      iterations,
      status: failure === undefined ? 'done' : 'failed',
      elapsedMs,
    };
    if (failure !== undefined) outcome.failure = failure;

    return outcome;
  }
}
