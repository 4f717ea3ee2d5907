/**
 * Fan-out over identifiers
 *
 * Runs one fetch chain per identifier, in order, one at a time.
 * A chain that throws is logged and skipped; the batch carries on.
 * Identifiers whose chain did not finish are summarized in one warning.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  describeError,
  type ApiItem,
  type Observer,
  type PaginationOutcome,
  type RequestFailure,
} from '@shovels-client/shared';

const SEPARATOR = '--------------------------------';

/**
 * An identifier whose chain ended without all of its data
 */
export interface FanOutFailure {
  id: string;
  failure: RequestFailure;
}

export interface FanOutResult {
  /** Tag shared by all log lines of this batch */
  batchId: string;

  /** Records from every identifier, flattened in identifier order */
  items: ApiItem[];

  failures: FanOutFailure[];
}

/**
 * Run `fetchOne` for each identifier and collect the results
 *
 * @param label - What is being fetched, for log lines (e.g. "permits")
 */
export async function fanOut(
  ids: readonly string[],
  label: string,
  fetchOne: (id: string) => Promise<PaginationOutcome>,
  observer: Observer,
): Promise<FanOutResult> {
  const batchId = uuidv4();
  const items: ApiItem[] = [];
  const failures: FanOutFailure[] = [];

  observer.record('info', SEPARATOR);
  observer.record('info', `[${batchId}] Fetching ${label} for ${ids.length} IDs: ${ids.join(', ')}`);

  for (const [index, id] of ids.entries()) {
    observer.record('info', `[${batchId}] Fetching ${label} for ${id} (${index + 1}/${ids.length})`);

    try {
      const outcome = await fetchOne(id);
      items.push(...outcome.items);
      if (outcome.failure !== undefined) {
        failures.push({ id, failure: outcome.failure });
      }
    } catch (err) {
      const { message, stack } = describeError(err);
      observer.record('error', `[${batchId}] Error fetching ${label} for ${id}: ${message}`);
      if (stack) observer.record('error', stack);
      failures.push({ id, failure: { kind: 'unexpected', message } });
    }
  }

  if (failures.length > 0) {
    observer.record(
      'warn',
      `[${batchId}] ${failures.length} of ${ids.length} IDs failed: ${failures.map((f) => f.id).join(', ')}`,
    );
  }
  observer.record('info', SEPARATOR);

  return { batchId, items, failures };
}
