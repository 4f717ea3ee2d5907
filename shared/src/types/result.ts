/**
 * Outcome of an operation that reports failure instead of throwing
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Why a single request did not produce a usable body
 */
export type RequestFailure =
  | {
      /** Server answered with a status other than 200 */
      kind: 'http';
      status: number;
      body: string;
    }
  | {
      /** Network error, timeout or abort */
      kind: 'transport';
      message: string;
    }
  | {
      /** Status 200 but the body was not a JSON object */
      kind: 'decode';
      status: number;
      body: string;
    }
  | {
      /** Anything thrown while a chain was running */
      kind: 'unexpected';
      message: string;
    };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * One-line description of a request failure for log output
 */
export function describeFailure(failure: RequestFailure): string {
  switch (failure.kind) {
    case 'http':
      return `HTTP Error ${failure.status}: ${failure.body}`;
    case 'decode':
      return `Invalid JSON body (HTTP ${failure.status}): ${failure.body}`;
    case 'transport':
      return `Transport error: ${failure.message}`;
    case 'unexpected':
      return `Unexpected error: ${failure.message}`;
  }
}
