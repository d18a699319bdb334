import { errors } from 'playwright';

/**
 * Outcome of a single page or service operation. Call sites decide the
 * fallback from the variant instead of relying on caught exceptions.
 */
export type OpResult<T = void> =
  | { kind: 'ok'; value: T }
  | { kind: 'not_found'; detail: string }
  | { kind: 'timeout'; detail: string }
  | { kind: 'service_error'; detail: string };

export type OpFailure = Exclude<OpResult<never>, { kind: 'ok' }>;

export function ok<T>(value: T): OpResult<T> {
  return { kind: 'ok', value };
}

export function notFound(detail: string): OpFailure {
  return { kind: 'not_found', detail };
}

export function timedOut(detail: string): OpFailure {
  return { kind: 'timeout', detail };
}

export function serviceError(detail: string): OpFailure {
  return { kind: 'service_error', detail };
}

export function isOk<T>(result: OpResult<T>): result is { kind: 'ok'; value: T } {
  return result.kind === 'ok';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a thrown Playwright error onto a result: timeouts stay timeouts,
 * anything else means the element could not be used.
 */
export function fromPageError(error: unknown, what: string): OpFailure {
  if (error instanceof errors.TimeoutError) {
    return timedOut(`${what}: ${error.message}`);
  }
  return notFound(`${what}: ${describeError(error)}`);
}

/**
 * Run a page operation and convert its failure into a result.
 */
export async function attempt<T>(what: string, operation: () => Promise<T>): Promise<OpResult<T>> {
  try {
    return ok(await operation());
  } catch (error) {
    return fromPageError(error, what);
  }
}

// Raised for missing mandatory request fields; never retried
export class PreconditionError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required fields: ${missing.join(', ')}`);
    this.name = 'PreconditionError';
  }
}

// Raised once every navigation readiness strategy has failed
export class NavigationError extends Error {
  constructor(readonly url: string, readonly attempts: string[]) {
    super(`Navigation to ${url} failed (${attempts.join('; ')})`);
    this.name = 'NavigationError';
  }
}
