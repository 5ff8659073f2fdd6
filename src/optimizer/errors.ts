/**
 * Minimizer errors and results
 *
 * Every operation reports failure as a value; nothing is retried and
 * nothing is returned partially.
 */

export enum KmapErrorType {
  INVALID_INPUT = 'INVALID_INPUT',
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',
  CAPACITY_EXCEEDED = 'CAPACITY_EXCEEDED',
  BUFFER_TOO_SMALL = 'BUFFER_TOO_SMALL',
  UNSUPPORTED_VAR_COUNT = 'UNSUPPORTED_VAR_COUNT',
}

export class KmapError extends Error {
  constructor(
    public readonly type: KmapErrorType,
    message: string
  ) {
    super(message);
    this.name = 'KmapError';
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: KmapError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(type: KmapErrorType, message: string): Result<T> {
  return { ok: false, error: new KmapError(type, message) };
}
