/**
 * Donation Ledger - Result Type
 *
 * A discriminated union type for representing success or failure,
 * used at the storage and crypto boundaries.
 */

// ============================================
// RESULT TYPE
// ============================================

/** Successful result */
export interface Ok<T> {
  ok: true;
  value: T;
}

/** Failed result */
export interface Err<E> {
  ok: false;
  error: E;
}

/** Discriminated union of success or failure */
export type Result<T, E> = Ok<T> | Err<E>;

// ============================================
// CONSTRUCTORS
// ============================================

/** Create a successful result */
export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/** Create a failed result */
export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================
// TYPE GUARDS
// ============================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.ok === false;
}

// ============================================
// UTILITY FUNCTIONS
// ============================================

/** Unwrap a result, throwing if error */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw new Error(`Unwrap called on error result: ${JSON.stringify(result.error)}`);
}

/** Map over an error result */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  if (result.ok) {
    return result;
  }
  return err(fn(result.error));
}

/** Try to execute a function, mapping any thrown value */
export function tryCatch<T, E>(
  fn: () => T,
  errorMapper: (e: unknown) => E
): Result<T, E> {
  try {
    return ok(fn());
  } catch (e) {
    return err(errorMapper(e));
  }
}

/** Async version of tryCatch */
export async function tryCatchAsync<T, E>(
  fn: () => Promise<T>,
  errorMapper: (e: unknown) => E
): Promise<Result<T, E>> {
  try {
    return ok(await fn());
  } catch (e) {
    return err(errorMapper(e));
  }
}
