/**
 * Result type for explicit error handling.
 *
 * Used where a failure for one input must not abort a batch, e.g. a
 * file whose structure cannot be parsed while its imports still can.
 *
 * @example
 * ```typescript
 * const structure = tryResult(() => analyzer.extractStructure(file, content));
 * if (isOk(structure)) {
 *   console.log(structure.value.length);
 * } else {
 *   logger.warning(structure.error.message);
 * }
 * ```
 */

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Creates a successful Result containing a value
 */
export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

/**
 * Run a throwing function and capture its outcome as a Result.
 * Non-Error throwables are wrapped so `error` is always an Error.
 */
export function tryResult<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn());
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}
