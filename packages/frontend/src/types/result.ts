/**
 * Result type for stage-by-stage error propagation
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

export const mapError = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> => (result.ok ? result : error(fn(result.error)));

export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => (result.ok ? fn(result.value) : result);

/**
 * Run `fn` over each item in order, stopping at the first failure.
 */
export const traverse = <T, U, E>(
  items: readonly T[],
  fn: (item: T, index: number) => Result<U, E>
): Result<readonly U[], E> => {
  const values: U[] = [];
  for (const [index, item] of items.entries()) {
    const result = fn(item, index);
    if (!result.ok) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
};
