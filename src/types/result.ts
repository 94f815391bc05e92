/**
 * Result type for expected failures across the planning pipeline.
 *
 * Usage:
 *   - Stages that can fail return Result<T, PlanningFailure>
 *   - Use Result.ok(value) for success
 *   - Use Result.err(failure) for failure
 *   - Check with result.ok before accessing result.value
 *
 * @example
 * function nightsBetween(start: string, end: string): Result<number> {
 *   const range = validateDateRange(start, end);
 *   if (!range.ok) return range;
 *   return Result.ok(Math.max(1, range.value.days - 1));
 * }
 */

export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Result = {
  ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
  },

  err<E = string>(error: E): Result<never, E> {
    return { ok: false, error };
  },

  /**
   * Chain a step that can itself fail.
   */
  andThen<T, U, E>(result: Result<T, E>, fn: (value: T) => Result<U, E>): Result<U, E> {
    return result.ok ? fn(result.value) : result;
  },
};
