/**
 * Stage outcome model and the fail-fast combinator.
 */

import { TypedError } from './errors';

/** Result of a stage: a value on success, a typed error on failure. */
export type StageOutcome<T> =
  | { success: true; value: T }
  | { success: false; error: TypedError };

export function succeed<T>(value: T): StageOutcome<T> {
  return { success: true, value };
}

export function fail<T = never>(error: TypedError): StageOutcome<T> {
  return { success: false, error };
}

/**
 * Chain a stage onto a previous outcome. The next stage runs only when the
 * previous one succeeded; a failure is forwarded unchanged.
 */
export async function andThen<T, U>(
  outcome: StageOutcome<T> | Promise<StageOutcome<T>>,
  next: (value: T) => StageOutcome<U> | Promise<StageOutcome<U>>,
): Promise<StageOutcome<U>> {
  const resolved = await outcome;
  if (!resolved.success) return resolved;
  return next(resolved.value);
}

/** Run outcome-producing steps in order, halting at the first failure. */
export async function sequence(
  steps: ReadonlyArray<() => StageOutcome<unknown> | Promise<StageOutcome<unknown>>>,
): Promise<StageOutcome<void>> {
  for (const step of steps) {
    const outcome = await step();
    if (!outcome.success) return outcome;
  }
  return succeed(undefined);
}
