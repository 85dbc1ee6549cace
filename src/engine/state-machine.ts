/**
 * Build phase sequencer state machine.
 *
 * Enforces valid sequencer transitions, producing typed errors on
 * invalid ones.
 */

import { SequencerState, VALID_SEQUENCER_TRANSITIONS } from '../domain/run';
import { TypedError, invalidTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a sequencer state transition. */
export function transitionSequencerState(
  current: SequencerState,
  target: SequencerState,
): TransitionResult<SequencerState> {
  const validTargets = VALID_SEQUENCER_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return { success: false, error: invalidTransitionError(current, target, validTargets) };
  }
  return { success: true, newStatus: target };
}

