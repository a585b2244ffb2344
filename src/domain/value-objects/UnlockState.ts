/**
 * Lifecycle of one remote torrent inside the unlock service
 * Strictly forward-only; `failed` is reachable from any state
 */

import type { ResolutionErrorCode } from '../errors';

export type UnlockPhase =
  | 'idle'
  | 'registered'
  | 'metadata-ready'
  | 'file-selected'
  | 'links-ready'
  | 'unrestricted';

export type UnlockState =
  | { phase: UnlockPhase }
  | { phase: 'failed'; from: UnlockPhase; reason: ResolutionErrorCode };

const PHASE_ORDER: readonly UnlockPhase[] = [
  'idle',
  'registered',
  'metadata-ready',
  'file-selected',
  'links-ready',
  'unrestricted'
];

export type FailedUnlockState = Extract<UnlockState, { phase: 'failed' }>;

export const INITIAL_UNLOCK_STATE: UnlockState = { phase: 'idle' };

/**
 * Moves to the next phase
 * @throws Error when `next` is not the immediate successor of the current phase
 */
export function advance(state: UnlockState, next: UnlockPhase): UnlockState {
  if (state.phase === 'failed') {
    throw new Error(`Cannot advance to ${next}: unlock already failed (${state.reason})`);
  }

  const current = PHASE_ORDER.indexOf(state.phase);
  if (PHASE_ORDER.indexOf(next) !== current + 1) {
    throw new Error(`Illegal unlock transition ${state.phase} -> ${next}`);
  }

  return { phase: next };
}

/**
 * Records the failure and the last phase reached; the first failure is kept
 */
export function fail(state: UnlockState, reason: ResolutionErrorCode): FailedUnlockState {
  if (state.phase === 'failed') {
    return state;
  }
  return { phase: 'failed', from: state.phase, reason };
}
