/**
 * Run state transition table.
 *
 * Idle → Discovering → Extracting → Injecting → Cleanup → Completed → Idle,
 * with Extracting/Injecting/Cleanup repeating once per target. A target that
 * ends before injection (2FA, negative decision, failed extraction) goes
 * straight from Extracting to the next target's Extracting, or to Completed.
 */

import { InvalidTransitionError } from '../core/errors.js';
import { RUN_STATES, type RunState } from '../core/types.js';

export const VALID_RUN_TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  Idle: ['Discovering'],
  Discovering: ['Extracting', 'Completed'],
  Extracting: ['Injecting', 'Extracting', 'Completed'],
  Injecting: ['Cleanup'],
  Cleanup: ['Extracting', 'Completed'],
  Completed: ['Idle'],
};

export function canTransition(from: RunState, to: RunState): boolean {
  return VALID_RUN_TRANSITIONS[from].includes(to);
}

/** Throws InvalidTransitionError for a move the table does not allow. */
export function assertTransition(from: RunState, to: RunState): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
}

export function isRunState(value: string): value is RunState {
  return RUN_STATES.some((s) => s === value);
}
