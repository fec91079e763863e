import { TrialStatus, TRIAL_TRANSITIONS, SessionPhase, SESSION_TRANSITIONS } from './types.js';
import { InvalidTransitionError } from '../errors.js';

/**
 * Validate a trial state transition.
 * Throws if the transition is invalid.
 */
export function transition(current: TrialStatus, target: TrialStatus): TrialStatus {
  const valid = TRIAL_TRANSITIONS[current];
  if (!valid.includes(target)) {
    throw new InvalidTransitionError(
      `Invalid trial transition: ${current} → ${target}. Valid: [${valid.join(', ')}]`
    );
  }
  return target;
}

/**
 * Return all valid next states from the current state.
 */
export function validNext(current: TrialStatus): TrialStatus[] {
  return TRIAL_TRANSITIONS[current];
}

/**
 * Check if a status is terminal (no further transitions possible).
 */
export function isTerminal(status: TrialStatus): boolean {
  return TRIAL_TRANSITIONS[status].length === 0;
}

/**
 * Validate a session phase change.
 */
export function sessionTransition(current: SessionPhase, target: SessionPhase): SessionPhase {
  if (!SESSION_TRANSITIONS[current].includes(target)) {
    throw new InvalidTransitionError(`Invalid session transition: ${current} → ${target}`);
  }
  return target;
}
