/**
 * Mitigation action lifecycle.
 *
 *   monitor         → applied         (terminal at creation)
 *   block / disable → pending_review → resolved
 */

import { MitigationState, VALID_MITIGATION_TRANSITIONS } from '../domain/mitigation';
import { createTypedError } from '../domain/errors';
import { Result, fail, ok } from '../domain/result';

export function transitionMitigationState(
  current: MitigationState,
  target: MitigationState,
): Result<MitigationState> {
  const allowed = VALID_MITIGATION_TRANSITIONS[current];
  if (allowed.includes(target)) return ok(target);

  return fail(
    createTypedError({
      code: 'MITIGATION.INVALID_TRANSITION',
      message: `Invalid mitigation state transition: ${current} -> ${target}`,
      details: { current, target, allowed },
    }),
  );
}

/** No transition leaves a terminal state. */
export function isTerminalMitigationState(state: MitigationState): boolean {
  return VALID_MITIGATION_TRANSITIONS[state].length === 0;
}
