import { InvalidTransitionError } from '../errors';
import type { CreditStatus } from '../types/dmrv';

export type TransitionTrigger = 'automatic' | 'manual';

/** Outcomes `verify` may apply from each status. Self-loops are re-verification. */
const AUTOMATIC_TRANSITIONS: Record<CreditStatus, readonly CreditStatus[]> = {
  PENDING: ['PENDING', 'VERIFIED', 'FLAGGED'],
  VERIFIED: ['VERIFIED', 'FLAGGED'],
  FLAGGED: ['FLAGGED'],
  SUBMITTED: [],
};

/** Targets an operator may move a credit to with `updateStatus`. */
const MANUAL_TRANSITIONS: Record<CreditStatus, readonly CreditStatus[]> = {
  PENDING: ['FLAGGED'],
  VERIFIED: ['SUBMITTED', 'FLAGGED'],
  FLAGGED: ['PENDING'],
  SUBMITTED: ['FLAGGED'],
};

export function canVerify(from: CreditStatus): boolean {
  return AUTOMATIC_TRANSITIONS[from].length > 0;
}

export function isAllowedTransition(
  from: CreditStatus,
  to: CreditStatus,
  trigger: TransitionTrigger,
): boolean {
  const table = trigger === 'automatic' ? AUTOMATIC_TRANSITIONS : MANUAL_TRANSITIONS;
  return table[from].includes(to);
}

export function assertVerifiable(from: CreditStatus): void {
  if (!canVerify(from)) {
    throw new InvalidTransitionError(
      from,
      null,
      `Credit in status ${from} cannot be re-verified; use a manual status update`,
    );
  }
}

export function assertTransition(
  from: CreditStatus,
  to: CreditStatus,
  trigger: TransitionTrigger,
): void {
  if (isAllowedTransition(from, to, trigger)) return;

  const allowed = (trigger === 'automatic' ? AUTOMATIC_TRANSITIONS : MANUAL_TRANSITIONS)[from];
  throw new InvalidTransitionError(
    from,
    to,
    `${trigger === 'manual' ? 'Manual' : 'Automatic'} transition ${from} -> ${to} is not allowed` +
      (allowed.length ? ` (allowed: ${allowed.join(', ')})` : ''),
  );
}
