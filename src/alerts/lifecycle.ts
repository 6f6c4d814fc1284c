import type { Alert, AlertStatus } from '../types/index.js';
import { InvalidTransitionError } from '../errors.js';

/**
 * Allowed status changes. OPEN is the only initial state; RESOLVED may still
 * be re-marked as a false positive; FALSE_POSITIVE is final.
 */
export const TRANSITIONS: Readonly<Record<AlertStatus, readonly AlertStatus[]>> = {
  OPEN: ['ACKNOWLEDGED', 'RESOLVED', 'FALSE_POSITIVE'],
  ACKNOWLEDGED: ['RESOLVED', 'FALSE_POSITIVE'],
  RESOLVED: ['FALSE_POSITIVE'],
  FALSE_POSITIVE: [],
};

export function canTransition(from: AlertStatus, to: AlertStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: AlertStatus, to: AlertStatus, alertId?: string): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to, alertId);
}

export function isTerminal(status: AlertStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export type TransitionFields = Pick<
  Alert,
  'status' | 'updatedAt' | 'acknowledgedAt' | 'acknowledgedBy' | 'resolvedAt' | 'resolvedBy' | 'notes'
>;

/** Fields a store writes when moving an alert into `to`. */
export function transitionFields(
  to: AlertStatus,
  actor: string,
  notes: string | undefined,
  at: string,
): Partial<TransitionFields> {
  switch (to) {
    case 'ACKNOWLEDGED':
      return { status: to, updatedAt: at, acknowledgedAt: at, acknowledgedBy: actor };
    case 'RESOLVED':
    case 'FALSE_POSITIVE':
      return {
        status: to,
        updatedAt: at,
        resolvedAt: at,
        resolvedBy: actor,
        ...(notes !== undefined ? { notes } : {}),
      };
    case 'OPEN':
      return { status: to, updatedAt: at };
  }
}
