/**
 * Scheduled post state machine
 *
 * scheduled ──claim──▶ dispatching ──▶ sent
 *     │                     └────────▶ failed
 *     └──cancel──▶ cancelled
 *
 * sent, failed and cancelled are terminal.
 */

import { PostState, TargetResult } from '../database/models';
import { ValidationError } from '../utils/errors';

const validTransitions: Record<PostState, ReadonlySet<PostState>> = {
  scheduled: new Set<PostState>(['dispatching', 'cancelled']),
  dispatching: new Set<PostState>(['sent', 'failed']),
  sent: new Set<PostState>(),
  failed: new Set<PostState>(),
  cancelled: new Set<PostState>(),
};

export function isTerminal(state: PostState): boolean {
  return validTransitions[state].size === 0;
}

export function canTransition(from: PostState, to: PostState): boolean {
  return validTransitions[from].has(to);
}

export function assertTransition(from: PostState, to: PostState): void {
  if (!canTransition(from, to)) {
    throw new ValidationError(
      `Invalid post state transition: ${from} -> ${to}`,
      'INVALID_STATE',
      { from, to },
    );
  }
}

/**
 * Overall post state from per-target results: sent only if every target was sent
 */
export function aggregateState(results: TargetResult[]): 'sent' | 'failed' {
  if (results.length === 0) {
    return 'failed';
  }
  return results.every((result) => result.status === 'sent') ? 'sent' : 'failed';
}
