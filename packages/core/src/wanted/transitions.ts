/**
 * Wanted item state machine.
 *
 * `availableTransitions` is the read-side view of the table below; the
 * write side re-checks the same rules inside each guarded statement.
 *
 * | status    | poster                | claimer       | other  |
 * |-----------|-----------------------|---------------|--------|
 * | open      | claim, delete         | claim         | claim  |
 * | claimed   | unclaim               | unclaim, done | -      |
 * | in_review | accept, reject, close | -             | -      |
 */

import type { Transition, WantedItem, WantedStatus } from './wanted.types';
import { TRANSITIONS } from './wanted.types';

export type TransitionRule = {
  from: WantedStatus;
  to: WantedStatus;
};

export const TRANSITION_RULES: Readonly<Record<Transition | 'update', TransitionRule>> = {
  claim: { from: 'open', to: 'claimed' },
  unclaim: { from: 'claimed', to: 'open' },
  done: { from: 'claimed', to: 'in_review' },
  accept: { from: 'in_review', to: 'completed' },
  reject: { from: 'in_review', to: 'claimed' },
  close: { from: 'in_review', to: 'completed' },
  delete: { from: 'open', to: 'withdrawn' },
  update: { from: 'open', to: 'open' },
};

export function isTerminal(status: WantedStatus): boolean {
  return status === 'completed' || status === 'withdrawn';
}

type RoleCheck = (item: Pick<WantedItem, 'postedBy' | 'claimedBy'>, actor: string) => boolean;

const isPoster: RoleCheck = (item, actor) => item.postedBy === actor;
const isClaimer: RoleCheck = (item, actor) => item.claimedBy !== null && item.claimedBy === actor;
const anyone: RoleCheck = () => true;

const ROLE_GATES: Readonly<Record<Transition, RoleCheck>> = {
  claim: anyone,
  unclaim: (item, actor) => isPoster(item, actor) || isClaimer(item, actor),
  done: isClaimer,
  // A rig cannot stamp its own completion.
  accept: (item, actor) => isPoster(item, actor) && !isClaimer(item, actor),
  reject: isPoster,
  close: isPoster,
  delete: isPoster,
};

/**
 * Transitions `actor` may perform on `item` right now, in display order.
 * Pure: depends only on status, postedBy, claimedBy and actor.
 */
export function availableTransitions(
  item: Pick<WantedItem, 'status' | 'postedBy' | 'claimedBy'>,
  actor: string
): Transition[] {
  if (isTerminal(item.status)) return [];
  return TRANSITIONS.filter(transition =>
    TRANSITION_RULES[transition].from === item.status && ROLE_GATES[transition](item, actor)
  );
}

/**
 * Single transition leading from one status to another, if any.
 * in_review to completed is ambiguous (accept or close); `stamped`
 * decides it.
 */
export function transitionBetween(from: WantedStatus, to: WantedStatus, stamped: boolean): Transition | null {
  if (from === 'in_review' && to === 'completed') {
    return stamped ? 'accept' : 'close';
  }
  const match = TRANSITIONS.find(transition => {
    const rule = TRANSITION_RULES[transition];
    return rule.from === from && rule.to === to;
  });
  return match ?? null;
}

/**
 * Shortest sequence of transitions from one status to another.
 * Empty when the statuses are equal or the target is unreachable.
 */
export function transitionPath(from: WantedStatus, to: WantedStatus, stamped: boolean): Transition[] {
  if (from === to) return [];
  const visited = new Set<WantedStatus>([from]);
  let frontier: Array<{ status: WantedStatus; path: Transition[] }> = [{ status: from, path: [] }];

  while (frontier.length > 0) {
    const next: Array<{ status: WantedStatus; path: Transition[] }> = [];
    for (const { status, path } of frontier) {
      for (const transition of TRANSITIONS) {
        const rule = TRANSITION_RULES[transition];
        if (rule.from !== status || visited.has(rule.to)) continue;
        const hop = rule.to === to ? transitionBetween(status, to, stamped) ?? transition : transition;
        const candidate = [...path, hop];
        if (rule.to === to) return candidate;
        visited.add(rule.to);
        next.push({ status: rule.to, path: candidate });
      }
    }
    frontier = next;
  }
  return [];
}
