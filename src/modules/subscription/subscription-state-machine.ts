import { Subscription, SubscriptionState } from './interfaces/subscription.interface';

export type MembershipAction = 'grant' | 'revoke';

const ALLOWED_TRANSITIONS: Readonly<Record<SubscriptionState, readonly SubscriptionState[]>> = {
  [SubscriptionState.NONE]: [SubscriptionState.PENDING, SubscriptionState.ACTIVE, SubscriptionState.CANCELLED],
  [SubscriptionState.PENDING]: [SubscriptionState.ACTIVE, SubscriptionState.CANCELLED],
  [SubscriptionState.ACTIVE]: [SubscriptionState.EXPIRED],
  // A new payment cycle reopens a terminal record; stale replays are filtered before this check
  [SubscriptionState.EXPIRED]: [SubscriptionState.PENDING, SubscriptionState.ACTIVE],
  [SubscriptionState.CANCELLED]: [SubscriptionState.PENDING, SubscriptionState.ACTIVE],
};

export class InvalidTransitionError extends Error {
  constructor(
    readonly userId: string,
    readonly from: SubscriptionState,
    readonly to: SubscriptionState,
  ) {
    super(`Invalid subscription transition for user ${userId}: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export function isTransitionAllowed(from: SubscriptionState, to: SubscriptionState): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(current: Subscription, next: Subscription): void {
  if (!isTransitionAllowed(current.state, next.state)) {
    throw new InvalidTransitionError(current.userId, current.state, next.state);
  }

  if (next.state === SubscriptionState.ACTIVE && current.state !== SubscriptionState.ACTIVE) {
    if (!next.expiresAt || next.expiresAt.getTime() <= next.updatedAt.getTime()) {
      throw new Error(`Subscription for user ${next.userId} cannot become ACTIVE without a future expiry`);
    }
  }
}

export function isTerminal(state: SubscriptionState): boolean {
  return state === SubscriptionState.EXPIRED || state === SubscriptionState.CANCELLED;
}

/**
 * Membership the platform should reflect for a state: only ACTIVE users belong in the group.
 */
export function desiredMembershipAction(state: SubscriptionState): MembershipAction {
  return state === SubscriptionState.ACTIVE ? 'grant' : 'revoke';
}

export function newSubscription(userId: string, now: Date): Subscription {
  return {
    userId,
    state: SubscriptionState.NONE,
    groupMembershipSynced: true,
    stateChangedAt: now,
    createdAt: now,
    updatedAt: now,
    version: 0,
  };
}
