import {
  NormalizedPaymentEvent,
  PaymentEventKind,
} from '../payment/interfaces/payment-event.interface';
import { Subscription, SubscriptionState } from '../subscription/interfaces/subscription.interface';
import {
  MembershipAction,
  desiredMembershipAction,
  isTerminal,
  newSubscription,
} from '../subscription/subscription-state-machine';

export type SkipReason = 'duplicate' | 'stale';

type WriteDecision = Extract<EventDecision, { type: 'write' }>;

export type EventDecision =
  | { type: 'skip'; reason: SkipReason; detail: string; current: Subscription | null }
  | {
      type: 'write';
      current: Subscription;
      next: Subscription;
      /** Membership call owed once `next` is stored */
      action?: MembershipAction;
    };

const skip = (reason: SkipReason, detail: string, current: Subscription | null): EventDecision => ({
  type: 'skip',
  reason,
  detail,
  current,
});

/**
 * Record the event id without touching state or membership, so a redelivery
 * is recognised as a duplicate.
 */
const acknowledge = (current: Subscription, event: NormalizedPaymentEvent, now: Date): WriteDecision => ({
  type: 'write',
  current,
  next: { ...current, lastEventId: event.eventId, updatedAt: now },
});

/**
 * Enter `state`, owing the membership action the new state desires.
 */
const enter = (
  current: Subscription,
  event: NormalizedPaymentEvent,
  now: Date,
  state: SubscriptionState,
  changes: Partial<Subscription> = {},
): EventDecision => ({
  type: 'write',
  current,
  next: {
    ...current,
    ...changes,
    state,
    externalPaymentRef: event.payload.externalPaymentRef,
    lastEventId: event.eventId,
    groupMembershipSynced: false,
    membershipFailure: undefined,
    stateChangedAt: now,
    updatedAt: now,
  },
  action: desiredMembershipAction(state),
});

const paymentDetails = (event: NormalizedPaymentEvent): Partial<Subscription> => ({
  customerRef: event.payload.customerRef,
  amountPaid: event.payload.amountPaid,
  currency: event.payload.currency,
});

/**
 * Whether a completion happened before the record reached its terminal state.
 * A record that lapsed at its expiry only rejects payments older than its
 * last paid period, so a renewal paid before the sweep ran still counts.
 */
function predatesTerminal(current: Subscription, event: NormalizedPaymentEvent, periodMs: number): boolean {
  const lapsedAt = lapsedExpiry(current);
  const cutoff = lapsedAt === undefined ? current.stateChangedAt.getTime() : lapsedAt - periodMs;
  return event.occurredAt.getTime() < cutoff;
}

const lapsedExpiry = (current: Subscription): number | undefined =>
  current.state === SubscriptionState.EXPIRED &&
  current.expiresAt !== undefined &&
  current.expiresAt.getTime() <= current.stateChangedAt.getTime()
    ? current.expiresAt.getTime()
    : undefined;

function decideCompleted(
  current: Subscription,
  event: NormalizedPaymentEvent,
  now: Date,
  periodMs: number,
  sameRef: boolean,
  predatesState: boolean,
): EventDecision {
  if (current.state === SubscriptionState.ACTIVE && sameRef) {
    // Same payment reported twice (checkout plus its first invoice): no second extension
    return {
      ...acknowledge(current, event, now),
      action: current.groupMembershipSynced ? undefined : 'grant',
    };
  }

  // An earlier payment redelivered after a later one was applied was already counted
  if (current.state === SubscriptionState.ACTIVE && predatesState) {
    return skip(
      'stale',
      `completion for ${event.payload.externalPaymentRef} predates the current ACTIVE cycle`,
      current,
    );
  }

  if (isTerminal(current.state) && (sameRef || predatesTerminal(current, event, periodMs))) {
    return skip(
      'stale',
      `completion for ${event.payload.externalPaymentRef} cannot reopen ${current.state} subscription`,
      current,
    );
  }

  const extendsFrom = current.state === SubscriptionState.ACTIVE
    ? current.expiresAt?.getTime()
    : lapsedExpiry(current);
  const base = extendsFrom === undefined
    ? event.occurredAt.getTime()
    : Math.max(extendsFrom, event.occurredAt.getTime());
  const expiresAt = new Date(base + periodMs);

  if (expiresAt.getTime() <= now.getTime()) {
    return skip('stale', `payment period for ${event.payload.externalPaymentRef} already elapsed`, current);
  }

  return enter(current, event, now, SubscriptionState.ACTIVE, { ...paymentDetails(event), expiresAt });
}

function decideFailed(
  current: Subscription,
  event: NormalizedPaymentEvent,
  now: Date,
  sameRef: boolean,
  predatesState: boolean,
): EventDecision {
  if (isTerminal(current.state)) {
    return acknowledge(current, event, now);
  }

  if (current.state !== SubscriptionState.NONE && !sameRef && predatesState) {
    return skip(
      'stale',
      `failure for ${event.payload.externalPaymentRef} predates the current ${current.state} cycle`,
      current,
    );
  }

  // A renewal failure ends paid access; a failure before first activation cancels
  const target = current.state === SubscriptionState.ACTIVE
    ? SubscriptionState.EXPIRED
    : SubscriptionState.CANCELLED;
  return enter(current, event, now, target);
}

function decidePending(
  current: Subscription,
  event: NormalizedPaymentEvent,
  now: Date,
  sameRef: boolean,
  predatesState: boolean,
): EventDecision {
  switch (current.state) {
    case SubscriptionState.ACTIVE:
      return acknowledge(current, event, now);

    case SubscriptionState.NONE:
      return {
        type: 'write',
        current,
        next: {
          ...current,
          state: SubscriptionState.PENDING,
          externalPaymentRef: event.payload.externalPaymentRef,
          customerRef: event.payload.customerRef,
          lastEventId: event.eventId,
          stateChangedAt: now,
          updatedAt: now,
        },
      };

    case SubscriptionState.PENDING:
      if (sameRef) {
        return acknowledge(current, event, now);
      }
      if (predatesState) {
        return skip('stale', `pending checkout ${event.payload.externalPaymentRef} was superseded`, current);
      }
      return {
        type: 'write',
        current,
        next: {
          ...current,
          externalPaymentRef: event.payload.externalPaymentRef,
          customerRef: event.payload.customerRef,
          lastEventId: event.eventId,
          updatedAt: now,
        },
      };

    default:
      if (sameRef || predatesState) {
        return skip(
          'stale',
          `pending checkout ${event.payload.externalPaymentRef} cannot reopen ${current.state} subscription`,
          current,
        );
      }
      // Revocation may still be owed from the terminal state, so the sync flag carries over
      return {
        type: 'write',
        current,
        next: {
          ...current,
          state: SubscriptionState.PENDING,
          externalPaymentRef: event.payload.externalPaymentRef,
          customerRef: event.payload.customerRef,
          lastEventId: event.eventId,
          stateChangedAt: now,
          updatedAt: now,
        },
      };
  }
}

/**
 * Decide how a payment event changes the subscription it correlates to.
 *
 * Pure: the caller reads `stored`, writes `next` with a version check and
 * recomputes from a fresh read when the write conflicts.
 */
export function decideEventTransition(
  stored: Subscription | null,
  event: NormalizedPaymentEvent,
  now: Date,
  periodMs: number,
): EventDecision {
  if (stored && stored.lastEventId === event.eventId) {
    return skip('duplicate', `event ${event.eventId} already applied`, stored);
  }

  const current = stored ?? newSubscription(event.userId, now);
  const sameRef = current.externalPaymentRef === event.payload.externalPaymentRef;
  const predatesState = current.version > 0 && event.occurredAt.getTime() < current.stateChangedAt.getTime();

  switch (event.kind) {
    case PaymentEventKind.PAYMENT_COMPLETED:
      return decideCompleted(current, event, now, periodMs, sameRef, predatesState);
    case PaymentEventKind.PAYMENT_FAILED:
      return decideFailed(current, event, now, sameRef, predatesState);
    case PaymentEventKind.PAYMENT_PENDING:
      return decidePending(current, event, now, sameRef, predatesState);
  }
}

/**
 * Sweep expiry for one record, or null when it is not due. Only ACTIVE
 * records expire; the grace period delays expiry past `expiresAt`.
 */
export function decideSweepExpiry(current: Subscription, now: Date, graceMs: number): Subscription | null {
  if (current.state !== SubscriptionState.ACTIVE || !current.expiresAt) {
    return null;
  }

  if (current.expiresAt.getTime() + graceMs > now.getTime()) {
    return null;
  }

  return {
    ...current,
    state: SubscriptionState.EXPIRED,
    groupMembershipSynced: false,
    membershipFailure: undefined,
    stateChangedAt: now,
    updatedAt: now,
  };
}
