import { MembershipFailure, Subscription } from '../interfaces/subscription.interface';
import { MembershipFailureColumn, SubscriptionEntity } from '../entities/subscription.entity';

const toFailure = (column: MembershipFailureColumn | null | undefined): MembershipFailure | undefined =>
  column
    ? {
        kind: column.kind,
        reason: column.reason,
        attempts: column.attempts,
        lastAttemptAt: new Date(column.lastAttemptAt),
      }
    : undefined;

const toFailureColumn = (failure: MembershipFailure | undefined): MembershipFailureColumn | undefined =>
  failure
    ? {
        kind: failure.kind,
        reason: failure.reason,
        attempts: failure.attempts,
        lastAttemptAt: failure.lastAttemptAt.toISOString(),
      }
    : undefined;

export function toSubscription(entity: SubscriptionEntity): Subscription {
  return {
    userId: entity.userId,
    state: entity.state,
    externalPaymentRef: entity.externalPaymentRef ?? undefined,
    expiresAt: entity.expiresAt ?? undefined,
    lastEventId: entity.lastEventId ?? undefined,
    groupMembershipSynced: entity.groupMembershipSynced,
    membershipFailure: toFailure(entity.membershipFailure),
    customerRef: entity.customerRef ?? undefined,
    amountPaid: entity.amountPaid === undefined || entity.amountPaid === null ? undefined : Number(entity.amountPaid),
    currency: entity.currency ?? undefined,
    stateChangedAt: entity.stateChangedAt,
    createdAt: entity.createdAt,
    updatedAt: entity.updatedAt,
    version: entity.version,
  };
}

/**
 * Column values for a write. Absent optionals become null so an update clears them.
 */
export function toRow(subscription: Subscription, version: number) {
  return {
    userId: subscription.userId,
    state: subscription.state,
    externalPaymentRef: subscription.externalPaymentRef ?? null,
    expiresAt: subscription.expiresAt ?? null,
    lastEventId: subscription.lastEventId ?? null,
    groupMembershipSynced: subscription.groupMembershipSynced,
    membershipFailure: toFailureColumn(subscription.membershipFailure) ?? null,
    customerRef: subscription.customerRef ?? null,
    amountPaid: subscription.amountPaid ?? null,
    currency: subscription.currency ?? null,
    stateChangedAt: subscription.stateChangedAt,
    createdAt: subscription.createdAt,
    updatedAt: subscription.updatedAt,
    version,
  };
}
