import { Injectable } from '@nestjs/common';
import { Subscription, SubscriptionState } from '../interfaces/subscription.interface';
import { PutResult, SubscriptionStore } from '../interfaces/subscription-store.interface';

const clone = (subscription: Subscription): Subscription => ({
  ...subscription,
  expiresAt: subscription.expiresAt ? new Date(subscription.expiresAt) : undefined,
  membershipFailure: subscription.membershipFailure
    ? { ...subscription.membershipFailure, lastAttemptAt: new Date(subscription.membershipFailure.lastAttemptAt) }
    : undefined,
  stateChangedAt: new Date(subscription.stateChangedAt),
  createdAt: new Date(subscription.createdAt),
  updatedAt: new Date(subscription.updatedAt),
});

/**
 * Process-local store with the same version semantics as the database store.
 * Records are copied on every read and write so callers never share state.
 */
@Injectable()
export class InMemorySubscriptionStore implements SubscriptionStore {
  private readonly records = new Map<string, Subscription>();

  async get(userId: string): Promise<Subscription | null> {
    const record = this.records.get(userId);
    return record ? clone(record) : null;
  }

  async put(subscription: Subscription): Promise<PutResult> {
    const stored = this.records.get(subscription.userId);
    const storedVersion = stored ? stored.version : 0;

    if (storedVersion !== subscription.version) {
      return { status: 'conflict' };
    }

    const written = clone({ ...subscription, version: subscription.version + 1 });
    this.records.set(written.userId, written);
    return { status: 'ok', subscription: clone(written) };
  }

  async *scanActive(_nowCutoff: Date): AsyncIterable<Subscription> {
    yield* this.scan((record) => record.state === SubscriptionState.ACTIVE);
  }

  async *scanUnsynced(): AsyncIterable<Subscription> {
    yield* this.scan((record) => !record.groupMembershipSynced);
  }

  private async *scan(matches: (record: Subscription) => boolean): AsyncIterable<Subscription> {
    const userIds = [...this.records.keys()].sort();
    for (const userId of userIds) {
      const record = this.records.get(userId);
      if (record && matches(record)) {
        yield clone(record);
      }
    }
  }
}
