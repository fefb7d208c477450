import { Injectable, Logger } from '@nestjs/common';
import {
  EntityManager,
  FilterQuery,
  QueryOrder,
  UniqueConstraintViolationException,
} from '@mikro-orm/core';
import { SubscriptionEntity } from '../entities/subscription.entity';
import { Subscription, SubscriptionState } from '../interfaces/subscription.interface';
import { PutResult, SubscriptionStore } from '../interfaces/subscription-store.interface';
import { toRow, toSubscription } from './subscription.mapper';

export const SCAN_BATCH_SIZE = 100;

@Injectable()
export class MikroOrmSubscriptionStore implements SubscriptionStore {
  private readonly logger = new Logger(MikroOrmSubscriptionStore.name);

  constructor(private readonly em: EntityManager) {}

  async get(userId: string): Promise<Subscription | null> {
    const entity = await this.em.fork().findOne(SubscriptionEntity, { userId });
    return entity ? toSubscription(entity) : null;
  }

  async put(subscription: Subscription): Promise<PutResult> {
    const em = this.em.fork();
    const nextVersion = subscription.version + 1;
    const row = toRow(subscription, nextVersion);

    if (subscription.version === 0) {
      try {
        await em.insert(SubscriptionEntity, row);
      } catch (error) {
        if (error instanceof UniqueConstraintViolationException) {
          this.logger.debug(`Insert conflict for user ${subscription.userId}`);
          return { status: 'conflict' };
        }
        throw error;
      }
    } else {
      const { userId, ...changes } = row;
      const affected = await em.nativeUpdate(
        SubscriptionEntity,
        { userId, version: subscription.version },
        changes,
      );

      if (affected === 0) {
        this.logger.debug(`Version conflict for user ${userId} at version ${subscription.version}`);
        return { status: 'conflict' };
      }
    }

    return { status: 'ok', subscription: { ...subscription, version: nextVersion } };
  }

  async *scanActive(nowCutoff: Date): AsyncIterable<Subscription> {
    this.logger.debug(`Scanning ACTIVE subscriptions for sweep at ${nowCutoff.toISOString()}`);
    yield* this.scan((cursor) =>
      cursor === undefined
        ? { state: SubscriptionState.ACTIVE }
        : { state: SubscriptionState.ACTIVE, userId: { $gt: cursor } },
    );
  }

  async *scanUnsynced(): AsyncIterable<Subscription> {
    yield* this.scan((cursor) =>
      cursor === undefined
        ? { groupMembershipSynced: false }
        : { groupMembershipSynced: false, userId: { $gt: cursor } },
    );
  }

  /**
   * Keyset pagination on userId: each page is a fresh query, so rows written
   * during the scan never shift the cursor.
   */
  private async *scan(
    where: (cursor: string | undefined) => FilterQuery<SubscriptionEntity>,
  ): AsyncIterable<Subscription> {
    let cursor: string | undefined;

    for (;;) {
      const batch = await this.em.fork().find(SubscriptionEntity, where(cursor), {
        orderBy: { userId: QueryOrder.ASC },
        limit: SCAN_BATCH_SIZE,
      });

      for (const entity of batch) {
        yield toSubscription(entity);
      }

      if (batch.length < SCAN_BATCH_SIZE) {
        return;
      }
      cursor = batch[batch.length - 1].userId;
    }
  }
}
