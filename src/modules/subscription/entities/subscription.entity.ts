import { Entity, Enum, Index, PrimaryKey, Property } from '@mikro-orm/core';
import { MembershipFailureKind, SubscriptionState } from '../interfaces/subscription.interface';

export interface MembershipFailureColumn {
  kind: MembershipFailureKind;
  reason: string;
  attempts: number;
  lastAttemptAt: string;
}

@Entity({ tableName: 'subscriptions' })
@Index({ properties: ['state', 'userId'] })
@Index({ properties: ['groupMembershipSynced', 'userId'] })
export class SubscriptionEntity {
  @PrimaryKey({ type: 'string', length: 64 })
  userId!: string; // 支付用户的 Telegram ID

  @Enum({ items: () => SubscriptionState })
  state!: SubscriptionState;

  @Property({ type: 'string', length: 255, nullable: true })
  externalPaymentRef?: string | null; // checkout session / invoice ID

  @Property({ type: 'Date', columnType: 'timestamptz', nullable: true })
  expiresAt?: Date | null;

  @Property({ type: 'string', length: 255, nullable: true })
  lastEventId?: string | null; // 最近一次应用的 Stripe 事件

  @Property({ type: 'boolean' })
  groupMembershipSynced!: boolean;

  @Property({ type: 'json', nullable: true })
  membershipFailure?: MembershipFailureColumn | null;

  @Property({ type: 'string', length: 255, nullable: true })
  customerRef?: string | null;

  @Property({ type: 'float', nullable: true })
  amountPaid?: number | null;

  @Property({ type: 'string', length: 3, nullable: true })
  currency?: string | null;

  @Property({ type: 'Date', columnType: 'timestamptz' })
  stateChangedAt!: Date;

  @Property({ type: 'Date', columnType: 'timestamptz' })
  createdAt!: Date;

  @Property({ type: 'Date', columnType: 'timestamptz' })
  updatedAt!: Date;

  @Property({ type: 'integer' })
  version!: number; // 乐观锁版本号，由 store 显式校验
}
