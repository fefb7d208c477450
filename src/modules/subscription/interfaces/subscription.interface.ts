export enum SubscriptionState {
  NONE = 'NONE',
  PENDING = 'PENDING',
  ACTIVE = 'ACTIVE',
  EXPIRED = 'EXPIRED',
  CANCELLED = 'CANCELLED',
}

export enum MembershipFailureKind {
  TRANSIENT = 'TRANSIENT',
  PERMANENT = 'PERMANENT',
}

export interface MembershipFailure {
  kind: MembershipFailureKind;
  reason: string;
  attempts: number;
  lastAttemptAt: Date;
}

export interface Subscription {
  userId: string;
  state: SubscriptionState;
  externalPaymentRef?: string;
  expiresAt?: Date;
  lastEventId?: string;
  groupMembershipSynced: boolean;
  membershipFailure?: MembershipFailure;
  customerRef?: string;
  amountPaid?: number;
  currency?: string;
  stateChangedAt: Date;
  createdAt: Date;
  updatedAt: Date;
  /** Version the record was read at; 0 for a record that has never been stored */
  version: number;
}
