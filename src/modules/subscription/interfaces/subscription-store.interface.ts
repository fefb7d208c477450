import { Subscription } from './subscription.interface';

export const SUBSCRIPTION_STORE = Symbol('SUBSCRIPTION_STORE');

export type PutResult =
  | { status: 'ok'; subscription: Subscription }
  | { status: 'conflict' };

export interface SubscriptionStore {
  get(userId: string): Promise<Subscription | null>;

  /**
   * Writes the record if the stored version still equals `subscription.version`
   * (absent for version 0). The returned record carries the new version.
   */
  put(subscription: Subscription): Promise<PutResult>;

  /**
   * All ACTIVE records in userId order. No expiry filter is applied; callers
   * compare `expiresAt` against their own cutoff.
   */
  scanActive(nowCutoff: Date): AsyncIterable<Subscription>;

  /** All records whose group membership is not known to match their state */
  scanUnsynced(): AsyncIterable<Subscription>;
}
