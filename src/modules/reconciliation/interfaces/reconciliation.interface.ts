import { PaymentRejectionReason } from '../../payment/interfaces/payment-event.interface';
import { MembershipResult } from '../../membership/interfaces/membership.interface';
import { Subscription, SubscriptionState } from '../../subscription/interfaces/subscription.interface';

export type ApplyStatus = 'applied' | 'duplicate' | 'stale';

export interface ApplyOutcome {
  status: ApplyStatus;
  subscription: Subscription | null;
  membership?: MembershipResult;
  detail?: string;
}

export type NotificationOutcome =
  | {
      accepted: true;
      status: ApplyStatus | 'ignored';
      eventId?: string;
      userId?: string;
      state?: SubscriptionState;
      membershipSynced?: boolean;
      detail?: string;
    }
  | {
      accepted: false;
      reason: PaymentRejectionReason;
      message: string;
      eventId?: string;
    };

export interface SweepResult {
  /** Records whose expiry or compensation completed with membership in sync */
  processed: number;
  /** Records whose membership action or store write failed this tick */
  failed: number;
  expired: number;
  compensated: number;
  permanentFailures: string[];
}
