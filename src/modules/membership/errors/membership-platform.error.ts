import { MembershipFailureKind } from '../../subscription/interfaces/subscription.interface';

export class MembershipPlatformError extends Error {
  constructor(
    readonly kind: MembershipFailureKind,
    message: string,
    /** Platform-requested wait before the next attempt, in milliseconds */
    readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'MembershipPlatformError';
  }

  static transient(message: string, retryAfterMs?: number): MembershipPlatformError {
    return new MembershipPlatformError(MembershipFailureKind.TRANSIENT, message, retryAfterMs);
  }

  static permanent(message: string): MembershipPlatformError {
    return new MembershipPlatformError(MembershipFailureKind.PERMANENT, message);
  }
}
