import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MembershipConfig } from '../../../config/configuration';
import { RetryConfigService } from '../../../common/services/retry-config.service';
import { computeBackoffDelay, delay } from '../../../common/utils/backoff.util';
import { describeError } from '../../../common/utils/error.util';
import { MembershipFailureKind } from '../../subscription/interfaces/subscription.interface';
import { MembershipPlatformError } from '../errors/membership-platform.error';
import {
  GROUP_MEMBERSHIP_PLATFORM,
  GroupMembershipPlatform,
  MembershipResult,
} from '../interfaces/membership.interface';

type MembershipOperation = 'grant' | 'revoke';

/**
 * Grants and revokes group access with a bounded timeout per platform call and
 * bounded exponential backoff for transient failures. Never throws: every
 * outcome is reported as a MembershipResult.
 */
@Injectable()
export class MembershipControllerService {
  private readonly logger = new Logger(MembershipControllerService.name);
  private readonly timeoutMs: number;

  constructor(
    @Inject(GROUP_MEMBERSHIP_PLATFORM) private readonly platform: GroupMembershipPlatform,
    private readonly configService: ConfigService,
    private readonly retryConfigService: RetryConfigService,
  ) {
    this.timeoutMs = this.configService.getOrThrow<MembershipConfig>('config.membership').timeoutMs;
  }

  grant(userId: string): Promise<MembershipResult> {
    return this.execute('grant', userId, (signal) => this.platform.addMember(userId, signal));
  }

  revoke(userId: string): Promise<MembershipResult> {
    return this.execute('revoke', userId, (signal) => this.platform.removeMember(userId, signal));
  }

  private async execute(
    operation: MembershipOperation,
    userId: string,
    call: (signal: AbortSignal) => Promise<void>,
  ): Promise<MembershipResult> {
    const policy = this.retryConfigService.getMembershipConfig();
    const maxAttempts = Math.max(1, policy.maxAttempts);
    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.withTimeout(call, `${operation} for user ${userId}`);

        if (attempt > 1) {
          this.logger.log(`Membership ${operation} for user ${userId} succeeded on attempt ${attempt}`);
        }
        return { ok: true, attempts: attempt };
      } catch (error) {
        const failure = this.classify(error);
        lastReason = failure.message;

        if (failure.kind === MembershipFailureKind.PERMANENT) {
          this.logger.error(`Membership ${operation} for user ${userId} failed permanently: ${failure.message}`);
          return { ok: false, kind: MembershipFailureKind.PERMANENT, reason: failure.message, attempts: attempt };
        }

        if (attempt === maxAttempts) {
          break;
        }

        const backoff = computeBackoffDelay(policy, attempt);
        const requested = Math.max(backoff, failure.retryAfterMs ?? 0);
        const wait = policy.maxDelay !== undefined ? Math.min(requested, policy.maxDelay) : requested;

        this.logger.warn(
          `Membership ${operation} for user ${userId} failed (attempt ${attempt}/${maxAttempts}): ${failure.message}; retrying in ${wait}ms`,
        );
        await delay(wait);
      }
    }

    this.logger.warn(`Membership ${operation} for user ${userId} gave up after ${maxAttempts} attempts: ${lastReason}`);
    return { ok: false, kind: MembershipFailureKind.TRANSIENT, reason: lastReason, attempts: maxAttempts };
  }

  private classify(error: unknown): MembershipPlatformError {
    if (error instanceof MembershipPlatformError) {
      return error;
    }
    // Unclassified errors (network stacks, client bugs) are retried rather than surfaced
    return MembershipPlatformError.transient(describeError(error));
  }

  /**
   * Runs one attempt and aborts it after the configured timeout, so a slow
   * attempt stops issuing requests before the next one starts.
   */
  private withTimeout<T>(call: (signal: AbortSignal) => Promise<T>, label: string): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(MembershipPlatformError.transient(`${label} timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    return Promise.race([call(controller.signal), timeout]).finally(() => clearTimeout(timer));
  }
}
