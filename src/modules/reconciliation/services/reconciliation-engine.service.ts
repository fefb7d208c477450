import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ReconciliationConfig } from '../../../config/configuration';
import { RetryConfigService } from '../../../common/services/retry-config.service';
import { computeBackoffDelay, delay } from '../../../common/utils/backoff.util';
import { describeError, errorStack } from '../../../common/utils/error.util';
import { MembershipResult } from '../../membership/interfaces/membership.interface';
import { MembershipControllerService } from '../../membership/services/membership-controller.service';
import {
  NormalizedPaymentEvent,
  PaymentRejectionReason,
} from '../../payment/interfaces/payment-event.interface';
import { PaymentEventNormalizerService } from '../../payment/services/payment-event-normalizer.service';
import {
  MembershipFailureKind,
  Subscription,
} from '../../subscription/interfaces/subscription.interface';
import {
  PutResult,
  SUBSCRIPTION_STORE,
  SubscriptionStore,
} from '../../subscription/interfaces/subscription-store.interface';
import {
  MembershipAction,
  assertTransition,
  desiredMembershipAction,
} from '../../subscription/subscription-state-machine';
import {
  ApplyOutcome,
  NotificationOutcome,
  SweepResult,
} from '../interfaces/reconciliation.interface';
import { TransientDownstreamFailure } from '../reconciliation.errors';
import { decideEventTransition, decideSweepExpiry } from '../subscription-transitions';

type Attempt<T> = { conflict: true } | { conflict: false; value: T };

const CONFLICT = { conflict: true } as const;
const done = <T>(value: T): Attempt<T> => ({ conflict: false, value });

/**
 * Applies payment events and sweep ticks to subscriptions and drives group
 * membership to match.
 *
 * Every write is a read-modify-write against the store's version check; a
 * conflict means another event or sweep got there first, so the decision is
 * recomputed from a fresh read. Membership calls happen only after the state
 * they serve is stored, and their outcome is recorded through the same loop.
 */
@Injectable()
export class ReconciliationEngineService {
  private readonly logger = new Logger(ReconciliationEngineService.name);
  private readonly config: ReconciliationConfig;

  constructor(
    @Inject(SUBSCRIPTION_STORE) private readonly store: SubscriptionStore,
    private readonly normalizer: PaymentEventNormalizerService,
    private readonly membership: MembershipControllerService,
    private readonly retryConfigService: RetryConfigService,
    private readonly configService: ConfigService,
  ) {
    this.config = this.configService.getOrThrow<ReconciliationConfig>('config.reconciliation');
  }

  /**
   * Entry point for the webhook transport. Verification and correlation
   * failures are rejected here; everything authenticated is acknowledged
   * unless the store is unavailable.
   */
  async handlePaymentNotification(
    rawPayload: Buffer | string,
    authHeader: string | undefined,
    now: Date,
  ): Promise<NotificationOutcome> {
    const normalized = this.normalizer.normalize(rawPayload, authHeader);

    if (!normalized.ok) {
      const { rejection } = normalized;

      if (rejection.reason === PaymentRejectionReason.UNSUPPORTED_EVENT) {
        return { accepted: true, status: 'ignored', eventId: rejection.eventId, detail: rejection.message };
      }

      if (rejection.reason === PaymentRejectionReason.MALFORMED_EVENT) {
        this.logger.error(
          `[OPERATOR REVIEW] Authenticated event ${rejection.eventId} (${rejection.eventType}) could not be correlated: ${rejection.message}`,
        );
      }

      return {
        accepted: false,
        reason: rejection.reason,
        message: rejection.message,
        eventId: rejection.eventId,
      };
    }

    const { event } = normalized;
    const outcome = await this.applyEvent(event, now);

    return {
      accepted: true,
      status: outcome.status,
      eventId: event.eventId,
      userId: event.userId,
      state: outcome.subscription?.state,
      membershipSynced: outcome.subscription?.groupMembershipSynced,
      detail: outcome.detail,
    };
  }

  async applyEvent(event: NormalizedPaymentEvent, now: Date): Promise<ApplyOutcome> {
    this.logger.log(`Applying ${event.kind} ${event.eventId} for user ${event.userId}`);

    const applied = await this.withConflictRetry(event.userId, async (): Promise<Attempt<ApplyOutcome & { action?: MembershipAction }>> => {
      const stored = await this.read(event.userId);
      const decision = decideEventTransition(stored, event, now, this.config.subscriptionPeriodMs);

      if (decision.type === 'skip') {
        return done({ status: decision.reason, subscription: stored, detail: decision.detail });
      }

      assertTransition(decision.current, decision.next);
      const put = await this.write(decision.next);
      if (put.status === 'conflict') {
        return CONFLICT;
      }

      if (decision.current.state !== put.subscription.state) {
        this.logger.log(
          `Subscription for user ${event.userId}: ${decision.current.state} -> ${put.subscription.state} (${event.eventId})`,
        );
      }
      return done({ status: 'applied', subscription: put.subscription, action: decision.action });
    });

    if (applied.status === 'duplicate') {
      this.logger.log(`Event ${event.eventId} already applied for user ${event.userId}, acknowledging`);
      return applied;
    }

    if (applied.status === 'stale') {
      this.logger.warn(`Discarded stale event ${event.eventId} for user ${event.userId}: ${applied.detail}`);
      return applied;
    }

    const { action, ...outcome } = applied;
    if (!action || !outcome.subscription) {
      return outcome;
    }

    const synced = await this.syncMembership(outcome.subscription, action, now);
    return { ...outcome, subscription: synced.subscription, membership: synced.result };
  }

  /**
   * Expire due ACTIVE subscriptions, then retry membership for every record
   * still owing it. Each record gets at most one membership call per sweep.
   */
  async runSweep(now: Date): Promise<SweepResult> {
    const result: SweepResult = { processed: 0, failed: 0, expired: 0, compensated: 0, permanentFailures: [] };
    const touched = new Set<string>();

    this.logger.log(`Starting sweep at ${now.toISOString()}`);

    for await (const candidate of this.store.scanActive(now)) {
      if (!decideSweepExpiry(candidate, now, this.config.sweepExpiryGraceMs)) {
        continue;
      }
      touched.add(candidate.userId);

      try {
        const expired = await this.expire(candidate.userId, now);
        if (!expired) {
          continue;
        }
        result.expired++;
        this.logger.log(`Subscription for user ${expired.userId} expired at ${expired.expiresAt?.toISOString()}`);

        const synced = await this.syncMembership(expired, 'revoke', now);
        this.tally(result, expired.userId, synced.result);
      } catch (error) {
        result.failed++;
        this.logger.error(`Sweep could not expire user ${candidate.userId}: ${describeError(error)}`, errorStack(error));
      }
    }

    for await (const candidate of this.store.scanUnsynced()) {
      if (touched.has(candidate.userId)) {
        continue;
      }
      if (candidate.membershipFailure?.kind === MembershipFailureKind.PERMANENT) {
        continue;
      }
      touched.add(candidate.userId);

      try {
        const action = desiredMembershipAction(candidate.state);
        this.logger.log(`Compensating ${action} for user ${candidate.userId} (${candidate.state})`);

        const synced = await this.syncMembership(candidate, action, now);
        if (synced.result.ok) {
          result.compensated++;
        }
        this.tally(result, candidate.userId, synced.result);
      } catch (error) {
        result.failed++;
        this.logger.error(`Sweep could not compensate user ${candidate.userId}: ${describeError(error)}`, errorStack(error));
      }
    }

    this.logger.log(
      `Sweep finished: ${result.processed} processed, ${result.failed} failed (${result.expired} expired, ${result.compensated} compensated)`,
    );
    if (result.permanentFailures.length > 0) {
      this.logger.error(`[ALERT] Sweep left ${result.permanentFailures.length} subscription(s) needing manual membership fixes`);
    }

    return result;
  }

  async getSubscription(userId: string): Promise<Subscription | null> {
    return this.read(userId);
  }

  async listUnsynced(limit: number): Promise<Subscription[]> {
    const records: Subscription[] = [];
    for await (const record of this.store.scanUnsynced()) {
      if (records.length >= limit) {
        break;
      }
      records.push(record);
    }
    return records;
  }

  /**
   * Operator-triggered retry of the membership action a record owes. Runs
   * even for PERMANENT failures, which the sweep no longer retries.
   */
  async retryMembership(userId: string, now: Date): Promise<ApplyOutcome | null> {
    const stored = await this.read(userId);
    if (!stored) {
      return null;
    }

    const synced = await this.syncMembership(stored, desiredMembershipAction(stored.state), now);
    return { status: 'applied', subscription: synced.subscription, membership: synced.result };
  }

  private async expire(userId: string, now: Date): Promise<Subscription | null> {
    return this.withConflictRetry(userId, async (): Promise<Attempt<Subscription | null>> => {
      const stored = await this.read(userId);
      const next = stored ? decideSweepExpiry(stored, now, this.config.sweepExpiryGraceMs) : null;

      // Renewed or changed since the scan read it
      if (!stored || !next) {
        return done(null);
      }

      assertTransition(stored, next);
      const put = await this.write(next);
      return put.status === 'ok' ? done(put.subscription) : CONFLICT;
    });
  }

  private async syncMembership(
    subscription: Subscription,
    action: MembershipAction,
    now: Date,
  ): Promise<{ subscription: Subscription; result: MembershipResult }> {
    const result = action === 'grant'
      ? await this.membership.grant(subscription.userId)
      : await this.membership.revoke(subscription.userId);

    let recorded: Subscription | null = null;
    try {
      recorded = await this.recordMembershipOutcome(subscription, action, result, now);
    } catch (error) {
      // The flag stays unsynced and the sweep repeats the idempotent action
      this.logger.error(
        `Could not record ${action} outcome for user ${subscription.userId}: ${describeError(error)}`,
        errorStack(error),
      );
    }

    if (!result.ok) {
      if (result.kind === MembershipFailureKind.PERMANENT) {
        this.logger.error(
          `[ALERT] ${action} for user ${subscription.userId} failed permanently: ${result.reason}. Manual intervention required.`,
        );
      } else {
        this.logger.warn(
          `${action} for user ${subscription.userId} left unsynced after ${result.attempts} attempt(s): ${result.reason}`,
        );
      }
    }

    return { subscription: recorded ?? subscription, result };
  }

  /**
   * Flip `groupMembershipSynced` (or record the failure) on the record the
   * action was performed for. A newer transition owns its own membership
   * action, so the flag is left alone once the record has moved on.
   */
  private async recordMembershipOutcome(
    actedOn: Subscription,
    action: MembershipAction,
    result: MembershipResult,
    now: Date,
  ): Promise<Subscription | null> {
    return this.withConflictRetry(actedOn.userId, async (): Promise<Attempt<Subscription | null>> => {
      const stored = await this.read(actedOn.userId);

      if (
        !stored ||
        stored.state !== actedOn.state ||
        stored.stateChangedAt.getTime() !== actedOn.stateChangedAt.getTime() ||
        desiredMembershipAction(stored.state) !== action
      ) {
        return done(stored);
      }

      if (result.ok && stored.groupMembershipSynced && !stored.membershipFailure) {
        return done(stored);
      }

      const next: Subscription = result.ok
        ? { ...stored, groupMembershipSynced: true, membershipFailure: undefined, updatedAt: now }
        : {
            ...stored,
            groupMembershipSynced: false,
            membershipFailure: {
              kind: result.kind,
              reason: result.reason,
              attempts: (stored.membershipFailure?.attempts ?? 0) + result.attempts,
              lastAttemptAt: now,
            },
            updatedAt: now,
          };

      const put = await this.write(next);
      return put.status === 'ok' ? done(put.subscription) : CONFLICT;
    });
  }

  private tally(result: SweepResult, userId: string, membership: MembershipResult): void {
    if (membership.ok) {
      result.processed++;
      return;
    }

    result.failed++;
    if (membership.kind === MembershipFailureKind.PERMANENT) {
      result.permanentFailures.push(userId);
    }
  }

  private async withConflictRetry<T>(userId: string, attempt: () => Promise<Attempt<T>>): Promise<T> {
    const policy = this.retryConfigService.getStoreConflictConfig();
    const maxAttempts = Math.max(1, policy.maxAttempts);

    for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber++) {
      const outcome = await attempt();
      if (!outcome.conflict) {
        return outcome.value;
      }

      this.logger.debug(`Store conflict for user ${userId} (attempt ${attemptNumber}/${maxAttempts}), re-reading`);
      if (attemptNumber < maxAttempts) {
        await delay(computeBackoffDelay(policy, attemptNumber));
      }
    }

    throw new TransientDownstreamFailure(
      `Store conflicts for user ${userId} persisted after ${maxAttempts} attempts`,
      userId,
    );
  }

  private async read(userId: string): Promise<Subscription | null> {
    try {
      return await this.store.get(userId);
    } catch (error) {
      this.logger.error(`Failed to read subscription for user ${userId}: ${describeError(error)}`, errorStack(error));
      throw new TransientDownstreamFailure(`Subscription store read failed: ${describeError(error)}`, userId);
    }
  }

  private async write(subscription: Subscription): Promise<PutResult> {
    try {
      return await this.store.put(subscription);
    } catch (error) {
      this.logger.error(
        `Failed to write subscription for user ${subscription.userId}: ${describeError(error)}`,
        errorStack(error),
      );
      throw new TransientDownstreamFailure(`Subscription store write failed: ${describeError(error)}`, subscription.userId);
    }
  }
}
