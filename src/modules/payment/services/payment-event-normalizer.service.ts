import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Stripe from 'stripe';
import { StripeConfig } from '../../../config/configuration';
import { describeError } from '../../../common/utils/error.util';
import {
  NormalizationResult,
  PaymentEventKind,
  PaymentEventPayload,
  PaymentRejectionReason,
} from '../interfaces/payment-event.interface';

const USER_ID_PATTERN = /^[1-9]\d*$/;

type CustomerField = string | Stripe.Customer | Stripe.DeletedCustomer | null;

interface CorrelationSource {
  metadata: Stripe.Metadata | null | undefined;
  fallbackUserId?: string | null;
}

@Injectable()
export class PaymentEventNormalizerService {
  private readonly logger = new Logger(PaymentEventNormalizerService.name);
  private readonly stripe: Stripe;
  private readonly config: StripeConfig;

  constructor(private readonly configService: ConfigService) {
    this.config = this.configService.getOrThrow<StripeConfig>('config.stripe');
    this.stripe = new Stripe(this.config.secretKey ?? '', {
      apiVersion: '2023-08-16',
    });
  }

  /**
   * Verify a raw Stripe webhook delivery and convert it to the internal event vocabulary
   */
  normalize(rawPayload: Buffer | string, signature: string | undefined): NormalizationResult {
    const webhookSecret = this.config.webhookSecret;

    if (!webhookSecret) {
      this.logger.error('STRIPE_WEBHOOK_SECRET is not configured');
      return this.reject(PaymentRejectionReason.AUTHENTICATION_FAILURE, 'Webhook secret is not configured');
    }

    if (!signature) {
      this.logger.warn('Missing Stripe signature header');
      return this.reject(PaymentRejectionReason.AUTHENTICATION_FAILURE, 'Missing Stripe signature');
    }

    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(rawPayload, signature, webhookSecret);
    } catch (error) {
      this.logger.warn(`Stripe webhook signature verification failed: ${describeError(error)}`);
      return this.reject(PaymentRejectionReason.AUTHENTICATION_FAILURE, 'Invalid Stripe signature');
    }

    return this.fromStripeEvent(event);
  }

  /**
   * Map an authenticated Stripe event.
   */
  private fromStripeEvent(event: Stripe.Event): NormalizationResult {
    switch (event.type) {
      case 'checkout.session.completed': {
        const session = event.data.object as Stripe.Checkout.Session;
        const kind = session.payment_status === 'unpaid'
          ? PaymentEventKind.PAYMENT_PENDING
          : PaymentEventKind.PAYMENT_COMPLETED;
        return this.fromCheckoutSession(event, session, kind);
      }

      case 'checkout.session.async_payment_succeeded':
        return this.fromCheckoutSession(
          event,
          event.data.object as Stripe.Checkout.Session,
          PaymentEventKind.PAYMENT_COMPLETED,
        );

      case 'checkout.session.async_payment_failed':
        return this.fromCheckoutSession(
          event,
          event.data.object as Stripe.Checkout.Session,
          PaymentEventKind.PAYMENT_FAILED,
        );

      case 'invoice.payment_succeeded':
        return this.fromInvoice(event, event.data.object as Stripe.Invoice, PaymentEventKind.PAYMENT_COMPLETED);

      case 'invoice.payment_failed':
        return this.fromInvoice(event, event.data.object as Stripe.Invoice, PaymentEventKind.PAYMENT_FAILED);

      default:
        this.logger.log(`Unhandled event type: ${event.type}`);
        return this.reject(
          PaymentRejectionReason.UNSUPPORTED_EVENT,
          `Event type ${event.type} does not affect subscriptions`,
          event,
        );
    }
  }

  private fromCheckoutSession(
    event: Stripe.Event,
    session: Stripe.Checkout.Session,
    kind: PaymentEventKind,
  ): NormalizationResult {
    // Subscription-mode checkouts also emit invoice events for the first invoice;
    // sharing the invoice id as the reference keeps them in one payment cycle.
    const invoiceId = typeof session.invoice === 'string' ? session.invoice : session.invoice?.id;

    return this.build(
      event,
      kind,
      { metadata: session.metadata, fallbackUserId: session.client_reference_id },
      {
        externalPaymentRef: invoiceId ?? session.id,
        customerRef: this.customerId(session.customer),
        amountPaid: session.amount_total === null ? undefined : session.amount_total / 100,
        currency: session.currency ?? undefined,
        providerEventType: event.type,
      },
    );
  }

  private fromInvoice(event: Stripe.Event, invoice: Stripe.Invoice, kind: PaymentEventKind): NormalizationResult {
    const metadata = invoice.metadata && Object.keys(invoice.metadata).length > 0
      ? invoice.metadata
      : invoice.subscription_details?.metadata;
    const amount = kind === PaymentEventKind.PAYMENT_COMPLETED ? invoice.amount_paid : invoice.amount_due;

    return this.build(
      event,
      kind,
      { metadata },
      {
        externalPaymentRef: invoice.id,
        customerRef: this.customerId(invoice.customer),
        amountPaid: amount / 100,
        currency: invoice.currency,
        providerEventType: event.type,
      },
    );
  }

  private build(
    event: Stripe.Event,
    kind: PaymentEventKind,
    source: CorrelationSource,
    payload: PaymentEventPayload,
  ): NormalizationResult {
    const metadata = source.metadata ?? {};
    const expectedSource = this.config.expectedSource;

    if (expectedSource && metadata.source !== expectedSource) {
      return this.malformed(event, `Invalid source: ${metadata.source ?? 'missing'}`);
    }

    const userId = metadata[this.config.userIdMetadataKey] ?? source.fallbackUserId ?? undefined;

    if (!userId) {
      return this.malformed(event, `Missing required field: ${this.config.userIdMetadataKey}`);
    }

    if (!USER_ID_PATTERN.test(userId)) {
      return this.malformed(event, `Invalid ${this.config.userIdMetadataKey}: must be a positive integer`);
    }

    return {
      ok: true,
      event: {
        eventId: event.id,
        userId,
        kind,
        occurredAt: new Date(event.created * 1000),
        payload,
      },
    };
  }

  private customerId(customer: CustomerField): string | undefined {
    if (!customer) {
      return undefined;
    }
    return typeof customer === 'string' ? customer : customer.id;
  }

  private malformed(event: Stripe.Event, message: string): NormalizationResult {
    this.logger.warn(`Webhook validation failed for event ${event.id} (${event.type}): ${message}`);
    return this.reject(PaymentRejectionReason.MALFORMED_EVENT, message, event);
  }

  private reject(reason: PaymentRejectionReason, message: string, event?: Stripe.Event): NormalizationResult {
    return {
      ok: false,
      rejection: {
        reason,
        message,
        eventId: event?.id,
        eventType: event?.type,
      },
    };
  }
}
