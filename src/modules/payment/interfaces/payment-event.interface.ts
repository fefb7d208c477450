export enum PaymentEventKind {
  PAYMENT_COMPLETED = 'PAYMENT_COMPLETED',
  PAYMENT_FAILED = 'PAYMENT_FAILED',
  /** Checkout finished but the payment settles asynchronously */
  PAYMENT_PENDING = 'PAYMENT_PENDING',
}

export interface PaymentEventPayload {
  externalPaymentRef: string;
  customerRef?: string;
  amountPaid?: number;
  currency?: string;
  providerEventType: string;
}

export interface NormalizedPaymentEvent {
  eventId: string;
  userId: string;
  kind: PaymentEventKind;
  occurredAt: Date;
  payload: PaymentEventPayload;
}

export enum PaymentRejectionReason {
  AUTHENTICATION_FAILURE = 'AUTHENTICATION_FAILURE',
  MALFORMED_EVENT = 'MALFORMED_EVENT',
  UNSUPPORTED_EVENT = 'UNSUPPORTED_EVENT',
}

export interface PaymentRejection {
  reason: PaymentRejectionReason;
  message: string;
  eventId?: string;
  eventType?: string;
}

export type NormalizationResult =
  | { ok: true; event: NormalizedPaymentEvent }
  | { ok: false; rejection: PaymentRejection };
