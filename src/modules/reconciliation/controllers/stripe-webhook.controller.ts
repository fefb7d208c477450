import {
  BadRequestException,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  RawBodyRequest,
  Req,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Request } from 'express';
import { PaymentRejectionReason } from '../../payment/interfaces/payment-event.interface';
import { ApplyStatus } from '../interfaces/reconciliation.interface';
import { TransientDownstreamFailure } from '../reconciliation.errors';
import { ReconciliationEngineService } from '../services/reconciliation-engine.service';

export interface WebhookReceipt {
  received: true;
  status: ApplyStatus | 'ignored';
  eventId?: string;
  userId?: string;
  state?: string;
  membershipSynced?: boolean;
  detail?: string;
}

@ApiTags('stripe-webhook')
@Controller('webhooks/stripe')
export class StripeWebhookController {
  private readonly logger = new Logger(StripeWebhookController.name);

  constructor(private readonly engine: ReconciliationEngineService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Receive a Stripe webhook event',
    description: 'Verifies the signature and applies checkout and invoice payment events to the subscription',
  })
  @ApiHeader({ name: 'stripe-signature', description: 'Stripe webhook signature', required: true })
  @ApiResponse({
    status: 200,
    description: 'Event accepted (applied, duplicate, stale or ignored)',
    schema: {
      type: 'object',
      properties: {
        received: { type: 'boolean', example: true },
        status: { type: 'string', enum: ['applied', 'duplicate', 'stale', 'ignored'] },
        eventId: { type: 'string', example: 'evt_1234567890' },
        userId: { type: 'string', example: '123456789' },
        state: { type: 'string', example: 'ACTIVE' },
        membershipSynced: { type: 'boolean' },
      },
    },
  })
  @ApiResponse({ status: 400, description: 'Authenticated event that cannot be correlated to a user' })
  @ApiResponse({ status: 401, description: 'Missing or invalid signature' })
  @ApiResponse({ status: 503, description: 'Subscription store unavailable, Stripe should redeliver' })
  async handleWebhook(
    @Req() req: Pick<RawBodyRequest<Request>, 'rawBody'>,
    @Headers('stripe-signature') signature?: string,
  ): Promise<WebhookReceipt> {
    if (!req.rawBody) {
      throw new BadRequestException('Missing raw request body');
    }

    const outcome = await this.engine
      .handlePaymentNotification(req.rawBody, signature, new Date())
      .catch((error: unknown) => {
        if (error instanceof TransientDownstreamFailure) {
          this.logger.warn(`Webhook deferred: ${error.message}`);
          throw new ServiceUnavailableException(error.message);
        }
        throw error;
      });

    if (!outcome.accepted) {
      if (outcome.reason === PaymentRejectionReason.AUTHENTICATION_FAILURE) {
        this.logger.warn(`Rejected webhook: ${outcome.message}`);
        throw new UnauthorizedException(outcome.message);
      }
      throw new BadRequestException(outcome.message);
    }

    const { accepted: _accepted, ...receipt } = outcome;
    return { received: true, ...receipt };
  }
}
