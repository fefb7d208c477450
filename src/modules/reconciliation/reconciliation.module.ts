import { Module } from '@nestjs/common';
import { MembershipModule } from '../membership/membership.module';
import { PaymentModule } from '../payment/payment.module';
import { SubscriptionModule } from '../subscription/subscription.module';
import { ReconciliationController } from './controllers/reconciliation.controller';
import { StripeWebhookController } from './controllers/stripe-webhook.controller';
import { ReconciliationEngineService } from './services/reconciliation-engine.service';
import { SweepSchedulerService } from './services/sweep-scheduler.service';

@Module({
  imports: [SubscriptionModule, PaymentModule, MembershipModule],
  controllers: [StripeWebhookController, ReconciliationController],
  providers: [ReconciliationEngineService, SweepSchedulerService],
  exports: [ReconciliationEngineService],
})
export class ReconciliationModule {}
