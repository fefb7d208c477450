import { Module } from '@nestjs/common';
import { PaymentEventNormalizerService } from './services/payment-event-normalizer.service';

@Module({
  providers: [PaymentEventNormalizerService],
  exports: [PaymentEventNormalizerService],
})
export class PaymentModule {}
