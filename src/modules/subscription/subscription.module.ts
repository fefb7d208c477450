import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { SubscriptionEntity } from './entities/subscription.entity';
import { SUBSCRIPTION_STORE } from './interfaces/subscription-store.interface';
import { MikroOrmSubscriptionStore } from './stores/mikro-orm-subscription.store';

@Module({
  imports: [MikroOrmModule.forFeature([SubscriptionEntity])],
  providers: [
    MikroOrmSubscriptionStore,
    {
      provide: SUBSCRIPTION_STORE,
      useExisting: MikroOrmSubscriptionStore,
    },
  ],
  exports: [SUBSCRIPTION_STORE],
})
export class SubscriptionModule {}
