import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { ScheduleModule } from '@nestjs/schedule';
import configuration, { AppConfig, DatabaseConfig } from './config/configuration';
import { validate } from './config/env.validation';
import { CommonModule } from './common/common.module';
import { SubscriptionEntity } from './modules/subscription/entities/subscription.entity';
import { ReconciliationModule } from './modules/reconciliation/reconciliation.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate,
    }),
    MikroOrmModule.forRootAsync({
      useFactory: (configService: ConfigService) => {
        const database = configService.getOrThrow<DatabaseConfig>('config.database');
        const app = configService.getOrThrow<AppConfig['app']>('config.app');
        return {
          type: 'postgresql',
          host: database.host,
          port: database.port,
          user: database.username,
          password: database.password,
          dbName: database.database,
          entities: [SubscriptionEntity],
          autoLoadEntities: true,
          debug: app.environment === 'development',
        };
      },
      inject: [ConfigService],
    }),
    ScheduleModule.forRoot(),
    CommonModule,
    ReconciliationModule,
  ],
})
export class AppModule {}
