import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { MembershipConfig } from '../../config/configuration';
import { GROUP_MEMBERSHIP_PLATFORM } from './interfaces/membership.interface';
import { TelegramGroupPlatform } from './platforms/telegram-group.platform';
import { MembershipControllerService } from './services/membership-controller.service';

@Module({
  imports: [
    HttpModule.registerAsync({
      useFactory: (configService: ConfigService) => ({
        timeout: configService.getOrThrow<MembershipConfig>('config.membership').timeoutMs,
        maxRedirects: 0,
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [
    TelegramGroupPlatform,
    {
      provide: GROUP_MEMBERSHIP_PLATFORM,
      useExisting: TelegramGroupPlatform,
    },
    MembershipControllerService,
  ],
  exports: [MembershipControllerService],
})
export class MembershipModule {}
