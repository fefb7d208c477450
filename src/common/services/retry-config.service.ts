import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RetryConfig } from '../interfaces/retry-config.interface';
import { MembershipConfig, ReconciliationConfig } from '../../config/configuration';

@Injectable()
export class RetryConfigService {
  constructor(private readonly configService: ConfigService) {}

  getMembershipConfig(): RetryConfig {
    return this.configService.getOrThrow<MembershipConfig>('config.membership').retry;
  }

  getStoreConflictConfig(): RetryConfig {
    return this.configService.getOrThrow<ReconciliationConfig>('config.reconciliation').storeConflictRetry;
  }
}
