import { Global, Module } from '@nestjs/common';
import { RetryConfigService } from './services/retry-config.service';

/**
 * Shared services available to every module
 */
@Global()
@Module({
  providers: [RetryConfigService],
  exports: [RetryConfigService],
})
export class CommonModule {}
