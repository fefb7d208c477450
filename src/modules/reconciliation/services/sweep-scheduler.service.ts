import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ReconciliationConfig } from '../../../config/configuration';
import { describeError, errorStack } from '../../../common/utils/error.util';
import { SweepResult } from '../interfaces/reconciliation.interface';
import { ReconciliationEngineService } from './reconciliation-engine.service';

export const SWEEP_INTERVAL_NAME = 'subscription-sweep';

@Injectable()
export class SweepSchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SweepSchedulerService.name);
  private running = false;

  constructor(
    private readonly engine: ReconciliationEngineService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService,
  ) {}

  onModuleInit(): void {
    const { sweepEnabled, sweepIntervalMs } =
      this.configService.getOrThrow<ReconciliationConfig>('config.reconciliation');

    if (!sweepEnabled) {
      this.logger.log('Periodic sweep disabled');
      return;
    }

    const interval = setInterval(() => {
      void this.tick();
    }, sweepIntervalMs);
    this.schedulerRegistry.addInterval(SWEEP_INTERVAL_NAME, interval);
    this.logger.log(`Periodic sweep scheduled every ${sweepIntervalMs}ms`);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', SWEEP_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(SWEEP_INTERVAL_NAME);
    }
  }

  /**
   * One scheduled sweep. Skipped while the previous tick is still running;
   * failures are logged and the next tick tries again.
   */
  async tick(now: Date = new Date()): Promise<SweepResult | null> {
    if (this.running) {
      this.logger.warn('Previous sweep still running, skipping this tick');
      return null;
    }

    this.running = true;
    try {
      return await this.engine.runSweep(now);
    } catch (error) {
      this.logger.error(`Scheduled sweep failed: ${describeError(error)}`, errorStack(error));
      return null;
    } finally {
      this.running = false;
    }
  }
}
