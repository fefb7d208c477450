import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Subscription } from '../../subscription/interfaces/subscription.interface';
import { RunSweepDto } from '../dto/run-sweep.dto';
import { ApplyOutcome, SweepResult } from '../interfaces/reconciliation.interface';
import { ReconciliationEngineService } from '../services/reconciliation-engine.service';

@ApiTags('reconciliation')
@Controller('reconciliation')
export class ReconciliationController {
  constructor(private readonly engine: ReconciliationEngineService) {}

  @Post('sweep')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Run an expiry and compensation sweep now' })
  @ApiResponse({ status: 200, description: 'Sweep counters' })
  async runSweep(@Body() dto: RunSweepDto): Promise<SweepResult> {
    return this.engine.runSweep(dto.now ? new Date(dto.now) : new Date());
  }

  @Get('subscriptions/:userId')
  @ApiOperation({ summary: 'Get the stored subscription of a user' })
  @ApiResponse({ status: 200, description: 'Subscription record' })
  @ApiResponse({ status: 404, description: 'No subscription stored for this user' })
  async getSubscription(@Param('userId') userId: string): Promise<Subscription> {
    const subscription = await this.engine.getSubscription(userId);
    if (!subscription) {
      throw new NotFoundException(`No subscription for user ${userId}`);
    }
    return subscription;
  }

  @Get('unsynced')
  @ApiOperation({ summary: 'List subscriptions whose group membership is out of sync' })
  @ApiQuery({ name: 'limit', required: false, description: 'Maximum records returned (default 100)' })
  async listUnsynced(
    @Query('limit', new DefaultValuePipe(100), ParseIntPipe) limit: number,
  ): Promise<Subscription[]> {
    return this.engine.listUnsynced(limit);
  }

  @Post('subscriptions/:userId/membership/retry')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Retry the membership action a subscription owes',
    description: 'Also retries records whose last failure was permanent, after an operator has fixed the cause',
  })
  @ApiResponse({ status: 200, description: 'Membership outcome and updated record' })
  @ApiResponse({ status: 404, description: 'No subscription stored for this user' })
  async retryMembership(@Param('userId') userId: string): Promise<ApplyOutcome> {
    const outcome = await this.engine.retryMembership(userId, new Date());
    if (!outcome) {
      throw new NotFoundException(`No subscription for user ${userId}`);
    }
    return outcome;
  }
}
