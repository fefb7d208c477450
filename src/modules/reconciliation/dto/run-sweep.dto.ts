import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsISO8601, IsOptional } from 'class-validator';

export class RunSweepDto {
  @ApiPropertyOptional({
    description: 'Evaluate expiry as of this instant instead of the current time',
    example: '2024-01-31T00:00:00.000Z',
  })
  @IsOptional()
  @IsISO8601()
  now?: string;
}
