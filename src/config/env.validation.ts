import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number;

  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsIn(['error', 'warn', 'info', 'verbose', 'debug'])
  LOG_LEVEL?: string;

  @IsOptional()
  @IsInt()
  DB_PORT?: number;

  @IsOptional()
  @IsString()
  STRIPE_WEBHOOK_SECRET?: string;

  @IsOptional()
  @IsString()
  PAYMENT_USER_ID_METADATA_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  TELEGRAM_API_BASE_URL?: string;

  @IsOptional()
  @Matches(/^-?\d+(\s*,\s*-?\d+)*$/, {
    message: 'MEMBERSHIP_CHAT_IDS must be a comma-separated list of chat ids',
  })
  MEMBERSHIP_CHAT_IDS?: string;

  @IsOptional()
  @IsInt()
  @IsPositive()
  MEMBERSHIP_INVITE_LINK_TTL_HOURS?: number;

  @IsOptional()
  @Matches(/^-?\d+$/, { message: 'MEMBERSHIP_ADMIN_CHAT_ID must be a chat id' })
  MEMBERSHIP_ADMIN_CHAT_ID?: string;

  @IsOptional()
  @IsInt()
  @IsPositive()
  MEMBERSHIP_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(5)
  MEMBERSHIP_RETRY_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  MEMBERSHIP_RETRY_DELAY?: number;

  @IsOptional()
  @IsNumber()
  @Min(1)
  MEMBERSHIP_RETRY_BACKOFF_FACTOR?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  MEMBERSHIP_RETRY_JITTER?: number;

  @IsOptional()
  @IsInt()
  @IsPositive()
  SUBSCRIPTION_PERIOD_DAYS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  STORE_CONFLICT_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  STORE_CONFLICT_RETRY_DELAY?: number;

  @IsOptional()
  @IsBooleanString()
  SWEEP_ENABLED?: string;

  @IsOptional()
  @IsInt()
  @IsPositive()
  SWEEP_INTERVAL_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  SWEEP_EXPIRY_GRACE_MS?: number;
}

/**
 * Validates process.env at boot. Numeric variables are converted before the
 * checks run; the raw environment is returned so ConfigService keeps string values.
 */
export function validate(config: Record<string, unknown>): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: true });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) => Object.values(error.constraints || {}));
    throw new Error(`Invalid environment configuration: ${messages.join('; ')}`);
  }

  return config;
}
