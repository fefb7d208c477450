import { registerAs } from '@nestjs/config';
import { RetryConfig } from '../common/interfaces/retry-config.interface';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
}

export interface StripeConfig {
  secretKey?: string;
  webhookSecret?: string;
  userIdMetadataKey: string;
  expectedSource?: string;
}

export interface MembershipConfig {
  botToken?: string;
  apiBaseUrl: string;
  chatIds: string[];
  /** How long an unused invite link stays valid */
  inviteLinkTtlMs: number;
  /** Receives a notice whenever a user is removed from the groups */
  adminChatId?: string;
  timeoutMs: number;
  retry: RetryConfig;
}

export interface ReconciliationConfig {
  subscriptionPeriodMs: number;
  storeConflictRetry: RetryConfig;
  sweepEnabled: boolean;
  sweepIntervalMs: number;
  sweepExpiryGraceMs: number;
}

export interface AppConfig {
  app: {
    port: number;
    environment: string;
    logLevel: string;
  };
  database: DatabaseConfig;
  stripe: StripeConfig;
  membership: MembershipConfig;
  reconciliation: ReconciliationConfig;
}

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const toFloat = (value: string | undefined, fallback: number): number => {
  const parsed = parseFloat(value ?? '');
  return Number.isNaN(parsed) ? fallback : parsed;
};

const toList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

export const buildConfiguration = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  app: {
    port: toInt(env.PORT, 3000),
    environment: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
  },
  database: {
    host: env.DB_HOST || 'localhost',
    port: toInt(env.DB_PORT, 5432),
    username: env.DB_USERNAME || 'postgres',
    password: env.DB_PASSWORD || 'postgres',
    database: env.DB_NAME || 'subscription_access',
  },
  stripe: {
    secretKey: env.STRIPE_SECRET_KEY,
    webhookSecret: env.STRIPE_WEBHOOK_SECRET,
    userIdMetadataKey: env.PAYMENT_USER_ID_METADATA_KEY || 'telegram_id',
    expectedSource: env.PAYMENT_EXPECTED_SOURCE || undefined,
  },
  membership: {
    botToken: env.TELEGRAM_BOT_TOKEN,
    apiBaseUrl: env.TELEGRAM_API_BASE_URL || 'https://api.telegram.org',
    chatIds: toList(env.MEMBERSHIP_CHAT_IDS),
    inviteLinkTtlMs: toInt(env.MEMBERSHIP_INVITE_LINK_TTL_HOURS, 24) * 60 * 60 * 1000,
    adminChatId: env.MEMBERSHIP_ADMIN_CHAT_ID || undefined,
    timeoutMs: toInt(env.MEMBERSHIP_TIMEOUT_MS, 10000),
    retry: {
      maxAttempts: toInt(env.MEMBERSHIP_RETRY_MAX_ATTEMPTS, 5),
      delay: toInt(env.MEMBERSHIP_RETRY_DELAY, 1000),
      backoff: true,
      backoffFactor: toFloat(env.MEMBERSHIP_RETRY_BACKOFF_FACTOR, 2),
      maxDelay: toInt(env.MEMBERSHIP_RETRY_MAX_DELAY, 30000),
      jitter: toFloat(env.MEMBERSHIP_RETRY_JITTER, 0.2),
    },
  },
  reconciliation: {
    subscriptionPeriodMs: toInt(env.SUBSCRIPTION_PERIOD_DAYS, 30) * DAY_MS,
    storeConflictRetry: {
      maxAttempts: toInt(env.STORE_CONFLICT_MAX_ATTEMPTS, 5),
      delay: toInt(env.STORE_CONFLICT_RETRY_DELAY, 25),
      backoff: true,
      backoffFactor: 2,
      maxDelay: 500,
      jitter: 0.5,
    },
    sweepEnabled: env.SWEEP_ENABLED !== 'false',
    sweepIntervalMs: toInt(env.SWEEP_INTERVAL_MS, 60 * 60 * 1000),
    sweepExpiryGraceMs: toInt(env.SWEEP_EXPIRY_GRACE_MS, 0),
  },
});

export default registerAs('config', () => buildConfiguration());
