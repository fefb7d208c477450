import { buildConfiguration } from '../configuration';
import { validate } from '../env.validation';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('configuration', () => {
  describe('buildConfiguration', () => {
    it('should apply defaults for an empty environment', () => {
      const config = buildConfiguration({});

      expect(config.app).toEqual({ port: 3000, environment: 'development', logLevel: 'info' });
      expect(config.stripe).toEqual({
        secretKey: undefined,
        webhookSecret: undefined,
        userIdMetadataKey: 'telegram_id',
        expectedSource: undefined,
      });
      expect(config.membership.apiBaseUrl).toBe('https://api.telegram.org');
      expect(config.membership.chatIds).toEqual([]);
      expect(config.membership.inviteLinkTtlMs).toBe(DAY_MS);
      expect(config.membership.adminChatId).toBeUndefined();
      expect(config.reconciliation.subscriptionPeriodMs).toBe(30 * DAY_MS);
      expect(config.reconciliation.sweepEnabled).toBe(true);
      expect(config.reconciliation.sweepIntervalMs).toBe(3600000);
      expect(config.reconciliation.sweepExpiryGraceMs).toBe(0);
    });

    it('should parse lists and numbers from the environment', () => {
      const config = buildConfiguration({
        MEMBERSHIP_CHAT_IDS: '-1001, -1002 ,,',
        SUBSCRIPTION_PERIOD_DAYS: '7',
        SWEEP_ENABLED: 'false',
        PAYMENT_EXPECTED_SOURCE: 'telegram_bot',
        DB_PORT: 'not-a-number',
        MEMBERSHIP_INVITE_LINK_TTL_HOURS: '6',
        MEMBERSHIP_ADMIN_CHAT_ID: '777',
      });

      expect(config.membership.chatIds).toEqual(['-1001', '-1002']);
      expect(config.reconciliation.subscriptionPeriodMs).toBe(7 * DAY_MS);
      expect(config.reconciliation.sweepEnabled).toBe(false);
      expect(config.stripe.expectedSource).toBe('telegram_bot');
      expect(config.database.port).toBe(5432);
      expect(config.membership.inviteLinkTtlMs).toBe(6 * 60 * 60 * 1000);
      expect(config.membership.adminChatId).toBe('777');
    });
  });

  describe('validate', () => {
    it('should return the raw environment when it is valid', () => {
      const env = { PORT: '8080', MEMBERSHIP_CHAT_IDS: '-100123,-100456', SWEEP_ENABLED: 'true' };

      expect(validate(env)).toBe(env);
    });

    it('should reject malformed chat ids', () => {
      expect(() => validate({ MEMBERSHIP_CHAT_IDS: 'group-a' })).toThrow(
        'MEMBERSHIP_CHAT_IDS must be a comma-separated list of chat ids',
      );
    });

    it('should reject out-of-range numbers', () => {
      expect(() => validate({ MEMBERSHIP_RETRY_JITTER: '2' })).toThrow('Invalid environment configuration');
      expect(() => validate({ SWEEP_INTERVAL_MS: '0' })).toThrow('Invalid environment configuration');
    });
  });
});
