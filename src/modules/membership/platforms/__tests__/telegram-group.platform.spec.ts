import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { AxiosError, AxiosHeaders } from 'axios';
import { Observable, of, throwError } from 'rxjs';
import { TelegramGroupPlatform } from '../telegram-group.platform';
import { MembershipConfig } from '../../../../config/configuration';
import { MembershipFailureKind } from '../../../subscription/interfaces/subscription.interface';

type Reply = Observable<{ data: unknown; status: number }>;
type Handler = (params: Record<string, unknown>) => Reply;

describe('TelegramGroupPlatform', () => {
  const mockHttpService = {
    post: jest.fn<Reply, [string, Record<string, unknown>]>(),
  };

  const ok = (result: unknown): Reply => of({ data: { ok: true, result }, status: 200 });

  const telegramError = (status: number, description: string, retryAfter?: number): Reply =>
    throwError(
      () =>
        new AxiosError('Request failed', 'ERR_BAD_REQUEST', undefined, undefined, {
          data: {
            ok: false,
            error_code: status,
            description,
            parameters: retryAfter === undefined ? undefined : { retry_after: retryAfter },
          },
          status,
          statusText: description,
          headers: {},
          config: { headers: new AxiosHeaders() },
        }),
    );

  const route = (handlers: Record<string, Handler>): void => {
    mockHttpService.post.mockImplementation((url, params) => {
      const method = url.slice(url.lastIndexOf('/') + 1);
      const handler = handlers[method];
      if (!handler) {
        throw new Error(`unexpected Telegram call ${method}`);
      }
      return handler(params);
    });
  };

  const calledMethods = (): string[] =>
    mockHttpService.post.mock.calls.map(([url]) => url.slice(url.lastIndexOf('/') + 1));

  const createPlatform = async (overrides: Partial<MembershipConfig> = {}): Promise<TelegramGroupPlatform> => {
    const membership: MembershipConfig = {
      botToken: 'test-token',
      apiBaseUrl: 'http://telegram.test',
      chatIds: ['-1001', '-1002'],
      inviteLinkTtlMs: 24 * 60 * 60 * 1000,
      timeoutMs: 1000,
      retry: { maxAttempts: 1, delay: 0 },
      ...overrides,
    };

    const module: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          ignoreEnvFile: true,
          load: [() => ({ config: { membership } })],
        }),
      ],
      providers: [
        TelegramGroupPlatform,
        {
          provide: HttpService,
          useValue: mockHttpService,
        },
      ],
    }).compile();

    return module.get<TelegramGroupPlatform>(TelegramGroupPlatform);
  };

  let platform: TelegramGroupPlatform;

  beforeEach(async () => {
    platform = await createPlatform();

    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('addMember', () => {
    it('should send expiring invite links for the chats the user is missing from', async () => {
      jest.spyOn(Date, 'now').mockReturnValue(1709251200000);
      route({
        getChatMember: (params) => ok({ status: params.chat_id === '-1001' ? 'left' : 'member' }),
        unbanChatMember: () => ok(true),
        createChatInviteLink: () => ok({ invite_link: 'https://t.me/+invite-1001' }),
        sendMessage: () => ok({ message_id: 1 }),
      });

      await platform.addMember('42');

      expect(calledMethods()).toEqual([
        'getChatMember',
        'unbanChatMember',
        'createChatInviteLink',
        'getChatMember',
        'sendMessage',
      ]);
      expect(mockHttpService.post).toHaveBeenCalledWith('http://telegram.test/bottest-token/unbanChatMember', {
        chat_id: '-1001',
        user_id: 42,
        only_if_banned: true,
      });
      expect(mockHttpService.post).toHaveBeenCalledWith('http://telegram.test/bottest-token/createChatInviteLink', {
        chat_id: '-1001',
        name: 'access 42',
        expire_date: 1709337600,
        member_limit: 1,
      });
      expect(mockHttpService.post).toHaveBeenCalledWith('http://telegram.test/bottest-token/sendMessage', {
        chat_id: '42',
        text: [
          'Your subscription is active! Here are your invite links:',
          '',
          'https://t.me/+invite-1001',
          '',
          'Each link can be used once and expires in 24 hour(s).',
        ].join('\n'),
      });
    });

    it('should do nothing for a user already in every chat', async () => {
      route({ getChatMember: () => ok({ status: 'administrator' }) });

      await platform.addMember('42');

      expect(calledMethods()).toEqual(['getChatMember', 'getChatMember']);
    });

    it('should treat a restricted user as a member only while is_member is set', async () => {
      route({
        getChatMember: (params) => ok({ status: 'restricted', is_member: params.chat_id === '-1002' }),
        unbanChatMember: () => ok(true),
        createChatInviteLink: () => ok({ invite_link: 'https://t.me/+invite' }),
        sendMessage: () => ok({ message_id: 1 }),
      });

      await platform.addMember('42');

      expect(calledMethods().filter((method) => method === 'createChatInviteLink')).toHaveLength(1);
    });

    it('should classify rate limiting as transient with the requested wait', async () => {
      route({ getChatMember: () => telegramError(429, 'Too Many Requests: retry after 3', 3) });

      await expect(platform.addMember('42')).rejects.toMatchObject({
        kind: MembershipFailureKind.TRANSIENT,
        message: 'getChatMember: Too Many Requests: retry after 3',
        retryAfterMs: 3000,
      });
    });

    it('should classify a blocked bot as permanent', async () => {
      route({
        getChatMember: () => ok({ status: 'left' }),
        unbanChatMember: () => ok(true),
        createChatInviteLink: () => ok({ invite_link: 'https://t.me/+invite' }),
        sendMessage: () => telegramError(403, 'Forbidden: bot was blocked by the user'),
      });

      await expect(platform.addMember('42')).rejects.toMatchObject({
        kind: MembershipFailureKind.PERMANENT,
        message: 'sendMessage: Forbidden: bot was blocked by the user',
      });
    });

    it('should classify server errors and lost connections as transient', async () => {
      route({ getChatMember: () => telegramError(502, 'Bad Gateway') });
      await expect(platform.addMember('42')).rejects.toMatchObject({ kind: MembershipFailureKind.TRANSIENT });

      route({ getChatMember: () => throwError(() => new AxiosError('socket hang up', 'ECONNRESET')) });
      await expect(platform.addMember('42')).rejects.toMatchObject({
        kind: MembershipFailureKind.TRANSIENT,
        message: 'getChatMember: ECONNRESET',
      });
    });

    it('should fail permanently when the bot is not configured', async () => {
      platform = await createPlatform({ botToken: undefined });

      await expect(platform.addMember('42')).rejects.toMatchObject({
        kind: MembershipFailureKind.PERMANENT,
        message: 'TELEGRAM_BOT_TOKEN or MEMBERSHIP_CHAT_IDS is not configured',
      });
      expect(mockHttpService.post).not.toHaveBeenCalled();
    });
  });

  describe('removeMember', () => {
    it('should kick the user from every chat they are in and notify them', async () => {
      jest.spyOn(Date, 'now').mockReturnValue(1709251200000);
      route({
        getChatMember: (params) => ok({ status: params.chat_id === '-1001' ? 'member' : 'kicked' }),
        banChatMember: () => ok(true),
        sendMessage: () => ok({ message_id: 2 }),
      });

      await platform.removeMember('42');

      expect(calledMethods()).toEqual(['getChatMember', 'banChatMember', 'getChatMember', 'sendMessage']);
      expect(mockHttpService.post).toHaveBeenCalledWith('http://telegram.test/bottest-token/banChatMember', {
        chat_id: '-1001',
        user_id: 42,
        until_date: 1709251235,
      });
    });

    it('should revoke links sent to a user who never joined', async () => {
      route({
        getChatMember: () => ok({ status: 'left' }),
        unbanChatMember: () => ok(true),
        createChatInviteLink: (params) => ok({ invite_link: `https://t.me/+invite${String(params.chat_id)}` }),
        sendMessage: () => ok({ message_id: 1 }),
        revokeChatInviteLink: () => ok({ invite_link: 'revoked' }),
      });
      await platform.addMember('42');
      mockHttpService.post.mockClear();

      await platform.removeMember('42');

      expect(calledMethods()).toEqual([
        'revokeChatInviteLink',
        'revokeChatInviteLink',
        'getChatMember',
        'getChatMember',
      ]);
      expect(mockHttpService.post).toHaveBeenCalledWith('http://telegram.test/bottest-token/revokeChatInviteLink', {
        chat_id: '-1001',
        invite_link: 'https://t.me/+invite-1001',
      });
      expect(mockHttpService.post).toHaveBeenCalledWith('http://telegram.test/bottest-token/revokeChatInviteLink', {
        chat_id: '-1002',
        invite_link: 'https://t.me/+invite-1002',
      });
    });

    it('should keep unrevoked links for the next attempt after a transient failure', async () => {
      route({
        getChatMember: () => ok({ status: 'left' }),
        unbanChatMember: () => ok(true),
        createChatInviteLink: (params) => ok({ invite_link: `https://t.me/+invite${String(params.chat_id)}` }),
        sendMessage: () => ok({ message_id: 1 }),
        revokeChatInviteLink: (params) =>
          params.chat_id === '-1002' ? telegramError(502, 'Bad Gateway') : ok({ invite_link: 'revoked' }),
      });
      await platform.addMember('42');

      await expect(platform.removeMember('42')).rejects.toMatchObject({
        kind: MembershipFailureKind.TRANSIENT,
        message: 'revokeChatInviteLink: Bad Gateway',
      });

      mockHttpService.post.mockClear();
      route({
        getChatMember: () => ok({ status: 'left' }),
        revokeChatInviteLink: () => ok({ invite_link: 'revoked' }),
      });

      await platform.removeMember('42');

      expect(calledMethods()).toEqual(['revokeChatInviteLink', 'getChatMember', 'getChatMember']);
      expect(mockHttpService.post).toHaveBeenCalledWith('http://telegram.test/bottest-token/revokeChatInviteLink', {
        chat_id: '-1002',
        invite_link: 'https://t.me/+invite-1002',
      });
    });

    it('should drop a link the platform refuses to revoke', async () => {
      route({
        getChatMember: () => ok({ status: 'left' }),
        unbanChatMember: () => ok(true),
        createChatInviteLink: () => ok({ invite_link: 'https://t.me/+invite' }),
        sendMessage: () => ok({ message_id: 1 }),
        revokeChatInviteLink: () => telegramError(400, 'Bad Request: INVITE_HASH_EXPIRED'),
      });
      platform = await createPlatform({ chatIds: ['-1001'] });
      await platform.addMember('42');

      await expect(platform.removeMember('42')).resolves.toBeUndefined();
      expect(Logger.prototype.warn).toHaveBeenCalledWith(
        'Could not revoke invite link for user 42 in chat -1001: revokeChatInviteLink: Bad Request: INVITE_HASH_EXPIRED',
      );

      mockHttpService.post.mockClear();
      await platform.removeMember('42');

      expect(calledMethods()).toEqual(['getChatMember']);
    });

    it('should notify the configured admin chat after a kick', async () => {
      platform = await createPlatform({ adminChatId: '777' });
      route({
        getChatMember: (params) => ok({ status: params.chat_id === '-1001' ? 'member' : 'left' }),
        banChatMember: () => ok(true),
        sendMessage: () => ok({ message_id: 3 }),
      });

      await platform.removeMember('42');

      expect(calledMethods()).toEqual(['getChatMember', 'banChatMember', 'getChatMember', 'sendMessage', 'sendMessage']);
      expect(mockHttpService.post).toHaveBeenLastCalledWith('http://telegram.test/bottest-token/sendMessage', {
        chat_id: '777',
        text: ['User removed from the private groups', '', 'User ID: 42', 'Chats: 1'].join('\n'),
      });
    });

    it('should not notify the admin when nobody was kicked', async () => {
      platform = await createPlatform({ adminChatId: '777' });
      route({ getChatMember: () => ok({ status: 'left' }) });

      await platform.removeMember('42');

      expect(calledMethods()).toEqual(['getChatMember', 'getChatMember']);
    });

    it('should treat an unknown participant as already removed', async () => {
      route({ getChatMember: () => telegramError(400, 'Bad Request: user not found') });

      await expect(platform.removeMember('42')).resolves.toBeUndefined();
      expect(calledMethods()).toEqual(['getChatMember', 'getChatMember']);
    });

    it('should ignore a user who left between the check and the kick', async () => {
      route({
        getChatMember: () => ok({ status: 'member' }),
        banChatMember: () => telegramError(400, 'Bad Request: USER_NOT_PARTICIPANT'),
      });

      await expect(platform.removeMember('42')).resolves.toBeUndefined();
      expect(calledMethods()).not.toContain('sendMessage');
    });

    it('should not fail the removal when the notice cannot be delivered', async () => {
      route({
        getChatMember: () => ok({ status: 'member' }),
        banChatMember: () => ok(true),
        sendMessage: () => telegramError(403, 'Forbidden: bot was blocked by the user'),
      });

      await expect(platform.removeMember('42')).resolves.toBeUndefined();
      expect(Logger.prototype.warn).toHaveBeenCalledWith(
        'Could not notify user 42 about removal: sendMessage: Forbidden: bot was blocked by the user',
      );
    });

    it('should surface a permanent kick failure', async () => {
      route({
        getChatMember: () => ok({ status: 'member' }),
        banChatMember: () => telegramError(400, 'Bad Request: not enough rights to restrict/unrestrict chat member'),
      });

      await expect(platform.removeMember('42')).rejects.toMatchObject({
        kind: MembershipFailureKind.PERMANENT,
        message: 'banChatMember: Bad Request: not enough rights to restrict/unrestrict chat member',
      });
    });
  });
});
