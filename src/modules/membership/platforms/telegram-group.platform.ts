import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { MembershipConfig } from '../../../config/configuration';
import { describeError } from '../../../common/utils/error.util';
import { MembershipPlatformError } from '../errors/membership-platform.error';
import { GroupMembershipPlatform } from '../interfaces/membership.interface';
import { MembershipFailureKind } from '../../subscription/interfaces/subscription.interface';

interface TelegramResponse<T> {
  ok: boolean;
  result?: T;
  error_code?: number;
  description?: string;
  parameters?: {
    retry_after?: number;
  };
}

interface TelegramChatMember {
  status: 'creator' | 'administrator' | 'member' | 'restricted' | 'left' | 'kicked';
  is_member?: boolean;
}

interface TelegramInviteLink {
  invite_link: string;
}

interface IssuedInviteLink {
  chatId: string;
  inviteLink: string;
  expiresAt: number;
}

// Telegram treats bans shorter than 30 seconds as permanent
const KICK_BAN_SECONDS = 35;

const NOT_A_MEMBER = /USER_NOT_PARTICIPANT|PARTICIPANT_ID_INVALID|user not found|member not found/i;

/**
 * Group membership over the Telegram Bot API. Access spans every configured
 * chat: a grant sends the user single-use invite links that expire after the
 * configured TTL, a revoke invalidates the links still outstanding and kicks
 * the user.
 *
 * Issued links are tracked in process only; after a restart, links issued
 * earlier stay usable until their expiry.
 */
@Injectable()
export class TelegramGroupPlatform implements GroupMembershipPlatform {
  private readonly logger = new Logger(TelegramGroupPlatform.name);
  private readonly config: MembershipConfig;
  private readonly issuedLinks = new Map<string, IssuedInviteLink[]>();

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.config = this.configService.getOrThrow<MembershipConfig>('config.membership');
  }

  async addMember(userId: string, signal?: AbortSignal): Promise<void> {
    this.ensureConfigured();
    const issued: IssuedInviteLink[] = [];

    for (const chatId of this.config.chatIds) {
      if (await this.isMember(chatId, userId, signal)) {
        this.logger.debug(`User ${userId} is already a member of chat ${chatId}`);
        continue;
      }

      // Lift any kick left over from an earlier expiry so the invite link works
      await this.call('unbanChatMember', {
        chat_id: chatId,
        user_id: Number(userId),
        only_if_banned: true,
      }, signal);

      const expiresAt = Date.now() + this.config.inviteLinkTtlMs;
      const link = await this.call<TelegramInviteLink>('createChatInviteLink', {
        chat_id: chatId,
        name: `access ${userId}`.slice(0, 32),
        expire_date: Math.floor(expiresAt / 1000),
        member_limit: 1,
      }, signal);
      const issuedLink = { chatId, inviteLink: link.invite_link, expiresAt };
      issued.push(issuedLink);
      this.track(userId, issuedLink);
    }

    if (issued.length === 0) {
      return;
    }

    const ttlHours = Math.max(1, Math.round(this.config.inviteLinkTtlMs / (60 * 60 * 1000)));
    await this.call('sendMessage', {
      chat_id: userId,
      text: [
        'Your subscription is active! Here are your invite links:',
        '',
        ...issued.map((link) => link.inviteLink),
        '',
        `Each link can be used once and expires in ${ttlHours} hour(s).`,
      ].join('\n'),
    }, signal);

    this.logger.log(`Sent ${issued.length} invite link(s) to user ${userId}`);
  }

  async removeMember(userId: string, signal?: AbortSignal): Promise<void> {
    this.ensureConfigured();
    await this.revokeInviteLinks(userId, signal);

    let removed = 0;

    for (const chatId of this.config.chatIds) {
      if (!(await this.isMember(chatId, userId, signal))) {
        continue;
      }

      try {
        await this.call('banChatMember', {
          chat_id: chatId,
          user_id: Number(userId),
          until_date: Math.floor(Date.now() / 1000) + KICK_BAN_SECONDS,
        }, signal);
        removed++;
      } catch (error) {
        if (error instanceof MembershipPlatformError && NOT_A_MEMBER.test(error.message)) {
          continue;
        }
        throw error;
      }
    }

    if (removed === 0) {
      return;
    }

    this.logger.log(`Removed user ${userId} from ${removed} chat(s)`);

    await this.notify(
      userId,
      'Your subscription has ended and your group access was removed. Renew your subscription to regain access.',
      `Could not notify user ${userId} about removal`,
    );

    if (this.config.adminChatId) {
      await this.notify(
        this.config.adminChatId,
        [
          'User removed from the private groups',
          '',
          `User ID: ${userId}`,
          `Chats: ${removed}`,
        ].join('\n'),
        `Could not notify admin about removal of user ${userId}`,
      );
    }
  }

  private track(userId: string, link: IssuedInviteLink): void {
    const now = Date.now();
    const live = (this.issuedLinks.get(userId) ?? []).filter((issued) => issued.expiresAt > now);
    this.issuedLinks.set(userId, [...live, link]);
  }

  /**
   * Invalidate every unexpired link issued to the user. Links the platform
   * refuses to revoke (already used, already expired) are dropped; transient
   * failures keep the remaining links for the next attempt.
   */
  private async revokeInviteLinks(userId: string, signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const outstanding = (this.issuedLinks.get(userId) ?? []).filter((issued) => issued.expiresAt > now);

    for (const [index, link] of outstanding.entries()) {
      try {
        await this.call('revokeChatInviteLink', { chat_id: link.chatId, invite_link: link.inviteLink }, signal);
      } catch (error) {
        if (!(error instanceof MembershipPlatformError) || error.kind !== MembershipFailureKind.PERMANENT) {
          this.issuedLinks.set(userId, outstanding.slice(index));
          throw error;
        }
        this.logger.warn(`Could not revoke invite link for user ${userId} in chat ${link.chatId}: ${error.message}`);
      }
    }

    this.issuedLinks.delete(userId);
  }

  private async notify(chatId: string, text: string, failureMessage: string): Promise<void> {
    try {
      await this.call('sendMessage', { chat_id: chatId, text });
    } catch (error) {
      this.logger.warn(`${failureMessage}: ${describeError(error)}`);
    }
  }

  private async isMember(chatId: string, userId: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const member = await this.call<TelegramChatMember>('getChatMember', {
        chat_id: chatId,
        user_id: Number(userId),
      }, signal);

      if (member.status === 'restricted') {
        return member.is_member === true;
      }
      return member.status === 'creator' || member.status === 'administrator' || member.status === 'member';
    } catch (error) {
      if (error instanceof MembershipPlatformError && NOT_A_MEMBER.test(error.message)) {
        return false;
      }
      throw error;
    }
  }

  private async call<T = unknown>(
    method: string,
    params: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<T> {
    if (signal?.aborted) {
      throw MembershipPlatformError.transient(`${method}: aborted`);
    }
    const url = `${this.config.apiBaseUrl}/bot${this.config.botToken}/${method}`;

    try {
      const request$ = signal
        ? this.httpService.post<TelegramResponse<T>>(url, params, { signal })
        : this.httpService.post<TelegramResponse<T>>(url, params);
      const response = await firstValueFrom(request$);
      const body = response.data;

      if (!body.ok || body.result === undefined) {
        throw this.classify(method, body.error_code ?? response.status, body.description, body.parameters?.retry_after);
      }
      return body.result;
    } catch (error) {
      if (error instanceof MembershipPlatformError) {
        throw error;
      }

      if (isAxiosError<TelegramResponse<unknown>>(error)) {
        if (!error.response) {
          throw MembershipPlatformError.transient(`${method}: ${error.code ?? error.message}`);
        }
        const data = error.response.data;
        throw this.classify(
          method,
          error.response.status,
          data?.description ?? error.message,
          data?.parameters?.retry_after,
        );
      }

      throw MembershipPlatformError.transient(`${method}: ${describeError(error)}`);
    }
  }

  private classify(
    method: string,
    status: number,
    description: string | undefined,
    retryAfterSeconds: number | undefined,
  ): MembershipPlatformError {
    const message = `${method}: ${description ?? `HTTP ${status}`}`;

    if (status === 429) {
      return MembershipPlatformError.transient(
        message,
        retryAfterSeconds !== undefined ? retryAfterSeconds * 1000 : undefined,
      );
    }

    if (status >= 500) {
      return MembershipPlatformError.transient(message);
    }

    // Blocked bot, deleted chat, missing admin rights, bad token
    return MembershipPlatformError.permanent(message);
  }

  private ensureConfigured(): void {
    if (!this.config.botToken || this.config.chatIds.length === 0) {
      throw MembershipPlatformError.permanent('TELEGRAM_BOT_TOKEN or MEMBERSHIP_CHAT_IDS is not configured');
    }
  }
}
