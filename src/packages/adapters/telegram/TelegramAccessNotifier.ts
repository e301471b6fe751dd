/**
 * Telegram Access Notifier
 *
 * Mutes and unmutes group members through the Bot API. Every community
 * brings its own bot token, so one grammy `Api` client is kept per token.
 *
 * @module packages/adapters/telegram/TelegramAccessNotifier
 */

import { Api } from 'grammy';
import type { ChatPermissions } from 'grammy/types';
import type { Logger } from 'pino';
import type { IAccessNotifier } from '../../core/ports/IAccessNotifier.js';
import type { GateDecision, PermissionLevel } from '../../../types/index.js';
import { NotifierError, errorMessage } from '../../../utils/errors.js';

/**
 * The part of the Bot API client this notifier calls
 */
export type ChatRestrictionApi = Pick<Api, 'restrictChatMember'>;

export const PERMISSIONS: Record<PermissionLevel, ChatPermissions> = {
  full: {
    can_send_messages: true,
    can_send_audios: true,
    can_send_documents: true,
    can_send_photos: true,
    can_send_videos: true,
    can_send_video_notes: true,
    can_send_voice_notes: true,
    can_send_polls: true,
    can_send_other_messages: true,
    can_add_web_page_previews: true,
  },
  none: {
    can_send_messages: false,
    can_send_audios: false,
    can_send_documents: false,
    can_send_photos: false,
    can_send_videos: false,
    can_send_video_notes: false,
    can_send_voice_notes: false,
    can_send_polls: false,
    can_send_other_messages: false,
    can_add_web_page_previews: false,
  },
};

export interface TelegramAccessNotifierOptions {
  logger: Logger;
  /** Builds the client for a bot token */
  createApi?: (botToken: string) => ChatRestrictionApi;
}

export class TelegramAccessNotifier implements IAccessNotifier {
  private readonly clients = new Map<string, ChatRestrictionApi>();
  private readonly createApi: (botToken: string) => ChatRestrictionApi;
  private readonly log: Logger;

  constructor(options: TelegramAccessNotifierOptions) {
    this.createApi = options.createApi ?? ((botToken) => new Api(botToken));
    this.log = options.logger.child({ component: 'TelegramAccessNotifier' });
  }

  async setPermission(decision: GateDecision): Promise<void> {
    const userId = Number(decision.identity);
    if (!/^\d+$/.test(decision.identity) || !Number.isSafeInteger(userId)) {
      throw new NotifierError(`Invalid Telegram user id: ${decision.identity}`);
    }

    try {
      await this.clientFor(decision.botToken).restrictChatMember(
        decision.chatId,
        userId,
        PERMISSIONS[decision.permission]
      );
    } catch (error) {
      throw new NotifierError(`restrictChatMember failed: ${errorMessage(error)}`);
    }

    this.log.info(
      { chatId: decision.chatId, userId, permission: decision.permission },
      'Chat permissions updated'
    );
  }

  private clientFor(botToken: string): ChatRestrictionApi {
    let client = this.clients.get(botToken);
    if (!client) {
      client = this.createApi(botToken);
      this.clients.set(botToken, client);
    }
    return client;
  }
}
