import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  PERMISSIONS,
  TelegramAccessNotifier,
  type ChatRestrictionApi,
} from '../../../../../src/packages/adapters/telegram/TelegramAccessNotifier.js';
import { NotifierError } from '../../../../../src/utils/errors.js';
import { silentLogger } from '../../../../helpers/fixtures.js';

describe('TelegramAccessNotifier', () => {
  const restrictChatMember = vi.fn(async () => true as const);
  const createApi = vi.fn((_botToken: string): ChatRestrictionApi => ({ restrictChatMember }));
  let notifier: TelegramAccessNotifier;

  beforeEach(() => {
    restrictChatMember.mockClear();
    createApi.mockClear();
    notifier = new TelegramAccessNotifier({ logger: silentLogger, createApi });
  });

  it('mutes a member', async () => {
    await notifier.setPermission({
      identity: '7001',
      chatId: '-100123',
      permission: 'none',
      botToken: 'test-bot-token',
    });

    expect(createApi).toHaveBeenCalledWith('test-bot-token');
    expect(restrictChatMember).toHaveBeenCalledWith('-100123', 7001, PERMISSIONS.none);
  });

  it('grants every send permission on full access', async () => {
    await notifier.setPermission({
      identity: '7001',
      chatId: '-100123',
      permission: 'full',
      botToken: 'test-bot-token',
    });

    expect(restrictChatMember).toHaveBeenCalledWith('-100123', 7001, PERMISSIONS.full);
    expect(Object.values(PERMISSIONS.full).every((allowed) => allowed === true)).toBe(true);
  });

  it('reuses one client per bot token', async () => {
    const decision = { identity: '7001', chatId: '-100123', permission: 'full' as const };

    await notifier.setPermission({ ...decision, botToken: 'test-bot-token' });
    await notifier.setPermission({ ...decision, botToken: 'test-bot-token' });
    await notifier.setPermission({ ...decision, botToken: 'test-bot-token-2' });

    expect(createApi.mock.calls).toEqual([['test-bot-token'], ['test-bot-token-2']]);
    expect(restrictChatMember).toHaveBeenCalledTimes(3);
  });

  it('rejects an identity that is not a numeric user id', async () => {
    await expect(
      notifier.setPermission({
        identity: '@someone',
        chatId: '-100123',
        permission: 'full',
        botToken: 'test-bot-token',
      })
    ).rejects.toThrow('Invalid Telegram user id: @someone');
    expect(restrictChatMember).not.toHaveBeenCalled();
  });

  it('wraps Bot API failures', async () => {
    restrictChatMember.mockRejectedValueOnce(new Error('Bad Request: not enough rights'));

    const attempt = notifier.setPermission({
      identity: '7001',
      chatId: '-100123',
      permission: 'none',
      botToken: 'test-bot-token',
    });

    await expect(attempt).rejects.toBeInstanceOf(NotifierError);
    await expect(attempt).rejects.toThrow('restrictChatMember failed: Bad Request: not enough rights');
  });
});
