/**
 * Bot API sender unit tests
 */

import { describe, it, expect, vi } from 'vitest';
import { Api } from 'grammy';
import { TelegramSenderService } from '../../../src/core/sending/telegram-sender.service.js';

const target = { id: -1002, type: 'channel' as const, title: 'Mirror' };

describe('TelegramSenderService', () => {
  it('should send text without a parse mode and with the preview switch', async () => {
    const api = new Api('test-token');
    const sendMessage = vi
      .spyOn(api, 'sendMessage')
      .mockImplementation(async (_chatId, text) => ({ message_id: 11, date: 0, chat: target, text }));

    const id = await new TelegramSenderService(api).sendText(-1002, 'visit  now', false);

    expect(id).toBe(11);
    expect(sendMessage).toHaveBeenCalledWith(-1002, 'visit  now', {
      link_preview_options: { is_disabled: true },
    });
  });

  it('should re-send a photo by file id with its caption', async () => {
    const api = new Api('test-token');
    const sendPhoto = vi.spyOn(api, 'sendPhoto').mockImplementation(async () => ({
      message_id: 12,
      date: 0,
      chat: target,
      photo: [{ file_id: 'photo-file-1', file_unique_id: 'p', width: 10, height: 10 }],
    }));

    const id = await new TelegramSenderService(api).sendMedia(
      -1002,
      { kind: 'photo', fileId: 'photo-file-1' },
      'look'
    );

    expect(id).toBe(12);
    expect(sendPhoto).toHaveBeenCalledWith(-1002, 'photo-file-1', { caption: 'look' });
  });

  it('should leave the caption out when there is none', async () => {
    const api = new Api('test-token');
    const sendVoice = vi.spyOn(api, 'sendVoice').mockImplementation(async () => ({
      message_id: 13,
      date: 0,
      chat: target,
      voice: { file_id: 'voice-1', file_unique_id: 'v', duration: 2 },
    }));

    await new TelegramSenderService(api).sendMedia(-1002, { kind: 'voice', fileId: 'voice-1' });

    expect(sendVoice).toHaveBeenCalledWith(-1002, 'voice-1', {});
  });

  it('should forward natively from the source chat', async () => {
    const api = new Api('test-token');
    const forwardMessage = vi
      .spyOn(api, 'forwardMessage')
      .mockImplementation(async () => ({ message_id: 14, date: 0, chat: target }));

    const id = await new TelegramSenderService(api).forwardNative({ chatId: -1001, messageId: 7 }, -1002);

    expect(id).toBe(14);
    expect(forwardMessage).toHaveBeenCalledWith(-1002, -1001, 7);
  });

  it('should copy without the forward header', async () => {
    const api = new Api('test-token');
    const copyMessage = vi.spyOn(api, 'copyMessage').mockImplementation(async () => ({ message_id: 15 }));

    const id = await new TelegramSenderService(api).copyNative({ chatId: -1001, messageId: 7 }, -1002);

    expect(id).toBe(15);
    expect(copyMessage).toHaveBeenCalledWith(-1002, -1001, 7);
  });
});
