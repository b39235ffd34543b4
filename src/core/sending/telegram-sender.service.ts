import { Api } from 'grammy';
import type { MessagingClient } from './messaging-client.js';
import type { ChatId } from '../../types/forwarding.types.js';
import type { MediaHandle, MessageHandle } from '../../types/message.types.js';

/**
 * MessagingClient on top of the Bot API.
 * Text is sent without parse mode: forwarded content is relayed verbatim.
 */
export class TelegramSenderService implements MessagingClient {
  constructor(private api: Api) {}

  async sendText(chatId: ChatId, text: string, showPreview: boolean): Promise<number> {
    const result = await this.api.sendMessage(chatId, text, {
      link_preview_options: { is_disabled: !showPreview },
    });
    return result.message_id;
  }

  /**
   * Send media by kind, re-using the file already stored on Telegram
   */
  async sendMedia(chatId: ChatId, media: MediaHandle, caption?: string): Promise<number> {
    const other = caption ? { caption } : {};

    switch (media.kind) {
      case 'photo':
        return (await this.api.sendPhoto(chatId, media.fileId, other)).message_id;
      case 'video':
        return (await this.api.sendVideo(chatId, media.fileId, other)).message_id;
      case 'animation':
        return (await this.api.sendAnimation(chatId, media.fileId, other)).message_id;
      case 'document':
        return (await this.api.sendDocument(chatId, media.fileId, other)).message_id;
      case 'audio':
        return (await this.api.sendAudio(chatId, media.fileId, other)).message_id;
      case 'voice':
        return (await this.api.sendVoice(chatId, media.fileId, other)).message_id;
    }
  }

  async forwardNative(message: MessageHandle, chatId: ChatId): Promise<number> {
    const result = await this.api.forwardMessage(chatId, message.chatId, message.messageId);
    return result.message_id;
  }

  async copyNative(message: MessageHandle, chatId: ChatId): Promise<number> {
    const result = await this.api.copyMessage(chatId, message.chatId, message.messageId);
    return result.message_id;
  }
}
