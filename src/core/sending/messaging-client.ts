import type { ChatId } from '../../types/forwarding.types.js';
import type { MediaHandle, MessageHandle } from '../../types/message.types.js';

/**
 * Outbound primitives of the messaging platform.
 * Each resolves to the id of the message created in the target chat.
 */
export interface MessagingClient {
  sendText(chatId: ChatId, text: string, showPreview: boolean): Promise<number>;
  /** Captions never get link previews on Telegram, so there is no preview flag here */
  sendMedia(chatId: ChatId, media: MediaHandle, caption?: string): Promise<number>;
  /** Native forward, keeps the "Forwarded from" header */
  forwardNative(message: MessageHandle, chatId: ChatId): Promise<number>;
  /** Copy without the header, keeping the original caption */
  copyNative(message: MessageHandle, chatId: ChatId): Promise<number>;
}
