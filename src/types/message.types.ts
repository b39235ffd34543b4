import type { ChatId } from './forwarding.types.js';

export type MediaKind = 'photo' | 'video' | 'animation' | 'document' | 'audio' | 'voice';

/**
 * Opaque reference to media already stored on Telegram servers
 */
export interface MediaHandle {
  kind: MediaKind;
  fileId: string;
}

/**
 * Any other non-text payload (sticker, video note, poll, location...).
 * It cannot be re-sent by file id, only forwarded or copied.
 */
export interface OtherMedia {
  kind: 'other';
}

export type InboundMedia = MediaHandle | OtherMedia;

export interface MessageHandle {
  chatId: ChatId;
  messageId: number;
}

/**
 * Message observed in a chat the bot is a member of
 */
export interface InboundMessage extends MessageHandle {
  text?: string;
  caption?: string;
  media?: InboundMedia;
}
