import type { Message } from 'grammy/types';
import type { InboundMedia, InboundMessage } from '../types/message.types.js';

/**
 * Pick the media a message carries. Kinds that can be re-sent with a caption get a
 * file handle; every other non-text payload is marked `other`.
 * Animations also fill `document`, so they are checked first.
 */
export function extractMedia(message: Message): InboundMedia | undefined {
  if (message.photo && message.photo.length > 0) {
    // Sizes are ordered smallest to largest
    return { kind: 'photo', fileId: message.photo[message.photo.length - 1].file_id };
  }
  if (message.animation) {
    return { kind: 'animation', fileId: message.animation.file_id };
  }
  if (message.video) {
    return { kind: 'video', fileId: message.video.file_id };
  }
  if (message.document) {
    return { kind: 'document', fileId: message.document.file_id };
  }
  if (message.audio) {
    return { kind: 'audio', fileId: message.audio.file_id };
  }
  if (message.voice) {
    return { kind: 'voice', fileId: message.voice.file_id };
  }
  if (
    message.sticker ||
    message.video_note ||
    message.poll ||
    message.location ||
    message.contact ||
    message.dice ||
    message.story
  ) {
    return { kind: 'other' };
  }
  return undefined;
}

/**
 * Convert a channel post or chat message into the dispatcher's inbound event
 */
export function parseInboundMessage(message: Message): InboundMessage {
  const media = extractMedia(message);
  return {
    chatId: message.chat.id,
    messageId: message.message_id,
    ...(message.text !== undefined ? { text: message.text } : {}),
    ...(message.caption !== undefined ? { caption: message.caption } : {}),
    ...(media ? { media } : {}),
  };
}
