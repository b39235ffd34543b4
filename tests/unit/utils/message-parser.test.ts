/**
 * Conversion of Bot API messages into inbound events
 */

import { describe, it, expect } from 'vitest';
import type { Message } from 'grammy/types';
import { extractMedia, parseInboundMessage } from '../../../src/utils/message-parser.js';

const channel = { id: -1001, type: 'channel' as const, title: 'News' };

function post(fields: Partial<Message>): Message {
  return { message_id: 7, date: 1714550400, chat: channel, ...fields };
}

describe('message parser', () => {
  it('should map a text post', () => {
    expect(parseInboundMessage(post({ text: 'hello' }))).toEqual({
      chatId: -1001,
      messageId: 7,
      text: 'hello',
    });
  });

  it('should take the largest photo size', () => {
    const message = post({
      caption: 'look',
      photo: [
        { file_id: 'small', file_unique_id: 's', width: 90, height: 60 },
        { file_id: 'large', file_unique_id: 'l', width: 1280, height: 853 },
      ],
    });

    expect(parseInboundMessage(message)).toEqual({
      chatId: -1001,
      messageId: 7,
      caption: 'look',
      media: { kind: 'photo', fileId: 'large' },
    });
  });

  it('should prefer the animation over its document copy', () => {
    const message = post({
      animation: { file_id: 'gif', file_unique_id: 'g', width: 320, height: 240, duration: 3 },
      document: { file_id: 'gif-doc', file_unique_id: 'gd' },
    });

    expect(extractMedia(message)).toEqual({ kind: 'animation', fileId: 'gif' });
  });

  it('should recognise voice notes', () => {
    const message = post({ voice: { file_id: 'voice-1', file_unique_id: 'v', duration: 4 } });

    expect(extractMedia(message)).toEqual({ kind: 'voice', fileId: 'voice-1' });
  });

  it('should mark stickers as media that can only be forwarded', () => {
    const message = post({
      sticker: {
        file_id: 'sticker-1',
        file_unique_id: 's1',
        type: 'regular',
        width: 512,
        height: 512,
        is_animated: false,
        is_video: false,
      },
    });

    expect(parseInboundMessage(message)).toEqual({ chatId: -1001, messageId: 7, media: { kind: 'other' } });
  });

  it('should mark locations as media', () => {
    expect(extractMedia(post({ location: { latitude: 50.45, longitude: 30.52 } }))).toEqual({ kind: 'other' });
  });

  it('should report no media for plain text', () => {
    expect(extractMedia(post({ text: 'plain' }))).toBeUndefined();
  });
});
