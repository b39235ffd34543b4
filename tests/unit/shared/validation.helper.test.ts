import { describe, it, expect } from 'vitest';
import { ValidationHelper } from '../../../src/shared/helpers/validation.helper.js';
import { InvalidInputError } from '../../../src/shared/errors/forwarder.errors.js';

describe('ValidationHelper', () => {
  it('should accept negative channel ids', () => {
    expect(ValidationHelper.chatId(-1001234567890)).toBe(-1001234567890);
  });

  it('should reject chat id 0', () => {
    expect(() => ValidationHelper.chatId(0)).toThrow('Invalid chat id: chat id must not be 0');
  });

  it('should reject fractional chat ids', () => {
    expect(() => ValidationHelper.chatId(1.5)).toThrow(InvalidInputError);
  });

  it('should trim chat titles', () => {
    expect(ValidationHelper.chatRef({ chatId: -100, title: '  News  ' })).toEqual({ chatId: -100, title: 'News' });
  });

  it('should reject an empty original', () => {
    expect(() => ValidationHelper.replacement('', 'x')).toThrow(
      'Invalid replacement: original: original must not be empty'
    );
  });

  it('should allow an empty replacement', () => {
    expect(ValidationHelper.replacement('@ads', '')).toEqual({ original: '@ads', replacement: '' });
  });

  it('should name the failing settings field', () => {
    expect(() => ValidationHelper.settingsPatch({ maxMessageLength: 5000 })).toThrow(
      'Invalid settings: maxMessageLength:'
    );
  });

  it('should accept a zero delay and the caption switch', () => {
    expect(ValidationHelper.settingsPatch({ delaySeconds: 0, captionForward: false })).toEqual({
      delaySeconds: 0,
      captionForward: false,
    });
  });

  it('should reject negative and fractional delays', () => {
    expect(() => ValidationHelper.settingsPatch({ delaySeconds: -1 })).toThrow('Invalid settings: delaySeconds:');
    expect(() => ValidationHelper.settingsPatch({ delaySeconds: 1.5 })).toThrow('Invalid settings: delaySeconds:');
  });

  it('should carry the INVALID_INPUT code', () => {
    try {
      ValidationHelper.keyword('');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error instanceof InvalidInputError && error.code).toBe('INVALID_INPUT');
    }
  });
});
