import type { ForwardSettings } from '../../types/forwarding.types.js';

/** Telegram rejects text messages longer than 4096 characters */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

export const DEFAULT_FORWARD_SETTINGS: Readonly<ForwardSettings> = Object.freeze({
  hideHeader: false,
  forwardMedia: true,
  urlPreviews: true,
  removeUsernames: false,
  removeLinks: false,
  captionForward: true,
  delaySeconds: 1,
  maxMessageLength: 4000,
});
