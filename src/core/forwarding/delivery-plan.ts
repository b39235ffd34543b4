import type { ForwardSettings } from '../../types/forwarding.types.js';
import type { InboundMessage, MediaHandle } from '../../types/message.types.js';

/**
 * What to send to each target chat of one user for one message
 */
export type DeliveryPlan =
  | { type: 'forward' }
  | { type: 'copy' }
  | { type: 'media'; media: MediaHandle; caption?: string }
  | { type: 'text'; text: string; showPreview: boolean }
  | { type: 'skip'; reason: 'empty-text' | 'media-disabled' };

/**
 * The text a message contributes to filtering and rewriting:
 * its body, or the media caption when there is no body and captions count
 */
export function extractText(
  message: InboundMessage,
  settings: Pick<ForwardSettings, 'captionForward'>
): string {
  if (message.text) {
    return message.text;
  }
  return settings.captionForward ? (message.caption ?? '') : '';
}

/**
 * Decide how a message is relayed.
 *
 * Media with media forwarding on is re-sent with the rewritten caption when the
 * text changed or the forward header must be hidden; otherwise it is forwarded
 * natively. Media that cannot be re-sent by file id is copied instead when the
 * header must be hidden. With media forwarding off only the rewritten text goes out.
 * Text that ends up empty is not sent.
 */
export function planDelivery(
  message: InboundMessage,
  originalText: string,
  transformedText: string,
  settings: Readonly<ForwardSettings>
): DeliveryPlan {
  const { media } = message;
  if (media) {
    if (settings.forwardMedia) {
      if (media.kind === 'other') {
        return settings.hideHeader ? { type: 'copy' } : { type: 'forward' };
      }
      if (settings.hideHeader || transformedText !== originalText) {
        return transformedText
          ? { type: 'media', media, caption: transformedText }
          : { type: 'media', media };
      }
      return { type: 'forward' };
    }
    if (transformedText) {
      return { type: 'text', text: transformedText, showPreview: settings.urlPreviews };
    }
    return { type: 'skip', reason: 'media-disabled' };
  }

  if (transformedText) {
    return { type: 'text', text: transformedText, showPreview: settings.urlPreviews };
  }
  return { type: 'skip', reason: 'empty-text' };
}
