import { ConfigNotFoundError } from '../../shared/errors/forwarder.errors.js';
import type { UserConfigRegistry } from '../registry/user-config.registry.js';
import type { Replacement, UserConfiguration, UserId } from '../../types/forwarding.types.js';

const USERNAME_PATTERN = /@\w+/g;

/**
 * A complete http(s) URL: scheme, authority, path, query and fragment built from
 * RFC 3986 characters and percent-encoded octets. A lone "%" ends the match.
 */
const URL_PATTERN = /https?:\/\/(?:[A-Za-z0-9\-._~:/?#[\]@!$&'()*+,;=]|%[0-9A-Fa-f]{2})+/g;

const TRUNCATION_MARKER = '...';

export function stripUsernames(text: string): string {
  return text.replace(USERNAME_PATTERN, '');
}

export function stripLinks(text: string): string {
  return text.replace(URL_PATTERN, '');
}

/**
 * Literal replacement of every occurrence, one pair after another.
 * Each pair sees the output of the pairs before it.
 */
export function applyReplacements(text: string, pairs: readonly Replacement[]): string {
  return pairs.reduce(
    (current, pair) =>
      pair.original ? current.split(pair.original).join(pair.replacement) : current,
    text
  );
}

/**
 * Cut to `maxLength` UTF-16 units including the marker.
 * A cut never splits a surrogate pair.
 */
export function capLength(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  let end = Math.max(0, maxLength - TRUNCATION_MARKER.length);
  if (end > 0 && isHighSurrogate(text.charCodeAt(end - 1))) {
    end -= 1;
  }
  return text.slice(0, end) + TRUNCATION_MARKER;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Rewrite a message body with one user's rules, in fixed order:
 * username strip, link strip, username replacements, link replacements, length cap.
 * Whitespace around removed tokens is left as it was.
 */
export function applyTransformChain(config: UserConfiguration, text: string): string {
  const { settings } = config;
  let result = text;

  if (settings.removeUsernames) {
    result = stripUsernames(result);
  }
  if (settings.removeLinks) {
    result = stripLinks(result);
  }
  result = applyReplacements(result, config.usernameReplacements);
  result = applyReplacements(result, config.linkReplacements);

  return capLength(result, settings.maxMessageLength);
}

/**
 * Text transformation against the live registry
 */
export class TextTransformerService {
  constructor(private readonly registry: UserConfigRegistry) {}

  transform(userId: UserId, text: string): string {
    const config = this.registry.get(userId);
    if (!config) {
      throw new ConfigNotFoundError(userId);
    }
    return applyTransformChain(config, text);
  }
}
