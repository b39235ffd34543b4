import { ConfigNotFoundError } from '../../shared/errors/forwarder.errors.js';
import type { UserConfigRegistry } from '../registry/user-config.registry.js';
import type { UserConfiguration, UserId } from '../../types/forwarding.types.js';

function containsAny(haystack: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => keyword.length > 0 && haystack.includes(keyword.toLowerCase()));
}

/**
 * Keyword gate for one user. Matching is case-insensitive substring search.
 * A blacklist hit always rejects; a non-empty whitelist requires at least one hit.
 * Missing text matches no keyword.
 */
export function evaluateFilters(config: UserConfiguration, text: string | undefined): boolean {
  const haystack = (text ?? '').toLowerCase();

  if (containsAny(haystack, config.blacklist)) {
    return false;
  }
  if (config.whitelist.length > 0) {
    return containsAny(haystack, config.whitelist);
  }
  return true;
}

export class FilterEngineService {
  constructor(private readonly registry: UserConfigRegistry) {}

  passes(userId: UserId, text: string | undefined): boolean {
    const config = this.registry.get(userId);
    if (!config) {
      throw new ConfigNotFoundError(userId);
    }
    return evaluateFilters(config, text);
  }
}
