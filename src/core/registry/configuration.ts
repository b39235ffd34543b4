import { DEFAULT_FORWARD_SETTINGS } from '../../shared/constants/default-settings.js';
import type { ChannelKind } from '../../database/models/channel.model.js';
import type {
  ChatRef,
  KeywordList,
  Replacement,
  ReplacementTable,
  UserConfiguration,
  UserId,
} from '../../types/forwarding.types.js';

export function createEmptyConfiguration(userId: UserId): UserConfiguration {
  return {
    userId,
    profile: {},
    sources: [],
    targets: [],
    settings: { ...DEFAULT_FORWARD_SETTINGS },
    forwarding: { enabled: false, totalForwarded: 0 },
    blacklist: [],
    whitelist: [],
    usernameReplacements: [],
    linkReplacements: [],
  };
}

/**
 * Freeze a snapshot and everything it holds so readers can share it safely
 */
export function freezeConfiguration(config: UserConfiguration): UserConfiguration {
  return Object.freeze({
    userId: config.userId,
    profile: Object.freeze({ ...config.profile }),
    sources: Object.freeze(config.sources.map((chat) => Object.freeze({ ...chat }))),
    targets: Object.freeze(config.targets.map((chat) => Object.freeze({ ...chat }))),
    settings: Object.freeze({ ...config.settings }),
    forwarding: Object.freeze({ ...config.forwarding }),
    blacklist: Object.freeze([...config.blacklist]),
    whitelist: Object.freeze([...config.whitelist]),
    usernameReplacements: Object.freeze(
      config.usernameReplacements.map((pair) => Object.freeze({ ...pair }))
    ),
    linkReplacements: Object.freeze(
      config.linkReplacements.map((pair) => Object.freeze({ ...pair }))
    ),
  });
}

/**
 * Forwarding runs only when switched on and both chat lists have entries
 */
export function isForwardingActive(config: UserConfiguration): boolean {
  return config.forwarding.enabled && config.sources.length > 0 && config.targets.length > 0;
}

/**
 * Replace the entry with the same chat id in place, or append
 */
export function upsertChatRef(list: readonly ChatRef[], chat: ChatRef): ChatRef[] {
  const index = list.findIndex((entry) => entry.chatId === chat.chatId);
  if (index === -1) {
    return [...list, chat];
  }
  return list.map((entry, i) => (i === index ? chat : entry));
}

export function upsertReplacement(
  list: readonly Replacement[],
  pair: Replacement
): Replacement[] {
  const index = list.findIndex((entry) => entry.original === pair.original);
  if (index === -1) {
    return [...list, pair];
  }
  return list.map((entry, i) => (i === index ? pair : entry));
}

export function replacementsOf(
  config: UserConfiguration,
  table: ReplacementTable
): readonly Replacement[] {
  return table === 'username' ? config.usernameReplacements : config.linkReplacements;
}

export function withReplacements(
  config: UserConfiguration,
  table: ReplacementTable,
  pairs: Replacement[]
): UserConfiguration {
  return table === 'username'
    ? { ...config, usernameReplacements: pairs }
    : { ...config, linkReplacements: pairs };
}

export function withKeywords(
  config: UserConfiguration,
  list: KeywordList,
  keywords: string[]
): UserConfiguration {
  return list === 'blacklist'
    ? { ...config, blacklist: keywords }
    : { ...config, whitelist: keywords };
}

export function channelsOf(config: UserConfiguration, kind: ChannelKind): readonly ChatRef[] {
  return kind === 'source' ? config.sources : config.targets;
}

export function withChannels(
  config: UserConfiguration,
  kind: ChannelKind,
  chats: ChatRef[]
): UserConfiguration {
  return kind === 'source' ? { ...config, sources: chats } : { ...config, targets: chats };
}
