import { DEFAULT_FORWARD_SETTINGS } from '../shared/constants/default-settings.js';
import type {
  ChatRef,
  ForwardSettings,
  Replacement,
  UserConfiguration,
  UserId,
} from '../types/forwarding.types.js';

export interface UserRow {
  userId: UserId;
  firstName?: string;
  username?: string;
}

export interface ChannelRow {
  userId: UserId;
  channelId: number;
  channelName: string;
}

export interface SettingsRow extends Partial<ForwardSettings> {
  userId: UserId;
}

export interface ForwardingRow {
  userId: UserId;
  isActive: boolean;
  totalForwarded: number;
  lastForwardedAt?: Date;
}

export interface KeywordRow {
  userId: UserId;
  keyword: string;
}

export interface ReplacementRow {
  userId: UserId;
  original: string;
  replacement: string;
}

/**
 * Every persisted row, each list already in its stored order
 */
export interface PersistedRows {
  users: UserRow[];
  sources: ChannelRow[];
  targets: ChannelRow[];
  settings: SettingsRow[];
  forwarding: ForwardingRow[];
  blacklist: KeywordRow[];
  whitelist: KeywordRow[];
  usernameReplacements: ReplacementRow[];
  linkReplacements: ReplacementRow[];
}

interface ConfigurationDraft {
  userId: UserId;
  profile: { firstName?: string; username?: string };
  sources: ChatRef[];
  targets: ChatRef[];
  settings: ForwardSettings;
  forwarding: { enabled: boolean; totalForwarded: number; lastForwardedAt?: Date };
  blacklist: string[];
  whitelist: string[];
  usernameReplacements: Replacement[];
  linkReplacements: Replacement[];
}

function emptyDraft(userId: UserId): ConfigurationDraft {
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
 * Fill the settings fields a stored row leaves out with the defaults.
 * null counts as missing.
 */
export function resolveSettings(row: Partial<ForwardSettings>): ForwardSettings {
  return {
    hideHeader: row.hideHeader ?? DEFAULT_FORWARD_SETTINGS.hideHeader,
    forwardMedia: row.forwardMedia ?? DEFAULT_FORWARD_SETTINGS.forwardMedia,
    urlPreviews: row.urlPreviews ?? DEFAULT_FORWARD_SETTINGS.urlPreviews,
    removeUsernames: row.removeUsernames ?? DEFAULT_FORWARD_SETTINGS.removeUsernames,
    removeLinks: row.removeLinks ?? DEFAULT_FORWARD_SETTINGS.removeLinks,
    captionForward: row.captionForward ?? DEFAULT_FORWARD_SETTINGS.captionForward,
    delaySeconds: row.delaySeconds ?? DEFAULT_FORWARD_SETTINGS.delaySeconds,
    maxMessageLength: row.maxMessageLength ?? DEFAULT_FORWARD_SETTINGS.maxMessageLength,
  };
}

function pushChannel(list: ChatRef[], row: ChannelRow): void {
  // Rows written before the unique index existed may repeat a chat
  if (!list.some((chat) => chat.chatId === row.channelId)) {
    list.push({ chatId: row.channelId, title: row.channelName });
  }
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) {
    list.push(value);
  }
}

/**
 * Build one configuration per user id found in any collection
 */
export function assembleConfigurations(rows: PersistedRows): Map<UserId, UserConfiguration> {
  const drafts = new Map<UserId, ConfigurationDraft>();
  const draftFor = (userId: UserId): ConfigurationDraft => {
    let draft = drafts.get(userId);
    if (!draft) {
      draft = emptyDraft(userId);
      drafts.set(userId, draft);
    }
    return draft;
  };

  for (const row of rows.users) {
    draftFor(row.userId).profile = {
      ...(row.firstName ? { firstName: row.firstName } : {}),
      ...(row.username ? { username: row.username } : {}),
    };
  }
  for (const row of rows.sources) {
    pushChannel(draftFor(row.userId).sources, row);
  }
  for (const row of rows.targets) {
    pushChannel(draftFor(row.userId).targets, row);
  }
  for (const row of rows.settings) {
    draftFor(row.userId).settings = resolveSettings(row);
  }
  for (const row of rows.forwarding) {
    draftFor(row.userId).forwarding = {
      enabled: row.isActive,
      totalForwarded: row.totalForwarded,
      ...(row.lastForwardedAt ? { lastForwardedAt: row.lastForwardedAt } : {}),
    };
  }
  for (const row of rows.blacklist) {
    pushUnique(draftFor(row.userId).blacklist, row.keyword);
  }
  for (const row of rows.whitelist) {
    pushUnique(draftFor(row.userId).whitelist, row.keyword);
  }
  for (const row of rows.usernameReplacements) {
    draftFor(row.userId).usernameReplacements.push({
      original: row.original,
      replacement: row.replacement,
    });
  }
  for (const row of rows.linkReplacements) {
    draftFor(row.userId).linkReplacements.push({
      original: row.original,
      replacement: row.replacement,
    });
  }

  const configurations = new Map<UserId, UserConfiguration>();
  for (const [userId, draft] of drafts) {
    configurations.set(userId, draft);
  }
  return configurations;
}
