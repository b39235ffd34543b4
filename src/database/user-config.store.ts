import type { ChannelKind } from './models/channel.model.js';
import type {
  ChatRef,
  ForwardSettings,
  KeywordList,
  Replacement,
  ReplacementTable,
  UserConfiguration,
  UserId,
  UserProfile,
} from '../types/forwarding.types.js';

/**
 * Durable storage behind the configuration registry.
 * Each mutating method is a single write.
 */
export interface UserConfigStore {
  loadAll(): Promise<Map<UserId, UserConfiguration>>;
  saveProfile(userId: UserId, profile: UserProfile): Promise<void>;
  upsertChannel(kind: ChannelKind, userId: UserId, chat: ChatRef): Promise<void>;
  removeChannel(kind: ChannelKind, userId: UserId, chatId: number): Promise<void>;
  saveSettings(userId: UserId, settings: ForwardSettings): Promise<void>;
  setForwardingEnabled(userId: UserId, enabled: boolean): Promise<void>;
  recordForward(userId: UserId, at: Date): Promise<void>;
  addKeyword(list: KeywordList, userId: UserId, keyword: string): Promise<void>;
  removeKeyword(list: KeywordList, userId: UserId, keyword: string): Promise<void>;
  upsertReplacement(table: ReplacementTable, userId: UserId, pair: Replacement): Promise<void>;
  removeReplacement(table: ReplacementTable, userId: UserId, original: string): Promise<void>;
  /** Remove the user's rows from every collection */
  deleteUser(userId: UserId): Promise<void>;
}
