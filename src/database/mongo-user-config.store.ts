import { ChannelRepository } from './repositories/channel.repository.js';
import { KeywordRepository } from './repositories/keyword.repository.js';
import { ReplacementRepository } from './repositories/replacement.repository.js';
import { UserRepository } from './repositories/user.repository.js';
import { UserSettingsRepository } from './repositories/user-settings.repository.js';
import { ForwardingStatusRepository } from './repositories/forwarding-status.repository.js';
import { assembleConfigurations } from './persisted-rows.js';
import type { ChannelKind } from './models/channel.model.js';
import type { UserConfigStore } from './user-config.store.js';
import { createModuleLogger } from '../utils/logger.js';
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

const log = createModuleLogger('store');

interface UserScopedRepository {
  deleteMany(filter: { userId: UserId }): Promise<number>;
}

/**
 * MongoDB-backed configuration store, one collection per logical table
 */
export class MongoUserConfigStore implements UserConfigStore {
  private readonly users = new UserRepository();
  private readonly settings = new UserSettingsRepository();
  private readonly forwarding = new ForwardingStatusRepository();
  private readonly channels: Record<ChannelKind, ChannelRepository> = {
    source: new ChannelRepository('source'),
    target: new ChannelRepository('target'),
  };
  private readonly keywords: Record<KeywordList, KeywordRepository> = {
    blacklist: new KeywordRepository('blacklist'),
    whitelist: new KeywordRepository('whitelist'),
  };
  private readonly replacements: Record<ReplacementTable, ReplacementRepository> = {
    username: new ReplacementRepository('username'),
    link: new ReplacementRepository('link'),
  };

  async loadAll(): Promise<Map<UserId, UserConfiguration>> {
    const [
      users,
      sources,
      targets,
      settings,
      forwarding,
      blacklist,
      whitelist,
      usernameReplacements,
      linkReplacements,
    ] = await Promise.all([
      this.users.listAll(),
      this.channels.source.listAll(),
      this.channels.target.listAll(),
      this.settings.listAll(),
      this.forwarding.listAll(),
      this.keywords.blacklist.listAll(),
      this.keywords.whitelist.listAll(),
      this.replacements.username.listAll(),
      this.replacements.link.listAll(),
    ]);

    log.debug(
      { users: users.length, sources: sources.length, targets: targets.length },
      'Loaded configuration rows'
    );

    return assembleConfigurations({
      users,
      sources,
      targets,
      settings,
      forwarding,
      blacklist,
      whitelist,
      usernameReplacements,
      linkReplacements,
    });
  }

  async saveProfile(userId: UserId, profile: UserProfile): Promise<void> {
    await this.users.saveProfile(userId, profile);
  }

  async upsertChannel(kind: ChannelKind, userId: UserId, chat: ChatRef): Promise<void> {
    await this.channels[kind].upsert(userId, chat);
  }

  async removeChannel(kind: ChannelKind, userId: UserId, chatId: number): Promise<void> {
    await this.channels[kind].remove(userId, chatId);
  }

  async saveSettings(userId: UserId, settings: ForwardSettings): Promise<void> {
    await this.settings.save(userId, settings);
  }

  async setForwardingEnabled(userId: UserId, enabled: boolean): Promise<void> {
    await this.forwarding.setActive(userId, enabled);
  }

  async recordForward(userId: UserId, at: Date): Promise<void> {
    await this.forwarding.recordForward(userId, at);
  }

  async addKeyword(list: KeywordList, userId: UserId, keyword: string): Promise<void> {
    await this.keywords[list].add(userId, keyword);
  }

  async removeKeyword(list: KeywordList, userId: UserId, keyword: string): Promise<void> {
    await this.keywords[list].remove(userId, keyword);
  }

  async upsertReplacement(
    table: ReplacementTable,
    userId: UserId,
    pair: Replacement
  ): Promise<void> {
    await this.replacements[table].upsert(userId, pair);
  }

  async removeReplacement(
    table: ReplacementTable,
    userId: UserId,
    original: string
  ): Promise<void> {
    await this.replacements[table].remove(userId, original);
  }

  /**
   * Delete the user's rows one collection at a time, the user document last.
   * A failure stops at that collection and leaves the rest in place; calling
   * again finishes the job, since deleting nothing is not an error.
   */
  async deleteUser(userId: UserId): Promise<void> {
    const repositories: UserScopedRepository[] = [
      this.channels.source,
      this.channels.target,
      this.keywords.blacklist,
      this.keywords.whitelist,
      this.replacements.username,
      this.replacements.link,
      this.settings,
      this.forwarding,
      this.users,
    ];

    let removed = 0;
    for (const repository of repositories) {
      removed += await repository.deleteMany({ userId });
    }
    log.info({ userId, removed }, 'Deleted persisted user configuration');
  }
}
