import { KeyedMutex } from '../../shared/concurrency/keyed-mutex.js';
import { ConfigNotFoundError, PersistenceError } from '../../shared/errors/forwarder.errors.js';
import { ValidationHelper } from '../../shared/helpers/validation.helper.js';
import { createModuleLogger } from '../../utils/logger.js';
import type { UserConfigStore } from '../../database/user-config.store.js';
import type { ChannelKind } from '../../database/models/channel.model.js';
import type {
  ChatId,
  ChatRef,
  ForwardSettings,
  KeywordList,
  ReplacementTable,
  ToggleableSetting,
  UserConfiguration,
  UserId,
  UserProfile,
} from '../../types/forwarding.types.js';
import {
  channelsOf,
  createEmptyConfiguration,
  freezeConfiguration,
  isForwardingActive,
  replacementsOf,
  upsertChatRef,
  upsertReplacement,
  withChannels,
  withKeywords,
  withReplacements,
} from './configuration.js';

const log = createModuleLogger('registry');

interface MutationOutcome<R> {
  next: UserConfiguration;
  result: R;
}

interface CommittedMutation<R> {
  snapshot: UserConfiguration;
  result: R;
}

/**
 * In-memory cache of every user's forwarding configuration.
 *
 * Snapshots are immutable. A mutation builds the next snapshot, writes the change
 * to the store and only then publishes the snapshot, so a failed write leaves the
 * previous snapshot in place. Mutations for one user are serialized; different
 * users never wait on each other.
 */
export class UserConfigRegistry {
  private configurations = new Map<UserId, UserConfiguration>();
  private readonly mutex = new KeyedMutex<UserId>();

  constructor(private readonly store: UserConfigStore) {}

  /**
   * Replace the cache with everything the store holds. Called once at startup.
   */
  async loadAll(): Promise<ReadonlyMap<UserId, UserConfiguration>> {
    let loaded: Map<UserId, UserConfiguration>;
    try {
      loaded = await this.store.loadAll();
    } catch (error) {
      throw new PersistenceError('loadAll', undefined, error);
    }

    const configurations = new Map<UserId, UserConfiguration>();
    for (const [userId, config] of loaded) {
      configurations.set(userId, freezeConfiguration(config));
    }
    this.configurations = configurations;

    const active = [...configurations.values()].filter(isForwardingActive).length;
    log.info({ users: configurations.size, active }, 'Loaded user configurations');

    return configurations;
  }

  get(userId: UserId): UserConfiguration | undefined {
    return this.configurations.get(userId);
  }

  list(): UserConfiguration[] {
    return [...this.configurations.values()];
  }

  get size(): number {
    return this.configurations.size;
  }

  /**
   * Users whose forwarding is active and who listen to the given chat
   */
  findCandidates(chatId: ChatId): UserConfiguration[] {
    return this.list().filter(
      (config) =>
        isForwardingActive(config) && config.sources.some((source) => source.chatId === chatId)
    );
  }

  /**
   * Create the configuration on first login, refresh the profile on later logins
   */
  async registerUser(userId: UserId, profile: UserProfile = {}): Promise<UserConfiguration> {
    return await this.mutex.runExclusive(userId, async () => {
      const current = this.configurations.get(userId) ?? createEmptyConfiguration(userId);
      const next = freezeConfiguration({ ...current, profile });

      await this.persist('registerUser', userId, () => this.store.saveProfile(userId, profile));

      this.configurations.set(userId, next);
      log.info({ userId }, 'Registered user');
      return next;
    });
  }

  async upsertSource(userId: UserId, chat: ChatRef): Promise<UserConfiguration> {
    return await this.upsertChannel('source', userId, chat);
  }

  async removeSource(userId: UserId, chatId: ChatId): Promise<boolean> {
    return await this.removeChannel('source', userId, chatId);
  }

  async upsertTarget(userId: UserId, chat: ChatRef): Promise<UserConfiguration> {
    return await this.upsertChannel('target', userId, chat);
  }

  async removeTarget(userId: UserId, chatId: ChatId): Promise<boolean> {
    return await this.removeChannel('target', userId, chatId);
  }

  /**
   * Store the forwarding switch. Empty chat lists do not prevent switching on;
   * they only keep the user out of the candidate set.
   */
  async setEnabled(userId: UserId, enabled: boolean): Promise<UserConfiguration> {
    const { snapshot } = await this.mutate(
      userId,
      'setEnabled',
      (current) => ({
        next: { ...current, forwarding: { ...current.forwarding, enabled } },
        result: undefined,
      }),
      () => this.store.setForwardingEnabled(userId, enabled)
    );
    return snapshot;
  }

  async updateSettings(
    userId: UserId,
    patch: Partial<ForwardSettings>
  ): Promise<Readonly<ForwardSettings>> {
    const validated = ValidationHelper.settingsPatch(patch);

    const { snapshot } = await this.mutate(
      userId,
      'updateSettings',
      (current) => ({
        next: { ...current, settings: { ...current.settings, ...validated } },
        result: undefined,
      }),
      (next) => this.store.saveSettings(userId, next.settings)
    );
    return snapshot.settings;
  }

  /**
   * Flip one boolean setting, returning its new value
   */
  async toggleSetting(userId: UserId, key: ToggleableSetting): Promise<boolean> {
    const { result } = await this.mutate(
      userId,
      'toggleSetting',
      (current) => {
        const value = !current.settings[key];
        const settings: ForwardSettings = { ...current.settings };
        settings[key] = value;
        return { next: { ...current, settings }, result: value };
      },
      (next) => this.store.saveSettings(userId, next.settings)
    );
    return result;
  }

  /**
   * Returns false when the keyword was already listed
   */
  async addKeyword(userId: UserId, list: KeywordList, keyword: string): Promise<boolean> {
    const value = ValidationHelper.keyword(keyword);

    const { result } = await this.mutate(
      userId,
      'addKeyword',
      (current) => {
        if (current[list].includes(value)) {
          return { next: current, result: false };
        }
        return { next: withKeywords(current, list, [...current[list], value]), result: true };
      },
      () => this.store.addKeyword(list, userId, value)
    );
    return result;
  }

  async removeKeyword(userId: UserId, list: KeywordList, keyword: string): Promise<boolean> {
    const value = ValidationHelper.keyword(keyword);

    const { result } = await this.mutate(
      userId,
      'removeKeyword',
      (current) => {
        const remaining = current[list].filter((entry) => entry !== value);
        return {
          next: withKeywords(current, list, remaining),
          result: remaining.length !== current[list].length,
        };
      },
      () => this.store.removeKeyword(list, userId, value)
    );
    return result;
  }

  /**
   * Register a replacement pair. Editing an existing original keeps its position.
   */
  async setReplacement(
    userId: UserId,
    table: ReplacementTable,
    original: string,
    replacement: string
  ): Promise<UserConfiguration> {
    const pair = ValidationHelper.replacement(original, replacement);

    const { snapshot } = await this.mutate(
      userId,
      'setReplacement',
      (current) => ({
        next: withReplacements(current, table, upsertReplacement(replacementsOf(current, table), pair)),
        result: undefined,
      }),
      () => this.store.upsertReplacement(table, userId, pair)
    );
    return snapshot;
  }

  async removeReplacement(
    userId: UserId,
    table: ReplacementTable,
    original: string
  ): Promise<boolean> {
    const { result } = await this.mutate(
      userId,
      'removeReplacement',
      (current) => {
        const pairs = replacementsOf(current, table);
        const remaining = pairs.filter((pair) => pair.original !== original);
        return {
          next: withReplacements(current, table, remaining),
          result: remaining.length !== pairs.length,
        };
      },
      () => this.store.removeReplacement(table, userId, original)
    );
    return result;
  }

  /**
   * Count one forwarded message for the user
   */
  async recordForward(userId: UserId, at: Date = new Date()): Promise<void> {
    await this.mutate(
      userId,
      'recordForward',
      (current) => ({
        next: {
          ...current,
          forwarding: {
            ...current.forwarding,
            totalForwarded: current.forwarding.totalForwarded + 1,
            lastForwardedAt: at,
          },
        },
        result: undefined,
      }),
      () => this.store.recordForward(userId, at)
    );
  }

  /**
   * Remove the user everywhere. Unknown users are not an error.
   * Returns whether a configuration was cached.
   */
  async deleteUser(userId: UserId): Promise<boolean> {
    return await this.mutex.runExclusive(userId, async () => {
      await this.persist('deleteUser', userId, () => this.store.deleteUser(userId));

      const existed = this.configurations.delete(userId);
      log.info({ userId, existed }, 'Deleted user configuration');
      return existed;
    });
  }

  private async upsertChannel(
    kind: ChannelKind,
    userId: UserId,
    chat: ChatRef
  ): Promise<UserConfiguration> {
    const validated = ValidationHelper.chatRef(chat);

    const { snapshot } = await this.mutate(
      userId,
      kind === 'source' ? 'upsertSource' : 'upsertTarget',
      (current) => ({
        next: withChannels(current, kind, upsertChatRef(channelsOf(current, kind), validated)),
        result: undefined,
      }),
      () => this.store.upsertChannel(kind, userId, validated)
    );
    return snapshot;
  }

  private async removeChannel(kind: ChannelKind, userId: UserId, chatId: ChatId): Promise<boolean> {
    const validated = ValidationHelper.chatId(chatId);

    const { result } = await this.mutate(
      userId,
      kind === 'source' ? 'removeSource' : 'removeTarget',
      (current) => {
        const chats = channelsOf(current, kind);
        const remaining = chats.filter((chat) => chat.chatId !== validated);
        return {
          next: withChannels(current, kind, remaining),
          result: remaining.length !== chats.length,
        };
      },
      () => this.store.removeChannel(kind, userId, validated)
    );
    return result;
  }

  /**
   * Run one mutation under the user's lock: build the next snapshot, write, publish
   */
  private async mutate<R>(
    userId: UserId,
    operation: string,
    apply: (current: UserConfiguration) => MutationOutcome<R>,
    write: (next: UserConfiguration) => Promise<void>
  ): Promise<CommittedMutation<R>> {
    return await this.mutex.runExclusive(userId, async () => {
      const current = this.configurations.get(userId);
      if (!current) {
        throw new ConfigNotFoundError(userId);
      }

      const { next, result } = apply(current);
      const frozen = freezeConfiguration(next);

      await this.persist(operation, userId, () => write(frozen));

      this.configurations.set(userId, frozen);
      log.debug({ userId, operation }, 'Configuration updated');
      return { snapshot: frozen, result };
    });
  }

  private async persist(
    operation: string,
    userId: UserId,
    write: () => Promise<void>
  ): Promise<void> {
    try {
      await write();
    } catch (error) {
      log.error({ err: error, userId, operation }, 'Persisting configuration change failed');
      throw new PersistenceError(operation, userId, error);
    }
  }
}
