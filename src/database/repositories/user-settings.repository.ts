import { BaseRepository } from './base.repository.js';
import { UserSettings, type IUserSettings } from '../models/user-settings.model.js';
import type { SettingsRow } from '../persisted-rows.js';
import type { ForwardSettings, UserId } from '../../types/forwarding.types.js';

export class UserSettingsRepository extends BaseRepository<IUserSettings> {
  constructor() {
    super(UserSettings);
  }

  async listAll(): Promise<SettingsRow[]> {
    const rows = await this.find({});
    return rows.map((row) => ({
      userId: row.userId,
      hideHeader: row.hideHeader,
      forwardMedia: row.forwardMedia,
      urlPreviews: row.urlPreviews,
      removeUsernames: row.removeUsernames,
      removeLinks: row.removeLinks,
      captionForward: row.captionForward,
      delaySeconds: row.delaySeconds,
      maxMessageLength: row.maxMessageLength,
    }));
  }

  /**
   * Write the complete settings record in one update
   */
  async save(userId: UserId, settings: ForwardSettings): Promise<void> {
    await this.upsertOne({ userId }, { $set: { ...settings, updatedAt: new Date() } });
  }
}
