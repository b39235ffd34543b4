import { BaseRepository } from './base.repository.js';
import { User, type IUser } from '../models/user.model.js';
import type { UserRow } from '../persisted-rows.js';
import type { UserId, UserProfile } from '../../types/forwarding.types.js';

export class UserRepository extends BaseRepository<IUser> {
  constructor() {
    super(User);
  }

  async listAll(): Promise<UserRow[]> {
    const users = await this.find({});
    return users.map((user) => ({
      userId: user.userId,
      ...(user.firstName ? { firstName: user.firstName } : {}),
      ...(user.username ? { username: user.username } : {}),
    }));
  }

  /**
   * Create the user on first login, refresh the display fields afterwards
   */
  async saveProfile(userId: UserId, profile: UserProfile): Promise<void> {
    const now = new Date();
    await this.upsertOne(
      { userId },
      {
        $set: { firstName: profile.firstName, username: profile.username, lastActiveAt: now },
        $setOnInsert: { createdAt: now },
      }
    );
  }
}
