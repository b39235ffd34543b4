import { BaseRepository } from './base.repository.js';
import {
  SourceChannel,
  TargetChannel,
  type ChannelKind,
  type IChannel,
} from '../models/channel.model.js';
import type { ChannelRow } from '../persisted-rows.js';
import type { ChatRef, UserId } from '../../types/forwarding.types.js';

/**
 * Repository for a user's source or target chats
 * Both lists share one schema, stored in separate collections
 */
export class ChannelRepository extends BaseRepository<IChannel> {
  constructor(readonly kind: ChannelKind) {
    super(kind === 'source' ? SourceChannel : TargetChannel);
  }

  /**
   * All rows of every user, oldest first
   */
  async listAll(): Promise<ChannelRow[]> {
    const channels = await this.find({}, { addedAt: 1, _id: 1 });
    return channels.map((channel) => ({
      userId: channel.userId,
      channelId: channel.channelId,
      channelName: channel.channelName,
    }));
  }

  /**
   * Add a chat to the user's list, or refresh its title when already listed
   */
  async upsert(userId: UserId, chat: ChatRef): Promise<void> {
    await this.upsertOne(
      { userId, channelId: chat.chatId },
      {
        $set: { channelName: chat.title },
        $setOnInsert: { addedAt: new Date() },
      }
    );
  }

  async remove(userId: UserId, chatId: number): Promise<boolean> {
    return await this.deleteOne({ userId, channelId: chatId });
  }
}
