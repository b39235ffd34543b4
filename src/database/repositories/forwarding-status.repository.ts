import { BaseRepository } from './base.repository.js';
import { ForwardingStatus, type IForwardingStatus } from '../models/forwarding-status.model.js';
import type { ForwardingRow } from '../persisted-rows.js';
import type { UserId } from '../../types/forwarding.types.js';

/**
 * Repository for the per-user forwarding switch and its counters
 */
export class ForwardingStatusRepository extends BaseRepository<IForwardingStatus> {
  constructor() {
    super(ForwardingStatus);
  }

  async listAll(): Promise<ForwardingRow[]> {
    const rows = await this.find({});
    return rows.map((row) => ({
      userId: row.userId,
      isActive: row.isActive,
      totalForwarded: row.totalForwarded,
      ...(row.lastForwardedAt ? { lastForwardedAt: row.lastForwardedAt } : {}),
    }));
  }

  async setActive(userId: UserId, isActive: boolean): Promise<void> {
    await this.upsertOne({ userId }, { $set: { isActive, updatedAt: new Date() } });
  }

  /**
   * Count one forwarded message
   */
  async recordForward(userId: UserId, at: Date): Promise<void> {
    await this.upsertOne(
      { userId },
      {
        $inc: { totalForwarded: 1 },
        $set: { lastForwardedAt: at, updatedAt: at },
      }
    );
  }
}
