import { BaseRepository } from './base.repository.js';
import {
  LinkReplacement,
  UsernameReplacement,
  type IReplacement,
} from '../models/replacement.model.js';
import type { ReplacementRow } from '../persisted-rows.js';
import type { Replacement, ReplacementTable, UserId } from '../../types/forwarding.types.js';

/**
 * Repository for username or link replacement pairs
 * Rows are returned in registration order, which is the order they are applied in
 */
export class ReplacementRepository extends BaseRepository<IReplacement> {
  constructor(readonly table: ReplacementTable) {
    super(table === 'username' ? UsernameReplacement : LinkReplacement);
  }

  async listAll(): Promise<ReplacementRow[]> {
    const rows = await this.find({}, { createdAt: 1, _id: 1 });
    return rows.map((row) => ({
      userId: row.userId,
      original: row.original,
      replacement: row.replacement,
    }));
  }

  async upsert(userId: UserId, pair: Replacement): Promise<void> {
    const now = new Date();
    await this.upsertOne(
      { userId, original: pair.original },
      {
        $set: { replacement: pair.replacement, updatedAt: now },
        $setOnInsert: { createdAt: now },
      }
    );
  }

  async remove(userId: UserId, original: string): Promise<boolean> {
    return await this.deleteOne({ userId, original });
  }
}
