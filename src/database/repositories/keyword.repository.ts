import { BaseRepository } from './base.repository.js';
import { BlacklistKeyword, WhitelistKeyword, type IKeyword } from '../models/keyword.model.js';
import type { KeywordRow } from '../persisted-rows.js';
import type { KeywordList, UserId } from '../../types/forwarding.types.js';

/**
 * Repository for blacklist or whitelist keywords
 */
export class KeywordRepository extends BaseRepository<IKeyword> {
  constructor(readonly list: KeywordList) {
    super(list === 'blacklist' ? BlacklistKeyword : WhitelistKeyword);
  }

  async listAll(): Promise<KeywordRow[]> {
    const keywords = await this.find({}, { addedAt: 1, _id: 1 });
    return keywords.map((entry) => ({ userId: entry.userId, keyword: entry.keyword }));
  }

  async add(userId: UserId, keyword: string): Promise<void> {
    await this.upsertOne({ userId, keyword }, { $setOnInsert: { addedAt: new Date() } });
  }

  async remove(userId: UserId, keyword: string): Promise<boolean> {
    return await this.deleteOne({ userId, keyword });
  }
}
