import { Model, Document, FilterQuery, UpdateQuery, SortOrder } from 'mongoose';

/**
 * Base repository providing common CRUD operations
 * All specific repositories extend this class
 */
export abstract class BaseRepository<T extends Document> {
  constructor(protected model: Model<T>) {}

  /**
   * Find all documents matching the filter, optionally sorted
   */
  async find(filter: FilterQuery<T>, sort?: Record<string, SortOrder>): Promise<T[]> {
    const query = this.model.find(filter);
    return sort ? await query.sort(sort) : await query;
  }

  /**
   * Update the document matching the filter, creating it when missing
   */
  async upsertOne(filter: FilterQuery<T>, data: UpdateQuery<T>): Promise<void> {
    await this.model.updateOne(filter, data, { upsert: true });
  }

  /**
   * Delete the first document matching the filter
   */
  async deleteOne(filter: FilterQuery<T>): Promise<boolean> {
    const result = await this.model.deleteOne(filter);
    return result.deletedCount > 0;
  }

  /**
   * Delete documents matching the filter
   */
  async deleteMany(filter: FilterQuery<T>): Promise<number> {
    const result = await this.model.deleteMany(filter);
    return result.deletedCount ?? 0;
  }
}
