/**
 * MongoDB store unit tests
 * Repository calls are mocked; no database connection is made
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { MongoUserConfigStore } from '../../../src/database/mongo-user-config.store.js';
import { BaseRepository } from '../../../src/database/repositories/base.repository.js';

describe('MongoUserConfigStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('deleteUser', () => {
    it('should delete from all nine collections for the user', async () => {
      const deleteMany = vi.spyOn(BaseRepository.prototype, 'deleteMany').mockResolvedValue(1);

      await new MongoUserConfigStore().deleteUser(42);

      expect(deleteMany).toHaveBeenCalledTimes(9);
      expect(deleteMany.mock.calls.every(([filter]) => filter.userId === 42)).toBe(true);
    });

    it('should stop at the first failing collection', async () => {
      const deleteMany = vi
        .spyOn(BaseRepository.prototype, 'deleteMany')
        .mockResolvedValueOnce(2)
        .mockRejectedValueOnce(new Error('connection lost'))
        .mockResolvedValue(0);

      await expect(new MongoUserConfigStore().deleteUser(42)).rejects.toThrow('connection lost');
      expect(deleteMany).toHaveBeenCalledTimes(2);
    });

    it('should finish on a second call after a failure', async () => {
      const deleteMany = vi
        .spyOn(BaseRepository.prototype, 'deleteMany')
        .mockRejectedValueOnce(new Error('connection lost'))
        .mockResolvedValue(0);
      const store = new MongoUserConfigStore();

      await expect(store.deleteUser(42)).rejects.toThrow('connection lost');
      await store.deleteUser(42);

      expect(deleteMany).toHaveBeenCalledTimes(10);
    });
  });
});
