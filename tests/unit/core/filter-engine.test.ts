/**
 * Keyword filter unit tests
 */

import { describe, it, expect } from 'vitest';
import { evaluateFilters, FilterEngineService } from '../../../src/core/filtering/filter-engine.service.js';
import { UserConfigRegistry } from '../../../src/core/registry/user-config.registry.js';
import { ConfigNotFoundError } from '../../../src/shared/errors/forwarder.errors.js';
import { buildConfiguration, configurationMap } from '../../fixtures/configurations.js';
import { FakeUserConfigStore } from '../../utils/fake-user-config.store.js';

describe('Filter engine', () => {
  describe('evaluateFilters', () => {
    it('should pass everything when both lists are empty', () => {
      const config = buildConfiguration(1);

      expect(evaluateFilters(config, 'anything')).toBe(true);
      expect(evaluateFilters(config, undefined)).toBe(true);
    });

    it('should reject on a blacklist hit regardless of case', () => {
      const config = buildConfiguration(1, { blacklist: ['Spam'] });

      expect(evaluateFilters(config, 'Buy SPAM now')).toBe(false);
    });

    it('should match blacklist keywords as substrings', () => {
      const config = buildConfiguration(1, { blacklist: ['ad'] });

      expect(evaluateFilters(config, 'a great read')).toBe(false);
    });

    it('should require a whitelist hit when the whitelist is set', () => {
      const config = buildConfiguration(1, { whitelist: ['sale', 'deal'] });

      expect(evaluateFilters(config, 'Big DEAL today')).toBe(true);
      expect(evaluateFilters(config, 'weather report')).toBe(false);
    });

    it('should let the blacklist win over the whitelist', () => {
      const config = buildConfiguration(1, { blacklist: ['spam'], whitelist: ['buy'] });

      expect(evaluateFilters(config, 'buy spam')).toBe(false);
    });

    it('should treat missing text as matching nothing', () => {
      expect(evaluateFilters(buildConfiguration(1, { blacklist: ['x'] }), undefined)).toBe(true);
      expect(evaluateFilters(buildConfiguration(1, { whitelist: ['x'] }), undefined)).toBe(false);
    });
  });

  describe('FilterEngineService', () => {
    it('should evaluate against the registered configuration', async () => {
      const registry = new UserConfigRegistry(
        new FakeUserConfigStore(configurationMap(buildConfiguration(3, { whitelist: ['news'] })))
      );
      await registry.loadAll();
      const filters = new FilterEngineService(registry);

      expect(filters.passes(3, 'Morning News')).toBe(true);
      expect(filters.passes(3, 'cat pictures')).toBe(false);
    });

    it('should throw for unknown users', () => {
      const filters = new FilterEngineService(new UserConfigRegistry(new FakeUserConfigStore()));

      expect(() => filters.passes(5, 'text')).toThrow(ConfigNotFoundError);
    });
  });
});
