/**
 * Text transform chain unit tests
 */

import { describe, it, expect } from 'vitest';
import {
  applyReplacements,
  applyTransformChain,
  capLength,
  stripLinks,
  stripUsernames,
  TextTransformerService,
} from '../../../src/core/transformation/text-transformer.service.js';
import { UserConfigRegistry } from '../../../src/core/registry/user-config.registry.js';
import { ConfigNotFoundError } from '../../../src/shared/errors/forwarder.errors.js';
import { buildConfiguration, configurationMap } from '../../fixtures/configurations.js';
import { FakeUserConfigStore } from '../../utils/fake-user-config.store.js';

describe('Text transform chain', () => {
  describe('stripUsernames', () => {
    it('should remove every mention and keep the surrounding spaces', () => {
      expect(stripUsernames('ask @alice or @bob_2 today')).toBe('ask  or  today');
    });

    it('should leave text without mentions unchanged', () => {
      expect(stripUsernames('no mentions here')).toBe('no mentions here');
    });

    it('should leave a bare @ alone', () => {
      expect(stripUsernames('meet @ noon')).toBe('meet @ noon');
    });
  });

  describe('stripLinks', () => {
    it('should remove http and https links with path and query', () => {
      expect(stripLinks('a http://x.com/p?q=1 b https://y.org/#top c')).toBe('a  b  c');
    });

    it('should stop at a percent sign that is not an escape', () => {
      expect(stripLinks('see http://x.com/a%zz end')).toBe('see %zz end');
    });

    it('should keep percent-encoded octets inside the link', () => {
      expect(stripLinks('go https://x.com/a%20b now')).toBe('go  now');
    });

    it('should not touch bare domains', () => {
      expect(stripLinks('visit x.com')).toBe('visit x.com');
    });
  });

  describe('applyReplacements', () => {
    it('should replace every occurrence', () => {
      expect(applyReplacements('ping @old and @old', [{ original: '@old', replacement: '@new' }])).toBe(
        'ping @new and @new'
      );
    });

    it('should apply pairs in order, each on the previous output', () => {
      const pairs = [
        { original: 'a', replacement: 'b' },
        { original: 'b', replacement: 'c' },
      ];
      expect(applyReplacements('a', pairs)).toBe('c');
    });

    it('should treat the original literally', () => {
      expect(applyReplacements('price: $5 (net)', [{ original: '$5 (net)', replacement: '$6' }])).toBe(
        'price: $6'
      );
    });
  });

  describe('capLength', () => {
    it('should keep text at the limit', () => {
      expect(capLength('abcdefghij', 10)).toBe('abcdefghij');
    });

    it('should cut longer text and append the marker within the limit', () => {
      expect(capLength('abcdefghij', 8)).toBe('abcde...');
    });

    it('should not split an emoji at the cut', () => {
      // The cut after six units would land between the two halves of the emoji
      expect(capLength('aaaaa😀bbbbbbbbbb', 9)).toBe('aaaaa...');
    });

    it('should keep an emoji that ends right at the cut', () => {
      expect(capLength('aaaa😀bbbbbbbbbb', 9)).toBe('aaaa😀...');
    });
  });

  describe('applyTransformChain', () => {
    it('should strip usernames and links when both are enabled', () => {
      const config = buildConfiguration(1, { settings: { removeUsernames: true, removeLinks: true } });

      expect(applyTransformChain(config, 'contact @alice at http://x.com')).toBe('contact  at ');
    });

    it('should only strip links when usernames are kept', () => {
      const config = buildConfiguration(1, { settings: { removeLinks: true } });

      expect(applyTransformChain(config, 'visit https://x.com now')).toBe('visit  now');
    });

    it('should return the text unchanged with default settings and no rules', () => {
      const config = buildConfiguration(1);

      expect(applyTransformChain(config, 'hello @alice https://x.com')).toBe('hello @alice https://x.com');
    });

    it('should strip before replacing', () => {
      const config = buildConfiguration(1, {
        settings: { removeUsernames: true },
        usernameReplacements: [{ original: '@alice', replacement: '@bob' }],
      });

      expect(applyTransformChain(config, 'hi @alice')).toBe('hi ');
    });

    it('should apply username replacements before link replacements', () => {
      const config = buildConfiguration(1, {
        usernameReplacements: [{ original: '@shop', replacement: 'shop.com' }],
        linkReplacements: [{ original: 'shop.com', replacement: 'store.org' }],
      });

      expect(applyTransformChain(config, 'buy at @shop')).toBe('buy at store.org');
    });

    it('should replace links that survived stripping', () => {
      const config = buildConfiguration(1, {
        settings: { removeLinks: true },
        linkReplacements: [{ original: 'x.com', replacement: 'y.org' }],
      });

      expect(applyTransformChain(config, 'go https://x.com/a x.com')).toBe('go  y.org');
    });

    it('should cap the result last', () => {
      const config = buildConfiguration(1, {
        settings: { maxMessageLength: 10 },
        usernameReplacements: [{ original: 'hi', replacement: 'hello there' }],
      });

      expect(applyTransformChain(config, 'hi')).toBe('hello t...');
    });
  });

  describe('TextTransformerService', () => {
    it('should transform with the registered configuration', async () => {
      const store = new FakeUserConfigStore(
        configurationMap(buildConfiguration(7, { settings: { removeUsernames: true } }))
      );
      const registry = new UserConfigRegistry(store);
      await registry.loadAll();

      expect(new TextTransformerService(registry).transform(7, 'by @alice')).toBe('by ');
    });

    it('should throw for unknown users', () => {
      const registry = new UserConfigRegistry(new FakeUserConfigStore());

      expect(() => new TextTransformerService(registry).transform(99, 'text')).toThrow(ConfigNotFoundError);
    });
  });
});
