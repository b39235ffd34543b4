import { createEmptyConfiguration } from '../../src/core/registry/configuration.js';
import type { UserConfiguration, UserId } from '../../src/types/forwarding.types.js';

export type ConfigurationOverrides = Partial<Omit<UserConfiguration, 'userId' | 'settings'>> & {
  settings?: Partial<UserConfiguration['settings']>;
};

/**
 * Configuration with defaults, forwarding switched on
 */
export function buildConfiguration(
  userId: UserId,
  overrides: ConfigurationOverrides = {}
): UserConfiguration {
  const base = createEmptyConfiguration(userId);
  const { settings, ...rest } = overrides;
  return {
    ...base,
    forwarding: { enabled: true, totalForwarded: 0 },
    ...rest,
    settings: { ...base.settings, ...settings },
  };
}

export function configurationMap(...configs: UserConfiguration[]): Map<UserId, UserConfiguration> {
  return new Map(configs.map((config) => [config.userId, config]));
}
