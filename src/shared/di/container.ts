import type { Api } from 'grammy';
import { MongoUserConfigStore } from '../../database/mongo-user-config.store.js';
import { UserConfigRegistry } from '../../core/registry/user-config.registry.js';
import { TextTransformerService } from '../../core/transformation/text-transformer.service.js';
import { FilterEngineService } from '../../core/filtering/filter-engine.service.js';
import { ForwardingDispatcherService } from '../../core/forwarding/forwarding-dispatcher.service.js';
import { TelegramSenderService } from '../../core/sending/telegram-sender.service.js';
import type { UserConfigStore } from '../../database/user-config.store.js';
import type { MessagingClient } from '../../core/sending/messaging-client.js';

export interface ServiceMap {
  UserConfigStore: UserConfigStore;
  UserConfigRegistry: UserConfigRegistry;
  TextTransformerService: TextTransformerService;
  FilterEngineService: FilterEngineService;
  MessagingClient: MessagingClient;
  ForwardingDispatcherService: ForwardingDispatcherService;
}

export type ServiceKey = keyof ServiceMap;

/**
 * Dependency Injection Container
 * Manages service lifecycle and dependencies
 */
export class DIContainer {
  private static instances = new Map<ServiceKey, unknown>();

  /**
   * Register a service instance
   */
  static register<K extends ServiceKey>(key: K, instance: ServiceMap[K]): void {
    this.instances.set(key, instance);
  }

  /**
   * Resolve a service instance
   */
  static resolve<K extends ServiceKey>(key: K): ServiceMap[K] {
    const instance = this.instances.get(key);
    if (!instance) {
      throw new Error(`No instance registered for key: ${key}`);
    }
    return instance as ServiceMap[K];
  }

  /**
   * Check if a service is registered
   */
  static has(key: ServiceKey): boolean {
    return this.instances.has(key);
  }

  /**
   * Initialize all services and repositories
   * Call this once during application startup, before loading the registry
   */
  static initialize(api: Api, store: UserConfigStore = new MongoUserConfigStore()): void {
    this.register('UserConfigStore', store);

    // Registry is shared by the dispatcher and the command layer
    const registry = new UserConfigRegistry(store);
    this.register('UserConfigRegistry', registry);

    this.register('TextTransformerService', new TextTransformerService(registry));
    this.register('FilterEngineService', new FilterEngineService(registry));

    const client = new TelegramSenderService(api);
    this.register('MessagingClient', client);
    this.register('ForwardingDispatcherService', new ForwardingDispatcherService(registry, client));
  }

  /**
   * Clear all registered instances
   * Useful for testing
   */
  static clear(): void {
    this.instances.clear();
  }
}
