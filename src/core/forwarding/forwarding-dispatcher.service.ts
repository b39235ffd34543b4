import { DeliveryError } from '../../shared/errors/forwarder.errors.js';
import { createModuleLogger } from '../../utils/logger.js';
import { applyTransformChain } from '../transformation/text-transformer.service.js';
import { evaluateFilters } from '../filtering/filter-engine.service.js';
import { extractText, planDelivery, type DeliveryPlan } from './delivery-plan.js';
import type { UserConfigRegistry } from '../registry/user-config.registry.js';
import type { MessagingClient } from '../sending/messaging-client.js';
import type { ChatId, UserConfiguration, UserId } from '../../types/forwarding.types.js';
import type { InboundMessage } from '../../types/message.types.js';

const log = createModuleLogger('dispatcher');

export type CandidateOutcome =
  | { userId: UserId; status: 'filtered' }
  | { userId: UserId; status: 'skipped'; reason: string }
  | { userId: UserId; status: 'dispatched'; delivered: ChatId[]; failed: ChatId[] }
  | { userId: UserId; status: 'error'; error: unknown };

/**
 * Relays each inbound message to the target chats of every user listening to
 * its chat. Users are handled independently and concurrently; the targets of
 * one user are handled one after another with the user's pause between them,
 * each failure isolated.
 */
export class ForwardingDispatcherService {
  constructor(
    private readonly registry: UserConfigRegistry,
    private readonly client: MessagingClient
  ) {}

  async onMessage(message: InboundMessage): Promise<CandidateOutcome[]> {
    const candidates = this.registry.findCandidates(message.chatId);
    if (candidates.length === 0) {
      return [];
    }

    log.debug(
      { chatId: message.chatId, messageId: message.messageId, candidates: candidates.length },
      'Dispatching message'
    );

    return await Promise.all(
      candidates.map((candidate) => this.processCandidate(message, candidate))
    );
  }

  /**
   * Handle one user against one snapshot of their configuration. Never rejects.
   */
  private async processCandidate(
    message: InboundMessage,
    config: UserConfiguration
  ): Promise<CandidateOutcome> {
    const { userId } = config;

    try {
      const originalText = extractText(message, config.settings);
      const transformedText = applyTransformChain(config, originalText);

      if (!evaluateFilters(config, transformedText)) {
        log.debug({ userId, messageId: message.messageId }, 'Message rejected by keyword filters');
        return { userId, status: 'filtered' };
      }

      const plan = planDelivery(message, originalText, transformedText, config.settings);
      if (plan.type === 'skip') {
        log.debug({ userId, messageId: message.messageId, reason: plan.reason }, 'Nothing to send');
        return { userId, status: 'skipped', reason: plan.reason };
      }

      const delivered: ChatId[] = [];
      const failed: ChatId[] = [];

      const delayMs = config.settings.delaySeconds * 1000;

      for (const [index, target] of config.targets.entries()) {
        if (index > 0 && delayMs > 0) {
          await this.sleep(delayMs);
        }
        try {
          await this.deliver(message, plan, target.chatId);
          delivered.push(target.chatId);
        } catch (error) {
          const deliveryError = new DeliveryError(userId, target.chatId, error);
          log.error(
            { err: deliveryError, userId, targetChatId: target.chatId, targetTitle: target.title },
            'Failed to deliver message to target'
          );
          failed.push(target.chatId);
        }
      }

      if (delivered.length > 0) {
        await this.recordForward(userId);
        log.info(
          { userId, messageId: message.messageId, delivered: delivered.length, targets: config.targets.length },
          'Forwarded message'
        );
      }

      return { userId, status: 'dispatched', delivered, failed };
    } catch (error) {
      log.error({ err: error, userId, chatId: message.chatId }, 'Error processing message for user');
      return { userId, status: 'error', error };
    }
  }

  private async deliver(message: InboundMessage, plan: DeliveryPlan, chatId: ChatId): Promise<void> {
    switch (plan.type) {
      case 'forward':
        await this.client.forwardNative(
          { chatId: message.chatId, messageId: message.messageId },
          chatId
        );
        return;
      case 'copy':
        await this.client.copyNative(
          { chatId: message.chatId, messageId: message.messageId },
          chatId
        );
        return;
      case 'media':
        await this.client.sendMedia(chatId, plan.media, plan.caption);
        return;
      case 'text':
        await this.client.sendText(chatId, plan.text, plan.showPreview);
        return;
      case 'skip':
        return;
    }
  }

  /**
   * Sleep utility
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private async recordForward(userId: UserId): Promise<void> {
    try {
      await this.registry.recordForward(userId);
    } catch (error) {
      // Statistics only; the message already went out
      log.warn({ err: error, userId }, 'Failed to record forwarding statistics');
    }
  }
}
