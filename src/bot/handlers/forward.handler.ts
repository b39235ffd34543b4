import { bot } from '../bot.js';
import { parseInboundMessage } from '../../utils/message-parser.js';
import { DIContainer } from '../../shared/di/container.js';
import { createModuleLogger } from '../../utils/logger.js';

const log = createModuleLogger('forward-handler');

// Posts in channels and messages in groups the bot is a member of
bot.on(['channel_post', 'message'], async (ctx) => {
  const message = ctx.msg;
  const dispatcher = DIContainer.resolve('ForwardingDispatcherService');

  const outcomes = await dispatcher.onMessage(parseInboundMessage(message));
  if (outcomes.length > 0) {
    log.debug(
      { chatId: message.chat.id, messageId: message.message_id, outcomes: outcomes.map((o) => o.status) },
      'Message dispatched'
    );
  }
});
