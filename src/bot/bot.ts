import { Bot } from 'grammy';
import { config } from '../config/index.js';
import { createModuleLogger } from '../utils/logger.js';

const log = createModuleLogger('bot');

export const bot = new Bot(config.botToken);

// Logging middleware
bot.use(async (ctx, next) => {
  const updateType = ctx.update.channel_post
    ? 'channel_post'
    : ctx.update.message
    ? 'message'
    : 'other';
  log.debug({ updateId: ctx.update.update_id, chatId: ctx.chat?.id }, `Received update: ${updateType}`);

  await next();
});

// Error handler
bot.catch((err) => {
  log.error({ err: err.error, updateId: err.ctx.update.update_id }, 'Bot error');
});

export async function initBot(): Promise<void> {
  await bot.init();
  log.info(`Bot initialized: @${bot.botInfo.username}`);
}
