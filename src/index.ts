import http from 'http';
import { webhookCallback } from 'grammy';
import { logger } from './utils/logger.js';
import { config } from './config/index.js';
import { connectDatabase, disconnectDatabase } from './database/connection.js';
import { initBot, bot } from './bot/bot.js';
import { DIContainer } from './shared/di/container.js';

// Import handlers to register them
import './bot/handlers/forward.handler.js';

let server: http.Server | null = null;

async function main() {
  try {
    logger.info('Starting Telegram Auto-Forward Bot...');
    logger.info(`Environment: ${config.nodeEnv}`);

    // Connect to MongoDB
    await connectDatabase(config.mongodbUri);

    // Initialize the bot
    await initBot();

    // Initialize DI container with all services
    DIContainer.initialize(bot.api);
    logger.info('DI Container initialized with all services');

    // Warm the registry before any update is handled
    await DIContainer.resolve('UserConfigRegistry').loadAll();

    // Set webhook if WEBHOOK_URL is provided, otherwise use long polling
    const webhookUrl = config.webhookUrl;
    const webhookPath = '/webhook';

    if (webhookUrl) {
      logger.info(`Setting up webhook at ${webhookUrl}${webhookPath}`);
      await bot.api.setWebhook(`${webhookUrl}${webhookPath}`, {
        allowed_updates: ['message', 'channel_post'],
      });
    } else {
      logger.warn('No WEBHOOK_URL provided, using long polling (not recommended for production)');
    }

    // Start HTTP server for health checks and webhooks
    const port = config.port;
    const notFoundResponse = JSON.stringify({ error: 'Not found' });

    // Create webhook handler
    const handleWebhook = webhookCallback(bot, 'http');

    server = http.createServer(async (req, res) => {
      // Handle webhook
      if (req.url === webhookPath && req.method === 'POST') {
        try {
          await handleWebhook(req, res);
        } catch (error) {
          logger.error({ err: error }, 'Error handling webhook');
          res.writeHead(500);
          res.end();
        }
        return;
      }

      // Health check endpoint
      const isHealthEndpoint = req.url === '/health' || req.url === '/';
      const body = isHealthEndpoint
        ? JSON.stringify({
            status: 'ok',
            service: 'telegram-autoforward-bot',
            users: DIContainer.resolve('UserConfigRegistry').size,
          })
        : notFoundResponse;
      res.writeHead(isHealthEndpoint ? 200 : 404, { 'Content-Type': 'application/json' });
      res.end(body);
    });

    server.listen(port, () => {
      logger.info(`Server listening on port ${port}`);

      // If no webhook, start long polling
      if (!webhookUrl) {
        logger.info('Starting long polling...');
        bot.start({ allowed_updates: ['message', 'channel_post'] }).catch((error: unknown) => {
          logger.error({ err: error }, 'Error in long polling');
        });
      }
    });

    logger.info('Bot is running...');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start bot');
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown() {
  logger.info('Shutting down gracefully...');

  try {
    // Stop bot if running in long polling mode
    if (!config.webhookUrl) {
      await bot.stop();
      logger.info('Bot stopped');
    }

    // Close HTTP server
    if (server) {
      await new Promise<void>((resolve) => {
        server?.close(() => {
          logger.info('HTTP server closed');
          resolve();
        });
      });
    }

    await disconnectDatabase();
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});

// Start the application
void main();
