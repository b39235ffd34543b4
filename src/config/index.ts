import dotenv from 'dotenv';
import { configSchema } from './schema.js';
import type { Config } from '../types/config.types.js';

// Load environment variables
dotenv.config();

function loadConfig(): Config {
  const rawConfig = {
    botToken: process.env.BOT_TOKEN,
    mongodbUri: process.env.MONGODB_URI,
    nodeEnv: process.env.NODE_ENV ?? 'development',
    logLevel: process.env.LOG_LEVEL ?? 'info',
    // An empty WEBHOOK_URL in .env means long polling
    webhookUrl: process.env.WEBHOOK_URL ? process.env.WEBHOOK_URL : undefined,
    port: process.env.PORT ?? 3000,
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

export const config = loadConfig();
