import { z } from 'zod';

export const configSchema = z.object({
  botToken: z.string().min(1, 'BOT_TOKEN is required'),
  mongodbUri: z.string().url('MONGODB_URI must be a valid URL'),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  webhookUrl: z.string().url('WEBHOOK_URL must be a valid URL').optional(),
  port: z.coerce.number().int().positive('PORT must be a positive integer').default(3000),
});

export type ConfigSchema = z.infer<typeof configSchema>;
