export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface Config {
  botToken: string;
  mongodbUri: string;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  webhookUrl?: string;
  port: number;
}
