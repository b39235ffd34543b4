import { z } from 'zod';
import { InvalidInputError } from '../errors/forwarder.errors.js';
import { TELEGRAM_MESSAGE_LIMIT } from '../constants/default-settings.js';
import type { ChatRef, ForwardSettings, Replacement } from '../../types/forwarding.types.js';

const chatIdSchema = z.number().int('chat id must be an integer').refine((id) => id !== 0, {
  message: 'chat id must not be 0',
});

const chatRefSchema = z.object({
  chatId: chatIdSchema,
  title: z.string().trim().max(255),
});

const keywordSchema = z.string().trim().min(1, 'keyword must not be empty').max(200);

const replacementSchema = z.object({
  original: z.string().min(1, 'original must not be empty').max(500),
  replacement: z.string().max(500),
});

const MAX_DELAY_SECONDS = 60;

const settingsPatchSchema = z
  .object({
    hideHeader: z.boolean(),
    forwardMedia: z.boolean(),
    urlPreviews: z.boolean(),
    removeUsernames: z.boolean(),
    removeLinks: z.boolean(),
    captionForward: z.boolean(),
    delaySeconds: z.number().int().min(0).max(MAX_DELAY_SECONDS),
    // Room for the "..." marker
    maxMessageLength: z.number().int().min(4).max(TELEGRAM_MESSAGE_LIMIT),
  })
  .partial()
  .strict();

/**
 * Validation of configuration command arguments.
 * Every method throws InvalidInputError listing the failed fields.
 */
export class ValidationHelper {
  static chatId(chatId: number): number {
    return this.parse(chatIdSchema, chatId, 'chat id');
  }

  static chatRef(chat: ChatRef): ChatRef {
    return this.parse(chatRefSchema, chat, 'chat');
  }

  static keyword(keyword: string): string {
    return this.parse(keywordSchema, keyword, 'keyword');
  }

  static replacement(original: string, replacement: string): Replacement {
    return this.parse(replacementSchema, { original, replacement }, 'replacement');
  }

  static settingsPatch(patch: Partial<ForwardSettings>): Partial<ForwardSettings> {
    return this.parse(settingsPatchSchema, patch, 'settings');
  }

  private static parse<T>(schema: z.ZodType<T>, value: unknown, label: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      throw new InvalidInputError(`Invalid ${label}: ${issues.join('; ')}`, { value });
    }
    return result.data;
  }
}
