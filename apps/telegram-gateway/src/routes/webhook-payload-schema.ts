import type { TelegramUpdate } from '@dharma-relay/telegram-sdk';
import { z } from 'zod';

const userSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean().optional(),
  first_name: z.string(),
  last_name: z.string().optional(),
  username: z.string().optional(),
  language_code: z.string().optional(),
});

const chatSchema = z.object({
  id: z.number().int(),
  type: z.enum(['private', 'group', 'supergroup', 'channel']),
  title: z.string().optional(),
  username: z.string().optional(),
});

const messageSchema = z.object({
  message_id: z.number().int(),
  date: z.number().int().nonnegative(),
  chat: chatSchema,
  from: userSchema.optional(),
  text: z.string().optional(),
  entities: z
    .array(z.object({ type: z.string(), offset: z.number().int(), length: z.number().int() }))
    .optional(),
});

/**
 * Subset of the Bot API `Update` object the gateway reads. Unknown update
 * kinds and fields are stripped rather than rejected, so Telegram can add
 * fields without breaking delivery.
 */
const telegramUpdateSchema = z.object({
  update_id: z.number().int().nonnegative(),
  message: messageSchema.optional(),
  edited_message: messageSchema.optional(),
  callback_query: z
    .object({
      id: z.string().min(1),
      from: userSchema,
      message: messageSchema.optional(),
      data: z.string().optional(),
    })
    .optional(),
});

export type TelegramUpdateParseResult =
  | { success: true; update: TelegramUpdate }
  | { success: false; issues: string[] };

/** Validate an inbound webhook body before it reaches the chat service. */
export function parseTelegramUpdate(payload: unknown): TelegramUpdateParseResult {
  const result = telegramUpdateSchema.safeParse(payload);

  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  return { success: true, update: result.data };
}
