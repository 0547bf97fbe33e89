import {
  InlineKeyboardButton,
  InlineKeyboardMarkup,
  NormalizedSender,
  NormalizedTelegramEvent,
  TelegramMessage,
  TelegramUpdate,
  TelegramUser,
} from './types';

/** Telegram rejects callback payloads longer than 64 bytes. */
export const MAX_CALLBACK_DATA_BYTES = 64;

const COMMAND_PATTERN = /^\/([a-zA-Z0-9_]+)(?:@[a-zA-Z0-9_]+)?(?:\s+([\s\S]*))?$/;

export interface ParsedCommand {
  command: string;
  args: string;
}

/**
 * Reduce a Bot API update to the event the gateway acts on. Messages from bots,
 * edits, and updates without text or callback data yield `undefined`.
 */
export function normalizeUpdate(update: TelegramUpdate): NormalizedTelegramEvent | undefined {
  if (!update || typeof update.update_id !== 'number') {
    return undefined;
  }

  if (update.callback_query) {
    const query = update.callback_query;
    const chatId = query.message?.chat.id ?? query.from.id;
    if (!query.data || query.from.is_bot) {
      return undefined;
    }

    return {
      type: 'callback',
      updateId: update.update_id,
      chatId,
      sender: normalizeSender(query.from),
      timestamp: (query.message?.date ?? 0) * 1000,
      callbackQueryId: query.id,
      messageId: query.message?.message_id,
      data: query.data,
    };
  }

  if (update.message) {
    return normalizeMessage(update.update_id, update.message);
  }

  return undefined;
}

export function normalizeMessage(
  updateId: number,
  message: TelegramMessage,
): NormalizedTelegramEvent | undefined {
  if (!message.from || message.from.is_bot) {
    return undefined;
  }

  const text = message.text?.trim();
  if (!text) {
    return undefined;
  }

  const base = {
    updateId,
    chatId: message.chat.id,
    sender: normalizeSender(message.from),
    timestamp: message.date * 1000,
    messageId: message.message_id,
  };

  const command = parseCommand(text);
  if (command) {
    return { ...base, type: 'command', command: command.command, args: command.args };
  }

  return { ...base, type: 'text', text };
}

/** Parse `/name@bot args` into a lower-cased command name and its trimmed arguments. */
export function parseCommand(text: string): ParsedCommand | undefined {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) {
    return undefined;
  }

  return {
    command: match[1].toLowerCase(),
    args: (match[2] ?? '').trim(),
  };
}

export function normalizeSender(user: TelegramUser): NormalizedSender {
  return {
    userId: String(user.id),
    username: user.username || undefined,
    firstName: user.first_name,
  };
}

/** Build an inline keyboard, validating each button's callback payload size. */
export function buildInlineKeyboard(rows: InlineKeyboardButton[][]): InlineKeyboardMarkup {
  for (const row of rows) {
    for (const button of row) {
      if (Buffer.byteLength(button.callback_data, 'utf8') > MAX_CALLBACK_DATA_BYTES) {
        throw new Error(
          `Callback data for button "${button.text}" exceeds ${MAX_CALLBACK_DATA_BYTES} bytes.`,
        );
      }
    }
  }

  return { inline_keyboard: rows.map((row) => row.map((button) => ({ ...button }))) };
}
