export { TelegramBotClient, TelegramApiError, TELEGRAM_MAX_TEXT_LENGTH, type SentMessage } from './client';
export {
  normalizeUpdate,
  normalizeMessage,
  normalizeSender,
  parseCommand,
  buildInlineKeyboard,
  MAX_CALLBACK_DATA_BYTES,
  type ParsedCommand,
} from './normalizers';
export { verifySecretToken, isValidSecretToken, SECRET_TOKEN_HEADER } from './secret-token';
export type * from './types';
