export interface TelegramUser {
  id: number;
  is_bot?: boolean;
  first_name: string;
  last_name?: string;
  username?: string;
  language_code?: string;
}

export type TelegramChatType = 'private' | 'group' | 'supergroup' | 'channel';

export interface TelegramChat {
  id: number;
  type: TelegramChatType;
  title?: string;
  username?: string;
}

export interface TelegramMessageEntity {
  type: string;
  offset: number;
  length: number;
}

export interface TelegramMessage {
  message_id: number;
  date: number;
  chat: TelegramChat;
  from?: TelegramUser;
  text?: string;
  entities?: TelegramMessageEntity[];
}

export interface TelegramCallbackQuery {
  id: string;
  from: TelegramUser;
  message?: TelegramMessage;
  data?: string;
}

/** Subset of the Bot API `Update` object the gateway consumes. */
export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
  edited_message?: TelegramMessage;
  callback_query?: TelegramCallbackQuery;
}

export interface InlineKeyboardButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboardMarkup {
  inline_keyboard: InlineKeyboardButton[][];
}

export type TelegramParseMode = 'Markdown' | 'MarkdownV2' | 'HTML';

export type TelegramChatAction = 'typing' | 'upload_document';

/** Identity of the chat participant an event came from. */
export interface NormalizedSender {
  userId: string;
  username?: string;
  firstName: string;
}

interface NormalizedEventBase {
  updateId: number;
  chatId: number;
  sender: NormalizedSender;
  timestamp: number;
}

export interface NormalizedCommandEvent extends NormalizedEventBase {
  type: 'command';
  messageId: number;
  command: string;
  args: string;
}

export interface NormalizedTextEvent extends NormalizedEventBase {
  type: 'text';
  messageId: number;
  text: string;
}

export interface NormalizedCallbackEvent extends NormalizedEventBase {
  type: 'callback';
  callbackQueryId: string;
  messageId?: number;
  data: string;
}

export type NormalizedTelegramEvent =
  | NormalizedCommandEvent
  | NormalizedTextEvent
  | NormalizedCallbackEvent;

export interface SendMessageCommand {
  chatId: number | string;
  text: string;
  parseMode?: TelegramParseMode;
  replyMarkup?: InlineKeyboardMarkup;
}

export interface EditMessageTextCommand {
  chatId: number | string;
  messageId: number;
  text: string;
  parseMode?: TelegramParseMode;
  replyMarkup?: InlineKeyboardMarkup;
}

export interface AnswerCallbackQueryCommand {
  callbackQueryId: string;
  text?: string;
}

export interface TelegramApiEnvelope {
  ok: boolean;
  result?: unknown;
  description?: string;
  error_code?: number;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface HttpRequestInitLike {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export type HttpClient = (url: string, init?: HttpRequestInitLike) => Promise<HttpResponseLike>;

export interface TelegramBotClientConfig {
  botToken: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  httpClient?: HttpClient;
}
