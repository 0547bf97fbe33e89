import {
  AnswerCallbackQueryCommand,
  EditMessageTextCommand,
  HttpClient,
  HttpRequestInitLike,
  HttpResponseLike,
  SendMessageCommand,
  TelegramApiEnvelope,
  TelegramBotClientConfig,
  TelegramChatAction,
} from './types';

const DEFAULT_API_BASE_URL = 'https://api.telegram.org';
const DEFAULT_TIMEOUT_MS = 10_000;

/** Maximum length of a single Telegram text message. */
export const TELEGRAM_MAX_TEXT_LENGTH = 4096;

export interface SentMessage {
  messageId: number;
  chatId: number;
}

/** Thin Bot API client covering the methods the gateway calls. */
export class TelegramBotClient {
  private readonly botToken: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly httpClient: HttpClient;

  constructor(config: TelegramBotClientConfig) {
    if (!config?.botToken) {
      throw new Error('TelegramBotClient requires a botToken.');
    }

    this.botToken = config.botToken;
    this.apiBaseUrl = (config.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.httpClient = config.httpClient ?? defaultHttpClient;
  }

  async sendMessage(command: SendMessageCommand): Promise<SentMessage> {
    if (!command.text) {
      throw new Error('SendMessageCommand requires non-empty text.');
    }

    if (command.text.length > TELEGRAM_MAX_TEXT_LENGTH) {
      throw new Error(`SendMessageCommand text exceeds ${TELEGRAM_MAX_TEXT_LENGTH} characters.`);
    }

    const result = await this.call('sendMessage', {
      chat_id: command.chatId,
      text: command.text,
      parse_mode: command.parseMode,
      reply_markup: command.replyMarkup,
    });

    return toSentMessage(result);
  }

  async editMessageText(command: EditMessageTextCommand): Promise<void> {
    await this.call('editMessageText', {
      chat_id: command.chatId,
      message_id: command.messageId,
      text: command.text,
      parse_mode: command.parseMode,
      reply_markup: command.replyMarkup,
    });
  }

  async answerCallbackQuery(command: AnswerCallbackQueryCommand): Promise<void> {
    await this.call('answerCallbackQuery', {
      callback_query_id: command.callbackQueryId,
      text: command.text,
    });
  }

  async sendChatAction(chatId: number | string, action: TelegramChatAction): Promise<void> {
    await this.call('sendChatAction', { chat_id: chatId, action });
  }

  /** Register the webhook URL and the secret Telegram must echo back on each delivery. */
  async setWebhook(url: string, secretToken: string): Promise<void> {
    await this.call('setWebhook', {
      url,
      secret_token: secretToken,
      allowed_updates: ['message', 'callback_query'],
    });
  }

  private async call(method: string, payload: Record<string, unknown>): Promise<unknown> {
    const response = await this.httpClient(this.buildMethodUrl(method), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      timeoutMs: this.timeoutMs,
    });

    const envelope = await readEnvelope(response);

    if (!response.ok || !envelope?.ok) {
      throw new TelegramApiError(
        envelope?.description ?? `Telegram API request failed with status ${response.status}.`,
        method,
        response.status,
        envelope?.error_code,
      );
    }

    return envelope.result;
  }

  private buildMethodUrl(method: string): string {
    return `${this.apiBaseUrl}/bot${this.botToken}/${method}`;
  }
}

export class TelegramApiError extends Error {
  readonly method: string;
  readonly status: number;
  readonly errorCode?: number;

  constructor(message: string, method: string, status: number, errorCode?: number) {
    super(message);
    this.name = 'TelegramApiError';
    this.method = method;
    this.status = status;
    this.errorCode = errorCode;
  }
}

async function readEnvelope(response: HttpResponseLike): Promise<TelegramApiEnvelope | undefined> {
  let body: unknown;
  try {
    body = await response.json();
  } catch {
    return undefined;
  }

  if (!body || typeof body !== 'object') {
    return undefined;
  }

  const record: Record<string, unknown> = { ...body };
  const ok = record.ok;
  if (typeof ok !== 'boolean') {
    return undefined;
  }

  return {
    ok,
    result: record.result,
    description: typeof record.description === 'string' ? record.description : undefined,
    error_code: typeof record.error_code === 'number' ? record.error_code : undefined,
  };
}

function toSentMessage(result: unknown): SentMessage {
  if (result && typeof result === 'object' && 'message_id' in result && 'chat' in result) {
    const chat = result.chat;
    const chatId = chat && typeof chat === 'object' && 'id' in chat ? Number(chat.id) : NaN;
    return { messageId: Number(result.message_id), chatId };
  }

  throw new TelegramApiError('Telegram API returned no message', 'sendMessage', 200);
}

const defaultHttpClient: HttpClient = async (url, init?: HttpRequestInitLike) => {
  const response = await fetch(url, {
    method: init?.method,
    headers: init?.headers,
    body: init?.body,
    signal: init?.timeoutMs ? AbortSignal.timeout(init.timeoutMs) : undefined,
  });

  const textClone = response.clone();

  return {
    ok: response.ok,
    status: response.status,
    json: () => response.json(),
    text: () => textClone.text(),
  };
};
