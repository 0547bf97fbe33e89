import {
  extractReplyText,
  type AgentRunClient,
  type ReplyExtractor,
} from '@dharma-relay/agent-client';
import {
  buildInlineKeyboard,
  MAX_CALLBACK_DATA_BYTES,
  normalizeUpdate,
  TelegramApiError,
  type InlineKeyboardButton,
  type NormalizedCallbackEvent,
  type NormalizedCommandEvent,
  type NormalizedSender,
  type NormalizedTelegramEvent,
  type NormalizedTextEvent,
  type SendMessageCommand,
  type TelegramBotClient,
  type TelegramParseMode,
  type TelegramUpdate,
} from '@dharma-relay/telegram-sdk';

import type { AppLogger } from '../../telemetry/logger';
import type { GatewayMetrics } from '../../telemetry/metrics';
import {
  toLifecycleError,
  type LifecycleError,
  type SessionBinding,
  type SessionLifecycleManager,
  type SessionUser,
} from '../session';

import {
  ARTIFACTS_NOTICE,
  autoSessionCreatedText,
  autoSessionFailedText,
  createFailedText,
  DELETE_CANCELLED,
  deleteFailedText,
  deletePromptText,
  GENERIC_FAILURE,
  HELP_TEXT,
  listFailedText,
  NO_ACTIVE_SESSION,
  NO_PENDING_DELETE,
  NO_SESSION_TO_DELETE,
  NO_SESSIONS,
  runFailedText,
  SESSION_ALREADY_GONE,
  SESSION_DELETED,
  SESSION_EXPIRED,
  SESSION_LIST_HEADER,
  sessionButtonLabel,
  sessionCreatedText,
  sessionSelectedText,
  unknownCommandText,
  welcomeText,
} from './messages';

export const SELECT_SESSION_PREFIX = 'select_session:';
export const CONFIRM_DELETE = 'confirm_delete';
export const CANCEL_DELETE = 'cancel_delete';

/** Bot API calls the chat service makes. */
export type TelegramMessenger = Pick<
  TelegramBotClient,
  'sendMessage' | 'editMessageText' | 'answerCallbackQuery' | 'sendChatAction'
>;

/** Agent service calls made outside the session lifecycle. */
export type AgentConversation = Pick<AgentRunClient, 'run' | 'listArtifacts'>;

export interface TelegramChatServiceOptions {
  /** Maximum number of characters in one Telegram message. */
  maxTextLength: number;
  extractReply?: ReplyExtractor;
}

export interface HandleUpdateResult {
  handled: boolean;
  kind?: NormalizedTelegramEvent['type'];
  /** Set when processing threw; the user has been sent an apology. */
  failed?: boolean;
}

type OutboundKind = 'assistant' | 'command' | 'notice' | 'error';

/**
 * Turns Telegram updates into session lifecycle calls and agent runs, and
 * renders every outcome back to the chat as text.
 */
export class TelegramChatService {
  private readonly extractReply: ReplyExtractor;

  constructor(
    private readonly bot: TelegramMessenger,
    private readonly agent: AgentConversation,
    private readonly sessions: SessionLifecycleManager,
    private readonly metrics: GatewayMetrics,
    private readonly logger: AppLogger,
    private readonly options: TelegramChatServiceOptions,
  ) {
    this.extractReply = options.extractReply ?? extractReplyText;
  }

  async handleUpdate(update: TelegramUpdate): Promise<HandleUpdateResult> {
    const event = normalizeUpdate(update);

    if (!event) {
      this.logger.debug({ updateId: update.update_id }, 'Ignoring unsupported Telegram update');
      return { handled: false };
    }

    try {
      switch (event.type) {
        case 'command':
          await this.handleCommand(event);
          break;
        case 'callback':
          await this.handleCallback(event);
          break;
        case 'text':
          await this.handleText(event);
          break;
      }
    } catch (error) {
      this.metrics.updateFailures.inc({ kind: event.type });
      this.logger.error(
        { updateId: event.updateId, kind: event.type, error },
        'Failed to process Telegram update',
      );
      await this.sendText(event.chatId, GENERIC_FAILURE, 'error');
      return { handled: false, kind: event.type, failed: true };
    }

    return { handled: true, kind: event.type };
  }

  private async handleCommand(event: NormalizedCommandEvent): Promise<void> {
    const user = toSessionUser(event.sender);

    switch (event.command) {
      case 'start':
        await this.sendText(event.chatId, welcomeText(event.sender.firstName), 'command');
        this.countCommand('start', 'success');
        return;
      case 'help':
        await this.sendText(event.chatId, HELP_TEXT, 'command', 'Markdown');
        this.countCommand('help', 'success');
        return;
      case 'newsession': {
        const result = await this.sessions.createSession(user);
        if (result.ok) {
          await this.sendText(
            event.chatId,
            sessionCreatedText(result.value.remoteSessionId),
            'command',
            'Markdown',
          );
        } else {
          await this.sendText(event.chatId, createFailedText(result.error.message), 'error');
        }
        this.countCommand('newsession', result.ok ? 'success' : 'error');
        return;
      }
      case 'listsessions':
        await this.listSessions(event.chatId, user);
        return;
      case 'deletesession': {
        const result = await this.sessions.requestDelete(user);
        if (result.ok) {
          const keyboard = buildInlineKeyboard([
            [
              { text: '✅ Yes, delete it', callback_data: CONFIRM_DELETE },
              { text: '❌ No, keep it', callback_data: CANCEL_DELETE },
            ],
          ]);
          await this.sendText(
            event.chatId,
            deletePromptText(result.value.remoteSessionId),
            'command',
            'Markdown',
            keyboard,
          );
        } else {
          await this.sendText(event.chatId, NO_ACTIVE_SESSION, 'command');
        }
        this.countCommand('deletesession', result.ok ? 'success' : 'rejected');
        return;
      }
      default:
        await this.sendText(event.chatId, unknownCommandText(event.command), 'command', 'Markdown');
        this.countCommand('unknown', 'success');
    }
  }

  private async listSessions(chatId: number, user: SessionUser): Promise<void> {
    const result = await this.sessions.listSessions(user);

    if (!result.ok) {
      await this.sendText(chatId, listFailedText(result.error.message), 'error');
      this.countCommand('listsessions', 'error');
      return;
    }

    const buttons: InlineKeyboardButton[][] = [];
    for (const session of result.value) {
      const data = `${SELECT_SESSION_PREFIX}${session.id}`;
      if (Buffer.byteLength(data, 'utf8') > MAX_CALLBACK_DATA_BYTES) {
        this.logger.warn({ sessionId: session.id }, 'Session id too long for a callback button');
        continue;
      }
      buttons.push([{ text: sessionButtonLabel(session), callback_data: data }]);
    }

    if (buttons.length === 0) {
      await this.sendText(chatId, NO_SESSIONS, 'command');
    } else {
      const keyboard = buildInlineKeyboard(buttons);
      await this.sendText(chatId, SESSION_LIST_HEADER, 'command', undefined, keyboard);
    }
    this.countCommand('listsessions', 'success');
  }

  private async handleCallback(event: NormalizedCallbackEvent): Promise<void> {
    const user = toSessionUser(event.sender);

    try {
      await this.bot.answerCallbackQuery({ callbackQueryId: event.callbackQueryId });
    } catch (error) {
      this.logger.warn(
        { callbackQueryId: event.callbackQueryId, error },
        'Failed to answer callback query',
      );
    }

    if (event.data.startsWith(SELECT_SESSION_PREFIX)) {
      const sessionId = event.data.slice(SELECT_SESSION_PREFIX.length);
      if (!sessionId) {
        this.countCommand('select_session', 'rejected');
        return;
      }
      await this.sessions.selectSession(user, sessionId);
      await this.replyToCallback(event, sessionSelectedText(sessionId), 'Markdown');
      this.countCommand('select_session', 'success');
      return;
    }

    if (event.data === CONFIRM_DELETE) {
      const result = await this.sessions.confirmDelete(user);
      if (result.ok) {
        await this.replyToCallback(event, SESSION_DELETED);
        this.countCommand('confirm_delete', 'success');
        return;
      }

      switch (result.error.kind) {
        case 'no-pending-delete':
          await this.replyToCallback(event, NO_PENDING_DELETE);
          break;
        case 'no-session':
          await this.replyToCallback(event, NO_SESSION_TO_DELETE);
          break;
        case 'not-found':
          await this.replyToCallback(event, SESSION_ALREADY_GONE);
          break;
        case 'upstream':
          await this.replyToCallback(event, deleteFailedText(result.error.message));
          break;
      }
      this.countCommand('confirm_delete', 'error');
      return;
    }

    if (event.data === CANCEL_DELETE) {
      await this.sessions.cancelDelete(user);
      await this.replyToCallback(event, DELETE_CANCELLED);
      this.countCommand('cancel_delete', 'success');
      return;
    }

    this.logger.debug({ data: event.data }, 'Ignoring unknown callback data');
    this.countCommand('unknown_callback', 'rejected');
  }

  private async handleText(event: NormalizedTextEvent): Promise<void> {
    const user = toSessionUser(event.sender);
    const ensured = await this.sessions.ensureSession(user);

    if (!ensured.ok) {
      await this.sendText(event.chatId, autoSessionFailedText(ensured.error.message), 'error');
      return;
    }

    const { binding, created } = ensured.value;
    if (created) {
      await this.sendText(
        event.chatId,
        autoSessionCreatedText(binding.remoteSessionId),
        'notice',
        'Markdown',
      );
    }

    await this.sendTyping(event.chatId);

    let response: unknown;
    try {
      response = await this.agent.run({
        userHandle: binding.remoteUserHandle,
        sessionId: binding.remoteSessionId,
        text: event.text,
      });
    } catch (error) {
      await this.handleRunFailure(event.chatId, user, binding, error);
      return;
    }

    let reply = this.extractReply(response);
    if (await this.hasArtifacts(binding)) {
      reply += ARTIFACTS_NOTICE;
    }

    await this.sendText(event.chatId, reply, 'assistant', 'Markdown');
  }

  private async handleRunFailure(
    chatId: number,
    user: SessionUser,
    binding: SessionBinding,
    error: unknown,
  ): Promise<void> {
    const failure = toLifecycleError(error);
    this.metrics.agentRunFailures.inc({ reason: failureReason(failure) });
    this.logger.error(
      {
        localUserId: user.localUserId,
        sessionId: binding.remoteSessionId,
        status: failure.status,
        error,
      },
      'Agent run failed',
    );

    if (failure.kind === 'not-found') {
      await this.sessions.forgetSession(user, binding.remoteSessionId);
      await this.sendText(chatId, SESSION_EXPIRED, 'error');
      return;
    }

    await this.sendText(chatId, runFailedText(failure.message), 'error');
  }

  /** A failed artifact lookup counts as no artifacts. */
  private async hasArtifacts(binding: SessionBinding): Promise<boolean> {
    try {
      const artifacts = await this.agent.listArtifacts(
        binding.remoteUserHandle,
        binding.remoteSessionId,
      );
      return artifacts.length > 0;
    } catch (error) {
      this.logger.warn(
        { sessionId: binding.remoteSessionId, error },
        'Failed to fetch session artifacts',
      );
      return false;
    }
  }

  private async replyToCallback(
    event: NormalizedCallbackEvent,
    text: string,
    parseMode?: TelegramParseMode,
  ): Promise<void> {
    if (event.messageId === undefined) {
      await this.sendText(event.chatId, text, 'command', parseMode);
      return;
    }

    try {
      await this.bot.editMessageText({
        chatId: event.chatId,
        messageId: event.messageId,
        text,
        parseMode,
      });
      this.metrics.outboundMessages.inc({ kind: 'edit', status: 'success' });
    } catch (error) {
      this.metrics.outboundMessages.inc({ kind: 'edit', status: 'error' });
      this.logger.warn(
        { chatId: event.chatId, error },
        'Failed to edit Telegram message; sending a new one',
      );
      await this.sendText(event.chatId, text, 'command', parseMode);
    }
  }

  private async sendTyping(chatId: number): Promise<void> {
    try {
      await this.bot.sendChatAction(chatId, 'typing');
      this.metrics.outboundMessages.inc({ kind: 'typing', status: 'success' });
    } catch (error) {
      this.metrics.outboundMessages.inc({ kind: 'typing', status: 'error' });
      this.logger.warn({ chatId, error }, 'Failed to send Telegram typing action');
    }
  }

  /** Send text, splitting messages that exceed the Telegram limit. */
  private async sendText(
    chatId: number,
    text: string,
    kind: OutboundKind,
    parseMode?: TelegramParseMode,
    replyMarkup?: SendMessageCommand['replyMarkup'],
  ): Promise<void> {
    if (!text.trim()) {
      return;
    }

    const chunks = chunkText(text, this.options.maxTextLength);

    for (const [index, chunk] of chunks.entries()) {
      const command: SendMessageCommand = {
        chatId,
        text: chunk,
        parseMode,
        replyMarkup: index === chunks.length - 1 ? replyMarkup : undefined,
      };

      try {
        await this.deliver(command);
        this.metrics.outboundMessages.inc({ kind, status: 'success' });
      } catch (error) {
        this.metrics.outboundMessages.inc({ kind, status: 'error' });
        this.logger.error({ chatId, error }, 'Failed to send Telegram message');
        break;
      }
    }
  }

  /** Telegram rejects unbalanced Markdown with a 400; such chunks are resent as plain text. */
  private async deliver(command: SendMessageCommand): Promise<void> {
    try {
      await this.bot.sendMessage(command);
    } catch (error) {
      if (!command.parseMode || !(error instanceof TelegramApiError) || error.status !== 400) {
        throw error;
      }
      this.logger.debug({ chatId: command.chatId, error }, 'Resending message without parse mode');
      await this.bot.sendMessage({ ...command, parseMode: undefined });
    }
  }

  private countCommand(command: string, status: 'success' | 'error' | 'rejected'): void {
    this.metrics.commandCounter.inc({ command, status });
  }
}

function failureReason(failure: LifecycleError): 'not_found' | 'network' | 'status' {
  if (failure.kind === 'not-found') {
    return 'not_found';
  }
  return failure.status === undefined ? 'network' : 'status';
}

/** The agent service knows users by Telegram username, or `user<id>` without one. */
export function toSessionUser(sender: NormalizedSender): SessionUser {
  return {
    localUserId: sender.userId,
    remoteUserHandle: sender.username ?? `user${sender.userId}`,
  };
}

/** Split text into chunks no longer than `maxLength`, preferring whitespace boundaries. */
export function chunkText(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > maxLength) {
    const window = remaining.slice(0, maxLength + 1);
    let splitIndex = Math.max(window.lastIndexOf('\n'), window.lastIndexOf(' '));
    if (splitIndex <= 0) {
      splitIndex = maxLength;
      if (splitIndex > 1 && isHighSurrogate(remaining.charCodeAt(splitIndex - 1))) {
        splitIndex -= 1;
      }
    }
    const chunk = remaining.slice(0, splitIndex).trimEnd();
    if (chunk.length > 0) {
      chunks.push(chunk);
    }
    remaining = remaining.slice(splitIndex).trimStart();
  }

  if (remaining.length > 0) {
    chunks.push(remaining);
  }

  return chunks;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
