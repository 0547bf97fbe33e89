import type { AgentSessionSummary } from '@dharma-relay/agent-client';

export const ARTIFACTS_NOTICE =
  "\n\n📎 *Note:* There are artifacts available in this session that can't be displayed in Telegram.";

export const HELP_TEXT = [
  '🧘 *Available commands:*',
  '',
  '/start - Welcome message',
  '/help - Show this help message',
  '/newsession - Create a new conversation session',
  '/listsessions - List your active sessions',
  '/deletesession - Delete your current session',
  '',
  'Simply type a message to ask a question or request a meditation guide!',
].join('\n');

export const NO_SESSIONS = "You don't have any active sessions. Use /newsession to create one.";
export const SESSION_LIST_HEADER = '🔍 Your active sessions:\nClick to select one:';
export const NO_ACTIVE_SESSION = "You don't have an active session. Use /newsession to create one.";
export const NO_SESSION_TO_DELETE = "You don't have an active session to delete.";
export const NO_PENDING_DELETE = 'This confirmation is no longer valid. Use /deletesession again.';
export const SESSION_DELETED = '✅ Session deleted successfully!';
export const SESSION_ALREADY_GONE = '✅ That session no longer exists on the server. It has been removed.';
export const DELETE_CANCELLED = 'Session deletion cancelled.';
export const SESSION_EXPIRED =
  '⚠️ Your session no longer exists. Send a message to start a new one, or use /newsession.';
export const GENERIC_FAILURE =
  '⚠️ Something went wrong while processing your message. Please try again later.';

export function welcomeText(firstName: string): string {
  return (
    `🙏 Welcome, ${firstName}!\n\n` +
    'I can help you explore spiritual traditions and meditation. ' +
    'Use /newsession to start a new conversation or simply ask me a question.'
  );
}

export function unknownCommandText(command: string): string {
  return `Unknown command: \`/${command}\`\n\n${HELP_TEXT}`;
}

export function sessionCreatedText(sessionId: string): string {
  return `✅ New session created successfully!\nSession ID: \`${sessionId}\`\n\nYou can now ask me anything.`;
}

export function autoSessionCreatedText(sessionId: string): string {
  return `✨ I've created a new session for you automatically.\nSession ID: \`${sessionId}\``;
}

export function sessionSelectedText(sessionId: string): string {
  return `✅ Selected session: \`${sessionId}\`\n\nYou can now continue your conversation.`;
}

export function deletePromptText(sessionId: string): string {
  return `Are you sure you want to delete your current session?\nSession ID: \`${sessionId}\``;
}

export function createFailedText(detail: string): string {
  return `❌ Failed to create session. Error: ${detail}`;
}

export function autoSessionFailedText(detail: string): string {
  return `❌ Failed to create a session. Error: ${detail}\n\nPlease use /newsession to create one manually.`;
}

export function listFailedText(detail: string): string {
  return `❌ Failed to retrieve sessions. Error: ${detail}`;
}

export function deleteFailedText(detail: string): string {
  return `❌ Failed to delete session. Error: ${detail}`;
}

export function runFailedText(detail: string): string {
  return `❌ Failed to get a response. Error: ${detail}\n\nPlease try again or create a new session with /newsession`;
}

/** Ids longer than 10 characters are shortened to their first 8 plus `...`. */
export function displaySessionId(sessionId: string): string {
  return sessionId.length > 10 ? `${sessionId.slice(0, 8)}...` : sessionId;
}

export function sessionButtonLabel(session: AgentSessionSummary): string {
  return `Session ${displaySessionId(session.id)} (${session.createdAt ?? 'Unknown date'})`;
}
