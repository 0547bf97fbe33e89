export { AgentRunClient, AgentServiceError, DEFAULT_AGENT_TIMEOUTS } from './client';
export {
  createReplyExtractor,
  extractReplyText,
  candidatesShape,
  eventListShape,
  legacyResponseShape,
  dataMessagesShape,
  DEFAULT_REPLY_SHAPES,
  FALLBACK_REPLY,
  type ReplyExtractor,
  type ReplyShape,
} from './reply-extractor';
export type {
  AgentRunClientConfig,
  AgentRunRequest,
  AgentRunTimeouts,
  AgentSession,
  AgentSessionSummary,
  HttpClient,
  HttpRequestInitLike,
  HttpResponseLike,
  RunAgentCommand,
} from './types';
