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

/** Per-call wait limits in milliseconds. */
export interface AgentRunTimeouts {
  session: number;
  run: number;
  probe: number;
}

export interface AgentRunClientConfig {
  baseUrl: string;
  appName: string;
  timeouts?: Partial<AgentRunTimeouts>;
  httpClient?: HttpClient;
}

export interface AgentSession {
  id: string;
}

export interface AgentSessionSummary {
  id: string;
  createdAt?: string;
}

export interface AgentMessagePart {
  text: string;
}

export interface AgentMessage {
  role: 'user';
  parts: AgentMessagePart[];
}

/** Wire body of `POST /run`. */
export interface AgentRunRequest {
  app_name: string;
  user_id: string;
  session_id: string;
  new_message: AgentMessage;
}

export interface RunAgentCommand {
  userHandle: string;
  sessionId: string;
  text: string;
}
