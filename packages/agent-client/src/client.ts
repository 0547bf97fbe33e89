import { z } from 'zod';

import {
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

export const DEFAULT_AGENT_TIMEOUTS: AgentRunTimeouts = {
  session: 10_000,
  run: 15_000,
  probe: 5_000,
};

const createdSessionSchema = z.object({ id: z.string().min(1) }).passthrough();

const sessionSummarySchema = z
  .object({
    id: z.string().min(1),
    created_at: z.union([z.string(), z.number()]).optional(),
    createTime: z.union([z.string(), z.number()]).optional(),
    lastUpdateTime: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

/**
 * Client for the agent run service's session and run endpoints. Every call is
 * a single attempt bounded by a timeout; failures surface as
 * {@link AgentServiceError} so callers decide how to report them.
 */
export class AgentRunClient {
  private readonly baseUrl: string;
  private readonly appName: string;
  private readonly timeouts: AgentRunTimeouts;
  private readonly httpClient: HttpClient;

  constructor(config: AgentRunClientConfig) {
    if (!config?.baseUrl) {
      throw new Error('AgentRunClient requires a baseUrl.');
    }

    if (!config.appName) {
      throw new Error('AgentRunClient requires an appName.');
    }

    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.appName = config.appName;
    this.timeouts = { ...DEFAULT_AGENT_TIMEOUTS, ...config.timeouts };
    this.httpClient = config.httpClient ?? defaultHttpClient;
  }

  async createSession(
    userHandle: string,
    state: Record<string, unknown> = {},
  ): Promise<AgentSession> {
    const body = await this.request(this.sessionsPath(userHandle), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ state }),
      timeoutMs: this.timeouts.session,
    });

    const parsed = createdSessionSchema.safeParse(body);
    if (!parsed.success) {
      throw new AgentServiceError('Agent service returned a session without an id', 200, body);
    }

    return { id: parsed.data.id };
  }

  async listSessions(userHandle: string): Promise<AgentSessionSummary[]> {
    const body = await this.request(this.sessionsPath(userHandle), {
      method: 'GET',
      timeoutMs: this.timeouts.session,
    });

    if (!Array.isArray(body)) {
      throw new AgentServiceError('Agent service returned a malformed session list', 200, body);
    }

    const sessions: AgentSessionSummary[] = [];
    for (const item of body) {
      const parsed = sessionSummarySchema.safeParse(item);
      if (!parsed.success) {
        continue;
      }
      const { id, created_at, createTime, lastUpdateTime } = parsed.data;
      const createdAt = created_at ?? createTime ?? lastUpdateTime;
      sessions.push({ id, createdAt: createdAt === undefined ? undefined : String(createdAt) });
    }

    return sessions;
  }

  async deleteSession(userHandle: string, sessionId: string): Promise<void> {
    await this.request(`${this.sessionsPath(userHandle)}/${encodeURIComponent(sessionId)}`, {
      method: 'DELETE',
      timeoutMs: this.timeouts.session,
    });
  }

  /** List artifacts attached to a session. Anything other than a list counts as none. */
  async listArtifacts(userHandle: string, sessionId: string): Promise<unknown[]> {
    const body = await this.request(
      `${this.sessionsPath(userHandle)}/${encodeURIComponent(sessionId)}/artifacts`,
      { method: 'GET', timeoutMs: this.timeouts.session },
    );

    return Array.isArray(body) ? body : [];
  }

  /** Send one user message to the agent and return the raw response body. */
  async run(command: RunAgentCommand): Promise<unknown> {
    const request: AgentRunRequest = {
      app_name: this.appName,
      user_id: command.userHandle,
      session_id: command.sessionId,
      new_message: {
        role: 'user',
        parts: [{ text: command.text }],
      },
    };

    return this.request('/run', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
      timeoutMs: this.timeouts.run,
    });
  }

  /** Liveness probe against `GET /list-apps`; never throws. */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.httpClient(`${this.baseUrl}/list-apps`, {
        method: 'GET',
        timeoutMs: this.timeouts.probe,
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  private sessionsPath(userHandle: string): string {
    return `/apps/${encodeURIComponent(this.appName)}/users/${encodeURIComponent(userHandle)}/sessions`;
  }

  private async request(path: string, init: HttpRequestInitLike): Promise<unknown> {
    let response: HttpResponseLike;

    try {
      response = await this.httpClient(`${this.baseUrl}${path}`, init);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const message = isTimeout(cause)
        ? `Agent service request timed out after ${init.timeoutMs}ms`
        : `Agent service request failed: ${cause.message}`;
      throw new AgentServiceError(message, undefined, undefined, cause);
    }

    const text = await safeReadText(response);

    if (!response.ok) {
      throw new AgentServiceError(
        `Agent service request failed with status ${response.status}.`,
        response.status,
        text,
      );
    }

    if (!text) {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new AgentServiceError('Agent service returned a non-JSON body', response.status, text);
    }
  }
}

export class AgentServiceError extends Error {
  readonly status?: number;
  readonly body?: unknown;

  constructor(message: string, status?: number, body?: unknown, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'AgentServiceError';
    this.status = status;
    this.body = body;
  }

  /** Raw upstream text when available, otherwise the error message. */
  get detail(): string {
    if (typeof this.body === 'string' && this.body.length > 0) {
      return this.body;
    }
    return this.message;
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }
}

function isTimeout(error: Error): boolean {
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

async function safeReadText(response: HttpResponseLike): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
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
