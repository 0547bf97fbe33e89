import { AgentServiceError, type AgentRunClient, type AgentSessionSummary } from '@dharma-relay/agent-client';
import { KeyedMutex } from '@dharma-relay/core';

import type { AppLogger } from '../../telemetry/logger';

import type { SessionBinding, SessionStore } from './store';

/** The agent service calls the lifecycle manager issues. */
export type SessionBackend = Pick<AgentRunClient, 'createSession' | 'listSessions' | 'deleteSession'>;

export interface SessionUser {
  localUserId: string;
  remoteUserHandle: string;
}

export type LifecycleErrorKind = 'upstream' | 'not-found' | 'no-session' | 'no-pending-delete';

export interface LifecycleError {
  kind: LifecycleErrorKind;
  /** HTTP status reported by the agent service, when there was one. */
  status?: number;
  /** Raw upstream text, or a description of the precondition that failed. */
  message: string;
}

export type LifecycleResult<T> = { ok: true; value: T } | { ok: false; error: LifecycleError };

export interface EnsuredSession {
  binding: SessionBinding;
  created: boolean;
}

export interface DeletedSession {
  remoteSessionId: string;
}

/**
 * Owns the NoSession/Active state of each chat user. Operations for one user
 * run one at a time; remote failures come back as `{ ok: false }` results and
 * never leave a partially written binding behind.
 */
export class SessionLifecycleManager {
  private readonly mutex = new KeyedMutex();
  private readonly pendingDeletes = new Map<string, string>();

  constructor(
    private readonly store: SessionStore,
    private readonly backend: SessionBackend,
    private readonly logger: AppLogger,
  ) {}

  /** Return the user's binding, creating a remote session first when there is none. */
  ensureSession(user: SessionUser): Promise<LifecycleResult<EnsuredSession>> {
    return this.exclusive(user, async () => {
      const existing = await this.store.get(user.localUserId);
      if (existing) {
        return ok({ binding: existing, created: false });
      }

      const created = await this.createAndBind(user);
      return created.ok ? ok({ binding: created.value, created: true }) : created;
    });
  }

  /** Always start a fresh remote session and bind it, replacing any current binding. */
  createSession(user: SessionUser): Promise<LifecycleResult<SessionBinding>> {
    return this.exclusive(user, () => this.createAndBind(user));
  }

  selectSession(user: SessionUser, remoteSessionId: string): Promise<LifecycleResult<SessionBinding>> {
    return this.exclusive(user, async () => {
      const binding: SessionBinding = {
        localUserId: user.localUserId,
        remoteSessionId,
        remoteUserHandle: user.remoteUserHandle,
      };
      await this.store.set(binding);
      this.logger.info({ localUserId: user.localUserId, remoteSessionId }, 'Selected agent session');
      return ok(binding);
    });
  }

  listSessions(user: SessionUser): Promise<LifecycleResult<AgentSessionSummary[]>> {
    return this.exclusive(user, async () => {
      try {
        return ok(await this.backend.listSessions(user.remoteUserHandle));
      } catch (error) {
        return this.remoteFailure(user, 'list', error);
      }
    });
  }

  /** First step of the delete handshake; issues no remote call. */
  requestDelete(user: SessionUser): Promise<LifecycleResult<SessionBinding>> {
    return this.exclusive(user, async () => {
      const binding = await this.store.get(user.localUserId);
      if (!binding) {
        return noSession();
      }

      this.pendingDeletes.set(user.localUserId, binding.remoteSessionId);
      return ok(binding);
    });
  }

  /**
   * Second step of the delete handshake. The pending request is consumed
   * whatever the outcome. The binding is removed when the remote delete
   * succeeds or reports the session as already gone.
   */
  confirmDelete(user: SessionUser): Promise<LifecycleResult<DeletedSession>> {
    return this.exclusive(user, async () => {
      const target = this.pendingDeletes.get(user.localUserId);
      this.pendingDeletes.delete(user.localUserId);

      if (!target) {
        return fail({ kind: 'no-pending-delete', message: 'No session deletion is awaiting confirmation' });
      }

      const binding = await this.store.get(user.localUserId);
      if (!binding) {
        return noSession();
      }

      try {
        await this.backend.deleteSession(binding.remoteUserHandle, target);
      } catch (error) {
        const failure = this.remoteFailure(user, 'delete', error);
        if (failure.error.kind === 'not-found') {
          await this.unbindIfCurrent(user.localUserId, target);
        }
        return failure;
      }

      await this.unbindIfCurrent(user.localUserId, target);
      this.logger.info({ localUserId: user.localUserId, remoteSessionId: target }, 'Deleted agent session');
      return ok({ remoteSessionId: target });
    });
  }

  /** Drop a pending delete request; the value reports whether one existed. */
  cancelDelete(user: SessionUser): Promise<LifecycleResult<boolean>> {
    return this.exclusive(user, async () => ok(this.pendingDeletes.delete(user.localUserId)));
  }

  hasPendingDelete(localUserId: string): boolean {
    return this.pendingDeletes.has(localUserId);
  }

  currentSession(user: SessionUser): Promise<SessionBinding | undefined> {
    return this.exclusive(user, () => this.store.get(user.localUserId));
  }

  /**
   * Remove a binding the agent service reported as missing. A binding that has
   * since moved to another session is left alone.
   */
  forgetSession(user: SessionUser, remoteSessionId: string): Promise<boolean> {
    return this.exclusive(user, () => this.unbindIfCurrent(user.localUserId, remoteSessionId));
  }

  private async createAndBind(user: SessionUser): Promise<LifecycleResult<SessionBinding>> {
    let remoteSessionId: string;
    try {
      ({ id: remoteSessionId } = await this.backend.createSession(user.remoteUserHandle, {}));
    } catch (error) {
      return this.remoteFailure(user, 'create', error);
    }

    const binding: SessionBinding = {
      localUserId: user.localUserId,
      remoteSessionId,
      remoteUserHandle: user.remoteUserHandle,
    };
    await this.store.set(binding);
    this.logger.info({ localUserId: user.localUserId, remoteSessionId }, 'Created agent session');
    return ok(binding);
  }

  private async unbindIfCurrent(localUserId: string, remoteSessionId: string): Promise<boolean> {
    const binding = await this.store.get(localUserId);
    if (binding?.remoteSessionId !== remoteSessionId) {
      return false;
    }

    await this.store.delete(localUserId);
    return true;
  }

  private remoteFailure(
    user: SessionUser,
    operation: string,
    error: unknown,
  ): { ok: false; error: LifecycleError } {
    const failure = toLifecycleError(error);
    this.logger.warn(
      { localUserId: user.localUserId, operation, status: failure.status, error },
      'Agent session call failed',
    );
    return fail(failure);
  }

  private exclusive<T>(user: SessionUser, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(user.localUserId, task);
  }
}

export function toLifecycleError(error: unknown): LifecycleError {
  if (error instanceof AgentServiceError) {
    return {
      kind: error.isNotFound ? 'not-found' : 'upstream',
      status: error.status,
      message: error.detail,
    };
  }

  return { kind: 'upstream', message: error instanceof Error ? error.message : String(error) };
}

function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

function fail(error: LifecycleError): { ok: false; error: LifecycleError } {
  return { ok: false, error };
}

function noSession(): { ok: false; error: LifecycleError } {
  return fail({ kind: 'no-session', message: 'No active session' });
}
