/** Binds a chat identity to one conversation on the agent service. */
export interface SessionBinding {
  localUserId: string;
  remoteSessionId: string;
  /** User id the agent service knows this person by. */
  remoteUserHandle: string;
}

/** At most one binding per `localUserId`; `set` overwrites. */
export interface SessionStore {
  get(localUserId: string): Promise<SessionBinding | undefined>;
  set(binding: SessionBinding): Promise<void>;
  delete(localUserId: string): Promise<void>;
}

export interface SessionStoreContext {
  prefix?: string;
}
