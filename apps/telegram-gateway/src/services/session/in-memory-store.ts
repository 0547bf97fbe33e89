import type { SessionBinding, SessionStore, SessionStoreContext } from './store';

/** Map-backed session store. Bindings live for the lifetime of the process. */
export class InMemorySessionStore implements SessionStore {
  private readonly store = new Map<string, SessionBinding>();
  private readonly prefix: string;

  constructor(context: SessionStoreContext = {}) {
    this.prefix = context.prefix ?? 'session:';
  }

  get size(): number {
    return this.store.size;
  }

  async get(localUserId: string): Promise<SessionBinding | undefined> {
    const binding = this.store.get(this.namespaced(localUserId));
    return binding ? { ...binding } : undefined;
  }

  async set(binding: SessionBinding): Promise<void> {
    this.store.set(this.namespaced(binding.localUserId), { ...binding });
  }

  async delete(localUserId: string): Promise<void> {
    this.store.delete(this.namespaced(localUserId));
  }

  private namespaced(localUserId: string): string {
    return `${this.prefix}${localUserId}`;
  }
}
