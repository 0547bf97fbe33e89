export type { SessionBinding, SessionStore, SessionStoreContext } from './store';
export { InMemorySessionStore } from './in-memory-store';
export {
  SessionLifecycleManager,
  toLifecycleError,
  type DeletedSession,
  type EnsuredSession,
  type LifecycleError,
  type LifecycleErrorKind,
  type LifecycleResult,
  type SessionBackend,
  type SessionUser,
} from './lifecycle';
