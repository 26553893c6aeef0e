/**
 * Zustand store publishing the session view to the host shell.
 * The coordinator is the only writer; hosts read and subscribe.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { SessionView } from '@shared/session';

export type SessionStore = StoreApi<SessionView>;

export function createSessionStore(initial: SessionView): SessionStore {
  return createStore<SessionView>()(() => initial);
}
