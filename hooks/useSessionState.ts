import { useSyncExternalStore } from 'react';
import type { SessionState } from '../services/sessionState';
import type { SessionSnapshot } from '../types';

/**
 * Subscribes a component to a SessionState and returns the current snapshot.
 */
export function useSessionState(session: SessionState): SessionSnapshot {
  return useSyncExternalStore(session.subscribe, session.getSnapshot);
}
