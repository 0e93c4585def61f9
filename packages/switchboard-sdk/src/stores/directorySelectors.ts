/**
 * Selectors over the directory and activity stores.
 *
 * Aggregate indicators combine the session index of the directory store
 * with per-thread state from the activity ledger, so they are plain
 * functions of both rather than selectors of one store.
 *
 * @example
 * ```tsx
 * const dispatchers = useDirectoryStore(directorySelectors.dispatchers)
 * const unread = unreadCountForDispatcher(jid, sessionIndex, unreadByThread)
 * ```
 *
 * @packageDocumentation
 * @module Stores/DirectorySelectors
 */

import type { DirectoryState } from './directoryStore'
import type { ChatTarget, DirectoryEntry } from '../core/types'

const EMPTY_ENTRIES: DirectoryEntry[] = []
const EMPTY_IDS: string[] = []

type SessionIndex = ReadonlyMap<string, Iterable<string>>

/**
 * Unread messages of a dispatcher thread plus those of every session it owns.
 */
export function unreadCountForDispatcher(
  dispatcherId: string,
  sessionIndex: SessionIndex,
  unreadByThread: ReadonlyMap<string, number>
): number {
  let total = unreadByThread.get(dispatcherId) ?? 0
  for (const sessionId of sessionIndex.get(dispatcherId) ?? EMPTY_IDS) {
    total += unreadByThread.get(sessionId) ?? 0
  }
  return total
}

/**
 * Dispatchers with at least one owned session currently composing.
 */
export function dispatchersWithComposingSessions(
  sessionIndex: SessionIndex,
  composing: ReadonlySet<string>
): Set<string> {
  const result = new Set<string>()
  if (composing.size === 0) return result
  for (const [dispatcherId, sessionIds] of sessionIndex) {
    for (const sessionId of sessionIds) {
      if (composing.has(sessionId)) {
        result.add(dispatcherId)
        break
      }
    }
  }
  return result
}

/**
 * @category Selectors
 */
export const directorySelectors = {
  dispatchers: (state: DirectoryState): DirectoryEntry[] => state.dispatchers,

  sessions: (state: DirectoryState): DirectoryEntry[] =>
    state.sessions.length > 0 ? state.sessions : EMPTY_ENTRIES,

  selectedDispatcherId: (state: DirectoryState): string | null => state.selectedDispatcherId,

  selectedSessionId: (state: DirectoryState): string | null => state.selectedSessionId,

  chatTarget: (state: DirectoryState): ChatTarget | null => state.chatTarget,

  selectedDispatcher: (state: DirectoryState): DirectoryEntry | null =>
    state.dispatchers.find((entry) => entry.id === state.selectedDispatcherId) ?? null,

  /** Sessions split into open and closed, each in display order. */
  openSessions: (state: DirectoryState): DirectoryEntry[] => {
    const open = state.sessions.filter((entry) => !entry.isClosed)
    return open.length > 0 ? open : EMPTY_ENTRIES
  },

  closedSessions: (state: DirectoryState): DirectoryEntry[] => {
    const closed = state.sessions.filter((entry) => entry.isClosed)
    return closed.length > 0 ? closed : EMPTY_ENTRIES
  },

  /** True while the first list for the selected dispatcher is still loading. */
  showsLoadingPlaceholder: (state: DirectoryState): boolean =>
    state.isLoadingIndividuals && !state.individualsLoadedOnce,

  isAwaitingSession: (state: DirectoryState): boolean =>
    state.awaitingSessionFor !== null && state.awaitingSessionFor === state.selectedDispatcherId,
}
