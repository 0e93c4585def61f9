import { useCallback, useMemo } from 'react'
import { useStore } from 'zustand'
import { useShallow } from 'zustand/react/shallow'
import { useXMPPContext } from '../provider'
import { directorySelectors, dispatchersWithComposingSessions, unreadCountForDispatcher } from '../stores/directorySelectors'
import type { DirectoryEntry, NavigationSelection, OutgoingAttachment } from '../core/types'

/**
 * Hook for the dispatcher and session columns.
 *
 * Reads the directory state published by the engine and exposes the
 * navigation and send actions. Actions are no-ops while the client is
 * offline or has no directory configured.
 *
 * @example
 * ```tsx
 * function Dispatchers() {
 *   const { dispatchers, selectedDispatcherId, unreadByDispatcher, selectDispatcher } = useDirectory()
 *
 *   return (
 *     <ul>
 *       {dispatchers.map((d) => (
 *         <li key={d.id} aria-selected={d.id === selectedDispatcherId} onClick={() => selectDispatcher(d)}>
 *           {d.displayName} {unreadByDispatcher.get(d.id) || ''}
 *         </li>
 *       ))}
 *     </ul>
 *   )
 * }
 * ```
 *
 * @category Hooks
 */
export function useDirectory() {
  const { client } = useXMPPContext()
  const { directory: directoryStore, activity: activityStore } = client.stores

  const state = useStore(
    directoryStore,
    useShallow((s) => ({
      dispatchers: directorySelectors.dispatchers(s),
      sessions: directorySelectors.sessions(s),
      selectedDispatcherId: s.selectedDispatcherId,
      selectedSessionId: s.selectedSessionId,
      chatTarget: s.chatTarget,
      isLoadingSessions: s.isLoadingIndividuals,
      individualsLoadedOnce: s.individualsLoadedOnce,
      showsLoadingPlaceholder: directorySelectors.showsLoadingPlaceholder(s),
      isAwaitingSession: directorySelectors.isAwaitingSession(s),
      sessionIndex: s.sessionIndex,
    }))
  )
  const unreadByThread = useStore(activityStore, (s) => s.unreadByThread)
  const composing = useStore(activityStore, (s) => s.composing)

  const { dispatchers, sessionIndex } = state

  const unreadByDispatcher = useMemo(() => {
    const counts = new Map<string, number>()
    for (const dispatcher of dispatchers) {
      const count = unreadCountForDispatcher(dispatcher.id, sessionIndex, unreadByThread)
      if (count > 0) counts.set(dispatcher.id, count)
    }
    return counts
  }, [dispatchers, sessionIndex, unreadByThread])

  const composingDispatchers = useMemo(
    () => dispatchersWithComposingSessions(sessionIndex, composing),
    [sessionIndex, composing]
  )

  const selectDispatcher = useCallback((entry: DirectoryEntry) => client.directory?.selectDispatcher(entry), [client])

  const selectSession = useCallback((entry: DirectoryEntry) => client.directory?.selectIndividual(entry), [client])

  const navigate = useCallback((selection: NavigationSelection) => client.directory?.navigate(selection), [client])

  const selectNextSession = useCallback(() => client.directory?.selectNextSession() ?? false, [client])

  const selectPreviousSession = useCallback(() => client.directory?.selectPreviousSession() ?? false, [client])

  const selectDispatcherHotkey = useCallback((slot: number) => client.selectDispatcherHotkey(slot), [client])

  const focusOldestWaitingSession = useCallback(
    () => client.directory?.focusOldestWaitingSession() ?? false,
    [client]
  )

  const sendChat = useCallback((body: string) => client.directory?.sendChat(body), [client])

  const sendAttachment = useCallback(
    (attachment: OutgoingAttachment) => client.directory?.sendAttachment(attachment),
    [client]
  )

  const resumeSession = useCallback((entry: DirectoryEntry) => client.directory?.resumeSession(entry) ?? false, [client])

  const refresh = useCallback(() => client.directory?.refreshAll(), [client])

  return {
    dispatchers,
    sessions: state.sessions,
    selectedDispatcherId: state.selectedDispatcherId,
    selectedSessionId: state.selectedSessionId,
    chatTarget: state.chatTarget,
    isLoadingSessions: state.isLoadingSessions,
    individualsLoadedOnce: state.individualsLoadedOnce,
    showsLoadingPlaceholder: state.showsLoadingPlaceholder,
    isAwaitingSession: state.isAwaitingSession,
    unreadByDispatcher,
    composingDispatchers,

    selectDispatcher,
    selectSession,
    navigate,
    selectNextSession,
    selectPreviousSession,
    selectDispatcherHotkey,
    focusOldestWaitingSession,
    sendChat,
    sendAttachment,
    resumeSession,
    refresh,
  }
}

export type UseDirectoryReturn = ReturnType<typeof useDirectory>
