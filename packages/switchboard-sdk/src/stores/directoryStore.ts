import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'
import type { ChatTarget, DirectoryEntry } from '../core/types'

/**
 * Directory state as last published by the directory engine.
 *
 * The engine owns the truth; store bindings copy its `directory:*` events
 * in here so UI code can subscribe with selectors.
 *
 * @example
 * ```ts
 * const { sessions, selectedSessionId } = client.stores.directory.getState()
 * ```
 *
 * @category Stores
 */
export interface DirectoryState {
  dispatchers: DirectoryEntry[]
  /** Visible sessions of {@link DirectoryState.sessionsDispatcherId} */
  sessions: DirectoryEntry[]
  sessionsDispatcherId: string | null
  selectedDispatcherId: string | null
  selectedSessionId: string | null
  chatTarget: ChatTarget | null
  isLoadingIndividuals: boolean
  individualsLoadedOnce: boolean
  awaitingSessionFor: string | null
  /** Known session ids per dispatcher */
  sessionIndex: Map<string, string[]>

  setDispatchers: (dispatchers: DirectoryEntry[]) => void
  setSessions: (dispatcherId: string | null, sessions: DirectoryEntry[]) => void
  setSelection: (dispatcherId: string | null, sessionId: string | null, chatTarget: ChatTarget | null) => void
  setLoading: (isLoading: boolean, loadedOnce: boolean) => void
  setSessionIndex: (dispatcherId: string, sessionIds: string[]) => void
  setAwaitingSession: (dispatcherId: string | null) => void
  reset: () => void
}

const initialState = {
  dispatchers: [],
  sessions: [],
  sessionsDispatcherId: null,
  selectedDispatcherId: null,
  selectedSessionId: null,
  chatTarget: null,
  isLoadingIndividuals: false,
  individualsLoadedOnce: false,
  awaitingSessionFor: null,
}

export function createDirectoryStore() {
  return createStore<DirectoryState>()(
    subscribeWithSelector((set) => ({
      ...initialState,
      sessionIndex: new Map(),

      setDispatchers: (dispatchers) => set({ dispatchers }),

      setSessions: (sessionsDispatcherId, sessions) => set({ sessionsDispatcherId, sessions }),

      setSelection: (selectedDispatcherId, selectedSessionId, chatTarget) =>
        set({ selectedDispatcherId, selectedSessionId, chatTarget }),

      setLoading: (isLoadingIndividuals, individualsLoadedOnce) =>
        set({ isLoadingIndividuals, individualsLoadedOnce }),

      setSessionIndex: (dispatcherId, sessionIds) =>
        set((state) => {
          const sessionIndex = new Map(state.sessionIndex)
          sessionIndex.set(dispatcherId, sessionIds)
          return { sessionIndex }
        }),

      setAwaitingSession: (awaitingSessionFor) => set({ awaitingSessionFor }),

      reset: () => set({ ...initialState, sessionIndex: new Map() }),
    }))
  )
}

export type DirectoryStore = ReturnType<typeof createDirectoryStore>
