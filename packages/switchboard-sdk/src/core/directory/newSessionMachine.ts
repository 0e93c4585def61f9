/**
 * XState machine for "awaiting a new session".
 *
 * After a message goes to a dispatcher, the dispatcher may spawn a session
 * for it. The machine remembers which sessions existed at send time, asks
 * its owner to re-fetch the session list on a short poll, and reports the
 * first session id that was not there before.
 *
 * ```
 * ┌──────┐  AWAIT   ┌──────────┐ after(poll) + polls left → refresh, re-enter
 * │ idle │─────────►│ awaiting │──────────────────────────────┐
 * └──────┘◄─────────└──────────┘◄─────────────────────────────┘
 *     SESSIONS_UPDATED (new id) → sessionFound
 *     CANCEL, or after(poll) with no polls left
 * ```
 *
 * Like the other machines in the SDK it performs no I/O: the directory
 * service listens for the emitted `refresh` and `sessionFound` events.
 *
 * @module Core/Directory/NewSessionMachine
 */
import { setup, assign, emit, type ActorRefFrom } from 'xstate'

/** Spacing between session list re-fetches (ms) */
export const NEW_SESSION_POLL_INTERVAL_MS = 1000

/** Re-fetches before giving up */
export const NEW_SESSION_MAX_POLLS = 5

export type NewSessionMachineEvent =
  | { type: 'AWAIT'; dispatcherId: string; knownSessionIds: string[] }
  | { type: 'SESSIONS_UPDATED'; dispatcherId: string; sessionIds: string[] }
  | { type: 'CANCEL' }

export type NewSessionMachineEmitted =
  | { type: 'refresh'; dispatcherId: string | null }
  | { type: 'sessionFound'; dispatcherId: string | null; sessionId: string | null }

export interface NewSessionMachineContext {
  dispatcherId: string | null
  /** Session ids visible when awaiting began */
  knownSessionIds: string[]
  pollsRemaining: number
}

/**
 * First id of `sessionIds`, in order, that is not in `known`.
 */
export function findNewSession(known: readonly string[], sessionIds: readonly string[]): string | null {
  const knownSet = new Set(known)
  return sessionIds.find((id) => !knownSet.has(id)) ?? null
}

export const newSessionMachine = setup({
  types: {
    context: {} as NewSessionMachineContext,
    events: {} as NewSessionMachineEvent,
    emitted: {} as NewSessionMachineEmitted,
  },
  actions: {
    startAwaiting: assign(({ event }) => {
      if (event.type !== 'AWAIT') return {}
      return {
        dispatcherId: event.dispatcherId,
        knownSessionIds: event.knownSessionIds,
        pollsRemaining: NEW_SESSION_MAX_POLLS,
      }
    }),

    consumePoll: assign(({ context }) => ({
      pollsRemaining: context.pollsRemaining - 1,
    })),

    emitRefresh: emit(({ context }) => ({
      type: 'refresh' as const,
      dispatcherId: context.dispatcherId,
    })),

    emitSessionFound: emit(({ context, event }) => ({
      type: 'sessionFound' as const,
      dispatcherId: context.dispatcherId,
      sessionId: event.type === 'SESSIONS_UPDATED' ? findNewSession(context.knownSessionIds, event.sessionIds) : null,
    })),

    clear: assign({
      dispatcherId: null,
      knownSessionIds: [],
      pollsRemaining: 0,
    }),
  },
  guards: {
    hasPollsLeft: ({ context }) => context.pollsRemaining > 0,

    revealsNewSession: ({ context, event }) => {
      if (event.type !== 'SESSIONS_UPDATED') return false
      if (event.dispatcherId !== context.dispatcherId) return false
      return findNewSession(context.knownSessionIds, event.sessionIds) !== null
    },
  },
  delays: {
    pollInterval: NEW_SESSION_POLL_INTERVAL_MS,
  },
}).createMachine({
  id: 'newSession',
  context: {
    dispatcherId: null,
    knownSessionIds: [],
    pollsRemaining: 0,
  },
  initial: 'idle',
  states: {
    idle: {
      on: {
        AWAIT: {
          target: 'awaiting',
          actions: 'startAwaiting',
        },
      },
    },

    awaiting: {
      after: {
        pollInterval: [
          {
            guard: 'hasPollsLeft',
            target: 'awaiting',
            reenter: true,
            actions: ['consumePoll', 'emitRefresh'],
          },
          {
            target: 'idle',
            actions: 'clear',
          },
        ],
      },
      on: {
        // A second send restarts the wait against the current list
        AWAIT: {
          target: 'awaiting',
          reenter: true,
          actions: 'startAwaiting',
        },
        SESSIONS_UPDATED: {
          guard: 'revealsNewSession',
          target: 'idle',
          actions: ['emitSessionFound', 'clear'],
        },
        CANCEL: {
          target: 'idle',
          actions: 'clear',
        },
      },
    },
  },
})

export type NewSessionActor = ActorRefFrom<typeof newSessionMachine>
