/**
 * Store bindings - wire SDK events to Zustand store updates.
 *
 * Modules and the directory engine never touch stores directly: they emit
 * events, and these bindings translate them into store updates. A headless
 * host can skip the bindings and handle the events itself.
 *
 * @packageDocumentation
 * @module Bindings
 */

import type { SubscribeSDK } from '../core/types'
import type { ActivityState } from '../stores/activityStore'
import type { DirectoryState } from '../stores/directoryStore'

/**
 * Store references for binding SDK events.
 * Uses the vanilla Zustand store getState() pattern.
 */
export interface StoreRefs {
  activity: ActivityState
  directory: DirectoryState
}

/** Anything SDK events can be subscribed on, normally an XMPPClient. */
export interface SDKEventSource {
  subscribe: SubscribeSDK
}

/**
 * Unsubscribe function returned by createStoreBindings.
 */
export type UnsubscribeBindings = () => void

/**
 * Create store bindings that wire SDK events to Zustand stores.
 *
 * @param getStores - Returns current store state; called on every event
 * @returns Unsubscribe function removing all bindings
 *
 * @example
 * ```typescript
 * const unsubscribe = createStoreBindings(client, () => ({
 *   activity: activityStore.getState(),
 *   directory: directoryStore.getState(),
 * }))
 * ```
 */
export function createStoreBindings(
  source: SDKEventSource,
  getStores: () => StoreRefs
): UnsubscribeBindings {
  const unsubscribers: Array<() => void> = []

  const on: SubscribeSDK = (event, handler) => {
    const unsub = source.subscribe(event, handler)
    unsubscribers.push(unsub)
    return unsub
  }

  // ============================================================================
  // Chat Events
  // ============================================================================

  on('chat:message', ({ message }) => {
    const { activity } = getStores()
    const input = {
      id: message.id,
      body: message.body,
      timestamp: message.timestamp,
      attachmentUrl: message.attachmentUrl,
      meta: message.meta,
    }
    if (message.direction === 'outgoing') {
      activity.appendOutgoing(message.threadId, input)
    } else {
      activity.appendIncoming(message.threadId, input)
    }
  })

  on('chat:typing', ({ jid, isTyping }) => {
    getStores().activity.setComposing(jid, isTyping)
  })

  // ============================================================================
  // Directory Events
  // ============================================================================

  on('directory:dispatchers', ({ dispatchers }) => {
    getStores().directory.setDispatchers(dispatchers)
  })

  on('directory:sessions', ({ dispatcherId, sessions }) => {
    getStores().directory.setSessions(dispatcherId, sessions)
  })

  on('directory:selection', ({ dispatcherId, sessionId, chatTarget }) => {
    const stores = getStores()
    stores.directory.setSelection(dispatcherId, sessionId, chatTarget)
    // The chat target's thread is the one being read
    stores.activity.setActiveThread(chatTarget?.address ?? null)
  })

  on('directory:loading', ({ isLoading, loadedOnce }) => {
    getStores().directory.setLoading(isLoading, loadedOnce)
  })

  on('directory:session-index', ({ dispatcherId, sessionIds }) => {
    getStores().directory.setSessionIndex(dispatcherId, sessionIds)
  })

  on('directory:awaiting-session', ({ dispatcherId }) => {
    getStores().directory.setAwaitingSession(dispatcherId)
  })

  return () => {
    for (const unsub of unsubscribers) unsub()
    unsubscribers.length = 0
  }
}
