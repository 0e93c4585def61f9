/**
 * SDK event types.
 *
 * Modules and the directory engine emit these; store bindings and hosts
 * subscribe to them with `client.subscribe(event, handler)`.
 *
 * @packageDocumentation
 * @module Types/SDKEvents
 */

import type { Element } from '@xmpp/client'
import type { ArchivedMessage, ChatMessage } from './chat'
import type { ChatTarget, DirectoryEntry } from './directory'

// ============================================================================
// Connection Events
// ============================================================================

export type ConnectionStatus = 'connecting' | 'online' | 'offline' | 'error'

export interface ConnectionEvents {
  'connection:status': {
    status: ConnectionStatus
    error?: string
  }

  /** Session bound; `jid` is the full bound address */
  'connection:authenticated': {
    jid: string
  }
}

// ============================================================================
// Chat Events
// ============================================================================

export interface ChatEvents {
  /** Live message received, or outgoing message sent */
  'chat:message': {
    message: ChatMessage
  }

  /** XEP-0085 chat state from a peer */
  'chat:typing': {
    jid: string
    isTyping: boolean
  }
}

// ============================================================================
// PubSub Events
// ============================================================================

export interface PubSubEvents {
  /** Items published to a node we receive notifications for */
  'pubsub:items': {
    node: string
    from?: string
    /** Payload of the first published item, if any */
    payload?: Element
  }
}

// ============================================================================
// Archive Events
// ============================================================================

export interface ArchiveEvents {
  /** One archived message of a running query */
  'archive:result': {
    queryId: string
    message: ArchivedMessage
  }

  /** History backfill started or drained */
  'archive:warmup': {
    active: boolean
  }
}

// ============================================================================
// Directory Events
// ============================================================================

export interface DirectoryEvents {
  'directory:dispatchers': {
    dispatchers: DirectoryEntry[]
  }

  /** Visible session list replaced */
  'directory:sessions': {
    dispatcherId: string | null
    sessions: DirectoryEntry[]
  }

  'directory:selection': {
    dispatcherId: string | null
    sessionId: string | null
    chatTarget: ChatTarget | null
  }

  'directory:loading': {
    isLoading: boolean
    loadedOnce: boolean
  }

  /** Known session ids of a dispatcher, used for aggregate indicators */
  'directory:session-index': {
    dispatcherId: string
    sessionIds: string[]
  }

  /** Dispatcher whose next new session will be auto-selected, or null */
  'directory:awaiting-session': {
    dispatcherId: string | null
  }
}

/**
 * All SDK events combined.
 *
 * @example
 * ```typescript
 * client.subscribe('directory:sessions', ({ sessions }) => {
 *   console.log(`${sessions.length} sessions visible`)
 * })
 * ```
 */
export interface SDKEvents
  extends ConnectionEvents,
    ChatEvents,
    PubSubEvents,
    ArchiveEvents,
    DirectoryEvents {}

export type SDKEventPayload<K extends keyof SDKEvents> = SDKEvents[K]

export type SDKEventHandler<K extends keyof SDKEvents> = (payload: SDKEvents[K]) => void

/** Emit function shared by modules and the engine. */
export type EmitSDK = <K extends keyof SDKEvents>(event: K, payload: SDKEvents[K]) => void

/** Subscribe function; returns an unsubscribe callback. */
export type SubscribeSDK = <K extends keyof SDKEvents>(event: K, handler: SDKEventHandler<K>) => () => void
