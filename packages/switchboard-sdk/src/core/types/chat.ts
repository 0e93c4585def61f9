/**
 * Conversation message types.
 *
 * @packageDocumentation
 * @module Types/Chat
 */

import type { MessageMeta } from './meta'

export type MessageDirection = 'incoming' | 'outgoing'

/**
 * A message in a conversation thread. The thread id is the bare address of
 * the peer (dispatcher, session or subagent).
 */
export interface ChatMessage {
  /** Stanza id, or `mam:<archive id>` for messages loaded from the archive */
  id: string
  threadId: string
  direction: MessageDirection
  body: string
  timestamp: Date
  /** Out-of-band URL (XEP-0066) when the message carries an attachment */
  attachmentUrl?: string
  meta?: MessageMeta
}

/** Message fields supplied when appending to the ledger. */
export interface IncomingMessageInput {
  id?: string
  body: string
  timestamp?: Date
  attachmentUrl?: string
  meta?: MessageMeta
}

export interface AppendOptions {
  /** Loaded from the archive rather than received live */
  isArchived?: boolean
}

/** Work envelope for messages sent to a subagent. */
export interface SubagentWork {
  taskId: string
  /** Session the subagent reports back to */
  parentJid: string
  body: string
}

/** A file to upload and share with the chat target. */
export interface OutgoingAttachment {
  data: ArrayBuffer
  filename: string
  mime: string
  caption?: string
}

/** A message streamed back by an archive query. */
export interface ArchivedMessage {
  /** Archive-assigned id (the `<result id>`) */
  id: string
  /** Bare sender address */
  from: string
  /** Bare recipient address */
  to: string
  body: string | null
  timestamp: Date
  attachmentUrl?: string
  meta?: MessageMeta
}
