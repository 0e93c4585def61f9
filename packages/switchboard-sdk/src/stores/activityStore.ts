import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'
import type { AppendOptions, ChatMessage, IncomingMessageInput, MessageDirection } from '../core/types'
import { generateUUID } from '../utils/uuid'

const EMPTY_MESSAGES: ChatMessage[] = []

/**
 * Conversation activity ledger.
 *
 * Holds the messages of every thread, each thread's last activity time,
 * unread counters and typing indicators. Archive ingestion and live
 * messages write here; the directory engine only reads it to order its
 * lists.
 *
 * @example
 * ```ts
 * const activity = createActivityStore()
 * activity.getState().appendIncoming('s1@agents.example.com', { body: 'done' })
 * activity.getState().getUnreadCount('s1@agents.example.com') // 1
 * ```
 *
 * @category Stores
 */
export interface ActivityState {
  /** Messages per thread, oldest first, unique by id */
  threads: Map<string, ChatMessage[]>
  /** Only ever moves forward per thread */
  lastActivityByThread: Map<string, Date>
  unreadByThread: Map<string, number>
  /** Addresses currently composing */
  composing: Set<string>
  activeThreadId: string | null

  /** @returns true when the message was new */
  appendIncoming: (threadId: string, message: IncomingMessageInput, options?: AppendOptions) => boolean
  appendOutgoing: (threadId: string, message: IncomingMessageInput, options?: AppendOptions) => boolean
  noteActivity: (threadId: string, timestamp: Date) => void
  markRead: (threadId: string) => void
  setActiveThread: (threadId: string | null) => void
  setComposing: (address: string, isComposing: boolean) => void
  reset: () => void

  getMessages: (threadId: string) => ChatMessage[]
  /** Ledger entry, else the newest message time */
  getLastActivity: (threadId: string) => Date | undefined
  getUnreadCount: (threadId: string) => number
}

export function createActivityStore() {
  return createStore<ActivityState>()(
    subscribeWithSelector((set, get) => {
      const append = (
        threadId: string,
        direction: MessageDirection,
        input: IncomingMessageInput
      ): ChatMessage | null => {
        const existing = get().threads.get(threadId) ?? EMPTY_MESSAGES
        const id = input.id || generateUUID()
        if (existing.some((m) => m.id === id)) return null

        const message: ChatMessage = {
          id,
          threadId,
          direction,
          body: input.body,
          timestamp: input.timestamp ?? new Date(),
          ...(input.attachmentUrl ? { attachmentUrl: input.attachmentUrl } : {}),
          ...(input.meta ? { meta: input.meta } : {}),
        }
        const messages = [...existing, message].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())

        set((state) => {
          const threads = new Map(state.threads)
          threads.set(threadId, messages)
          return { threads }
        })
        get().noteActivity(threadId, message.timestamp)
        return message
      }

      return {
        threads: new Map(),
        lastActivityByThread: new Map(),
        unreadByThread: new Map(),
        composing: new Set(),
        activeThreadId: null,

        appendIncoming: (threadId, input, options = {}) => {
          const message = append(threadId, 'incoming', input)
          if (!message) return false
          if (!options.isArchived && get().activeThreadId !== threadId) {
            set((state) => {
              const unreadByThread = new Map(state.unreadByThread)
              unreadByThread.set(threadId, (unreadByThread.get(threadId) ?? 0) + 1)
              return { unreadByThread }
            })
          }
          return true
        },

        appendOutgoing: (threadId, input, options = {}) => {
          const message = append(threadId, 'outgoing', input)
          if (!message) return false
          // Replying in a thread reads it
          if (!options.isArchived) get().markRead(threadId)
          return true
        },

        noteActivity: (threadId, timestamp) => {
          const current = get().lastActivityByThread.get(threadId)
          if (current && current.getTime() >= timestamp.getTime()) return
          set((state) => {
            const lastActivityByThread = new Map(state.lastActivityByThread)
            lastActivityByThread.set(threadId, timestamp)
            return { lastActivityByThread }
          })
        },

        markRead: (threadId) => {
          if (!get().unreadByThread.has(threadId)) return
          set((state) => {
            const unreadByThread = new Map(state.unreadByThread)
            unreadByThread.delete(threadId)
            return { unreadByThread }
          })
        },

        setActiveThread: (threadId) => {
          set({ activeThreadId: threadId })
          if (threadId) get().markRead(threadId)
        },

        setComposing: (address, isComposing) => {
          if (get().composing.has(address) === isComposing) return
          set((state) => {
            const composing = new Set(state.composing)
            if (isComposing) composing.add(address)
            else composing.delete(address)
            return { composing }
          })
        },

        reset: () => {
          set({
            threads: new Map(),
            lastActivityByThread: new Map(),
            unreadByThread: new Map(),
            composing: new Set(),
            activeThreadId: null,
          })
        },

        getMessages: (threadId) => get().threads.get(threadId) ?? EMPTY_MESSAGES,

        getLastActivity: (threadId) => {
          const noted = get().lastActivityByThread.get(threadId)
          if (noted) return noted
          const messages = get().threads.get(threadId)
          return messages && messages.length > 0 ? messages[messages.length - 1].timestamp : undefined
        },

        getUnreadCount: (threadId) => get().unreadByThread.get(threadId) ?? 0,
      }
    })
  )
}

export type ActivityStore = ReturnType<typeof createActivityStore>
