import { useCallback } from 'react'
import { useStore } from 'zustand'
import { useXMPPContext } from '../provider'
import { logError } from '../core/logger'
import { describeError } from '../utils/xmppError'
import type { QuestionReply } from '../core/types'

/**
 * Messages, unread count and typing state of one thread, and the answer
 * action for questions its agent asks.
 *
 * @param threadId - Bare address of the peer, or null for no thread
 *
 * @example
 * ```tsx
 * const { chatTarget } = useDirectory()
 * const { messages, isComposing } = useThread(chatTarget?.address ?? null)
 * ```
 *
 * @category Hooks
 */
export function useThread(threadId: string | null) {
  const { client } = useXMPPContext()
  const activity = client.stores.activity

  const messages = useStore(activity, (s) => (threadId ? s.getMessages(threadId) : s.getMessages('')))
  const unreadCount = useStore(activity, (s) => (threadId ? s.getUnreadCount(threadId) : 0))
  const isComposing = useStore(activity, (s) => (threadId ? s.composing.has(threadId) : false))

  const markRead = useCallback(() => {
    if (threadId) activity.getState().markRead(threadId)
  }, [activity, threadId])

  /** Answer a question the agent in this thread asked. */
  const answerQuestion = useCallback(
    (reply: QuestionReply) => {
      if (!threadId) return
      client.chat.sendQuestionReply(threadId, reply).catch((err: unknown) => {
        logError(`Question reply to ${threadId} failed: ${describeError(err)}`)
      })
    },
    [client, threadId]
  )

  return { messages, unreadCount, isComposing, markRead, answerQuestion }
}
