import { describe, it, expect, beforeEach } from 'vitest'
import { createActivityStore, type ActivityStore } from './activityStore'

const T = 'ops@agents.example.com'
const at = (minutes: number) => new Date(Date.UTC(2026, 2, 1, 9, minutes))

describe('activityStore', () => {
  let store: ActivityStore

  beforeEach(() => {
    store = createActivityStore()
  })

  describe('appending messages', () => {
    it('should keep messages ordered by timestamp', () => {
      store.getState().appendIncoming(T, { id: 'm2', body: 'second', timestamp: at(2) })
      store.getState().appendIncoming(T, { id: 'm1', body: 'first', timestamp: at(1) })

      expect(store.getState().getMessages(T).map((m) => m.id)).toEqual(['m1', 'm2'])
    })

    it('should drop a message whose id is already in the thread', () => {
      expect(store.getState().appendIncoming(T, { id: 'm1', body: 'hello', timestamp: at(1) })).toBe(true)
      expect(store.getState().appendIncoming(T, { id: 'm1', body: 'hello again', timestamp: at(3) })).toBe(false)

      expect(store.getState().getMessages(T)).toHaveLength(1)
      expect(store.getState().getUnreadCount(T)).toBe(1)
    })

    it('should build the message from its input', () => {
      store.getState().appendOutgoing(T, { id: 'o1', body: 'see attached', timestamp: at(4), attachmentUrl: 'https://files.example.com/a.png' })

      expect(store.getState().getMessages(T)).toEqual([
        {
          id: 'o1',
          threadId: T,
          direction: 'outgoing',
          body: 'see attached',
          timestamp: at(4),
          attachmentUrl: 'https://files.example.com/a.png',
        },
      ])
    })

    it('should generate an id when none is given', () => {
      store.getState().appendIncoming(T, { body: 'anonymous' })
      expect(store.getState().getMessages(T)[0].id).toMatch(/^[0-9a-f-]{36}$/)
    })
  })

  describe('unread counters', () => {
    it('should count live incoming messages outside the active thread', () => {
      store.getState().appendIncoming(T, { id: 'm1', body: 'a', timestamp: at(1) })
      store.getState().appendIncoming(T, { id: 'm2', body: 'b', timestamp: at(2) })
      expect(store.getState().getUnreadCount(T)).toBe(2)
    })

    it('should not count archived messages', () => {
      store.getState().appendIncoming(T, { id: 'm1', body: 'a', timestamp: at(1) }, { isArchived: true })
      expect(store.getState().getUnreadCount(T)).toBe(0)
    })

    it('should not count messages in the active thread', () => {
      store.getState().setActiveThread(T)
      store.getState().appendIncoming(T, { id: 'm1', body: 'a', timestamp: at(1) })
      expect(store.getState().getUnreadCount(T)).toBe(0)
    })

    it('should clear on activation and on a live reply', () => {
      store.getState().appendIncoming(T, { id: 'm1', body: 'a', timestamp: at(1) })
      store.getState().setActiveThread(T)
      expect(store.getState().unreadByThread.has(T)).toBe(false)

      store.getState().setActiveThread(null)
      store.getState().appendIncoming(T, { id: 'm2', body: 'b', timestamp: at(2) })
      store.getState().appendOutgoing(T, { id: 'o1', body: 'ok', timestamp: at(3) })
      expect(store.getState().getUnreadCount(T)).toBe(0)
    })

    it('should keep the counter on an archived outgoing message', () => {
      store.getState().appendIncoming(T, { id: 'm1', body: 'a', timestamp: at(1) })
      store.getState().appendOutgoing(T, { id: 'o0', body: 'earlier', timestamp: at(0) }, { isArchived: true })
      expect(store.getState().getUnreadCount(T)).toBe(1)
    })
  })

  describe('last activity', () => {
    it('should only move forward', () => {
      store.getState().noteActivity(T, at(5))
      store.getState().noteActivity(T, at(3))
      expect(store.getState().getLastActivity(T)).toEqual(at(5))

      store.getState().noteActivity(T, at(7))
      expect(store.getState().getLastActivity(T)).toEqual(at(7))
    })

    it('should follow appended messages', () => {
      store.getState().appendIncoming(T, { id: 'm1', body: 'a', timestamp: at(6) })
      expect(store.getState().lastActivityByThread.get(T)).toEqual(at(6))
    })

    it('should be undefined for an unknown thread', () => {
      expect(store.getState().getLastActivity('nobody@example.com')).toBeUndefined()
    })

    it('should replace the map only when the time advances', () => {
      store.getState().noteActivity(T, at(5))
      const before = store.getState().lastActivityByThread
      store.getState().noteActivity(T, at(5))
      expect(store.getState().lastActivityByThread).toBe(before)
    })
  })

  describe('composing', () => {
    it('should add and remove addresses', () => {
      store.getState().setComposing(T, true)
      expect(store.getState().composing.has(T)).toBe(true)

      const before = store.getState().composing
      store.getState().setComposing(T, true)
      expect(store.getState().composing).toBe(before)

      store.getState().setComposing(T, false)
      expect(store.getState().composing.size).toBe(0)
    })
  })

  it('should return a stable empty list for unknown threads', () => {
    expect(store.getState().getMessages('a@x')).toBe(store.getState().getMessages('b@x'))
  })

  it('should reset everything', () => {
    store.getState().appendIncoming(T, { id: 'm1', body: 'a', timestamp: at(1) })
    store.getState().setComposing(T, true)
    store.getState().setActiveThread('other@example.com')
    store.getState().reset()

    const state = store.getState()
    expect(state.threads.size).toBe(0)
    expect(state.lastActivityByThread.size).toBe(0)
    expect(state.unreadByThread.size).toBe(0)
    expect(state.composing.size).toBe(0)
    expect(state.activeThreadId).toBeNull()
  })
})
