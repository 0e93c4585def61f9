/**
 * Tests for the new-session awaiting machine: polling cadence, detection of
 * the first unseen session, and the ways a wait ends.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createActor } from 'xstate'
import {
  findNewSession,
  newSessionMachine,
  NEW_SESSION_MAX_POLLS,
  NEW_SESSION_POLL_INTERVAL_MS,
} from './newSessionMachine'

describe('findNewSession', () => {
  it('should return the first id not known before', () => {
    expect(findNewSession(['s1', 's2'], ['s1', 's3', 's4', 's2'])).toBe('s3')
  })

  it('should return null when nothing is new', () => {
    expect(findNewSession(['s1', 's2'], ['s2'])).toBeNull()
  })
})

describe('newSessionMachine', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  const start = () => {
    const actor = createActor(newSessionMachine).start()
    const refreshes: Array<string | null> = []
    const found: Array<{ dispatcherId: string | null; sessionId: string | null }> = []
    actor.on('refresh', (event) => refreshes.push(event.dispatcherId))
    actor.on('sessionFound', ({ dispatcherId, sessionId }) => found.push({ dispatcherId, sessionId }))
    return { actor, refreshes, found }
  }

  it('should start idle with empty context', () => {
    const { actor } = start()
    expect(actor.getSnapshot().value).toBe('idle')
    expect(actor.getSnapshot().context).toEqual({ dispatcherId: null, knownSessionIds: [], pollsRemaining: 0 })
    actor.stop()
  })

  it('should poll once per interval and give up after the last poll', () => {
    const { actor, refreshes } = start()
    actor.send({ type: 'AWAIT', dispatcherId: 'd1', knownSessionIds: ['s1'] })
    expect(actor.getSnapshot().value).toBe('awaiting')
    expect(refreshes).toEqual([])

    vi.advanceTimersByTime(NEW_SESSION_POLL_INTERVAL_MS)
    expect(refreshes).toEqual(['d1'])
    expect(actor.getSnapshot().context.pollsRemaining).toBe(NEW_SESSION_MAX_POLLS - 1)

    vi.advanceTimersByTime(NEW_SESSION_POLL_INTERVAL_MS * (NEW_SESSION_MAX_POLLS - 1))
    expect(refreshes).toHaveLength(NEW_SESSION_MAX_POLLS)
    expect(actor.getSnapshot().value).toBe('awaiting')

    vi.advanceTimersByTime(NEW_SESSION_POLL_INTERVAL_MS)
    expect(actor.getSnapshot().value).toBe('idle')
    expect(actor.getSnapshot().context.dispatcherId).toBeNull()
    expect(refreshes).toHaveLength(NEW_SESSION_MAX_POLLS)
    actor.stop()
  })

  it('should report the first new session and stop polling', () => {
    const { actor, refreshes, found } = start()
    actor.send({ type: 'AWAIT', dispatcherId: 'd1', knownSessionIds: ['s1', 's2'] })

    actor.send({ type: 'SESSIONS_UPDATED', dispatcherId: 'd1', sessionIds: ['s1', 's2', 's3'] })

    expect(found).toEqual([{ dispatcherId: 'd1', sessionId: 's3' }])
    expect(actor.getSnapshot().value).toBe('idle')

    vi.advanceTimersByTime(NEW_SESSION_POLL_INTERVAL_MS * 3)
    expect(refreshes).toEqual([])
    actor.stop()
  })

  it('should ignore lists of another dispatcher or without new sessions', () => {
    const { actor, found } = start()
    actor.send({ type: 'AWAIT', dispatcherId: 'd1', knownSessionIds: ['s1'] })

    actor.send({ type: 'SESSIONS_UPDATED', dispatcherId: 'd2', sessionIds: ['s9'] })
    actor.send({ type: 'SESSIONS_UPDATED', dispatcherId: 'd1', sessionIds: ['s1'] })

    expect(found).toEqual([])
    expect(actor.getSnapshot().value).toBe('awaiting')
    actor.stop()
  })

  it('should ignore list updates while idle', () => {
    const { actor, found } = start()
    actor.send({ type: 'SESSIONS_UPDATED', dispatcherId: 'd1', sessionIds: ['s1'] })

    expect(found).toEqual([])
    expect(actor.getSnapshot().value).toBe('idle')
    actor.stop()
  })

  it('should restart the wait on a second AWAIT', () => {
    const { actor, refreshes } = start()
    actor.send({ type: 'AWAIT', dispatcherId: 'd1', knownSessionIds: [] })
    vi.advanceTimersByTime(NEW_SESSION_POLL_INTERVAL_MS * 2)
    expect(refreshes).toEqual(['d1', 'd1'])

    actor.send({ type: 'AWAIT', dispatcherId: 'd2', knownSessionIds: ['s1'] })
    expect(actor.getSnapshot().context).toEqual({
      dispatcherId: 'd2',
      knownSessionIds: ['s1'],
      pollsRemaining: NEW_SESSION_MAX_POLLS,
    })

    vi.advanceTimersByTime(NEW_SESSION_POLL_INTERVAL_MS)
    expect(refreshes).toEqual(['d1', 'd1', 'd2'])
    actor.stop()
  })

  it('should stop on CANCEL', () => {
    const { actor, refreshes } = start()
    actor.send({ type: 'AWAIT', dispatcherId: 'd1', knownSessionIds: [] })
    actor.send({ type: 'CANCEL' })

    expect(actor.getSnapshot().value).toBe('idle')
    vi.advanceTimersByTime(NEW_SESSION_POLL_INTERVAL_MS * 2)
    expect(refreshes).toEqual([])
    actor.stop()
  })
})
