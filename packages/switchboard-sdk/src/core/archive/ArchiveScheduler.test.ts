import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { ArchiveScheduler, ARCHIVE_ROUTE_GRACE_MS, type ArchiveQueryOptions } from './ArchiveScheduler'
import { createActivityStore, type ActivityStore } from '../../stores/activityStore'
import { RecordingEventBus, createDeferred, flushPromises, type Deferred } from '../test-utils'
import type { ArchivedMessage } from '../types'

const S1 = 's1@agents.example.com'
const S2 = 's2@agents.example.com'

interface QueryCall {
  options: ArchiveQueryOptions
  deferred: Deferred<unknown>
}

describe('ArchiveScheduler', () => {
  let bus: RecordingEventBus
  let activity: ActivityStore
  let calls: QueryCall[]
  let scheduler: ArchiveScheduler

  const archived = (overrides: Partial<ArchivedMessage> = {}): ArchivedMessage => ({
    id: 'a1',
    from: S1,
    to: 'me@example.com',
    body: 'build finished',
    timestamp: new Date('2026-03-01T10:00:00Z'),
    ...overrides,
  })

  beforeEach(() => {
    vi.useFakeTimers()
    bus = new RecordingEventBus()
    activity = createActivityStore()
    calls = []
    scheduler = new ArchiveScheduler({
      queryArchive: (options) => {
        const deferred = createDeferred<unknown>()
        calls.push({ options, deferred })
        return deferred.promise
      },
      subscribe: (event, handler) => bus.subscribe(event, handler),
      emitSDK: bus.emitSDK,
      activity,
      getOwnJid: () => 'me@example.com/web',
    })
  })

  afterEach(() => {
    scheduler.dispose()
    vi.useRealTimers()
  })

  it('should issue exactly one history query per conversation', () => {
    scheduler.ensureHistoryLoaded(S1)
    scheduler.ensureHistoryLoaded(S1)
    scheduler.ensureHistoryLoaded(S1)

    expect(calls).toHaveLength(1)
    expect(calls[0].options.with).toBe(S1)
    expect(calls[0].options.max).toBe(50)
    expect(calls[0].options.queryId).toMatch(/^mam_/)
  })

  it('should run history loads one after another', async () => {
    scheduler.ensureHistoryLoaded(S1)
    scheduler.ensureHistoryLoaded(S2)
    expect(calls.map((c) => c.options.with)).toEqual([S1])

    calls[0].deferred.resolve({ complete: true })
    await flushPromises()

    expect(calls.map((c) => c.options.with)).toEqual([S1, S2])
    expect(scheduler.isHistoryLoaded(S1)).toBe(true)
  })

  it('should keep the two queues independent', () => {
    scheduler.ensureHistoryLoaded(S1)
    scheduler.ensureRecencyProbed(S1)

    expect(calls.map((c) => [c.options.with, c.options.max])).toEqual([
      [S1, 50],
      [S1, 1],
    ])
  })

  it('should signal warm-up while history loads are pending', async () => {
    scheduler.ensureHistoryLoaded(S1)
    expect(scheduler.isHistoryWarmup).toBe(true)
    expect(bus.recorded('archive:warmup')).toEqual([{ active: true }])

    calls[0].deferred.resolve({ complete: true })
    await flushPromises()

    expect(scheduler.isHistoryWarmup).toBe(false)
    expect(bus.recorded('archive:warmup')).toEqual([{ active: true }, { active: false }])
  })

  it('should not signal warm-up for recency probes', () => {
    scheduler.ensureRecencyProbed(S1)
    expect(scheduler.isHistoryWarmup).toBe(false)
    expect(bus.count('archive:warmup')).toBe(0)
  })

  it('should route history results into the conversation as archived messages', () => {
    scheduler.ensureHistoryLoaded(S1)
    const { queryId } = calls[0].options

    bus.emit('archive:result', { queryId, message: archived() })
    bus.emit('archive:result', {
      queryId,
      message: archived({ id: 'a2', from: 'me@example.com', to: S1, body: 'thanks', timestamp: new Date('2026-03-01T10:05:00Z') }),
    })

    const messages = activity.getState().getMessages(S1)
    expect(messages.map((m) => [m.id, m.direction, m.body])).toEqual([
      ['mam:a1', 'incoming', 'build finished'],
      ['mam:a2', 'outgoing', 'thanks'],
    ])
    expect(activity.getState().getUnreadCount(S1)).toBe(0)
    expect(activity.getState().getLastActivity(S1)).toEqual(new Date('2026-03-01T10:05:00Z'))
  })

  it('should keep agent metadata of archived messages', () => {
    scheduler.ensureHistoryLoaded(S1)
    bus.emit('archive:result', {
      queryId: calls[0].options.queryId,
      message: archived({ meta: { type: 'tool', tool: 'bash' } }),
    })

    expect(activity.getState().getMessages(S1)[0].meta).toEqual({ type: 'tool', tool: 'bash' })
  })

  it('should only record the time of recency probe results', () => {
    scheduler.ensureRecencyProbed(S1)
    bus.emit('archive:result', { queryId: calls[0].options.queryId, message: archived() })

    expect(activity.getState().getMessages(S1)).toEqual([])
    expect(activity.getState().lastActivityByThread.get(S1)).toEqual(new Date('2026-03-01T10:00:00Z'))
  })

  it('should count bodyless history results for ordering only', () => {
    scheduler.ensureHistoryLoaded(S1)
    bus.emit('archive:result', { queryId: calls[0].options.queryId, message: archived({ body: null }) })

    expect(activity.getState().getMessages(S1)).toEqual([])
    expect(activity.getState().lastActivityByThread.get(S1)).toEqual(new Date('2026-03-01T10:00:00Z'))
  })

  it('should ignore results of unknown queries', () => {
    bus.emit('archive:result', { queryId: 'mam_other', message: archived() })
    expect(activity.getState().threads.size).toBe(0)
  })

  it('should route late results within the grace period and drop them after it', async () => {
    scheduler.ensureHistoryLoaded(S1)
    const { queryId } = calls[0].options
    calls[0].deferred.resolve({ complete: true })
    await flushPromises()

    vi.advanceTimersByTime(ARCHIVE_ROUTE_GRACE_MS - 1)
    expect(scheduler.routeOf(queryId)).toEqual({ conversationId: S1, kind: 'history' })
    bus.emit('archive:result', { queryId, message: archived() })
    expect(activity.getState().getMessages(S1)).toHaveLength(1)

    // The late result re-armed the route
    vi.advanceTimersByTime(ARCHIVE_ROUTE_GRACE_MS)
    expect(scheduler.routeOf(queryId)).toBeNull()
    bus.emit('archive:result', { queryId, message: archived({ id: 'a9' }) })
    expect(activity.getState().getMessages(S1)).toHaveLength(1)
  })

  it('should retry a conversation whose query failed', async () => {
    scheduler.ensureHistoryLoaded(S1)
    calls[0].deferred.reject(new Error('Not connected'))
    await flushPromises()

    expect(scheduler.isHistoryLoaded(S1)).toBe(false)
    scheduler.ensureHistoryLoaded(S1)
    expect(calls).toHaveLength(2)
  })

  it('should apply configured limits', () => {
    scheduler.dispose()
    scheduler = new ArchiveScheduler({
      queryArchive: (options) => {
        const deferred = createDeferred<unknown>()
        calls.push({ options, deferred })
        return deferred.promise
      },
      subscribe: (event, handler) => bus.subscribe(event, handler),
      emitSDK: bus.emitSDK,
      activity,
      getOwnJid: () => null,
      limits: { historyLastItems: 120, recencyLastItems: 3 },
    })

    scheduler.ensureHistoryLoaded(S1)
    scheduler.ensureRecencyProbed(S2)

    expect(calls.map((c) => c.options.max)).toEqual([120, 3])
  })

  it('should clamp limits to the supported ranges', () => {
    scheduler.dispose()
    scheduler = new ArchiveScheduler({
      queryArchive: (options) => {
        const deferred = createDeferred<unknown>()
        calls.push({ options, deferred })
        return deferred.promise
      },
      subscribe: (event, handler) => bus.subscribe(event, handler),
      emitSDK: bus.emitSDK,
      activity,
      getOwnJid: () => null,
      limits: { historyLastItems: 100_000, recencyLastItems: 50 },
    })

    scheduler.ensureHistoryLoaded(S1)
    scheduler.ensureRecencyProbed(S2)

    expect(calls.map((c) => c.options.max)).toEqual([500, 5])
  })

  it('should start no queued query after dispose', async () => {
    const S3 = 's3@agents.example.com'
    scheduler.ensureHistoryLoaded(S1)
    scheduler.ensureHistoryLoaded(S2)
    scheduler.ensureHistoryLoaded(S3)
    const warmups = bus.count('archive:warmup')

    scheduler.dispose()
    calls[0].deferred.resolve({ complete: true })
    await flushPromises()

    expect(calls.map((c) => c.options.with)).toEqual([S1])
    expect(bus.count('archive:warmup')).toBe(warmups)
    expect(scheduler.isHistoryWarmup).toBe(false)
    expect(scheduler.routeOf(calls[0].options.queryId)).toBeNull()
  })

  it('should stop routing after dispose', () => {
    scheduler.ensureHistoryLoaded(S1)
    const { queryId } = calls[0].options
    scheduler.dispose()

    bus.emit('archive:result', { queryId, message: archived() })
    expect(bus.listenerCount('archive:result')).toBe(0)
    expect(activity.getState().threads.size).toBe(0)
  })
})
