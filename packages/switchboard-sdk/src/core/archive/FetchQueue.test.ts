import { describe, it, expect, vi } from 'vitest'
import { FetchQueue } from './FetchQueue'
import { createDeferred, flushPromises, type Deferred } from '../test-utils'

function createScriptedFetch() {
  const calls: Array<{ id: string; deferred: Deferred<void> }> = []
  const fetch = vi.fn((id: string) => {
    const deferred = createDeferred<void>()
    calls.push({ id, deferred })
    return deferred.promise
  })
  return { fetch, calls }
}

describe('FetchQueue', () => {
  it('should run one fetch at a time in request order', async () => {
    const { fetch, calls } = createScriptedFetch()
    const queue = new FetchQueue('history load', fetch)

    queue.ensure('s1')
    queue.ensure('s2')
    queue.ensure('s3')
    expect(calls.map((c) => c.id)).toEqual(['s1'])

    calls[0].deferred.resolve()
    await flushPromises()
    expect(calls.map((c) => c.id)).toEqual(['s1', 's2'])

    calls[1].deferred.resolve()
    await flushPromises()
    expect(calls.map((c) => c.id)).toEqual(['s1', 's2', 's3'])
  })

  it('should ignore a conversation that is queued, in flight or done', async () => {
    const { fetch, calls } = createScriptedFetch()
    const queue = new FetchQueue('history load', fetch)

    expect(queue.ensure('s1')).toBe(true)
    expect(queue.ensure('s2')).toBe(true)
    expect(queue.ensure('s1')).toBe(false)
    expect(queue.ensure('s2')).toBe(false)

    calls[0].deferred.resolve()
    await flushPromises()
    calls[1].deferred.resolve()
    await flushPromises()

    expect(queue.ensure('s1')).toBe(false)
    expect(queue.isDone('s1')).toBe(true)
    expect(fetch).toHaveBeenCalledTimes(2)
  })

  it('should trim ids and ignore blank ones', () => {
    const { fetch } = createScriptedFetch()
    const queue = new FetchQueue('recency probe', fetch)

    expect(queue.ensure('  ')).toBe(false)
    queue.ensure(' s1 ')
    expect(queue.ensure('s1')).toBe(false)
    expect(fetch).toHaveBeenCalledWith('s1')
  })

  it('should report busy while work remains', async () => {
    const { fetch, calls } = createScriptedFetch()
    const onBusyChange = vi.fn()
    const queue = new FetchQueue('history load', fetch, onBusyChange)

    queue.ensure('s1')
    queue.ensure('s2')
    expect(queue.isBusy).toBe(true)
    expect(onBusyChange.mock.calls).toEqual([[true]])

    calls[0].deferred.resolve()
    await flushPromises()
    expect(queue.isBusy).toBe(true)

    calls[1].deferred.resolve()
    await flushPromises()
    expect(queue.isBusy).toBe(false)
    expect(onBusyChange.mock.calls).toEqual([[true], [false]])
  })

  it('should forget a failed conversation and carry on with the next one', async () => {
    const { fetch, calls } = createScriptedFetch()
    const queue = new FetchQueue('history load', fetch)

    queue.ensure('s1')
    queue.ensure('s2')
    calls[0].deferred.reject(new Error('service-unavailable'))
    await flushPromises()

    expect(queue.has('s1')).toBe(false)
    expect(calls.map((c) => c.id)).toEqual(['s1', 's2'])
    expect(console.error).toHaveBeenCalledWith(
      '[Switchboard]',
      'Archive history load failed for s1: service-unavailable'
    )

    expect(queue.ensure('s1')).toBe(true)
  })

  it('should drop queued work on dispose and accept nothing after', async () => {
    const { fetch, calls } = createScriptedFetch()
    const onBusyChange = vi.fn()
    const queue = new FetchQueue('history load', fetch, onBusyChange)

    queue.ensure('s1')
    queue.ensure('s2')
    queue.dispose()

    expect(queue.isBusy).toBe(false)
    expect(queue.has('s2')).toBe(false)
    expect(queue.ensure('s3')).toBe(false)

    calls[0].deferred.resolve()
    await flushPromises()

    expect(fetch).toHaveBeenCalledTimes(1)
    expect(onBusyChange.mock.calls).toEqual([[true]])
  })
})
