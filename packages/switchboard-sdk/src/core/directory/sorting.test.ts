import { describe, it, expect } from 'vitest'
import { compareNames, dispatcherActivity, sameOrder, sortByRecency, sortDispatchersByRecency } from './sorting'
import { createDirectoryEntry, type DirectoryEntry } from '../types'

const at = (minutes: number) => new Date(Date.UTC(2026, 0, 1, 12, minutes))

const lookupFrom = (times: Record<string, Date>) => (threadId: string) => times[threadId]

const ids = (entries: DirectoryEntry[]) => entries.map((entry) => entry.id)

describe('compareNames', () => {
  it('should ignore case and compare digits numerically', () => {
    expect(compareNames('alpha', 'ALPHA')).toBe(0)
    expect(compareNames('session 2', 'session 10')).toBeLessThan(0)
  })
})

describe('sortByRecency', () => {
  it('should order open sessions newest first', () => {
    const items = [createDirectoryEntry('s1'), createDirectoryEntry('s2')]
    const sorted = sortByRecency(items, lookupFrom({ s1: at(1), s2: at(5) }))

    expect(ids(sorted)).toEqual(['s2', 's1'])
  })

  it('should put sessions without activity after those with activity, by name', () => {
    const items = [
      createDirectoryEntry('s3', { displayName: 'Charlie' }),
      createDirectoryEntry('s1', { displayName: 'alpha' }),
      createDirectoryEntry('s2', { displayName: 'Bravo' }),
    ]
    const sorted = sortByRecency(items, lookupFrom({ s2: at(0) }))

    expect(ids(sorted)).toEqual(['s2', 's1', 's3'])
  })

  it('should break name ties by address', () => {
    const items = [createDirectoryEntry('b', { displayName: 'Same' }), createDirectoryEntry('a', { displayName: 'Same' })]

    expect(ids(sortByRecency(items, lookupFrom({})))).toEqual(['a', 'b'])
  })

  it('should keep closed entries last in their original order', () => {
    const items = [
      createDirectoryEntry('c1', { isClosed: true }),
      createDirectoryEntry('s1'),
      createDirectoryEntry('c2', { isClosed: true }),
      createDirectoryEntry('s2'),
    ]
    const sorted = sortByRecency(items, lookupFrom({ c2: at(30), c1: at(1), s1: at(2), s2: at(3) }))

    expect(ids(sorted)).toEqual(['s2', 's1', 'c1', 'c2'])
  })

  it('should be idempotent', () => {
    const items = [createDirectoryEntry('s1'), createDirectoryEntry('s2'), createDirectoryEntry('s3', { isClosed: true })]
    const lookup = lookupFrom({ s1: at(4), s2: at(9) })
    const once = sortByRecency(items, lookup)

    expect(ids(sortByRecency(once, lookup))).toEqual(ids(once))
  })

  it('should not modify its input', () => {
    const items = [createDirectoryEntry('s1'), createDirectoryEntry('s2')]
    sortByRecency(items, lookupFrom({ s2: at(1) }))

    expect(ids(items)).toEqual(['s1', 's2'])
  })
})

describe('dispatcher ordering', () => {
  it('should use the latest of the dispatcher thread and its sessions', () => {
    const lookup = lookupFrom({ d1: at(1), s1: at(7), s2: at(3) })

    expect(dispatcherActivity('d1', ['s1', 's2'], lookup)).toBe(at(7).getTime())
    expect(dispatcherActivity('d2', [], lookup)).toBe(Number.NEGATIVE_INFINITY)
  })

  it('should order by activity, then rank, then name', () => {
    const items = [
      createDirectoryEntry('d1', { displayName: 'Zulu' }),
      createDirectoryEntry('d2', { displayName: 'Yankee', sortOrder: 2 }),
      createDirectoryEntry('d3', { displayName: 'Xray', sortOrder: 1 }),
      createDirectoryEntry('d4', { displayName: 'Whiskey' }),
      createDirectoryEntry('d5', { displayName: 'Victor' }),
    ]
    const sessionsOf = (id: string) => (id === 'd5' ? ['s9'] : [])
    const sorted = sortDispatchersByRecency(items, sessionsOf, lookupFrom({ s9: at(10) }))

    expect(ids(sorted)).toEqual(['d5', 'd3', 'd2', 'd4', 'd1'])
  })
})

describe('sameOrder', () => {
  it('should compare addresses position by position', () => {
    const a = [createDirectoryEntry('x'), createDirectoryEntry('y')]
    expect(sameOrder(a, [createDirectoryEntry('x'), createDirectoryEntry('y')])).toBe(true)
    expect(sameOrder(a, [createDirectoryEntry('y'), createDirectoryEntry('x')])).toBe(false)
    expect(sameOrder(a, [createDirectoryEntry('x')])).toBe(false)
  })
})
