import type { DirectoryEntry } from '../types'

/** Last activity of a thread, if any is known. */
export type ActivityLookup = (threadId: string) => Date | undefined

const NEVER = Number.NEGATIVE_INFINITY

function activityTime(lookup: ActivityLookup, threadId: string): number {
  return lookup(threadId)?.getTime() ?? NEVER
}

/** Case-insensitive, numeric-aware name comparison. */
export function compareNames(a: string, b: string): number {
  return a.localeCompare(b, undefined, { sensitivity: 'accent', numeric: true })
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

/**
 * Order sessions for display: open sessions by last activity (newest
 * first), then by name, then by id; closed sessions follow in their
 * original relative order.
 */
export function sortByRecency(items: readonly DirectoryEntry[], lastActivity: ActivityLookup): DirectoryEntry[] {
  const open = items.filter((item) => !item.isClosed)
  const closed = items.filter((item) => item.isClosed)

  const times = new Map(open.map((item) => [item.id, activityTime(lastActivity, item.id)]))
  const sorted = [...open].sort((a, b) => {
    const aTime = times.get(a.id) ?? NEVER
    const bTime = times.get(b.id) ?? NEVER
    if (aTime !== bTime) return bTime - aTime > 0 ? 1 : -1
    return compareNames(a.displayName, b.displayName) || compareIds(a.id, b.id)
  })

  return [...sorted, ...closed]
}

/**
 * Latest activity of a dispatcher thread or any of its known sessions.
 */
export function dispatcherActivity(
  dispatcherId: string,
  sessionIds: Iterable<string>,
  lastActivity: ActivityLookup
): number {
  let latest = activityTime(lastActivity, dispatcherId)
  for (const sessionId of sessionIds) {
    latest = Math.max(latest, activityTime(lastActivity, sessionId))
  }
  return latest
}

/**
 * Order dispatchers by {@link dispatcherActivity} (newest first), then by
 * directory rank, then by name, then by id.
 */
export function sortDispatchersByRecency(
  items: readonly DirectoryEntry[],
  sessionsOf: (dispatcherId: string) => Iterable<string>,
  lastActivity: ActivityLookup
): DirectoryEntry[] {
  const times = new Map(items.map((item) => [item.id, dispatcherActivity(item.id, sessionsOf(item.id), lastActivity)]))
  return [...items].sort((a, b) => {
    const aTime = times.get(a.id) ?? NEVER
    const bTime = times.get(b.id) ?? NEVER
    if (aTime !== bTime) return bTime - aTime > 0 ? 1 : -1
    if (a.sortOrder !== b.sortOrder) return a.sortOrder < b.sortOrder ? -1 : 1
    return compareNames(a.displayName, b.displayName) || compareIds(a.id, b.id)
  })
}

export function sameOrder(a: readonly DirectoryEntry[], b: readonly DirectoryEntry[]): boolean {
  return a.length === b.length && a.every((entry, index) => entry.id === b[index].id)
}
