import type { DirectoryEntry } from '../types'

const normalize = (value: string) => value.trim().toLowerCase()

/**
 * Resolve a hotkey token to a dispatcher. Matches, in order of preference:
 * exact address or name, address prefix, name prefix, substring of either.
 * Comparison is case-insensitive.
 */
export function resolveDispatcherToken(
  token: string,
  dispatchers: readonly DirectoryEntry[]
): DirectoryEntry | null {
  const t = normalize(token)
  if (!t) return null

  const matchers: Array<(id: string, name: string) => boolean> = [
    (id, name) => id === t || name === t,
    (id) => id.startsWith(t),
    (_id, name) => name.startsWith(t),
    (id, name) => id.includes(t) || name.includes(t),
  ]

  for (const matches of matchers) {
    const found = dispatchers.find((entry) => matches(normalize(entry.id), normalize(entry.displayName)))
    if (found) return found
  }
  return null
}
