/**
 * Directory model: dispatchers, their sessions, and what the user is
 * currently looking at and talking to.
 *
 * @packageDocumentation
 * @module Types/Directory
 */

/**
 * Sort order for entries the directory did not rank.
 * Sorts after every explicit `order=<n>`.
 */
export const UNORDERED = Number.MAX_SAFE_INTEGER

/**
 * A node of the dispatcher/session hierarchy as discovered from the
 * directory service or pushed through a `sessions:<dispatcher>` notification.
 */
export interface DirectoryEntry {
  /** Entry address; unique within a list */
  id: string
  displayName: string
  /** A dispatcher that is chatted with directly and owns no sessions */
  isDirect: boolean
  isClosed: boolean
  isGroup: boolean
  /** Lower sorts first; {@link UNORDERED} when unranked */
  sortOrder: number
}

export function createDirectoryEntry(
  id: string,
  overrides: Partial<Omit<DirectoryEntry, 'id'>> = {}
): DirectoryEntry {
  return {
    id,
    displayName: overrides.displayName ?? id,
    isDirect: overrides.isDirect ?? false,
    isClosed: overrides.isClosed ?? false,
    isGroup: overrides.isGroup ?? false,
    sortOrder: overrides.sortOrder ?? UNORDERED,
  }
}

/**
 * Which child list is current. A `group` level is a legacy filter and never
 * becomes a chat target.
 */
export type NavigationSelection =
  | { kind: 'dispatcher'; id: string }
  | { kind: 'group'; id: string }
  | { kind: 'individual'; id: string }
  | { kind: 'subagent'; id: string }

/**
 * Where outgoing messages go. Every variant carries the target address.
 */
export type ChatTarget =
  | { kind: 'dispatcher'; address: string }
  | { kind: 'individual'; address: string }
  | { kind: 'subagent'; address: string }

/** A disco#items entry as returned by the transport. */
export interface DiscoItem {
  jid: string
  name?: string
  node?: string
}

/** Read-only view of the reconciler state, for hosts and tests. */
export interface DirectorySnapshot {
  dispatchers: DirectoryEntry[]
  individuals: DirectoryEntry[]
  selectedDispatcherId: string | null
  selectedSessionId: string | null
  chatTarget: ChatTarget | null
  isLoadingIndividuals: boolean
  individualsLoadedOnce: boolean
  awaitingSessionFor: string | null
}
