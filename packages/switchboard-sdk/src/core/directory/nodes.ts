import { createDirectoryEntry, UNORDERED, type DirectoryEntry, type DiscoItem } from '../types'

const SESSIONS_PREFIX = 'sessions:'
const INDIVIDUALS_PREFIX = 'individuals:'

/**
 * Node identifiers queried on the directory service and subscribed to on
 * the notification service.
 */
export const DIRECTORY_NODES = {
  dispatchers: 'dispatchers',
  sessions: (dispatcherJid: string) => `${SESSIONS_PREFIX}${dispatcherJid}`,
  // Legacy hierarchy levels; only `individuals:` notifications are still honoured
  groups: (dispatcherJid: string) => `groups:${dispatcherJid}`,
  individuals: (groupJid: string) => `${INDIVIDUALS_PREFIX}${groupJid}`,
  subagents: (individualJid: string) => `subagents:${individualJid}`,
} as const

/** Dispatcher address of a `sessions:<dispatcher>` node, else null. */
export function dispatcherOfSessionsNode(node: string): string | null {
  if (!node.startsWith(SESSIONS_PREFIX)) return null
  const dispatcherJid = node.slice(SESSIONS_PREFIX.length)
  return dispatcherJid || null
}

export function isLegacyIndividualsNode(node: string): boolean {
  return node.startsWith(INDIVIDUALS_PREFIX)
}

export interface NodeTag {
  /** Child node the item opens, e.g. `sessions:<address>` */
  childNode: string | null
  sortOrder: number
  isDirect: boolean
  isClosed: boolean
  isGroup: boolean
}

/**
 * Parse a disco item `node` attribute of the form
 * `<child node>;order=<n>;direct;closed;group`.
 */
export function parseNodeTag(node: string | undefined): NodeTag {
  const tag: NodeTag = { childNode: null, sortOrder: UNORDERED, isDirect: false, isClosed: false, isGroup: false }
  if (!node) return tag

  const [head, ...flags] = node.split(';').map((segment) => segment.trim())
  tag.childNode = head || null

  for (const flag of flags) {
    if (flag === 'direct') tag.isDirect = true
    else if (flag === 'closed') tag.isClosed = true
    else if (flag === 'group') tag.isGroup = true
    else if (flag.startsWith('order=')) {
      const order = Number.parseInt(flag.slice('order='.length), 10)
      if (Number.isFinite(order)) tag.sortOrder = order
    }
  }
  return tag
}

export function entryFromDiscoItem(item: DiscoItem): DirectoryEntry {
  const tag = parseNodeTag(item.node)
  const name = item.name?.trim()
  return createDirectoryEntry(item.jid, {
    displayName: name || item.jid,
    isDirect: tag.isDirect,
    isClosed: tag.isClosed,
    isGroup: tag.isGroup,
    sortOrder: tag.sortOrder,
  })
}

/**
 * Drop entries without an address and later duplicates of an address.
 */
export function uniqueEntries(entries: DirectoryEntry[]): DirectoryEntry[] {
  const seen = new Set<string>()
  return entries.filter((entry) => {
    if (!entry.id || seen.has(entry.id)) return false
    seen.add(entry.id)
    return true
  })
}
