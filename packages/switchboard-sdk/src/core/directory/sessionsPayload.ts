import type { Element } from '@xmpp/client'
import { NS_SWITCHBOARD_DIRECTORY } from '../namespaces'
import { createDirectoryEntry, type DirectoryEntry } from '../types'
import { uniqueEntries } from './nodes'

/**
 * Parse the session list published on a `sessions:<dispatcher>` node:
 *
 * ```xml
 * <sessions xmlns="urn:switchboard:directory:0">
 *   <session jid="s1@agents.example.com" name="Fix login" status="closed"/>
 * </sessions>
 * ```
 *
 * Returns null when the payload is absent or malformed, in which case the
 * caller falls back to discovery.
 */
export function parseSessionsPayload(payload: Element | undefined): DirectoryEntry[] | null {
  if (!payload || !payload.is('sessions', NS_SWITCHBOARD_DIRECTORY)) return null

  const entries: DirectoryEntry[] = []
  for (const session of payload.getChildren('session')) {
    const jid = session.attrs.jid?.trim()
    if (!jid) return null

    const name = session.attrs.name?.trim()
    entries.push(
      createDirectoryEntry(jid, {
        displayName: name || jid,
        isClosed: session.attrs.status === 'closed',
        isGroup: session.attrs.kind === 'group',
      })
    )
  }
  return uniqueEntries(entries)
}
