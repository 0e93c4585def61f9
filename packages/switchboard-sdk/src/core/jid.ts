/**
 * JID (Jabber ID) Utilities
 *
 * XMPP addresses (JIDs) have the format: local@domain/resource
 * - Bare JID: local@domain (without resource)
 * - Full JID: local@domain/resource (with resource)
 *
 * These are plain string operations; no RFC 6122 escaping is applied.
 */

/**
 * Get bare JID (without resource) from a full JID
 * @param fullJid - Full JID (e.g., "user@example.com/mobile")
 * @returns Bare JID (e.g., "user@example.com")
 */
export function getBareJid(fullJid: string): string {
  if (!fullJid) return ''
  const slashIndex = fullJid.indexOf('/')
  return slashIndex >= 0 ? fullJid.substring(0, slashIndex) : fullJid
}

/**
 * Get local part (username) from a JID.
 * A domain-only JID returns the domain itself.
 */
export function getLocalPart(jid: string): string {
  if (!jid) return ''
  const bareJid = getBareJid(jid)
  const atIndex = bareJid.indexOf('@')
  return atIndex >= 0 ? bareJid.substring(0, atIndex) : bareJid
}

/**
 * Get domain from a JID
 * @param jid - Any JID (e.g., "user@example.com" or "user@example.com/mobile")
 * @returns Domain (e.g., "example.com"), or '' when the JID has no local part
 */
export function getDomain(jid: string): string {
  if (!jid) return ''
  const bareJid = getBareJid(jid)
  const atIndex = bareJid.indexOf('@')
  return atIndex >= 0 ? bareJid.substring(atIndex + 1) : ''
}

export function hasResource(jid: string): boolean {
  return jid.includes('/')
}

/**
 * Append a resource unless the JID already carries one.
 */
export function withDefaultResource(jid: string, resource: string): string {
  if (!jid || hasResource(jid)) return jid
  return `${jid}/${resource}`
}
