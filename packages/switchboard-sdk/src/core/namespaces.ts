/**
 * XMPP Namespace Constants
 *
 * Centralized namespace definitions for the XEPs and private payloads the
 * SDK reads and writes.
 */

// XEP-0030: Service Discovery
export const NS_DISCO_INFO = 'http://jabber.org/protocol/disco#info'
export const NS_DISCO_ITEMS = 'http://jabber.org/protocol/disco#items'

// XEP-0060: Publish-Subscribe
export const NS_PUBSUB = 'http://jabber.org/protocol/pubsub'
export const NS_PUBSUB_EVENT = 'http://jabber.org/protocol/pubsub#event'

// XEP-0313: Message Archive Management
export const NS_MAM = 'urn:xmpp:mam:2'

// XEP-0059: Result Set Management
export const NS_RSM = 'http://jabber.org/protocol/rsm'

// XEP-0004: Data Forms
export const NS_DATA_FORMS = 'jabber:x:data'

// XEP-0297: Stanza Forwarding
export const NS_FORWARD = 'urn:xmpp:forward:0'

// XEP-0203: Delayed Delivery
export const NS_DELAY = 'urn:xmpp:delay'

// XEP-0363: HTTP File Upload
export const NS_HTTP_UPLOAD = 'urn:xmpp:http:upload:0'

// XEP-0066: Out of Band Data
export const NS_OOB = 'jabber:x:oob'

// XEP-0085: Chat State Notifications
export const NS_CHATSTATES = 'http://jabber.org/protocol/chatstates'

// RFC 6120: Stanza errors
export const NS_XMPP_STANZAS = 'urn:ietf:params:xml:ns:xmpp-stanzas'

// Directory push payload for sessions:<dispatcher> nodes
export const NS_SWITCHBOARD_DIRECTORY = 'urn:switchboard:directory:0'

// Work envelope attached to messages sent to a subagent
export const NS_SWITCHBOARD_SUBAGENT = 'urn:switchboard:subagent:0'

// Agent metadata on chat messages (tool calls, run stats, questions, attachments)
export const NS_SWITCHBOARD_META = 'urn:switchboard:message-meta:0'
