import type { Element } from '@xmpp/client'
import { NS_XMPP_STANZAS } from '../core/namespaces'

/**
 * RFC 6120 §8.3 error type categories.
 */
export type XMPPErrorType = 'cancel' | 'continue' | 'modify' | 'auth' | 'wait'

/**
 * Structured representation of an XMPP stanza error (RFC 6120 §8.3).
 */
export interface XMPPStanzaError {
  type: XMPPErrorType
  /** Defined condition element name, e.g. 'item-not-found' */
  condition: string
  text?: string
}

const ERROR_TYPES: readonly XMPPErrorType[] = ['cancel', 'continue', 'modify', 'auth', 'wait']

function toErrorType(raw: string | undefined): XMPPErrorType {
  return ERROR_TYPES.find((type) => type === raw) ?? 'cancel'
}

/**
 * Parse an XMPP `<error>` element, or a stanza carrying one, into a
 * structured object. Returns null when no error element is present.
 */
export function parseXMPPError(errorEl: Element | undefined | null): XMPPStanzaError | null {
  if (!errorEl) return null

  const el = errorEl.name === 'error' ? errorEl : errorEl.getChild('error')
  if (!el) return null

  let condition = 'undefined-condition'
  for (const child of el.children) {
    if (typeof child === 'string') continue
    if (child.attrs.xmlns === NS_XMPP_STANZAS && child.name !== 'text') {
      condition = child.name
      break
    }
  }

  const text = el.getChild('text', NS_XMPP_STANZAS)?.text() || undefined

  return { type: toErrorType(el.attrs.type), condition, text }
}

/**
 * Format an XMPPStanzaError for display: the server text when present,
 * otherwise the condition in sentence case ('not-allowed' → 'Not allowed').
 */
export function formatXMPPError(error: XMPPStanzaError): string {
  if (error.text) return error.text

  const words = error.condition.split('-')
  words[0] = words[0].charAt(0).toUpperCase() + words[0].slice(1)
  return words.join(' ')
}

/**
 * One-line description of anything thrown by the transport.
 *
 * IQ failures from @xmpp/client reject with a StanzaError that carries
 * `condition` and the original `element`; those are rendered through
 * {@link formatXMPPError} so logs read the same as parsed errors.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    if ('element' in err && isElement(err.element)) {
      const parsed = parseXMPPError(err.element)
      if (parsed) return `${parsed.condition}: ${formatXMPPError(parsed)}`
    }
    if ('condition' in err && typeof err.condition === 'string' && err.condition) {
      return err.message && err.message !== err.condition
        ? `${err.condition}: ${err.message}`
        : err.condition
    }
    return err.message || err.name
  }
  return String(err)
}

function isElement(value: unknown): value is Element {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'getChild' in value &&
    typeof value.getChild === 'function'
  )
}
