import type { Element } from '@xmpp/client'
import type { EmitSDK } from '../types'

/**
 * Dependencies injected into each module by XMPPClient.
 *
 * Provides stanza sending and event emission without modules needing
 * direct access to the XMPPClient instance.
 *
 * @internal
 */
export interface ModuleDependencies {
  sendStanza: (stanza: Element) => Promise<void>
  /** Resolves with the result IQ; rejects on an error IQ or timeout */
  sendIQ: (iq: Element) => Promise<Element>
  /** Full bound JID, or null while offline */
  getCurrentJid: () => string | null
  emitSDK: EmitSDK
}

/**
 * Base class for protocol modules in XMPPClient.
 *
 * Each module owns a set of XEPs and processes the incoming stanzas that
 * belong to it. Return `true` from `handle()` to stop the stanza from
 * reaching the modules after it.
 *
 * @example
 * ```typescript
 * class CustomModule extends BaseModule {
 *   handle(stanza: Element): boolean {
 *     return stanza.is('message') && stanza.getChild('custom', 'urn:example:custom') !== undefined
 *   }
 * }
 * ```
 *
 * @category Modules
 * @internal
 */
export abstract class BaseModule {
  protected deps: ModuleDependencies

  constructor(deps: ModuleDependencies) {
    this.deps = deps
  }

  abstract handle(stanza: Element): boolean
}
