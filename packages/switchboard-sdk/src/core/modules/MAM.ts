/**
 * Message Archive Management (XEP-0313) module.
 *
 * Queries are fire-and-collect: `queryArchive()` sends the query and each
 * `<result/>` message the server streams back is emitted as an
 * `archive:result` event tagged with the caller's query id. Routing results
 * to a conversation is left to the caller (see ArchiveScheduler).
 *
 * @module MAM
 * @category Modules
 */

import { xml, type Element } from '@xmpp/client'
import { BaseModule } from './BaseModule'
import { getBareJid } from '../jid'
import { NS_DATA_FORMS, NS_DELAY, NS_FORWARD, NS_MAM, NS_OOB, NS_RSM } from '../namespaces'
import type { ArchivedMessage } from '../types'
import { parseMessageMeta } from '../messageMeta'

export interface ArchiveQuery {
  /** Peer the archived conversation is with */
  with: string
  /** Most recent messages to return */
  max: number
  queryId: string
}

export interface ArchiveQueryResult {
  /** The archive holds nothing older than what was returned */
  complete: boolean
}

export class MAM extends BaseModule {
  handle(stanza: Element): boolean {
    if (!stanza.is('message')) return false
    const result = stanza.getChild('result', NS_MAM)
    if (!result) return false

    // Error stanzas may echo a stale result
    if (stanza.attrs.type === 'error') return true

    const queryId = result.attrs.queryid
    const message = queryId ? this.parseArchiveMessage(result) : null
    if (queryId && message) {
      this.deps.emitSDK('archive:result', { queryId, message })
    }
    return true
  }

  /**
   * Fetch the latest `max` messages exchanged with a peer.
   */
  async queryArchive({ with: peer, max, queryId }: ArchiveQuery): Promise<ArchiveQueryResult> {
    const iq = this.buildMAMQuery(queryId, [this.formField('FORM_TYPE', NS_MAM, 'hidden'), this.formField('with', peer)], max)
    const response = await this.deps.sendIQ(iq)
    const fin = response.getChild('fin', NS_MAM)
    return { complete: fin?.attrs.complete === 'true' }
  }

  /**
   * Empty `<before/>` asks for the newest page.
   */
  private buildMAMQuery(queryId: string, formFields: Element[], max: number): Element {
    return xml(
      'iq',
      { type: 'set', id: queryId },
      xml(
        'query',
        { xmlns: NS_MAM, queryid: queryId },
        xml('x', { xmlns: NS_DATA_FORMS, type: 'submit' }, ...formFields),
        xml('set', { xmlns: NS_RSM }, xml('max', {}, String(max)), xml('before', {}))
      )
    )
  }

  private formField(name: string, value: string, type?: string): Element {
    return xml('field', { var: name, type }, xml('value', {}, value))
  }

  private parseArchiveMessage(result: Element): ArchivedMessage | null {
    const id = result.attrs.id
    const forwarded = result.getChild('forwarded', NS_FORWARD)
    const messageEl = forwarded?.getChild('message')
    if (!id || !forwarded || !messageEl) return null

    const stamp = forwarded.getChild('delay', NS_DELAY)?.attrs.stamp
    const parsed = stamp ? new Date(stamp) : null
    const timestamp = parsed && !Number.isNaN(parsed.getTime()) ? parsed : new Date()

    const attachmentUrl = messageEl.getChild('x', NS_OOB)?.getChildText('url') || undefined
    const meta = parseMessageMeta(messageEl)
    return {
      id,
      from: getBareJid(messageEl.attrs.from ?? ''),
      to: getBareJid(messageEl.attrs.to ?? ''),
      body: messageEl.getChildText('body'),
      timestamp,
      ...(attachmentUrl ? { attachmentUrl } : {}),
      ...(meta ? { meta } : {}),
    }
  }
}
