import { xml, type Element } from '@xmpp/client'
import { BaseModule } from './BaseModule'
import { generateUUID } from '../../utils/uuid'
import { NS_PUBSUB, NS_PUBSUB_EVENT } from '../namespaces'

/**
 * Publish-Subscribe module (XEP-0060).
 *
 * Subscribes to nodes of a pubsub service and turns incoming item
 * notifications into `pubsub:items` events carrying the payload of the
 * first published item.
 *
 * @category Modules
 */
export class PubSub extends BaseModule {
  handle(stanza: Element): boolean {
    if (!stanza.is('message')) return false
    const event = stanza.getChild('event', NS_PUBSUB_EVENT)
    if (!event) return false

    const items = event.getChild('items')
    const node = items?.attrs.node
    if (!items || !node) return true

    const payload = items.getChild('item')?.children.find((child): child is Element => typeof child !== 'string')
    this.deps.emitSDK('pubsub:items', {
      node,
      ...(stanza.attrs.from ? { from: stanza.attrs.from } : {}),
      ...(payload ? { payload } : {}),
    })
    return true
  }

  /**
   * Subscribe `subscriber` to a node. Resolves on the service acknowledgment,
   * rejects with the stanza error otherwise.
   */
  async subscribe(service: string, node: string, subscriber: string): Promise<void> {
    const iq = xml(
      'iq',
      { type: 'set', to: service, id: `sub_${generateUUID()}` },
      xml('pubsub', { xmlns: NS_PUBSUB }, xml('subscribe', { node, jid: subscriber }))
    )
    await this.deps.sendIQ(iq)
  }
}
