import { xml, type Element } from '@xmpp/client'
import { BaseModule } from './BaseModule'
import { getBareJid, getDomain } from '../jid'
import { generateUUID } from '../../utils/uuid'
import { describeError } from '../../utils/xmppError'
import { NS_DATA_FORMS, NS_DISCO_INFO, NS_DISCO_ITEMS, NS_HTTP_UPLOAD } from '../namespaces'
import type { DiscoItem, HttpUploadService, UploadSlot } from '../types'
import { logInfo, logWarn } from '../logger'

/**
 * Service discovery and HTTP file upload module.
 *
 * - XEP-0030: Service Discovery (disco#items against the directory, disco#info
 *   when looking for an upload service)
 * - XEP-0363: HTTP File Upload (service discovery, upload slot requests)
 *
 * @example
 * ```typescript
 * const items = await client.discovery.discoverItems('directory@example.com/directory', 'dispatchers')
 * const slot = await client.discovery.requestUploadSlot('photo.jpg', 1024000, 'image/jpeg')
 * // PUT file to slot.putUrl, then share slot.getUrl in message
 * ```
 *
 * @category Modules
 */
export class Discovery extends BaseModule {
  private uploadService: Promise<HttpUploadService | null> | null = null

  handle(_stanza: Element): boolean {
    // Responses arrive through the IQ caller
    return false
  }

  /**
   * List the items of a node (XEP-0030 disco#items).
   * Item addresses are returned bare.
   */
  async discoverItems(service: string, node?: string): Promise<DiscoItem[]> {
    const iq = xml(
      'iq',
      { type: 'get', to: service, id: `items_${generateUUID()}` },
      xml('query', { xmlns: NS_DISCO_ITEMS, node })
    )
    const result = await this.deps.sendIQ(iq)
    const items = result.getChild('query', NS_DISCO_ITEMS)?.getChildren('item') ?? []

    const discovered: DiscoItem[] = []
    for (const item of items) {
      const jid = item.attrs.jid
      if (!jid) continue
      discovered.push({
        jid: getBareJid(jid),
        ...(item.attrs.name ? { name: item.attrs.name } : {}),
        ...(item.attrs.node ? { node: item.attrs.node } : {}),
      })
    }
    return discovered
  }

  /**
   * Find the HTTP Upload service (XEP-0363). The lookup runs once per
   * connection; a failed lookup is retried on the next call.
   */
  getHttpUploadService(): Promise<HttpUploadService | null> {
    if (!this.uploadService) {
      const lookup = this.discoverHttpUploadService()
      this.uploadService = lookup
      void lookup.then((service) => {
        if (!service && this.uploadService === lookup) this.uploadService = null
      })
    }
    return this.uploadService
  }

  /** Forget the cached upload service, e.g. after reconnecting elsewhere. */
  reset(): void {
    this.uploadService = null
  }

  /**
   * Checks disco#info on the server domain first (some servers advertise
   * the feature there), then each disco#items component.
   */
  private async discoverHttpUploadService(): Promise<HttpUploadService | null> {
    const domain = getDomain(this.deps.getCurrentJid() ?? '')
    if (!domain) return null

    try {
      const serverQuery = await this.fetchInfo(domain)
      if (this.hasFeature(serverQuery, NS_HTTP_UPLOAD)) {
        return this.announce(this.extractUploadService(domain, serverQuery))
      }

      const components = await this.discoverItems(domain)
      for (const { jid } of components) {
        try {
          const query = await this.fetchInfo(jid)
          if (this.hasFeature(query, NS_HTTP_UPLOAD)) {
            return this.announce(this.extractUploadService(jid, query))
          }
        } catch (err) {
          logWarn(`disco#info on ${jid} failed: ${describeError(err)}`)
        }
      }

      logInfo('No HTTP Upload service found')
      return null
    } catch (err) {
      logWarn(`HTTP Upload discovery failed: ${describeError(err)}`)
      return null
    }
  }

  private async fetchInfo(jid: string): Promise<Element | undefined> {
    const iq = xml('iq', { type: 'get', to: jid, id: `info_${generateUUID()}` }, xml('query', { xmlns: NS_DISCO_INFO }))
    const result = await this.deps.sendIQ(iq)
    return result.getChild('query', NS_DISCO_INFO)
  }

  private hasFeature(query: Element | undefined, feature: string): boolean {
    return (query?.getChildren('feature') ?? []).some((f) => f.attrs.var === feature)
  }

  private announce(service: HttpUploadService): HttpUploadService {
    const limit = service.maxFileSize ? ` (max ${Math.round(service.maxFileSize / 1024 / 1024)}MB)` : ''
    logInfo(`HTTP Upload service: ${service.jid}${limit}`)
    return service
  }

  /**
   * Read `max-file-size` from the upload form of a disco#info result.
   */
  private extractUploadService(jid: string, query: Element | undefined): HttpUploadService {
    for (const form of query?.getChildren('x', NS_DATA_FORMS) ?? []) {
      const field = form.getChildren('field').find((f) => f.attrs.var === 'max-file-size')
      const value = field?.getChildText('value')
      const maxFileSize = value ? Number.parseInt(value, 10) : Number.NaN
      if (Number.isFinite(maxFileSize)) return { jid, maxFileSize }
    }
    return { jid }
  }

  /**
   * Request an upload slot from the HTTP Upload service (XEP-0363).
   * @param size - File size in bytes
   * @returns Upload slot with PUT and GET URLs
   */
  async requestUploadSlot(filename: string, size: number, contentType: string): Promise<UploadSlot> {
    const service = await this.getHttpUploadService()
    if (!service) {
      throw new Error('HTTP Upload service not available')
    }
    if (service.maxFileSize && size > service.maxFileSize) {
      throw new Error(`File too large (max ${Math.round(service.maxFileSize / 1024 / 1024)}MB)`)
    }

    const iq = xml(
      'iq',
      { type: 'get', to: service.jid, id: `slot_${generateUUID()}` },
      xml('request', {
        xmlns: NS_HTTP_UPLOAD,
        filename,
        size: String(size),
        'content-type': contentType,
      })
    )

    const result = await this.deps.sendIQ(iq)
    const slot = result.getChild('slot', NS_HTTP_UPLOAD)
    const put = slot?.getChild('put')
    const get = slot?.getChild('get')
    const putUrl = put?.attrs.url
    const getUrl = get?.attrs.url
    if (!put || !putUrl || !getUrl) {
      throw new Error('Invalid upload slot response')
    }

    const headers: Record<string, string> = {}
    for (const header of put.getChildren('header')) {
      const name = header.attrs.name
      if (name) headers[name] = header.text()
    }

    return {
      putUrl,
      getUrl,
      ...(Object.keys(headers).length > 0 ? { headers } : {}),
    }
  }
}
