import { client, type Client, type Element } from '@xmpp/client'
import { BaseModule } from './BaseModule'
import { getDomain, getLocalPart } from '../jid'
import { logError, logInfo, logWarn } from '../logger'
import { describeError } from '../../utils/xmppError'

export interface ConnectOptions {
  /** Account address */
  jid: string
  password: string
  /** Connection URL (`wss://…/ws`, `xmpp://host:port`) */
  service: string
  resource?: string
  lang?: string
}

/**
 * Connection lifecycle module.
 *
 * Owns the @xmpp/client instance: starts and stops it, forwards every
 * incoming stanza to the stanza handler set by XMPPClient, and reports
 * status changes as `connection:status` events. The bound address is
 * announced through `connection:authenticated` and the online handler,
 * which runs again after each automatic reconnect.
 *
 * @category Modules
 */
export class Connection extends BaseModule {
  private xmpp: Client | null = null
  private boundJid: string | null = null
  private onStanza: ((stanza: Element) => void) | null = null
  private onOnline: ((jid: string) => void) | null = null
  private onOffline: (() => void) | null = null

  handle(_stanza: Element): boolean {
    return false
  }

  setStanzaHandler(handler: (stanza: Element) => void): void {
    this.onStanza = handler
  }

  /** Called with the full bound address each time the session comes online. */
  setOnlineHandler(handler: (jid: string) => void): void {
    this.onOnline = handler
  }

  setOfflineHandler(handler: () => void): void {
    this.onOffline = handler
  }

  getClient(): Client | null {
    return this.xmpp
  }

  /** Full bound address, or null while offline. */
  getJid(): string | null {
    return this.boundJid
  }

  /**
   * Connect and authenticate. Resolves once the session is online; rejects
   * with the transport error otherwise.
   */
  async connect({ jid, password, service, resource, lang }: ConnectOptions): Promise<void> {
    if (this.xmpp) await this.disconnect()

    this.deps.emitSDK('connection:status', { status: 'connecting' })
    logInfo(`Connecting to ${service}`)

    const xmpp = client({
      service,
      domain: getDomain(jid) || jid,
      username: getLocalPart(jid),
      password,
      resource,
      lang,
    })
    this.xmpp = xmpp
    this.setupHandlers(xmpp)

    try {
      await xmpp.start()
    } catch (err) {
      const message = describeError(err)
      logError(`Connection error: ${message}`)
      if (this.xmpp === xmpp) {
        this.xmpp = null
        this.boundJid = null
      }
      this.deps.emitSDK('connection:status', { status: 'error', error: message })
      throw err
    }
  }

  /**
   * Close the stream. Status turns offline before the stream is closed, so
   * callers can tear down state right away.
   */
  async disconnect(): Promise<void> {
    const xmpp = this.xmpp
    this.xmpp = null
    this.boundJid = null
    if (!xmpp) return

    this.deps.emitSDK('connection:status', { status: 'offline' })
    this.onOffline?.()

    try {
      await xmpp.stop()
    } catch (err) {
      logWarn(`Stream close failed: ${describeError(err)}`)
    }
  }

  private setupHandlers(xmpp: Client): void {
    xmpp.on('online', (address) => {
      if (this.xmpp !== xmpp) return
      this.boundJid = address.toString()
      logInfo(`Online as ${this.boundJid}`)
      this.deps.emitSDK('connection:status', { status: 'online' })
      this.deps.emitSDK('connection:authenticated', { jid: this.boundJid })
      this.onOnline?.(this.boundJid)
    })

    xmpp.on('offline', () => {
      if (this.xmpp !== xmpp) return
      this.boundJid = null
      this.deps.emitSDK('connection:status', { status: 'offline' })
      this.onOffline?.()
    })

    xmpp.on('error', (err) => {
      logWarn(`Stream error: ${describeError(err)}`)
    })

    xmpp.on('stanza', (stanza) => {
      if (this.xmpp !== xmpp) return
      this.onStanza?.(stanza)
    })
  }
}
