import type { Element } from '@xmpp/client'
import { Connection, type ConnectOptions } from './modules/Connection'
import { Discovery } from './modules/Discovery'
import { PubSub } from './modules/PubSub'
import { MAM } from './modules/MAM'
import { Chat } from './modules/Chat'
import type { BaseModule, ModuleDependencies } from './modules/BaseModule'
import { SDKEventBus } from './SDKEventBus'
import { ArchiveScheduler } from './archive/ArchiveScheduler'
import { DirectoryService, type DirectoryTransport } from './directory/DirectoryService'
import type { AppConfig } from './config'
import type { DirectoryEntry, SDKEventHandler, SDKEvents } from './types'
import { createActivityStore, type ActivityStore } from '../stores/activityStore'
import { createDirectoryStore, type DirectoryStore } from '../stores/directoryStore'
import { createStoreBindings } from '../bindings/storeBindings'
import { logInfo } from './logger'

/**
 * Client configuration. Everything is optional; without `directoryJid`
 * the client is a plain chat client with no directory engine.
 */
export interface XMPPClientConfig {
  /** Full address of the directory client */
  directoryJid?: string | null
  pubSubJid?: string | null
  convenienceDispatchers?: DirectoryEntry[]
  prefetchHistoryThreads?: number
  recencyProbeThreads?: number
  mamLastItems?: number
  mamRecencyLastItems?: number
  /** Dispatcher lookup tokens, one per hotkey slot */
  dispatcherHotkeys?: Array<string | null>
}

/**
 * Per-client state stores, fed by SDK events.
 */
export interface ClientStores {
  activity: ActivityStore
  directory: DirectoryStore
}

/**
 * XMPP client with the directory engine attached.
 *
 * Wires the protocol modules to one connection, owns the per-client
 * stores, and builds a fresh archive scheduler and directory engine each
 * time the session comes online (including after an automatic reconnect).
 *
 * @example
 * ```typescript
 * const client = new XMPPClient({ directoryJid: 'directory@example.com/directory' })
 * client.subscribe('directory:sessions', ({ sessions }) => render(sessions))
 * await client.connect({ jid: 'me@example.com', password: 'secret', service: 'wss://example.com/ws' })
 * client.directory?.sendChat('summarize yesterday')
 * ```
 *
 * @category Core
 */
export class XMPPClient {
  /** Connection lifecycle and stanza routing */
  readonly connection: Connection

  /** Service discovery (XEP-0030) and HTTP upload (XEP-0363) */
  readonly discovery: Discovery

  /** Publish-Subscribe (XEP-0060) */
  readonly pubsub: PubSub

  /** Message Archive Management (XEP-0313) */
  readonly mam: MAM

  /** One-to-one messages and chat states */
  readonly chat: Chat

  readonly stores: ClientStores

  private readonly events = new SDKEventBus()
  private readonly modules: BaseModule[]
  private readonly unbindStores: () => void
  private archiveScheduler: ArchiveScheduler | null = null
  private directoryService: DirectoryService | null = null

  constructor(private readonly config: XMPPClientConfig = {}) {
    const moduleDeps: ModuleDependencies = {
      sendStanza: (stanza) => this.sendStanza(stanza),
      sendIQ: (iq) => this.sendIQ(iq),
      getCurrentJid: () => this.connection.getJid(),
      emitSDK: (event, payload) => this.emitSDK(event, payload),
    }

    this.connection = new Connection(moduleDeps)
    this.discovery = new Discovery(moduleDeps)
    this.pubsub = new PubSub(moduleDeps)
    this.mam = new MAM(moduleDeps)
    this.chat = new Chat(moduleDeps, this.discovery)

    // Order matters: archive results and pubsub events are messages too
    this.modules = [this.mam, this.pubsub, this.chat, this.discovery]

    this.connection.setStanzaHandler((stanza) => {
      for (const module of this.modules) {
        if (module.handle(stanza)) break
      }
    })
    this.connection.setOnlineHandler(() => this.startSession())
    this.connection.setOfflineHandler(() => this.stopSession())

    this.stores = {
      activity: createActivityStore(),
      directory: createDirectoryStore(),
    }
    this.unbindStores = createStoreBindings(this, () => ({
      activity: this.stores.activity.getState(),
      directory: this.stores.directory.getState(),
    }))
  }

  /** Directory engine of the current session, null while offline or without a directory. */
  get directory(): DirectoryService | null {
    return this.directoryService
  }

  /** Archive scheduler of the current session, null while offline. */
  get archive(): ArchiveScheduler | null {
    return this.archiveScheduler
  }

  // ============================================================================
  // Event Handling
  // ============================================================================

  /**
   * Subscribe to an SDK event.
   *
   * @returns Unsubscribe function
   *
   * @example
   * ```typescript
   * client.subscribe('chat:message', ({ message }) => {
   *   console.log(`${message.threadId}: ${message.body}`)
   * })
   * ```
   */
  subscribe<K extends keyof SDKEvents>(event: K, handler: SDKEventHandler<K>): () => void {
    return this.events.subscribe(event, handler)
  }

  /**
   * @internal Used by modules and the engine to emit events
   */
  emitSDK<K extends keyof SDKEvents>(event: K, payload: SDKEvents[K]): void {
    this.events.emit(event, payload)
  }

  // ============================================================================
  // Connection
  // ============================================================================

  async connect(options: ConnectOptions): Promise<void> {
    await this.connection.connect(options)
  }

  async disconnect(): Promise<void> {
    await this.connection.disconnect()
  }

  getJid(): string | null {
    return this.connection.getJid()
  }

  isConnected(): boolean {
    return this.connection.getJid() !== null
  }

  /**
   * Select the dispatcher bound to a hotkey slot (0-based).
   * @returns the selected dispatcher id, or null when the slot is empty or matches nothing
   */
  selectDispatcherHotkey(slot: number): string | null {
    const token = this.config.dispatcherHotkeys?.[slot]
    if (!token || !this.directoryService) return null
    return this.directoryService.selectDispatcherByToken(token)
  }

  /** Tear everything down; the client cannot be reused. */
  async destroy(): Promise<void> {
    this.stopSession()
    this.unbindStores()
    await this.connection.disconnect()
  }

  // ============================================================================
  // Session
  // ============================================================================

  private startSession(): void {
    this.stopSession()
    this.discovery.reset()

    const activity = this.stores.activity
    const archive = new ArchiveScheduler({
      queryArchive: (options) => this.mam.queryArchive(options),
      subscribe: (event, handler) => this.subscribe(event, handler),
      emitSDK: (event, payload) => this.emitSDK(event, payload),
      activity,
      getOwnJid: () => this.connection.getJid(),
      limits: {
        ...(this.config.mamLastItems === undefined ? {} : { historyLastItems: this.config.mamLastItems }),
        ...(this.config.mamRecencyLastItems === undefined ? {} : { recencyLastItems: this.config.mamRecencyLastItems }),
      },
    })
    this.archiveScheduler = archive

    const directoryJid = this.config.directoryJid
    if (!directoryJid) return

    this.directoryService = new DirectoryService({
      transport: this.createTransport(),
      archive,
      activity,
      emitSDK: (event, payload) => this.emitSDK(event, payload),
      subscribe: (event, handler) => this.subscribe(event, handler),
      directoryJid,
      pubSubJid: this.config.pubSubJid,
      convenienceDispatchers: this.config.convenienceDispatchers,
      prefetchHistoryThreads: this.config.prefetchHistoryThreads,
      recencyProbeThreads: this.config.recencyProbeThreads,
    })
    logInfo(`Directory engine started for ${directoryJid}`)
    this.directoryService.refreshAll()
  }

  private stopSession(): void {
    this.directoryService?.dispose()
    this.directoryService = null
    this.archiveScheduler?.dispose()
    this.archiveScheduler = null
    this.stores.directory.getState().reset()
  }

  private createTransport(): DirectoryTransport {
    return {
      discoverItems: (service, node) => this.discovery.discoverItems(service, node),
      subscribe: (service, node, subscriber) => this.pubsub.subscribe(service, node, subscriber),
      getSubscriberJid: () => this.connection.getJid(),
      sendMessage: async (to, body) => {
        await this.chat.sendMessage(to, body)
      },
      sendSubagentWork: async (to, work) => {
        await this.chat.sendSubagentWork(to, work)
      },
      sendAttachment: async (to, attachment) => {
        await this.chat.sendAttachment(to, attachment)
      },
    }
  }

  // ============================================================================
  // Internal Methods
  // ============================================================================

  private async sendStanza(stanza: Element): Promise<void> {
    const xmpp = this.connection.getClient()
    if (!xmpp) {
      throw new Error('Not connected')
    }
    await xmpp.send(stanza)
  }

  private async sendIQ(iq: Element): Promise<Element> {
    const xmpp = this.connection.getClient()
    if (!xmpp) {
      throw new Error('Not connected')
    }
    return xmpp.iqCaller.request(iq)
  }
}

/**
 * Client configured from {@link loadConfig} output.
 */
export function createClientFromConfig(config: AppConfig): XMPPClient {
  return new XMPPClient({
    directoryJid: config.directoryJid,
    pubSubJid: config.pubSubJid,
    convenienceDispatchers: config.convenienceDispatchers,
    prefetchHistoryThreads: config.prefetchHistoryThreads,
    recencyProbeThreads: config.recencyProbeThreads,
    mamLastItems: config.mamLastItems,
    mamRecencyLastItems: config.mamRecencyLastItems,
    dispatcherHotkeys: config.dispatcherHotkeys,
  })
}

/** Connection options for the account named in the configuration. */
export function connectOptionsFromConfig(config: AppConfig): ConnectOptions {
  return { jid: config.jid, password: config.password, service: config.service }
}
