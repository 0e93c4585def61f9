/**
 * Shared test utilities for module and engine tests
 */
import { EventEmitter } from 'node:events'
import { vi, type Mock } from 'vitest'
import { xml, type Client, type Element, type IQCaller, type JID } from '@xmpp/client'
import type { ModuleDependencies } from './modules/BaseModule'
import type { ArchiveWork, DirectoryTransport } from './directory/DirectoryService'
import type { DiscoItem, EmitSDK, SDKEvents } from './types'
import { SDKEventBus } from './SDKEventBus'

export interface MockChildInput {
  name: string
  attrs?: Record<string, string>
  children?: MockChildInput[]
  text?: string
}

/**
 * Build a stanza tree with the real `xml()` builder.
 *
 * @example
 * ```ts
 * createMockElement('message', { from: 'a@example.com' }, [{ name: 'body', text: 'hi' }])
 * ```
 */
export const createMockElement = (
  name: string,
  attrs: Record<string, string> = {},
  children: MockChildInput[] = [],
  text?: string
): Element => {
  const childElements = children.map((child) =>
    createMockElement(child.name, child.attrs ?? {}, child.children ?? [], child.text)
  )
  return text === undefined ? xml(name, attrs, ...childElements) : xml(name, attrs, ...childElements, text)
}

export type MockModuleDependencies = {
  sendStanza: Mock<ModuleDependencies['sendStanza']>
  sendIQ: Mock<ModuleDependencies['sendIQ']>
  getCurrentJid: Mock<ModuleDependencies['getCurrentJid']>
  emitSDK: Mock<EmitSDK>
}

/**
 * Module dependencies with every function mocked. `sendIQ` resolves with an
 * empty result until a test overrides it.
 */
export const createMockDeps = (jid: string | null = 'me@example.com/web'): MockModuleDependencies => ({
  sendStanza: vi.fn<ModuleDependencies['sendStanza']>().mockResolvedValue(undefined),
  sendIQ: vi.fn<ModuleDependencies['sendIQ']>().mockResolvedValue(createMockElement('iq', { type: 'result' })),
  getCurrentJid: vi.fn<ModuleDependencies['getCurrentJid']>().mockReturnValue(jid),
  emitSDK: vi.fn<EmitSDK>(),
})

/**
 * Event bus that keeps every emitted payload, for asserting on event streams.
 */
export class RecordingEventBus extends SDKEventBus {
  private payloads: { [K in keyof SDKEvents]?: Array<SDKEvents[K]> } = {}

  readonly emitSDK: EmitSDK = (event, payload) => this.emit(event, payload)

  override emit<K extends keyof SDKEvents>(event: K, payload: SDKEvents[K]): void {
    const existing: Array<SDKEvents[K]> | undefined = this.payloads[event]
    const list = existing ?? []
    if (!existing) this.payloads[event] = list
    list.push(payload)
    super.emit(event, payload)
  }

  recorded<K extends keyof SDKEvents>(event: K): Array<SDKEvents[K]> {
    const list: Array<SDKEvents[K]> | undefined = this.payloads[event]
    return list ?? []
  }

  /** Most recent payload of an event, if it was emitted. */
  last<K extends keyof SDKEvents>(event: K): SDKEvents[K] | undefined {
    const list = this.recorded(event)
    return list[list.length - 1]
  }

  count(event: keyof SDKEvents): number {
    return this.recorded(event).length
  }

  clear(): void {
    this.payloads = {}
  }
}

/** Address object as @xmpp/client hands it to `online` handlers. */
export const createMockJid = (full: string): JID => {
  const [bare, resource = ''] = full.split('/')
  const [local, domain] = bare.includes('@') ? bare.split('@') : ['', bare]
  const jid: JID = {
    local,
    domain,
    resource,
    bare: () => createMockJid(bare),
    toString: () => full,
  }
  return jid
}

type ClientEventHandler =
  | ((address: JID) => void)
  | (() => void)
  | ((err: Error) => void)
  | ((stanza: Element) => void)
  | ((status: string) => void)

/**
 * Stand-in for the @xmpp/client instance. Tests drive the connection with
 * {@link MockXmppClient.goOnline}, {@link MockXmppClient.deliver} and
 * {@link MockXmppClient.dropConnection}.
 */
export class MockXmppClient implements Client {
  private readonly events = new EventEmitter()

  readonly start = vi.fn<Client['start']>().mockResolvedValue(undefined)
  readonly stop = vi.fn<Client['stop']>().mockResolvedValue(undefined)
  readonly send = vi.fn<Client['send']>().mockResolvedValue(undefined)
  readonly iqCaller = {
    request: vi.fn<IQCaller['request']>().mockResolvedValue(createMockElement('iq', { type: 'result' })),
  }

  on(event: 'online', handler: (address: JID) => void): void
  on(event: 'offline', handler: () => void): void
  on(event: 'error', handler: (err: Error) => void): void
  on(event: 'stanza', handler: (stanza: Element) => void): void
  on(event: 'status', handler: (status: string) => void): void
  on(event: string, handler: ClientEventHandler): void {
    this.events.on(event, handler)
  }

  goOnline(jid: string): void {
    this.events.emit('online', createMockJid(jid))
  }

  deliver(stanza: Element): void {
    this.events.emit('stanza', stanza)
  }

  dropConnection(): void {
    this.events.emit('offline')
  }

  fail(err: Error): void {
    this.events.emit('error', err)
  }
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (err: unknown) => void
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {}
  let reject: (err: unknown) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

/**
 * Drain pending microtasks. Works under fake timers, unlike a `setTimeout`-based flush.
 */
export async function flushPromises(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve()
  }
}

interface PendingDiscovery {
  service: string
  node: string
  deferred: Deferred<DiscoItem[]>
}

export type MockTransport = {
  discoverItems: Mock<DirectoryTransport['discoverItems']>
  subscribe: Mock<DirectoryTransport['subscribe']>
  getSubscriberJid: Mock<DirectoryTransport['getSubscriberJid']>
  sendMessage: Mock<DirectoryTransport['sendMessage']>
  sendSubagentWork: Mock<DirectoryTransport['sendSubagentWork']>
  sendAttachment: Mock<DirectoryTransport['sendAttachment']>
  /** Discovery calls not answered yet, oldest first */
  pending: PendingDiscovery[]
  /** Answer the oldest open discovery of `node`. */
  resolveDiscovery: (node: string, items: DiscoItem[]) => void
  rejectDiscovery: (node: string, err: unknown) => void
  /** Number of discovery calls issued for `node` */
  discoveryCount: (node: string) => number
}

/**
 * Scripted transport for the directory engine: discovery calls stay open
 * until the test answers them, in any order; subscribes and sends resolve.
 */
export const createMockTransport = (subscriberJid: string | null = 'me@example.com/web'): MockTransport => {
  const pending: PendingDiscovery[] = []

  const take = (node: string): PendingDiscovery => {
    const index = pending.findIndex((entry) => entry.node === node)
    if (index < 0) throw new Error(`No open discovery for ${node}`)
    return pending.splice(index, 1)[0]
  }

  const discoverItems = vi.fn<DirectoryTransport['discoverItems']>((service, node) => {
    const deferred = createDeferred<DiscoItem[]>()
    pending.push({ service, node, deferred })
    return deferred.promise
  })

  return {
    discoverItems,
    subscribe: vi.fn<DirectoryTransport['subscribe']>().mockResolvedValue(undefined),
    getSubscriberJid: vi.fn<DirectoryTransport['getSubscriberJid']>().mockReturnValue(subscriberJid),
    sendMessage: vi.fn<DirectoryTransport['sendMessage']>().mockResolvedValue(undefined),
    sendSubagentWork: vi.fn<DirectoryTransport['sendSubagentWork']>().mockResolvedValue(undefined),
    sendAttachment: vi.fn<DirectoryTransport['sendAttachment']>().mockResolvedValue(undefined),
    pending,
    resolveDiscovery: (node, items) => take(node).deferred.resolve(items),
    rejectDiscovery: (node, err) => take(node).deferred.reject(err),
    discoveryCount: (node) => discoverItems.mock.calls.filter(([, calledNode]) => calledNode === node).length,
  }
}

export type MockArchive = {
  ensureHistoryLoaded: Mock<ArchiveWork['ensureHistoryLoaded']>
  ensureRecencyProbed: Mock<ArchiveWork['ensureRecencyProbed']>
  isHistoryWarmup: boolean
}

export const createMockArchive = (): MockArchive => ({
  ensureHistoryLoaded: vi.fn<ArchiveWork['ensureHistoryLoaded']>(),
  ensureRecencyProbed: vi.fn<ArchiveWork['ensureRecencyProbed']>(),
  isHistoryWarmup: false,
})

/** A disco item as a directory would list it. */
export const discoItem = (jid: string, name?: string, node?: string): DiscoItem => ({
  jid,
  ...(name === undefined ? {} : { name }),
  ...(node === undefined ? {} : { node }),
})
