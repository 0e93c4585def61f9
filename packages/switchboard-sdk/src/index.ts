/**
 * # Switchboard SDK
 *
 * Client-side sync engine for dispatcher/session chat over XMPP: a cached
 * directory of dispatchers and their sessions kept current by discovery
 * and push notifications, throttled archive backfill, recency ordering,
 * and automatic selection of newly opened sessions.
 *
 * ## Bundle Structure
 *
 * - **`@switchboard/sdk`** - Everything below (this bundle)
 * - **`@switchboard/sdk/react`** - Provider and hooks
 * - **`@switchboard/sdk/stores`** - Direct Zustand store access
 *
 * ## Quick Start (headless)
 *
 * ```ts
 * import { loadConfig, createClientFromConfig, connectOptionsFromConfig } from '@switchboard/sdk'
 *
 * const config = loadConfig()
 * const client = createClientFromConfig(config)
 * client.subscribe('directory:sessions', ({ dispatcherId, sessions }) => {
 *   console.log(dispatcherId, sessions.map((s) => s.displayName))
 * })
 * await client.connect(connectOptionsFromConfig(config))
 * ```
 *
 * ## Quick Start (React)
 *
 * ```tsx
 * import { XMPPProvider, useDirectory } from '@switchboard/sdk/react'
 *
 * <XMPPProvider client={client}>
 *   <Columns />
 * </XMPPProvider>
 * ```
 *
 * @packageDocumentation
 * @module SDK
 */

// Client
export { XMPPClient, createClientFromConfig, connectOptionsFromConfig } from './core/XMPPClient'
export type { XMPPClientConfig, ClientStores } from './core/XMPPClient'
export type { ConnectOptions } from './core/modules/Connection'

// Configuration
export {
  loadConfig,
  ConfigError,
  CONFIG_LIMITS,
  DIRECTORY_RESOURCE,
  parseConvenienceDispatchers,
  resolveServiceUrl,
  inferPubSubJid,
} from './core/config'
export type { AppConfig, LoadConfigOptions } from './core/config'

// Directory engine
export { DirectoryService } from './core/directory/DirectoryService'
export type {
  DirectoryTransport,
  ArchiveWork,
  DirectoryServiceOptions,
  DirectoryServiceDependencies,
} from './core/directory/DirectoryService'
export { DIRECTORY_NODES, parseNodeTag, entryFromDiscoItem } from './core/directory/nodes'
export { parseSessionsPayload } from './core/directory/sessionsPayload'
export { sortByRecency, sortDispatchersByRecency, compareNames } from './core/directory/sorting'
export { resolveDispatcherToken } from './core/directory/dispatcherLookup'
export { RESORT_DEBOUNCE_MS, RESORT_SUPPRESS_MS } from './core/directory/ResortScheduler'
export { NEW_SESSION_POLL_INTERVAL_MS, NEW_SESSION_MAX_POLLS } from './core/directory/newSessionMachine'

// Archive
export { ArchiveScheduler, ARCHIVE_ROUTE_GRACE_MS, DEFAULT_ARCHIVE_LIMITS } from './core/archive/ArchiveScheduler'
export type { ArchiveLimits, ArchiveQueryKind } from './core/archive/ArchiveScheduler'

// Agent message metadata
export { parseMessageMeta, buildMetaElement, buildQuestionReplyMeta, buildAttachmentMeta } from './core/messageMeta'
export type { MetaElementOptions } from './core/messageMeta'

// Bindings and stores
export { createStoreBindings } from './bindings/storeBindings'
export type { StoreRefs, SDKEventSource } from './bindings/storeBindings'
export * from './stores'

// React
export * from './hooks'

// Types and helpers
export * from './core/types'
export { getBareJid, getDomain, getLocalPart } from './core/jid'
export { parseXMPPError, formatXMPPError, describeError } from './utils/xmppError'
export type { XMPPStanzaError, XMPPErrorType } from './utils/xmppError'

// Re-export xml builder from @xmpp/client for raw stanza construction
export { xml } from '@xmpp/client'
export type { Element } from '@xmpp/client'
