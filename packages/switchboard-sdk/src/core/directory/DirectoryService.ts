import type { Element } from '@xmpp/client'
import { createActor } from 'xstate'
import type { ActivityStore } from '../../stores/activityStore'
import { dispatchersWithComposingSessions, unreadCountForDispatcher } from '../../stores/directorySelectors'
import { describeError } from '../../utils/xmppError'
import { generateUUID } from '../../utils/uuid'
import { clamp, CONFIG_LIMITS } from '../config'
import { getBareJid } from '../jid'
import { logError, logInfo, logWarn } from '../logger'
import {
  createDirectoryEntry,
  type ChatTarget,
  type DirectoryEntry,
  type DirectorySnapshot,
  type DiscoItem,
  type EmitSDK,
  type NavigationSelection,
  type OutgoingAttachment,
  type SubagentWork,
  type SubscribeSDK,
} from '../types'
import { resolveDispatcherToken } from './dispatcherLookup'
import { newSessionMachine, type NewSessionActor } from './newSessionMachine'
import {
  DIRECTORY_NODES,
  dispatcherOfSessionsNode,
  entryFromDiscoItem,
  isLegacyIndividualsNode,
  uniqueEntries,
} from './nodes'
import { ResortScheduler } from './ResortScheduler'
import { parseSessionsPayload } from './sessionsPayload'
import { sameOrder, sortByRecency, sortDispatchersByRecency, type ActivityLookup } from './sorting'
import { SubscriptionManager } from './SubscriptionManager'

/**
 * What the directory engine needs from the XMPP layer.
 */
export interface DirectoryTransport {
  discoverItems(service: string, node: string): Promise<DiscoItem[]>
  subscribe(service: string, node: string, subscriber: string): Promise<void>
  /** Full bound JID that notifications are delivered to, null while offline */
  getSubscriberJid(): string | null
  sendMessage(to: string, body: string): Promise<void>
  sendSubagentWork(to: string, work: SubagentWork): Promise<void>
  sendAttachment(to: string, attachment: OutgoingAttachment): Promise<void>
}

/**
 * Archive work the engine requests for conversations it shows.
 */
export interface ArchiveWork {
  ensureHistoryLoaded(conversationId: string): void
  ensureRecencyProbed(conversationId: string): void
  readonly isHistoryWarmup: boolean
}

export interface DirectoryServiceOptions {
  /** Full JID of the directory client; disco queries go here */
  directoryJid: string
  /** Notification service; defaults to the bare directory JID */
  pubSubJid?: string | null
  /** Direct dispatchers added when discovery does not list them */
  convenienceDispatchers?: DirectoryEntry[]
  /** Newly appeared sessions that get a history prefetch */
  prefetchHistoryThreads?: number
  /** Newly appeared sessions that get a recency probe */
  recencyProbeThreads?: number
}

export interface DirectoryServiceDependencies extends DirectoryServiceOptions {
  transport: DirectoryTransport
  archive: ArchiveWork
  activity: ActivityStore
  emitSDK: EmitSDK
  subscribe: SubscribeSDK
}

/**
 * Directory cache and reconciler.
 *
 * Keeps the dispatcher list, a per-dispatcher session cache and the
 * current selection consistent with the directory service, which is
 * reached through discovery queries and pubsub notifications. Results are
 * applied only while still relevant: every session query carries a
 * per-dispatcher token, and a result whose token was superseded, or whose
 * dispatcher is no longer selected, is dropped.
 *
 * State changes are published as `directory:*` SDK events. No method
 * throws; transport failures are logged and leave the lists as they were.
 *
 * @example
 * ```typescript
 * const directory = client.directory
 * directory?.refreshAll()
 * client.subscribe('directory:sessions', ({ sessions }) => render(sessions))
 * directory?.sendChat('start a new session for the login bug')
 * ```
 *
 * @category Directory
 */
export class DirectoryService {
  private dispatchers: DirectoryEntry[] = []
  private individuals: DirectoryEntry[] = []
  private selectedDispatcher: DirectoryEntry | null = null
  private selectedSessionId: string | null = null
  private chatTarget: ChatTarget | null = null
  private isLoadingIndividuals = false
  private individualsLoadedOnce = false
  private awaitingSessionFor: string | null = null
  private dispatchersLoaded = false
  private dispatchersToken = 0
  private dispatchersQuery: Promise<void> | null = null
  private disposed = false

  private readonly sessionsByDispatcher = new Map<string, DirectoryEntry[]>()
  private readonly dispatcherToSessions = new Map<string, Set<string>>()
  /** Session id → the one dispatcher whose cache holds it */
  private readonly sessionOwners = new Map<string, string>()
  /** Session ids whose archive work was already requested, per dispatcher */
  private readonly knownSessionIds = new Map<string, Set<string>>()
  private readonly rememberedSessions = new Map<string, string>()
  private readonly refreshTokens = new Map<string, number>()

  private readonly subscriptions: SubscriptionManager
  private readonly resort: ResortScheduler
  private readonly awaiter: NewSessionActor
  private readonly lastActivity: ActivityLookup
  private readonly cleanups: Array<() => void> = []
  private readonly prefetchHistoryThreads: number
  private readonly recencyProbeThreads: number

  constructor(private readonly deps: DirectoryServiceDependencies) {
    const { prefetchHistoryThreads: prefetch, recencyProbeThreads: probe } = CONFIG_LIMITS
    this.prefetchHistoryThreads = clamp(deps.prefetchHistoryThreads ?? prefetch.fallback, prefetch.min, prefetch.max)
    this.recencyProbeThreads = clamp(deps.recencyProbeThreads ?? probe.fallback, probe.min, probe.max)

    const pubSubService = deps.pubSubJid || getBareJid(deps.directoryJid)
    this.subscriptions = new SubscriptionManager(async (topic) => {
      const subscriber = deps.transport.getSubscriberJid()
      if (!subscriber) throw new Error('Not connected')
      await deps.transport.subscribe(pubSubService, topic, subscriber)
    })

    this.lastActivity = (threadId) => deps.activity.getState().getLastActivity(threadId)
    this.resort = new ResortScheduler({
      resort: () => this.resortLists(),
      isBlocked: () => this.isLoadingIndividuals || deps.archive.isHistoryWarmup,
    })

    this.awaiter = createActor(newSessionMachine)
    const refreshSub = this.awaiter.on('refresh', ({ dispatcherId }) => this.handleAwaiterRefresh(dispatcherId))
    const foundSub = this.awaiter.on('sessionFound', ({ dispatcherId, sessionId }) =>
      this.handleSessionFound(dispatcherId, sessionId)
    )
    const stateSub = this.awaiter.subscribe((snapshot) => {
      const awaiting = snapshot.matches('awaiting') ? snapshot.context.dispatcherId : null
      if (awaiting === this.awaitingSessionFor) return
      this.awaitingSessionFor = awaiting
      deps.emitSDK('directory:awaiting-session', { dispatcherId: awaiting })
    })
    this.awaiter.start()

    this.cleanups.push(
      () => refreshSub.unsubscribe(),
      () => foundSub.unsubscribe(),
      () => stateSub.unsubscribe(),
      deps.subscribe('pubsub:items', ({ node, payload }) => this.handleTopicUpdate(node, payload)),
      deps.subscribe('archive:warmup', ({ active }) => {
        if (!active) this.resort.schedule()
      }),
      deps.activity.subscribe(
        (state) => state.lastActivityByThread,
        (next, previous) => this.handleActivityChange(next, previous)
      )
    )
  }

  // ============================================================================
  // Read access
  // ============================================================================

  get selectedDispatcherId(): string | null {
    return this.selectedDispatcher?.id ?? null
  }

  getSnapshot(): DirectorySnapshot {
    return {
      dispatchers: this.dispatchers,
      individuals: this.individuals,
      selectedDispatcherId: this.selectedDispatcherId,
      selectedSessionId: this.selectedSessionId,
      chatTarget: this.chatTarget,
      isLoadingIndividuals: this.isLoadingIndividuals,
      individualsLoadedOnce: this.individualsLoadedOnce,
      awaitingSessionFor: this.awaitingSessionFor,
    }
  }

  /** Cached sessions of a dispatcher, in the order they were last applied. */
  getCachedSessions(dispatcherId: string): DirectoryEntry[] {
    return this.sessionsByDispatcher.get(dispatcherId) ?? []
  }

  /** Session last selected under a dispatcher, if still listed. */
  getRememberedSession(dispatcherId: string): string | null {
    return this.rememberedSessions.get(dispatcherId) ?? null
  }

  /** Unread messages in a dispatcher thread and all of its known sessions. */
  unreadCountForDispatcher(dispatcherId: string): number {
    return unreadCountForDispatcher(dispatcherId, this.dispatcherToSessions, this.deps.activity.getState().unreadByThread)
  }

  /** Dispatchers owning at least one session that is composing. */
  dispatchersWithComposingSessions(): Set<string> {
    return dispatchersWithComposingSessions(this.dispatcherToSessions, this.deps.activity.getState().composing)
  }

  // ============================================================================
  // Loading
  // ============================================================================

  /**
   * Load dispatchers if they were never loaded, and re-query the sessions of
   * the selected dispatcher. While a dispatcher query is in flight, another
   * call does not start a second one.
   */
  refreshAll(): void {
    if (this.disposed) return
    if (!this.dispatchersLoaded && !this.dispatchersQuery) this.queryDispatchers()

    const selected = this.selectedDispatcher
    if (selected) {
      if (!selected.isDirect) void this.refreshSessions(selected.id)
    } else {
      this.publishIndividuals([])
      this.setLoading(false, false)
    }
  }

  private queryDispatchers(): void {
    const query = this.refreshDispatchers().finally(() => {
      if (this.dispatchersQuery === query) this.dispatchersQuery = null
    })
    this.dispatchersQuery = query
  }

  private async refreshDispatchers(): Promise<void> {
    const node = DIRECTORY_NODES.dispatchers
    this.subscriptions.ensureSubscribed(node)
    const token = ++this.dispatchersToken

    let items: DiscoItem[]
    try {
      items = await this.deps.transport.discoverItems(this.deps.directoryJid, node)
    } catch (err) {
      logWarn(`Dispatcher discovery failed: ${describeError(err)}`)
      return
    }
    if (this.disposed || token !== this.dispatchersToken) return

    const discovered = uniqueEntries(items.map(entryFromDiscoItem))
    const discoveredIds = new Set(discovered.map((entry) => entry.id))
    const extras = (this.deps.convenienceDispatchers ?? []).filter((entry) => !discoveredIds.has(entry.id))

    this.dispatchersLoaded = true
    this.publishDispatchers(this.sortDispatchers([...discovered, ...extras]))
    logInfo(`Loaded ${this.dispatchers.length} dispatcher(s)`)

    if (!this.selectedDispatcher && this.dispatchers.length > 0) {
      this.selectDispatcher(this.dispatchers[0])
    }
  }

  private async refreshSessions(dispatcherId: string): Promise<void> {
    const token = this.nextToken(dispatcherId)
    if (this.selectedDispatcherId === dispatcherId && this.individuals.length === 0) {
      this.setLoading(true, this.individualsLoadedOnce)
    }

    const node = DIRECTORY_NODES.sessions(dispatcherId)
    this.subscriptions.ensureSubscribed(node)

    let items: DiscoItem[]
    try {
      items = await this.deps.transport.discoverItems(this.deps.directoryJid, node)
    } catch (err) {
      logWarn(`Session discovery for ${dispatcherId} failed: ${describeError(err)}`)
      if (!this.disposed && this.isCurrentQuery(dispatcherId, token)) {
        this.setLoading(false, this.individualsLoadedOnce)
      }
      return
    }
    if (this.disposed || !this.isCurrentQuery(dispatcherId, token)) return

    this.applySessionsList(uniqueEntries(items.map(entryFromDiscoItem)), dispatcherId)
  }

  private nextToken(dispatcherId: string): number {
    const token = (this.refreshTokens.get(dispatcherId) ?? 0) + 1
    this.refreshTokens.set(dispatcherId, token)
    return token
  }

  private isCurrentQuery(dispatcherId: string, token: number): boolean {
    return this.refreshTokens.get(dispatcherId) === token && this.selectedDispatcherId === dispatcherId
  }

  /**
   * Replace a dispatcher's session list, from a query result or a push.
   */
  private applySessionsList(items: DirectoryEntry[], dispatcherId: string): void {
    const sorted = sortByRecency(items, this.lastActivity)
    const visibleIds = new Set(sorted.map((entry) => entry.id))

    for (const id of this.dispatcherToSessions.get(dispatcherId) ?? []) {
      if (!visibleIds.has(id) && this.sessionOwners.get(id) === dispatcherId) this.sessionOwners.delete(id)
    }
    for (const id of visibleIds) this.claimSession(id, dispatcherId)

    this.sessionsByDispatcher.set(dispatcherId, sorted)
    this.setSessionIndex(dispatcherId, visibleIds)

    const remembered = this.rememberedSessions.get(dispatcherId)
    if (remembered && !visibleIds.has(remembered)) this.rememberedSessions.delete(dispatcherId)

    if (this.selectedDispatcherId !== dispatcherId) return

    this.publishIndividuals(sorted)
    this.resort.suppressFor()
    this.requestArchiveWork(dispatcherId, sorted)
    this.setLoading(false, true)
    logInfo(`Applied ${sorted.length} session(s) for ${dispatcherId}`)
    this.awaiter.send({ type: 'SESSIONS_UPDATED', dispatcherId, sessionIds: sorted.map((entry) => entry.id) })
  }

  /** Record `dispatcherId` as the only owner of a session. */
  private claimSession(sessionId: string, dispatcherId: string): void {
    const previousOwner = this.sessionOwners.get(sessionId)
    this.sessionOwners.set(sessionId, dispatcherId)
    if (previousOwner === undefined || previousOwner === dispatcherId) return

    const cached = this.sessionsByDispatcher.get(previousOwner)
    if (cached) this.sessionsByDispatcher.set(previousOwner, cached.filter((entry) => entry.id !== sessionId))

    const index = new Set(this.dispatcherToSessions.get(previousOwner))
    index.delete(sessionId)
    this.setSessionIndex(previousOwner, index)

    this.knownSessionIds.get(previousOwner)?.delete(sessionId)
    if (this.rememberedSessions.get(previousOwner) === sessionId) this.rememberedSessions.delete(previousOwner)
    if (this.selectedDispatcherId === previousOwner) {
      this.publishIndividuals(this.individuals.filter((entry) => entry.id !== sessionId))
    }
  }

  /** Probe and prefetch only sessions not seen before for this dispatcher. */
  private requestArchiveWork(dispatcherId: string, sorted: DirectoryEntry[]): void {
    const known = this.knownSessionIds.get(dispatcherId) ?? new Set<string>()
    const appeared = sorted.filter((entry) => !known.has(entry.id))
    this.knownSessionIds.set(dispatcherId, new Set([...known, ...appeared.map((entry) => entry.id)]))

    const { archive } = this.deps
    for (const entry of appeared.filter((e) => !e.isClosed).slice(0, this.recencyProbeThreads)) {
      archive.ensureRecencyProbed(entry.id)
    }
    for (const entry of appeared.slice(0, this.prefetchHistoryThreads)) {
      archive.ensureHistoryLoaded(entry.id)
    }
  }

  // ============================================================================
  // Selection
  // ============================================================================

  /**
   * Select a dispatcher. Selecting the already-selected dispatcher only
   * focuses it as chat target; otherwise the cached sessions are shown at
   * once and re-queried in the background.
   */
  selectDispatcher(entry: DirectoryEntry): void {
    if (this.disposed) return
    this.awaiter.send({ type: 'CANCEL' })
    this.rememberedSessions.delete(entry.id)

    if (this.selectedDispatcherId === entry.id) {
      this.setSelection(this.selectedDispatcher, null, { kind: 'dispatcher', address: entry.id })
      this.deps.archive.ensureHistoryLoaded(entry.id)
      return
    }

    this.selectedDispatcher = entry
    this.selectedSessionId = null
    this.chatTarget = { kind: 'dispatcher', address: entry.id }

    const cached = this.sessionsByDispatcher.get(entry.id)
    if (entry.isDirect) {
      this.publishIndividuals([])
      this.setLoading(false, true)
    } else if (cached && cached.length > 0) {
      const sorted = sortByRecency(cached, this.lastActivity)
      this.publishIndividuals(sorted)
      this.setSessionIndex(entry.id, new Set(sorted.map((e) => e.id)))
      this.setLoading(false, true)
    } else {
      this.publishIndividuals([])
      this.setLoading(true, false)
    }

    this.resort.suppressFor()
    this.emitSelection()
    this.deps.archive.ensureHistoryLoaded(entry.id)
    if (!entry.isDirect) void this.refreshSessions(entry.id)
  }

  /** Select a session of the current dispatcher as chat target. */
  selectIndividual(entry: DirectoryEntry): void {
    if (this.disposed || !this.selectedDispatcher) return
    this.awaiter.send({ type: 'CANCEL' })
    this.rememberedSessions.set(this.selectedDispatcher.id, entry.id)
    this.setSelection(this.selectedDispatcher, entry.id, { kind: 'individual', address: entry.id })
    this.deps.archive.ensureHistoryLoaded(entry.id)
  }

  /**
   * Apply a navigation selection. Groups are filters and leave the chat
   * target alone; a subagent becomes the target under the current session.
   */
  navigate(selection: NavigationSelection): void {
    switch (selection.kind) {
      case 'dispatcher':
        this.selectDispatcher(this.dispatchers.find((d) => d.id === selection.id) ?? createDirectoryEntry(selection.id))
        return
      case 'individual':
        this.selectIndividual(this.findSession(selection.id) ?? createDirectoryEntry(selection.id))
        return
      case 'subagent':
        if (this.disposed || !this.selectedDispatcher) return
        this.awaiter.send({ type: 'CANCEL' })
        this.setSelection(this.selectedDispatcher, this.selectedSessionId, { kind: 'subagent', address: selection.id })
        this.deps.archive.ensureHistoryLoaded(selection.id)
        return
      case 'group':
        return
    }
  }

  /** Select the session after the current one in display order. */
  selectNextSession(): boolean {
    return this.stepSession(1)
  }

  /** Select the session before the current one in display order. */
  selectPreviousSession(): boolean {
    return this.stepSession(-1)
  }

  private stepSession(step: 1 | -1): boolean {
    const list = this.individuals
    if (!this.selectedDispatcher || list.length === 0) return false

    const current = this.selectedSessionId === null ? -1 : list.findIndex((e) => e.id === this.selectedSessionId)
    const next = current === -1 ? (step === 1 ? 0 : list.length - 1) : current + step
    if (next < 0 || next >= list.length) return false

    this.selectIndividual(list[next])
    return true
  }

  /**
   * Select the dispatcher a hotkey token resolves to.
   * @returns the selected dispatcher id, or null when nothing matched
   */
  selectDispatcherByToken(token: string): string | null {
    const match = resolveDispatcherToken(token, this.dispatchers)
    if (!match) return null
    this.selectDispatcher(match)
    return match.id
  }

  /**
   * Jump to the session that has waited longest for a reply: among known
   * sessions with unread messages, the one whose oldest unread message is
   * oldest. Without unread sessions, the most recently active one.
   *
   * @returns false when no session qualifies
   */
  focusOldestWaitingSession(): boolean {
    const { unreadByThread } = this.deps.activity.getState()
    const dispatcherIds = new Set(this.dispatchers.map((d) => d.id))

    let best: { entry: DirectoryEntry; dispatcherId: string; time: number } | null = null
    for (const [threadId, count] of unreadByThread) {
      if (count <= 0 || dispatcherIds.has(threadId)) continue
      const located = this.locateSession(threadId)
      if (!located) continue
      const time = this.oldestUnreadTime(threadId, count)
      if (time === null) continue
      if (!best || time < best.time || (time === best.time && threadId < best.entry.id)) {
        best = { ...located, time }
      }
    }

    if (!best) {
      for (const [dispatcherId, sessions] of this.sessionsByDispatcher) {
        for (const entry of sessions) {
          const time = this.lastActivity(entry.id)?.getTime()
          if (time === undefined) continue
          if (!best || time > best.time || (time === best.time && entry.id < best.entry.id)) {
            best = { entry, dispatcherId, time }
          }
        }
      }
    }

    if (!best) return false
    if (this.selectedDispatcherId !== best.dispatcherId) {
      const dispatcherId = best.dispatcherId
      this.selectDispatcher(this.dispatchers.find((d) => d.id === dispatcherId) ?? createDirectoryEntry(dispatcherId))
    }
    this.selectIndividual(best.entry)
    return true
  }

  private oldestUnreadTime(threadId: string, unread: number): number | null {
    const inbound = this.deps.activity
      .getState()
      .getMessages(threadId)
      .filter((m) => m.direction === 'incoming')
    if (inbound.length === 0) return this.lastActivity(threadId)?.getTime() ?? null
    return inbound[Math.max(0, inbound.length - unread)].timestamp.getTime()
  }

  private locateSession(sessionId: string): { entry: DirectoryEntry; dispatcherId: string } | null {
    const dispatcherId = this.sessionOwners.get(sessionId)
    if (dispatcherId === undefined) return null
    const entry = this.sessionsByDispatcher.get(dispatcherId)?.find((e) => e.id === sessionId)
    return entry ? { entry, dispatcherId } : null
  }

  private findSession(sessionId: string): DirectoryEntry | undefined {
    return this.individuals.find((e) => e.id === sessionId) ?? this.locateSession(sessionId)?.entry
  }

  // ============================================================================
  // Sending
  // ============================================================================

  /** Send a message to the current chat target. */
  sendChat(body: string): void {
    const target = this.chatTarget
    if (this.disposed || !target || !body.trim()) return

    const delivery =
      target.kind === 'subagent'
        ? this.deps.transport.sendSubagentWork(target.address, {
            taskId: generateUUID(),
            parentJid: this.subagentParent(),
            body,
          })
        : this.deps.transport.sendMessage(target.address, body)
    void delivery.catch((err: unknown) => {
      logError(`Send to ${target.address} failed: ${describeError(err)}`)
    })

    this.awaitNewSessionAfterSend(target)
  }

  /** Upload a file and share it with the current chat target. Subagents take no attachments. */
  sendAttachment(attachment: OutgoingAttachment): void {
    const target = this.chatTarget
    if (this.disposed || !target || target.kind === 'subagent') return

    void this.deps.transport.sendAttachment(target.address, attachment).catch((err: unknown) => {
      logError(`Attachment to ${target.address} failed: ${describeError(err)}`)
    })

    this.awaitNewSessionAfterSend(target)
  }

  /**
   * Ask the selected dispatcher to pick a closed session back up, then wait
   * for the session it opens.
   */
  resumeSession(entry: DirectoryEntry): boolean {
    const dispatcher = this.selectedDispatcher
    if (this.disposed || !dispatcher || !entry.isClosed) return false
    const owner = this.sessionOwners.get(entry.id)
    if (owner !== undefined && owner !== dispatcher.id) return false

    this.selectDispatcher(dispatcher)
    void this.deps.transport.sendMessage(dispatcher.id, `/resume ${entry.id}`).catch((err: unknown) => {
      logError(`Resume request to ${dispatcher.id} failed: ${describeError(err)}`)
    })
    this.beginAwaitingSession(dispatcher.id)
    return true
  }

  private subagentParent(): string {
    const remembered = this.selectedDispatcherId ? this.rememberedSessions.get(this.selectedDispatcherId) : undefined
    return remembered ?? getBareJid(this.deps.transport.getSubscriberJid() ?? '')
  }

  private awaitNewSessionAfterSend(target: ChatTarget): void {
    const dispatcher = this.selectedDispatcher
    if (target.kind !== 'dispatcher' || !dispatcher || dispatcher.id !== target.address || dispatcher.isDirect) return
    this.beginAwaitingSession(dispatcher.id)
  }

  private beginAwaitingSession(dispatcherId: string): void {
    this.awaiter.send({
      type: 'AWAIT',
      dispatcherId,
      knownSessionIds: this.individuals.map((entry) => entry.id),
    })
  }

  private handleAwaiterRefresh(dispatcherId: string | null): void {
    if (!dispatcherId) return
    if (this.selectedDispatcherId !== dispatcherId) {
      this.awaiter.send({ type: 'CANCEL' })
      return
    }
    void this.refreshSessions(dispatcherId)
  }

  private handleSessionFound(dispatcherId: string | null, sessionId: string | null): void {
    if (!sessionId || dispatcherId !== this.selectedDispatcherId) return
    if (this.chatTarget?.kind !== 'dispatcher') return
    const entry = this.individuals.find((e) => e.id === sessionId)
    if (entry) this.selectIndividual(entry)
  }

  // ============================================================================
  // Notifications and ordering
  // ============================================================================

  private handleTopicUpdate(node: string, payload: Element | undefined): void {
    if (this.disposed || !this.subscriptions.isSubscribed(node)) return

    if (isLegacyIndividualsNode(node)) {
      const selected = this.selectedDispatcher
      if (selected && !selected.isDirect) void this.refreshSessions(selected.id)
      return
    }

    const dispatcherId = dispatcherOfSessionsNode(node)
    if (dispatcherId) {
      const entries = parseSessionsPayload(payload)
      if (entries) {
        // Supersedes any query still in flight
        this.nextToken(dispatcherId)
        this.applySessionsList(entries, dispatcherId)
        return
      }
      if (payload) logWarn(`Malformed sessions payload on ${node}, re-querying`)
      if (this.selectedDispatcherId === dispatcherId) void this.refreshSessions(dispatcherId)
      return
    }

    if (node === DIRECTORY_NODES.dispatchers) {
      this.dispatchersLoaded = false
      // A push always re-queries; the token drops the older reply
      this.queryDispatchers()
    }
  }

  private handleActivityChange(next: Map<string, Date>, previous: Map<string, Date>): void {
    const changed = (id: string) => next.get(id) !== previous.get(id)
    const affectsSessions = this.individuals.some((entry) => changed(entry.id))
    const affectsDispatchers = this.dispatchers.some(
      (entry) => changed(entry.id) || [...(this.dispatcherToSessions.get(entry.id) ?? [])].some(changed)
    )
    if (affectsSessions || affectsDispatchers) this.resort.schedule()
  }

  private resortLists(): void {
    if (this.disposed) return
    const individuals = sortByRecency(this.individuals, this.lastActivity)
    if (!sameOrder(individuals, this.individuals)) this.publishIndividuals(individuals)

    const dispatchers = this.sortDispatchers(this.dispatchers)
    if (!sameOrder(dispatchers, this.dispatchers)) this.publishDispatchers(dispatchers)
  }

  private sortDispatchers(entries: DirectoryEntry[]): DirectoryEntry[] {
    return sortDispatchersByRecency(entries, (id) => this.dispatcherToSessions.get(id) ?? [], this.lastActivity)
  }

  // ============================================================================
  // Publishing
  // ============================================================================

  private publishDispatchers(dispatchers: DirectoryEntry[]): void {
    this.dispatchers = dispatchers
    this.deps.emitSDK('directory:dispatchers', { dispatchers })
  }

  private publishIndividuals(sessions: DirectoryEntry[]): void {
    this.individuals = sessions
    this.deps.emitSDK('directory:sessions', { dispatcherId: this.selectedDispatcherId, sessions })
  }

  private setSessionIndex(dispatcherId: string, sessionIds: Set<string>): void {
    this.dispatcherToSessions.set(dispatcherId, sessionIds)
    this.deps.emitSDK('directory:session-index', { dispatcherId, sessionIds: [...sessionIds] })
  }

  private setLoading(isLoading: boolean, loadedOnce: boolean): void {
    if (this.isLoadingIndividuals === isLoading && this.individualsLoadedOnce === loadedOnce) return
    this.isLoadingIndividuals = isLoading
    this.individualsLoadedOnce = loadedOnce
    this.deps.emitSDK('directory:loading', { isLoading, loadedOnce })
  }

  private setSelection(dispatcher: DirectoryEntry | null, sessionId: string | null, chatTarget: ChatTarget | null): void {
    this.selectedDispatcher = dispatcher
    this.selectedSessionId = sessionId
    this.chatTarget = chatTarget
    this.emitSelection()
  }

  private emitSelection(): void {
    this.deps.emitSDK('directory:selection', {
      dispatcherId: this.selectedDispatcherId,
      sessionId: this.selectedSessionId,
      chatTarget: this.chatTarget,
    })
  }

  /** Stop timers, the awaiter and every subscription. */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    for (const cleanup of this.cleanups) cleanup()
    this.cleanups.length = 0
    this.awaiter.stop()
    this.resort.dispose()
  }
}
