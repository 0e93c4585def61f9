import type { ActivityStore } from '../../stores/activityStore'
import type { ArchivedMessage, EmitSDK, SubscribeSDK } from '../types'
import { clamp, CONFIG_LIMITS } from '../config'
import { getBareJid } from '../jid'
import { generateId } from '../../utils/uuid'
import { FetchQueue } from './FetchQueue'

/** How long results of a query are still routed after its last activity (ms) */
export const ARCHIVE_ROUTE_GRACE_MS = 30_000

export interface ArchiveLimits {
  /** Messages fetched by a history load */
  historyLastItems: number
  /** Messages fetched by a recency probe */
  recencyLastItems: number
}

export const DEFAULT_ARCHIVE_LIMITS: ArchiveLimits = {
  historyLastItems: CONFIG_LIMITS.mamLastItems.fallback,
  recencyLastItems: CONFIG_LIMITS.mamRecencyLastItems.fallback,
}

export interface ArchiveQueryOptions {
  with: string
  max: number
  queryId: string
}

export interface ArchiveSchedulerDependencies {
  /** Runs one archive query; results arrive as `archive:result` events */
  queryArchive: (options: ArchiveQueryOptions) => Promise<unknown>
  subscribe: SubscribeSDK
  emitSDK: EmitSDK
  activity: ActivityStore
  /** Own address, used to tell outgoing archived messages apart */
  getOwnJid: () => string | null
  /** Clamped to the ranges in `CONFIG_LIMITS` */
  limits?: Partial<ArchiveLimits>
  routeGraceMs?: number
}

export type ArchiveQueryKind = 'history' | 'recency'

interface ArchiveRoute {
  conversationId: string
  kind: ArchiveQueryKind
  cleanup: ReturnType<typeof setTimeout>
}

/**
 * Schedules archive work for conversations.
 *
 * Two independent queues: history loads (the last N messages of a
 * conversation, driving the warm-up signal) and recency probes (the last
 * one or few, used only for their timestamps). Results stream in as
 * `archive:result` events and are routed to their conversation by query
 * id; a route outlives its query by a grace period so late results still
 * land.
 */
export class ArchiveScheduler {
  private readonly routes = new Map<string, ArchiveRoute>()
  private readonly history: FetchQueue
  private readonly recency: FetchQueue
  private readonly limits: ArchiveLimits
  private readonly routeGraceMs: number
  private readonly unsubscribe: () => void
  private disposed = false

  constructor(private readonly deps: ArchiveSchedulerDependencies) {
    const { mamLastItems: history, mamRecencyLastItems: recency } = CONFIG_LIMITS
    const limits = { ...DEFAULT_ARCHIVE_LIMITS, ...deps.limits }
    this.limits = {
      historyLastItems: clamp(limits.historyLastItems, history.min, history.max),
      recencyLastItems: clamp(limits.recencyLastItems, recency.min, recency.max),
    }
    this.routeGraceMs = deps.routeGraceMs ?? ARCHIVE_ROUTE_GRACE_MS

    this.history = new FetchQueue(
      'history load',
      (conversationId) => this.runQuery(conversationId, 'history'),
      (active) => deps.emitSDK('archive:warmup', { active })
    )
    this.recency = new FetchQueue('recency probe', (conversationId) => this.runQuery(conversationId, 'recency'))

    this.unsubscribe = deps.subscribe('archive:result', ({ queryId, message }) => {
      this.handleResult(queryId, message)
    })
  }

  /** True while history loads are queued or in flight. */
  get isHistoryWarmup(): boolean {
    return this.history.isBusy
  }

  ensureHistoryLoaded(conversationId: string): void {
    this.history.ensure(conversationId)
  }

  ensureRecencyProbed(conversationId: string): void {
    this.recency.ensure(conversationId)
  }

  isHistoryLoaded(conversationId: string): boolean {
    return this.history.isDone(conversationId)
  }

  isRecencyProbed(conversationId: string): boolean {
    return this.recency.isDone(conversationId)
  }

  /** Conversation a query id currently routes to. */
  routeOf(queryId: string): { conversationId: string; kind: ArchiveQueryKind } | null {
    const route = this.routes.get(queryId)
    return route ? { conversationId: route.conversationId, kind: route.kind } : null
  }

  dispose(): void {
    this.disposed = true
    this.history.dispose()
    this.recency.dispose()
    this.unsubscribe()
    for (const route of this.routes.values()) clearTimeout(route.cleanup)
    this.routes.clear()
  }

  private async runQuery(conversationId: string, kind: ArchiveQueryKind): Promise<void> {
    const queryId = generateId('mam')
    const max = kind === 'history' ? this.limits.historyLastItems : this.limits.recencyLastItems
    this.armRoute(queryId, conversationId, kind)
    try {
      await this.deps.queryArchive({ with: conversationId, max, queryId })
    } finally {
      // Final batches can trail the completion
      if (!this.disposed) this.armRoute(queryId, conversationId, kind)
    }
  }

  private armRoute(queryId: string, conversationId: string, kind: ArchiveQueryKind): void {
    const existing = this.routes.get(queryId)
    if (existing) clearTimeout(existing.cleanup)
    const cleanup = setTimeout(() => {
      this.routes.delete(queryId)
    }, this.routeGraceMs)
    this.routes.set(queryId, { conversationId, kind, cleanup })
  }

  private handleResult(queryId: string, message: ArchivedMessage): void {
    const route = this.routes.get(queryId)
    if (!route) return
    const { conversationId, kind } = route
    this.armRoute(queryId, conversationId, kind)

    const { activity } = this.deps
    // Bodyless results still count for ordering
    activity.getState().noteActivity(conversationId, message.timestamp)
    if (kind === 'recency') return
    if (!message.body) return

    const input = {
      id: `mam:${message.id}`,
      body: message.body,
      timestamp: message.timestamp,
      attachmentUrl: message.attachmentUrl,
      meta: message.meta,
    }
    const ownJid = getBareJid(this.deps.getOwnJid() ?? '')
    if (ownJid && message.from === ownJid) {
      activity.getState().appendOutgoing(conversationId, input, { isArchived: true })
    } else {
      activity.getState().appendIncoming(conversationId, input, { isArchived: true })
    }
  }
}
