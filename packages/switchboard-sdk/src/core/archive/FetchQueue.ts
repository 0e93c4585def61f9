import { logError } from '../logger'
import { describeError } from '../../utils/xmppError'

/**
 * Serial, de-duplicating queue of per-conversation archive fetches.
 *
 * Each target moves queued → in flight → done. `ensure` is a no-op for a
 * target in any of those states. One fetch runs at a time. A failed fetch
 * is logged and the target is forgotten, so a later `ensure` retries it.
 * After `dispose` the queue accepts and starts nothing.
 */
export class FetchQueue {
  private readonly queue: string[] = []
  private readonly queued = new Set<string>()
  private readonly done = new Set<string>()
  private inFlight: string | null = null
  private busy = false
  private disposed = false

  /**
   * @param label - Queue name used in log lines
   * @param fetch - Runs one archive query for a conversation
   * @param onBusyChange - Called when the queue starts or drains
   */
  constructor(
    private readonly label: string,
    private readonly fetch: (conversationId: string) => Promise<void>,
    private readonly onBusyChange?: (busy: boolean) => void
  ) {}

  get isBusy(): boolean {
    return this.busy
  }

  has(conversationId: string): boolean {
    return this.queued.has(conversationId) || this.inFlight === conversationId || this.done.has(conversationId)
  }

  isDone(conversationId: string): boolean {
    return this.done.has(conversationId)
  }

  /** @returns true when the conversation was enqueued */
  ensure(rawId: string): boolean {
    const conversationId = rawId.trim()
    if (this.disposed || !conversationId || this.has(conversationId)) return false

    this.queued.add(conversationId)
    this.queue.push(conversationId)
    this.setBusy(true)
    if (this.inFlight === null) this.processNext()
    return true
  }

  /**
   * Drop everything still queued. A fetch in flight runs to completion but
   * starts nothing after it, and the busy callback no longer fires.
   */
  dispose(): void {
    this.disposed = true
    this.queue.length = 0
    this.queued.clear()
    this.busy = false
  }

  private processNext(): void {
    if (this.disposed) return
    const next = this.queue.shift()
    if (next === undefined) {
      this.setBusy(false)
      return
    }
    this.queued.delete(next)
    this.inFlight = next

    void this.fetch(next)
      .then(
        () => {
          this.done.add(next)
        },
        (err: unknown) => {
          logError(`Archive ${this.label} failed for ${next}: ${describeError(err)}`)
        }
      )
      .finally(() => {
        this.inFlight = null
        this.processNext()
      })
  }

  private setBusy(busy: boolean): void {
    if (this.busy === busy) return
    this.busy = busy
    this.onBusyChange?.(busy)
  }
}
