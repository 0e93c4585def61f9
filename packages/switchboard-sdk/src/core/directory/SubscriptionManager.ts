import { logInfo, logWarn } from '../logger'
import { describeError } from '../../utils/xmppError'

/**
 * Tracks notification topics subscribed to on the pubsub service.
 *
 * A topic is either unsubscribed, pending (request in flight) or
 * subscribed (acknowledged). At most one request is in flight per topic;
 * a failed request returns the topic to unsubscribed.
 */
export class SubscriptionManager {
  private readonly subscribed = new Set<string>()
  private readonly pending = new Set<string>()

  constructor(private readonly subscribe: (topic: string) => Promise<void>) {}

  isSubscribed(topic: string): boolean {
    return this.subscribed.has(topic)
  }

  isPending(topic: string): boolean {
    return this.pending.has(topic)
  }

  ensureSubscribed(topic: string): void {
    if (this.subscribed.has(topic) || this.pending.has(topic)) return
    this.pending.add(topic)

    void this.subscribe(topic).then(
      () => {
        this.pending.delete(topic)
        this.subscribed.add(topic)
        logInfo(`Subscribed to ${topic}`)
      },
      (err: unknown) => {
        this.pending.delete(topic)
        logWarn(`Subscribe to ${topic} failed: ${describeError(err)}`)
      }
    )
  }
}
