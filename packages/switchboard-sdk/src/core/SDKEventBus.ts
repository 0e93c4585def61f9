import type { SDKEventHandler, SDKEvents } from './types'

type HandlerRegistry = { [K in keyof SDKEvents]?: Set<SDKEventHandler<K>> }

/**
 * Typed publish/subscribe for SDK events.
 *
 * Handlers run synchronously in subscription order. A handler added while
 * an event is being delivered first sees the next one.
 *
 * @internal
 */
export class SDKEventBus {
  private readonly handlers: HandlerRegistry = {}

  subscribe<K extends keyof SDKEvents>(event: K, handler: SDKEventHandler<K>): () => void {
    const existing: Set<SDKEventHandler<K>> | undefined = this.handlers[event]
    const set = existing ?? new Set<SDKEventHandler<K>>()
    if (!existing) this.handlers[event] = set
    set.add(handler)
    return () => {
      set.delete(handler)
    }
  }

  emit<K extends keyof SDKEvents>(event: K, payload: SDKEvents[K]): void {
    const set: Set<SDKEventHandler<K>> | undefined = this.handlers[event]
    if (!set) return
    for (const handler of [...set]) handler(payload)
  }

  listenerCount(event: keyof SDKEvents): number {
    return this.handlers[event]?.size ?? 0
  }
}
