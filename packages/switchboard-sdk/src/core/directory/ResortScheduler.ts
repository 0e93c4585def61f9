export const RESORT_DEBOUNCE_MS = 350
export const RESORT_SUPPRESS_MS = 1500

export interface ResortSchedulerOptions {
  /** Reorders the visible lists */
  resort: () => void
  /** True while a resort must not run (list loading, history warm-up) */
  isBlocked: () => boolean
  debounceMs?: number
}

/**
 * Debounces list reordering.
 *
 * Bursts of activity collapse into one resort {@link RESORT_DEBOUNCE_MS}
 * after the last trigger. A suppression window (opened after a dispatcher
 * switch or an applied list) holds resorts back and ends with exactly one
 * resort of its own.
 */
export class ResortScheduler {
  private debounceTimer: ReturnType<typeof setTimeout> | null = null
  private windowTimer: ReturnType<typeof setTimeout> | null = null
  private suppressedUntil = 0
  private readonly debounceMs: number

  constructor(private readonly options: ResortSchedulerOptions) {
    this.debounceMs = options.debounceMs ?? RESORT_DEBOUNCE_MS
  }

  get isSuppressed(): boolean {
    return Date.now() < this.suppressedUntil
  }

  get hasPendingResort(): boolean {
    return this.debounceTimer !== null
  }

  schedule(): void {
    if (this.debounceTimer) clearTimeout(this.debounceTimer)
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null
      this.flush()
    }, this.debounceMs)
  }

  /** Open (or extend) the suppression window. */
  suppressFor(ms: number = RESORT_SUPPRESS_MS): void {
    this.suppressedUntil = Date.now() + ms
    if (this.windowTimer) clearTimeout(this.windowTimer)
    this.windowTimer = setTimeout(() => {
      this.windowTimer = null
      this.flush()
    }, ms)
  }

  dispose(): void {
    if (this.debounceTimer) clearTimeout(this.debounceTimer)
    if (this.windowTimer) clearTimeout(this.windowTimer)
    this.debounceTimer = null
    this.windowTimer = null
  }

  private flush(): void {
    if (this.isSuppressed || this.options.isBlocked()) return
    this.options.resort()
  }
}
