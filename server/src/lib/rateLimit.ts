export type RateLimiterOptions = {
  windowMs: number
  maxHits: number
  /** How often idle clients are swept. Defaults to the window size. */
  sweepIntervalMs?: number
  now?: () => number
}

export type HitResult = { allowed: boolean; remaining: number; retryAfterSeconds: number }

/**
 * Per-client sliding-window limiter kept in process memory (one instance only).
 *
 * A client's timestamps are pruned on every hit and the client is forgotten as
 * soon as none remain in the window. Clients that never come back are swept
 * once per interval, from the next hit or from an unref'd timer when idle.
 */
export class InMemoryRateLimiter {
  private readonly clients = new Map<string, number[]>()
  private readonly windowMs: number
  private readonly maxHits: number
  private readonly now: () => number
  private readonly sweepIntervalMs: number
  private lastSweep: number
  private sweepTimer: ReturnType<typeof setInterval> | null

  constructor(opts: RateLimiterOptions) {
    this.windowMs = opts.windowMs
    this.maxHits = opts.maxHits
    this.now = opts.now ?? Date.now
    this.sweepIntervalMs = opts.sweepIntervalMs ?? opts.windowMs
    this.lastSweep = this.now()
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs)
    this.sweepTimer.unref()
  }

  /** Number of clients currently tracked. */
  get size(): number {
    return this.clients.size
  }

  hit(clientId: string): HitResult {
    const t = this.now()
    if (t - this.lastSweep >= this.sweepIntervalMs) this.sweep()
    const hits = this.recentHits(clientId, t)

    if (hits.length >= this.maxHits) {
      const oldest = hits[0] ?? t
      const retryAfterMs = Math.max(0, oldest + this.windowMs - t)
      return { allowed: false, remaining: 0, retryAfterSeconds: Math.ceil(retryAfterMs / 1000) }
    }

    hits.push(t)
    this.clients.set(clientId, hits)
    return { allowed: true, remaining: this.maxHits - hits.length, retryAfterSeconds: 0 }
  }

  /** Drop clients with no hits left in the window. */
  sweep(): void {
    const t = this.now()
    this.lastSweep = t
    for (const clientId of [...this.clients.keys()]) this.recentHits(clientId, t)
  }

  /** Stop the sweep timer and forget every client. */
  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
    this.clients.clear()
  }

  private recentHits(clientId: string, t: number): number[] {
    const cutoff = t - this.windowMs
    const hits = (this.clients.get(clientId) ?? []).filter((ts) => ts >= cutoff)
    if (hits.length === 0) this.clients.delete(clientId)
    else this.clients.set(clientId, hits)
    return hits
  }
}
