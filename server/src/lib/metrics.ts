export type Labels = Record<string, string>

/** Prometheus client default buckets, in seconds. */
export const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10]

type Series = {
  labels: Labels
  bucketCounts: number[]
  sum: number
  count: number
}

/**
 * Cumulative histogram rendered in the Prometheus text exposition format.
 *
 * @example
 * ```ts
 * const latency = new Histogram('chatbox_http_request_duration_seconds', 'HTTP request duration')
 * latency.observe({ endpoint: '/chatbox/healthz', method: 'GET' }, 0.004)
 * ```
 */
export class Histogram {
  readonly buckets: number[]
  private readonly series = new Map<string, Series>()

  constructor(
    readonly name: string,
    readonly help: string,
    buckets: number[] = DEFAULT_BUCKETS,
  ) {
    this.buckets = [...buckets].sort((a, b) => a - b)
  }

  observe(labels: Labels, value: number): void {
    const key = labelKey(labels)
    const s = this.series.get(key) ?? { labels, bucketCounts: this.buckets.map(() => 0), sum: 0, count: 0 }
    s.sum += value
    s.count += 1
    this.buckets.forEach((le, i) => {
      if (value <= le) s.bucketCounts[i] = (s.bucketCounts[i] ?? 0) + 1
    })
    this.series.set(key, s)
  }

  getCount(labels: Labels): number {
    return this.series.get(labelKey(labels))?.count ?? 0
  }

  expose(): string {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`]
    for (const [key, s] of this.series) {
      this.buckets.forEach((le, i) => {
        lines.push(`${this.name}_bucket${labelKey({ ...s.labels, le: String(le) })} ${s.bucketCounts[i] ?? 0}`)
      })
      lines.push(`${this.name}_bucket${labelKey({ ...s.labels, le: '+Inf' })} ${s.count}`)
      lines.push(`${this.name}_sum${key} ${s.sum}`)
      lines.push(`${this.name}_count${key} ${s.count}`)
    }
    return lines.join('\n')
  }
}

export class MetricsRegistry {
  readonly httpRequestDuration = new Histogram(
    'chatbox_http_request_duration_seconds',
    'HTTP request duration in seconds by endpoint and method',
  )

  expose(): string {
    return `${this.httpRequestDuration.expose()}\n`
  }
}

/** `{a="1",b="2"}` with keys sorted (`le` always last), or `` for no labels. */
function labelKey(labels: Labels): string {
  const entries = Object.entries(labels).sort(([a], [b]) => (a === 'le' ? 1 : b === 'le' ? -1 : a.localeCompare(b)))
  if (entries.length === 0) return ''
  return `{${entries.map(([k, v]) => `${k}="${v.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`).join(',')}}`
}
