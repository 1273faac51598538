export type Labels = Record<string, string>

interface Series<T> {
  labels: Labels
  data: T
}

/** One value per distinct label set; label order does not matter */
class LabeledSeries<T> {
  private readonly series = new Map<string, Series<T>>()

  constructor(private readonly initial: () => T) {}

  get(labels: Labels = {}): T {
    const key = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([name, value]) => `${name}=${value}`)
      .join(',')
    let entry = this.series.get(key)
    if (!entry) {
      entry = { labels: { ...labels }, data: this.initial() }
      this.series.set(key, entry)
    }
    return entry.data
  }

  peek(labels: Labels = {}): T | undefined {
    for (const entry of this.series.values()) {
      if (sameLabels(entry.labels, labels)) return entry.data
    }
    return undefined
  }

  entries(): Series<T>[] {
    return Array.from(this.series.values())
  }
}

function sameLabels(a: Labels, b: Labels): boolean {
  const keys = Object.keys(a)
  return keys.length === Object.keys(b).length && keys.every((k) => a[k] === b[k])
}

export class Counter {
  private readonly series = new LabeledSeries(() => ({ total: 0 }))

  constructor(readonly name: string, readonly help: string) {}

  inc(labels?: Labels, by = 1) {
    this.series.get(labels).total += by
  }

  value(labels?: Labels): number {
    return this.series.peek(labels)?.total ?? 0
  }

  snapshot() {
    return this.series.entries().map(({ labels, data }) => ({ labels, value: data.total }))
  }
}

/** Millisecond observations summarized as count, sum and max */
export class Histogram {
  private readonly series = new LabeledSeries(() => ({ count: 0, sum: 0, max: 0 }))

  constructor(readonly name: string, readonly help: string) {}

  observe(ms: number, labels?: Labels) {
    const stats = this.series.get(labels)
    stats.count += 1
    stats.sum += ms
    stats.max = Math.max(stats.max, ms)
  }

  /** The returned function records and returns the elapsed ms */
  startTimer(labels?: Labels): () => number {
    const startedAt = Date.now()
    return () => {
      const elapsed = Date.now() - startedAt
      this.observe(elapsed, labels)
      return elapsed
    }
  }

  snapshot() {
    return this.series.entries().map(({ labels, data }) => ({
      labels,
      count: data.count,
      sum: data.sum,
      avg: data.sum / data.count,
      max: data.max,
    }))
  }
}

export class MetricsRegistry {
  private readonly counters = new Map<string, Counter>()
  private readonly histograms = new Map<string, Histogram>()

  counter(name: string, help: string): Counter {
    const counter = this.counters.get(name) ?? new Counter(name, help)
    this.counters.set(name, counter)
    return counter
  }

  histogram(name: string, help: string): Histogram {
    const histogram = this.histograms.get(name) ?? new Histogram(name, help)
    this.histograms.set(name, histogram)
    return histogram
  }

  asJson() {
    const describe = ({ name, help }: { name: string; help: string }) => ({ name, help })
    return {
      counters: Array.from(this.counters.values(), (c) => ({ ...describe(c), series: c.snapshot() })),
      histograms: Array.from(this.histograms.values(), (h) => ({ ...describe(h), series: h.snapshot() })),
    }
  }
}
