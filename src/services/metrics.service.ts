export interface DurationSummary {
  count: number;
  p50: number;
  p95: number;
  max: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  durations: Record<string, DurationSummary>;
}

const MAX_SAMPLES = 1000;

function percentile(sorted: readonly number[], fraction: number): number {
  return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * fraction))] ?? 0;
}

/**
 * In-process counters and fetch-latency samples. Names are dotted, e.g.
 * `fetch.league_site.ok` or `cache.reference_site.hit`. Nothing leaves the
 * process; callers read `snapshot()`.
 */
export class MetricsService {
  private readonly counters = new Map<string, number>();
  private readonly samples = new Map<string, number[]>();

  increment(name: string, value = 1): void {
    this.counters.set(name, this.counter(name) + value);
  }

  /** Keeps the most recent samples per name. */
  recordDuration(name: string, ms: number): void {
    const values = this.samples.get(name) ?? [];
    values.push(ms);
    if (values.length > MAX_SAMPLES) values.splice(0, values.length - MAX_SAMPLES);
    this.samples.set(name, values);
  }

  counter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): MetricsSnapshot {
    const durations: Record<string, DurationSummary> = {};
    for (const [name, values] of this.samples) {
      if (values.length === 0) continue;
      const sorted = [...values].sort((a, b) => a - b);
      durations[name] = {
        count: sorted.length,
        p50: percentile(sorted, 0.5),
        p95: percentile(sorted, 0.95),
        max: sorted[sorted.length - 1],
      };
    }
    return { counters: Object.fromEntries(this.counters), durations };
  }

  reset(): void {
    this.counters.clear();
    this.samples.clear();
  }
}

export const metrics = new MetricsService();
