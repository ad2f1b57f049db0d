import type { Logger } from '@workspace/logger';

type CounterName =
  | 'requests.total'
  | 'requests.failed'
  | 'records.saved'
  | 'records.dropped'
  | 'chunks.flushed'
  | 'retries.empty'
  | 'retries.error';

type GaugeName = 'cursor' | 'buffer.size';

type MetricSnapshot = {
  counters: Partial<Record<CounterName, number>>;
  gauges: Partial<Record<GaugeName, number>>;
  requestDurations: {
    count: number;
    min: number;
    max: number;
    avg: number;
  };
};

export class FetchMetrics {
  private readonly counters = new Map<CounterName, number>();
  private readonly gauges = new Map<GaugeName, number>();
  private durationCount = 0;
  private durationTotal = 0;
  private durationMin = Number.POSITIVE_INFINITY;
  private durationMax = 0;

  increment(counter: CounterName, amount = 1): void {
    this.counters.set(counter, (this.counters.get(counter) ?? 0) + amount);
  }

  gauge(name: GaugeName, value: number): void {
    this.gauges.set(name, value);
  }

  recordDuration(ms: number): void {
    this.durationCount += 1;
    this.durationTotal += ms;
    this.durationMin = Math.min(this.durationMin, ms);
    this.durationMax = Math.max(this.durationMax, ms);
  }

  snapshot(): MetricSnapshot {
    const counters: Partial<Record<CounterName, number>> = {};
    for (const [key, value] of this.counters) {
      counters[key] = value;
    }

    const gauges: Partial<Record<GaugeName, number>> = {};
    for (const [key, value] of this.gauges) {
      gauges[key] = value;
    }

    const count = this.durationCount;

    return {
      counters,
      gauges,
      requestDurations: {
        count,
        min: count > 0 ? this.durationMin : 0,
        max: this.durationMax,
        avg: count > 0 ? this.durationTotal / count : 0,
      },
    };
  }

  log(logger: Logger): void {
    logger.info('[Metrics]', this.snapshot());
  }
}

export type { CounterName, GaugeName, MetricSnapshot };
