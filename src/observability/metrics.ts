/**
 * Metrics recorded by the client and its gates
 */

export const MetricNames = {
  REQUEST_COUNT: 'x.requests.total',
  REQUEST_DURATION_MS: 'x.requests.duration_ms',
  REQUEST_ERRORS: 'x.requests.errors',
  QUOTA_REJECTIONS: 'x.gate.quota_rejections',
  CIRCUIT_REJECTIONS: 'x.gate.circuit_rejections',
  CIRCUIT_BREAKER_STATE: 'x.circuit_breaker.state',
  RETRY_ATTEMPTS: 'x.retry.attempts',
} as const;

export type MetricName = (typeof MetricNames)[keyof typeof MetricNames];

/** Label keys in the order they appear in a series key */
export const LABEL_KEYS = ['gate', 'endpoint', 'window', 'status', 'kind'] as const;

export type LabelKey = (typeof LABEL_KEYS)[number];

export type MetricLabels = Partial<Record<LabelKey, string>>;

/**
 * Gauge values for circuit states
 */
export const CircuitStateValue = {
  closed: 0,
  half_open: 1,
  open: 2,
} as const;

export interface MetricsCollector {
  /** Adds one to a counter */
  increment(name: MetricName, labels?: MetricLabels): void;
  observe(name: MetricName, value: number, labels?: MetricLabels): void;
  gauge(name: MetricName, value: number, labels?: MetricLabels): void;
}

interface Series {
  name: MetricName;
  count: number;
  observations: number[];
  gauge?: number;
}

/**
 * Keeps every series in memory. Used by tests and for local inspection.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly series = new Map<string, Series>();

  increment(name: MetricName, labels?: MetricLabels): void {
    this.seriesFor(name, labels).count += 1;
  }

  observe(name: MetricName, value: number, labels?: MetricLabels): void {
    this.seriesFor(name, labels).observations.push(value);
  }

  gauge(name: MetricName, value: number, labels?: MetricLabels): void {
    this.seriesFor(name, labels).gauge = value;
  }

  /** Counter value for exactly this label set */
  count(name: MetricName, labels?: MetricLabels): number {
    return this.series.get(seriesKey(name, labels))?.count ?? 0;
  }

  /** Counter value summed over every label set */
  total(name: MetricName): number {
    let sum = 0;
    for (const series of this.series.values()) {
      if (series.name === name) sum += series.count;
    }
    return sum;
  }

  observations(name: MetricName, labels?: MetricLabels): readonly number[] {
    return this.series.get(seriesKey(name, labels))?.observations ?? [];
  }

  gaugeValue(name: MetricName, labels?: MetricLabels): number | undefined {
    return this.series.get(seriesKey(name, labels))?.gauge;
  }

  clear(): void {
    this.series.clear();
  }

  private seriesFor(name: MetricName, labels?: MetricLabels): Series {
    const key = seriesKey(name, labels);
    let series = this.series.get(key);
    if (!series) {
      series = { name, count: 0, observations: [] };
      this.series.set(key, series);
    }
    return series;
  }
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  observe(): void {}
  gauge(): void {}
}

/**
 * `name{gate=write,window=15m}`, labels in LABEL_KEYS order, unset ones left out
 */
export function seriesKey(name: MetricName, labels: MetricLabels = {}): string {
  const parts: string[] = [];
  for (const key of LABEL_KEYS) {
    const value = labels[key];
    if (value !== undefined) parts.push(`${key}=${value}`);
  }
  return parts.length === 0 ? name : `${name}{${parts.join(',')}}`;
}
