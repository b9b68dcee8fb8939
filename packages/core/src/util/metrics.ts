import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  SHAPE_CHECK: 'shapeCheckMs',
  REFERENCE_LOAD: 'referenceLoadMs',
  EXTRACTION: 'extractionMs',
  INSTANCE_VALIDATION: 'instanceValidationMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

export type MetricsSnapshot = Record<MetricsPhaseKey, number> & {
  remoteFetches: number;
  definitionsLoaded: number;
  definitionsRejected: number;
};

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

type Counter = 'remoteFetches' | 'definitionsLoaded' | 'definitionsRejected';

/**
 * Phase timers and counters for definition loading. Timers accumulate
 * across calls; `snapshot()` reports totals in milliseconds.
 */
export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly totals: Record<MetricsPhaseKey, number>;
  private readonly counters: Record<Counter, number>;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.totals = {
      shapeCheckMs: 0,
      referenceLoadMs: 0,
      extractionMs: 0,
      instanceValidationMs: 0,
    };
    this.counters = {
      remoteFetches: 0,
      definitionsLoaded: 0,
      definitionsRejected: 0,
    };
  }

  /**
   * Time an async step; the elapsed time is recorded whether the step
   * resolves or rejects. Overlapping measurements of one phase add up.
   */
  public async measure<T>(phase: MetricPhase, fn: () => Promise<T>): Promise<T> {
    const startedAt = this.now();
    try {
      return await fn();
    } finally {
      this.record(phase, this.now() - startedAt);
    }
  }

  public measureSync<T>(phase: MetricPhase, fn: () => T): T {
    const startedAt = this.now();
    try {
      return fn();
    } finally {
      this.record(phase, this.now() - startedAt);
    }
  }

  private record(phase: MetricPhase, elapsed: number): void {
    if (!this.enabled) return;
    this.totals[METRIC_PHASES[phase]] += Math.max(0, elapsed);
  }

  public increment(counter: Counter, by = 1): void {
    if (!this.enabled) return;
    this.counters[counter] += by;
  }

  public snapshot(): MetricsSnapshot {
    return { ...this.totals, ...this.counters };
  }

  public reset(): void {
    for (const key of Object.values(METRIC_PHASES)) {
      this.totals[key] = 0;
    }
    this.counters.remoteFetches = 0;
    this.counters.definitionsLoaded = 0;
    this.counters.definitionsRejected = 0;
  }
}
