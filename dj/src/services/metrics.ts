import { Counter, Gauge, Registry } from 'prom-client';

export type CycleOutcomeLabel =
  | 'queued'
  | 'parse_failure'
  | 'not_found'
  | 'repeat_rejected'
  | 'upstream_unavailable'
  | 'error'
  | 'discarded';

/**
 * Auto-DJ counters. Kept in a private registry; the console logs a snapshot
 * when the session ends.
 */
export class DjMetrics {
  readonly registry: Registry;
  private readonly cycles: Counter<'outcome'>;
  private readonly enqueued: Counter;
  private readonly failureStreak: Gauge;

  constructor(registry?: Registry) {
    this.registry = registry ?? new Registry();
    this.cycles = new Counter({
      name: 'autodj_cycles_total',
      help: 'Auto-DJ recommendation cycles by outcome',
      labelNames: ['outcome'],
      registers: [this.registry],
    });
    this.enqueued = new Counter({
      name: 'autodj_tracks_enqueued_total',
      help: 'Tracks added to the playback queue by the Auto-DJ',
      registers: [this.registry],
    });
    this.failureStreak = new Gauge({
      name: 'autodj_consecutive_failures',
      help: 'Failed Auto-DJ cycles since the last success',
      registers: [this.registry],
    });
  }

  recordCycle(outcome: CycleOutcomeLabel): void {
    this.cycles.inc({ outcome });
    if (outcome === 'queued') {
      this.enqueued.inc();
    }
  }

  setConsecutiveFailures(count: number): void {
    this.failureStreak.set(count);
  }

  /** Flat `name{labels}` → value map for logging. */
  async snapshot(): Promise<Record<string, number>> {
    const result: Record<string, number> = {};
    for (const metric of await this.registry.getMetricsAsJSON()) {
      for (const sample of metric.values) {
        const labels = Object.entries(sample.labels)
          .map(([key, value]) => `${key}=${String(value)}`)
          .join(',');
        result[labels ? `${metric.name}{${labels}}` : metric.name] = sample.value;
      }
    }
    return result;
  }
}
