import { describe, it, expect } from 'vitest';
import { DjMetrics } from '../src/services/metrics.js';

describe('DjMetrics', () => {
  it('counts cycles by outcome and enqueued tracks', async () => {
    const metrics = new DjMetrics();

    metrics.recordCycle('queued');
    metrics.recordCycle('queued');
    metrics.recordCycle('parse_failure');
    metrics.setConsecutiveFailures(1);

    expect(await metrics.snapshot()).toEqual({
      'autodj_cycles_total{outcome=queued}': 2,
      'autodj_cycles_total{outcome=parse_failure}': 1,
      autodj_tracks_enqueued_total: 2,
      autodj_consecutive_failures: 1,
    });
  });

  it('keeps registries separate per instance', async () => {
    const first = new DjMetrics();
    const second = new DjMetrics();
    first.recordCycle('queued');

    expect((await second.snapshot()).autodj_tracks_enqueued_total).toBe(0);
  });
});
