import { EventEmitter } from 'node:events';
import { createChildLogger } from '@autodj/logger';
import {
  describeError,
  ParseFailure,
  RepeatRejected,
  TrackNotFound,
  UpstreamUnavailable,
} from '../errors.js';
import type { HistoryLog } from '../history/history-log.js';
import type { PlaybackAdapter } from '../playback.js';
import type { RecommendationEngine } from '../recommendation/engine.js';
import type { TrackResolver } from '../resolver.js';
import type { CycleOutcomeLabel, DjMetrics } from '../services/metrics.js';
import { formatTrack, type ResolvedTrack, type TrackCandidate } from '../types.js';
import { cooldownDelay, type BackoffSettings } from './logic.js';
import { TrackQueuer } from './track-queuer.js';
import type { UpNext } from './up-next.js';

const log = createChildLogger({ component: 'autodj' });

export type AutoDjState = 'disabled' | 'idle' | 'fetching' | 'cooldown';
export type TriggerReason = 'queue-low' | 'interval' | 'manual';

export type CycleOutcome =
  | { kind: 'queued'; track: ResolvedTrack; narrative?: string }
  | { kind: 'parse-failure'; error: ParseFailure }
  | { kind: 'not-found'; error: TrackNotFound }
  | { kind: 'repeat-rejected'; error: RepeatRejected }
  | { kind: 'upstream-unavailable'; error: UpstreamUnavailable }
  | { kind: 'error'; error: Error }
  | { kind: 'discarded' }
  | { kind: 'ignored'; state: AutoDjState };

export interface AutoDjSettings extends BackoffSettings {
  /** Played/queued entries the repeat guard looks back over. */
  repeatWindow: number;
  /** Cooldown after the playback or recommendation service failed. */
  upstreamCooldownMs: number;
  /** History entries handed to the engine as context. */
  contextWindow?: number;
}

export interface AutoDjDependencies {
  engine: RecommendationEngine;
  resolver: TrackResolver;
  history: HistoryLog;
  playback: Pick<PlaybackAdapter, 'enqueue'>;
  upNext: UpNext;
  currentTrack: () => ResolvedTrack | null;
  metrics?: DjMetrics;
}

export interface AutoDjEvents {
  state: (next: AutoDjState, previous: AutoDjState) => void;
  outcome: (outcome: CycleOutcome) => void;
}

const OUTCOME_LABELS: Record<Exclude<CycleOutcome['kind'], 'ignored'>, CycleOutcomeLabel> = {
  queued: 'queued',
  'parse-failure': 'parse_failure',
  'not-found': 'not_found',
  'repeat-rejected': 'repeat_rejected',
  'upstream-unavailable': 'upstream_unavailable',
  error: 'error',
  discarded: 'discarded',
};

/**
 * Auto-DJ loop controller.
 *
 *   disabled --enable--> idle --trigger--> fetching --queued--> idle
 *                                             |
 *                                          failure --> cooldown --timer--> idle
 *
 * `disable()` is accepted in every state. It bumps the generation, aborts the
 * in-flight fetch and cancels the cooldown timer; any result that arrives for
 * an older generation is dropped without enqueueing.
 */
export class AutoDjController {
  private readonly events = new EventEmitter();
  private readonly contextWindow: number;
  private readonly queuer: TrackQueuer;
  private current: AutoDjState = 'disabled';
  private generation = 0;
  private consecutiveFailures = 0;
  private inFlight: AbortController | null = null;
  private cooldownTimer: NodeJS.Timeout | null = null;
  private cooldownUntil: number | null = null;

  constructor(
    private readonly deps: AutoDjDependencies,
    private readonly settings: AutoDjSettings,
  ) {
    this.contextWindow = settings.contextWindow ?? settings.repeatWindow;
    this.queuer = new TrackQueuer(deps, settings.repeatWindow);
  }

  get state(): AutoDjState {
    return this.current;
  }

  get enabled(): boolean {
    return this.current !== 'disabled';
  }

  get failureStreak(): number {
    return this.consecutiveFailures;
  }

  /** Epoch ms when the running cooldown ends, or null. */
  get cooldownEndsAt(): number | null {
    return this.cooldownUntil;
  }

  on<E extends keyof AutoDjEvents>(event: E, listener: AutoDjEvents[E]): this {
    this.events.on(event, listener);
    return this;
  }

  off<E extends keyof AutoDjEvents>(event: E, listener: AutoDjEvents[E]): this {
    this.events.off(event, listener);
    return this;
  }

  enable(): void {
    if (this.current !== 'disabled') return;
    this.consecutiveFailures = 0;
    this.deps.metrics?.setConsecutiveFailures(0);
    this.transition('idle');
  }

  disable(): void {
    if (this.current === 'disabled') return;
    this.generation++;
    this.inFlight?.abort();
    this.inFlight = null;
    this.clearCooldown();
    this.transition('disabled');
  }

  toggle(): boolean {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
    return this.enabled;
  }

  /**
   * Runs one recommendation cycle if the controller is idle. Never rejects:
   * every failure ends up as an outcome plus a state transition.
   */
  async trigger(reason: TriggerReason): Promise<CycleOutcome> {
    if (this.current !== 'idle') {
      return { kind: 'ignored', state: this.current };
    }

    const generation = this.generation;
    const abort = new AbortController();
    this.inFlight = abort;
    this.transition('fetching');
    log.debug({ reason, generation }, 'Auto-DJ cycle started');

    const isCurrent = (): boolean => generation === this.generation;
    let outcome: CycleOutcome;
    try {
      outcome = await this.runCycle(abort.signal, isCurrent);
    } catch (error) {
      outcome = this.classify(error);
    }

    if (this.inFlight === abort) {
      this.inFlight = null;
    }
    if (!isCurrent() && outcome.kind !== 'queued') {
      outcome = { kind: 'discarded' };
    }

    this.finish(outcome, isCurrent());
    return outcome;
  }

  private async runCycle(signal: AbortSignal, isCurrent: () => boolean): Promise<CycleOutcome> {
    const { engine, resolver, history } = this.deps;
    const current = this.deps.currentTrack();

    const suggestion = await engine.suggest({
      current,
      recent: history.recent(this.contextWindow),
      signal,
    });
    if (!isCurrent()) return { kind: 'discarded' };
    if (!suggestion.success) {
      return { kind: 'parse-failure', error: suggestion.error };
    }

    let rejected: RepeatRejected | null = null;
    let missing: TrackNotFound | null = null;

    for (const candidate of suggestion.data.candidates) {
      if (this.queuer.isRepeatCandidate(candidate, current)) {
        rejected = this.reject(candidate);
        continue;
      }

      const resolution = await resolver.resolve(candidate);
      if (!isCurrent()) return { kind: 'discarded' };
      if (!resolution.success) {
        missing = resolution.error;
        log.warn({ candidate }, 'Auto-DJ candidate not found in catalog');
        continue;
      }

      const track = resolution.data;
      if (this.queuer.isRepeatTrack(track, current)) {
        rejected = this.reject(candidate);
        continue;
      }

      // Once the request has left, the remote queue holds the track whatever
      // the local state is, so the result is reported even after a disable.
      await this.queuer.enqueue(track, 'auto');
      const { narrative } = suggestion.data;
      return narrative === undefined ? { kind: 'queued', track } : { kind: 'queued', track, narrative };
    }

    if (missing) return { kind: 'not-found', error: missing };
    if (rejected) return { kind: 'repeat-rejected', error: rejected };
    return {
      kind: 'parse-failure',
      error: new ParseFailure('Recommendation contained no candidates'),
    };
  }

  private reject(candidate: TrackCandidate): RepeatRejected {
    log.debug({ candidate }, 'Auto-DJ candidate rejected as a recent repeat');
    return new RepeatRejected(candidate.title, candidate.artist);
  }

  private classify(error: unknown): CycleOutcome {
    if (error instanceof UpstreamUnavailable) {
      return { kind: 'upstream-unavailable', error };
    }
    if (error instanceof ParseFailure) {
      return { kind: 'parse-failure', error };
    }
    return { kind: 'error', error: error instanceof Error ? error : new Error(String(error)) };
  }

  private finish(outcome: CycleOutcome, stillCurrent: boolean): void {
    if (outcome.kind === 'ignored') return;
    this.deps.metrics?.recordCycle(OUTCOME_LABELS[outcome.kind]);

    if (outcome.kind === 'queued') {
      this.consecutiveFailures = 0;
      this.deps.metrics?.setConsecutiveFailures(0);
      log.info({ track: formatTrack(outcome.track), id: outcome.track.id }, 'Auto-DJ queued track');
      if (stillCurrent) this.transition('idle');
    } else if (outcome.kind === 'discarded') {
      log.debug('Auto-DJ result discarded after disable');
    } else {
      this.consecutiveFailures++;
      this.deps.metrics?.setConsecutiveFailures(this.consecutiveFailures);
      this.logFailure(outcome);
      this.startCooldown(outcome.kind === 'upstream-unavailable');
    }

    this.events.emit('outcome', outcome);
  }

  private logFailure(outcome: Exclude<CycleOutcome, { kind: 'queued' | 'discarded' | 'ignored' }>): void {
    const context = { failures: this.consecutiveFailures, error: describeError(outcome.error) };
    switch (outcome.kind) {
      case 'repeat-rejected':
        log.debug(context, 'Auto-DJ cycle produced only recent repeats');
        break;
      case 'parse-failure':
      case 'not-found':
        log.warn(context, 'Auto-DJ cycle failed, cooling down');
        break;
      case 'upstream-unavailable':
        log.error(context, 'Auto-DJ upstream failure, pausing');
        break;
      case 'error':
        log.error(context, 'Auto-DJ cycle crashed, cooling down');
        break;
    }
  }

  private startCooldown(upstream: boolean): void {
    const backoff = cooldownDelay(this.consecutiveFailures, this.settings);
    const delay = upstream ? Math.max(backoff, this.settings.upstreamCooldownMs) : backoff;
    const generation = this.generation;

    this.clearCooldown();
    this.transition('cooldown');
    this.cooldownUntil = Date.now() + delay;
    this.cooldownTimer = setTimeout(() => {
      this.cooldownTimer = null;
      this.cooldownUntil = null;
      if (generation === this.generation && this.current === 'cooldown') {
        this.transition('idle');
      }
    }, delay);
    this.cooldownTimer.unref?.();
  }

  private clearCooldown(): void {
    if (this.cooldownTimer) {
      clearTimeout(this.cooldownTimer);
      this.cooldownTimer = null;
    }
    this.cooldownUntil = null;
  }

  private transition(next: AutoDjState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    log.debug({ from: previous, to: next }, 'Auto-DJ state change');
    this.events.emit('state', next, previous);
  }
}
