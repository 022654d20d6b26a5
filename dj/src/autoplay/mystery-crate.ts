import { createChildLogger } from '@autodj/logger';
import { describeError, type ParseFailure } from '../errors.js';
import { promptVariables, type CompletionBackend } from '../recommendation/engine.js';
import { parseRecommendation } from '../recommendation/parse.js';
import type { TrackResolver } from '../resolver.js';
import {
  fail,
  formatTrack,
  ok,
  type HistoryEntry,
  type ResolvedTrack,
  type Result,
  type TrackCandidate,
} from '../types.js';
import type { TrackQueuer } from './track-queuer.js';

const log = createChildLogger({ component: 'mystery' });

export const MYSTERY_OPTIONS = 5;

export interface MysteryOption {
  candidate: TrackCandidate;
  /** Null when the catalog has no match. */
  track: ResolvedTrack | null;
}

export interface MysteryCrateDependencies {
  assistant: CompletionBackend;
  resolver: TrackResolver;
  queuer: TrackQueuer;
}

export interface DealContext {
  current: ResolvedTrack;
  recent: readonly HistoryEntry[];
  signal?: AbortSignal;
}

export type DealOutcome =
  | { kind: 'dealt'; options: readonly MysteryOption[] }
  | { kind: 'failed'; error: ParseFailure }
  | { kind: 'discarded' };

/**
 * Mystery crate mode. Each round asks the model for five follow-ups to the
 * playing track and queues the one it picked without saying which; the
 * listener can override it by choosing an option.
 *
 * Toggling off or starting a new round invalidates the running one.
 */
export class MysteryCrate {
  private on = false;
  private round = 0;
  private options: MysteryOption[] = [];
  private hiddenPick: string | null = null;

  constructor(private readonly deps: MysteryCrateDependencies) {}

  get enabled(): boolean {
    return this.on;
  }

  get awaitingChoice(): boolean {
    return this.options.length > 0;
  }

  get choiceCount(): number {
    return this.options.length;
  }

  toggle(): boolean {
    this.on = !this.on;
    if (!this.on) this.clear();
    return this.on;
  }

  /** Id of the secretly queued pick of the open round. */
  get hiddenPickId(): string | null {
    return this.hiddenPick;
  }

  async deal(context: DealContext): Promise<DealOutcome> {
    if (!this.on) return { kind: 'discarded' };
    this.clear();
    const round = this.round;
    const isCurrent = (): boolean => this.on && round === this.round;

    const text = await this.deps.assistant.complete('mystery_crate', promptVariables(context), {
      signal: context.signal,
    });
    if (!isCurrent()) return { kind: 'discarded' };
    const parsed = parseRecommendation(text, MYSTERY_OPTIONS);
    if (!parsed.success) {
      log.warn({ error: describeError(parsed.error) }, 'Mystery crate response unusable');
      return { kind: 'failed', error: parsed.error };
    }

    const options: MysteryOption[] = [];
    for (const candidate of parsed.data.candidates) {
      const resolution = await this.deps.resolver.resolve(candidate);
      if (!isCurrent()) return { kind: 'discarded' };
      options.push({ candidate, track: resolution.success ? resolution.data : null });
    }

    const { selectedIndex } = parsed.data;
    const pick = selectedIndex === undefined ? null : (options[selectedIndex]?.track ?? null);
    if (pick && !this.deps.queuer.isRepeatTrack(pick, context.current)) {
      this.hiddenPick = pick.id;
      try {
        await this.deps.queuer.enqueue(pick, 'auto');
      } catch (error) {
        this.hiddenPick = null;
        log.warn({ error: describeError(error) }, 'Mystery pick could not be queued');
      }
      if (!isCurrent()) return { kind: 'discarded' };
    } else if (pick === null) {
      log.warn({ selectedIndex }, 'Mystery crate pick missing or unavailable');
    }

    this.options = options;
    log.info({ options: options.map((option) => formatTrack(option.candidate)) }, 'Mystery crate dealt');
    return { kind: 'dealt', options };
  }

  /** Takes the listener's 1-based choice and closes the round. */
  choose(choice: number): Result<ResolvedTrack, string> {
    if (!this.awaitingChoice) return fail('No mystery selection pending');
    const option = this.options[choice - 1];
    if (!option) return fail('Invalid selection');
    if (!option.track) return fail('Selected track is unavailable');
    this.clear();
    return ok(option.track);
  }

  clear(): void {
    this.round++;
    this.options = [];
    this.hiddenPick = null;
  }

  /** Numbered options without marking the hidden pick. */
  display(): string {
    const lines = ['Mystery crate picks:'];
    this.options.forEach((option, index) => {
      const suffix = option.track ? '' : ' (unavailable)';
      lines.push(`${index + 1}. ${formatTrack(option.candidate)}${suffix}`);
    });
    lines.push(`Press 1-${this.options.length} to choose the next track`);
    return lines.join('\n');
  }
}
