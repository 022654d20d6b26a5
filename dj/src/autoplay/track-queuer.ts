import { createChildLogger } from '@autodj/logger';
import { RepeatRejected, type TrackNotFound } from '../errors.js';
import type { HistoryLog } from '../history/history-log.js';
import type { PlaybackAdapter } from '../playback.js';
import type { TrackResolver } from '../resolver.js';
import { formatTrack, type HistorySource, type ResolvedTrack, type TrackCandidate } from '../types.js';
import { sameSong } from './matching.js';
import type { UpNext } from './up-next.js';

const log = createChildLogger({ component: 'queuer' });

export interface TrackQueuerDependencies {
  resolver: TrackResolver;
  history: HistoryLog;
  playback: Pick<PlaybackAdapter, 'enqueue'>;
  upNext: UpNext;
}

export interface QueueAllOptions {
  source: HistorySource;
  /** Stop after this many tracks were queued. */
  limit: number;
  current: ResolvedTrack | null;
  signal?: AbortSignal;
}

export interface QueueAllResult {
  queued: ResolvedTrack[];
  rejected: RepeatRejected[];
  missing: TrackNotFound[];
}

/**
 * Puts resolved tracks on the remote queue under the repeat guard.
 *
 * A track is reserved in the up-next list before its enqueue request leaves,
 * so every caller sharing the list sees it while the request is pending. A
 * failed request drops the reservation again.
 */
export class TrackQueuer {
  constructor(
    private readonly deps: TrackQueuerDependencies,
    private readonly repeatWindow: number,
  ) {}

  /** Heard recently, already waiting in up-next, or playing right now. */
  isRepeatCandidate(candidate: TrackCandidate, current: ResolvedTrack | null): boolean {
    return (
      this.deps.history.isRecentCandidate(candidate, this.repeatWindow) ||
      this.deps.upNext.containsSong(candidate) ||
      (current !== null && sameSong(current, candidate))
    );
  }

  isRepeatTrack(track: ResolvedTrack, current: ResolvedTrack | null): boolean {
    return (
      this.deps.history.isRecent(track.id, this.repeatWindow) ||
      this.deps.upNext.contains(track.id) ||
      current?.id === track.id
    );
  }

  async enqueue(track: ResolvedTrack, source: HistorySource): Promise<void> {
    const { upNext, playback, history } = this.deps;
    upNext.add(track, source);
    try {
      await playback.enqueue(track.id);
    } catch (error) {
      upNext.remove(track.id);
      throw error;
    }
    history.record({ track, source, action: 'queued' });
  }

  /**
   * Resolves and queues candidates in order until `limit` tracks are queued
   * or the signal aborts. Repeats and catalog misses are skipped and
   * reported; playback errors propagate.
   */
  async queueAll(candidates: readonly TrackCandidate[], options: QueueAllOptions): Promise<QueueAllResult> {
    const result: QueueAllResult = { queued: [], rejected: [], missing: [] };

    for (const candidate of candidates) {
      if (result.queued.length >= options.limit || options.signal?.aborted) break;
      if (this.isRepeatCandidate(candidate, options.current)) {
        result.rejected.push(new RepeatRejected(candidate.title, candidate.artist));
        continue;
      }

      const resolution = await this.deps.resolver.resolve(candidate);
      if (options.signal?.aborted) break;
      if (!resolution.success) {
        result.missing.push(resolution.error);
        continue;
      }

      const track = resolution.data;
      if (this.isRepeatTrack(track, options.current)) {
        result.rejected.push(new RepeatRejected(candidate.title, candidate.artist));
        continue;
      }
      await this.enqueue(track, options.source);
      result.queued.push(track);
    }

    log.info(
      {
        source: options.source,
        queued: result.queued.map(formatTrack),
        rejected: result.rejected.length,
        missing: result.missing.length,
      },
      'Queued batch of tracks',
    );
    return result;
  }
}
