import type { HistorySource, ResolvedTrack, TrackCandidate } from '../types.js';
import { sameSong } from './matching.js';

interface PendingTrack {
  track: ResolvedTrack;
  source: HistorySource;
}

/**
 * Tracks queued from this session that have not started playing yet. A
 * track is added before its enqueue request leaves, so concurrent cycles see
 * it, and leaves the list when it becomes the current track.
 */
export class UpNext {
  private readonly tracks: PendingTrack[] = [];

  get length(): number {
    return this.tracks.length;
  }

  add(track: ResolvedTrack, source: HistorySource = 'auto'): void {
    this.tracks.push({ track, source });
  }

  /** Drops a reservation whose enqueue failed. */
  remove(trackId: string): boolean {
    const index = this.tracks.findIndex((pending) => pending.track.id === trackId);
    if (index < 0) return false;
    this.tracks.splice(index, 1);
    return true;
  }

  pending(): readonly ResolvedTrack[] {
    return this.tracks.map((pending) => pending.track);
  }

  peek(): ResolvedTrack | undefined {
    return this.tracks[0]?.track;
  }

  contains(trackId: string): boolean {
    return this.tracks.some((pending) => pending.track.id === trackId);
  }

  containsSong(candidate: TrackCandidate): boolean {
    return this.tracks.some((pending) => sameSong(pending.track, candidate));
  }

  /**
   * Called when `track` starts playing. Drops it and anything queued ahead
   * of it (those were skipped on the remote side). Returns who queued it, or
   * null when it did not come from this list.
   */
  consume(track: ResolvedTrack): HistorySource | null {
    const index = this.tracks.findIndex((pending) => pending.track.id === track.id);
    if (index < 0) return null;
    const source = this.tracks[index]?.source ?? null;
    this.tracks.splice(0, index + 1);
    return source;
  }

  clear(): void {
    this.tracks.length = 0;
  }
}
