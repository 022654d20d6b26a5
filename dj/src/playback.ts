import type { ResolvedTrack } from './types.js';

export interface PlaybackSnapshot {
  track: ResolvedTrack;
  isPlaying: boolean;
  progressMs: number;
  durationMs: number;
  volumePercent: number | null;
}

/**
 * Remote playback service as seen by the core. Auth and token refresh stay
 * inside the implementation; failures surface as UpstreamUnavailable.
 */
export interface PlaybackAdapter {
  /** Catalog search ranked by the service, best first. */
  search(title: string, artist: string, limit?: number): Promise<ResolvedTrack[]>;
  enqueue(trackId: string): Promise<void>;
  play(trackId?: string): Promise<void>;
  pause(): Promise<void>;
  skip(): Promise<void>;
  previous(): Promise<void>;
  seek(positionMs: number): Promise<void>;
  setVolume(percent: number): Promise<void>;
  currentlyPlaying(): Promise<PlaybackSnapshot | null>;
}
