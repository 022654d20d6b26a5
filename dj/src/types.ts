// Core data model shared by the Auto-DJ and the session console.

/** Unresolved suggestion coming back from the recommendation backend. */
export interface TrackCandidate {
  title: string;
  artist: string;
}

/** A candidate matched to a playable item of the remote catalog. */
export interface ResolvedTrack {
  readonly id: string;
  readonly title: string;
  readonly artist: string;
}

export type HistorySource = 'user' | 'auto';
export type HistoryAction = 'played' | 'skipped' | 'liked' | 'queued';

export interface HistoryEntry {
  readonly timestamp: Date;
  readonly track: ResolvedTrack;
  readonly source: HistorySource;
  readonly action: HistoryAction;
}

export type Result<T, E> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

export function resolvedTrack(id: string, title: string, artist: string): ResolvedTrack {
  return Object.freeze({ id, title, artist });
}

export function formatTrack(track: TrackCandidate): string {
  return `${track.title} by ${track.artist}`;
}
