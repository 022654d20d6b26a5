import { TrackNotFound } from './errors.js';
import { artistsMatch, titlesMatch } from './autoplay/matching.js';
import type { PlaybackAdapter } from './playback.js';
import { fail, ok, type ResolvedTrack, type Result, type TrackCandidate } from './types.js';

export interface TrackResolver {
  resolve(candidate: TrackCandidate): Promise<Result<ResolvedTrack, TrackNotFound>>;
}

/**
 * Resolves candidates against the playback catalog. Read-only: it only
 * searches, so calling it twice for an unchanged catalog gives the same id.
 * A search hit must line up with the candidate on both title and artist; when
 * no hit does, the candidate counts as not found.
 */
export class CatalogTrackResolver implements TrackResolver {
  constructor(
    private readonly playback: Pick<PlaybackAdapter, 'search'>,
    private readonly searchLimit = 5,
  ) {}

  async resolve(candidate: TrackCandidate): Promise<Result<ResolvedTrack, TrackNotFound>> {
    const hits = await this.playback.search(candidate.title, candidate.artist, this.searchLimit);
    const match = hits.find(
      (hit) => titlesMatch(hit.title, candidate.title) && artistsMatch(hit.artist, candidate.artist),
    );
    return match ? ok(match) : fail(new TrackNotFound(candidate.title, candidate.artist));
  }
}
