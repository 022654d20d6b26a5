import type { ParseFailure } from '../errors.js';
import { formatTrack, type HistoryEntry, type ResolvedTrack, type Result, type TrackCandidate } from '../types.js';
import { parseRecommendation, type Recommendation } from './parse.js';
import type { PromptKey, PromptVariables } from './prompts.js';
import { sameSong } from '../autoplay/matching.js';

export interface RecommendationContext {
  current: ResolvedTrack | null;
  /** Most recent last. */
  recent: readonly HistoryEntry[];
  signal?: AbortSignal;
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

/** Text completion keyed by prompt template; throws UpstreamUnavailable. */
export interface CompletionBackend {
  complete(key: PromptKey, variables: PromptVariables, options?: CompletionOptions): Promise<string>;
}

/**
 * Anything that can propose the next track. Malformed output is a
 * ParseFailure value; upstream outages are thrown. No retries here.
 */
export interface RecommendationEngine {
  suggest(context: RecommendationContext): Promise<Result<Recommendation, ParseFailure>>;
}

export function promptVariables(context: Pick<RecommendationContext, 'current' | 'recent'>): PromptVariables {
  const seed = context.current ?? context.recent.at(-1)?.track ?? null;
  const seen = new Set<string>();
  const lines: string[] = [];
  for (const entry of context.recent) {
    const line = `- ${formatTrack(entry.track)}`;
    if (seen.has(line)) continue;
    seen.add(line);
    lines.push(line);
  }
  return {
    song_name: seed?.title ?? 'nothing yet',
    artist_name: seed?.artist ?? 'no artist yet',
    recent_tracks: lines.length > 0 ? lines.join('\n') : '- (none)',
  };
}

export class GptRecommendationEngine implements RecommendationEngine {
  constructor(
    private readonly backend: CompletionBackend,
    private readonly templateKey: Extract<PromptKey, 'auto_dj' | 'auto_dj_batch' | 'recommend_next_song'> = 'auto_dj',
  ) {}

  async suggest(context: RecommendationContext): Promise<Result<Recommendation, ParseFailure>> {
    const text = await this.backend.complete(this.templateKey, promptVariables(context), { signal: context.signal });
    return parseRecommendation(text);
  }
}

/**
 * Rule-based engine cycling through a fixed crate, skipping songs found in
 * the supplied recent history.
 */
export class StaticRecommendationEngine implements RecommendationEngine {
  private cursor = 0;

  constructor(private readonly crate: readonly TrackCandidate[]) {}

  async suggest(context: RecommendationContext): Promise<Result<Recommendation, ParseFailure>> {
    const candidates: TrackCandidate[] = [];
    for (let i = 0; i < this.crate.length; i++) {
      const candidate = this.crate[(this.cursor + i) % this.crate.length];
      if (!candidate) continue;
      const heard = context.recent.some((entry) => sameSong(entry.track, candidate));
      const playing = context.current !== null && sameSong(context.current, candidate);
      if (!heard && !playing) candidates.push(candidate);
    }
    this.cursor = this.crate.length > 0 ? (this.cursor + 1) % this.crate.length : 0;
    return parseRecommendation(
      JSON.stringify(candidates.map((candidate) => ({ track_name: candidate.title, artist_name: candidate.artist }))),
    );
  }
}
