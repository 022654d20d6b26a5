export * from './types.js';
export * from './errors.js';
export { KeyedMutex } from './keyedMutex.js';
export type { PlaybackAdapter, PlaybackSnapshot } from './playback.js';
export { CatalogTrackResolver, type TrackResolver } from './resolver.js';
export { autoDjSettingsFromEnv } from './settings.js';

export { HistoryLog, type RecordInput } from './history/history-log.js';
export { JsonlHistoryStore, deserializeEntry, serializeEntry, type HistoryStore } from './history/history-store.js';

export {
  GptRecommendationEngine,
  StaticRecommendationEngine,
  promptVariables,
  type CompletionBackend,
  type CompletionOptions,
  type RecommendationContext,
  type RecommendationEngine,
} from './recommendation/engine.js';
export { parseRecommendation, MAX_CANDIDATES, type Recommendation } from './recommendation/parse.js';
export {
  BUNDLED_PROMPTS_FILE,
  loadPromptTemplates,
  renderPrompt,
  type PromptKey,
  type PromptTemplates,
  type PromptVariables,
} from './recommendation/prompts.js';

export {
  AutoDjController,
  type AutoDjDependencies,
  type AutoDjSettings,
  type AutoDjState,
  type CycleOutcome,
  type TriggerReason,
} from './autoplay/controller.js';
export { cooldownDelay, intervalElapsed, shouldRefillQueue } from './autoplay/logic.js';
export { sameSong } from './autoplay/matching.js';
export { UpNext } from './autoplay/up-next.js';
export {
  TrackQueuer,
  type QueueAllOptions,
  type QueueAllResult,
  type TrackQueuerDependencies,
} from './autoplay/track-queuer.js';
export {
  MysteryCrate,
  MYSTERY_OPTIONS,
  type DealContext,
  type DealOutcome,
  type MysteryCrateDependencies,
  type MysteryOption,
} from './autoplay/mystery-crate.js';

export { DjMetrics } from './services/metrics.js';
export { SpotifyPlaybackAdapter, type SpotifyCredentials } from './services/spotify.js';
export {
  OpenAiCompletionBackend,
  createChatClient,
  type ChatClient,
  type CompletionExchange,
} from './services/openai.js';
export { DisabledScrobbler, LastFmScrobbler, type ScrobbleAdapter } from './services/lastfm.js';
export { LrclibLyricsAdapter, type LyricsAdapter } from './services/lyrics.js';
